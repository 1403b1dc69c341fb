/**
 * Errors raised at the edges of the pipeline. The formatters themselves never
 * throw; these cover configuration and tool input.
 */

export class InvalidPipelineConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid insight pipeline config: ${issues.join("; ")}`);
    this.name = "InvalidPipelineConfigError";
  }
}

export class PayloadFileError extends Error {
  constructor(public path: string, cause: unknown) {
    super(`Could not read insight payload from ${path}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "PayloadFileError";
  }
}

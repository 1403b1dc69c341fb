import { z } from "zod";
import { InvalidPipelineConfigError } from "./errors.js";

export const PipelineConfigSchema = z.object({
  similarity_containment_ratio: z.number().gt(0).lte(1),
  similarity_jaccard_threshold: z.number().gt(0).lte(1),
  template_min_length: z.number().int().nonnegative(),
  comfort_tip_max_words: z.number().int().positive(),
  app_names: z.array(z.string().min(1)).min(1),
  log_events: z.boolean(),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type SimilarityThresholds = Pick<
  PipelineConfig,
  "similarity_containment_ratio" | "similarity_jaccard_threshold"
>;

// Heuristic values carried over from the production formatter. Recalibrate
// through env overrides rather than editing call sites.
export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  similarity_containment_ratio: 0.8,
  similarity_jaccard_threshold: 0.7,
  template_min_length: 10,
  comfort_tip_max_words: 20,
  app_names: ["app", "flare"],
  log_events: false,
};

const EnvSchema = z.object({
  INSIGHT_SIMILARITY_CONTAINMENT: z.coerce.number().optional(),
  INSIGHT_SIMILARITY_JACCARD: z.coerce.number().optional(),
  INSIGHT_TEMPLATE_MIN_LENGTH: z.coerce.number().optional(),
  INSIGHT_COMFORT_TIP_MAX_WORDS: z.coerce.number().optional(),
  INSIGHT_APP_NAMES: z.string().optional(),
  INSIGHT_LOG_EVENTS: z.enum(["0", "1"]).optional(),
});

const blankToUndefined = (env: Record<string, string | undefined>): Record<string, string | undefined> =>
  Object.fromEntries(
    Object.entries(env).map(([key, value]) => [key, value === undefined || value.trim() === "" ? undefined : value.trim()])
  );

/**
 * Build the pipeline config from environment overrides on top of the defaults.
 * Throws InvalidPipelineConfigError when an override is present but malformed.
 */
export function loadPipelineConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsedEnv = EnvSchema.safeParse(blankToUndefined(env));
  if (!parsedEnv.success) {
    throw new InvalidPipelineConfigError(
      parsedEnv.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const overrides = parsedEnv.data;
  const appNames = overrides.INSIGHT_APP_NAMES?.split(",")
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);

  const candidate = {
    similarity_containment_ratio:
      overrides.INSIGHT_SIMILARITY_CONTAINMENT ?? DEFAULT_PIPELINE_CONFIG.similarity_containment_ratio,
    similarity_jaccard_threshold:
      overrides.INSIGHT_SIMILARITY_JACCARD ?? DEFAULT_PIPELINE_CONFIG.similarity_jaccard_threshold,
    template_min_length: overrides.INSIGHT_TEMPLATE_MIN_LENGTH ?? DEFAULT_PIPELINE_CONFIG.template_min_length,
    comfort_tip_max_words: overrides.INSIGHT_COMFORT_TIP_MAX_WORDS ?? DEFAULT_PIPELINE_CONFIG.comfort_tip_max_words,
    app_names: appNames && appNames.length > 0 ? appNames : DEFAULT_PIPELINE_CONFIG.app_names,
    log_events: overrides.INSIGHT_LOG_EVENTS === "1",
  };

  const result = PipelineConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new InvalidPipelineConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return result.data;
}

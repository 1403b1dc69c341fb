/**
 * Field resolution as an ordered list of fallback providers: the raw value is
 * passed through each step in turn, and the first step that yields nothing
 * hands the field over to the fixed default.
 */

export type FieldStep = {
  name: string;
  apply: (value: string) => string | undefined;
};

export type FieldResolution =
  | { source: "payload"; value: string }
  | { source: "default"; value: string; reason: string };

type Pending = { value: string } | { reason: string };

export function resolveField(
  raw: string | undefined,
  steps: readonly FieldStep[],
  fallback: () => string
): FieldResolution {
  const initial: Pending = raw !== undefined && raw.trim().length > 0 ? { value: raw } : { reason: "missing" };

  const outcome = steps.reduce<Pending>((current, step) => {
    if (!("value" in current)) return current;
    const next = step.apply(current.value)?.trim();
    return next ? { value: next } : { reason: step.name };
  }, initial);

  return "value" in outcome
    ? { source: "payload", value: outcome.value }
    : { source: "default", value: fallback(), reason: outcome.reason };
}

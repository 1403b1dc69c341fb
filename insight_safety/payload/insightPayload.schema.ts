import { z } from "zod";

// Upstream fields are loosely typed. Anything that is not a string counts as absent.
const optionalText = z.unknown().transform((value) => (typeof value === "string" ? value : undefined));

export const DailyInsightFieldsSchema = z.object({
  summary: optionalText,
  why: optionalText,
  comfort_tip: optionalText,
  sign_off: optionalText,
});

export const NestedDailyInsightSchema = z.object({
  summary_sentence: optionalText,
  why_line: optionalText,
  comfort_tip: optionalText,
  sign_off: optionalText,
});

export const StructuredDailyPayloadSchema = DailyInsightFieldsSchema.extend({
  daily_insight: NestedDailyInsightSchema.optional().catch(undefined),
});

export const WeeklyDayEntrySchema = z
  .object({
    label: optionalText,
    insight: optionalText,
  })
  .catch({ label: undefined, insight: undefined });

export const StructuredWeeklyPayloadSchema = z.object({
  weekly_summary: optionalText,
  preparation_tip: optionalText,
  daily_breakdown: z
    .union([z.array(WeeklyDayEntrySchema), z.record(z.unknown())])
    .optional()
    .catch(undefined),
});

export type DailyInsightFields = {
  summary?: string;
  why?: string;
  comfort_tip?: string;
  sign_off?: string;
};

export type WeeklyDayEntry = z.infer<typeof WeeklyDayEntrySchema>;

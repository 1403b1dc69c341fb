import { removeSourceCitations } from "../text/removeSourceCitations.js";
import { splitLines } from "../text/textNormalization.js";
import {
  StructuredDailyPayloadSchema,
  StructuredWeeklyPayloadSchema,
  type DailyInsightFields,
  type WeeklyDayEntry,
} from "./insightPayload.schema.js";

export type DailyPayload =
  | { kind: "empty" }
  | { kind: "structured"; fields: DailyInsightFields }
  | { kind: "legacy"; text: string };

export type WeeklyPayload =
  | { kind: "empty" }
  | { kind: "structured_list"; summary?: string; preparation_tip?: string; entries: WeeklyDayEntry[] }
  | { kind: "structured_map"; summary?: string; preparation_tip?: string; entries: Record<string, string> }
  | { kind: "legacy_multi_line"; lines: string[] }
  | { kind: "legacy_single_paragraph"; text: string };

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Normalise the raw response value: blank becomes undefined, a JSON object
 * string becomes the object, any other string stays legacy text.
 */
function decodeRaw(raw: unknown): Record<string, unknown> | string | undefined {
  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (trimmed.length === 0) return undefined;
    if (trimmed.startsWith("{")) {
      try {
        const parsed: unknown = JSON.parse(trimmed);
        if (isPlainObject(parsed)) return parsed;
      } catch {
        return raw;
      }
    }
    return raw;
  }
  return isPlainObject(raw) ? raw : undefined;
}

export function parseDailyPayload(raw: unknown): DailyPayload {
  const value = decodeRaw(raw);
  if (value === undefined) return { kind: "empty" };
  if (typeof value === "string") return { kind: "legacy", text: value };

  const parsed = StructuredDailyPayloadSchema.safeParse(value);
  if (!parsed.success) return { kind: "empty" };

  const { daily_insight: nested, ...flat } = parsed.data;
  const fields: DailyInsightFields = nested
    ? {
        summary: nested.summary_sentence,
        why: nested.why_line,
        comfort_tip: nested.comfort_tip,
        sign_off: nested.sign_off,
      }
    : flat;

  return { kind: "structured", fields };
}

export function parseWeeklyPayload(raw: unknown): WeeklyPayload {
  const value = decodeRaw(raw);
  if (value === undefined) return { kind: "empty" };

  if (typeof value === "string") {
    const lines = splitLines(removeSourceCitations(value));
    if (lines.length === 0) return { kind: "empty" };
    if (lines.length > 1) return { kind: "legacy_multi_line", lines };
    return { kind: "legacy_single_paragraph", text: lines[0] };
  }

  const parsed = StructuredWeeklyPayloadSchema.safeParse(value);
  if (!parsed.success) return { kind: "empty" };

  const { weekly_summary: summary, preparation_tip, daily_breakdown: breakdown } = parsed.data;

  if (breakdown !== undefined && !Array.isArray(breakdown)) {
    const entries: Record<string, string> = {};
    for (const [key, detail] of Object.entries(breakdown)) {
      if (typeof detail === "string") entries[key] = detail;
    }
    return { kind: "structured_map", summary, preparation_tip, entries };
  }

  return { kind: "structured_list", summary, preparation_tip, entries: breakdown ?? [] };
}

import { silentInsightLogger, type InsightLogger } from "../../logging/insightLog.js";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipelineConfig.js";
import { resolveField, type FieldStep } from "../daily/resolveField.js";
import type { WeeklyDayEntry } from "../payload/insightPayload.schema.js";
import { parseWeeklyPayload } from "../payload/parseInsightPayload.js";
import { filterAppReference } from "../text/filterAppReference.js";
import { removeSourceCitations } from "../text/removeSourceCitations.js";
import { repairBrokenTemplate } from "../text/repairBrokenTemplate.js";
import { sanitizeInsightText } from "../text/sanitizeInsightText.js";
import { ensureTerminalPunctuation, splitSentences, toSingleSentence } from "../text/textNormalization.js";
import { formatDayDetail, LOW_FLARE_RISK } from "./formatDayDetail.js";
import { nextSevenWeekdays, weekdayName, type WeekdayAbbreviation } from "./nextSevenWeekdays.js";
import { CONTEXT_AFTER, CONTEXT_BEFORE, DAY_PATTERN_RULES, DEFAULT_DAY_ROTATION } from "./weekPatterns.js";

export const DEFAULT_WEEKLY_SUMMARY = "A mostly steady week ahead with consistent conditions.";

const DAY_SEPARATOR = /\s*—\s*/;

export type WeekdayEntry = {
  label: WeekdayAbbreviation;
  detail: string;
};

export type FormattedWeeklyInsight = {
  /** Exactly one sentence. */
  summary: string;
  /** Always seven entries, starting the day after the reference date. */
  days: WeekdayEntry[];
  preparation_tip?: string;
};

export interface WeeklyInsightOptions {
  /** Captured once per call; defaults to now. */
  referenceDate?: Date;
  /** IANA zone used to decide which weekday the reference date falls on. */
  timeZone?: string;
  config?: PipelineConfig;
  logger?: InsightLogger;
}

type DayDetails = (string | undefined)[];

// Template repair reads the raw summary: the sanitizer would strip the
// measurements and leave the quantities they belonged to dangling.
function summarySteps(config: PipelineConfig, logger: InsightLogger): FieldStep[] {
  return [
    { name: "source_citations", apply: removeSourceCitations },
    {
      name: "template_repair",
      apply: (value) => {
        const repaired = repairBrokenTemplate(value, config.template_min_length);
        if (repaired !== ensureTerminalPunctuation(value)) {
          logger({ event: "insight.weekly.summary_repaired", field: "weekly_summary" });
        }
        return repaired;
      },
    },
    { name: "sanitize", apply: sanitizeInsightText },
    { name: "app_reference", apply: (value) => filterAppReference(value, config.app_names) },
    { name: "single_sentence", apply: toSingleSentence },
  ];
}

function resolveSummary(raw: string | undefined, config: PipelineConfig, logger: InsightLogger): string {
  const summary = resolveField(raw, summarySteps(config, logger), () => DEFAULT_WEEKLY_SUMMARY);
  if (summary.source === "default") {
    logger({
      event: summary.reason === "app_reference" ? "insight.field.app_reference_dropped" : "insight.field.defaulted",
      field: "weekly_summary",
      reason: summary.reason,
    });
  }
  return summary.value;
}

function resolvePreparationTip(raw: string | undefined, config: PipelineConfig): string | undefined {
  const tip = resolveField(
    raw,
    [
      { name: "sanitize", apply: sanitizeInsightText },
      { name: "app_reference", apply: (value) => filterAppReference(value, config.app_names) },
    ],
    () => ""
  );
  return tip.source === "payload" ? tip.value : undefined;
}

/** Day detail text that survived the app-reference filter, or undefined. */
const keepDetail = (text: string | undefined, config: PipelineConfig): string | undefined =>
  text === undefined ? undefined : filterAppReference(text, config.app_names);

function detailsFromList(entries: WeeklyDayEntry[], config: PipelineConfig): DayDetails {
  return entries.slice(0, 7).map((entry) => keepDetail(entry.insight, config));
}

function detailsFromMap(
  entries: Record<string, string>,
  labels: WeekdayAbbreviation[],
  config: PipelineConfig
): DayDetails {
  const byKey = new Map(
    Object.entries(entries).map(([key, detail]): [string, string] => [
      key.trim().replace(/\.$/, "").toLowerCase(),
      detail,
    ])
  );
  return labels.map((label) =>
    keepDetail(byKey.get(label.toLowerCase()) ?? byKey.get(weekdayName(label).toLowerCase()), config)
  );
}

function detailsFromLines(lines: string[], config: PipelineConfig): DayDetails {
  return lines
    .map((line) => line.split(DAY_SEPARATOR).filter(Boolean))
    .filter((parts) => parts.length >= 2)
    .slice(0, 7)
    .map((parts) => keepDetail(parts.slice(1).join(" — "), config));
}

/**
 * Phrase per coming day from the weather words near a mention of that day,
 * else the day's entry in the default rotation.
 */
function detailsFromParagraph(text: string, labels: WeekdayAbbreviation[]): DayDetails {
  const lower = text.toLowerCase();
  return labels.map((label, index) => {
    const mention = new RegExp(`\\b${weekdayName(label).toLowerCase()}s?\\b`).exec(lower);
    if (mention) {
      const context = lower.slice(Math.max(0, mention.index - CONTEXT_BEFORE), mention.index + CONTEXT_AFTER);
      const rule = DAY_PATTERN_RULES.find(([pattern]) => pattern.test(context));
      if (rule) return rule[1];
    }
    return DEFAULT_DAY_ROTATION[index];
  });
}

function buildDays(
  details: DayDetails,
  labels: WeekdayAbbreviation[],
  logger: InsightLogger
): WeekdayEntry[] {
  const missing = labels.length - details.filter((detail) => detail !== undefined).length;
  if (missing > 0) logger({ event: "insight.weekly.days_padded", count: missing });

  return labels.map((label, index) => {
    const detail = details[index];
    return { label, detail: detail === undefined ? LOW_FLARE_RISK : formatDayDetail(detail) };
  });
}

/**
 * Build the weekly insight: a one-sentence summary and exactly seven day
 * entries labeled from the reference date, whatever shape the payload takes.
 */
export function formatWeeklyInsight(raw: unknown, options: WeeklyInsightOptions = {}): FormattedWeeklyInsight {
  const { config = DEFAULT_PIPELINE_CONFIG, logger = silentInsightLogger, timeZone } = options;
  const labels = nextSevenWeekdays(options.referenceDate ?? new Date(), timeZone);

  const payload = parseWeeklyPayload(raw);
  logger({ event: "insight.payload.parsed", payload_kind: payload.kind });

  switch (payload.kind) {
    case "empty":
      return {
        summary: DEFAULT_WEEKLY_SUMMARY,
        days: labels.map((label) => ({ label, detail: LOW_FLARE_RISK })),
      };

    case "structured_list":
    case "structured_map": {
      const details =
        payload.kind === "structured_list"
          ? detailsFromList(payload.entries, config)
          : detailsFromMap(payload.entries, labels, config);
      const insight: FormattedWeeklyInsight = {
        summary: resolveSummary(payload.summary, config, logger),
        days: buildDays(details, labels, logger),
      };
      const preparationTip = resolvePreparationTip(payload.preparation_tip, config);
      if (preparationTip !== undefined) insight.preparation_tip = preparationTip;
      return insight;
    }

    case "legacy_multi_line":
      return {
        summary: resolveSummary(payload.lines[0], config, logger),
        days: buildDays(detailsFromLines(payload.lines.slice(1), config), labels, logger),
      };

    case "legacy_single_paragraph": {
      const [first, ...rest] = splitSentences(payload.text);
      const remaining = sanitizeInsightText(rest.join(". "));
      return {
        summary: resolveSummary(first, config, logger),
        days: buildDays(detailsFromParagraph(remaining, labels), labels, logger),
      };
    }
  }
}

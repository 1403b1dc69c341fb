import { silentInsightLogger, type InsightLogger } from "../../logging/insightLog.js";
import { classifyWeatherFactor } from "../classification/classifyWeatherFactor.js";
import type { WeatherFactor } from "../classification/types.js";
import { DEFAULT_PIPELINE_CONFIG, type PipelineConfig } from "../config/pipelineConfig.js";
import { parseDailyPayload, type DailyPayload } from "../payload/parseInsightPayload.js";
import { defaultRandomSource, type RandomSource } from "../random/randomSource.js";
import { areSimilar } from "../similarity/areSimilar.js";
import { filterAppReference } from "../text/filterAppReference.js";
import { sanitizeInsightText } from "../text/sanitizeInsightText.js";
import {
  ensureTerminalPunctuation,
  escapeRegExp,
  normalizeForComparison,
  splitSentences,
  wordCount,
} from "../text/textNormalization.js";
import {
  BODY_SENSATION_CATALOG,
  GENERIC_DISTINCT_WHY,
  SECONDARY_DISTINCT_WHY,
} from "../vague/bodySensationCatalog.js";
import { generateDistinctWhy } from "../vague/generateDistinctWhy.js";
import { containsVagueLanguage, rewriteVague } from "../vague/vagueLanguage.js";
import { namesCareTradition, pickComfortTip, pickSignOff } from "./approvedLines.js";
import { resolveField, type FieldResolution, type FieldStep } from "./resolveField.js";

export const DEFAULT_DAILY_SUMMARY = "Cooler air and steady pressure may make today easier on the body.";
export const DEFAULT_DAILY_WHY = "Steady pressure can ease tension in stiff joints.";

export const DEFAULT_DAILY_MESSAGE = [
  DEFAULT_DAILY_SUMMARY,
  "",
  `Why: ${DEFAULT_DAILY_WHY}`,
  "",
  "Comfort tip: Take short pauses through the day.",
  "",
  "Move at the pace that feels right.",
].join("\n");

export interface DailyInsightOptions {
  /** Separate "why" explanation from the analysis response; wins over the payload's own why when non-empty. */
  whyOverride?: string;
  random?: RandomSource;
  config?: PipelineConfig;
  logger?: InsightLogger;
}

type DailyCandidates = {
  summary?: string;
  why?: string;
  comfortTip?: string;
  signOff?: string;
};

const hasText = (value: string | undefined): value is string => value !== undefined && value.trim().length > 0;

function textSteps(config: PipelineConfig): FieldStep[] {
  return [
    { name: "sanitize", apply: sanitizeInsightText },
    { name: "app_reference", apply: (value) => filterAppReference(value, config.app_names) },
  ];
}

function extractCandidates(payload: DailyPayload, steps: FieldStep[]): DailyCandidates {
  if (payload.kind === "structured") {
    const { summary, why, comfort_tip, sign_off } = payload.fields;
    return { summary, why, comfortTip: comfort_tip, signOff: sign_off };
  }
  if (payload.kind === "legacy") {
    // Sentences are split before sanitizing so decimals and line structure survive.
    const kept = splitSentences(payload.text).flatMap((sentence) => {
      const resolved = resolveField(sentence, steps, () => "");
      return resolved.source === "payload" ? [resolved.value.replace(/[.!?]+$/, "")] : [];
    });
    return {
      summary: kept[0] === undefined ? undefined : `${kept[0]}.`,
      why: kept[1] === undefined ? undefined : `${kept[1]}.`,
    };
  }
  return {};
}

function logDefaulted(logger: InsightLogger, field: string, resolution: FieldResolution): void {
  if (resolution.source !== "default") return;
  logger({
    event: resolution.reason === "app_reference" ? "insight.field.app_reference_dropped" : "insight.field.defaulted",
    field,
    reason: resolution.reason,
  });
}

/**
 * Last resort when the regenerated why still restates the summary: the
 * secondary sentence, then any catalog sentence that reads differently.
 */
function forceDistinctWhy(summary: string, config: PipelineConfig): string {
  const candidates = [SECONDARY_DISTINCT_WHY, ...Object.values(BODY_SENSATION_CATALOG).flat(), GENERIC_DISTINCT_WHY];
  return candidates.find((candidate) => !areSimilar(summary, candidate, config)) ?? GENERIC_DISTINCT_WHY;
}

function resolveWhy(
  summary: string,
  why: string,
  factor: WeatherFactor,
  random: RandomSource,
  config: PipelineConfig,
  logger: InsightLogger
): string {
  let resolved = why;

  if (containsVagueLanguage(resolved)) {
    resolved = rewriteVague(resolved, factor, random);
    logger({ event: "insight.why.vague_rewritten", field: "why", reason: "vague" });
  }

  if (areSimilar(summary, resolved, config)) {
    resolved = generateDistinctWhy(summary, factor, config);
    logger({ event: "insight.why.regenerated", field: "why", reason: "similar_to_summary" });
    // regenerated text goes through the vague guard once more
    if (containsVagueLanguage(resolved)) resolved = rewriteVague(resolved, factor, random);
  }

  if (areSimilar(summary, resolved, config)) {
    resolved = forceDistinctWhy(summary, config);
    logger({ event: "insight.why.regenerated", field: "why", reason: "still_similar" });
  }

  return resolved;
}

function isAcceptableComfortTip(tip: string, config: PipelineConfig): boolean {
  if (wordCount(tip) > config.comfort_tip_max_words) return false;
  return namesCareTradition(tip) || !containsVagueLanguage(tip);
}

/**
 * Keep the comfort tip and sign-off from repeating each other. Returns the
 * comfort tip to show and the sign-off, or undefined when it is dropped.
 */
function dedupeClosingLines(
  comfortTip: string,
  signOff: string,
  config: PipelineConfig,
  logger: InsightLogger
): { comfortTip: string; signOff?: string } {
  const cleanSignOff = normalizeForComparison(signOff);

  if (areSimilar(normalizeForComparison(comfortTip), cleanSignOff, config)) {
    logger({ event: "insight.sign_off.dropped", field: "sign_off", reason: "similar_to_comfort_tip" });
    return { comfortTip };
  }

  if (!comfortTip.toLowerCase().includes(signOff.toLowerCase())) {
    return { comfortTip, signOff };
  }

  const stripped = comfortTip
    .replace(new RegExp(escapeRegExp(signOff), "gi"), " ")
    .replace(/\s+/g, " ")
    .replace(/^[\s,;:.]+|[\s,;:]+$/g, "");

  if (stripped.length > 0) {
    return { comfortTip: ensureTerminalPunctuation(stripped), signOff };
  }

  if (normalizeForComparison(comfortTip) === cleanSignOff) {
    logger({ event: "insight.sign_off.dropped", field: "sign_off", reason: "equals_comfort_tip" });
    return { comfortTip };
  }
  return { comfortTip, signOff };
}

/**
 * Build the daily insight card text from a structured or legacy payload.
 *
 * Never throws and never returns an empty string. Lines are separated by a
 * single blank line: summary, "Why: ...", optional "Comfort tip: ...", optional sign-off.
 */
export function formatDailyInsight(raw: unknown, options: DailyInsightOptions = {}): string {
  const {
    random = defaultRandomSource,
    config = DEFAULT_PIPELINE_CONFIG,
    logger = silentInsightLogger,
  } = options;

  const payload = parseDailyPayload(raw);
  logger({ event: "insight.payload.parsed", payload_kind: payload.kind });

  if (payload.kind === "empty") {
    logger({ event: "insight.daily.default_message", reason: "empty_payload" });
    return DEFAULT_DAILY_MESSAGE;
  }

  const steps = textSteps(config);
  const candidates = extractCandidates(payload, steps);

  const summary = resolveField(candidates.summary, steps, () => DEFAULT_DAILY_SUMMARY);
  logDefaulted(logger, "summary", summary);

  const whyCandidate = hasText(options.whyOverride) ? options.whyOverride : candidates.why;
  const why = resolveField(whyCandidate, steps, () => DEFAULT_DAILY_WHY);
  logDefaulted(logger, "why", why);

  const factor = classifyWeatherFactor(summary.value);
  const whyText = resolveWhy(summary.value, why.value, factor, random, config, logger);

  let comfortTip: string | undefined;
  let signOff: string | undefined;

  if (payload.kind === "structured") {
    const comfort = resolveField(
      candidates.comfortTip,
      [
        ...steps,
        { name: "comfort_tip_rules", apply: (tip) => (isAcceptableComfortTip(tip, config) ? tip : undefined) },
      ],
      () => pickComfortTip(random)
    );
    if (comfort.source === "default") {
      logger({ event: "insight.comfort_tip.replaced", field: "comfort_tip", reason: comfort.reason });
    }

    const signOffResolution = resolveField(candidates.signOff, steps, () => pickSignOff(random));
    logDefaulted(logger, "sign_off", signOffResolution);

    ({ comfortTip, signOff } = dedupeClosingLines(comfort.value, signOffResolution.value, config, logger));
  } else {
    // legacy text carries no comfort tip, only an approved sign-off
    signOff = pickSignOff(random);
  }

  if (comfortTip !== undefined && areSimilar(whyText, comfortTip, config)) {
    logger({ event: "insight.comfort_tip.dropped", field: "comfort_tip", reason: "similar_to_why" });
    comfortTip = undefined;
  }

  if (signOff !== undefined) {
    const previous = comfortTip ?? whyText;
    if (areSimilar(previous, signOff, config) || areSimilar(summary.value, signOff, config)) {
      logger({ event: "insight.sign_off.dropped", field: "sign_off", reason: "similar_to_previous_line" });
      signOff = undefined;
    }
  }

  const lines = [summary.value, "", `Why: ${whyText}`];
  if (comfortTip) lines.push("", `Comfort tip: ${comfortTip}`);
  if (signOff) lines.push("", signOff);

  return lines.join("\n").trim();
}

import { DEFAULT_PIPELINE_CONFIG } from "../config/pipelineConfig.js";
import { ensureTerminalPunctuation } from "./textNormalization.js";

export const CANNED_WEEKLY_SUMMARIES = {
  steady: "A steady week ahead with consistent conditions.",
  cooler: "A mostly stable pattern with slightly cooler conditions.",
  warmer: "A mostly stable pattern with mild temperatures.",
  neutral: "Weather stays fairly consistent through the week.",
} as const;

type Replacement = [RegExp, string];

// Shapes of the upstream weekly template with every value missing. Nothing
// readable survives these, so they go straight to a canned sentence.
const UNREPAIRABLE_SIGNATURES = [
  /the upcoming week presents.*temperatures around\s+to\b.*steady at.*humidity around/is,
  /consistent weather pattern.*temperatures around\s+to\b/is,
  /\bstable temperatures around\s+to\b/i,
  /\bsteady at\s*,\s*and\b/i,
  /\bhumidity around\s*\.?\s*$/i,
];

// A weather quantity whose value slot holds a number, a placeholder or
// nothing. Removing the value leaves "temperatures ranging with humidity",
// so the sentence is replaced rather than trimmed.
const VALUE_SLOT =
  /\b(?:temps|temperatures?|humidity|pressure)\b(?:\s+(?:steady|holding|hovering|sitting|staying|ranging))?\s+(?:from|between|around|near|at)\s*(?:[-+]?\d|\{|(?:to|and|with)\b|[,.;:!?]|$)/i;

const PLACEHOLDER_RULES: Replacement[] = [
  [/\{\{?[^{}]*\}?\}/g, ""],
  [/\b(?:null|undefined|NaN)\b/g, ""],
];

const NUMERIC_RULES: Replacement[] = [
  [/\d+(?:\.\d+)?\s*%/g, ""],
  [/\b(?:ranging\s+)?from\s+\d+(?:\.\d+)?\s+to\s+\d+(?:\.\d+)?/gi, ""],
  [/\bbetween\s+\d+(?:\.\d+)?\s+and\s+\d+(?:\.\d+)?/gi, ""],
  [/\b(?:steady\s+)?(?:at|around|near)\s+\d+(?:\.\d+)?/gi, ""],
  [/\d+(?:\.\d+)?\s*[-–]\s*\d+(?:\.\d+)?/g, ""],
];

const BROKEN_RANGE_RULES: Replacement[] = [
  [/\b(?:ranging\s+)?from\s+to\b/gi, ""],
  [/\bbetween\s+and\b/gi, ""],
  [/\b(?:around|near)\s+to\b/gi, ""],
];

const DANGLING_CONNECTIVE_RULES: Replacement[] = [
  [/\b(?:steady\s+)?(?:at|around|near)\s*(?=[,.;:!?]|$)/gi, ""],
  [/\b(?:steady\s+)?(?:at|around|near)\s+(?=(?:and|with)\b)/gi, ""],
  [/\b(temps|temperatures|pressure|humidity)\s+(?:ranging|from|between)\s*(?=[,.;:!?]|$)/gi, "$1"],
];

const CLEANUP_RULES: Replacement[] = [
  [/\s+/g, " "],
  [/\s+([,.;:!?])/g, "$1"],
  [/,(?:\s*,)+/g, ","],
  [/,\s*(?:and|with)\s*(?=[.!?]|$)/gi, ""],
  [/\s+(?:and|with)\s*(?=[.!?]|$)/gi, ""],
  [/^\s*(?:and|with)\s+/i, ""],
  [/[,;:]\s*(?=[.!?]|$)/g, ""],
  [/^[\s,;:.]+/, ""],
];

const applyAll = (text: string, rules: Replacement[]): string =>
  rules.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);

function cannedSummaryFor(original: string): string {
  const lower = original.toLowerCase();
  if (lower.includes("steady") || lower.includes("stable")) return CANNED_WEEKLY_SUMMARIES.steady;
  if (lower.includes("cool")) return CANNED_WEEKLY_SUMMARIES.cooler;
  if (lower.includes("warm")) return CANNED_WEEKLY_SUMMARIES.warmer;
  return CANNED_WEEKLY_SUMMARIES.neutral;
}

/**
 * Neutralise fragments left behind when the upstream template lost its
 * interpolated values ("around to", "steady at ,", "{min_temp}").
 */
export function repairBrokenTemplate(
  text: string,
  minLength: number = DEFAULT_PIPELINE_CONFIG.template_min_length
): string {
  if (UNREPAIRABLE_SIGNATURES.some((pattern) => pattern.test(text)) || VALUE_SLOT.test(text)) {
    return cannedSummaryFor(text);
  }

  let repaired = applyAll(text, PLACEHOLDER_RULES);
  repaired = applyAll(repaired, NUMERIC_RULES);
  repaired = applyAll(repaired, BROKEN_RANGE_RULES);
  repaired = applyAll(repaired, DANGLING_CONNECTIVE_RULES);
  repaired = applyAll(repaired, CLEANUP_RULES).trim();

  if (repaired.length < minLength) {
    return cannedSummaryFor(text);
  }
  return ensureTerminalPunctuation(repaired);
}

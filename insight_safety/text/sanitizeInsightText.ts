import { capitalizeSentences, escapeRegExp } from "./textNormalization.js";

/**
 * Strip markup, measurements and forbidden vocabulary from a fragment of model output.
 *
 * Total and idempotent: any string maps to a string, and running the result
 * through again returns it unchanged.
 */

type Replacement = [RegExp, string];

const MARKUP_RULES: Replacement[] = [
  [/<br\s*\/?>/gi, " "],
  [/(?:☀️?\s*)?\bdaily\s+insight\b\s*:?/gi, " "],
  [/\*+/g, ""],
  [/_+/g, ""],
  [/•/g, " "],
  [/(^|\n)[ \t]*[-–][ \t]+/g, "$1"],
];

const NUMBER = String.raw`[-+]?\d+(?:[.,]\d+)?`;
const NUMBER_RANGE = String.raw`${NUMBER}(?:\s*(?:-|–|to|and)\s*${NUMBER})?`;
const UNIT = [
  String.raw`°\s*[cf]\b`,
  String.raw`°`,
  String.raw`degrees?\b(?:\s+(?:celsius|fahrenheit|c|f)\b)?`,
  String.raw`celsius\b`,
  String.raw`fahrenheit\b`,
  "%",
  String.raw`percent\b`,
  String.raw`hpa\b`,
  String.raw`hectopascals?\b`,
  String.raw`mbar\b`,
  String.raw`mb\b`,
  String.raw`millibars?\b`,
  String.raw`kpa\b`,
  String.raw`mmhg\b`,
  String.raw`inhg\b`,
  String.raw`[cf]\b`,
].join("|");
const CONNECTIVE = String.raw`(?:\b(?:at|around|near|about|roughly|approximately|of|to|from|between)\s+)?`;

const MEASUREMENT_PATTERN = new RegExp(`${CONNECTIVE}${NUMBER_RANGE}\\s*(?:${UNIT})`, "gi");

export const FORBIDDEN_TERMS = [
  "barometric",
  "atmospheric",
  "dew point",
  "pressure gradient",
  "trough",
  "isobars",
  "isobar",
  "hectopascals",
  "millibars",
  "hpa",
  "mbar",
  "mb",
  "kpa",
  "mmhg",
  "inhg",
  "you should",
  "you must",
  "try to",
  "make sure to",
  "be sure to",
  "good day for",
  "keeps things gentle",
  "conditions stay stable",
  "high/low sensitivity",
];

const FORBIDDEN_TERM_PATTERNS = FORBIDDEN_TERMS.map(
  (term) => new RegExp(`\\b${escapeRegExp(term)}\\b`, "gi")
);

const TIDY_RULES: Replacement[] = [
  [/\s+/g, " "],
  [/\s+([,.;:!?])/g, "$1"],
  [/([,;:])(?:\s*[,;:])+/g, "$1"],
  [/[,;:]\s*([.!?])/g, "$1"],
  [/([.!?])(?:\s*[.!?])+/g, "$1"],
  [/^[\s,;:.!?\-–—]+/, ""],
];

const MAX_PASSES = 8;

const applyAll = (text: string, rules: Replacement[]): string =>
  rules.reduce((current, [pattern, replacement]) => current.replace(pattern, replacement), text);

function sanitizeOnce(text: string): string {
  let out = applyAll(text, MARKUP_RULES);
  out = out.replace(MEASUREMENT_PATTERN, " ");
  out = FORBIDDEN_TERM_PATTERNS.reduce((current, pattern) => current.replace(pattern, " "), out);
  out = applyAll(out, TIDY_RULES).trim();
  return capitalizeSentences(out);
}

export function sanitizeInsightText(text: string): string {
  if (typeof text !== "string") return "";
  // A removal can bring two fragments together into a new match, so passes
  // repeat until the text settles.
  let current = text;
  for (let pass = 0; pass < MAX_PASSES; pass++) {
    const next = sanitizeOnce(current);
    if (next === current) return next;
    current = next;
  }
  return current;
}

import type { RiskLevel } from "./types.js";

export const LOW_RISK_MARKERS = [
  /\blow flare risk\b/,
  /\b(?:steady|calm|stable)\s+(?:pattern|conditions|trend|pressure)\b/,
];

export const HIGHER_RISK_MARKERS = [
  /\bmoderate/,
  /\bhigh(?:er)?\b/,
  /\brising\b/,
  /\bshift/,
  /\bstorm/,
  /\bfront\b/,
  /\bstiff/,
  /\btiring\b/,
  /\bdraining\b/,
  /\bheavy\b/,
  /\bsluggish\b/,
  /\btense\b/,
  /\bsensitive\b/,
  /\beffortful\b/,
  /\bwatch for\b/,
];

const GENTLE = /\bgentle\b/;
const MILD = /\bmild\b/;
// A hyphen only joins clauses when spaced; "low-key" is one word.
const WEATHER_DETAIL = /\s[-–—]\s|[—–]|humid|temperat|pressure/;

/**
 * Decide whether a weekly day detail reads as a quiet day or one worth describing.
 * Explicit low markers beat risk markers; without either, embedded weather
 * detail means elevated.
 */
export function classifyRisk(detail: string): RiskLevel {
  const lower = detail.toLowerCase();

  if (LOW_RISK_MARKERS.some((pattern) => pattern.test(lower))) return "low";

  const hasRiskMarker = HIGHER_RISK_MARKERS.some((pattern) => pattern.test(lower));
  if (hasRiskMarker) return "elevated";

  if (GENTLE.test(lower) && MILD.test(lower)) return "low";
  if (WEATHER_DETAIL.test(lower)) return "elevated";

  return "low";
}

import { classifyRisk } from "../classification/classifyRisk.js";
import { sanitizeInsightText } from "../text/sanitizeInsightText.js";

export const LOW_FLARE_RISK = "low flare risk";

const LEADING_MARKER = /^\s*(?:[-•*]|\d+[.)])\s*/;

/**
 * Weekly day detail: quiet days collapse to "low flare risk", anything else
 * keeps its sanitized wording.
 */
export function formatDayDetail(text: string): string {
  const sanitized = sanitizeInsightText(text.replace(LEADING_MARKER, ""));
  if (sanitized.length === 0) return LOW_FLARE_RISK;
  return classifyRisk(sanitized) === "low" ? LOW_FLARE_RISK : sanitized;
}

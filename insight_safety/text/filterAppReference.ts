import { DEFAULT_PIPELINE_CONFIG } from "../config/pipelineConfig.js";
import { escapeRegExp } from "./textNormalization.js";

/**
 * Usage nudges that upstream generation sometimes slips into insight text.
 * Each is only disqualifying next to a reference to the product itself.
 */
export const APP_INSTRUCTION_PATTERNS = [
  /\bjot(?:s|ted|ting)?\b/,
  /\bteach(?:es|ing)?\b/,
  /\bthose notes\b/,
  /\bnote-taking\b/,
  /\b(?:take|taking|add|adding) (?:a )?notes?\b/,
  /\blog(?:s|ged|ging)?\b/,
  /\bone minute\b/,
  /\bmatters most\b/,
  /\bdrop a (?:quick )?update\b/,
  /\bupdate (?:in|the)\b/,
  /\bso the guidance stays personal\b/,
];

// "low flare risk" and "flare-ups" name a symptom, not the product.
const SYMPTOM_SUFFIX = String.raw`(?![\s-]+(?:risks?|ups?|days?)\b)`;

const ONE_MINUTE = /\bone minute\b/;
const JOT = /\bjot(?:s|ted|ting)?\b/;

/**
 * Returns undefined when the fragment is an app-usage nudge rather than
 * weather or body content; otherwise returns the text untouched.
 */
export function filterAppReference(
  text: string,
  appNames: readonly string[] = DEFAULT_PIPELINE_CONFIG.app_names
): string | undefined {
  const lower = text.toLowerCase();
  if (lower.trim().length === 0) return text;

  const hasSelfReference = appNames.some((name) =>
    new RegExp(`\\b${escapeRegExp(name.toLowerCase())}\\b${SYMPTOM_SUFFIX}`).test(lower)
  );
  const hasInstruction = APP_INSTRUCTION_PATTERNS.some((pattern) => pattern.test(lower));

  if (hasSelfReference && hasInstruction) return undefined;
  // "take one minute to jot..." reads as a call to action even without naming the app.
  if (ONE_MINUTE.test(lower) && JOT.test(lower)) return undefined;

  return text;
}

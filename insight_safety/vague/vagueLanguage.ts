import type { WeatherFactor } from "../classification/types.js";
import { defaultRandomSource, pickOne, type RandomSource } from "../random/randomSource.js";
import { BODY_SENSATION_CATALOG, GENERIC_DISTINCT_WHY } from "./bodySensationCatalog.js";
import { LIGHTER, LIGHTER_BODY_CONTEXT, VAGUE_PHRASES } from "./vaguePhrases.js";

export function containsVagueLanguage(text: string): boolean {
  const lower = text.toLowerCase();
  if (VAGUE_PHRASES.some((phrase) => lower.includes(phrase))) return true;
  // "lighter" only describes the body when it is tied to muscles, joints or tightness
  return LIGHTER.test(lower) && !LIGHTER_BODY_CONTEXT.test(lower);
}

/**
 * Replace vague phrasing with a specific body-sensation sentence for the given
 * factor. Text that is already specific comes back untouched.
 */
export function rewriteVague(
  text: string,
  factor: WeatherFactor,
  random: RandomSource = defaultRandomSource
): string {
  if (!containsVagueLanguage(text)) return text;
  const candidates = BODY_SENSATION_CATALOG[factor].filter((sentence) => !containsVagueLanguage(sentence));
  return pickOne(candidates, random) ?? GENERIC_DISTINCT_WHY;
}

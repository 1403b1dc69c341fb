import { detectWeatherFactor } from "../classification/classifyWeatherFactor.js";
import type { WeatherFactor } from "../classification/types.js";
import { DEFAULT_PIPELINE_CONFIG, type SimilarityThresholds } from "../config/pipelineConfig.js";
import { areSimilar } from "../similarity/areSimilar.js";
import { BODY_SENSATION_CATALOG, GENERIC_DISTINCT_WHY } from "./bodySensationCatalog.js";
import { containsVagueLanguage } from "./vagueLanguage.js";

/**
 * Build a "why" line that explains the summary instead of repeating it. The
 * summary's own factor wins; `factor` applies when the summary names none.
 */
export function generateDistinctWhy(
  summary: string,
  factor: WeatherFactor,
  thresholds: SimilarityThresholds = DEFAULT_PIPELINE_CONFIG
): string {
  const resolved = detectWeatherFactor(summary) ?? factor;
  const distinct = BODY_SENSATION_CATALOG[resolved].find(
    (sentence) => !containsVagueLanguage(sentence) && !areSimilar(summary, sentence, thresholds)
  );
  return distinct ?? GENERIC_DISTINCT_WHY;
}

import type { WeatherFactor } from "../classification/types.js";

// One weather factor, one body sensation per sentence, built from the approved
// vocabulary: sluggish, draining, tiring, stiff, tense, sensitive, effortful,
// ease tension, loosen tightness. None of these may trip containsVagueLanguage.
export const BODY_SENSATION_CATALOG: Record<WeatherFactor, readonly string[]> = {
  pressure: [
    "Falling pressure can leave the body sluggish and slow to get going.",
    "Rapid pressure changes can make muscles stiff or tense.",
    "Pressure swings can be draining for sensitive joints.",
    "Low pressure can make movement effortful and tiring.",
    "Steady pressure can ease tension in stiff joints.",
  ],
  humidity: [
    "Humid air can leave the body sluggish.",
    "Rising humidity can make joints stiff and sensitive.",
    "Damp air can make breathing and movement effortful.",
    "Heavy humidity can be draining on tired muscles.",
  ],
  temperature: [
    "Cooler air can make muscles stiff and tense.",
    "Heat can be draining and leave the body sluggish.",
    "Temperature swings can make joints sensitive and stiff.",
    "Warmer air can loosen tightness in stiff muscles.",
  ],
  wind: [
    "Gusty wind can make muscles tense.",
    "Strong wind can make walking effortful and draining.",
    "Cold wind can make exposed joints stiff and sensitive.",
    "Calmer air can ease tension in sensitive muscles.",
  ],
};

export const GENERIC_DISTINCT_WHY = "Weather changes can make the body feel more effortful or tiring.";

export const SECONDARY_DISTINCT_WHY = "The weather pattern today may make the body feel more effortful or tiring.";

import type { WeatherFactor } from "./types.js";

// Evaluated in order; the first factor with a keyword hit wins.
const FACTOR_KEYWORDS: [WeatherFactor, RegExp][] = [
  ["pressure", /\b(?:pressure|barometric)/],
  ["humidity", /\b(?:humid|moisture|moist|damp|muggy)/],
  ["temperature", /\b(?:temperat|temps?\b|cool|warm|heat|hot\b|cold|chill)/],
  ["wind", /\b(?:wind|breez|gust)/],
];

/** The factor a fragment talks about, or undefined when it names none. */
export function detectWeatherFactor(text: string): WeatherFactor | undefined {
  const lower = text.toLowerCase();
  return FACTOR_KEYWORDS.find(([, pattern]) => pattern.test(lower))?.[0];
}

export function classifyWeatherFactor(text: string): WeatherFactor {
  return detectWeatherFactor(text) ?? "pressure";
}

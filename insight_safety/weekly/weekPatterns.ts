/**
 * Day phrases for legacy single-paragraph forecasts, which carry no per-day
 * breakdown. Keyword rules are checked in order against the text around a
 * weekday mention.
 */
export const DAY_PATTERN_RULES: [RegExp, string][] = [
  [/\bcool/, "Cooler air — joints may be stiff"],
  [/\bwarm/, "Warming trend — movement may be tiring"],
  [/\bhumid/, "Rising humidity — joints may be stiff"],
  [/\b(?:pressure|shift)/, "Quick pressure dip — muscles may be tense"],
  [/\b(?:calm|stable|steady)/, "Steady conditions — low flare risk"],
  [/\bcloud/, "Cloudy stretch — the body may be sluggish"],
  [/\bclear/, "Clear skies — low flare risk"],
];

// Indexed by position in the coming week, not by weekday.
export const DEFAULT_DAY_ROTATION = [
  "Steady conditions — low flare risk",
  "Stable pattern — low flare risk",
  "Calm conditions — low flare risk",
  "Cooler air — joints may be stiff",
  "Rising humidity — the body may be sluggish",
  "Steady pressure — low flare risk",
  "Stable trend — low flare risk",
] as const;

export const CONTEXT_BEFORE = 50;
export const CONTEXT_AFTER = 100;

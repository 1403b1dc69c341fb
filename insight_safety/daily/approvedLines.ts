import { pickOne, type RandomSource } from "../random/randomSource.js";

// Non-clinical comfort tips. Tradition-attributed tips describe a practice,
// never a treatment.
export const APPROVED_COMFORT_TIPS = [
  "Chinese medicine suggests a few minutes of tai chi to ease muscle tension.",
  "Chinese medicine suggests warm ginger tea on cooler days.",
  "Chinese medicine recommends slow qigong movements to loosen stiff joints.",
  "Ayurveda suggests a warm oil massage to ease stiff joints.",
  "Ayurveda recommends gentle yoga stretches to ease muscle tension.",
  "Ayurveda suggests warm layers when temperatures drop.",
  "Western medicine suggests gentle stretching to ease muscle tension.",
  "Western medicine recommends staying warm and hydrated during weather shifts.",
  "Take short pauses through the day when your body needs them.",
  "Move gently at your own pace and listen to your body.",
] as const;

export const APPROVED_SIGN_OFFS = [
  "Move at the pace that feels right.",
  "Take things one moment at a time.",
  "Wishing you a steadier day ahead.",
] as const;

export const CARE_TRADITION_MARKERS = [
  "chinese medicine",
  "traditional chinese",
  "tcm",
  "ayurveda",
  "western medicine",
  "traditional medicine",
  "suggests",
  "recommends",
];

export const pickComfortTip = (random: RandomSource): string =>
  pickOne(APPROVED_COMFORT_TIPS, random) ?? APPROVED_COMFORT_TIPS[0];

export const pickSignOff = (random: RandomSource): string => pickOne(APPROVED_SIGN_OFFS, random) ?? APPROVED_SIGN_OFFS[0];

export function namesCareTradition(text: string): boolean {
  const lower = text.toLowerCase();
  return CARE_TRADITION_MARKERS.some((marker) => new RegExp(`\\b${marker}\\b`).test(lower));
}

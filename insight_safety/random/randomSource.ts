import seedrandom from "seedrandom";

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export const defaultRandomSource: RandomSource = Math.random;

export function seededRandomSource(seed: string): RandomSource {
  const rng = seedrandom(seed);
  return () => rng();
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T | undefined {
  if (items.length === 0) return undefined;
  const index = Math.min(items.length - 1, Math.max(0, Math.floor(random() * items.length)));
  return items[index];
}

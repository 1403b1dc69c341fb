import { DEFAULT_PIPELINE_CONFIG, type SimilarityThresholds } from "../config/pipelineConfig.js";

const MIN_WORD_LENGTH = 3;

const normalize = (text: string): string => text.toLowerCase().trim();

const wordSet = (text: string): Set<string> =>
  new Set((text.match(/[\p{L}\p{N}']+/gu) ?? []).filter((word) => word.length >= MIN_WORD_LENGTH));

const jaccard = (a: Set<string>, b: Set<string>): number => {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const word of a) {
    if (b.has(word)) intersection += 1;
  }
  return intersection / (a.size + b.size - intersection);
};

/**
 * Near-duplicate check used to keep adjacent insight lines from restating
 * each other. Symmetric in its two text arguments.
 */
export function areSimilar(
  a: string,
  b: string,
  thresholds: SimilarityThresholds = DEFAULT_PIPELINE_CONFIG
): boolean {
  const left = normalize(a);
  const right = normalize(b);

  if (left === right) return true;

  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  if (shorter.length > 0 && longer.includes(shorter)) {
    if (shorter.length / longer.length > thresholds.similarity_containment_ratio) return true;
  }

  return jaccard(wordSet(left), wordSet(right)) > thresholds.similarity_jaccard_threshold;
}

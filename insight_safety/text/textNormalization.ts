/** Lower-cased and trimmed, with edge punctuation removed. Used for line-to-line comparisons. */
export function normalizeForComparison(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/^[.,;:!?\s]+|[.,;:!?\s]+$/g, "");
}

/**
 * Split on sentence-ending punctuation that is followed by whitespace or the end
 * of the text. Terminators are dropped; decimals such as "1.5" stay intact.
 */
export const splitSentences = (text: string): string[] =>
  text
    .split(/[.!?]+(?=\s|$)/)
    .map((sentence) => sentence.trim())
    .filter(Boolean);

export const splitLines = (text: string): string[] =>
  text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);

export function ensureTerminalPunctuation(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) return trimmed;
  return /[.!?]$/.test(trimmed) ? trimmed : `${trimmed}.`;
}

/** First sentence only, always closed with a period. Empty input stays empty. */
export function toSingleSentence(text: string): string {
  const first = splitSentences(text)[0];
  if (!first) return "";
  return `${first.replace(/[,;:\s]+$/, "")}.`;
}

/** Upper-cases the first letter of the text and of each sentence after terminal punctuation and whitespace. */
export function capitalizeSentences(text: string): string {
  let capitalizeNext = true;
  let afterTerminal = false;
  let result = "";
  for (const char of text) {
    if (capitalizeNext && /\p{L}/u.test(char)) {
      result += char.toUpperCase();
      capitalizeNext = false;
      afterTerminal = false;
      continue;
    }
    result += char;
    if (".!?".includes(char)) {
      afterTerminal = true;
    } else if (afterTerminal && /\s/.test(char)) {
      capitalizeNext = true;
      afterTerminal = false;
    } else {
      afterTerminal = false;
    }
  }
  return result;
}

export const wordCount = (text: string): number => text.split(/\s+/).filter(Boolean).length;

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");

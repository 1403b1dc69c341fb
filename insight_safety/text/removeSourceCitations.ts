/**
 * Remove source citations from model text. Sources are shown separately under
 * the card, never inline.
 */

const INLINE_CITATION_PATTERNS = [
  /\s*\[sources?:[^\]]*\]/gi,
  /\s*\(sources?:[^)]*\)/gi,
  /\s*\bsources?\s*[:\-–]\s*[^\n]*/gi,
];

export function removeSourceCitations(text: string): string {
  if (text.trim().length === 0) return text;

  let cleaned = INLINE_CITATION_PATTERNS.reduce((current, pattern) => current.replace(pattern, ""), text);

  cleaned = cleaned
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.toLowerCase().startsWith("source"))
    .join("\n")
    .trim();

  return cleaned.length === 0 ? text : cleaned;
}

/**
 * Phrasing that lets the weather "feel" something or hedges without naming a
 * body sensation. Matched as lower-case substrings.
 */
export const VAGUE_PHRASES = [
  // weather never feels; only the body does
  "conditions feel",
  "weather feels",
  "pressure feels",
  "humidity feels",
  "humid feels",
  "temperature feels",
  "wind feels",
  "air feels",
  "feels gentle",
  "feels calm",
  "feels steady",
  "feels heavier",
  "feels off",
  "feels unusual",
  "feels different",
  "may feel different",
  "might feel different",
  "can feel different",
  "may feel off",
  "could feel easier",
  "keeps things steady",
  "keeps things gentle",
  "keeps things calm",
  "conditions remain stable",
  "stays stable",
  "remains calm",
  // generic impact claims
  "can affect",
  "could affect",
  "may affect",
  "may impact",
  "might impact",
  "can impact",
  "can impact your comfort",
  "might impact comfort",
  "may impact comfort",
  "affects the body",
  "you may notice changes",
  "noticeable shifts",
  // hedges and helper claims
  "a bit",
  "supportive",
  "moody",
  "unusual",
  "may help",
  "might help",
  "could help",
  "help with",
  "helps with",
];

export const LIGHTER = /\blighter\b/;
export const LIGHTER_BODY_CONTEXT = /\b(?:muscles?|joints?|tightness)\b/;

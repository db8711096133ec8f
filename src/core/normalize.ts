/**
 * Canonical form used for every equality and similarity check between user
 * text and catalog fields.
 *
 * - "Montréal" → "montreal"
 * - "Macy's" → "macys"
 * - "Coca-Cola" → "coca cola"
 * - "  New   York!! " → "new york"
 */
export type NormalizedToken = string;

const COMBINING_MARKS = /\p{M}+/gu;
// Apostrophes and periods between two word characters join the word.
const WORD_INTERNAL_PUNCTUATION = /(?<=[\p{L}\p{N}])['’`.](?=[\p{L}\p{N}])/gu;
const NON_WORD = /[^\p{L}\p{N}\s]+/gu;

export function normalize(text: string): NormalizedToken {
  if (!text) return '';
  return text
    .normalize('NFKD')
    .toLowerCase()
    .replace(COMBINING_MARKS, '')
    .replace(WORD_INTERNAL_PUNCTUATION, '')
    .replace(NON_WORD, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isEquivalent(a: string, b: string): boolean {
  return normalize(a) === normalize(b);
}

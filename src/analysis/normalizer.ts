/**
 * Content Analysis - Normalizer and Tokenizer
 *
 * Document text and keywords go through the same functions so that keyword
 * matching compares like with like.
 */

const WHITESPACE_RUN = /\s+/g;
// Anything that is not a letter, combining mark, digit, underscore or whitespace
const NON_WORD = /[^\p{L}\p{M}\p{N}_\s]/gu;

/**
 * Canonical form: trimmed, NFKC, lowercased, whitespace runs collapsed.
 */
export function normalize(raw: string): string {
  return raw
    .trim()
    .normalize('NFKC')
    .toLowerCase()
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/**
 * Split text into normalized word tokens, in document order.
 */
export function tokenize(text: string): string[] {
  return normalize(text)
    .replace(NON_WORD, ' ')
    .split(WHITESPACE_RUN)
    .filter(token => token.length > 0);
}

/**
 * Length in code points, so astral characters count once.
 */
export function charLength(text: string): number {
  return Array.from(text).length;
}

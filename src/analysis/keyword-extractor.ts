/**
 * Content Analysis - Keyword Extractor
 *
 * Candidate keyword and phrase generation from page text.
 */

import { readFileSync } from 'fs';
import type { KeywordCount } from './types.js';
import { charLength, normalize, tokenize } from './normalizer.js';

function loadStopWords(): ReadonlySet<string> {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../data/stop-words.json', import.meta.url), 'utf8')
  );
  if (!Array.isArray(raw)) {
    throw new Error('data/stop-words.json must contain an array of strings');
  }
  return normalizeStopWords(raw.filter((w): w is string => typeof w === 'string'));
}

/**
 * Bring a caller-provided stop-word list into the same form as tokens.
 */
export function normalizeStopWords(words: Iterable<string>): ReadonlySet<string> {
  const set = new Set<string>();
  for (const word of words) {
    const normalized = normalize(word);
    if (normalized) set.add(normalized);
  }
  return set;
}

export const DEFAULT_STOP_WORDS: ReadonlySet<string> = loadStopWords();

export interface ExtractOptions {
  minLength?: number;
  stopWords?: ReadonlySet<string>;
  limit?: number;
}

/**
 * Tokens long enough and not stop words, in document order. No dedupe.
 */
export function extractKeywords(
  text: string,
  minLength: number = 2,
  stopWords: ReadonlySet<string> = DEFAULT_STOP_WORDS
): string[] {
  return filterTokens(tokenize(text), minLength, stopWords);
}

function filterTokens(tokens: string[], minLength: number, stopWords: ReadonlySet<string>): string[] {
  return tokens.filter(token => charLength(token) >= minLength && !stopWords.has(token));
}

/**
 * Most frequent keywords, ties broken by first appearance.
 */
export function keywordFrequency(text: string, options: ExtractOptions = {}): KeywordCount[] {
  const keywords = extractKeywords(text, options.minLength, options.stopWords);
  return rank(countInOrder(keywords), options.limit);
}

/**
 * Most frequent n-word phrases. Windows that start or end on a stop word are
 * skipped; stop words inside the phrase are kept ("return on investment").
 */
export function extractPhrases(text: string, n: number, options: ExtractOptions = {}): KeywordCount[] {
  const stopWords = options.stopWords ?? DEFAULT_STOP_WORDS;
  const minLength = options.minLength ?? 2;
  const tokens = tokenize(text);
  if (!Number.isInteger(n) || n < 1 || tokens.length < n) return [];

  const isEdge = (token: string) => charLength(token) >= minLength && !stopWords.has(token);
  const phrases: string[] = [];

  for (let i = 0; i <= tokens.length - n; i++) {
    const window = tokens.slice(i, i + n);
    if (!isEdge(window[0]) || !isEdge(window[n - 1])) continue;
    phrases.push(window.join(' '));
  }

  return rank(countInOrder(phrases), options.limit);
}

function countInOrder(items: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const item of items) {
    counts.set(item, (counts.get(item) ?? 0) + 1);
  }
  return counts;
}

// Map iteration order is insertion order, and sort is stable
function rank(counts: Map<string, number>, limit?: number): KeywordCount[] {
  const ranked = Array.from(counts.entries())
    .map(([keyword, count]) => ({ keyword, count }))
    .sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

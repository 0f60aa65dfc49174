import { describe, it, expect } from 'vitest';
import {
  DEFAULT_STOP_WORDS,
  extractKeywords,
  extractPhrases,
  keywordFrequency,
  normalizeStopWords,
} from '../../src/analysis/index.js';

const SENTENCE = 'The quick brown fox jumps over the lazy dog';

describe('extractKeywords', () => {
  it('should drop default stop words', () => {
    expect(extractKeywords(SENTENCE)).toEqual(['quick', 'brown', 'fox', 'jumps', 'lazy', 'dog']);
  });

  it('should respect the minimum length', () => {
    expect(extractKeywords(SENTENCE, 4)).toEqual(['quick', 'brown', 'jumps', 'lazy']);
  });

  it('should use an injected stop-word set', () => {
    const stopWords = normalizeStopWords(['FOX', '  Dog ']);
    expect(extractKeywords(SENTENCE, 2, stopWords)).toEqual([
      'the', 'quick', 'brown', 'jumps', 'over', 'the', 'lazy',
    ]);
  });

  it('should not dedupe repeated keywords', () => {
    expect(extractKeywords('shoes shoes shoes')).toEqual(['shoes', 'shoes', 'shoes']);
  });

  it('should return nothing for empty text', () => {
    expect(extractKeywords('')).toEqual([]);
  });
});

describe('DEFAULT_STOP_WORDS', () => {
  it('should contain common English function words', () => {
    expect(DEFAULT_STOP_WORDS.has('the')).toBe(true);
    expect(DEFAULT_STOP_WORDS.has('and')).toBe(true);
    expect(DEFAULT_STOP_WORDS.has('shoes')).toBe(false);
  });
});

describe('keywordFrequency', () => {
  it('should rank by count and keep first appearance on ties', () => {
    expect(keywordFrequency('red shoes, blue shoes and red hats')).toEqual([
      { keyword: 'red', count: 2 },
      { keyword: 'shoes', count: 2 },
      { keyword: 'blue', count: 1 },
      { keyword: 'hats', count: 1 },
    ]);
  });

  it('should apply the limit', () => {
    expect(keywordFrequency('red shoes, blue shoes and red hats', { limit: 2 })).toEqual([
      { keyword: 'red', count: 2 },
      { keyword: 'shoes', count: 2 },
    ]);
  });
});

describe('extractPhrases', () => {
  it('should count two-word phrases and skip stop-word edges', () => {
    expect(extractPhrases('running shoes for trail running shoes', 2)).toEqual([
      { keyword: 'running shoes', count: 2 },
      { keyword: 'trail running', count: 1 },
    ]);
  });

  it('should keep stop words inside longer phrases', () => {
    expect(extractPhrases('return on investment', 3)).toEqual([
      { keyword: 'return on investment', count: 1 },
    ]);
  });

  it('should return nothing when the text is shorter than the phrase', () => {
    expect(extractPhrases('lonely', 2)).toEqual([]);
    expect(extractPhrases('some words', 0)).toEqual([]);
    expect(extractPhrases('red running shoes', 1.5)).toEqual([]);
  });
});

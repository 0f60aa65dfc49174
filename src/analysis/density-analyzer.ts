/**
 * Content Analysis - Keyword Density Analyzer
 *
 * Counts a (possibly multi-word) keyword in a document with a stride-1 window
 * over the token sequence. Every start position is tested, so overlapping
 * repeats are each counted: "aa aa" occurs twice in "aa aa aa".
 */

import type { AnalysisConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import type { DensityStatus, KeywordResult, KeywordTarget, SerpTier } from './types.js';
import { normalize, tokenize } from './normalizer.js';

export interface AnalyzeKeywordOptions {
  tier?: SerpTier;
  config?: AnalysisConfig;
}

/**
 * Analyze one keyword against a document. Never throws; empty text or keyword
 * gives a zero result.
 */
export function analyzeKeyword(
  text: string,
  keyword: string,
  options: AnalyzeKeywordOptions = {}
): KeywordResult {
  const config = options.config ?? DEFAULT_CONFIG;
  return matchKeyword(tokenize(text), keyword, options.tier ?? config.defaultTier);
}

/**
 * Analyze several keywords against one tokenization of the document.
 */
export function analyzeKeywords(
  text: string,
  keywords: Array<string | KeywordTarget>,
  config: AnalysisConfig = DEFAULT_CONFIG
): KeywordResult[] {
  const docTokens = tokenize(text);
  return keywords.map(entry => {
    const target = typeof entry === 'string' ? { keyword: entry } : entry;
    return matchKeyword(docTokens, target.keyword, target.tier ?? config.defaultTier);
  });
}

function matchKeyword(docTokens: string[], keyword: string, tier: SerpTier): KeywordResult {
  const normalized = normalize(keyword);
  const kwTokens = tokenize(normalized);
  const positions = findPhrase(docTokens, kwTokens);
  const count = positions.length;

  return {
    keyword,
    normalized,
    matchedPhrase: kwTokens.join(' '),
    count,
    densityBps: count === 0 ? 0 : Math.floor((count * 10_000) / docTokens.length),
    positionFirst: count === 0 ? null : positions[0],
    positionLast: count === 0 ? null : positions[count - 1],
    tier,
  };
}

/**
 * Start index of every window equal to `phrase`, overlaps included.
 */
export function findPhrase(tokens: string[], phrase: string[]): number[] {
  const starts: number[] = [];
  const size = phrase.length;
  if (size === 0 || tokens.length < size) return starts;

  for (let start = 0; start <= tokens.length - size; start++) {
    let matched = true;
    for (let offset = 0; offset < size; offset++) {
      if (tokens[start + offset] !== phrase[offset]) {
        matched = false;
        break;
      }
    }
    if (matched) starts.push(start);
  }

  return starts;
}

/**
 * Token-level containment, so "shoe" does not match inside "shoes".
 */
export function containsPhrase(text: string, phrase: string): boolean {
  return findPhrase(tokenize(text), tokenize(phrase)).length > 0;
}

/**
 * Place a raw density against the configured acceptable band.
 */
export function classifyDensity(densityBps: number, config: AnalysisConfig = DEFAULT_CONFIG): DensityStatus {
  if (densityBps <= 0) return 'none';
  if (densityBps < config.density.floorBps) return 'under';
  if (densityBps > config.density.ceilingBps) return 'over';
  return 'optimal';
}

/**
 * Content Analysis - Types
 */

import type { SERP_TIERS } from '../config/schema.js';

// =============================================================================
// Keyword Types
// =============================================================================

/**
 * Strategic category of a keyword. Assigned by the caller and carried through
 * untouched; nothing in this package derives it.
 */
export type SerpTier = (typeof SERP_TIERS)[number];

export type DensityStatus = 'none' | 'under' | 'optimal' | 'over';

export interface KeywordResult {
  /** Keyword exactly as the caller passed it */
  keyword: string;
  normalized: string;
  /** Keyword tokens joined by single spaces, the form compared against the document */
  matchedPhrase: string;
  count: number;
  /** Matches per document token, in basis points */
  densityBps: number;
  /** Token index of the first matching window start, null without a match */
  positionFirst: number | null;
  positionLast: number | null;
  tier: SerpTier;
}

export interface KeywordTarget {
  keyword: string;
  tier?: SerpTier;
}

export interface KeywordCount {
  keyword: string;
  count: number;
}

// =============================================================================
// Scoring Types
// =============================================================================

export type ContentGrade = 'A' | 'B' | 'C' | 'D' | 'F';

export type ScoreFactor = 'title' | 'description' | 'heading' | 'keyword' | 'length';

export type SubScores = Record<ScoreFactor, number>;

export interface PageScoreInput {
  title: string;
  description: string;
  /** Target keyword checked for in the title and description */
  keyword: string;
  h1Count: number;
  densityBps: number;
  wordCount: number;
}

export interface PageScore {
  totalBps: number;
  subScores: SubScores;
  grade: ContentGrade;
  /** Weakest factor first */
  suggestions: string[];
}

// =============================================================================
// Page Analysis Types
// =============================================================================

export interface PageAnalysisInput {
  title: string;
  description: string;
  body: string;
  keyword: string;
  tier?: SerpTier;
  /** Counted from the body markup when omitted */
  h1Count?: number;
  /** Detected from the body when omitted */
  isHtml?: boolean;
}

export interface PageAnalysis {
  wordCount: number;
  h1Count: number;
  keyword: KeywordResult;
  candidates: KeywordCount[];
  score: PageScore;
}

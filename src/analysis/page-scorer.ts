/**
 * Content Analysis - Page Scorer
 *
 * Combines five independently bounded sub-scores into one total, maps the
 * total to a grade and lists fixes for the weakest factors. All arithmetic is
 * integer basis points.
 */

import { z } from 'zod';
import type { AnalysisConfig } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import type { ContentGrade, PageScore, PageScoreInput, ScoreFactor, SubScores } from './types.js';
import { ValidationError } from './errors.js';
import { charLength } from './normalizer.js';
import { classifyDensity, containsPhrase } from './density-analyzer.js';

// =============================================================================
// Constants
// =============================================================================

export const MAX_SCORE_BPS = 10_000;

const TITLE_LENGTH_SHARE = 6000;
const TITLE_KEYWORD_SHARE = 4000;
const DESCRIPTION_LENGTH_SHARE = 7000;
const DESCRIPTION_KEYWORD_SHARE = 3000;
// Lost per character beyond a maximum length
const OVERLENGTH_PENALTY_PER_CHAR = 100;

export const GRADE_ORDER: readonly ContentGrade[] = ['A', 'B', 'C', 'D', 'F'];

const FACTOR_ORDER: readonly ScoreFactor[] = ['title', 'description', 'heading', 'keyword', 'length'];

const PageScoreInputSchema = z.object({
  title: z.string(),
  description: z.string(),
  keyword: z.string(),
  h1Count: z.number().int().min(0),
  densityBps: z.number().int().min(0).max(MAX_SCORE_BPS),
  wordCount: z.number().int().min(0),
});

// =============================================================================
// Grades
// =============================================================================

export interface GradeThreshold {
  grade: ContentGrade;
  minBps: number;
}

/**
 * Grade table in descending order of threshold; F catches everything.
 */
export function gradeThresholds(config: AnalysisConfig = DEFAULT_CONFIG): GradeThreshold[] {
  return [
    { grade: 'A', minBps: config.grades.A },
    { grade: 'B', minBps: config.grades.B },
    { grade: 'C', minBps: config.grades.C },
    { grade: 'D', minBps: config.grades.D },
    { grade: 'F', minBps: 0 },
  ];
}

/**
 * A total sitting exactly on a threshold takes the higher grade.
 */
export function gradeFor(totalBps: number, config: AnalysisConfig = DEFAULT_CONFIG): ContentGrade {
  for (const { grade, minBps } of gradeThresholds(config)) {
    if (totalBps >= minBps) return grade;
  }
  return 'F';
}

/**
 * Positive when `a` ranks above `b`.
 */
export function compareGrades(a: ContentGrade, b: ContentGrade): number {
  return GRADE_ORDER.indexOf(b) - GRADE_ORDER.indexOf(a);
}

// =============================================================================
// Sub-scores
// =============================================================================

function clampBps(value: number): number {
  return Math.min(MAX_SCORE_BPS, Math.max(0, value));
}

function overlengthPenalty(share: number, length: number, max: number): number {
  return Math.max(0, share - (length - max) * OVERLENGTH_PENALTY_PER_CHAR);
}

export function scoreTitle(title: string, keyword: string, config: AnalysisConfig = DEFAULT_CONFIG): number {
  const length = charLength(title.trim());
  if (length === 0) return 0;

  const max = config.limits.titleMaxLength;
  const lengthPart = length <= max ? TITLE_LENGTH_SHARE : overlengthPenalty(TITLE_LENGTH_SHARE, length, max);
  const keywordPart = containsPhrase(title, keyword) ? TITLE_KEYWORD_SHARE : 0;

  return clampBps(lengthPart + keywordPart);
}

export function scoreDescription(
  description: string,
  keyword: string,
  config: AnalysisConfig = DEFAULT_CONFIG
): number {
  const length = charLength(description.trim());
  if (length === 0) return 0;

  const { descriptionMinLength: min, descriptionMaxLength: max } = config.limits;
  let lengthPart = DESCRIPTION_LENGTH_SHARE;
  if (length < min) {
    lengthPart = Math.floor((DESCRIPTION_LENGTH_SHARE * length) / min);
  } else if (length > max) {
    lengthPart = overlengthPenalty(DESCRIPTION_LENGTH_SHARE, length, max);
  }
  const keywordPart = containsPhrase(description, keyword) ? DESCRIPTION_KEYWORD_SHARE : 0;

  return clampBps(lengthPart + keywordPart);
}

export function scoreHeadings(h1Count: number, config: AnalysisConfig = DEFAULT_CONFIG): number {
  if (h1Count === config.heading.recommendedH1Count) return MAX_SCORE_BPS;
  if (h1Count === 0) return 0;
  return config.heading.multipleH1Score;
}

/**
 * Full marks inside the density band. Under the floor the score rises linearly
 * from 0. Over the ceiling it loses at least 1 bps per density bp and still
 * scores 1 at 100% density, so heavier stuffing always scores lower.
 */
export function scoreKeywordDensity(densityBps: number, config: AnalysisConfig = DEFAULT_CONFIG): number {
  const { floorBps, ceilingBps } = config.density;

  if (densityBps < floorBps) {
    return clampBps(Math.floor((MAX_SCORE_BPS * densityBps) / floorBps));
  }
  if (densityBps > ceilingBps) {
    const span = Math.max(1, MAX_SCORE_BPS - ceilingBps);
    const excess = Math.floor(((densityBps - ceilingBps) * (MAX_SCORE_BPS - 1)) / span);
    return clampBps(MAX_SCORE_BPS - excess);
  }
  return MAX_SCORE_BPS;
}

export function scoreLength(wordCount: number, config: AnalysisConfig = DEFAULT_CONFIG): number {
  const { minimumWords, idealWords } = config.length;

  if (wordCount >= idealWords) return MAX_SCORE_BPS;
  if (wordCount < minimumWords) return 0;

  const half = MAX_SCORE_BPS / 2;
  return clampBps(half + Math.floor(((wordCount - minimumWords) * half) / (idealWords - minimumWords)));
}

// =============================================================================
// Aggregation
// =============================================================================

/**
 * Weighted sum of the sub-scores, weights in basis points.
 */
export function aggregateScore(subScores: SubScores, config: AnalysisConfig = DEFAULT_CONFIG): number {
  let weighted = 0;
  for (const factor of FACTOR_ORDER) {
    weighted += subScores[factor] * config.weights[factor];
  }
  return clampBps(Math.floor(weighted / MAX_SCORE_BPS));
}

/**
 * Score a page. Throws ValidationError for malformed input instead of
 * coercing it.
 */
export function scorePage(input: PageScoreInput, config: AnalysisConfig = DEFAULT_CONFIG): PageScore {
  const parsed = PageScoreInputSchema.safeParse(input);
  if (!parsed.success) {
    throw ValidationError.fromZod('page score input', parsed.error);
  }
  const page = parsed.data;

  const subScores: SubScores = {
    title: scoreTitle(page.title, page.keyword, config),
    description: scoreDescription(page.description, page.keyword, config),
    heading: scoreHeadings(page.h1Count, config),
    keyword: scoreKeywordDensity(page.densityBps, config),
    length: scoreLength(page.wordCount, config),
  };

  const totalBps = aggregateScore(subScores, config);

  return {
    totalBps,
    subScores,
    grade: gradeFor(totalBps, config),
    suggestions: buildSuggestions(page, subScores, config),
  };
}

// =============================================================================
// Suggestions
// =============================================================================

function formatPercent(bps: number): string {
  return `${(bps / 100).toFixed(2)}%`;
}

function buildSuggestions(page: PageScoreInput, subScores: SubScores, config: AnalysisConfig): string[] {
  return FACTOR_ORDER
    .filter(factor => subScores[factor] < config.suggestionThresholdBps)
    .sort((a, b) => subScores[a] - subScores[b])
    .map(factor => describeWeakness(factor, page, config));
}

function describeWeakness(factor: ScoreFactor, page: PageScoreInput, config: AnalysisConfig): string {
  const { limits } = config;

  switch (factor) {
    case 'title': {
      const length = charLength(page.title.trim());
      if (length === 0) return 'Title: add a title tag';
      const fixes: string[] = [];
      if (length > limits.titleMaxLength) {
        fixes.push(`shorten it to ${limits.titleMaxLength} characters or fewer (currently ${length})`);
      }
      if (!containsPhrase(page.title, page.keyword)) {
        fixes.push(keywordFix(page.keyword));
      }
      return `Title: ${fixes.join('; ')}`;
    }
    case 'description': {
      const length = charLength(page.description.trim());
      if (length === 0) return 'Description: add a meta description';
      const fixes: string[] = [];
      if (length < limits.descriptionMinLength) {
        fixes.push(`lengthen it to at least ${limits.descriptionMinLength} characters (currently ${length})`);
      } else if (length > limits.descriptionMaxLength) {
        fixes.push(`shorten it to ${limits.descriptionMaxLength} characters or fewer (currently ${length})`);
      }
      if (!containsPhrase(page.description, page.keyword)) {
        fixes.push(keywordFix(page.keyword));
      }
      return `Description: ${fixes.join('; ')}`;
    }
    case 'heading':
      return `Headings: use exactly ${config.heading.recommendedH1Count} H1 heading (found ${page.h1Count})`;
    case 'keyword': {
      const current = formatPercent(page.densityBps);
      if (classifyDensity(page.densityBps, config) === 'over') {
        return `Keyword: density ${current} exceeds the ${formatPercent(config.density.ceilingBps)} maximum; reduce repetition to avoid keyword stuffing`;
      }
      return `Keyword: density ${current} is below the ${formatPercent(config.density.floorBps)} minimum; use the target keyword more often`;
    }
    case 'length':
      return `Length: expand the body to at least ${config.length.idealWords} words (currently ${page.wordCount})`;
  }
}

function keywordFix(keyword: string): string {
  return keyword.trim() ? `include the target keyword "${keyword.trim()}"` : 'set a target keyword';
}

/**
 * Content Analysis
 *
 * Normalization, keyword extraction, density analysis and page scoring.
 */

export { normalize, tokenize, charLength } from './normalizer.js';

export {
  DEFAULT_STOP_WORDS,
  extractKeywords,
  extractPhrases,
  keywordFrequency,
  normalizeStopWords,
  type ExtractOptions,
} from './keyword-extractor.js';

export {
  analyzeKeyword,
  analyzeKeywords,
  classifyDensity,
  containsPhrase,
  findPhrase,
  type AnalyzeKeywordOptions,
} from './density-analyzer.js';

export {
  GRADE_ORDER,
  MAX_SCORE_BPS,
  aggregateScore,
  compareGrades,
  gradeFor,
  gradeThresholds,
  scoreDescription,
  scoreHeadings,
  scoreKeywordDensity,
  scoreLength,
  scorePage,
  scoreTitle,
  type GradeThreshold,
} from './page-scorer.js';

export { countHeadings, looksLikeHtml, stripHtml, type HeadingCounts } from './html.js';

export { ValidationError, type ValidationIssue } from './errors.js';

export {
  ContentAnalyzerService,
  createContentAnalyzer,
  type ContentAnalyzerOptions,
} from './content-analyzer.js';

export type {
  ContentGrade,
  DensityStatus,
  KeywordCount,
  KeywordResult,
  KeywordTarget,
  PageAnalysis,
  PageAnalysisInput,
  PageScore,
  PageScoreInput,
  ScoreFactor,
  SerpTier,
  SubScores,
} from './types.js';

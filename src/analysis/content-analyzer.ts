/**
 * Content Analysis - Content Analyzer
 *
 * Runs the full page pipeline: text extraction, keyword density, candidate
 * keywords and the page score.
 */

import type { Logger } from 'pino';
import type { AnalysisConfig, AnalysisConfigInput } from '../config/schema.js';
import { ConfigLoader } from '../config/schema.js';
import { createLogger, getLogger } from '../observability/logger.js';
import type {
  KeywordCount,
  KeywordResult,
  PageAnalysis,
  PageAnalysisInput,
  PageScore,
  PageScoreInput,
  SerpTier,
} from './types.js';
import { analyzeKeyword } from './density-analyzer.js';
import { DEFAULT_STOP_WORDS, extractKeywords, keywordFrequency } from './keyword-extractor.js';
import { countHeadings, looksLikeHtml, stripHtml } from './html.js';
import { tokenize } from './normalizer.js';
import { scorePage } from './page-scorer.js';

export interface ContentAnalyzerOptions {
  stopWords?: ReadonlySet<string>;
  logger?: Logger;
}

export class ContentAnalyzerService {
  private readonly config: AnalysisConfig;
  private readonly stopWords: ReadonlySet<string>;
  private readonly logger: Logger;

  constructor(config?: AnalysisConfig, options: ContentAnalyzerOptions = {}) {
    this.config = config ?? ConfigLoader.get();
    this.stopWords = options.stopWords ?? DEFAULT_STOP_WORDS;
    this.logger = options.logger ?? getLogger().child({ module: 'ContentAnalyzer' });
  }

  /**
   * Analyze a whole page against its target keyword
   */
  analyzePage(input: PageAnalysisInput): PageAnalysis {
    const isHtml = input.isHtml ?? looksLikeHtml(input.body);
    const text = isHtml ? stripHtml(input.body) : input.body;
    const h1Count = input.h1Count ?? (isHtml ? countHeadings(input.body).h1 : 0);
    const wordCount = tokenize(text).length;

    const keyword = this.analyzeKeyword(text, input.keyword, input.tier);
    const candidates = this.topKeywords(text);
    const score = this.scorePage({
      title: input.title,
      description: input.description,
      keyword: input.keyword,
      h1Count,
      densityBps: keyword.densityBps,
      wordCount,
    });

    this.logger.debug(
      {
        keyword: keyword.normalized,
        wordCount,
        densityBps: keyword.densityBps,
        totalBps: score.totalBps,
        grade: score.grade,
      },
      'Page analyzed'
    );

    return { wordCount, h1Count, keyword, candidates, score };
  }

  analyzeKeyword(text: string, keyword: string, tier?: SerpTier): KeywordResult {
    return analyzeKeyword(text, keyword, { tier, config: this.config });
  }

  extractKeywords(text: string): string[] {
    return extractKeywords(text, this.config.text.minKeywordLength, this.stopWords);
  }

  topKeywords(text: string, limit: number = this.config.text.candidateLimit): KeywordCount[] {
    return keywordFrequency(text, {
      minLength: this.config.text.minKeywordLength,
      stopWords: this.stopWords,
      limit,
    });
  }

  scorePage(input: PageScoreInput): PageScore {
    try {
      return scorePage(input, this.config);
    } catch (error) {
      this.logger.warn({ err: error }, 'Rejected page score input');
      throw error;
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createContentAnalyzer(
  config?: AnalysisConfigInput,
  options?: ContentAnalyzerOptions
): ContentAnalyzerService {
  if (!config) {
    return new ContentAnalyzerService(undefined, options);
  }

  const parsed = ConfigLoader.parse(config);
  // An explicit logging section gets its own logger instead of the process one
  const logger = options?.logger
    ?? (config.logging ? createLogger(parsed.logging).child({ module: 'ContentAnalyzer' }) : undefined);
  return new ContentAnalyzerService(parsed, { ...options, logger });
}

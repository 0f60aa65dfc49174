import { z } from 'zod';
import { initLogger } from '../observability/logger.js';

export const SERP_TIERS = ['core', 'long_tail', 'brand', 'local', 'image'] as const;

const SerpTierSchema = z.enum(SERP_TIERS);

const BpsSchema = z.number().int().min(0).max(10_000);

// Tokenization and candidate generation
const TextConfigSchema = z.object({
  minKeywordLength: z.number().int().min(1).max(64).default(2),
  candidateLimit: z.number().int().min(1).max(500).default(20),
});

// Shared length constants consumed by the metadata builders
const LimitsConfigSchema = z.object({
  titleMaxLength: z.number().int().min(1).default(60),
  descriptionMinLength: z.number().int().min(0).default(120),
  descriptionMaxLength: z.number().int().min(1).default(160),
  snippetTitleMaxLength: z.number().int().min(1).default(60),
  snippetDescriptionMaxLength: z.number().int().min(1).default(155),
});

// Acceptable keyword density band, in basis points (0.5% - 3%)
const DensityConfigSchema = z.object({
  floorBps: BpsSchema.default(50),
  ceilingBps: BpsSchema.default(300),
});

const LengthConfigSchema = z.object({
  minimumWords: z.number().int().min(0).default(300),
  idealWords: z.number().int().min(1).default(800),
});

const HeadingConfigSchema = z.object({
  recommendedH1Count: z.number().int().min(1).default(1),
  multipleH1Score: BpsSchema.default(5000),
});

// Weights are basis points and must sum to 10000
const WeightsConfigSchema = z.object({
  title: BpsSchema.default(2000),
  description: BpsSchema.default(1500),
  heading: BpsSchema.default(1500),
  keyword: BpsSchema.default(3000),
  length: BpsSchema.default(2000),
});

// Minimum total score per grade; F is everything below D
const GradesConfigSchema = z.object({
  A: BpsSchema.default(9000),
  B: BpsSchema.default(7500),
  C: BpsSchema.default(6000),
  D: BpsSchema.default(4000),
});

const SitemapConfigSchema = z.object({
  maxUrlsPerFile: z.number().int().min(1).max(50_000).default(50_000),
});

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  prettyPrint: z.boolean().default(false),
});

export const AnalysisConfigSchema = z.object({
  text: TextConfigSchema.default({}),
  limits: LimitsConfigSchema.default({}),
  density: DensityConfigSchema.default({}),
  length: LengthConfigSchema.default({}),
  heading: HeadingConfigSchema.default({}),
  weights: WeightsConfigSchema.default({}),
  grades: GradesConfigSchema.default({}),
  suggestionThresholdBps: BpsSchema.default(7000),
  defaultTier: SerpTierSchema.default('core'),
  sitemap: SitemapConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;
export type WeightsConfig = z.infer<typeof WeightsConfigSchema>;
export type GradesConfig = z.infer<typeof GradesConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const DEFAULT_CONFIG: AnalysisConfig = AnalysisConfigSchema.parse({});

function isLogLevel(value: string): value is LoggingConfig['level'] {
  return LOG_LEVELS.some(level => level === value);
}

// Configuration loader with validation
export class ConfigLoader {
  private static instance: AnalysisConfig | null = null;

  /**
   * Parse and validate raw configuration, then make it the process default.
   * The process logger is rebuilt from the `logging` section.
   */
  static load(raw: unknown = {}): AnalysisConfig {
    const config = this.parse(raw);
    this.instance = config;
    initLogger(config.logging);
    return config;
  }

  /**
   * Parse and validate without touching the process default.
   */
  static parse(raw: unknown = {}): AnalysisConfig {
    const result = AnalysisConfigSchema.safeParse(raw);

    if (!result.success) {
      throw new ConfigValidationError(
        result.error.errors.map(e => ({ path: e.path.join('.'), message: e.message }))
      );
    }

    this.validateInvariants(result.data);
    return result.data;
  }

  static get(): AnalysisConfig {
    return this.instance ?? DEFAULT_CONFIG;
  }

  static reset(): void {
    this.instance = null;
  }

  /**
   * Build a config input from SEO_SIGNALS_* environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): AnalysisConfigInput {
    const logging: { level?: LoggingConfig['level']; prettyPrint?: boolean } = {};

    const level = env.SEO_SIGNALS_LOG_LEVEL?.trim().toLowerCase();
    if (level) {
      if (!isLogLevel(level)) {
        throw new ConfigValidationError([
          { path: 'logging.level', message: `Unknown log level "${level}"` },
        ]);
      }
      logging.level = level;
    }

    const pretty = env.SEO_SIGNALS_LOG_PRETTY?.trim().toLowerCase();
    if (pretty) {
      logging.prettyPrint = pretty === 'true' || pretty === '1';
    }

    return { logging };
  }

  private static validateInvariants(config: AnalysisConfig): void {
    const errors: ConfigIssue[] = [];

    const weightSum = Object.values(config.weights).reduce((sum, w) => sum + w, 0);
    if (weightSum !== 10_000) {
      errors.push({ path: 'weights', message: `Weights must sum to 10000 bps, got ${weightSum}` });
    }

    const { A, B, C, D } = config.grades;
    if (!(A > B && B > C && C > D)) {
      errors.push({ path: 'grades', message: 'Grade thresholds must be strictly descending (A > B > C > D)' });
    }

    if (config.density.floorBps > config.density.ceilingBps) {
      errors.push({ path: 'density', message: 'floorBps must not exceed ceilingBps' });
    }

    if (config.length.minimumWords >= config.length.idealWords) {
      errors.push({ path: 'length', message: 'minimumWords must be below idealWords' });
    }

    if (config.limits.descriptionMinLength > config.limits.descriptionMaxLength) {
      errors.push({ path: 'limits', message: 'descriptionMinLength must not exceed descriptionMaxLength' });
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(errors);
    }
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  public readonly errors: ConfigIssue[];

  constructor(errors: ConfigIssue[]) {
    const message = errors.map(e => (e.path ? `${e.path}: ${e.message}` : e.message)).join(', ');

    super(`Configuration validation failed: ${message}`);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

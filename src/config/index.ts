export {
  AnalysisConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  DEFAULT_CONFIG,
  SERP_TIERS,
  type AnalysisConfig,
  type AnalysisConfigInput,
  type LimitsConfig,
  type WeightsConfig,
  type GradesConfig,
  type LoggingConfig,
  type ConfigIssue,
} from './schema.js';

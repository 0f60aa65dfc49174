import { describe, it, expect, afterEach } from 'vitest';
import {
  AnalysisConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  DEFAULT_CONFIG,
} from '../../src/config/index.js';
import { getLogger, initLogger } from '../../src/observability/index.js';

function errorsOf(raw: unknown): Array<{ path: string; message: string }> {
  try {
    ConfigLoader.parse(raw);
  } catch (error) {
    if (error instanceof ConfigValidationError) return error.errors;
    throw error;
  }
  return [];
}

describe('AnalysisConfigSchema', () => {
  it('should fill every default from an empty object', () => {
    const config = AnalysisConfigSchema.parse({});

    expect(config.density).toEqual({ floorBps: 50, ceilingBps: 300 });
    expect(config.grades).toEqual({ A: 9000, B: 7500, C: 6000, D: 4000 });
    expect(config.limits).toEqual({
      titleMaxLength: 60,
      descriptionMinLength: 120,
      descriptionMaxLength: 160,
      snippetTitleMaxLength: 60,
      snippetDescriptionMaxLength: 155,
    });
    expect(config.length).toEqual({ minimumWords: 300, idealWords: 800 });
    expect(config.suggestionThresholdBps).toBe(7000);
    expect(config.defaultTier).toBe('core');
    expect(config.sitemap.maxUrlsPerFile).toBe(50_000);
  });

  it('should ship weights that sum to 10000 bps', () => {
    const sum = Object.values(DEFAULT_CONFIG.weights).reduce((total, w) => total + w, 0);
    expect(sum).toBe(10_000);
  });
});

describe('ConfigLoader', () => {
  afterEach(() => {
    ConfigLoader.reset();
    initLogger({});
  });

  describe('parse', () => {
    it('should merge partial overrides with defaults', () => {
      const config = ConfigLoader.parse({ density: { ceilingBps: 250 } });
      expect(config.density).toEqual({ floorBps: 50, ceilingBps: 250 });
    });

    it('should reject weights that do not sum to 10000', () => {
      expect(errorsOf({ weights: { title: 5000 } })).toEqual([
        { path: 'weights', message: 'Weights must sum to 10000 bps, got 13000' },
      ]);
    });

    it('should reject grade thresholds out of order', () => {
      expect(errorsOf({ grades: { A: 7000 } })[0].path).toBe('grades');
    });

    it('should reject an inverted density band', () => {
      expect(errorsOf({ density: { floorBps: 400 } })[0].path).toBe('density');
    });

    it('should reject an ideal length below the minimum', () => {
      expect(errorsOf({ length: { minimumWords: 900 } })[0].path).toBe('length');
    });

    it('should report schema errors by path', () => {
      expect(errorsOf({ density: { floorBps: -1 } })[0].path).toBe('density.floorBps');
      expect(errorsOf({ defaultTier: 'premium' })[0].path).toBe('defaultTier');
    });
  });

  describe('load and get', () => {
    it('should fall back to defaults before anything is loaded', () => {
      expect(ConfigLoader.get()).toBe(DEFAULT_CONFIG);
    });

    it('should rebuild the process logger from the logging section', () => {
      ConfigLoader.load({ logging: { level: 'error' } });
      expect(getLogger().level).toBe('error');
    });

    it('should keep the loaded configuration until reset', () => {
      ConfigLoader.load({ suggestionThresholdBps: 5000 });
      expect(ConfigLoader.get().suggestionThresholdBps).toBe(5000);

      ConfigLoader.reset();
      expect(ConfigLoader.get().suggestionThresholdBps).toBe(7000);
    });
  });

  describe('fromEnv', () => {
    it('should map logging variables', () => {
      expect(ConfigLoader.fromEnv({
        SEO_SIGNALS_LOG_LEVEL: 'DEBUG',
        SEO_SIGNALS_LOG_PRETTY: '1',
      })).toEqual({ logging: { level: 'debug', prettyPrint: true } });
    });

    it('should ignore unset variables', () => {
      expect(ConfigLoader.fromEnv({})).toEqual({ logging: {} });
    });

    it('should reject unknown log levels', () => {
      expect(() => ConfigLoader.fromEnv({ SEO_SIGNALS_LOG_LEVEL: 'loud' })).toThrow(ConfigValidationError);
    });
  });
});

describe('ConfigValidationError', () => {
  it('should include validation errors in message', () => {
    const errors = [
      { path: 'weights', message: 'Weights must sum to 10000 bps, got 9000' },
    ];

    const error = new ConfigValidationError(errors);

    expect(error.message).toBe('Configuration validation failed: weights: Weights must sum to 10000 bps, got 9000');
    expect(error.errors).toEqual(errors);
  });

  it('should print path-less issues by message alone', () => {
    const error = new ConfigValidationError([{ path: '', message: 'Something is off' }]);
    expect(error.message).toBe('Configuration validation failed: Something is off');
  });
});

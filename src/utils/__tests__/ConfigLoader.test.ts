/**
 * Tests for run configuration
 */

import { ConfigError } from '../../domain/errors';
import { DEFAULTS, assertCrawlConfig, buildRunConfig, defaultWorkerCount } from '../ConfigLoader';

const ENV_KEYS = ['WAYBACK_RATE_LIMIT_CALLS', 'WAYBACK_RATE_LIMIT_PERIOD_MS', 'WAYBACK_RETRY_ATTEMPTS', 'WAYBACK_TIMEOUT_MS'];

describe('ConfigLoader', () => {
  const savedEnv: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  describe('buildRunConfig', () => {
    it('should apply defaults', () => {
      const config = buildRunConfig({});

      expect(config.startDate).toBe('20240419');
      expect(config.endDate).toBe('20250203');
      expect(config.frequency).toBe('monthly');
      expect(config.siteType).toBe('robots');
      expect(config.maxChunkSizeMb).toBe(DEFAULTS.maxChunkSizeMb);
      expect(config.numWorkers).toBe(defaultWorkerCount());
      expect(config.rateLimit).toEqual({ maxCalls: 3, periodMs: 1000 });
      expect(config.retry).toEqual({ attempts: 3, baseDelayMs: 1000, maxDelayMs: 60000 });
      expect(config.failureLogPath).toBe('failed_urls.txt');
      expect(config.countChanges).toBe(false);
    });

    it('should parse numeric options given as strings', () => {
      const config = buildRunConfig({ numWorkers: '4', maxChunkSize: '0.5', frequency: 'daily', siteType: 'tos' });

      expect(config.numWorkers).toBe(4);
      expect(config.maxChunkSizeMb).toBe(0.5);
      expect(config.frequency).toBe('daily');
      expect(config.siteType).toBe('tos');
    });

    it('should be frozen', () => {
      const config = buildRunConfig({});

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.rateLimit)).toBe(true);
    });

    it('should reject invalid dates', () => {
      expect(() => buildRunConfig({ startDate: '20240230' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ endDate: '2024-03-01' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ startDate: '20240301', endDate: '20240101' })).toThrow(
        'Start date 20240301 is after end date 20240101'
      );
    });

    it('should reject unknown choices', () => {
      expect(() => buildRunConfig({ frequency: 'weekly' })).toThrow(
        'Invalid frequency: weekly (expected one of daily, monthly, annually)'
      );
      expect(() => buildRunConfig({ siteType: 'blog' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ logLevel: 'verbose' })).toThrow(ConfigError);
    });

    it('should reject non-positive numbers', () => {
      expect(() => buildRunConfig({ numWorkers: '0' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ numWorkers: '2.5' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ maxChunkSize: '-1' })).toThrow(ConfigError);
      expect(() => buildRunConfig({ maxChunkSize: 'big' })).toThrow(ConfigError);
    });

    it('should read rate limit and retry overrides from the environment', () => {
      process.env.WAYBACK_RATE_LIMIT_CALLS = '5';
      process.env.WAYBACK_RATE_LIMIT_PERIOD_MS = '2000';
      process.env.WAYBACK_RETRY_ATTEMPTS = '4';
      process.env.WAYBACK_TIMEOUT_MS = '5000';

      const config = buildRunConfig({});

      expect(config.rateLimit).toEqual({ maxCalls: 5, periodMs: 2000 });
      expect(config.retry.attempts).toBe(4);
      expect(config.requestTimeoutMs).toBe(5000);
    });

    it('should reject an invalid environment override', () => {
      process.env.WAYBACK_RATE_LIMIT_CALLS = 'many';

      expect(() => buildRunConfig({})).toThrow(ConfigError);
    });
  });

  describe('assertCrawlConfig', () => {
    it('should require an input path', () => {
      expect(() => assertCrawlConfig(buildRunConfig({ countChanges: true }))).toThrow(
        'An input CSV path is required (--input-path)'
      );
    });

    it('should require at least one output', () => {
      expect(() => assertCrawlConfig(buildRunConfig({ inputPath: 'sites.csv' }))).toThrow(ConfigError);
    });

    it('should accept a crawl with one output enabled', () => {
      expect(() => assertCrawlConfig(buildRunConfig({ inputPath: 'sites.csv', saveSnapshots: true }))).not.toThrow();
    });
  });
});

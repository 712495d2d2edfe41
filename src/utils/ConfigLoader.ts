/**
 * Builds and validates the run configuration
 */

import * as os from 'os';
import { ConfigError } from '../domain/errors';
import { FREQUENCIES, Frequency, LogLevel, RunConfig, SITE_TYPES, SiteType } from '../domain/models/types';
import { DEFAULT_RATE_LIMIT } from '../services/RateLimiter';
import { DEFAULT_RETRY } from '../services/RetryPolicy';
import { isCompactDate } from './DateFormatter';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Raw options as they arrive from the command line
 */
export interface RunOptions {
  inputPath?: string;
  outputJsonPath?: string;
  startDate?: string;
  endDate?: string;
  frequency?: string;
  siteType?: string;
  numWorkers?: string | number;
  maxChunkSize?: string | number;
  countChanges?: boolean;
  saveSnapshots?: boolean;
  processToJson?: boolean;
  extractText?: boolean;
  urlColumn?: string;
  snapshotsPath?: string;
  statsPath?: string;
  failureLog?: string;
  logFile?: string;
  logLevel?: string;
}

export const DEFAULTS = {
  outputJsonPath: 'wayback_data.json',
  startDate: '20240419',
  endDate: '20250203',
  frequency: 'monthly',
  siteType: 'robots',
  maxChunkSizeMb: 5000,
  snapshotsPath: 'snapshots',
  statsPath: 'stats',
  failureLogPath: 'failed_urls.txt',
  logFile: 'wayback_client.log',
  logLevel: 'info',
  requestTimeoutMs: 30000,
} as const;

export function defaultWorkerCount(): number {
  return Math.max(1, os.cpus().length - 1);
}

/**
 * Validate raw options into a frozen RunConfig
 * @throws ConfigError on the first invalid value
 */
export function buildRunConfig(options: RunOptions): RunConfig {
  const startDate = options.startDate ?? DEFAULTS.startDate;
  const endDate = options.endDate ?? DEFAULTS.endDate;

  if (!isCompactDate(startDate)) {
    throw new ConfigError(`Invalid start date (expected YYYYMMDD): ${startDate}`);
  }
  if (!isCompactDate(endDate)) {
    throw new ConfigError(`Invalid end date (expected YYYYMMDD): ${endDate}`);
  }
  if (startDate > endDate) {
    throw new ConfigError(`Start date ${startDate} is after end date ${endDate}`);
  }

  const config: RunConfig = {
    inputPath: options.inputPath,
    outputJsonPath: options.outputJsonPath ?? DEFAULTS.outputJsonPath,
    startDate,
    endDate,
    frequency: parseChoice<Frequency>('frequency', options.frequency ?? DEFAULTS.frequency, FREQUENCIES),
    siteType: parseChoice<SiteType>('site type', options.siteType ?? DEFAULTS.siteType, SITE_TYPES),
    numWorkers:
      options.numWorkers === undefined
        ? defaultWorkerCount()
        : parsePositiveInteger('number of workers', options.numWorkers),
    maxChunkSizeMb:
      options.maxChunkSize === undefined
        ? DEFAULTS.maxChunkSizeMb
        : parsePositiveNumber('max chunk size', options.maxChunkSize),
    countChanges: options.countChanges ?? false,
    saveSnapshots: options.saveSnapshots ?? false,
    processToJson: options.processToJson ?? false,
    extractText: options.extractText ?? false,
    urlColumn: options.urlColumn,
    snapshotsPath: options.snapshotsPath ?? DEFAULTS.snapshotsPath,
    statsPath: options.statsPath ?? DEFAULTS.statsPath,
    failureLogPath: options.failureLog ?? DEFAULTS.failureLogPath,
    logFile: options.logFile ?? DEFAULTS.logFile,
    logLevel: parseChoice<LogLevel>('log level', options.logLevel ?? DEFAULTS.logLevel, LOG_LEVELS),
    rateLimit: Object.freeze({
      maxCalls: parsePositiveInteger(
        'WAYBACK_RATE_LIMIT_CALLS',
        getEnvVar('WAYBACK_RATE_LIMIT_CALLS', String(DEFAULT_RATE_LIMIT.maxCalls))
      ),
      periodMs: parsePositiveInteger(
        'WAYBACK_RATE_LIMIT_PERIOD_MS',
        getEnvVar('WAYBACK_RATE_LIMIT_PERIOD_MS', String(DEFAULT_RATE_LIMIT.periodMs))
      ),
    }),
    retry: Object.freeze({
      attempts: parsePositiveInteger(
        'WAYBACK_RETRY_ATTEMPTS',
        getEnvVar('WAYBACK_RETRY_ATTEMPTS', String(DEFAULT_RETRY.attempts))
      ),
      baseDelayMs: DEFAULT_RETRY.baseDelayMs,
      maxDelayMs: DEFAULT_RETRY.maxDelayMs,
    }),
    requestTimeoutMs: parsePositiveInteger(
      'WAYBACK_TIMEOUT_MS',
      getEnvVar('WAYBACK_TIMEOUT_MS', String(DEFAULTS.requestTimeoutMs))
    ),
  };

  return Object.freeze(config);
}

/**
 * Check that a crawl has an input and something to produce
 * @throws ConfigError otherwise
 */
export function assertCrawlConfig(config: RunConfig): void {
  if (!config.inputPath) {
    throw new ConfigError('An input CSV path is required (--input-path)');
  }
  if (!config.countChanges && !config.saveSnapshots && !config.processToJson) {
    throw new ConfigError(
      'Nothing to do: enable at least one of --count-changes, --save-snapshots or --process-to-json'
    );
  }
}

function parseChoice<T extends string>(name: string, value: string, choices: readonly T[]): T {
  const match = choices.find((choice) => choice === value);
  if (match === undefined) {
    throw new ConfigError(`Invalid ${name}: ${value} (expected one of ${choices.join(', ')})`);
  }
  return match;
}

function parsePositiveInteger(name: string, value: string | number): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid ${name}: ${value} (expected a positive integer)`);
  }
  return parsed;
}

function parsePositiveNumber(name: string, value: string | number): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new ConfigError(`Invalid ${name}: ${value} (expected a positive number)`);
  }
  return parsed;
}

/**
 * Load environment variable with fallback
 */
export function getEnvVar(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

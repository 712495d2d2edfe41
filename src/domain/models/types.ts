/**
 * Core type definitions for the Wayback temporal crawler
 */

/**
 * Kind of resource collected for each input site
 */
export type SiteType = 'tos' | 'robots' | 'main';

/**
 * Sampling frequency: one snapshot is kept per calendar day, month or year
 */
export type Frequency = 'daily' | 'monthly' | 'annually';

export const SITE_TYPES: readonly SiteType[] = ['tos', 'robots', 'main'];

export const FREQUENCIES: readonly Frequency[] = ['daily', 'monthly', 'annually'];

/**
 * One input URL, resolved for its site type. Created once per input row.
 */
export interface UrlTask {
  readonly rawUrl: string;
  readonly siteType: SiteType;
  readonly resolvedUrl: string;
  /** Host without a leading "www.", used as the output dataset key */
  readonly domain: string;
}

/**
 * One capture listed by the CDX index
 */
export interface SnapshotRef {
  /** Wayback timestamp (YYYYMMDDHHMMSS) */
  timestamp: string;
  /** Capture day (YYYY-MM-DD) */
  date: string;
  /** Content digest; equal digests mean identical bodies */
  digest: string;
  original: string;
  statusCode: string;
  mimeType: string;
}

/**
 * A contiguous sampling interval inside the requested range
 */
export interface Bucket {
  /** YYYY-MM-DD, YYYY-MM or YYYY depending on frequency */
  key: string;
  /** First day of the bucket clipped to the range (YYYYMMDD) */
  start: string;
  /** Last day of the bucket clipped to the range (YYYYMMDD) */
  end: string;
}

/**
 * The capture chosen to represent one bucket
 */
export interface SelectedSnapshot {
  bucket: string;
  ref: SnapshotRef;
}

/**
 * Fetched body of one selected capture
 */
export interface SnapshotContent {
  url: string;
  domain: string;
  /** YYYY-MM-DD, always taken from the selected capture */
  date: string;
  timestamp: string;
  content: string;
}

/**
 * Rate-of-change statistics for one URL
 */
export interface ChangeRecord {
  url: string;
  /** Adjacent digest transitions across every capture in range */
  changeCount: number;
  captures: number;
  /** Transitions attributed to the bucket of the later capture */
  changeCounts: Record<string, number>;
}

export type FailureKind = 'index' | 'fetch' | 'decode' | 'task';

/**
 * A request that exhausted its retries or otherwise failed
 */
export interface FailedRequest {
  url: string;
  timestamp?: string;
  kind: FailureKind;
  reason: string;
}

/**
 * domain -> date -> content
 */
export type OutputDataset = Record<string, Record<string, string>>;

/**
 * Logging levels
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface RateLimitConfig {
  maxCalls: number;
  periodMs: number;
}

export interface RetryConfig {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Validated, immutable settings for one run
 */
export interface RunConfig {
  readonly inputPath?: string;
  readonly outputJsonPath: string;
  readonly startDate: string;
  readonly endDate: string;
  readonly frequency: Frequency;
  readonly siteType: SiteType;
  readonly numWorkers: number;
  readonly maxChunkSizeMb: number;
  readonly countChanges: boolean;
  readonly saveSnapshots: boolean;
  readonly processToJson: boolean;
  readonly extractText: boolean;
  readonly urlColumn?: string;
  readonly snapshotsPath: string;
  readonly statsPath: string;
  readonly failureLogPath: string;
  readonly logFile: string;
  readonly logLevel: LogLevel;
  readonly rateLimit: Readonly<RateLimitConfig>;
  readonly retry: Readonly<RetryConfig>;
  readonly requestTimeoutMs: number;
}

/**
 * Outcome of a crawl or export run
 */
export interface RunSummary {
  tasks: number;
  completed: number;
  skipped: number;
  snapshotsWritten: number;
  changeRecords: number;
  failures: number;
  failureLogPath: string;
  outputFiles: string[];
}

/**
 * Error types for the crawl pipeline.
 *
 * ConfigError and WriteError are fatal to a run. IndexError and FetchError
 * stay local to one URL or one capture and end up in the failure log.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ArchiveErrorOptions {
  status?: number;
  transient?: boolean;
  cause?: unknown;
}

/**
 * Base class for failed calls to the archive's services
 */
export class ArchiveError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly transient: boolean;

  constructor(message: string, url: string, options: ArchiveErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ArchiveError';
    this.url = url;
    this.status = options.status;
    this.transient = options.transient ?? false;
  }
}

export type IndexFailureReason = 'invalid-url' | 'http' | 'network' | 'parse';

export class IndexError extends ArchiveError {
  readonly reason: IndexFailureReason;

  constructor(
    message: string,
    url: string,
    reason: IndexFailureReason,
    options: ArchiveErrorOptions = {}
  ) {
    super(message, url, options);
    this.name = 'IndexError';
    this.reason = reason;
  }
}

export type FetchFailureReason = 'http' | 'network' | 'decode';

export class FetchError extends ArchiveError {
  readonly timestamp: string;
  readonly reason: FetchFailureReason;

  constructor(
    message: string,
    url: string,
    timestamp: string,
    reason: FetchFailureReason,
    options: ArchiveErrorOptions = {}
  ) {
    super(message, url, options);
    this.name = 'FetchError';
    this.timestamp = timestamp;
    this.reason = reason;
  }
}

/**
 * Body bytes could not be decoded as text
 */
export class DecodeError extends FetchError {
  constructor(message: string, url: string, timestamp: string) {
    super(message, url, timestamp, 'decode');
    this.name = 'DecodeError';
  }
}

/**
 * Output could not be persisted. Aborts the run.
 */
export class WriteError extends Error {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'WriteError';
    this.path = path;
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof WriteError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Append-only log of requests that failed for good
 */

import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../domain/errors';
import { FailedRequest } from '../domain/models/types';
import { LoggingService } from './LoggingService';

export function formatFailure(failure: FailedRequest): string {
  const when = failure.timestamp ? ` [${failure.timestamp}]` : '';
  const reason = failure.reason.replace(/\s*\r?\n\s*/g, ' ');
  return `${failure.url}${when} --> ${failure.kind}: ${reason}`;
}

export class FailureSink {
  readonly path: string;
  private logger: LoggingService;
  private recorded: FailedRequest[] = [];

  constructor(filePath: string, logger: LoggingService) {
    this.path = path.resolve(filePath);
    this.logger = logger;
  }

  get count(): number {
    return this.recorded.length;
  }

  get failures(): readonly FailedRequest[] {
    return this.recorded;
  }

  /**
   * Append one failure to the log file
   * @throws WriteError if the log cannot be written
   */
  record(failure: FailedRequest): void {
    const entry = Object.freeze({ ...failure });

    try {
      fs.mkdirSync(path.dirname(this.path), { recursive: true });
      fs.appendFileSync(this.path, `${formatFailure(entry)}\n`, 'utf-8');
    } catch (error) {
      throw new WriteError(`Failed to append to failure log ${this.path}`, this.path, error);
    }

    this.recorded.push(entry);
    this.logger.warn(`Recorded failure for ${entry.url}`, {
      timestamp: entry.timestamp,
      kind: entry.kind,
      reason: entry.reason,
    });
  }
}

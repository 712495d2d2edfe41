/**
 * Fixed-size pool running one async task per item
 */

import pLimit from 'p-limit';
import { LoggingService } from '../../services/LoggingService';
import { errorMessage } from '../errors';

export interface PoolSummary {
  total: number;
  completed: number;
  failed: number;
  /** Items never started because the pool was stopped */
  skipped: number;
}

export interface WorkerPoolOptions {
  concurrency: number;
  /** Errors that stop the whole pool instead of being reported per item */
  isFatal?: (error: unknown) => boolean;
}

export class WorkerPool<T> {
  private limit: ReturnType<typeof pLimit>;
  private logger: LoggingService;
  private isFatal: (error: unknown) => boolean;
  private stopped = false;

  constructor(options: WorkerPoolOptions, logger: LoggingService) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new RangeError(`concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.limit = pLimit(options.concurrency);
    this.logger = logger;
    this.isFatal = options.isFatal ?? (() => false);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Stop dispatching queued items. Items already running finish normally.
   */
  stop(): void {
    if (!this.stopped) {
      this.logger.warn('Stopping worker pool; in-flight tasks will finish');
    }
    this.stopped = true;
  }

  /**
   * Run every item through the worker and wait for all of them to settle
   * @param onFailure - Receives each item whose worker rejected with a non-fatal error
   * @throws The first fatal error, after in-flight items have settled
   */
  async run(
    items: readonly T[],
    worker: (item: T) => Promise<void>,
    onFailure: (item: T, error: unknown) => void
  ): Promise<PoolSummary> {
    const summary: PoolSummary = { total: items.length, completed: 0, failed: 0, skipped: 0 };
    const fatalErrors: unknown[] = [];

    const runOne = async (item: T): Promise<void> => {
      if (this.stopped) {
        summary.skipped++;
        return;
      }

      try {
        await worker(item);
        summary.completed++;
      } catch (error) {
        if (this.isFatal(error)) {
          fatalErrors.push(error);
          this.logger.error(`Fatal error, stopping pool: ${errorMessage(error)}`, error);
          this.stop();
          return;
        }

        summary.failed++;
        try {
          onFailure(item, error);
        } catch (reportError) {
          // Failures that cannot be recorded end the run
          fatalErrors.push(reportError);
          this.logger.error(`Could not record failure, stopping pool: ${errorMessage(reportError)}`, reportError);
          this.stop();
        }
      }
    };

    await Promise.all(items.map((item) => this.limit(() => runOne(item))));

    if (fatalErrors.length > 0) {
      throw fatalErrors[0];
    }
    return summary;
  }
}

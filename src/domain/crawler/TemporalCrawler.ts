/**
 * Temporal crawler: collects one archived copy per sampling bucket for each URL
 * and optionally measures how often the URL's content changed.
 */

import { ChangeCounter } from '../cdx/ChangeCounter';
import { IndexClient } from '../cdx/IndexClient';
import { DecodeError, FetchError, IndexError, errorMessage, isFatalError } from '../errors';
import { Frequency, SelectedSnapshot, SnapshotRef, UrlTask } from '../models/types';
import { TextExtractor } from '../text/TextExtractor';
import { ChunkedWriter } from '../../services/ChunkedWriter';
import { FailureSink } from '../../services/FailureSink';
import { LoggingService } from '../../services/LoggingService';
import { SnapshotStore } from '../../services/SnapshotStore';
import { StatsStore } from '../../services/StatsStore';
import { formatReadableDate } from '../../utils/DateFormatter';
import { ContentFetcher } from './ContentFetcher';
import { SnapshotSelector } from './SnapshotSelector';
import { PoolSummary, WorkerPool } from './WorkerPool';

export interface CrawlWindow {
  startDate: string;
  endDate: string;
  frequency: Frequency;
}

/**
 * Collaborators of the crawler. Optional outputs switch features on:
 * a writer for the JSON dataset, a stats store for change counting,
 * a snapshot store for the raw body cache, an extractor for HTML-to-text.
 */
export interface TemporalCrawlerDeps {
  indexClient: IndexClient;
  contentFetcher: ContentFetcher;
  failureSink: FailureSink;
  logger: LoggingService;
  selector?: SnapshotSelector;
  changeCounter?: ChangeCounter;
  writer?: ChunkedWriter;
  statsStore?: StatsStore;
  snapshotStore?: SnapshotStore;
  textExtractor?: TextExtractor;
}

export interface TaskResult {
  url: string;
  captures: number;
  selected: number;
  written: number;
  cached: number;
  failed: number;
  changeCount?: number;
}

export interface CrawlResult extends PoolSummary {
  snapshotsWritten: number;
  changeRecords: number;
}

export class TemporalCrawler {
  private indexClient: IndexClient;
  private contentFetcher: ContentFetcher;
  private selector: SnapshotSelector;
  private changeCounter: ChangeCounter;
  private failureSink: FailureSink;
  private writer?: ChunkedWriter;
  private statsStore?: StatsStore;
  private snapshotStore?: SnapshotStore;
  private textExtractor?: TextExtractor;
  private logger: LoggingService;
  private window: CrawlWindow;
  private pool?: WorkerPool<UrlTask>;
  private stopRequested = false;

  constructor(window: CrawlWindow, deps: TemporalCrawlerDeps) {
    this.window = window;
    this.indexClient = deps.indexClient;
    this.contentFetcher = deps.contentFetcher;
    this.selector = deps.selector ?? new SnapshotSelector();
    this.changeCounter = deps.changeCounter ?? new ChangeCounter();
    this.failureSink = deps.failureSink;
    this.writer = deps.writer;
    this.statsStore = deps.statsStore;
    this.snapshotStore = deps.snapshotStore;
    this.textExtractor = deps.textExtractor;
    this.logger = deps.logger;
  }

  /** Whether selected captures are fetched at all */
  get fetchesContent(): boolean {
    return this.writer !== undefined || this.snapshotStore !== undefined;
  }

  /**
   * Process one URL end to end: index query, change counting, selection, fetching.
   * Index and fetch failures are recorded and do not reject.
   * @throws WriteError when an output cannot be persisted
   */
  async processTask(task: UrlTask): Promise<TaskResult> {
    const { startDate, endDate, frequency } = this.window;
    const result: TaskResult = { url: task.resolvedUrl, captures: 0, selected: 0, written: 0, cached: 0, failed: 0 };

    // Stats saved by an earlier run are kept
    const countChanges = this.statsStore !== undefined && !this.statsStore.has(task.resolvedUrl);
    if (this.statsStore && !countChanges) {
      this.logger.debug(`Stats already exist for ${task.resolvedUrl}`);
    }
    if (!countChanges && !this.fetchesContent) {
      return result;
    }

    let refs: SnapshotRef[];
    try {
      refs = await this.indexClient.query(task.resolvedUrl, startDate, endDate);
    } catch (error) {
      if (error instanceof IndexError) {
        this.failureSink.record({ url: task.resolvedUrl, kind: 'index', reason: error.message });
        result.failed++;
        return result;
      }
      throw error;
    }
    result.captures = refs.length;

    if (this.statsStore && countChanges) {
      const record = this.changeCounter.countChanges(
        task.resolvedUrl,
        refs,
        this.selector.buckets(startDate, endDate, frequency)
      );
      this.statsStore.save(record);
      result.changeCount = record.changeCount;
    }

    if (!this.fetchesContent) {
      return result;
    }

    const selected = this.selector.select(refs, startDate, endDate, frequency);
    result.selected = selected.length;

    const range = `${formatReadableDate(startDate)} and ${formatReadableDate(endDate)}`;
    if (selected.length === 0) {
      this.logger.info(`No snapshots available for ${task.resolvedUrl} between ${range}`);
      return result;
    }

    // Strictly in time order within one URL
    for (const selection of selected) {
      const content = await this.loadContent(task, selection, result);
      if (content === null) {
        result.failed++;
        continue;
      }

      if (this.writer) {
        const added = this.writer.add({
          url: task.resolvedUrl,
          domain: task.domain,
          date: selection.ref.date,
          timestamp: selection.ref.timestamp,
          content: this.textExtractor ? this.textExtractor.extract(content) : content,
        });
        if (added) {
          result.written++;
        }
      }
    }

    this.logger.info(
      `Processed ${result.selected} snapshots for ${task.resolvedUrl} between ${range}` +
        (result.failed > 0 ? ` (${result.failed} failed)` : '')
    );
    return result;
  }

  /**
   * Process every task on a fixed-size worker pool
   * @throws WriteError (or another fatal error) after in-flight tasks settle
   */
  async run(tasks: readonly UrlTask[], concurrency: number): Promise<CrawlResult> {
    const pool = new WorkerPool<UrlTask>({ concurrency, isFatal: isFatalError }, this.logger.child('pool'));
    this.pool = pool;
    if (this.stopRequested) {
      pool.stop();
    }

    let done = 0;
    let snapshotsWritten = 0;
    let changeRecords = 0;

    this.logger.info(`Processing ${tasks.length} URLs with ${concurrency} workers`);

    const summary = await pool.run(
      tasks,
      async (task) => {
        try {
          const result = await this.processTask(task);
          snapshotsWritten += result.written;
          changeRecords += result.changeCount === undefined ? 0 : 1;
        } finally {
          done++;
          this.logger.info(`Progress: ${done}/${tasks.length} URLs`);
        }
      },
      (task, error) => {
        this.logger.error(`Error processing ${task.resolvedUrl}`, error);
        this.failureSink.record({ url: task.resolvedUrl, kind: 'task', reason: errorMessage(error) });
      }
    );

    return { ...summary, snapshotsWritten, changeRecords };
  }

  /**
   * Best-effort shutdown: queued URLs are skipped, running ones finish
   */
  stop(): void {
    this.stopRequested = true;
    this.pool?.stop();
  }

  private async loadContent(task: UrlTask, selection: SelectedSnapshot, result: TaskResult): Promise<string | null> {
    const { ref } = selection;

    if (this.snapshotStore?.has(task.resolvedUrl, ref.timestamp)) {
      const cached = this.snapshotStore.read(task.resolvedUrl, ref.timestamp);
      if (cached !== null) {
        this.logger.debug(`Using cached snapshot for ${task.resolvedUrl} @ ${ref.timestamp}`);
        result.cached++;
        return cached;
      }
    }

    let content: string;
    try {
      content = await this.contentFetcher.fetch(task.resolvedUrl, ref.timestamp);
    } catch (error) {
      if (error instanceof FetchError) {
        this.failureSink.record({
          url: task.resolvedUrl,
          timestamp: ref.timestamp,
          kind: error instanceof DecodeError ? 'decode' : 'fetch',
          reason: error.message,
        });
        return null;
      }
      throw error;
    }

    this.snapshotStore?.save(task.resolvedUrl, ref.timestamp, ref.digest, content);
    return content;
  }
}

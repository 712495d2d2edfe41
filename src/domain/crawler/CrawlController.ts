/**
 * Controller for crawl and export runs
 * Wires every service from the run configuration and reports the outcome
 */

import { AxiosInstance } from 'axios';
import { ChangeCounter } from '../cdx/ChangeCounter';
import { IndexClient } from '../cdx/IndexClient';
import { RunConfig, RunSummary, SnapshotRef, UrlTask } from '../models/types';
import { TextExtractor } from '../text/TextExtractor';
import { ArchiveHttpClient, BROWSER_USER_AGENT, DEFAULT_USER_AGENT } from '../../services/ArchiveHttpClient';
import { ChunkedWriter } from '../../services/ChunkedWriter';
import { FailureSink } from '../../services/FailureSink';
import { LoggingService, createLogger } from '../../services/LoggingService';
import { RateLimiter, SlidingWindowRateLimiter } from '../../services/RateLimiter';
import { RetryPolicy } from '../../services/RetryPolicy';
import { SnapshotStore, StoredSnapshot } from '../../services/SnapshotStore';
import { StatsStore } from '../../services/StatsStore';
import { assertCrawlConfig } from '../../utils/ConfigLoader';
import { formatShortDate } from '../../utils/DateFormatter';
import { readUrlTasks } from '../../utils/UrlListReader';
import { domainOf } from '../../utils/urlUtils';
import { ContentFetcher } from './ContentFetcher';
import { SnapshotSelector } from './SnapshotSelector';
import { TemporalCrawler } from './TemporalCrawler';

const BYTES_PER_MB = 1024 * 1024;

/**
 * Replaceable infrastructure, mainly for tests
 */
export interface CrawlControllerOverrides {
  logger?: LoggingService;
  limiter?: RateLimiter;
  retryPolicy?: RetryPolicy;
  client?: AxiosInstance;
}

export class CrawlController {
  private config: RunConfig;
  private logger: LoggingService;
  private ownsLogger: boolean;
  private overrides: CrawlControllerOverrides;
  private crawler?: TemporalCrawler;
  private snapshotStore?: SnapshotStore;

  constructor(config: RunConfig, overrides: CrawlControllerOverrides = {}) {
    this.config = config;
    this.overrides = overrides;
    this.ownsLogger = overrides.logger === undefined;
    this.logger = overrides.logger ?? createLogger('TemporalCrawler', config.logFile, config.logLevel);
  }

  /**
   * Crawl every URL of the input file
   * @throws ConfigError before any work, WriteError when output cannot be persisted
   */
  async crawl(tasks?: UrlTask[]): Promise<RunSummary> {
    const config = this.config;
    assertCrawlConfig(config);

    const urlTasks =
      tasks ?? readUrlTasks(config.inputPath ?? '', config.siteType, this.logger.child('input'), config.urlColumn);

    this.logger.info('Starting temporal crawl', {
      urls: urlTasks.length,
      startDate: config.startDate,
      endDate: config.endDate,
      frequency: config.frequency,
      siteType: config.siteType,
      workers: config.numWorkers,
      countChanges: config.countChanges,
      saveSnapshots: config.saveSnapshots,
      processToJson: config.processToJson,
    });

    const http = new ArchiveHttpClient(
      this.overrides.limiter ?? new SlidingWindowRateLimiter(config.rateLimit),
      this.logger.child('http'),
      {
        userAgent: config.siteType === 'robots' ? BROWSER_USER_AGENT : DEFAULT_USER_AGENT,
        timeoutMs: config.requestTimeoutMs,
        retryPolicy: this.overrides.retryPolicy ?? new RetryPolicy(config.retry),
        client: this.overrides.client,
      }
    );

    const failureSink = new FailureSink(config.failureLogPath, this.logger.child('failures'));
    const writer = config.processToJson ? this.createWriter() : undefined;
    if (config.saveSnapshots) {
      this.snapshotStore = new SnapshotStore(config.snapshotsPath, this.logger.child('store'));
    }

    this.crawler = new TemporalCrawler(
      { startDate: config.startDate, endDate: config.endDate, frequency: config.frequency },
      {
        indexClient: new IndexClient(http, this.logger.child('cdx')),
        contentFetcher: new ContentFetcher(http, this.logger.child('replay')),
        selector: new SnapshotSelector(),
        changeCounter: new ChangeCounter(),
        failureSink,
        logger: this.logger.child('crawler'),
        writer,
        statsStore: config.countChanges ? new StatsStore(config.statsPath, this.logger.child('stats')) : undefined,
        snapshotStore: this.snapshotStore,
        textExtractor: config.extractText ? new TextExtractor() : undefined,
      }
    );

    const result = await this.crawler.run(urlTasks, config.numWorkers);
    const outputFiles = writer ? writer.close() : [];

    const summary: RunSummary = {
      tasks: result.total,
      completed: result.completed,
      skipped: result.skipped,
      snapshotsWritten: result.snapshotsWritten,
      changeRecords: result.changeRecords,
      failures: failureSink.count,
      failureLogPath: failureSink.path,
      outputFiles,
    };
    this.logSummary(summary);
    return summary;
  }

  /**
   * Rebuild the JSON dataset from the snapshot cache without network calls.
   * Only captures inside the configured date range are exported, one per bucket
   * of the configured frequency.
   */
  exportSnapshots(): RunSummary {
    const config = this.config;
    const store = new SnapshotStore(config.snapshotsPath, this.logger.child('store'));
    this.snapshotStore = store;

    const writer = this.createWriter();
    const extractor = config.extractText ? new TextExtractor() : undefined;
    const failureSink = new FailureSink(config.failureLogPath, this.logger.child('failures'));
    let exported = 0;

    const selector = new SnapshotSelector();
    const byUrl = new Map<string, StoredSnapshot[]>();
    for (const snapshot of store.list()) {
      const group = byUrl.get(snapshot.url) ?? [];
      group.push(snapshot);
      byUrl.set(snapshot.url, group);
    }

    for (const [url, stored] of byUrl) {
      const byTimestamp = new Map(stored.map((snapshot) => [snapshot.timestamp, snapshot]));
      const refs: SnapshotRef[] = stored.map((snapshot) => ({
        timestamp: snapshot.timestamp,
        date: formatShortDate(snapshot.timestamp),
        digest: snapshot.digest,
        original: url,
        statusCode: '',
        mimeType: '',
      }));

      // Same sampling as a crawl: one cached capture per bucket
      for (const { ref } of selector.select(refs, config.startDate, config.endDate, config.frequency)) {
        const content = store.read(url, ref.timestamp);
        if (content === null) {
          failureSink.record({
            url,
            timestamp: ref.timestamp,
            kind: 'fetch',
            reason: `Cached body missing: ${byTimestamp.get(ref.timestamp)?.localPath ?? ref.timestamp}`,
          });
          continue;
        }

        const added = writer.add({
          url,
          domain: domainOf(url),
          date: ref.date,
          timestamp: ref.timestamp,
          content: extractor ? extractor.extract(content) : content,
        });
        if (added) {
          exported++;
        }
      }
    }

    const summary: RunSummary = {
      tasks: exported,
      completed: exported,
      skipped: 0,
      snapshotsWritten: exported,
      changeRecords: 0,
      failures: failureSink.count,
      failureLogPath: failureSink.path,
      outputFiles: writer.close(),
    };
    this.logSummary(summary);
    return summary;
  }

  /**
   * Best-effort shutdown of a running crawl
   */
  stop(): void {
    this.crawler?.stop();
  }

  async close(): Promise<void> {
    this.snapshotStore?.close();
    this.snapshotStore = undefined;
    if (this.ownsLogger) {
      await this.logger.close();
    }
  }

  private createWriter(): ChunkedWriter {
    return new ChunkedWriter(
      {
        outputPath: this.config.outputJsonPath,
        maxChunkBytes: Math.max(1, Math.floor(this.config.maxChunkSizeMb * BYTES_PER_MB)),
      },
      this.logger.child('writer')
    );
  }

  private logSummary(summary: RunSummary): void {
    this.logger.info('Run complete', {
      tasks: summary.tasks,
      completed: summary.completed,
      skipped: summary.skipped,
      snapshotsWritten: summary.snapshotsWritten,
      changeRecords: summary.changeRecords,
      failures: summary.failures,
      outputFiles: summary.outputFiles,
    });
    if (summary.failures > 0) {
      this.logger.warn(`${summary.failures} requests failed; see ${summary.failureLogPath}`);
    }
  }
}

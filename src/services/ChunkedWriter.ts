/**
 * Size-bounded JSON output.
 * Entries accumulate as domain -> date -> content and are written to numbered
 * chunk files whenever the serialized size estimate reaches the limit.
 */

import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../domain/errors';
import { OutputDataset, SnapshotContent } from '../domain/models/types';
import { LoggingService } from './LoggingService';

export interface ChunkedWriterOptions {
  /** Base output path; chunks are written as <stem>_<n><ext> beside it */
  outputPath: string;
  maxChunkBytes: number;
}

export class ChunkedWriter {
  private readonly directory: string;
  private readonly stem: string;
  private readonly extension: string;
  private readonly maxChunkBytes: number;
  private logger: LoggingService;

  private dataset: OutputDataset = {};
  private estimatedBytes = 2;
  private pendingEntries = 0;
  private nextChunk: number;
  private written: string[] = [];
  private totalEntries = 0;
  /** URL that supplied each domain and date, across all chunks */
  private owners = new Map<string, string>();

  constructor(options: ChunkedWriterOptions, logger: LoggingService) {
    if (!(options.maxChunkBytes > 0)) {
      throw new RangeError(`maxChunkBytes must be positive, got ${options.maxChunkBytes}`);
    }

    this.directory = path.dirname(path.resolve(options.outputPath));
    this.extension = path.extname(options.outputPath) || '.json';
    this.stem = path.basename(options.outputPath, path.extname(options.outputPath));
    this.maxChunkBytes = options.maxChunkBytes;
    this.logger = logger;

    try {
      fs.mkdirSync(this.directory, { recursive: true });
    } catch (error) {
      throw new WriteError(`Cannot create output directory ${this.directory}`, this.directory, error);
    }
    this.nextChunk = this.findLastChunk() + 1;
  }

  /** Chunk files written by this writer, in order */
  get files(): string[] {
    return [...this.written];
  }

  /** Entries added over the writer's lifetime */
  get entryCount(): number {
    return this.totalEntries;
  }

  /** Entries held in memory, not yet flushed */
  get pendingCount(): number {
    return this.pendingEntries;
  }

  /**
   * Add one snapshot; flushes when the chunk reaches its size limit.
   * A domain and date already supplied by a different URL is kept as it was.
   * @returns false when the snapshot was rejected for that reason
   * @throws WriteError when a triggered flush fails
   */
  add(snapshot: SnapshotContent): boolean {
    const key = `${snapshot.domain}|${snapshot.date}`;
    const owner = this.owners.get(key);
    if (owner !== undefined && owner !== snapshot.url) {
      this.logger.warn(
        `Dropping ${snapshot.url} @ ${snapshot.timestamp}: ${snapshot.domain} ${snapshot.date} already comes from ${owner}`
      );
      return false;
    }
    this.owners.set(key, snapshot.url);

    let dates = this.dataset[snapshot.domain];
    if (!dates) {
      dates = {};
      this.dataset[snapshot.domain] = dates;
      this.estimatedBytes += jsonBytes(snapshot.domain) + 4;
    }

    const previous = dates[snapshot.date];
    if (previous !== undefined) {
      this.estimatedBytes -= entryBytes(snapshot.date, previous);
    } else {
      this.pendingEntries++;
      this.totalEntries++;
    }

    dates[snapshot.date] = snapshot.content;
    this.estimatedBytes += entryBytes(snapshot.date, snapshot.content);

    if (this.estimatedBytes >= this.maxChunkBytes) {
      this.flush();
    }
    return true;
  }

  /**
   * Write the accumulated entries to the next chunk file.
   * On failure the entries stay in memory and the chunk number is reused.
   * @returns The chunk path, or null when there was nothing to write
   */
  flush(): string | null {
    if (this.pendingEntries === 0) {
      return null;
    }

    const target = path.join(this.directory, `${this.stem}_${this.nextChunk}${this.extension}`);
    const temp = `${target}.tmp`;

    try {
      fs.writeFileSync(temp, JSON.stringify(this.dataset, null, 2), 'utf-8');
      fs.renameSync(temp, target);
    } catch (error) {
      removeQuietly(temp);
      this.logger.error(`Failed to write output chunk ${target}`, error);
      throw new WriteError(`Failed to write output chunk ${target}`, target, error);
    }

    this.logger.info(`Wrote ${this.pendingEntries} entries to ${target}`);
    this.written.push(target);
    this.nextChunk++;
    this.dataset = {};
    this.estimatedBytes = 2;
    this.pendingEntries = 0;

    return target;
  }

  /**
   * Flush what remains
   * @returns Every chunk file written by this writer
   */
  close(): string[] {
    this.flush();
    return this.files;
  }

  private findLastChunk(): number {
    const pattern = new RegExp(`^${escapeRegExp(this.stem)}_(\\d+)${escapeRegExp(this.extension)}$`);
    let last = 0;

    for (const entry of fs.readdirSync(this.directory)) {
      const match = pattern.exec(entry);
      if (match) {
        last = Math.max(last, parseInt(match[1], 10));
      }
    }

    return last;
  }
}

/**
 * Read every chunk file and merge them into one dataset
 */
export function mergeChunks(files: string[]): OutputDataset {
  const merged: OutputDataset = {};

  for (const file of files) {
    const chunk: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    if (typeof chunk !== 'object' || chunk === null || Array.isArray(chunk)) {
      throw new Error(`Invalid chunk file: ${file}`);
    }

    const domains: [string, unknown][] = Object.entries(chunk);
    for (const [domain, dates] of domains) {
      if (typeof dates !== 'object' || dates === null) {
        continue;
      }
      const target = (merged[domain] = merged[domain] ?? {});
      const entries: [string, unknown][] = Object.entries(dates);
      for (const [date, content] of entries) {
        if (typeof content === 'string') {
          target[date] = content;
        }
      }
    }
  }

  return merged;
}

function jsonBytes(value: string): number {
  return Buffer.byteLength(JSON.stringify(value), 'utf-8');
}

function entryBytes(date: string, content: string): number {
  return jsonBytes(date) + jsonBytes(content) + 2;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function removeQuietly(file: string): void {
  try {
    fs.rmSync(file, { force: true });
  } catch {
    // The original write error is the one reported
  }
}

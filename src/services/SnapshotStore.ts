/**
 * On-disk cache of fetched snapshot bodies.
 * Bodies live in <root>/<sanitized url>/<timestamp>.html; a SQLite index
 * records which (url, timestamp) pairs are present.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../domain/errors';
import { sanitizeUrl } from '../utils/urlUtils';
import { LoggingService } from './LoggingService';

export interface StoredSnapshot {
  url: string;
  timestamp: string;
  digest: string;
  localPath: string;
  sizeBytes: number;
  fetchedAt: string;
}

interface SnapshotRow {
  url: string;
  timestamp: string;
  digest: string;
  local_path: string;
  size_bytes: number;
  fetched_at: string;
}

function toStoredSnapshot(row: SnapshotRow): StoredSnapshot {
  return {
    url: row.url,
    timestamp: row.timestamp,
    digest: row.digest,
    localPath: row.local_path,
    sizeBytes: row.size_bytes,
    fetchedAt: row.fetched_at,
  };
}

export class SnapshotStore {
  readonly root: string;
  private logger: LoggingService;
  private db: Database.Database;

  /**
   * @param root - Directory holding body files and the index database
   * @param dbPath - Index database path (default: <root>/index.db)
   */
  constructor(root: string, logger: LoggingService, dbPath?: string) {
    this.root = path.resolve(root);
    this.logger = logger;

    try {
      fs.mkdirSync(this.root, { recursive: true });
      this.db = new Database(dbPath ?? path.join(this.root, 'index.db'));
      this.db.pragma('journal_mode = WAL');
    } catch (error) {
      this.logger.error(`Failed to open snapshot store at ${this.root}`, error);
      throw new WriteError(`Failed to open snapshot store at ${this.root}`, this.root, error);
    }
    this.initDb();
  }

  private initDb(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS snapshots (
        url TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        digest TEXT NOT NULL,
        local_path TEXT NOT NULL,
        size_bytes INTEGER NOT NULL,
        fetched_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        PRIMARY KEY (url, timestamp)
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_url ON snapshots(url);
    `);
  }

  /**
   * Whether a body for (url, timestamp) is stored and still on disk
   */
  has(url: string, timestamp: string): boolean {
    const row = this.find(url, timestamp);
    return row !== undefined && fs.existsSync(row.localPath);
  }

  /**
   * Read a stored body
   * @returns The body, or null when it is not cached
   */
  read(url: string, timestamp: string): string | null {
    const row = this.find(url, timestamp);
    if (!row || !fs.existsSync(row.localPath)) {
      return null;
    }
    return fs.readFileSync(row.localPath, 'utf-8');
  }

  /**
   * Store a fetched body and index it
   * @returns Path of the body file
   * @throws WriteError if the body cannot be persisted
   */
  save(url: string, timestamp: string, digest: string, content: string): string {
    const localPath = path.join(this.root, sanitizeUrl(url), `${timestamp}.html`);

    try {
      fs.mkdirSync(path.dirname(localPath), { recursive: true });
      fs.writeFileSync(localPath, content, 'utf-8');
      this.db
        .prepare<[string, string, string, string, number]>(
          `INSERT OR REPLACE INTO snapshots (url, timestamp, digest, local_path, size_bytes, fetched_at)
           VALUES (?, ?, ?, ?, ?, CURRENT_TIMESTAMP)`
        )
        .run(url, timestamp, digest, localPath, Buffer.byteLength(content, 'utf-8'));
    } catch (error) {
      throw new WriteError(`Failed to save snapshot ${url} @ ${timestamp}`, localPath, error);
    }

    this.logger.debug(`Snapshot saved as ${localPath}`);
    return localPath;
  }

  /**
   * Stored snapshots, ordered by url then timestamp
   */
  list(url?: string): StoredSnapshot[] {
    const rows =
      url === undefined
        ? this.db
            .prepare<[], SnapshotRow>('SELECT * FROM snapshots ORDER BY url, timestamp')
            .all()
        : this.db
            .prepare<[string], SnapshotRow>('SELECT * FROM snapshots WHERE url = ? ORDER BY timestamp')
            .all(url);

    return rows.map(toStoredSnapshot);
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM snapshots').get();
    return row?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }

  private find(url: string, timestamp: string): StoredSnapshot | undefined {
    const row = this.db
      .prepare<[string, string], SnapshotRow>('SELECT * FROM snapshots WHERE url = ? AND timestamp = ?')
      .get(url, timestamp);
    return row ? toStoredSnapshot(row) : undefined;
  }
}

/**
 * Persists rate-of-change records, one JSON file per URL
 */

import * as fs from 'fs';
import * as path from 'path';
import { WriteError } from '../domain/errors';
import { ChangeRecord } from '../domain/models/types';
import { sanitizeUrl } from '../utils/urlUtils';
import { LoggingService } from './LoggingService';

export class StatsStore {
  readonly root: string;
  private logger: LoggingService;

  constructor(root: string, logger: LoggingService) {
    this.root = path.resolve(root);
    this.logger = logger;
  }

  pathFor(url: string): string {
    return path.join(this.root, `${sanitizeUrl(url)}.json`);
  }

  /** Whether stats were already saved for a URL */
  has(url: string): boolean {
    return fs.existsSync(this.pathFor(url));
  }

  /**
   * @throws WriteError if the stats file cannot be written
   */
  save(record: ChangeRecord): string {
    const statsPath = this.pathFor(record.url);

    try {
      fs.mkdirSync(this.root, { recursive: true });
      fs.writeFileSync(statsPath, JSON.stringify(record, null, 2), 'utf-8');
    } catch (error) {
      throw new WriteError(`Failed to save stats for ${record.url}`, statsPath, error);
    }

    this.logger.debug(`Stats saved as ${statsPath}`);
    return statsPath;
  }
}

/**
 * Reads the input CSV into UrlTasks
 */

import * as fs from 'fs';
import { ConfigError } from '../domain/errors';
import { createUrlTask } from '../domain/models/UrlTask';
import { SiteType, UrlTask } from '../domain/models/types';
import { LoggingService } from '../services/LoggingService';

const URL_COLUMNS: Record<SiteType, string[]> = {
  tos: ['tos_url', 'tos', 'url', 'domain', 'site', 'website'],
  robots: ['url', 'domain', 'site', 'website'],
  main: ['url', 'domain', 'site', 'website'],
};

/**
 * Split CSV text into rows (RFC 4180 quoting, CRLF or LF line endings)
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (quoted) {
      if (char === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && text[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field !== '' || row.length > 0) {
    row.push(field);
    rows.push(row);
  }

  return rows;
}

/**
 * Index of the column holding URLs
 * @throws ConfigError when an explicitly named column is missing
 */
export function findUrlColumn(header: string[], siteType: SiteType, urlColumn?: string): number {
  const normalized = header.map((name) => name.trim().toLowerCase());

  if (urlColumn) {
    const index = normalized.indexOf(urlColumn.trim().toLowerCase());
    if (index === -1) {
      throw new ConfigError(`Column "${urlColumn}" not found in input header: ${header.join(', ')}`);
    }
    return index;
  }

  for (const candidate of URL_COLUMNS[siteType]) {
    const index = normalized.indexOf(candidate);
    if (index !== -1) {
      return index;
    }
  }
  return 0;
}

/**
 * Build one task per output domain; blank or invalid rows are skipped, and so is
 * any later row whose domain key repeats an earlier one
 */
export function tasksFromRows(
  rows: string[][],
  siteType: SiteType,
  logger: LoggingService,
  urlColumn?: string
): UrlTask[] {
  if (rows.length === 0) {
    return [];
  }

  const column = findUrlColumn(rows[0], siteType, urlColumn);
  const seen = new Map<string, string>();
  const tasks: UrlTask[] = [];

  rows.slice(1).forEach((row, index) => {
    const value = (row[column] ?? '').trim();
    if (!value) {
      return;
    }

    let task: UrlTask;
    try {
      task = createUrlTask(value, siteType);
    } catch {
      logger.warn(`Skipping invalid URL on input line ${index + 2}: ${value}`);
      return;
    }

    const first = seen.get(task.domain);
    if (first !== undefined) {
      if (first === task.resolvedUrl) {
        logger.debug(`Skipping duplicate URL: ${task.resolvedUrl}`);
      } else {
        logger.warn(`Skipping ${task.resolvedUrl} on input line ${index + 2}: domain ${task.domain} already comes from ${first}`);
      }
      return;
    }
    seen.set(task.domain, task.resolvedUrl);
    tasks.push(task);
  });

  return tasks;
}

/**
 * Read UrlTasks from a CSV file with a header row
 * @throws ConfigError if the file cannot be read
 */
export function readUrlTasks(
  csvPath: string,
  siteType: SiteType,
  logger: LoggingService,
  urlColumn?: string
): UrlTask[] {
  let content: string;
  try {
    content = fs.readFileSync(csvPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Input file not found: ${csvPath}`);
    }
    throw new ConfigError(`Cannot read input file ${csvPath}: ${String(error)}`);
  }

  const tasks = tasksFromRows(parseCsv(content.replace(/^\uFEFF/, '')), siteType, logger, urlColumn);
  logger.info(`Loaded ${tasks.length} URLs from ${csvPath}`);
  return tasks;
}

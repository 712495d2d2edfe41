/**
 * Utility functions for Wayback timestamps, YYYYMMDD dates and sampling buckets.
 * All calendar arithmetic is done in UTC, matching the archive's timestamps.
 */

import { Bucket, Frequency } from '../domain/models/types';

const TIMESTAMP_PATTERN = /^\d{14}$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parse a Wayback Machine timestamp (YYYYMMDDHHMMSS) to a UTC Date
 * @throws Error if timestamp format is invalid
 */
export function parseWaybackTimestamp(timestamp: string): Date {
  if (!TIMESTAMP_PATTERN.test(timestamp)) {
    throw new Error(`Invalid Wayback timestamp format: ${timestamp}`);
  }

  const year = parseInt(timestamp.substring(0, 4), 10);
  const month = parseInt(timestamp.substring(4, 6), 10) - 1;
  const day = parseInt(timestamp.substring(6, 8), 10);
  const hour = parseInt(timestamp.substring(8, 10), 10);
  const minute = parseInt(timestamp.substring(10, 12), 10);
  const second = parseInt(timestamp.substring(12, 14), 10);

  const date = new Date(Date.UTC(year, month, day, hour, minute, second));

  if (
    date.getUTCMonth() !== month ||
    date.getUTCDate() !== day ||
    hour > 23 ||
    minute > 59 ||
    second > 59
  ) {
    throw new Error(`Invalid date components in timestamp: ${timestamp}`);
  }

  return date;
}

/**
 * Format a Date object to Wayback timestamp (YYYYMMDDHHMMSS)
 */
export function formatWaybackTimestamp(date: Date): string {
  const year = date.getUTCFullYear().toString().padStart(4, '0');
  const month = (date.getUTCMonth() + 1).toString().padStart(2, '0');
  const day = date.getUTCDate().toString().padStart(2, '0');
  const hour = date.getUTCHours().toString().padStart(2, '0');
  const minute = date.getUTCMinutes().toString().padStart(2, '0');
  const second = date.getUTCSeconds().toString().padStart(2, '0');

  return `${year}${month}${day}${hour}${minute}${second}`;
}

/**
 * Format a Wayback timestamp or YYYYMMDD date to YYYY-MM-DD
 */
export function formatShortDate(timestamp: string): string {
  return `${timestamp.substring(0, 4)}-${timestamp.substring(4, 6)}-${timestamp.substring(6, 8)}`;
}

/**
 * Format a YYYYMMDD date for log messages (MM-DD-YYYY)
 */
export function formatReadableDate(compactDate: string): string {
  return `${compactDate.substring(4, 6)}-${compactDate.substring(6, 8)}-${compactDate.substring(0, 4)}`;
}

export function extractYear(timestamp: string): number {
  return parseInt(timestamp.substring(0, 4), 10);
}

/**
 * Whether a string is a real calendar date in YYYYMMDD form
 */
export function isCompactDate(value: string): boolean {
  const match = COMPACT_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10) - 1;
  const day = parseInt(match[3], 10);
  const date = new Date(Date.UTC(year, month, day));

  return date.getUTCFullYear() === year && date.getUTCMonth() === month && date.getUTCDate() === day;
}

/**
 * Parse a YYYYMMDD date to midnight UTC
 * @throws Error if the value is not a calendar date
 */
export function parseCompactDate(value: string): Date {
  if (!isCompactDate(value)) {
    throw new Error(`Invalid date (expected YYYYMMDD): ${value}`);
  }

  return new Date(
    Date.UTC(
      parseInt(value.substring(0, 4), 10),
      parseInt(value.substring(4, 6), 10) - 1,
      parseInt(value.substring(6, 8), 10)
    )
  );
}

export function formatCompactDate(date: Date): string {
  return formatWaybackTimestamp(date).substring(0, 8);
}

/**
 * Bucket key of a YYYYMMDD date or Wayback timestamp for a frequency
 */
export function bucketKey(timestamp: string, frequency: Frequency): string {
  switch (frequency) {
    case 'daily':
      return formatShortDate(timestamp);
    case 'monthly':
      return `${timestamp.substring(0, 4)}-${timestamp.substring(4, 6)}`;
    case 'annually':
      return timestamp.substring(0, 4);
  }
}

/**
 * Partition an inclusive YYYYMMDD range into calendar buckets clipped to the range
 */
export function enumerateBuckets(startDate: string, endDate: string, frequency: Frequency): Bucket[] {
  const start = parseCompactDate(startDate);
  const end = parseCompactDate(endDate);
  const buckets: Bucket[] = [];

  let cursor = start;
  while (cursor.getTime() <= end.getTime()) {
    const next = nextBucketStart(cursor, frequency);
    const lastDay = new Date(Math.min(next.getTime() - DAY_MS, end.getTime()));
    const bucketStart = formatCompactDate(cursor);

    buckets.push({
      key: bucketKey(bucketStart, frequency),
      start: bucketStart,
      end: formatCompactDate(lastDay),
    });
    cursor = next;
  }

  return buckets;
}

function nextBucketStart(date: Date, frequency: Frequency): Date {
  const year = date.getUTCFullYear();
  const month = date.getUTCMonth();

  switch (frequency) {
    case 'daily':
      return new Date(date.getTime() + DAY_MS);
    case 'monthly':
      return new Date(Date.UTC(year, month + 1, 1));
    case 'annually':
      return new Date(Date.UTC(year + 1, 0, 1));
  }
}

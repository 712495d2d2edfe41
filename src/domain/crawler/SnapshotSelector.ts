/**
 * Snapshot Selection
 * Picks one capture per sampling bucket (day, month or year)
 */

import { Bucket, Frequency, SelectedSnapshot, SnapshotRef } from '../models/types';
import { bucketKey, enumerateBuckets } from '../../utils/DateFormatter';

export class SnapshotSelector {
  /**
   * Split an inclusive YYYYMMDD range into calendar buckets
   */
  buckets(startDate: string, endDate: string, frequency: Frequency): Bucket[] {
    return enumerateBuckets(startDate, endDate, frequency);
  }

  /**
   * Select the first capture of each bucket inside the range.
   * Buckets without captures produce no entry.
   * @returns Selections ordered by increasing timestamp
   */
  select(refs: SnapshotRef[], startDate: string, endDate: string, frequency: Frequency): SelectedSnapshot[] {
    const earliest = new Map<string, SnapshotRef>();

    for (const ref of refs) {
      const day = ref.timestamp.substring(0, 8);
      if (day < startDate || day > endDate) {
        continue;
      }

      const key = bucketKey(ref.timestamp, frequency);
      const current = earliest.get(key);
      // Strict comparison keeps the first-listed ref on equal timestamps
      if (!current || ref.timestamp < current.timestamp) {
        earliest.set(key, ref);
      }
    }

    return Array.from(earliest.entries())
      .map(([bucket, ref]) => ({ bucket, ref }))
      .sort((a, b) => a.ref.timestamp.localeCompare(b.ref.timestamp));
  }
}

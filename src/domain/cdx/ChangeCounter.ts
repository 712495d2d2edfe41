/**
 * Rate-of-change measurement from CDX digests alone
 */

import { Bucket, ChangeRecord, SnapshotRef } from '../models/types';

function byTimestamp(refs: SnapshotRef[]): SnapshotRef[] {
  return [...refs].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
}

export class ChangeCounter {
  /**
   * Count adjacent digest transitions across every capture
   * @param buckets - When given, also break the count down per bucket
   */
  countChanges(url: string, refs: SnapshotRef[], buckets: Bucket[] = []): ChangeRecord {
    const ordered = byTimestamp(refs);
    let changeCount = 0;

    for (let i = 1; i < ordered.length; i++) {
      if (ordered[i].digest !== ordered[i - 1].digest) {
        changeCount++;
      }
    }

    return {
      url,
      changeCount,
      captures: ordered.length,
      changeCounts: this.countByBucket(ordered, buckets),
    };
  }

  /**
   * Transitions per bucket, each attributed to the bucket of its later capture.
   * Every bucket is present in the result, with zero when nothing changed.
   */
  countByBucket(refs: SnapshotRef[], buckets: Bucket[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const bucket of buckets) {
      counts[bucket.key] = 0;
    }

    const ordered = byTimestamp(refs);
    for (let i = 1; i < ordered.length; i++) {
      if (ordered[i].digest === ordered[i - 1].digest) {
        continue;
      }

      const day = ordered[i].timestamp.substring(0, 8);
      const bucket = buckets.find((b) => b.start <= day && day <= b.end);
      if (bucket) {
        counts[bucket.key]++;
      }
    }

    return counts;
  }
}

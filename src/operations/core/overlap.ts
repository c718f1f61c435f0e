/**
 * Overlap-join between label rows and intervals
 *
 * Equivalent to `bedtools intersect -a labels -b intervals -wa -wb`: every
 * overlapping (label, interval) pair becomes one joined row carrying both
 * originals. Rows are ordered by label, then by interval input order.
 *
 * @module overlap
 * @since v0.1.0
 */

import type { GenomicInterval, JoinedInterval, LabelInterval } from "../../types";
import { intervalsOverlap } from "./coordinates";

interface IndexedInterval {
  readonly interval: GenomicInterval;
  readonly index: number;
}

/**
 * Intervals grouped by chromosome and sorted by start
 */
export class IntervalIndex {
  private readonly byChromosome = new Map<string, IndexedInterval[]>();

  constructor(intervals: readonly GenomicInterval[]) {
    intervals.forEach((interval, index) => {
      const bucket = this.byChromosome.get(interval.chromosome) ?? [];
      bucket.push({ interval, index });
      this.byChromosome.set(interval.chromosome, bucket);
    });
    for (const bucket of this.byChromosome.values()) {
      bucket.sort((a, b) => a.interval.start - b.interval.start || a.index - b.index);
    }
  }

  /**
   * Input positions of all intervals overlapping `query`, ascending
   */
  overlapping(query: GenomicInterval): number[] {
    const bucket = this.byChromosome.get(query.chromosome);
    if (bucket === undefined) return [];

    // Only intervals starting before query.end can overlap
    const limit = upperBound(bucket, query.end);
    const hits: number[] = [];
    for (let i = 0; i < limit; i++) {
      const candidate = bucket[i];
      if (candidate !== undefined && intervalsOverlap(candidate.interval, query)) {
        hits.push(candidate.index);
      }
    }
    return hits.sort((a, b) => a - b);
  }
}

/**
 * First position whose interval starts at or after `position`
 */
function upperBound(bucket: readonly IndexedInterval[], position: number): number {
  let low = 0;
  let high = bucket.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const entry = bucket[mid];
    if (entry !== undefined && entry.interval.start < position) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

/**
 * Join every label against every interval, keeping overlapping pairs
 *
 * @returns Joined rows; empty when nothing overlaps
 */
export function overlapJoin(
  labels: readonly LabelInterval[],
  intervals: readonly GenomicInterval[]
): JoinedInterval[] {
  const index = new IntervalIndex(intervals);
  const joined: JoinedInterval[] = [];

  labels.forEach((label, labelIndex) => {
    for (const intervalIndex of index.overlapping(label)) {
      const interval = intervals[intervalIndex];
      if (interval !== undefined) {
        joined.push({ label, interval, labelIndex, intervalIndex });
      }
    }
  });

  return joined;
}

/**
 * Coordinate-frame translation between genome, interval and window
 *
 * Pure functions for padding an interval to a fixed window, moving
 * coordinates between absolute and window-relative frames, and formatting
 * `chrom:start-end` region strings. All coordinates are 0-based half-open.
 *
 * @module coordinates
 * @since v0.1.0
 */

import { ValidationError, WindowTooSmallError } from "../../errors";
import type { FlankSplit, GenomicInterval, PaddedInterval } from "../../types";

// =============================================================================
// REGION STRINGS
// =============================================================================

/**
 * Format an interval as `chrom:start-end`
 *
 * @example
 * ```typescript
 * formatRegion({ chromosome: "chr1", start: 100, end: 110 }); // "chr1:100-110"
 * ```
 */
export function formatRegion(interval: GenomicInterval): string {
  return `${interval.chromosome}:${interval.start}-${interval.end}`;
}

/**
 * Parse a `chrom:start-end` region string
 *
 * The chromosome part may itself contain `:` (e.g. HLA contigs); the last
 * colon separates the coordinates.
 *
 * @throws {ValidationError} When the region is malformed
 */
export function parseRegion(region: string): GenomicInterval {
  if (region.trim() === "") {
    throw new ValidationError("Region string cannot be empty");
  }

  const colon = region.lastIndexOf(":");
  const match = colon > 0 ? /^(\d+)-(\d+)$/.exec(region.slice(colon + 1)) : null;
  if (match === null) {
    throw new ValidationError(`Invalid region format: ${region} (expected chrom:start-end)`);
  }

  const start = Number.parseInt(match[1] ?? "", 10);
  const end = Number.parseInt(match[2] ?? "", 10);
  if (start >= end) {
    throw new ValidationError(`Invalid coordinates: start ${start} >= end ${end} in region ${region}`);
  }

  return { chromosome: region.slice(0, colon), start, end };
}

// =============================================================================
// PADDING
// =============================================================================

/**
 * Split the padding that brings an interval of `intervalLength` bp up to
 * `windowLength` bp
 *
 * Odd padding puts the extra base before the interval: `pre` takes the
 * ceiling, `post` the floor.
 *
 * @throws {WindowTooSmallError} When the window is shorter than the interval
 *
 * @example
 * ```typescript
 * splitPadding(10, 20); // { pad: 10, pre: 5, post: 5 }
 * splitPadding(9, 20);  // { pad: 11, pre: 6, post: 5 }
 * ```
 */
export function splitPadding(intervalLength: number, windowLength: number, region = ""): FlankSplit {
  const pad = windowLength - intervalLength;
  if (pad < 0) {
    throw new WindowTooSmallError(windowLength, intervalLength, region);
  }

  const post = Math.floor(pad / 2);
  return { pad, pre: pad - post, post };
}

/**
 * Widen an interval to exactly `windowLength` bp
 *
 * The padded start may be negative near a chromosome start; window slicing
 * truncates rather than failing.
 *
 * @throws {WindowTooSmallError} When the window is shorter than the interval
 */
export function padInterval(interval: GenomicInterval, windowLength: number): PaddedInterval {
  const { pre, post } = splitPadding(
    interval.end - interval.start,
    windowLength,
    formatRegion(interval)
  );

  return {
    chromosome: interval.chromosome,
    start: interval.start - pre,
    end: interval.end + post,
    source: interval,
    pre,
    post,
  };
}

// =============================================================================
// FRAME TRANSLATION
// =============================================================================

/**
 * Absolute coordinate -> window-relative coordinate
 *
 * `anchor` is the absolute position that sits at window offset `pre`
 * (the unpadded interval start).
 */
export function toWindowRelative(position: number, anchor: number, pre: number): number {
  return position - anchor + pre;
}

/**
 * Window-relative coordinate -> absolute coordinate
 *
 * Inverse of {@link toWindowRelative}.
 */
export function toAbsolute(position: number, anchor: number, pre: number): number {
  return anchor - pre + position;
}

/**
 * Expand a window-relative region by `flankSize` bases on each side
 *
 * The result may extend past either window edge.
 */
export function expandRegion(
  start: number,
  end: number,
  flankSize: number
): { start: number; end: number } {
  return { start: start - flankSize, end: end + flankSize };
}

/**
 * Half-open overlap test for two intervals on the same chromosome
 */
export function intervalsOverlap(a: GenomicInterval, b: GenomicInterval): boolean {
  return a.chromosome === b.chromosome && a.start < b.end && b.start < a.end;
}

/**
 * Fixed-window mapping of BED intervals
 *
 * Every interval is padded to the window length, the window is extracted,
 * and one location record describes the interval (mutation) and the
 * interval widened by `flankSize` on both sides (response), both in
 * window-relative coordinates.
 *
 * @module operations/flank-mapper
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type {
  Genome,
  GenomicInterval,
  LocationRecord,
  MappingResult,
  PaddedInterval,
  WindowMappingOptions,
} from "../types";
import { WindowMappingOptionsSchema } from "../types";
import { expandRegion, formatRegion, padInterval } from "./core/coordinates";
import { createLocationRecord, windowKey } from "./core/locations";
import { loadWindows } from "./genome-windows";

export const DEFAULT_MAPPING_OPTIONS: Required<WindowMappingOptions> = {
  windowLength: 1000,
  flankSize: 15,
  includeSequence: false,
};

/**
 * Merge user options with defaults and validate them
 *
 * @throws {ValidationError} When a length is not a non-negative integer
 */
export function resolveMappingOptions(options: WindowMappingOptions): Required<WindowMappingOptions> {
  const merged = { ...DEFAULT_MAPPING_OPTIONS, ...options };

  const validationResult = WindowMappingOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new ValidationError(`Invalid window mapping options: ${validationResult.summary}`);
  }

  return merged;
}

/**
 * Name of the single flank response region
 */
export function flankName(flankSize: number): string {
  return `flank_${flankSize}`;
}

/**
 * Location record of one padded interval
 */
export function flankedRecord(seq: number, padded: PaddedInterval, flankSize: number): LocationRecord {
  const { source, pre } = padded;
  const size = source.end - source.start;
  const mutation = { start: pre, end: pre + size, name: formatRegion(source) };
  const response = expandRegion(mutation.start, mutation.end, flankSize);

  return createLocationRecord(seq, mutation, [{ ...response, name: flankName(flankSize) }]);
}

/**
 * Pad, window and locate every interval
 *
 * All intervals are padded before any window is extracted, so a window
 * shorter than one interval fails the batch before any sequence work.
 *
 * @throws {WindowTooSmallError} When `windowLength` is below an interval's span
 * @throws {UnknownChromosomeError} When an interval's chromosome is missing
 * @throws {UnsupportedCharacterError} When a window contains a base outside ACGTN
 *
 * @example
 * ```typescript
 * const { locations } = mapFlanked(
 *   [{ chromosome: "chr1", start: 100, end: 110 }],
 *   genome,
 *   { windowLength: 20, flankSize: 3 }
 * );
 * locations.get("seq_0");
 * // { seq: 0, mutStart: 5, mutEnd: 15, mutName: "chr1:100-110",
 * //   respStart: [2], respEnd: [18], respNames: ["flank_3"] }
 * ```
 */
export function mapFlanked(
  intervals: readonly GenomicInterval[],
  genome: Genome,
  options: WindowMappingOptions = {}
): MappingResult {
  const { windowLength, flankSize, includeSequence } = resolveMappingOptions(options);

  const paddedIntervals = intervals.map((interval) => padInterval(interval, windowLength));

  const locations = new Map<string, LocationRecord>();
  paddedIntervals.forEach((padded, seq) => {
    locations.set(windowKey(seq), flankedRecord(seq, padded, flankSize));
  });

  const windows = loadWindows(paddedIntervals, genome, { includeSequence });

  return { windows, locations, paddedIntervals };
}

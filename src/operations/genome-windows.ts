/**
 * Genome window loading
 *
 * Slices each interval out of a read-only genome handle and one-hot encodes
 * it. Output order is input order; every mapper relies on that positional
 * correspondence.
 *
 * @module operations/genome-windows
 */

import { UnknownChromosomeError } from "../errors";
import type { Genome, GenomicInterval, LoadWindowsOptions, SequenceWindow } from "../types";
import { encodeOneHot } from "./core/one-hot";

/**
 * Slice `[start, end)` from a chromosome sequence
 *
 * Out-of-range bounds truncate instead of failing: a negative start clamps to
 * 0, an end past the sequence stops at its length, and an empty string comes
 * back when nothing remains.
 */
export function sliceInterval(sequence: string, start: number, end: number): string {
  const from = Math.max(0, start);
  const to = Math.min(sequence.length, end);
  return from < to ? sequence.slice(from, to) : "";
}

/**
 * Look up a chromosome in the genome
 *
 * @throws {UnknownChromosomeError} When the genome has no such sequence
 */
export function getChromosome(genome: Genome, chromosome: string): string {
  const sequence = genome.get(chromosome);
  if (sequence === undefined) {
    throw new UnknownChromosomeError(chromosome, [...genome.keys()]);
  }
  return sequence;
}

/**
 * Extract and encode one window per interval
 *
 * @throws {UnknownChromosomeError} When an interval names a missing chromosome
 * @throws {UnsupportedCharacterError} When a window contains a base outside ACGTN
 *
 * @example
 * ```typescript
 * const genome = await loadGenome("hg19.fa");
 * const windows = loadWindows([{ chromosome: "chr1", start: 100, end: 1100 }], genome);
 * windows[0].encoded.length; // 1000
 * ```
 */
export function loadWindows(
  intervals: readonly GenomicInterval[],
  genome: Genome,
  options: LoadWindowsOptions = {}
): SequenceWindow[] {
  const { includeSequence = false } = options;

  return intervals.map((interval, index) => {
    const chromosome = getChromosome(genome, interval.chromosome);
    const sequence = sliceInterval(chromosome, interval.start, interval.end);
    const encoded = encodeOneHot(sequence);

    return Object.freeze(
      includeSequence ? { index, interval, encoded, sequence } : { index, interval, encoded }
    );
  });
}

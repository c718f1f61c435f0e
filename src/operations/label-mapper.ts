/**
 * Window mapping of intervals that overlap labeled features
 *
 * Labels are overlap-joined against the intervals. For each joined row the
 * interval (peak) is padded to the window length and windowed, while the
 * mutation and response regions come from the label's feature span
 * translated into that window.
 *
 * @module operations/label-mapper
 */

import { ValidationError } from "../errors";
import type {
  Genome,
  GenomicInterval,
  JoinedInterval,
  LabelInterval,
  LabelMappingResult,
  LocationRecord,
  PaddedInterval,
  WindowMappingOptions,
} from "../types";
import { expandRegion, formatRegion, padInterval, toWindowRelative } from "./core/coordinates";
import { createLocationRecord, windowKey } from "./core/locations";
import { overlapJoin } from "./core/overlap";
import { flankName, resolveMappingOptions } from "./flank-mapper";
import { loadWindows } from "./genome-windows";

/**
 * Location record of one joined row
 *
 * The feature end is shifted by the post flank, not the pre flank; the two
 * differ by one base when the padding is odd.
 */
export function labeledRecord(
  seq: number,
  label: LabelInterval,
  padded: PaddedInterval,
  flankSize: number
): LocationRecord {
  const { source, pre, post } = padded;
  const mutation = {
    start: toWindowRelative(label.featureStart, source.start, pre),
    end: toWindowRelative(label.featureEnd, source.start, post),
    name: formatRegion(source),
  };
  const response = expandRegion(mutation.start, mutation.end, flankSize);

  return createLocationRecord(seq, mutation, [{ ...response, name: flankName(flankSize) }]);
}

/**
 * Reject labels whose feature does not end after it starts
 *
 * @throws {ValidationError} Naming the label and its source line
 */
export function validateLabelFeatures(labels: readonly LabelInterval[]): void {
  labels.forEach((label, i) => {
    if (label.featureEnd <= label.featureStart) {
      throw new ValidationError(
        `Label ${i} (${formatRegion(label)}) has an empty or reversed feature span ${label.featureStart}-${label.featureEnd}`,
        label.lineNumber
      );
    }
  });
}

/**
 * Overlap-join labels with intervals, then window and locate every pair
 *
 * Records are keyed by joined-row position (`seq_<row>`), not by the
 * original interval or label index; `joined` maps them back.
 *
 * @returns Empty windows and locations when no label overlaps an interval
 * @throws {ValidationError} When a label's feature span is empty or reversed
 * @throws {WindowTooSmallError} When `windowLength` is below an interval's span
 * @throws {UnknownChromosomeError} When an interval's chromosome is missing
 */
export function mapWithLabels(
  intervals: readonly GenomicInterval[],
  labels: readonly LabelInterval[],
  genome: Genome,
  options: WindowMappingOptions = {}
): LabelMappingResult {
  const { windowLength, flankSize, includeSequence } = resolveMappingOptions(options);
  validateLabelFeatures(labels);

  const joined: JoinedInterval[] = overlapJoin(labels, intervals);
  const paddedIntervals: PaddedInterval[] = [];
  const locations = new Map<string, LocationRecord>();

  joined.forEach(({ label, interval }, seq) => {
    const padded = padInterval(interval, windowLength);
    paddedIntervals.push(padded);
    locations.set(windowKey(seq), labeledRecord(seq, label, padded, flankSize));
  });

  const windows = loadWindows(paddedIntervals, genome, { includeSequence });

  return { windows, locations, paddedIntervals, joined };
}

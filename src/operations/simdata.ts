/**
 * Location decoding for simulated sequences
 *
 * Each row of a simulation table describes one generated sequence. Its
 * `embeddings` column lists the motifs planted in it as
 * `pos-<start>_<motif>-<label>` tokens. Every placement is in turn treated
 * as the mutation, with all other placements of the same row as its
 * response regions.
 *
 * @module operations/simdata
 */

import { ShapeMismatchError } from "../errors";
import type {
  LocationMap,
  LocationRecord,
  Placement,
  SequenceWindow,
  SimdataOptions,
  TableRow,
} from "../types";
import { createLocationRecord, placementKey } from "./core/locations";
import { parsePlacements } from "./core/placements";

const DEFAULT_SIMDATA_OPTIONS = {
  column: "embeddings",
  onWarning: (warning: string): void => {
    console.warn(`Simdata Warning: ${warning}`);
  },
} satisfies Required<SimdataOptions>;

/**
 * Location records for one row of placements
 *
 * Placements are compared by token, so a token repeated in a row is not a
 * response of itself and both copies share one key.
 */
export function placementRecords(seq: number, placements: readonly Placement[]): Array<[string, LocationRecord]> {
  return placements.map((mutation) => {
    const responses = placements
      .filter((other) => other.token !== mutation.token)
      .map((other) => ({ start: other.start, end: other.end, name: other.name }));

    return [placementKey(seq, mutation.token), createLocationRecord(seq, mutation, responses)];
  });
}

/**
 * Decode placement strings into location records
 *
 * @param sequences - Encoded sequences, or just their count
 * @param rows - Simulation table rows, one per sequence
 * @throws {ShapeMismatchError} When row and sequence counts differ
 * @throws {PlacementParseError} When a placement token is malformed
 *
 * @example
 * ```typescript
 * const locations = decodeSimdataLocations(1, [
 *   { embeddings: "pos-10_TAL1-AAAA,pos-30_GATA1-CCCC" },
 * ]);
 * locations.get("seq_0_emb_pos-10_TAL1-AAAA")?.respNames; // ["GATA1"]
 * ```
 */
export function decodeSimdataLocations(
  sequences: readonly SequenceWindow[] | number,
  rows: readonly TableRow[],
  options: SimdataOptions = {}
): LocationMap {
  const { column, onWarning } = { ...DEFAULT_SIMDATA_OPTIONS, ...options };
  const sequenceCount = typeof sequences === "number" ? sequences : sequences.length;

  if (rows.length !== sequenceCount) {
    throw new ShapeMismatchError(
      "Simulation table rows do not match sequence count",
      sequenceCount,
      rows.length
    );
  }

  const locations = new Map<string, LocationRecord>();

  rows.forEach((row, seq) => {
    const field = row[column];
    if (field === undefined || field === null || field.trim() === "") {
      onWarning(`No embeddings for seq ${seq}`);
      return;
    }

    for (const [key, record] of placementRecords(seq, parsePlacements(field, seq))) {
      locations.set(key, record);
    }
  });

  return locations;
}

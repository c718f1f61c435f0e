/**
 * Core type definitions for window extraction and location mapping
 *
 * Four coordinate frames meet in this library:
 * - absolute genome coordinates (0-based, half-open)
 * - interval-relative coordinates
 * - padded-window-relative coordinates (what location records carry)
 * - the `pos-<start>_<motif>-<label>` placement encoding of simulated data
 *
 * Interfaces describe the values; the ArkType schemas at the bottom validate
 * option objects at the public entry points.
 */

import { type } from "arktype";

// =============================================================================
// INTERVALS AND GENOME
// =============================================================================

/**
 * Genomic interval in absolute coordinates (0-based, half-open)
 */
export interface GenomicInterval {
  readonly chromosome: string;
  readonly start: number;
  readonly end: number;
}

/**
 * Interval row parsed from a BED-like table
 */
export interface BedRecord extends GenomicInterval {
  /** Columns after the first three, verbatim */
  readonly fields: readonly string[];
  readonly lineNumber?: number;
}

/**
 * Label row: an interval plus the absolute span of the labeled feature
 */
export interface LabelInterval extends GenomicInterval {
  readonly featureStart: number;
  readonly featureEnd: number;
  readonly lineNumber?: number;
}

/**
 * Read-only genome handle: sequence name to nucleotide string
 */
export type Genome = ReadonlyMap<string, string>;

/**
 * FASTA record
 */
export interface FastaSequence {
  readonly id: string;
  readonly description?: string;
  readonly sequence: string;
  readonly length: number;
  readonly lineNumber?: number;
}

// =============================================================================
// WINDOWS
// =============================================================================

/**
 * Row-major one-hot matrix of shape `length × 4` (columns A, C, G, T)
 *
 * Matrices are frozen, but `data` is the window's own buffer: it is neither
 * copied nor frozen, so writes to it are visible through every reference.
 */
export interface OneHotMatrix {
  readonly length: number;
  readonly data: Float32Array;
}

/**
 * Encoded window extracted for one input interval
 */
export interface SequenceWindow {
  /** Position of the source interval in the input */
  readonly index: number;
  /** Interval the window was sliced from */
  readonly interval: GenomicInterval;
  readonly encoded: OneHotMatrix;
  /** Raw nucleotides, present when requested */
  readonly sequence?: string;
}

/**
 * Pre/post flank split of the padding needed to reach a window length
 */
export interface FlankSplit {
  readonly pad: number;
  readonly pre: number;
  readonly post: number;
}

/**
 * Interval widened to the full window, with the flanks that produced it
 */
export interface PaddedInterval extends GenomicInterval {
  readonly source: GenomicInterval;
  readonly pre: number;
  readonly post: number;
}

// =============================================================================
// LOCATIONS
// =============================================================================

/**
 * Mutation region plus response regions of one window, window-relative
 *
 * Coordinates may be negative or exceed the window length when a flank
 * reaches past the window boundary.
 */
export interface LocationRecord {
  /** Index of the owning window */
  readonly seq: number;
  readonly mutStart: number;
  readonly mutEnd: number;
  readonly mutName: string;
  readonly respStart: readonly number[];
  readonly respEnd: readonly number[];
  readonly respNames: readonly string[];
}

/**
 * Location records keyed `seq_<index>` or `seq_<index>_emb_<token>`
 */
export type LocationMap = ReadonlyMap<string, LocationRecord>;

/**
 * Snake-case record shape used for JSON export
 */
export interface LocationRecordObject {
  seq: number;
  mut_start: number;
  mut_end: number;
  mut_name: string;
  resp_start: number[];
  resp_end: number[];
  resp_names: string[];
}

/**
 * One parsed synthetic placement token
 */
export interface Placement {
  /** Sequence-relative start */
  readonly start: number;
  /** `start + label.length` */
  readonly end: number;
  /** Motif name up to its first `_` */
  readonly name: string;
  /** Embedded nucleotide label */
  readonly label: string;
  /** Token as it appeared in the table */
  readonly token: string;
}

/**
 * Overlapping label/interval pair from an overlap-join
 */
export interface JoinedInterval {
  readonly label: LabelInterval;
  readonly interval: GenomicInterval;
  readonly labelIndex: number;
  readonly intervalIndex: number;
}

/**
 * Windows plus location records from one mapping run
 */
export interface MappingResult {
  readonly windows: readonly SequenceWindow[];
  readonly locations: LocationMap;
  readonly paddedIntervals: readonly PaddedInterval[];
}

export interface LabelMappingResult extends MappingResult {
  readonly joined: readonly JoinedInterval[];
}

/**
 * Table row with nullable cells, keyed by header name
 */
export type TableRow = Readonly<Record<string, string | null>>;

// =============================================================================
// OPTIONS
// =============================================================================

export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Options shared by the text parsers
 */
export interface ParserOptions {
  /** Maximum line length before throwing error */
  maxLineLength?: number;
  /** AbortController signal for cancelling parsing operations */
  signal?: AbortSignal;
  /** Custom warning handler */
  onWarning?: WarningHandler;
}

export interface LoadWindowsOptions {
  /** Keep the raw nucleotide string on every window */
  includeSequence?: boolean;
}

export interface WindowMappingOptions extends LoadWindowsOptions {
  /** Target window length in bp */
  windowLength?: number;
  /** Bases added on each side of the feature to form the response region */
  flankSize?: number;
}

export interface SimdataOptions {
  /** Column holding the placement string */
  column?: string;
  onWarning?: WarningHandler;
}

export interface CorrectPredictionOptions {
  /** Positives count as correct above this score */
  posThreshold?: number;
  /** When set, negatives count as correct below this score */
  negThreshold?: number;
  /** Task `t` labels are read from column `t + labelKeyColumn + 1` */
  labelKeyColumn?: number;
}

export type CompressionFormat = "gzip" | "none";

export interface FileReaderOptions {
  encoding?: "utf8";
  maxFileSize?: number;
  bufferSize?: number;
  autoDecompress?: boolean;
}

// =============================================================================
// SCHEMAS
// =============================================================================

export const WindowMappingOptionsSchema = type({
  windowLength: "number.integer > 0",
  flankSize: "number.integer >= 0",
  includeSequence: "boolean",
});

export const CorrectPredictionOptionsSchema = type({
  posThreshold: "number",
  "negThreshold?": "number",
  labelKeyColumn: "number.integer >= 0",
});

export const FileReaderOptionsSchema = type({
  encoding: '"utf8"',
  maxFileSize: "number.integer > 0",
  bufferSize: "number.integer > 0",
  autoDecompress: "boolean",
});

export const FilePathSchema = type("string > 0").pipe((path: string) => {
  if (path.includes("\0")) {
    throw new Error("Path must not contain null bytes");
  }
  return path.trim();
});

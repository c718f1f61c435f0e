/**
 * File-level entry points
 *
 * Load interval tables, genomes and simulation tables from disk (gzip
 * inputs are decompressed transparently) and run the window mappers on
 * them. Everything after loading is the synchronous core.
 *
 * @module operations/pipelines
 */

import { BedParser, BedWriter, toLabelInterval } from "../formats/bed";
import type { BedParserOptions, LabelColumns } from "../formats/bed";
import { parseTable } from "../formats/dsv";
import type { DSVParserOptions } from "../formats/dsv";
import { loadGenome } from "../formats/fasta";
import { readToString } from "../io/file-reader";
import { writeJson, writeString } from "../io/file-writer";
import type {
  BedRecord,
  Genome,
  LabelInterval,
  LabelMappingResult,
  LoadWindowsOptions,
  LocationMap,
  MappingResult,
  PaddedInterval,
  SequenceWindow,
  SimdataOptions,
  WindowMappingOptions,
} from "../types";
import { toLocationObject } from "./core/locations";
import { mapFlanked } from "./flank-mapper";
import { loadWindows } from "./genome-windows";
import { mapWithLabels } from "./label-mapper";
import { decodeSimdataLocations } from "./simdata";

/**
 * A genome handle, or the path of a FASTA file to load one from
 */
export type GenomeSource = Genome | string;

export interface SimdataFileOptions extends SimdataOptions {
  /** Table parsing; defaults to a tab-separated table with a header */
  table?: DSVParserOptions;
}

async function resolveGenome(source: GenomeSource): Promise<Genome> {
  return typeof source === "string" ? loadGenome(source) : source;
}

/**
 * Read every interval of a BED file
 */
export async function loadIntervals(bedPath: string, options: BedParserOptions = {}): Promise<BedRecord[]> {
  const intervals: BedRecord[] = [];
  for await (const record of new BedParser(options).parseFile(bedPath)) {
    intervals.push(record);
  }
  return intervals;
}

/**
 * Read a labels table, taking each row's feature span from its extra columns
 */
export async function loadLabels(
  labelsPath: string,
  columns: LabelColumns = {},
  options: BedParserOptions = {}
): Promise<LabelInterval[]> {
  const records = await loadIntervals(labelsPath, options);
  return records.map((record) => toLabelInterval(record, columns));
}

/**
 * Window every interval of a BED file as-is (no padding)
 *
 * @example
 * ```typescript
 * const windows = await loadSequencesFromBed("peaks.bed", "hg19.genome.fa", {
 *   includeSequence: true,
 * });
 * windows[0]?.sequence;
 * ```
 */
export async function loadSequencesFromBed(
  bedPath: string,
  genome: GenomeSource,
  options: LoadWindowsOptions = {}
): Promise<SequenceWindow[]> {
  const [intervals, handle] = await Promise.all([loadIntervals(bedPath), resolveGenome(genome)]);
  return loadWindows(intervals, handle, options);
}

/**
 * Decode placement locations from a simulation table file
 *
 * @param sequences - Encoded sequences, or just their count
 */
export async function processLocationsFromSimdata(
  sequences: readonly SequenceWindow[] | number,
  simdataPath: string,
  options: SimdataFileOptions = {}
): Promise<LocationMap> {
  const { table, ...simdataOptions } = options;
  const rows = await parseTable(await readToString(simdataPath), table);
  return decodeSimdataLocations(sequences, rows, simdataOptions);
}

/**
 * Flank-map every interval of a BED file
 */
export async function processSeqsAndLocationsFromBed(
  bedPath: string,
  genome: GenomeSource,
  options: WindowMappingOptions = {}
): Promise<MappingResult> {
  const [intervals, handle] = await Promise.all([loadIntervals(bedPath), resolveGenome(genome)]);
  return mapFlanked(intervals, handle, options);
}

/**
 * Overlap-join a labels file against a BED file and map every joined row
 */
export async function processSeqsAndLocationsFromBedAndLabels(
  bedPath: string,
  labelsPath: string,
  genome: GenomeSource,
  options: WindowMappingOptions = {},
  columns: LabelColumns = {}
): Promise<LabelMappingResult> {
  const [intervals, labels, handle] = await Promise.all([
    loadIntervals(bedPath),
    loadLabels(labelsPath, columns),
    resolveGenome(genome),
  ]);
  return mapWithLabels(intervals, labels, handle, options);
}

/**
 * Write padded window coordinates as BED
 */
export async function writePaddedIntervals(
  filePath: string,
  paddedIntervals: readonly PaddedInterval[]
): Promise<void> {
  const writer = new BedWriter();
  await writeString(filePath, writer.formatIntervals(paddedIntervals));
}

/**
 * Write locations as JSON with snake_case record fields
 */
export async function writeLocations(filePath: string, locations: LocationMap): Promise<void> {
  await writeJson(filePath, toLocationObject(locations));
}

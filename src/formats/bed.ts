/**
 * BED interval table parser and writer
 *
 * Reads the first three columns as chromosome, start and end (0-based,
 * half-open) and keeps every further column verbatim. Handles real-world
 * interval files:
 * - Track lines, browser lines and `#` comments
 * - An optional header row (`chrom start end ...`), detected automatically
 * - Tab-separated or whitespace-separated columns
 * - Label tables whose feature span sits in extra columns
 */

import { BedError } from "../errors";
import type { BedRecord, GenomicInterval, LabelInterval, ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * BED parser options
 */
export interface BedParserOptions extends ParserOptions {
  /** `true` skips the first data line, `"auto"` skips it when its coordinates are not numeric */
  header?: boolean | "auto";
  /** Accept `start == end` intervals */
  allowZeroLength?: boolean;
}

/**
 * Columns holding the feature span of a label row (0-based, counted over the
 * whole row)
 */
export interface LabelColumns {
  featureStartColumn?: number;
  featureEndColumn?: number;
}

const COORDINATE_PATTERN = /^\d+$/;
const ABORT_CHECK_INTERVAL = 10_000;

/**
 * Validate genomic coordinates
 */
export function validateCoordinates(
  start: number,
  end: number,
  allowZeroLength = false
): { valid: boolean; error?: string } {
  if (start < 0 || end < 0) {
    return { valid: false, error: "Coordinates cannot be negative" };
  }

  if (!allowZeroLength && start >= end) {
    return { valid: false, error: "End coordinate must be greater than start" };
  }

  if (allowZeroLength && start > end) {
    return { valid: false, error: "Start coordinate cannot exceed end coordinate" };
  }

  return { valid: true };
}

function splitFields(line: string): string[] {
  return line.includes("\t") ? line.split("\t").map((field) => field.trim()) : line.trim().split(/\s+/);
}

function isDirectiveLine(trimmed: string): boolean {
  return (
    trimmed.startsWith("#") || trimmed.startsWith("track") || trimmed.startsWith("browser")
  );
}

/**
 * Streaming BED parser
 *
 * @example
 * ```typescript
 * const parser = new BedParser();
 * for await (const interval of parser.parseFile("peaks.bed")) {
 *   console.log(interval.chromosome, interval.start, interval.end);
 * }
 * ```
 */
export class BedParser extends AbstractParser<BedRecord, BedParserOptions> {
  constructor(options: BedParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): Partial<BedParserOptions> {
    return {
      header: "auto",
      allowZeroLength: false,
    };
  }

  protected getFormatName(): string {
    return "BED";
  }

  /**
   * Parse BED intervals from any line source
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<BedRecord> {
    let lineNumber = 0;
    let seenData = false;

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % ABORT_CHECK_INTERVAL === 0) {
        this.throwIfAborted("interval parsing");
      }
      this.checkLineLength(line, lineNumber);

      const trimmed = line.trim();
      if (trimmed === "" || isDirectiveLine(trimmed)) continue;

      const fields = splitFields(line);
      const isFirstData = !seenData;
      seenData = true;

      if (isFirstData && this.isHeader(fields)) continue;

      yield this.parseRecord(fields, lineNumber);
    }
  }

  private isHeader(fields: readonly string[]): boolean {
    const { header } = this.options;
    if (header === true) return true;
    if (header === false) return false;
    return !COORDINATE_PATTERN.test(fields[1] ?? "") || !COORDINATE_PATTERN.test(fields[2] ?? "");
  }

  private parseRecord(fields: readonly string[], lineNumber: number): BedRecord {
    const [chromosome = "", startText = "", endText = "", ...rest] = fields;

    if (fields.length < 3) {
      throw new BedError(
        `BED line must have at least 3 fields (chrom, start, end), got ${fields.length}`,
        chromosome,
        undefined,
        undefined,
        lineNumber
      );
    }
    if (chromosome === "") {
      throw new BedError("Empty chromosome name", undefined, undefined, undefined, lineNumber);
    }
    if (!COORDINATE_PATTERN.test(startText) || !COORDINATE_PATTERN.test(endText)) {
      throw new BedError(
        `Invalid coordinates '${startText}' - '${endText}': must be non-negative integers`,
        chromosome,
        undefined,
        undefined,
        lineNumber
      );
    }

    const start = Number.parseInt(startText, 10);
    const end = Number.parseInt(endText, 10);
    const validation = validateCoordinates(start, end, this.options.allowZeroLength ?? false);
    if (!validation.valid) {
      throw new BedError(
        `Invalid coordinates: ${validation.error ?? "unknown error"}`,
        chromosome,
        start,
        end,
        lineNumber
      );
    }

    return Object.freeze({
      chromosome,
      start,
      end,
      fields: Object.freeze([...rest]),
      lineNumber,
    });
  }
}

/**
 * Read a label row's feature span from its extra columns
 *
 * By default the feature start/end are the two columns right after the
 * interval's own three.
 *
 * @throws {BedError} When a feature column is missing or not an integer, or
 *   the feature does not end after it starts
 */
export function toLabelInterval(record: BedRecord, columns: LabelColumns = {}): LabelInterval {
  const { featureStartColumn = 3, featureEndColumn = 4 } = columns;
  const readColumn = (column: number): number => {
    const text = record.fields[column - 3];
    if (column < 3 || text === undefined || !/^-?\d+$/.test(text)) {
      throw new BedError(
        `Label column ${column} is not an integer feature coordinate: '${text ?? ""}'`,
        record.chromosome,
        record.start,
        record.end,
        record.lineNumber
      );
    }
    return Number.parseInt(text, 10);
  };

  const featureStart = readColumn(featureStartColumn);
  const featureEnd = readColumn(featureEndColumn);
  if (featureEnd <= featureStart) {
    throw new BedError(
      `Label feature span ${featureStart}-${featureEnd} is empty or reversed`,
      record.chromosome,
      record.start,
      record.end,
      record.lineNumber
    );
  }

  return Object.freeze({
    chromosome: record.chromosome,
    start: record.start,
    end: record.end,
    featureStart,
    featureEnd,
    lineNumber: record.lineNumber,
  });
}

/**
 * BED writer
 */
export class BedWriter {
  /**
   * Format one interval as a tab-separated line
   */
  formatInterval(interval: GenomicInterval & { readonly fields?: readonly string[] }): string {
    const columns = [interval.chromosome, String(interval.start), String(interval.end)];
    return [...columns, ...(interval.fields ?? [])].join("\t");
  }

  /**
   * Format intervals as BED text with a trailing newline
   */
  formatIntervals(intervals: readonly (GenomicInterval & { readonly fields?: readonly string[] })[]): string {
    return intervals.map((interval) => `${this.formatInterval(interval)}\n`).join("");
  }
}

export const BedUtils = {
  validateCoordinates,
  toLabelInterval,
} as const;

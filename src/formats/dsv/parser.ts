/**
 * DSV table parser
 *
 * Reads tab- or comma-separated tables with a header row into rows keyed by
 * column name. Cells listed in `nullValues` become `null`, the way table
 * tools read NA.
 */

import { DSVParseError } from "../../errors";
import type { ParserOptions, TableRow } from "../../types";
import { AbstractParser } from "../abstract-parser";
import { COMMENT_PREFIXES, DEFAULT_DELIMITERS, DEFAULT_NULL_VALUES, DEFAULT_QUOTE } from "./constants";
import { hasBalancedQuotes, parseCSVRow } from "./state-machine";

const ABORT_CHECK_INTERVAL = 10_000;

/**
 * DSV parser options
 */
export interface DSVParserOptions extends ParserOptions {
  delimiter?: string;
  quote?: string;
  /** First data line names the columns; otherwise columns are named "0", "1", ... */
  header?: boolean;
  nullValues?: readonly string[];
  /** Skip lines starting with `#` */
  skipComments?: boolean;
  /** Maximum physical lines a quoted field may span */
  maxFieldLines?: number;
}

/**
 * Streaming DSV parser
 *
 * @example
 * ```typescript
 * const parser = new DSVParser({ delimiter: "," });
 * for await (const row of parser.parseFile("simdata.csv")) {
 *   console.log(row.embeddings);
 * }
 * ```
 */
export class DSVParser extends AbstractParser<TableRow, DSVParserOptions> {
  constructor(options: DSVParserOptions = {}) {
    super(options);
    if (this.delimiter.length !== 1) {
      throw new DSVParseError(`Delimiter must be a single character, got '${this.delimiter}'`);
    }
  }

  protected getDefaultOptions(): Partial<DSVParserOptions> {
    return {
      delimiter: DEFAULT_DELIMITERS.tsv,
      quote: DEFAULT_QUOTE,
      header: true,
      nullValues: DEFAULT_NULL_VALUES,
      skipComments: true,
      maxFieldLines: 1000,
    };
  }

  protected getFormatName(): string {
    return "DSV";
  }

  private get delimiter(): string {
    return this.options.delimiter ?? DEFAULT_DELIMITERS.tsv;
  }

  private get quote(): string {
    return this.options.quote ?? DEFAULT_QUOTE;
  }

  /**
   * Parse table rows from any line source
   *
   * @throws {DSVParseError} On an unclosed quote, a duplicate column name,
   *   or a row wider than the header
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<TableRow> {
    const nullValues = new Set(this.options.nullValues ?? DEFAULT_NULL_VALUES);
    const maxFieldLines = this.options.maxFieldLines ?? 1000;
    let columns: string[] | null = null;
    let lineNumber = 0;
    let pending: { text: string; startLine: number; spanned: number } | null = null;

    this.throwIfAborted("row parsing");

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % ABORT_CHECK_INTERVAL === 0) {
        this.throwIfAborted("row parsing");
      }
      this.checkLineLength(line, lineNumber);

      if (pending === null) {
        if (line.trim() === "") continue;
        if (this.isComment(line, columns)) continue;
        pending = { text: line, startLine: lineNumber, spanned: 1 };
      } else {
        pending = { text: `${pending.text}\n${line}`, startLine: pending.startLine, spanned: pending.spanned + 1 };
      }

      if (!hasBalancedQuotes(pending.text, this.quote)) {
        if (pending.spanned >= maxFieldLines) {
          throw new DSVParseError(`Quoted field spans more than ${maxFieldLines} lines`, pending.startLine);
        }
        continue;
      }

      const fields = parseCSVRow(pending.text, this.delimiter, this.quote, pending.startLine);
      const rowLine = pending.startLine;
      pending = null;

      if (columns === null) {
        columns = this.options.header === false ? fields.map((_, i) => String(i)) : this.readHeader(fields, rowLine);
        if (this.options.header !== false) continue;
      }

      yield this.buildRow(columns, fields, nullValues, rowLine);
    }

    if (pending !== null) {
      throw new DSVParseError("Unclosed quote in field", pending.startLine);
    }
  }

  private isComment(line: string, columns: readonly string[] | null): boolean {
    if (this.options.skipComments !== true || columns !== null) return false;
    return COMMENT_PREFIXES.some((prefix) => line.startsWith(prefix));
  }

  private readHeader(fields: readonly string[], lineNumber: number): string[] {
    const columns = fields.map((field) => field.trim());
    const seen = new Set<string>();
    for (const [i, column] of columns.entries()) {
      if (seen.has(column)) {
        throw new DSVParseError("Duplicate column name", lineNumber, i + 1, column);
      }
      seen.add(column);
    }
    return columns;
  }

  private buildRow(
    columns: readonly string[],
    fields: readonly string[],
    nullValues: ReadonlySet<string>,
    lineNumber: number
  ): TableRow {
    if (fields.length > columns.length) {
      throw new DSVParseError(
        `Row has ${fields.length} fields but header has ${columns.length}`,
        lineNumber
      );
    }
    if (fields.length < columns.length) {
      this.options.onWarning(
        `Row has ${fields.length} fields, filling ${columns.length - fields.length} missing with null`,
        lineNumber
      );
    }

    const row: Record<string, string | null> = {};
    columns.forEach((column, i) => {
      const value = fields[i];
      row[column] = value === undefined || nullValues.has(value) ? null : value;
    });
    return Object.freeze(row);
  }
}

/**
 * Values of a parsed row in column order
 */
export function rowValues(row: TableRow): Array<string | null> {
  return Object.values(row);
}

/**
 * Read a whole table file into memory
 */
export async function readTable(filePath: string, options: DSVParserOptions = {}): Promise<TableRow[]> {
  const rows: TableRow[] = [];
  for await (const row of new DSVParser(options).parseFile(filePath)) {
    rows.push(row);
  }
  return rows;
}

/**
 * Parse table text into memory
 */
export async function parseTable(data: string, options: DSVParserOptions = {}): Promise<TableRow[]> {
  const rows: TableRow[] = [];
  for await (const row of new DSVParser(options).parseString(data)) {
    rows.push(row);
  }
  return rows;
}

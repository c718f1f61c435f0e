/**
 * Abstract base parser with shared option and interrupt handling
 *
 * Provides consistent AbortSignal support and warning reporting across the
 * BED, FASTA and DSV parsers without imposing parsing implementation details.
 */

import { ParseError } from "../errors";
import { createStream } from "../io/file-reader";
import { readLines, splitLines } from "../io/stream-utils";
import type { ParserOptions } from "../types";

/**
 * Abstract parser base class
 *
 * @template T - The record type this parser produces
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & Required<ParserOptions>;

  constructor(options: TOptions) {
    const baseDefaults: Required<Omit<ParserOptions, "signal">> = {
      maxLineLength: 1_000_000_000,
      onWarning: (warning: string, lineNumber?: number): void => {
        const location = lineNumber !== undefined ? ` (line ${lineNumber})` : "";
        console.warn(`${this.getFormatName()} Warning${location}: ${warning}`);
      },
    };

    // Merge in order: base -> format-specific -> user options
    this.options = {
      signal: new AbortController().signal,
      ...baseDefaults,
      ...this.getDefaultOptions(),
      ...options,
    };
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  /**
   * Format name for error messages and logging (e.g. "BED", "FASTA")
   */
  protected abstract getFormatName(): string;

  /**
   * Parse records from any line source
   */
  abstract parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<T>;

  /**
   * Parse records from an in-memory string
   */
  async *parseString(data: string): AsyncIterable<T> {
    yield* this.parseLines(splitLines(data));
  }

  /**
   * Parse records from a file (`.gz` files are decompressed)
   */
  async *parseFile(filePath: string): AsyncIterable<T> {
    const stream = await createStream(filePath);
    yield* this.parseLines(readLines(stream));
  }

  /**
   * Parse everything into an array
   */
  async collect(source: Iterable<string> | AsyncIterable<string>): Promise<T[]> {
    const records: T[] = [];
    for await (const record of this.parseLines(source)) {
      records.push(record);
    }
    return records;
  }

  /**
   * Throw if the caller aborted; call this in parsing loops
   *
   * @throws {ParseError} If the signal has been aborted
   */
  protected throwIfAborted(context: string): void {
    if (this.options.signal.aborted) {
      throw new ParseError(`Operation aborted during ${this.getFormatName()} ${context}`, "ABORTED");
    }
  }

  /**
   * Reject lines longer than `maxLineLength`
   */
  protected checkLineLength(line: string, lineNumber: number): void {
    if (line.length > this.options.maxLineLength) {
      throw new ParseError(
        `Line too long: ${line.length} characters exceeds maximum ${this.options.maxLineLength}`,
        this.getFormatName(),
        lineNumber
      );
    }
  }
}

/**
 * FASTA parser and genome loader
 *
 * Parses multi-line FASTA records and builds the read-only genome handle
 * the window loader slices from. Sequence case is preserved (soft-masked
 * lowercase bases encode like uppercase ones).
 */

import { FastaError } from "../errors";
import type { FastaSequence, Genome, ParserOptions } from "../types";
import { AbstractParser } from "./abstract-parser";

/**
 * FASTA parser options
 */
export interface FastaParserOptions extends ParserOptions {
  /** Keep the header text after the identifier as `description` */
  keepDescription?: boolean;
}

const ABORT_CHECK_INTERVAL = 100_000;

/**
 * Split a header line into identifier and description
 *
 * The identifier is the text between `>` and the first whitespace.
 */
export function parseFastaHeader(headerLine: string): { id: string; description?: string } {
  const content = headerLine.slice(1).trim();
  const match = /^(\S*)\s*(.*)$/.exec(content);
  const id = match?.[1] ?? "";
  const description = match?.[2] ?? "";
  return description !== "" ? { id, description } : { id };
}

/**
 * Streaming FASTA parser
 *
 * @example
 * ```typescript
 * const parser = new FastaParser();
 * for await (const record of parser.parseString(">chr1\nACGT\nNNAC\n")) {
 *   console.log(record.id, record.sequence); // chr1 ACGTNNAC
 * }
 * ```
 */
export class FastaParser extends AbstractParser<FastaSequence, FastaParserOptions> {
  constructor(options: FastaParserOptions = {}) {
    super(options);
  }

  protected getDefaultOptions(): Partial<FastaParserOptions> {
    return { keepDescription: true };
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  /**
   * Parse FASTA records from any line source
   *
   * @throws {FastaError} When sequence data appears before the first header
   *   or a header has no identifier
   */
  async *parseLines(lines: Iterable<string> | AsyncIterable<string>): AsyncIterable<FastaSequence> {
    let lineNumber = 0;
    let header: { id: string; description?: string; lineNumber: number } | null = null;
    let chunks: string[] = [];

    for await (const line of lines) {
      lineNumber++;
      if (lineNumber % ABORT_CHECK_INTERVAL === 0) {
        this.throwIfAborted("sequence parsing");
      }
      this.checkLineLength(line, lineNumber);

      const trimmed = line.trim();
      if (trimmed === "" || trimmed.startsWith(";")) continue;

      if (trimmed.startsWith(">")) {
        if (header !== null) {
          yield this.buildRecord(header, chunks);
        }
        const parsed = parseFastaHeader(trimmed);
        if (parsed.id === "") {
          throw new FastaError("FASTA header has no identifier", undefined, lineNumber, trimmed);
        }
        header = { ...parsed, lineNumber };
        chunks = [];
        continue;
      }

      if (header === null) {
        throw new FastaError("Sequence data found before header", undefined, lineNumber);
      }
      chunks.push(trimmed.includes(" ") ? trimmed.replace(/\s+/g, "") : trimmed);
    }

    if (header !== null) {
      yield this.buildRecord(header, chunks);
    }
  }

  private buildRecord(
    header: { id: string; description?: string; lineNumber: number },
    chunks: readonly string[]
  ): FastaSequence {
    const sequence = chunks.join("");
    if (sequence === "") {
      this.options.onWarning(`Sequence '${header.id}' is empty`, header.lineNumber);
    }

    return Object.freeze({
      id: header.id,
      ...(this.options.keepDescription === true && header.description !== undefined
        ? { description: header.description }
        : {}),
      sequence,
      length: sequence.length,
      lineNumber: header.lineNumber,
    });
  }
}

/**
 * Build a genome handle from parsed FASTA records
 *
 * @throws {FastaError} When two records share an identifier
 */
export async function genomeFromRecords(
  records: Iterable<FastaSequence> | AsyncIterable<FastaSequence>
): Promise<Genome> {
  const genome = new Map<string, string>();
  for await (const record of records) {
    if (genome.has(record.id)) {
      throw new FastaError(`Duplicate sequence identifier '${record.id}'`, record.id, record.lineNumber);
    }
    genome.set(record.id, record.sequence);
  }
  return genome;
}

/**
 * Load a FASTA file (optionally `.gz`) into a genome handle
 *
 * @example
 * ```typescript
 * const genome = await loadGenome("hg19.genome.fa");
 * genome.get("chr1")?.length;
 * ```
 */
export async function loadGenome(filePath: string, options: FastaParserOptions = {}): Promise<Genome> {
  const parser = new FastaParser({ ...options, keepDescription: false });
  return genomeFromRecords(parser.parseFile(filePath));
}

/**
 * Build a genome handle from FASTA text
 */
export async function parseGenome(data: string, options: FastaParserOptions = {}): Promise<Genome> {
  const parser = new FastaParser({ ...options, keepDescription: false });
  return genomeFromRecords(parser.parseString(data));
}

export const FastaUtils = {
  parseFastaHeader,
  genomeFromRecords,
  loadGenome,
  parseGenome,
} as const;

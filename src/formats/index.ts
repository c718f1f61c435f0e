/**
 * Format parsers
 */

export { AbstractParser } from "./abstract-parser";
export {
  BedParser,
  type BedParserOptions,
  BedUtils,
  BedWriter,
  type LabelColumns,
  toLabelInterval,
  validateCoordinates,
} from "./bed";
export * from "./dsv";
export {
  FastaParser,
  type FastaParserOptions,
  FastaUtils,
  genomeFromRecords,
  loadGenome,
  parseFastaHeader,
  parseGenome,
} from "./fasta";

/**
 * seqwindow - genomic windows and perturbation locations for model
 * interpretation
 *
 * Extracts fixed-length, one-hot encoded windows around BED intervals,
 * records where the perturbed feature and its response regions sit inside
 * each window, and selects the examples a model already predicts correctly.
 */

// Compression infrastructure
export { CompressionDetector, createDecompressor, GzipDecompressor } from './compression';
// Error types
export {
  BedError,
  CompressionError,
  DSVParseError,
  ERROR_SUGGESTIONS,
  FastaError,
  FileError,
  getErrorSuggestion,
  ParseError,
  PlacementParseError,
  SeqWindowError,
  ShapeMismatchError,
  StreamError,
  UnknownChromosomeError,
  UnsupportedCharacterError,
  ValidationError,
  WindowTooSmallError,
} from './errors';
// Formats
export * from './formats';
// I/O
export { FileReader } from './io/file-reader';
export { FileWriter } from './io/file-writer';
export { StreamUtils } from './io/stream-utils';
// Operations
export * from './operations';
// Types
export type {
  BedRecord,
  CompressionFormat,
  CorrectPredictionOptions,
  FastaSequence,
  FileReaderOptions,
  FlankSplit,
  Genome,
  GenomicInterval,
  JoinedInterval,
  LabelInterval,
  LabelMappingResult,
  LoadWindowsOptions,
  LocationMap,
  LocationRecord,
  LocationRecordObject,
  MappingResult,
  OneHotMatrix,
  PaddedInterval,
  ParserOptions,
  Placement,
  SequenceWindow,
  SimdataOptions,
  TableRow,
  WarningHandler,
  WindowMappingOptions,
} from './types';

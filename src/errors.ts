/**
 * Error handling for window extraction and location mapping
 *
 * Every fatal condition aborts the whole batch: downstream consumers rely on
 * positional alignment between windows and location records, so partial
 * results are never returned.
 */

/**
 * Base error class for all seqwindow errors
 */
export class SeqWindowError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "SeqWindowError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed options or data
 */
export class ValidationError extends SeqWindowError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends SeqWindowError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "PARSE_ERROR", lineNumber, context);
    this.name = "ParseError";
  }
}

/**
 * BED interval table errors
 */
export class BedError extends ParseError {
  constructor(
    message: string,
    public readonly chromosome?: string,
    public readonly start?: number,
    public readonly end?: number,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "BED", lineNumber, context);
    this.name = "BedError";
  }
}

/**
 * FASTA genome errors
 */
export class FastaError extends ParseError {
  constructor(
    message: string,
    public readonly sequenceId?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "FASTA", lineNumber, context);
    this.name = "FastaError";
  }
}

/**
 * Delimiter-separated table errors with column context
 */
export class DSVParseError extends ParseError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly column?: number,
    public readonly field?: string
  ) {
    const context = [
      line !== undefined ? `line ${line}` : "",
      column !== undefined ? `column ${column}` : "",
      field !== undefined ? `field "${field}"` : "",
    ]
      .filter((part) => part !== "")
      .join(", ");

    super(context !== "" ? `${message} (${context})` : message, "DSV", line);
    this.name = "DSVParseError";
  }
}

/**
 * Malformed synthetic placement token (`pos-<start>_<motif>-<label>`)
 */
export class PlacementParseError extends ParseError {
  constructor(
    message: string,
    public readonly token: string,
    public readonly row?: number
  ) {
    super(
      `${message}: '${token}'${row !== undefined ? ` (row ${row})` : ""}`,
      "PLACEMENT",
      undefined,
      "Expected pos-<start>_<motif>-<label>"
    );
    this.name = "PlacementParseError";
  }
}

/**
 * A nucleotide outside {A, C, G, T, N} (case-insensitive) during one-hot encoding
 */
export class UnsupportedCharacterError extends SeqWindowError {
  constructor(
    public readonly character: string,
    public readonly position: number,
    context?: string
  ) {
    super(
      `Unsupported character: '${character}' at position ${position}`,
      "UNSUPPORTED_CHARACTER",
      undefined,
      context
    );
    this.name = "UnsupportedCharacterError";
  }
}

/**
 * An interval references a sequence name absent from the genome
 */
export class UnknownChromosomeError extends SeqWindowError {
  constructor(
    public readonly chromosome: string,
    public readonly available: readonly string[] = []
  ) {
    super(
      `Chromosome '${chromosome}' not found in genome`,
      "UNKNOWN_CHROMOSOME",
      undefined,
      available.length > 0 ? `Available: ${available.slice(0, 10).join(", ")}` : undefined
    );
    this.name = "UnknownChromosomeError";
  }
}

/**
 * Two collections that must align positionally have different sizes
 */
export class ShapeMismatchError extends SeqWindowError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`${message}: expected ${expected}, got ${actual}`, "SHAPE_MISMATCH");
    this.name = "ShapeMismatchError";
  }
}

/**
 * The requested window is shorter than an interval's own span
 */
export class WindowTooSmallError extends SeqWindowError {
  constructor(
    public readonly windowLength: number,
    public readonly intervalLength: number,
    public readonly region: string
  ) {
    super(
      `Window length ${windowLength} is smaller than interval ${region} (${intervalLength} bp)`,
      "WINDOW_TOO_SMALL",
      undefined,
      `Use a window length of at least ${intervalLength}`
    );
    this.name = "WindowTooSmallError";
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends SeqWindowError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "stream",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const msg = errorMessage.toLowerCase();
    const suggestion =
      msg.includes("header") || msg.includes("magic")
        ? `. File may be corrupted or not actually ${format} compressed`
        : msg.includes("unexpected end")
          ? ". File appears to be truncated or incomplete"
          : "";

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }
}

/**
 * File I/O errors with detailed context
 */
export class FileError extends SeqWindowError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    if (systemError instanceof FileError) return systemError;

    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();
    msg += `\nFile: ${this.filePath}`;
    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }
    return msg;
  }
}

/**
 * Stream processing errors for line reading
 */
export class StreamError extends SeqWindowError {
  constructor(
    message: string,
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "STREAM_ERROR", undefined, context);
    this.name = "StreamError";
  }
}

export const ERROR_SUGGESTIONS = {
  UNSUPPORTED_CHARACTER: "Windows may only contain A, C, G, T or N (any case)",
  UNKNOWN_CHROMOSOME: "Check that the interval file and genome use the same chromosome naming (chr1 vs 1)",
  WINDOW_TOO_SMALL: "Increase the window length or drop intervals longer than the window",
  SHAPE_MISMATCH: "Each simulation table row must correspond to exactly one sequence",
  INVALID_BED_COORDINATES: "BED coordinates must be non-negative integers with start < end",
  MALFORMED_LINE: "Check for extra whitespace, special characters, or encoding issues",
} as const;

/**
 * Get helpful suggestion for an error
 */
export function getErrorSuggestion(error: SeqWindowError): string {
  switch (error.code) {
    case "UNSUPPORTED_CHARACTER":
      return ERROR_SUGGESTIONS.UNSUPPORTED_CHARACTER;
    case "UNKNOWN_CHROMOSOME":
      return ERROR_SUGGESTIONS.UNKNOWN_CHROMOSOME;
    case "WINDOW_TOO_SMALL":
      return ERROR_SUGGESTIONS.WINDOW_TOO_SMALL;
    case "SHAPE_MISMATCH":
      return ERROR_SUGGESTIONS.SHAPE_MISMATCH;
  }
  if (error instanceof BedError && error.message.toLowerCase().includes("coordinate")) {
    return ERROR_SUGGESTIONS.INVALID_BED_COORDINATES;
  }
  return ERROR_SUGGESTIONS.MALFORMED_LINE;
}

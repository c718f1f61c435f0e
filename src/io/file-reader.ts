/**
 * File reading utilities built on Effect Platform
 *
 * Promise-based wrappers around Effect's `FileSystem` service with path
 * validation, size limits and transparent gzip decompression.
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Stream } from "effect";
import { CompressionDetector, GzipDecompressor } from "../compression";
import { FileError } from "../errors";
import type { FileReaderOptions } from "../types";
import { FilePathSchema, FileReaderOptionsSchema } from "../types";
import { DEFAULT_BUFFER_SIZE, getPlatform } from "./runtime";
import { peekStream } from "./stream-utils";

// Module-level constants for default options
const DEFAULT_OPTIONS: Required<FileReaderOptions> = {
  encoding: "utf8",
  maxFileSize: 10_000_000_000, // 10GB, enough for uncompressed reference genomes
  bufferSize: DEFAULT_BUFFER_SIZE,
  autoDecompress: true,
};

/**
 * Check if a file exists and is a regular file
 *
 * @throws {FileError} If path validation fails
 */
export async function exists(path: string): Promise<boolean> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const pathExists = yield* fs.exists(validatedPath);
    if (!pathExists) return false;

    const info = yield* fs.stat(validatedPath);
    return info.type === "File";
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Get file size in bytes
 *
 * @throws {FileError} If file cannot be accessed or doesn't exist
 */
export async function getSize(path: string): Promise<number> {
  const validatedPath = validatePath(path);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const info = yield* fs.stat(validatedPath);
    return Number(info.size);
  });

  try {
    return await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("stat", validatedPath, error);
  }
}

/**
 * Create a streaming reader for a file
 *
 * Gzip content is recognised by its magic bytes, whatever the extension, and
 * decompressed on the fly unless `autoDecompress` is false.
 *
 * @throws {FileError} If file cannot be opened or exceeds `maxFileSize`
 */
export async function createStream(
  path: string,
  options: FileReaderOptions = {}
): Promise<ReadableStream<Uint8Array>> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);

  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const effectStream = fs.stream(validatedPath, {
      bufferSize: mergedOptions.bufferSize,
    });
    return Stream.toReadableStream(effectStream);
  });

  let stream: ReadableStream<Uint8Array>;
  try {
    stream = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (!mergedOptions.autoDecompress) {
    return stream;
  }

  const peeked = await peekStream(stream);
  if (CompressionDetector.fromMagicBytes(peeked.head) === "gzip") {
    return GzipDecompressor.wrapStream(peeked.stream);
  }
  return peeked.stream;
}

/**
 * Read an entire file to a string, decompressing gzip content
 *
 * @throws {FileError} If file cannot be read or is too large
 */
export async function readToString(path: string, options: FileReaderOptions = {}): Promise<string> {
  const validatedPath = validatePath(path);
  const mergedOptions = mergeOptions(options);
  await validateFileSize(validatedPath, mergedOptions);

  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.readFile(validatedPath);
  });

  let bytes: Uint8Array;
  try {
    bytes = await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("read", validatedPath, error);
  }

  if (mergedOptions.autoDecompress && CompressionDetector.fromMagicBytes(bytes) === "gzip") {
    bytes = await GzipDecompressor.decompress(bytes);
  }
  return new TextDecoder("utf-8").decode(bytes);
}

// Namespace export
export const FileReader = {
  exists,
  getSize,
  createStream,
  readToString,
} as const;

// =============================================================================
// PRIVATE HELPER FUNCTIONS
// =============================================================================

/**
 * Validate file path using ArkType
 * Maintains FileError interface contract for callers
 */
function validatePath(path: string): string {
  try {
    const validationResult = FilePathSchema(path);
    if (validationResult instanceof type.errors) {
      throw new FileError(`Invalid file path: ${validationResult.summary}`, path, "stat");
    }
    return validationResult;
  } catch (error) {
    if (error instanceof FileError) throw error;
    throw new FileError(
      `Invalid file path: ${error instanceof Error ? error.message : String(error)}`,
      path,
      "stat"
    );
  }
}

async function validateFileSize(
  validatedPath: string,
  mergedOptions: Required<FileReaderOptions>
): Promise<void> {
  const fileSize = await getSize(validatedPath);
  if (fileSize > mergedOptions.maxFileSize) {
    throw new FileError(
      `File too large: ${fileSize} bytes exceeds limit of ${mergedOptions.maxFileSize} bytes`,
      validatedPath,
      "read"
    );
  }
}

/**
 * Merge user options with defaults
 */
function mergeOptions(options: FileReaderOptions): Required<FileReaderOptions> {
  const merged = { ...DEFAULT_OPTIONS, ...options };

  const validationResult = FileReaderOptionsSchema(merged);
  if (validationResult instanceof type.errors) {
    throw new FileError(`Invalid file reader options: ${validationResult.summary}`, "", "read");
  }

  return merged;
}

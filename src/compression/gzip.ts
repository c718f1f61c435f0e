/**
 * Gzip decompression for genomic files
 *
 * Buffers go through Node's zlib; streams through the WHATWG
 * `DecompressionStream`, so line readers can consume `.gz` files without
 * inflating them fully in memory.
 */

import { DecompressionStream } from 'node:stream/web';
import { promisify } from 'node:util';
import { gunzip } from 'node:zlib';
import { CompressionError } from '../errors';
import { CompressionDetector } from './detector';

const gunzipAsync = promisify(gunzip);

/**
 * Decompress an entire gzip buffer in memory
 *
 * @throws {CompressionError} If the data is not gzip or is corrupted
 *
 * @example
 * ```typescript
 * const text = new TextDecoder().decode(await decompress(compressed));
 * ```
 */
export async function decompress(compressed: Uint8Array): Promise<Uint8Array> {
  if (compressed.length === 0) {
    throw new CompressionError('Compressed data must not be empty', 'gzip', 'decompress');
  }
  if (CompressionDetector.fromMagicBytes(compressed) !== 'gzip') {
    throw new CompressionError(
      'Invalid gzip magic bytes - file may not be gzip compressed',
      'gzip',
      'decompress',
      0
    );
  }

  try {
    const result = await gunzipAsync(compressed);
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength);
  } catch (error) {
    throw CompressionError.fromSystemError('gzip', 'decompress', error, compressed.length);
  }
}

/**
 * Wrap a compressed byte stream in a decompressing one
 */
export function wrapStream(stream: ReadableStream<Uint8Array>): ReadableStream<Uint8Array> {
  return stream.pipeThrough(new DecompressionStream('gzip'));
}

export const GzipDecompressor = {
  decompress,
  wrapStream,
} as const;

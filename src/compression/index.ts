/**
 * Compression module for genomic file formats
 *
 * @example Auto-detection and decompression
 * ```typescript
 * import { CompressionDetector, createDecompressor } from 'seqwindow';
 *
 * const format = CompressionDetector.fromMagicBytes(bytes);
 * if (format !== 'none') {
 *   const decompressed = await createDecompressor(format).decompress(bytes);
 * }
 * ```
 */

export { CompressionDetector } from './detector';
export { GzipDecompressor } from './gzip';

import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';
import { GzipDecompressor } from './gzip';

/**
 * Decompressor for a detected format
 *
 * @throws {CompressionError} For formats without a decompressor
 */
export function createDecompressor(format: CompressionFormat): typeof GzipDecompressor {
  switch (format) {
    case 'gzip':
      return GzipDecompressor;
    case 'none':
      throw new CompressionError('No decompressor needed for uncompressed data', 'none', 'decompress');
  }
}

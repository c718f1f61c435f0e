/**
 * Compression format detection for genomic files
 *
 * Simulation tables and reference genomes are commonly distributed
 * gzip-compressed; detection works from file extensions or magic bytes.
 */

import { CompressionError } from '../errors';
import type { CompressionFormat } from '../types';

const GZIP_MAGIC = new Uint8Array([0x1f, 0x8b]);

/**
 * File extensions used for gzip-compressed genomic files
 */
const GZIP_EXTENSIONS = ['.gz', '.gzip', '.bgz'] as const;

/**
 * Cross-platform compression format detector
 *
 * @example Basic detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/simdata.txt.gz'); // 'gzip'
 * CompressionDetector.fromExtension('/data/peaks.bed');      // 'none'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from file extension
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError('File path must not be empty', 'none', 'detect');
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, '/');
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? 'gzip' : 'none';
  }

  /**
   * Detect compression format from the first bytes of a file
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length < GZIP_MAGIC.length) {
      return 'none';
    }
    return GZIP_MAGIC.every((byte, index) => bytes[index] === byte) ? 'gzip' : 'none';
  }
}

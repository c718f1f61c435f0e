/**
 * Effect platform layer for file I/O
 *
 * All file access goes through Effect's `FileSystem` service; this module
 * supplies the Node.js implementation.
 */

import { NodeContext } from "@effect/platform-node";

/** Default read buffer for streamed files (64KB) */
export const DEFAULT_BUFFER_SIZE = 65_536;

/**
 * Effect platform layer providing FileSystem, Path and friends
 */
export function getPlatform(): typeof NodeContext.layer {
  return NodeContext.layer;
}

/**
 * Stream processing utilities for line-oriented text formats
 *
 * Converts byte streams into complete lines regardless of where chunk
 * boundaries fall, handling `\n` and `\r\n` line endings.
 */

import { StreamError } from "../errors";

// Constants for stream processing
const MAX_LINE_LENGTH = 1_000_000_000; // single-line FASTA chromosomes can be very long

/**
 * Result of splitting a text buffer into complete lines
 */
export interface LineProcessingResult {
  readonly lines: string[];
  readonly remainder: string;
}

/**
 * Convert ReadableStream<Uint8Array> to async iterable of lines
 *
 * @yields Complete lines of text, without line terminators
 * @throws {StreamError} If stream processing fails
 *
 * @example Line-by-line processing
 * ```typescript
 * const stream = await createStream('/path/to/genome.fa.gz');
 * for await (const line of readLines(stream)) {
 *   if (line.startsWith('>')) {
 *     console.log('Found header:', line);
 *   }
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    // Final decode call flushes any partial multi-byte character
    buffer += decoder.decode();
    if (buffer.endsWith("\r")) buffer = buffer.slice(0, -1);
    if (buffer !== "") {
      yield buffer;
    }
  } catch (error) {
    if (error instanceof StreamError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines plus the trailing partial line
 *
 * @throws {StreamError} If the partial line grows past the maximum line length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const parts = buffer.split("\n");
  const remainder = parts.pop() ?? "";

  if (remainder.length > MAX_LINE_LENGTH) {
    throw new StreamError(
      `Incomplete line too long: ${remainder.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      undefined,
      "This might indicate a file without proper line endings"
    );
  }

  const lines = parts.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
  return { lines, remainder };
}

/**
 * Split an in-memory string into lines
 */
export function splitLines(data: string): string[] {
  const lines = data.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Read the first chunk of a stream and return it with a stream that replays
 * it before the rest
 *
 * The source stream is locked to the returned replay stream.
 */
export async function peekStream(
  stream: ReadableStream<Uint8Array>
): Promise<{ head: Uint8Array; stream: ReadableStream<Uint8Array> }> {
  const reader = stream.getReader();
  const first = await reader.read();
  const head = first.done ? new Uint8Array() : first.value;

  const replay = new ReadableStream<Uint8Array>({
    start(controller) {
      if (head.length > 0) controller.enqueue(head);
      if (first.done) controller.close();
    },
    async pull(controller) {
      const { done, value } = await reader.read();
      if (done) {
        controller.close();
      } else {
        controller.enqueue(value);
      }
    },
    cancel(reason) {
      return reader.cancel(reason);
    },
  });

  return { head, stream: replay };
}

// Namespace export
export const StreamUtils = {
  readLines,
  processBuffer,
  splitLines,
  peekStream,
} as const;

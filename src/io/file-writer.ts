/**
 * File writing operations using Effect Platform
 *
 * Promise-based API over Effect's `FileSystem` service.
 *
 * @module file-writer
 */

import { FileSystem } from "@effect/platform";
import { Effect } from "effect";
import { FileError } from "../errors";
import { getPlatform } from "./runtime";

/**
 * Write string to file (overwrites if exists, creates if not)
 *
 * @throws {FileError} If the file cannot be written
 *
 * @example
 * ```typescript
 * await writeString("padded.bed", new BedWriter().formatIntervals(paddedIntervals));
 * ```
 */
export async function writeString(path: string, content: string): Promise<void> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    yield* fs.writeFileString(path, content);
  });

  try {
    await Effect.runPromise(program.pipe(Effect.provide(getPlatform())));
  } catch (error) {
    throw FileError.fromSystemError("write", path, error);
  }
}

/**
 * Write a value as pretty-printed JSON
 */
export async function writeJson(path: string, value: unknown): Promise<void> {
  await writeString(path, `${JSON.stringify(value, null, 2)}\n`);
}

// Namespace export
export const FileWriter = {
  writeString,
  writeJson,
} as const;

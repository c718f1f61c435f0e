import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { gzipSync } from "node:zlib";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError } from "../../src/errors";
import { createStream, exists, getSize, readToString } from "../../src/io/file-reader";
import { readLines } from "../../src/io/stream-utils";

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe("FileReader", () => {
  let dir: string;
  const content = "chr1\t10\t20\nchr1\t30\t40\n";

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "seqwindow-reader-"));
    await writeFile(join(dir, "peaks.bed"), content);
    await writeFile(join(dir, "peaks.bed.gz"), gzipSync(content));
    await writeFile(join(dir, "peaks.bin"), gzipSync(content));
    await mkdir(join(dir, "nested"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("exists is true only for regular files", async () => {
    expect(await exists(join(dir, "peaks.bed"))).toBe(true);
    expect(await exists(join(dir, "nested"))).toBe(false);
    expect(await exists(join(dir, "missing.bed"))).toBe(false);
  });

  test("getSize returns the byte count", async () => {
    expect(await getSize(join(dir, "peaks.bed"))).toBe(content.length);
  });

  test("readToString reads plain files", async () => {
    expect(await readToString(join(dir, "peaks.bed"))).toBe(content);
  });

  test("readToString decompresses gzip by content, whatever the extension", async () => {
    expect(await readToString(join(dir, "peaks.bed.gz"))).toBe(content);
    expect(await readToString(join(dir, "peaks.bin"))).toBe(content);
  });

  test("createStream decompresses .gz files on the fly", async () => {
    const lines = await collect(readLines(await createStream(join(dir, "peaks.bed.gz"))));
    expect(lines).toEqual(["chr1\t10\t20", "chr1\t30\t40"]);
  });

  test("createStream decompresses gzip content without a .gz extension", async () => {
    const lines = await collect(readLines(await createStream(join(dir, "peaks.bin"))));
    expect(lines).toEqual(["chr1\t10\t20", "chr1\t30\t40"]);
  });

  test("createStream passes plain files through", async () => {
    const lines = await collect(readLines(await createStream(join(dir, "peaks.bed"))));
    expect(lines).toEqual(["chr1\t10\t20", "chr1\t30\t40"]);
  });

  test("createStream leaves compressed bytes alone when asked", async () => {
    const stream = await createStream(join(dir, "peaks.bed.gz"), { autoDecompress: false });
    const reader = stream.getReader();
    const { value } = await reader.read();
    reader.releaseLock();
    await stream.cancel();

    expect(value?.[0]).toBe(0x1f);
    expect(value?.[1]).toBe(0x8b);
  });

  test("rejects files above the size limit", async () => {
    await expect(readToString(join(dir, "peaks.bed"), { maxFileSize: 4 })).rejects.toThrow("File too large");
  });

  test("rejects missing files and empty paths with FileError", async () => {
    await expect(readToString(join(dir, "missing.bed"))).rejects.toThrow(FileError);
    await expect(readToString("")).rejects.toThrow("Invalid file path");
  });

  test("rejects invalid options", async () => {
    await expect(readToString(join(dir, "peaks.bed"), { bufferSize: 0 })).rejects.toThrow(
      "Invalid file reader options"
    );
  });
});

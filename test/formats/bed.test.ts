import { beforeEach, describe, expect, test } from "vitest";
import { BedError } from "../../src/errors";
import { BedParser, BedUtils, BedWriter, toLabelInterval } from "../../src/formats/bed";
import type { BedRecord } from "../../src/types";

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe("BedParser", () => {
  let parser: BedParser;

  beforeEach(() => {
    parser = new BedParser();
  });

  test("parses intervals and keeps extra columns", async () => {
    const [record] = await collect(parser.parseString("chr1\t100\t200\tpeak1\t5\n"));

    expect(record).toEqual({ chromosome: "chr1", start: 100, end: 200, fields: ["peak1", "5"], lineNumber: 1 });
  });

  test("skips comments, track and browser lines, and blank lines", async () => {
    const data = ["# comment", 'track name="peaks"', "browser position chr1:1-100", "", "chr1\t1\t5", ""].join("\n");
    const records = await collect(parser.parseString(data));

    expect(records).toHaveLength(1);
    expect(records[0]?.lineNumber).toBe(5);
  });

  test("detects a header row automatically", async () => {
    const records = await collect(parser.parseString("chrom\tstart\tend\nchr1\t1\t5\nchr2\t7\t9\n"));
    expect(records.map((record) => record.chromosome)).toEqual(["chr1", "chr2"]);
  });

  test("treats the header row as data when headers are disabled", async () => {
    const strict = new BedParser({ header: false });
    await expect(collect(strict.parseString("chrom\tstart\tend\n"))).rejects.toThrow(BedError);
  });

  test("splits on whitespace when a line has no tabs", async () => {
    const [record] = await collect(parser.parseString("chr2   10  20 name\n"));
    expect(record).toMatchObject({ chromosome: "chr2", start: 10, end: 20, fields: ["name"] });
  });

  test("rejects lines with fewer than three fields", async () => {
    await expect(collect(parser.parseString("chr1\t1\t5\nchr1\t5\n"))).rejects.toThrow(
      "BED line must have at least 3 fields (chrom, start, end), got 2"
    );
  });

  test("rejects inverted and zero-length intervals", async () => {
    await expect(collect(parser.parseString("chr1\t200\t100\n"))).rejects.toThrow(
      "Invalid coordinates: End coordinate must be greater than start"
    );
    await expect(collect(parser.parseString("chr1\t5\t5\n"))).rejects.toThrow(BedError);
  });

  test("accepts zero-length intervals when allowed", async () => {
    const lenient = new BedParser({ allowZeroLength: true });
    const [record] = await collect(lenient.parseString("chr1\t5\t5\n"));
    expect(record?.end).toBe(5);
  });

  test("stops when the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const aborted = new BedParser({ signal: controller.signal });
    const lines = Array.from({ length: 10_000 }, (_, i) => `chr1\t${i}\t${i + 1}`);

    await expect(collect(aborted.parseLines(lines))).rejects.toThrow("Operation aborted during BED interval parsing");
  });
});

describe("toLabelInterval", () => {
  const record: BedRecord = { chromosome: "chr1", start: 30, end: 60, fields: ["lbl", "42", "46"], lineNumber: 3 };

  test("reads the feature span from the given columns", () => {
    expect(toLabelInterval(record, { featureStartColumn: 4, featureEndColumn: 5 })).toEqual({
      chromosome: "chr1",
      start: 30,
      end: 60,
      featureStart: 42,
      featureEnd: 46,
      lineNumber: 3,
    });
  });

  test("defaults to the two columns after the interval", () => {
    const plain: BedRecord = { chromosome: "chr1", start: 0, end: 10, fields: ["2", "8"] };
    expect(toLabelInterval(plain)).toMatchObject({ featureStart: 2, featureEnd: 8 });
  });

  test("rejects an empty or reversed feature span with its line", () => {
    const empty: BedRecord = { chromosome: "chr1", start: 0, end: 10, fields: ["4", "4"], lineNumber: 9 };
    const reversed: BedRecord = { chromosome: "chr1", start: 0, end: 10, fields: ["6", "2"], lineNumber: 10 };

    expect(() => toLabelInterval(empty)).toThrow("Label feature span 4-4 is empty or reversed");
    expect(() => toLabelInterval(reversed)).toThrow(BedError);
    try {
      toLabelInterval(reversed);
    } catch (error) {
      expect(error).toBeInstanceOf(BedError);
      expect(error).toMatchObject({ lineNumber: 10, chromosome: "chr1" });
    }
  });

  test("rejects non-integer feature columns", () => {
    expect(() => toLabelInterval(record)).toThrow("Label column 3 is not an integer feature coordinate: 'lbl'");
  });
});

describe("BedWriter", () => {
  test("writes tab-separated lines with extra columns", () => {
    const writer = new BedWriter();
    expect(
      writer.formatIntervals([
        { chromosome: "chr1", start: 95, end: 115 },
        { chromosome: "chr2", start: 1, end: 2, fields: ["a", "b"] },
      ])
    ).toBe("chr1\t95\t115\nchr2\t1\t2\ta\tb\n");
  });
});

test("validateCoordinates reports negative coordinates", () => {
  expect(BedUtils.validateCoordinates(-1, 5)).toEqual({ valid: false, error: "Coordinates cannot be negative" });
  expect(BedUtils.validateCoordinates(1, 5)).toEqual({ valid: true });
});

import { describe, expect, test } from "vitest";
import { UnknownChromosomeError, UnsupportedCharacterError } from "../../src/errors";
import { decodeOneHot } from "../../src/operations/core/one-hot";
import { getChromosome, loadWindows, sliceInterval } from "../../src/operations/genome-windows";

const genome = new Map([
  ["chr1", "ACGTACGTAC"],
  ["chr2", "nnACGTRR"],
]);

describe("sliceInterval", () => {
  test("slices half-open ranges", () => {
    expect(sliceInterval("ACGTACGTAC", 2, 6)).toBe("GTAC");
  });

  test("truncates out-of-range bounds", () => {
    expect(sliceInterval("ACGTACGTAC", -3, 2)).toBe("AC");
    expect(sliceInterval("ACGTACGTAC", 8, 20)).toBe("AC");
    expect(sliceInterval("ACGTACGTAC", 12, 20)).toBe("");
    expect(sliceInterval("ACGTACGTAC", 5, 5)).toBe("");
  });
});

describe("getChromosome", () => {
  test("names the missing chromosome and the available ones", () => {
    try {
      getChromosome(genome, "chrX");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownChromosomeError);
      if (error instanceof UnknownChromosomeError) {
        expect(error.message).toBe("Chromosome 'chrX' not found in genome");
        expect(error.context).toBe("Available: chr1, chr2");
      }
    }
  });
});

describe("loadWindows", () => {
  test("returns one encoded window per interval, in input order", () => {
    const intervals = [
      { chromosome: "chr1", start: 4, end: 8 },
      { chromosome: "chr2", start: 0, end: 4 },
    ];
    const windows = loadWindows(intervals, genome);

    expect(windows.map((window) => window.index)).toEqual([0, 1]);
    expect(windows.map((window) => decodeOneHot(window.encoded))).toEqual(["ACGT", "NNAC"]);
    expect(windows[1]?.interval).toBe(intervals[1]);
    expect(windows[0]?.sequence).toBeUndefined();
  });

  test("keeps the raw sequence when asked", () => {
    const [window] = loadWindows([{ chromosome: "chr2", start: 0, end: 3 }], genome, { includeSequence: true });
    expect(window?.sequence).toBe("nnA");
  });

  test("fails on a missing chromosome", () => {
    expect(() => loadWindows([{ chromosome: "chr9", start: 0, end: 2 }], genome)).toThrow(UnknownChromosomeError);
  });

  test("fails on unsupported bases inside the window", () => {
    expect(() => loadWindows([{ chromosome: "chr2", start: 4, end: 8 }], genome)).toThrow(
      UnsupportedCharacterError
    );
  });

  test("returns frozen windows", () => {
    const [window] = loadWindows([{ chromosome: "chr1", start: 0, end: 2 }], genome);
    expect(Object.isFrozen(window)).toBe(true);
    expect(Object.isFrozen(window?.encoded ?? {})).toBe(true);
  });
});

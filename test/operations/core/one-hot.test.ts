import { describe, expect, test } from "vitest";
import { ShapeMismatchError, UnsupportedCharacterError } from "../../../src/errors";
import {
  decodeOneHot,
  encodeOneHot,
  nucleotideColumn,
  oneHotRows,
  stackWindows,
} from "../../../src/operations/core/one-hot";
import type { SequenceWindow } from "../../../src/types";

function windowOf(index: number, sequence: string): SequenceWindow {
  return {
    index,
    interval: { chromosome: "chr1", start: 0, end: sequence.length },
    encoded: encodeOneHot(sequence),
  };
}

describe("encodeOneHot", () => {
  test("encodes ACGTN with an all-zero row for N", () => {
    expect(oneHotRows(encodeOneHot("ACGTN"))).toEqual([
      [1, 0, 0, 0],
      [0, 1, 0, 0],
      [0, 0, 1, 0],
      [0, 0, 0, 1],
      [0, 0, 0, 0],
    ]);
  });

  test("encodes lowercase bases like uppercase ones", () => {
    expect(Array.from(encodeOneHot("acgtn").data)).toEqual(Array.from(encodeOneHot("ACGTN").data));
  });

  test("rejects unsupported characters with their position", () => {
    expect(() => encodeOneHot("Z")).toThrow(UnsupportedCharacterError);

    try {
      encodeOneHot("ACRT");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(UnsupportedCharacterError);
      if (error instanceof UnsupportedCharacterError) {
        expect(error.character).toBe("R");
        expect(error.position).toBe(2);
        expect(error.message).toBe("Unsupported character: 'R' at position 2");
      }
    }
  });

  test("every row sums to 1, or 0 for N", () => {
    const sequence = "GATTACANNcg";
    const rows = oneHotRows(encodeOneHot(sequence));

    expect(rows).toHaveLength(sequence.length);
    rows.forEach((row, i) => {
      const sum = row.reduce((total, value) => total + value, 0);
      expect(sum).toBe(sequence[i]?.toUpperCase() === "N" ? 0 : 1);
    });
  });

  test("returns a frozen matrix", () => {
    const matrix = encodeOneHot("AC");
    expect(Object.isFrozen(matrix)).toBe(true);
    expect(Reflect.set(matrix, "length", 5)).toBe(false);
    expect(matrix.length).toBe(2);
  });

  test("encodes an empty sequence as a zero-length matrix", () => {
    const matrix = encodeOneHot("");
    expect(matrix.length).toBe(0);
    expect(matrix.data).toHaveLength(0);
  });
});

describe("nucleotideColumn", () => {
  test("maps bases to columns and N to -1", () => {
    expect(["A", "c", "G", "t", "N"].map((base) => nucleotideColumn(base))).toEqual([0, 1, 2, 3, -1]);
  });

  test("rejects multi-character input", () => {
    expect(() => nucleotideColumn("AC", 7)).toThrow("Unsupported character: 'AC' at position 7");
  });
});

describe("decodeOneHot", () => {
  test("restores uppercase bases and N", () => {
    expect(decodeOneHot(encodeOneHot("acgTNa"))).toBe("ACGTNA");
  });
});

describe("stackWindows", () => {
  test("stacks equal-length windows into a count × length × 4 tensor", () => {
    const { data, shape } = stackWindows([windowOf(0, "AC"), windowOf(1, "GT")]);

    expect(shape).toEqual([2, 2, 4]);
    expect(Array.from(data)).toEqual([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]);
  });

  test("returns an empty tensor for no windows", () => {
    const { data, shape } = stackWindows([]);
    expect(shape).toEqual([0, 0, 4]);
    expect(data).toHaveLength(0);
  });

  test("rejects windows of different lengths", () => {
    expect(() => stackWindows([windowOf(0, "ACGT"), windowOf(1, "AC")])).toThrow(ShapeMismatchError);
  });
});

import { describe, expect, test, vi } from "vitest";
import { PlacementParseError, ShapeMismatchError } from "../../src/errors";
import { encodeOneHot } from "../../src/operations/core/one-hot";
import { decodeSimdataLocations, placementRecords } from "../../src/operations/simdata";
import { parsePlacements } from "../../src/operations/core/placements";
import type { SequenceWindow } from "../../src/types";

const silent = { onWarning: (): void => {} };

describe("decodeSimdataLocations", () => {
  test("makes every placement the mutation and the others its responses", () => {
    const locations = decodeSimdataLocations(1, [{ embeddings: "pos-10_TAL1-AAAA,pos-30_GATA1-CCCC" }]);

    expect([...locations.keys()]).toEqual(["seq_0_emb_pos-10_TAL1-AAAA", "seq_0_emb_pos-30_GATA1-CCCC"]);
    expect(locations.get("seq_0_emb_pos-10_TAL1-AAAA")).toEqual({
      seq: 0,
      mutStart: 10,
      mutEnd: 14,
      mutName: "TAL1",
      respStart: [30],
      respEnd: [34],
      respNames: ["GATA1"],
    });
    expect(locations.get("seq_0_emb_pos-30_GATA1-CCCC")).toEqual({
      seq: 0,
      mutStart: 30,
      mutEnd: 34,
      mutName: "GATA1",
      respStart: [10],
      respEnd: [14],
      respNames: ["TAL1"],
    });
  });

  test("lists the other k-1 placements in row order", () => {
    const locations = decodeSimdataLocations(1, [
      { embeddings: "pos-50_CTCF-ACGTAC,pos-5_SOX2-GG,pos-20_TAL1-AAAA" },
    ]);
    const middle = locations.get("seq_0_emb_pos-5_SOX2-GG");

    expect(locations.size).toBe(3);
    expect(middle?.respNames).toEqual(["CTCF", "TAL1"]);
    expect(middle?.respStart).toEqual([50, 20]);
    expect(middle?.respEnd).toEqual([56, 24]);
  });

  test("gives a single placement empty responses", () => {
    const record = decodeSimdataLocations(1, [{ embeddings: "pos-7_NANOG-TTT" }]).get("seq_0_emb_pos-7_NANOG-TTT");
    expect(record?.respStart).toEqual([]);
    expect(record?.respEnd).toEqual([]);
    expect(record?.respNames).toEqual([]);
  });

  test("skips rows without embeddings and reports them", () => {
    const onWarning = vi.fn();
    const locations = decodeSimdataLocations(
      3,
      [{ embeddings: null }, { embeddings: "pos-1_A-C" }, { other: "x" }],
      { onWarning }
    );

    expect([...locations.keys()]).toEqual(["seq_1_emb_pos-1_A-C"]);
    expect(onWarning).toHaveBeenCalledTimes(2);
    expect(onWarning).toHaveBeenNthCalledWith(1, "No embeddings for seq 0");
    expect(onWarning).toHaveBeenNthCalledWith(2, "No embeddings for seq 2");
  });

  test("collapses duplicate tokens in a row into one key", () => {
    const locations = decodeSimdataLocations(1, [{ embeddings: "pos-1_X-AA,pos-1_X-AA,pos-5_Y-C" }], silent);

    expect(locations.size).toBe(2);
    expect(locations.get("seq_0_emb_pos-1_X-AA")?.respNames).toEqual(["Y"]);
    expect(locations.get("seq_0_emb_pos-5_Y-C")?.respNames).toEqual(["X", "X"]);
  });

  test("reads placements from a custom column", () => {
    const locations = decodeSimdataLocations(1, [{ emb: "pos-2_M-GA" }], { column: "emb" });
    expect(locations.get("seq_0_emb_pos-2_M-GA")?.mutEnd).toBe(4);
  });

  test("accepts windows instead of a count", () => {
    const windows: SequenceWindow[] = [
      { index: 0, interval: { chromosome: "sim", start: 0, end: 4 }, encoded: encodeOneHot("ACGT") },
    ];
    expect(decodeSimdataLocations(windows, [{ embeddings: "pos-0_M-AC" }]).size).toBe(1);
  });

  test("returns identical results for identical input", () => {
    const rows = [{ embeddings: "pos-50_CTCF-ACGTAC,pos-5_SOX2-GG" }, { embeddings: "pos-12_TAL1-AAAA" }];
    const first = decodeSimdataLocations(2, rows);
    const second = decodeSimdataLocations(2, rows);

    expect([...second]).toEqual([...first]);
  });

  test("rejects a row count that differs from the sequence count", () => {
    expect(() => decodeSimdataLocations(2, [{ embeddings: "pos-1_A-C" }])).toThrow(ShapeMismatchError);
    expect(() => decodeSimdataLocations(2, [{ embeddings: "pos-1_A-C" }])).toThrow(
      "Simulation table rows do not match sequence count: expected 2, got 1"
    );
  });

  test("fails on a malformed token with its row", () => {
    expect(() => decodeSimdataLocations(2, [{ embeddings: "pos-1_X-AA" }, { embeddings: "bad" }])).toThrow(
      PlacementParseError
    );
    expect(() => decodeSimdataLocations(2, [{ embeddings: "pos-1_X-AA" }, { embeddings: "bad" }])).toThrow(
      "Placement must start with 'pos-': 'bad' (row 1)"
    );
  });
});

test("placementRecords keys records by sequence and token", () => {
  const records = placementRecords(4, parsePlacements("pos-1_A-C,pos-3_B-GG"));
  expect(records.map(([key]) => key)).toEqual(["seq_4_emb_pos-1_A-C", "seq_4_emb_pos-3_B-GG"]);
  expect(records[1]?.[1].respEnd).toEqual([2]);
});

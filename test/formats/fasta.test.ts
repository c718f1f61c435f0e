import { describe, expect, test, vi } from "vitest";
import { FastaError } from "../../src/errors";
import { FastaParser, parseFastaHeader, parseGenome } from "../../src/formats/fasta";

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe("parseFastaHeader", () => {
  test("splits identifier and description at the first whitespace", () => {
    expect(parseFastaHeader(">chr1  assembled  chromosome")).toEqual({ id: "chr1", description: "assembled  chromosome" });
    expect(parseFastaHeader(">chrM")).toEqual({ id: "chrM" });
  });
});

describe("FastaParser", () => {
  test("joins multi-line sequences and keeps case", async () => {
    const records = await collect(new FastaParser().parseString(">chr1 test contig\nACGT\nNNac\n>chr2\nGG\n"));

    expect(records).toEqual([
      { id: "chr1", description: "test contig", sequence: "ACGTNNac", length: 8, lineNumber: 1 },
      { id: "chr2", sequence: "GG", length: 2, lineNumber: 4 },
    ]);
  });

  test("skips blank and semicolon comment lines and strips inner whitespace", async () => {
    const [record] = await collect(new FastaParser().parseString(";old comment\n>s\r\nAC GT\r\n\r\nTT\r\n"));
    expect(record?.sequence).toBe("ACGTTT");
  });

  test("drops descriptions when asked", async () => {
    const [record] = await collect(new FastaParser({ keepDescription: false }).parseString(">s desc\nA\n"));
    expect(record?.description).toBeUndefined();
  });

  test("warns about empty sequences", async () => {
    const onWarning = vi.fn();
    const records = await collect(new FastaParser({ onWarning }).parseString(">e\n>f\nA\n"));

    expect(records.map((record) => record.length)).toEqual([0, 1]);
    expect(onWarning).toHaveBeenCalledWith("Sequence 'e' is empty", 1);
  });

  test("rejects sequence data before the first header", async () => {
    await expect(collect(new FastaParser().parseString("ACGT\n>s\nA\n"))).rejects.toThrow(
      "Sequence data found before header"
    );
  });

  test("rejects a header without an identifier", async () => {
    await expect(collect(new FastaParser().parseString(">\nACGT\n"))).rejects.toThrow(FastaError);
  });
});

describe("parseGenome", () => {
  test("maps identifiers to sequences", async () => {
    const genome = await parseGenome(">chr1 desc\nACGT\n>chr2\nTTTT\nGG\n");
    expect([...genome.entries()]).toEqual([
      ["chr1", "ACGT"],
      ["chr2", "TTTTGG"],
    ]);
  });

  test("rejects duplicate identifiers", async () => {
    await expect(parseGenome(">chr1\nA\n>chr1\nC\n")).rejects.toThrow("Duplicate sequence identifier 'chr1'");
  });
});

import { describe, expect, it } from "vitest";
import { InvalidConfigurationError } from "../src/errors";
import { segment } from "../src/segmenter";

/** Rebuild the source by appending the non-overlapping tail of each chunk. */
function rebuild(chunks: ReturnType<typeof segment>): string {
  let out = "";
  for (const c of chunks) out += c.text.slice(out.length - c.start);
  return out;
}

describe("segment", () => {
  it("splits into overlapping windows with offsets", () => {
    const chunks = segment("ABCDEFGHIJ", 4, 1, "doc-1");
    expect(chunks.map((c) => c.text)).toEqual(["ABCD", "DEFG", "GHIJ"]);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 4],
      [3, 7],
      [6, 10],
    ]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2]);
    expect(chunks.every((c) => c.documentId === "doc-1")).toBe(true);
  });

  it("returns no chunks for empty text", () => {
    expect(segment("", 4, 1)).toEqual([]);
  });

  it("returns the whole text as one chunk when it fits", () => {
    expect(segment("abc", 10, 2)).toEqual([{ index: 0, documentId: "", text: "abc", start: 0, end: 3 }]);
    expect(segment("abcd", 4, 1).map((c) => c.text)).toEqual(["abcd"]);
  });

  it("emits a shorter final window", () => {
    expect(segment("abcdefg", 3, 0).map((c) => c.text)).toEqual(["abc", "def", "g"]);
    expect(segment("abc", 1, 0).map((c) => c.text)).toEqual(["a", "b", "c"]);
  });

  it("reconstructs the source once overlaps are removed", () => {
    const source = "The quick brown fox jumps over the lazy dog, twice.";
    const params: Array<[number, number]> = [
      [1, 0],
      [3, 2],
      [5, 1],
      [8, 7],
      [16, 4],
      [60, 10],
    ];
    for (const [size, overlap] of params) {
      for (const len of [0, 1, 7, 23, source.length]) {
        const text = source.slice(0, len);
        const chunks = segment(text, size, overlap);
        expect(rebuild(chunks)).toBe(text);
        chunks.forEach((c, i) => {
          expect(c.index).toBe(i);
          expect(c.text).toBe(text.slice(c.start, c.end));
          expect(c.text.length).toBeLessThanOrEqual(size);
          if (i > 0) expect(chunks[i - 1].end - c.start).toBe(overlap);
        });
      }
    }
  });

  it("freezes chunks", () => {
    const [chunk] = segment("hello", 10, 0);
    expect(Object.isFrozen(chunk)).toBe(true);
  });

  it.each([
    [0, 0],
    [-3, 0],
    [4.5, 1],
    [4, 4],
    [4, 5],
    [4, -1],
    [4, 1.5],
  ])("rejects chunkSize=%s overlap=%s", (size, overlap) => {
    expect(() => segment("abcdef", size, overlap)).toThrow(InvalidConfigurationError);
  });

  it("rejects bad parameters even for empty text", () => {
    expect(() => segment("", 2, 2)).toThrow(InvalidConfigurationError);
  });
});

import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { chunkText, joinChunks, splitText } from "./chunker.js";

describe("splitText", () => {
  it("splits text into overlapping chunks", () => {
    const chunks = splitText("abcdefghij", 4, 1);

    assert.deepEqual(chunks, ["abcd", "defg", "ghij"]);
  });

  it("returns one trimmed chunk when the text fits", () => {
    const chunks = splitText("  The capital of France is Paris.  \n", 100, 10);
    assert.deepEqual(chunks, ["The capital of France is Paris."]);
  });

  it("returns one chunk when the text is exactly chunkSize long", () => {
    assert.deepEqual(splitText("abcd", 4, 2), ["abcd"]);
  });

  it("returns no chunks for blank text", () => {
    assert.deepEqual(splitText(" \n\t ", 10, 2), []);
  });

  it("reconstructs the text when overlaps are removed", () => {
    const samples = [
      "a",
      "abcdefghij",
      "Paris is the capital of France. Berlin is the capital of Germany.",
      "x".repeat(97) + "yz",
      "line one\nline two\n\nline four with more words in it"
    ];
    const settings: Array<[number, number]> = [
      [1, 0],
      [5, 0],
      [5, 4],
      [7, 3],
      [16, 5],
      [200, 50]
    ];

    for (const text of samples) {
      for (const [chunkSize, overlap] of settings) {
        const chunks = splitText(text, chunkSize, overlap);
        assert.ok(chunks.length > 0);
        assert.ok(chunks.every((chunk) => chunk.length <= chunkSize));
        assert.equal(joinChunks(chunks, overlap), text, `${chunkSize}/${overlap}: ${text}`);
      }
    }
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    assert.throws(() => splitText("abc", 4, 4), RangeError);
    assert.throws(() => splitText("abc", 0, 0), RangeError);
    assert.throws(() => splitText("abc", 4, -1), RangeError);
  });
});

describe("chunkText", () => {
  it("records the offset of each chunk in the trimmed text", () => {
    const parts = chunkText("  abcdefghij", { chunkSize: 4, overlap: 1 });

    assert.deepEqual(
      parts.map((part) => part.offset),
      [0, 3, 6]
    );
    assert.equal(parts[1]?.content, "defg");
  });
});

import { describe, expect, it } from "vitest";

import { Chunker, chunkId } from "../chunker";

describe("Chunker", () => {
  it("returns a single chunk for text no longer than the chunk size", () => {
    const chunker = new Chunker({ chunkSize: 1000, chunkOverlap: 200 });

    const chunks = chunker.split("Hello world.", "doc", { source: "notes" });

    expect(chunks).toEqual([
      {
        id: "doc_chunk_0",
        text: "Hello world.",
        metadata: {
          source: "notes",
          parent_document_id: "doc",
          chunk_number: 0,
          chunk_start_offset: 0,
          chunk_end_offset: 12,
        },
      },
    ]);
  });

  it("returns no chunks for empty text", () => {
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 20 });

    expect(chunker.split("", "doc")).toEqual([]);
  });

  it("overlaps consecutive windows by the configured amount", () => {
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 20 });
    const text = "abcdefghij".repeat(25);

    const chunks = chunker.split(text, "doc");

    expect(
      chunks.map((c) => [c.metadata.chunk_start_offset, c.metadata.chunk_end_offset])
    ).toEqual([
      [0, 100],
      [80, 180],
      [160, 250],
    ]);
    expect(chunks.map((c) => c.id)).toEqual([
      "doc_chunk_0",
      "doc_chunk_1",
      "doc_chunk_2",
    ]);
    expect(chunks[1]?.text).toBe(text.slice(80, 180));
  });

  it("covers the whole text without gaps", () => {
    const chunker = new Chunker({ chunkSize: 50, chunkOverlap: 10 });
    const text = "Sentences end here. ".repeat(30).trim();

    const chunks = chunker.split(text, "doc");

    expect(chunks[0]?.metadata.chunk_start_offset).toBe(0);
    expect(chunks.at(-1)?.metadata.chunk_end_offset).toBe(text.length);
    for (let i = 1; i < chunks.length; i += 1) {
      const previous = chunks[i - 1];
      const current = chunks[i];
      expect(current?.metadata.chunk_start_offset).toBeLessThanOrEqual(
        previous?.metadata.chunk_end_offset ?? -1
      );
      expect(current?.metadata.chunk_start_offset).toBeGreaterThan(
        previous?.metadata.chunk_start_offset ?? Infinity
      );
    }
  });

  it("ends a window after a period in the last 30% of the window", () => {
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 0 });
    const text = "x".repeat(79) + "." + "y".repeat(50);

    const chunks = chunker.split(text, "doc");

    expect(chunks.map((c) => c.text)).toEqual(["x".repeat(79) + ".", "y".repeat(50)]);
    expect(chunks[0]?.metadata.chunk_end_offset).toBe(80);
    expect(chunks[1]?.metadata.chunk_start_offset).toBe(80);
  });

  it("treats a period exactly at 70% of the window as a boundary", () => {
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 0 });
    const text = "x".repeat(70) + "." + "y".repeat(59);

    const chunks = chunker.split(text, "doc");

    expect(chunks[0]?.metadata.chunk_end_offset).toBe(71);
  });

  it("ignores a period early in the window", () => {
    const chunker = new Chunker({ chunkSize: 100, chunkOverlap: 0 });
    const text = "x".repeat(50) + "." + "y".repeat(79);

    const chunks = chunker.split(text, "doc");

    expect(chunks[0]?.metadata.chunk_end_offset).toBe(100);
    expect(chunks[1]?.text).toBe("y".repeat(30));
  });

  it("skips whitespace-only windows without using up a chunk number", () => {
    const chunker = new Chunker({ chunkSize: 10, chunkOverlap: 0 });
    const text = "abc" + " ".repeat(20) + "def";

    const chunks = chunker.split(text, "doc");

    expect(chunks.map((c) => [c.id, c.text, c.metadata.chunk_start_offset])).toEqual([
      ["doc_chunk_0", "abc", 0],
      ["doc_chunk_1", "def", 20],
    ]);
  });

  it("still advances when the overlap is not smaller than the chunk size", () => {
    const chunker = new Chunker({ chunkSize: 10, chunkOverlap: 10 });
    const text = "abcdefghijklmnopqrstuvwxy";

    const chunks = chunker.split(text, "doc");

    expect(chunks.map((c) => c.text)).toEqual([
      "abcdefghij",
      "klmnopqrst",
      "uvwxy",
    ]);
  });

  it("builds chunk ids from the document id and chunk number", () => {
    expect(chunkId("about-me", 3)).toBe("about-me_chunk_3");
  });
});

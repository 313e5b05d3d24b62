import type { VectorRecord } from "@domain/rag/ports";
import { describe, expect, it } from "vitest";

import { FakePineconeClient, FakePineconeIndex } from "../../../_tests/fakes";
import { PineconeIndexProvider, toMetadata } from "../PineconeIndexProvider";

const SERVERLESS = { cloud: "aws" as const, region: "us-east-1" };

describe("toMetadata", () => {
  it("keeps scalar values and joins string lists", () => {
    expect(
      toMetadata({
        text: "Alpha builds search tools.",
        chunk_number: 2,
        published: true,
        tags: ["search", "tooling"],
      })
    ).toEqual({
      text: "Alpha builds search tools.",
      chunk_number: 2,
      published: true,
      tags: "search, tooling",
    });
  });

  it("returns empty metadata for a record without any", () => {
    expect(toMetadata(undefined)).toEqual({});
  });
});

describe("PineconeIndexProvider", () => {
  it("reuses an existing index", async () => {
    const client = new FakePineconeClient(["portfolio-rag"]);

    await new PineconeIndexProvider(client, SERVERLESS).createIfAbsent(
      "portfolio-rag",
      1536,
      "cosine"
    );

    expect(client.created).toEqual([]);
  });

  it("creates a missing serverless index and waits for it", async () => {
    const client = new FakePineconeClient(["other-index"]);

    await new PineconeIndexProvider(client, SERVERLESS).createIfAbsent(
      "portfolio-rag",
      1536,
      "cosine"
    );

    expect(client.created).toEqual([
      {
        name: "portfolio-rag",
        dimension: 1536,
        metric: "cosine",
        spec: { serverless: { cloud: "aws", region: "us-east-1" } },
        waitUntilReady: true,
        suppressConflicts: true,
      },
    ]);
  });

  it("checks for cancellation before touching the control plane", async () => {
    const client = new FakePineconeClient();
    const controller = new AbortController();
    controller.abort(new Error("cancelled"));

    await expect(
      new PineconeIndexProvider(client, SERVERLESS).createIfAbsent(
        "portfolio-rag",
        4,
        "cosine",
        controller.signal
      )
    ).rejects.toThrow("cancelled");
    expect(client.created).toEqual([]);
  });

  it("connects to the named index", async () => {
    const client = new FakePineconeClient();

    const handle = await new PineconeIndexProvider(client, SERVERLESS).connect("portfolio-rag");

    expect(handle).toBe(client.handle);
    expect(client.connected).toEqual(["portfolio-rag"]);
  });

  it("upserts in batches of 100", async () => {
    const handle = new FakePineconeIndex();
    const records: VectorRecord[] = Array.from({ length: 250 }, (_, i) => ({
      id: `doc_chunk_${i}`,
      values: [i, 0],
      metadata: { chunk_number: i },
    }));

    await new PineconeIndexProvider(new FakePineconeClient(), SERVERLESS).upsert(
      handle,
      records
    );

    expect(handle.upserts.map((batch) => batch.length)).toEqual([100, 100, 50]);
    expect(handle.upserts[2]?.[0]).toEqual({
      id: "doc_chunk_200",
      values: [200, 0],
      metadata: { chunk_number: 200 },
    });
  });

  it("maps query matches and defaults a missing score to 0", async () => {
    const handle = new FakePineconeIndex({
      matches: [
        { id: "a_chunk_0", score: 0.91, metadata: { text: "A", tags: ["x", "y"] } },
        { id: "b_chunk_0" },
      ],
    });

    const matches = await new PineconeIndexProvider(
      new FakePineconeClient(),
      SERVERLESS
    ).query(handle, { vector: [1, 0], topK: 3, includeMetadata: true });

    expect(matches).toEqual([
      { id: "a_chunk_0", score: 0.91, metadata: { text: "A", tags: "x, y" } },
      { id: "b_chunk_0", score: 0, metadata: {} },
    ]);
    expect(handle.queries).toEqual([
      { vector: [1, 0], topK: 3, includeMetadata: true, includeValues: false },
    ]);
  });

  it("returns no matches when the response has none", async () => {
    const handle = new FakePineconeIndex({});

    expect(
      await new PineconeIndexProvider(new FakePineconeClient(), SERVERLESS).query(handle, {
        vector: [1, 0],
        topK: 3,
        includeMetadata: true,
      })
    ).toEqual([]);
  });

  it("deletes by id and clears the index", async () => {
    const handle = new FakePineconeIndex();
    const provider = new PineconeIndexProvider(new FakePineconeClient(), SERVERLESS);

    await provider.delete(handle, ["a_chunk_0"]);
    await provider.deleteAll(handle);

    expect(handle.deleted).toEqual([["a_chunk_0"]]);
    expect(handle.deleteAllCalls).toBe(1);
  });

  it("maps index statistics", async () => {
    const handle = new FakePineconeIndex(
      { matches: [] },
      {
        totalRecordCount: 42,
        dimension: 1536,
        indexFullness: 0.25,
        namespaces: { "": { recordCount: 40 }, archive: {} },
      }
    );

    expect(
      await new PineconeIndexProvider(new FakePineconeClient(), SERVERLESS).describeStats(handle)
    ).toEqual({
      totalVectors: 42,
      dimension: 1536,
      fullness: 0.25,
      namespaces: { "": { vectorCount: 40 }, archive: { vectorCount: 0 } },
    });
  });

  it("treats missing statistics as zero", async () => {
    expect(
      await new PineconeIndexProvider(new FakePineconeClient(), SERVERLESS).describeStats(
        new FakePineconeIndex()
      )
    ).toEqual({ totalVectors: 0, dimension: 0, fullness: 0, namespaces: {} });
  });
});

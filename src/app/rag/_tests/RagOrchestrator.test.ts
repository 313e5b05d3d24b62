import { Chunker } from "@domain/rag/chunker";
import { Retriever } from "@domain/rag/retriever";
import { VectorStoreAdapter } from "@domain/rag/vectorStore";
import { InMemoryIndexProvider } from "@infrastructure/vector/InMemoryIndexProvider";
import { ValidationError } from "@typesLocal/AppError";
import { describe, expect, it, vi } from "vitest";

import {
  FakeEmbeddingProvider,
  FakeGenerationProvider,
} from "../../../_tests/fakes";
import { DEGRADED_RESPONSE_TEXT, RagOrchestrator } from "../RagOrchestrator";

const RAG = {
  topK: 5,
  minScore: 0.7,
  chunkSize: 1000,
  chunkOverlap: 200,
  embedConcurrency: 2,
};

const DOCUMENTS = [
  { id: "alpha", text: "Alpha builds search tools.", metadata: { title: "Alpha" } },
  { id: "beta", text: "Beta writes documentation." },
];

function setup() {
  const embeddings = new FakeEmbeddingProvider(4, {
    "Alpha builds search tools.": [1, 0, 0, 0],
    "Beta writes documentation.": [0, 1, 0, 0],
    "Who builds search tools?": [1, 0, 0, 0],
    "What is the weather?": [0, 0, 1, 0],
  });
  const index = new InMemoryIndexProvider();
  const generator = new FakeGenerationProvider("Alpha is a search tooling project.");

  const store = new VectorStoreAdapter(embeddings, index, {
    indexName: "portfolio",
    dimension: 4,
    embeddingModel: "embed-test",
    embedConcurrency: RAG.embedConcurrency,
  });

  const orchestrator = new RagOrchestrator({
    chunker: new Chunker({ chunkSize: RAG.chunkSize, chunkOverlap: RAG.chunkOverlap }),
    retriever: new Retriever(store, { topK: RAG.topK, minScore: RAG.minScore }),
    store,
    generator,
    settings: {
      chatModel: "chat-test",
      embeddingModel: "embed-test",
      maxTokens: 500,
      temperature: 0.7,
      rag: RAG,
    },
  });

  return { embeddings, index, generator, orchestrator };
}

describe("RagOrchestrator", () => {
  describe("initialize", () => {
    it("reports whether the index is ready", async () => {
      const { orchestrator } = setup();

      expect(await orchestrator.initialize()).toBe(true);
    });

    it("returns false when the index cannot be created", async () => {
      const { index, orchestrator } = setup();
      vi.spyOn(index, "createIfAbsent").mockRejectedValue(new Error("forbidden"));

      expect(await orchestrator.initialize()).toBe(false);
    });
  });

  describe("addDocuments", () => {
    it("chunks and stores every document", async () => {
      const { orchestrator } = setup();

      expect(await orchestrator.addDocuments(DOCUMENTS)).toBe(true);

      const stats = await orchestrator.getStats();
      expect(stats).toMatchObject({ totalDocuments: 2 });
    });

    it("rejects a document without an id", async () => {
      const { orchestrator } = setup();

      await expect(
        orchestrator.addDocuments([{ id: " ", text: "Some text." }])
      ).rejects.toThrow("Document at index 0 has an empty id");
    });

    it("rejects a document without text", async () => {
      const { orchestrator } = setup();

      await expect(
        orchestrator.addDocuments([{ id: "empty", text: "  " }])
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it("rejects duplicate ids in one batch", async () => {
      const { orchestrator } = setup();

      await expect(
        orchestrator.addDocuments([
          { id: "same", text: "One." },
          { id: "same", text: "Two." },
        ])
      ).rejects.toThrow('Duplicate document id "same" in batch');
    });

    it("returns false when storage fails", async () => {
      const { index, orchestrator } = setup();
      vi.spyOn(index, "upsert").mockRejectedValue(new Error("write rejected"));

      expect(await orchestrator.addDocuments(DOCUMENTS)).toBe(false);
    });
  });

  describe("chatWithContext", () => {
    it("grounds the answer in retrieved fragments", async () => {
      const { generator, orchestrator } = setup();
      await orchestrator.addDocuments(DOCUMENTS);
      const history = [
        { role: "user" as const, content: "Hi" },
        { role: "assistant" as const, content: "Hello!" },
      ];

      const result = await orchestrator.chatWithContext(
        "Who builds search tools?",
        history
      );

      const context = "Context 1 (relevance: 1.00):\nAlpha builds search tools.";
      expect(result).toEqual({
        responseText: "Alpha is a search tooling project.",
        modelUsed: "chat-test",
        sourcesUsed: 1,
        sources: [
          {
            id: "alpha_chunk_0",
            score: 1,
            metadata: {
              title: "Alpha",
              parent_document_id: "alpha",
              chunk_number: 0,
              chunk_start_offset: 0,
              chunk_end_offset: 26,
            },
          },
        ],
        contextLength: context.length,
      });

      const request = generator.requests[0];
      expect(request?.model).toBe("chat-test");
      expect(request?.maxTokens).toBe(500);
      expect(request?.temperature).toBe(0.7);
      expect(request?.messages).toHaveLength(4);
      expect(request?.messages[0]?.content).toContain(`Context:\n${context}\n\nInstructions:`);
      expect(request?.messages.slice(1, 3)).toEqual(history);
      expect(request?.messages[3]).toEqual({
        role: "user",
        content: "Who builds search tools?",
      });
    });

    it("answers without sources when nothing is relevant", async () => {
      const { generator, orchestrator } = setup();
      await orchestrator.addDocuments(DOCUMENTS);

      const result = await orchestrator.chatWithContext("What is the weather?");

      expect(result.sourcesUsed).toBe(0);
      expect(result.sources).toEqual([]);
      expect(result.contextLength).toBe("No relevant context found.".length);
      expect(generator.requests[0]?.messages[0]?.content).toContain(
        "Context:\nNo relevant context found.\n"
      );
    });

    it("degrades when retrieval fails", async () => {
      const { embeddings, generator, orchestrator } = setup();
      embeddings.failure = new Error("invalid api key");

      const result = await orchestrator.chatWithContext("Who builds search tools?");

      expect(result).toEqual({
        responseText: DEGRADED_RESPONSE_TEXT,
        modelUsed: "chat-test",
        sourcesUsed: 0,
        sources: [],
        contextLength: 0,
        error: "RAG chat failed: Failed to create embedding: invalid api key",
      });
      expect(generator.requests).toEqual([]);
    });

    it("degrades when generation fails", async () => {
      const { generator, orchestrator } = setup();
      await orchestrator.addDocuments(DOCUMENTS);
      generator.failure = new Error("model overloaded");

      const result = await orchestrator.chatWithContext("Who builds search tools?");

      expect(result.responseText).toBe(DEGRADED_RESPONSE_TEXT);
      expect(result.sourcesUsed).toBe(0);
      expect(result.sources).toEqual([]);
      expect(result.error).toBe("RAG chat failed: model overloaded");
    });
  });

  describe("plainChat", () => {
    it("returns the completion without retrieval", async () => {
      const { embeddings, generator, orchestrator } = setup();

      const result = await orchestrator.plainChat("Hi");

      expect(result).toEqual({
        responseText: "Alpha is a search tooling project.",
        modelUsed: "chat-test",
      });
      expect(generator.requests[0]?.messages).toHaveLength(2);
      expect(embeddings.calls).toEqual([]);
    });

    it("substitutes a placeholder for an empty completion", async () => {
      const { generator, orchestrator } = setup();
      generator.respondWith("");

      expect((await orchestrator.plainChat("Hi")).responseText).toBe(
        "No response generated"
      );
    });

    it("propagates generation errors", async () => {
      const { generator, orchestrator } = setup();
      generator.failure = new Error("model overloaded");

      await expect(orchestrator.plainChat("Hi")).rejects.toThrow("model overloaded");
    });
  });

  describe("getStats", () => {
    it("reports index statistics with the active settings", async () => {
      const { orchestrator } = setup();
      await orchestrator.addDocuments(DOCUMENTS);

      expect(await orchestrator.getStats()).toEqual({
        totalDocuments: 2,
        indexDimension: 4,
        indexFullness: 0,
        embeddingModel: "embed-test",
        chatModel: "chat-test",
        ragSettings: { topK: 5, minScore: 0.7, chunkSize: 1000, chunkOverlap: 200 },
      });
    });

    it("returns an error entry when the index cannot describe itself", async () => {
      const { index, orchestrator } = setup();
      vi.spyOn(index, "describeStats").mockRejectedValue(new Error("unavailable"));

      expect(await orchestrator.getStats()).toEqual({ error: "unavailable" });
    });
  });

  describe("clearKnowledgeBase and deleteEntry", () => {
    it("removes stored entries", async () => {
      const { orchestrator } = setup();
      await orchestrator.addDocuments(DOCUMENTS);

      expect(await orchestrator.deleteEntry("alpha_chunk_0")).toBe(true);
      expect(await orchestrator.getStats()).toMatchObject({ totalDocuments: 1 });

      expect(await orchestrator.clearKnowledgeBase()).toBe(true);
      expect(await orchestrator.getStats()).toMatchObject({ totalDocuments: 0 });
    });

    it("reports failures as false", async () => {
      const { index, orchestrator } = setup();
      vi.spyOn(index, "deleteAll").mockRejectedValue(new Error("forbidden"));

      expect(await orchestrator.clearKnowledgeBase()).toBe(false);
    });
  });
});

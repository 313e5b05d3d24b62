/**
 * Retrieval-augmented chat and ingestion pipeline.
 *
 * Ingestion: validate -> chunk every document -> one vector store upsert.
 * Chat:      retrieve -> build context -> build messages -> complete -> format.
 *
 * chatWithContext() never throws: any failure in retrieval or generation yields
 * a degraded response with an apology and no sources. plainChat() is the
 * non-RAG single-turn path the HTTP layer falls back to when even that fails.
 */
import type { RagSettings } from "@config/index";
import type { ChatTurn, GenerationProvider } from "@domain/llm/ports";
import type { Chunker } from "@domain/rag/chunker";
import {
  buildContext,
  buildMessages,
  buildPlainMessages,
} from "@domain/rag/contextAssembler";
import type { Retriever } from "@domain/rag/retriever";
import type {
  Chunk,
  Document,
  RetrievedFragment,
  SourceReference,
} from "@domain/rag/types";
import type { VectorStoreAdapter } from "@domain/rag/vectorStore";
import { errorMessage, logEvent, logger } from "@infrastructure/logging/Logger";
import { ValidationError } from "@typesLocal/AppError";

export const DEGRADED_RESPONSE_TEXT =
  "I apologize, but I'm having trouble accessing my knowledge base right now. Please try again.";

export interface RagResponse {
  responseText: string;
  modelUsed: string;
  sourcesUsed: number;
  sources: SourceReference[];
  contextLength: number;
  error?: string;
}

export interface PlainChatResponse {
  responseText: string;
  modelUsed: string;
}

export interface KnowledgeBaseStats {
  totalDocuments: number;
  indexDimension: number;
  indexFullness: number;
  embeddingModel: string;
  chatModel: string;
  ragSettings: {
    topK: number;
    minScore: number;
    chunkSize: number;
    chunkOverlap: number;
  };
}

export type KnowledgeBaseStatsResult = KnowledgeBaseStats | { error: string };

export interface OrchestratorSettings {
  chatModel: string;
  embeddingModel: string;
  maxTokens: number;
  temperature: number;
  rag: RagSettings;
}

export interface RagOrchestratorDeps {
  chunker: Chunker;
  retriever: Retriever;
  store: Pick<
    VectorStoreAdapter,
    "ensureIndex" | "upsert" | "stats" | "clear" | "delete"
  >;
  generator: GenerationProvider;
  settings: OrchestratorSettings;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

function toSource(fragment: RetrievedFragment): SourceReference {
  return {
    id: fragment.id,
    score: fragment.score,
    metadata: fragment.metadata,
  };
}

function validateDocuments(documents: Document[]): void {
  const seen = new Set<string>();

  documents.forEach((doc, i) => {
    if (!doc.id || !doc.id.trim()) {
      throw new ValidationError(`Document at index ${i} has an empty id`);
    }
    if (!doc.text || !doc.text.trim()) {
      throw new ValidationError(`Document "${doc.id}" has empty text`);
    }
    if (seen.has(doc.id)) {
      throw new ValidationError(`Duplicate document id "${doc.id}" in batch`);
    }
    seen.add(doc.id);
  });
}

export class RagOrchestrator {
  private readonly chunker: Chunker;
  private readonly retriever: Retriever;
  private readonly store: RagOrchestratorDeps["store"];
  private readonly generator: GenerationProvider;
  private readonly settings: OrchestratorSettings;

  constructor(deps: RagOrchestratorDeps) {
    this.chunker = deps.chunker;
    this.retriever = deps.retriever;
    this.store = deps.store;
    this.generator = deps.generator;
    this.settings = deps.settings;
  }

  async initialize(options: RequestOptions = {}): Promise<boolean> {
    const outcome = await this.store.ensureIndex(options.signal);

    if (!outcome.ok) {
      logger.log("error", "RAG service initialization failed", {
        error: outcome.error,
      });
      return false;
    }

    logger.log("info", "RAG service initialized");
    return true;
  }

  /**
   * Chunks and stores the documents. Invalid input throws ValidationError;
   * storage failures resolve to false and nothing is reported as partially
   * stored.
   */
  async addDocuments(
    documents: Document[],
    options: RequestOptions = {}
  ): Promise<boolean> {
    validateDocuments(documents);

    const chunks: Chunk[] = documents.flatMap((doc) =>
      this.chunker.split(doc.text, doc.id, doc.metadata ?? {})
    );

    const outcome = await this.store.upsert(chunks, options.signal);

    logEvent(outcome.ok ? "RAG_INGEST_SUCCESS" : "RAG_INGEST_FAILURE", {
      documents: documents.length,
      chunks: chunks.length,
      ...(outcome.ok ? {} : { message: outcome.error }),
    });

    return outcome.ok;
  }

  async chatWithContext(
    userMessage: string,
    history: ChatTurn[] = [],
    options: RequestOptions = {}
  ): Promise<RagResponse> {
    const { chatModel, maxTokens, temperature, rag } = this.settings;
    const startedAt = Date.now();

    try {
      const fragments = await this.retriever.search(userMessage, {
        topK: rag.topK,
        minScore: rag.minScore,
        signal: options.signal,
      });

      const context = buildContext(fragments);
      const messages = buildMessages(userMessage, context, history);

      const completion = await this.generator.complete({
        model: chatModel,
        messages,
        maxTokens,
        temperature,
        signal: options.signal,
      });

      logEvent("RAG_CHAT_SUCCESS", {
        model: chatModel,
        durationMs: Date.now() - startedAt,
        sourcesUsed: fragments.length,
        historyCount: history.length,
        contextLength: context.length,
      });

      return {
        responseText: completion.text,
        modelUsed: chatModel,
        sourcesUsed: fragments.length,
        sources: fragments.map(toSource),
        contextLength: context.length,
      };
    } catch (error: unknown) {
      logEvent("RAG_CHAT_FAILURE", {
        model: chatModel,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
      });

      return {
        responseText: DEGRADED_RESPONSE_TEXT,
        modelUsed: chatModel,
        sourcesUsed: 0,
        sources: [],
        contextLength: 0,
        error: `RAG chat failed: ${errorMessage(error)}`,
      };
    }
  }

  /** Single-turn completion without retrieval. Generation errors propagate. */
  async plainChat(
    userMessage: string,
    options: RequestOptions = {}
  ): Promise<PlainChatResponse> {
    const { chatModel, maxTokens, temperature } = this.settings;

    const completion = await this.generator.complete({
      model: chatModel,
      messages: buildPlainMessages(userMessage),
      maxTokens,
      temperature,
      signal: options.signal,
    });

    return {
      responseText: completion.text || "No response generated",
      modelUsed: chatModel,
    };
  }

  async getStats(options: RequestOptions = {}): Promise<KnowledgeBaseStatsResult> {
    const outcome = await this.store.stats(options.signal);

    if (!outcome.ok) {
      return { error: outcome.error };
    }

    const { rag } = this.settings;

    return {
      totalDocuments: outcome.value.totalVectors,
      indexDimension: outcome.value.dimension,
      indexFullness: outcome.value.fullness,
      embeddingModel: this.settings.embeddingModel,
      chatModel: this.settings.chatModel,
      ragSettings: {
        topK: rag.topK,
        minScore: rag.minScore,
        chunkSize: rag.chunkSize,
        chunkOverlap: rag.chunkOverlap,
      },
    };
  }

  async clearKnowledgeBase(options: RequestOptions = {}): Promise<boolean> {
    const outcome = await this.store.clear(options.signal);

    if (outcome.ok) {
      logger.log("info", "Knowledge base cleared");
    }
    return outcome.ok;
  }

  /** Removes a single stored entry (one chunk vector) by id. */
  async deleteEntry(id: string, options: RequestOptions = {}): Promise<boolean> {
    const outcome = await this.store.delete(id, options.signal);
    return outcome.ok;
  }
}

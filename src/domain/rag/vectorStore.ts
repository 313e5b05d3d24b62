/**
 * Vector store adapter over an embedding provider and a vector index provider.
 *
 * Failure policy:
 * - embed() throws EmbeddingError; callers decide whether to abort or degrade.
 * - Every index-side operation returns a StoreOutcome and never throws.
 *   upsert() also folds embedding failures into its outcome, because a batch
 *   is all-or-nothing.
 *
 * The index handle follows an explicit `uninitialized -> ready` lifecycle.
 * Concurrent first callers share a single in-flight initialisation, which no
 * single caller's signal can cancel; an aborted caller only stops waiting.
 */
import { errorMessage, logEvent } from "@infrastructure/logging/Logger";
import { EmbeddingError } from "@typesLocal/AppError";
import { abortable, linkedController } from "@utils/abort";
import PQueue from "p-queue";

import type {
  EmbeddingProvider,
  IndexProvider,
  SimilarityMetric,
  VectorRecord,
} from "./ports";
import {
  failed,
  succeeded,
  type Chunk,
  type IndexStats,
  type RetrievedFragment,
  type StoreOutcome,
} from "./types";

/** Metadata key holding the raw chunk text inside the index. */
export const TEXT_METADATA_KEY = "text";

export interface VectorStoreOptions {
  indexName: string;
  dimension: number;
  embeddingModel: string;
  metric?: SimilarityMetric;
  /** Maximum number of embedding requests in flight during upsert. */
  embedConcurrency?: number;
}

export type IndexState<THandle> =
  | { status: "uninitialized" }
  | { status: "ready"; handle: THandle };

const EMPTY_STATS: IndexStats = {
  totalVectors: 0,
  dimension: 0,
  fullness: 0,
  namespaces: {},
};

export class VectorStoreAdapter<THandle = unknown> {
  private state: IndexState<THandle> = { status: "uninitialized" };
  private initializing: Promise<THandle> | null = null;
  private readonly metric: SimilarityMetric;
  private readonly embedConcurrency: number;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly index: IndexProvider<THandle>,
    private readonly options: VectorStoreOptions
  ) {
    this.metric = options.metric ?? "cosine";
    this.embedConcurrency = options.embedConcurrency ?? 5;
  }

  status(): IndexState<THandle>["status"] {
    return this.state.status;
  }

  async ensureIndex(signal?: AbortSignal): Promise<StoreOutcome<boolean>> {
    try {
      await this.handle(signal);
      return succeeded(true);
    } catch (error: unknown) {
      return failed(false, errorMessage(error));
    }
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    const input = text.trim();

    if (!input) {
      throw new EmbeddingError("Cannot embed empty text");
    }

    const startedAt = Date.now();

    try {
      const vector = await this.embeddings.embed(
        this.options.embeddingModel,
        input,
        signal
      );

      if (vector.length !== this.options.dimension) {
        throw new EmbeddingError(
          `Embedding has ${vector.length} dimensions, expected ${this.options.dimension}`
        );
      }

      logEvent("EMBEDDING_SUCCESS", {
        model: this.options.embeddingModel,
        durationMs: Date.now() - startedAt,
        inputLength: input.length,
      });

      return vector;
    } catch (error: unknown) {
      logEvent("EMBEDDING_FAILURE", {
        model: this.options.embeddingModel,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
      });

      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError(`Failed to create embedding: ${errorMessage(error)}`, {
        model: this.options.embeddingModel,
      });
    }
  }

  /**
   * Embeds every chunk and stores them with one provider upsert call.
   * Resolves to the number of stored vectors. A partially applied provider
   * upsert is not rolled back.
   */
  async upsert(
    chunks: Chunk[],
    signal?: AbortSignal
  ): Promise<StoreOutcome<number>> {
    if (chunks.length === 0) {
      return succeeded(0);
    }

    const queue = new PQueue({ concurrency: this.embedConcurrency });
    // Aborted on the first failure so in-flight embeddings stop too.
    const batch = linkedController(signal);
    const batchSignal = batch.controller.signal;

    try {
      const handle = await this.handle(signal);
      const records: VectorRecord[] = [];

      await queue.addAll(
        chunks.map((chunk, i) => async () => {
          records[i] = {
            id: chunk.id,
            values: await this.embed(chunk.text, batchSignal),
            metadata: { ...chunk.metadata, [TEXT_METADATA_KEY]: chunk.text },
          };
        }),
        { signal: batchSignal }
      );

      await this.index.upsert(handle, records, signal);

      logEvent("VECTOR_UPSERT_SUCCESS", {
        index: this.options.indexName,
        count: records.length,
      });

      return succeeded(records.length);
    } catch (error: unknown) {
      queue.clear();
      batch.controller.abort(error);
      logEvent("VECTOR_UPSERT_FAILURE", {
        index: this.options.indexName,
        count: chunks.length,
        message: errorMessage(error),
      });
      return failed(0, errorMessage(error));
    } finally {
      batch.release();
    }
  }

  /**
   * Nearest-neighbour search. Embedding errors propagate; index errors yield
   * an empty, failed outcome.
   */
  async query(
    queryText: string,
    topK: number,
    minScore: number,
    signal?: AbortSignal
  ): Promise<StoreOutcome<RetrievedFragment[]>> {
    const vector = await this.embed(queryText, signal);

    try {
      const handle = await this.handle(signal);
      const matches = await this.index.query(
        handle,
        { vector, topK, includeMetadata: true },
        signal
      );

      const fragments = matches
        .filter((match) => match.score >= minScore)
        .sort((a, b) => b.score - a.score)
        .slice(0, topK)
        .map((match): RetrievedFragment => {
          const { [TEXT_METADATA_KEY]: text, ...metadata } = match.metadata;
          return {
            id: match.id,
            score: match.score,
            text: typeof text === "string" ? text : "",
            metadata,
          };
        });

      logEvent("VECTOR_QUERY", {
        index: this.options.indexName,
        topK,
        minScore,
        rawCount: matches.length,
        returned: fragments.length,
      });

      return succeeded(fragments);
    } catch (error: unknown) {
      logEvent("VECTOR_QUERY_FAILURE", {
        index: this.options.indexName,
        message: errorMessage(error),
      });
      return failed([], errorMessage(error));
    }
  }

  async delete(id: string, signal?: AbortSignal): Promise<StoreOutcome<boolean>> {
    return this.guard("VECTOR_DELETE", false, async (handle) => {
      await this.index.delete(handle, [id], signal);
      return true;
    }, signal);
  }

  async clear(signal?: AbortSignal): Promise<StoreOutcome<boolean>> {
    return this.guard("VECTOR_CLEAR", false, async (handle) => {
      await this.index.deleteAll(handle, signal);
      return true;
    }, signal);
  }

  async stats(signal?: AbortSignal): Promise<StoreOutcome<IndexStats>> {
    return this.guard(
      "VECTOR_STATS",
      EMPTY_STATS,
      (handle) => this.index.describeStats(handle, signal),
      signal
    );
  }

  private async guard<T>(
    operation: string,
    empty: T,
    fn: (handle: THandle) => Promise<T>,
    signal?: AbortSignal
  ): Promise<StoreOutcome<T>> {
    try {
      const value = await fn(await this.handle(signal));
      logEvent(`${operation}_SUCCESS`, { index: this.options.indexName });
      return succeeded(value);
    } catch (error: unknown) {
      logEvent(`${operation}_FAILURE`, {
        index: this.options.indexName,
        message: errorMessage(error),
      });
      return failed(empty, errorMessage(error));
    }
  }

  private async handle(signal?: AbortSignal): Promise<THandle> {
    if (this.state.status === "ready") {
      return this.state.handle;
    }

    if (!this.initializing) {
      this.initializing = this.initialize().finally(() => {
        this.initializing = null;
      });
    }

    return abortable(this.initializing, signal);
  }

  private async initialize(): Promise<THandle> {
    const { indexName, dimension } = this.options;

    try {
      await this.index.createIfAbsent(indexName, dimension, this.metric);
      const handle = await this.index.connect(indexName);
      this.state = { status: "ready", handle };

      logEvent("INDEX_READY", {
        provider: this.index.name,
        index: indexName,
        dimension,
        metric: this.metric,
      });

      return handle;
    } catch (error: unknown) {
      logEvent("INDEX_INIT_FAILURE", {
        provider: this.index.name,
        index: indexName,
        message: errorMessage(error),
      });
      throw error;
    }
  }
}

import type { IndexStats, Metadata } from "./types";

/**
 * Provider contracts consumed by the vector store adapter.
 *
 * Production implementations live under src/infrastructure/; the in-memory
 * index and the fakes in src/_tests/ implement the same interfaces.
 */
export interface EmbeddingProvider {
  embed(model: string, input: string, signal?: AbortSignal): Promise<number[]>;
}

export type SimilarityMetric = "cosine" | "euclidean" | "dotproduct";

export interface VectorRecord {
  id: string;
  values: number[];
  metadata: Metadata;
}

export interface VectorMatch {
  id: string;
  score: number;
  metadata: Metadata;
}

export interface IndexQuery {
  vector: number[];
  topK: number;
  includeMetadata: boolean;
}

/**
 * Vector index capability. `THandle` is whatever the provider needs to talk to
 * a connected index; the adapter treats it as opaque.
 */
export interface IndexProvider<THandle = unknown> {
  readonly name: string;

  createIfAbsent(
    name: string,
    dimension: number,
    metric: SimilarityMetric,
    signal?: AbortSignal
  ): Promise<void>;

  connect(name: string, signal?: AbortSignal): Promise<THandle>;

  upsert(
    handle: THandle,
    records: VectorRecord[],
    signal?: AbortSignal
  ): Promise<void>;

  query(
    handle: THandle,
    query: IndexQuery,
    signal?: AbortSignal
  ): Promise<VectorMatch[]>;

  delete(handle: THandle, ids: string[], signal?: AbortSignal): Promise<void>;

  deleteAll(handle: THandle, signal?: AbortSignal): Promise<void>;

  describeStats(handle: THandle, signal?: AbortSignal): Promise<IndexStats>;
}

/**
 * Process-local vector index with exact nearest-neighbour search.
 *
 * Used for local runs (VECTOR_STORE=memory) and as the in-process stand-in
 * for hosted indexes in tests. Contents are lost when the process exits.
 */
import type {
  IndexProvider,
  IndexQuery,
  SimilarityMetric,
  VectorMatch,
  VectorRecord,
} from "@domain/rag/ports";
import type { IndexStats } from "@domain/rag/types";
import {
  cosineSimilarity,
  dotProduct,
  euclideanDistance,
} from "@utils/vector";

export interface InMemoryIndex {
  name: string;
  dimension: number;
  metric: SimilarityMetric;
  records: Map<string, VectorRecord>;
}

function score(metric: SimilarityMetric, a: number[], b: number[]): number {
  switch (metric) {
    case "cosine":
      return cosineSimilarity(a, b);
    case "dotproduct":
      return dotProduct(a, b);
    case "euclidean":
      return 1 / (1 + euclideanDistance(a, b));
  }
}

export class InMemoryIndexProvider implements IndexProvider<InMemoryIndex> {
  readonly name = "memory";
  private readonly indexes = new Map<string, InMemoryIndex>();

  async createIfAbsent(
    name: string,
    dimension: number,
    metric: SimilarityMetric
  ): Promise<void> {
    if (!this.indexes.has(name)) {
      this.indexes.set(name, { name, dimension, metric, records: new Map() });
    }
  }

  async connect(name: string): Promise<InMemoryIndex> {
    const index = this.indexes.get(name);

    if (!index) {
      throw new Error(`Index "${name}" does not exist`);
    }
    return index;
  }

  async upsert(handle: InMemoryIndex, records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      if (record.values.length !== handle.dimension) {
        throw new Error(
          `Vector ${record.id} has dimension ${record.values.length}, index expects ${handle.dimension}`
        );
      }
    }

    for (const record of records) {
      handle.records.set(record.id, {
        id: record.id,
        values: [...record.values],
        metadata: { ...record.metadata },
      });
    }
  }

  async query(handle: InMemoryIndex, query: IndexQuery): Promise<VectorMatch[]> {
    return [...handle.records.values()]
      .map((record) => ({
        id: record.id,
        score: score(handle.metric, query.vector, record.values),
        metadata: query.includeMetadata ? { ...record.metadata } : {},
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, query.topK);
  }

  async delete(handle: InMemoryIndex, ids: string[]): Promise<void> {
    for (const id of ids) {
      handle.records.delete(id);
    }
  }

  async deleteAll(handle: InMemoryIndex): Promise<void> {
    handle.records.clear();
  }

  async describeStats(handle: InMemoryIndex): Promise<IndexStats> {
    return {
      totalVectors: handle.records.size,
      dimension: handle.dimension,
      fullness: 0,
      namespaces:
        handle.records.size > 0
          ? { "": { vectorCount: handle.records.size } }
          : {},
    };
  }
}

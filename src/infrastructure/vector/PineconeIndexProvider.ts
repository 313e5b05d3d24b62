/**
 * Pinecone serverless implementation of the IndexProvider port.
 *
 * Notes:
 *  - Indexes are created as serverless indexes in the configured cloud/region.
 *  - Record metadata values must be strings, numbers, booleans or string
 *    lists; list values are joined when read back.
 *  - The SDK does not accept an AbortSignal, so cancellation is checked
 *    before each request.
 */
import { Pinecone, type RecordMetadata } from "@pinecone-database/pinecone";
import type {
  IndexProvider,
  IndexQuery,
  SimilarityMetric,
  VectorMatch,
  VectorRecord,
} from "@domain/rag/ports";
import type { IndexStats, Metadata } from "@domain/rag/types";
import { logger } from "@infrastructure/logging/Logger";

// Pinecone recommends batches of at most 100 vectors per upsert request.
const PINECONE_BATCH_SIZE = 100;

export interface PineconeServerlessSpec {
  cloud: "aws" | "gcp" | "azure";
  region: string;
}

function batches<T>(items: T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

export interface PineconeRecordInput {
  id: string;
  values: number[];
  metadata: RecordMetadata;
}

export interface PineconeIndexOps {
  upsert(records: PineconeRecordInput[]): Promise<void>;
  query(options: {
    vector: number[];
    topK: number;
    includeMetadata: boolean;
    includeValues: boolean;
  }): Promise<{
    matches?: { id: string; score?: number; metadata?: RecordMetadata }[];
  }>;
  deleteMany(ids: string[]): Promise<void>;
  deleteAll(): Promise<void>;
  describeIndexStats(): Promise<{
    totalRecordCount?: number;
    dimension?: number;
    indexFullness?: number;
    namespaces?: Record<string, { recordCount?: number }>;
  }>;
}

/** The parts of the Pinecone client this provider calls. */
export interface PineconeControlPlane {
  listIndexes(): Promise<{ indexes?: { name: string }[] }>;
  createIndex(options: {
    name: string;
    dimension: number;
    metric: SimilarityMetric;
    spec: { serverless: PineconeServerlessSpec };
    waitUntilReady: boolean;
    suppressConflicts: boolean;
  }): Promise<unknown>;
  index(name: string): PineconeIndexOps;
}

export function toMetadata(raw: RecordMetadata | undefined): Metadata {
  const metadata: Metadata = {};

  for (const [key, value] of Object.entries(raw ?? {})) {
    metadata[key] = Array.isArray(value) ? value.join(", ") : value;
  }
  return metadata;
}

export function createPineconeClient(apiKey: string): Pinecone {
  return new Pinecone({ apiKey });
}

export class PineconeIndexProvider implements IndexProvider<PineconeIndexOps> {
  readonly name = "pinecone";

  constructor(
    private readonly client: PineconeControlPlane,
    private readonly spec: PineconeServerlessSpec
  ) {}

  async createIfAbsent(
    name: string,
    dimension: number,
    metric: SimilarityMetric,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    const existing = await this.client.listIndexes();

    if ((existing.indexes ?? []).some((index) => index.name === name)) {
      logger.log("info", "Using existing Pinecone index", { index: name });
      return;
    }

    signal?.throwIfAborted();
    await this.client.createIndex({
      name,
      dimension,
      metric,
      spec: {
        serverless: { cloud: this.spec.cloud, region: this.spec.region },
      },
      waitUntilReady: true,
      suppressConflicts: true,
    });

    logger.log("info", "Created Pinecone index", { index: name, dimension });
  }

  async connect(name: string, signal?: AbortSignal): Promise<PineconeIndexOps> {
    signal?.throwIfAborted();
    return this.client.index(name);
  }

  async upsert(
    handle: PineconeIndexOps,
    records: VectorRecord[],
    signal?: AbortSignal
  ): Promise<void> {
    for (const batch of batches(records, PINECONE_BATCH_SIZE)) {
      signal?.throwIfAborted();
      await handle.upsert(
        batch.map((record) => ({
          id: record.id,
          values: record.values,
          metadata: record.metadata,
        }))
      );
    }
  }

  async query(
    handle: PineconeIndexOps,
    query: IndexQuery,
    signal?: AbortSignal
  ): Promise<VectorMatch[]> {
    signal?.throwIfAborted();

    const response = await handle.query({
      vector: query.vector,
      topK: query.topK,
      includeMetadata: query.includeMetadata,
      includeValues: false,
    });

    return (response.matches ?? []).map((match) => ({
      id: match.id,
      score: match.score ?? 0,
      metadata: toMetadata(match.metadata),
    }));
  }

  async delete(
    handle: PineconeIndexOps,
    ids: string[],
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    await handle.deleteMany(ids);
  }

  async deleteAll(handle: PineconeIndexOps, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await handle.deleteAll();
  }

  async describeStats(
    handle: PineconeIndexOps,
    signal?: AbortSignal
  ): Promise<IndexStats> {
    signal?.throwIfAborted();
    const stats = await handle.describeIndexStats();

    const namespaces: IndexStats["namespaces"] = {};
    for (const [name, summary] of Object.entries(stats.namespaces ?? {})) {
      namespaces[name] = { vectorCount: summary.recordCount ?? 0 };
    }

    return {
      totalVectors: stats.totalRecordCount ?? 0,
      dimension: stats.dimension ?? 0,
      fullness: stats.indexFullness ?? 0,
      namespaces,
    };
  }
}

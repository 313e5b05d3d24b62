/**
 * Postgres + pgvector implementation of the IndexProvider port.
 *
 * Each index is a table `(id TEXT PRIMARY KEY, embedding vector(n), metadata
 * JSONB)`. Scores are derived from the pgvector distance operator matching the
 * index metric:
 * - cosine:     1 - (embedding <=> q)
 * - dotproduct: -(embedding <#> q)
 * - euclidean:  1 / (1 + (embedding <-> q))
 */
import type {
  IndexProvider,
  IndexQuery,
  SimilarityMetric,
  VectorMatch,
  VectorRecord,
} from "@domain/rag/ports";
import type { IndexStats } from "@domain/rag/types";
import { toPgVectorLiteral } from "@utils/vector";
import { z } from "zod";

/** Minimal query surface shared by pg.Pool and pg.Client. */
export interface SqlClient {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

export interface PgVectorTable {
  table: string;
  metric: SimilarityMetric;
}

const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const MatchRowSchema = z.object({
  id: z.string(),
  score: z.coerce.number(),
  metadata: MetadataSchema.nullable().transform((m) => m ?? {}),
});

const CountRowSchema = z.object({ total: z.coerce.number() });
const DimensionRowSchema = z.object({ dimension: z.coerce.number() });
const RegclassRowSchema = z.object({ oid: z.string().nullable() });

const DISTANCE_OPERATORS: Record<SimilarityMetric, string> = {
  cosine: "<=>",
  dotproduct: "<#>",
  euclidean: "<->",
};

function scoreExpression(metric: SimilarityMetric): string {
  switch (metric) {
    case "cosine":
      return "1 - (embedding <=> $1::vector)";
    case "dotproduct":
      return "(embedding <#> $1::vector) * -1";
    case "euclidean":
      return "1 / (1 + (embedding <-> $1::vector))";
  }
}

export function tableNameFor(indexName: string): string {
  const normalized = indexName.toLowerCase().replace(/[^a-z0-9_]/g, "_");
  return `rag_${normalized}`;
}

export class PgVectorIndexProvider implements IndexProvider<PgVectorTable> {
  readonly name = "pgvector";
  private readonly metrics = new Map<string, SimilarityMetric>();

  constructor(private readonly db: SqlClient) {}

  async createIfAbsent(
    name: string,
    dimension: number,
    metric: SimilarityMetric,
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    const table = tableNameFor(name);

    await this.db.query("CREATE EXTENSION IF NOT EXISTS vector");
    await this.db.query(
      `
      CREATE TABLE IF NOT EXISTS ${table} (
        id TEXT PRIMARY KEY,
        embedding vector(${dimension}) NOT NULL,
        metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      )
      `
    );

    this.metrics.set(name, metric);
  }

  async connect(name: string, signal?: AbortSignal): Promise<PgVectorTable> {
    signal?.throwIfAborted();
    const table = tableNameFor(name);

    const result = await this.db.query("SELECT to_regclass($1)::text AS oid", [
      table,
    ]);
    const row = RegclassRowSchema.parse(result.rows[0] ?? { oid: null });

    if (!row.oid) {
      throw new Error(`pgvector table "${table}" does not exist`);
    }

    return { table, metric: this.metrics.get(name) ?? "cosine" };
  }

  async upsert(
    handle: PgVectorTable,
    records: VectorRecord[],
    signal?: AbortSignal
  ): Promise<void> {
    if (records.length === 0) {
      return;
    }
    signal?.throwIfAborted();

    const values: unknown[] = [];
    const tuples = records.map((record, i) => {
      values.push(
        record.id,
        toPgVectorLiteral(record.values),
        JSON.stringify(record.metadata)
      );
      const base = i * 3;
      return `($${base + 1}, $${base + 2}::vector, $${base + 3}::jsonb)`;
    });

    await this.db.query(
      `
      INSERT INTO ${handle.table} (id, embedding, metadata)
      VALUES ${tuples.join(", ")}
      ON CONFLICT (id) DO UPDATE
        SET embedding = EXCLUDED.embedding,
            metadata = EXCLUDED.metadata,
            updated_at = now()
      `,
      values
    );
  }

  async query(
    handle: PgVectorTable,
    query: IndexQuery,
    signal?: AbortSignal
  ): Promise<VectorMatch[]> {
    signal?.throwIfAborted();

    const result = await this.db.query(
      `
      SELECT
        id,
        ${scoreExpression(handle.metric)} AS score,
        ${query.includeMetadata ? "metadata" : "NULL::jsonb AS metadata"}
      FROM ${handle.table}
      ORDER BY embedding ${DISTANCE_OPERATORS[handle.metric]} $1::vector ASC
      LIMIT $2
      `,
      [toPgVectorLiteral(query.vector), query.topK]
    );

    return result.rows.map((row) => MatchRowSchema.parse(row));
  }

  async delete(
    handle: PgVectorTable,
    ids: string[],
    signal?: AbortSignal
  ): Promise<void> {
    signal?.throwIfAborted();
    await this.db.query(`DELETE FROM ${handle.table} WHERE id = ANY($1::text[])`, [
      ids,
    ]);
  }

  async deleteAll(handle: PgVectorTable, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    await this.db.query(`TRUNCATE ${handle.table}`);
  }

  async describeStats(
    handle: PgVectorTable,
    signal?: AbortSignal
  ): Promise<IndexStats> {
    signal?.throwIfAborted();

    const countResult = await this.db.query(
      `SELECT count(*)::int AS total FROM ${handle.table}`
    );
    const dimensionResult = await this.db.query(
      `SELECT vector_dims(embedding) AS dimension FROM ${handle.table} LIMIT 1`
    );

    const { total } = CountRowSchema.parse(countResult.rows[0] ?? { total: 0 });
    const { dimension } = DimensionRowSchema.parse(
      dimensionResult.rows[0] ?? { dimension: 0 }
    );

    return {
      totalVectors: total,
      dimension,
      fullness: 0,
      namespaces: total > 0 ? { "": { vectorCount: total } } : {},
    };
  }
}

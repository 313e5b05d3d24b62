/**
 * Core RAG data model: documents, chunks, retrieved fragments and the
 * explicit outcome type used by every vector-index operation.
 */
export type MetadataValue = string | number | boolean;

export type Metadata = Record<string, MetadataValue>;

export interface Document {
  /** Caller-assigned, unique within the knowledge base. */
  id: string;
  text: string;
  metadata?: Metadata;
}

export interface ChunkMetadata extends Metadata {
  parent_document_id: string;
  chunk_number: number;
  chunk_start_offset: number;
  chunk_end_offset: number;
}

export interface Chunk {
  /** `{documentId}_chunk_{chunkNumber}` */
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

export interface RetrievedFragment {
  id: string;
  /** Cosine similarity, higher is more relevant. */
  score: number;
  text: string;
  /** Stored metadata without the raw text field. */
  metadata: Metadata;
}

export interface SourceReference {
  id: string;
  score: number;
  metadata: Metadata;
}

export interface IndexStats {
  totalVectors: number;
  dimension: number;
  fullness: number;
  namespaces: Record<string, { vectorCount: number }>;
}

/**
 * Result of an index-side operation. Failures carry the empty default value
 * alongside the error description, so callers can either branch on `ok` or
 * use `value` directly.
 */
export type StoreOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; error: string };

export function succeeded<T>(value: T): StoreOutcome<T> {
  return { ok: true, value };
}

export function failed<T>(value: T, error: string): StoreOutcome<T> {
  return { ok: false, value, error };
}

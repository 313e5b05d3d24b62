/**
 * Similarity retrieval with configured defaults for top-K and minimum score.
 *
 * A failed index query has already been logged by the vector store and is
 * treated as "no context". Embedding failures propagate to the caller.
 */
import type { RetrievedFragment } from "./types";
import type { VectorStoreAdapter } from "./vectorStore";

export interface RetrievalDefaults {
  topK: number;
  minScore: number;
}

export interface SearchOptions {
  topK?: number;
  minScore?: number;
  signal?: AbortSignal;
}

export class Retriever {
  constructor(
    private readonly store: Pick<VectorStoreAdapter, "query">,
    private readonly defaults: RetrievalDefaults
  ) {}

  async search(
    query: string,
    options: SearchOptions = {}
  ): Promise<RetrievedFragment[]> {
    const topK = options.topK ?? this.defaults.topK;
    const minScore = options.minScore ?? this.defaults.minScore;

    const outcome = await this.store.query(query, topK, minScore, options.signal);
    return outcome.value;
  }
}

/**
 * In-process stand-ins for the external providers, shared by the test suites.
 */
import type {
  Completion,
  CompletionRequest,
  GenerationProvider,
} from "@domain/llm/ports";
import type { EmbeddingProvider } from "@domain/rag/ports";
import type { SqlClient } from "@infrastructure/vector/PgVectorIndexProvider";
import type {
  PineconeControlPlane,
  PineconeIndexOps,
  PineconeRecordInput,
} from "@infrastructure/vector/PineconeIndexProvider";

/**
 * Deterministic embedder. Inputs listed in `vectors` get that exact vector;
 * anything else is a bag-of-words vector with one bucket per word hash.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: { model: string; input: string }[] = [];
  failure: Error | null = null;

  constructor(
    private readonly dimension: number,
    private readonly vectors: Record<string, number[]> = {}
  ) {}

  async embed(model: string, input: string): Promise<number[]> {
    this.calls.push({ model, input });

    if (this.failure) {
      throw this.failure;
    }

    const known = this.vectors[input];
    if (known) {
      return [...known];
    }

    const vector = new Array<number>(this.dimension).fill(0);
    for (const word of input.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean)) {
      let hash = 0;
      for (const ch of word) {
        hash = (hash * 31 + ch.charCodeAt(0)) % 997;
      }
      const bucket = hash % this.dimension;
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    }
    return vector;
  }
}

export class FakeGenerationProvider implements GenerationProvider {
  readonly requests: CompletionRequest[] = [];
  failure: Error | null = null;

  constructor(private reply = "Generated answer.") {}

  respondWith(reply: string): void {
    this.reply = reply;
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    this.requests.push(request);

    if (this.failure) {
      throw this.failure;
    }
    return { text: this.reply, model: request.model, finishReason: "stop" };
  }
}

export interface SqlCall {
  text: string;
  values: unknown[] | undefined;
}

/** Records every statement and answers with rows chosen by `respond`. */
export class FakeSqlClient implements SqlClient {
  readonly calls: SqlCall[] = [];

  constructor(private readonly respond: (text: string) => unknown[] = () => []) {}

  async query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number }> {
    this.calls.push({ text, values });
    const rows = this.respond(text);
    return { rows, rowCount: rows.length };
  }
}

/** Collapses runs of whitespace so SQL can be compared line-independently. */
export function squish(sql: string): string {
  return sql.replace(/\s+/g, " ").trim();
}

/** Minimal HTTP reply that records the status code and JSON body. */
export class FakeReply {
  statusCode = 200;
  body: unknown = undefined;
  writableFinished = false;
  private readonly closeListeners: (() => void)[] = [];

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.writableFinished = true;
    return this;
  }

  on(_event: "close", listener: () => void): this {
    this.closeListeners.push(listener);
    return this;
  }

  /** Simulates the client connection closing. */
  close(): void {
    for (const listener of this.closeListeners) {
      listener();
    }
  }
}

export function fakeRequest(
  body: unknown,
  params: Record<string, string> = {}
): { body: unknown; params: Record<string, string> } {
  return { body, params };
}

type IndexStatsResponse = Awaited<ReturnType<PineconeIndexOps["describeIndexStats"]>>;
type QueryResponse = Awaited<ReturnType<PineconeIndexOps["query"]>>;
type CreateIndexOptions = Parameters<PineconeControlPlane["createIndex"]>[0];

/** In-process stand-in for one Pinecone index. */
export class FakePineconeIndex implements PineconeIndexOps {
  readonly upserts: PineconeRecordInput[][] = [];
  readonly queries: Parameters<PineconeIndexOps["query"]>[0][] = [];
  readonly deleted: string[][] = [];
  deleteAllCalls = 0;

  constructor(
    private readonly queryResponse: QueryResponse = { matches: [] },
    private readonly statsResponse: IndexStatsResponse = {}
  ) {}

  async upsert(records: PineconeRecordInput[]): Promise<void> {
    this.upserts.push(records);
  }

  async query(options: Parameters<PineconeIndexOps["query"]>[0]): Promise<QueryResponse> {
    this.queries.push(options);
    return this.queryResponse;
  }

  async deleteMany(ids: string[]): Promise<void> {
    this.deleted.push(ids);
  }

  async deleteAll(): Promise<void> {
    this.deleteAllCalls += 1;
  }

  async describeIndexStats(): Promise<IndexStatsResponse> {
    return this.statsResponse;
  }
}

/** In-process stand-in for the Pinecone control plane. */
export class FakePineconeClient implements PineconeControlPlane {
  readonly created: CreateIndexOptions[] = [];
  readonly connected: string[] = [];

  constructor(
    private readonly existing: string[] = [],
    readonly handle: FakePineconeIndex = new FakePineconeIndex()
  ) {}

  async listIndexes(): Promise<{ indexes: { name: string }[] }> {
    return { indexes: this.existing.map((name) => ({ name })) };
  }

  async createIndex(options: CreateIndexOptions): Promise<void> {
    this.created.push(options);
  }

  index(name: string): FakePineconeIndex {
    this.connected.push(name);
    return this.handle;
  }
}

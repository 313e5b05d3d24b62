/**
 * Centralized configuration for the RAG service.
 *
 * Environment variables are validated once with a zod schema and mapped onto a
 * typed, frozen config object:
 * - OpenAI settings (chat + embedding models, generation limits)
 * - Vector store selection (Pinecone, Postgres + pgvector, or in-memory)
 * - RAG tuning (top-K, minimum score, chunk size and overlap)
 * - HTTP port, allowed CORS origins and logging
 *
 * loadConfig() never reads process.env implicitly; entry points call
 * dotenv.config() first and pass the environment in.
 */
import { ValidationError } from "@typesLocal/AppError";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v ? v : undefined));

const DEFAULT_CORS_ORIGINS = [
  "http://localhost:3000",
  "http://127.0.0.1:3000",
  "http://localhost:8000",
  "http://127.0.0.1:8000",
].join(",");

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: z.coerce.number().int().positive().default(3000),
    CORS_ORIGINS: z
      .string()
      .default(DEFAULT_CORS_ORIGINS)
      .transform((v) =>
        v
          .split(",")
          .map((origin) => origin.trim())
          .filter(Boolean)
      ),

    OPENAI_API_KEY: z
      .string({ required_error: "OPENAI_API_KEY is missing" })
      .startsWith("sk-", 'OpenAI API key must start with "sk-"'),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    MAX_TOKENS: z.coerce.number().int().positive().default(500),
    TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

    VECTOR_STORE: z.enum(["pinecone", "pgvector", "memory"]).default("pinecone"),
    INDEX_NAME: z.string().min(1).default("portfolio-rag"),
    EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
    PINECONE_API_KEY: optionalString,
    PINECONE_CLOUD: z.enum(["aws", "gcp", "azure"]).default("aws"),
    PINECONE_REGION: z.string().min(1).default("us-east-1"),

    DB_HOST: z.string().default("localhost"),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USER: optionalString,
    DB_PASSWORD: optionalString,
    DB_NAME: optionalString,
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    DB_CONN_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

    RAG_TOP_K: z.coerce.number().int().positive().default(5),
    RAG_MIN_SCORE: z.coerce.number().min(0).max(1).default(0.7),
    CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
    EMBED_CONCURRENCY: z.coerce.number().int().positive().default(5),

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FILE: z.string().default("logs/app.log"),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be less than CHUNK_SIZE",
      });
    }

    if (
      env.VECTOR_STORE === "pinecone" &&
      (!env.PINECONE_API_KEY || env.PINECONE_API_KEY.length < 10)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["PINECONE_API_KEY"],
        message: "PINECONE_API_KEY must be provided when VECTOR_STORE=pinecone",
      });
    }
  });

export type VectorStoreKind = z.infer<typeof EnvSchema>["VECTOR_STORE"];

export interface RagSettings {
  topK: number;
  minScore: number;
  chunkSize: number;
  chunkOverlap: number;
  embedConcurrency: number;
}

export interface AppConfig {
  env: string;
  port: number;
  /** Browser origins allowed to call the API. */
  corsOrigins: string[];
  openai: {
    key: string;
    model: string;
    embeddingModel: string;
    baseUrl: string | undefined;
    timeoutMs: number;
    maxTokens: number;
    temperature: number;
  };
  vectorStore: {
    provider: VectorStoreKind;
    indexName: string;
    dimension: number;
    pinecone: {
      apiKey: string | undefined;
      cloud: "aws" | "gcp" | "azure";
      region: string;
    };
    db: {
      host: string;
      port: number;
      user: string | undefined;
      password: string | undefined;
      database: string | undefined;
      max: number;
      idleTimeoutMs: number;
      connectionTimeoutMs: number;
    };
  };
  rag: RagSettings;
  observability: {
    logLevel: "debug" | "info" | "warn" | "error";
    logFile: string | null;
  };
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, {
      issues,
    });
  }

  const e = parsed.data;

  return Object.freeze({
    env: e.NODE_ENV,
    port: e.PORT,
    corsOrigins: e.CORS_ORIGINS,
    openai: {
      key: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      embeddingModel: e.OPENAI_EMBEDDING_MODEL,
      baseUrl: e.OPENAI_BASE_URL,
      timeoutMs: e.OPENAI_TIMEOUT_MS,
      maxTokens: e.MAX_TOKENS,
      temperature: e.TEMPERATURE,
    },
    vectorStore: {
      provider: e.VECTOR_STORE,
      indexName: e.INDEX_NAME,
      dimension: e.EMBEDDING_DIMENSION,
      pinecone: {
        apiKey: e.PINECONE_API_KEY,
        cloud: e.PINECONE_CLOUD,
        region: e.PINECONE_REGION,
      },
      db: {
        host: e.DB_HOST,
        port: e.DB_PORT,
        user: e.DB_USER,
        password: e.DB_PASSWORD,
        database: e.DB_NAME,
        max: e.DB_POOL_MAX,
        idleTimeoutMs: e.DB_IDLE_TIMEOUT_MS,
        connectionTimeoutMs: e.DB_CONN_TIMEOUT_MS,
      },
    },
    rag: {
      topK: e.RAG_TOP_K,
      minScore: e.RAG_MIN_SCORE,
      chunkSize: e.CHUNK_SIZE,
      chunkOverlap: e.CHUNK_OVERLAP,
      embedConcurrency: e.EMBED_CONCURRENCY,
    },
    observability: {
      logLevel: e.LOG_LEVEL,
      logFile: e.LOG_FILE || null,
    },
  });
}

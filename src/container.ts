/**
 * Process-wide dependency container.
 *
 * Built once at startup and handed to the HTTP layer and scripts explicitly.
 * Provider adapters (OpenAI, vector index) are the only long-lived shared
 * resources; everything else is stateless.
 */
import {
  RagOrchestrator,
  type RagOrchestratorDeps,
} from "@app/rag/RagOrchestrator";
import type { AppConfig } from "@config/index";
import type { GenerationProvider } from "@domain/llm/ports";
import { Chunker } from "@domain/rag/chunker";
import type { EmbeddingProvider, IndexProvider } from "@domain/rag/ports";
import { Retriever } from "@domain/rag/retriever";
import { VectorStoreAdapter } from "@domain/rag/vectorStore";
import { createPool } from "@infrastructure/database/db";
import { OpenAIEmbeddingProvider } from "@infrastructure/llm/EmbeddingProvider";
import {
  checkOpenAIConnectivity,
  createOpenAIClient,
  OpenAIGenerationProvider,
} from "@infrastructure/llm/OpenAIAdapter";
import { InMemoryIndexProvider } from "@infrastructure/vector/InMemoryIndexProvider";
import { PgVectorIndexProvider } from "@infrastructure/vector/PgVectorIndexProvider";
import {
  createPineconeClient,
  PineconeIndexProvider,
} from "@infrastructure/vector/PineconeIndexProvider";
import { ValidationError } from "@typesLocal/AppError";

export interface Providers {
  embeddings: EmbeddingProvider;
  generator: GenerationProvider;
  index: IndexProvider<unknown>;
  /** Startup check of the model provider; logs and resolves, never throws. */
  checkConnectivity?: () => Promise<boolean>;
  /** Releases provider resources (database pool) on shutdown. */
  close?: () => Promise<void>;
}

export interface Container {
  config: AppConfig;
  store: VectorStoreAdapter<unknown>;
  retriever: Retriever;
  orchestrator: RagOrchestrator;
  checkConnectivity(): Promise<boolean>;
  close(): Promise<void>;
}

function createIndexProvider(config: AppConfig): {
  index: IndexProvider<unknown>;
  close?: () => Promise<void>;
} {
  const { vectorStore } = config;

  switch (vectorStore.provider) {
    case "pinecone": {
      if (!vectorStore.pinecone.apiKey) {
        throw new ValidationError("PINECONE_API_KEY is required for Pinecone");
      }
      return {
        index: new PineconeIndexProvider(
          createPineconeClient(vectorStore.pinecone.apiKey),
          vectorStore.pinecone
        ),
      };
    }
    case "pgvector": {
      const pool = createPool(vectorStore.db);
      return {
        index: new PgVectorIndexProvider(pool),
        close: () => pool.end(),
      };
    }
    case "memory":
      return { index: new InMemoryIndexProvider() };
  }
}

export function createProviders(config: AppConfig): Providers {
  const client = createOpenAIClient(config.openai);

  return {
    embeddings: new OpenAIEmbeddingProvider(client),
    generator: new OpenAIGenerationProvider(client),
    checkConnectivity: () =>
      checkOpenAIConnectivity(client, config.openai.embeddingModel),
    ...createIndexProvider(config),
  };
}

export function createContainer(
  config: AppConfig,
  providers: Providers = createProviders(config)
): Container {
  const store = new VectorStoreAdapter(providers.embeddings, providers.index, {
    indexName: config.vectorStore.indexName,
    dimension: config.vectorStore.dimension,
    embeddingModel: config.openai.embeddingModel,
    metric: "cosine",
    embedConcurrency: config.rag.embedConcurrency,
  });

  const retriever = new Retriever(store, {
    topK: config.rag.topK,
    minScore: config.rag.minScore,
  });

  const deps: RagOrchestratorDeps = {
    chunker: new Chunker({
      chunkSize: config.rag.chunkSize,
      chunkOverlap: config.rag.chunkOverlap,
    }),
    retriever,
    store,
    generator: providers.generator,
    settings: {
      chatModel: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
      maxTokens: config.openai.maxTokens,
      temperature: config.openai.temperature,
      rag: config.rag,
    },
  };

  return {
    config,
    store,
    retriever,
    orchestrator: new RagOrchestrator(deps),
    async checkConnectivity() {
      return providers.checkConnectivity ? providers.checkConnectivity() : true;
    },
    async close() {
      await providers.close?.();
    },
  };
}

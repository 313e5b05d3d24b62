/**
 * OpenAI embeddings implementation of the EmbeddingProvider port.
 *
 * Logging and dimension checks live in the vector store adapter; this class
 * only performs the request and validates the response shape.
 */
import type { EmbeddingProvider } from "@domain/rag/ports";
import { errorMessage } from "@infrastructure/logging/Logger";
import { EmbeddingError } from "@typesLocal/AppError";
import type OpenAI from "openai";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  constructor(private readonly client: OpenAI) {}

  async embed(
    model: string,
    input: string,
    signal?: AbortSignal
  ): Promise<number[]> {
    const response = await this.client.embeddings
      .create({ model, input }, { signal })
      .catch((error: unknown) => {
        throw new EmbeddingError(
          `OpenAI embeddings request failed: ${errorMessage(error)}`,
          { model }
        );
      });

    const first = response.data[0];

    if (!first || first.embedding.length === 0) {
      throw new EmbeddingError("Embedding API returned invalid data", { model });
    }

    return first.embedding;
  }
}

/**
 * OpenAI integration: shared client factory and the chat-completion
 * implementation of the GenerationProvider port.
 *
 * The client is created once by the dependency container and shared across
 * requests. Retries are disabled: a provider failure is final for that call.
 */
import type {
  ChatTurn,
  Completion,
  CompletionRequest,
  GenerationProvider,
} from "@domain/llm/ports";
import { errorMessage, logEvent, logger } from "@infrastructure/logging/Logger";
import { GenerationError } from "@typesLocal/AppError";
import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";

export interface OpenAIClientSettings {
  key: string;
  baseUrl: string | undefined;
  timeoutMs: number;
}

export function createOpenAIClient(settings: OpenAIClientSettings): OpenAI {
  return new OpenAI({
    apiKey: settings.key,
    baseURL: settings.baseUrl,
    timeout: settings.timeoutMs,
    maxRetries: 0,
  });
}

function toMessageParam(turn: ChatTurn): ChatCompletionMessageParam {
  switch (turn.role) {
    case "system":
      return { role: "system", content: turn.content };
    case "assistant":
      return { role: "assistant", content: turn.content };
    case "user":
      return { role: "user", content: turn.content };
  }
}

export class OpenAIGenerationProvider implements GenerationProvider {
  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest): Promise<Completion> {
    const startedAt = Date.now();

    try {
      const response = await this.client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toMessageParam),
          max_tokens: request.maxTokens,
          temperature: request.temperature,
        },
        { signal: request.signal }
      );

      const choice = response.choices[0];

      logEvent("LLM_SUCCESS", {
        model: request.model,
        durationMs: Date.now() - startedAt,
        messageCount: request.messages.length,
        finishReason: choice?.finish_reason,
        totalTokens: response.usage?.total_tokens,
      });

      return {
        text: choice?.message.content ?? "",
        model: response.model,
        finishReason: choice?.finish_reason,
      };
    } catch (error: unknown) {
      logEvent("LLM_FAILURE", {
        model: request.model,
        durationMs: Date.now() - startedAt,
        message: errorMessage(error),
        name: error instanceof Error ? error.name : undefined,
      });

      throw new GenerationError(`LLM request failed: ${errorMessage(error)}`, {
        model: request.model,
      });
    }
  }
}

/**
 * Startup connectivity check. Logs the outcome and never throws, so a missing
 * provider does not prevent the server from starting in degraded mode.
 */
export async function checkOpenAIConnectivity(
  client: OpenAI,
  embeddingModel: string
): Promise<boolean> {
  const startedAt = Date.now();

  try {
    const response = await client.embeddings.create({
      model: embeddingModel,
      input: "connectivity-check",
    });

    if (!response.data[0]?.embedding.length) {
      logger.log("error", "OpenAI connectivity check returned no embedding data");
      return false;
    }

    logger.log("info", "OpenAI connectivity OK", {
      model: embeddingModel,
      durationMs: Date.now() - startedAt,
    });
    return true;
  } catch (error: unknown) {
    logger.log("error", "OpenAI connectivity check failed", {
      message: errorMessage(error),
    });
    return false;
  }
}

/**
 * Chat HTTP controller for POST /api/chat.
 *
 * Two fallback tiers:
 * 1. The orchestrator degrades retrieval/generation failures into an
 *    apologetic response on its own.
 * 2. If the orchestrator throws anyway, answer with a plain single-turn
 *    completion without knowledge-base context.
 * Only when both fail does the request end in an error response.
 */
import type { RagOrchestrator, RagResponse } from "@app/rag/RagOrchestrator";
import { errorMessage, logger } from "@infrastructure/logging/Logger";
import {
  ChatRequestSchema,
  type ChatRequest,
  type ChatResponse,
} from "@interfaces/http/chat/schema";
import {
  parseRequest,
  requestSignal,
  type HttpReply,
  type HttpRequest,
} from "@interfaces/http/validation";
import { InfrastructureError } from "@typesLocal/AppError";
import type { NextFunction } from "express";

export function toChatResponse(result: RagResponse): ChatResponse {
  return {
    response: result.responseText,
    modelUsed: result.modelUsed,
    sourcesUsed: result.sourcesUsed,
    sources: result.sources,
  };
}

export function createChatController(
  orchestrator: Pick<RagOrchestrator, "chatWithContext" | "plainChat">
) {
  return async function chatController(
    req: HttpRequest,
    res: HttpReply,
    next: NextFunction
  ): Promise<void> {
    let request: ChatRequest;

    try {
      request = parseRequest(ChatRequestSchema, req.body);
    } catch (err: unknown) {
      next(err);
      return;
    }

    const { message, history = [] } = request;

    const signal = requestSignal(res);

    try {
      const result = await orchestrator.chatWithContext(message, history, {
        signal,
      });
      res.json(toChatResponse(result));
      return;
    } catch (err: unknown) {
      logger.log("warn", "RAG chat failed, falling back to plain completion", {
        message: errorMessage(err),
      });
    }

    try {
      const fallback = await orchestrator.plainChat(message, { signal });
      const body: ChatResponse = {
        response: fallback.responseText,
        modelUsed: fallback.modelUsed,
        sourcesUsed: 0,
        sources: [],
      };
      res.json(body);
    } catch (fallbackError: unknown) {
      next(
        new InfrastructureError(`Chat failed: ${errorMessage(fallbackError)}`, 502)
      );
    }
  };
}

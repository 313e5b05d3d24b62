/**
 * Semantic search HTTP controller for POST /api/internal/search.
 *
 * Exposes the retriever directly, without generation, for inspecting what a
 * query would put into the chat context.
 */
import type { Retriever } from "@domain/rag/retriever";
import { SearchRequestSchema } from "@interfaces/http/search/schema";
import {
  parseRequest,
  requestSignal,
  type HttpReply,
  type HttpRequest,
} from "@interfaces/http/validation";
import type { NextFunction } from "express";

export function createSearchController(retriever: Pick<Retriever, "search">) {
  return async function searchController(
    req: HttpRequest,
    res: HttpReply,
    next: NextFunction
  ): Promise<void> {
    try {
      const { query, topK, minScore } = parseRequest(
        SearchRequestSchema,
        req.body
      );

      const results = await retriever.search(query, {
        topK,
        minScore,
        signal: requestSignal(res),
      });

      res.json({ query, results });
    } catch (err: unknown) {
      next(err);
    }
  };
}

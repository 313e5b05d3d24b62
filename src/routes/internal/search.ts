import type { Retriever } from "@domain/rag/retriever";
import { createSearchController } from "@interfaces/http/SearchController";
import { Router } from "express";

/**
 * POST /api/internal/search { query, topK?, minScore? } -> { query, results }
 */
export function createSearchRouter(retriever: Retriever): Router {
  const router = Router();

  router.post("/", createSearchController(retriever));

  return router;
}

/**
 * Health check route.
 *
 * Reports the vector index lifecycle state without calling any provider, so
 * the check stays cheap and never consumes model quota.
 */
import type { VectorStoreAdapter } from "@domain/rag/vectorStore";
import { Router } from "express";

export function createHealthRouter(
  store: Pick<VectorStoreAdapter, "status">
): Router {
  const router = Router();

  router.get("/", (_req, res) => {
    res.json({
      status: "ok",
      index: store.status(),
    });
  });

  return router;
}

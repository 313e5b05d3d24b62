import type { RagOrchestrator } from "@app/rag/RagOrchestrator";
import { createKnowledgeBaseController } from "@interfaces/http/KnowledgeBaseController";
import { Router } from "express";

export function createKnowledgeBaseRouter(
  orchestrator: RagOrchestrator
): Router {
  const router = Router();
  const controller = createKnowledgeBaseController(orchestrator);

  router.post("/documents", controller.ingest);
  router.get("/stats", controller.stats);
  router.delete("/", controller.clear);
  router.delete("/entries/:id", controller.deleteEntry);

  return router;
}

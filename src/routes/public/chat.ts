import type { RagOrchestrator } from "@app/rag/RagOrchestrator";
import { createChatController } from "@interfaces/http/ChatController";
import { Router } from "express";

export function createChatRouter(orchestrator: RagOrchestrator): Router {
  const router = Router();

  router.post("/", createChatController(orchestrator));

  return router;
}

/**
 * Route registration for the RAG service API.
 *
 * - GET    /api/health                          liveness + index state
 * - POST   /api/chat                            retrieval-augmented chat
 * - POST   /api/knowledge-base/documents        ingest documents
 * - GET    /api/knowledge-base/stats            knowledge-base statistics
 * - DELETE /api/knowledge-base                  clear every stored vector
 * - DELETE /api/knowledge-base/entries/:id      delete one stored vector
 * - POST   /api/internal/search                 raw retrieval results
 */
import type { Container } from "@container";
import { createSearchRouter } from "@routes/internal/search";
import { createChatRouter } from "@routes/public/chat";
import { createHealthRouter } from "@routes/public/health";
import { createKnowledgeBaseRouter } from "@routes/public/knowledgeBase";
import type { Express } from "express";

export function registerRoutes(app: Express, container: Container): void {
  app.use("/api/health", createHealthRouter(container.store));
  app.use("/api/chat", createChatRouter(container.orchestrator));
  app.use(
    "/api/knowledge-base",
    createKnowledgeBaseRouter(container.orchestrator)
  );
  app.use("/api/internal/search", createSearchRouter(container.retriever));
}

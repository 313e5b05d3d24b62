/**
 * Knowledge-base HTTP controller: document ingestion, stats, clearing and
 * single-entry deletion.
 */
import type { RagOrchestrator } from "@app/rag/RagOrchestrator";
import {
  EntryParamsSchema,
  IngestRequestSchema,
} from "@interfaces/http/knowledgeBase/schema";
import {
  parseRequest,
  requestSignal,
  type HttpReply,
  type HttpRequest,
} from "@interfaces/http/validation";
import type { NextFunction } from "express";

type KnowledgeBaseOperations = Pick<
  RagOrchestrator,
  "addDocuments" | "getStats" | "clearKnowledgeBase" | "deleteEntry"
>;

export function createKnowledgeBaseController(
  orchestrator: KnowledgeBaseOperations
) {
  return {
    async ingest(
      req: HttpRequest,
      res: HttpReply,
      next: NextFunction
    ): Promise<void> {
      try {
        const { documents } = parseRequest(IngestRequestSchema, req.body);
        const success = await orchestrator.addDocuments(documents, {
          signal: requestSignal(res),
        });

        res.status(success ? 200 : 502).json({
          success,
          documents: documents.length,
        });
      } catch (err: unknown) {
        next(err);
      }
    },

    async stats(
      _req: HttpRequest,
      res: HttpReply,
      next: NextFunction
    ): Promise<void> {
      try {
        const stats = await orchestrator.getStats({
          signal: requestSignal(res),
        });

        if ("error" in stats) {
          res.status(500).json({
            error: `Failed to get knowledge base stats: ${stats.error}`,
          });
          return;
        }

        res.json(stats);
      } catch (err: unknown) {
        next(err);
      }
    },

    async clear(
      _req: HttpRequest,
      res: HttpReply,
      next: NextFunction
    ): Promise<void> {
      try {
        const success = await orchestrator.clearKnowledgeBase({
          signal: requestSignal(res),
        });
        res.status(success ? 200 : 502).json({ success });
      } catch (err: unknown) {
        next(err);
      }
    },

    async deleteEntry(
      req: HttpRequest,
      res: HttpReply,
      next: NextFunction
    ): Promise<void> {
      try {
        const { id } = parseRequest(EntryParamsSchema, req.params);
        const success = await orchestrator.deleteEntry(id, {
          signal: requestSignal(res),
        });
        res.status(success ? 200 : 502).json({ success, id });
      } catch (err: unknown) {
        next(err);
      }
    },
  };
}

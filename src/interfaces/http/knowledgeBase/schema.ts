import { z } from "zod";

/**
 * DTOs for the knowledge-base endpoints (ingest, stats, clear, delete entry).
 */
export const DocumentSchema = z.object({
  id: z.string().trim().min(1),
  text: z.string().trim().min(1),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
});

export const IngestRequestSchema = z.object({
  documents: z.array(DocumentSchema).min(1),
});

export const EntryParamsSchema = z.object({
  id: z.string().min(1),
});

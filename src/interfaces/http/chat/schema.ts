import { z } from "zod";

/**
 * Request/response DTOs for POST /api/chat.
 *
 * History is caller-supplied on every request; the service never stores it.
 */
export const ChatTurnSchema = z.object({
  role: z.enum(["system", "user", "assistant"]),
  content: z.string(),
});

export const ChatRequestSchema = z.object({
  message: z.string().trim().min(1),
  history: z.array(ChatTurnSchema).optional(),
});

export const SourceSchema = z.object({
  id: z.string(),
  score: z.number(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])),
});

export const ChatResponseSchema = z.object({
  response: z.string(),
  modelUsed: z.string(),
  sourcesUsed: z.number().int().min(0),
  sources: z.array(SourceSchema),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;
export type ChatResponse = z.infer<typeof ChatResponseSchema>;

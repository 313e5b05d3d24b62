import { z } from "zod";

/**
 * DTOs for POST /api/internal/search, which exposes raw retrieval results for
 * tuning top-K and the minimum score.
 */
export const SearchRequestSchema = z.object({
  query: z.string().trim().min(1),
  topK: z.number().int().positive().max(100).optional(),
  minScore: z.number().min(0).max(1).optional(),
});

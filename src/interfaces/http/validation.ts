import { ValidationError } from "@typesLocal/AppError";
import type { z } from "zod";

/** Request surface the controllers read; express's Request satisfies it. */
export interface HttpRequest {
  body: unknown;
  params: Record<string, string>;
}

/** Response surface the controllers write; express's Response satisfies it. */
export interface HttpReply {
  readonly writableFinished: boolean;
  status(code: number): HttpReply;
  json(body: unknown): unknown;
  on(event: "close", listener: () => void): unknown;
}

/** Parses a request payload, turning zod issues into a 400 ValidationError. */
export function parseRequest<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  payload: unknown
): z.infer<TSchema> {
  const parsed = schema.safeParse(payload);

  if (!parsed.success) {
    throw new ValidationError("Invalid request", {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/**
 * AbortSignal that fires when the client goes away before the response is
 * written, so abandoned requests stop consuming provider quota.
 */
export function requestSignal(res: HttpReply): AbortSignal {
  const controller = new AbortController();

  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort(new Error("Client closed the request"));
    }
  });

  return controller.signal;
}

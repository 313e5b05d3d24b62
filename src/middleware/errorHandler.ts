/**
 * Global error handling middleware.
 *
 * Converts anything thrown or passed to next() into a JSON error body
 * `{ error: { message, code, details } }` with the error's status code, and
 * logs it with its metadata.
 */
import { logger } from "@infrastructure/logging/Logger";
import {
  InfrastructureError,
  isAppError,
  type AppError,
} from "@typesLocal/AppError";
import type { HttpReply } from "@interfaces/http/validation";
import type { NextFunction } from "express";

export function toAppError(err: unknown): AppError {
  if (isAppError(err)) {
    return err;
  }

  const message =
    err instanceof Error && err.message ? err.message : "Internal Server Error";

  const statusCode =
    err &&
    typeof err === "object" &&
    "statusCode" in err &&
    typeof err.statusCode === "number"
      ? err.statusCode
      : 500;

  return new InfrastructureError(message, statusCode, {
    originalError: String(err),
  });
}

export function errorHandler(
  err: unknown,
  _req: unknown,
  res: HttpReply,
  _next: NextFunction
): void {
  const appError = toAppError(err);
  const status = appError.statusCode ?? 500;

  logger.log(status >= 500 ? "error" : "warn", "Request failed", {
    type: appError.type,
    statusCode: status,
    message: appError.message,
    metadata: appError.metadata ? JSON.stringify(appError.metadata) : undefined,
  });

  res.status(status).json({
    error: {
      message: appError.message,
      code: appError.type,
      details: appError.metadata ?? {},
    },
  });
}

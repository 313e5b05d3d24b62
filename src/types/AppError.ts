/**
 * Error hierarchy shared by the domain, infrastructure and HTTP layers.
 *
 * Only input errors, embedding errors and generation errors are thrown across
 * component boundaries. Vector-index failures are reported as StoreOutcome
 * values instead (see domain/rag/types.ts).
 */
export type AppErrorType =
  | "InfrastructureError"
  | "AppError"
  | "ValidationError"
  | "EmbeddingError"
  | "GenerationError";

export interface AppErrorMetadata {
  [key: string]: unknown;
}

export class AppError extends Error {
  public readonly type: AppErrorType;
  public readonly statusCode: number | undefined;
  public readonly metadata: AppErrorMetadata | undefined;

  constructor(
    message: string,
    type: AppErrorType = "AppError",
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message);
    this.name = new.target.name;
    this.type = type;
    this.statusCode = statusCode;
    this.metadata = metadata;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class InfrastructureError extends AppError {
  constructor(
    message: string,
    statusCode?: number,
    metadata?: AppErrorMetadata
  ) {
    super(message, "InfrastructureError", statusCode, metadata);
  }
}

export class ValidationError extends AppError {
  constructor(
    message: string,
    statusOrMeta: number | AppErrorMetadata = 400,
    metadata?: AppErrorMetadata
  ) {
    if (typeof statusOrMeta === "number") {
      super(message, "ValidationError", statusOrMeta, metadata);
    } else {
      super(message, "ValidationError", 400, statusOrMeta);
    }
  }
}

/** The embedding provider rejected or failed a request. Always propagated. */
export class EmbeddingError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "EmbeddingError", 502, metadata);
  }
}

/** The language-model provider failed to produce a completion. */
export class GenerationError extends AppError {
  constructor(message: string, metadata?: AppErrorMetadata) {
    super(message, "GenerationError", 502, metadata);
  }
}

export function isAppError(error: unknown): error is AppError {
  if (!error || typeof error !== "object") {
    return false;
  }

  return (
    error instanceof AppError ||
    ("message" in error &&
      typeof error.message === "string" &&
      "type" in error &&
      typeof error.type === "string")
  );
}

import type { ZodError } from "zod";

export type RetrievalErrorCode =
  | "INVALID_CONFIGURATION"
  | "DOCUMENT_UNREADABLE"
  | "EMBEDDING_SERVICE_ERROR"
  | "INDEX_NOT_READY"
  | "INVALID_METHOD";

export abstract class RetrievalError extends Error {
  abstract readonly code: RetrievalErrorCode;
  readonly retryable: boolean = false;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad chunking, weight or threshold parameters. A caller bug; never retried. */
export class InvalidConfigurationError extends RetrievalError {
  readonly code = "INVALID_CONFIGURATION";

  static fromZod(error: ZodError, context: string): InvalidConfigurationError {
    const details = error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return new InvalidConfigurationError(`${context}: ${details}`, {
      cause: error,
    });
  }
}

export class DocumentUnreadableError extends RetrievalError {
  readonly code = "DOCUMENT_UNREADABLE";

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Document "${path}" is unreadable: ${reason}`, options);
  }
}

export class EmbeddingServiceError extends RetrievalError {
  readonly code = "EMBEDDING_SERVICE_ERROR";
  override readonly retryable = true;
}

export class IndexNotReadyError extends RetrievalError {
  readonly code = "INDEX_NOT_READY";
}

export class InvalidMethodError extends RetrievalError {
  readonly code = "INVALID_METHOD";

  constructor(readonly method: string) {
    super(
      `Unknown retrieval method "${method}". Expected one of: dense, sparse, hybrid`,
    );
  }
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

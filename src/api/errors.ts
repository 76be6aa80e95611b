import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { RetrievalErrorCode } from "../errors";
import { errorMessage, isRetrievalError } from "../errors";
import { createLogger } from "../utils/logger";

export type ErrorStatus = 400 | 404 | 422 | 500 | 502 | 503;

export const STATUS_BY_CODE: Record<RetrievalErrorCode, ErrorStatus> = {
  INVALID_METHOD: 400,
  INVALID_CONFIGURATION: 400,
  DOCUMENT_UNREADABLE: 422,
  EMBEDDING_SERVICE_ERROR: 502,
  INDEX_NOT_READY: 503,
};

const log = createLogger("api");

export function statusFor(error: unknown): ErrorStatus {
  if (isRetrievalError(error)) return STATUS_BY_CODE[error.code];
  if (error instanceof HTTPException) {
    switch (error.status) {
      case 400:
      case 404:
      case 422:
      case 502:
      case 503:
        return error.status;
    }
  }
  return 500;
}

export function handleError(error: Error, c: Context): Response {
  const status = statusFor(error);
  if (status === 500) {
    log.error(`Unhandled error on ${c.req.method} ${c.req.path}`, error);
  }
  return c.json(
    {
      success: false as const,
      error: status === 500 ? "Internal server error" : errorMessage(error),
      code: isRetrievalError(error) ? error.code : undefined,
    },
    status,
  );
}

import { createRoute } from "@hono/zod-openapi";
import {
  AskRequestSchema,
  AskResponseSchema,
  ChatRequestSchema,
  ChatResponseSchema,
  ErrorSchema,
  HealthResponseSchema,
  IngestQuerySchema,
  IngestResponseSchema,
  RetrieveRequestSchema,
  RetrieveResponseSchema,
  SessionDeletedSchema,
  SessionParamsSchema,
  SessionResponseSchema,
  StatsResponseSchema,
} from "../schemas/api";

const errorContent = { content: { "application/json": { schema: ErrorSchema } } };

const retrievalErrors = {
  400: { description: "Invalid method or parameters", ...errorContent },
  502: { description: "Embedding service failed", ...errorContent },
  503: { description: "Index not ready", ...errorContent },
};

export const healthRoute = createRoute({
  method: "get",
  path: "/health",
  tags: ["System"],
  summary: "Health check",
  responses: {
    200: {
      description: "Service healthy",
      content: { "application/json": { schema: HealthResponseSchema } },
    },
  },
});

export const statsRoute = createRoute({
  method: "get",
  path: "/api/stats",
  tags: ["System"],
  summary: "Index and session statistics",
  responses: {
    200: {
      description: "Current statistics",
      content: { "application/json": { schema: StatsResponseSchema } },
    },
    503: { description: "Index not ready", ...errorContent },
  },
});

export const retrieveRoute = createRoute({
  method: "post",
  path: "/api/retrieve",
  tags: ["Query"],
  summary: "Retrieve passages",
  description:
    "Runs dense, sparse or hybrid retrieval and reports whether the top result clears the relevance threshold.",
  request: {
    body: { content: { "application/json": { schema: RetrieveRequestSchema } } },
  },
  responses: {
    200: {
      description: "Ranked passages",
      content: { "application/json": { schema: RetrieveResponseSchema } },
    },
    ...retrievalErrors,
  },
});

export const askRoute = createRoute({
  method: "post",
  path: "/api/ask",
  tags: ["Query"],
  summary: "Ask a medical question",
  description:
    "Answers from the knowledge base when retrieval is sufficient, otherwise from a web search.",
  request: {
    body: { content: { "application/json": { schema: AskRequestSchema } } },
  },
  responses: {
    200: {
      description: "Answer generated",
      content: { "application/json": { schema: AskResponseSchema } },
    },
    400: { description: "Bad request", ...errorContent },
  },
});

export const chatRoute = createRoute({
  method: "post",
  path: "/api/chat",
  tags: ["Chat"],
  summary: "Send a message to the assistant",
  description:
    "Starts a session when no sessionId is given. The receptionist identifies the patient and routes medical questions to the clinical agent.",
  request: {
    body: { content: { "application/json": { schema: ChatRequestSchema } } },
  },
  responses: {
    200: {
      description: "Assistant reply",
      content: { "application/json": { schema: ChatResponseSchema } },
    },
    404: { description: "Unknown session", ...errorContent },
  },
});

export const sessionRoute = createRoute({
  method: "get",
  path: "/api/chat/{sessionId}",
  tags: ["Chat"],
  summary: "Session status and conversation log",
  request: { params: SessionParamsSchema },
  responses: {
    200: {
      description: "Session state",
      content: { "application/json": { schema: SessionResponseSchema } },
    },
    404: { description: "Unknown session", ...errorContent },
  },
});

export const deleteSessionRoute = createRoute({
  method: "delete",
  path: "/api/chat/{sessionId}",
  tags: ["Chat"],
  summary: "End a chat session",
  request: { params: SessionParamsSchema },
  responses: {
    200: {
      description: "Session ended",
      content: { "application/json": { schema: SessionDeletedSchema } },
    },
    404: { description: "Unknown session", ...errorContent },
  },
});

export const ingestPdfRoute = createRoute({
  method: "post",
  path: "/api/ingest/pdf",
  tags: ["Ingestion"],
  summary: "Rebuild the index from a PDF",
  description:
    "Send the PDF bytes as the request body. The index is rebuilt and swapped in once the build succeeds.",
  request: {
    query: IngestQuerySchema,
    body: {
      content: {
        "application/pdf": { schema: { type: "string", format: "binary" } },
      },
    },
  },
  responses: {
    200: {
      description: "Index rebuilt",
      content: { "application/json": { schema: IngestResponseSchema } },
    },
    400: { description: "Empty body", ...errorContent },
    422: { description: "Unreadable document", ...errorContent },
    502: { description: "Embedding service failed", ...errorContent },
  },
});

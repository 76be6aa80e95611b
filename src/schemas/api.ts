import { z } from "@hono/zod-openapi";
import { PatientRecordSchema } from "./patient";

export const ErrorSchema = z.object({
  success: z.literal(false),
  error: z.string(),
  code: z.string().optional(),
});

export const HealthResponseSchema = z.object({
  status: z.string(),
  version: z.string(),
  uptime: z.number(),
  indexReady: z.boolean(),
});

export const RetrieveRequestSchema = z.object({
  query: z.string().min(1).openapi({ example: "What are the stages of chronic kidney disease?" }),
  k: z.number().int().positive().optional().openapi({ example: 5 }),
  method: z.string().optional().openapi({ example: "hybrid" }),
});

export const RetrievalResultSchema = z.object({
  method: z.enum(["dense", "sparse", "hybrid"]),
  chunkId: z.string(),
  text: z.string(),
  source: z.string(),
  page: z.number(),
  offset: z.number(),
  denseScore: z.number().optional(),
  sparseScore: z.number().optional(),
  fusedScore: z.number(),
});

export const RetrieveResponseSchema = z.object({
  success: z.literal(true),
  results: z.array(RetrievalResultSchema),
  sufficient: z.boolean(),
  context: z.string(),
});

export const WebSearchHitSchema = z.object({
  title: z.string(),
  url: z.string(),
  snippet: z.string(),
});

export const ClinicalAnswerSchema = z.object({
  answer: z.string(),
  sourceType: z.enum([
    "knowledge_base",
    "web_search",
    "web_search_failed",
    "knowledge_base_unavailable",
    "error",
  ]),
  knowledgeSources: z.array(
    z.object({
      index: z.number(),
      chunkId: z.string(),
      source: z.string(),
      page: z.number(),
      relevance: z.number(),
      method: z.enum(["dense", "sparse", "hybrid"]),
    }),
  ),
  webSources: z.array(WebSearchHitSchema),
  success: z.boolean(),
  error: z.string().optional(),
});

export const AskRequestSchema = z.object({
  query: z.string().min(1).openapi({ example: "Can I eat high-potassium foods?" }),
  patientName: z.string().optional().openapi({ example: "Jane Doe" }),
});

export const AskResponseSchema = z.object({
  success: z.literal(true),
  answer: ClinicalAnswerSchema,
  patientFound: z.boolean(),
});

export const ChatRequestSchema = z.object({
  message: z.string().min(1).openapi({ example: "Hi, my name is Jane Doe" }),
  sessionId: z.string().optional(),
});

export const ChatResponseSchema = z.object({
  success: z.literal(true),
  sessionId: z.string(),
  greeting: z.string().optional(),
  response: z.string(),
  currentAgent: z.enum(["receptionist", "clinical"]).nullable(),
  action: z.string(),
  clinical: ClinicalAnswerSchema.optional(),
  patient: PatientRecordSchema.optional(),
});

export const SessionParamsSchema = z.object({
  sessionId: z.string().openapi({ param: { name: "sessionId", in: "path" } }),
});

export const SessionResponseSchema = z.object({
  success: z.literal(true),
  status: z.object({
    sessionId: z.string(),
    sessionActive: z.boolean(),
    currentAgent: z.enum(["receptionist", "clinical"]),
    patientIdentified: z.boolean(),
    patientName: z.string().nullable(),
    conversationLength: z.number(),
  }),
  log: z.array(
    z.object({
      agent: z.enum(["receptionist", "clinical"]),
      messageType: z.enum(["greeting", "user_input", "response"]),
      content: z.string(),
      metadata: z.record(z.string(), z.unknown()),
      timestamp: z.string(),
    }),
  ),
});

export const SessionDeletedSchema = z.object({
  success: z.literal(true),
  sessionId: z.string(),
});

export const IngestQuerySchema = z.object({
  source: z.string().optional().openapi({ example: "nephrology-reference.pdf" }),
});

export const IngestResponseSchema = z.object({
  success: z.literal(true),
  result: z.object({
    sources: z.array(z.string()),
    chunkCount: z.number(),
    dimensions: z.number(),
    modelId: z.string(),
    location: z.string(),
    processingTimeMs: z.number(),
  }),
  message: z.string(),
});

export const StatsResponseSchema = z.object({
  success: z.literal(true),
  index: z.object({
    chunkCount: z.number(),
    denseEntries: z.number(),
    sparseTerms: z.number(),
    dimensions: z.number(),
    modelId: z.string(),
    sources: z.array(z.string()),
  }),
  patients: z.number(),
  sessions: z.number(),
});

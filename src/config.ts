import type OpenAI from "openai";
import { z } from "zod";
import { InvalidConfigurationError } from "./errors";

export const RETRIEVAL_METHODS = ["dense", "sparse", "hybrid"] as const;
export const WEIGHT_TOLERANCE = 1e-6;

export const Bm25ConfigSchema = z.object({
  k1: z.number().nonnegative().optional(),
  b: z.number().min(0).max(1).optional(),
});

export const ChunkingConfigSchema = z.object({
  chunkSize: z.number().int().positive().optional(),
  chunkOverlap: z.number().int().nonnegative().optional(),
  pageSeparator: z.string().optional(),
});

export const RetrievalConfigSchema = z.object({
  topK: z.number().int().positive().optional(),
  method: z.enum(RETRIEVAL_METHODS).optional(),
  denseWeight: z.number().min(0).max(1).optional(),
  sparseWeight: z.number().min(0).max(1).optional(),
  threshold: z.number().min(0).max(1).optional(),
  overFetchFactor: z.number().int().positive().optional(),
  bm25: Bm25ConfigSchema.optional(),
});

export const ModelConfigSchema = z.object({
  chatModel: z.string().optional(),
  embeddingModel: z.string().optional(),
  embeddingDimensions: z.number().int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
  maxRetries: z.number().int().nonnegative().optional(),
  embeddingTimeoutMs: z.number().int().positive().optional(),
});

export const ProviderConfigSchema = z.object({
  apiKey: z.string().optional(),
  baseURL: z.string().url().optional(),
});

export const StorageConfigSchema = z.discriminatedUnion("driver", [
  z.object({
    driver: z.literal("file"),
    indexDir: z.string(),
  }),
  z.object({
    driver: z.literal("postgres"),
    connectionString: z.string(),
    indexName: z.string().default("default"),
  }),
]);

export const SessionConfigSchema = z.object({
  maxSessions: z.number().int().positive().optional(),
  idleTtlMs: z.number().int().positive().optional(),
});

export const AppConfigSchema = z.object({
  llm: ProviderConfigSchema.optional(),
  embedding: ProviderConfigSchema.optional(),
  models: ModelConfigSchema.optional(),
  chunking: ChunkingConfigSchema.optional(),
  retrieval: RetrievalConfigSchema.optional(),
  storage: StorageConfigSchema,
  sessions: SessionConfigSchema.optional(),
  patientsFile: z.string().optional(),
  port: z.number().int().positive().optional(),
});

export type RetrievalMethod = (typeof RETRIEVAL_METHODS)[number];
export type Bm25ConfigInput = z.infer<typeof Bm25ConfigSchema>;
export type ChunkingConfigInput = z.infer<typeof ChunkingConfigSchema>;
export type RetrievalConfigInput = z.infer<typeof RetrievalConfigSchema>;
export type ModelConfigInput = z.infer<typeof ModelConfigSchema>;
export type ProviderConfig = z.infer<typeof ProviderConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type SessionConfigInput = z.infer<typeof SessionConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export interface AppConfigWithClients extends AppConfig {
  chatClient?: OpenAI;
  embeddingClient?: OpenAI;
}

export interface ResolvedBm25Config {
  k1: number;
  b: number;
}

export interface ResolvedChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
  pageSeparator: string;
}

export interface ResolvedRetrievalConfig {
  topK: number;
  method: RetrievalMethod;
  denseWeight: number;
  sparseWeight: number;
  threshold: number;
  overFetchFactor: number;
  bm25: ResolvedBm25Config;
}

/** Chat sessions live in memory; idle ones expire and the oldest go first at the cap. */
export interface ResolvedSessionConfig {
  maxSessions: number;
  idleTtlMs: number;
}

export interface ResolvedModelConfig {
  chatModel: string;
  embeddingModel: string;
  embeddingDimensions?: number;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  embeddingTimeoutMs: number;
}

export const DEFAULT_BM25_CONFIG: ResolvedBm25Config = {
  k1: 1.5,
  b: 0.75,
};

export const DEFAULT_CHUNKING_CONFIG: ResolvedChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  pageSeparator: "",
};

export const DEFAULT_RETRIEVAL_CONFIG: ResolvedRetrievalConfig = {
  topK: 5,
  method: "hybrid",
  denseWeight: 0.7,
  sparseWeight: 0.3,
  threshold: 0.3,
  overFetchFactor: 3,
  bm25: DEFAULT_BM25_CONFIG,
};

export const DEFAULT_MODEL_CONFIG: ResolvedModelConfig = {
  chatModel: "llama-3.3-70b-versatile",
  embeddingModel: "text-embedding-3-small",
  temperature: 0.7,
  maxTokens: 2048,
  maxRetries: 3,
  embeddingTimeoutMs: 30_000,
};

export const DEFAULT_SESSION_CONFIG: ResolvedSessionConfig = {
  maxSessions: 1000,
  idleTtlMs: 30 * 60_000,
};

export const MEDICAL_DISCLAIMER = `⚠️ IMPORTANT DISCLAIMER:
This is an AI assistant for educational purposes only. The information provided should not be
considered as medical advice. Always consult with qualified healthcare professionals for personal
medical advice, diagnosis, or treatment.`;

export function isRetrievalMethod(value: string): value is RetrievalMethod {
  return RETRIEVAL_METHODS.some((method) => method === value);
}

export function resolveModelConfig(
  input?: ModelConfigInput,
): ResolvedModelConfig {
  const d = DEFAULT_MODEL_CONFIG;
  return {
    chatModel: input?.chatModel ?? d.chatModel,
    embeddingModel: input?.embeddingModel ?? d.embeddingModel,
    embeddingDimensions: input?.embeddingDimensions ?? d.embeddingDimensions,
    temperature: input?.temperature ?? d.temperature,
    maxTokens: input?.maxTokens ?? d.maxTokens,
    maxRetries: input?.maxRetries ?? d.maxRetries,
    embeddingTimeoutMs: input?.embeddingTimeoutMs ?? d.embeddingTimeoutMs,
  };
}

export function resolveSessionConfig(
  input?: SessionConfigInput,
): ResolvedSessionConfig {
  return {
    maxSessions: input?.maxSessions ?? DEFAULT_SESSION_CONFIG.maxSessions,
    idleTtlMs: input?.idleTtlMs ?? DEFAULT_SESSION_CONFIG.idleTtlMs,
  };
}

export function resolveChunkingConfig(
  input?: ChunkingConfigInput,
): ResolvedChunkingConfig {
  const d = DEFAULT_CHUNKING_CONFIG;
  const resolved = {
    chunkSize: input?.chunkSize ?? d.chunkSize,
    chunkOverlap: input?.chunkOverlap ?? d.chunkOverlap,
    pageSeparator: input?.pageSeparator ?? d.pageSeparator,
  };
  validateChunking(resolved.chunkSize, resolved.chunkOverlap);
  return resolved;
}

export function resolveRetrievalConfig(
  input?: RetrievalConfigInput,
): ResolvedRetrievalConfig {
  const d = DEFAULT_RETRIEVAL_CONFIG;
  const resolved: ResolvedRetrievalConfig = {
    topK: input?.topK ?? d.topK,
    method: input?.method ?? d.method,
    denseWeight: input?.denseWeight ?? d.denseWeight,
    sparseWeight: input?.sparseWeight ?? d.sparseWeight,
    threshold: input?.threshold ?? d.threshold,
    overFetchFactor: input?.overFetchFactor ?? d.overFetchFactor,
    bm25: {
      k1: input?.bm25?.k1 ?? d.bm25.k1,
      b: input?.bm25?.b ?? d.bm25.b,
    },
  };
  validateWeights(resolved.denseWeight, resolved.sparseWeight);
  return resolved;
}

export function validateChunking(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(
      `chunkSize must be a positive integer, got ${chunkSize}`,
    );
  }
  if (
    !Number.isInteger(chunkOverlap) ||
    chunkOverlap < 0 ||
    chunkOverlap >= chunkSize
  ) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be an integer in [0, chunkSize), got ${chunkOverlap} for chunkSize ${chunkSize}`,
    );
  }
}

export function validateWeights(denseWeight: number, sparseWeight: number): void {
  for (const [name, weight] of [
    ["denseWeight", denseWeight],
    ["sparseWeight", sparseWeight],
  ] as const) {
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new InvalidConfigurationError(
        `${name} must be within [0, 1], got ${weight}`,
      );
    }
  }
  if (Math.abs(denseWeight + sparseWeight - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidConfigurationError(
      `denseWeight + sparseWeight must equal 1.0, got ${denseWeight + sparseWeight}`,
    );
  }
}

export function parseAppConfig(input: unknown): AppConfig {
  const result = AppConfigSchema.safeParse(input);
  if (!result.success) {
    throw InvalidConfigurationError.fromZod(result.error, "Invalid configuration");
  }
  return result.data;
}

type Env = Record<string, string | undefined>;

function numberFrom(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function stringFrom(env: Env, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/** Maps environment variables onto {@link AppConfigSchema}. */
export function loadConfigFromEnv(env: Env = process.env): AppConfig {
  const driver = stringFrom(env, "INDEX_DRIVER") ?? "file";
  const storage =
    driver === "postgres"
      ? {
          driver,
          connectionString: stringFrom(env, "POSTGRES_URL"),
          indexName: stringFrom(env, "INDEX_NAME"),
        }
      : { driver, indexDir: stringFrom(env, "INDEX_DIR") ?? "./data/index" };

  const method = stringFrom(env, "RETRIEVAL_METHOD");

  return parseAppConfig({
    llm: {
      apiKey: stringFrom(env, "LLM_API_KEY") ?? stringFrom(env, "GROQ_API_KEY"),
      baseURL: stringFrom(env, "LLM_BASE_URL"),
    },
    embedding: {
      apiKey:
        stringFrom(env, "EMBEDDING_API_KEY") ?? stringFrom(env, "OPENAI_API_KEY"),
      baseURL: stringFrom(env, "EMBEDDING_BASE_URL"),
    },
    models: {
      chatModel: stringFrom(env, "CHAT_MODEL"),
      embeddingModel: stringFrom(env, "EMBEDDING_MODEL"),
      embeddingDimensions: numberFrom(env, "EMBEDDING_DIMENSIONS"),
      temperature: numberFrom(env, "TEMPERATURE"),
    },
    chunking: {
      chunkSize: numberFrom(env, "CHUNK_SIZE"),
      chunkOverlap: numberFrom(env, "CHUNK_OVERLAP"),
    },
    retrieval: {
      topK: numberFrom(env, "TOP_K"),
      method,
      denseWeight: numberFrom(env, "DENSE_WEIGHT"),
      sparseWeight: numberFrom(env, "SPARSE_WEIGHT"),
      threshold: numberFrom(env, "SIMILARITY_THRESHOLD"),
    },
    storage,
    sessions: {
      maxSessions: numberFrom(env, "MAX_SESSIONS"),
      idleTtlMs: numberFrom(env, "SESSION_IDLE_TTL_MS"),
    },
    patientsFile: stringFrom(env, "PATIENTS_FILE"),
    port: numberFrom(env, "PORT"),
  });
}

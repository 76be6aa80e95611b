import { randomUUID } from "node:crypto";
import OpenAI from "openai";
import type {
  AppConfigWithClients,
  ResolvedRetrievalConfig,
  ResolvedSessionConfig,
  SessionConfigInput,
} from "./config";
import {
  resolveChunkingConfig,
  resolveModelConfig,
  resolveRetrievalConfig,
  resolveSessionConfig,
} from "./config";
import { createIndexStore } from "./db";
import { IndexNotReadyError, InvalidConfigurationError } from "./errors";
import type {
  IEmbedder,
  IIndexStore,
  IIngestionResult,
  ILanguageModel,
  ISourceDocument,
  IWebSearchProvider,
} from "./interfaces";
import { KnowledgeBase } from "./KnowledgeBase";
import {
  AgentRouter,
  ClinicalAgent,
  DuckDuckGoSearchProvider,
  OpenAIChatModel,
  ReceptionistAgent,
  WebSearchAgent,
} from "./modules/agents";
import { OpenAIEmbedder } from "./modules/embedding";
import { IngestionPipeline } from "./modules/ingestion";
import { PdfDocumentLoader } from "./modules/loaders";
import { PatientRepository } from "./modules/patients";
import { createLogger } from "./utils/logger";

export type DocumentParser = (
  data: Uint8Array,
  source: string,
) => Promise<ISourceDocument>;

/** Replaceable collaborators; anything omitted is built from the config. */
export interface ServiceOverrides {
  embedder?: IEmbedder;
  llm?: ILanguageModel;
  searchProvider?: IWebSearchProvider;
  store?: IIndexStore;
  patients?: PatientRepository;
  parsePdf?: DocumentParser;
}

export interface AppServices {
  knowledgeBase: KnowledgeBase;
  patients: PatientRepository;
  clinical: ClinicalAgent;
  retrieval: ResolvedRetrievalConfig;
  sessions: SessionStore;
  ingestDocument(data: Uint8Array, source: string): Promise<IIngestionResult>;
}

const log = createLogger("app");

interface SessionEntry {
  router: AgentRouter;
  lastUsed: number;
}

export interface SessionStoreOptions extends SessionConfigInput {
  now?: () => number;
}

/**
 * In-memory chat sessions. Sessions idle for longer than `idleTtlMs` are
 * dropped on the next access, and creating one past `maxSessions` evicts the
 * least recently used.
 */
export class SessionStore {
  // Map order is least recently used first.
  private sessions = new Map<string, SessionEntry>();
  private config: ResolvedSessionConfig;
  private now: () => number;

  constructor(
    private readonly factory: (sessionId: string) => AgentRouter,
    options: SessionStoreOptions = {},
  ) {
    this.config = resolveSessionConfig(options);
    this.now = options.now ?? Date.now;
  }

  get(sessionId: string): AgentRouter | undefined {
    this.prune();
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;

    this.sessions.delete(sessionId);
    entry.lastUsed = this.now();
    this.sessions.set(sessionId, entry);
    return entry.router;
  }

  create(sessionId: string = randomUUID()): AgentRouter {
    this.prune();
    while (this.sessions.size >= this.config.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.end(oldest.value, "evicted");
    }

    const router = this.factory(sessionId);
    this.sessions.set(sessionId, { router, lastUsed: this.now() });
    return router;
  }

  delete(sessionId: string): boolean {
    return this.end(sessionId, "ended");
  }

  get size(): number {
    this.prune();
    return this.sessions.size;
  }

  private prune(): void {
    const cutoff = this.now() - this.config.idleTtlMs;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.lastUsed > cutoff) break;
      this.end(sessionId, "expired");
    }
  }

  private end(sessionId: string, reason: string): boolean {
    const entry = this.sessions.get(sessionId);
    if (!entry) return false;
    entry.router.resetSession();
    this.sessions.delete(sessionId);
    log.info(`Session ${sessionId} ${reason}`);
    return true;
  }
}

function chatClient(config: AppConfigWithClients): OpenAI | undefined {
  if (config.chatClient) return config.chatClient;
  if (!config.llm?.apiKey) return undefined;
  return new OpenAI({
    apiKey: config.llm.apiKey,
    baseURL: config.llm.baseURL ?? "https://api.groq.com/openai/v1",
  });
}

function embeddingClient(config: AppConfigWithClients): OpenAI | undefined {
  if (config.embeddingClient) return config.embeddingClient;
  if (!config.embedding?.apiKey) return undefined;
  return new OpenAI({
    apiKey: config.embedding.apiKey,
    baseURL: config.embedding.baseURL,
  });
}

/**
 * Wires the knowledge base, patient records and agents together. A missing
 * index is not fatal: the service starts and answers retrieval calls with
 * `IndexNotReady` until an ingestion succeeds.
 */
export async function createServices(
  config: AppConfigWithClients,
  overrides: ServiceOverrides = {},
): Promise<AppServices> {
  const models = resolveModelConfig(config.models);
  const retrieval = resolveRetrievalConfig(config.retrieval);
  const chunking = resolveChunkingConfig(config.chunking);

  const embedder = overrides.embedder ?? createEmbedder(config);
  const llm = overrides.llm ?? createChatModel(config);
  const store = overrides.store ?? createIndexStore(config.storage);
  const patients =
    overrides.patients ??
    (config.patientsFile
      ? await PatientRepository.fromFile(config.patientsFile)
      : new PatientRepository());

  const knowledgeBase = new KnowledgeBase({
    store,
    embedder,
    retrieval,
  });
  try {
    await knowledgeBase.reload();
  } catch (error) {
    if (!(error instanceof IndexNotReadyError)) throw error;
    log.warn(`Starting without an index: ${error.message}`);
  }

  const webSearch = new WebSearchAgent({
    provider: overrides.searchProvider ?? new DuckDuckGoSearchProvider(),
    llm,
  });
  const clinical = new ClinicalAgent({
    knowledgeBase,
    llm,
    webSearch,
    topK: retrieval.topK,
    method: retrieval.method,
    threshold: retrieval.threshold,
  });

  const sessions = new SessionStore(
    (sessionId) =>
      new AgentRouter({
        sessionId,
        receptionist: new ReceptionistAgent({ llm, patients }),
        clinical,
      }),
    config.sessions,
  );

  const pipeline = new IngestionPipeline({
    store,
    embedder,
    chunking,
    bm25: retrieval.bm25,
    config: { embeddingRetries: models.maxRetries },
  });
  const pdfLoader = new PdfDocumentLoader();
  const parsePdf: DocumentParser =
    overrides.parsePdf ?? ((data, source) => pdfLoader.parse(data, source));

  return {
    knowledgeBase,
    patients,
    clinical,
    retrieval,
    sessions,
    async ingestDocument(data, source) {
      const document = await parsePdf(data, source);
      const result = await pipeline.ingest([document]);
      await knowledgeBase.reload();
      return result;
    },
  };
}

function createEmbedder(config: AppConfigWithClients): IEmbedder {
  const client = embeddingClient(config);
  if (!client) {
    throw new InvalidConfigurationError(
      "No embedding provider configured: set EMBEDDING_API_KEY or OPENAI_API_KEY",
    );
  }
  return new OpenAIEmbedder({ openaiClient: client, models: config.models });
}

function createChatModel(config: AppConfigWithClients): ILanguageModel {
  const client = chatClient(config);
  if (!client) {
    throw new InvalidConfigurationError(
      "No chat model provider configured: set LLM_API_KEY or GROQ_API_KEY",
    );
  }
  return new OpenAIChatModel({ openaiClient: client, models: config.models });
}

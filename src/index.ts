export { KnowledgeBase } from "./KnowledgeBase";
export type { KnowledgeBaseOptions } from "./KnowledgeBase";

export * from "./config";
export * from "./errors";

export { createServices, SessionStore } from "./app";
export type { AppServices, DocumentParser, ServiceOverrides } from "./app";
export { createServer } from "./api/server";

export { FileIndexStore, PostgresIndexStore, createIndexStore } from "./db";
export type { PostgresIndexStoreConfig } from "./db";

export { Chunker, DEFAULT_CHUNKER_CONFIG, chunkDocument } from "./modules/chunker";
export { OpenAIEmbedder, cosineSimilarity } from "./modules/embedding";
export { PdfDocumentLoader, TextDocumentLoader, loadDocument } from "./modules/loaders";

export {
  IngestionPipeline,
  DEFAULT_INGESTION_CONFIG,
} from "./modules/ingestion";
export type { IngestionPipelineOptions } from "./modules/ingestion";

export {
  DenseIndex,
  HybridRetriever,
  SparseIndex,
  isSufficient,
  minMaxNormalize,
  selectContext,
  tokenize,
} from "./modules/retrieval";
export type { RetrieverOptions } from "./modules/retrieval";

export {
  PatientRepository,
  formatPatientInfo,
} from "./modules/patients";
export { PatientRecordSchema } from "./schemas/patient";
export type { IPatientRecord } from "./schemas/patient";

export {
  AgentRouter,
  ClinicalAgent,
  DuckDuckGoSearchProvider,
  OpenAIChatModel,
  ReceptionistAgent,
  WebSearchAgent,
} from "./modules/agents";

export * from "./interfaces";

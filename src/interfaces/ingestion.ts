import type { IChunkerConfig, ISourceDocument } from "./chunker";

export interface IIngestionConfig {
  chunker?: Partial<IChunkerConfig>;
  embeddingBatchSize: number;
  embeddingConcurrency: number;
  embeddingRetries: number;
  retryBaseDelayMs: number;
}

export interface IIngestionResult {
  sources: string[];
  chunkCount: number;
  dimensions: number;
  modelId: string;
  location: string;
  processingTimeMs: number;
}

export interface IIngestionProgress {
  stage: "loading" | "chunking" | "embedding" | "indexing" | "storing";
  message: string;
}

export type IngestionProgressCallback = (progress: IIngestionProgress) => void;

export interface IIngestionPipeline {
  ingest(
    documents: ISourceDocument[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult>;
}

export interface IDocumentLoader {
  supports(path: string): boolean;
  load(path: string): Promise<ISourceDocument>;
}

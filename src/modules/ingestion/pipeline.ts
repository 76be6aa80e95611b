import type { ChunkingConfigInput, ResolvedBm25Config } from "../../config";
import {
  DEFAULT_BM25_CONFIG,
  resolveChunkingConfig,
} from "../../config";
import { InvalidConfigurationError } from "../../errors";
import type {
  IChunk,
  IDocumentLoader,
  IEmbedder,
  IIndexSnapshot,
  IIndexStore,
  IIngestionConfig,
  IIngestionPipeline,
  IIngestionResult,
  ISourceDocument,
  IngestionProgressCallback,
} from "../../interfaces";
import { createLogger } from "../../utils/logger";
import { Chunker } from "../chunker";
import { DEFAULT_LOADERS, loadDocument } from "../loaders";
import { DenseIndex } from "../retrieval/dense-index";
import { SparseIndex } from "../retrieval/sparse-index";

export const DEFAULT_INGESTION_CONFIG: IIngestionConfig = {
  embeddingBatchSize: 32,
  embeddingConcurrency: 4,
  embeddingRetries: 3,
  retryBaseDelayMs: 500,
};

export interface IngestionPipelineOptions {
  store: IIndexStore;
  embedder: IEmbedder;
  chunking?: ChunkingConfigInput;
  bm25?: ResolvedBm25Config;
  config?: Partial<IIngestionConfig>;
  loaders?: IDocumentLoader[];
}

const log = createLogger("ingestion");

/**
 * Offline build: chunk every document, embed and index the chunks, then hand
 * the finished snapshot to the store. Nothing is saved unless every step
 * succeeds.
 */
export class IngestionPipeline implements IIngestionPipeline {
  private store: IIndexStore;
  private embedder: IEmbedder;
  private bm25: ResolvedBm25Config;
  private config: IIngestionConfig;
  private chunker: Chunker;
  private loaders: IDocumentLoader[];

  constructor(options: IngestionPipelineOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.bm25 = options.bm25 ?? DEFAULT_BM25_CONFIG;
    this.config = { ...DEFAULT_INGESTION_CONFIG, ...options.config };
    this.chunker = new Chunker({
      ...resolveChunkingConfig(options.chunking),
      ...this.config.chunker,
    });
    this.loaders = options.loaders ?? DEFAULT_LOADERS;
  }

  async ingestFiles(
    paths: string[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult> {
    const documents: ISourceDocument[] = [];
    for (const path of paths) {
      onProgress?.({ stage: "loading", message: `Loading ${path}...` });
      documents.push(await loadDocument(path, this.loaders));
    }
    return this.ingest(documents, onProgress);
  }

  async ingest(
    documents: ISourceDocument[],
    onProgress?: IngestionProgressCallback,
  ): Promise<IIngestionResult> {
    const startTime = Date.now();

    onProgress?.({ stage: "chunking", message: "Chunking documents..." });
    const chunks = this.chunkAll(documents);
    log.info(`Chunked ${documents.length} documents into ${chunks.length} chunks`);

    onProgress?.({
      stage: "embedding",
      message: `Embedding ${chunks.length} chunks...`,
    });
    const dense = await DenseIndex.build(chunks, this.embedder, {
      batchSize: this.config.embeddingBatchSize,
      concurrency: this.config.embeddingConcurrency,
      retries: this.config.embeddingRetries,
      retryBaseDelayMs: this.config.retryBaseDelayMs,
      onBatch: (done, total) =>
        onProgress?.({
          stage: "embedding",
          message: `Embedded ${done}/${total} chunks...`,
        }),
      onRetry: (error, attempt, delayMs) =>
        log.warn(
          `Embedding batch failed (retry ${attempt} in ${delayMs}ms): ${String(error)}`,
        ),
    });

    onProgress?.({ stage: "indexing", message: "Building keyword index..." });
    const sparse = SparseIndex.build(chunks, this.bm25);

    const snapshot = this.createSnapshot(documents, chunks, dense, sparse);

    onProgress?.({
      stage: "storing",
      message: `Saving index to ${this.store.location}...`,
    });
    await this.store.save(snapshot);

    return {
      sources: snapshot.manifest.sources,
      chunkCount: chunks.length,
      dimensions: dense.dimensions,
      modelId: dense.modelId,
      location: this.store.location,
      processingTimeMs: Date.now() - startTime,
    };
  }

  private chunkAll(documents: ISourceDocument[]): IChunk[] {
    const chunks: IChunk[] = [];
    const seen = new Set<string>();
    for (const document of documents) {
      for (const chunk of this.chunker.chunk(document)) {
        if (seen.has(chunk.id)) {
          throw new InvalidConfigurationError(
            `Duplicate chunk id "${chunk.id}": document sources must be unique`,
          );
        }
        seen.add(chunk.id);
        chunks.push(chunk);
      }
    }
    return chunks;
  }

  private createSnapshot(
    documents: ISourceDocument[],
    chunks: IChunk[],
    dense: DenseIndex,
    sparse: SparseIndex,
  ): IIndexSnapshot {
    return {
      manifest: {
        version: 1,
        modelId: dense.modelId,
        dimensions: dense.dimensions,
        chunking: this.chunker.getConfig(),
        bm25: { ...sparse.params },
        sources: documents.map((d) => d.source),
        chunkCount: chunks.length,
        createdAt: new Date().toISOString(),
      },
      chunks,
      dense: [...dense.entries],
      sparse: sparse.toData(),
    };
  }

  setChunkerConfig(config: ChunkingConfigInput): void {
    this.chunker.setConfig(config);
  }
}

import type {
  RetrievalConfigInput,
  RetrievalMethod,
  ResolvedRetrievalConfig,
} from "./config";
import { resolveRetrievalConfig } from "./config";
import { IndexNotReadyError, InvalidConfigurationError } from "./errors";
import type {
  IEmbedder,
  IIndexManifest,
  IIndexStore,
  IKnowledgeBase,
  IRetrievalStats,
  RetrievalResult,
} from "./interfaces";
import {
  DenseIndex,
  HybridRetriever,
  SparseIndex,
  isSufficient,
  selectContext,
} from "./modules/retrieval";
import { createLogger } from "./utils/logger";

export interface KnowledgeBaseOptions {
  store: IIndexStore;
  embedder: IEmbedder;
  retrieval?: RetrievalConfigInput;
}

interface LoadedIndex {
  retriever: HybridRetriever;
  manifest: IIndexManifest;
  stats: IRetrievalStats;
}

const log = createLogger("knowledge-base");

/**
 * Read side of the index: loads a snapshot from the store and serves queries
 * through a {@link HybridRetriever}. `reload()` swaps in a new retriever
 * without disturbing queries already running against the old one.
 */
export class KnowledgeBase implements IKnowledgeBase {
  private store: IIndexStore;
  private embedder: IEmbedder;
  private config: ResolvedRetrievalConfig;
  private current: LoadedIndex | null = null;

  constructor(options: KnowledgeBaseOptions) {
    this.store = options.store;
    this.embedder = options.embedder;
    this.config = resolveRetrievalConfig(options.retrieval);
  }

  static async open(options: KnowledgeBaseOptions): Promise<KnowledgeBase> {
    const kb = new KnowledgeBase(options);
    await kb.reload();
    return kb;
  }

  get isReady(): boolean {
    return this.current !== null;
  }

  async reload(): Promise<IIndexManifest> {
    const snapshot = await this.store.load();
    const { manifest } = snapshot;

    // query vectors from another model are not comparable with the stored ones
    if (manifest.modelId !== this.embedder.modelId) {
      throw new InvalidConfigurationError(
        `Index built with "${manifest.modelId}", query embedder is "${this.embedder.modelId}"`,
      );
    }

    const dense = new DenseIndex(snapshot.dense, manifest.modelId);
    const sparse = SparseIndex.fromData(snapshot.sparse);
    const retriever = new HybridRetriever({
      chunks: snapshot.chunks,
      dense,
      sparse,
      embedder: this.embedder,
      config: this.config,
    });

    this.current = {
      retriever,
      manifest,
      stats: {
        chunkCount: snapshot.chunks.length,
        denseEntries: dense.size,
        sparseTerms: sparse.termCount,
        dimensions: dense.dimensions,
        modelId: manifest.modelId,
        sources: [...manifest.sources],
      },
    };
    log.info(
      `Loaded index from ${this.store.location}: ${snapshot.chunks.length} chunks, ${manifest.sources.length} sources`,
    );
    return manifest;
  }

  async retrieve(
    query: string,
    k: number = this.config.topK,
    method: RetrievalMethod | string = this.config.method,
  ): Promise<RetrievalResult[]> {
    return this.loaded().retriever.retrieve(query, k, method);
  }

  isSufficient(
    results: readonly RetrievalResult[],
    threshold: number = this.config.threshold,
  ): boolean {
    return isSufficient(results, threshold);
  }

  selectContext(results: readonly RetrievalResult[], k?: number): string {
    return selectContext(results, k);
  }

  getStats(): IRetrievalStats {
    return { ...this.loaded().stats };
  }

  getManifest(): IIndexManifest {
    return this.loaded().manifest;
  }

  getConfig(): ResolvedRetrievalConfig {
    return { ...this.config };
  }

  getStoreLocation(): string {
    return this.store.location;
  }

  private loaded(): LoadedIndex {
    if (!this.current) {
      throw new IndexNotReadyError(
        `Knowledge base at ${this.store.location} has not been loaded`,
      );
    }
    return this.current;
  }
}

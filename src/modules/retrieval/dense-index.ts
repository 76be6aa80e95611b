import {
  EmbeddingServiceError,
  InvalidConfigurationError,
  errorMessage,
  isRetrievalError,
} from "../../errors";
import type {
  IChunk,
  IDenseVectorEntry,
  IEmbedder,
  IScoredChunk,
} from "../../interfaces";
import {
  assertSameDimensions,
  cosineSimilarity,
  embedAll,
  type EmbedAllOptions,
} from "../embedding";
import { topK } from "./ranking";

export const DEFAULT_EMBED_OPTIONS: EmbedAllOptions = {
  batchSize: 32,
  concurrency: 4,
  retries: 3,
  retryBaseDelayMs: 500,
};

/** Exhaustive cosine-similarity search over one vector per chunk. */
export class DenseIndex {
  readonly entries: readonly IDenseVectorEntry[];
  readonly modelId: string;
  readonly dimensions: number;

  constructor(entries: IDenseVectorEntry[], modelId: string) {
    this.entries = entries;
    this.modelId = modelId;
    this.dimensions = assertSameDimensions(entries.map((e) => e.vector));
  }

  /**
   * Embeds every chunk. Any batch that still fails after its retries rejects
   * the build; no partial index is returned.
   */
  static async build(
    chunks: IChunk[],
    embedder: IEmbedder,
    options: Partial<EmbedAllOptions> = {},
  ): Promise<DenseIndex> {
    const vectors = await embedAll(
      embedder,
      chunks.map((c) => c.text),
      { ...DEFAULT_EMBED_OPTIONS, ...options },
    );
    const entries = chunks.map((chunk, i) => ({
      chunkId: chunk.id,
      vector: vectors[i],
      text: chunk.text,
      source: chunk.source,
      page: chunk.page,
      offset: chunk.offset,
    }));
    return new DenseIndex(entries, embedder.modelId);
  }

  get size(): number {
    return this.entries.length;
  }

  async query(
    text: string,
    embedder: IEmbedder,
    k: number,
  ): Promise<IScoredChunk[]> {
    if (this.entries.length === 0 || k <= 0) return [];

    if (embedder.modelId !== this.modelId) {
      throw new InvalidConfigurationError(
        `Index was built with embedding model "${this.modelId}" but the query embedder is "${embedder.modelId}"`,
      );
    }

    let vector: number[];
    try {
      vector = await embedder.embed(text);
    } catch (error) {
      if (isRetrievalError(error)) throw error;
      throw new EmbeddingServiceError(
        `Query embedding failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    return this.search(vector, k);
  }

  search(vector: number[], k: number): IScoredChunk[] {
    if (this.entries.length === 0) return [];
    if (vector.length !== this.dimensions) {
      throw new EmbeddingServiceError(
        `Query vector has ${vector.length} dimensions, index has ${this.dimensions}`,
      );
    }
    return topK(
      this.entries.map((entry) => ({
        chunkId: entry.chunkId,
        score: cosineSimilarity(vector, entry.vector),
        offset: entry.offset,
      })),
      k,
    );
  }
}

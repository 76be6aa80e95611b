import type {
  RetrievalConfigInput,
  RetrievalMethod,
  ResolvedRetrievalConfig,
} from "../../config";
import { isRetrievalMethod, resolveRetrievalConfig } from "../../config";
import {
  IndexNotReadyError,
  InvalidConfigurationError,
  InvalidMethodError,
} from "../../errors";
import type {
  IChunk,
  IEmbedder,
  IHybridRetrievalResult,
  IRetriever,
  IScoredChunk,
  RetrievalResult,
} from "../../interfaces";
import type { DenseIndex } from "./dense-index";
import { compareRanked, minMaxNormalize } from "./ranking";
import type { SparseIndex } from "./sparse-index";

export interface RetrieverOptions {
  chunks: Iterable<IChunk>;
  dense: DenseIndex | null;
  sparse: SparseIndex | null;
  embedder: IEmbedder;
  config?: RetrievalConfigInput;
}

type ChunkMeta = Pick<IChunk, "text" | "source" | "page" | "offset">;

/**
 * Queries the dense and sparse indexes, min-max normalises each side and
 * fuses them with a weighted sum. Holds only read-only references, so one
 * instance serves concurrent callers.
 */
export class HybridRetriever implements IRetriever {
  private readonly dense: DenseIndex | null;
  private readonly sparse: SparseIndex | null;
  private readonly embedder: IEmbedder;
  private readonly chunks: ReadonlyMap<string, ChunkMeta>;
  readonly config: ResolvedRetrievalConfig;

  constructor(options: RetrieverOptions) {
    this.dense = options.dense;
    this.sparse = options.sparse;
    this.embedder = options.embedder;
    this.config = resolveRetrievalConfig(options.config);

    const chunks = new Map<string, ChunkMeta>();
    for (const chunk of options.chunks) {
      chunks.set(chunk.id, {
        text: chunk.text,
        source: chunk.source,
        page: chunk.page,
        offset: chunk.offset,
      });
    }
    this.chunks = chunks;
  }

  async retrieve(
    query: string,
    k: number = this.config.topK,
    method: RetrievalMethod | string = this.config.method,
  ): Promise<RetrievalResult[]> {
    if (!isRetrievalMethod(method)) {
      throw new InvalidMethodError(method);
    }
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidConfigurationError(
        `k must be a positive integer, got ${k}`,
      );
    }

    switch (method) {
      case "dense": {
        const scored = await this.requireDense().query(query, this.embedder, k);
        const normalized = minMaxNormalize(scored);
        return this.resolve(scored).map(([chunkId, meta]) => {
          const score = normalized.get(chunkId) ?? 0;
          return {
            method: "dense" as const,
            chunkId,
            ...meta,
            denseScore: score,
            fusedScore: score,
          };
        });
      }
      case "sparse": {
        const scored = this.requireSparse().query(query, k);
        const normalized = minMaxNormalize(scored);
        return this.resolve(scored).map(([chunkId, meta]) => {
          const score = normalized.get(chunkId) ?? 0;
          return {
            method: "sparse" as const,
            chunkId,
            ...meta,
            sparseScore: score,
            fusedScore: score,
          };
        });
      }
      case "hybrid":
        return this.retrieveHybrid(query, k);
    }
  }

  private async retrieveHybrid(
    query: string,
    k: number,
  ): Promise<IHybridRetrievalResult[]> {
    const dense = this.requireDense();
    const sparse = this.requireSparse();
    const candidates = k * this.config.overFetchFactor;

    const [denseScored, sparseScored] = await Promise.all([
      dense.query(query, this.embedder, candidates),
      Promise.resolve(sparse.query(query, candidates)),
    ]);

    const denseNorm = minMaxNormalize(denseScored);
    const sparseNorm = minMaxNormalize(sparseScored);
    const { denseWeight, sparseWeight } = this.config;

    const fused: IHybridRetrievalResult[] = [];
    for (const chunkId of new Set([...denseNorm.keys(), ...sparseNorm.keys()])) {
      const meta = this.chunks.get(chunkId);
      if (!meta) continue;
      const denseScore = denseNorm.get(chunkId);
      const sparseScore = sparseNorm.get(chunkId);
      fused.push({
        method: "hybrid" as const,
        chunkId,
        ...meta,
        denseScore,
        sparseScore,
        fusedScore:
          denseWeight * (denseScore ?? 0) + sparseWeight * (sparseScore ?? 0),
      });
    }

    return fused
      .sort((a, b) =>
        compareRanked(
          { chunkId: a.chunkId, score: a.fusedScore, offset: a.offset },
          { chunkId: b.chunkId, score: b.fusedScore, offset: b.offset },
        ),
      )
      .slice(0, k);
  }

  private resolve(scored: IScoredChunk[]): Array<[string, ChunkMeta]> {
    const resolved: Array<[string, ChunkMeta]> = [];
    for (const { chunkId } of scored) {
      const meta = this.chunks.get(chunkId);
      if (meta) resolved.push([chunkId, meta]);
    }
    return resolved;
  }

  private requireDense(): DenseIndex {
    if (!this.dense) {
      throw new IndexNotReadyError("Dense index has not been built or loaded");
    }
    return this.dense;
  }

  private requireSparse(): SparseIndex {
    if (!this.sparse) {
      throw new IndexNotReadyError("Sparse index has not been built or loaded");
    }
    return this.sparse;
  }
}

import type { RetrievalMethod } from "../config";

export interface IScoredChunk {
  chunkId: string;
  score: number;
}

interface IRetrievalResultBase {
  chunkId: string;
  text: string;
  source: string;
  page: number;
  offset: number;
  fusedScore: number;
}

export interface IDenseRetrievalResult extends IRetrievalResultBase {
  method: "dense";
  denseScore: number;
}

export interface ISparseRetrievalResult extends IRetrievalResultBase {
  method: "sparse";
  sparseScore: number;
}

export interface IHybridRetrievalResult extends IRetrievalResultBase {
  method: "hybrid";
  denseScore?: number;
  sparseScore?: number;
}

export type RetrievalResult =
  | IDenseRetrievalResult
  | ISparseRetrievalResult
  | IHybridRetrievalResult;

export interface IRetriever {
  retrieve(
    query: string,
    k?: number,
    method?: RetrievalMethod | string,
  ): Promise<RetrievalResult[]>;
}

export interface IRetrievalStats {
  chunkCount: number;
  denseEntries: number;
  sparseTerms: number;
  dimensions: number;
  modelId: string;
  sources: string[];
}

/** What the clinical agent needs from the knowledge base. */
export interface IKnowledgeBase {
  retrieve(
    query: string,
    k?: number,
    method?: RetrievalMethod | string,
  ): Promise<RetrievalResult[]>;
  isSufficient(results: readonly RetrievalResult[], threshold?: number): boolean;
  selectContext(results: readonly RetrievalResult[], k?: number): string;
}

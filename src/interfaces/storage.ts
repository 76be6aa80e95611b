import type { ResolvedBm25Config, ResolvedChunkingConfig } from "../config";
import type { IChunk } from "./chunker";

export interface IDenseVectorEntry {
  chunkId: string;
  vector: number[];
  text: string;
  source: string;
  page: number;
  offset: number;
}

export interface ISparsePosting {
  chunkId: string;
  tf: number;
}

export interface ISparseIndexData {
  params: ResolvedBm25Config;
  /** Token count per chunk id, after stopword removal. */
  lengths: Record<string, number>;
  offsets: Record<string, number>;
  postings: Record<string, ISparsePosting[]>;
}

export interface IIndexManifest {
  version: 1;
  modelId: string;
  dimensions: number;
  chunking: ResolvedChunkingConfig;
  bm25: ResolvedBm25Config;
  sources: string[];
  chunkCount: number;
  createdAt: string;
}

export interface IIndexSnapshot {
  manifest: IIndexManifest;
  chunks: IChunk[];
  dense: IDenseVectorEntry[];
  sparse: ISparseIndexData;
}

export interface IIndexStore {
  readonly location: string;
  /** Persists the snapshot completely or not at all. */
  save(snapshot: IIndexSnapshot): Promise<void>;
  /** Rejects with `IndexNotReadyError` when nothing has been saved. */
  load(): Promise<IIndexSnapshot>;
  exists(): Promise<boolean>;
}

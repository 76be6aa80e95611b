import { DEFAULT_BM25_CONFIG, type ResolvedBm25Config } from "../../config";
import type {
  IChunk,
  IScoredChunk,
  ISparseIndexData,
  ISparsePosting,
} from "../../interfaces";
import { type IRankable, topK } from "./ranking";
import { tokenize } from "./tokenizer";

/** In-memory BM25 inverted index over chunk text. */
export class SparseIndex {
  private readonly postings: Map<string, ISparsePosting[]>;
  private readonly lengths: Map<string, number>;
  private readonly offsets: Map<string, number>;
  private readonly averageLength: number;
  readonly params: ResolvedBm25Config;

  private constructor(
    postings: Map<string, ISparsePosting[]>,
    lengths: Map<string, number>,
    offsets: Map<string, number>,
    params: ResolvedBm25Config,
  ) {
    this.postings = postings;
    this.lengths = lengths;
    this.offsets = offsets;
    this.params = params;

    let total = 0;
    for (const length of lengths.values()) total += length;
    this.averageLength = lengths.size > 0 ? total / lengths.size : 0;
  }

  static build(
    chunks: Iterable<IChunk>,
    params: ResolvedBm25Config = DEFAULT_BM25_CONFIG,
  ): SparseIndex {
    const postings = new Map<string, ISparsePosting[]>();
    const lengths = new Map<string, number>();
    const offsets = new Map<string, number>();

    for (const chunk of chunks) {
      const tokens = tokenize(chunk.text);
      lengths.set(chunk.id, tokens.length);
      offsets.set(chunk.id, chunk.offset);

      const frequencies = new Map<string, number>();
      for (const token of tokens) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      for (const [term, tf] of frequencies) {
        const list = postings.get(term);
        if (list) {
          list.push({ chunkId: chunk.id, tf });
        } else {
          postings.set(term, [{ chunkId: chunk.id, tf }]);
        }
      }
    }

    return new SparseIndex(postings, lengths, offsets, { ...params });
  }

  static fromData(data: ISparseIndexData): SparseIndex {
    return new SparseIndex(
      new Map(Object.entries(data.postings)),
      new Map(Object.entries(data.lengths)),
      new Map(Object.entries(data.offsets)),
      { ...data.params },
    );
  }

  get size(): number {
    return this.lengths.size;
  }

  get termCount(): number {
    return this.postings.size;
  }

  documentFrequency(term: string): number {
    return this.postings.get(term)?.length ?? 0;
  }

  idf(term: string): number {
    const n = this.size;
    const df = this.documentFrequency(term);
    return Math.log(1 + (n - df + 0.5) / (df + 0.5));
  }

  /** Top `k` chunks with a positive BM25 score for `text`. */
  query(text: string, k: number): IScoredChunk[] {
    if (this.size === 0 || k <= 0) return [];

    const { k1, b } = this.params;
    const avg = this.averageLength || 1;
    const scores = new Map<string, number>();

    for (const term of tokenize(text)) {
      const list = this.postings.get(term);
      if (!list) continue;

      const idf = this.idf(term);
      for (const { chunkId, tf } of list) {
        const length = this.lengths.get(chunkId) ?? 0;
        const norm = 1 - b + (b * length) / avg;
        const score = (idf * (tf * (k1 + 1))) / (tf + k1 * norm);
        scores.set(chunkId, (scores.get(chunkId) ?? 0) + score);
      }
    }

    const candidates: IRankable[] = [];
    for (const [chunkId, score] of scores) {
      if (score > 0) {
        candidates.push({
          chunkId,
          score,
          offset: this.offsets.get(chunkId) ?? 0,
        });
      }
    }
    return topK(candidates, k);
  }

  toData(): ISparseIndexData {
    return {
      params: { ...this.params },
      lengths: Object.fromEntries(this.lengths),
      offsets: Object.fromEntries(this.offsets),
      postings: Object.fromEntries(this.postings),
    };
  }
}

import type { IScoredChunk } from "../../interfaces";

export interface IRankable {
  chunkId: string;
  score: number;
  offset: number;
}

/** Score descending, then lower offset, then chunk id. */
export function compareRanked(a: IRankable, b: IRankable): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.offset !== b.offset) return a.offset - b.offset;
  return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

export function topK(candidates: IRankable[], k: number): IScoredChunk[] {
  return [...candidates]
    .sort(compareRanked)
    .slice(0, k)
    .map(({ chunkId, score }) => ({ chunkId, score }));
}

/**
 * Min-max normalisation over one candidate set. When every score is equal
 * (including a single candidate) each maps to 1.0.
 */
export function minMaxNormalize(scores: IScoredChunk[]): Map<string, number> {
  const normalized = new Map<string, number>();
  if (scores.length === 0) return normalized;

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  for (const { score } of scores) {
    if (score < min) min = score;
    if (score > max) max = score;
  }

  const range = max - min;
  for (const { chunkId, score } of scores) {
    normalized.set(chunkId, range === 0 ? 1 : (score - min) / range);
  }
  return normalized;
}

import type { IChunkerConfig, IPageBoundary } from "../../interfaces";

export interface IChunkWindow {
  text: string;
  start: number;
  end: number;
  index: number;
}

/**
 * Fixed-size character windows advancing by `chunkSize - chunkOverlap`.
 * Stops once a window reaches the end of the text, so the last window may be
 * shorter and no window is wholly contained in its predecessor.
 */
export class FixedSizeStrategy {
  *windows(
    text: string,
    config: Pick<IChunkerConfig, "chunkSize" | "chunkOverlap">,
  ): Generator<IChunkWindow> {
    const { chunkSize, chunkOverlap } = config;
    const step = chunkSize - chunkOverlap;

    let index = 0;
    for (let start = 0; start < text.length; start += step) {
      const end = Math.min(start + chunkSize, text.length);
      yield { text: text.slice(start, end), start, end, index: index++ };
      if (end >= text.length) break;
    }
  }
}

/** Binary search for the page whose start offset is the greatest one `<= offset`. */
export function pageForOffset(
  boundaries: IPageBoundary[],
  offset: number,
): number {
  if (boundaries.length === 0) return 1;

  let lo = 0;
  let hi = boundaries.length - 1;
  let found = 0;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (boundaries[mid].start <= offset) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return boundaries[found].pageNumber;
}

import { DEFAULT_CHUNKING_CONFIG, validateChunking } from "../../config";
import type {
  IChunk,
  IChunker,
  IChunkerConfig,
  IPageBoundary,
  ISourceDocument,
} from "../../interfaces";
import { FixedSizeStrategy, pageForOffset } from "./strategies";

export const DEFAULT_CHUNKER_CONFIG: IChunkerConfig = {
  ...DEFAULT_CHUNKING_CONFIG,
};

export interface IConcatenatedDocument {
  text: string;
  boundaries: IPageBoundary[];
}

export function concatenatePages(
  document: ISourceDocument,
  separator: string,
): IConcatenatedDocument {
  const boundaries: IPageBoundary[] = [];
  let text = "";

  document.pages.forEach((page, i) => {
    if (i > 0) text += separator;
    boundaries.push({ pageNumber: page.pageNumber, start: text.length });
    text += page.text;
  });

  return { text, boundaries };
}

/** `<source>:<offset>` with the source percent-encoded, so distinct sources never share ids. */
export function chunkId(source: string, offset: number): string {
  return `${encodeURIComponent(source)}:${offset}`;
}

export class Chunker implements IChunker {
  private config: IChunkerConfig;
  private strategy = new FixedSizeStrategy();

  constructor(config: Partial<IChunkerConfig> = {}) {
    const merged = { ...DEFAULT_CHUNKER_CONFIG, ...config };
    validateChunking(merged.chunkSize, merged.chunkOverlap);
    this.config = merged;
  }

  /**
   * Returns a lazy sequence over the document's chunks. Each iteration starts
   * from the beginning and produces the same chunks.
   */
  chunk(document: ISourceDocument): Iterable<IChunk> {
    const config = { ...this.config };
    const strategy = this.strategy;

    return {
      *[Symbol.iterator](): Iterator<IChunk> {
        const { text, boundaries } = concatenatePages(
          document,
          config.pageSeparator,
        );
        for (const window of strategy.windows(text, config)) {
          yield {
            id: chunkId(document.source, window.start),
            text: window.text,
            source: document.source,
            page: pageForOffset(boundaries, window.start),
            offset: window.start,
            index: window.index,
          };
        }
      },
    };
  }

  getConfig(): IChunkerConfig {
    return { ...this.config };
  }

  setConfig(config: Partial<IChunkerConfig>): void {
    const merged = { ...this.config, ...config };
    validateChunking(merged.chunkSize, merged.chunkOverlap);
    this.config = merged;
  }
}

/** Validates eagerly, then defers the work to iteration. */
export function chunkDocument(
  document: ISourceDocument,
  chunkSize: number,
  chunkOverlap: number,
  pageSeparator = DEFAULT_CHUNKING_CONFIG.pageSeparator,
): Iterable<IChunk> {
  return new Chunker({ chunkSize, chunkOverlap, pageSeparator }).chunk(document);
}

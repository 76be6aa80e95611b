export interface ISourcePage {
  /** 1-based page number. */
  pageNumber: number;
  text: string;
}

export interface ISourceDocument {
  source: string;
  pages: ISourcePage[];
}

export interface IChunk {
  id: string;
  text: string;
  source: string;
  page: number;
  offset: number;
  index: number;
}

export interface IPageBoundary {
  pageNumber: number;
  start: number;
}

export interface IChunkerConfig {
  chunkSize: number;
  chunkOverlap: number;
  pageSeparator: string;
}

export interface IChunker {
  chunk(document: ISourceDocument): Iterable<IChunk>;
  getConfig(): IChunkerConfig;
  setConfig(config: Partial<IChunkerConfig>): void;
}

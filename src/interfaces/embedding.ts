/**
 * Text to fixed-length vector. Implementations must be deterministic for a
 * given `modelId` and reject with `EmbeddingServiceError` on provider failure.
 */
export interface IEmbedder {
  readonly modelId: string;
  embed(text: string): Promise<number[]>;
  embedBatch?(texts: string[]): Promise<number[][]>;
}

import { EmbeddingServiceError, isRetrievalError } from "../../errors";
import type { IEmbedder } from "../../interfaces";
import { withRetry } from "../../utils/retry";

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface EmbedAllOptions {
  batchSize: number;
  concurrency: number;
  retries: number;
  retryBaseDelayMs: number;
  onBatch?: (done: number, total: number) => void;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

async function embedBatch(
  embedder: IEmbedder,
  texts: string[],
): Promise<number[][]> {
  if (embedder.embedBatch) return embedder.embedBatch(texts);
  const vectors: number[][] = [];
  for (const text of texts) {
    vectors.push(await embedder.embed(text));
  }
  return vectors;
}

/**
 * Embeds `texts` in batches, at most `concurrency` batches in flight. Each
 * batch is retried on retryable errors; the first batch that still fails
 * rejects the whole call.
 */
export async function embedAll(
  embedder: IEmbedder,
  texts: string[],
  options: EmbedAllOptions,
): Promise<number[][]> {
  const batches: string[][] = [];
  for (let i = 0; i < texts.length; i += options.batchSize) {
    batches.push(texts.slice(i, i + options.batchSize));
  }

  const results: number[][][] = new Array(batches.length);
  let done = 0;

  for (let i = 0; i < batches.length; i += options.concurrency) {
    const group = batches.slice(i, i + options.concurrency);
    await Promise.all(
      group.map(async (batch, j) => {
        const vectors = await withRetry(() => embedBatch(embedder, batch), {
          retries: options.retries,
          baseDelayMs: options.retryBaseDelayMs,
          shouldRetry: (error) => isRetrievalError(error) && error.retryable,
          onRetry: options.onRetry,
        });
        if (vectors.length !== batch.length) {
          throw new EmbeddingServiceError(
            `Embedder returned ${vectors.length} vectors for ${batch.length} texts`,
          );
        }
        results[i + j] = vectors;
        done += batch.length;
        options.onBatch?.(done, texts.length);
      }),
    );
  }

  const vectors = results.flat();
  assertSameDimensions(vectors);
  return vectors;
}

export function assertSameDimensions(vectors: number[][]): number {
  if (vectors.length === 0) return 0;
  const dims = vectors[0].length;
  if (dims === 0) {
    throw new EmbeddingServiceError("Embedder returned an empty vector");
  }
  for (const vector of vectors) {
    if (vector.length !== dims) {
      throw new EmbeddingServiceError(
        `Inconsistent embedding dimensions: expected ${dims}, got ${vector.length}`,
      );
    }
  }
  return dims;
}

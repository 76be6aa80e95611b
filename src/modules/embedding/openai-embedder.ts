import OpenAI, { APIConnectionTimeoutError } from "openai";
import type { ModelConfigInput, ResolvedModelConfig } from "../../config";
import { resolveModelConfig } from "../../config";
import { EmbeddingServiceError, errorMessage } from "../../errors";
import type { IEmbedder } from "../../interfaces";

export interface OpenAIEmbedderOptions {
  openaiClient?: OpenAI;
  apiKey?: string;
  baseURL?: string;
  models?: ModelConfigInput;
}

export class OpenAIEmbedder implements IEmbedder {
  private openai: OpenAI;
  private config: ResolvedModelConfig;

  constructor(options: OpenAIEmbedderOptions) {
    if (options.openaiClient) {
      this.openai = options.openaiClient;
    } else if (options.apiKey) {
      this.openai = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL,
      });
    } else {
      throw new EmbeddingServiceError(
        "Either openaiClient or apiKey must be provided for embeddings",
      );
    }
    this.config = resolveModelConfig(options.models);
  }

  get modelId(): string {
    const dims = this.config.embeddingDimensions;
    return dims
      ? `${this.config.embeddingModel}@${dims}`
      : this.config.embeddingModel;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const response = await this.request(texts);

    if (response.data.length !== texts.length) {
      throw new EmbeddingServiceError(
        `Expected ${texts.length} embeddings, received ${response.data.length}`,
      );
    }

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((d) => d.embedding);
  }

  /**
   * One embeddings call. The SDK enforces the timeout and aborts the request;
   * its own retries are off because `embedAll` retries whole batches.
   */
  private async request(texts: string[]) {
    const timeoutMs = this.config.embeddingTimeoutMs;
    try {
      return await this.openai.embeddings.create(
        {
          model: this.config.embeddingModel,
          input: texts,
          encoding_format: "float",
          dimensions: this.config.embeddingDimensions,
        },
        { timeout: timeoutMs, maxRetries: 0 },
      );
    } catch (error) {
      if (error instanceof APIConnectionTimeoutError) {
        throw new EmbeddingServiceError(
          `Embedding request timed out after ${timeoutMs}ms`,
          { cause: error },
        );
      }
      throw new EmbeddingServiceError(
        `Embedding request failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}

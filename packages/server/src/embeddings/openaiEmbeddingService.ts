import OpenAI from 'openai';
import { EmbeddingUnavailableError, type EmbeddingService } from 'memory-core';

export interface OpenAIEmbeddingOptions {
  model: string;
  dimension: number;
  /**
   * Send `dimensions` with each request. Only the text-embedding-3 family
   * accepts it; OpenAI-compatible local servers reject or ignore it.
   */
  requestDimensions?: boolean;
}

/**
 * Embeddings over the OpenAI embeddings endpoint. The same client talks to
 * Ollama through its OpenAI-compatible `/v1` API.
 *
 * Retries are left to the caller; the guarded wrapper bounds each call.
 */
export class OpenAIEmbeddingService implements EmbeddingService {
  readonly dimension: number;
  readonly modelName: string;
  private readonly requestDimensions: boolean;

  constructor(private readonly client: OpenAI, options: OpenAIEmbeddingOptions) {
    this.modelName = options.model;
    this.dimension = options.dimension;
    this.requestDimensions = options.requestDimensions ?? false;
  }

  async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    const response = await this.client.embeddings.create(
      {
        model: this.modelName,
        input: text,
        encoding_format: 'float',
        ...(this.requestDimensions && { dimensions: this.dimension }),
      },
      { signal },
    );

    const first = response.data[0];
    if (!first || !Array.isArray(first.embedding)) {
      throw new EmbeddingUnavailableError(
        `${this.modelName} returned no embedding`,
        'invalid_response',
      );
    }
    return Float32Array.from(first.embedding);
  }
}

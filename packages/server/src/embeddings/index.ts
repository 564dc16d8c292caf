import OpenAI from 'openai';
import {
  EmbeddingUnavailableError,
  GuardedEmbeddingService,
  HashingEmbeddingService,
  type EmbeddingService,
} from 'memory-core';
import type { EmbeddingConfig } from '../config.js';
import { OpenAIEmbeddingService } from './openaiEmbeddingService.js';

export { OpenAIEmbeddingService } from './openaiEmbeddingService.js';

// Ollama ignores the key but the SDK refuses to start without one.
const OLLAMA_PLACEHOLDER_KEY = 'ollama';

/**
 * Build the configured provider, wrapped with the timeout and vector checks
 * every caller relies on.
 */
export function createEmbeddingService(config: EmbeddingConfig): EmbeddingService {
  return new GuardedEmbeddingService(createProvider(config), config.timeoutMs);
}

function createProvider(config: EmbeddingConfig): EmbeddingService {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbeddingService(config.dimension, config.model);

    case 'ollama':
      return new OpenAIEmbeddingService(
        new OpenAI({
          apiKey: config.apiKey || OLLAMA_PLACEHOLDER_KEY,
          baseURL: config.baseUrl,
          maxRetries: 0,
        }),
        { model: config.model, dimension: config.dimension },
      );

    case 'openai':
      if (!config.apiKey) {
        throw new EmbeddingUnavailableError(
          'EMBEDDING_API_KEY is required for the openai provider',
          'not_configured',
        );
      }
      return new OpenAIEmbeddingService(
        new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl, maxRetries: 0 }),
        {
          model: config.model,
          dimension: config.dimension,
          requestDimensions: config.model.startsWith('text-embedding-3'),
        },
      );
  }
}

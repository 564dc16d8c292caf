import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EmbeddingUnavailableError } from 'memory-core';
import { createEmbeddingService } from '../embeddings/index.js';
import type { EmbeddingConfig } from '../config.js';

const mocks = vi.hoisted(() => ({
  create: vi.fn(),
  construct: vi.fn(),
}));

vi.mock('openai', () => ({
  default: class {
    embeddings = { create: mocks.create };

    constructor(options: unknown) {
      mocks.construct(options);
    }
  },
}));

function config(overrides: Partial<EmbeddingConfig> = {}): EmbeddingConfig {
  return {
    provider: 'ollama',
    baseUrl: 'http://localhost:11434/v1',
    apiKey: '',
    model: 'nomic-embed-text',
    dimension: 4,
    timeoutMs: 1000,
    ...overrides,
  };
}

describe('createEmbeddingService', () => {
  beforeEach(() => {
    mocks.create.mockReset();
    mocks.construct.mockReset();
  });

  it('talks to ollama through the OpenAI-compatible endpoint', async () => {
    mocks.create.mockResolvedValue({ data: [{ embedding: [0.1, 0.2, 0.3, 0.4] }] });

    const service = createEmbeddingService(config());
    const vector = await service.embed('hello');

    expect(mocks.construct).toHaveBeenCalledWith({
      apiKey: 'ollama',
      baseURL: 'http://localhost:11434/v1',
      maxRetries: 0,
    });
    expect(mocks.create).toHaveBeenCalledWith(
      { model: 'nomic-embed-text', input: 'hello', encoding_format: 'float' },
      { signal: expect.any(AbortSignal) },
    );
    expect(Array.from(vector)).toEqual(Array.from(Float32Array.from([0.1, 0.2, 0.3, 0.4])));
    expect(service.modelName).toBe('nomic-embed-text');
  });

  it('asks openai for the configured dimension', async () => {
    mocks.create.mockResolvedValue({ data: [{ embedding: [1, 0, 0, 0] }] });

    const service = createEmbeddingService(config({
      provider: 'openai',
      baseUrl: 'https://api.openai.com/v1',
      apiKey: 'test-key',
      model: 'text-embedding-3-small',
    }));
    await service.embed('hello');

    expect(mocks.create).toHaveBeenCalledWith(
      { model: 'text-embedding-3-small', input: 'hello', encoding_format: 'float', dimensions: 4 },
      { signal: expect.any(AbortSignal) },
    );
  });

  it('refuses openai without an API key', () => {
    expect(() => createEmbeddingService(config({ provider: 'openai' })))
      .toThrow(EmbeddingUnavailableError);
  });

  it('flags vectors of the wrong dimension', async () => {
    mocks.create.mockResolvedValue({ data: [{ embedding: [1, 0] }] });

    const service = createEmbeddingService(config());
    await expect(service.embed('hello')).rejects.toMatchObject({
      code: 'EMBEDDING_UNAVAILABLE',
      reason: 'dimension_mismatch',
    });
  });

  it('flags an empty response', async () => {
    mocks.create.mockResolvedValue({ data: [] });

    const service = createEmbeddingService(config());
    await expect(service.embed('hello')).rejects.toMatchObject({ reason: 'invalid_response' });
  });

  it('maps request failures to a retryable unavailable error', async () => {
    mocks.create.mockRejectedValue(new Error('ECONNREFUSED'));

    const service = createEmbeddingService(config());
    const error = await service.embed('hello').catch((err: unknown) => err);

    if (!(error instanceof EmbeddingUnavailableError)) throw error;
    expect(error.reason).toBe('request_failed');
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Embedding request to nomic-embed-text failed: ECONNREFUSED');
  });

  it('builds the offline hashing embedder without a client', async () => {
    const service = createEmbeddingService(config({ provider: 'hashing', model: 'hashing-v1', dimension: 16 }));
    const vector = await service.embed('cache invalidation bug');

    expect(vector).toHaveLength(16);
    expect(mocks.construct).not.toHaveBeenCalled();
  });
});

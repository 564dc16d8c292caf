import Fastify from 'fastify';
import type { EmbeddingService } from 'memory-core';
import type { ServerConfig } from '../config.js';

export const TEST_CONFIG: ServerConfig = {
  port: 0,
  host: '127.0.0.1',
  nodeEnv: 'test',
  logLevel: 'silent',
  dbPath: ':memory:',

  admissionThreshold: 0.7,
  dedupThreshold: 0.92,
  defaultConfidence: 0.8,
  similarityWeight: 0.7,
  confidenceWeight: 0.3,
  queryOversample: 3,
  queryMinScore: 0,
  embedContext: false,
  mergeContext: true,
  mergeSessionSource: 'keep',
  lockTimeoutMs: 2000,
  unhealthyAfterIoErrors: 3,

  embedding: {
    provider: 'hashing',
    baseUrl: '',
    apiKey: '',
    model: 'hashing-v1',
    dimension: 384,
    timeoutMs: 5000,
  },
};

/**
 * Embedder answering from a fixed text -> vector table.
 */
export class ScriptedEmbeddings implements EmbeddingService {
  readonly dimension: number = 4;
  readonly calls: string[] = [];
  failure: Error | null = null;
  delayMs = 0;

  constructor(
    private readonly vectors: Record<string, number[]>,
    readonly modelName = 'scripted-v1',
  ) {}

  async embed(text: string): Promise<Float32Array> {
    this.calls.push(text);
    if (this.delayMs > 0) {
      await new Promise(resolve => setTimeout(resolve, this.delayMs));
    }
    if (this.failure) throw this.failure;

    const vector = this.vectors[text];
    if (!vector) throw new Error(`no scripted vector for "${text}"`);
    return Float32Array.from(vector);
  }
}

export function silentLogger() {
  return Fastify({ logger: false }).log;
}

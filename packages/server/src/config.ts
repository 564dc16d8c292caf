export type EmbeddingProviderName = 'openai' | 'ollama' | 'hashing';

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  baseUrl: string;
  apiKey: string;
  model: string;
  dimension: number;
  timeoutMs: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  dbPath: string;

  admissionThreshold: number;
  dedupThreshold: number;
  defaultConfidence: number;
  similarityWeight: number;
  confidenceWeight: number;
  queryOversample: number;
  queryMinScore: number;
  embedContext: boolean;
  mergeContext: boolean;
  mergeSessionSource: 'keep' | 'latest';
  lockTimeoutMs: number;
  unhealthyAfterIoErrors: number;

  embedding: EmbeddingConfig;
}

const EMBEDDING_DEFAULTS: Record<EmbeddingProviderName, { baseUrl: string; model: string; dimension: number }> = {
  ollama: { baseUrl: 'http://localhost:11434/v1', model: 'nomic-embed-text', dimension: 768 },
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'text-embedding-3-small', dimension: 1536 },
  hashing: { baseUrl: '', model: 'hashing-v1', dimension: 384 },
};

function requireEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function numberEnv(name: string, fallback: number, range?: { min: number; max: number }): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got "${raw}"`);
  }
  if (range && (value < range.min || value > range.max)) {
    throw new Error(`${name} must be between ${range.min} and ${range.max}, got ${value}`);
  }
  return value;
}

function intEnv(name: string, fallback: number, min = 0): number {
  const value = numberEnv(name, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

function boolEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw.toLowerCase() === 'true' || raw === '1';
}

function oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const match = allowed.find(a => a === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
  }
  return match;
}

export function loadConfig(): ServerConfig {
  const nodeEnv = oneOf('NODE_ENV', ['development', 'production', 'test'], 'development');
  const isDev = nodeEnv === 'development';

  const provider = oneOf('EMBEDDING_PROVIDER', ['openai', 'ollama', 'hashing'], 'ollama');
  const defaults = EMBEDDING_DEFAULTS[provider];

  return {
    port: intEnv('PORT', 8741),
    host: process.env.HOST || '127.0.0.1',
    nodeEnv,
    logLevel: process.env.LOG_LEVEL || 'info',
    dbPath: process.env.DB_PATH || 'file:learnings.db',

    admissionThreshold: numberEnv('ADMISSION_THRESHOLD', 0.7, { min: 0, max: 1 }),
    dedupThreshold: numberEnv('DEDUP_THRESHOLD', 0.92, { min: -1, max: 1 }),
    defaultConfidence: numberEnv('DEFAULT_CONFIDENCE', 0.8, { min: 0, max: 1 }),
    similarityWeight: numberEnv('SIMILARITY_WEIGHT', 0.7, { min: 0, max: 1 }),
    confidenceWeight: numberEnv('CONFIDENCE_WEIGHT', 0.3, { min: 0, max: 1 }),
    queryOversample: intEnv('QUERY_OVERSAMPLE', 3, 1),
    queryMinScore: numberEnv('QUERY_MIN_SCORE', 0, { min: -1, max: 1 }),
    embedContext: boolEnv('EMBED_CONTEXT', false),
    mergeContext: boolEnv('MERGE_CONTEXT', true),
    mergeSessionSource: oneOf('MERGE_SESSION_SOURCE', ['keep', 'latest'], 'keep'),
    lockTimeoutMs: intEnv('LOCK_TIMEOUT_MS', 2000, 1),
    unhealthyAfterIoErrors: intEnv('UNHEALTHY_AFTER_IO_ERRORS', 3, 1),

    embedding: {
      provider,
      baseUrl: process.env.EMBEDDING_BASE_URL || defaults.baseUrl,
      apiKey: process.env.EMBEDDING_API_KEY || (provider !== 'openai' || isDev
        ? ''
        : requireEnv('EMBEDDING_API_KEY')),
      model: process.env.EMBEDDING_MODEL || defaults.model,
      dimension: intEnv('EMBEDDING_DIMENSION', defaults.dimension, 1),
      timeoutMs: intEnv('EMBEDDING_TIMEOUT_MS', 5000, 1),
    },
  };
}

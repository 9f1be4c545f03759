import { ConfigurationError } from './errors';

export type LlmProvider = 'gemini' | 'openai' | 'ollama' | 'none';

export interface ChunkingConfig {
  chunkSize: number;
  chunkOverlap: number;
}

export interface AppConfig {
  port: number;
  geminiApiKey?: string;
  openaiApiKey?: string;
  ollamaBaseUrl: string;
  llm: {
    provider: LlmProvider;
    model: string;
    temperature: number;
    maxOutputTokens: number;
    timeoutMs: number;
    required: boolean;
  };
  embedding: {
    model: string;
    dimension: number;
    maxConcurrent: number;
  };
  pinecone: {
    apiKey?: string;
    indexName: string;
  };
  chunking: ChunkingConfig;
  topK: number;
  rankConcurrency: number;
  ingest: {
    maxAttempts: number;
    retryDelayMs: number;
  };
}

const DEFAULT_MODELS: Record<LlmProvider, string> = {
  gemini: 'gemini-1.5-flash',
  openai: 'gpt-4o-mini',
  ollama: 'llama3.1',
  none: ''
};

/**
 * Throws unless `chunkSize > chunkOverlap >= 0`; an overlap as large as the
 * window would never advance it.
 */
export function validateChunking(chunkSize: number, chunkOverlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new ConfigurationError(`chunk_size must be a positive integer, got ${chunkSize}`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0) {
    throw new ConfigurationError(`chunk_overlap must be a non-negative integer, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new ConfigurationError(`chunk_overlap (${chunkOverlap}) must be smaller than chunk_size (${chunkSize})`);
  }
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number = 0): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function readFloat(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = parseFloat(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

function readProvider(raw: string | undefined): LlmProvider {
  const value = (raw || 'gemini').trim().toLowerCase();
  if (value === 'gemini' || value === 'openai' || value === 'ollama' || value === 'none') {
    return value;
  }
  throw new ConfigurationError(`LLM_PROVIDER must be one of gemini, openai, ollama, none; got '${raw}'`);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const provider = readProvider(env.LLM_PROVIDER);
  const chunking: ChunkingConfig = {
    chunkSize: readInt(env, 'CHUNK_SIZE', 1000, 1),
    chunkOverlap: readInt(env, 'CHUNK_OVERLAP', 200)
  };
  validateChunking(chunking.chunkSize, chunking.chunkOverlap);

  const config: AppConfig = {
    port: readInt(env, 'PORT', 5003),
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
    llm: {
      provider,
      model: env.LLM_MODEL || DEFAULT_MODELS[provider],
      temperature: readFloat(env, 'LLM_TEMPERATURE', 0.3),
      maxOutputTokens: readInt(env, 'LLM_MAX_OUTPUT_TOKENS', 8192, 1),
      timeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 60000, 1),
      required: env.LLM_REQUIRED === 'true'
    },
    embedding: {
      model: env.EMBEDDING_MODEL || 'text-embedding-004',
      dimension: readInt(env, 'EMBEDDING_DIMENSION', 768, 1),
      maxConcurrent: readInt(env, 'EMBEDDING_MAX_CONCURRENT', 10, 1)
    },
    pinecone: {
      apiKey: env.PINECONE_API_KEY || undefined,
      indexName: env.PINECONE_INDEX_NAME || 'resume-rag-index'
    },
    chunking,
    topK: readInt(env, 'TOP_K_RESULTS', 5, 1),
    rankConcurrency: readInt(env, 'RANK_CONCURRENCY', 4, 1),
    ingest: {
      maxAttempts: readInt(env, 'INGEST_MAX_ATTEMPTS', 3, 1),
      retryDelayMs: readInt(env, 'INGEST_RETRY_DELAY_MS', 1000)
    }
  };

  // A local Ollama server needs no key
  if (config.llm.required && provider !== 'ollama') {
    const key = provider === 'openai' ? config.openaiApiKey : config.geminiApiKey;
    if (provider === 'none' || !key) {
      throw new ConfigurationError(`LLM_REQUIRED is set but provider '${provider}' has no API key configured`);
    }
  }

  return config;
}

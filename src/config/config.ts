// src/config/config.ts
import dotenv from 'dotenv';
import { AnalysisMode, IndexStrategy } from '../types';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export type VectorStoreKind = 'memory' | 'qdrant';

export interface Config {
  nodeEnv: string;
  port: number;
  logLevel: string;
  debugMode: boolean;
  corpus: {
    snapshotPath: string;
  };
  retrieval: {
    strategy: IndexStrategy;
    maxVocabularySize: number;
    resultCount: number;
    chunkSize: number;
    chunkOverlap: number;
    minScore?: number;
    contextExcerptChars: number;
    summaryExcerptChars: number;
  };
  analysis: {
    mode: AnalysisMode;
  };
  qdrant: {
    vectorStore: VectorStoreKind;
    url: string;
    collection: string;
  };
  openai: {
    apiKey: string;
    azureEndpoint?: string;
    azureApiVersion?: string;
    model: string;
    timeoutMs: number;
  };
  embeddings: {
    apiKey: string;   // Cohere API key
    model: string;    // Cohere embedding model
    batchSize: number;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${key} must be an integer, got "${raw}"`, key);
  }
  return value;
}

function readOptionalNumber(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`, key);
  }
  return value;
}

function readChoice<T extends string>(env: Env, key: string, choices: readonly T[], fallback: T): T {
  const raw = env[key];
  if (raw === undefined || raw === '') return fallback;
  const choice = choices.find(candidate => candidate === raw.toLowerCase());
  if (!choice) {
    throw new ConfigurationError(`${key} must be one of ${choices.join(', ')}, got "${raw}"`, key);
  }
  return choice;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    nodeEnv: env.NODE_ENV || 'development',
    port: readInt(env, 'PORT', 3000),
    logLevel: env.LOG_LEVEL || 'info',
    debugMode: env.DEBUG_MODE === 'true' || env.DEBUG_MODE === '1',
    corpus: {
      snapshotPath: env.CORPUS_PATH || './data/statutes.json',
    },
    retrieval: {
      strategy: readChoice(env, 'INDEX_STRATEGY', ['lexical', 'semantic'] as const, 'lexical'),
      maxVocabularySize: readInt(env, 'MAX_VOCABULARY_SIZE', 1000),
      resultCount: readInt(env, 'RESULT_COUNT', 5),
      chunkSize: readInt(env, 'CHUNK_SIZE', 1000),
      chunkOverlap: readInt(env, 'CHUNK_OVERLAP', 200),
      minScore: readOptionalNumber(env, 'RETRIEVAL_MIN_SCORE'),
      contextExcerptChars: readInt(env, 'CONTEXT_EXCERPT_CHARS', 400),
      summaryExcerptChars: readInt(env, 'SUMMARY_EXCERPT_CHARS', 300),
    },
    analysis: {
      mode: readChoice(env, 'ANALYSIS_MODE', ['local', 'external'] as const, 'local'),
    },
    qdrant: {
      vectorStore: readChoice(env, 'VECTOR_STORE', ['memory', 'qdrant'] as const, 'memory'),
      url: env.QDRANT_URL || 'http://localhost:6333',
      collection: env.QDRANT_COLLECTION || 'statute_documents',
    },
    openai: {
      apiKey: env.OPENAI_API_KEY || '',
      azureEndpoint: env.AZURE_OPENAI_ENDPOINT || undefined,
      azureApiVersion: env.AZURE_OPENAI_API_VERSION || undefined,
      model: env.AGENT_MODEL_DEPLOYMENT || 'gpt-4o-mini',
      timeoutMs: readInt(env, 'LLM_TIMEOUT_MS', 30000),
    },
    embeddings: {
      apiKey: env.COHERE_API_KEY || '',
      model: env.EMBEDDING_MODEL || 'embed-multilingual-v3.0',
      batchSize: readInt(env, 'EMBEDDING_BATCH_SIZE', 20),
    },
  };
}

/**
 * Throws ConfigurationError for settings the engine cannot run with.
 * Returns warnings for settings that only disable optional features.
 */
export function validateConfig(config: Config): string[] {
  const { retrieval } = config;
  const positive: [string, number][] = [
    ['MAX_VOCABULARY_SIZE', retrieval.maxVocabularySize],
    ['RESULT_COUNT', retrieval.resultCount],
    ['CHUNK_SIZE', retrieval.chunkSize],
    ['CONTEXT_EXCERPT_CHARS', retrieval.contextExcerptChars],
    ['SUMMARY_EXCERPT_CHARS', retrieval.summaryExcerptChars],
  ];
  for (const [key, value] of positive) {
    if (value < 1) {
      throw new ConfigurationError(`${key} must be at least 1, got ${value}`, key);
    }
  }
  if (retrieval.chunkOverlap < 0 || retrieval.chunkOverlap >= retrieval.chunkSize) {
    throw new ConfigurationError(
      `CHUNK_OVERLAP must be in [0, CHUNK_SIZE), got ${retrieval.chunkOverlap} with CHUNK_SIZE ${retrieval.chunkSize}`,
      'CHUNK_OVERLAP'
    );
  }
  if (retrieval.strategy === 'semantic' && !config.embeddings.apiKey) {
    throw new ConfigurationError('INDEX_STRATEGY=semantic requires COHERE_API_KEY', 'COHERE_API_KEY');
  }

  const warnings: string[] = [];
  if (!config.openai.apiKey) {
    warnings.push('OPENAI_API_KEY is not set. External analysis will fall back to the local summary.');
  }
  if (config.openai.azureEndpoint && !config.openai.azureApiVersion) {
    warnings.push('AZURE_OPENAI_API_VERSION is not set. The Azure OpenAI client will use its default API version.');
  }
  return warnings;
}

const config: Config = loadConfig();

export default config;

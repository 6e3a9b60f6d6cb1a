/**
 * Configuration settings for the RAG pipeline.
 */
import dotenv from 'dotenv';
import { ConfigurationError, UnsupportedResponseModeError } from './errors.js';

dotenv.config();

export type ProviderType = 'local_api' | 'managed_api';

export interface ModelConfiguration {
  name: string;
  provider: ProviderType;
  llmModel: string;
  embeddingModel: string;
  apiBase?: string;
  apiVersion?: string;
}

// Model Configuration
// For managed_api entries the model names are deployment names.
export const MODEL_CONFIGS: Readonly<Record<string, Readonly<ModelConfiguration>>> = Object.freeze({
  default: Object.freeze({
    name: 'default',
    provider: 'local_api',
    llmModel: 'gpt-4o',
    embeddingModel: 'text-embedding-3-large',
  }),
  fast: Object.freeze({
    name: 'fast',
    provider: 'local_api',
    llmModel: 'gpt-4',
    embeddingModel: 'text-embedding-3-small',
  }),
  legacy: Object.freeze({
    name: 'legacy',
    provider: 'local_api',
    llmModel: 'gpt-3.5-turbo',
    embeddingModel: 'text-embedding-3-small',
  }),
  local: Object.freeze({
    name: 'local',
    provider: 'local_api',
    llmModel: 'llama3.1',
    embeddingModel: 'nomic-embed-text',
    apiBase: 'http://localhost:11434/v1',
  }),
  azure_default: Object.freeze({
    name: 'azure_default',
    provider: 'managed_api',
    llmModel: 'gpt-4',
    embeddingModel: 'text-embedding-ada-002',
    apiVersion: '2024-02-15-preview',
  }),
  azure_fast: Object.freeze({
    name: 'azure_fast',
    provider: 'managed_api',
    llmModel: 'gpt-35-turbo',
    embeddingModel: 'text-embedding-ada-002',
    apiVersion: '2024-02-15-preview',
  }),
});

// File type Configuration
export const FILE_TYPES: Readonly<Record<string, readonly string[]>> = Object.freeze({
  default: Object.freeze(['.pdf', '.docx', '.txt', '.md']),
  text_only: Object.freeze(['.txt', '.md']),
  documents: Object.freeze(['.pdf', '.docx']),
});

// Vector store Configuration
export const STORE_CONFIG = Object.freeze({
  collectionPrefix: 'rag_collection',
  persistDirectory: process.env.RAG_PERSIST_DIR || 'data/vector_store',
});

export const DEFAULT_DATA_DIR = process.env.RAG_DATA_DIR || 'data/test_docs';

// Query Configuration
export const RESPONSE_MODES = ['compact', 'refine', 'tree_summarize'] as const;
export type ResponseMode = (typeof RESPONSE_MODES)[number];

export interface QueryConfig {
  defaultResponseMode: ResponseMode;
  supportedResponseModes: readonly ResponseMode[];
  similarityTopK: number;
  contextWindow: number; // Tokens
  numOutput: number; // Tokens reserved for the answer
}

export const QUERY_CONFIG: Readonly<QueryConfig> = Object.freeze({
  defaultResponseMode: 'compact',
  supportedResponseModes: RESPONSE_MODES,
  similarityTopK: 2,
  contextWindow: 3900,
  numOutput: 256,
});

// Chunking Configuration
export const CHUNKING_CONFIG = Object.freeze({
  chunkSize: 512,
  chunkOverlap: 50,
  embedBatchSize: 64,
});

// Server Configuration
export const SERVER_CONFIG = Object.freeze({
  port: parseInt(process.env.PORT || '3000', 10),
  defaultCollection: process.env.RAG_COLLECTION || undefined,
});

const COLLECTION_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{1,61}[A-Za-z0-9]$/;

/**
 * Get the model configuration registered under `name`.
 */
export function resolveModel(name: string): ModelConfiguration {
  if (!Object.hasOwn(MODEL_CONFIGS, name)) {
    throw new ConfigurationError(
      `Unknown model configuration: ${name}. Available: ${Object.keys(MODEL_CONFIGS).join(', ')}`
    );
  }
  return MODEL_CONFIGS[name];
}

/**
 * Get the file extensions registered under `name`.
 */
export function resolveFileTypes(name: string): readonly string[] {
  if (!Object.hasOwn(FILE_TYPES, name)) {
    throw new ConfigurationError(
      `Unknown file types configuration: ${name}. Available: ${Object.keys(FILE_TYPES).join(', ')}`
    );
  }
  return FILE_TYPES[name];
}

/**
 * The requested response mode, or the default when none is given.
 */
export function resolveResponseMode(queryConfig: QueryConfig, responseMode?: string): ResponseMode {
  if (responseMode === undefined) {
    return queryConfig.defaultResponseMode;
  }
  const supported = queryConfig.supportedResponseModes.find((mode) => mode === responseMode);
  if (supported === undefined) {
    throw new UnsupportedResponseModeError(responseMode, queryConfig.supportedResponseModes);
  }
  return supported;
}

export function validateCollectionName(name: string): string {
  if (!COLLECTION_NAME_PATTERN.test(name) || name.includes('..')) {
    throw new ConfigurationError(
      `Invalid collection name '${name}': use 3-63 characters from [A-Za-z0-9._-], ` +
        'starting and ending with a letter or digit'
    );
  }
  return name;
}

/**
 * Collection names are tied to the model configuration that produced their
 * vectors: `{prefix}_{modelConfigName}` unless a name is given explicitly.
 */
export function resolveCollectionName(
  modelConfigName: string,
  explicitName?: string,
  prefix: string = STORE_CONFIG.collectionPrefix
): string {
  return validateCollectionName(explicitName ?? `${prefix}_${modelConfigName}`);
}

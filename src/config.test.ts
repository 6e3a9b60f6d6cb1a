import { describe, expect, it } from 'vitest';
import {
  MODEL_CONFIGS,
  QUERY_CONFIG,
  resolveCollectionName,
  resolveFileTypes,
  resolveModel,
  resolveResponseMode,
  validateCollectionName,
} from './config.js';
import { ConfigurationError, UnsupportedResponseModeError } from './errors.js';

describe('resolveModel', () => {
  it('returns the registered configurations', () => {
    expect(resolveModel('default')).toEqual({
      name: 'default',
      provider: 'local_api',
      llmModel: 'gpt-4o',
      embeddingModel: 'text-embedding-3-large',
    });
    expect(resolveModel('fast').embeddingModel).toBe('text-embedding-3-small');
    expect(resolveModel('legacy').llmModel).toBe('gpt-3.5-turbo');
    expect(resolveModel('azure_default').provider).toBe('managed_api');
    expect(resolveModel('azure_fast').llmModel).toBe('gpt-35-turbo');
  });

  it('rejects unknown names and lists the available ones', () => {
    expect(() => resolveModel('nope')).toThrow(ConfigurationError);
    expect(() => resolveModel('nope')).toThrow(
      'Unknown model configuration: nope. Available: default, fast, legacy, local, azure_default, azure_fast'
    );
  });

  it('does not resolve inherited object keys', () => {
    expect(() => resolveModel('toString')).toThrow(ConfigurationError);
  });

  it('keeps the registry immutable', () => {
    expect(Object.isFrozen(MODEL_CONFIGS)).toBe(true);
    expect(Object.isFrozen(MODEL_CONFIGS.default)).toBe(true);
  });
});

describe('resolveFileTypes', () => {
  it('returns the extension lists', () => {
    expect(resolveFileTypes('default')).toEqual(['.pdf', '.docx', '.txt', '.md']);
    expect(resolveFileTypes('text_only')).toEqual(['.txt', '.md']);
    expect(resolveFileTypes('documents')).toEqual(['.pdf', '.docx']);
  });

  it('rejects unknown names', () => {
    expect(() => resolveFileTypes('images')).toThrow(
      'Unknown file types configuration: images. Available: default, text_only, documents'
    );
  });
});

describe('resolveCollectionName', () => {
  it('derives the name from the model configuration', () => {
    expect(resolveCollectionName('default')).toBe('rag_collection_default');
    expect(resolveCollectionName('azure_fast')).toBe('rag_collection_azure_fast');
  });

  it('prefers an explicit name', () => {
    expect(resolveCollectionName('default', 'release-notes')).toBe('release-notes');
  });

  it('rejects names the store cannot hold', () => {
    expect(() => resolveCollectionName('default', 'ab')).toThrow(ConfigurationError);
    expect(() => validateCollectionName('a..b')).toThrow(ConfigurationError);
    expect(() => validateCollectionName('../escape')).toThrow(ConfigurationError);
    expect(() => validateCollectionName('_leading')).toThrow(ConfigurationError);
    expect(validateCollectionName('docs.v2')).toBe('docs.v2');
  });
});

describe('resolveResponseMode', () => {
  it('defaults to compact', () => {
    expect(resolveResponseMode(QUERY_CONFIG)).toBe('compact');
  });

  it('accepts every supported mode', () => {
    expect(resolveResponseMode(QUERY_CONFIG, 'refine')).toBe('refine');
    expect(resolveResponseMode(QUERY_CONFIG, 'tree_summarize')).toBe('tree_summarize');
  });

  it('rejects anything else', () => {
    expect(() => resolveResponseMode(QUERY_CONFIG, 'bogus')).toThrow(UnsupportedResponseModeError);
    expect(() => resolveResponseMode(QUERY_CONFIG, 'bogus')).toThrow(
      'Unsupported response mode: bogus. Supported modes: compact, refine, tree_summarize'
    );
  });
});

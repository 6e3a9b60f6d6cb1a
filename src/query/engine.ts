/**
 * Question answering over a loaded collection.
 */
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { QUERY_CONFIG, resolveResponseMode, type QueryConfig, type ResponseMode } from '../config.js';
import { NoIndexLoadedError, toProviderError } from '../errors.js';
import type { CollectionIndex } from '../rag/collectionIndex.js';
import { createQueryGraph, type QueryGraph } from './graph.js';
import { TiktokenCounter, type TokenCounter } from './tokenizer.js';

export interface QueryEngineOptions {
  queryConfig?: QueryConfig;
  tokenCounter?: TokenCounter;
}

export class QueryEngine {
  readonly index: CollectionIndex | null;
  private readonly config: QueryConfig;
  private readonly graph: QueryGraph | null;

  constructor(index: CollectionIndex | null, llm: BaseChatModel, options: QueryEngineOptions = {}) {
    this.index = index;
    this.config = options.queryConfig ?? QUERY_CONFIG;
    this.graph = index
      ? createQueryGraph(index, llm, this.config, options.tokenCounter ?? new TiktokenCounter())
      : null;
  }

  get supportedResponseModes(): readonly ResponseMode[] {
    return this.config.supportedResponseModes;
  }

  /**
   * Resolve the response mode, rejecting unsupported ones before any work.
   */
  resolveResponseMode(responseMode?: string): ResponseMode {
    return resolveResponseMode(this.config, responseMode);
  }

  /**
   * Retrieve relevant chunks and synthesize an answer. Nothing is cached.
   */
  async query(question: string, responseMode?: string): Promise<string> {
    if (this.graph === null) {
      throw new NoIndexLoadedError(
        'Index not loaded. Make sure the collection exists and has documents.'
      );
    }

    const mode = this.resolveResponseMode(responseMode);

    try {
      const result = await this.graph.invoke({ question, responseMode: mode });
      return result.answer;
    } catch (error) {
      throw toProviderError('Query failed', error);
    }
  }
}

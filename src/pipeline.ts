/**
 * RAG pipeline: resolve configuration, load or build the collection, answer queries.
 */
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import {
  CHUNKING_CONFIG,
  DEFAULT_DATA_DIR,
  QUERY_CONFIG,
  STORE_CONFIG,
  resolveCollectionName,
  resolveFileTypes,
  resolveModel,
  resolveResponseMode,
  type ModelConfiguration,
  type QueryConfig,
  type ResponseMode,
} from './config.js';
import { NoIndexLoadedError } from './errors.js';
import { createChatModel, createEmbeddings } from './providers.js';
import { QueryEngine } from './query/engine.js';
import type { TokenCounter } from './query/tokenizer.js';
import type { CollectionIndex } from './rag/collectionIndex.js';
import { CollectionManager } from './rag/collectionManager.js';
import { CollectionStore } from './rag/collectionStore.js';
import { DocumentLoader } from './rag/documentLoader.js';

export interface RagPipelineOptions {
  dataDir?: string;
  collectionName?: string;
  modelConfig?: string;
  fileTypes?: string;
  recursive?: boolean;
  excludeHidden?: boolean;
  persistDirectory?: string;
  chunkSize?: number;
  chunkOverlap?: number;
  queryConfig?: QueryConfig;
}

/**
 * Collaborators that default to the configured providers. Tests and
 * embedders of the pipeline supply their own.
 */
export interface RagPipelineDependencies {
  embeddings?: EmbeddingsInterface;
  llm?: BaseChatModel;
  store?: CollectionStore;
  documentLoader?: DocumentLoader;
  tokenCounter?: TokenCounter;
}

type PipelineState =
  | { status: 'absent' }
  | { status: 'built'; index: CollectionIndex; engine: QueryEngine };

export class RagPipeline {
  readonly dataDir: string;
  readonly collectionName: string;
  readonly modelConfig: ModelConfiguration;
  readonly fileTypes: readonly string[];

  private readonly recursive: boolean;
  private readonly excludeHidden: boolean;
  private readonly queryConfig: QueryConfig;
  private readonly llm: BaseChatModel;
  private readonly tokenCounter?: TokenCounter;
  private readonly documentLoader: DocumentLoader;
  private readonly manager: CollectionManager;
  private state: PipelineState = { status: 'absent' };

  constructor(options: RagPipelineOptions = {}, deps: RagPipelineDependencies = {}) {
    const modelConfigName = options.modelConfig ?? 'default';

    this.modelConfig = resolveModel(modelConfigName);
    this.fileTypes = resolveFileTypes(options.fileTypes ?? 'default');
    this.collectionName = resolveCollectionName(modelConfigName, options.collectionName);
    this.dataDir = options.dataDir ?? DEFAULT_DATA_DIR;
    this.recursive = options.recursive ?? false;
    this.excludeHidden = options.excludeHidden ?? true;
    this.queryConfig = options.queryConfig ?? QUERY_CONFIG;

    this.llm = deps.llm ?? createChatModel(this.modelConfig);
    this.tokenCounter = deps.tokenCounter;
    this.documentLoader = deps.documentLoader ?? new DocumentLoader();
    this.manager = new CollectionManager({
      store: deps.store ?? new CollectionStore(options.persistDirectory ?? STORE_CONFIG.persistDirectory),
      embeddings: deps.embeddings ?? createEmbeddings(this.modelConfig),
      embeddingModel: this.modelConfig.embeddingModel,
      chunkSize: options.chunkSize ?? CHUNKING_CONFIG.chunkSize,
      chunkOverlap: options.chunkOverlap ?? CHUNKING_CONFIG.chunkOverlap,
    });
  }

  get isLoaded(): boolean {
    return this.state.status === 'built';
  }

  get supportedFileTypes(): string[] {
    return this.documentLoader.supportedExtensions;
  }

  get supportedResponseModes(): readonly ResponseMode[] {
    return this.queryConfig.supportedResponseModes;
  }

  resolveResponseMode(responseMode?: string): ResponseMode {
    return resolveResponseMode(this.queryConfig, responseMode);
  }

  /**
   * Load the existing collection if it holds documents; otherwise load the
   * data directory and build it. Returns the active collection's size
   * (0 when nothing was found to index).
   */
  async loadDocuments(fileTypes?: readonly string[]): Promise<number> {
    const docCount = this.manager.getDocumentCount(this.collectionName);
    if (docCount > 0) {
      console.log(`Loading existing index with ${docCount} documents...`);
      return this.loadExistingIndex();
    }

    const documents = await this.documentLoader.load(
      this.dataDir,
      fileTypes ?? this.fileTypes,
      this.recursive,
      this.excludeHidden
    );
    if (documents.length === 0) {
      return 0;
    }

    const index = await this.manager.createIndex(documents, { name: this.collectionName });
    if (index.documentCount === 0) {
      this.state = { status: 'absent' };
      return 0;
    }
    this.activate(index);
    return index.documentCount;
  }

  /**
   * Attach to a stored collection without reading the data directory.
   * Returns the collection's size, 0 if it is absent or empty.
   */
  async loadExistingIndex(): Promise<number> {
    const index = await this.manager.getExistingIndex(this.collectionName);
    if (index === null) {
      this.state = { status: 'absent' };
      return 0;
    }
    this.activate(index);
    return index.documentCount;
  }

  async query(question: string, responseMode?: string): Promise<string> {
    if (this.state.status === 'absent') {
      throw new NoIndexLoadedError();
    }
    return this.state.engine.query(question, responseMode);
  }

  /**
   * Delete the collection and forget the active index.
   */
  deleteIndex(): void {
    this.manager.deleteCollection(this.collectionName);
    this.state = { status: 'absent' };
  }

  getDocumentCount(): number {
    return this.manager.getDocumentCount(this.collectionName);
  }

  private activate(index: CollectionIndex): void {
    const engine = new QueryEngine(index, this.llm, {
      queryConfig: this.queryConfig,
      tokenCounter: this.tokenCounter,
    });
    this.state = { status: 'built', index, engine };
  }
}

/**
 * Manages collection lifecycle: build, load, count and delete.
 */
import { createHash } from 'crypto';
import type { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { CHUNKING_CONFIG } from '../config.js';
import { toProviderError } from '../errors.js';
import { CollectionIndex } from './collectionIndex.js';
import type { CollectionStore, RecordMetadata, StoredRecord } from './collectionStore.js';

export interface CollectionManagerOptions {
  store: CollectionStore;
  embeddings: EmbeddingsInterface;
  embeddingModel: string;
  chunkSize?: number;
  chunkOverlap?: number;
  embedBatchSize?: number;
}

export interface CollectionConfig {
  name: string;
}

interface PendingChunk {
  id: string;
  content: string;
  metadata: RecordMetadata;
}

/**
 * Keep primitive metadata values; flatten the splitter's line range.
 */
function toRecordMetadata(metadata: Record<string, unknown>): RecordMetadata {
  const result: RecordMetadata = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      result[key] = value;
    }
  }

  const loc = metadata.loc;
  if (typeof loc === 'object' && loc !== null && 'lines' in loc) {
    const lines = loc.lines;
    if (typeof lines === 'object' && lines !== null && 'from' in lines && 'to' in lines) {
      if (typeof lines.from === 'number') result.line_from = lines.from;
      if (typeof lines.to === 'number') result.line_to = lines.to;
    }
  }

  return result;
}

function chunkId(metadata: RecordMetadata, chunkIndex: number, content: string): string {
  return createHash('sha256')
    .update(`${metadata.source_path ?? ''}:${metadata.page_number ?? ''}:${chunkIndex}:${content}`)
    .digest('hex');
}

/**
 * Owns the persistent collections for one embedding model.
 */
export class CollectionManager {
  private readonly store: CollectionStore;
  private readonly embeddings: EmbeddingsInterface;
  private readonly embeddingModel: string;
  private readonly textSplitter: RecursiveCharacterTextSplitter;
  private readonly embedBatchSize: number;

  constructor(options: CollectionManagerOptions) {
    this.store = options.store;
    this.embeddings = options.embeddings;
    this.embeddingModel = options.embeddingModel;
    this.embedBatchSize = options.embedBatchSize ?? CHUNKING_CONFIG.embedBatchSize;
    this.textSplitter = new RecursiveCharacterTextSplitter({
      chunkSize: options.chunkSize ?? CHUNKING_CONFIG.chunkSize,
      chunkOverlap: options.chunkOverlap ?? CHUNKING_CONFIG.chunkOverlap,
    });
  }

  /**
   * Number of stored items; 0 if the collection does not exist.
   */
  getDocumentCount(collectionName: string): number {
    try {
      return this.store.count(collectionName);
    } catch (error) {
      throw toProviderError(`Could not read collection '${collectionName}'`, error);
    }
  }

  /**
   * Split, embed and upsert documents into the named collection.
   * Each embedding batch is persisted as soon as it is embedded; a failure
   * part-way leaves the earlier batches in place.
   */
  async createIndex(documents: Document[], collectionConfig: CollectionConfig): Promise<CollectionIndex> {
    const chunks = await this.splitDocuments(documents);
    const { name } = collectionConfig;

    // Documents with no text produce no chunks; leave the store untouched
    if (chunks.length === 0) {
      console.warn(`No text to index in ${documents.length} documents; collection '${name}' not created`);
      return CollectionIndex.fromRecords(name, [], this.embeddings);
    }

    try {
      this.store.ensure(name, this.embeddingModel);
    } catch (error) {
      throw toProviderError(`Could not create collection '${name}'`, error);
    }

    for (let start = 0; start < chunks.length; start += this.embedBatchSize) {
      const batch = chunks.slice(start, start + this.embedBatchSize);

      let vectors: number[][];
      try {
        vectors = await this.embeddings.embedDocuments(batch.map((chunk) => chunk.content));
      } catch (error) {
        throw toProviderError('Embedding request failed', error);
      }
      if (vectors.length !== batch.length) {
        throw toProviderError(
          'Embedding request failed',
          new Error(`expected ${batch.length} vectors, received ${vectors.length}`)
        );
      }

      const records: StoredRecord[] = batch.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }));
      try {
        this.store.upsert(name, records, this.embeddingModel);
      } catch (error) {
        throw toProviderError(`Could not write collection '${name}'`, error);
      }
    }

    console.log(
      `Created index for ${documents.length} documents (${chunks.length} chunks) in collection '${name}'`
    );

    return CollectionIndex.fromRecords(name, this.store.getRecords(name), this.embeddings);
  }

  /**
   * Load a stored collection. Returns null when it does not exist or holds
   * no items; both mean there is nothing to query.
   */
  async getExistingIndex(collectionName: string): Promise<CollectionIndex | null> {
    let records: StoredRecord[];
    try {
      if (!this.store.exists(collectionName)) {
        console.warn(`Collection '${collectionName}' does not exist.`);
        return null;
      }
      records = this.store.getRecords(collectionName);
    } catch (error) {
      throw toProviderError(`Could not read collection '${collectionName}'`, error);
    }

    if (records.length === 0) {
      console.warn(`Collection '${collectionName}' exists but has no documents.`);
      return null;
    }

    return CollectionIndex.fromRecords(collectionName, records, this.embeddings);
  }

  /**
   * Irrevocably remove a collection. Throws CollectionNotFoundError if absent.
   */
  deleteCollection(collectionName: string): void {
    try {
      this.store.deleteCollection(collectionName);
    } catch (error) {
      throw toProviderError(`Could not delete collection '${collectionName}'`, error);
    }
    console.log(`Deleted collection '${collectionName}'`);
  }

  private async splitDocuments(documents: Document[]): Promise<PendingChunk[]> {
    const chunks: PendingChunk[] = [];

    for (const document of documents) {
      const pieces = await this.textSplitter.splitDocuments([document]);
      pieces.forEach((piece, chunkIndex) => {
        const metadata = { ...toRecordMetadata(piece.metadata), chunk_index: chunkIndex };
        chunks.push({
          id: chunkId(metadata, chunkIndex, piece.pageContent),
          content: piece.pageContent,
          metadata,
        });
      });
    }

    return chunks;
  }
}

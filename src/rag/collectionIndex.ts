/**
 * Searchable view over one loaded collection.
 */
import { Document } from '@langchain/core/documents';
import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { MemoryVectorStore } from 'langchain/vectorstores/memory';
import { toProviderError } from '../errors.js';
import type { StoredRecord } from './collectionStore.js';

export class CollectionIndex {
  readonly name: string;
  readonly documentCount: number;
  private readonly vectorStore: MemoryVectorStore;

  private constructor(name: string, documentCount: number, vectorStore: MemoryVectorStore) {
    this.name = name;
    this.documentCount = documentCount;
    this.vectorStore = vectorStore;
  }

  /**
   * Build an index from stored records. Uses the stored vectors as-is;
   * only queries are embedded.
   */
  static async fromRecords(
    name: string,
    records: StoredRecord[],
    embeddings: EmbeddingsInterface
  ): Promise<CollectionIndex> {
    const vectorStore = new MemoryVectorStore(embeddings);
    if (records.length > 0) {
      await vectorStore.addVectors(
        records.map((record) => record.embedding),
        records.map((record) => new Document({
          pageContent: record.content,
          metadata: { ...record.metadata },
          id: record.id,
        }))
      );
    }
    return new CollectionIndex(name, records.length, vectorStore);
  }

  /**
   * Top-k chunks by cosine similarity to the query, best first.
   */
  async similaritySearch(query: string, k: number): Promise<Array<[Document, number]>> {
    try {
      const results = await this.vectorStore.similaritySearchWithScore(query, k);
      return results.map(([doc, score]) => [
        new Document({ pageContent: doc.pageContent, metadata: doc.metadata, id: doc.id }),
        score,
      ]);
    } catch (error) {
      throw toProviderError('Similarity search failed', error);
    }
  }
}

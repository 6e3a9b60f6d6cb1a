import fs from 'fs';
import os from 'os';
import path from 'path';
import { Document } from '@langchain/core/documents';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CollectionNotFoundError, ProviderError } from '../errors.js';
import { KeywordEmbeddings } from '../testing/fakes.js';
import { CollectionManager } from './collectionManager.js';
import { CollectionStore } from './collectionStore.js';

function doc(fileName: string, content: string): Document {
  return new Document({
    pageContent: content,
    metadata: { source_path: `/docs/${fileName}`, file_name: fileName, extension: '.txt' },
  });
}

describe('CollectionManager', () => {
  let dir: string;
  let store: CollectionStore;
  let embeddings: KeywordEmbeddings;
  let manager: CollectionManager;

  const documents = [
    doc('budget_2024-02-01.txt', 'The warehouse budget is 320000 dollars.'),
    doc('budget_2024-07-15.txt', 'The warehouse budget is 410000 dollars.'),
    doc('api_2024-04-03.txt', 'The API rate limit is 600 requests per minute.'),
  ];

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'manager-'));
    store = new CollectionStore(dir);
    embeddings = new KeywordEmbeddings();
    manager = new CollectionManager({ store, embeddings, embeddingModel: 'test-embedding', embedBatchSize: 2 });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('embeds in batches and persists every chunk', async () => {
    const index = await manager.createIndex(documents, { name: 'docs' });

    expect(embeddings.documentCalls).toBe(2);
    expect(index.documentCount).toBe(3);
    expect(manager.getDocumentCount('docs')).toBe(3);

    const [first] = store.getRecords('docs');
    expect(first.metadata).toMatchObject({
      file_name: 'budget_2024-02-01.txt',
      source_path: '/docs/budget_2024-02-01.txt',
      chunk_index: 0,
      line_from: 1,
      line_to: 1,
    });
  });

  it('does not duplicate chunks when the same documents are indexed again', async () => {
    await manager.createIndex(documents, { name: 'docs' });
    await manager.createIndex(documents, { name: 'docs' });
    expect(manager.getDocumentCount('docs')).toBe(3);
  });

  it('splits long documents into several chunks', async () => {
    const small = new CollectionManager({
      store,
      embeddings,
      embeddingModel: 'test-embedding',
      chunkSize: 40,
      chunkOverlap: 0,
    });
    const text = Array.from({ length: 10 }, (_, i) => `Sentence number ${i} is here.`).join('\n');

    const index = await small.createIndex([doc('long.txt', text)], { name: 'long' });
    expect(index.documentCount).toBeGreaterThan(1);
    expect(store.getRecords('long').map((r) => r.metadata.chunk_index)).toEqual(
      Array.from({ length: index.documentCount }, (_, i) => i)
    );
  });

  it('searches the built index by similarity', async () => {
    const index = await manager.createIndex(documents, { name: 'docs' });
    const [[best]] = await index.similaritySearch('What is the API rate limit?', 1);
    expect(best.metadata.file_name).toBe('api_2024-04-03.txt');
  });

  it('loads an existing collection without re-embedding', async () => {
    await manager.createIndex(documents, { name: 'docs' });
    const fresh = new KeywordEmbeddings();
    const reloaded = new CollectionManager({ store, embeddings: fresh, embeddingModel: 'test-embedding' });

    const index = await reloaded.getExistingIndex('docs');
    expect(index?.documentCount).toBe(3);
    expect(fresh.documentCalls).toBe(0);
  });

  it('returns null for absent or empty collections', async () => {
    expect(await manager.getExistingIndex('missing')).toBeNull();
    store.ensure('empty', 'test-embedding');
    expect(await manager.getExistingIndex('empty')).toBeNull();
  });

  it('deletes collections', async () => {
    await manager.createIndex(documents, { name: 'docs' });
    manager.deleteCollection('docs');

    expect(manager.getDocumentCount('docs')).toBe(0);
    expect(() => manager.deleteCollection('docs')).toThrow(CollectionNotFoundError);
  });

  it('wraps embedding failures', async () => {
    embeddings.failWith = new Error('quota exceeded');
    const attempt = manager.createIndex(documents, { name: 'docs' });

    await expect(attempt).rejects.toThrow(ProviderError);
    await expect(attempt).rejects.toThrow('Embedding request failed: quota exceeded');
  });
});

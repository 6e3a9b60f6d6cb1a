import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CollectionNotFoundError, NoIndexLoadedError, UnsupportedResponseModeError } from '../errors.js';
import { RagPipeline } from '../pipeline.js';
import { CollectionStore } from '../rag/collectionStore.js';
import { FakeChatModel, KeywordEmbeddings, WordCounter } from '../testing/fakes.js';
import { PipelineQueryService, createApp, type QueryRequest, type QueryService } from './index.js';

class StubQueryService implements QueryService {
  requests: QueryRequest[] = [];
  failure: Error | null = null;

  listCollections() {
    return [
      {
        name: 'docs',
        count: 3,
        embeddingModel: 'test-embedding',
        dimensions: 8,
        createdAt: '2024-01-01T00:00:00.000Z',
        updatedAt: '2024-01-01T00:00:00.000Z',
      },
    ];
  }

  async query(request: QueryRequest): Promise<string> {
    this.requests.push(request);
    if (this.failure) {
      throw this.failure;
    }
    return `answer to ${request.question}`;
  }
}

describe('HTTP API', () => {
  let service: StubQueryService;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    service = new StubQueryService();
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(service).listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  const postQuery = (body: unknown) =>
    fetch(`${baseUrl}/api/query`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'healthy' });
  });

  it('lists collection names', async () => {
    const res = await fetch(`${baseUrl}/api/collections`);
    expect(await res.json()).toEqual({ success: true, collections: ['docs'] });
  });

  it('answers questions', async () => {
    const res = await postQuery({ question: 'What changed?', collection: 'docs', responseMode: 'refine' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ success: true, response: 'answer to What changed?' });
    expect(service.requests).toEqual([{ question: 'What changed?', collection: 'docs', responseMode: 'refine' }]);
  });

  it('requires a question', async () => {
    const res = await postQuery({ question: '   ' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: 'Question is required' });
    expect(service.requests).toEqual([]);
  });

  it('maps unsupported modes to 400', async () => {
    service.failure = new UnsupportedResponseModeError('bogus', ['compact']);
    const res = await postQuery({ question: 'q', responseMode: 'bogus' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      success: false,
      error: 'Unsupported response mode: bogus. Supported modes: compact',
    });
  });

  it('maps missing collections to 404', async () => {
    service.failure = new NoIndexLoadedError("Collection 'gone' does not exist or has no documents.");
    expect((await postQuery({ question: 'q' })).status).toBe(404);

    service.failure = new CollectionNotFoundError('gone');
    expect((await postQuery({ question: 'q' })).status).toBe(404);
  });

  it('hides unexpected failures', async () => {
    service.failure = new Error('socket hang up');
    const res = await postQuery({ question: 'q' });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ success: false, error: 'Internal server error' });
  });
});

describe('PipelineQueryService', () => {
  let root: string;
  let store: CollectionStore;
  let embeddings: KeywordEmbeddings;
  let created: string[];
  let factory: (collection: string | undefined) => RagPipeline;
  let service: PipelineQueryService;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'service-'));
    fs.writeFileSync(path.join(root, 'limits.txt'), 'The API rate limit is 600 requests per minute.');
    store = new CollectionStore(path.join(root, 'vectors'));
    embeddings = new KeywordEmbeddings();
    created = [];

    factory = (collection: string | undefined) => {
      const collectionName = collection ?? 'limits';
      created.push(collectionName);
      return new RagPipeline(
        { dataDir: root, collectionName },
        { store, embeddings, llm: new FakeChatModel(), tokenCounter: new WordCounter() }
      );
    };
    await factory('limits').loadDocuments();
    created = [];
    service = new PipelineQueryService(store, factory);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('answers from stored collections and reuses loaded pipelines', async () => {
    expect(await service.query({ question: 'What is the API rate limit?' })).toContain('600 requests per minute');
    expect(await service.query({ question: 'rate limit' })).toContain('600 requests per minute');
    expect(created).toEqual(['limits']);
  });

  it('stops answering from a collection deleted after it was loaded', async () => {
    await service.query({ question: 'rate limit' });
    store.deleteCollection('limits');

    await expect(service.query({ question: 'rate limit' })).rejects.toThrow(NoIndexLoadedError);
  });

  it('reloads a collection rebuilt after it was loaded', async () => {
    expect(await service.query({ question: 'rate limit' })).toContain('600 requests');

    store.deleteCollection('limits');
    fs.writeFileSync(path.join(root, 'limits.txt'), 'The API rate limit is 900 requests per minute.');
    // Rebuilt collections get a later timestamp
    await new Promise((resolve) => setTimeout(resolve, 5));
    await factory('limits').loadDocuments();

    const answer = await service.query({ question: 'rate limit' });
    expect(answer).toContain('900 requests');
    expect(answer).not.toContain('600 requests');
    expect(created).toEqual(['limits', 'limits', 'limits']);
  });

  it('rejects collections without documents', async () => {
    await expect(service.query({ question: 'q', collection: 'missing' })).rejects.toThrow(
      "Collection 'missing' does not exist or has no documents."
    );
  });

  it('lists stored collections', () => {
    expect(service.listCollections().map((c) => c.name)).toEqual(['limits']);
  });
});

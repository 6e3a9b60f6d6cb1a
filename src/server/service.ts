/**
 * Query service backing the HTTP API: one lazily loaded pipeline per collection.
 */
import { NoIndexLoadedError } from '../errors.js';
import type { RagPipeline } from '../pipeline.js';
import type { CollectionInfo, CollectionStore } from '../rag/collectionStore.js';

export interface QueryRequest {
  question: string;
  collection?: string;
  responseMode?: string;
}

export interface QueryService {
  listCollections(): CollectionInfo[];
  query(request: QueryRequest): Promise<string>;
}

export type PipelineFactory = (collectionName: string | undefined) => RagPipeline;

interface LoadedPipeline {
  pipeline: RagPipeline;
  // Collection version the pipeline's vectors were read from
  updatedAt: string;
}

export class PipelineQueryService implements QueryService {
  private readonly store: CollectionStore;
  private readonly createPipeline: PipelineFactory;
  private readonly pipelines = new Map<string, LoadedPipeline>();

  constructor(store: CollectionStore, createPipeline: PipelineFactory) {
    this.store = store;
    this.createPipeline = createPipeline;
  }

  listCollections(): CollectionInfo[] {
    return this.store.listCollections();
  }

  async query(request: QueryRequest): Promise<string> {
    const pipeline = await this.pipelineFor(request.collection);
    return pipeline.query(request.question, request.responseMode);
  }

  private async pipelineFor(collection: string | undefined): Promise<RagPipeline> {
    const key = collection ?? '';
    const cached = this.pipelines.get(key);
    if (cached) {
      const info = this.store.getInfo(cached.pipeline.collectionName);
      if (info !== null && info.updatedAt === cached.updatedAt) {
        return cached.pipeline;
      }
      // Deleted or rebuilt since it was loaded
      this.pipelines.delete(key);
    }

    const pipeline = this.createPipeline(collection);
    console.log(`[RAGServer] Loading collection '${pipeline.collectionName}'`);
    const info = this.store.getInfo(pipeline.collectionName);
    const count = await pipeline.loadExistingIndex();
    if (info === null || count === 0) {
      throw new NoIndexLoadedError(
        `Collection '${pipeline.collectionName}' does not exist or has no documents.`
      );
    }

    this.pipelines.set(key, { pipeline, updatedAt: info.updatedAt });
    return pipeline;
  }
}

/**
 * Serve the query API over HTTP.
 */
import { parseArgs } from 'util';
import { SERVER_CONFIG, STORE_CONFIG } from '../config.js';
import { RagPipeline } from '../pipeline.js';
import { CollectionStore } from '../rag/collectionStore.js';
import { PipelineQueryService, RagServer } from '../server/index.js';
import { parseIntOption } from './shared.js';

export async function runServe(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string' },
      'model-config': { type: 'string', default: 'default' },
      'collection-name': { type: 'string' },
    },
  });

  const port = parseIntOption(values.port, 'port', SERVER_CONFIG.port);
  const modelConfig = values['model-config'] ?? 'default';
  const defaultCollection = values['collection-name'] ?? SERVER_CONFIG.defaultCollection;
  const store = new CollectionStore(STORE_CONFIG.persistDirectory);

  const queryService = new PipelineQueryService(
    store,
    (collection) => new RagPipeline({ collectionName: collection ?? defaultCollection, modelConfig }, { store })
  );

  const server = new RagServer({ port, queryService });
  await server.start();

  await new Promise<void>((resolve) => {
    const shutdown = () => {
      console.log('\n[RAGServer] Shutting down...');
      server.stop().then(resolve, (error: unknown) => {
        console.error('[RAGServer] Error during shutdown:', error);
        resolve();
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
  return 0;
}

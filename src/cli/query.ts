/**
 * Query an existing collection, once or interactively.
 */
import React from 'react';
import { render } from 'ink';
import { parseArgs } from 'util';
import { STORE_CONFIG } from '../config.js';
import { RagPipeline } from '../pipeline.js';
import { CollectionStore } from '../rag/collectionStore.js';
import { QueryChat } from '../ui/QueryChat.js';
import { listAvailableCollections, printSeparator, reportFailure } from './shared.js';

export async function runQuery(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'collection-name': { type: 'string' },
      'model-config': { type: 'string', default: 'default' },
      'response-mode': { type: 'string' },
      question: { type: 'string', short: 'q' },
      'list-collections': { type: 'boolean', default: false },
      list: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
    },
  });

  const store = new CollectionStore(STORE_CONFIG.persistDirectory);

  if (values['list-collections'] || values.list) {
    listAvailableCollections(store);
    return 0;
  }

  console.log(`Querying index from collection '${values['collection-name'] ?? 'default'}'...`);

  try {
    const pipeline = new RagPipeline(
      { collectionName: values['collection-name'], modelConfig: values['model-config'] },
      { store }
    );

    const documentCount = await pipeline.loadExistingIndex();
    if (documentCount === 0) {
      return reportFailure(
        new Error(`Collection '${pipeline.collectionName}' does not exist or has no documents.`),
        { debug: values.debug, store }
      );
    }

    if (values.question !== undefined) {
      console.log(`\nQuestion: ${values.question}`);
      console.log('\nQuerying...');
      const response = await pipeline.query(values.question, values['response-mode']);
      console.log('\nResponse:');
      printSeparator();
      console.log(response);
      return 0;
    }

    console.clear();
    const app = render(
      React.createElement(QueryChat, {
        collectionName: pipeline.collectionName,
        documentCount,
        responseModes: pipeline.supportedResponseModes,
        initialMode: pipeline.resolveResponseMode(values['response-mode']),
        ask: (question, responseMode) => pipeline.query(question, responseMode),
        listCollections: () => store.listCollections(),
      })
    );
    await app.waitUntilExit();
    return 0;
  } catch (error) {
    return reportFailure(error, { debug: values.debug, store });
  }
}

/**
 * Inspect and manage stored collections directly, without the pipeline.
 */
import { confirm } from '@inquirer/prompts';
import { parseArgs } from 'util';
import { STORE_CONFIG, resolveModel } from '../config.js';
import { CollectionNotFoundError } from '../errors.js';
import { createEmbeddings } from '../providers.js';
import { CollectionIndex } from '../rag/collectionIndex.js';
import { CollectionStore, type CollectionInfo } from '../rag/collectionStore.js';
import { FileScanner } from '../rag/fileScanner.js';
import { parseIntOption, printSeparator, reportFailure } from './shared.js';

const PREVIEW_LENGTH = 250;

export function preview(content: string, length: number = PREVIEW_LENGTH): string {
  return content.length > length ? `${content.slice(0, length)}...` : content;
}

function listCollections(store: CollectionStore): CollectionInfo[] {
  const collections = store.listCollections();
  if (collections.length === 0) {
    console.log('No collections found in the vector store.');
    return collections;
  }

  console.log(`Found ${collections.length} collection(s):`);
  collections.forEach((info, i) => {
    console.log(`  ${i + 1}. ${info.name} (${info.count} documents, ${info.embeddingModel})`);
  });
  return collections;
}

function inspectCollection(store: CollectionStore, name: string, limit: number): void {
  const info = store.getInfo(name);
  if (info === null) {
    throw new CollectionNotFoundError(name);
  }

  console.log(`Collection: ${info.name}`);
  console.log(`Document count: ${info.count}`);
  console.log(`Embedding model: ${info.embeddingModel} (${info.dimensions} dimensions)`);
  console.log(`Updated: ${info.updatedAt}`);

  if (info.count === 0) {
    console.log('Warning: This collection is empty. No documents to show.');
    return;
  }

  const records = store.peek(name, limit);
  printSeparator();
  console.log(`Sample documents (showing ${records.length} of ${info.count}):`);

  records.forEach((record, i) => {
    console.log(`\nDocument ${i + 1} (ID: ${record.id}):`);
    console.log(`  Metadata: ${JSON.stringify(record.metadata, null, 2)}`);
    console.log(`  Content preview: ${preview(record.content)}`);
    console.log(
      `  Embedding: Dimension: ${record.embedding.length}, First 3 values: [${record.embedding.slice(0, 3).join(', ')}]`
    );
  });
  printSeparator();
}

async function queryCollection(
  store: CollectionStore,
  name: string,
  text: string,
  limit: number,
  modelConfigName: string
): Promise<void> {
  const records = store.getRecords(name);
  if (records.length === 0) {
    throw new CollectionNotFoundError(name);
  }

  const embeddings = createEmbeddings(resolveModel(modelConfigName));
  const index = await CollectionIndex.fromRecords(name, records, embeddings);
  const results = await index.similaritySearch(text, limit);

  console.log(`Top ${results.length} matches for: ${text}`);
  results.forEach(([doc, score], i) => {
    console.log(`\n${i + 1}. score=${score.toFixed(4)} ${doc.metadata.file_name ?? ''}`);
    console.log(`   ${preview(doc.pageContent, 200)}`);
  });
}

async function confirmed(message: string, force: boolean): Promise<boolean> {
  if (force) {
    return true;
  }
  const answer = await confirm({ message, default: false });
  if (!answer) {
    console.log('Operation cancelled.');
  }
  return answer;
}

export async function runInspect(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      list: { type: 'boolean', default: false },
      collection: { type: 'string' },
      limit: { type: 'string' },
      path: { type: 'string', default: STORE_CONFIG.persistDirectory },
      query: { type: 'string' },
      'model-config': { type: 'string', default: 'default' },
      delete: { type: 'boolean', default: false },
      'delete-all': { type: 'boolean', default: false },
      force: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
    },
  });

  const storePath = values.path ?? STORE_CONFIG.persistDirectory;
  if (!FileScanner.isDirectory(storePath)) {
    console.error(`Error: Vector store directory not found at '${storePath}'`);
    console.log("Run 'rag create-index' first to create a collection");
    return 1;
  }

  const store = new CollectionStore(storePath);
  console.log(`Reading vector store at: ${storePath}`);

  try {
    const limit = parseIntOption(values.limit, 'limit', 5);

    if (values['delete-all']) {
      const collections = store.listCollections();
      if (collections.length === 0) {
        console.log('No collections found to delete.');
        return 0;
      }
      console.log(`About to delete ALL ${collections.length} collections:`);
      collections.forEach((c) => console.log(`  - ${c.name}`));
      if (!(await confirmed('Are you sure? This cannot be undone!', values.force ?? false))) {
        return 0;
      }
      const deleted = store.deleteAll();
      console.log(`Successfully deleted all ${deleted.length} collections.`);
      return 0;
    }

    if (values.delete) {
      if (!values.collection) {
        console.error('Error: --delete requires --collection NAME');
        return 1;
      }
      const count = store.count(values.collection);
      if (!store.exists(values.collection)) {
        throw new CollectionNotFoundError(values.collection);
      }
      if (!(await confirmed(`Delete collection '${values.collection}' with ${count} documents?`, values.force ?? false))) {
        return 0;
      }
      store.deleteCollection(values.collection);
      console.log(`Successfully deleted collection '${values.collection}'.`);
      return 0;
    }

    if (values.list || !values.collection) {
      const collections = listCollections(store);
      if (!values.collection && collections.length > 0) {
        console.log('\nUse --collection NAME to inspect a specific collection');
        console.log('Use --collection NAME --query TEXT to run a similarity query');
        console.log('Use --delete --collection NAME to delete a collection');
        console.log('Use --delete-all to remove all collections');
      }
    }

    if (values.collection) {
      printSeparator();
      if (values.query !== undefined) {
        await queryCollection(store, values.collection, values.query, limit, values['model-config'] ?? 'default');
      } else {
        inspectCollection(store, values.collection, limit);
      }
    }
    return 0;
  } catch (error) {
    return reportFailure(error, { debug: values.debug, store, tip: "Run 'rag inspect --list' to see stored collections." });
  }
}

/**
 * Build (or reuse) the collection for a documents directory.
 */
import { parseArgs } from 'util';
import { DEFAULT_DATA_DIR } from '../config.js';
import { FileScanner } from '../rag/fileScanner.js';
import { RagPipeline } from '../pipeline.js';
import { printBanner, reportFailure } from './shared.js';

export async function runCreateIndex(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'data-dir': { type: 'string', default: DEFAULT_DATA_DIR },
      'collection-name': { type: 'string' },
      'model-config': { type: 'string', default: 'default' },
      'file-types': { type: 'string', default: 'default' },
      recursive: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
    },
  });

  const dataDir = values['data-dir'] ?? DEFAULT_DATA_DIR;
  if (!FileScanner.isDirectory(dataDir)) {
    console.error(`Error: Data directory '${dataDir}' not found.`);
    console.log("\nTip: Run 'rag generate-docs' to create sample documents.");
    return 1;
  }

  printBanner('Creating index');
  console.log(`Documents: ${dataDir}`);

  try {
    const pipeline = new RagPipeline({
      dataDir,
      collectionName: values['collection-name'],
      modelConfig: values['model-config'],
      fileTypes: values['file-types'],
      recursive: values.recursive,
    });

    const count = await pipeline.loadDocuments();
    if (count === 0) {
      console.warn('\nNo documents were indexed.');
      return 1;
    }

    console.log('\nIndex ready!');
    console.log(`Collection name: ${pipeline.collectionName} (${count} documents)`);
    console.log("\nNext step: Run 'rag query' to query the index");
    return 0;
  } catch (error) {
    return reportFailure(error, { debug: values.debug, tip: 'Check the data directory and model configuration.' });
  }
}

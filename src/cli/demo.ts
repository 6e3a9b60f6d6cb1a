/**
 * Demo: build or load a collection and run the version-comparison questions.
 */
import * as readline from 'readline';
import { parseArgs } from 'util';
import { DEFAULT_DATA_DIR } from '../config.js';
import { RagPipeline } from '../pipeline.js';
import { printBanner, printSeparator, reportFailure } from './shared.js';

export const EXAMPLE_QUESTIONS = [
  'Compare all versions of the Warehouse Platform Overview. What are the key differences between versions?',
  'Which version of the API Design Specification is more recent, and what major changes were made?',
  'List all documents that appear to be different versions of the same content, ordered by date.',
  'Identify any documents that could be considered outdated and should be archived, explaining why.',
];

async function runInteractive(pipeline: RagPipeline): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const ask = (prompt: string) => new Promise<string>((resolve) => rl.question(prompt, resolve));

  try {
    for (;;) {
      const question = (await ask("\nEnter your question (or 'quit' to exit): ")).trim();
      if (question.toLowerCase() === 'quit') break;
      if (!question) continue;

      printSeparator();
      const response = await pipeline.query(question);
      console.log(`Answer: ${response}`);
    }
  } finally {
    rl.close();
  }
}

export async function runDemo(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'model-config': { type: 'string', default: 'default' },
      'data-dir': { type: 'string', default: DEFAULT_DATA_DIR },
      'file-types': { type: 'string', default: 'default' },
      'collection-name': { type: 'string' },
      interactive: { type: 'boolean', default: false },
      debug: { type: 'boolean', default: false },
    },
  });

  try {
    const pipeline = new RagPipeline({
      dataDir: values['data-dir'],
      modelConfig: values['model-config'],
      fileTypes: values['file-types'],
      collectionName: values['collection-name'],
    });

    console.log(`Loading documents from ${pipeline.dataDir}...`);
    await pipeline.loadDocuments();

    printBanner(`Using ${pipeline.collectionName} pipeline (${pipeline.modelConfig.name} configuration)`);

    if (values.interactive) {
      await runInteractive(pipeline);
      return 0;
    }

    for (const question of EXAMPLE_QUESTIONS) {
      console.log(`\nQuestion: ${question}`);
      printSeparator();
      const response = await pipeline.query(question);
      console.log(`Answer: ${response}`);
    }
    return 0;
  } catch (error) {
    return reportFailure(error, { debug: values.debug });
  }
}

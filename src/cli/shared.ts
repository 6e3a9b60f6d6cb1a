/**
 * Console helpers shared by the command-line entry points.
 */
import { STORE_CONFIG } from '../config.js';
import { CollectionStore } from '../rag/collectionStore.js';

export function printBanner(title: string): void {
  console.log('='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
  console.log();
}

export function printSeparator(): void {
  console.log('-'.repeat(60));
}

/**
 * Print every stored collection with its size.
 */
export function listAvailableCollections(store: CollectionStore = new CollectionStore(STORE_CONFIG.persistDirectory)): void {
  try {
    const collections = store.listCollections();
    if (collections.length === 0) {
      console.log('\nNo collections found.');
      console.log(`Vector store directory: ${store.persistDirectory}`);
      return;
    }

    console.log('\nAvailable collections:');
    for (const info of collections) {
      console.log(`  - ${info.name} (${info.count} documents)`);
      const [first] = store.peek(info.name, 1);
      if (first) {
        console.log(`    - First document ID: ${first.id}`);
        console.log(`    - Has embeddings: ${first.embedding.length > 0}`);
      }
    }
  } catch (error) {
    console.error(`\nError listing collections: ${error instanceof Error ? error.message : error}`);
  }
}

/**
 * Report a failed command: message, optional stack, the collections that do
 * exist, and what to run next. Returns the process exit code.
 */
export function reportFailure(error: unknown, options: { debug?: boolean; tip?: string; store?: CollectionStore } = {}): number {
  console.error(`\nError: ${error instanceof Error ? error.message : String(error)}`);

  if (options.debug) {
    console.error('\n========== FULL TRACE ==========');
    console.error(error instanceof Error ? error.stack : error);
    console.error('================================\n');
  }

  console.log('\nChecking stored collections...');
  listAvailableCollections(options.store);

  console.log(`\nTip: ${options.tip ?? "Make sure you've created an index first by running 'rag create-index'"}`);
  return 1;
}

export type CommandHandler = (argv: string[]) => Promise<number>;

/**
 * Look up a subcommand by name; only the table's own keys count.
 */
export function lookupCommand(
  commands: Readonly<Record<string, CommandHandler>>,
  name: string | undefined
): CommandHandler | undefined {
  if (name === undefined || !Object.hasOwn(commands, name)) {
    return undefined;
  }
  return commands[name];
}

export function parseIntOption(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`--${name} must be a non-negative integer, got '${value}'`);
  }
  return parsed;
}

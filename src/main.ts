#!/usr/bin/env node
/**
 * Command-line entry point.
 */
import { runCreateIndex } from './cli/createIndex.js';
import { runDemo } from './cli/demo.js';
import { runGenerateDocs } from './cli/generateDocs.js';
import { runInspect } from './cli/inspect.js';
import { runQuery } from './cli/query.js';
import { runServe } from './cli/serve.js';
import { lookupCommand, type CommandHandler } from './cli/shared.js';

const COMMANDS: Readonly<Record<string, CommandHandler>> = {
  'generate-docs': runGenerateDocs,
  'create-index': runCreateIndex,
  query: runQuery,
  inspect: runInspect,
  demo: runDemo,
  serve: runServe,
};

function printUsage(): void {
  console.log('Usage: rag <command> [options]');
  console.log();
  console.log('Commands:');
  console.log('  generate-docs   Write versioned sample documents (--output-dir)');
  console.log('  create-index    Build the collection for a directory (--data-dir, --collection-name, --model-config, --file-types)');
  console.log('  query           Ask a question (--question) or start the interactive UI; --list-collections');
  console.log('  inspect         List, inspect, query or delete stored collections');
  console.log('  demo            Run the version-comparison example questions');
  console.log('  serve           Start the HTTP query API');
}

async function main(): Promise<number> {
  const [command, ...argv] = process.argv.slice(2);
  const run = lookupCommand(COMMANDS, command);

  if (!run) {
    printUsage();
    return command === undefined || command === '--help' ? 0 : 1;
  }
  return run(argv);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);

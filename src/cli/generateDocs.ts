/**
 * Generate versioned synthetic documents for trying out the pipeline.
 */
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { DEFAULT_DATA_DIR } from '../config.js';

export interface DocumentVersion {
  date: string;
  content: string;
}

export interface DocumentSet {
  name: string;
  title: string;
  versions: DocumentVersion[];
}

const DOCUMENT_SETS_PATH = new URL('../../fixtures/synthetic-documents.json', import.meta.url);

function isDocumentSet(value: unknown): value is DocumentSet {
  return (
    typeof value === 'object' && value !== null &&
    'name' in value && typeof value.name === 'string' &&
    'title' in value && typeof value.title === 'string' &&
    'versions' in value && Array.isArray(value.versions) &&
    value.versions.every(
      (v: unknown) =>
        typeof v === 'object' && v !== null &&
        'date' in v && typeof v.date === 'string' &&
        'content' in v && typeof v.content === 'string'
    )
  );
}

export function loadDocumentSets(filePath: URL | string = DOCUMENT_SETS_PATH): DocumentSet[] {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (!Array.isArray(data) || !data.every(isDocumentSet)) {
    throw new Error(`Malformed document sets file: ${filePath}`);
  }
  return data;
}

/**
 * Write a .txt and a .md file per document version. Returns the written paths.
 */
export function generateDocuments(outputDir: string, documentSets: DocumentSet[] = loadDocumentSets()): string[] {
  fs.mkdirSync(outputDir, { recursive: true });

  const written: string[] = [];
  for (const docSet of documentSets) {
    for (const version of docSet.versions) {
      const baseName = `${docSet.name}_${version.date}`;
      const heading = `${docSet.title} - ${version.date}`;

      const txtPath = path.join(outputDir, `${baseName}.txt`);
      fs.writeFileSync(txtPath, `${heading}\n\n${version.content}\n`);

      const mdPath = path.join(outputDir, `${baseName}.md`);
      fs.writeFileSync(mdPath, `# ${heading}\n\n${version.content}\n`);

      written.push(txtPath, mdPath);
    }
  }
  return written;
}

export async function runGenerateDocs(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      'output-dir': { type: 'string', default: DEFAULT_DATA_DIR },
    },
  });
  const outputDir = values['output-dir'] ?? DEFAULT_DATA_DIR;

  const written = generateDocuments(outputDir);
  console.log(`Generated ${written.length} test documents in '${outputDir}'`);
  console.log("\nNext step: run 'rag create-index' to build the index");
  return 0;
}

/**
 * Document loading for RAG.
 */
import { TextLoader } from 'langchain/document_loaders/fs/text';
import { PDFLoader } from '@langchain/community/document_loaders/fs/pdf';
import { DocxLoader } from '@langchain/community/document_loaders/fs/docx';
import { Document } from '@langchain/core/documents';
import path from 'path';
import { DirectoryNotFoundError } from '../errors.js';
import { FileScanner } from './fileScanner.js';

/**
 * Anything that turns one file into one or more Documents.
 */
export interface DocumentSource {
  load(): Promise<Document[]>;
}

export type ExtractorFactory = (filePath: string) => DocumentSource;

export interface DocumentMetadata {
  source_path: string;
  file_name: string;
  extension: string;
  page_number?: number;
}

const DEFAULT_EXTRACTORS: ReadonlyArray<[string, ExtractorFactory]> = [
  ['.txt', (filePath) => new TextLoader(filePath)],
  ['.md', (filePath) => new TextLoader(filePath)],
  ['.pdf', (filePath) => new PDFLoader(filePath, { splitPages: true })],
  ['.docx', (filePath) => new DocxLoader(filePath)],
];

function normalizeExtension(extension: string): string {
  const lower = extension.toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

function pageNumberOf(metadata: Record<string, unknown>): number | undefined {
  const loc = metadata.loc;
  if (typeof loc === 'object' && loc !== null && 'pageNumber' in loc && typeof loc.pageNumber === 'number') {
    return loc.pageNumber;
  }
  return undefined;
}

/**
 * Loads documents from a directory, dispatching each file to the extractor
 * registered for its extension.
 */
export class DocumentLoader {
  private readonly extractors: Map<string, ExtractorFactory>;

  constructor(extractors?: Iterable<[string, ExtractorFactory]>) {
    this.extractors = new Map();
    for (const [extension, factory] of extractors ?? DEFAULT_EXTRACTORS) {
      this.addExtractor(extension, factory);
    }
  }

  /**
   * Register (or replace) the extractor for an extension.
   */
  addExtractor(extension: string, factory: ExtractorFactory): void {
    this.extractors.set(normalizeExtension(extension), factory);
  }

  get supportedExtensions(): string[] {
    return Array.from(this.extractors.keys());
  }

  /**
   * Load a single file. Returns an empty list for extensions without an extractor.
   */
  async loadFile(filePath: string): Promise<Document[]> {
    const extension = FileScanner.extensionOf(filePath);
    const factory = this.extractors.get(extension);
    if (!factory) {
      console.warn(`Skipping ${path.basename(filePath)}: no extractor registered for ${extension}`);
      return [];
    }

    const extracted = await factory(filePath).load();

    return extracted.map((doc) => {
      const metadata: DocumentMetadata = {
        source_path: filePath,
        file_name: path.basename(filePath),
        extension,
      };
      const pageNumber = pageNumberOf(doc.metadata);
      if (pageNumber !== undefined) {
        metadata.page_number = pageNumber;
      }
      return new Document({ pageContent: doc.pageContent, metadata: { ...metadata } });
    });
  }

  /**
   * Load every file under `directory` whose extension is allowed.
   * Document order follows filesystem enumeration and is not guaranteed.
   */
  async load(
    directory: string,
    allowedExtensions: readonly string[],
    recursive: boolean = false,
    excludeHidden: boolean = true
  ): Promise<Document[]> {
    if (!FileScanner.isDirectory(directory)) {
      throw new DirectoryNotFoundError(directory);
    }

    const files = FileScanner.scan(directory, {
      extensions: allowedExtensions,
      recursive,
      excludeHidden,
    });

    const documents: Document[] = [];

    for (const filePath of files) {
      try {
        const docs = await this.loadFile(filePath);
        documents.push(...docs);
      } catch (error) {
        console.warn(`Error loading ${path.basename(filePath)}: ${error}`);
      }
    }

    if (documents.length === 0) {
      console.warn(
        `Warning: No documents found in ${directory} with extensions ${allowedExtensions.join(', ')}`
      );
    } else {
      console.log(`Loaded ${documents.length} documents from ${directory}`);
    }

    return documents;
  }
}

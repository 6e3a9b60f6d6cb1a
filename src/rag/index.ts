/**
 * RAG (Retrieval-Augmented Generation) module exports.
 *
 * Document loading, persistent collections and collection lifecycle.
 */

// Main manager - use this for most cases
export {
  CollectionManager,
  type CollectionManagerOptions,
  type CollectionConfig,
} from './collectionManager.js';

// Core components
export { CollectionIndex } from './collectionIndex.js';
export {
  CollectionStore,
  type CollectionInfo,
  type StoredRecord,
  type RecordMetadata,
} from './collectionStore.js';
export {
  DocumentLoader,
  type DocumentSource,
  type ExtractorFactory,
  type DocumentMetadata,
} from './documentLoader.js';

// Utilities
export { FileScanner, type ScanOptions } from './fileScanner.js';

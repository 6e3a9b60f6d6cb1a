/**
 * Library entry point.
 */
export * from './config.js';
export * from './errors.js';
export { RagPipeline, type RagPipelineOptions, type RagPipelineDependencies } from './pipeline.js';
export { createChatModel, createEmbeddings } from './providers.js';
export * from './rag/index.js';
export * from './query/index.js';

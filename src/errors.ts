/**
 * Error taxonomy for the RAG pipeline.
 *
 * Configuration and precondition errors signal caller misuse and are never
 * retried. Everything that fails inside an embedding, LLM or store call is
 * surfaced as a ProviderError with the original failure kept as `cause`.
 */

export class RagError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unknown model/file-type name, invalid collection name, missing credentials. */
export class ConfigurationError extends RagError {}

export class DirectoryNotFoundError extends RagError {
  constructor(readonly directory: string) {
    super(`Data directory not found: ${directory}`);
  }
}

export class NoIndexLoadedError extends RagError {
  constructor(message: string = 'No documents have been loaded. Call loadDocuments() first.') {
    super(message);
  }
}

export class UnsupportedResponseModeError extends RagError {
  constructor(readonly responseMode: string, readonly supported: readonly string[]) {
    super(`Unsupported response mode: ${responseMode}. Supported modes: ${supported.join(', ')}`);
  }
}

export class CollectionNotFoundError extends RagError {
  constructor(readonly collectionName: string) {
    super(`Collection '${collectionName}' not found`);
  }
}

export class ProviderError extends RagError {}

/**
 * Wrap a failure from a delegated call, leaving taxonomy errors untouched.
 */
export function toProviderError(context: string, error: unknown): RagError {
  if (error instanceof RagError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new ProviderError(`${context}: ${detail}`, { cause: error });
}

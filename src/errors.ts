// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy for the question-answering pipeline.
 *
 * Every failure surfaced to a caller is one of the classes below. None of
 * them is retried internally; `retryable` only tells the caller whether a
 * retry could succeed.
 */

/**
 * Error categories for classification and user guidance.
 */
export enum ErrorCategory {
  CONFIGURATION = 'configuration',
  PROVISIONING = 'provisioning',
  INGESTION = 'ingestion',
  RETRIEVAL = 'retrieval',
  GENERATION = 'generation',
}

export interface RagErrorOptions {
  cause?: unknown;
  retryable?: boolean;
}

/**
 * Base class for pipeline errors.
 */
export abstract class RagError extends Error {
  abstract readonly category: ErrorCategory;
  readonly retryable: boolean;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Invalid chunking, index, mode or query parameters.
 */
export class ConfigurationError extends RagError {
  readonly category = ErrorCategory.CONFIGURATION;
}

/**
 * Index creation failed, was rejected, or never became ready.
 */
export class IndexProvisioningError extends RagError {
  readonly category = ErrorCategory.PROVISIONING;

  constructor(
    message: string,
    public readonly indexName: string,
    options: RagErrorOptions = {}
  ) {
    super(message, options);
  }
}

/**
 * Embedding or similarity search failed for a query.
 */
export class RetrievalError extends RagError {
  readonly category = ErrorCategory.RETRIEVAL;

  constructor(message: string, options: RagErrorOptions = {}) {
    super(message, { retryable: true, ...options });
  }
}

/**
 * Completion or streaming failed. Fragments already delivered stay delivered.
 */
export class GenerationError extends RagError {
  readonly category = ErrorCategory.GENERATION;

  constructor(
    message: string,
    public readonly fragmentsDelivered: number = 0,
    options: RagErrorOptions = {}
  ) {
    super(message, { retryable: true, ...options });
  }
}

/**
 * A batch failed during ingestion.
 *
 * `failedIds` holds exactly the chunks of the failing batch, `upsertedIds`
 * every chunk stored before it and `pendingIds` the batches never attempted.
 */
export class IngestionError extends RagError {
  readonly category = ErrorCategory.INGESTION;

  constructor(
    message: string,
    public readonly batchIndex: number,
    public readonly failedIds: string[],
    public readonly upsertedIds: string[],
    public readonly pendingIds: string[],
    options: RagErrorOptions = {}
  ) {
    super(message, { retryable: true, ...options });
  }
}

/**
 * Suggestions shown with each category.
 */
const ERROR_GUIDE: Record<ErrorCategory, string[]> = {
  [ErrorCategory.CONFIGURATION]: [
    'Check chunkSize, chunkOverlap, batchSize and retrieval k in your config',
    'chunkOverlap must be smaller than chunkSize',
    'Run docqa init to write an example config',
  ],
  [ErrorCategory.PROVISIONING]: [
    'Check that the embedding dimension matches the index',
    'The local index store only supports the cosine metric',
    'Delete the index with docqa delete-index and index again',
  ],
  [ErrorCategory.INGESTION]: [
    'Only the failed batch and the pending batches need to be ingested again',
    'Check your embedding provider credentials and quota',
  ],
  [ErrorCategory.RETRIEVAL]: [
    'Check that the embedding provider is reachable',
    'Make sure documents were indexed with docqa index',
  ],
  [ErrorCategory.GENERATION]: [
    'Check your API key and quota limits',
    'Try the other mode or a different model',
  ],
};

/**
 * Normalise any thrown value into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Render an error for the terminal, with suggestions for pipeline errors.
 */
export function formatError(error: unknown): string {
  if (!(error instanceof RagError)) {
    return `❌ ${errorMessage(error)}\n`;
  }

  let output = `❌ ${error.name}: ${error.message}\n`;
  output += `\n📌 Category: ${error.category}\n`;

  if (error instanceof IngestionError) {
    output += `\n📦 Batch ${error.batchIndex + 1}: ${error.failedIds.length} failed, ` +
      `${error.upsertedIds.length} stored, ${error.pendingIds.length} pending\n`;
  }

  const suggestions = ERROR_GUIDE[error.category];
  if (suggestions.length > 0) {
    output += `\n💡 Suggestions:\n`;
    suggestions.forEach((suggestion, index) => {
      output += `   ${index + 1}. ${suggestion}\n`;
    });
  }

  if (error.retryable) {
    output += `\n🔄 This error is retryable.\n`;
  }

  return output;
}

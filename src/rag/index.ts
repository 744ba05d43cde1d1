// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * RAG System Exports
 *
 * Main entry point for the question-answering pipeline.
 */

// Types
export type {
  Chunk,
  ChunkMetadata,
  DistanceMetric,
  Document,
  DocumentMetadata,
  FieldCondition,
  IngestProgressCallback,
  IngestReport,
  MetadataFilter,
  MetadataValue,
  QueryResult,
  RetrievedDocument,
} from './types.js';

// Embedding providers
export {
  BaseEmbeddingProvider,
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  EMBEDDING_PROVIDERS,
  createEmbeddingProvider,
} from './embeddings/index.js';
export type { EmbeddingProviderName, EmbeddingSettings } from './embeddings/index.js';

// Index services
export {
  MemoryIndexService,
  VectraIndexService,
  DEFAULT_INDEX_DIR,
  createIndexService,
} from './index-service/index.js';
export type {
  CreateIndexRequest,
  IndexDescription,
  IndexPlacement,
  IndexRecord,
  ScoredRecord,
  VectorIndexService,
} from './index-service/index.js';

// Core components
export { TextChunker, DEFAULT_CHUNKER_CONFIG } from './chunker.js';
export type { ChunkerConfig } from './chunker.js';
export { IndexManager, DEFAULT_BATCH_SIZE } from './index-manager.js';
export type { EnsureIndexOptions, IngestOptions } from './index-manager.js';
export { Retriever } from './retriever.js';
export { AnswerPipeline } from './pipeline.js';
export type { AnswerPipelineOptions, QueryOptions, StreamQueryOptions } from './pipeline.js';
export { resolveMode, renderTemplate, MODE_NAMES, CHAIN_OF_THOUGHT_TEMPLATE, FAST_TEMPLATE } from './modes.js';
export type { Mode, ModeName, ModeOverrides } from './modes.js';
export { loadDirectory, loadFile, DEFAULT_GLOB } from './document-loader.js';
export { matchesFilter } from './filter.js';

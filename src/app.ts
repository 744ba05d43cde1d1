// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Document Q&A
 *
 * Wires the pieces together for the CLI: loader, chunker and index manager
 * for indexing; retriever and answer pipeline for questions.
 */

import type { ResolvedConfig } from './config/types.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';
import { createGenerationProvider, getProviderTypes, hasProviderType } from './providers/index.js';
import type { BaseGenerationProvider } from './providers/base.js';
import { TextChunker } from './rag/chunker.js';
import { loadDirectory } from './rag/document-loader.js';
import type { BaseEmbeddingProvider } from './rag/embeddings/base.js';
import { EMBEDDING_PROVIDERS, createEmbeddingProvider, type EmbeddingProviderName } from './rag/embeddings/index.js';
import { createIndexService } from './rag/index-service/index.js';
import type { VectorIndexService } from './rag/index-service/types.js';
import { IndexManager } from './rag/index-manager.js';
import { resolveMode, type Mode } from './rag/modes.js';
import { AnswerPipeline, type QueryOptions, type StreamQueryOptions } from './rag/pipeline.js';
import { Retriever } from './rag/retriever.js';
import type {
  DistanceMetric,
  Document,
  IngestProgressCallback,
  IngestReport,
  MetadataFilter,
  QueryResult,
  RetrievedDocument,
} from './rag/types.js';
import { isDistanceMetric } from './utils/vector.js';

export interface DocumentQAOptions {
  config: ResolvedConfig;
  /** Replace the configured providers (tests, embedding in other tools) */
  embeddingProvider?: BaseEmbeddingProvider;
  generator?: BaseGenerationProvider;
  indexService?: VectorIndexService;
}

export interface IndexSummary {
  documents: number;
  chunks: number;
  report: IngestReport;
}

function isEmbeddingProviderName(value: string): value is EmbeddingProviderName {
  return (EMBEDDING_PROVIDERS as readonly string[]).includes(value);
}

export class DocumentQA {
  private config: ResolvedConfig;
  private metric: DistanceMetric;
  private mode: Mode;
  private chunker: TextChunker;
  private embeddingProvider: BaseEmbeddingProvider;
  private generator: BaseGenerationProvider;
  private indexManager: IndexManager;
  private retriever: Retriever;
  private pipeline: AnswerPipeline | null = null;

  constructor(options: DocumentQAOptions) {
    const { config } = options;
    this.config = config;

    if (!isDistanceMetric(config.metric)) {
      throw new ConfigurationError(`Unknown metric "${config.metric}". Valid: cosine, euclidean, dotproduct`);
    }
    this.metric = config.metric;

    this.chunker = new TextChunker({ chunkSize: config.chunkSize, chunkOverlap: config.chunkOverlap });
    this.embeddingProvider = options.embeddingProvider ?? this.createEmbeddingProvider();
    this.generator = options.generator ?? this.createGenerator();

    this.mode = resolveMode(config.mode, {
      model: config.generationModel ?? this.generator.getDefaultModel(),
      retrievalK: config.retrievalK,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
    });

    const service = options.indexService ?? createIndexService({
      backend: config.indexBackend,
      indexDir: config.indexDir,
    });
    this.indexManager = new IndexManager(config.indexName, service, this.embeddingProvider);
    this.retriever = new Retriever(config.indexName, service, this.embeddingProvider);
  }

  private createEmbeddingProvider(): BaseEmbeddingProvider {
    const { embeddingProvider: provider } = this.config;
    if (!isEmbeddingProviderName(provider)) {
      throw new ConfigurationError(
        `Unknown embedding provider "${provider}". Valid: ${EMBEDDING_PROVIDERS.join(', ')}`
      );
    }
    return createEmbeddingProvider({
      provider,
      model: this.config.embeddingModel,
      apiKey: this.config.openaiApiKey,
      baseUrl: this.config.embeddingBaseUrl,
    });
  }

  private createGenerator(): BaseGenerationProvider {
    const { generationProvider: type } = this.config;
    if (!hasProviderType(type)) {
      throw new ConfigurationError(
        `Unknown generation provider "${type}". Valid: ${getProviderTypes().join(', ')}`
      );
    }
    return createGenerationProvider({
      type,
      apiKey: type === 'anthropic' ? this.config.anthropicApiKey : this.config.openaiApiKey,
      baseUrl: this.config.generationBaseUrl,
      model: this.config.generationModel,
    });
  }

  getMode(): Mode {
    return this.mode;
  }

  getRetriever(): Retriever {
    return this.retriever;
  }

  /**
   * Load, chunk and ingest every matching file under a directory.
   */
  async indexDocuments(
    directory: string,
    pattern: string = this.config.glob,
    onBatch?: IngestProgressCallback
  ): Promise<IndexSummary> {
    const documents = await loadDirectory(directory, pattern);
    return this.ingestDocuments(documents, onBatch);
  }

  /**
   * Chunk and ingest documents that are already loaded.
   */
  async ingestDocuments(documents: Document[], onBatch?: IngestProgressCallback): Promise<IndexSummary> {
    const chunks = this.chunker.split(documents);
    logger.verbose(`Split ${documents.length} documents into ${chunks.length} chunks`);

    await this.indexManager.ensureIndex({
      dimension: await this.embeddingProvider.resolveDimensions(),
      metric: this.metric,
      placement: this.config.placement,
    });

    const report = await this.indexManager.ingest(chunks, {
      batchSize: this.config.batchSize,
      onBatch,
    });
    return { documents: documents.length, chunks: chunks.length, report };
  }

  query(question: string, options?: QueryOptions): Promise<QueryResult> {
    return this.getPipeline().query(question, options);
  }

  streamQuery(question: string, options?: StreamQueryOptions): AsyncGenerator<string, void, undefined> {
    return this.getPipeline().streamQuery(question, options);
  }

  /**
   * Similarity search without generation.
   */
  search(question: string, k: number = this.mode.retrievalK, filter?: MetadataFilter): Promise<RetrievedDocument[]> {
    return this.retriever.search(question, k, filter);
  }

  deleteIndex(): Promise<void> {
    return this.indexManager.deleteIndex();
  }

  private getPipeline(): AnswerPipeline {
    if (!this.pipeline) {
      this.pipeline = new AnswerPipeline({
        retriever: this.retriever,
        generator: this.generator,
        mode: this.mode,
      });
    }
    return this.pipeline;
  }
}

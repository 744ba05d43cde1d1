/**
 * RAG Retriever
 *
 * Queries the vector index for the chunks most similar to a question.
 */

import { ConfigurationError, RetrievalError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type { ScoredRecord, VectorIndexService } from './index-service/types.js';
import type { MetadataFilter, RetrievedDocument } from './types.js';

/**
 * Retriever for querying one index.
 *
 * The embedding provider must be the one the index was built with.
 */
export class Retriever {
  private embeddingProvider: BaseEmbeddingProvider;
  private service: VectorIndexService;
  private indexName: string;

  constructor(indexName: string, service: VectorIndexService, embeddingProvider: BaseEmbeddingProvider) {
    this.indexName = indexName;
    this.service = service;
    this.embeddingProvider = embeddingProvider;
  }

  /**
   * Search for the k most similar chunks, best first.
   */
  async search(query: string, k: number, filter?: MetadataFilter): Promise<RetrievedDocument[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ConfigurationError(`k must be a positive integer, got ${k}`);
    }

    let embedding: number[];
    try {
      embedding = await this.embeddingProvider.embedOne(query);
    } catch (error) {
      throw new RetrievalError(
        `${this.embeddingProvider.getName()} failed to embed the query: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    let records: ScoredRecord[];
    try {
      records = await this.service.search(this.indexName, embedding, k, filter);
    } catch (error) {
      throw new RetrievalError(
        `Search on index ${this.indexName} failed: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    const results = records.map((record, i) => ({
      chunk: record.payload,
      score: record.score,
      rank: i + 1,
    }));

    logger.retrieval(results.length, k, results[0]?.score);
    return results;
  }

  /**
   * Format results as a simple list (for command output).
   */
  formatAsToolOutput(results: RetrievedDocument[]): string {
    if (results.length === 0) {
      return 'No relevant documents found.';
    }

    const lines: string[] = [`Found ${results.length} relevant documents:\n`];

    for (const { chunk, score, rank } of results) {
      const matchPercent = Math.round(score * 100);
      const page = typeof chunk.metadata.page === 'number' ? ` (page ${chunk.metadata.page + 1})` : '';

      lines.push(`${rank}. ${chunk.metadata.source}${page}`);
      lines.push(`   Match: ${matchPercent}%`);
      lines.push('');

      const content =
        chunk.content.length > 3000
          ? chunk.content.slice(0, 3000) + '\n... (truncated)'
          : chunk.content;
      lines.push(content.trim());
      lines.push('');
    }

    return lines.join('\n');
  }
}

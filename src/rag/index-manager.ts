// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Index Manager
 *
 * Owns the lifecycle of one named index (create-if-absent, readiness wait,
 * deletion) and its population (embed and upsert in batches).
 *
 * Ingestion is fail-fast: the first failing batch stops the run and is
 * reported with the ids it contained, so the caller can resume from there.
 */

import { ConfigurationError, IndexProvisioningError, IngestionError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { BaseEmbeddingProvider } from './embeddings/base.js';
import type { IndexPlacement, VectorIndexService } from './index-service/types.js';
import type { Chunk, DistanceMetric, IngestProgressCallback, IngestReport } from './types.js';

/** Default chunks per embed/upsert batch */
export const DEFAULT_BATCH_SIZE = 100;

/** Default wait for an index to become ready */
export const DEFAULT_READY_TIMEOUT_MS = 60_000;

/** Default interval between readiness checks */
export const DEFAULT_POLL_INTERVAL_MS = 1000;

export interface EnsureIndexOptions {
  dimension: number;
  metric: DistanceMetric;
  placement?: IndexPlacement;
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export interface IngestOptions {
  batchSize?: number;
  onBatch?: IngestProgressCallback;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Manages one index on a vector index service.
 */
export class IndexManager {
  private service: VectorIndexService;
  private embeddingProvider: BaseEmbeddingProvider;
  private indexName: string;
  /** Tail of the queue that serializes admin calls and ingestion */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(indexName: string, service: VectorIndexService, embeddingProvider: BaseEmbeddingProvider) {
    if (indexName.trim() === '') {
      throw new ConfigurationError('Index name must not be empty');
    }
    this.indexName = indexName;
    this.service = service;
    this.embeddingProvider = embeddingProvider;
  }

  getIndexName(): string {
    return this.indexName;
  }

  /**
   * Create the index if it does not exist, then wait until it is ready.
   * Calling it again with the same parameters never creates a second index.
   */
  ensureIndex(options: EnsureIndexOptions): Promise<void> {
    return this.serialize(() => this.doEnsureIndex(options));
  }

  /**
   * Embed and upsert chunks, one batch at a time, in order.
   */
  async ingest(chunks: Chunk[], options: IngestOptions = {}): Promise<IngestReport> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    requirePositiveInteger('batchSize', batchSize);
    return this.serialize(() => this.doIngest(chunks, batchSize, options.onBatch));
  }

  /**
   * Remove the index and everything in it. Irreversible.
   */
  deleteIndex(): Promise<void> {
    return this.serialize(async () => {
      await this.service.deleteIndex(this.indexName);
      logger.verbose(`Deleted index ${this.indexName}`);
    });
  }

  /**
   * Run a task after every previously queued task has settled.
   */
  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task, task);
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async doEnsureIndex(options: EnsureIndexOptions): Promise<void> {
    const {
      dimension,
      metric,
      placement,
      timeoutMs = DEFAULT_READY_TIMEOUT_MS,
      pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    } = options;
    requirePositiveInteger('dimension', dimension);
    requirePositiveInteger('pollIntervalMs', pollIntervalMs);
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new ConfigurationError(`timeoutMs must be a non-negative number, got ${timeoutMs}`);
    }

    const name = this.indexName;
    const startTime = Date.now();

    let existing: string[];
    try {
      existing = await this.service.listIndexes();
    } catch (error) {
      throw new IndexProvisioningError(
        `Could not list indexes on ${this.service.name}: ${errorMessage(error)}`,
        name,
        { cause: error, retryable: true }
      );
    }

    if (!existing.includes(name)) {
      logger.verbose(`Creating index ${name} (${dimension} dims, ${metric})`);
      try {
        await this.service.createIndex({ name, dimension, metric, ...(placement && { placement }) });
      } catch (error) {
        throw new IndexProvisioningError(
          `${this.service.name} rejected index ${name}: ${errorMessage(error)}`,
          name,
          { cause: error }
        );
      }
    }

    const deadline = startTime + timeoutMs;
    for (;;) {
      let ready: boolean;
      try {
        const description = await this.service.describeIndex(name);
        if (description.dimension !== dimension) {
          throw new IndexProvisioningError(
            `Index ${name} has dimension ${description.dimension}, embeddings have ${dimension}`,
            name
          );
        }
        ready = description.ready;
      } catch (error) {
        if (error instanceof IndexProvisioningError) throw error;
        throw new IndexProvisioningError(
          `Could not describe index ${name}: ${errorMessage(error)}`,
          name,
          { cause: error, retryable: true }
        );
      }

      if (ready) break;
      if (Date.now() >= deadline) {
        throw new IndexProvisioningError(
          `Index ${name} was not ready after ${timeoutMs}ms`,
          name,
          { retryable: true }
        );
      }
      await sleep(pollIntervalMs);
    }

    logger.stage(`Index ${name} ready`, Date.now() - startTime);
  }

  private async doIngest(
    chunks: Chunk[],
    batchSize: number,
    onBatch?: IngestProgressCallback
  ): Promise<IngestReport> {
    const startTime = Date.now();
    const totalBatches = Math.ceil(chunks.length / batchSize);
    const upserted: string[] = [];

    for (let b = 0; b < totalBatches; b++) {
      const batch = chunks.slice(b * batchSize, (b + 1) * batchSize);
      const batchStart = Date.now();

      try {
        const vectors = await this.embeddingProvider.embed(batch.map((chunk) => chunk.content));
        if (vectors.length !== batch.length) {
          throw new Error(`Expected ${batch.length} embeddings, got ${vectors.length}`);
        }

        await this.service.upsert(
          this.indexName,
          batch.map((chunk, i) => ({ id: chunk.id, vector: vectors[i], payload: chunk }))
        );
      } catch (error) {
        const failedIds = batch.map((chunk) => chunk.id);
        const pendingIds = chunks.slice((b + 1) * batchSize).map((chunk) => chunk.id);
        throw new IngestionError(
          `Batch ${b + 1}/${totalBatches} failed: ${errorMessage(error)}`,
          b,
          failedIds,
          [...upserted],
          pendingIds,
          { cause: error }
        );
      }

      upserted.push(...batch.map((chunk) => chunk.id));
      logger.batchProgress(b + 1, totalBatches, batch.length, Date.now() - batchStart);
      onBatch?.(b + 1, totalBatches, upserted.length);
    }

    const durationMs = Date.now() - startTime;
    logger.stage(`Ingested ${upserted.length} chunks into ${this.indexName}`, durationMs, `${totalBatches} batches`);
    return { upserted, batches: totalBatches, durationMs };
  }
}

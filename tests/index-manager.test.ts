// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IndexManager } from '../src/rag/index-manager.js';
import { MemoryIndexService } from '../src/rag/index-service/memory.js';
import type { IndexDescription } from '../src/rag/index-service/types.js';
import { ConfigurationError, IndexProvisioningError, IngestionError } from '../src/errors.js';
import { KeywordEmbeddingProvider, makeChunk } from './helpers/keyword-embeddings.js';

/**
 * Index service whose indexes report ready only after a number of checks.
 */
class SlowIndexService extends MemoryIndexService {
  describeCalls = 0;

  constructor(private checksUntilReady: number) {
    super();
  }

  async describeIndex(name: string): Promise<IndexDescription> {
    const description = await super.describeIndex(name);
    this.describeCalls++;
    return { ...description, ready: this.describeCalls > this.checksUntilReady };
  }
}

function makeChunks(count: number) {
  return Array.from({ length: count }, (_, i) => makeChunk(`chunk-${i}`, `chunk number ${i}`, 'bulk.txt', i));
}

function ids(from: number, to: number): string[] {
  return Array.from({ length: to - from }, (_, i) => `chunk-${from + i}`);
}

describe('IndexManager', () => {
  let service: MemoryIndexService;
  let embedder: KeywordEmbeddingProvider;
  let manager: IndexManager;

  beforeEach(() => {
    service = new MemoryIndexService();
    embedder = new KeywordEmbeddingProvider(['chunk', 'number']);
    manager = new IndexManager('docs', service, embedder);
  });

  it('rejects an empty index name', () => {
    expect(() => new IndexManager(' ', service, embedder)).toThrow(ConfigurationError);
  });

  describe('ensureIndex', () => {
    it('creates a missing index with the requested settings', async () => {
      await manager.ensureIndex({
        dimension: 2,
        metric: 'cosine',
        placement: { cloud: 'aws', region: 'us-east-1' },
      });

      expect(await service.describeIndex('docs')).toEqual({
        name: 'docs',
        dimension: 2,
        metric: 'cosine',
        placement: { cloud: 'aws', region: 'us-east-1' },
        ready: true,
      });
    });

    it('creates the index only once', async () => {
      const createSpy = vi.spyOn(service, 'createIndex');

      await manager.ensureIndex({ dimension: 2, metric: 'cosine' });
      await manager.ensureIndex({ dimension: 2, metric: 'cosine' });

      expect(createSpy).toHaveBeenCalledTimes(1);
      expect(await service.listIndexes()).toEqual(['docs']);
    });

    it('creates the index only once under concurrent calls', async () => {
      const createSpy = vi.spyOn(service, 'createIndex');

      await Promise.all([
        manager.ensureIndex({ dimension: 2, metric: 'cosine' }),
        manager.ensureIndex({ dimension: 2, metric: 'cosine' }),
      ]);

      expect(createSpy).toHaveBeenCalledTimes(1);
    });

    it('uses an existing index as is', async () => {
      await service.createIndex({ name: 'docs', dimension: 2, metric: 'cosine' });
      const createSpy = vi.spyOn(service, 'createIndex');

      await manager.ensureIndex({ dimension: 2, metric: 'cosine' });

      expect(createSpy).not.toHaveBeenCalled();
    });

    it('fails when the existing index has another dimension', async () => {
      await service.createIndex({ name: 'docs', dimension: 3, metric: 'cosine' });

      await expect(manager.ensureIndex({ dimension: 2, metric: 'cosine' })).rejects.toThrow(
        'Index docs has dimension 3, embeddings have 2'
      );
    });

    it('waits until the index is ready', async () => {
      const slow = new SlowIndexService(2);
      const slowManager = new IndexManager('docs', slow, embedder);

      await slowManager.ensureIndex({ dimension: 2, metric: 'cosine', pollIntervalMs: 1, timeoutMs: 1000 });

      expect(slow.describeCalls).toBe(3);
    });

    it('times out when the index never becomes ready', async () => {
      const never = new SlowIndexService(Number.POSITIVE_INFINITY);
      const neverManager = new IndexManager('docs', never, embedder);

      const error = await neverManager
        .ensureIndex({ dimension: 2, metric: 'cosine', pollIntervalMs: 5, timeoutMs: 30 })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexProvisioningError);
      expect(error).toMatchObject({
        message: 'Index docs was not ready after 30ms',
        indexName: 'docs',
        retryable: true,
      });
    });

    it('wraps a rejected creation', async () => {
      const cause = new Error('quota exceeded');
      vi.spyOn(service, 'createIndex').mockRejectedValue(cause);

      const error = await manager.ensureIndex({ dimension: 2, metric: 'cosine' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IndexProvisioningError);
      expect(error).toMatchObject({
        message: 'memory rejected index docs: quota exceeded',
        indexName: 'docs',
        retryable: false,
        cause,
      });
    });

    it('wraps a failure to list indexes as retryable', async () => {
      vi.spyOn(service, 'listIndexes').mockRejectedValue(new Error('connection reset'));

      await expect(manager.ensureIndex({ dimension: 2, metric: 'cosine' })).rejects.toMatchObject({
        message: 'Could not list indexes on memory: connection reset',
        retryable: true,
      });
    });

    it('validates its parameters', async () => {
      await expect(manager.ensureIndex({ dimension: 0, metric: 'cosine' })).rejects.toThrow(ConfigurationError);
      await expect(manager.ensureIndex({ dimension: 2, metric: 'cosine', timeoutMs: -1 })).rejects.toThrow(
        'timeoutMs must be a non-negative number, got -1'
      );
    });
  });

  describe('ingest', () => {
    beforeEach(async () => {
      await manager.ensureIndex({ dimension: embedder.getDimensions(), metric: 'cosine' });
    });

    it('stores every chunk in batches and reports progress', async () => {
      const progress: Array<[number, number, number]> = [];

      const report = await manager.ingest(makeChunks(250), {
        batchSize: 100,
        onBatch: (batch, total, stored) => progress.push([batch, total, stored]),
      });

      expect(report.upserted).toEqual(ids(0, 250));
      expect(report.batches).toBe(3);
      expect(progress).toEqual([
        [1, 3, 100],
        [2, 3, 200],
        [3, 3, 250],
      ]);
      expect(embedder.calls.map((texts) => texts.length)).toEqual([100, 100, 50]);
      expect(await service.search('docs', [1, 1], 1000)).toHaveLength(250);
    });

    it('stops at the first failing batch and reports exactly which chunks were stored', async () => {
      const upsert = service.upsert.bind(service);
      let calls = 0;
      vi.spyOn(service, 'upsert').mockImplementation(async (name, records) => {
        calls++;
        if (calls === 2) {
          throw new Error('quota exceeded');
        }
        return upsert(name, records);
      });

      const error = await manager.ingest(makeChunks(250), { batchSize: 100 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(IngestionError);
      if (!(error instanceof IngestionError)) return;
      expect(error.message).toBe('Batch 2/3 failed: quota exceeded');
      expect(error.batchIndex).toBe(1);
      expect(error.failedIds).toEqual(ids(100, 200));
      expect(error.upsertedIds).toEqual(ids(0, 100));
      expect(error.pendingIds).toEqual(ids(200, 250));
      // The third batch is never attempted
      expect(calls).toBe(2);
      expect(await service.search('docs', [1, 1], 1000)).toHaveLength(100);
    });

    it('reports an embedding failure against its batch', async () => {
      embedder.failWith = new Error('rate limited');

      const error = await manager.ingest(makeChunks(3), { batchSize: 2 }).catch((e: unknown) => e);

      expect(error).toMatchObject({
        message: 'Batch 1/2 failed: rate limited',
        batchIndex: 0,
        failedIds: ['chunk-0', 'chunk-1'],
        upsertedIds: [],
        pendingIds: ['chunk-2'],
      });
    });

    it('fails a batch when the provider returns too few embeddings', async () => {
      vi.spyOn(embedder, 'embed').mockResolvedValue([[1, 1]]);

      await expect(manager.ingest(makeChunks(2))).rejects.toThrow('Batch 1/1 failed: Expected 2 embeddings, got 1');
    });

    it('does nothing for no chunks', async () => {
      const report = await manager.ingest([]);
      expect(report.upserted).toEqual([]);
      expect(report.batches).toBe(0);
      expect(embedder.calls).toEqual([]);
    });

    it('rejects a non-positive batch size', async () => {
      await expect(manager.ingest(makeChunks(1), { batchSize: 0 })).rejects.toThrow(
        'batchSize must be a positive integer, got 0'
      );
    });
  });

  describe('serialization', () => {
    it('runs deletion only after a running ingestion has finished', async () => {
      await manager.ensureIndex({ dimension: 2, metric: 'cosine' });
      const events: string[] = [];
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      vi.spyOn(embedder, 'embed').mockImplementation(async (texts) => {
        events.push('embed:start');
        await gate;
        events.push('embed:end');
        return texts.map(() => [1, 1]);
      });
      const deleteIndex = service.deleteIndex.bind(service);
      vi.spyOn(service, 'deleteIndex').mockImplementation(async (name) => {
        events.push('delete');
        return deleteIndex(name);
      });

      const ingesting = manager.ingest(makeChunks(2));
      const deleting = manager.deleteIndex();
      release();
      await Promise.all([ingesting, deleting]);

      expect(events).toEqual(['embed:start', 'embed:end', 'delete']);
      expect(await service.listIndexes()).toEqual([]);
    });

    it('keeps running queued work after a failure', async () => {
      await manager.ensureIndex({ dimension: 2, metric: 'cosine' });
      embedder.failWith = new Error('boom');

      const failed = manager.ingest(makeChunks(1));
      const deleted = manager.deleteIndex();

      await expect(failed).rejects.toBeInstanceOf(IngestionError);
      await expect(deleted).resolves.toBeUndefined();
    });
  });
});

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { VectraIndexService } from '../src/rag/index-service/vectra.js';
import { makeChunk } from './helpers/keyword-embeddings.js';

describe('VectraIndexService', () => {
  let baseDir: string;
  let service: VectraIndexService;

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-vectra-'));
    service = new VectraIndexService(baseDir);
  });

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true });
  });

  it('lists nothing when the base directory does not exist', async () => {
    const missing = new VectraIndexService(path.join(baseDir, 'nowhere'));
    expect(await missing.listIndexes()).toEqual([]);
  });

  it('creates an index with a manifest', async () => {
    await service.createIndex({
      name: 'docs',
      dimension: 3,
      metric: 'cosine',
      placement: { cloud: 'aws', region: 'us-east-1' },
    });

    expect(await service.listIndexes()).toEqual(['docs']);
    expect(await service.describeIndex('docs')).toEqual({
      name: 'docs',
      dimension: 3,
      metric: 'cosine',
      placement: { cloud: 'aws', region: 'us-east-1' },
      ready: true,
    });
    expect(fs.existsSync(path.join(service.getPath('docs'), 'docqa-manifest.json'))).toBe(true);
  });

  it('ignores folders without a manifest', async () => {
    fs.mkdirSync(path.join(baseDir, 'stray'));
    await service.createIndex({ name: 'docs', dimension: 3, metric: 'cosine' });
    expect(await service.listIndexes()).toEqual(['docs']);
  });

  it('refuses to create an index twice', async () => {
    await service.createIndex({ name: 'docs', dimension: 3, metric: 'cosine' });
    await expect(service.createIndex({ name: 'docs', dimension: 3, metric: 'cosine' })).rejects.toThrow(
      'Index "docs" already exists'
    );
  });

  it('only supports cosine', async () => {
    await expect(service.createIndex({ name: 'docs', dimension: 3, metric: 'euclidean' })).rejects.toThrow(
      'Metric "euclidean" is not supported by vectra (cosine only)'
    );
  });

  it('rejects names that are not folder-safe', async () => {
    await expect(service.createIndex({ name: '../escape', dimension: 3, metric: 'cosine' })).rejects.toThrow(
      'Invalid index name "../escape"'
    );
  });

  it('throws for unknown indexes', async () => {
    await expect(service.describeIndex('missing')).rejects.toThrow('Index "missing" not found');
  });

  it('stores chunks and returns them from search', async () => {
    await service.createIndex({ name: 'docs', dimension: 3, metric: 'cosine' });
    await service.upsert('docs', [
      { id: 'a', vector: [1, 0, 0], payload: makeChunk('a', 'alpha text', 'a.txt') },
      { id: 'b', vector: [0, 1, 0], payload: makeChunk('b', 'beta text', 'b.txt', 1) },
      { id: 'c', vector: [0, 0, 1], payload: makeChunk('c', 'gamma text', 'c.txt') },
    ]);

    const results = await service.search('docs', [0.1, 1, 0], 2);

    expect(results).toHaveLength(2);
    expect(results[0].id).toBe('b');
    expect(results[0].payload).toEqual({
      id: 'b',
      content: 'beta text',
      metadata: { source: 'b.txt', chunkIndex: 1, startIndex: 0 },
    });
    expect(results[0].score).toBeGreaterThan(results[1].score);
    expect(results[1].id).toBe('a');
  });

  it('persists across service instances', async () => {
    await service.createIndex({ name: 'docs', dimension: 2, metric: 'cosine' });
    await service.upsert('docs', [{ id: 'a', vector: [1, 0], payload: makeChunk('a', 'kept') }]);

    const reopened = new VectraIndexService(baseDir);
    const results = await reopened.search('docs', [1, 0], 1);
    expect(results.map((r) => r.payload.content)).toEqual(['kept']);
  });

  it('filters on metadata', async () => {
    await service.createIndex({ name: 'docs', dimension: 2, metric: 'cosine' });
    await service.upsert('docs', [
      { id: 'a', vector: [1, 0], payload: makeChunk('a', 'first', 'a.txt') },
      { id: 'b', vector: [0.9, 0.1], payload: makeChunk('b', 'second', 'b.txt') },
    ]);

    const results = await service.search('docs', [1, 0], 2, { source: { $eq: 'b.txt' } });
    expect(results.map((r) => r.id)).toEqual(['b']);
  });

  it('rejects vectors of the wrong dimension', async () => {
    await service.createIndex({ name: 'docs', dimension: 2, metric: 'cosine' });
    await expect(
      service.upsert('docs', [{ id: 'a', vector: [1, 0, 0], payload: makeChunk('a', 'x') }])
    ).rejects.toThrow('Vector for "a" has dimension 3, index expects 2');
    await expect(service.search('docs', [1], 1)).rejects.toThrow('Query vector has dimension 1, index expects 2');
  });

  it('deletes an index and its folder', async () => {
    await service.createIndex({ name: 'docs', dimension: 2, metric: 'cosine' });
    await service.deleteIndex('docs');

    expect(await service.listIndexes()).toEqual([]);
    expect(fs.existsSync(service.getPath('docs'))).toBe(false);
    await expect(service.deleteIndex('docs')).rejects.toThrow('Index "docs" not found');
  });
});

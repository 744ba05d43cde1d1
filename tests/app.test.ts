// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DocumentQA } from '../src/app.js';
import { mergeConfig, type ResolvedConfig } from '../src/config/index.js';
import { ConfigurationError } from '../src/errors.js';
import { MockGenerationProvider } from '../src/providers/mock.js';
import { MemoryIndexService } from '../src/rag/index-service/memory.js';
import type { Document } from '../src/rag/types.js';
import { KeywordEmbeddingProvider } from './helpers/keyword-embeddings.js';

const VOCABULARY = ['rate', 'limits', 'api', 'webhooks', 'events'];

const DOCUMENTS: Document[] = [
  { content: 'Rate limits apply to every API key.', metadata: { source: 'limits.pdf' } },
  { content: 'Webhooks deliver events to your endpoint.', metadata: { source: 'hooks.pdf' } },
];

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const fragments: string[] = [];
  for await (const fragment of stream) {
    fragments.push(fragment);
  }
  return fragments;
}

describe('DocumentQA', () => {
  let config: ResolvedConfig;
  let service: MemoryIndexService;
  let embedder: KeywordEmbeddingProvider;
  let generator: MockGenerationProvider;

  beforeEach(() => {
    config = mergeConfig(null, { indexName: 'docs', backend: 'memory' }, {});
    service = new MemoryIndexService();
    embedder = new KeywordEmbeddingProvider(VOCABULARY);
    generator = new MockGenerationProvider({ defaultResponse: 'Every API key is rate limited.' });
  });

  function create(overrides: Partial<ResolvedConfig> = {}): DocumentQA {
    return new DocumentQA({
      config: { ...config, ...overrides },
      embeddingProvider: embedder,
      generator,
      indexService: service,
    });
  }

  describe('construction', () => {
    it('uses the fast mode by default', () => {
      const mode = create().getMode();
      expect(mode.name).toBe('fast');
      expect(mode.model).toBe('gpt-3.5-turbo');
      expect(mode.retrievalK).toBe(3);
    });

    it('lets the configured model and k override the mode', () => {
      const mode = create({ mode: 'standard', generationModel: 'custom-model', retrievalK: 2 }).getMode();
      expect(mode.name).toBe('standard');
      expect(mode.model).toBe('custom-model');
      expect(mode.retrievalK).toBe(2);
    });

    it('rejects an unknown metric', () => {
      expect(() => create({ metric: 'manhattan' })).toThrow(
        'Unknown metric "manhattan". Valid: cosine, euclidean, dotproduct'
      );
    });

    it('rejects an unknown mode', () => {
      expect(() => create({ mode: 'turbo' })).toThrow(ConfigurationError);
    });

    it('rejects unknown providers', () => {
      expect(() => new DocumentQA({ config: { ...config, embeddingProvider: 'cohere' }, generator })).toThrow(
        'Unknown embedding provider "cohere". Valid: openai, ollama'
      );
      expect(
        () => new DocumentQA({ config: { ...config, generationProvider: 'gemini' }, embeddingProvider: embedder })
      ).toThrow(ConfigurationError);
    });
  });

  describe('ingestDocuments', () => {
    it('creates the index and stores one chunk per short document', async () => {
      const summary = await create().ingestDocuments(DOCUMENTS);

      expect(summary.documents).toBe(2);
      expect(summary.chunks).toBe(2);
      expect(summary.report.batches).toBe(1);
      expect(summary.report.upserted).toHaveLength(2);
      expect(await service.describeIndex('docs')).toMatchObject({
        dimension: VOCABULARY.length,
        metric: 'cosine',
        ready: true,
      });
    });

    it('reports progress per batch', async () => {
      const progress: Array<[number, number, number]> = [];
      await create({ batchSize: 1 }).ingestDocuments(DOCUMENTS, (batch, total, stored) => {
        progress.push([batch, total, stored]);
      });

      expect(progress).toEqual([
        [1, 2, 1],
        [2, 2, 2],
      ]);
    });
  });

  describe('embedding dimension', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    it('creates the index with the size the embedding server reports', async () => {
      const fetchMock = vi.fn(async (_url: string, init: { body: string }) => {
        const { input }: { input: string[] } = JSON.parse(init.body);
        return { ok: true, json: async () => ({ embeddings: input.map(() => [0.1, 0.2, 0.3]) }) };
      });
      vi.stubGlobal('fetch', fetchMock);

      const qa = new DocumentQA({
        config: { ...config, embeddingProvider: 'ollama', embeddingModel: 'custom-embed' },
        generator,
        indexService: service,
      });
      const summary = await qa.ingestDocuments(DOCUMENTS);

      expect((await service.describeIndex('docs')).dimension).toBe(3);
      expect(summary.report.upserted).toHaveLength(2);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });
  });

  describe('indexDocuments', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docqa-app-'));
      fs.writeFileSync(path.join(dir, 'limits.txt'), 'Rate limits apply to every API key.');
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('loads and ingests matching files', async () => {
      const summary = await create().indexDocuments(dir, '**/*.txt');
      expect(summary).toMatchObject({ documents: 1, chunks: 1 });
    });
  });

  describe('questions', () => {
    let qa: DocumentQA;

    beforeEach(async () => {
      qa = create();
      await qa.ingestDocuments(DOCUMENTS);
    });

    it('searches without generating', async () => {
      const results = await qa.search('webhooks events', 1);

      expect(results).toHaveLength(1);
      expect(results[0].chunk.metadata.source).toBe('hooks.pdf');
      expect(results[0].rank).toBe(1);
      expect(generator.getCallCount()).toBe(0);
    });

    it('answers with the mode model', async () => {
      const result = await qa.query('What are the API rate limits?');

      expect(result.answer).toBe('Every API key is rate limited.');
      expect(result.documents[0].chunk.metadata.source).toBe('limits.pdf');
      expect(generator.getLastCall()?.model).toBe('gpt-3.5-turbo');
    });

    it('streams the same answer', async () => {
      const fragments = await collect(qa.streamQuery('What are the API rate limits?'));
      expect(fragments.join('')).toBe('Every API key is rate limited.');
    });
  });

  describe('deleteIndex', () => {
    it('removes the index', async () => {
      const qa = create();
      await qa.ingestDocuments(DOCUMENTS);

      await qa.deleteIndex();

      expect(await service.listIndexes()).toEqual([]);
    });
  });
});

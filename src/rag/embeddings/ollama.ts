// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Ollama Embedding Provider
 *
 * Sends texts to a local Ollama server's `/api/embed` endpoint, one request
 * at a time, at most REQUEST_BATCH_SIZE inputs per request. The vector size
 * depends on the pulled model and is learned from the first response.
 */

import { BaseEmbeddingProvider } from './base.js';

const DEFAULT_MODEL = 'nomic-embed-text';
const DEFAULT_BASE_URL = 'http://localhost:11434';
const REQUEST_BATCH_SIZE = 64;

/** Sizes reported for well-known models before the first request */
const KNOWN_DIMENSIONS: Record<string, number> = {
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
};

function isVectorList(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every((vector) => Array.isArray(vector) && vector.every((x) => typeof x === 'number'))
  );
}

export class OllamaEmbeddingProvider extends BaseEmbeddingProvider {
  private readonly model: string;
  private readonly baseUrl: string;
  private learnedDimensions: number | null = null;

  constructor(model: string = DEFAULT_MODEL, baseUrl: string = DEFAULT_BASE_URL) {
    super();
    this.model = model;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  getName(): string {
    return 'Ollama';
  }

  getModel(): string {
    return this.model;
  }

  /**
   * The learned size, else the known size of the model, else 0.
   */
  getDimensions(): number {
    return this.learnedDimensions ?? KNOWN_DIMENSIONS[this.model] ?? 0;
  }

  /**
   * Ask the server once, since a model tag may not match the known sizes.
   */
  async resolveDimensions(): Promise<number> {
    if (this.learnedDimensions === null) {
      await this.embed(['dimension check']);
    }
    return this.getDimensions();
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let i = 0; i < texts.length; i += REQUEST_BATCH_SIZE) {
      vectors.push(...(await this.request(texts.slice(i, i + REQUEST_BATCH_SIZE))));
    }
    return vectors;
  }

  private async request(input: string[]): Promise<number[][]> {
    const response = await fetch(`${this.baseUrl}/api/embed`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ model: this.model, input }),
    });

    if (!response.ok) {
      throw new Error(`Ollama embedding request failed: ${response.status} ${response.statusText}`);
    }

    const data: unknown = await response.json();
    const embeddings = typeof data === 'object' && data !== null && 'embeddings' in data ? data.embeddings : undefined;
    if (!isVectorList(embeddings) || embeddings.length !== input.length) {
      throw new Error(`Ollama returned no embeddings for ${input.length} inputs from ${this.model}`);
    }

    if (this.learnedDimensions === null && embeddings.length > 0) {
      this.learnedDimensions = embeddings[0].length;
    }
    return embeddings;
  }
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Embedding Provider
 *
 * Abstract class that all embedding providers must implement.
 */

import { createHash } from 'crypto';

/**
 * Simple hash function for cache keys.
 */
function hashText(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 16);
}

/**
 * Embedding cache entry with TTL.
 */
interface EmbeddingCacheEntry {
  embedding: number[];
  timestamp: number;
}

/**
 * In-memory LRU cache for embeddings with TTL.
 */
class EmbeddingCache {
  private cache = new Map<string, EmbeddingCacheEntry>();
  private maxSize: number;
  private ttlMs: number;

  constructor(maxSize = 1000, ttlMinutes = 60) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMinutes * 60 * 1000;
  }

  get(key: string): number[] | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    // Check TTL
    if (Date.now() - entry.timestamp > this.ttlMs) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end for LRU (delete and re-add)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.embedding;
  }

  set(key: string, embedding: number[]): void {
    // Evict oldest entries if at capacity
    while (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey === undefined) break;
      this.cache.delete(firstKey);
    }

    this.cache.set(key, {
      embedding,
      timestamp: Date.now(),
    });
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// Shared cache instance across all providers
const embeddingCache = new EmbeddingCache();

/**
 * Abstract base class for embedding providers.
 *
 * The same provider (name, model and dimensions) must be used for ingestion
 * and for queries; scores from mixed models are meaningless.
 */
export abstract class BaseEmbeddingProvider {
  /**
   * Get the provider name (e.g., "OpenAI", "Ollama").
   */
  abstract getName(): string;

  /**
   * Get the model name being used.
   */
  abstract getModel(): string;

  /**
   * Get the embedding vector dimensions.
   */
  abstract getDimensions(): number;

  /**
   * Dimensions to create an index with. Providers that only learn the size
   * from the server override this.
   */
  async resolveDimensions(): Promise<number> {
    return this.getDimensions();
  }

  /**
   * Generate embeddings for multiple texts, in input order.
   */
  abstract embed(texts: string[]): Promise<number[][]>;

  private cacheKey(text: string): string {
    return `${this.getName()}:${this.getModel()}:${hashText(text)}`;
  }

  /**
   * Generate embedding for a single text with caching.
   */
  async embedOne(text: string): Promise<number[]> {
    const cacheKey = this.cacheKey(text);

    const cached = embeddingCache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const [embedding] = await this.embed([text]);
    if (!embedding) {
      throw new Error(`${this.getName()} returned no embedding`);
    }

    embeddingCache.set(cacheKey, embedding);
    return embedding;
  }

  /**
   * Get embedding cache statistics.
   */
  static getCacheStats(): { size: number } {
    return { size: embeddingCache.size };
  }

  /**
   * Clear the embedding cache.
   */
  static clearCache(): void {
    embeddingCache.clear();
  }
}

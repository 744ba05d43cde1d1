// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Vector utilities for embedding-based operations.
 */

import type { DistanceMetric } from '../rag/types.js';

/**
 * Compute the dot product of two vectors of equal length.
 */
export function dotProduct(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

/**
 * Compute cosine similarity between two embedding vectors.
 * Returns value between -1 and 1 (1 = identical, 0 = orthogonal, -1 = opposite).
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

/**
 * Compute the Euclidean distance between two vectors of equal length.
 */
export function euclideanDistance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - b[i];
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Score two vectors under a metric so that higher always means closer.
 * Euclidean distance d maps to 1 / (1 + d).
 */
export function similarity(metric: DistanceMetric, a: number[], b: number[]): number {
  switch (metric) {
    case 'cosine':
      return cosineSimilarity(a, b);
    case 'dotproduct':
      return dotProduct(a, b);
    case 'euclidean':
      return 1 / (1 + euclideanDistance(a, b));
  }
}

export const DISTANCE_METRICS: readonly DistanceMetric[] = ['cosine', 'euclidean', 'dotproduct'];

export function isDistanceMetric(value: unknown): value is DistanceMetric {
  return typeof value === 'string' && (DISTANCE_METRICS as readonly string[]).includes(value);
}

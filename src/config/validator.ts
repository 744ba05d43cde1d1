// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Validator
 *
 * Functions for validating workspace configuration.
 */

import type { WorkspaceConfig } from './types.js';

export const VALID_MODES = ['standard', 'fast'];
export const VALID_EMBEDDING_PROVIDERS = ['openai', 'ollama'];
export const VALID_GENERATION_PROVIDERS = ['openai', 'anthropic', 'ollama', 'mock'];
export const VALID_INDEX_BACKENDS = ['vectra', 'memory'];
export const VALID_METRICS = ['cosine', 'euclidean', 'dotproduct'];

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validate workspace configuration.
 * Returns an array of warning messages for invalid options.
 */
export function validateConfig(config: WorkspaceConfig): string[] {
  const warnings: string[] = [];

  if (config.mode && !VALID_MODES.includes(config.mode)) {
    warnings.push(`Unknown mode "${config.mode}". Valid: ${VALID_MODES.join(', ')}`);
  }

  if (config.indexBackend && !VALID_INDEX_BACKENDS.includes(config.indexBackend)) {
    warnings.push(`Unknown indexBackend "${config.indexBackend}". Valid: ${VALID_INDEX_BACKENDS.join(', ')}`);
  }

  if (config.metric && !VALID_METRICS.includes(config.metric)) {
    warnings.push(`Unknown metric "${config.metric}". Valid: ${VALID_METRICS.join(', ')}`);
  }

  if (config.embedding?.provider && !VALID_EMBEDDING_PROVIDERS.includes(config.embedding.provider)) {
    warnings.push(
      `Unknown embedding provider "${config.embedding.provider}". Valid: ${VALID_EMBEDDING_PROVIDERS.join(', ')}`
    );
  }

  if (config.generation?.provider && !VALID_GENERATION_PROVIDERS.includes(config.generation.provider)) {
    warnings.push(
      `Unknown generation provider "${config.generation.provider}". Valid: ${VALID_GENERATION_PROVIDERS.join(', ')}`
    );
  }

  for (const key of ['chunkSize', 'batchSize', 'retrievalK'] as const) {
    const value = config[key];
    if (value !== undefined && !isPositiveInteger(value)) {
      warnings.push(`${key} must be a positive integer`);
    }
  }

  if (config.chunkOverlap !== undefined) {
    if (!Number.isInteger(config.chunkOverlap) || config.chunkOverlap < 0) {
      warnings.push('chunkOverlap must be a non-negative integer');
    } else if (config.chunkSize !== undefined && config.chunkOverlap >= config.chunkSize) {
      warnings.push('chunkOverlap must be smaller than chunkSize');
    }
  }

  if (config.generation?.maxTokens !== undefined && !isPositiveInteger(config.generation.maxTokens)) {
    warnings.push('generation.maxTokens must be a positive integer');
  }

  return warnings;
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Embedding Provider Factory
 *
 * Creates the embedding provider named in configuration.
 */

import { BaseEmbeddingProvider } from './base.js';
import { OpenAIEmbeddingProvider } from './openai.js';
import { OllamaEmbeddingProvider } from './ollama.js';

export { BaseEmbeddingProvider } from './base.js';
export { OpenAIEmbeddingProvider } from './openai.js';
export { OllamaEmbeddingProvider } from './ollama.js';

export const EMBEDDING_PROVIDERS = ['openai', 'ollama'] as const;

export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export interface EmbeddingSettings {
  provider: EmbeddingProviderName;
  /** Provider default when omitted */
  model?: string;
  apiKey?: string;
  baseUrl?: string;
}

/**
 * Create an embedding provider based on configuration.
 */
export function createEmbeddingProvider(settings: EmbeddingSettings): BaseEmbeddingProvider {
  switch (settings.provider) {
    case 'openai':
      return new OpenAIEmbeddingProvider(settings.model, {
        apiKey: settings.apiKey,
        baseUrl: settings.baseUrl,
      });

    case 'ollama':
      return new OllamaEmbeddingProvider(settings.model, settings.baseUrl);
  }
}

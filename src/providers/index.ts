// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { BaseGenerationProvider, type ProviderConfig } from './base.js';
import { AnthropicProvider } from './anthropic.js';
import { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
import { MockGenerationProvider } from './mock.js';

export { BaseGenerationProvider } from './base.js';
export type { GenerationOptions, GenerationResult, ProviderConfig, TokenUsage } from './base.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAICompatibleProvider, createOllamaProvider } from './openai-compatible.js';
export { MockGenerationProvider } from './mock.js';
export type { MockCall, MockProviderConfig, MockResponse } from './mock.js';

export interface CreateProviderOptions extends ProviderConfig {
  type: string;
}

/** Provider factory function type */
export type ProviderFactory = (options: CreateProviderOptions) => BaseGenerationProvider;

/** Registry of provider factories */
const providerFactories = new Map<string, ProviderFactory>();

// Register built-in providers
providerFactories.set('openai', (options) => new OpenAICompatibleProvider(options));
providerFactories.set('anthropic', (options) => new AnthropicProvider(options));
providerFactories.set('ollama', (options) => createOllamaProvider(options.model, options.baseUrl));
providerFactories.set('mock', () => new MockGenerationProvider());

/**
 * Register a new provider factory.
 */
export function registerProviderFactory(type: string, factory: ProviderFactory): void {
  if (providerFactories.has(type)) {
    throw new Error(`Provider type '${type}' is already registered`);
  }
  providerFactories.set(type, factory);
}

/**
 * Get list of registered provider types.
 */
export function getProviderTypes(): string[] {
  return Array.from(providerFactories.keys());
}

/**
 * Check if a provider type is registered.
 */
export function hasProviderType(type: string): boolean {
  return providerFactories.has(type);
}

/**
 * Factory function to create a generation provider based on type.
 */
export function createGenerationProvider(options: CreateProviderOptions): BaseGenerationProvider {
  const factory = providerFactories.get(options.type);

  if (!factory) {
    const available = getProviderTypes().join(', ');
    throw new Error(`Unknown provider type: ${options.type}. Available: ${available}`);
  }

  return factory(options);
}

// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Connection settings shared by generation providers.
 */
export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  /** Model used when configuration does not name one */
  model?: string;
}

/**
 * Per-request generation parameters. The model comes from the pipeline's mode.
 */
export interface GenerationOptions {
  model: string;
  temperature: number;
  maxTokens: number;
  /** Aborting releases the underlying connection */
  signal?: AbortSignal;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface GenerationResult {
  text: string;
  /** Model that produced the text, as reported by the service */
  model: string;
  usage?: TokenUsage;
}

/**
 * Abstract base class for text generation backends.
 * Implement this interface to add support for new model backends.
 */
export abstract class BaseGenerationProvider {
  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = config;
  }

  /**
   * Generate a complete answer for a prompt.
   */
  abstract generate(prompt: string, options: GenerationOptions): Promise<GenerationResult>;

  /**
   * Generate an answer as text fragments, in generation order.
   * Closing the generator early releases the connection.
   */
  abstract generateStream(prompt: string, options: GenerationOptions): AsyncGenerator<string, void, undefined>;

  /**
   * Get the name of this provider for display purposes.
   */
  abstract getName(): string;

  /**
   * Model to use instead of the mode's model, when the provider cannot serve
   * the mode defaults (undefined means the mode decides).
   */
  getDefaultModel(): string | undefined {
    return this.config.model;
  }
}

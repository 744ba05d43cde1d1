// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Mock Provider for Testing
 *
 * A configurable mock provider that simulates model responses
 * for deterministic testing without real API calls.
 */

import { BaseGenerationProvider, type GenerationOptions, type GenerationResult, type TokenUsage } from './base.js';

/**
 * A single mock response configuration.
 */
export interface MockResponse {
  /** Text content to return */
  content?: string;
  /** Simulate an error */
  error?: Error;
  /**
   * When streaming, deliver this many fragments before throwing `error`.
   * Without it the error is thrown before the first fragment.
   */
  failAfterFragments?: number;
  /** Optional token usage to report */
  usage?: TokenUsage;
}

/**
 * Configuration for MockGenerationProvider.
 */
export interface MockProviderConfig {
  /** Queue of responses to return in order */
  responses?: MockResponse[];
  /** Default response when queue is empty */
  defaultResponse?: string;
  /** Delay between streaming chunks in ms (default: 0) */
  streamDelay?: number;
  /** Chunk size for streaming (default: 10 characters) */
  streamChunkSize?: number;
  /** Model name to report instead of the requested one */
  model?: string;
}

/**
 * Record of a single call to the provider.
 */
export interface MockCall {
  /** Method that was called */
  method: 'generate' | 'generateStream';
  prompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  /** Timestamp of the call */
  timestamp: Date;
}

/**
 * Mock provider for testing.
 * Simulates generation responses with configurable behavior.
 */
export class MockGenerationProvider extends BaseGenerationProvider {
  private responseQueue: MockResponse[];
  private defaultResponse: string;
  private streamDelay: number;
  private streamChunkSize: number;
  private modelName?: string;
  private callHistory: MockCall[] = [];
  private openStreams = 0;
  private closedStreams = 0;

  constructor(config: MockProviderConfig = {}) {
    super({});
    this.responseQueue = [...(config.responses || [])];
    this.defaultResponse = config.defaultResponse || 'Mock response';
    this.streamDelay = config.streamDelay || 0;
    this.streamChunkSize = config.streamChunkSize || 10;
    this.modelName = config.model;
  }

  /**
   * Add responses to the queue.
   */
  addResponses(responses: MockResponse[]): void {
    this.responseQueue.push(...responses);
  }

  /**
   * Set the default response when queue is empty.
   */
  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  /**
   * Get the call history.
   */
  getCallHistory(): MockCall[] {
    return [...this.callHistory];
  }

  /**
   * Get the most recent call.
   */
  getLastCall(): MockCall | undefined {
    return this.callHistory[this.callHistory.length - 1];
  }

  /**
   * Get call count.
   */
  getCallCount(): number {
    return this.callHistory.length;
  }

  /**
   * Streams started and not yet released.
   */
  getOpenStreamCount(): number {
    return this.openStreams;
  }

  /**
   * Streams released, whether exhausted, failed or closed early.
   */
  getClosedStreamCount(): number {
    return this.closedStreams;
  }

  /**
   * Reset the provider state.
   */
  reset(): void {
    this.callHistory = [];
    this.responseQueue = [];
    this.openStreams = 0;
    this.closedStreams = 0;
  }

  /**
   * Get the next response from the queue or default.
   */
  private getNextResponse(): MockResponse {
    return this.responseQueue.shift() ?? { content: this.defaultResponse };
  }

  private recordCall(method: MockCall['method'], prompt: string, options: GenerationOptions): void {
    this.callHistory.push({
      method,
      prompt,
      model: options.model,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timestamp: new Date(),
    });
  }

  async generate(prompt: string, options: GenerationOptions): Promise<GenerationResult> {
    this.recordCall('generate', prompt, options);
    options.signal?.throwIfAborted();

    const response = this.getNextResponse();
    if (response.error) {
      throw response.error;
    }

    return {
      text: response.content || '',
      model: this.modelName || options.model,
      usage: response.usage || { inputTokens: 100, outputTokens: 50 },
    };
  }

  async *generateStream(prompt: string, options: GenerationOptions): AsyncGenerator<string, void, undefined> {
    this.recordCall('generateStream', prompt, options);
    const response = this.getNextResponse();

    const { content = '', error } = response;
    const fragments: string[] = [];
    for (let i = 0; i < content.length; i += this.streamChunkSize) {
      fragments.push(content.slice(i, i + this.streamChunkSize));
    }
    const failAt = Math.min(response.failAfterFragments ?? 0, fragments.length);

    this.openStreams++;
    try {
      for (let n = 0; n < fragments.length; n++) {
        if (error && n === failAt) {
          throw error;
        }
        options.signal?.throwIfAborted();
        yield fragments[n];
        if (this.streamDelay > 0) {
          await new Promise(resolve => setTimeout(resolve, this.streamDelay));
        }
      }
      if (error) {
        throw error;
      }
    } finally {
      this.openStreams--;
      this.closedStreams++;
    }
  }

  getName(): string {
    return 'Mock';
  }
}

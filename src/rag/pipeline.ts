// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Answer Pipeline
 *
 * Retrieves context for a question, renders the mode's prompt and asks the
 * generation provider for an answer, either complete or as a stream.
 *
 * The pipeline's behavior is fixed by the values it was built with. One
 * retrieval per question; generation only runs when retrieval succeeded.
 */

import { ConfigurationError, GenerationError, RagError, RetrievalError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { BaseGenerationProvider, GenerationOptions } from '../providers/base.js';
import { renderTemplate, type Mode } from './modes.js';
import type { Retriever } from './retriever.js';
import type { QueryResult, RetrievedDocument } from './types.js';

export interface AnswerPipelineOptions {
  retriever: Retriever;
  generator: BaseGenerationProvider;
  mode: Mode;
}

export interface QueryOptions {
  /** Aborting cancels generation and releases its connection */
  signal?: AbortSignal;
}

export interface StreamQueryOptions extends QueryOptions {
  /** Called with the retrieved documents before the first fragment */
  onRetrieved?: (documents: RetrievedDocument[]) => void;
}

export class AnswerPipeline {
  private readonly retriever: Retriever;
  private readonly generator: BaseGenerationProvider;
  readonly mode: Mode;

  constructor(options: AnswerPipelineOptions) {
    this.retriever = options.retriever;
    this.generator = options.generator;
    this.mode = Object.isFrozen(options.mode) ? options.mode : Object.freeze({ ...options.mode });
  }

  /**
   * Render documents as numbered blocks, in retrieval order.
   */
  formatContext(documents: RetrievedDocument[]): string {
    return documents
      .map(({ chunk }, i) => {
        const source = chunk.metadata.source || 'Unknown';
        return `Document ${i + 1} (Source: ${source}):\n${chunk.content.trim()}`;
      })
      .join('\n\n');
  }

  /**
   * Substitute context and question into the mode's template.
   */
  buildPrompt(question: string, context: string): string {
    return renderTemplate(this.mode.template, { context, question });
  }

  /**
   * Answer a question in one piece, with wall-clock latency.
   */
  async query(question: string, options: QueryOptions = {}): Promise<QueryResult> {
    const startTime = Date.now();
    const documents = await this.retrieve(question);
    const prompt = this.prepare(question, documents, false);

    let answer: string;
    try {
      const result = await this.generator.generate(prompt, this.generationOptions(options.signal));
      answer = result.text;
    } catch (error) {
      throw new GenerationError(
        `${this.generator.getName()} generation failed: ${errorMessage(error)}`,
        0,
        { cause: error, retryable: !options.signal?.aborted }
      );
    }

    const latencySeconds = (Date.now() - startTime) / 1000;
    logger.stage('Answer generated', Date.now() - startTime, `${this.mode.name} mode, ${documents.length} documents`);
    logger.answerFull(answer, latencySeconds);

    return { answer, latencySeconds, documents };
  }

  /**
   * Answer a question as fragments, in generation order.
   *
   * Not restartable. Breaking out of the loop, calling return() or aborting
   * the signal releases the generation connection. A failure mid-stream is
   * thrown as GenerationError after the fragments already yielded.
   */
  async *streamQuery(question: string, options: StreamQueryOptions = {}): AsyncGenerator<string, void, undefined> {
    const documents = await this.retrieve(question);
    options.onRetrieved?.(documents);
    const prompt = this.prepare(question, documents, true);

    let delivered = 0;
    try {
      for await (const fragment of this.generator.generateStream(prompt, this.generationOptions(options.signal))) {
        delivered++;
        yield fragment;
      }
    } catch (error) {
      throw new GenerationError(
        `${this.generator.getName()} stream failed after ${delivered} fragments: ${errorMessage(error)}`,
        delivered,
        { cause: error, retryable: !options.signal?.aborted }
      );
    }
  }

  private async retrieve(question: string): Promise<RetrievedDocument[]> {
    if (question.trim() === '') {
      throw new ConfigurationError('Question must not be empty');
    }

    try {
      return await this.retriever.search(question, this.mode.retrievalK);
    } catch (error) {
      if (error instanceof RagError) throw error;
      throw new RetrievalError(`Retrieval failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  private prepare(question: string, documents: RetrievedDocument[], streaming: boolean): string {
    const prompt = this.buildPrompt(question, this.formatContext(documents));
    logger.generationRequest(this.generator.getName(), this.mode.model, prompt.length, streaming);
    logger.promptFull(this.mode.model, prompt);
    return prompt;
  }

  private generationOptions(signal?: AbortSignal): GenerationOptions {
    return {
      model: this.mode.model,
      temperature: this.mode.temperature,
      maxTokens: this.mode.maxTokens,
      ...(signal && { signal }),
    };
  }
}

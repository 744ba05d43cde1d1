/**
 * Execution modes.
 *
 * A mode bundles the generation model, retrieval breadth and prompt template.
 * It is chosen once when a pipeline is built and never changes afterwards.
 */

import { ConfigurationError } from '../errors.js';

export type ModeName = 'standard' | 'fast';

export const MODE_NAMES: readonly ModeName[] = ['standard', 'fast'];

/**
 * An immutable configuration bundle selecting quality against latency.
 */
export interface Mode {
  readonly name: ModeName;
  /** Generation model identifier */
  readonly model: string;
  /** Documents retrieved per question */
  readonly retrievalK: number;
  /** Prompt with {context} and {question} placeholders */
  readonly template: string;
  readonly temperature: number;
  readonly maxTokens: number;
}

/**
 * Optional per-mode overrides from configuration.
 */
export interface ModeOverrides {
  model?: string;
  retrievalK?: number;
  temperature?: number;
  maxTokens?: number;
}

export const CHAIN_OF_THOUGHT_TEMPLATE = `You are a technical expert assistant. Answer the question using the provided context documents.

Use chain-of-thought reasoning:
1. First, identify the key technical concepts in the question
2. Then, analyze the relevant information from the context
3. Finally, provide a clear, accurate answer

Context Documents:
{context}

Question: {question}

Technical Analysis:
Let me break this down step by step:

1. Key Concepts: [Identify the main technical concepts in the question]

2. Relevant Information: [Extract and analyze relevant details from the context]

3. Answer: [Provide a clear, comprehensive answer]

Please provide your response following this chain-of-thought structure.`;

export const FAST_TEMPLATE = `Answer this technical question using the context.

Context: {context}

Question: {question}

Answer:`;

const MODE_DEFAULTS: Record<ModeName, Mode> = {
  standard: {
    name: 'standard',
    model: 'gpt-4-turbo-preview',
    retrievalK: 4,
    template: CHAIN_OF_THOUGHT_TEMPLATE,
    temperature: 0,
    maxTokens: 1000,
  },
  fast: {
    name: 'fast',
    model: 'gpt-3.5-turbo',
    retrievalK: 3,
    template: FAST_TEMPLATE,
    temperature: 0,
    maxTokens: 1000,
  },
};

export function isModeName(value: string): value is ModeName {
  return (MODE_NAMES as readonly string[]).includes(value);
}

/**
 * Build the frozen mode for a name, applying configured overrides.
 * The template always belongs to the named mode.
 */
export function resolveMode(name: string, overrides: ModeOverrides = {}): Mode {
  if (!isModeName(name)) {
    throw new ConfigurationError(`Unknown mode "${name}". Valid: ${MODE_NAMES.join(', ')}`);
  }

  const base = MODE_DEFAULTS[name];
  const mode: Mode = {
    ...base,
    model: overrides.model ?? base.model,
    retrievalK: overrides.retrievalK ?? base.retrievalK,
    temperature: overrides.temperature ?? base.temperature,
    maxTokens: overrides.maxTokens ?? base.maxTokens,
  };

  if (mode.model.trim() === '') {
    throw new ConfigurationError(`Mode "${name}" needs a model`);
  }
  if (!Number.isInteger(mode.retrievalK) || mode.retrievalK <= 0) {
    throw new ConfigurationError(`retrievalK must be a positive integer, got ${mode.retrievalK}`);
  }
  if (!Number.isFinite(mode.temperature) || mode.temperature < 0 || mode.temperature > 2) {
    throw new ConfigurationError(`temperature must be between 0 and 2, got ${mode.temperature}`);
  }
  if (!Number.isInteger(mode.maxTokens) || mode.maxTokens <= 0) {
    throw new ConfigurationError(`maxTokens must be a positive integer, got ${mode.maxTokens}`);
  }

  return Object.freeze(mode);
}

/**
 * Substitute {context} and {question} in one pass, so text inserted for one
 * placeholder is never scanned for the other.
 */
export function renderTemplate(template: string, values: { context: string; question: string }): string {
  return template.replace(/\{(context|question)\}/g, (_match, key: 'context' | 'question') => values[key]);
}

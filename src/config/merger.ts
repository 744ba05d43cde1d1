// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration from multiple sources.
 * Priority: CLI options > environment > workspace config > defaults
 */

import { ConfigurationError } from '../errors.js';
import { DEFAULT_INDEX_DIR } from '../rag/index-service/vectra.js';
import type { WorkspaceConfig, ResolvedConfig } from './types.js';

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
  mode: 'fast',
  indexName: 'document-intelligence',
  indexBackend: 'vectra',
  indexDir: DEFAULT_INDEX_DIR,
  metric: 'cosine',
  placement: { cloud: 'aws', region: 'us-east-1' },
  glob: '**/*.pdf',
  chunkSize: 1000,
  chunkOverlap: 200,
  batchSize: 100,
  embeddingProvider: 'openai',
  generationProvider: 'openai',
};

/**
 * CLI options that can override configuration.
 */
export interface CLIOptions {
  mode?: string;
  indexName?: string;
  indexDir?: string;
  backend?: string;
  provider?: string;
  model?: string;
  embeddingProvider?: string;
  embeddingModel?: string;
  k?: number;
  chunkSize?: number;
  chunkOverlap?: number;
  batchSize?: number;
}

/**
 * Read an integer environment variable.
 */
function envInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Apply a workspace config layer to the resolved config.
 */
function applyWorkspaceConfig(config: ResolvedConfig, source: WorkspaceConfig): void {
  if (source.mode) config.mode = source.mode;
  if (source.indexName) config.indexName = source.indexName;
  if (source.indexBackend) config.indexBackend = source.indexBackend;
  if (source.indexDir) config.indexDir = source.indexDir;
  if (source.metric) config.metric = source.metric;
  if (source.placement) config.placement = { ...source.placement };
  if (source.glob) config.glob = source.glob;
  if (source.chunkSize !== undefined) config.chunkSize = source.chunkSize;
  if (source.chunkOverlap !== undefined) config.chunkOverlap = source.chunkOverlap;
  if (source.batchSize !== undefined) config.batchSize = source.batchSize;
  if (source.retrievalK !== undefined) config.retrievalK = source.retrievalK;
  if (source.embedding?.provider) config.embeddingProvider = source.embedding.provider;
  if (source.embedding?.model) config.embeddingModel = source.embedding.model;
  if (source.embedding?.baseUrl) config.embeddingBaseUrl = source.embedding.baseUrl;
  if (source.generation?.provider) config.generationProvider = source.generation.provider;
  if (source.generation?.model) config.generationModel = source.generation.model;
  if (source.generation?.baseUrl) config.generationBaseUrl = source.generation.baseUrl;
  if (source.generation?.temperature !== undefined) config.temperature = source.generation.temperature;
  if (source.generation?.maxTokens !== undefined) config.maxTokens = source.generation.maxTokens;
}

/**
 * Apply environment variables (DOCQA_*, provider API keys).
 */
function applyEnvironment(config: ResolvedConfig, env: NodeJS.ProcessEnv): void {
  if (env.DOCQA_MODE) config.mode = env.DOCQA_MODE;
  if (env.DOCQA_INDEX_NAME) config.indexName = env.DOCQA_INDEX_NAME;
  if (env.DOCQA_INDEX_DIR) config.indexDir = env.DOCQA_INDEX_DIR;
  if (env.DOCQA_EMBEDDING_MODEL) config.embeddingModel = env.DOCQA_EMBEDDING_MODEL;
  if (env.DOCQA_LLM_MODEL) config.generationModel = env.DOCQA_LLM_MODEL;

  const chunkSize = envInteger(env, 'DOCQA_CHUNK_SIZE');
  if (chunkSize !== undefined) config.chunkSize = chunkSize;
  const chunkOverlap = envInteger(env, 'DOCQA_CHUNK_OVERLAP');
  if (chunkOverlap !== undefined) config.chunkOverlap = chunkOverlap;

  if (env.OPENAI_API_KEY) config.openaiApiKey = env.OPENAI_API_KEY;
  if (env.ANTHROPIC_API_KEY) config.anthropicApiKey = env.ANTHROPIC_API_KEY;
}

/**
 * Merge workspace config with environment and CLI options.
 * The result is a plain value; nothing here is kept between calls.
 */
export function mergeConfig(
  workspaceConfig: WorkspaceConfig | null,
  cliOptions: CLIOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig {
  const config: ResolvedConfig = { ...DEFAULT_CONFIG, placement: { ...DEFAULT_CONFIG.placement } };

  if (workspaceConfig) {
    applyWorkspaceConfig(config, workspaceConfig);
  }

  applyEnvironment(config, env);

  // CLI options override everything else
  if (cliOptions.mode) config.mode = cliOptions.mode;
  if (cliOptions.indexName) config.indexName = cliOptions.indexName;
  if (cliOptions.indexDir) config.indexDir = cliOptions.indexDir;
  if (cliOptions.backend) config.indexBackend = cliOptions.backend;
  if (cliOptions.provider) config.generationProvider = cliOptions.provider;
  if (cliOptions.model) config.generationModel = cliOptions.model;
  if (cliOptions.embeddingProvider) config.embeddingProvider = cliOptions.embeddingProvider;
  if (cliOptions.embeddingModel) config.embeddingModel = cliOptions.embeddingModel;
  if (cliOptions.k !== undefined) config.retrievalK = cliOptions.k;
  if (cliOptions.chunkSize !== undefined) config.chunkSize = cliOptions.chunkSize;
  if (cliOptions.chunkOverlap !== undefined) config.chunkOverlap = cliOptions.chunkOverlap;
  if (cliOptions.batchSize !== undefined) config.batchSize = cliOptions.batchSize;

  return config;
}

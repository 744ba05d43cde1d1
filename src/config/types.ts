// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 *
 * Shape of the workspace config file and of the resolved configuration
 * passed into construction.
 */

/**
 * Workspace configuration file shape (.docqa.json). Every field is optional.
 */
export interface WorkspaceConfig {
  /** Execution mode: "standard" or "fast" */
  mode?: string;

  /** Name of the vector index */
  indexName?: string;

  /** Index backend: "vectra" (persistent, default) or "memory" */
  indexBackend?: string;

  /** Directory holding vectra indexes */
  indexDir?: string;

  /** Distance metric for new indexes */
  metric?: string;

  /** Placement recorded with new indexes */
  placement?: {
    cloud: string;
    region: string;
  };

  /** Glob used by `docqa index` */
  glob?: string;

  /** Chunking */
  chunkSize?: number;
  chunkOverlap?: number;

  /** Chunks per embed/upsert batch */
  batchSize?: number;

  /** Documents retrieved per question (overrides the mode) */
  retrievalK?: number;

  /** Embedding settings */
  embedding?: {
    /** "openai" or "ollama" */
    provider?: string;
    model?: string;
    baseUrl?: string;
  };

  /** Generation settings */
  generation?: {
    /** "openai", "anthropic", "ollama" or "mock" */
    provider?: string;
    /** Overrides the mode's model */
    model?: string;
    baseUrl?: string;
    temperature?: number;
    maxTokens?: number;
  };
}

/**
 * Resolved configuration after merging defaults, the workspace file,
 * environment and CLI options.
 */
export interface ResolvedConfig {
  mode: string;
  indexName: string;
  indexBackend: string;
  indexDir: string;
  metric: string;
  placement: {
    cloud: string;
    region: string;
  };
  glob: string;
  chunkSize: number;
  chunkOverlap: number;
  batchSize: number;
  retrievalK?: number;
  embeddingProvider: string;
  embeddingModel?: string;
  embeddingBaseUrl?: string;
  generationProvider: string;
  generationModel?: string;
  generationBaseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

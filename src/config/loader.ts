// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Functions for loading and writing workspace configuration files.
 */

import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../logger.js';
import type { WorkspaceConfig } from './types.js';

/**
 * Configuration file names (checked in order).
 */
export const CONFIG_FILES = ['.docqa.json', '.docqa/config.json', 'docqa.config.json'];

/**
 * Check that a parsed file is a JSON object.
 */
function isWorkspaceConfig(value: unknown): value is WorkspaceConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load a configuration file by path.
 */
export function loadConfigFile(configPath: string): WorkspaceConfig | null {
  try {
    const content = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (!isWorkspaceConfig(parsed)) {
      logger.warn(`Ignoring ${configPath}: expected a JSON object`);
      return null;
    }
    return parsed;
  } catch (error) {
    logger.warn(`Failed to parse ${configPath}: ${error instanceof Error ? error.message : error}`);
    return null;
  }
}

/**
 * Find and load workspace configuration from the current directory.
 * Searches for .docqa.json, .docqa/config.json, or docqa.config.json
 */
export function loadWorkspaceConfig(cwd: string = process.cwd()): {
  config: WorkspaceConfig | null;
  configPath: string | null;
} {
  for (const fileName of CONFIG_FILES) {
    const configPath = path.join(cwd, fileName);
    if (fs.existsSync(configPath)) {
      return { config: loadConfigFile(configPath), configPath };
    }
  }
  return { config: null, configPath: null };
}

/**
 * Create an example configuration file content.
 */
export function getExampleConfig(): string {
  const example: WorkspaceConfig = {
    mode: 'fast',
    indexName: 'document-intelligence',
    indexBackend: 'vectra',
    metric: 'cosine',
    glob: '**/*.pdf',
    chunkSize: 1000,
    chunkOverlap: 200,
    batchSize: 100,
    embedding: {
      provider: 'openai',
      model: 'text-embedding-3-small',
    },
    generation: {
      provider: 'openai',
    },
  };

  return JSON.stringify(example, null, 2) + '\n';
}

/**
 * Initialize a new .docqa.json file in the current directory.
 */
export function initConfig(cwd: string = process.cwd()): {
  success: boolean;
  path: string;
  error?: string;
} {
  const configPath = path.join(cwd, CONFIG_FILES[0]);

  if (fs.existsSync(configPath)) {
    return {
      success: false,
      path: configPath,
      error: 'Config file already exists',
    };
  }

  try {
    fs.writeFileSync(configPath, getExampleConfig());
    return { success: true, path: configPath };
  } catch (error) {
    return {
      success: false,
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

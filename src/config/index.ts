// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * - types.ts     - Type definitions (WorkspaceConfig, ResolvedConfig)
 * - loader.ts    - File I/O (load/init config files)
 * - validator.ts - Config validation
 * - merger.ts    - Config merging with priority handling
 */

export type { WorkspaceConfig, ResolvedConfig } from './types.js';

export { CONFIG_FILES, loadConfigFile, loadWorkspaceConfig, getExampleConfig, initConfig } from './loader.js';

export {
  validateConfig,
  VALID_MODES,
  VALID_EMBEDDING_PROVIDERS,
  VALID_GENERATION_PROVIDERS,
  VALID_INDEX_BACKENDS,
  VALID_METRICS,
} from './validator.js';

export { DEFAULT_CONFIG, mergeConfig } from './merger.js';
export type { CLIOptions } from './merger.js';

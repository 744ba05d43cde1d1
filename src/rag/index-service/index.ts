/**
 * Vector index service factory.
 */

import { ConfigurationError } from '../../errors.js';
import { MemoryIndexService } from './memory.js';
import { VectraIndexService } from './vectra.js';
import type { VectorIndexService } from './types.js';

export type {
  CreateIndexRequest,
  IndexDescription,
  IndexPlacement,
  IndexRecord,
  ScoredRecord,
  VectorIndexService,
} from './types.js';
export { MemoryIndexService } from './memory.js';
export { VectraIndexService, DEFAULT_INDEX_DIR } from './vectra.js';

export interface IndexServiceOptions {
  backend: string;
  /** Base directory for persistent backends */
  indexDir?: string;
}

export function createIndexService(options: IndexServiceOptions): VectorIndexService {
  switch (options.backend) {
    case 'vectra':
      return new VectraIndexService(options.indexDir);
    case 'memory':
      return new MemoryIndexService();
    default:
      throw new ConfigurationError(`Unknown index backend "${options.backend}". Valid: vectra, memory`);
  }
}

/**
 * In-process vector index.
 *
 * Keeps records in insertion order and scores every record on search.
 * Suited to small corpora, one-off sessions and tests.
 */

import { similarity } from '../../utils/vector.js';
import { matchesFilter } from '../filter.js';
import type { MetadataFilter } from '../types.js';
import type {
  CreateIndexRequest,
  IndexDescription,
  IndexRecord,
  ScoredRecord,
  VectorIndexService,
} from './types.js';

interface MemoryIndex {
  description: IndexDescription;
  records: Map<string, IndexRecord>;
}

export class MemoryIndexService implements VectorIndexService {
  readonly name = 'memory';
  private indexes = new Map<string, MemoryIndex>();

  async listIndexes(): Promise<string[]> {
    return Array.from(this.indexes.keys());
  }

  async createIndex(request: CreateIndexRequest): Promise<void> {
    if (this.indexes.has(request.name)) {
      throw new Error(`Index "${request.name}" already exists`);
    }
    if (!Number.isInteger(request.dimension) || request.dimension <= 0) {
      throw new Error(`Invalid dimension ${request.dimension}`);
    }

    this.indexes.set(request.name, {
      description: { ...request, ready: true },
      records: new Map(),
    });
  }

  async describeIndex(name: string): Promise<IndexDescription> {
    return { ...this.getIndex(name).description };
  }

  async upsert(indexName: string, records: IndexRecord[]): Promise<void> {
    const index = this.getIndex(indexName);
    const { dimension } = index.description;

    const wrong = records.find((record) => record.vector.length !== dimension);
    if (wrong) {
      throw new Error(
        `Vector for "${wrong.id}" has dimension ${wrong.vector.length}, index expects ${dimension}`
      );
    }

    for (const record of records) {
      // Re-inserting moves the record to the end, like a fresh write
      index.records.delete(record.id);
      index.records.set(record.id, { ...record, vector: [...record.vector] });
    }
  }

  async search(
    indexName: string,
    vector: number[],
    k: number,
    filter?: MetadataFilter
  ): Promise<ScoredRecord[]> {
    const index = this.getIndex(indexName);
    const { metric, dimension } = index.description;

    if (vector.length !== dimension) {
      throw new Error(`Query vector has dimension ${vector.length}, index expects ${dimension}`);
    }

    const scored: ScoredRecord[] = [];
    for (const record of index.records.values()) {
      if (filter && !matchesFilter(record.payload.metadata, filter)) continue;
      scored.push({
        id: record.id,
        score: similarity(metric, vector, record.vector),
        payload: record.payload,
      });
    }

    // Array.prototype.sort is stable, so insertion order breaks ties
    return scored.sort((a, b) => b.score - a.score).slice(0, k);
  }

  async deleteIndex(name: string): Promise<void> {
    this.getIndex(name);
    this.indexes.delete(name);
  }

  private getIndex(name: string): MemoryIndex {
    const index = this.indexes.get(name);
    if (!index) {
      throw new Error(`Index "${name}" not found`);
    }
    return index;
  }
}

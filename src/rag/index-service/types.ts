/**
 * Vector index service capability.
 *
 * The index manager and retriever only talk to this interface, so any
 * storage backend that implements it can be swapped in.
 */

import type { Chunk, DistanceMetric, MetadataFilter } from '../types.js';

/**
 * Where a hosted index lives. Local backends record it but do not act on it.
 */
export interface IndexPlacement {
  cloud: string;
  region: string;
}

export interface CreateIndexRequest {
  name: string;
  dimension: number;
  metric: DistanceMetric;
  placement?: IndexPlacement;
}

export interface IndexDescription {
  name: string;
  dimension: number;
  metric: DistanceMetric;
  placement?: IndexPlacement;
  ready: boolean;
}

/**
 * A stored vector with its chunk.
 */
export interface IndexRecord {
  id: string;
  vector: number[];
  payload: Chunk;
}

/**
 * A record returned by similarity search, with its score.
 */
export interface ScoredRecord {
  id: string;
  score: number;
  payload: Chunk;
}

export interface VectorIndexService {
  /** Provider name for display */
  readonly name: string;
  listIndexes(): Promise<string[]>;
  createIndex(request: CreateIndexRequest): Promise<void>;
  /** Throws when the index does not exist */
  describeIndex(name: string): Promise<IndexDescription>;
  upsert(indexName: string, records: IndexRecord[]): Promise<void>;
  /** Results ordered by descending score */
  search(indexName: string, vector: number[], k: number, filter?: MetadataFilter): Promise<ScoredRecord[]>;
  deleteIndex(name: string): Promise<void>;
}

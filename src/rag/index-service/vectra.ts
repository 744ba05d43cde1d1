// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Vectra Index Service
 *
 * Persistent local indexes: one vectra LocalIndex folder per index name,
 * each with a manifest recording dimension, metric and placement.
 */

import { LocalIndex, type MetadataFilter as VectraFilter } from 'vectra';
import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs/promises';
import { isDistanceMetric } from '../../utils/vector.js';
import type { ChunkMetadata, MetadataFilter } from '../types.js';
import type {
  CreateIndexRequest,
  IndexDescription,
  IndexPlacement,
  IndexRecord,
  ScoredRecord,
  VectorIndexService,
} from './types.js';

/** Directory where indexes are stored by default */
export const DEFAULT_INDEX_DIR = path.join(os.homedir(), '.docqa', 'indexes');

const MANIFEST_FILE = 'docqa-manifest.json';

/**
 * Metadata stored with each vector: the chunk metadata plus the chunk itself.
 */
interface StoredMetadata extends ChunkMetadata {
  _chunkId: string;
  _content: string;
}

type Manifest = Omit<IndexDescription, 'ready'>;

function isPlacement(value: unknown): value is IndexPlacement {
  return typeof value === 'object' && value !== null &&
    'cloud' in value && typeof value.cloud === 'string' &&
    'region' in value && typeof value.region === 'string';
}

/**
 * Validate a manifest read from disk.
 */
function parseManifest(raw: unknown, file: string): Manifest {
  if (typeof raw !== 'object' || raw === null) {
    throw new Error(`Corrupt index manifest: ${file}`);
  }
  const name = 'name' in raw ? raw.name : undefined;
  const dimension = 'dimension' in raw ? raw.dimension : undefined;
  const metric = 'metric' in raw ? raw.metric : undefined;
  const placement = 'placement' in raw ? raw.placement : undefined;

  if (typeof name !== 'string' || typeof dimension !== 'number' || !isDistanceMetric(metric)) {
    throw new Error(`Corrupt index manifest: ${file}`);
  }
  return {
    name,
    dimension,
    metric,
    ...(isPlacement(placement) && { placement }),
  };
}

/**
 * Vector index service backed by vectra.
 */
export class VectraIndexService implements VectorIndexService {
  readonly name = 'vectra';
  private baseDir: string;
  private open = new Map<string, LocalIndex<StoredMetadata>>();

  constructor(baseDir: string = DEFAULT_INDEX_DIR) {
    this.baseDir = baseDir;
  }

  async listIndexes(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const names: string[] = [];
    for (const entry of entries.sort()) {
      if (await this.exists(path.join(this.baseDir, entry, MANIFEST_FILE))) {
        names.push(entry);
      }
    }
    return names;
  }

  async createIndex(request: CreateIndexRequest): Promise<void> {
    const { name, dimension, metric, placement } = request;

    if (!/^[a-z0-9][a-z0-9-]*$/.test(name)) {
      throw new Error(`Invalid index name "${name}": use lowercase letters, digits and hyphens`);
    }
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new Error(`Invalid dimension ${dimension}`);
    }
    if (metric !== 'cosine') {
      throw new Error(`Metric "${metric}" is not supported by vectra (cosine only)`);
    }

    const folder = this.folderFor(name);
    if (await this.exists(path.join(folder, MANIFEST_FILE))) {
      throw new Error(`Index "${name}" already exists`);
    }

    await fs.mkdir(folder, { recursive: true });
    const index = new LocalIndex<StoredMetadata>(folder);
    await index.createIndex({ version: 1, deleteIfExists: true });

    const manifest: Manifest = { name, dimension, metric, ...(placement && { placement }) };
    await fs.writeFile(path.join(folder, MANIFEST_FILE), JSON.stringify(manifest, null, 2) + '\n');
    this.open.set(name, index);
  }

  async describeIndex(name: string): Promise<IndexDescription> {
    const manifest = await this.readManifest(name);
    const ready = await this.getIndex(name).isIndexCreated();
    return { ...manifest, ready };
  }

  async upsert(indexName: string, records: IndexRecord[]): Promise<void> {
    const { dimension } = await this.readManifest(indexName);
    const wrong = records.find((record) => record.vector.length !== dimension);
    if (wrong) {
      throw new Error(
        `Vector for "${wrong.id}" has dimension ${wrong.vector.length}, index expects ${dimension}`
      );
    }

    const index = this.getIndex(indexName);
    await index.beginUpdate();
    try {
      for (const record of records) {
        await index.upsertItem({
          id: record.id,
          vector: record.vector,
          metadata: {
            ...record.payload.metadata,
            _chunkId: record.payload.id,
            _content: record.payload.content,
          },
        });
      }
      await index.endUpdate();
    } catch (error) {
      index.cancelUpdate();
      throw error;
    }
  }

  async search(
    indexName: string,
    vector: number[],
    k: number,
    filter?: MetadataFilter
  ): Promise<ScoredRecord[]> {
    const { dimension } = await this.readManifest(indexName);
    if (vector.length !== dimension) {
      throw new Error(`Query vector has dimension ${vector.length}, index expects ${dimension}`);
    }

    const results = await this.getIndex(indexName).queryItems(vector, k, this.toVectraFilter(filter));

    return results.map(({ item, score }) => {
      const { _chunkId, _content, ...metadata } = item.metadata;
      return {
        id: item.id,
        score,
        payload: { id: _chunkId, content: _content, metadata },
      };
    });
  }

  async deleteIndex(name: string): Promise<void> {
    await this.readManifest(name);
    await this.getIndex(name).deleteIndex();
    await fs.rm(this.folderFor(name), { recursive: true, force: true });
    this.open.delete(name);
  }

  /**
   * Get the folder of an index.
   */
  getPath(name: string): string {
    return this.folderFor(name);
  }

  private folderFor(name: string): string {
    return path.join(this.baseDir, name);
  }

  private getIndex(name: string): LocalIndex<StoredMetadata> {
    let index = this.open.get(name);
    if (!index) {
      index = new LocalIndex<StoredMetadata>(this.folderFor(name));
      this.open.set(name, index);
    }
    return index;
  }

  private async readManifest(name: string): Promise<Manifest> {
    const file = path.join(this.folderFor(name), MANIFEST_FILE);
    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch {
      throw new Error(`Index "${name}" not found`);
    }
    return parseManifest(JSON.parse(content), file);
  }

  private toVectraFilter(filter?: MetadataFilter): VectraFilter | undefined {
    if (!filter) return undefined;
    const where: VectraFilter = {};
    for (const [field, condition] of Object.entries(filter)) {
      where[field] = condition;
    }
    return where;
  }

  private async exists(file: string): Promise<boolean> {
    try {
      await fs.access(file);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Metadata filter evaluation for backends without native filtering.
 */

import type { ChunkMetadata, FieldCondition, MetadataFilter, MetadataValue } from './types.js';

function isCondition(value: MetadataValue | FieldCondition): value is FieldCondition {
  return typeof value === 'object' && value !== null;
}

function matchesCondition(actual: MetadataValue | undefined, condition: FieldCondition): boolean {
  if (condition.$eq !== undefined && actual !== condition.$eq) return false;
  if (condition.$ne !== undefined && actual === condition.$ne) return false;
  if (condition.$in !== undefined) {
    if (typeof actual !== 'string' && typeof actual !== 'number') return false;
    if (!condition.$in.includes(actual)) return false;
  }
  if (condition.$nin !== undefined) {
    if ((typeof actual === 'string' || typeof actual === 'number') && condition.$nin.includes(actual)) {
      return false;
    }
  }

  const bounds: Array<[number | undefined, (a: number, b: number) => boolean]> = [
    [condition.$gt, (a, b) => a > b],
    [condition.$gte, (a, b) => a >= b],
    [condition.$lt, (a, b) => a < b],
    [condition.$lte, (a, b) => a <= b],
  ];
  for (const [bound, compare] of bounds) {
    if (bound === undefined) continue;
    if (typeof actual !== 'number' || !compare(actual, bound)) return false;
  }

  return true;
}

/**
 * True when every field in the filter matches the metadata.
 */
export function matchesFilter(metadata: ChunkMetadata, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(([field, expected]) => {
    const actual = metadata[field];
    return isCondition(expected) ? matchesCondition(actual, expected) : actual === expected;
  });
}

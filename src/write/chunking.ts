/**
 * Splitting of write units into bounded batches.
 * @module write/chunking
 */

import { InvalidArgumentError } from '../errors/index.js';
import type { WriteBatch, WriteUnit } from './types.js';

/**
 * A slice of a larger array.
 */
export interface Chunk<T> {
  index: number;
  start: number;
  end: number;
  items: T[];
}

/**
 * Number of groups needed for `total` items of at most `max` each.
 */
export function groupCount(total: number, max: number): number {
  return Math.ceil(total / max);
}

/**
 * Splits items into consecutive chunks of at most `max` items.
 */
export function chunk<T>(items: readonly T[], max: number): Array<Chunk<T>> {
  if (!Number.isInteger(max) || max < 1) {
    throw new InvalidArgumentError(`Group size must be a positive integer, got ${max}`);
  }
  const chunks: Array<Chunk<T>> = [];
  for (let start = 0; start < items.length; start += max) {
    const end = Math.min(start + max, items.length);
    chunks.push({ index: chunks.length, start, end, items: items.slice(start, end) });
  }
  return chunks;
}

/**
 * Splits units into write batches.
 */
export function toBatches(units: readonly WriteUnit[], maxPerGroup: number): WriteBatch[] {
  return chunk(units, maxPerGroup).map((group) => ({
    index: group.index,
    range: { start: group.start, end: group.end },
    units: group.items,
  }));
}

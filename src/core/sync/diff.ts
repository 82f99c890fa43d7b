// src/core/sync/diff.ts

import type { Category, CategorySnapshot, DiffResult } from './types';
import { SyncError } from '../../utils/errors';

/**
 * Set difference between two snapshots of the same category.
 * Pure function: toAdd = source \ destination, toRemove = destination \ source.
 * Both lists are ordered by identity key.
 */
export function diff<C extends Category>(
  source: CategorySnapshot<C>,
  destination: CategorySnapshot<C>
): DiffResult<C> {
  if (source.category !== destination.category) {
    throw new SyncError(
      `Cannot diff ${source.category} against ${destination.category}`,
      'CATEGORY_MISMATCH',
      { source: source.category, destination: destination.category }
    );
  }

  return {
    category: source.category,
    toAdd: missingFrom(source.items, destination.items),
    toRemove: missingFrom(destination.items, source.items),
  };
}

function missingFrom<T>(from: ReadonlyMap<string, T>, other: ReadonlyMap<string, T>): T[] {
  return [...from.entries()]
    .filter(([key]) => !other.has(key))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, item]) => item);
}

export function isEmptyDiff(result: DiffResult<Category>): boolean {
  return result.toAdd.length === 0 && result.toRemove.length === 0;
}

// src/core/sync/identity.ts

import type { SavedItem, SavedItemKind } from './types';

/**
 * Identity key of an item within its category. Subreddit names and account
 * handles are case-insensitive on the remote; saved item IDs are exact.
 */
export function identityKey(item: string | SavedItem): string {
  return typeof item === 'string' ? item.toLowerCase() : item.id;
}

export function isSavedItemKind(kind: string): kind is SavedItemKind {
  return kind === 'post' || kind === 'comment';
}

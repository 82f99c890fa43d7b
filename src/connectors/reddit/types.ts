// src/connectors/reddit/types.ts

import type { SavedItemKind } from '../../core/sync/types';

export const REDDIT_API_BASE = 'https://oauth.reddit.com';

/** Reddit's maximum page size for listings */
export const LISTING_PAGE_SIZE = 100;

/**
 * Thing type prefixes (t1_abc, t3_xyz) for the saved-item kinds
 */
export const THING_PREFIX: Record<SavedItemKind, string> = {
  comment: 't1',
  post: 't3',
};

export function kindFromThingPrefix(prefix: string): string {
  switch (prefix) {
    case THING_PREFIX.post:
      return 'post';
    case THING_PREFIX.comment:
      return 'comment';
    default:
      return prefix;
  }
}

export function fullname(id: string, kind: SavedItemKind): string {
  return `${THING_PREFIX[kind]}_${id}`;
}

export interface RedditSessionOptions {
  /** Override for tests or a Reddit-compatible host */
  apiBase?: string;
  pageSize?: number;
}

// src/connectors/reddit/RedditSession.ts

import type { z } from 'zod';
import type {
  AccountSession,
  MutationOutcome,
  PreferenceMap,
  SavedItem,
  SavedItemKind,
} from '../../core/sync/types';
import type { HttpRequestConfig } from '../../core/http/types';
import type { AccessTokenSource } from '../../core/auth/AccessTokenProvider';
import type { SessionDeps } from '../types';
import {
  ApiReasonSchema,
  FriendListSchema,
  ListingSchema,
  PreferencesSchema,
  SavedThingSchema,
  SubredditSchema,
  type ListingChild,
} from './schemas';
import {
  LISTING_PAGE_SIZE,
  REDDIT_API_BASE,
  fullname,
  kindFromThingPrefix,
  type RedditSessionOptions,
} from './types';
import { ApiClientError, SyncError } from '../../utils/errors';

/**
 * Reddit account session over the OAuth API
 *
 * Every call goes through HttpCore under the account's own throttle key, so
 * requests for one account are serialized while the other account proceeds.
 *
 * @example
 * ```typescript
 * const sdk = AccountSyncSDK.init(config);
 * const source = await sdk.authenticate({ username: 'old_account', ... });
 * for await (const name of source.listSubscriptions()) console.log(name);
 * ```
 */
export class RedditSession implements AccountSession {
  private apiBase: string;
  private pageSize: number;

  constructor(
    private deps: SessionDeps,
    readonly account: string,
    private tokens: AccessTokenSource,
    options: RedditSessionOptions = {}
  ) {
    this.apiBase = options.apiBase ?? REDDIT_API_BASE;
    this.pageSize = Math.min(options.pageSize ?? LISTING_PAGE_SIZE, LISTING_PAGE_SIZE);
  }

  async *listSubscriptions(): AsyncIterable<string> {
    for await (const child of this.paginate('/subreddits/mine/subscriber')) {
      yield this.parse(SubredditSchema, child.data, 'subreddit').display_name;
    }
  }

  async *listFriends(): AsyncIterable<string> {
    const response = await this.call({ url: `${this.apiBase}/api/v1/me/friends`, method: 'GET' });
    const friends = this.parse(FriendListSchema, response, 'friend list');
    for (const friend of friends.data.children) {
      yield friend.name;
    }
  }

  async *listSaved(): AsyncIterable<SavedItem> {
    const path = `/user/${encodeURIComponent(this.account)}/saved`;
    for await (const child of this.paginate(path)) {
      const { id } = this.parse(SavedThingSchema, child.data, 'saved item');
      yield { id, kind: kindFromThingPrefix(child.kind) };
    }
  }

  async getPreferences(): Promise<PreferenceMap> {
    const response = await this.call({ url: `${this.apiBase}/api/v1/me/prefs`, method: 'GET' });
    return this.parse(PreferencesSchema, response, 'preferences');
  }

  async setPreferences(preferences: PreferenceMap): Promise<void> {
    await this.call({
      url: `${this.apiBase}/api/v1/me/prefs`,
      method: 'PATCH',
      body: preferences,
    });
  }

  async subscribeBulk(primary: string, others: readonly string[]): Promise<MutationOutcome> {
    return this.subscription('sub', primary, others);
  }

  async unsubscribeBulk(primary: string, others: readonly string[]): Promise<MutationOutcome> {
    return this.subscription('unsub', primary, others);
  }

  async friend(handle: string): Promise<MutationOutcome> {
    await this.call({
      url: `${this.apiBase}/api/v1/me/friends/${encodeURIComponent(handle)}`,
      method: 'PUT',
      body: { name: handle },
    });
    return 'applied';
  }

  async unfriend(handle: string): Promise<MutationOutcome> {
    try {
      await this.call({
        url: `${this.apiBase}/api/v1/me/friends/${encodeURIComponent(handle)}`,
        method: 'DELETE',
      });
      return 'applied';
    } catch (error: unknown) {
      if (this.hasReason(error, 'NOT_FRIEND')) {
        return 'unchanged';
      }
      throw error;
    }
  }

  async save(id: string, kind: SavedItemKind): Promise<MutationOutcome> {
    await this.call({
      url: `${this.apiBase}/api/save`,
      method: 'POST',
      body: new URLSearchParams({ id: fullname(id, kind) }),
    });
    return 'applied';
  }

  async unsave(id: string, kind: SavedItemKind): Promise<MutationOutcome> {
    await this.call({
      url: `${this.apiBase}/api/unsave`,
      method: 'POST',
      body: new URLSearchParams({ id: fullname(id, kind) }),
    });
    return 'applied';
  }

  /**
   * POST /api/subscribe takes every subreddit as one comma-separated sr_name
   */
  private async subscription(
    action: 'sub' | 'unsub',
    primary: string,
    others: readonly string[]
  ): Promise<MutationOutcome> {
    const names = [primary, ...others];
    const body = new URLSearchParams({ action, sr_name: names.join(',') });
    if (action === 'sub') {
      // Otherwise a fresh account is also subscribed to the default subreddits
      body.set('skip_initial_defaults', 'true');
    }

    await this.call({ url: `${this.apiBase}/api/subscribe`, method: 'POST', body });

    this.deps.logger.debug('Bulk subscription call completed', {
      account: this.account,
      action,
      count: names.length,
    });
    return 'applied';
  }

  /**
   * Follow `data.after` until Reddit reports the end of the listing
   */
  private async *paginate(path: string): AsyncIterable<ListingChild> {
    const seen = new Set<string>();
    let after: string | null = null;
    let page = 0;

    do {
      const query: Record<string, string | number> = { limit: this.pageSize, raw_json: 1 };
      if (after) {
        query.after = after;
        seen.add(after);
      }

      const response = await this.call({ url: `${this.apiBase}${path}`, method: 'GET', query });
      const listing = this.parse(ListingSchema, response, `listing ${path}`);
      page++;

      yield* listing.data.children;

      // A cursor already followed means the listing cycles
      if (listing.data.after !== null && seen.has(listing.data.after)) {
        this.deps.logger.warn('Listing cursor repeated, stopping', {
          account: this.account,
          path,
          page,
          after: listing.data.after,
        });
        break;
      }
      after = listing.data.after;
    } while (after);

    this.deps.logger.debug('Listing drained', { account: this.account, path, pages: page });
  }

  private async call(config: Omit<HttpRequestConfig, 'account' | 'headers'>): Promise<unknown> {
    const accessToken = await this.tokens.getAccessToken();
    const response = await this.deps.http.request<unknown>({
      ...config,
      account: this.account,
      headers: { Authorization: `Bearer ${accessToken}` },
    });
    return response.data;
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, what: string): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new SyncError(`Unexpected ${what} payload from Reddit`, 'INVALID_RESPONSE', {
        account: this.account,
        issues: result.error.message,
      });
    }
    return result.data;
  }

  private hasReason(error: unknown, reason: string): boolean {
    if (!(error instanceof ApiClientError) || error.status !== 400) return false;
    const body = ApiReasonSchema.safeParse(error.details?.response);
    return body.success && body.data.reason === reason;
  }
}

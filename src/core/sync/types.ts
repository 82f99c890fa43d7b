// src/core/sync/types.ts

/**
 * Categories reconciled by set difference. Preferences are copied wholesale
 * and are not part of this union.
 */
export type Category = 'subscriptions' | 'friends' | 'savedItems';

export type SyncTarget = Category | 'preferences';

export const CATEGORY_ORDER: readonly Category[] = ['subscriptions', 'friends', 'savedItems'];

export const ALL_TARGETS: readonly SyncTarget[] = [...CATEGORY_ORDER, 'preferences'];

export type SavedItemKind = 'post' | 'comment';

export interface SavedItem {
  id: string;
  /**
   * Resolved once from the listing's thing prefix: t3 is 'post', t1 is
   * 'comment'. Any other prefix is kept verbatim so the reconciler can report it.
   */
  kind: SavedItemKind | (string & {});
}

/** Item value carried by each category's snapshot */
export interface CategoryItemMap {
  subscriptions: string;
  friends: string;
  savedItems: SavedItem;
}

export type CategoryItem<C extends Category> = CategoryItemMap[C];

export interface CategorySnapshot<C extends Category = Category> {
  category: C;
  account: string;
  /** Keyed by item identity; values keep the remote's display form */
  items: ReadonlyMap<string, CategoryItem<C>>;
  fetchedAt: Date;
}

export interface DiffResult<C extends Category = Category> {
  category: C;
  toAdd: ReadonlyArray<CategoryItem<C>>;
  toRemove: ReadonlyArray<CategoryItem<C>>;
}

/** Diff of any category, discriminated on `category` */
export type AnyDiffResult = { [C in Category]: DiffResult<C> }[Category];

export type PreferenceMap = Record<string, unknown>;

/** 'unchanged' means the remote was already in the requested state */
export type MutationOutcome = 'applied' | 'unchanged';

/**
 * Authenticated handle on one remote account. Listings are restartable,
 * finite async sequences; pagination is the implementation's concern.
 */
export interface AccountSession {
  readonly account: string;

  listSubscriptions(): AsyncIterable<string>;
  listFriends(): AsyncIterable<string>;
  listSaved(): AsyncIterable<SavedItem>;

  getPreferences(): Promise<PreferenceMap>;
  setPreferences(preferences: PreferenceMap): Promise<void>;

  subscribeBulk(primary: string, others: readonly string[]): Promise<MutationOutcome>;
  unsubscribeBulk(primary: string, others: readonly string[]): Promise<MutationOutcome>;

  friend(handle: string): Promise<MutationOutcome>;
  unfriend(handle: string): Promise<MutationOutcome>;

  save(id: string, kind: SavedItemKind): Promise<MutationOutcome>;
  unsave(id: string, kind: SavedItemKind): Promise<MutationOutcome>;
}

export type ReconcileAction = 'add' | 'remove';

export interface ItemFailure {
  /** Identity of the item as sent to the remote */
  item: string;
  action: ReconcileAction;
  code: string;
  message: string;
}

export type ReconcileStatus = 'completed' | 'aborted' | 'planned';

export interface ReconcileReport {
  readonly category: Category;
  readonly status: ReconcileStatus;
  readonly planned: { readonly toAdd: number; readonly toRemove: number };
  readonly applied: number;
  readonly skippedDuplicate: number;
  readonly failed: number;
  readonly failures: readonly ItemFailure[];
  /** Set when the category was aborted because a snapshot could not be fetched */
  readonly error?: { readonly code: string; readonly message: string };
}

export type PreferenceCopyOutcome =
  | { readonly status: 'copied'; readonly keyCount: number }
  | { readonly status: 'planned'; readonly keyCount: number }
  | { readonly status: 'failed'; readonly code: string; readonly message: string };

export interface RunOptions {
  /** Subset to reconcile; defaults to all four targets */
  targets?: readonly SyncTarget[];
  /** Compute diffs and read preferences without issuing any mutation */
  dryRun?: boolean;
}

export interface RunResult {
  readonly runId: string;
  readonly source: string;
  readonly destination: string;
  readonly startedAt: Date;
  readonly finishedAt: Date;
  readonly dryRun: boolean;
  readonly categories: Readonly<Partial<Record<Category, ReconcileReport>>>;
  readonly preferences?: PreferenceCopyOutcome;
  readonly success: boolean;
}

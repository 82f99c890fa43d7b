// src/index.ts

export { AccountSyncSDK } from './sdk';
export type { SDKOptions } from './sdk';
export type { InitConfig } from './config/ConfigValidator';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { AccountCredentials, AccountLogin, ClientCredentials, TokenSet } from './core/auth/types';
export type {
  AccountSession,
  AnyDiffResult,
  Category,
  CategorySnapshot,
  DiffResult,
  ItemFailure,
  MutationOutcome,
  PreferenceCopyOutcome,
  PreferenceMap,
  ReconcileReport,
  RunOptions,
  RunResult,
  SavedItem,
  SavedItemKind,
  SyncTarget,
} from './core/sync/types';
export { ALL_TARGETS, CATEGORY_ORDER } from './core/sync/types';

// Building blocks for custom sessions and pipelines
export { diff, isEmptyDiff } from './core/sync/diff';
export { bulkRequest, Reconciler } from './core/sync/Reconciler';
export { SnapshotFetcher } from './core/sync/SnapshotFetcher';
export { PreferenceCopier } from './core/sync/PreferenceCopier';
export { SyncOrchestrator } from './core/sync/SyncOrchestrator';
export { RedditSession } from './connectors/reddit/RedditSession';
export { CredentialStore } from './core/credentials/CredentialStore';
export { createCredentialBackend, PERSISTENT_SCHEMES } from './core/credentials/backend';

// Export error classes for error handling
export {
  SyncError,
  RemoteUnavailableError,
  UnsupportedItemKindError,
  InvalidBulkRequestError,
  AuthError,
  CredentialsNotFoundError,
  ApiError,
  ApiClientError,
  ApiServerError,
  RateLimitError,
  NetworkError,
  NetworkTimeoutError,
  CircuitBreakerOpenError,
} from './utils/errors';

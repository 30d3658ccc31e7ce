// Sync engine
export { DEFAULT_SYNC_OPTIONS, SyncEngine } from "./engine.js";
export type { SyncEngineDeps, SyncRunOptions } from "./engine.js";
export { FolderCheckpoint, runCheckpointGroups } from "./checkpoint.js";
export { MessageMaterializer } from "./materializer.js";
export { partitionPage, Reconciler } from "./reconcile.js";
// Folders
export {
  buildFolderPaths,
  createFolderMatcher,
  filterExcludedFolders,
  filterIncludedFolders,
  FolderDirectory,
  orderFoldersForPersistence,
} from "./folders.js";
// Configuration
export { loadConfig, toSyncOptions } from "./config.js";
export type { MirrorConfig } from "./config.js";
// Errors
export {
  ArtifactNotFoundError,
  ConfigurationError,
  ExitCodes,
  MirrorError,
  RemoteApiError,
  RetryExhaustedError,
  SyncCancelledError,
} from "./errors.js";
// Logger
export { ConsoleLogger, createLogger, silentLogger } from "./logger.js";
// Artifact store
export { createArtifactStore, FileArtifactStore } from "./output.js";
// Rate limiter
export {
  createRateLimiter,
  parseRetryAfter,
  SlidingWindowRateLimiter,
} from "./rate-limiter.js";
// Retry helper
export { createRetrier, exponentialBackoff, withRetry } from "./retry.js";
export type { BackoffPolicy, Retrier, RetryOptions } from "./retry.js";
// Filenames
export { artifactFilename, sanitizeFilename, sanitizeFolderPath } from "./filenames.js";
// State database
export { StateDatabase } from "./state.js";
// Verification
export { ArchiveVerifier, hasUnresolvedIssues } from "./verify.js";
export type { SizeMismatch, VerifyOptions, VerifyReport } from "./verify.js";
// Transformation
export { MarkdownCardTransformer } from "./transform.js";
export type {
  ArtifactStore,
  DeltaPage,
  FolderRecord,
  FolderSyncProgressRecord,
  ItemChange,
  ItemIdentity,
  Logger,
  MessageRecord,
  ProgressObserver,
  RateLimiter,
  RateLimiterConfig,
  RemoteFolder,
  RemoteItem,
  RemoteMessageSource,
  SyncError,
  SyncOptions,
  SyncProgress,
  SyncResult,
  SyncStateRecord,
  Transformer,
} from "./types.js";

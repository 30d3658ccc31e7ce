/** Core type definitions for mailbox-mirror. */

// ─── Remote identity ───

/**
 * A remote item is known by two ids. The mutable id changes when the item is
 * moved between folders; the immutable id does not and is the dedupe key.
 */
export interface ItemIdentity {
  readonly mutableId: string;
  readonly immutableId: string;
}

export type ItemChange =
  | { kind: "upsert" }
  | { kind: "deleted" }
  | { kind: "moved"; newParentId: string | null };

// ─── Remote Message Source ───

export interface RemoteFolder {
  id: string;
  parentId: string | null;
  displayName: string;
  totalItemCount: number;
  unreadItemCount: number;
}

export interface RemoteItem {
  identity: ItemIdentity;
  subject: string | null;
  sender: string | null;
  recipients: string[];
  receivedAt: Date;
  /** Remote size estimate in bytes; the stored artifact size wins once written. */
  size: number;
  hasAttachments: boolean;
  conversationId: string | null;
  inReplyTo: string | null;
  change: ItemChange;
}

export interface DeltaPage {
  items: RemoteItem[];
  hasMorePages: boolean;
  nextPageCursor: string | null;
  /** Only set on the last page of a delta round. */
  finalCursor: string | null;
}

export interface RemoteMessageSource {
  getMailboxIdentity(signal?: AbortSignal): Promise<string>;
  listFolders(signal?: AbortSignal): Promise<RemoteFolder[]>;
  fetchDeltaPage(
    folderId: string,
    cursor: string | null,
    signal?: AbortSignal,
  ): Promise<DeltaPage>;
  fetchSinceDate(
    folderId: string,
    since: Date,
    signal?: AbortSignal,
  ): Promise<RemoteItem[]>;
  fetchRawContent(mutableId: string, signal?: AbortSignal): Promise<Buffer>;
}

// ─── Folder Directory ───

export interface DirectoryFolder extends RemoteFolder {
  /** Slash-separated path from the mailbox root, e.g. `Inbox/Projects`. */
  path: string;
}

// ─── Persisted records ───

export interface SyncStateRecord {
  mailbox: string;
  lastSyncAt: string | null;
  lastDeltaToken: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface FolderRecord {
  id: string;
  parentId: string | null;
  localPath: string;
  displayName: string;
  totalItemCount: number;
  unreadItemCount: number;
  deltaToken: string | null;
  lastSyncAt: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Exists only while a folder's sync is incomplete. */
export interface FolderSyncProgressRecord {
  folderId: string;
  pendingCursor: string | null;
  pendingPageNumber: number;
  pendingPosition: number;
  startedAt: string;
  lastCheckpointAt: string | null;
  processedCount: number;
}

export interface MessageRecord {
  mutableId: string;
  immutableId: string;
  localPath: string;
  folderPath: string;
  subject: string | null;
  sender: string | null;
  recipients: string | null;
  receivedAt: string;
  size: number;
  hasAttachments: boolean;
  inReplyTo: string | null;
  conversationId: string | null;
  quarantinedAt: string | null;
  quarantineReason: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TransformationRecord {
  messageId: string;
  type: string;
  appliedAt: string;
  configVersion: string;
  outputPath: string;
}

// ─── Local storage collaborator ───

export interface ArtifactStore {
  storeArtifact(
    content: Buffer,
    folderPath: string,
    subject: string | null,
    receivedAt: Date,
  ): Promise<string>;
  moveArtifact(fromPath: string, toFolderPath: string): Promise<string>;
  moveToQuarantine(fromPath: string): Promise<string>;
  getSize(relativePath: string): Promise<number>;
  removeArtifact(relativePath: string): Promise<void>;
  sweepTempFiles(maxAgeMs: number): Promise<number>;
  listArtifacts(): Promise<string[]>;
}

// ─── Transformation collaborator ───

export interface TransformOptions {
  markdown: boolean;
}

export interface Transformer {
  transformSingleMessage(
    message: MessageRecord,
    options: TransformOptions,
  ): Promise<boolean>;
}

// ─── Progress ───

export type SyncPhase =
  | "enumerating-folders"
  | "syncing-folder"
  | "downloading"
  | "completed";

export interface SyncProgress {
  phase: SyncPhase;
  currentFolder: string | null;
  totalFolders: number;
  processedFolders: number;
  totalItemsInFolder: number;
  processedInFolder: number;
  itemsSynced: number;
  currentPage: number;
  itemsInPage: number;
}

export interface ProgressObserver {
  onProgress(progress: SyncProgress): void;
}

// ─── Sync options & result ───

export interface SyncOptions {
  mailbox?: string;
  checkpointInterval: number;
  maxParallelDownloads: number;
  excludeFolders: string[];
  /** Restrict the run to these folders (same patterns as exclusions); empty means all. */
  includeFolders: string[];
  overlapMinutes: number;
  dryRun: boolean;
  transform: TransformOptions;
}

export interface SyncError {
  entity: string;
  error: string;
  retryable: boolean;
}

export type SyncStatus = "completed" | "cancelled" | "failed";

export interface SyncResult {
  mailbox: string | null;
  status: SyncStatus;
  dryRun: boolean;
  itemsSynced: number;
  itemsSkipped: number;
  itemsFailed: number;
  foldersProcessed: number;
  errors: SyncError[];
  durationMs: number;
}

export type MaterializeOutcome =
  | { status: "synced"; message: MessageRecord | null }
  | { status: "skipped" }
  | { status: "error"; error: SyncError };

// ─── Rate Limiter ───

export interface RateLimiterConfig {
  maxRequests?: number;
  windowMs?: number;
  minDelayMs?: number;
}

export interface RateLimiter {
  acquire(signal?: AbortSignal): Promise<void>;
  backoff(retryAfterMs: number): void;
  updateFromHeaders(headers: Headers): void;
}

// ─── Logger ───

export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  progress(current: number, total: number, label: string): void;
}

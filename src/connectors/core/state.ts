/**
 * SQLite-backed state for the mirror.
 *
 * The database is an index over the stored artifacts, not the source of
 * truth: losing it costs a re-scan, never data. Statements run synchronously
 * (better-sqlite3), so writes issued from concurrent download tasks are
 * still applied one at a time on the event loop.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import Database from "better-sqlite3";
import type {
  FolderRecord,
  FolderSyncProgressRecord,
  MessageRecord,
  SyncStateRecord,
  TransformationRecord,
} from "./types.js";

export const SCHEMA_VERSION = 1;
export const DEFAULT_DB_FILENAME = ".sync.db";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_state (
  mailbox TEXT PRIMARY KEY,
  last_sync_at TEXT,
  last_delta_token TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS folders (
  id TEXT PRIMARY KEY,
  parent_id TEXT,
  local_path TEXT NOT NULL UNIQUE,
  display_name TEXT NOT NULL,
  total_item_count INTEGER NOT NULL DEFAULT 0,
  unread_item_count INTEGER NOT NULL DEFAULT 0,
  delta_token TEXT,
  last_sync_at TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (parent_id) REFERENCES folders(id)
);

CREATE TABLE IF NOT EXISTS folder_sync_progress (
  folder_id TEXT PRIMARY KEY,
  pending_cursor TEXT,
  pending_page_number INTEGER NOT NULL DEFAULT 0,
  pending_position INTEGER NOT NULL DEFAULT 0,
  started_at TEXT NOT NULL,
  last_checkpoint_at TEXT,
  processed_count INTEGER NOT NULL DEFAULT 0,
  FOREIGN KEY (folder_id) REFERENCES folders(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS messages (
  mutable_id TEXT PRIMARY KEY,
  immutable_id TEXT NOT NULL UNIQUE,
  local_path TEXT NOT NULL,
  folder_path TEXT NOT NULL,
  subject TEXT,
  sender TEXT,
  recipients TEXT,
  received_at TEXT NOT NULL,
  size INTEGER NOT NULL,
  has_attachments INTEGER NOT NULL,
  in_reply_to TEXT,
  conversation_id TEXT,
  quarantined_at TEXT,
  quarantine_reason TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS transformations (
  message_id TEXT NOT NULL,
  type TEXT NOT NULL,
  applied_at TEXT NOT NULL,
  config_version TEXT NOT NULL,
  output_path TEXT NOT NULL,
  PRIMARY KEY (message_id, type),
  FOREIGN KEY (message_id) REFERENCES messages(mutable_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_messages_folder ON messages(folder_path);
CREATE INDEX IF NOT EXISTS idx_messages_received ON messages(received_at);
CREATE INDEX IF NOT EXISTS idx_messages_conversation ON messages(conversation_id);
CREATE INDEX IF NOT EXISTS idx_messages_quarantined ON messages(quarantined_at) WHERE quarantined_at IS NOT NULL;
`;

// ─── Row shapes ───

interface SyncStateRow {
  mailbox: string;
  last_sync_at: string | null;
  last_delta_token: string | null;
  created_at: string;
  updated_at: string;
}

interface FolderRow {
  id: string;
  parent_id: string | null;
  local_path: string;
  display_name: string;
  total_item_count: number;
  unread_item_count: number;
  delta_token: string | null;
  last_sync_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ProgressRow {
  folder_id: string;
  pending_cursor: string | null;
  pending_page_number: number;
  pending_position: number;
  started_at: string;
  last_checkpoint_at: string | null;
  processed_count: number;
}

interface MessageRow {
  mutable_id: string;
  immutable_id: string;
  local_path: string;
  folder_path: string;
  subject: string | null;
  sender: string | null;
  recipients: string | null;
  received_at: string;
  size: number;
  has_attachments: number;
  in_reply_to: string | null;
  conversation_id: string | null;
  quarantined_at: string | null;
  quarantine_reason: string | null;
  created_at: string;
  updated_at: string;
}

interface TransformationRow {
  message_id: string;
  type: string;
  applied_at: string;
  config_version: string;
  output_path: string;
}

function toSyncState(row: SyncStateRow): SyncStateRecord {
  return {
    mailbox: row.mailbox,
    lastSyncAt: row.last_sync_at,
    lastDeltaToken: row.last_delta_token,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toFolder(row: FolderRow): FolderRecord {
  return {
    id: row.id,
    parentId: row.parent_id,
    localPath: row.local_path,
    displayName: row.display_name,
    totalItemCount: row.total_item_count,
    unreadItemCount: row.unread_item_count,
    deltaToken: row.delta_token,
    lastSyncAt: row.last_sync_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toProgress(row: ProgressRow): FolderSyncProgressRecord {
  return {
    folderId: row.folder_id,
    pendingCursor: row.pending_cursor,
    pendingPageNumber: row.pending_page_number,
    pendingPosition: row.pending_position,
    startedAt: row.started_at,
    lastCheckpointAt: row.last_checkpoint_at,
    processedCount: row.processed_count,
  };
}

function toMessage(row: MessageRow): MessageRecord {
  return {
    mutableId: row.mutable_id,
    immutableId: row.immutable_id,
    localPath: row.local_path,
    folderPath: row.folder_path,
    subject: row.subject,
    sender: row.sender,
    recipients: row.recipients,
    receivedAt: row.received_at,
    size: row.size,
    hasAttachments: row.has_attachments === 1,
    inReplyTo: row.in_reply_to,
    conversationId: row.conversation_id,
    quarantinedAt: row.quarantined_at,
    quarantineReason: row.quarantine_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTransformation(row: TransformationRow): TransformationRecord {
  return {
    messageId: row.message_id,
    type: row.type,
    appliedAt: row.applied_at,
    configVersion: row.config_version,
    outputPath: row.output_path,
  };
}

// ─── Database ───

export class StateDatabase {
  private readonly db: Database.Database;

  /** Pass `":memory:"` for a throwaway database. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("synchronous = NORMAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(SCHEMA);
    const row = this.db
      .prepare<[], { version: number }>("SELECT version FROM schema_version LIMIT 1")
      .get();
    if (!row) {
      this.db
        .prepare<[number]>("INSERT INTO schema_version (version) VALUES (?)")
        .run(SCHEMA_VERSION);
    }
  }

  getSchemaVersion(): number {
    const row = this.db
      .prepare<[], { version: number }>("SELECT version FROM schema_version LIMIT 1")
      .get();
    return row?.version ?? 0;
  }

  close(): void {
    this.db.close();
  }

  // ── Sync state ──

  getSyncState(mailbox: string): SyncStateRecord | null {
    const row = this.db
      .prepare<[string], SyncStateRow>("SELECT * FROM sync_state WHERE mailbox = ?")
      .get(mailbox);
    return row ? toSyncState(row) : null;
  }

  listSyncStates(): SyncStateRecord[] {
    return this.db
      .prepare<[], SyncStateRow>("SELECT * FROM sync_state ORDER BY mailbox")
      .all()
      .map(toSyncState);
  }

  upsertSyncState(state: SyncStateRecord): void {
    this.db
      .prepare<SyncStateRow>(
        `INSERT INTO sync_state (mailbox, last_sync_at, last_delta_token, created_at, updated_at)
         VALUES (@mailbox, @last_sync_at, @last_delta_token, @created_at, @updated_at)
         ON CONFLICT(mailbox) DO UPDATE SET
           last_sync_at = excluded.last_sync_at,
           last_delta_token = excluded.last_delta_token,
           updated_at = excluded.updated_at`,
      )
      .run({
        mailbox: state.mailbox,
        last_sync_at: state.lastSyncAt,
        last_delta_token: state.lastDeltaToken,
        created_at: state.createdAt,
        updated_at: state.updatedAt,
      });
  }

  // ── Folders ──

  getFolder(id: string): FolderRecord | null {
    const row = this.db
      .prepare<[string], FolderRow>("SELECT * FROM folders WHERE id = ?")
      .get(id);
    return row ? toFolder(row) : null;
  }

  getFolderByPath(localPath: string): FolderRecord | null {
    const row = this.db
      .prepare<[string], FolderRow>("SELECT * FROM folders WHERE local_path = ?")
      .get(localPath);
    return row ? toFolder(row) : null;
  }

  listFolders(): FolderRecord[] {
    return this.db
      .prepare<[], FolderRow>("SELECT * FROM folders ORDER BY local_path")
      .all()
      .map(toFolder);
  }

  /**
   * Insert or update a folder. A stale record holding the same local path
   * under another id (remote id migration) hands its cursor and last sync
   * time over and is removed.
   */
  upsertFolder(folder: FolderRecord): void {
    const migrate = this.db.transaction((record: FolderRecord) => {
      const stale = this.db
        .prepare<[string, string], FolderRow>(
          "SELECT * FROM folders WHERE local_path = ? AND id != ?",
        )
        .get(record.localPath, record.id);

      let deltaToken = record.deltaToken;
      let lastSyncAt = record.lastSyncAt;
      if (stale) {
        deltaToken ??= stale.delta_token;
        lastSyncAt ??= stale.last_sync_at;
        this.db
          .prepare<[string]>("UPDATE folders SET parent_id = NULL WHERE parent_id = ?")
          .run(stale.id);
        this.db.prepare<[string]>("DELETE FROM folders WHERE id = ?").run(stale.id);
      }

      this.db
        .prepare<FolderRow>(
          `INSERT INTO folders (id, parent_id, local_path, display_name, total_item_count,
                                unread_item_count, delta_token, last_sync_at, created_at, updated_at)
           VALUES (@id, @parent_id, @local_path, @display_name, @total_item_count,
                   @unread_item_count, @delta_token, @last_sync_at, @created_at, @updated_at)
           ON CONFLICT(id) DO UPDATE SET
             parent_id = excluded.parent_id,
             local_path = excluded.local_path,
             display_name = excluded.display_name,
             total_item_count = excluded.total_item_count,
             unread_item_count = excluded.unread_item_count,
             delta_token = excluded.delta_token,
             last_sync_at = excluded.last_sync_at,
             updated_at = excluded.updated_at`,
        )
        .run({
          id: record.id,
          parent_id: record.parentId,
          local_path: record.localPath,
          display_name: record.displayName,
          total_item_count: record.totalItemCount,
          unread_item_count: record.unreadItemCount,
          delta_token: deltaToken,
          last_sync_at: lastSyncAt,
          created_at: record.createdAt,
          updated_at: record.updatedAt,
        });
    });
    migrate(folder);
  }

  // ── Folder sync progress ──

  getFolderSyncProgress(folderId: string): FolderSyncProgressRecord | null {
    const row = this.db
      .prepare<[string], ProgressRow>(
        "SELECT * FROM folder_sync_progress WHERE folder_id = ?",
      )
      .get(folderId);
    return row ? toProgress(row) : null;
  }

  listInProgressFolders(): FolderSyncProgressRecord[] {
    return this.db
      .prepare<[], ProgressRow>("SELECT * FROM folder_sync_progress ORDER BY folder_id")
      .all()
      .map(toProgress);
  }

  saveFolderSyncProgress(progress: FolderSyncProgressRecord): void {
    this.db
      .prepare<ProgressRow>(
        `INSERT INTO folder_sync_progress (folder_id, pending_cursor, pending_page_number,
                                           pending_position, started_at, last_checkpoint_at,
                                           processed_count)
         VALUES (@folder_id, @pending_cursor, @pending_page_number, @pending_position,
                 @started_at, @last_checkpoint_at, @processed_count)
         ON CONFLICT(folder_id) DO UPDATE SET
           pending_cursor = excluded.pending_cursor,
           pending_page_number = excluded.pending_page_number,
           pending_position = excluded.pending_position,
           last_checkpoint_at = excluded.last_checkpoint_at,
           processed_count = excluded.processed_count`,
      )
      .run({
        folder_id: progress.folderId,
        pending_cursor: progress.pendingCursor,
        pending_page_number: progress.pendingPageNumber,
        pending_position: progress.pendingPosition,
        started_at: progress.startedAt,
        last_checkpoint_at: progress.lastCheckpointAt,
        processed_count: progress.processedCount,
      });
  }

  deleteFolderSyncProgress(folderId: string): void {
    this.db
      .prepare<[string]>("DELETE FROM folder_sync_progress WHERE folder_id = ?")
      .run(folderId);
  }

  // ── Messages ──

  getMessage(mutableId: string): MessageRecord | null {
    const row = this.db
      .prepare<[string], MessageRow>("SELECT * FROM messages WHERE mutable_id = ?")
      .get(mutableId);
    return row ? toMessage(row) : null;
  }

  getMessageByImmutableId(immutableId: string): MessageRecord | null {
    const row = this.db
      .prepare<[string], MessageRow>("SELECT * FROM messages WHERE immutable_id = ?")
      .get(immutableId);
    return row ? toMessage(row) : null;
  }

  insertMessage(message: MessageRecord): void {
    this.db
      .prepare<MessageRow>(
        `INSERT INTO messages (mutable_id, immutable_id, local_path, folder_path, subject, sender,
                               recipients, received_at, size, has_attachments, in_reply_to,
                               conversation_id, quarantined_at, quarantine_reason,
                               created_at, updated_at)
         VALUES (@mutable_id, @immutable_id, @local_path, @folder_path, @subject, @sender,
                 @recipients, @received_at, @size, @has_attachments, @in_reply_to,
                 @conversation_id, @quarantined_at, @quarantine_reason,
                 @created_at, @updated_at)`,
      )
      .run({
        mutable_id: message.mutableId,
        immutable_id: message.immutableId,
        local_path: message.localPath,
        folder_path: message.folderPath,
        subject: message.subject,
        sender: message.sender,
        recipients: message.recipients,
        received_at: message.receivedAt,
        size: message.size,
        has_attachments: message.hasAttachments ? 1 : 0,
        in_reply_to: message.inReplyTo,
        conversation_id: message.conversationId,
        quarantined_at: message.quarantinedAt,
        quarantine_reason: message.quarantineReason,
        created_at: message.createdAt,
        updated_at: message.updatedAt,
      });
  }

  updateMessageLocation(
    immutableId: string,
    localPath: string,
    folderPath: string,
    updatedAt: string,
  ): void {
    this.db
      .prepare<[string, string, string, string]>(
        `UPDATE messages SET local_path = ?, folder_path = ?, updated_at = ?
         WHERE immutable_id = ?`,
      )
      .run(localPath, folderPath, updatedAt, immutableId);
  }

  markQuarantined(
    immutableId: string,
    localPath: string,
    quarantinedAt: string,
    reason: string,
  ): void {
    this.db
      .prepare<[string, string, string, string, string]>(
        `UPDATE messages SET local_path = ?, quarantined_at = ?, quarantine_reason = ?,
                             updated_at = ?
         WHERE immutable_id = ?`,
      )
      .run(localPath, quarantinedAt, reason, quarantinedAt, immutableId);
  }

  listMessages(): MessageRecord[] {
    return this.db
      .prepare<[], MessageRow>("SELECT * FROM messages ORDER BY local_path")
      .all()
      .map(toMessage);
  }

  /** Transformations of the message go with it. */
  deleteMessage(mutableId: string): void {
    this.db.prepare<[string]>("DELETE FROM messages WHERE mutable_id = ?").run(mutableId);
  }

  countMessages(): number {
    const row = this.db
      .prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM messages")
      .get();
    return row?.n ?? 0;
  }

  countQuarantined(): number {
    const row = this.db
      .prepare<[], { n: number }>(
        "SELECT COUNT(*) AS n FROM messages WHERE quarantined_at IS NOT NULL",
      )
      .get();
    return row?.n ?? 0;
  }

  // ── Transformations ──

  upsertTransformation(record: TransformationRecord): void {
    this.db
      .prepare<TransformationRow>(
        `INSERT INTO transformations (message_id, type, applied_at, config_version, output_path)
         VALUES (@message_id, @type, @applied_at, @config_version, @output_path)
         ON CONFLICT(message_id, type) DO UPDATE SET
           applied_at = excluded.applied_at,
           config_version = excluded.config_version,
           output_path = excluded.output_path`,
      )
      .run({
        message_id: record.messageId,
        type: record.type,
        applied_at: record.appliedAt,
        config_version: record.configVersion,
        output_path: record.outputPath,
      });
  }

  listTransformations(messageId: string): TransformationRecord[] {
    return this.db
      .prepare<[string], TransformationRow>(
        "SELECT * FROM transformations WHERE message_id = ? ORDER BY type",
      )
      .all(messageId)
      .map(toTransformation);
  }
}

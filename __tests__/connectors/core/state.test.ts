import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SCHEMA_VERSION, StateDatabase } from "../../../src/connectors/core/state.js";
import type {
  FolderRecord,
  FolderSyncProgressRecord,
  MessageRecord,
} from "../../../src/connectors/core/types.js";

const T0 = "2024-03-05T10:00:00.000Z";
const T1 = "2024-03-05T11:00:00.000Z";

function folderRecord(id: string, localPath: string, extra: Partial<FolderRecord> = {}): FolderRecord {
  return {
    id,
    parentId: null,
    localPath,
    displayName: localPath.split("/").pop() ?? localPath,
    totalItemCount: 0,
    unreadItemCount: 0,
    deltaToken: null,
    lastSyncAt: null,
    createdAt: T0,
    updatedAt: T0,
    ...extra,
  };
}

function progressRecord(folderId: string, extra: Partial<FolderSyncProgressRecord> = {}): FolderSyncProgressRecord {
  return {
    folderId,
    pendingCursor: null,
    pendingPageNumber: 0,
    pendingPosition: 0,
    startedAt: T0,
    lastCheckpointAt: null,
    processedCount: 0,
    ...extra,
  };
}

function messageRecord(id: string, extra: Partial<MessageRecord> = {}): MessageRecord {
  return {
    mutableId: `m-${id}`,
    immutableId: id,
    localPath: `eml/Inbox/2024/03/${id}_1030.eml`,
    folderPath: "Inbox",
    subject: `Subject ${id}`,
    sender: "alice@example.com",
    recipients: JSON.stringify(["bob@example.com"]),
    receivedAt: "2024-03-05T10:30:00.000Z",
    size: 42,
    hasAttachments: true,
    inReplyTo: null,
    conversationId: "conv-1",
    quarantinedAt: null,
    quarantineReason: null,
    createdAt: T0,
    updatedAt: T0,
    ...extra,
  };
}

describe("StateDatabase", () => {
  let db: StateDatabase;

  beforeEach(() => {
    db = new StateDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  it("records the schema version", () => {
    expect(db.getSchemaVersion()).toBe(SCHEMA_VERSION);
  });

  describe("sync state", () => {
    it("returns null for an unknown mailbox", () => {
      expect(db.getSyncState("user@example.com")).toBeNull();
    });

    it("upserts and keeps the creation time", () => {
      db.upsertSyncState({
        mailbox: "user@example.com",
        lastSyncAt: null,
        lastDeltaToken: null,
        createdAt: T0,
        updatedAt: T0,
      });
      db.upsertSyncState({
        mailbox: "user@example.com",
        lastSyncAt: T1,
        lastDeltaToken: "tok",
        createdAt: T1,
        updatedAt: T1,
      });

      expect(db.getSyncState("user@example.com")).toEqual({
        mailbox: "user@example.com",
        lastSyncAt: T1,
        lastDeltaToken: "tok",
        createdAt: T0,
        updatedAt: T1,
      });
      expect(db.listSyncStates()).toHaveLength(1);
    });
  });

  describe("folders", () => {
    it("stores and looks up folders by id and path", () => {
      db.upsertFolder(folderRecord("inbox", "Inbox"));
      db.upsertFolder(folderRecord("proj", "Inbox/Projects", { parentId: "inbox" }));

      expect(db.getFolder("proj")?.parentId).toBe("inbox");
      expect(db.getFolderByPath("Inbox")?.id).toBe("inbox");
      expect(db.listFolders().map((f) => f.localPath)).toEqual(["Inbox", "Inbox/Projects"]);
    });

    it("updates an existing folder in place", () => {
      db.upsertFolder(folderRecord("inbox", "Inbox"));
      db.upsertFolder(folderRecord("inbox", "Inbox", { deltaToken: "tok", updatedAt: T1 }));

      const stored = db.getFolder("inbox");
      expect(stored?.deltaToken).toBe("tok");
      expect(stored?.updatedAt).toBe(T1);
      expect(db.listFolders()).toHaveLength(1);
    });

    it("migrates a stale folder that held the same path under another id", () => {
      db.upsertFolder(folderRecord("old", "Inbox", { deltaToken: "tok", lastSyncAt: T0 }));
      db.upsertFolder(folderRecord("child", "Inbox/Sub", { parentId: "old" }));
      db.saveFolderSyncProgress(progressRecord("old"));

      db.upsertFolder(folderRecord("new", "Inbox"));

      expect(db.getFolder("old")).toBeNull();
      expect(db.getFolder("new")).toMatchObject({ deltaToken: "tok", lastSyncAt: T0 });
      expect(db.getFolder("child")?.parentId).toBeNull();
      expect(db.getFolderSyncProgress("old")).toBeNull();
    });

    it("rejects a parent that does not exist", () => {
      expect(() =>
        db.upsertFolder(folderRecord("orphan", "Orphan", { parentId: "missing" })),
      ).toThrow();
    });
  });

  describe("folder sync progress", () => {
    beforeEach(() => {
      db.upsertFolder(folderRecord("inbox", "Inbox"));
      db.upsertFolder(folderRecord("archive", "Archive"));
    });

    it("saves, updates and deletes progress", () => {
      db.saveFolderSyncProgress(progressRecord("inbox"));
      db.saveFolderSyncProgress(
        progressRecord("inbox", {
          pendingCursor: "page-2",
          pendingPageNumber: 1,
          pendingPosition: 10,
          processedCount: 10,
          lastCheckpointAt: T1,
        }),
      );

      expect(db.getFolderSyncProgress("inbox")).toEqual(
        progressRecord("inbox", {
          pendingCursor: "page-2",
          pendingPageNumber: 1,
          pendingPosition: 10,
          processedCount: 10,
          lastCheckpointAt: T1,
        }),
      );

      db.deleteFolderSyncProgress("inbox");
      expect(db.getFolderSyncProgress("inbox")).toBeNull();
    });

    it("lists folders with progress", () => {
      db.saveFolderSyncProgress(progressRecord("inbox"));
      db.saveFolderSyncProgress(progressRecord("archive"));
      expect(db.listInProgressFolders().map((p) => p.folderId)).toEqual(["archive", "inbox"]);
    });
  });

  describe("messages", () => {
    it("round-trips a message", () => {
      db.insertMessage(messageRecord("a"));
      expect(db.getMessage("m-a")).toEqual(messageRecord("a"));
      expect(db.getMessageByImmutableId("a")?.hasAttachments).toBe(true);
    });

    it("refuses a second row for the same immutable id", () => {
      db.insertMessage(messageRecord("a"));
      expect(() => db.insertMessage(messageRecord("a", { mutableId: "m-other" }))).toThrow();
    });

    it("updates the location of a moved message", () => {
      db.insertMessage(messageRecord("a"));
      db.updateMessageLocation("a", "eml/Archive/2024/03/a_1030.eml", "Archive", T1);

      expect(db.getMessageByImmutableId("a")).toMatchObject({
        localPath: "eml/Archive/2024/03/a_1030.eml",
        folderPath: "Archive",
        updatedAt: T1,
      });
    });

    it("marks a message quarantined", () => {
      db.insertMessage(messageRecord("a"));
      db.insertMessage(messageRecord("b"));
      db.markQuarantined("a", "_Quarantine/eml/Inbox/2024/03/a_1030.eml", T1, "deleted_remotely");

      expect(db.getMessageByImmutableId("a")).toMatchObject({
        localPath: "_Quarantine/eml/Inbox/2024/03/a_1030.eml",
        quarantinedAt: T1,
        quarantineReason: "deleted_remotely",
        updatedAt: T1,
      });
      expect(db.countMessages()).toBe(2);
      expect(db.countQuarantined()).toBe(1);
    });

    it("lists messages by local path", () => {
      db.insertMessage(messageRecord("b"));
      db.insertMessage(messageRecord("a", { localPath: "_Quarantine/eml/Inbox/2024/03/a_1030.eml" }));
      db.insertMessage(messageRecord("c"));

      expect(db.listMessages().map((m) => m.immutableId)).toEqual(["a", "b", "c"]);
    });

    it("deletes a message together with its transformations", () => {
      db.insertMessage(messageRecord("a"));
      db.insertMessage(messageRecord("b"));
      db.upsertTransformation({
        messageId: "m-a",
        type: "markdown",
        appliedAt: T0,
        configVersion: "1",
        outputPath: "markdown/Inbox/2024/03/a_1030.md",
      });

      db.deleteMessage("m-a");

      expect(db.getMessage("m-a")).toBeNull();
      expect(db.listTransformations("m-a")).toEqual([]);
      expect(db.countMessages()).toBe(1);
    });
  });

  describe("transformations", () => {
    it("keeps one row per message and type", () => {
      db.insertMessage(messageRecord("a"));
      db.upsertTransformation({
        messageId: "m-a",
        type: "markdown",
        appliedAt: T0,
        configVersion: "1",
        outputPath: "markdown/Inbox/2024/03/a_1030.md",
      });
      db.upsertTransformation({
        messageId: "m-a",
        type: "markdown",
        appliedAt: T1,
        configVersion: "2",
        outputPath: "markdown/Inbox/2024/03/a_1030.md",
      });

      expect(db.listTransformations("m-a")).toEqual([
        {
          messageId: "m-a",
          type: "markdown",
          appliedAt: T1,
          configVersion: "2",
          outputPath: "markdown/Inbox/2024/03/a_1030.md",
        },
      ]);
    });
  });
});

describe("StateDatabase on disk", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mailbox-mirror-state-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates the parent directory and persists across reopen", () => {
    const dbPath = path.join(tmpDir, "nested", ".sync.db");
    const first = new StateDatabase(dbPath);
    first.upsertFolder(folderRecord("inbox", "Inbox"));
    first.close();

    const second = new StateDatabase(dbPath);
    expect(second.getFolder("inbox")?.localPath).toBe("Inbox");
    expect(second.getSchemaVersion()).toBe(SCHEMA_VERSION);
    second.close();
  });
});

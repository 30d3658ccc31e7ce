import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SyncCancelledError } from "../../../src/connectors/core/errors.js";
import { FileArtifactStore } from "../../../src/connectors/core/output.js";
import { StateDatabase } from "../../../src/connectors/core/state.js";
import type { MessageRecord } from "../../../src/connectors/core/types.js";
import { ArchiveVerifier, hasUnresolvedIssues } from "../../../src/connectors/core/verify.js";
import { RECEIVED_AT, RecordingLogger } from "./fake-source.js";

const T0 = "2024-03-05T10:00:00.000Z";

describe("ArchiveVerifier", () => {
  let tmpDir: string;
  let state: StateDatabase;
  let store: FileArtifactStore;
  let logger: RecordingLogger;
  let verifier: ArchiveVerifier;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mailbox-mirror-verify-"));
    state = new StateDatabase(":memory:");
    store = new FileArtifactStore(tmpDir);
    logger = new RecordingLogger();
    verifier = new ArchiveVerifier({ state, store, logger });
  });

  afterEach(() => {
    state.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function storeMessage(id: string, size = id.length): Promise<MessageRecord> {
    const localPath = await store.storeArtifact(Buffer.from(id), "Inbox", `Message ${id}`, RECEIVED_AT);
    const record: MessageRecord = {
      mutableId: `m-${id}`,
      immutableId: id,
      localPath,
      folderPath: "Inbox",
      subject: `Message ${id}`,
      sender: null,
      recipients: null,
      receivedAt: RECEIVED_AT.toISOString(),
      size,
      hasAttachments: false,
      inReplyTo: null,
      conversationId: null,
      quarantinedAt: null,
      quarantineReason: null,
      createdAt: T0,
      updatedAt: T0,
    };
    state.insertMessage(record);
    return record;
  }

  it("reports a healthy archive", async () => {
    await storeMessage("a");
    const report = await verifier.verify({ fix: false });

    expect(report).toEqual({
      checked: 1,
      missing: [],
      untracked: [],
      sizeMismatches: [],
      removedRecords: 0,
    });
    expect(hasUnresolvedIssues(report)).toBe(false);
  });

  it("finds missing, untracked and resized files", async () => {
    await storeMessage("a");
    const gone = await storeMessage("b");
    fs.rmSync(path.join(tmpDir, gone.localPath));
    await storeMessage("c", 99);
    await storeMessage("d", 0);
    fs.writeFileSync(path.join(tmpDir, "eml/Inbox/2024/03/stray.eml"), "x");

    const report = await verifier.verify({ fix: false });

    expect(report).toEqual({
      checked: 4,
      missing: ["eml/Inbox/2024/03/Message b_1030.eml"],
      untracked: ["eml/Inbox/2024/03/stray.eml"],
      sizeMismatches: [{ path: "eml/Inbox/2024/03/Message c_1030.eml", expected: 99, actual: 1 }],
      removedRecords: 0,
    });
    expect(hasUnresolvedIssues(report)).toBe(true);
    expect(state.getMessage("m-b")).not.toBeNull();
  });

  it("tracks quarantined files", async () => {
    const record = await storeMessage("q");
    const quarantined = await store.moveToQuarantine(record.localPath);
    state.markQuarantined("q", quarantined, T0, "deleted_remotely");

    const report = await verifier.verify({ fix: false });

    expect(report.checked).toBe(1);
    expect(report.missing).toEqual([]);
    expect(report.untracked).toEqual([]);
  });

  it("removes index rows for missing files when fixing", async () => {
    await storeMessage("a");
    const gone = await storeMessage("b");
    fs.rmSync(path.join(tmpDir, gone.localPath));

    const report = await verifier.verify({ fix: true });

    expect(report.missing).toEqual([gone.localPath]);
    expect(report.removedRecords).toBe(1);
    expect(hasUnresolvedIssues(report)).toBe(false);
    expect(state.getMessage("m-b")).toBeNull();
    expect(state.countMessages()).toBe(1);

    const again = await verifier.verify({ fix: true });
    expect(again).toMatchObject({ checked: 1, missing: [], removedRecords: 0 });
  });

  it("never deletes untracked files", async () => {
    fs.mkdirSync(path.join(tmpDir, "eml/Inbox"), { recursive: true });
    fs.writeFileSync(path.join(tmpDir, "eml/Inbox/stray.eml"), "x");

    const report = await verifier.verify({ fix: true });

    expect(report.untracked).toEqual(["eml/Inbox/stray.eml"]);
    expect(fs.existsSync(path.join(tmpDir, "eml/Inbox/stray.eml"))).toBe(true);
  });

  it("stops when cancelled", async () => {
    await storeMessage("a");
    const ac = new AbortController();
    ac.abort();

    await expect(verifier.verify({ fix: true, signal: ac.signal })).rejects.toBeInstanceOf(
      SyncCancelledError,
    );
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FolderCheckpoint, runCheckpointGroups } from "../../../src/connectors/core/checkpoint.js";
import { SyncCancelledError } from "../../../src/connectors/core/errors.js";
import { StateDatabase } from "../../../src/connectors/core/state.js";

const NOW = new Date("2024-03-05T10:00:00Z");

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

describe("FolderCheckpoint", () => {
  let state: StateDatabase;

  beforeEach(() => {
    state = new StateDatabase(":memory:");
    state.upsertFolder({
      id: "inbox",
      parentId: null,
      localPath: "Inbox",
      displayName: "Inbox",
      totalItemCount: 0,
      unreadItemCount: 0,
      deltaToken: null,
      lastSyncAt: null,
      createdAt: NOW.toISOString(),
      updatedAt: NOW.toISOString(),
    });
  });

  afterEach(() => {
    state.close();
  });

  it("creates and stores a fresh record", () => {
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, true);
    expect(checkpoint.record).toEqual({
      folderId: "inbox",
      pendingCursor: null,
      pendingPageNumber: 0,
      pendingPosition: 0,
      startedAt: NOW.toISOString(),
      lastCheckpointAt: null,
      processedCount: 0,
    });
    expect(state.getFolderSyncProgress("inbox")).toEqual(checkpoint.record);
  });

  it("resumes a stored record", () => {
    FolderCheckpoint.open(state, "inbox", NOW, true).advance(7, 7, NOW);
    const resumed = FolderCheckpoint.open(state, "inbox", new Date("2024-03-06T00:00:00Z"), true);
    expect(resumed.record.pendingPosition).toBe(7);
    expect(resumed.record.startedAt).toBe(NOW.toISOString());
  });

  it("moving to the next page starts the position over", () => {
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, true);
    checkpoint.advance(10, 10, NOW);
    checkpoint.nextPage("page-2", 1, NOW);

    expect(state.getFolderSyncProgress("inbox")).toMatchObject({
      pendingCursor: "page-2",
      pendingPageNumber: 1,
      pendingPosition: 0,
      processedCount: 10,
    });
  });

  it("reset drops cursor and counts", () => {
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, true);
    checkpoint.nextPage("page-2", 1, NOW);
    checkpoint.advance(4, 4, NOW);
    checkpoint.reset(NOW);

    expect(state.getFolderSyncProgress("inbox")).toMatchObject({
      pendingCursor: null,
      pendingPageNumber: 0,
      pendingPosition: 0,
      processedCount: 0,
      lastCheckpointAt: null,
    });
  });

  it("complete deletes the record", () => {
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, true);
    checkpoint.complete();
    expect(state.getFolderSyncProgress("inbox")).toBeNull();
  });

  it("keeps progress in memory only when not persisting", () => {
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, false);
    checkpoint.advance(5, 5, NOW);
    expect(checkpoint.record.processedCount).toBe(5);
    expect(state.getFolderSyncProgress("inbox")).toBeNull();
  });

  it("writes one checkpoint per group", async () => {
    const save = vi.spyOn(state, "saveFolderSyncProgress");
    const checkpoint = FolderCheckpoint.open(state, "inbox", NOW, true);

    await runCheckpointGroups(range(25), {
      interval: 10,
      parallelism: 4,
      skip: 0,
      worker: async (n) => n,
      onGroupDone: (results, next) => checkpoint.advance(next, results.length, NOW),
    });

    // One save on open, then one per group.
    expect(save).toHaveBeenCalledTimes(4);
    expect(save.mock.calls.slice(1).map(([p]) => [p.pendingPosition, p.processedCount])).toEqual([
      [10, 10],
      [20, 20],
      [25, 25],
    ]);
  });
});

describe("runCheckpointGroups", () => {
  it("returns results in item order", async () => {
    const results = await runCheckpointGroups(range(5), {
      interval: 2,
      parallelism: 2,
      skip: 0,
      worker: async (n) => n * 10,
      onGroupDone: () => {},
    });
    expect(results).toEqual([0, 10, 20, 30, 40]);
  });

  it("skips items handled by an earlier run", async () => {
    const seen: number[] = [];
    const positions: number[] = [];
    await runCheckpointGroups(range(25), {
      interval: 10,
      parallelism: 4,
      skip: 20,
      worker: async (n) => {
        seen.push(n);
        return n;
      },
      onGroupDone: (_results, next) => positions.push(next),
    });
    expect(seen.sort((a, b) => a - b)).toEqual([20, 21, 22, 23, 24]);
    expect(positions).toEqual([25]);
  });

  it("caps concurrency within a group", async () => {
    let active = 0;
    let peak = 0;
    await runCheckpointGroups(range(10), {
      interval: 10,
      parallelism: 3,
      skip: 0,
      worker: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 1));
        active--;
      },
      onGroupDone: () => {},
    });
    expect(peak).toBe(3);
  });

  it("stops between groups once cancelled", async () => {
    const ac = new AbortController();
    const worker = vi.fn(async (n: number) => n);
    await expect(
      runCheckpointGroups(range(25), {
        interval: 10,
        parallelism: 4,
        skip: 0,
        signal: ac.signal,
        worker,
        onGroupDone: () => ac.abort(),
      }),
    ).rejects.toBeInstanceOf(SyncCancelledError);
    expect(worker).toHaveBeenCalledTimes(10);
  });

  it("lets a group settle before surfacing a worker rejection", async () => {
    const failure = new Error("disk full");
    const worker = vi.fn(async (n: number) => {
      if (n === 3) throw failure;
      return n;
    });
    const onGroupDone = vi.fn();

    await expect(
      runCheckpointGroups(range(25), {
        interval: 10,
        parallelism: 4,
        skip: 0,
        worker,
        onGroupDone,
      }),
    ).rejects.toBe(failure);
    expect(worker).toHaveBeenCalledTimes(10);
    expect(onGroupDone).not.toHaveBeenCalled();
  });
});

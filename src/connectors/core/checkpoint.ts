import pLimit from "p-limit";
import { SyncCancelledError } from "./errors.js";
import type { StateDatabase } from "./state.js";
import type { FolderSyncProgressRecord } from "./types.js";

/**
 * Resumable progress for one folder. Mirrors `folder_sync_progress`; with
 * `persist` off (dry run) the record only lives in memory.
 */
export class FolderCheckpoint {
  private current: FolderSyncProgressRecord;

  private constructor(
    record: FolderSyncProgressRecord,
    private readonly state: StateDatabase,
    private readonly persist: boolean,
  ) {
    this.current = record;
  }

  /** Resume the stored record for `folderId`, or start (and store) a fresh one. */
  static open(
    state: StateDatabase,
    folderId: string,
    now: Date,
    persist: boolean,
  ): FolderCheckpoint {
    const stored = state.getFolderSyncProgress(folderId);
    if (stored) return new FolderCheckpoint(stored, state, persist);

    const checkpoint = new FolderCheckpoint(
      {
        folderId,
        pendingCursor: null,
        pendingPageNumber: 0,
        pendingPosition: 0,
        startedAt: now.toISOString(),
        lastCheckpointAt: null,
        processedCount: 0,
      },
      state,
      persist,
    );
    checkpoint.save();
    return checkpoint;
  }

  get record(): Readonly<FolderSyncProgressRecord> {
    return this.current;
  }

  /**
   * Record a finished group of `count` items; `position` is the index on the
   * current page where the next run should pick up.
   */
  advance(position: number, count: number, now: Date): void {
    this.current = {
      ...this.current,
      pendingPosition: position,
      processedCount: this.current.processedCount + count,
      lastCheckpointAt: now.toISOString(),
    };
    this.save();
  }

  /** Point at the next page; the in-page position starts over. */
  nextPage(cursor: string, pageNumber: number, now: Date): void {
    this.current = {
      ...this.current,
      pendingCursor: cursor,
      pendingPageNumber: pageNumber,
      pendingPosition: 0,
      lastCheckpointAt: now.toISOString(),
    };
    this.save();
  }

  complete(): void {
    if (this.persist) this.state.deleteFolderSyncProgress(this.current.folderId);
  }

  /** Drop stored progress and start over from the first page. */
  reset(now: Date): void {
    this.current = {
      ...this.current,
      pendingCursor: null,
      pendingPageNumber: 0,
      pendingPosition: 0,
      startedAt: now.toISOString(),
      lastCheckpointAt: null,
      processedCount: 0,
    };
    this.save();
  }

  private save(): void {
    if (this.persist) this.state.saveFolderSyncProgress(this.current);
  }
}

// ─── Mini-batch runner ───

export interface CheckpointGroupOptions<T, R> {
  /** Items per checkpoint group. */
  interval: number;
  /** Concurrent workers inside a group. */
  parallelism: number;
  /** Leading items already handled by an earlier run. */
  skip: number;
  signal?: AbortSignal;
  worker: (item: T) => Promise<R>;
  /**
   * Runs once per group after every worker in it has settled. `nextPosition`
   * is the index of the first item not yet handled.
   */
  onGroupDone: (results: R[], nextPosition: number) => void;
}

/**
 * Process `items` in consecutive groups of `interval`, running each group
 * concurrently and calling `onGroupDone` as the barrier between groups.
 * Cancellation is observed between groups. A group always settles before a
 * worker's rejection is rethrown, and a rejected group is never reported to
 * `onGroupDone`.
 */
export async function runCheckpointGroups<T, R>(
  items: readonly T[],
  opts: CheckpointGroupOptions<T, R>,
): Promise<R[]> {
  const interval = Math.max(1, opts.interval);
  const limit = pLimit(Math.max(1, opts.parallelism));
  const all: R[] = [];

  for (let start = Math.max(0, opts.skip); start < items.length; start += interval) {
    if (opts.signal?.aborted) throw new SyncCancelledError();
    const group = items.slice(start, start + interval);
    const settled = await Promise.allSettled(
      group.map((item) => limit(() => opts.worker(item))),
    );
    const results: R[] = [];
    for (const outcome of settled) {
      // Workers report per-item failures as values; a rejection aborts the run.
      if (outcome.status === "rejected") throw outcome.reason;
      results.push(outcome.value);
    }
    opts.onGroupDone(results, start + group.length);
    all.push(...results);
  }
  return all;
}

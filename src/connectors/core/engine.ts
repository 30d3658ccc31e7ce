import { FolderCheckpoint, runCheckpointGroups } from "./checkpoint.js";
import {
  classifyTransientError,
  ConfigurationError,
  errorMessage,
  ExitCodes,
  isChangeTrackingInvalid,
  MirrorError,
  RetryExhaustedError,
  SyncCancelledError,
} from "./errors.js";
import { FolderDirectory, filterIncludedFolders } from "./folders.js";
import { MessageMaterializer } from "./materializer.js";
import { partitionPage, Reconciler } from "./reconcile.js";
import { createRetrier, type Retrier, type RetryOptions } from "./retry.js";
import type { StateDatabase } from "./state.js";
import type {
  ArtifactStore,
  DeltaPage,
  DirectoryFolder,
  Logger,
  MaterializeOutcome,
  ProgressObserver,
  RemoteItem,
  RemoteMessageSource,
  SyncError,
  SyncOptions,
  SyncProgress,
  SyncResult,
  Transformer,
} from "./types.js";

export const DEFAULT_SYNC_OPTIONS: SyncOptions = {
  checkpointInterval: 10,
  maxParallelDownloads: 4,
  excludeFolders: [],
  includeFolders: [],
  overlapMinutes: 60,
  dryRun: false,
  transform: { markdown: false },
};

/** Temp files older than this are left over from an interrupted run. */
export const STALE_TEMP_FILE_AGE_MS = 60 * 60 * 1000;

export interface SyncEngineDeps {
  source: RemoteMessageSource;
  state: StateDatabase;
  store: ArtifactStore;
  logger: Logger;
  transformer?: Transformer;
  /** Policy shared by every remote call; `logger` defaults to the engine's. */
  retry?: Omit<RetryOptions, "operation" | "signal">;
  clock?: () => Date;
}

export interface SyncRunOptions {
  signal?: AbortSignal;
  observer?: ProgressObserver;
}

// ─── Run bookkeeping ───

interface Tally {
  synced: number;
  skipped: number;
  failed: number;
}

interface RunContext {
  options: SyncOptions;
  signal: AbortSignal | undefined;
  observer: ProgressObserver | undefined;
  totals: Tally;
  errors: SyncError[];
  totalFolders: number;
  processedFolders: number;
}

interface FolderRun {
  folder: DirectoryFolder;
  checkpoint: FolderCheckpoint;
  tally: Tally;
  pageNumber: number;
  itemsInPage: number;
}

function emptyTally(): Tally {
  return { synced: 0, skipped: 0, failed: 0 };
}

function isRetryable(err: unknown): boolean {
  return err instanceof RetryExhaustedError || classifyTransientError(err).kind !== "fatal";
}

// ─── Engine ───

/**
 * Mirrors every folder of a mailbox, one folder at a time. Each folder
 * streams delta pages, applies deletes and moves, then downloads new items
 * in checkpointed groups so an interrupted run resumes within one group.
 */
export class SyncEngine {
  private readonly source: RemoteMessageSource;
  private readonly state: StateDatabase;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;
  private readonly retry: Retrier;
  private readonly clock: () => Date;
  private readonly directory: FolderDirectory;
  private readonly materializer: MessageMaterializer;
  private readonly reconciler: Reconciler;

  constructor(deps: SyncEngineDeps) {
    this.source = deps.source;
    this.state = deps.state;
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());
    this.retry = createRetrier({ logger: deps.logger, ...deps.retry });

    this.directory = new FolderDirectory({
      source: this.source,
      retry: this.retry,
      logger: this.logger,
    });
    this.materializer = new MessageMaterializer({
      state: this.state,
      store: this.store,
      source: this.source,
      retry: this.retry,
      logger: this.logger,
      transformer: deps.transformer,
    });
    this.reconciler = new Reconciler({
      state: this.state,
      store: this.store,
      logger: this.logger,
    });
  }

  async sync(options: SyncOptions, run: SyncRunOptions = {}): Promise<SyncResult> {
    const startedAt = Date.now();
    const ctx: RunContext = {
      options,
      signal: run.signal,
      observer: run.observer,
      totals: emptyTally(),
      errors: [],
      totalFolders: 0,
      processedFolders: 0,
    };
    let mailbox: string | null = options.mailbox ?? null;

    const finish = (status: SyncResult["status"]): SyncResult => ({
      mailbox,
      status,
      dryRun: options.dryRun,
      itemsSynced: ctx.totals.synced,
      itemsSkipped: ctx.totals.skipped,
      itemsFailed: ctx.totals.failed,
      foldersProcessed: ctx.processedFolders,
      errors: ctx.errors,
      durationMs: Date.now() - startedAt,
    });

    try {
      this.logger.info("Starting sync", {
        dryRun: options.dryRun,
        parallel: options.maxParallelDownloads,
        checkpointInterval: options.checkpointInterval,
      });

      if (!options.dryRun) {
        const swept = await this.store.sweepTempFiles(STALE_TEMP_FILE_AGE_MS);
        if (swept > 0) this.logger.info(`Removed ${swept} stale temp file(s)`);
      }

      const resolved =
        options.mailbox ??
        (await this.retry(
          "resolve mailbox",
          () => this.source.getMailboxIdentity(run.signal),
          run.signal,
        ));
      mailbox = resolved;
      this.logger.info(`Syncing mailbox ${resolved}`);

      const startTime = this.clock().toISOString();
      const syncState = this.state.getSyncState(resolved) ?? {
        mailbox: resolved,
        lastSyncAt: null,
        lastDeltaToken: null,
        createdAt: startTime,
        updatedAt: startTime,
      };
      if (!options.dryRun) this.state.upsertSyncState(syncState);

      this.emit(ctx, { phase: "enumerating-folders", currentFolder: null });
      const folders = await this.directory.enumerate(options.excludeFolders, run.signal);
      // Every enumerated folder is stored so parents exist for the selected ones.
      if (!options.dryRun) this.directory.persist(folders, this.state, this.clock());
      const selected = filterIncludedFolders(folders, options.includeFolders);
      if (selected.length === 0 && options.includeFolders.length > 0) {
        throw new ConfigurationError(`No folder matches ${options.includeFolders.join(", ")}`);
      }
      ctx.totalFolders = selected.length;
      this.logger.info(`Found ${selected.length} folder(s) to sync`);

      for (const folder of selected) {
        if (run.signal?.aborted) throw new SyncCancelledError();
        await this.syncFolder(folder, ctx, false);
        ctx.processedFolders++;
      }

      if (!options.dryRun) {
        const finishedAt = this.clock().toISOString();
        this.state.upsertSyncState({ ...syncState, lastSyncAt: finishedAt, updatedAt: finishedAt });
      }

      this.emit(ctx, { phase: "completed", currentFolder: null });
      const result = finish("completed");
      this.logger.info(
        `Sync complete: ${result.itemsSynced} synced, ${result.itemsSkipped} skipped, ${result.itemsFailed} failed`,
        { durationMs: result.durationMs },
      );
      return result;
    } catch (err) {
      if (err instanceof SyncCancelledError) {
        this.logger.warn("Sync cancelled; progress is saved up to the last checkpoint");
        return finish("cancelled");
      }
      const message = errorMessage(err);
      this.logger.error(`Sync failed: ${message}`);
      ctx.errors.push({ entity: "sync", error: message, retryable: isRetryable(err) });
      return finish("failed");
    }
  }

  // ─── Per-folder state machine ───

  /**
   * `forceFull` ignores the stored change cursor; it is set when a cursor
   * turned out invalid and there is no earlier sync time to fall back on.
   */
  private async syncFolder(
    folder: DirectoryFolder,
    ctx: RunContext,
    forceFull: boolean,
  ): Promise<void> {
    const { options, signal } = ctx;
    const stored = this.state.getFolder(folder.id);
    const checkpoint = FolderCheckpoint.open(
      this.state,
      folder.id,
      this.clock(),
      !options.dryRun,
    );
    if (forceFull) checkpoint.reset(this.clock());

    const resume = checkpoint.record;
    let cursor = resume.pendingCursor ?? (forceFull ? null : (stored?.deltaToken ?? null));
    let skip = resume.pendingPosition;
    const fr: FolderRun = {
      folder,
      checkpoint,
      tally: emptyTally(),
      pageNumber: resume.pendingPageNumber,
      itemsInPage: 0,
    };

    this.logger.info(`Syncing folder ${folder.path}`, {
      mode: cursor ? "incremental" : "full",
      resumeAt: skip > 0 ? skip : undefined,
    });
    this.emit(ctx, { phase: "syncing-folder", currentFolder: folder.path }, fr);

    let finalCursor: string | null = null;
    let usedFallback = false;

    for (;;) {
      if (signal?.aborted) throw new SyncCancelledError();

      let page: DeltaPage;
      try {
        const pageCursor = cursor;
        page = await this.retry(
          "fetch delta page",
          () => this.source.fetchDeltaPage(folder.id, pageCursor, signal),
          signal,
        );
      } catch (err) {
        if (!isChangeTrackingInvalid(err)) throw err;

        const lastSyncAt = stored?.lastSyncAt ?? null;
        if (lastSyncAt) {
          this.logger.warn(`Change cursor rejected for ${folder.path}, syncing by date`, {
            error: errorMessage(err),
          });
          await this.syncSinceDate(fr, ctx, new Date(lastSyncAt));
          usedFallback = true;
          break;
        }
        if (forceFull) throw err;

        this.logger.warn(`Change cursor rejected for ${folder.path}, restarting full sync`, {
          error: errorMessage(err),
        });
        return this.syncFolder(folder, ctx, true);
      }

      fr.pageNumber++;
      fr.itemsInPage = page.items.length;
      await this.processPage(page.items, skip, fr, ctx);
      skip = 0;
      this.emit(ctx, { phase: "downloading", currentFolder: folder.path }, fr);

      if (!page.hasMorePages) {
        finalCursor = page.finalCursor;
        break;
      }
      if (!page.nextPageCursor) {
        throw new MirrorError(
          `Folder ${folder.path}: page ${fr.pageNumber} reported more pages but no cursor`,
          ExitCodes.network,
        );
      }
      cursor = page.nextPageCursor;
      checkpoint.nextPage(cursor, fr.pageNumber, this.clock());
    }

    if (!options.dryRun) {
      const current = this.state.getFolder(folder.id);
      if (current) {
        const now = this.clock().toISOString();
        // A date fallback yields no cursor; the stored one is kept.
        const deltaToken = usedFallback ? current.deltaToken : (finalCursor ?? current.deltaToken);
        this.state.upsertFolder({ ...current, deltaToken, lastSyncAt: now, updatedAt: now });
      }
      checkpoint.complete();
    }

    this.logger.info(`Completed folder ${folder.path}`, {
      synced: fr.tally.synced,
      skipped: fr.tally.skipped,
      failed: fr.tally.failed,
      fallback: usedFallback || undefined,
    });
  }

  private async syncSinceDate(fr: FolderRun, ctx: RunContext, lastSyncAt: Date): Promise<void> {
    const { signal, options } = ctx;
    const since = new Date(lastSyncAt.getTime() - options.overlapMinutes * 60_000);
    const items = await this.retry(
      "fetch messages since date",
      () => this.source.fetchSinceDate(fr.folder.id, since, signal),
      signal,
    );
    this.logger.debug(`Date fallback returned ${items.length} item(s)`, {
      since: since.toISOString(),
    });

    fr.pageNumber = 1;
    fr.itemsInPage = items.length;
    await this.processPage(items, 0, fr, ctx);
    this.emit(ctx, { phase: "downloading", currentFolder: fr.folder.path }, fr);
  }

  /** Deletes and moves first, then new items in checkpointed groups. */
  private async processPage(
    items: readonly RemoteItem[],
    skip: number,
    fr: FolderRun,
    ctx: RunContext,
  ): Promise<void> {
    const { options } = ctx;
    const { deleted, moved, upserts } = partitionPage(items);

    const deletes = await this.reconciler.applyDeletes(deleted, options.dryRun);
    const moves = await this.reconciler.applyMoves(moved, options.dryRun);
    for (const summary of [deletes, moves]) {
      fr.tally.failed += summary.errors.length;
      ctx.totals.failed += summary.errors.length;
      ctx.errors.push(...summary.errors);
    }

    await runCheckpointGroups(upserts, {
      interval: options.checkpointInterval,
      parallelism: options.maxParallelDownloads,
      skip,
      signal: ctx.signal,
      worker: (item) =>
        this.materializer.materialize(item, fr.folder.path, {
          dryRun: options.dryRun,
          transform: options.transform,
          signal: ctx.signal,
        }),
      onGroupDone: (results, nextPosition) => {
        for (const outcome of results) this.count(outcome, fr, ctx);
        fr.checkpoint.advance(nextPosition, results.length, this.clock());
        this.emit(ctx, { phase: "downloading", currentFolder: fr.folder.path }, fr);
      },
    });
  }

  private count(outcome: MaterializeOutcome, fr: FolderRun, ctx: RunContext): void {
    switch (outcome.status) {
      case "synced":
        fr.tally.synced++;
        ctx.totals.synced++;
        break;
      case "skipped":
        fr.tally.skipped++;
        ctx.totals.skipped++;
        break;
      case "error":
        fr.tally.failed++;
        ctx.totals.failed++;
        ctx.errors.push(outcome.error);
        break;
    }
  }

  // ─── Progress ───

  private emit(
    ctx: RunContext,
    where: Pick<SyncProgress, "phase" | "currentFolder">,
    fr?: FolderRun,
  ): void {
    if (!ctx.observer) return;
    const progress: SyncProgress = {
      ...where,
      totalFolders: ctx.totalFolders,
      processedFolders: ctx.processedFolders,
      totalItemsInFolder: fr?.folder.totalItemCount ?? 0,
      processedInFolder: fr ? fr.tally.synced + fr.tally.skipped + fr.tally.failed : 0,
      itemsSynced: ctx.totals.synced,
      currentPage: fr?.pageNumber ?? 0,
      itemsInPage: fr?.itemsInPage ?? 0,
    };
    try {
      ctx.observer.onProgress(progress);
    } catch (err) {
      this.logger.warn("Progress observer threw", { error: errorMessage(err) });
    }
  }
}

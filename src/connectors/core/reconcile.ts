import { ArtifactNotFoundError, errorMessage, isFatalLocalError } from "./errors.js";
import type { StateDatabase } from "./state.js";
import type { ArtifactStore, Logger, RemoteItem, SyncError } from "./types.js";

export const DELETED_REMOTELY = "deleted_remotely";

// ─── Page partitioning ───

export interface PartitionedPage {
  deleted: RemoteItem[];
  moved: RemoteItem[];
  upserts: RemoteItem[];
}

/**
 * Split a page by annotation. When one immutable id shows up more than once
 * in a page, only its last entry counts.
 */
export function partitionPage(items: readonly RemoteItem[]): PartitionedPage {
  const lastIndex = new Map<string, number>();
  items.forEach((item, index) => lastIndex.set(item.identity.immutableId, index));

  const page: PartitionedPage = { deleted: [], moved: [], upserts: [] };
  items.forEach((item, index) => {
    if (lastIndex.get(item.identity.immutableId) !== index) return;
    switch (item.change.kind) {
      case "deleted":
        page.deleted.push(item);
        break;
      case "moved":
        page.moved.push(item);
        break;
      case "upsert":
        page.upserts.push(item);
        break;
    }
  });
  return page;
}

// ─── Handlers ───

export type ReconcileOutcome = "applied" | "unchanged" | "skipped";

export interface ReconcilerDeps {
  state: StateDatabase;
  store: ArtifactStore;
  logger: Logger;
}

export interface ReconcileSummary {
  applied: number;
  errors: SyncError[];
}

/**
 * Applies remote move and delete annotations to stored artifacts and their
 * index rows. Every failure is scoped to its own item.
 */
export class Reconciler {
  private readonly state: StateDatabase;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;

  constructor(deps: ReconcilerDeps) {
    this.state = deps.state;
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async applyDeletes(items: readonly RemoteItem[], dryRun: boolean): Promise<ReconcileSummary> {
    return this.applyEach(items, "delete", (item) => this.applyDelete(item, dryRun));
  }

  async applyMoves(items: readonly RemoteItem[], dryRun: boolean): Promise<ReconcileSummary> {
    return this.applyEach(items, "move", (item) => this.applyMove(item, dryRun));
  }

  async applyDelete(item: RemoteItem, dryRun: boolean): Promise<ReconcileOutcome> {
    const { immutableId, mutableId } = item.identity;
    const message =
      this.state.getMessageByImmutableId(immutableId) ?? this.state.getMessage(mutableId);
    if (!message) {
      this.logger.debug("Deleted message not in index, skipping", { immutableId });
      return "skipped";
    }
    if (message.quarantinedAt) return "unchanged";

    if (dryRun) {
      this.logger.debug("Would quarantine message", { immutableId, path: message.localPath });
      return "applied";
    }

    let localPath = message.localPath;
    try {
      localPath = await this.store.moveToQuarantine(message.localPath);
    } catch (err) {
      if (!(err instanceof ArtifactNotFoundError)) throw err;
      this.logger.warn("Artifact missing for deleted message, updating index only", {
        immutableId,
        path: message.localPath,
      });
    }

    this.state.markQuarantined(
      message.immutableId,
      localPath,
      new Date().toISOString(),
      DELETED_REMOTELY,
    );
    return "applied";
  }

  async applyMove(item: RemoteItem, dryRun: boolean): Promise<ReconcileOutcome> {
    const { immutableId } = item.identity;
    const message = this.state.getMessageByImmutableId(immutableId);
    if (!message) {
      this.logger.debug("Moved message not in index, skipping", { immutableId });
      return "skipped";
    }
    if (message.quarantinedAt) return "unchanged";

    const newParentId = item.change.kind === "moved" ? item.change.newParentId : null;
    if (!newParentId) {
      this.logger.warn("Moved message has no destination folder", { immutableId });
      return "skipped";
    }
    const destination = this.state.getFolder(newParentId);
    if (!destination) {
      this.logger.warn("Destination folder not in index, skipping move", {
        immutableId,
        folderId: newParentId,
      });
      return "skipped";
    }
    if (destination.localPath.toLowerCase() === message.folderPath.toLowerCase()) {
      return "unchanged";
    }

    if (dryRun) {
      this.logger.debug("Would move message", {
        immutableId,
        from: message.folderPath,
        to: destination.localPath,
      });
      return "applied";
    }

    const newPath = await this.store.moveArtifact(message.localPath, destination.localPath);
    this.state.updateMessageLocation(
      message.immutableId,
      newPath,
      destination.localPath,
      new Date().toISOString(),
    );
    return "applied";
  }

  private async applyEach(
    items: readonly RemoteItem[],
    action: string,
    apply: (item: RemoteItem) => Promise<ReconcileOutcome>,
  ): Promise<ReconcileSummary> {
    const summary: ReconcileSummary = { applied: 0, errors: [] };
    for (const item of items) {
      try {
        if ((await apply(item)) === "applied") summary.applied++;
      } catch (err) {
        if (isFatalLocalError(err)) throw err;
        const message = errorMessage(err);
        this.logger.error(`Failed to ${action} message ${item.identity.immutableId}`, {
          error: message,
        });
        summary.errors.push({
          entity: `${action}:${item.identity.immutableId}`,
          error: message,
          retryable: false,
        });
      }
    }
    return summary;
  }
}

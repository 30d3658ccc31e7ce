import {
  classifyTransientError,
  errorMessage,
  isFatalLocalError,
  RetryExhaustedError,
  SyncCancelledError,
} from "./errors.js";
import type { Retrier } from "./retry.js";
import type { StateDatabase } from "./state.js";
import type {
  ArtifactStore,
  Logger,
  MaterializeOutcome,
  MessageRecord,
  RemoteItem,
  RemoteMessageSource,
  SyncError,
  TransformOptions,
  Transformer,
} from "./types.js";

export interface MaterializerDeps {
  state: StateDatabase;
  store: ArtifactStore;
  source: RemoteMessageSource;
  retry: Retrier;
  logger: Logger;
  transformer?: Transformer;
}

export interface MaterializeOptions {
  dryRun: boolean;
  transform: TransformOptions;
  /** Aborts waits between download attempts; the request itself runs to completion. */
  signal?: AbortSignal;
}

function isRetryable(err: unknown): boolean {
  return err instanceof RetryExhaustedError || classifyTransientError(err).kind !== "fatal";
}

/**
 * Ensures exactly one stored artifact per remote item. The immutable id is
 * the dedupe key; the mutable id is only used to download.
 */
export class MessageMaterializer {
  private readonly deps: MaterializerDeps;

  constructor(deps: MaterializerDeps) {
    this.deps = deps;
  }

  async materialize(
    item: RemoteItem,
    folderPath: string,
    opts: MaterializeOptions,
  ): Promise<MaterializeOutcome> {
    const { state, store, source, retry, logger } = this.deps;
    const { mutableId, immutableId } = item.identity;

    if (state.getMessageByImmutableId(immutableId)) {
      return { status: "skipped" };
    }
    if (opts.dryRun) {
      logger.debug("Would download message", { immutableId, folder: folderPath });
      return { status: "synced", message: null };
    }

    let storedPath: string | null = null;
    try {
      const content = await retry(
        "download message",
        () => source.fetchRawContent(mutableId),
        opts.signal,
      );
      storedPath = await store.storeArtifact(
        content,
        folderPath,
        item.subject,
        item.receivedAt,
      );
      const size = await store.getSize(storedPath);

      const now = new Date().toISOString();
      const message: MessageRecord = {
        mutableId,
        immutableId,
        localPath: storedPath,
        folderPath,
        subject: item.subject,
        sender: item.sender,
        recipients: item.recipients.length > 0 ? JSON.stringify(item.recipients) : null,
        receivedAt: item.receivedAt.toISOString(),
        size,
        hasAttachments: item.hasAttachments,
        inReplyTo: item.inReplyTo,
        conversationId: item.conversationId,
        quarantinedAt: null,
        quarantineReason: null,
        createdAt: now,
        updatedAt: now,
      };
      state.insertMessage(message);

      await this.transform(message, opts.transform);
      return { status: "synced", message };
    } catch (err) {
      if (isFatalLocalError(err) || err instanceof SyncCancelledError) throw err;

      if (storedPath) {
        // Without an index row the artifact would be stored again next run.
        await store.removeArtifact(storedPath).catch((cleanupErr: unknown) => {
          logger.warn("Could not remove orphaned artifact", {
            path: storedPath,
            error: errorMessage(cleanupErr),
          });
        });
      }

      const error: SyncError = {
        entity: `message:${immutableId}`,
        error: errorMessage(err),
        retryable: isRetryable(err),
      };
      logger.error(`Failed to materialize message ${immutableId}`, {
        folder: folderPath,
        error: error.error,
      });
      return { status: "error", error };
    }
  }

  private async transform(message: MessageRecord, options: TransformOptions): Promise<void> {
    const { transformer, logger } = this.deps;
    if (!transformer || !options.markdown) return;
    try {
      const ok = await transformer.transformSingleMessage(message, options);
      if (!ok) {
        logger.warn("Transformation failed", { message: message.immutableId });
      }
    } catch (err) {
      logger.warn("Transformation failed", {
        message: message.immutableId,
        error: errorMessage(err),
      });
    }
  }
}

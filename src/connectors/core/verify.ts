import { ArtifactNotFoundError, SyncCancelledError } from "./errors.js";
import type { StateDatabase } from "./state.js";
import type { ArtifactStore, Logger } from "./types.js";

export interface SizeMismatch {
  path: string;
  expected: number;
  actual: number;
}

export interface VerifyReport {
  /** Index rows checked against the archive. */
  checked: number;
  /** Indexed paths with no file behind them. */
  missing: string[];
  /** `.eml` files the index does not know about. */
  untracked: string[];
  sizeMismatches: SizeMismatch[];
  /** Rows deleted by `fix`; always 0 otherwise. */
  removedRecords: number;
}

export interface VerifyOptions {
  /** Delete index rows whose file is gone. */
  fix: boolean;
  signal?: AbortSignal;
}

export interface ArchiveVerifierDeps {
  state: StateDatabase;
  store: ArtifactStore;
  logger: Logger;
}

/**
 * Cross-checks the message index against the files on disk. Files are never
 * touched; `fix` only drops index rows for files that no longer exist.
 */
export class ArchiveVerifier {
  private readonly state: StateDatabase;
  private readonly store: ArtifactStore;
  private readonly logger: Logger;

  constructor(deps: ArchiveVerifierDeps) {
    this.state = deps.state;
    this.store = deps.store;
    this.logger = deps.logger;
  }

  async verify(opts: VerifyOptions): Promise<VerifyReport> {
    const messages = this.state.listMessages();
    this.logger.info(`Checking ${messages.length} indexed message(s)`);

    const report: VerifyReport = {
      checked: 0,
      missing: [],
      untracked: [],
      sizeMismatches: [],
      removedRecords: 0,
    };
    const tracked = new Set<string>();

    for (const message of messages) {
      if (opts.signal?.aborted) throw new SyncCancelledError("Verification was cancelled");
      tracked.add(message.localPath);
      report.checked++;

      let actual: number;
      try {
        actual = await this.store.getSize(message.localPath);
      } catch (err) {
        if (!(err instanceof ArtifactNotFoundError)) throw err;
        report.missing.push(message.localPath);
        if (opts.fix) {
          this.state.deleteMessage(message.mutableId);
          report.removedRecords++;
          this.logger.debug("Removed index row for missing file", { path: message.localPath });
        }
        continue;
      }

      // Size 0 means the size was never recorded.
      if (message.size > 0 && actual !== message.size) {
        report.sizeMismatches.push({ path: message.localPath, expected: message.size, actual });
      }
    }

    if (opts.signal?.aborted) throw new SyncCancelledError("Verification was cancelled");
    report.untracked = (await this.store.listArtifacts()).filter((p) => !tracked.has(p));

    this.logger.info(
      `Verified ${report.checked} message(s): ${report.missing.length} missing, ${report.untracked.length} untracked, ${report.sizeMismatches.length} size mismatch(es)`,
    );
    return report;
  }
}

/** True when the report holds a problem `fix` did not resolve. */
export function hasUnresolvedIssues(report: VerifyReport): boolean {
  return (
    report.missing.length > report.removedRecords ||
    report.untracked.length > 0 ||
    report.sizeMismatches.length > 0
  );
}

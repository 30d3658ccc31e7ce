#!/usr/bin/env node
import * as fs from "node:fs";
import * as path from "node:path";
import { Command, InvalidArgumentError } from "commander";
import { config as loadDotenv } from "dotenv";
import { GraphMailClient } from "../outlook/index.js";
import { type ConfigOverride, loadConfig, type MirrorConfig, toSyncOptions } from "./config.js";
import { SyncEngine } from "./engine.js";
import { ConfigurationError, errorMessage, ExitCodes, MirrorError } from "./errors.js";
import { createLogger } from "./logger.js";
import { createArtifactStore } from "./output.js";
import { createRateLimiter } from "./rate-limiter.js";
import { exponentialBackoff } from "./retry.js";
import { DEFAULT_DB_FILENAME, StateDatabase } from "./state.js";
import { MarkdownCardTransformer } from "./transform.js";
import type { SyncResult } from "./types.js";
import { ArchiveVerifier, hasUnresolvedIssues, type VerifyReport } from "./verify.js";

loadDotenv();
loadDotenv({ path: ".env.local", override: true });

interface CommonOptions {
  config?: string;
  output?: string;
  verbose?: boolean;
}

interface SyncCommandOptions extends CommonOptions {
  mailbox?: string;
  parallel?: number;
  checkpointInterval?: number;
  exclude?: string[];
  folder?: string[];
  dryRun?: boolean;
  markdown?: boolean;
}

interface VerifyCommandOptions extends CommonOptions {
  fix?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function resolveConfig(opts: SyncCommandOptions): MirrorConfig {
  const overrides: ConfigOverride[] = [];
  if (opts.mailbox) overrides.push({ path: ["mailbox"], value: opts.mailbox });
  if (opts.output) overrides.push({ path: ["outputPath"], value: opts.output });
  if (opts.parallel) overrides.push({ path: ["sync", "parallel"], value: opts.parallel });
  if (opts.checkpointInterval) {
    overrides.push({ path: ["sync", "checkpointInterval"], value: opts.checkpointInterval });
  }
  if (opts.exclude && opts.exclude.length > 0) {
    overrides.push({ path: ["sync", "excludeFolders"], value: opts.exclude });
  }
  if (opts.markdown) overrides.push({ path: ["transform", "markdown"], value: true });
  if (opts.verbose) overrides.push({ path: ["verbose"], value: true });
  return loadConfig({ configPath: opts.config, overrides }).config;
}

function fail(err: unknown): never {
  if (err instanceof ConfigurationError) {
    console.error(`✗ ${err.message}`);
    if (err.configFilePath) console.error(`  (config file: ${err.configFilePath})`);
  } else {
    console.error(`✗ ${errorMessage(err)}`);
  }
  process.exit(err instanceof MirrorError ? err.exitCode : ExitCodes.general);
}

function printSummary(r: SyncResult): void {
  console.log("\n═══ Sync Summary ═══\n");
  const status = r.status === "completed" && r.errors.length === 0 ? "✓" : "⚠";
  console.log(
    `${status} ${r.mailbox ?? "(unknown mailbox)"}${r.dryRun ? " [dry run]" : ""}: ${r.status}`,
  );
  console.log(
    `  ${r.itemsSynced} synced, ${r.itemsSkipped} skipped, ${r.itemsFailed} failed, ${r.foldersProcessed} folder(s) [${(r.durationMs / 1000).toFixed(1)}s]`,
  );
  for (const err of r.errors.slice(0, 5)) {
    console.log(`  ✗ ${err.entity}: ${err.error}`);
  }
  if (r.errors.length > 5) {
    console.log(`  ... and ${r.errors.length - 5} more errors`);
  }
}

function printVerifyReport(r: VerifyReport): void {
  console.log("\n═══ Verify Summary ═══\n");
  const sections: Array<[string, string[]]> = [
    ["Missing files (indexed, not on disk)", r.missing],
    ["Untracked files (on disk, not indexed)", r.untracked],
    [
      "Size mismatches",
      r.sizeMismatches.map((m) => `${m.path} (expected ${m.expected} bytes, found ${m.actual})`),
    ],
  ];
  let clean = true;
  for (const [title, lines] of sections) {
    if (lines.length === 0) continue;
    clean = false;
    console.log(`⚠ ${title}: ${lines.length}`);
    for (const line of lines.slice(0, 10)) console.log(`  - ${line}`);
    if (lines.length > 10) console.log(`  ... and ${lines.length - 10} more`);
  }
  if (clean) console.log("✓ No issues found. Archive is healthy.");
  if (r.removedRecords > 0) console.log(`✓ Removed ${r.removedRecords} index row(s) for missing files`);
  else if (r.missing.length > 0) console.log("  Run with --fix to remove index rows for missing files.");
  console.log(`\nFiles checked: ${r.checked}`);
}

function exitCodeFor(result: SyncResult): number {
  if (result.status === "cancelled") return ExitCodes.cancelled;
  if (result.status === "failed" || result.itemsFailed > 0) return ExitCodes.general;
  return ExitCodes.success;
}

const program = new Command()
  .name("mailbox-mirror")
  .description("Mirror a remote mailbox into a local archive of .eml files")
  .version("1.0.0");

program
  .command("sync")
  .description("Download new mail and apply remote moves and deletions")
  .option("-c, --config <path>", "Config file (default: ./config.yaml, then ~/.config/mailbox-mirror/config.yaml)")
  .option("--mailbox <address>", "Mailbox to sync (default: the signed-in user)")
  .option("--output <dir>", "Archive directory")
  .option("--parallel <n>", "Concurrent downloads per checkpoint group", parsePositiveInt)
  .option("--checkpoint-interval <n>", "Items per checkpoint", parsePositiveInt)
  .option("--exclude <pattern>", "Folder name or glob to skip (repeatable)", collect)
  .option("--folder <pattern>", "Only sync this folder and its subfolders (repeatable)", collect)
  .option("--markdown", "Write a Markdown card for each new message")
  .option("--dry-run", "Report what would be synced without writing anything")
  .option("-v, --verbose", "Debug logging")
  .action(async (opts: SyncCommandOptions) => {
    let config: MirrorConfig;
    try {
      config = resolveConfig(opts);
      if (!config.accessToken) {
        throw new ConfigurationError(
          "No access token configured. Set MAILBOX_MIRROR_ACCESS_TOKEN or accessToken in the config file.",
        );
      }
    } catch (err) {
      fail(err);
    }

    const logger = createLogger("mirror", { verbose: config.verbose });
    const outputDir = path.resolve(config.outputPath);
    const accessToken = config.accessToken;

    const state = new StateDatabase(path.join(outputDir, DEFAULT_DB_FILENAME));
    const source = new GraphMailClient(
      {
        tokenProvider: () => accessToken ?? "",
        mailbox: config.mailbox,
        baseUrl: config.graph.baseUrl,
        pageSize: config.sync.pageSize,
      },
      createRateLimiter({
        maxRequests: config.graph.maxRequests,
        windowMs: config.graph.windowMs,
        minDelayMs: config.graph.minDelayMs,
      }),
      logger.child("graph"),
    );
    const engine = new SyncEngine({
      source,
      state,
      store: createArtifactStore(outputDir, logger.child("store")),
      logger,
      transformer: new MarkdownCardTransformer({
        rootDir: outputDir,
        state,
        logger: logger.child("markdown"),
      }),
      retry: {
        maxAttempts: config.retry.maxAttempts,
        backoff: exponentialBackoff({
          baseDelayMs: config.retry.baseDelayMs,
          maxDelayMs: config.retry.maxDelayMs,
          jitterFactor: config.retry.jitterFactor,
          defaultRetryAfterMs: config.retry.defaultRetryAfterMs,
        }),
      },
    });

    const ac = new AbortController();
    const onSigint = () => {
      if (ac.signal.aborted) {
        console.error("\nForced exit.");
        process.exit(ExitCodes.cancelled);
      }
      logger.warn("Received interrupt, finishing current checkpoint group...");
      ac.abort();
    };
    process.on("SIGINT", onSigint);

    let result: SyncResult;
    try {
      result = await engine.sync(toSyncOptions(config, opts.dryRun ?? false, opts.folder ?? []), {
        signal: ac.signal,
        observer: {
          onProgress: (p) => {
            if (p.phase === "downloading" && p.currentFolder) {
              logger.progress(
                p.processedInFolder,
                Math.max(p.totalItemsInFolder, p.processedInFolder),
                p.currentFolder,
              );
            }
          },
        },
      });
    } finally {
      process.removeListener("SIGINT", onSigint);
      state.close();
    }

    printSummary(result);
    process.exit(exitCodeFor(result));
  });

program
  .command("status")
  .description("Show what the local archive holds")
  .option("-c, --config <path>", "Config file")
  .option("--output <dir>", "Archive directory")
  .action((opts: CommonOptions) => {
    let config: MirrorConfig;
    try {
      config = resolveConfig(opts);
    } catch (err) {
      fail(err);
    }

    const dbPath = path.join(path.resolve(config.outputPath), DEFAULT_DB_FILENAME);
    if (!fs.existsSync(dbPath)) {
      console.log(`No sync state found at ${dbPath}`);
      return;
    }

    const state = new StateDatabase(dbPath);
    try {
      const mailboxes = state.listSyncStates();
      if (mailboxes.length === 0) console.log("No mailbox synced yet");
      for (const s of mailboxes) {
        console.log(`${s.mailbox}: last synced ${s.lastSyncAt ?? "never"}`);
      }

      const folders = state.listFolders();
      const pending = state.listInProgressFolders();
      console.log(`Folders: ${folders.length}`);
      if (pending.length > 0) {
        const byId = new Map(folders.map((f) => [f.id, f.localPath]));
        console.log(`Interrupted (resume on next sync): ${pending.length}`);
        for (const p of pending) {
          console.log(
            `  - ${byId.get(p.folderId) ?? p.folderId}: ${p.processedCount} processed, page ${p.pendingPageNumber}`,
          );
        }
      }
      console.log(`Messages: ${state.countMessages()} (${state.countQuarantined()} quarantined)`);
    } finally {
      state.close();
    }
  });

program
  .command("verify")
  .description("Check the index against the archive files")
  .option("-c, --config <path>", "Config file")
  .option("--output <dir>", "Archive directory")
  .option("--fix", "Remove index rows whose file is missing")
  .option("-v, --verbose", "Debug logging")
  .action(async (opts: VerifyCommandOptions) => {
    let config: MirrorConfig;
    try {
      config = resolveConfig(opts);
    } catch (err) {
      fail(err);
    }

    const outputDir = path.resolve(config.outputPath);
    const dbPath = path.join(outputDir, DEFAULT_DB_FILENAME);
    if (!fs.existsSync(dbPath)) {
      console.log(`No sync state found at ${dbPath}`);
      return;
    }

    const logger = createLogger("verify", { verbose: config.verbose });
    const state = new StateDatabase(dbPath);
    const ac = new AbortController();
    const onSigint = () => ac.abort();
    process.on("SIGINT", onSigint);

    let report: VerifyReport;
    try {
      report = await new ArchiveVerifier({
        state,
        store: createArtifactStore(outputDir, logger.child("store")),
        logger,
      }).verify({ fix: opts.fix ?? false, signal: ac.signal });
    } catch (err) {
      fail(err);
    } finally {
      process.removeListener("SIGINT", onSigint);
      state.close();
    }

    printVerifyReport(report);
    process.exit(hasUnresolvedIssues(report) ? ExitCodes.general : ExitCodes.success);
  });

await program.parseAsync(process.argv);

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "./errors.js";
import type { SyncOptions } from "./types.js";

export const ENV_PREFIX = "MAILBOX_MIRROR_";
export const CONFIG_FILENAME = "config.yaml";
export const DEFAULT_GRAPH_BASE_URL = "https://graph.microsoft.com/v1.0";

// ─── Schema ───

const ConfigSchema = z.object({
  mailbox: z.string().min(1).optional(),
  outputPath: z.string().min(1).default("./data"),
  accessToken: z.string().min(1).optional(),
  graph: z
    .object({
      baseUrl: z.string().url().default(DEFAULT_GRAPH_BASE_URL),
      maxRequests: z.number().int().positive().default(10_000),
      windowMs: z.number().int().positive().default(600_000),
      minDelayMs: z.number().int().min(0).default(0),
    })
    .default({}),
  sync: z
    .object({
      checkpointInterval: z.number().int().min(1).default(10),
      parallel: z.number().int().min(1).max(32).default(4),
      overlapMinutes: z.number().int().min(0).default(60),
      pageSize: z.number().int().min(1).max(1000).default(50),
      excludeFolders: z.array(z.string()).default([]),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(5),
      baseDelayMs: z.number().int().min(0).default(1000),
      maxDelayMs: z.number().int().min(0).default(120_000),
      jitterFactor: z.number().min(0).max(1).default(0.2),
      defaultRetryAfterMs: z.number().int().min(0).default(30_000),
    })
    .default({}),
  transform: z
    .object({
      markdown: z.boolean().default(false),
    })
    .default({}),
  verbose: z.boolean().default(false),
});

export type MirrorConfig = z.infer<typeof ConfigSchema>;

// ─── Overrides ───

export interface ConfigOverride {
  path: readonly string[];
  value: unknown;
}

function asNumber(value: string): unknown {
  const trimmed = value.trim();
  return /^-?\d+(\.\d+)?$/.test(trimmed) ? Number(trimmed) : value;
}

function asBoolean(value: string): unknown {
  const lower = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(lower)) return true;
  if (["false", "0", "no", "off"].includes(lower)) return false;
  return value;
}

function asList(value: string): unknown {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

const ENV_OVERRIDES: ReadonlyArray<{
  name: string;
  path: readonly string[];
  parse: (value: string) => unknown;
}> = [
  { name: "MAILBOX", path: ["mailbox"], parse: (v) => v },
  { name: "OUTPUT_PATH", path: ["outputPath"], parse: (v) => v },
  { name: "ACCESS_TOKEN", path: ["accessToken"], parse: (v) => v },
  { name: "SYNC_CHECKPOINT_INTERVAL", path: ["sync", "checkpointInterval"], parse: asNumber },
  { name: "SYNC_PARALLEL", path: ["sync", "parallel"], parse: asNumber },
  { name: "SYNC_OVERLAP_MINUTES", path: ["sync", "overlapMinutes"], parse: asNumber },
  { name: "SYNC_PAGE_SIZE", path: ["sync", "pageSize"], parse: asNumber },
  { name: "SYNC_EXCLUDE_FOLDERS", path: ["sync", "excludeFolders"], parse: asList },
  { name: "RETRY_MAX_ATTEMPTS", path: ["retry", "maxAttempts"], parse: asNumber },
  { name: "TRANSFORM_MARKDOWN", path: ["transform", "markdown"], parse: asBoolean },
];

/** Overrides taken from `MAILBOX_MIRROR_*` variables that are set and non-empty. */
export function envOverrides(env: NodeJS.ProcessEnv): ConfigOverride[] {
  const overrides: ConfigOverride[] = [];
  for (const entry of ENV_OVERRIDES) {
    const raw = env[`${ENV_PREFIX}${entry.name}`];
    if (raw !== undefined && raw !== "") {
      overrides.push({ path: entry.path, value: entry.parse(raw) });
    }
  }
  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function applyOverride(target: Record<string, unknown>, override: ConfigOverride): void {
  const keys = override.path;
  const last = keys[keys.length - 1];
  if (last === undefined) return;

  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
  node[last] = override.value;
}

// ─── Loading ───

export interface LoadConfigOptions {
  /** Explicit path; must exist when given. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  /** Applied after the file and the environment. */
  overrides?: ConfigOverride[];
  cwd?: string;
  homeDir?: string;
}

export interface LoadedConfig {
  config: MirrorConfig;
  /** File the values came from, or null when running on defaults. */
  sourcePath: string | null;
}

export function findConfigFile(opts: LoadConfigOptions = {}): string | null {
  if (opts.configPath) {
    const explicit = path.resolve(opts.cwd ?? process.cwd(), opts.configPath);
    if (!fs.existsSync(explicit)) {
      throw new ConfigurationError(`Config file not found: ${explicit}`, explicit);
    }
    return explicit;
  }
  const candidates = [
    path.join(opts.cwd ?? process.cwd(), CONFIG_FILENAME),
    path.join(opts.homeDir ?? os.homedir(), ".config", "mailbox-mirror", CONFIG_FILENAME),
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = parseYaml(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(
      `Invalid YAML in ${filePath}: ${errorMessage(err)}`,
      filePath,
      { cause: err },
    );
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${filePath} must contain a YAML mapping`, filePath);
  }
  return parsed;
}

/** File values, then `MAILBOX_MIRROR_*` variables, then explicit overrides. */
export function loadConfig(opts: LoadConfigOptions = {}): LoadedConfig {
  const sourcePath = findConfigFile(opts);
  const raw = sourcePath ? readConfigFile(sourcePath) : {};

  for (const override of envOverrides(opts.env ?? process.env)) applyOverride(raw, override);
  for (const override of opts.overrides ?? []) applyOverride(raw, override);

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(
      `Invalid configuration${sourcePath ? ` in ${sourcePath}` : ""}: ${details}`,
      sourcePath,
    );
  }
  return { config: result.data, sourcePath };
}

export function toSyncOptions(
  config: MirrorConfig,
  dryRun = false,
  includeFolders: string[] = [],
): SyncOptions {
  return {
    mailbox: config.mailbox,
    checkpointInterval: config.sync.checkpointInterval,
    maxParallelDownloads: config.sync.parallel,
    excludeFolders: config.sync.excludeFolders,
    includeFolders,
    overlapMinutes: config.sync.overlapMinutes,
    dryRun,
    transform: { markdown: config.transform.markdown },
  };
}

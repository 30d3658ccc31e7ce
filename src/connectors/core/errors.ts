/**
 * Error taxonomy for the mirror.
 *
 * Remote failures fall into three buckets: transient (retry), change-tracking
 * invalid (switch to the date fallback) and everything else (fatal).
 */

export const ExitCodes = {
  success: 0,
  general: 1,
  configuration: 2,
  network: 4,
  fileSystem: 5,
  database: 6,
  cancelled: 130,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

export class MirrorError extends Error {
  readonly exitCode: ExitCode;

  constructor(
    message: string,
    exitCode: ExitCode = ExitCodes.general,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigurationError extends MirrorError {
  readonly configFilePath: string | null;

  constructor(
    message: string,
    configFilePath: string | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, ExitCodes.configuration, options);
    this.configFilePath = configFilePath;
  }
}

export class RemoteApiError extends MirrorError {
  readonly status: number;
  readonly code: string | null;
  /** Server-declared wait before retrying, in ms. */
  readonly retryAfterMs: number | null;

  constructor(
    message: string,
    status: number,
    code: string | null = null,
    retryAfterMs: number | null = null,
  ) {
    super(message, ExitCodes.network);
    this.status = status;
    this.code = code;
    this.retryAfterMs = retryAfterMs;
  }
}

export class RetryExhaustedError extends MirrorError {
  readonly operation: string;
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(
      `Operation ${operation} failed after ${attempts} attempts: ${errorMessage(cause)}`,
      ExitCodes.network,
      { cause },
    );
    this.operation = operation;
    this.attempts = attempts;
  }
}

export class SyncCancelledError extends MirrorError {
  constructor(message = "Sync was cancelled") {
    super(message, ExitCodes.cancelled);
  }
}

export class ArtifactNotFoundError extends MirrorError {
  readonly relativePath: string;

  constructor(relativePath: string) {
    super(`Artifact not found: ${relativePath}`, ExitCodes.fileSystem);
    this.relativePath = relativePath;
  }
}

// ─── Classification ───

export type RetryVerdict =
  | { kind: "fatal" }
  | { kind: "transient" }
  | { kind: "rateLimited"; retryAfterMs: number | null };

const RETRYABLE_STATUSES = new Set([500, 502, 503, 504]);

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const NETWORK_ERROR_MESSAGES = [
  "econnreset",
  "etimedout",
  "enotfound",
  "socket hang up",
  "fetch failed",
  "network error",
];

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function statusOf(err: unknown): number | null {
  if (err instanceof RemoteApiError) return err.status;
  if (typeof err === "object" && err !== null && "status" in err) {
    return typeof err.status === "number" ? err.status : null;
  }
  return null;
}

function codeOf(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : null;
  }
  return null;
}

export function isNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = codeOf(err) ?? codeOf(err.cause);
  if (code && NETWORK_ERROR_CODES.has(code)) return true;
  const msg = err.message.toLowerCase();
  return NETWORK_ERROR_MESSAGES.some((needle) => msg.includes(needle));
}

/**
 * Default retry classifier: 429 is rate limited, 500/502/503/504 and
 * transport failures are transient, anything else is fatal.
 */
export function classifyTransientError(err: unknown): RetryVerdict {
  const status = statusOf(err);
  if (status === 429) {
    const retryAfterMs = err instanceof RemoteApiError ? err.retryAfterMs : null;
    return { kind: "rateLimited", retryAfterMs };
  }
  if (status !== null && RETRYABLE_STATUSES.has(status)) {
    return { kind: "transient" };
  }
  if (status === null && isNetworkError(err)) {
    return { kind: "transient" };
  }
  return { kind: "fatal" };
}

const CHANGE_TRACKING_CODES = new Set([
  "syncstatenotfound",
  "syncstateinvalid",
  "resyncrequired",
  "invaliddeltatoken",
]);

/**
 * True when the remote has dropped the change-tracking state behind a cursor
 * (expired delta token, forced resync).
 */
export function isChangeTrackingInvalid(err: unknown): boolean {
  const status = statusOf(err);
  if (status === 410) return true;
  // "Access token has expired" is an auth failure, not a stale cursor.
  if (status === 401 || status === 403) return false;

  const code = codeOf(err);
  if (code && CHANGE_TRACKING_CODES.has(code.toLowerCase())) return true;

  if (!(err instanceof Error)) return false;
  const msg = err.message.toUpperCase();
  return (
    msg.includes("RESYNC") ||
    msg.includes("SYNC_STATE") ||
    msg.includes("SYNCSTATE") ||
    (msg.includes("TOKEN") &&
      (msg.includes("INVALID") || msg.includes("EXPIRED")))
  );
}

const FATAL_LOCAL_CODES = new Set(["ENOSPC", "EDQUOT", "EACCES", "EPERM", "EROFS"]);

/** Local storage failures that no later item can succeed past (disk full, no permission). */
export function isFatalLocalError(err: unknown): boolean {
  const code = codeOf(err);
  return code !== null && FATAL_LOCAL_CODES.has(code);
}

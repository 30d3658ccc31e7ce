import { describe, expect, it } from "vitest";
import {
  classifyTransientError,
  ConfigurationError,
  ExitCodes,
  isChangeTrackingInvalid,
  isFatalLocalError,
  RemoteApiError,
  RetryExhaustedError,
  SyncCancelledError,
} from "../../../src/connectors/core/errors.js";

function withCode(message: string, code: string): Error {
  return Object.assign(new Error(message), { code });
}

describe("classifyTransientError", () => {
  it("treats 429 as rate limited and carries the server hint", () => {
    const err = new RemoteApiError("throttled", 429, null, 5000);
    expect(classifyTransientError(err)).toEqual({ kind: "rateLimited", retryAfterMs: 5000 });
  });

  it("treats 5xx gateway errors as transient", () => {
    for (const status of [500, 502, 503, 504]) {
      expect(classifyTransientError(new RemoteApiError("x", status))).toEqual({ kind: "transient" });
    }
  });

  it("treats other HTTP failures as fatal", () => {
    expect(classifyTransientError(new RemoteApiError("missing", 404))).toEqual({ kind: "fatal" });
    expect(classifyTransientError(new RemoteApiError("denied", 403))).toEqual({ kind: "fatal" });
  });

  it("recognises transport failures by code and message", () => {
    expect(classifyTransientError(withCode("connect failed", "ECONNRESET"))).toEqual({
      kind: "transient",
    });
    expect(classifyTransientError(new Error("socket hang up"))).toEqual({ kind: "transient" });
  });

  it("treats anything else as fatal", () => {
    expect(classifyTransientError(new Error("bad input"))).toEqual({ kind: "fatal" });
    expect(classifyTransientError("oops")).toEqual({ kind: "fatal" });
  });
});

describe("isChangeTrackingInvalid", () => {
  it("accepts 410 Gone", () => {
    expect(isChangeTrackingInvalid(new RemoteApiError("gone", 410))).toBe(true);
  });

  it("accepts known sync-state error codes in any case", () => {
    expect(
      isChangeTrackingInvalid(new RemoteApiError("bad request", 400, "SyncStateNotFound")),
    ).toBe(true);
  });

  it("accepts resync and invalid token messages", () => {
    expect(isChangeTrackingInvalid(new Error("Resync required"))).toBe(true);
    expect(isChangeTrackingInvalid(new Error("The delta token is invalid"))).toBe(true);
  });

  it("does not mistake an expired access token for a stale cursor", () => {
    expect(
      isChangeTrackingInvalid(new RemoteApiError("Access token has expired", 401)),
    ).toBe(false);
  });

  it("rejects unrelated failures", () => {
    expect(isChangeTrackingInvalid(new Error("timeout"))).toBe(false);
    expect(isChangeTrackingInvalid(null)).toBe(false);
  });
});

describe("isFatalLocalError", () => {
  it("flags disk-full and permission failures", () => {
    expect(isFatalLocalError(withCode("no space left", "ENOSPC"))).toBe(true);
    expect(isFatalLocalError(withCode("permission denied", "EACCES"))).toBe(true);
  });

  it("ignores other errors", () => {
    expect(isFatalLocalError(withCode("missing", "ENOENT"))).toBe(false);
    expect(isFatalLocalError(new Error("plain"))).toBe(false);
  });
});

describe("error classes", () => {
  it("carry exit codes", () => {
    expect(new ConfigurationError("bad").exitCode).toBe(ExitCodes.configuration);
    expect(new SyncCancelledError().exitCode).toBe(130);
    expect(new RemoteApiError("x", 500).exitCode).toBe(ExitCodes.network);
  });

  it("describes exhausted retries with the last failure", () => {
    const cause = new Error("busy");
    const err = new RetryExhaustedError("list folders", 3, cause);
    expect(err.message).toBe("Operation list folders failed after 3 attempts: busy");
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("RetryExhaustedError");
  });
});

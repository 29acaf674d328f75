import { describe, expect, it } from "vitest";
import {
  AbortError,
  abortErrorFrom,
  CacheError,
  ConfigError,
  DecodeError,
  DerivationError,
  ErrorCode,
  isCacheError,
  PoolClosedError,
  PoolExhaustedError,
  StoreError,
  toError,
} from "../index.js";

describe("ErrorCode", () => {
  it("groups configuration codes in 1xxx", () => {
    expect(ErrorCode.CONFIG_INVALID).toBe(1001);
    expect(ErrorCode.CONFIG_NOT_FOUND).toBe(1002);
    expect(ErrorCode.CONFIG_PARSE_ERROR).toBe(1003);
  });

  it("groups store and pool codes in 2xxx", () => {
    expect(ErrorCode.STORE_TIMEOUT).toBe(2001);
    expect(ErrorCode.STORE_CONNECTION).toBe(2002);
    expect(ErrorCode.STORE_PROTOCOL).toBe(2003);
    expect(ErrorCode.STORE_CLOSED).toBe(2004);
    expect(ErrorCode.POOL_EXHAUSTED).toBe(2101);
    expect(ErrorCode.POOL_CLOSED).toBe(2102);
  });
});

describe("CacheError", () => {
  it("carries code, context and cause", () => {
    const cause = new Error("socket reset");
    const error = new CacheError("lookup failed", ErrorCode.STORE_CONNECTION, {
      cause,
      context: { key: "cachet:ab" },
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("CacheError");
    expect(error.code).toBe(ErrorCode.STORE_CONNECTION);
    expect(error.context).toEqual({ key: "cachet:ab" });
    expect(error.cause).toBe(cause);
  });

  it("infers severity from the code", () => {
    expect(new CacheError("x", ErrorCode.STORE_TIMEOUT).severity).toBe("low");
    expect(new CacheError("x", ErrorCode.ENTRY_DECODE_FAILED).severity).toBe("medium");
    expect(new CacheError("x", ErrorCode.CONFIG_INVALID).severity).toBe("high");
  });

  it("toJSON() includes the cause message", () => {
    const error = new CacheError("outer", ErrorCode.POOL_CLOSED, { cause: new Error("inner") });

    expect(error.toJSON()).toEqual({
      name: "CacheError",
      message: "outer",
      code: ErrorCode.POOL_CLOSED,
      severity: "medium",
      context: undefined,
      cause: "inner",
    });
  });
});

describe("cache error subclasses", () => {
  it("StoreError maps each reason to its code", () => {
    expect(new StoreError("timeout", "t").code).toBe(ErrorCode.STORE_TIMEOUT);
    expect(new StoreError("connection", "c").code).toBe(ErrorCode.STORE_CONNECTION);
    expect(new StoreError("protocol", "p").code).toBe(ErrorCode.STORE_PROTOCOL);
    expect(new StoreError("closed", "x").code).toBe(ErrorCode.STORE_CLOSED);
  });

  it("StoreError records the operation in context", () => {
    const error = new StoreError("timeout", "slow", { operation: "get" });

    expect(error.reason).toBe("timeout");
    expect(error.operation).toBe("get");
    expect(error.context).toEqual({ operation: "get" });
  });

  it("PoolExhaustedError reports timeout and pool size", () => {
    const error = new PoolExhaustedError(100, 4);

    expect(error.message).toBe("No store connection became available within 100ms (pool size 4)");
    expect(error.timeoutMs).toBe(100);
    expect(error.severity).toBe("low");
  });

  it("subclasses carry their own codes", () => {
    expect(new PoolClosedError().code).toBe(ErrorCode.POOL_CLOSED);
    expect(new DecodeError("bad").code).toBe(ErrorCode.ENTRY_DECODE_FAILED);
    expect(new DerivationError("bad").code).toBe(ErrorCode.KEY_DERIVATION_FAILED);
    expect(new ConfigError("bad", ErrorCode.CONFIG_INVALID).severity).toBe("high");
  });

  it("ConfigError keeps the file path in context", () => {
    const error = new ConfigError("unreadable", ErrorCode.CONFIG_PARSE_ERROR, {
      path: "/srv/cachet.toml",
    });

    expect(error.name).toBe("ConfigError");
    expect(error.context).toEqual({ path: "/srv/cachet.toml" });
  });

  it("isCacheError() recognizes every subclass", () => {
    expect(isCacheError(new AbortError())).toBe(true);
    expect(isCacheError(new StoreError("closed", "x"))).toBe(true);
    expect(isCacheError(new Error("plain"))).toBe(false);
  });
});

describe("abortErrorFrom", () => {
  it("reuses an AbortError reason", () => {
    const reason = new AbortError("client went away");
    const controller = new AbortController();
    controller.abort(reason);

    expect(abortErrorFrom(controller.signal)).toBe(reason);
  });

  it("wraps any other reason as the cause", () => {
    const controller = new AbortController();
    controller.abort("deadline");

    const error = abortErrorFrom(controller.signal);

    expect(error).toBeInstanceOf(AbortError);
    expect(error.cause).toBe("deadline");
  });
});

describe("toError", () => {
  it("passes errors through and wraps other values", () => {
    const error = new Error("x");
    expect(toError(error)).toBe(error);
    expect(toError("text").message).toBe("text");
    expect(toError({ code: 1 }).message).toBe('{"code":1}');
  });

  it("describes values JSON cannot render", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(toError(undefined).message).toBe("undefined");
    expect(toError(10n).message).toBe("10");
    expect(toError({ size: 10n }).message).toBe("[object Object]");
    expect(toError(circular).message).toBe("[object Object]");
  });
});

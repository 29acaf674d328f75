import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  ConfigSchema,
  KeyConfigSchema,
  LogLevelSchema,
  PolicyConfigSchema,
  PoolConfigSchema,
  StoreConfigSchema,
} from "../schema.js";

describe("StoreConfigSchema", () => {
  it("applies defaults", () => {
    expect(StoreConfigSchema.parse({})).toEqual({
      url: "redis://127.0.0.1:6379",
      keyPrefix: "cachet",
      connectTimeoutMs: 2000,
    });
  });

  it("rejects a non-URL", () => {
    expect(() => StoreConfigSchema.parse({ url: "not a url" })).toThrow(ZodError);
  });

  it("rejects an empty key prefix", () => {
    expect(() => StoreConfigSchema.parse({ keyPrefix: "" })).toThrow(ZodError);
  });
});

describe("PoolConfigSchema", () => {
  it("requires a positive integer size", () => {
    expect(PoolConfigSchema.parse({ size: 2 }).size).toBe(2);
    expect(() => PoolConfigSchema.parse({ size: 0 })).toThrow(ZodError);
    expect(() => PoolConfigSchema.parse({ size: 1.5 })).toThrow(ZodError);
  });
});

describe("KeyConfigSchema", () => {
  it("lowercases vary headers and uppercases body methods", () => {
    expect(
      KeyConfigSchema.parse({ varyHeaders: ["Accept-Language"], bodyMethods: ["post"] })
    ).toEqual({
      version: 1,
      varyHeaders: ["accept-language"],
      bodyMethods: ["POST"],
      canonicalJsonBodies: false,
    });
  });
});

describe("PolicyConfigSchema", () => {
  it("leaves statuses unset by default", () => {
    expect(PolicyConfigSchema.parse({})).toEqual({ methods: ["GET"] });
  });

  it("rejects statuses outside 100-599", () => {
    expect(() => PolicyConfigSchema.parse({ statuses: [200, 700] })).toThrow(ZodError);
  });
});

describe("LogLevelSchema", () => {
  it.each(["trace", "debug", "info", "warn", "error", "fatal"] as const)("accepts %s", (level) => {
    expect(LogLevelSchema.parse(level)).toBe(level);
  });

  it("rejects unknown levels", () => {
    expect(() => LogLevelSchema.parse("verbose")).toThrow(ZodError);
  });
});

describe("ConfigSchema", () => {
  it("fills nested defaults from an empty object", () => {
    const config = ConfigSchema.parse({});

    expect(config.pool).toEqual({ size: 10, acquireTimeoutMs: 1000 });
    expect(config.operationTimeoutMs).toBe(250);
    expect(config.cacheStatusHeader).toBe("x-cache");
  });

  it("rejects true for the cache status header", () => {
    expect(() => ConfigSchema.parse({ cacheStatusHeader: true })).toThrow(ZodError);
  });

  it("caps the default TTL at what an entry can record", () => {
    expect(ConfigSchema.parse({ defaultTtlMs: 0xffffffff }).defaultTtlMs).toBe(0xffffffff);
    expect(() => ConfigSchema.parse({ defaultTtlMs: 0x100000000 })).toThrow(ZodError);
    expect(() => ConfigSchema.parse({ defaultTtlMs: 60 * 24 * 60 * 60 * 1000 })).toThrow(ZodError);
  });
});

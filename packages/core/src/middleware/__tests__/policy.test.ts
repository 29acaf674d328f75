import { describe, expect, it } from "vitest";
import { CachePolicy, hasCacheDirective } from "../policy.js";
import type { CachedResponse } from "../types.js";

const response = (status: number, headers: CachedResponse["headers"] = []): CachedResponse => ({
  status,
  headers,
  body: new Uint8Array(0),
});

describe("hasCacheDirective", () => {
  it("matches directive names case-insensitively and ignores arguments", () => {
    expect(hasCacheDirective("Public, NO-STORE", "no-store")).toBe(true);
    expect(hasCacheDirective("private=\"set-cookie\"", "private")).toBe(true);
    expect(hasCacheDirective("max-age=0", "no-store")).toBe(false);
    expect(hasCacheDirective(undefined, "no-store")).toBe(false);
  });

  it("does not match on substrings", () => {
    expect(hasCacheDirective("x-no-store-ish", "no-store")).toBe(false);
  });
});

describe("CachePolicy", () => {
  const policy = new CachePolicy();

  it("caches GET only by default", () => {
    expect(policy.isCacheableRequest({ method: "get", url: "/" })).toBe(true);
    expect(policy.isCacheableRequest({ method: "POST", url: "/" })).toBe(false);
    expect(policy.isCacheableRequest({ method: "HEAD", url: "/" })).toBe(false);
  });

  it("refuses requests that ask for no-store", () => {
    expect(
      policy.isCacheableRequest({ method: "GET", url: "/", headers: { "cache-control": "no-store" } })
    ).toBe(false);
  });

  it("accepts any 2xx response by default", () => {
    expect(policy.isCacheableResponse(response(200))).toBe(true);
    expect(policy.isCacheableResponse(response(299))).toBe(true);
    expect(policy.isCacheableResponse(response(304))).toBe(false);
    expect(policy.isCacheableResponse(response(500))).toBe(false);
  });

  it("refuses responses marked no-store or private", () => {
    expect(policy.isCacheableResponse(response(200, [["Cache-Control", "no-store"]]))).toBe(false);
    expect(policy.isCacheableResponse(response(200, [["cache-control", "private"]]))).toBe(false);
    expect(policy.isCacheableResponse(response(200, [["cache-control", "public"]]))).toBe(true);
  });

  it("uses configured methods and statuses", () => {
    const custom = new CachePolicy({ methods: ["get", "QUERY"], statuses: [200, 410] });

    expect(custom.isCacheableRequest({ method: "QUERY", url: "/" })).toBe(true);
    expect(custom.isCacheableResponse(response(410))).toBe(true);
    expect(custom.isCacheableResponse(response(201))).toBe(false);
  });
});

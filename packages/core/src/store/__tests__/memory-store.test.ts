import { describe, expect, it } from "vitest";
import { StoreError } from "../../errors/index.js";
import { createMemoryConnectionFactory, MemoryStore } from "../memory-store.js";

const bytes = (text: string): Uint8Array => new Uint8Array(Buffer.from(text, "utf8"));

describe("MemoryStore", () => {
  it("copies values on write and read", () => {
    const store = new MemoryStore();
    const value = bytes("abc");

    store.write("k", value, 60_000);
    value.fill(0);
    const read = store.read("k");
    read?.fill(0);

    expect(Buffer.from(store.read("k") ?? new Uint8Array(0)).toString()).toBe("abc");
  });

  it("expires entries after their TTL", async () => {
    const store = new MemoryStore();
    store.write("k", bytes("v"), 10);

    await new Promise((resolve) => setTimeout(resolve, 30));

    expect(store.read("k")).toBeNull();
  });

  it("evicts the least recently used entry at capacity", () => {
    const store = new MemoryStore({ maxEntries: 2 });
    store.write("a", bytes("1"), 60_000);
    store.write("b", bytes("2"), 60_000);
    store.read("a");
    store.write("c", bytes("3"), 60_000);

    expect(store.has("a")).toBe(true);
    expect(store.has("b")).toBe(false);
    expect(store.size).toBe(2);
  });
});

describe("MemoryStoreConnection", () => {
  it("fails with a closed StoreError after close()", async () => {
    const connection = new MemoryStore().connect();

    await connection.close();

    expect(connection.isOpen).toBe(false);
    await expect(connection.get("k")).rejects.toMatchObject({ reason: "closed" });
    await expect(connection.ping()).rejects.toBeInstanceOf(StoreError);
  });

  it("shares one store across factory connections", async () => {
    const factory = createMemoryConnectionFactory(new MemoryStore());
    const a = await factory.create();
    const b = await factory.create();

    await a.set("k", bytes("shared"), 60_000);

    expect(Buffer.from((await b.get("k")) ?? new Uint8Array(0)).toString()).toBe("shared");
    expect(factory.validate?.(a)).toBe(true);
    await factory.destroy(a, false);
    expect(factory.validate?.(a)).toBe(false);
  });
});

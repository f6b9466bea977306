import { describe, expect, it } from "vitest";
import { createMemoryStorage, createMemoryStorageWithInspection } from "../src/index.ts";

const KEY = "ABCDEFGHJKMNPQRSTVWXYZ0123";
const DATA = new Uint8Array([1, 2, 3, 4, 5]);

describe("createMemoryStorage", () => {
  it("returns null for a missing key", async () => {
    const storage = createMemoryStorage();
    expect(await storage.get(KEY)).toBeNull();
    expect(await storage.has(KEY)).toBe(false);
  });

  it("put then get returns the bytes", async () => {
    const storage = createMemoryStorage();
    await storage.put(KEY, DATA);
    expect(await storage.get(KEY)).toEqual(DATA);
    expect(await storage.has(KEY)).toBe(true);
  });

  it("keeps the first value when a key is written twice", async () => {
    const storage = createMemoryStorage();
    await storage.put(KEY, DATA);
    await storage.put(KEY, new Uint8Array([9]));
    expect(await storage.get(KEY)).toEqual(DATA);
  });

  it("is not affected by later changes to the caller's buffer", async () => {
    const storage = createMemoryStorage();
    const buf = new Uint8Array([7, 7]);
    await storage.put(KEY, buf);
    buf[0] = 0;
    expect(await storage.get(KEY)).toEqual(new Uint8Array([7, 7]));
  });

  it("reads initial data", async () => {
    const storage = createMemoryStorage({ initialData: new Map([[KEY, DATA]]) });
    expect(await storage.get(KEY)).toEqual(DATA);
  });
});

describe("createMemoryStorageWithInspection", () => {
  it("counts gets and puts", async () => {
    const storage = createMemoryStorageWithInspection();
    await storage.put(KEY, DATA);
    await storage.put(KEY, DATA);
    await storage.get(KEY);

    expect(storage.stats).toEqual({ gets: 1, puts: 2 });
    expect(storage.size()).toBe(1);
    expect(storage.keys()).toEqual([KEY]);
  });

  it("delete and clear remove blocks", async () => {
    const storage = createMemoryStorageWithInspection();
    await storage.put(KEY, DATA);
    expect(storage.delete(KEY)).toBe(true);
    expect(await storage.get(KEY)).toBeNull();

    await storage.put(KEY, DATA);
    storage.clear();
    expect(storage.size()).toBe(0);
  });
});

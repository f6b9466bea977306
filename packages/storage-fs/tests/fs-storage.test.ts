import { mkdtemp, readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFsStorage } from "../src/index.ts";

const KEY = "3A8FQRSTVWXYZ0123456789ABC";
const DATA = new Uint8Array([10, 20, 30]);

describe("createFsStorage", () => {
  let basePath: string;

  beforeEach(async () => {
    basePath = await mkdtemp(join(tmpdir(), "dagfs-fs-storage-"));
  });

  afterEach(async () => {
    await rm(basePath, { recursive: true, force: true });
  });

  it("returns null and false for missing keys", async () => {
    const storage = createFsStorage({ basePath });
    expect(await storage.get(KEY)).toBeNull();
    expect(await storage.has(KEY)).toBe(false);
  });

  it("writes sharded block files under the prefix", async () => {
    const storage = createFsStorage({ basePath });
    await storage.put(KEY, DATA);

    const onDisk = await readFile(join(basePath, "blocks", "3A", KEY));
    expect(new Uint8Array(onDisk)).toEqual(DATA);
    expect(await readdir(join(basePath, "blocks", "3A"))).toEqual([KEY]);
  });

  it("round-trips bytes and reports existence", async () => {
    const storage = createFsStorage({ basePath, prefix: "cas/" });
    await storage.put(KEY, DATA);

    expect(await storage.get(KEY)).toEqual(DATA);
    expect(await storage.has(KEY)).toBe(true);
  });

  it("keeps the first block when a key is written twice", async () => {
    const storage = createFsStorage({ basePath });
    await storage.put(KEY, DATA);
    await storage.put(KEY, new Uint8Array([1]));
    expect(await storage.get(KEY)).toEqual(DATA);
  });

  it("sees blocks written by another provider on the same directory", async () => {
    await createFsStorage({ basePath }).put(KEY, DATA);
    const reader = createFsStorage({ basePath });
    expect(await reader.get(KEY)).toEqual(DATA);
    expect(reader.getCacheStats()).toEqual({ size: 1 });
  });

  it("rechecks the disk after clearCache", async () => {
    const storage = createFsStorage({ basePath });
    await storage.put(KEY, DATA);
    expect(storage.getCacheStats()).toEqual({ size: 1 });

    storage.clearCache();
    expect(storage.getCacheStats()).toEqual({ size: 0 });

    expect(await storage.has(KEY)).toBe(true);
    expect(storage.getCacheStats()).toEqual({ size: 1 });
  });
});

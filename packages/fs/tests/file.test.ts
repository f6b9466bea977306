/**
 * PublicFile tests, including a file stored inside a directory
 */
import { describe, expect, it } from "vitest";
import {
  createDirectory,
  directoryWithEntry,
  getEntry,
  getEntryNames,
  lookupNode,
} from "../src/directory.ts";
import { createFile, fileToRecord, fileWithContent } from "../src/file.ts";
import { metadataEquals } from "../src/metadata.ts";
import { PublicNode } from "../src/node.ts";
import { PublicNodeSchema } from "../src/serializable.ts";
import { C1, C2, createTestStore, T1, T1_SECONDS, T2, unwrap } from "./helpers.ts";

describe("PublicFile", () => {
  it("rejects a malformed content CID", () => {
    expect(() => createFile(T1, "abc")).toThrow("Invalid content CID: 'abc'");
  });

  it("fileWithContent replaces content and optionally bumps mtime", () => {
    const file = createFile(T1, C1);

    const same = fileWithContent(file, C2);
    expect(same.content).toBe(C2);
    expect(same.metadata).toBe(file.metadata);

    const bumped = fileWithContent(file, C2, T2);
    expect(bumped.metadata.modified).toBe(1_700_003_600);
    expect(file.content).toBe(C1);
  });

  it("serializes to the tagged wire record", async () => {
    const { store } = createTestStore();
    const file = createFile(T1, C1);

    expect(fileToRecord(file)).toEqual({
      version: "1.0.0",
      metadata: { created: T1_SECONDS, modified: T1_SECONDS },
      content: C1,
      previous: [],
    });

    const cid = await PublicNode.fromFile(file).store(store);
    const record = unwrap(await store.getDeserializable(cid, PublicNodeSchema));
    expect(record).toEqual({ "pub/file": fileToRecord(file) });
  });

  it("loads back from a directory entry", async () => {
    const { store } = createTestStore();

    const file = createFile(T1, C1);
    const fileCid = await PublicNode.fromFile(file).store(store);

    const dir = directoryWithEntry(createDirectory(T1), "a.txt", fileCid);
    const dirCid = await PublicNode.fromDir(dir).store(store);

    const loadedDir = unwrap(unwrap(await PublicNode.load(dirCid, store)).asDir());
    expect(getEntryNames(loadedDir)).toEqual(["a.txt"]);
    expect(getEntry(loadedDir, "a.txt")?.getCid()).toBe(fileCid);

    const child = unwrap(await lookupNode(loadedDir, "a.txt", store));
    const loadedFile = unwrap(child.asFile());
    expect(loadedFile.content).toBe(C1);
    expect(metadataEquals(loadedFile.metadata, file.metadata)).toBe(true);
    expect(loadedFile.previous.size).toBe(0);
    expect(child.equals(PublicNode.fromFile(file))).toBe(true);
  });
});

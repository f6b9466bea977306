/**
 * @dagfs/fs: PublicDirectory
 *
 * Entries map names to PublicLinks. Storing a directory first stores every
 * in-memory child (depth-first, in name order) so that the children's CIDs
 * can be embedded in the directory record.
 *
 * Recursion depth follows the tree depth and is not bounded here.
 */

import {
  type BlockStore,
  type Cid,
  type FsError,
  isValidCid,
  OnceCell,
} from "@dagfs/core";
import { PublicLink } from "./link.ts";
import {
  createMetadata,
  metadataEquals,
  metadataFromRecord,
  metadataToRecord,
} from "./metadata.ts";
import { PublicNode } from "./node.ts";
import { setEquals, toPreviousSet } from "./revision.ts";
import { DIR_TAG, type DirectoryRecord, isValidEntryName, NODE_VERSION } from "./serializable.ts";
import type { PublicDirectory } from "./types.ts";

export type EntryTarget = PublicNode | PublicLink | Cid;

export const createDirectory = (time: Date): PublicDirectory => ({
  kind: "dir",
  metadata: createMetadata(time),
  entries: new Map(),
  previous: new Set(),
  persistedAs: new OnceCell(),
});

/** Entry names in sorted order */
export const getEntryNames = (dir: PublicDirectory): string[] => [...dir.entries.keys()].sort();

export const getEntry = (dir: PublicDirectory, name: string): PublicLink | undefined =>
  dir.entries.get(name);

const toLink = (target: EntryTarget): PublicLink => {
  if (target instanceof PublicLink) return target;
  if (target instanceof PublicNode) return PublicLink.fromNode(target);
  if (!isValidCid(target)) {
    throw new Error(`Invalid child CID: '${target}'`);
  }
  return PublicLink.fromCid(target);
};

/**
 * Add or replace a single entry. Throws on names that cannot be stored
 * (empty, containing '/', '.' or '..').
 */
export const directoryWithEntry = (
  dir: PublicDirectory,
  name: string,
  target: EntryTarget
): PublicDirectory => {
  if (!isValidEntryName(name)) {
    throw new Error(`Invalid entry name: '${name}'`);
  }
  const entries = new Map(dir.entries);
  entries.set(name, toLink(target));
  return { ...dir, entries, persistedAs: new OnceCell() };
};

/** Remove an entry; returns `dir` itself when there is nothing to remove */
export const directoryWithoutEntry = (dir: PublicDirectory, name: string): PublicDirectory => {
  if (!dir.entries.has(name)) {
    return dir;
  }
  const entries = new Map(dir.entries);
  entries.delete(name);
  return { ...dir, entries, persistedAs: new OnceCell() };
};

/**
 * Resolve a single entry to a node. Returns null when the name is absent.
 */
export const lookupNode = async (
  dir: PublicDirectory,
  name: string,
  store: BlockStore
): Promise<PublicNode | FsError | null> => {
  const link = dir.entries.get(name);
  if (link === undefined) {
    return null;
  }
  return link.resolveValue(store);
};

export const directoryToRecord = async (
  dir: PublicDirectory,
  store: BlockStore
): Promise<DirectoryRecord> => {
  const children: Record<string, Cid> = {};
  for (const name of getEntryNames(dir)) {
    const link = dir.entries.get(name);
    if (link !== undefined) {
      children[name] = await link.resolveCid(store);
    }
  }

  return {
    version: NODE_VERSION,
    metadata: metadataToRecord(dir.metadata),
    children,
    previous: [...dir.previous],
  };
};

export const directoryFromRecord = (record: DirectoryRecord, cid?: Cid): PublicDirectory => {
  const entries = new Map<string, PublicLink>();
  for (const [name, childCid] of Object.entries(record.children)) {
    entries.set(name, PublicLink.fromCid(childCid));
  }
  return {
    kind: "dir",
    metadata: metadataFromRecord(record.metadata),
    entries,
    previous: toPreviousSet(record.previous),
    persistedAs: cid === undefined ? new OnceCell() : OnceCell.withValue(cid),
  };
};

export const storeDirectory = (dir: PublicDirectory, store: BlockStore): Promise<Cid> =>
  dir.persistedAs.getOrInit(async () =>
    store.putSerializable({ [DIR_TAG]: await directoryToRecord(dir, store) })
  );

export const directoryEquals = (a: PublicDirectory, b: PublicDirectory): boolean => {
  if (a === b) return true;
  if (!metadataEquals(a.metadata, b.metadata) || !setEquals(a.previous, b.previous)) {
    return false;
  }
  if (a.entries.size !== b.entries.size) return false;
  for (const [name, link] of a.entries) {
    const other = b.entries.get(name);
    if (other === undefined || !link.equals(other)) return false;
  }
  return true;
};

/**
 * @dagfs/fs: Copy-on-write helpers shared by both node variants
 *
 * Every helper returns a new value; the input is never modified and the
 * result starts with an empty persistedAs cell.
 */

import { type Cid, OnceCell, sortedCidSet } from "@dagfs/core";
import { upsertMtime } from "./metadata.ts";
import type { Metadata, NodeValue } from "./types.ts";

type CommonChanges = { metadata: Metadata } | { previous: ReadonlySet<Cid> };

const derive = <T extends NodeValue>(value: T, changes: CommonChanges): T => ({
  ...value,
  ...changes,
  persistedAs: new OnceCell<Cid>(),
});

export const toPreviousSet = (cids: Iterable<Cid>): ReadonlySet<Cid> =>
  new Set(sortedCidSet(cids));

export const withMtime = <T extends NodeValue>(value: T, time: Date): T =>
  derive(value, { metadata: upsertMtime(value.metadata, time) });

export const withMetadata = <T extends NodeValue>(value: T, metadata: Metadata): T =>
  derive(value, { metadata });

/** Replace the previous-version set with the deduplicated, sorted `cids` */
export const withPrevious = <T extends NodeValue>(value: T, cids: Iterable<Cid>): T =>
  derive(value, { previous: toPreviousSet(cids) });

/**
 * Start the next revision of a stored value: the copy points back at the
 * CID the value was persisted under. Values never stored are returned as-is.
 */
export const prepareNextRevision = <T extends NodeValue>(value: T): T => {
  const previousCid = value.persistedAs.get();
  if (previousCid === undefined) {
    return value;
  }
  return derive(value, { previous: new Set([previousCid]) });
};

export const setEquals = <T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean => {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
};

/**
 * @dagfs/fs: PublicFile
 *
 * A file references its content by CID only; serializing it is a pure
 * function of its fields and needs no I/O besides the final block write.
 */

import { type BlockStore, type Cid, isValidCid, OnceCell } from "@dagfs/core";
import {
  createMetadata,
  metadataEquals,
  metadataFromRecord,
  metadataToRecord,
  upsertMtime,
} from "./metadata.ts";
import { setEquals, toPreviousSet } from "./revision.ts";
import { FILE_TAG, type FileRecord, NODE_VERSION } from "./serializable.ts";
import type { PublicFile } from "./types.ts";

const assertCid = (cid: Cid): void => {
  if (!isValidCid(cid)) {
    throw new Error(`Invalid content CID: '${cid}'`);
  }
};

export const createFile = (time: Date, content: Cid): PublicFile => {
  assertCid(content);
  return {
    kind: "file",
    metadata: createMetadata(time),
    content,
    previous: new Set(),
    persistedAs: new OnceCell(),
  };
};

/**
 * Point the file at new content. With `time`, the modification time is
 * bumped in the same step.
 */
export const fileWithContent = (file: PublicFile, content: Cid, time?: Date): PublicFile => {
  assertCid(content);
  return {
    ...file,
    content,
    metadata: time === undefined ? file.metadata : upsertMtime(file.metadata, time),
    persistedAs: new OnceCell(),
  };
};

export const fileToRecord = (file: PublicFile): FileRecord => ({
  version: NODE_VERSION,
  metadata: metadataToRecord(file.metadata),
  content: file.content,
  previous: [...file.previous],
});

/**
 * Build a file from a validated record. `cid`, when given, is the CID the
 * record was loaded from and pre-fills persistedAs.
 */
export const fileFromRecord = (record: FileRecord, cid?: Cid): PublicFile => ({
  kind: "file",
  metadata: metadataFromRecord(record.metadata),
  content: record.content,
  previous: toPreviousSet(record.previous),
  persistedAs: cid === undefined ? new OnceCell() : OnceCell.withValue(cid),
});

export const storeFile = (file: PublicFile, store: BlockStore): Promise<Cid> =>
  file.persistedAs.getOrInit(() => store.putSerializable({ [FILE_TAG]: fileToRecord(file) }));

export const fileEquals = (a: PublicFile, b: PublicFile): boolean =>
  a === b ||
  (a.content === b.content &&
    metadataEquals(a.metadata, b.metadata) &&
    setEquals(a.previous, b.previous));

/**
 * @dagfs/fs
 *
 * Public (unencrypted) nodes of a content-addressed, versioned file system.
 *
 * A `PublicNode` is a handle over either a `PublicFile` or a
 * `PublicDirectory`. File and directory values are immutable; mutation goes
 * through the handle, which swaps in a derived value (copy-on-write).
 * `store` writes a node to a `BlockStore` from `@dagfs/core` and memoizes
 * the resulting CID on the value; `PublicNode.load` reads it back.
 *
 * Path resolution and tree traversal are not part of this package: a
 * directory only knows its direct entries.
 *
 * @packageDocumentation
 */

export {
  createDirectory,
  directoryEquals,
  directoryFromRecord,
  directoryToRecord,
  directoryWithEntry,
  directoryWithoutEntry,
  type EntryTarget,
  getEntry,
  getEntryNames,
  lookupNode,
  storeDirectory,
} from "./directory.ts";
export {
  createFile,
  fileEquals,
  fileFromRecord,
  fileToRecord,
  fileWithContent,
  storeFile,
} from "./file.ts";
export { PublicLink } from "./link.ts";
export {
  createMetadata,
  getCreated,
  getMetadataValue,
  getModified,
  metadataEquals,
  putMetadataValue,
  RESERVED_METADATA_KEYS,
  upsertMtime,
} from "./metadata.ts";
export { PublicNode } from "./node.ts";
export {
  prepareNextRevision,
  withMetadata,
  withMtime,
  withPrevious,
} from "./revision.ts";
export {
  DIR_TAG,
  type DirectoryRecord,
  DirectoryRecordSchema,
  FILE_TAG,
  type FileRecord,
  FileRecordSchema,
  isValidEntryName,
  type MetadataRecord,
  type MetadataValue,
  NODE_VERSION,
  PreviousSchema,
  type PublicNodeRecord,
  PublicNodeSchema,
} from "./serializable.ts";
export type {
  Metadata,
  NodeKind,
  NodeValue,
  PublicDirectory,
  PublicFile,
} from "./types.ts";
// Errors live in @dagfs/core; re-exported for callers narrowing node results
export { type FsError, type FsErrorCode, isFsError } from "@dagfs/core";

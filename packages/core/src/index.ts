/**
 * @dagfs/core
 *
 * Content-addressing primitives for dagfs:
 * - CID computation (BLAKE3-128, Crockford Base32)
 * - Canonical CBOR codec
 * - BlockStore over any StorageProvider
 * - OnceCell for write-once CID memoization
 * - FsError typed failures
 */

export { createBlockStore } from "./block-store.ts";
export {
  CID_BYTES,
  CID_LENGTH,
  compareCids,
  createBlake3KeyProvider,
  encodeCB32,
  isValidCid,
  keyToCid,
  sortedCidSet,
} from "./cid.ts";
export { decodeCbor, encodeCbor } from "./codec.ts";
export {
  decodeError,
  type FsError,
  type FsErrorCode,
  fsError,
  isFsError,
  notADirectory,
  notAFile,
  notFound,
} from "./errors.ts";
export { OnceCell } from "./once-cell.ts";
export type {
  BlockStore,
  BlockStoreContext,
  BlockStoredInfo,
  Cid,
  KeyProvider,
} from "./types.ts";
// Re-exported so that consumers don't need a separate storage-core dependency
export type { StorageProvider } from "@dagfs/storage-core";

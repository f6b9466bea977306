/**
 * Block store types
 */

import type { StorageProvider } from "@dagfs/storage-core";
import type { ZodType, ZodTypeDef } from "zod";
import type { FsError } from "./errors.ts";

/**
 * Content identifier: 26-char Crockford Base32 of a 128-bit BLAKE3 digest.
 * Plain strings compare, sort and key Maps/Sets without extra plumbing.
 */
export type Cid = string;

/**
 * Key provider: computes the 128-bit content-addressed key of a block.
 * The key must be a pure function of the input bytes.
 */
export type KeyProvider = {
  computeKey: (data: Uint8Array) => Promise<Uint8Array>;
};

/** Information passed to the onBlockStored hook */
export type BlockStoredInfo = {
  cid: Cid;
  bytes: Uint8Array;
};

export type BlockStoreContext = {
  /** Raw block storage */
  storage: StorageProvider;
  /** Key provider. Defaults to BLAKE3-128. */
  key?: KeyProvider;
  /** Awaited after each block write, e.g. for usage accounting */
  onBlockStored?: (info: BlockStoredInfo) => Promise<void>;
};

/**
 * Content Store consumed by the node layer.
 */
export type BlockStore = {
  putBlock: (bytes: Uint8Array) => Promise<Cid>;
  getBlock: (cid: Cid) => Promise<Uint8Array | null>;
  hasBlock: (cid: Cid) => Promise<boolean>;
  /** Canonical-CBOR encode `value` and store it */
  putSerializable: (value: unknown) => Promise<Cid>;
  /** Fetch, CBOR-decode and validate against `schema` */
  getDeserializable: <T>(
    cid: Cid,
    schema: ZodType<T, ZodTypeDef, unknown>
  ) => Promise<T | FsError>;
};

/**
 * Block Store
 *
 * Content Store over a raw StorageProvider: computes CIDs, encodes
 * serializable values as canonical CBOR, and decodes + validates them
 * on the way back.
 */

import type { ZodType, ZodTypeDef } from "zod";
import { createBlake3KeyProvider, keyToCid } from "./cid.ts";
import { decodeCbor, encodeCbor } from "./codec.ts";
import { decodeError, type FsError, notFound } from "./errors.ts";
import type { BlockStore, BlockStoreContext, Cid } from "./types.ts";

export const createBlockStore = (ctx: BlockStoreContext): BlockStore => {
  const { storage, onBlockStored } = ctx;
  const keyProvider = ctx.key ?? createBlake3KeyProvider();

  const putBlock: BlockStore["putBlock"] = async (bytes) => {
    const cid = keyToCid(await keyProvider.computeKey(bytes));
    await storage.put(cid, bytes);

    if (onBlockStored) {
      await onBlockStored({ cid, bytes });
    }

    return cid;
  };

  const getDeserializable = async <T>(
    cid: Cid,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T | FsError> => {
    const bytes = await storage.get(cid);
    if (bytes === null) {
      return notFound(cid);
    }

    let raw: unknown;
    try {
      raw = decodeCbor(bytes);
    } catch (error: unknown) {
      return decodeError(cid, error instanceof Error ? error.message : String(error));
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      return decodeError(cid, "record does not match schema", {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
    }
    return parsed.data;
  };

  return {
    putBlock,
    getBlock: (cid) => storage.get(cid),
    hasBlock: (cid) => storage.has(cid),
    putSerializable: (value) => putBlock(encodeCbor(value)),
    getDeserializable,
  };
};

/**
 * Wire format of public nodes
 *
 * Node ::= { "pub/file": FileRecord } | { "pub/dir": DirectoryRecord }
 *
 * Records are CBOR maps; `previous` is always a sorted, duplicate-free
 * array. Decoded blocks are validated with these schemas before any
 * in-memory node is built from them.
 */

import { isValidCid } from "@dagfs/core";
import { z } from "zod";

export const NODE_VERSION = "1.0.0";

export const FILE_TAG = "pub/file";
export const DIR_TAG = "pub/dir";

// "__proto__" cannot survive a round trip through a plain-object CBOR map
const RESERVED_NAMES = new Set([".", "..", "__proto__"]);

/** Directory entry names: non-empty, no '/', not '.', '..' or '__proto__' */
export function isValidEntryName(name: string): boolean {
  return name.length > 0 && !name.includes("/") && !RESERVED_NAMES.has(name);
}

export const CidSchema = z.string().refine(isValidCid, "Invalid CID");

const isStrictlyAscending = (cids: readonly string[]): boolean => {
  for (let i = 1; i < cids.length; i++) {
    const prev = cids[i - 1];
    const cid = cids[i];
    if (prev === undefined || cid === undefined || prev >= cid) return false;
  }
  return true;
};

/** Previous-version CIDs, sorted and duplicate-free as written by the encoder */
export const PreviousSchema = z
  .array(CidSchema)
  .refine(isStrictlyAscending, "previous must be sorted without duplicates");

export const VersionSchema = z.string().regex(/^1\.\d+\.\d+$/, "Unsupported node version");

export const MetadataValueSchema = z.union([z.string(), z.number().finite(), z.boolean()]);
export type MetadataValue = z.infer<typeof MetadataValueSchema>;

export const MetadataSchema = z
  .object({
    created: z.number().int(),
    modified: z.number().int(),
  })
  .catchall(MetadataValueSchema);
export type MetadataRecord = z.infer<typeof MetadataSchema>;

export const EntryNameSchema = z.string().refine(isValidEntryName, "Invalid entry name");

export const FileRecordSchema = z.object({
  version: VersionSchema,
  metadata: MetadataSchema,
  content: CidSchema,
  previous: PreviousSchema,
});
export type FileRecord = z.infer<typeof FileRecordSchema>;

export const DirectoryRecordSchema = z.object({
  version: VersionSchema,
  metadata: MetadataSchema,
  children: z.record(EntryNameSchema, CidSchema),
  previous: PreviousSchema,
});
export type DirectoryRecord = z.infer<typeof DirectoryRecordSchema>;

export const PublicNodeSchema = z.union([
  z.object({ "pub/file": FileRecordSchema }).strict(),
  z.object({ "pub/dir": DirectoryRecordSchema }).strict(),
]);
export type PublicNodeRecord = z.infer<typeof PublicNodeSchema>;

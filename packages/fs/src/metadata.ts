/**
 * @dagfs/fs: Metadata
 *
 * Timestamps are whole Unix seconds; sub-second precision is dropped on
 * write so that a loaded node compares equal to the one that was stored.
 */

import type { MetadataRecord, MetadataValue } from "./serializable.ts";
import type { Metadata } from "./types.ts";

/**
 * Keys putMetadataValue refuses. `__proto__` would be dropped when the
 * record is decoded back into a plain object.
 */
export const RESERVED_METADATA_KEYS: ReadonlySet<string> = new Set([
  "created",
  "modified",
  "__proto__",
]);

export const toUnixSeconds = (time: Date): number => {
  const ms = time.getTime();
  if (Number.isNaN(ms)) {
    throw new Error("Invalid date");
  }
  return Math.floor(ms / 1000);
};

export const createMetadata = (time: Date): Metadata => {
  const seconds = toUnixSeconds(time);
  return { created: seconds, modified: seconds, extra: new Map() };
};

export const upsertMtime = (metadata: Metadata, time: Date): Metadata => ({
  ...metadata,
  modified: toUnixSeconds(time),
});

export const getCreated = (metadata: Metadata): Date => new Date(metadata.created * 1000);

export const getModified = (metadata: Metadata): Date => new Date(metadata.modified * 1000);

export const getMetadataValue = (metadata: Metadata, key: string): MetadataValue | undefined => {
  if (key === "created") return metadata.created;
  if (key === "modified") return metadata.modified;
  return metadata.extra.get(key);
};

/**
 * Set a user-defined key. `created` and `modified` are managed by
 * createMetadata / upsertMtime and cannot be set here.
 */
export const putMetadataValue = (
  metadata: Metadata,
  key: string,
  value: MetadataValue
): Metadata => {
  if (RESERVED_METADATA_KEYS.has(key)) {
    throw new Error(`Metadata key '${key}' is reserved`);
  }
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new Error(`Metadata value for '${key}' must be a finite number`);
  }
  const extra = new Map(metadata.extra);
  extra.set(key, value);
  return { ...metadata, extra };
};

export const metadataEquals = (a: Metadata, b: Metadata): boolean => {
  if (a === b) return true;
  if (a.created !== b.created || a.modified !== b.modified) return false;
  if (a.extra.size !== b.extra.size) return false;
  for (const [key, value] of a.extra) {
    if (b.extra.get(key) !== value) return false;
  }
  return true;
};

export const metadataToRecord = (metadata: Metadata): MetadataRecord => ({
  ...Object.fromEntries(metadata.extra),
  created: metadata.created,
  modified: metadata.modified,
});

export const metadataFromRecord = (record: MetadataRecord): Metadata => {
  const extra = new Map<string, MetadataValue>();
  for (const [key, value] of Object.entries(record)) {
    if (!RESERVED_METADATA_KEYS.has(key)) {
      extra.set(key, value);
    }
  }
  return { created: record.created, modified: record.modified, extra };
};

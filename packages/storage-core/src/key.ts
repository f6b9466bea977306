/**
 * Storage key helpers
 */

export const DEFAULT_PREFIX = "blocks/";

/**
 * Create storage path from a block key.
 * Uses the first 2 chars of the key as the subdirectory.
 *
 * Example: 3A8F... -> blocks/3A/3A8F...
 */
export const toStoragePath = (key: string, prefix = DEFAULT_PREFIX): string => {
  if (key.length < 2) {
    throw new Error(`Storage key too short: '${key}'`);
  }
  return `${prefix}${key.slice(0, 2)}/${key}`;
};

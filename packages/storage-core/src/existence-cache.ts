/**
 * Bounded record of keys known to be present in a backend.
 *
 * Only presence is remembered: blocks are immutable once written, so a key
 * seen once stays valid, while a miss may be filled by another writer.
 */

import QuickLRU from "quick-lru";

export const DEFAULT_CACHE_SIZE = 10000;

export type ExistenceCache = {
  isKnown: (key: string) => boolean;
  remember: (key: string) => void;
  clear: () => void;
  size: () => number;
};

export const createExistenceCache = (maxSize = DEFAULT_CACHE_SIZE): ExistenceCache => {
  const seen = new QuickLRU<string, true>({ maxSize });
  return {
    // get() rather than has() so a hit refreshes recency
    isKnown: (key) => seen.get(key) === true,
    remember: (key) => {
      seen.set(key, true);
    },
    clear: () => seen.clear(),
    size: () => seen.size,
  };
};

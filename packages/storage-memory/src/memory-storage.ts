/**
 * In-Memory Storage Provider
 *
 * Useful for testing and short-lived processes.
 */

import type { StorageProvider } from "@dagfs/storage-core";

export type MemoryStorageConfig = {
  /** Optional initial data */
  initialData?: Map<string, Uint8Array>;
};

/** Counters exposed by the inspecting variant */
export type MemoryStorageStats = {
  gets: number;
  puts: number;
};

const createProvider = (
  data: Map<string, Uint8Array>,
  stats?: MemoryStorageStats
): StorageProvider => ({
  has: async (key) => data.has(key),
  get: async (key) => {
    if (stats) stats.gets++;
    return data.get(key) ?? null;
  },
  put: async (key, value) => {
    if (stats) stats.puts++;
    if (data.has(key)) return;
    // Copy so callers can reuse their buffer
    data.set(key, value.slice());
  },
});

/**
 * Create an in-memory storage provider
 */
export const createMemoryStorage = (config: MemoryStorageConfig = {}): StorageProvider => {
  return createProvider(config.initialData ?? new Map<string, Uint8Array>());
};

/**
 * Create memory storage with inspection methods (for testing)
 */
export const createMemoryStorageWithInspection = (config: MemoryStorageConfig = {}) => {
  const data = config.initialData ?? new Map<string, Uint8Array>();
  const stats: MemoryStorageStats = { gets: 0, puts: 0 };

  return {
    ...createProvider(data, stats),
    /** get/put call counters, including puts of already-present keys */
    stats,
    /** Clear all stored data */
    clear: () => data.clear(),
    /** Get number of stored blocks */
    size: () => data.size,
    /** Get all stored keys */
    keys: () => Array.from(data.keys()),
    /** Delete a specific key */
    delete: (key: string) => data.delete(key),
    /** Get raw data map (for inspection and corruption tests) */
    getData: () => data,
  };
};

export type InspectableMemoryStorage = ReturnType<typeof createMemoryStorageWithInspection>;

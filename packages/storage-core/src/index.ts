/**
 * @dagfs/storage-core
 *
 * Storage provider contract and helpers shared by every backend.
 */

export { DEFAULT_PREFIX, toStoragePath } from "./key.ts";
export { createExistenceCache, DEFAULT_CACHE_SIZE, type ExistenceCache } from "./existence-cache.ts";
export type { StorageConfig, StorageProvider } from "./types.ts";

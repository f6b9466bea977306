/**
 * @dagfs/storage-memory
 *
 * In-memory storage provider (testing and development).
 */

export {
  createMemoryStorage,
  createMemoryStorageWithInspection,
  type InspectableMemoryStorage,
  type MemoryStorageConfig,
  type MemoryStorageStats,
} from "./memory-storage.ts";

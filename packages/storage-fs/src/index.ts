/**
 * @dagfs/storage-fs
 *
 * File system-backed storage provider for Node.js.
 */

export { createFsStorage, type FsStorageConfig, type FsStorageProvider } from "./fs-storage.ts";

/**
 * File System Storage Provider
 *
 * Implements StorageProvider with:
 * - LRU cache for key existence checks
 * - Sharded block files under a base directory
 * - Temp-file + rename writes, so readers never see a partial block
 */

import { randomUUID } from "node:crypto";
import { access, mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import {
  createExistenceCache,
  DEFAULT_PREFIX,
  type StorageConfig,
  type StorageProvider,
  toStoragePath,
} from "@dagfs/storage-core";

/**
 * File System Storage configuration
 */
export type FsStorageConfig = StorageConfig & {
  /** Base directory for storage (created on first write) */
  basePath: string;
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

/**
 * Create a file system-backed storage provider
 */
export const createFsStorage = (config: FsStorageConfig) => {
  const { basePath } = config;
  const prefix = config.prefix ?? DEFAULT_PREFIX;
  const existsCache = createExistenceCache(config.cacheSize);

  const toFilePath = (key: string): string => join(basePath, toStoragePath(key, prefix));

  const has = async (key: string): Promise<boolean> => {
    if (existsCache.isKnown(key)) {
      return true;
    }

    try {
      await access(toFilePath(key));
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        // Don't cache non-existence (it might be written later)
        return false;
      }
      throw error;
    }

    existsCache.remember(key);
    return true;
  };

  const get = async (key: string): Promise<Uint8Array | null> => {
    try {
      const buffer = await readFile(toFilePath(key));
      existsCache.remember(key);
      return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  };

  const put = async (key: string, value: Uint8Array): Promise<void> => {
    if (await has(key)) {
      return;
    }

    const filePath = toFilePath(key);
    await mkdir(dirname(filePath), { recursive: true });

    const tmpPath = `${filePath}.${randomUUID()}.tmp`;
    await writeFile(tmpPath, value);
    try {
      await rename(tmpPath, filePath);
    } catch (error: unknown) {
      await rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[FsStorage] failed to remove temp file ${tmpPath}:`, cleanupError);
      });
      throw error;
    }

    existsCache.remember(key);
  };

  const provider: StorageProvider = { has, get, put };

  return {
    ...provider,
    /** Drop cached existence entries (e.g. after external cleanup) */
    clearCache: () => existsCache.clear(),
    getCacheStats: () => ({ size: existsCache.size() }),
  };
};

export type FsStorageProvider = ReturnType<typeof createFsStorage>;

/**
 * Storage Provider interface for block storage
 *
 * Raw, content-addressed byte storage. Keys are CIDs produced by the
 * block store in `@dagfs/core`; providers never inspect or verify them.
 */
export type StorageProvider = {
  /**
   * Check if a key exists in storage
   */
  has: (key: string) => Promise<boolean>;

  /**
   * Get block bytes by key
   * Returns null if not found
   */
  get: (key: string) => Promise<Uint8Array | null>;

  /**
   * Store block bytes. Idempotent: blocks are immutable, so writing the
   * same key twice leaves the first value in place.
   */
  put: (key: string, value: Uint8Array) => Promise<void>;
};

/**
 * Shared storage provider configuration
 */
export type StorageConfig = {
  /**
   * Key prefix in storage
   * Default: "blocks/"
   */
  prefix?: string;

  /**
   * LRU cache size for key existence checks
   * Default: 10000
   */
  cacheSize?: number;
};

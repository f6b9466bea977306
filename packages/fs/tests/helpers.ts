/**
 * Shared fixtures for node tests
 */
import { type BlockStore, createBlockStore, type FsError, isFsError } from "@dagfs/core";
import {
  createMemoryStorageWithInspection,
  type InspectableMemoryStorage,
} from "@dagfs/storage-memory";

/** 2023-11-14T22:13:20.500Z; whole seconds 1_700_000_000 */
export const T1 = new Date(1_700_000_000_500);
export const T1_SECONDS = 1_700_000_000;
/** One hour after T1 */
export const T2 = new Date(1_700_003_600_000);

// Valid CIDs (26 Crockford Base32 characters), ordered C1 < C2 < C3
export const C1 = "1".repeat(26);
export const C2 = "2".repeat(26);
export const C3 = "3".repeat(26);

export type TestStore = {
  storage: InspectableMemoryStorage;
  store: BlockStore;
};

export const createTestStore = (): TestStore => {
  const storage = createMemoryStorageWithInspection();
  return { storage, store: createBlockStore({ storage }) };
};

/** Unwrap a node-layer result, failing the test on an FsError or null */
export const unwrap = <T>(result: T | FsError | null): T => {
  if (result === null) {
    throw new Error("Unexpected null result");
  }
  if (isFsError(result)) {
    throw new Error(`Unexpected ${result.code}: ${result.message}`);
  }
  return result;
};

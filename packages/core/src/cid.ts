/**
 * CID computation and helpers
 *
 * CID = Crockford Base32 (uppercase, unpadded) of BLAKE3 with a 16-byte
 * output, i.e. 26 characters.
 */

import { blake3 } from "@noble/hashes/blake3";
import type { Cid, KeyProvider } from "./types.ts";

export const CID_BYTES = 16;
export const CID_LENGTH = 26;

const CB32_ALPHABET = "0123456789ABCDEFGHJKMNPQRSTVWXYZ";
const CID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/;

/**
 * Encode bytes to Crockford Base32, MSB first, zero-padding the last group.
 */
export function encodeCB32(bytes: Uint8Array): string {
  let result = "";
  let buffer = 0;
  let bitsLeft = 0;

  for (const byte of bytes) {
    buffer = ((buffer << 8) | byte) & 0xffff;
    bitsLeft += 8;

    while (bitsLeft >= 5) {
      bitsLeft -= 5;
      result += CB32_ALPHABET.charAt((buffer >> bitsLeft) & 0x1f);
    }
  }

  if (bitsLeft > 0) {
    result += CB32_ALPHABET.charAt((buffer << (5 - bitsLeft)) & 0x1f);
  }

  return result;
}

/**
 * Turn a 16-byte key into a CID string
 */
export function keyToCid(key: Uint8Array): Cid {
  if (key.length !== CID_BYTES) {
    throw new Error(`Invalid key length: ${key.length} bytes (expected ${CID_BYTES})`);
  }
  return encodeCB32(key);
}

export function isValidCid(value: string): boolean {
  return CID_PATTERN.test(value);
}

/** Total order on CIDs (code unit order of their string form) */
export function compareCids(a: Cid, b: Cid): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Deduplicate and sort */
export function sortedCidSet(cids: Iterable<Cid>): Cid[] {
  return Array.from(new Set(cids)).sort(compareCids);
}

/**
 * BLAKE3-128 key provider (default for createBlockStore)
 */
export const createBlake3KeyProvider = (): KeyProvider => ({
  computeKey: async (data) => blake3(data, { dkLen: CID_BYTES }),
});

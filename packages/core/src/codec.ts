/**
 * Wire codec: CBOR with RFC 8949 deterministic map ordering, so that
 * equal values always produce equal bytes and therefore equal CIDs.
 */

import { decode, encode, rfc8949EncodeOptions } from "cborg";

export function encodeCbor(value: unknown): Uint8Array {
  return encode(value, rfc8949EncodeOptions);
}

export function decodeCbor(bytes: Uint8Array): unknown {
  return decode(bytes);
}

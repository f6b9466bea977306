/**
 * Metadata tests
 */
import { describe, expect, it } from "vitest";
import {
  createMetadata,
  getCreated,
  getMetadataValue,
  getModified,
  metadataEquals,
  metadataFromRecord,
  metadataToRecord,
  putMetadataValue,
  upsertMtime,
} from "../src/metadata.ts";
import { T1, T1_SECONDS, T2 } from "./helpers.ts";

describe("Metadata", () => {
  it("creates with created == modified, truncated to seconds", () => {
    const metadata = createMetadata(T1);
    expect(metadata.created).toBe(T1_SECONDS);
    expect(metadata.modified).toBe(T1_SECONDS);
    expect(getCreated(metadata)).toEqual(new Date(1_700_000_000_000));
  });

  it("upsertMtime returns a new value and leaves the original", () => {
    const original = createMetadata(T1);
    const updated = upsertMtime(original, T2);

    expect(getModified(updated)).toEqual(T2);
    expect(updated.created).toBe(T1_SECONDS);
    expect(original.modified).toBe(T1_SECONDS);
  });

  it("rejects invalid dates", () => {
    expect(() => createMetadata(new Date("not a date"))).toThrow("Invalid date");
  });

  it("stores user-defined keys", () => {
    const metadata = putMetadataValue(createMetadata(T1), "mode", 420);
    expect(getMetadataValue(metadata, "mode")).toBe(420);
    expect(getMetadataValue(metadata, "created")).toBe(T1_SECONDS);
    expect(getMetadataValue(metadata, "missing")).toBeUndefined();
  });

  it("refuses reserved keys and non-finite numbers", () => {
    const metadata = createMetadata(T1);
    expect(() => putMetadataValue(metadata, "modified", 1)).toThrow(
      "Metadata key 'modified' is reserved"
    );
    expect(() => putMetadataValue(metadata, "size", Number.POSITIVE_INFINITY)).toThrow(
      "Metadata value for 'size' must be a finite number"
    );
  });

  it("refuses __proto__ as a key", () => {
    expect(() => putMetadataValue(createMetadata(T1), "__proto__", "x")).toThrow(
      "Metadata key '__proto__' is reserved"
    );
  });

  it("compares entry-wise", () => {
    const a = putMetadataValue(createMetadata(T1), "owner", "alice");
    const b = putMetadataValue(createMetadata(T1), "owner", "alice");
    const c = putMetadataValue(createMetadata(T1), "owner", "bob");

    expect(metadataEquals(a, b)).toBe(true);
    expect(metadataEquals(a, c)).toBe(false);
    expect(metadataEquals(a, createMetadata(T1))).toBe(false);
  });

  it("converts to and from the wire record", () => {
    const metadata = putMetadataValue(createMetadata(T1), "hidden", true);
    const record = metadataToRecord(metadata);

    expect(record).toEqual({ created: T1_SECONDS, modified: T1_SECONDS, hidden: true });
    expect(metadataEquals(metadataFromRecord(record), metadata)).toBe(true);
  });
});

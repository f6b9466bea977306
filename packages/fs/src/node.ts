/**
 * @dagfs/fs: PublicNode
 *
 * Handle over exactly one of the two node variants. The handle is the only
 * mutable part: its mutators swap in a derived value and never touch the
 * value they replace, so other handles, links and callers that still
 * reference that value keep observing it unchanged.
 */

import {
  type BlockStore,
  type Cid,
  type FsError,
  isFsError,
  notADirectory,
  notAFile,
} from "@dagfs/core";
import { directoryEquals, directoryFromRecord, storeDirectory } from "./directory.ts";
import { fileEquals, fileFromRecord, storeFile } from "./file.ts";
import { prepareNextRevision, withMtime, withPrevious } from "./revision.ts";
import { PublicNodeSchema } from "./serializable.ts";
import type { Metadata, NodeKind, NodeValue, PublicDirectory, PublicFile } from "./types.ts";

export class PublicNode {
  #value: NodeValue;

  private constructor(value: NodeValue) {
    this.#value = value;
  }

  static fromFile(file: PublicFile): PublicNode {
    return new PublicNode(file);
  }

  static fromDir(dir: PublicDirectory): PublicNode {
    return new PublicNode(dir);
  }

  get kind(): NodeKind {
    return this.#value.kind;
  }

  /** New handle sharing this handle's current value */
  clone(): PublicNode {
    return new PublicNode(this.#value);
  }

  /** Set the modification time, copy-on-write */
  upsertMtime(time: Date): void {
    this.#value = withMtime(this.#value, time);
  }

  /**
   * New node whose previous-version set is `cids`, deduplicated and
   * sorted. This handle is left as it was.
   */
  updatePrevious(cids: Iterable<Cid>): PublicNode {
    return new PublicNode(withPrevious(this.#value, cids));
  }

  getPrevious(): ReadonlySet<Cid> {
    return this.#value.previous;
  }

  getMetadata(): Metadata {
    return this.#value.metadata;
  }

  /** CID the current value was stored under or loaded from */
  getPersistedAs(): Cid | undefined {
    return this.#value.persistedAs.get();
  }

  /**
   * New node for the next revision: if the current value was stored as C,
   * its previous set is {C}; otherwise it shares the current value.
   */
  prepareNextRevision(): PublicNode {
    return new PublicNode(prepareNextRevision(this.#value));
  }

  asDir(): PublicDirectory | FsError {
    return this.#value.kind === "dir" ? this.#value : notADirectory();
  }

  asFile(): PublicFile | FsError {
    return this.#value.kind === "file" ? this.#value : notAFile();
  }

  isDir(): boolean {
    return this.#value.kind === "dir";
  }

  isFile(): boolean {
    return this.#value.kind === "file";
  }

  /**
   * Store the node and return its CID. Files serialize from their fields
   * alone; directories store their in-memory children first. Repeated
   * calls on the same value return the memoized CID without writing.
   */
  store(store: BlockStore): Promise<Cid> {
    const value = this.#value;
    return value.kind === "file" ? storeFile(value, store) : storeDirectory(value, store);
  }

  /**
   * Load a node. Directory children stay addressed by CID until resolved.
   */
  static async load(cid: Cid, store: BlockStore): Promise<PublicNode | FsError> {
    const record = await store.getDeserializable(cid, PublicNodeSchema);
    if (isFsError(record)) {
      return record;
    }
    if ("pub/file" in record) {
      return new PublicNode(fileFromRecord(record["pub/file"], cid));
    }
    return new PublicNode(directoryFromRecord(record["pub/dir"], cid));
  }

  /**
   * Same variant, and either the same value or field-wise equal values.
   * The memoized CID is not compared.
   */
  equals(other: PublicNode): boolean {
    const a = this.#value;
    const b = other.#value;
    if (a.kind === "file" && b.kind === "file") {
      return a === b || fileEquals(a, b);
    }
    if (a.kind === "dir" && b.kind === "dir") {
      return a === b || directoryEquals(a, b);
    }
    return false;
  }
}

/**
 * @dagfs/fs: PublicLink
 *
 * A directory entry: a child addressed by CID, held in memory, or both.
 * In-memory children are stored on demand when their parent is stored;
 * CID-only children are loaded on demand and cached.
 */

import { type BlockStore, type Cid, type FsError, isFsError, OnceCell } from "@dagfs/core";
import { PublicNode } from "./node.ts";

export class PublicLink {
  readonly #cid: OnceCell<Cid>;
  readonly #value: OnceCell<PublicNode>;

  private constructor(cid: OnceCell<Cid>, value: OnceCell<PublicNode>) {
    this.#cid = cid;
    this.#value = value;
  }

  static fromCid(cid: Cid): PublicLink {
    return new PublicLink(OnceCell.withValue(cid), new OnceCell());
  }

  /**
   * Link to an in-memory node. The link holds its own handle, so later
   * mutations through `node` do not reach the link.
   */
  static fromNode(node: PublicNode): PublicLink {
    return new PublicLink(new OnceCell(), OnceCell.withValue(node.clone()));
  }

  /** CID if known without I/O */
  getCid(): Cid | undefined {
    return this.#cid.get() ?? this.#value.get()?.getPersistedAs();
  }

  /** A fresh handle to the cached node, if loaded or linked in memory */
  getValue(): PublicNode | undefined {
    return this.#value.get()?.clone();
  }

  /** Store the child if needed and return its CID */
  resolveCid(store: BlockStore): Promise<Cid> {
    return this.#cid.getOrInit(async () => {
      const node = this.#value.get();
      if (node === undefined) {
        throw new Error("PublicLink has neither a CID nor a value");
      }
      return node.store(store);
    });
  }

  /** Load the child if needed. Failed loads are not cached. */
  async resolveValue(store: BlockStore): Promise<PublicNode | FsError> {
    const cached = this.#value.get();
    if (cached !== undefined) {
      return cached.clone();
    }

    const cid = this.#cid.get();
    if (cid === undefined) {
      throw new Error("PublicLink has neither a CID nor a value");
    }

    const loaded = await PublicNode.load(cid, store);
    if (isFsError(loaded)) {
      return loaded;
    }
    this.#value.set(loaded);
    return (this.#value.get() ?? loaded).clone();
  }

  /**
   * Two links are equal when they address the same CID, or, when a CID is
   * not known on both sides, when their in-memory nodes are equal.
   */
  equals(other: PublicLink): boolean {
    if (this === other) return true;

    const cid = this.getCid();
    const otherCid = other.getCid();
    if (cid !== undefined && otherCid !== undefined) {
      return cid === otherCid;
    }

    const value = this.#value.get();
    const otherValue = other.#value.get();
    if (value !== undefined && otherValue !== undefined) {
      return value.equals(otherValue);
    }
    return false;
  }
}

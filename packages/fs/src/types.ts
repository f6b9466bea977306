/**
 * @dagfs/fs: Types
 *
 * File and directory values are immutable. Every derived value gets a
 * fresh `persistedAs` cell: it has not been stored under any CID yet.
 */

import type { Cid, OnceCell } from "@dagfs/core";
import type { PublicLink } from "./link.ts";
import type { MetadataValue } from "./serializable.ts";

export type Metadata = {
  /** Unix seconds */
  readonly created: number;
  /** Unix seconds */
  readonly modified: number;
  /** User-defined keys */
  readonly extra: ReadonlyMap<string, MetadataValue>;
};

export type PublicFile = {
  readonly kind: "file";
  readonly metadata: Metadata;
  /** CID of the file content; the content itself is stored elsewhere */
  readonly content: Cid;
  /** Immediate predecessor revisions, iterated in sorted order */
  readonly previous: ReadonlySet<Cid>;
  /** CID this exact value was stored under */
  readonly persistedAs: OnceCell<Cid>;
};

export type PublicDirectory = {
  readonly kind: "dir";
  readonly metadata: Metadata;
  readonly entries: ReadonlyMap<string, PublicLink>;
  readonly previous: ReadonlySet<Cid>;
  readonly persistedAs: OnceCell<Cid>;
};

/** The closed set of node variants */
export type NodeValue = PublicFile | PublicDirectory;

export type NodeKind = NodeValue["kind"];

/**
 * Commitment roots and prefixes
 */

import type { CommitmentPrefix, CommitmentRoot } from "./types.ts";

/**
 * Wrap a trusted root hash, e.g. the app hash of a verified block header.
 */
export function newRoot(hash: Uint8Array): CommitmentRoot {
  return { hash };
}

/** Raw root hash. Callers must not mutate it. */
export function rootHash(root: CommitmentRoot): Uint8Array {
  return root.hash;
}

export function isRootEmpty(root: CommitmentRoot): boolean {
  return root.hash.length === 0;
}

/**
 * Wrap a store prefix. Keys committed by the store live under this prefix.
 */
export function newPrefix(keyPrefix: Uint8Array): CommitmentPrefix {
  return { keyPrefix };
}

/** Raw prefix bytes. Callers must not mutate them. */
export function prefixBytes(prefix: CommitmentPrefix): Uint8Array {
  return prefix.keyPrefix;
}

export function isPrefixEmpty(prefix: CommitmentPrefix): boolean {
  return prefix.keyPrefix.length === 0;
}

/**
 * Proof fixtures built from single-leaf trees under the Tendermint spec.
 * Roots are computed by the ICS-23 library, never hard-coded.
 */

import { calculateExistenceRoot, tendermintSpec } from "@confio/ics23";
import type { ExistenceProof, ProofSpec, SubProof } from "../src/types.ts";

export const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

export const spec: ProofSpec = tendermintSpec;

/** Existence proof of `key` -> `value` in a tree holding only that leaf */
export function leaf(key: string, value: Uint8Array | string): ExistenceProof {
  const leafSpec = tendermintSpec.leafSpec;
  if (!leafSpec) {
    throw new Error("tendermint spec has no leaf spec");
  }
  return {
    key: utf8(key),
    value: typeof value === "string" ? utf8(value) : value,
    leaf: { ...leafSpec },
    path: [],
  };
}

export const existence = (exist: ExistenceProof): SubProof => ({ exist });

export const rootOf = (exist: ExistenceProof): Uint8Array => calculateExistenceRoot(exist);

/** Copy of `bytes` with the first byte flipped */
export function flipFirstByte(bytes: Uint8Array): Uint8Array {
  const copy = new Uint8Array(bytes);
  copy[0] = (copy[0] ?? 0) ^ 0xff;
  return copy;
}

/**
 * Two-level membership chain: ("b", "v1") stored in a subtree whose root is
 * committed under key "a" of the root tree.
 */
export function membershipChain() {
  const lower = leaf("b", "v1");
  const subroot = rootOf(lower);
  const upper = leaf("a", subroot);
  return { lower, upper, subroot, root: rootOf(upper) };
}

/**
 * Two-level non-membership chain: "b" absent from a subtree holding only
 * "a", whose root is committed under key "ibc" of the root tree.
 */
export function nonMembershipChain() {
  const left = leaf("a", "x");
  const absent: SubProof = { nonexist: { key: utf8("b"), left } };
  const subroot = rootOf(left);
  const upper = leaf("ibc", subroot);
  return { left, absent, subroot, upper, root: rootOf(upper) };
}

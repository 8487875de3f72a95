/**
 * Chained commitment proof structure checks
 */

import { fail, verified } from "./result.ts";
import type { ChainedCommitmentProof, ProofSpec, SubProof, VerifyResult } from "./types.ts";

/**
 * Assemble a chained proof. Both lists run from the lowest subtree to the
 * root tree.
 */
export function newChainedProof(
  proofs: readonly SubProof[],
  specs: readonly ProofSpec[]
): ChainedCommitmentProof {
  return { proofs, specs };
}

/**
 * True when either list is empty or any positional entry in either list is
 * missing.
 */
export function isProofEmpty(proof: ChainedCommitmentProof): boolean {
  if (proof.proofs.length === 0 || proof.specs.length === 0) {
    return true;
  }
  const longest = Math.max(proof.proofs.length, proof.specs.length);
  for (let i = 0; i < longest; i++) {
    if (i < proof.proofs.length && proof.proofs[i] == null) return true;
    if (i < proof.specs.length && proof.specs[i] == null) return true;
  }
  return false;
}

/**
 * Structural gate run before any verification: non-empty, no missing
 * entries, one spec per sub-proof.
 */
export function validateBasic(proof: ChainedCommitmentProof): VerifyResult {
  if (isProofEmpty(proof)) {
    return fail("INVALID_PROOF", "proof is empty or has missing entries");
  }
  if (proof.proofs.length !== proof.specs.length) {
    return fail(
      "INVALID_PROOF",
      `proof has ${proof.proofs.length} sub-proofs but ${proof.specs.length} specs`
    );
  }
  return verified;
}

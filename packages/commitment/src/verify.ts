/**
 * Chained proof verification.
 *
 * A chained proof shows a key/value (or a key's absence) in the lowest
 * subtree, then shows each subtree's root committed in the tree above it,
 * until the last proof is checked against the caller's trusted root.
 *
 * Proofs run leaf-to-root; path levels run root-to-leaf. Proof `i` of `n`
 * is therefore paired with path level `n - 1 - i`.
 *
 * Verification is pure and single-pass: the first failing check rejects
 * the whole chain.
 */

import { DEFAULT_MAX_CHAIN_LENGTH } from "./constants.ts";
import { ics23ProofOps } from "./ics23.ts";
import { keyPathToString } from "./key-path.ts";
import { isMerklePath, isPathEmpty, pathToString } from "./path.ts";
import { validateBasic } from "./proof.ts";
import { errorMessage, fail, succeed, verified } from "./result.ts";
import type {
  ChainedCommitmentProof,
  ChainVerifier,
  CommitmentRoot,
  ExistenceProof,
  KeyPath,
  PathLike,
  ProofOps,
  ProofSpec,
  Result,
  SubProof,
  VerifierConfig,
  VerifyResult,
} from "./types.ts";

const textEncoder = new TextEncoder();

// ============================================================================
// Helpers
// ============================================================================

type ChainLevel = {
  readonly proof: SubProof;
  readonly spec: ProofSpec;
  /** Key of this level: the rendered key path of the matching path level */
  readonly key: Uint8Array;
};

type CheckedChain = {
  readonly levels: readonly ChainLevel[];
  readonly rendered: string;
  readonly trustedRoot: Uint8Array;
};

/**
 * Shared preconditions. Runs before any hashing.
 */
function checkChain(
  proof: ChainedCommitmentProof,
  root: CommitmentRoot | null | undefined,
  path: PathLike | null | undefined,
  maxChainLength: number
): Result<CheckedChain> {
  if (!validateBasic(proof).ok || !root || root.hash.length === 0 || !path || isPathEmpty(path)) {
    return fail("INVALID_PROOF", "empty params or proof");
  }

  if (!isMerklePath(path)) {
    return fail("NOT_A_MERKLE_PATH", "path is not a merkle path for a merkle proof");
  }

  const n = proof.proofs.length;
  if (n !== path.keyPaths.length) {
    return fail(
      "INVALID_PROOF",
      `invalid chained proof: proof chain length ${n} not the same as path length ${path.keyPaths.length}`
    );
  }
  if (n > maxChainLength) {
    return fail("INVALID_PROOF", `proof chain length ${n} exceeds maximum ${maxChainLength}`);
  }

  const levels: ChainLevel[] = [];
  for (let i = 0; i < n; i++) {
    const sub = proof.proofs[i];
    const spec = proof.specs[i];
    // Proofs go from the lowest subtree up, the path from the root down.
    const keyPath: KeyPath | undefined = path.keyPaths[n - 1 - i];
    if (!sub || !spec || !keyPath) {
      return fail("INVALID_PROOF", `missing proof level ${i}`);
    }
    levels.push({ proof: sub, spec, key: textEncoder.encode(keyPathToString(keyPath)) });
  }

  return succeed({ levels, rendered: pathToString(path), trustedRoot: root.hash });
}

function calculateRoot(ops: ProofOps, exist: ExistenceProof, level: number): Result<Uint8Array> {
  try {
    return succeed(ops.calculate(exist));
  } catch (err) {
    return fail("INVALID_PROOF", `cannot calculate root of proof ${level}: ${errorMessage(err)}`);
  }
}

function runCheck(check: () => boolean, rendered: string, level: number): VerifyResult {
  let valid: boolean;
  try {
    valid = check();
  } catch (err) {
    return fail("INVALID_PROOF", `proof ${level} errored: ${errorMessage(err)}`);
  }
  return valid ? verified : fail("INVALID_PROOF", `invalid proof for path: ${rendered}`);
}

/**
 * Prove `value` present at each remaining level, starting at `from`.
 * Each level's computed root becomes the value proven one level up; the
 * last level is checked against the trusted root instead of its own
 * computed root.
 */
function proveInclusionChain(
  ops: ProofOps,
  chain: CheckedChain,
  from: number,
  value: Uint8Array
): VerifyResult {
  const last = chain.levels.length - 1;
  let current = value;

  for (let i = from; i <= last; i++) {
    const level = chain.levels[i];
    if (!level) {
      return fail("INVALID_PROOF", `missing proof level ${i}`);
    }
    const exist = level.proof.exist;
    if (!exist) {
      return fail("INVALID_PROOF", "proof is not an existence proof");
    }

    const subroot = calculateRoot(ops, exist, i);
    if (!subroot.ok) return subroot;

    const anchor = i === last ? chain.trustedRoot : subroot.value;
    const provedValue = current;
    const check = runCheck(
      () => ops.verifyMembership(level.spec, anchor, level.proof, level.key, provedValue),
      chain.rendered,
      i
    );
    if (!check.ok) return check;

    current = subroot.value;
  }

  return verified;
}

// ============================================================================
// Algorithms
// ============================================================================

function membership(
  ops: ProofOps,
  maxChainLength: number,
  proof: ChainedCommitmentProof,
  root: CommitmentRoot | null | undefined,
  path: PathLike | null | undefined,
  value: Uint8Array
): VerifyResult {
  if (value.length === 0) {
    return fail("INVALID_PROOF", "empty params or proof");
  }
  const chain = checkChain(proof, root, path, maxChainLength);
  if (!chain.ok) return chain;

  return proveInclusionChain(ops, chain.value, 0, value);
}

function nonMembership(
  ops: ProofOps,
  maxChainLength: number,
  proof: ChainedCommitmentProof,
  root: CommitmentRoot | null | undefined,
  path: PathLike | null | undefined
): VerifyResult {
  const chain = checkChain(proof, root, path, maxChainLength);
  if (!chain.ok) return chain;

  const { levels, rendered, trustedRoot } = chain.value;
  const lowest = levels[0];
  if (!lowest) {
    return fail("INVALID_PROOF", "missing proof level 0");
  }

  // The lowest subtree proves absence; its root is recomputed from the left
  // neighbour of the gap.
  const nonexist = lowest.proof.nonexist;
  if (!nonexist) {
    return fail("INVALID_PROOF", "proof is not a nonexistence proof");
  }
  if (!nonexist.left) {
    return fail("INVALID_PROOF", "nonexistence proof has no left neighbor");
  }

  const subroot = calculateRoot(ops, nonexist.left, 0);
  if (!subroot.ok) return subroot;

  // A one-level chain has no upper tree to anchor it, so it is checked
  // against the trusted root directly.
  const anchor = levels.length === 1 ? trustedRoot : subroot.value;
  const check = runCheck(
    () => ops.verifyNonMembership(lowest.spec, anchor, lowest.proof, lowest.key),
    rendered,
    0
  );
  if (!check.ok) return check;

  return proveInclusionChain(ops, chain.value, 1, subroot.value);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Create a verifier with its own primitive, chain bound and logger.
 *
 * @example
 * ```ts
 * const verifier = createChainVerifier({ maxChainLength: 2, logger: console });
 * const result = verifier.verifyMembership(proof, root, path, value);
 * if (!result.ok) reject(result.message);
 * ```
 */
export function createChainVerifier(config: VerifierConfig = {}): ChainVerifier {
  const ops = config.proofOps ?? ics23ProofOps;
  const maxChainLength = config.maxChainLength ?? DEFAULT_MAX_CHAIN_LENGTH;
  const logger = config.logger;

  const report = (
    kind: "membership" | "non-membership",
    path: PathLike | null | undefined,
    result: VerifyResult
  ): VerifyResult => {
    if (!logger) return result;
    if (result.ok) {
      logger.debug(`[ChainVerifier] ${kind} verified for ${path ? pathToString(path) : ""}`);
    } else {
      logger.warn(`[ChainVerifier] ${kind} rejected (${result.code}): ${result.message}`);
    }
    return result;
  };

  return {
    verifyMembership: (proof, root, path, value) =>
      report("membership", path, membership(ops, maxChainLength, proof, root, path, value)),
    verifyNonMembership: (proof, root, path) =>
      report("non-membership", path, nonMembership(ops, maxChainLength, proof, root, path)),
  };
}

const defaultVerifier = createChainVerifier();

/**
 * Verify that `value` is stored at `path` under the trusted `root`, using
 * the default verifier (ICS-23 primitive, default chain bound, no logging).
 */
export function verifyMembership(
  proof: ChainedCommitmentProof,
  root: CommitmentRoot | null | undefined,
  path: PathLike | null | undefined,
  value: Uint8Array
): VerifyResult {
  return defaultVerifier.verifyMembership(proof, root, path, value);
}

/**
 * Verify that nothing is stored at `path` under the trusted `root`, using
 * the default verifier.
 */
export function verifyNonMembership(
  proof: ChainedCommitmentProof,
  root: CommitmentRoot | null | undefined,
  path: PathLike | null | undefined
): VerifyResult {
  return defaultVerifier.verifyNonMembership(proof, root, path);
}

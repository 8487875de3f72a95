/**
 * Types for chained commitment proofs.
 *
 * Proofs are ordered from the lowest subtree up to the root tree, while
 * paths are ordered from the root down to the leaf.
 */

import type { ics23 } from "@confio/ics23";
import type { PathValidator } from "@chainproof/host";
import type { MERKLE } from "./constants.ts";

// ============================================================================
// Roots & prefixes
// ============================================================================

/**
 * Trusted root hash. Zero length means unset.
 */
export type CommitmentRoot = {
  readonly hash: Uint8Array;
};

/**
 * Namespace prepended to every key of a store.
 */
export type CommitmentPrefix = {
  readonly keyPrefix: Uint8Array;
};

// ============================================================================
// Paths
// ============================================================================

/** How a key segment is rendered in the path string */
export type KeyEncoding = "url" | "hex";

/**
 * One key segment.
 * - "url" segments render percent-encoded
 * - "hex" segments render as `x:` + upper-case hex
 */
export type KeySegment = {
  readonly name: Uint8Array;
  readonly encoding: KeyEncoding;
};

/** Ordered segments addressing a key inside one tree */
export type KeyPath = readonly KeySegment[];

/**
 * Path through a chain of nested Merkle trees.
 * `keyPaths[0]` is the level closest to the trust root.
 */
export type CommitmentPath = {
  readonly commitmentType: typeof MERKLE;
  readonly keyPaths: readonly KeyPath[];
};

/**
 * Path belonging to some other commitment scheme, carried as its rendered
 * string. Merkle operations reject it with NOT_A_MERKLE_PATH.
 */
export type ForeignPath = {
  readonly commitmentType: string;
  readonly path: string;
};

/** Any path a caller can hand to the commitment API */
export type PathLike = CommitmentPath | ForeignPath;

// ============================================================================
// Proofs
// ============================================================================

/** Single-tree proof (Existence or NonExistence variant) */
export type SubProof = ics23.ICommitmentProof;

/** Hashing and encoding rules for one tree level */
export type ProofSpec = ics23.IProofSpec;

/** Leaf value plus the sibling data needed to recompute a subtree root */
export type ExistenceProof = ics23.IExistenceProof;

/**
 * Chain of per-level proofs, lowest subtree first, root tree last.
 * `proofs[i]` is checked with `specs[i]`.
 *
 * Entries may be null when decoded from untrusted input; `validateBasic`
 * rejects such proofs.
 */
export type ChainedCommitmentProof = {
  readonly proofs: readonly (SubProof | null | undefined)[];
  readonly specs: readonly (ProofSpec | null | undefined)[];
};

// ============================================================================
// Single-tree primitive — injected
// ============================================================================

/**
 * Single-tree proof primitive the chain verifier is built on.
 * Implementations may throw; the verifier reports throws as INVALID_PROOF.
 */
export type ProofOps = {
  /** Recompute the root hash committed to by an existence proof */
  calculate: (proof: ExistenceProof) => Uint8Array;

  /** Does `proof` show `key` -> `value` under `root`? */
  verifyMembership: (
    spec: ProofSpec,
    root: Uint8Array,
    proof: SubProof,
    key: Uint8Array,
    value: Uint8Array
  ) => boolean;

  /** Does `proof` show `key` is absent under `root`? */
  verifyNonMembership: (
    spec: ProofSpec,
    root: Uint8Array,
    proof: SubProof,
    key: Uint8Array
  ) => boolean;
};

// ============================================================================
// Verifier configuration
// ============================================================================

/**
 * Logger accepted by the chain verifier. `console` satisfies it.
 */
export type VerifierLogger = {
  debug: (message: string) => void;
  warn: (message: string) => void;
};

export type VerifierConfig = {
  /** Single-tree primitive (default: ics23ProofOps) */
  proofOps?: ProofOps;
  /** Longest proof chain accepted (default: DEFAULT_MAX_CHAIN_LENGTH) */
  maxChainLength?: number;
  /** Receives rejections (warn) and accepted chains (debug); silent when omitted */
  logger?: VerifierLogger;
};

export type ChainVerifier = {
  verifyMembership: (
    proof: ChainedCommitmentProof,
    root: CommitmentRoot | null | undefined,
    path: PathLike | null | undefined,
    value: Uint8Array
  ) => VerifyResult;
  verifyNonMembership: (
    proof: ChainedCommitmentProof,
    root: CommitmentRoot | null | undefined,
    path: PathLike | null | undefined
  ) => VerifyResult;
};

export type ApplyPrefixOptions = {
  /** Grammar the rendered path must satisfy (default: defaultPathValidator) */
  validator?: PathValidator;
};

// ============================================================================
// Result types
// ============================================================================

/** Possible commitment error codes. */
export type CommitmentErrorCode =
  | "INVALID_PROOF"
  | "EMPTY_PREFIX"
  | "INVALID_PATH"
  | "NOT_A_MERKLE_PATH"
  | "MALFORMED_ENCODING"
  | "INVALID_ENCODING";

/** Operation failure. */
export type CommitmentFailure = {
  readonly ok: false;
  readonly code: CommitmentErrorCode;
  readonly message: string;
};

/** Verification outcome: success carries no value. */
export type VerifyResult = { readonly ok: true } | CommitmentFailure;

/** Outcome of an operation producing a value. */
export type Result<T> = { readonly ok: true; readonly value: T } | CommitmentFailure;

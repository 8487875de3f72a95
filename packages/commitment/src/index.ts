/**
 * @chainproof/commitment — chained Merkle commitment proofs.
 *
 * This package contains:
 * - Types (CommitmentRoot, CommitmentPrefix, CommitmentPath, ChainedCommitmentProof, ...)
 * - Roots & prefixes (newRoot, newPrefix, ...)
 * - Paths (newPath, applyPrefix, pathToString, prettyPath, key-path helpers)
 * - Proof structure (newChainedProof, isProofEmpty, validateBasic)
 * - Verification (verifyMembership, verifyNonMembership, createChainVerifier)
 * - Wire codec (encode/decode for every type)
 *
 * The single-tree primitive is injected through ProofOps; ics23ProofOps is
 * the default.
 */

// Types
export type {
  ApplyPrefixOptions,
  ChainedCommitmentProof,
  ChainVerifier,
  CommitmentErrorCode,
  CommitmentFailure,
  CommitmentPath,
  CommitmentPrefix,
  CommitmentRoot,
  ExistenceProof,
  ForeignPath,
  KeyEncoding,
  KeyPath,
  KeySegment,
  PathLike,
  ProofOps,
  ProofSpec,
  Result,
  SubProof,
  VerifierConfig,
  VerifierLogger,
  VerifyResult,
} from "./types.ts";

// Constants
export {
  DEFAULT_MAX_CHAIN_LENGTH,
  HEX_SEGMENT_PREFIX,
  MERKLE,
  PATH_SEPARATOR,
} from "./constants.ts";

// Roots & prefixes
export {
  isPrefixEmpty,
  isRootEmpty,
  newPrefix,
  newRoot,
  prefixBytes,
  rootHash,
} from "./root.ts";

// Paths
export { appendKey, keyPathToString, parseKeyPath } from "./key-path.ts";
export {
  applyPrefix,
  isMerklePath,
  isPathEmpty,
  newPath,
  pathFromKeyPaths,
  pathToString,
  prettyPath,
} from "./path.ts";

// Proof structure
export { isProofEmpty, newChainedProof, validateBasic } from "./proof.ts";

// Verification
export { ics23ProofOps } from "./ics23.ts";
export {
  createChainVerifier,
  verifyMembership,
  verifyNonMembership,
} from "./verify.ts";

// Wire codec
export type {
  ChainedProofWire,
  CommitmentPathWire,
  CommitmentPrefixWire,
  CommitmentRootWire,
  KeySegmentWire,
} from "./codec.ts";
export {
  ChainedProofWireSchema,
  CommitmentPathWireSchema,
  CommitmentPrefixWireSchema,
  CommitmentRootWireSchema,
  decodeChainedProof,
  decodePath,
  decodePrefix,
  decodeRoot,
  encodeChainedProof,
  encodePath,
  encodePrefix,
  encodeRoot,
  KeySegmentWireSchema,
  parseChainedProofJson,
} from "./codec.ts";

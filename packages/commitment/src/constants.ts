/**
 * Commitment constants
 */

/** Commitment type tag carried by Merkle paths */
export const MERKLE = "merkle";

/** Separator between segments and between key-path levels */
export const PATH_SEPARATOR = "/";

/** Rendered prefix marking a hex-encoded key segment */
export const HEX_SEGMENT_PREFIX = "x:";

/**
 * Default upper bound on the number of chained sub-proofs a verifier accepts.
 * Verification cost is linear in chain length; real deployments use 1-2 levels.
 */
export const DEFAULT_MAX_CHAIN_LENGTH = 8;

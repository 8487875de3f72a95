/**
 * Store path grammar types
 */

/** Identifier kinds with their own length bounds */
export type IdentifierKind = "default" | "client" | "connection" | "channel" | "port";

/** Possible host validation error codes */
export type HostErrorCode = "INVALID_IDENTIFIER" | "INVALID_PATH";

/** Validation success */
export type HostValidationSuccess = {
  readonly ok: true;
};

/** Validation failure */
export type HostValidationFailure = {
  readonly ok: false;
  readonly code: HostErrorCode;
  readonly message: string;
};

export type HostValidationResult = HostValidationSuccess | HostValidationFailure;

/**
 * Validates a rendered path string.
 * Pluggable so that callers can enforce a stricter grammar.
 */
export type PathValidator = (path: string) => HostValidationResult;

/**
 * Consensus height, rendered as `{revisionNumber}-{revisionHeight}`
 */
export type Height = {
  readonly revisionNumber: number;
  readonly revisionHeight: number;
};

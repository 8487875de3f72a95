/**
 * @chainproof/host — store path grammar.
 *
 * This package contains:
 * - Identifier validation (validateIdentifier and per-kind wrappers)
 * - Rendered path validation (defaultPathValidator)
 * - Well-known store path builders (clientStatePath, channelPath, ...)
 *
 * No I/O. Validators return `{ ok, code, message }` results.
 */

// Types
export type {
  Height,
  HostErrorCode,
  HostValidationFailure,
  HostValidationResult,
  HostValidationSuccess,
  IdentifierKind,
  PathValidator,
} from "./types.ts";

// Constants
export {
  IDENTIFIER_BOUNDS,
  IDENTIFIER_CHARS_REGEX,
  MAX_PATH_SEGMENT_LENGTH,
  PATH_SEGMENT_REGEX,
  PATH_SEPARATOR,
} from "./constants.ts";

// Identifiers
export {
  validateChannelId,
  validateClientId,
  validateConnectionId,
  validateIdentifier,
  validatePortId,
} from "./identifier.ts";

// Paths
export { defaultPathValidator } from "./path-validator.ts";
export {
  channelPath,
  clientStatePath,
  connectionPath,
  consensusStatePath,
  formatHeight,
  nextSequenceRecvPath,
  packetAcknowledgementPath,
  packetCommitmentPath,
} from "./paths.ts";

/**
 * @chainproof/encoding
 *
 * Shared byte-string encodings for the chainproof packages.
 *
 * - Hex encode/decode
 * - Base64 encode/decode (wire form of raw bytes)
 * - Path-segment percent-encoding (store key rendering)
 *
 * This package has zero runtime dependencies so that both
 * `@chainproof/host` and `@chainproof/commitment` can import it.
 */

export { base64Decode, base64Encode, isValidBase64 } from "./base64.ts";
export { bytesToHex, hexToBytes, isValidHex } from "./hex.ts";
export { escapePathSegment, unescapePath, unescapePathToString } from "./path-escape.ts";

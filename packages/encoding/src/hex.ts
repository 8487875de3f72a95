/**
 * Hex encoding/decoding utilities
 */

const HEX_REGEX = /^[0-9a-fA-F]*$/;

/**
 * Convert bytes to hex string.
 *
 * @param bytes - Bytes to encode
 * @returns Lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/**
 * Check whether a string is well-formed hex (even length, hex digits only).
 * Accepts either case.
 */
export function isValidHex(hex: string): boolean {
  return hex.length % 2 === 0 && HEX_REGEX.test(hex);
}

/**
 * Convert hex string to bytes.
 *
 * @param hex - Hex string (must have even length)
 * @returns Decoded bytes
 * @throws Error if hex string has odd length or contains non-hex characters
 */
export function hexToBytes(hex: string): Uint8Array {
  if (hex.length % 2 !== 0) {
    throw new Error("Hex string must have even length");
  }
  if (!HEX_REGEX.test(hex)) {
    throw new Error(`Invalid hex string: "${hex}"`);
  }

  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }

  return bytes;
}

/**
 * Base64 encoding/decoding (RFC 4648 Section 4)
 *
 * Standard alphabet with `=` padding — the form protobuf JSON and most
 * chain tooling use for raw bytes.
 */

const BASE64_REGEX = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Encode bytes to Base64 string.
 *
 * @param bytes - Bytes to encode
 * @returns Padded Base64 string
 */
export function base64Encode(bytes: Uint8Array): string {
  let binary = "";
  for (const byte of bytes) {
    binary += String.fromCharCode(byte);
  }
  return btoa(binary);
}

/**
 * Check whether a string is canonical padded Base64.
 */
export function isValidBase64(str: string): boolean {
  return BASE64_REGEX.test(str);
}

/**
 * Decode Base64 string to bytes.
 *
 * @param str - Padded Base64 string
 * @returns Decoded bytes
 * @throws Error if the input is not canonical padded Base64
 */
export function base64Decode(str: string): Uint8Array {
  if (!BASE64_REGEX.test(str)) {
    throw new Error(`Invalid Base64 string: "${str}"`);
  }

  const binary = atob(str);
  const bytes = new Uint8Array(binary.length);
  for (let i = 0; i < binary.length; i++) {
    bytes[i] = binary.charCodeAt(i);
  }
  return bytes;
}

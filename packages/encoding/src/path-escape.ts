/**
 * Path-segment percent-encoding.
 *
 * Byte-for-byte compatible with Go's `url.PathEscape` / `url.PathUnescape`,
 * which is how store keys are rendered on the wire:
 *
 * - `A-Z a-z 0-9 - _ . ~` and `$ & + : = @` are emitted literally
 * - every other byte (including `/`, `;`, `,`, `?` and space) becomes `%XX`
 *   with upper-case hex digits
 *
 * Segments are raw bytes, so non-UTF-8 keys survive a round trip.
 */

const PERCENT = 0x25;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

const LITERAL_PUNCTUATION = new Set(Array.from("-_.~$&+:=@", (c) => c.charCodeAt(0)));

function isLiteral(byte: number): boolean {
  return (
    (byte >= 0x30 && byte <= 0x39) || // 0-9
    (byte >= 0x41 && byte <= 0x5a) || // A-Z
    (byte >= 0x61 && byte <= 0x7a) || // a-z
    LITERAL_PUNCTUATION.has(byte)
  );
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

/**
 * Percent-encode one path segment.
 *
 * @param segment - Raw segment bytes, or a string (encoded as UTF-8 first)
 * @returns Escaped segment, safe to join with `/`
 *
 * @example
 * ```ts
 * escapePathSegment("ports/transfer") // => "ports%2Ftransfer"
 * escapePathSegment("a b")            // => "a%20b"
 * ```
 */
export function escapePathSegment(segment: Uint8Array | string): string {
  const bytes = typeof segment === "string" ? textEncoder.encode(segment) : segment;
  let result = "";
  for (const byte of bytes) {
    if (isLiteral(byte)) {
      result += String.fromCharCode(byte);
    } else {
      result += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return result;
}

/**
 * Decode a percent-encoded string back into raw bytes.
 *
 * Only `%XX` sequences are decoded; `/` separators are kept as-is, so this
 * works on whole rendered paths as well as single segments.
 *
 * @throws Error if a `%` is not followed by two hex digits
 */
export function unescapePath(escaped: string): Uint8Array {
  const input = textEncoder.encode(escaped);
  const output = new Uint8Array(input.length);
  let length = 0;

  for (let i = 0; i < input.length; i++) {
    const byte = input[i]!;
    if (byte !== PERCENT) {
      output[length++] = byte;
      continue;
    }

    const hi = i + 1 < input.length ? hexValue(input[i + 1]!) : -1;
    const lo = i + 2 < input.length ? hexValue(input[i + 2]!) : -1;
    if (hi < 0 || lo < 0) {
      const bad = textDecoder.decode(input.slice(i, i + 3));
      throw new Error(`Invalid URL escape "${bad}"`);
    }
    output[length++] = (hi << 4) | lo;
    i += 2;
  }

  return output.slice(0, length);
}

/**
 * Decode a percent-encoded string and interpret the bytes as UTF-8.
 * Invalid UTF-8 sequences are replaced with U+FFFD.
 *
 * @throws Error if a `%` is not followed by two hex digits
 */
export function unescapePathToString(escaped: string): string {
  return textDecoder.decode(unescapePath(escaped));
}

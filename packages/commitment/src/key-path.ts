/**
 * Key paths — ordered key segments inside one tree.
 *
 * Rendered form: segments joined with "/", where
 * - url segments are percent-encoded (Go `url.PathEscape` rules)
 * - hex segments are `x:` followed by upper-case hex
 *
 * A url segment whose raw name itself starts with "x:" renders the same as a
 * hex segment; parseKeyPath reads such strings back as hex.
 */

import {
  bytesToHex,
  escapePathSegment,
  hexToBytes,
  isValidHex,
  unescapePath,
} from "@chainproof/encoding";
import { HEX_SEGMENT_PREFIX, PATH_SEPARATOR } from "./constants.ts";
import { errorMessage, fail, succeed } from "./result.ts";
import type { KeyEncoding, KeyPath, KeySegment, Result } from "./types.ts";

const textEncoder = new TextEncoder();

/**
 * Return a new key path with one more segment.
 *
 * @param keyPath  - Existing key path (not modified)
 * @param name     - Segment bytes, or a string taken as UTF-8
 * @param encoding - Rendering of the segment
 */
export function appendKey(
  keyPath: KeyPath,
  name: Uint8Array | string,
  encoding: KeyEncoding = "url"
): KeyPath {
  const bytes = typeof name === "string" ? textEncoder.encode(name) : name;
  return [...keyPath, { name: bytes, encoding }];
}

function formatSegment(segment: KeySegment): string {
  switch (segment.encoding) {
    case "url":
      return escapePathSegment(segment.name);
    case "hex":
      return `${HEX_SEGMENT_PREFIX}${bytesToHex(segment.name).toUpperCase()}`;
  }
}

/**
 * Render a key path.
 *
 * @example
 * ```ts
 * keyPathToString(appendKey(appendKey([], "ports/transfer"), new Uint8Array([1, 2]), "hex"))
 * // => "ports%2Ftransfer/x:0102"
 * ```
 */
export function keyPathToString(keyPath: KeyPath): string {
  return keyPath.map(formatSegment).join(PATH_SEPARATOR);
}

/**
 * Parse a rendered key path back into segments.
 *
 * Fails with MALFORMED_ENCODING on bad percent escapes or bad hex.
 * The empty string parses to the empty key path.
 */
export function parseKeyPath(rendered: string): Result<KeyPath> {
  if (rendered === "") {
    return succeed([]);
  }

  const segments: KeySegment[] = [];
  for (const raw of rendered.split(PATH_SEPARATOR)) {
    if (raw.startsWith(HEX_SEGMENT_PREFIX)) {
      const hex = raw.slice(HEX_SEGMENT_PREFIX.length);
      if (!isValidHex(hex)) {
        return fail("MALFORMED_ENCODING", `Invalid hex key segment: "${raw}"`);
      }
      segments.push({ name: hexToBytes(hex), encoding: "hex" });
      continue;
    }

    try {
      segments.push({ name: unescapePath(raw), encoding: "url" });
    } catch (err) {
      return fail("MALFORMED_ENCODING", `Invalid key segment "${raw}": ${errorMessage(err)}`);
    }
  }

  return succeed(segments);
}

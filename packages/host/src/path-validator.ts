/**
 * Rendered store path validation
 *
 * Grammar: segment ("/" segment)*
 * - path must be non-empty
 * - no leading, trailing or doubled separators
 * - each segment is 1-128 characters from PATH_SEGMENT_REGEX
 */

import { MAX_PATH_SEGMENT_LENGTH, PATH_SEGMENT_REGEX, PATH_SEPARATOR } from "./constants.ts";
import type { HostValidationFailure, HostValidationResult, PathValidator } from "./types.ts";

function invalid(message: string): HostValidationFailure {
  return { ok: false, code: "INVALID_PATH", message };
}

/**
 * Default path validator.
 *
 * Operates on the *rendered* (percent-escaped) form of a path, so escaped
 * bytes such as `%2F` are accepted while raw spaces are not.
 *
 * @example
 * ```ts
 * defaultPathValidator("clients/07-tendermint-0/clientState") // => { ok: true }
 * defaultPathValidator("/clients")
 * // => { ok: false, code: "INVALID_PATH", message: "path /clients cannot begin or end with '/'" }
 * ```
 */
export const defaultPathValidator: PathValidator = (path: string): HostValidationResult => {
  if (path === "") {
    return invalid("path cannot be empty");
  }
  if (path.startsWith(PATH_SEPARATOR) || path.endsWith(PATH_SEPARATOR)) {
    return invalid(`path ${path} cannot begin or end with '${PATH_SEPARATOR}'`);
  }

  const segments = path.split(PATH_SEPARATOR);
  for (const [i, segment] of segments.entries()) {
    if (segment === "") {
      return invalid(`path ${path} contains an empty segment at position ${i}`);
    }
    if (segment.length > MAX_PATH_SEGMENT_LENGTH) {
      return invalid(
        `path ${path} segment ${i} exceeds ${MAX_PATH_SEGMENT_LENGTH} characters`
      );
    }
    if (!PATH_SEGMENT_REGEX.test(segment)) {
      return invalid(`path ${path} segment "${segment}" contains invalid characters`);
    }
  }

  return { ok: true };
};

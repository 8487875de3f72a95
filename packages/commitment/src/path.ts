/**
 * Commitment paths and prefix application
 */

import { unescapePathToString } from "@chainproof/encoding";
import { defaultPathValidator } from "@chainproof/host";
import { MERKLE, PATH_SEPARATOR } from "./constants.ts";
import { appendKey, keyPathToString } from "./key-path.ts";
import { errorMessage, fail, succeed } from "./result.ts";
import type {
  ApplyPrefixOptions,
  CommitmentPath,
  CommitmentPrefix,
  KeyPath,
  PathLike,
  Result,
} from "./types.ts";

/**
 * Build a single-level commitment path, one url-encoded segment per string.
 *
 * @example
 * ```ts
 * pathToString(newPath(["clients", "07-tendermint-0", "clientState"]))
 * // => "clients/07-tendermint-0/clientState"
 * ```
 */
export function newPath(segments: readonly string[]): CommitmentPath {
  const keyPath = segments.reduce<KeyPath>((acc, segment) => appendKey(acc, segment, "url"), []);
  return { commitmentType: MERKLE, keyPaths: [keyPath] };
}

/** Build a commitment path directly from key-path levels, root level first. */
export function pathFromKeyPaths(keyPaths: readonly KeyPath[]): CommitmentPath {
  return { commitmentType: MERKLE, keyPaths };
}

export function isMerklePath(path: PathLike): path is CommitmentPath {
  return path.commitmentType === MERKLE && "keyPaths" in path;
}

/**
 * Render a path: each key-path level rendered, levels joined with "/".
 * A path with no levels renders as "".
 */
export function pathToString(path: PathLike): string {
  if (!isMerklePath(path)) {
    return path.path;
  }
  return path.keyPaths.map(keyPathToString).join(PATH_SEPARATOR);
}

/**
 * Rendered path with percent-escapes decoded, for display.
 *
 * Fails with MALFORMED_ENCODING when the rendered string holds an invalid
 * escape (only possible for foreign paths, whose strings are taken as-is).
 */
export function prettyPath(path: PathLike): Result<string> {
  const rendered = pathToString(path);
  try {
    return succeed(unescapePathToString(rendered));
  } catch (err) {
    return fail("MALFORMED_ENCODING", `Cannot unescape path ${rendered}: ${errorMessage(err)}`);
  }
}

/** True when the path has no key-path levels (foreign: empty string). */
export function isPathEmpty(path: PathLike): boolean {
  if (!isMerklePath(path)) {
    return path.path === "";
  }
  return path.keyPaths.length === 0;
}

/**
 * Interpret `path` inside the store namespaced by `prefix`.
 *
 * The prefix becomes a new outermost key-path level, so the result is a
 * chained path: the prefix addresses the store in the root tree, the
 * original levels address the key inside the store.
 *
 * Checks, in order:
 *   1. rendered path satisfies the validator → INVALID_PATH
 *   2. prefix present and non-empty          → EMPTY_PREFIX
 *   3. path is a Merkle path                 → NOT_A_MERKLE_PATH
 */
export function applyPrefix(
  prefix: CommitmentPrefix | null | undefined,
  path: PathLike,
  options: ApplyPrefixOptions = {}
): Result<CommitmentPath> {
  const validate = options.validator ?? defaultPathValidator;
  const validation = validate(pathToString(path));
  if (!validation.ok) {
    return fail("INVALID_PATH", validation.message);
  }

  if (!prefix || prefix.keyPrefix.length === 0) {
    return fail("EMPTY_PREFIX", "prefix can't be empty");
  }

  if (!isMerklePath(path)) {
    return fail("NOT_A_MERKLE_PATH", `path is not a merkle path (type: ${path.commitmentType})`);
  }

  const prefixLevel = appendKey([], prefix.keyPrefix, "url");
  return succeed(pathFromKeyPaths([prefixLevel, ...path.keyPaths]));
}

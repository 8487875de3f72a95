/**
 * Command-line input decoding: proof files, roots, values and paths.
 */

import * as fs from "node:fs";
import {
  applyPrefix,
  type ChainedCommitmentProof,
  type CommitmentPath,
  type CommitmentRoot,
  newPath,
  newPrefix,
  newRoot,
  parseChainedProofJson,
  type Result,
} from "@chainproof/commitment";
import { hexToBytes } from "@chainproof/encoding";
import type { ValueEncoding } from "./config.ts";

const textEncoder = new TextEncoder();

export function decodeValue(value: string, encoding: ValueEncoding): Uint8Array {
  return encoding === "hex" ? hexToBytes(value) : textEncoder.encode(value);
}

export function parseRoot(hex: string): CommitmentRoot {
  return newRoot(hexToBytes(hex));
}

export function readProofFile(file: string): Result<ChainedCommitmentProof> {
  return parseChainedProofJson(fs.readFileSync(file, "utf-8"));
}

/**
 * Build the path to verify. With a prefix the store prefix becomes the
 * outer level; without one the segments form a single-level path.
 */
export function buildPath(segments: string[], prefix: string | undefined): Result<CommitmentPath> {
  const path = newPath(segments);
  if (prefix === undefined) {
    return { ok: true, value: path };
  }
  return applyPrefix(newPrefix(textEncoder.encode(prefix)), path);
}

/**
 * `--prefix <p>` wins, `--no-prefix` (false) disables the configured default.
 */
export function resolvePrefix(
  option: string | false | undefined,
  defaultPrefix: string | undefined
): string | undefined {
  if (option === false) return undefined;
  return option ?? defaultPrefix;
}

/**
 * CLI E2E Test Setup
 *
 * Creates an isolated CHAINPROOF_HOME per suite and writes proof files
 * built from single-leaf ICS-23 trees, so roots are computed rather than
 * hard-coded.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  encodeChainedProof,
  type ExistenceProof,
  newChainedProof,
  type SubProof,
} from "@chainproof/commitment";
import { bytesToHex } from "@chainproof/encoding";
import { calculateExistenceRoot, tendermintSpec } from "@confio/ics23";

const utf8 = (text: string): Uint8Array => new TextEncoder().encode(text);

// ============================================================================
// Context
// ============================================================================

export interface CliTestContext {
  /** Temporary CHAINPROOF_HOME */
  home: string;
  /** Write a file under the temporary home, returning its path */
  writeFile: (name: string, content: string) => string;
  cleanup: () => void;
}

export function createCliTestContext(): CliTestContext {
  const previous = process.env.CHAINPROOF_HOME;
  const home = mkdtempSync(join(tmpdir(), "chainproof-cli-"));
  process.env.CHAINPROOF_HOME = home;

  return {
    home,
    writeFile: (name, content) => {
      const file = join(home, name);
      writeFileSync(file, content, "utf-8");
      return file;
    },
    cleanup: () => {
      if (previous === undefined) {
        delete process.env.CHAINPROOF_HOME;
      } else {
        process.env.CHAINPROOF_HOME = previous;
      }
      rmSync(home, { recursive: true, force: true });
    },
  };
}

// ============================================================================
// Proof files
// ============================================================================

export interface ProofFixture {
  /** Chained proof wire JSON */
  json: string;
  /** Trusted root as hex */
  rootHex: string;
}

function leaf(key: string, value: Uint8Array): ExistenceProof {
  const leafSpec = tendermintSpec.leafSpec;
  if (!leafSpec) {
    throw new Error("tendermint spec has no leaf spec");
  }
  return { key: utf8(key), value, leaf: { ...leafSpec }, path: [] };
}

function toFixture(proofs: SubProof[], root: Uint8Array): ProofFixture {
  const wire = encodeChainedProof(newChainedProof(proofs, [tendermintSpec, tendermintSpec]));
  if (!wire.ok) {
    throw new Error(wire.message);
  }
  return { json: JSON.stringify(wire.value), rootHex: bytesToHex(root) };
}

/**
 * "channels/channel-0" -> "open" in a store committed under "ibc"
 */
export function membershipFixture(): ProofFixture {
  const lower = leaf("channels/channel-0", utf8("open"));
  const upper = leaf("ibc", calculateExistenceRoot(lower));
  return toFixture([{ exist: lower }, { exist: upper }], calculateExistenceRoot(upper));
}

/**
 * "channels/channel-1" absent from the same store
 */
export function nonMembershipFixture(): ProofFixture {
  const left = leaf("channels/channel-0", utf8("open"));
  const upper = leaf("ibc", calculateExistenceRoot(left));
  return toFixture(
    [{ nonexist: { key: utf8("channels/channel-1"), left } }, { exist: upper }],
    calculateExistenceRoot(upper)
  );
}

/**
 * Wire encoding of commitment types.
 *
 * JSON objects validated with zod; raw bytes are padded Base64. Sub-proofs
 * and specs travel as the Base64 of their ICS-23 protobuf encoding.
 *
 * Decoding checks shape and encodings only. Semantic checks (equal list
 * lengths, non-empty chain) are `validateBasic`'s job.
 */

import { ics23 } from "@confio/ics23";
import { base64Decode, base64Encode, isValidBase64 } from "@chainproof/encoding";
import { z } from "zod";
import { MERKLE } from "./constants.ts";
import { errorMessage, fail, succeed } from "./result.ts";
import type {
  ChainedCommitmentProof,
  CommitmentPath,
  CommitmentPrefix,
  CommitmentRoot,
  KeyPath,
  ProofSpec,
  Result,
  SubProof,
} from "./types.ts";

// ============================================================================
// Schemas
// ============================================================================

const Base64BytesSchema = z.string().refine(isValidBase64, "Invalid Base64 bytes");

export const CommitmentRootWireSchema = z.object({
  hash: Base64BytesSchema,
});

export type CommitmentRootWire = z.infer<typeof CommitmentRootWireSchema>;

export const CommitmentPrefixWireSchema = z.object({
  key_prefix: Base64BytesSchema,
});

export type CommitmentPrefixWire = z.infer<typeof CommitmentPrefixWireSchema>;

export const KeySegmentWireSchema = z.object({
  name: Base64BytesSchema,
  enc: z.enum(["url", "hex"]),
});

export type KeySegmentWire = z.infer<typeof KeySegmentWireSchema>;

export const CommitmentPathWireSchema = z.object({
  /** Ordered key-path levels, each an ordered list of segments */
  key_paths: z.array(z.array(KeySegmentWireSchema)),
});

export type CommitmentPathWire = z.infer<typeof CommitmentPathWireSchema>;

export const ChainedProofWireSchema = z.object({
  /** ics23.CommitmentProof protobuf bytes, lowest subtree first */
  proofs: z.array(Base64BytesSchema),
  /** ics23.ProofSpec protobuf bytes, paired with proofs by position */
  specs: z.array(Base64BytesSchema),
});

export type ChainedProofWire = z.infer<typeof ChainedProofWireSchema>;

// ============================================================================
// Helpers
// ============================================================================

function parseWire<T>(schema: z.ZodType<T>, input: unknown, what: string): Result<T> {
  const result = schema.safeParse(input);
  if (result.success) {
    return succeed(result.data);
  }
  const issue = result.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return fail("INVALID_ENCODING", `Invalid ${what}: ${where}${issue?.message ?? "malformed input"}`);
}

// ============================================================================
// Root & prefix
// ============================================================================

export function encodeRoot(root: CommitmentRoot): CommitmentRootWire {
  return { hash: base64Encode(root.hash) };
}

export function decodeRoot(input: unknown): Result<CommitmentRoot> {
  const wire = parseWire(CommitmentRootWireSchema, input, "commitment root");
  if (!wire.ok) return wire;
  return succeed({ hash: base64Decode(wire.value.hash) });
}

export function encodePrefix(prefix: CommitmentPrefix): CommitmentPrefixWire {
  return { key_prefix: base64Encode(prefix.keyPrefix) };
}

export function decodePrefix(input: unknown): Result<CommitmentPrefix> {
  const wire = parseWire(CommitmentPrefixWireSchema, input, "commitment prefix");
  if (!wire.ok) return wire;
  return succeed({ keyPrefix: base64Decode(wire.value.key_prefix) });
}

// ============================================================================
// Path
// ============================================================================

export function encodePath(path: CommitmentPath): CommitmentPathWire {
  return {
    key_paths: path.keyPaths.map((keyPath) =>
      keyPath.map((segment) => ({ name: base64Encode(segment.name), enc: segment.encoding }))
    ),
  };
}

export function decodePath(input: unknown): Result<CommitmentPath> {
  const wire = parseWire(CommitmentPathWireSchema, input, "commitment path");
  if (!wire.ok) return wire;
  const keyPaths = wire.value.key_paths.map(
    (level): KeyPath =>
      level.map((segment) => ({ name: base64Decode(segment.name), encoding: segment.enc }))
  );
  return succeed({ commitmentType: MERKLE, keyPaths });
}

// ============================================================================
// Chained proof
// ============================================================================

/**
 * Encode a chained proof. Fails with INVALID_ENCODING when an entry is
 * missing, since a missing entry has no protobuf form.
 */
export function encodeChainedProof(proof: ChainedCommitmentProof): Result<ChainedProofWire> {
  const proofs: string[] = [];
  for (const [i, sub] of proof.proofs.entries()) {
    if (!sub) return fail("INVALID_ENCODING", `proofs.${i}: missing sub-proof`);
    proofs.push(base64Encode(ics23.CommitmentProof.encode(sub).finish()));
  }

  const specs: string[] = [];
  for (const [i, spec] of proof.specs.entries()) {
    if (!spec) return fail("INVALID_ENCODING", `specs.${i}: missing proof spec`);
    specs.push(base64Encode(ics23.ProofSpec.encode(spec).finish()));
  }

  return succeed({ proofs, specs });
}

export function decodeChainedProof(input: unknown): Result<ChainedCommitmentProof> {
  const wire = parseWire(ChainedProofWireSchema, input, "chained proof");
  if (!wire.ok) return wire;

  const proofs: SubProof[] = [];
  for (const [i, encoded] of wire.value.proofs.entries()) {
    try {
      proofs.push(ics23.CommitmentProof.decode(base64Decode(encoded)));
    } catch (err) {
      return fail("INVALID_ENCODING", `Invalid chained proof: proofs.${i}: ${errorMessage(err)}`);
    }
  }

  const specs: ProofSpec[] = [];
  for (const [i, encoded] of wire.value.specs.entries()) {
    try {
      specs.push(ics23.ProofSpec.decode(base64Decode(encoded)));
    } catch (err) {
      return fail("INVALID_ENCODING", `Invalid chained proof: specs.${i}: ${errorMessage(err)}`);
    }
  }

  return succeed({ proofs, specs });
}

/**
 * Parse chained-proof JSON text, e.g. the contents of a proof file.
 */
export function parseChainedProofJson(text: string): Result<ChainedCommitmentProof> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return fail("INVALID_ENCODING", `Invalid chained proof: ${errorMessage(err)}`);
  }
  return decodeChainedProof(parsed);
}

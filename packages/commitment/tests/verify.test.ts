/**
 * Chained proof verification tests.
 *
 * "ics23" suites run the real ICS-23 primitive over fixture trees; the
 * "ProofOps" suite injects mocks to observe ordering and anchoring.
 */

import { describe, expect, it, vi } from "vitest";
import { applyPrefix, newPath, pathFromKeyPaths } from "../src/path.ts";
import { newChainedProof } from "../src/proof.ts";
import { newPrefix, newRoot } from "../src/root.ts";
import type { CommitmentPath, ExistenceProof, ProofOps, SubProof } from "../src/types.ts";
import { createChainVerifier, verifyMembership, verifyNonMembership } from "../src/verify.ts";
import {
  existence,
  flipFirstByte,
  leaf,
  membershipChain,
  nonMembershipChain,
  rootOf,
  spec,
  utf8,
} from "./fixtures.ts";

function prefixed(prefix: string, segments: string[]): CommitmentPath {
  const result = applyPrefix(newPrefix(utf8(prefix)), newPath(segments));
  if (!result.ok) {
    throw new Error(result.message);
  }
  return result.value;
}

const invalidFor = (path: string) => ({
  ok: false,
  code: "INVALID_PROOF",
  message: `invalid proof for path: ${path}`,
});

const emptyParams = { ok: false, code: "INVALID_PROOF", message: "empty params or proof" };

// ============================================================================
// Membership (ics23)
// ============================================================================

describe("verifyMembership", () => {
  describe("single level", () => {
    const exist = leaf("a", "v1");
    const root = newRoot(rootOf(exist));
    const proof = newChainedProof([existence(exist)], [spec]);
    const path = newPath(["a"]);

    it("should accept the committed value", () => {
      expect(root.hash).toHaveLength(32);
      expect(verifyMembership(proof, root, path, utf8("v1"))).toEqual({ ok: true });
    });

    it("should reject a different value", () => {
      expect(verifyMembership(proof, root, path, utf8("v2"))).toEqual(invalidFor("a"));
    });

    it("should reject a different key", () => {
      expect(verifyMembership(proof, root, newPath(["z"]), utf8("v1"))).toEqual(invalidFor("z"));
    });
  });

  describe("two levels", () => {
    const { lower, upper, subroot, root } = membershipChain();
    const proof = newChainedProof([existence(lower), existence(upper)], [spec, spec]);
    const path = prefixed("a", ["b"]);

    it("should accept the value proven through both trees", () => {
      expect(verifyMembership(proof, newRoot(root), path, utf8("v1"))).toEqual({ ok: true });
    });

    it("should reject an altered value", () => {
      expect(verifyMembership(proof, newRoot(root), path, utf8("v2"))).toEqual(invalidFor("a/b"));
    });

    it("should reject an altered root", () => {
      expect(verifyMembership(proof, newRoot(flipFirstByte(root)), path, utf8("v1"))).toEqual(
        invalidFor("a/b")
      );
    });

    it("should reject an altered sub-proof", () => {
      const tampered: ExistenceProof = { ...upper, value: flipFirstByte(subroot) };
      const altered = newChainedProof([existence(lower), existence(tampered)], [spec, spec]);
      expect(verifyMembership(altered, newRoot(root), path, utf8("v1"))).toEqual(
        invalidFor("a/b")
      );
    });

    it("should reject proofs given root-first", () => {
      const reversed = newChainedProof([existence(upper), existence(lower)], [spec, spec]);
      expect(verifyMembership(reversed, newRoot(root), path, utf8("v1"))).toEqual(
        invalidFor("a/b")
      );
    });

    it("should not accept the subtree root as the trust anchor", () => {
      expect(verifyMembership(proof, newRoot(subroot), path, utf8("v1"))).toEqual(
        invalidFor("a/b")
      );
    });
  });

  describe("preconditions", () => {
    const exist = leaf("a", "v1");
    const root = newRoot(rootOf(exist));
    const proof = newChainedProof([existence(exist)], [spec]);
    const path = newPath(["a"]);

    it("should reject empty or missing parameters", () => {
      expect(verifyMembership(proof, root, path, new Uint8Array())).toEqual(emptyParams);
      expect(verifyMembership(proof, newRoot(new Uint8Array()), path, utf8("v1"))).toEqual(
        emptyParams
      );
      expect(verifyMembership(proof, null, path, utf8("v1"))).toEqual(emptyParams);
      expect(verifyMembership(proof, root, undefined, utf8("v1"))).toEqual(emptyParams);
      expect(verifyMembership(proof, root, pathFromKeyPaths([]), utf8("v1"))).toEqual(
        emptyParams
      );
    });

    it("should reject structurally invalid proofs", () => {
      const mismatched = newChainedProof([existence(exist)], [spec, spec]);
      expect(verifyMembership(mismatched, root, path, utf8("v1"))).toEqual(emptyParams);
      expect(verifyMembership({ proofs: [null], specs: [spec] }, root, path, utf8("v1"))).toEqual(
        emptyParams
      );
    });

    it("should reject foreign paths", () => {
      const foreign = { commitmentType: "opaque", path: "a" };
      expect(verifyMembership(proof, root, foreign, utf8("v1"))).toEqual({
        ok: false,
        code: "NOT_A_MERKLE_PATH",
        message: "path is not a merkle path for a merkle proof",
      });
    });

    it("should require one proof per path level", () => {
      expect(verifyMembership(proof, root, prefixed("ibc", ["a"]), utf8("v1"))).toEqual({
        ok: false,
        code: "INVALID_PROOF",
        message: "invalid chained proof: proof chain length 1 not the same as path length 2",
      });
    });

    it("should reject non-existence sub-proofs", () => {
      const { absent } = nonMembershipChain();
      const wrong = newChainedProof([absent], [spec]);
      expect(verifyMembership(wrong, root, path, utf8("v1"))).toEqual({
        ok: false,
        code: "INVALID_PROOF",
        message: "proof is not an existence proof",
      });
    });
  });
});

// ============================================================================
// Non-membership (ics23)
// ============================================================================

describe("verifyNonMembership", () => {
  describe("two levels", () => {
    const { left, absent, upper, root } = nonMembershipChain();
    const proof = newChainedProof([absent, existence(upper)], [spec, spec]);

    it("should accept an absent key", () => {
      expect(verifyNonMembership(proof, newRoot(root), prefixed("ibc", ["b"]))).toEqual({
        ok: true,
      });
    });

    it("should reject a key that is present", () => {
      expect(verifyNonMembership(proof, newRoot(root), prefixed("ibc", ["a"]))).toEqual(
        invalidFor("ibc/a")
      );
    });

    it("should reject an altered root", () => {
      expect(
        verifyNonMembership(proof, newRoot(flipFirstByte(root)), prefixed("ibc", ["b"]))
      ).toEqual(invalidFor("ibc/b"));
    });

    it("should require a non-existence proof at the lowest level", () => {
      const wrong = newChainedProof([existence(left), existence(upper)], [spec, spec]);
      expect(verifyNonMembership(wrong, newRoot(root), prefixed("ibc", ["b"]))).toEqual({
        ok: false,
        code: "INVALID_PROOF",
        message: "proof is not a nonexistence proof",
      });
    });

    it("should require existence proofs above the lowest level", () => {
      const wrong = newChainedProof([absent, absent], [spec, spec]);
      expect(verifyNonMembership(wrong, newRoot(root), prefixed("ibc", ["b"]))).toEqual({
        ok: false,
        code: "INVALID_PROOF",
        message: "proof is not an existence proof",
      });
    });

    it("should require a left neighbour", () => {
      const rightOnly: SubProof = { nonexist: { key: utf8("0"), right: left } };
      const wrong = newChainedProof([rightOnly, existence(upper)], [spec, spec]);
      expect(verifyNonMembership(wrong, newRoot(root), prefixed("ibc", ["0"]))).toEqual({
        ok: false,
        code: "INVALID_PROOF",
        message: "nonexistence proof has no left neighbor",
      });
    });
  });

  describe("single level", () => {
    const { left, absent } = nonMembershipChain();
    const proof = newChainedProof([absent], [spec]);

    it("should accept an absent key under the trusted root", () => {
      expect(verifyNonMembership(proof, newRoot(rootOf(left)), newPath(["b"]))).toEqual({
        ok: true,
      });
    });

    it("should anchor the check to the trusted root", () => {
      expect(verifyNonMembership(proof, newRoot(new Uint8Array(32)), newPath(["b"]))).toEqual(
        invalidFor("b")
      );
    });
  });

  it("should reject empty parameters", () => {
    const { absent } = nonMembershipChain();
    const proof = newChainedProof([absent], [spec]);
    expect(verifyNonMembership(proof, undefined, newPath(["b"]))).toEqual(emptyParams);
    expect(verifyNonMembership({ proofs: [], specs: [] }, newRoot(utf8("r")), newPath(["b"]))).toEqual(
      emptyParams
    );
  });
});

// ============================================================================
// Injected ProofOps
// ============================================================================

describe("createChainVerifier with ProofOps", () => {
  const decoder = new TextDecoder();
  const trusted = newRoot(utf8("trusted-root"));

  function mockOps(overrides: Partial<ProofOps> = {}) {
    return {
      calculate: vi.fn((exist: ExistenceProof) =>
        utf8(`root-of-${decoder.decode(exist.key ?? new Uint8Array())}`)
      ),
      verifyMembership: vi.fn(() => true),
      verifyNonMembership: vi.fn(() => true),
      ...overrides,
    };
  }

  const lowerProof = existence(leaf("b", "v1"));
  const upperProof = existence(leaf("a", "ignored"));
  const proof = newChainedProof([lowerProof, upperProof], [spec, spec]);

  it("should pair leaf-first proofs with root-first path levels", () => {
    const ops = mockOps();
    const verifier = createChainVerifier({ proofOps: ops });

    expect(verifier.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"))).toEqual({
      ok: true,
    });
    expect(ops.verifyMembership).toHaveBeenCalledTimes(2);
    expect(ops.verifyMembership).toHaveBeenNthCalledWith(
      1,
      spec,
      utf8("root-of-b"),
      lowerProof,
      utf8("b"),
      utf8("v1")
    );
    expect(ops.verifyMembership).toHaveBeenNthCalledWith(
      2,
      spec,
      trusted.hash,
      upperProof,
      utf8("a"),
      utf8("root-of-b")
    );
  });

  it("should anchor non-membership chains the same way", () => {
    const ops = mockOps();
    const verifier = createChainVerifier({ proofOps: ops });
    const { absent } = nonMembershipChain();
    const chain = newChainedProof([absent, upperProof], [spec, spec]);

    expect(verifier.verifyNonMembership(chain, trusted, prefixed("a", ["b"]))).toEqual({
      ok: true,
    });
    expect(ops.verifyNonMembership).toHaveBeenCalledWith(
      spec,
      utf8("root-of-a"),
      absent,
      utf8("b")
    );
    expect(ops.verifyMembership).toHaveBeenCalledWith(
      spec,
      trusted.hash,
      upperProof,
      utf8("a"),
      utf8("root-of-a")
    );
  });

  it("should stop at the first failing level", () => {
    const ops = mockOps({ verifyMembership: vi.fn(() => false) });
    const verifier = createChainVerifier({ proofOps: ops });

    expect(verifier.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"))).toEqual(
      invalidFor("a/b")
    );
    expect(ops.verifyMembership).toHaveBeenCalledTimes(1);
  });

  it("should reject length mismatches before any hashing", () => {
    const ops = mockOps();
    const verifier = createChainVerifier({ proofOps: ops });

    verifier.verifyMembership(proof, trusted, newPath(["b"]), utf8("v1"));
    verifier.verifyMembership(newChainedProof([lowerProof], [spec, spec]), trusted, newPath(["b"]), utf8("v1"));
    verifier.verifyNonMembership(proof, trusted, newPath(["b"]));

    expect(ops.calculate).not.toHaveBeenCalled();
    expect(ops.verifyMembership).not.toHaveBeenCalled();
    expect(ops.verifyNonMembership).not.toHaveBeenCalled();
  });

  it("should enforce the configured chain bound", () => {
    const ops = mockOps();
    const verifier = createChainVerifier({ proofOps: ops, maxChainLength: 1 });

    expect(verifier.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"))).toEqual({
      ok: false,
      code: "INVALID_PROOF",
      message: "proof chain length 2 exceeds maximum 1",
    });
    expect(ops.calculate).not.toHaveBeenCalled();
  });

  it("should report primitive errors as invalid proofs", () => {
    const calculateFails = createChainVerifier({
      proofOps: mockOps({
        calculate: () => {
          throw new Error("boom");
        },
      }),
    });
    expect(
      calculateFails.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"))
    ).toEqual({
      ok: false,
      code: "INVALID_PROOF",
      message: "cannot calculate root of proof 0: boom",
    });

    const verifyFails = createChainVerifier({
      proofOps: mockOps({
        verifyMembership: () => {
          throw new Error("kaboom");
        },
      }),
    });
    expect(verifyFails.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"))).toEqual({
      ok: false,
      code: "INVALID_PROOF",
      message: "proof 0 errored: kaboom",
    });
  });

  it("should log rejections and accepted chains", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    const verifier = createChainVerifier({ proofOps: mockOps(), logger });

    verifier.verifyMembership(proof, trusted, prefixed("a", ["b"]), utf8("v1"));
    verifier.verifyMembership(proof, trusted, newPath(["b"]), utf8("v1"));

    expect(logger.debug).toHaveBeenCalledWith("[ChainVerifier] membership verified for a/b");
    expect(logger.warn).toHaveBeenCalledWith(
      "[ChainVerifier] membership rejected (INVALID_PROOF): invalid chained proof: proof chain length 2 not the same as path length 1"
    );
  });
});

/**
 * ProofOps backed by the ICS-23 reference implementation.
 */

import { calculateExistenceRoot, verifyMembership, verifyNonMembership } from "@confio/ics23";
import type { ProofOps } from "./types.ts";

export const ics23ProofOps: ProofOps = {
  calculate: (proof) => calculateExistenceRoot(proof),
  verifyMembership: (spec, root, proof, key, value) =>
    verifyMembership(proof, spec, root, key, value),
  verifyNonMembership: (spec, root, proof, key) => verifyNonMembership(proof, spec, root, key),
};

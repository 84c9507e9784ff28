/**
 * Claim proof verification.
 *
 * The winner of a round backs its revealed reserve commitment with a
 * witness chunk:
 *   1. the chunk address is included in the revealed reserve hash (merkle)
 *   2. the chunk lies in the anchor's neighbourhood at depth − height
 *
 * Pure function. The redistribution game only sees the ClaimProofVerifier
 * interface, so a stronger verifier can be swapped in.
 */

import { isHash32, type Hash32 } from "./hash.js";
import { verifyMerkleProof, type MerkleStep } from "./merkle.js";
import { inProximity } from "./proximity.js";

export interface ClaimProof {
  chunkAddress: Hash32;
  inclusion: MerkleStep[];
}

export interface ClaimContext {
  anchor: Hash32;
  overlay: Hash32;
  reserveHash: Hash32;
  depth: number;
  height: number;
}

export type ClaimVerifyResult = { valid: true } | { valid: false; error: string };

export interface ClaimProofVerifier {
  verify(context: ClaimContext, proof: ClaimProof): ClaimVerifyResult;
}

export function verifyClaimProof(
  context: ClaimContext,
  proof: ClaimProof,
): ClaimVerifyResult {
  if (!isHash32(proof.chunkAddress)) {
    return { valid: false, error: "invalid_chunk_address" };
  }
  for (const step of proof.inclusion) {
    if (!isHash32(step.hash)) {
      return { valid: false, error: "invalid_inclusion_step" };
    }
  }

  if (!verifyMerkleProof(proof.chunkAddress, proof.inclusion, context.reserveHash)) {
    return { valid: false, error: "inclusion_mismatch" };
  }

  if (!inProximity(proof.chunkAddress, context.anchor, context.depth - context.height)) {
    return { valid: false, error: "chunk_out_of_depth" };
  }

  return { valid: true };
}

export const merkleClaimVerifier: ClaimProofVerifier = {
  verify: verifyClaimProof,
};

/**
 * Claim proof verification — inclusion + neighbourhood.
 */

import { describe, it, expect } from "vitest";
import { verifyClaimProof, type ClaimContext } from "../../src/claim-proof.js";
import { merkleRoot, merkleProof } from "../../src/merkle.js";

const ANCHOR = "00".repeat(32);
const NEAR = "01" + "ab".repeat(31); // shares 7 leading bits with the anchor
const ALSO_NEAR = "02" + "cd".repeat(31);
const FAR = "ff".repeat(32);
const LEAVES = [NEAR, ALSO_NEAR, FAR];
const RESERVE = merkleRoot(LEAVES);

function context(overrides?: Partial<ClaimContext>): ClaimContext {
  return {
    anchor: ANCHOR,
    overlay: "aa".repeat(32),
    reserveHash: RESERVE,
    depth: 2,
    height: 0,
    ...overrides,
  };
}

describe("verifyClaimProof", () => {
  it("accepts an included chunk inside the neighbourhood", () => {
    const result = verifyClaimProof(context(), {
      chunkAddress: NEAR,
      inclusion: merkleProof(LEAVES, 0),
    });
    expect(result).toEqual({ valid: true });
  });

  it("rejects a chunk outside the neighbourhood", () => {
    const result = verifyClaimProof(context(), {
      chunkAddress: FAR,
      inclusion: merkleProof(LEAVES, 2),
    });
    expect(result).toEqual({ valid: false, error: "chunk_out_of_depth" });
  });

  it("height relaxes the neighbourhood", () => {
    const result = verifyClaimProof(context({ height: 2 }), {
      chunkAddress: FAR,
      inclusion: merkleProof(LEAVES, 2),
    });
    expect(result).toEqual({ valid: true });
  });

  it("rejects a proof against a different reserve", () => {
    const result = verifyClaimProof(context({ reserveHash: "ee".repeat(32) }), {
      chunkAddress: NEAR,
      inclusion: merkleProof(LEAVES, 0),
    });
    expect(result).toEqual({ valid: false, error: "inclusion_mismatch" });
  });

  it("rejects malformed chunk addresses", () => {
    const result = verifyClaimProof(context(), { chunkAddress: "zz", inclusion: [] });
    expect(result).toEqual({ valid: false, error: "invalid_chunk_address" });
  });
});

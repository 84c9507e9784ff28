/**
 * Test vectors — merkle tree over chunk addresses.
 */

import { describe, it, expect } from "vitest";
import { merkleRoot, merkleProof, verifyMerkleProof } from "../../src/merkle.js";
import { keccakHex } from "../../src/hash.js";

function leaf(label: string): string {
  return keccakHex(new TextEncoder().encode(label));
}

describe("merkle root", () => {
  it("single leaf → root equals the leaf", () => {
    const only = leaf("only leaf");
    expect(merkleRoot([only])).toBe(only);
  });

  it("two leaves → root differs from both", () => {
    const a = leaf("a");
    const b = leaf("b");
    const root = merkleRoot([a, b]);

    expect(root).toMatch(/^[0-9a-f]{64}$/);
    expect(root).not.toBe(a);
    expect(root).not.toBe(b);
  });

  it("order matters", () => {
    const a = leaf("a");
    const b = leaf("b");
    expect(merkleRoot([a, b])).not.toBe(merkleRoot([b, a]));
  });

  it("throws on empty list", () => {
    expect(() => merkleRoot([])).toThrow("empty leaf list");
  });
});

describe("merkle proofs", () => {
  const leaves = Array.from({ length: 7 }, (_, i) => leaf(`chunk_${i}`));
  const root = merkleRoot(leaves);

  it("every leaf of an odd-sized tree proves against the root", () => {
    for (let i = 0; i < leaves.length; i++) {
      const proof = merkleProof(leaves, i);
      expect(verifyMerkleProof(leaves[i] ?? "", proof, root)).toBe(true);
    }
  });

  it("promoted last leaf skips the missing sibling", () => {
    // 7 leaves: leaf 6 is promoted at the first level, so it has one step fewer
    expect(merkleProof(leaves, 6)).toHaveLength(2);
    expect(merkleProof(leaves, 0)).toHaveLength(3);
  });

  it("proof for one leaf does not verify another", () => {
    const proof = merkleProof(leaves, 1);
    expect(verifyMerkleProof(leaves[2] ?? "", proof, root)).toBe(false);
  });

  it("rejects out-of-range index", () => {
    expect(() => merkleProof(leaves, 7)).toThrow(RangeError);
  });
});

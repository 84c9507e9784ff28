/**
 * Binary merkle tree over 32-byte chunk addresses.
 *
 * node = SHA256(left || right). Odd leaf is promoted.
 * A reserve commitment is the root over the sampled chunk addresses.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { concatParts, fromHex, type Hash32 } from "./hash.js";

export interface MerkleStep {
  hash: Hash32;
  position: "left" | "right";
}

function buildLevels(leaves: readonly Hash32[]): Uint8Array[][] {
  if (leaves.length === 0) {
    throw new Error("merkleRoot: empty leaf list");
  }

  const levels: Uint8Array[][] = [leaves.map((leaf) => fromHex(leaf))];
  let level = levels[0] ?? [];

  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left === undefined) break;
      next.push(right === undefined ? left : sha256(concatParts([left, right])));
    }
    levels.push(next);
    level = next;
  }

  return levels;
}

/** Compute the merkle root of an ordered leaf list. */
export function merkleRoot(leaves: readonly Hash32[]): Hash32 {
  const levels = buildLevels(leaves);
  const top = levels[levels.length - 1]?.[0];
  if (top === undefined) {
    throw new Error("merkleRoot: empty leaf list");
  }
  return bytesToHex(top);
}

/** Build the inclusion proof for the leaf at `index`. */
export function merkleProof(leaves: readonly Hash32[], index: number): MerkleStep[] {
  if (index < 0 || index >= leaves.length) {
    throw new RangeError(`merkleProof: index ${index} out of range`);
  }

  const levels = buildLevels(leaves);
  const proof: MerkleStep[] = [];
  let position = index;

  for (const level of levels.slice(0, -1)) {
    const isRight = position % 2 === 1;
    const sibling = level[isRight ? position - 1 : position + 1];
    // A promoted odd leaf has no sibling at this level
    if (sibling !== undefined) {
      proof.push({ hash: bytesToHex(sibling), position: isRight ? "left" : "right" });
    }
    position = Math.floor(position / 2);
  }

  return proof;
}

/** Verify a merkle proof for a given leaf. */
export function verifyMerkleProof(
  leaf: Hash32,
  proof: readonly MerkleStep[],
  root: Hash32,
): boolean {
  let current = fromHex(leaf);

  for (const step of proof) {
    const sibling = fromHex(step.hash);
    current =
      step.position === "left"
        ? sha256(concatParts([sibling, current]))
        : sha256(concatParts([current, sibling]));
  }

  return bytesToHex(current) === root;
}

/**
 * Stake-weighted draws.
 *
 * draw = uint256(H(seed || tag)) mod Σ weight
 * The selected entry is the one whose cumulative weight interval
 * [Σ_{j<i} w_j, Σ_{j≤i} w_j) contains the draw. Any non-empty list with
 * positive total weight yields exactly one selection.
 */

import {
  concatParts,
  hashBytes,
  hashToBigInt,
  keccakHex,
  type Hash32,
} from "./hash.js";

export type DrawTag = "truth" | "winner";

/** Raw draw value in [0, total). */
export function drawValue(seed: Hash32, tag: DrawTag, total: bigint): bigint {
  if (total <= 0n) {
    throw new RangeError("drawValue: total weight must be positive");
  }
  const encoder = new TextEncoder();
  const digest = keccakHex(concatParts([hashBytes(seed), encoder.encode(tag)]));
  return hashToBigInt(digest) % total;
}

/**
 * Select the index whose cumulative interval contains `draw`.
 * Zero-weight entries own an empty interval and are never selected.
 *
 * @returns selected index, or -1 if the draw lies outside the total weight
 */
export function selectByWeight(weights: readonly bigint[], draw: bigint): number {
  let cumulative = 0n;
  for (let i = 0; i < weights.length; i++) {
    const w = weights[i] ?? 0n;
    if (w <= 0n) continue;
    cumulative += w;
    if (draw < cumulative) return i;
  }
  return -1;
}

/**
 * Weighted draw over `weights` seeded by `seed`.
 * @returns selected index, or -1 when the list has no positive weight
 */
export function weightedDraw(
  seed: Hash32,
  tag: DrawTag,
  weights: readonly bigint[],
): number {
  const total = weights.reduce((sum, w) => (w > 0n ? sum + w : sum), 0n);
  if (total === 0n) return -1;
  return selectByWeight(weights, drawValue(seed, tag, total));
}

/**
 * Proximity between overlay addresses.
 *
 * proximity order = number of leading bits two addresses share,
 * i.e. the leading-zero count of their XOR distance.
 */

import { hashBytes, type Hash32 } from "./hash.js";

const MAX_PO = 256;

/** Count of matching leading bits, capped at `limit`. */
export function proximityOrder(a: Hash32, b: Hash32, limit: number = MAX_PO): number {
  const x = hashBytes(a);
  const y = hashBytes(b);
  const cap = Math.min(limit, MAX_PO);

  let po = 0;
  for (let i = 0; i < x.length && po < cap; i++) {
    const diff = (x[i] ?? 0) ^ (y[i] ?? 0);
    if (diff === 0) {
      po += 8;
      continue;
    }
    po += Math.clz32(diff) - 24;
    break;
  }
  return Math.min(po, cap);
}

/**
 * True iff `a` and `b` agree on at least `minBits` leading bits.
 * `minBits <= 0` is always in proximity.
 */
export function inProximity(a: Hash32, b: Hash32, minBits: number): boolean {
  if (minBits <= 0) return true;
  return proximityOrder(a, b, minBits) >= minBits;
}

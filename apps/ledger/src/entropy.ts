/**
 * Entropy sources for the redistribution seed.
 */

import { randomBytes } from "@noble/hashes/utils";
import {
  concatParts,
  hashBytes,
  keccakHex,
  toHex,
  uint256,
  type Hash32,
} from "@stampnet/protocol";

export interface EntropySource {
  entropy(round: number, block: number): Hash32;
}

/** Fresh random bytes per call. The server default. */
export const randomEntropy: EntropySource = {
  entropy: () => toHex(randomBytes(32)),
};

/**
 * Deterministic entropy: H(base || round || block). Replays identically,
 * which is what tests and simulations need.
 */
export function deterministicEntropy(base: Hash32): EntropySource {
  return {
    entropy: (round, block) =>
      keccakHex(concatParts([hashBytes(base), uint256(BigInt(round)), uint256(BigInt(block))])),
  };
}

/**
 * Content-derived identifiers.
 *
 * overlay     = H(identity || network_id_u64le || nonce)
 * batch_id    = H(owner || nonce)
 * commitment  = H(overlay || depth_u8 || reserve_hash || reveal_nonce)
 *
 * Nothing in the ledger is keyed by a sequential id; every record is found
 * again by recomputing one of these.
 */

import {
  addressBytes,
  concatParts,
  hashBytes,
  keccakHex,
  uint256,
  uint64LE,
  uint8,
  type Address,
  type Hash32,
} from "./hash.js";

/**
 * Derive the overlay address an operator occupies for a given network.
 * The network id is packed little-endian, matching how nodes derive it.
 */
export function overlayAddress(
  identity: Address,
  networkId: bigint,
  nonce: Hash32,
): Hash32 {
  return keccakHex(
    concatParts([addressBytes(identity), uint64LE(networkId), hashBytes(nonce)]),
  );
}

export function batchIdOf(owner: Address, nonce: Hash32): Hash32 {
  return keccakHex(concatParts([addressBytes(owner), hashBytes(nonce)]));
}

/**
 * Obfuscated commitment to a reserve sample. The depth is part of the
 * preimage, so revealing with a different depth never matches.
 */
export function wrapCommit(
  overlay: Hash32,
  depth: number,
  reserveHash: Hash32,
  revealNonce: Hash32,
): Hash32 {
  return keccakHex(
    concatParts([
      hashBytes(overlay),
      uint8(depth),
      hashBytes(reserveHash),
      hashBytes(revealNonce),
    ]),
  );
}

// ── Seeds ──────────────────────────────────────────────────────────

/** Advance a seed past `skippedRounds` rounds that produced no entropy. */
export function skipSeed(seed: Hash32, skippedRounds: number): Hash32 {
  if (skippedRounds <= 0) return seed;
  return keccakHex(concatParts([hashBytes(seed), uint256(BigInt(skippedRounds))]));
}

/** Mix fresh entropy into the accumulated seed. */
export function mixSeed(seed: Hash32, entropy: Hash32): Hash32 {
  return keccakHex(concatParts([hashBytes(seed), hashBytes(entropy)]));
}

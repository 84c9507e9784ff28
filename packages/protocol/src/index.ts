/**
 * @stampnet/protocol — Frozen protocol primitives.
 *
 * This package contains ONLY pure functions, constants and versioned schemas.
 * It has no I/O and no state.
 * Everything else in the monorepo imports from here, never the reverse.
 */

// Hashing + packing
export {
  keccakHex,
  fromHex,
  toHex,
  concatParts,
  uint8,
  uint64LE,
  uint256,
  addressBytes,
  hashBytes,
  hashToBigInt,
  isAddress,
  isHash32,
  type Address,
  type Hash32,
} from "./hash.js";

// Content-derived identifiers + seeds
export {
  overlayAddress,
  batchIdOf,
  wrapCommit,
  skipSeed,
  mixSeed,
} from "./identifiers.js";

// Proximity
export { proximityOrder, inProximity } from "./proximity.js";

// Round geometry
export {
  roundOf,
  roundOffset,
  phaseOf,
  isPhaseLastBlock,
  roundStartBlock,
  phaseStartBlock,
  type Phase,
} from "./round.js";

// Price adjustment
export {
  adjustUpscaledPrice,
  clampRedundancy,
  changeRateFor,
  upscalePrice,
  downscalePrice,
  DEFAULT_PRICE_ADJUSTMENT,
  type PriceAdjustmentParams,
} from "./price.js";

// Stake-weighted draws
export { drawValue, selectByWeight, weightedDraw, type DrawTag } from "./draw.js";

// Merkle + claim proofs
export { merkleRoot, merkleProof, verifyMerkleProof, type MerkleStep } from "./merkle.js";
export {
  verifyClaimProof,
  merkleClaimVerifier,
  type ClaimProof,
  type ClaimContext,
  type ClaimVerifyResult,
  type ClaimProofVerifier,
} from "./claim-proof.js";

// Errors
export {
  ProtocolError,
  PROTOCOL_ERROR_CODES,
  isProtocolError,
  ensure,
  bigintReplacer,
  type ProtocolErrorCode,
} from "./errors.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";

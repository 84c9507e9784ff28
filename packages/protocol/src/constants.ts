/**
 * Protocol constants.
 *
 * FROZEN constants never change — breaking change = redeploy.
 * TUNABLE constants are defaults; components take overrides at construction
 * and admins can change some of them at runtime.
 */

// ── Frozen (never change) ──────────────────────────────────────────
export const ROUND_LENGTH = 152; // blocks per redistribution round
export const PHASE_LENGTH = ROUND_LENGTH / 4; // commit and reveal each take a quarter

export const ADDRESS_BYTES = 20;
export const HASH_BYTES = 32;

export const ZERO_ADDRESS = "00".repeat(ADDRESS_BYTES);
export const ZERO_HASH = "00".repeat(HASH_BYTES);

// ── Stake registry ─────────────────────────────────────────────────
export const MIN_STAKE = 100_000_000_000_000_000n; // 10 tokens at 16 decimals
export const DEFAULT_NETWORK_ID = 1n;
/** Rounds a stake must age before its owner may commit. */
export const STAKE_MATURITY_ROUNDS = 2;

// ── Postage ledger ─────────────────────────────────────────────────
export const MINIMUM_BUCKET_DEPTH = 16;
export const MINIMUM_VALIDITY_BLOCKS = 17_280; // ~24h at 5s blocks

// ── Price oracle ───────────────────────────────────────────────────
export const MINIMUM_PRICE = 24_000n;
export const PRICE_UPSCALE_BITS = 10n;
export const PRICE_BASE = 1_048_576n; // 2^20, rate of exactly 1
export const TARGET_REDUNDANCY = 4;
export const MAX_CONSIDERED_EXTRA_REDUNDANCY = 4;

/**
 * Multiplicative price change per round, indexed by observed redundancy.
 * Index 0 is the largest increase and is also used to backfill skipped rounds.
 */
export const CHANGE_RATE: readonly bigint[] = [
  1_049_417n,
  1_049_206n,
  1_048_996n,
  1_048_786n,
  1_048_576n,
  1_048_366n,
  1_048_156n,
  1_047_946n,
  1_047_736n,
];

// ── Redistribution ─────────────────────────────────────────────────
export const PENALTY_MULTIPLIER_DISAGREEMENT = 1;
export const PENALTY_MULTIPLIER_NON_REVEALED = 2;
/** Upper bound on the skipped-round count fed into the minimum depth ratchet. */
export const MAX_SKIPPED_ROUNDS = 254;

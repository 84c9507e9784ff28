/**
 * Ledger configuration.
 */

import {
  DEFAULT_NETWORK_ID,
  MIN_STAKE,
  MINIMUM_PRICE,
  MINIMUM_VALIDITY_BLOCKS,
} from "@stampnet/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

export const config = {
  port: parseInt(env("LEDGER_PORT", "3110"), 10),
  host: env("LEDGER_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  networkId: BigInt(env("NETWORK_ID", DEFAULT_NETWORK_ID.toString())),
  /** Hex identity holding the admin role on every component. */
  adminAddress: env("ADMIN_ADDRESS", "ad".repeat(20)),
  /** Wall-clock milliseconds per block. */
  blockTimeMs: parseInt(env("BLOCK_TIME_MS", "5000"), 10),
  /** Block 0 timestamp (ms). 0 = process start. */
  genesisTimestampMs: parseInt(env("GENESIS_TIMESTAMP_MS", "0"), 10),
  /** Round scheduler check interval (ms). 0 = disabled. */
  roundSchedulerIntervalMs: parseInt(env("ROUND_SCHEDULER_INTERVAL_MS", "5000"), 10),
  /** Batches the keeper expires per round. */
  expiryBatchLimit: parseInt(env("EXPIRY_BATCH_LIMIT", "50"), 10),
  minimumPrice: BigInt(env("MINIMUM_PRICE", MINIMUM_PRICE.toString())),
  minimumValidityBlocks: parseInt(env("MINIMUM_VALIDITY_BLOCKS", MINIMUM_VALIDITY_BLOCKS.toString()), 10),
  minimumStake: BigInt(env("MIN_STAKE", MIN_STAKE.toString())),
} as const;

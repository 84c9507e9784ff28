/**
 * Event log schemas — append-only ledger events.
 *
 * Every state transition of a component appends one event. Payloads are
 * typed per event type.
 */

import type { Address, Hash32 } from "@stampnet/protocol";

// ── Event types ────────────────────────────────────────────────────

export const ROLE_GRANTED_EVENT = "role.granted.v1" as const;
export const ROLE_REVOKED_EVENT = "role.revoked.v1" as const;
export const PAUSED_EVENT = "paused.v1" as const;
export const UNPAUSED_EVENT = "unpaused.v1" as const;

export const STAKE_UPDATED_EVENT = "stake.updated.v1" as const;
export const STAKE_FROZEN_EVENT = "stake.frozen.v1" as const;
export const STAKE_SLASHED_EVENT = "stake.slashed.v1" as const;
export const STAKE_WITHDRAWN_EVENT = "stake.withdrawn.v1" as const;
export const NETWORK_ID_CHANGED_EVENT = "stake.network_id.v1" as const;

export const BATCH_CREATED_EVENT = "batch.created.v1" as const;
export const BATCH_TOPUP_EVENT = "batch.topup.v1" as const;
export const BATCH_DEPTH_EVENT = "batch.depth.v1" as const;
export const BATCH_EXPIRED_EVENT = "batch.expired.v1" as const;
export const POSTAGE_PRICE_EVENT = "postage.price.v1" as const;
export const POT_WITHDRAWN_EVENT = "pot.withdrawn.v1" as const;

export const PRICE_UPDATE_EVENT = "price.update.v1" as const;
export const PRICE_PUSH_FAILED_EVENT = "price.push_failed.v1" as const;

export const COMMITTED_EVENT = "round.committed.v1" as const;
export const REVEALED_EVENT = "round.revealed.v1" as const;
export const REVEAL_ANCHOR_EVENT = "round.anchor.v1" as const;
export const TRUTH_SELECTED_EVENT = "round.truth.v1" as const;
export const WINNER_SELECTED_EVENT = "round.winner.v1" as const;
export const CHUNK_COUNT_EVENT = "round.chunk_count.v1" as const;
export const PRICE_SKIPPED_EVENT = "round.price_skipped.v1" as const;
export const PROOF_REJECTED_EVENT = "round.proof_rejected.v1" as const;

// ── Payloads ───────────────────────────────────────────────────────

export interface EventPayloads {
  [ROLE_GRANTED_EVENT]: { role: string; account: Address; sender: Address };
  [ROLE_REVOKED_EVENT]: { role: string; account: Address; sender: Address };
  [PAUSED_EVENT]: { sender: Address };
  [UNPAUSED_EVENT]: { sender: Address };

  [STAKE_UPDATED_EVENT]: {
    owner: Address;
    overlay: Hash32;
    collateral: bigint;
    height: number;
    lastUpdateHeight: number;
  };
  [STAKE_FROZEN_EVENT]: { owner: Address; overlay: Hash32; frozenUntil: number };
  [STAKE_SLASHED_EVENT]: { owner: Address; overlay: Hash32; amount: bigint };
  [STAKE_WITHDRAWN_EVENT]: { owner: Address; amount: bigint };
  [NETWORK_ID_CHANGED_EVENT]: { networkId: bigint };

  [BATCH_CREATED_EVENT]: {
    batchId: Hash32;
    totalAmount: bigint;
    normalisedBalance: bigint;
    owner: Address;
    depth: number;
    bucketDepth: number;
    immutable: boolean;
  };
  [BATCH_TOPUP_EVENT]: { batchId: Hash32; topupAmount: bigint; normalisedBalance: bigint };
  [BATCH_DEPTH_EVENT]: { batchId: Hash32; newDepth: number; normalisedBalance: bigint };
  [BATCH_EXPIRED_EVENT]: { batchId: Hash32; depth: number };
  [POSTAGE_PRICE_EVENT]: { price: bigint };
  [POT_WITHDRAWN_EVENT]: { recipient: Address; amount: bigint };

  [PRICE_UPDATE_EVENT]: { price: bigint; round: number };
  [PRICE_PUSH_FAILED_EVENT]: { price: bigint; error: string };

  [COMMITTED_EVENT]: { round: number; overlay: Hash32; height: number };
  [REVEALED_EVENT]: {
    round: number;
    overlay: Hash32;
    stake: bigint;
    stakeDensity: bigint;
    reserveHash: Hash32;
    depth: number;
  };
  [REVEAL_ANCHOR_EVENT]: { round: number; anchor: Hash32 };
  [TRUTH_SELECTED_EVENT]: { round: number; hash: Hash32; depth: number };
  [WINNER_SELECTED_EVENT]: { round: number; overlay: Hash32; owner: Address; depth: number };
  [CHUNK_COUNT_EVENT]: { round: number; validChunkCount: bigint };
  [PRICE_SKIPPED_EVENT]: { round: number; redundancy: number; error: string };
  [PROOF_REJECTED_EVENT]: { round: number; overlay: Hash32; error: string; slashed: bigint };
}

export type EventType = keyof EventPayloads;

export interface LedgerEvent<K extends EventType = EventType> {
  seq: number;
  type: K;
  block: number;
  emitter: Address;
  payload: EventPayloads[K];
}

/**
 * Postage ledger — prepaid batches with price-time decay.
 *
 * A batch's normalised balance is its per-chunk balance shifted onto the
 * global outpayment axis: `currentTotalOutPayment()` grows by the price
 * every block, and a batch whose normalised balance it has reached is
 * expired. Expiry walks the balance-ordered index from the bottom and
 * sweeps the outpayment the expired and live chunks earned into the pot.
 */

import {
  ensure,
  batchIdOf,
  MINIMUM_BUCKET_DEPTH,
  MINIMUM_VALIDITY_BLOCKS,
  ZERO_ADDRESS,
  type Address,
  type Hash32,
} from "@stampnet/protocol";
import type { Chain } from "../chain.js";
import { LedgerComponent } from "../component.js";
import {
  BATCH_CREATED_EVENT,
  BATCH_DEPTH_EVENT,
  BATCH_EXPIRED_EVENT,
  BATCH_TOPUP_EVENT,
  POSTAGE_PRICE_EVENT,
  POT_WITHDRAWN_EVENT,
} from "../event-log/schemas.js";
import { firstEntry, insertEntry, removeEntry, type IndexEntry } from "./batch-index.js";

export interface BatchRecord {
  id: Hash32;
  owner: Address;
  depth: number;
  bucketDepth: number;
  immutable: boolean;
  normalisedBalance: bigint;
  lastUpdatedBlock: number;
}

interface PostageState {
  batches: Map<Hash32, BatchRecord>;
  index: IndexEntry[];
  validChunkCount: bigint;
  pot: bigint;
  lastPrice: bigint;
  lastUpdatedBlock: number;
  /** Outpayment accumulated up to `lastUpdatedBlock`. */
  totalOutPayment: bigint;
  /** Outpayment level up to which the pot has been swept. */
  lastExpiryBalance: bigint;
  minimumValidityBlocks: number;
  minimumBucketDepth: number;
}

export interface CreateBatchInput {
  owner: Address;
  initialBalancePerChunk: bigint;
  depth: number;
  bucketDepth: number;
  nonce: Hash32;
  immutable: boolean;
}

export interface ExpiryResult {
  expired: Hash32[];
  /** False when the limit stopped the walk before the index was clean. */
  complete: boolean;
}

export interface PostageStampOptions {
  minimumValidityBlocks?: number;
  minimumBucketDepth?: number;
}

export class PostageStamp extends LedgerComponent<PostageState> {
  constructor(chain: Chain, address: Address, admin: Address, options: PostageStampOptions = {}) {
    super("postage-stamp", address, chain, {
      batches: new Map(),
      index: [],
      validChunkCount: 0n,
      pot: 0n,
      lastPrice: 0n,
      lastUpdatedBlock: chain.blockNumber(),
      totalOutPayment: 0n,
      lastExpiryBalance: 0n,
      minimumValidityBlocks: options.minimumValidityBlocks ?? MINIMUM_VALIDITY_BLOCKS,
      minimumBucketDepth: options.minimumBucketDepth ?? MINIMUM_BUCKET_DEPTH,
    }, admin);
  }

  // ── Batch owner entry points ───────────────────────────────────

  /**
   * Create a batch funded by `sender`. The id is hashed from the owner
   * argument, so a payer can create batches on someone else's behalf.
   */
  createBatch(sender: Address, input: CreateBatchInput): BatchRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      ensure(input.owner !== ZERO_ADDRESS, "ZeroAddress");
      this.requireValidDepths(input.depth, input.bucketDepth);

      const id = batchIdOf(input.owner, input.nonce);
      ensure(!this.state.batches.has(id), "BatchExists", { batchId: id });

      const minimum = this.minimumInitialBalancePerChunk();
      ensure(input.initialBalancePerChunk > minimum, "InsufficientBalance", {
        initialBalancePerChunk: input.initialBalancePerChunk,
        minimum,
      });

      return this.storeBatch(sender, id, input);
    });
  }

  topUp(sender: Address, batchId: Hash32, topupAmountPerChunk: bigint): BatchRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      const batch = this.requireLiveBatch(batchId);
      ensure(batch.depth > this.state.minimumBucketDepth, "BatchTooSmall", { depth: batch.depth });

      const minimum = this.minimumInitialBalancePerChunk();
      ensure(this.remainingBalanceOf(batch) + topupAmountPerChunk >= minimum, "InsufficientBalance", {
        topupAmountPerChunk,
        minimum,
      });

      const totalAmount = topupAmountPerChunk << BigInt(batch.depth);
      this.pull(sender, totalAmount);

      this.reindex(batch, batch.normalisedBalance + topupAmountPerChunk);
      this.emit(BATCH_TOPUP_EVENT, {
        batchId,
        topupAmount: totalAmount,
        normalisedBalance: batch.normalisedBalance,
      });
      return { ...batch };
    });
  }

  /**
   * Spread the remaining balance over 2^Δ times the capacity. Paid for by
   * the batch itself: the per-chunk balance is divided by 2^Δ.
   */
  increaseDepth(sender: Address, batchId: Hash32, newDepth: number): BatchRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      const batch = this.requireLiveBatch(batchId);
      ensure(batch.owner === sender, "NotBatchOwner", { batchId, sender });
      ensure(!batch.immutable, "BatchIsImmutable", { batchId });
      ensure(
        Number.isInteger(newDepth) && newDepth <= 255 && newDepth > batch.depth && newDepth > this.state.minimumBucketDepth,
        "DepthNotIncreasing",
        { depth: batch.depth, newDepth },
      );

      const depthChange = BigInt(newDepth - batch.depth);
      const newRemaining = this.remainingBalanceOf(batch) >> depthChange;
      const minimum = this.minimumInitialBalancePerChunk();
      ensure(newRemaining >= minimum, "InsufficientBalance", { newRemaining, minimum });

      this.expire(Number.POSITIVE_INFINITY);
      this.state.validChunkCount += (1n << BigInt(newDepth)) - (1n << BigInt(batch.depth));

      batch.depth = newDepth;
      this.reindex(batch, this.currentTotalOutPayment() + newRemaining);
      this.emit(BATCH_DEPTH_EVENT, {
        batchId,
        newDepth,
        normalisedBalance: batch.normalisedBalance,
      });
      return { ...batch };
    });
  }

  /** Expire at most `limit` batches. Anyone may call it. */
  expireLimited(limit: number): ExpiryResult {
    return this.atomic(() => {
      this.requireNotPaused();
      return this.expire(limit);
    });
  }

  // ── Capabilities ───────────────────────────────────────────────

  /** REDISTRIBUTOR: pay out the whole pot. */
  withdraw(sender: Address, recipient: Address): bigint {
    return this.atomic(() => {
      this.requireNotPaused();
      this.requireRole("REDISTRIBUTOR", sender);
      this.expire(Number.POSITIVE_INFINITY);

      const amount = this.boundedPot();
      this.push(recipient, amount);
      this.state.pot = 0n;

      this.emit(POT_WITHDRAWN_EVENT, { recipient, amount });
      this.log.info({ recipient, amount: amount.toString() }, "pot withdrawn");
      return amount;
    });
  }

  /** PRICE_ORACLE: set the per-chunk-per-block price from now on. */
  setPrice(sender: Address, price: bigint): void {
    this.atomic(() => {
      this.requireNotPaused();
      this.requireRole("PRICE_ORACLE", sender);

      if (this.state.lastPrice !== 0n) {
        this.state.totalOutPayment = this.currentTotalOutPayment();
      }
      this.state.lastPrice = price;
      this.state.lastUpdatedBlock = this.now();
      this.emit(POSTAGE_PRICE_EVENT, { price });
    });
  }

  // ── Admin ──────────────────────────────────────────────────────

  /** Restore a batch under a given id, funded by the admin. */
  copyBatch(sender: Address, id: Hash32, input: Omit<CreateBatchInput, "nonce">): BatchRecord {
    return this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      ensure(input.owner !== ZERO_ADDRESS, "ZeroAddress");
      this.requireValidDepths(input.depth, input.bucketDepth);
      ensure(!this.state.batches.has(id), "BatchExists", { batchId: id });
      ensure(input.initialBalancePerChunk > 0n, "InsufficientBalance");
      return this.storeBatch(sender, id, input);
    });
  }

  setMinimumValidityBlocks(sender: Address, blocks: number): void {
    this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      ensure(Number.isSafeInteger(blocks) && blocks >= 0, "InvalidParameter", { blocks });
      this.state.minimumValidityBlocks = blocks;
    });
  }

  /** Expire everything, then report the pot the ledger can actually pay. Expiry is pause-gated. */
  totalPot(): bigint {
    return this.atomic(() => {
      this.requireNotPaused();
      this.expire(Number.POSITIVE_INFINITY);
      return this.boundedPot();
    });
  }

  // ── Reads ──────────────────────────────────────────────────────

  batches(batchId: Hash32): BatchRecord | undefined {
    const batch = this.state.batches.get(batchId);
    return batch ? { ...batch } : undefined;
  }

  currentTotalOutPayment(): bigint {
    const blocks = BigInt(this.now() - this.state.lastUpdatedBlock);
    return this.state.totalOutPayment + this.state.lastPrice * blocks;
  }

  /** Per-chunk balance left at the current price; 0 once expired. */
  remainingBalance(batchId: Hash32): bigint {
    const batch = this.state.batches.get(batchId);
    ensure(batch !== undefined, "BatchDoesNotExist", { batchId });
    return this.remainingBalanceOf(batch);
  }

  minimumInitialBalancePerChunk(): bigint {
    return BigInt(this.state.minimumValidityBlocks) * this.state.lastPrice;
  }

  expiredBatchesExist(): boolean {
    const first = firstEntry(this.state.index);
    return first !== undefined && first.balance <= this.currentTotalOutPayment();
  }

  firstBatchId(): Hash32 | undefined {
    return firstEntry(this.state.index)?.id;
  }

  batchCount(): number {
    return this.state.batches.size;
  }

  validChunkCount(): bigint {
    return this.state.validChunkCount;
  }

  pot(): bigint {
    return this.state.pot;
  }

  lastPrice(): bigint {
    return this.state.lastPrice;
  }

  // ── Internals ──────────────────────────────────────────────────

  private requireValidDepths(depth: number, bucketDepth: number): void {
    ensure(
      Number.isInteger(depth) && depth <= 255 && bucketDepth < depth && bucketDepth >= this.state.minimumBucketDepth,
      "InvalidDepth",
      { depth, bucketDepth },
    );
  }

  private requireLiveBatch(batchId: Hash32): BatchRecord {
    const batch = this.state.batches.get(batchId);
    ensure(batch !== undefined, "BatchDoesNotExist", { batchId });
    ensure(batch.normalisedBalance > this.currentTotalOutPayment(), "BatchExpired", { batchId });
    return batch;
  }

  private storeBatch(
    sender: Address,
    id: Hash32,
    input: Omit<CreateBatchInput, "nonce">,
  ): BatchRecord {
    const totalAmount = input.initialBalancePerChunk << BigInt(input.depth);
    this.pull(sender, totalAmount);

    const batch: BatchRecord = {
      id,
      owner: input.owner,
      depth: input.depth,
      bucketDepth: input.bucketDepth,
      immutable: input.immutable,
      normalisedBalance: this.currentTotalOutPayment() + input.initialBalancePerChunk,
      lastUpdatedBlock: this.now(),
    };

    this.expire(Number.POSITIVE_INFINITY);
    this.state.validChunkCount += 1n << BigInt(input.depth);
    this.state.batches.set(id, batch);
    insertEntry(this.state.index, { balance: batch.normalisedBalance, id });

    this.emit(BATCH_CREATED_EVENT, {
      batchId: id,
      totalAmount,
      normalisedBalance: batch.normalisedBalance,
      owner: batch.owner,
      depth: batch.depth,
      bucketDepth: batch.bucketDepth,
      immutable: batch.immutable,
    });
    this.log.debug({ batchId: id, depth: batch.depth }, "batch created");
    return { ...batch };
  }

  private reindex(batch: BatchRecord, normalisedBalance: bigint): void {
    removeEntry(this.state.index, { balance: batch.normalisedBalance, id: batch.id });
    batch.normalisedBalance = normalisedBalance;
    batch.lastUpdatedBlock = this.now();
    insertEntry(this.state.index, { balance: normalisedBalance, id: batch.id });
  }

  private remainingBalanceOf(batch: BatchRecord): bigint {
    const current = this.currentTotalOutPayment();
    return batch.normalisedBalance > current ? batch.normalisedBalance - current : 0n;
  }

  private boundedPot(): bigint {
    const balance = this.chain.token.balanceOf(this.address);
    return this.state.pot < balance ? this.state.pot : balance;
  }

  /**
   * Sweep outpayment into the pot. Each expired batch contributes its
   * chunks from the last sweep level up to its own normalised balance;
   * once the walk reaches a live batch (or the end), every remaining
   * valid chunk contributes up to the current outpayment.
   */
  private expire(limit: number): ExpiryResult {
    const sweptFrom = this.state.lastExpiryBalance;
    const current = this.currentTotalOutPayment();
    const expired: Hash32[] = [];
    let complete = false;

    while (expired.length < limit) {
      const first = firstEntry(this.state.index);
      if (first === undefined || first.balance > current) {
        this.state.lastExpiryBalance = current;
        complete = true;
        break;
      }

      const batch = this.state.batches.get(first.id);
      ensure(batch !== undefined, "BatchDoesNotExist", { batchId: first.id });
      const size = 1n << BigInt(batch.depth);
      ensure(this.state.validChunkCount >= size, "InsufficientChunkCount", { batchId: batch.id });

      this.state.validChunkCount -= size;
      if (batch.normalisedBalance > sweptFrom) {
        this.state.pot += size * (batch.normalisedBalance - sweptFrom);
      }
      removeEntry(this.state.index, first);
      this.state.batches.delete(batch.id);
      expired.push(batch.id);
      this.emit(BATCH_EXPIRED_EVENT, { batchId: batch.id, depth: batch.depth });
    }

    if (!complete && !this.expiredBatchesExist()) {
      this.state.lastExpiryBalance = current;
      complete = true;
    }

    this.state.pot += this.state.validChunkCount * (this.state.lastExpiryBalance - sweptFrom);

    if (expired.length > 0) {
      this.log.info({ expired: expired.length, complete }, "batches expired");
    }
    return { expired, complete };
  }
}

/**
 * Redistribution game — the commit / reveal / claim Schelling round.
 *
 * Phases follow block height: commit in the first quarter of a round,
 * reveal in the second, claim in the second half. Commits and reveals
 * carry their round number; records of earlier rounds are dropped when
 * the first commit of a new round arrives.
 *
 * Randomness:
 *   - `seed` is mixed with fresh entropy at the first reveal of a round
 *   - rounds without a reveal advance it by H(seed || skipped)
 *   - the anchor a round's reveals are checked against is fixed at its
 *     first reveal, so nobody can pick a neighbourhood after the fact
 */

import {
  ensure,
  inProximity,
  isPhaseLastBlock,
  mixSeed,
  phaseOf,
  roundOf,
  skipSeed,
  weightedDraw,
  wrapCommit,
  isProtocolError,
  MAX_SKIPPED_ROUNDS,
  PENALTY_MULTIPLIER_DISAGREEMENT,
  PENALTY_MULTIPLIER_NON_REVEALED,
  ROUND_LENGTH,
  STAKE_MATURITY_ROUNDS,
  ZERO_HASH,
  type Address,
  type ClaimProof,
  type ClaimProofVerifier,
  type Hash32,
  type Phase,
} from "@stampnet/protocol";
import type { Chain } from "../chain.js";
import { LedgerComponent } from "../component.js";
import type { EntropySource } from "../entropy.js";
import {
  CHUNK_COUNT_EVENT,
  COMMITTED_EVENT,
  PRICE_SKIPPED_EVENT,
  PROOF_REJECTED_EVENT,
  REVEAL_ANCHOR_EVENT,
  REVEALED_EVENT,
  TRUTH_SELECTED_EVENT,
  WINNER_SELECTED_EVENT,
} from "../event-log/schemas.js";
import type { PostageStamp } from "./postage-stamp.js";
import type { PriceOracle } from "./price-oracle.js";
import type { StakeRegistry } from "./stake-registry.js";

export interface CommitRecord {
  round: number;
  overlay: Hash32;
  owner: Address;
  height: number;
  stake: bigint;
  obfuscatedHash: Hash32;
  revealed: boolean;
}

export interface RevealRecord {
  round: number;
  overlay: Hash32;
  owner: Address;
  depth: number;
  height: number;
  hash: Hash32;
  stake: bigint;
  stakeDensity: bigint;
}

export interface WinnerRecord {
  round: number;
  overlay: Hash32;
  owner: Address;
  depth: number;
}

export interface ClaimResult {
  round: number;
  winner: RevealRecord;
  truth: { hash: Hash32; depth: number };
  proofValid: boolean;
  /** Pot paid to the winner; 0 when the proof was rejected. */
  paid: bigint;
}

interface Selection {
  reveals: RevealRecord[];
  truth: RevealRecord;
  agreeing: RevealRecord[];
  winner: RevealRecord;
}

interface GameState {
  commits: CommitRecord[];
  reveals: RevealRecord[];
  currentCommitRound: number;
  currentRevealRound: number;
  currentClaimRound: number;
  seed: Hash32;
  /** Anchor of `currentRevealRound`, fixed by its first reveal. */
  revealAnchor: Hash32;
  lastWinner: WinnerRecord | null;
  penaltyMultiplierNonRevealed: number;
  penaltyMultiplierDisagreement: number;
}

export interface RedistributionDeps {
  registry: StakeRegistry;
  postage: PostageStamp;
  oracle: PriceOracle;
  entropy: EntropySource;
  verifier: ClaimProofVerifier;
}

export class Redistribution extends LedgerComponent<GameState> {
  private readonly registry: StakeRegistry;
  private readonly postage: PostageStamp;
  private readonly oracle: PriceOracle;
  private readonly entropy: EntropySource;
  private readonly verifier: ClaimProofVerifier;

  constructor(chain: Chain, address: Address, admin: Address, deps: RedistributionDeps) {
    super("redistribution", address, chain, {
      commits: [],
      reveals: [],
      currentCommitRound: -1,
      currentRevealRound: -1,
      currentClaimRound: -1,
      seed: ZERO_HASH,
      revealAnchor: ZERO_HASH,
      lastWinner: null,
      penaltyMultiplierNonRevealed: PENALTY_MULTIPLIER_NON_REVEALED,
      penaltyMultiplierDisagreement: PENALTY_MULTIPLIER_DISAGREEMENT,
    }, admin);
    this.registry = deps.registry;
    this.postage = deps.postage;
    this.oracle = deps.oracle;
    this.entropy = deps.entropy;
    this.verifier = deps.verifier;
  }

  // ── Commit ─────────────────────────────────────────────────────

  commit(sender: Address, obfuscatedHash: Hash32, roundNumber: number): CommitRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      const now = this.now();
      const round = this.currentRound();

      ensure(roundNumber >= round, "CommitRoundOver", { roundNumber, round });
      ensure(roundNumber <= round, "CommitRoundNotStarted", { roundNumber, round });
      ensure(phaseOf(now) === "commit", "NotCommitPhase");
      ensure(!isPhaseLastBlock(now), "PhaseLastBlock");

      const stake = this.registry.stakes(sender);
      const effective = this.registry.nodeEffectiveStake(sender);
      ensure(stake !== undefined && effective > 0n, "NotStaked", { owner: sender });
      this.requireMatureStake(stake.lastUpdateHeight);

      if (this.state.currentCommitRound !== round) {
        this.state.commits = [];
        this.state.currentCommitRound = round;
      }
      ensure(
        !this.state.commits.some((c) => c.overlay === stake.overlay),
        "AlreadyCommitted",
        { overlay: stake.overlay },
      );

      const record: CommitRecord = {
        round,
        overlay: stake.overlay,
        owner: sender,
        height: stake.height,
        stake: effective,
        obfuscatedHash,
        revealed: false,
      };
      this.state.commits.push(record);

      this.emit(COMMITTED_EVENT, { round, overlay: record.overlay, height: record.height });
      this.log.debug({ round, overlay: record.overlay }, "committed");
      return { ...record };
    });
  }

  // ── Reveal ─────────────────────────────────────────────────────

  reveal(sender: Address, depth: number, reserveHash: Hash32, revealNonce: Hash32): RevealRecord {
    return this.atomic(() => {
      this.requireNotPaused();
      const now = this.now();
      const round = this.currentRound();

      ensure(phaseOf(now) === "reveal", "NotRevealPhase");
      ensure(this.state.currentCommitRound === round, "NoCommitsReceived", { round });
      ensure(Number.isInteger(depth) && depth >= 0 && depth <= 255, "OutOfDepth", { depth });

      const commit = this.state.commits.find((c) => c.round === round && c.owner === sender);
      ensure(commit !== undefined, "NoMatchingCommit", { owner: sender });
      ensure(!commit.revealed, "AlreadyRevealed", { overlay: commit.overlay });
      ensure(
        wrapCommit(commit.overlay, depth, reserveHash, revealNonce) === commit.obfuscatedHash,
        "NoMatchingCommit",
        { overlay: commit.overlay },
      );

      const minimumDepth = this.currentMinimumDepth();
      ensure(depth >= minimumDepth && depth >= commit.height, "OutOfDepth", {
        depth,
        minimumDepth,
        height: commit.height,
      });

      if (this.state.currentRevealRound !== round) {
        this.fixRevealAnchor(round, now);
      }
      ensure(
        inProximity(commit.overlay, this.state.revealAnchor, depth - commit.height),
        "OutOfDepthReveal",
        { overlay: commit.overlay, anchor: this.state.revealAnchor },
      );

      commit.revealed = true;
      const record: RevealRecord = {
        round,
        overlay: commit.overlay,
        owner: sender,
        depth,
        height: commit.height,
        hash: reserveHash,
        stake: commit.stake,
        stakeDensity: commit.stake << BigInt(depth - commit.height),
      };
      this.state.reveals.push(record);

      this.emit(REVEALED_EVENT, {
        round,
        overlay: record.overlay,
        stake: record.stake,
        stakeDensity: record.stakeDensity,
        reserveHash,
        depth,
      });
      this.log.debug({ round, overlay: record.overlay, depth }, "revealed");
      return { ...record };
    });
  }

  private fixRevealAnchor(round: number, now: number): void {
    const anchor = this.currentSeed();
    this.state.currentRevealRound = round;
    this.state.revealAnchor = anchor;
    this.state.reveals = [];
    this.state.seed = mixSeed(anchor, this.entropy.entropy(round, now));

    this.emit(REVEAL_ANCHOR_EVENT, { round, anchor });
    this.log.info({ round, anchor }, "reveal anchor fixed");
  }

  // ── Claim ──────────────────────────────────────────────────────

  /**
   * Close the round. Anyone may submit; the pot goes to the winner.
   * Non-revealers and revealers that disagreed with the truth are frozen.
   * A proof the verifier rejects costs the winner its whole collateral.
   */
  claim(sender: Address, proof: ClaimProof): ClaimResult {
    return this.atomic(() => {
      this.requireNotPaused();
      const round = this.currentRound();
      ensure(phaseOf(this.now()) === "claim", "NotClaimPhase");
      ensure(this.state.currentClaimRound !== round, "AlreadyClaimed", { round });

      const { reveals, truth, agreeing, winner } = this.select();
      this.emit(TRUTH_SELECTED_EVENT, { round, hash: truth.hash, depth: truth.depth });
      this.emit(WINNER_SELECTED_EVENT, {
        round,
        overlay: winner.overlay,
        owner: winner.owner,
        depth: winner.depth,
      });

      this.applyPenalties(round, truth, reveals);
      this.state.currentClaimRound = round;

      const verdict = this.verifier.verify(
        {
          anchor: this.state.revealAnchor,
          overlay: winner.overlay,
          reserveHash: winner.hash,
          depth: winner.depth,
          height: winner.height,
        },
        proof,
      );
      const result = {
        round,
        winner: { ...winner },
        truth: { hash: truth.hash, depth: truth.depth },
      };

      if (!verdict.valid) {
        const slashed = this.registry.stakes(winner.owner)?.collateral ?? 0n;
        this.registry.slashDeposit(this.address, winner.owner, slashed);
        this.emit(PROOF_REJECTED_EVENT, { round, overlay: winner.overlay, error: verdict.error, slashed });
        this.log.warn({ round, overlay: winner.overlay, error: verdict.error, sender }, "claim proof rejected");
        return { ...result, proofValid: false, paid: 0n };
      }

      this.emit(CHUNK_COUNT_EVENT, { round, validChunkCount: this.postage.validChunkCount() });
      const paid = this.postage.withdraw(this.address, winner.owner);
      this.reportRedundancy(round, agreeing.length);
      this.state.lastWinner = {
        round,
        overlay: winner.overlay,
        owner: winner.owner,
        depth: winner.depth,
      };

      this.log.info({ round, winner: winner.overlay, paid: paid.toString() }, "round claimed");
      return { ...result, proofValid: true, paid };
    });
  }

  private applyPenalties(round: number, truth: RevealRecord, reveals: RevealRecord[]): void {
    const nonRevealed = this.freezeBlocks(this.state.penaltyMultiplierNonRevealed, truth.depth);
    const disagreement = this.freezeBlocks(this.state.penaltyMultiplierDisagreement, truth.depth);

    for (const commit of this.state.commits) {
      if (commit.round === round && !commit.revealed) {
        this.registry.freezeDeposit(this.address, commit.owner, nonRevealed);
      }
    }
    for (const reveal of reveals) {
      if (reveal.hash !== truth.hash || reveal.depth !== truth.depth) {
        this.registry.freezeDeposit(this.address, reveal.owner, disagreement);
      }
    }
  }

  /** multiplier × roundLength × 2^depth, capped to a safe block count. */
  private freezeBlocks(multiplier: number, depth: number): number {
    const blocks = BigInt(multiplier * ROUND_LENGTH) << BigInt(depth);
    const cap = BigInt(Number.MAX_SAFE_INTEGER);
    return Number(blocks < cap ? blocks : cap);
  }

  private reportRedundancy(round: number, redundancy: number): void {
    try {
      this.chain.transact(() => this.oracle.adjustPrice(this.address, redundancy));
    } catch (err) {
      if (!isProtocolError(err)) throw err;
      this.emit(PRICE_SKIPPED_EVENT, { round, redundancy, error: err.code });
      this.log.warn({ round, redundancy, error: err.code }, "price adjustment skipped");
    }
  }

  // ── Claim-phase views ──────────────────────────────────────────

  /** Never gated by pause: anyone can audit the outcome. */
  isWinner(overlay: Hash32): boolean {
    ensure(this.currentPhase() === "claim", "NotClaimPhase");
    ensure(this.state.currentClaimRound !== this.currentRound(), "AlreadyClaimed");
    return this.select().winner.overlay === overlay;
  }

  currentRoundReveals(): RevealRecord[] {
    ensure(this.currentPhase() === "claim", "NotClaimPhase");
    return this.select().reveals.map((r) => ({ ...r }));
  }

  /**
   * Truth: stake-density draw over every reveal of the round.
   * Winner: stake-density draw over the reveals agreeing with the truth.
   */
  private select(): Selection {
    const round = this.currentRound();
    const reveals = this.state.currentRevealRound === round
      ? this.state.reveals.filter((r) => r.round === round)
      : [];
    ensure(reveals.length > 0, "NoReveals", { round });

    const truth = reveals[weightedDraw(this.state.seed, "truth", reveals.map((r) => r.stakeDensity))];
    ensure(truth !== undefined, "NoReveals", { round });

    const agreeing = reveals.filter((r) => r.hash === truth.hash && r.depth === truth.depth);
    const winner = agreeing[weightedDraw(this.state.seed, "winner", agreeing.map((r) => r.stakeDensity))];
    ensure(winner !== undefined, "NoReveals", { round });

    return { reveals, truth, agreeing, winner };
  }

  // ── Lookahead ──────────────────────────────────────────────────

  /**
   * Would `owner` be in the neighbourhood at `depth`? In the commit phase
   * this is checked against the current anchor, in the claim phase
   * against the next round's. The reveal phase's anchor is not known
   * until its first reveal.
   */
  isParticipatingInUpcomingRound(owner: Address, depth: number): boolean {
    ensure(this.currentPhase() !== "reveal", "WrongPhase");
    const stake = this.registry.stakes(owner);
    ensure(stake !== undefined && this.registry.nodeEffectiveStake(owner) > 0n, "NotStaked", { owner });
    this.requireMatureStake(stake.lastUpdateHeight);
    ensure(depth >= stake.height && depth >= this.currentMinimumDepth(), "OutOfDepth", { depth });
    return inProximity(stake.overlay, this.currentRoundAnchor(), depth - stake.height);
  }

  // ── Admin ──────────────────────────────────────────────────────

  setFreezingParams(sender: Address, nonRevealed: number, disagreement: number): void {
    this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      ensure(
        Number.isSafeInteger(nonRevealed) && nonRevealed >= 0 && Number.isSafeInteger(disagreement) && disagreement >= 0,
        "InvalidParameter",
        { nonRevealed, disagreement },
      );
      this.state.penaltyMultiplierNonRevealed = nonRevealed;
      this.state.penaltyMultiplierDisagreement = disagreement;
    });
  }

  // ── Reads ──────────────────────────────────────────────────────

  currentRound(): number {
    return roundOf(this.now());
  }

  currentPhase(): Phase {
    return phaseOf(this.now());
  }

  /** Seed the current round's anchor derives from. */
  currentSeed(): Hash32 {
    return this.seedFor(this.currentRound());
  }

  nextSeed(): Hash32 {
    return this.seedFor(this.currentRound() + 1);
  }

  currentRoundAnchor(): Hash32 {
    const phase = this.currentPhase();
    if (phase === "commit") return this.currentSeed();
    if (phase === "claim") return this.nextSeed();
    ensure(this.state.currentRevealRound !== this.currentRound(), "FirstRevealDone");
    return this.currentSeed();
  }

  /** Anchor fixed by the latest first reveal, and its round. */
  revealAnchor(): { round: number; anchor: Hash32 } | null {
    if (this.state.currentRevealRound < 0) return null;
    return { round: this.state.currentRevealRound, anchor: this.state.revealAnchor };
  }

  /**
   * One below the last winner's depth after a claimed round; every round
   * that closed without a claim relaxes it by one more.
   */
  currentMinimumDepth(): number {
    const lastWinnerDepth = this.state.lastWinner?.depth ?? 0;
    const gap = this.state.currentCommitRound - this.state.currentClaimRound - 1;
    const skipped = Math.min(MAX_SKIPPED_ROUNDS, Math.max(0, gap));
    return Math.max(0, lastWinnerDepth - (skipped + 1));
  }

  currentCommits(): CommitRecord[] {
    const round = this.currentRound();
    return this.state.commits.filter((c) => c.round === round).map((c) => ({ ...c }));
  }

  winner(): WinnerRecord | null {
    return this.state.lastWinner ? { ...this.state.lastWinner } : null;
  }

  roundCounters(): { commit: number; reveal: number; claim: number } {
    return {
      commit: this.state.currentCommitRound,
      reveal: this.state.currentRevealRound,
      claim: this.state.currentClaimRound,
    };
  }

  private seedFor(round: number): Hash32 {
    return skipSeed(this.state.seed, round - this.state.currentRevealRound - 1);
  }

  private requireMatureStake(lastUpdateHeight: number): void {
    ensure(
      this.now() - lastUpdateHeight > STAKE_MATURITY_ROUNDS * ROUND_LENGTH,
      "MustStake2Rounds",
      { lastUpdateHeight },
    );
  }
}

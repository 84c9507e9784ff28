/**
 * Ledger server — HTTP surface over the four components.
 *
 * The caller identity travels as `sender` in the request body; checking
 * that the sender actually signed the call belongs to the host ledger.
 *
 * Routes:
 *   GET  /health              — health check
 *   GET  /round               — round counters, phase, anchor, minimum depth
 *   GET  /stake/:owner        — stake record
 *   POST /stake               — create or top up a stake
 *   POST /stake/withdraw      — withdraw surplus collateral
 *   POST /stake/migrate       — emergency exit (registry paused only)
 *   GET  /batch/:id           — batch record + remaining balance
 *   POST /batch               — create a batch
 *   POST /batch/:id/topup     — top up a batch
 *   POST /batch/:id/depth     — increase a batch's depth
 *   POST /batch/expire        — expire up to `limit` batches
 *   GET  /postage             — ledger totals
 *   POST /commit              — commit a reserve sample
 *   POST /reveal              — reveal a committed sample
 *   POST /claim               — close the round with a claim proof
 *   GET  /reveals             — reveals of the round (claim phase)
 *   GET  /winner/:overlay     — is this overlay the round's winner
 *   GET  /participation/:owner/:depth — upcoming-round lookahead
 *   GET  /events              — event log (from seq)
 *   POST /oracle/price        — admin price override
 *   POST /admin/pause         — pause a component
 *   POST /admin/unpause       — unpause a component
 *   POST /admin/grant         — grant a role on a component
 *   POST /admin/revoke        — revoke a role on a component
 *   POST /dev/fund            — mint + approve (dev token only)
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  bigintReplacer,
  isProtocolError,
  Amount,
  Depth,
  Hex20,
  Hex32,
  ProtocolError,
  type BatchV1,
  type CommitV1,
  type PostageStatusV1,
  type ProtocolErrorCode,
  type RevealV1,
  type RoundStatusV1,
  type StakeV1,
} from "@stampnet/protocol";
import { MemoryToken } from "@stampnet/token-client";
import { isRole, type Role } from "./access-control.js";
import { Chain } from "./chain.js";
import { WallClock } from "./clock.js";
import { config } from "./config.js";
import { deploy, type Deployment } from "./deploy.js";
import { createLogger, type Logger } from "./logger.js";
import { createRoundScheduler } from "./scheduler.js";
import type { BatchRecord } from "./views/postage-stamp.js";
import type { CommitRecord, RevealRecord } from "./views/redistribution.js";
import type { StakeRecord } from "./views/stake-registry.js";

// ── Request bodies ─────────────────────────────────────────────────

const Sender = Type.Object({ sender: Hex20 });

const StakeBody = Type.Object({
  sender: Hex20,
  nonce: Hex32,
  amount: Amount,
  height: Depth,
});

const AmountBody = Type.Object({ sender: Hex20, amount: Amount });

const CreateBatchBody = Type.Object({
  sender: Hex20,
  owner: Hex20,
  initial_balance_per_chunk: Amount,
  depth: Depth,
  bucket_depth: Depth,
  nonce: Hex32,
  immutable: Type.Boolean({ default: false }),
});

const TopUpBody = Type.Object({ sender: Hex20, topup_per_chunk: Amount });
const DepthBody = Type.Object({ sender: Hex20, new_depth: Depth });
const ExpireBody = Type.Object({ limit: Type.Integer({ minimum: 1 }) });

const CommitBody = Type.Object({
  sender: Hex20,
  obfuscated_hash: Hex32,
  round: Type.Integer({ minimum: 0 }),
});

const RevealBody = Type.Object({
  sender: Hex20,
  depth: Depth,
  reserve_hash: Hex32,
  reveal_nonce: Hex32,
});

const ClaimBody = Type.Object({
  sender: Hex20,
  proof: Type.Object({
    chunk_address: Hex32,
    inclusion: Type.Array(
      Type.Object({
        hash: Hex32,
        position: Type.Union([Type.Literal("left"), Type.Literal("right")]),
      }),
    ),
  }),
});

const PriceBody = Type.Object({ sender: Hex20, price: Amount });

const ComponentName = Type.Union([
  Type.Literal("stake"),
  Type.Literal("postage"),
  Type.Literal("oracle"),
  Type.Literal("game"),
]);
const PauseBody = Type.Object({ sender: Hex20, component: ComponentName });
const RoleBody = Type.Object({
  sender: Hex20,
  component: ComponentName,
  role: Type.String(),
  account: Hex20,
});

const FundBody = Type.Object({ account: Hex20, amount: Amount });

// ── Wire mapping ───────────────────────────────────────────────────

function stakeToWire(record: StakeRecord, effectiveStake: bigint): StakeV1 {
  return {
    version: 1,
    owner: record.owner,
    overlay: record.overlay,
    collateral: record.collateral.toString(),
    height: record.height,
    last_update_block: record.lastUpdateHeight,
    frozen_until: record.frozenUntil,
    effective_stake: effectiveStake.toString(),
  };
}

function batchToWire(batch: BatchRecord, remaining: bigint): BatchV1 {
  return {
    version: 1,
    id: batch.id,
    owner: batch.owner,
    depth: batch.depth,
    bucket_depth: batch.bucketDepth,
    immutable: batch.immutable,
    normalised_balance: batch.normalisedBalance.toString(),
    remaining_balance: remaining.toString(),
    last_update_block: batch.lastUpdatedBlock,
  };
}

function commitToWire(commit: CommitRecord): CommitV1 {
  return {
    round: commit.round,
    overlay: commit.overlay,
    owner: commit.owner,
    height: commit.height,
    stake: commit.stake.toString(),
    obfuscated_hash: commit.obfuscatedHash,
    revealed: commit.revealed,
  };
}

function revealToWire(reveal: RevealRecord): RevealV1 {
  return {
    round: reveal.round,
    overlay: reveal.overlay,
    owner: reveal.owner,
    depth: reveal.depth,
    height: reveal.height,
    hash: reveal.hash,
    stake: reveal.stake.toString(),
    stake_density: reveal.stakeDensity.toString(),
  };
}

function statusFor(code: ProtocolErrorCode): number {
  switch (code) {
    case "BatchDoesNotExist":
    case "NotStaked":
      return 404;
    case "Unauthorized":
      return 403;
    default:
      return 422;
  }
}

// ── App ────────────────────────────────────────────────────────────

interface AdminSurface {
  readonly address: string;
  pause(sender: string): void;
  unPause(sender: string): void;
  grantRole(sender: string, role: Role, account: string): void;
  revokeRole(sender: string, role: Role, account: string): void;
  hasRole(role: Role, account: string): boolean;
}

export interface LedgerDeps {
  deployment: Deployment;
  logger: Logger;
  /** Present in dev mode: enables /dev/fund. */
  faucet?: MemoryToken;
}

export async function buildApp(deps: LedgerDeps) {
  const { registry, postage, oracle, game, chain } = deps.deployment;
  const app = Fastify({ loggerInstance: deps.logger });

  const components: Record<Static<typeof ComponentName>, AdminSurface> = {
    stake: registry,
    postage,
    oracle,
    game,
  };

  app.setReplySerializer((payload) => JSON.stringify(payload, bigintReplacer));

  app.setErrorHandler((err, _req, reply) => {
    if (isProtocolError(err)) {
      return reply
        .status(statusFor(err.code))
        .send({ error: err.code, detail: err.details ?? null });
    }
    throw err;
  });

  // ── Health + round ─────────────────────────────────────────────
  app.get("/health", async (_req, reply) => {
    return reply.send({
      status: "ok",
      block: chain.blockNumber(),
      events: chain.events.count(),
      timestamp: Date.now(),
    });
  });

  app.get("/round", async (_req, reply) => {
    const counters = game.roundCounters();
    const round = game.currentRound();
    const fixed = game.revealAnchor();
    const status: RoundStatusV1 = {
      version: 1,
      block: chain.blockNumber(),
      round,
      phase: game.currentPhase(),
      commit_round: counters.commit,
      reveal_round: counters.reveal,
      claim_round: counters.claim,
      anchor: fixed && fixed.round === round ? fixed.anchor : null,
      minimum_depth: game.currentMinimumDepth(),
      current_price: oracle.currentPrice().toString(),
      paused: game.isPaused(),
    };
    return reply.send(status);
  });

  // ── Stake registry ─────────────────────────────────────────────
  app.get<{ Params: { owner: string } }>("/stake/:owner", async (req, reply) => {
    const record = registry.stakes(req.params.owner);
    if (!record) throw new ProtocolError("NotStaked", { owner: req.params.owner });
    return reply.send(stakeToWire(record, registry.nodeEffectiveStake(record.owner)));
  });

  app.post<{ Body: Static<typeof StakeBody> }>(
    "/stake",
    { schema: { body: StakeBody } },
    async (req, reply) => {
      const { sender, nonce, amount, height } = req.body;
      const record = registry.manageStake(sender, nonce, BigInt(amount), height);
      return reply.send(stakeToWire(record, registry.nodeEffectiveStake(sender)));
    },
  );

  app.post<{ Body: Static<typeof AmountBody> }>(
    "/stake/withdraw",
    { schema: { body: AmountBody } },
    async (req, reply) => {
      const withdrawn = registry.withdrawFromStake(req.body.sender, BigInt(req.body.amount));
      return reply.send({ withdrawn: withdrawn.toString() });
    },
  );

  app.post<{ Body: Static<typeof Sender> }>(
    "/stake/migrate",
    { schema: { body: Sender } },
    async (req, reply) => {
      const returned = registry.migrateStake(req.body.sender);
      return reply.send({ returned: returned.toString() });
    },
  );

  // ── Postage ledger ─────────────────────────────────────────────
  app.get<{ Params: { id: string } }>("/batch/:id", async (req, reply) => {
    const batch = postage.batches(req.params.id);
    if (!batch) throw new ProtocolError("BatchDoesNotExist", { batchId: req.params.id });
    return reply.send(batchToWire(batch, postage.remainingBalance(batch.id)));
  });

  app.post<{ Body: Static<typeof CreateBatchBody> }>(
    "/batch",
    { schema: { body: CreateBatchBody } },
    async (req, reply) => {
      const body = req.body;
      const batch = postage.createBatch(body.sender, {
        owner: body.owner,
        initialBalancePerChunk: BigInt(body.initial_balance_per_chunk),
        depth: body.depth,
        bucketDepth: body.bucket_depth,
        nonce: body.nonce,
        immutable: body.immutable,
      });
      return reply.status(201).send(batchToWire(batch, postage.remainingBalance(batch.id)));
    },
  );

  app.post<{ Params: { id: string }; Body: Static<typeof TopUpBody> }>(
    "/batch/:id/topup",
    { schema: { body: TopUpBody } },
    async (req, reply) => {
      const batch = postage.topUp(req.body.sender, req.params.id, BigInt(req.body.topup_per_chunk));
      return reply.send(batchToWire(batch, postage.remainingBalance(batch.id)));
    },
  );

  app.post<{ Params: { id: string }; Body: Static<typeof DepthBody> }>(
    "/batch/:id/depth",
    { schema: { body: DepthBody } },
    async (req, reply) => {
      const batch = postage.increaseDepth(req.body.sender, req.params.id, req.body.new_depth);
      return reply.send(batchToWire(batch, postage.remainingBalance(batch.id)));
    },
  );

  app.post<{ Body: Static<typeof ExpireBody> }>(
    "/batch/expire",
    { schema: { body: ExpireBody } },
    async (req, reply) => {
      const result = postage.expireLimited(req.body.limit);
      return reply.send({ expired: result.expired, complete: result.complete });
    },
  );

  app.get("/postage", async (_req, reply) => {
    const status: PostageStatusV1 = {
      version: 1,
      last_price: postage.lastPrice().toString(),
      total_out_payment: postage.currentTotalOutPayment().toString(),
      valid_chunk_count: postage.validChunkCount().toString(),
      pot: postage.pot().toString(),
      batch_count: postage.batchCount(),
      paused: postage.isPaused(),
    };
    return reply.send(status);
  });

  // ── Redistribution game ────────────────────────────────────────
  app.post<{ Body: Static<typeof CommitBody> }>(
    "/commit",
    { schema: { body: CommitBody } },
    async (req, reply) => {
      const commit = game.commit(req.body.sender, req.body.obfuscated_hash, req.body.round);
      return reply.send(commitToWire(commit));
    },
  );

  app.post<{ Body: Static<typeof RevealBody> }>(
    "/reveal",
    { schema: { body: RevealBody } },
    async (req, reply) => {
      const { sender, depth, reserve_hash, reveal_nonce } = req.body;
      const reveal = game.reveal(sender, depth, reserve_hash, reveal_nonce);
      return reply.send(revealToWire(reveal));
    },
  );

  app.post<{ Body: Static<typeof ClaimBody> }>(
    "/claim",
    { schema: { body: ClaimBody } },
    async (req, reply) => {
      const { sender, proof } = req.body;
      const result = game.claim(sender, {
        chunkAddress: proof.chunk_address,
        inclusion: proof.inclusion,
      });
      return reply.send({
        round: result.round,
        winner: revealToWire(result.winner),
        truth: result.truth,
        proof_valid: result.proofValid,
        paid: result.paid.toString(),
      });
    },
  );

  app.get("/reveals", async (_req, reply) => {
    return reply.send(game.currentRoundReveals().map(revealToWire));
  });

  app.get("/commits", async (_req, reply) => {
    return reply.send(game.currentCommits().map(commitToWire));
  });

  app.get<{ Params: { overlay: string } }>("/winner/:overlay", async (req, reply) => {
    return reply.send({ overlay: req.params.overlay, winner: game.isWinner(req.params.overlay) });
  });

  app.get<{ Params: { owner: string; depth: string } }>(
    "/participation/:owner/:depth",
    async (req, reply) => {
      const depth = parseInt(req.params.depth, 10);
      if (!Number.isInteger(depth)) {
        return reply.status(422).send({ error: "invalid_depth" });
      }
      return reply.send({
        owner: req.params.owner,
        depth,
        participating: game.isParticipatingInUpcomingRound(req.params.owner, depth),
      });
    },
  );

  // ── Events ─────────────────────────────────────────────────────
  app.get<{ Querystring: { from?: string } }>("/events", async (req, reply) => {
    const from = req.query.from ? parseInt(req.query.from, 10) : 0;
    return reply.send(chain.events.getEvents(Number.isNaN(from) ? 0 : from));
  });

  // ── Admin ──────────────────────────────────────────────────────
  app.post<{ Body: Static<typeof PriceBody> }>(
    "/oracle/price",
    { schema: { body: PriceBody } },
    async (req, reply) => {
      const result = oracle.setPrice(req.body.sender, BigInt(req.body.price));
      return reply.send({ price: result.price.toString(), push: result.push });
    },
  );

  app.post<{ Body: Static<typeof PauseBody> }>(
    "/admin/pause",
    { schema: { body: PauseBody } },
    async (req, reply) => {
      components[req.body.component].pause(req.body.sender);
      return reply.send({ component: req.body.component, paused: true });
    },
  );

  app.post<{ Body: Static<typeof PauseBody> }>(
    "/admin/unpause",
    { schema: { body: PauseBody } },
    async (req, reply) => {
      components[req.body.component].unPause(req.body.sender);
      return reply.send({ component: req.body.component, paused: false });
    },
  );

  app.post<{ Body: Static<typeof RoleBody> }>(
    "/admin/grant",
    { schema: { body: RoleBody } },
    async (req, reply) => {
      const { sender, component, role, account } = req.body;
      if (!isRole(role)) return reply.status(422).send({ error: "invalid_role" });
      components[component].grantRole(sender, role, account);
      return reply.send({ component, role, account, granted: components[component].hasRole(role, account) });
    },
  );

  app.post<{ Body: Static<typeof RoleBody> }>(
    "/admin/revoke",
    { schema: { body: RoleBody } },
    async (req, reply) => {
      const { sender, component, role, account } = req.body;
      if (!isRole(role)) return reply.status(422).send({ error: "invalid_role" });
      components[component].revokeRole(sender, role, account);
      return reply.send({ component, role, account, granted: components[component].hasRole(role, account) });
    },
  );

  // ── Dev token ──────────────────────────────────────────────────
  const faucet = deps.faucet;
  if (faucet) {
    app.log.info("dev token enabled — /dev/fund mints and approves");
    app.post<{ Body: Static<typeof FundBody> }>(
      "/dev/fund",
      { schema: { body: FundBody } },
      async (req, reply) => {
        const amount = BigInt(req.body.amount);
        faucet.mint(req.body.account, amount);
        for (const { address } of Object.values(components)) {
          const allowed = faucet.allowance(req.body.account, address);
          faucet.approve(req.body.account, address, allowed + amount);
        }
        return reply.send({
          account: req.body.account,
          balance: faucet.balanceOf(req.body.account).toString(),
        });
      },
    );
  }

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  const logger = createLogger(config.logLevel);
  logger.info(
    {
      port: config.port,
      networkId: config.networkId.toString(),
      blockTimeMs: config.blockTimeMs,
      scheduler: config.roundSchedulerIntervalMs > 0 ? `${config.roundSchedulerIntervalMs}ms` : "disabled",
    },
    "ledger config",
  );

  const genesis = config.genesisTimestampMs > 0 ? config.genesisTimestampMs : Date.now();
  const clock = new WallClock(genesis, config.blockTimeMs);
  const token = new MemoryToken();
  const chain = new Chain({ clock, token, logger });
  const deployment = deploy(chain, {
    admin: config.adminAddress,
    networkId: config.networkId,
    minimumStake: config.minimumStake,
    minimumPrice: config.minimumPrice,
    minimumValidityBlocks: config.minimumValidityBlocks,
  });

  const app = await buildApp({ deployment, logger, faucet: token });

  // Start the scheduler BEFORE listen (Fastify 5 forbids addHook after listen)
  if (config.roundSchedulerIntervalMs > 0) {
    const scheduler = createRoundScheduler(clock, deployment.postage, {
      checkIntervalMs: config.roundSchedulerIntervalMs,
      batchLimit: config.expiryBatchLimit,
      logger,
      onTick: (result) => {
        logger.info(
          { round: result.round, expired: result.expired.length, complete: result.complete },
          "expiry keeper ran",
        );
      },
    });
    app.addHook("onClose", async () => {
      scheduler.stop();
    });
    scheduler.start();
  }

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}

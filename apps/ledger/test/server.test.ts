/**
 * HTTP surface tests (fastify inject, no listener).
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ZERO_HASH } from "@stampnet/protocol";
import { silentLogger } from "../src/logger.js";
import { buildApp } from "../src/server.js";
import { ADMIN, ALICE, BOB, nonce, setup, type Fixture } from "./helpers.js";

describe("ledger server", () => {
  let f: Fixture;
  let app: Awaited<ReturnType<typeof buildApp>>;

  beforeEach(async () => {
    f = setup({ minimumStake: 1_000n });
    app = await buildApp({ deployment: f, logger: silentLogger(), faucet: f.token });
  });

  afterEach(async () => {
    await app.close();
  });

  it("GET /health reports the block height", async () => {
    const res = await app.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ status: "ok", block: 0 });
  });

  it("GET /round reports counters before the first commit", async () => {
    const res = await app.inject({ method: "GET", url: "/round" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      version: 1,
      block: 0,
      round: 0,
      phase: "commit",
      commit_round: -1,
      reveal_round: -1,
      claim_round: -1,
      anchor: null,
      minimum_depth: 0,
      current_price: "24000",
      paused: false,
    });
  });

  it("funds an account and stakes through the API", async () => {
    const fund = await app.inject({
      method: "POST",
      url: "/dev/fund",
      payload: { account: ALICE, amount: "100000" },
    });
    expect(fund.json()).toEqual({ account: ALICE, balance: "100000" });

    const stake = await app.inject({
      method: "POST",
      url: "/stake",
      payload: { sender: ALICE, nonce: nonce("alice"), amount: "4000", height: 0 },
    });
    expect(stake.statusCode).toBe(200);
    expect(stake.json()).toMatchObject({ owner: ALICE, collateral: "4000", effective_stake: "4000", height: 0 });

    const read = await app.inject({ method: "GET", url: `/stake/${ALICE}` });
    expect(read.json()).toMatchObject({ overlay: f.registry.overlayOfAddress(ALICE), last_update_block: 0 });
    expect(f.token.balanceOf(ALICE)).toBe(96_000n);
  });

  it("maps protocol errors to status codes", async () => {
    const missingStake = await app.inject({ method: "GET", url: `/stake/${BOB}` });
    expect(missingStake.statusCode).toBe(404);
    expect(missingStake.json()).toEqual({ error: "NotStaked", detail: { owner: BOB } });

    const missingBatch = await app.inject({ method: "GET", url: `/batch/${ZERO_HASH}` });
    expect(missingBatch.statusCode).toBe(404);
    expect(missingBatch.json().error).toBe("BatchDoesNotExist");

    const unauthorized = await app.inject({
      method: "POST",
      url: "/oracle/price",
      payload: { sender: ALICE, price: "30000" },
    });
    expect(unauthorized.statusCode).toBe(403);
    expect(unauthorized.json().error).toBe("Unauthorized");

    const belowMinimum = await app.inject({
      method: "POST",
      url: "/stake",
      payload: { sender: ALICE, nonce: nonce("alice"), amount: "10", height: 0 },
    });
    expect(belowMinimum.statusCode).toBe(422);
    expect(belowMinimum.json()).toEqual({
      error: "BelowMinimumStake",
      detail: { collateral: "10", required: "1000" },
    });
  });

  it("rejects malformed bodies", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/stake",
      payload: { sender: "not-an-address", nonce: nonce("x"), amount: "4000", height: 0 },
    });
    expect(res.statusCode).toBe(400);
  });

  it("pauses a component for the admin", async () => {
    const res = await app.inject({
      method: "POST",
      url: "/admin/pause",
      payload: { sender: ADMIN, component: "game" },
    });
    expect(res.json()).toEqual({ component: "game", paused: true });
    expect(f.game.isPaused()).toBe(true);

    const round = await app.inject({ method: "GET", url: "/round" });
    expect(round.json().paused).toBe(true);
  });

  it("grants and revokes roles, rejecting unknown ones", async () => {
    const grant = await app.inject({
      method: "POST",
      url: "/admin/grant",
      payload: { sender: ADMIN, component: "oracle", role: "PRICE_UPDATER", account: BOB },
    });
    expect(grant.json()).toEqual({ component: "oracle", role: "PRICE_UPDATER", account: BOB, granted: true });
    expect(f.oracle.hasRole("PRICE_UPDATER", BOB)).toBe(true);

    const revoke = await app.inject({
      method: "POST",
      url: "/admin/revoke",
      payload: { sender: ADMIN, component: "oracle", role: "PRICE_UPDATER", account: BOB },
    });
    expect(revoke.json().granted).toBe(false);

    const unknown = await app.inject({
      method: "POST",
      url: "/admin/grant",
      payload: { sender: ADMIN, component: "oracle", role: "SUPERUSER", account: BOB },
    });
    expect(unknown.statusCode).toBe(422);
    expect(unknown.json()).toEqual({ error: "invalid_role" });
  });

  it("serves the event log with amounts as strings", async () => {
    const res = await app.inject({ method: "GET", url: "/events?from=0" });
    const events: Array<{ type: string; payload: Record<string, unknown> }> = res.json();

    expect(events).toHaveLength(f.chain.events.count());
    const priceUpdate = events.find((e) => e.type === "price.update.v1");
    expect(priceUpdate?.payload).toEqual({ price: "24000", round: 0 });
  });
});

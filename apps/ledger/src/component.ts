/**
 * Base for ledger components: owned state, a role table, a pause flag,
 * and checked value transfers through the chain's token.
 */

import { ensure, ProtocolError, type Address } from "@stampnet/protocol";
import { AccessControl, type Role } from "./access-control.js";
import type { Chain } from "./chain.js";
import {
  PAUSED_EVENT,
  ROLE_GRANTED_EVENT,
  ROLE_REVOKED_EVENT,
  UNPAUSED_EVENT,
  type EventPayloads,
  type EventType,
} from "./event-log/schemas.js";
import type { Logger } from "./logger.js";

export abstract class LedgerComponent<S> {
  protected state: S;
  protected readonly log: Logger;
  private readonly roles: AccessControl;
  private paused = false;

  constructor(
    readonly name: string,
    readonly address: Address,
    protected readonly chain: Chain,
    initial: S,
    admin: Address,
  ) {
    this.state = initial;
    this.roles = new AccessControl(admin);
    this.roles.add("PAUSER", admin);
    this.log = chain.logger.child({ component: name });
    chain.register(this);
    chain.register(this.roles);
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.state);
    const paused = this.paused;
    return () => {
      this.state = saved;
      this.paused = paused;
    };
  }

  // ── Access control ─────────────────────────────────────────────

  hasRole(role: Role, account: Address): boolean {
    return this.roles.hasRole(role, account);
  }

  grantRole(sender: Address, role: Role, account: Address): void {
    this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      if (this.roles.add(role, account)) {
        this.emit(ROLE_GRANTED_EVENT, { role, account, sender });
      }
    });
  }

  revokeRole(sender: Address, role: Role, account: Address): void {
    this.atomic(() => {
      this.requireRole("DEFAULT_ADMIN", sender);
      if (this.roles.remove(role, account)) {
        this.emit(ROLE_REVOKED_EVENT, { role, account, sender });
      }
    });
  }

  protected requireRole(role: Role, account: Address): void {
    ensure(this.roles.hasRole(role, account), "Unauthorized", { role, account });
  }

  // ── Pause ──────────────────────────────────────────────────────

  isPaused(): boolean {
    return this.paused;
  }

  pause(sender: Address): void {
    this.atomic(() => {
      this.requireRole("PAUSER", sender);
      this.requireNotPaused();
      this.paused = true;
      this.emit(PAUSED_EVENT, { sender });
      this.log.warn({ sender }, "paused");
    });
  }

  unPause(sender: Address): void {
    this.atomic(() => {
      this.requireRole("PAUSER", sender);
      this.requireIsPaused();
      this.paused = false;
      this.emit(UNPAUSED_EVENT, { sender });
      this.log.info({ sender }, "unpaused");
    });
  }

  protected requireNotPaused(): void {
    ensure(!this.paused, "EnforcedPause");
  }

  protected requireIsPaused(): void {
    ensure(this.paused, "ExpectedPause");
  }

  // ── Execution helpers ──────────────────────────────────────────

  protected atomic<T>(fn: () => T): T {
    return this.chain.transact(fn);
  }

  protected now(): number {
    return this.chain.blockNumber();
  }

  protected emit<K extends EventType>(type: K, payload: EventPayloads[K]): void {
    this.chain.events.append(type, this.address, this.now(), payload);
  }

  /** Pull `amount` from `from` into this component (needs an allowance). */
  protected pull(from: Address, amount: bigint): void {
    if (amount === 0n) return;
    if (!this.chain.token.transferFrom(this.address, from, this.address, amount)) {
      throw new ProtocolError("TransferFailed", { from, amount });
    }
  }

  /** Pay `amount` out of this component's token balance. */
  protected push(to: Address, amount: bigint): void {
    if (amount === 0n) return;
    if (!this.chain.token.transfer(this.address, to, amount)) {
      throw new ProtocolError("TransferFailed", { to, amount });
    }
  }
}

/**
 * Role tables. One per component: Role → set of identities.
 */

import type { Address } from "@stampnet/protocol";

export const ROLES = [
  "DEFAULT_ADMIN",
  "PAUSER",
  "REDISTRIBUTOR",
  "PRICE_ORACLE",
  "PRICE_UPDATER",
] as const;

export type Role = (typeof ROLES)[number];

export function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

export class AccessControl {
  private members = new Map<Role, Set<Address>>();

  constructor(admin: Address) {
    this.add("DEFAULT_ADMIN", admin);
  }

  hasRole(role: Role, account: Address): boolean {
    return this.members.get(role)?.has(account) ?? false;
  }

  /** @returns false when the account already held the role */
  add(role: Role, account: Address): boolean {
    let set = this.members.get(role);
    if (!set) {
      set = new Set();
      this.members.set(role, set);
    }
    if (set.has(account)) return false;
    set.add(account);
    return true;
  }

  /** @returns false when the account did not hold the role */
  remove(role: Role, account: Address): boolean {
    return this.members.get(role)?.delete(account) ?? false;
  }

  checkpoint(): () => void {
    const saved = structuredClone(this.members);
    return () => {
      this.members = saved;
    };
  }
}

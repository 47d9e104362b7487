/**
 * @vestline/gate — Access / pause gate.
 *
 * One gate per ledger. Holds role membership and the pause flag, and
 * answers the two questions every mutating entry point asks first:
 * "is the ledger running?" and "may this caller do this?".
 *
 * Rules:
 * - The admin role always exists and always has at least its initial holder
 * - Only admins grant or revoke roles and toggle pause
 * - Reads never consult the pause flag
 */

import type { Address } from "@vestline/types";
import { isAddress, isZeroAddress } from "@vestline/types";
import { LedgerError } from "./errors.js";

export const ADMIN_ROLE = "admin";

export type AdminRole = typeof ADMIN_ROLE;

/**
 * Serializable gate state.
 */
export interface AccessGateSnapshot {
  readonly roles: Readonly<Record<string, readonly string[]>>;
  readonly paused: boolean;
}

export class AccessGate<TRole extends string = AdminRole> {
  private readonly _known: ReadonlySet<string>;
  private readonly _members = new Map<TRole | AdminRole, Set<Address>>();
  private _paused = false;

  /**
   * @param admin - Initial holder of the admin role
   * @param roles - Roles this ledger recognizes besides admin
   */
  constructor(admin: Address, roles: readonly TRole[] = []) {
    if (isZeroAddress(admin)) {
      throw new LedgerError("INVALID_ADDRESS", "Admin cannot be the zero address");
    }
    this._known = new Set<string>([ADMIN_ROLE, ...roles]);
    this._members.set(ADMIN_ROLE, new Set([admin]));
  }

  // ─── Roles ───────────────────────────────────────────────────────────

  hasRole(role: TRole | AdminRole, account: Address): boolean {
    return this._members.get(role)?.has(account) ?? false;
  }

  isAdmin(account: Address): boolean {
    return this.hasRole(ADMIN_ROLE, account);
  }

  /** True if the account holds admin or any of the given roles. */
  hasAnyRole(account: Address, roles: readonly TRole[]): boolean {
    if (this.isAdmin(account)) return true;
    return roles.some((role) => this.hasRole(role, account));
  }

  holders(role: TRole | AdminRole): readonly Address[] {
    return [...(this._members.get(role) ?? [])];
  }

  /**
   * Grant a role. Returns false if the account already held it.
   */
  grantRole(caller: Address, role: TRole | AdminRole, account: Address): boolean {
    this.assertAdmin(caller);
    if (isZeroAddress(account)) {
      throw new LedgerError("INVALID_ADDRESS", "Cannot grant a role to the zero address");
    }

    let members = this._members.get(role);
    if (members === undefined) {
      members = new Set();
      this._members.set(role, members);
    }
    if (members.has(account)) return false;
    members.add(account);
    return true;
  }

  /**
   * Revoke a role. Returns false if the account did not hold it.
   * An admin cannot drop their own admin role.
   */
  revokeRole(caller: Address, role: TRole | AdminRole, account: Address): boolean {
    this.assertAdmin(caller);
    if (role === ADMIN_ROLE && account === caller) {
      throw new LedgerError("CANNOT_REMOVE_SELF", "An admin cannot revoke their own admin role");
    }
    return this._members.get(role)?.delete(account) ?? false;
  }

  // ─── Pause ───────────────────────────────────────────────────────────

  get paused(): boolean {
    return this._paused;
  }

  /** Returns false if the gate was already paused. */
  pause(caller: Address): boolean {
    this.assertAdmin(caller);
    if (this._paused) return false;
    this._paused = true;
    return true;
  }

  /** Returns false if the gate was not paused. */
  unpause(caller: Address): boolean {
    this.assertAdmin(caller);
    if (!this._paused) return false;
    this._paused = false;
    return true;
  }

  // ─── Assertions ──────────────────────────────────────────────────────

  assertNotPaused(): void {
    if (this._paused) {
      throw new LedgerError("LEDGER_PAUSED", "Ledger is paused");
    }
  }

  assertAdmin(caller: Address): void {
    if (!this.isAdmin(caller)) {
      throw new LedgerError("NOT_AUTHORIZED", `${caller} does not hold the admin role`);
    }
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): AccessGateSnapshot {
    const roles: Record<string, readonly string[]> = {};
    for (const [role, members] of this._members) {
      roles[role] = [...members];
    }
    return { roles, paused: this._paused };
  }

  /**
   * Restore a gate. Unknown roles and malformed addresses are rejected.
   */
  static fromSnapshot<TRole extends string>(
    snapshot: AccessGateSnapshot,
    roles: readonly TRole[] = [],
  ): AccessGate<TRole> {
    const admins = (snapshot.roles[ADMIN_ROLE] ?? []).filter(isAddress);
    const firstAdmin = admins[0];
    if (firstAdmin === undefined) {
      throw new LedgerError("INVALID_ADDRESS", "Snapshot has no admin");
    }

    const gate = new AccessGate<TRole>(firstAdmin, roles);
    for (const [role, members] of Object.entries(snapshot.roles)) {
      if (!gate.isKnownRole(role)) {
        throw new LedgerError("NOT_AUTHORIZED", `Unknown role in snapshot: "${role}"`);
      }
      for (const member of members) {
        if (!isAddress(member)) {
          throw new LedgerError("INVALID_ADDRESS", `Invalid address in snapshot: "${member}"`);
        }
        gate.grantRole(firstAdmin, role, member);
      }
    }
    gate._paused = snapshot.paused;
    return gate;
  }

  private isKnownRole(role: string): role is TRole | AdminRole {
    return this._known.has(role);
  }
}

/**
 * @vestline/token — In-memory token ledger.
 *
 * Reference implementation of the external token the vesting core mints
 * through. Balances are bigint in the smallest unit.
 *
 * Rules:
 * - Total supply never exceeds maxSupply
 * - Mint requires the minter role (admins may always mint)
 * - A batch mint applies every entry or none
 * - Pause blocks mint, burn and transfer; reads stay available
 * - totalMinted counts every mint and is never reduced by burns
 */

import type { Address, MintEntry, TokenPort } from "@vestline/types";
import { isZeroAddress } from "@vestline/types";
import { AccessGate, EventOutbox, LedgerError, ReentrancyGuard } from "@vestline/gate";
import type { MintHook, TokenConfig, TokenRole } from "./types.js";

export class InMemoryTokenLedger {
  readonly symbol: string;
  readonly decimals: number;
  readonly maxSupply: bigint;

  private readonly gate: AccessGate<TokenRole>;
  private readonly guard = new ReentrancyGuard();
  private readonly outbox: EventOutbox;
  private readonly balances = new Map<Address, bigint>();
  private _totalSupply = 0n;
  private _totalMinted = 0n;
  private mintHook: MintHook | undefined;

  constructor(config: TokenConfig) {
    if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 36) {
      throw new LedgerError("INVALID_AMOUNT", `Invalid decimals: ${String(config.decimals)}`);
    }
    if (config.maxSupply <= 0n) {
      throw new LedgerError("INVALID_AMOUNT", "maxSupply must be positive");
    }
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    this.maxSupply = config.maxSupply;
    this.gate = new AccessGate<TokenRole>(config.admin, ["minter"]);
    this.outbox = new EventOutbox("token", config.clock, config.events);
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  mint(caller: Address, to: Address, amount: bigint): void {
    this.mintBatch(caller, [{ to, amount }]);
  }

  /**
   * Mint to several recipients as one operation. Every entry is checked
   * and the whole batch is held against the cap before any balance
   * changes; a throwing recipient callback reverts every entry.
   */
  mintBatch(caller: Address, entries: readonly MintEntry[]): void {
    this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        if (!this.gate.hasAnyRole(caller, ["minter"])) {
          throw new LedgerError("NOT_AUTHORIZED", `${caller} may not mint ${this.symbol}`);
        }

        let batchTotal = 0n;
        for (const { to, amount } of entries) {
          if (isZeroAddress(to)) {
            throw new LedgerError("INVALID_ADDRESS", "Cannot mint to the zero address");
          }
          if (amount <= 0n) {
            throw new LedgerError("INVALID_AMOUNT", "Mint amount must be positive");
          }
          batchTotal += amount;
        }
        if (this._totalSupply + batchTotal > this.maxSupply) {
          throw new LedgerError(
            "MAX_SUPPLY_EXCEEDED",
            `Minting ${batchTotal.toString()} would exceed max supply ${this.maxSupply.toString()}`,
          );
        }

        const applied: MintEntry[] = [];
        try {
          for (const entry of entries) {
            this.credit(entry.to, entry.amount);
            applied.push(entry);
            this.mintHook?.(entry.to, entry.amount);
          }
        } catch (error) {
          for (const entry of applied) {
            this.balances.set(entry.to, this.balanceOf(entry.to) - entry.amount);
            this._totalSupply -= entry.amount;
            this._totalMinted -= entry.amount;
          }
          throw error;
        }

        let supply = this._totalSupply - batchTotal;
        for (const { to, amount } of entries) {
          supply += amount;
          emit({
            type: "token.minted",
            payload: { to, amount: amount.toString(), totalSupply: supply.toString() },
          });
        }
      }),
    );
  }

  burn(caller: Address, amount: bigint): void {
    this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        if (amount <= 0n) {
          throw new LedgerError("INVALID_AMOUNT", "Burn amount must be positive");
        }
        const balance = this.balanceOf(caller);
        if (balance < amount) {
          throw new LedgerError(
            "INSUFFICIENT_BALANCE",
            `Balance ${balance.toString()} is less than ${amount.toString()}`,
          );
        }

        this.balances.set(caller, balance - amount);
        this._totalSupply -= amount;

        emit({
          type: "token.burned",
          payload: {
            from: caller,
            amount: amount.toString(),
            totalSupply: this._totalSupply.toString(),
          },
        });
      }),
    );
  }

  transfer(caller: Address, to: Address, amount: bigint): void {
    this.guard.enter(() =>
      this.outbox.transaction(caller, (emit) => {
        this.gate.assertNotPaused();
        if (isZeroAddress(to)) {
          throw new LedgerError("INVALID_ADDRESS", "Cannot transfer to the zero address");
        }
        if (amount <= 0n) {
          throw new LedgerError("INVALID_AMOUNT", "Transfer amount must be positive");
        }
        const balance = this.balanceOf(caller);
        if (balance < amount) {
          throw new LedgerError(
            "INSUFFICIENT_BALANCE",
            `Balance ${balance.toString()} is less than ${amount.toString()}`,
          );
        }

        this.balances.set(caller, balance - amount);
        this.balances.set(to, this.balanceOf(to) + amount);

        emit({
          type: "token.transferred",
          payload: { from: caller, to, amount: amount.toString() },
        });
      }),
    );
  }

  // ─── Administration ──────────────────────────────────────────────────

  grantMinter(caller: Address, account: Address): boolean {
    return this.guard.enter(() => this.gate.grantRole(caller, "minter", account));
  }

  revokeMinter(caller: Address, account: Address): boolean {
    return this.guard.enter(() => this.gate.revokeRole(caller, "minter", account));
  }

  isMinter(account: Address): boolean {
    return this.gate.hasAnyRole(account, ["minter"]);
  }

  pause(caller: Address): boolean {
    return this.guard.enter(() => this.gate.pause(caller));
  }

  unpause(caller: Address): boolean {
    return this.guard.enter(() => this.gate.unpause(caller));
  }

  /** Install or clear the post-mint callback. */
  onMint(hook: MintHook | undefined): void {
    this.mintHook = hook;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get paused(): boolean {
    return this.gate.paused;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  get totalMinted(): bigint {
    return this._totalMinted;
  }

  balanceOf(account: Address): bigint {
    return this.balances.get(account) ?? 0n;
  }

  private credit(to: Address, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
    this._totalMinted += amount;
  }

  /**
   * A TokenPort that mints as `minter`. This is what the ledgers receive.
   */
  asMinter(minter: Address): TokenPort {
    return {
      mint: (to, amount) => this.mint(minter, to, amount),
      mintBatch: (entries) => this.mintBatch(minter, entries),
      balanceOf: (account) => this.balanceOf(account),
    };
  }
}

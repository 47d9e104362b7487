/**
 * @vestline/gate — Reentrancy guard.
 *
 * A single lock per ledger instance. Every mutating entry point runs
 * inside `enter()`; a nested call into any guarded entry point of the
 * same ledger (directly or through a token callback) is rejected.
 */

import { LedgerError } from "./errors.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  enter<T>(operation: () => T): T {
    if (this._entered) {
      throw new LedgerError("REENTRANT_CALL", "Reentrant call rejected");
    }
    this._entered = true;
    try {
      return operation();
    } finally {
      this._entered = false;
    }
  }
}

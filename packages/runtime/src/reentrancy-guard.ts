/**
 * Reentrancy guard.
 *
 * Wraps a family of entry points so that none of them can be entered
 * again while one is still running (e.g. a hook calling back into
 * `deposit` on the same vault).
 */

import { RuntimeError } from "./errors.js";

export class ReentrancyGuard {
  private _entered = false;

  constructor(private readonly family: string) {}

  get entered(): boolean {
    return this._entered;
  }

  run<T>(operation: () => T): T {
    if (this._entered) {
      throw new RuntimeError(
        "REENTRANT_CALL",
        `Reentrant call into ${this.family} while another call is in progress`,
      );
    }
    this._entered = true;
    try {
      return operation();
    } finally {
      this._entered = false;
    }
  }
}

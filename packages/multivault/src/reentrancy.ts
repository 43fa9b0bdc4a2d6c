/**
 * @termvault/multivault — Reentrancy guard.
 *
 * One lock shared by every mutating entry point. A collaborator that
 * calls back into the engine while a call is in flight is rejected
 * with REENTRANT_CALL; the lock is released on every exit path.
 */

import { MultiVaultError } from "./types.js";

export class ReentrancyGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(fn: () => T): T {
    if (this.entered) {
      throw new MultiVaultError(
        "REENTRANT_CALL",
        "A mutating call is already in progress",
      );
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}

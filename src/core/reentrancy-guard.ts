// src/core/reentrancy-guard.ts

import { PoolError, PoolErrorCode } from '../utils/errors';

/**
 * Mutual-exclusion flag around a critical section that calls out to the
 * transfer service. Held for one top-level operation; always released.
 */
export class ReentrancyGuard {
  private executing = false;

  get isHeld(): boolean {
    return this.executing;
  }

  run<T>(body: () => T): T {
    if (this.executing) {
      throw new PoolError(PoolErrorCode.Reentrancy, 'Operation re-entered while another is executing');
    }
    this.executing = true;
    try {
      return body();
    } finally {
      this.executing = false;
    }
  }
}

// src/core/escrow-balance.ts

import type { TransferService } from '../types/ledger';
import type { Identity } from '../types/pool';
import { PoolError, PoolErrorCode } from '../utils/errors';

export interface EscrowBalance {
  available(): bigint;
  credit(amount: bigint): void;
  debit(amount: bigint): void;
}

export const ensureSpendable = (balance: EscrowBalance, amount: bigint): void => {
  const available = balance.available();
  if (amount > available) {
    throw new PoolError(
      PoolErrorCode.InsufficientFunds,
      `Requested ${amount} but only ${available} is held in escrow`,
      'amount'
    );
  }
};

/** Explicit counter moved in lock-step with every transfer. */
export class CounterBalance implements EscrowBalance {
  constructor(private value = 0n) {}

  available(): bigint {
    return this.value;
  }

  credit(amount: bigint): void {
    this.value += amount;
  }

  debit(amount: bigint): void {
    ensureSpendable(this, amount);
    this.value -= amount;
  }
}

/** Reads the escrow account's real balance from the external ledger. */
export class LedgerBalance implements EscrowBalance {
  constructor(
    private readonly ledger: TransferService,
    private readonly account: Identity
  ) {}

  available(): bigint {
    return this.ledger.balanceOf(this.account);
  }

  credit(): void {
    // the ledger already reflects the transfer
  }

  debit(): void {
    // the ledger already reflects the transfer
  }
}

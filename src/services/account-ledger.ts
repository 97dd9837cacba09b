// src/services/account-ledger.ts

import type { Transfer, TransferError, TransferResult, TransferService } from '../types/ledger';
import type { Identity } from '../types/pool';
import { isValidIdentity } from '../utils/validation';

export interface AccountLedgerHooks {
  /**
   * Called before each transfer is applied. Returning an error rejects it;
   * the hook may also call back into the escrow to simulate reentrancy.
   */
  beforeTransfer?(transfer: Transfer, leg: number): TransferError | void;
}

export const checkTransfer = (transfer: Transfer, leg: number, available: bigint): TransferError | null => {
  if (transfer.amount <= 0n || !isValidIdentity(transfer.from) || !isValidIdentity(transfer.to)) {
    return { reason: 'INVALID_TRANSFER', leg, message: 'Malformed transfer' };
  }
  if (transfer.from === transfer.to) {
    return { reason: 'INVALID_TRANSFER', leg, message: 'Sender and recipient are the same account' };
  }
  if (available < transfer.amount) {
    return {
      reason: 'INSUFFICIENT_BALANCE',
      leg,
      message: `${transfer.from} holds ${available}, needs ${transfer.amount}`,
    };
  }
  return null;
};

/** In-process ledger of account balances with an applied-transfer log. */
export class InMemoryAccountLedger implements TransferService {
  private balances = new Map<Identity, bigint>();
  private journal: Transfer[] = [];

  constructor(private readonly hooks: AccountLedgerHooks = {}) {}

  mint(account: Identity, amount: bigint): void {
    this.balances.set(account, (this.balances.get(account) ?? 0n) + amount);
  }

  balanceOf(account: Identity): bigint {
    return this.balances.get(account) ?? 0n;
  }

  history(): readonly Transfer[] {
    return [...this.journal];
  }

  transfer(transfer: Transfer): TransferResult {
    return this.transferAll([transfer]);
  }

  transferAll(transfers: readonly Transfer[]): TransferResult {
    // Stage against a copy so a failing leg leaves no trace
    const staged = new Map(this.balances);

    for (const [leg, transfer] of transfers.entries()) {
      const rejected = this.hooks.beforeTransfer?.(transfer, leg);
      if (rejected) {
        return { ok: false, error: rejected };
      }
      const invalid = checkTransfer(transfer, leg, staged.get(transfer.from) ?? 0n);
      if (invalid) {
        return { ok: false, error: invalid };
      }
      staged.set(transfer.from, (staged.get(transfer.from) ?? 0n) - transfer.amount);
      staged.set(transfer.to, (staged.get(transfer.to) ?? 0n) + transfer.amount);
    }

    this.balances = staged;
    this.journal.push(...transfers);
    return { ok: true };
  }
}

// src/types/ledger.ts

import type { Identity } from './pool';

export interface Transfer {
  readonly amount: bigint;
  readonly from: Identity;
  readonly to: Identity;
}

export type TransferErrorReason = 'INSUFFICIENT_BALANCE' | 'INVALID_TRANSFER' | 'REJECTED';

export interface TransferError {
  readonly reason: TransferErrorReason;
  /** Index of the failing transfer within a batch; 0 for single transfers. */
  readonly leg: number;
  readonly message: string;
}

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: TransferError };

/**
 * Synchronous account ledger the escrow moves value through.
 * Native-currency and token ledgers share this contract.
 */
export interface TransferService {
  transfer(transfer: Transfer): TransferResult;
  /** Applies every transfer or none of them. */
  transferAll(transfers: readonly Transfer[]): TransferResult;
  balanceOf(account: Identity): bigint;
}

/** Monotonic ordinal source for informational timestamps. */
export interface SequenceClock {
  now(): number;
}

// src/core/payout.ts

import type { Transfer, TransferService } from '../types/ledger';
import type { Identity, RewardPayout } from '../types/pool';
import { PoolError, PoolErrorCode } from '../utils/errors';
import { type FeeLedger, splitPlatformFee } from './claim-ledger';

export interface PayoutContext {
  readonly transfers: TransferService;
  readonly feeLedger: FeeLedger;
  readonly escrowAccount: Identity;
  readonly feeWallet: Identity;
  readonly feePercent: bigint;
}

export const moveFunds = (transfers: TransferService, transfer: Transfer): void => {
  const result = transfers.transfer(transfer);
  if (!result.ok) {
    throw new PoolError(
      PoolErrorCode.TransferFailed,
      `Transfer of ${transfer.amount} from ${transfer.from} to ${transfer.to} failed: ${result.error.message}`,
      'transfer'
    );
  }
};

/**
 * Pays `amount` out of escrow, fee leg first. Both legs commit as one batch,
 * so a failed reward leg never leaves the fee collected.
 */
export const payReward = (ctx: PayoutContext, recipient: Identity, amount: bigint): RewardPayout => {
  const { fee, net } = splitPlatformFee(amount, ctx.feePercent, ctx.feeLedger.hasPaid(recipient));

  const legs: Transfer[] = [];
  if (fee > 0n) {
    legs.push({ amount: fee, from: ctx.escrowAccount, to: ctx.feeWallet });
  }
  if (net > 0n) {
    legs.push({ amount: net, from: ctx.escrowAccount, to: recipient });
  }

  const result = ctx.transfers.transferAll(legs);
  if (!result.ok) {
    if (fee > 0n && result.error.leg === 0) {
      throw new PoolError(
        PoolErrorCode.FeeTransferFailed,
        `Platform fee transfer failed: ${result.error.message}`,
        'fee'
      );
    }
    throw new PoolError(
      PoolErrorCode.TransferFailed,
      `Reward transfer to ${recipient} failed: ${result.error.message}`,
      'transfer'
    );
  }

  if (fee > 0n) {
    ctx.feeLedger.markPaid(recipient);
  }
  return { amount, fee, net };
};

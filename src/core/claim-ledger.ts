// src/core/claim-ledger.ts

import type { ClaimRecord, Identity } from '../types/pool';
import { PoolError, PoolErrorCode } from '../utils/errors';

/** Source of truth for who has been paid. Records are written once. */
export class ClaimLedger {
  private records = new Map<Identity, ClaimRecord>();

  hasClaimed(participant: Identity): boolean {
    return this.records.get(participant)?.claimed === true;
  }

  get(participant: Identity): ClaimRecord | undefined {
    return this.records.get(participant);
  }

  get count(): number {
    return this.records.size;
  }

  assertUnclaimed(participant: Identity): void {
    if (this.hasClaimed(participant)) {
      throw new PoolError(
        PoolErrorCode.RewardAlreadyClaimed,
        `${participant} has already claimed a reward`,
        'participant'
      );
    }
  }

  record(participant: Identity, amount: bigint, claimedAt: number): ClaimRecord {
    this.assertUnclaimed(participant);
    const record: ClaimRecord = { participant, claimed: true, amount, claimedAt };
    this.records.set(participant, record);
    return record;
  }
}

/** Participants whose platform fee has already been collected. */
export class FeeLedger {
  private paid = new Set<Identity>();

  hasPaid(participant: Identity): boolean {
    return this.paid.has(participant);
  }

  markPaid(participant: Identity): void {
    this.paid.add(participant);
  }
}

export interface FeeSplit {
  readonly fee: bigint;
  readonly net: bigint;
}

export const splitPlatformFee = (amount: bigint, feePercent: bigint, alreadyPaid: boolean): FeeSplit => {
  const fee = alreadyPaid ? 0n : (amount * feePercent) / 100n;
  return { fee, net: amount - fee };
};

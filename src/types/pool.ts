// src/types/pool.ts

export type Identity = string;

export type FeeModel = 'fixed' | 'sponsored' | 'none';

export type BalanceSource = 'counter' | 'ledger';

export interface PoolVariant {
  readonly feeModel: FeeModel;
  readonly entryFee: bigint;
  readonly poolSize: bigint;
  readonly sponsorGated: boolean;
  readonly refundOnKick: boolean;
  readonly balanceSource: BalanceSource;
  readonly rewardCap: boolean;
}

export interface PoolSettings {
  /** Identity bound into every signed message for this pool. */
  readonly poolId: Identity;
  /** Account that holds the escrowed funds. */
  readonly escrowAccount: Identity;
  readonly owner: Identity;
  readonly feeWallet: Identity;
  readonly feePercent: bigint;
  readonly variant: PoolVariant;
}

export interface Membership {
  readonly participant: Identity;
  readonly joinedAt: number;
  readonly contributed: bigint;
  readonly isSponsor: boolean;
}

export interface ClaimRecord {
  readonly participant: Identity;
  readonly claimed: true;
  readonly amount: bigint;
  readonly claimedAt: number;
}

export interface PoolDetails {
  readonly poolId: Identity;
  readonly owner: Identity;
  readonly entryFee: bigint;
  readonly poolSize: bigint;
  readonly balance: bigint;
  readonly totalPlayers: number;
  readonly sponsored: boolean;
}

export interface Deposit {
  readonly id: bigint;
  readonly owner: Identity;
  readonly amount: bigint;
  readonly valid: boolean;
  readonly depositedAt: number;
}

export interface ClaimedDeposit {
  readonly depositId: bigint;
  readonly participant: Identity;
  readonly amount: bigint;
  readonly claimedAt: number;
}

export interface RewardPayout {
  readonly amount: bigint;
  readonly fee: bigint;
  readonly net: bigint;
}

export type PoolEvent =
  | { readonly type: 'joined'; readonly poolId: Identity; readonly participant: Identity; readonly contributed: bigint }
  | { readonly type: 'left'; readonly poolId: Identity; readonly participant: Identity; readonly refund: bigint }
  | { readonly type: 'kicked'; readonly poolId: Identity; readonly participant: Identity; readonly refund: bigint }
  | { readonly type: 'reward-claimed'; readonly poolId: Identity; readonly participant: Identity; readonly payout: RewardPayout }
  | { readonly type: 'funded'; readonly poolId: Identity; readonly from: Identity; readonly amount: bigint }
  | { readonly type: 'withdrawn'; readonly poolId: Identity; readonly to: Identity; readonly amount: bigint }
  | { readonly type: 'deposited'; readonly poolId: Identity; readonly participant: Identity; readonly depositId: bigint; readonly amount: bigint }
  | { readonly type: 'deposit-claimed'; readonly poolId: Identity; readonly participant: Identity; readonly depositId: bigint; readonly amount: bigint }
  | { readonly type: 'deposit-lost'; readonly poolId: Identity; readonly participant: Identity; readonly depositId: bigint };

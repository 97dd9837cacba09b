// src/core/variants.ts

import type { PoolVariant } from '../types/pool';
import { PoolError, PoolErrorCode } from '../utils/errors';

const requireFee = (amount: bigint, field: string): bigint => {
  if (amount <= 0n) {
    throw new PoolError(PoolErrorCode.InvalidFee, `${field} must be greater than zero`, field);
  }
  return amount;
};

/** Every participant pays the entry fee; the deployer must join first. */
export const fixedPoolVariant = (entryFee: bigint): PoolVariant => ({
  feeModel: 'fixed',
  entryFee: requireFee(entryFee, 'entryFee'),
  poolSize: 0n,
  sponsorGated: true,
  refundOnKick: true,
  balanceSource: 'counter',
  rewardCap: false,
});

/** The deployer funds the whole pool; everyone else plays for free. */
export const sponsoredPoolVariant = (poolSize: bigint): PoolVariant => ({
  feeModel: 'sponsored',
  entryFee: 0n,
  poolSize: requireFee(poolSize, 'poolSize'),
  sponsorGated: true,
  refundOnKick: false,
  balanceSource: 'counter',
  rewardCap: false,
});

/** Sponsored pool whose balance is read from the token ledger. */
export const sponsoredTokenPoolVariant = (poolSize: bigint): PoolVariant => ({
  ...sponsoredPoolVariant(poolSize),
  balanceSource: 'ledger',
});

/** Free to join, funded through `fund`. */
export const openPoolVariant = (): PoolVariant => ({
  feeModel: 'none',
  entryFee: 0n,
  poolSize: 0n,
  sponsorGated: false,
  refundOnKick: false,
  balanceSource: 'counter',
  rewardCap: false,
});

/** Pools created through a registry: fee-charging, ungated, capped at balance. */
export const registryPoolVariant = (entryFee: bigint): PoolVariant => ({
  ...fixedPoolVariant(entryFee),
  sponsorGated: false,
  rewardCap: true,
});

// src/utils/validation.ts

import type { Identity } from '../types/pool';
import { PoolError, PoolErrorCode } from './errors';

export const MAX_UINT128 = (1n << 128n) - 1n;
export const MAX_IDENTITY_LENGTH = 128;

const IDENTITY_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._:/-]*$/;

export const isValidIdentity = (value: unknown): value is Identity =>
  typeof value === 'string' &&
  value.length > 0 &&
  value.length <= MAX_IDENTITY_LENGTH &&
  IDENTITY_PATTERN.test(value);

export const validateIdentity = (value: string, field: string): Identity => {
  if (!value) {
    throw new PoolError(PoolErrorCode.InvalidFormat, `${field} is required`, field);
  }
  if (!isValidIdentity(value)) {
    throw new PoolError(PoolErrorCode.InvalidFormat, `Invalid ${field} format`, field);
  }
  return value;
};

/** Range check for values carried as u128 on the wire. */
export const validateUint = (value: bigint, field: string): bigint => {
  if (value < 0n || value > MAX_UINT128) {
    throw new PoolError(
      PoolErrorCode.InvalidFormat,
      `${field} must be an unsigned 128-bit integer`,
      field
    );
  }
  return value;
};

export const validatePositiveAmount = (amount: bigint, field = 'amount'): bigint => {
  validateUint(amount, field);
  if (amount === 0n) {
    throw new PoolError(PoolErrorCode.InvalidAmount, `${field} must be greater than zero`, field);
  }
  return amount;
};

export const validateFeePercent = (percent: bigint): bigint => {
  if (percent < 0n || percent > 100n) {
    throw new PoolError(
      PoolErrorCode.InvalidFee,
      'Platform fee percent must be between 0 and 100',
      'feePercent'
    );
  }
  return percent;
};

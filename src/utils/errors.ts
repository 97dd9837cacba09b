// src/utils/errors.ts

export enum PoolErrorCode {
  AlreadyJoined = 'ALREADY_JOINED',
  NotJoined = 'NOT_JOINED',
  NotJoinable = 'NOT_JOINABLE',
  PoolNotEmpty = 'POOL_NOT_EMPTY',
  PoolNotFound = 'POOL_NOT_FOUND',
  PoolAlreadyExists = 'POOL_ALREADY_EXISTS',
  InvalidFee = 'INVALID_FEE',
  InsufficientFunds = 'INSUFFICIENT_FUNDS',
  MaximumRewardExceeded = 'MAXIMUM_REWARD_EXCEEDED',
  InvalidSignature = 'INVALID_SIGNATURE',
  InvalidAmount = 'INVALID_AMOUNT',
  InvalidFormat = 'INVALID_FORMAT',
  RewardAlreadyClaimed = 'REWARD_ALREADY_CLAIMED',
  TransferFailed = 'TRANSFER_FAILED',
  FeeTransferFailed = 'FEE_TRANSFER_FAILED',
  Unauthorized = 'UNAUTHORIZED',
  Reentrancy = 'REENTRANCY',
  DepositNotFound = 'DEPOSIT_NOT_FOUND',
  DepositNotValid = 'DEPOSIT_NOT_VALID',
  DepositAlreadyClaimed = 'DEPOSIT_ALREADY_CLAIMED',
}

export class PoolError extends Error {
  constructor(
    public readonly code: PoolErrorCode,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'PoolError';
  }
}

export type PoolResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: PoolError };

export const ok = <T>(value: T): PoolResult<T> => ({ ok: true, value });

export const fail = <T>(error: PoolError): PoolResult<T> => ({ ok: false, error });

/**
 * Runs an operation body and folds PoolError into a typed result.
 * Anything else is a bug or an adapter crash and is rethrown.
 */
export const toResult = <T>(body: () => T): PoolResult<T> => {
  try {
    return ok(body());
  } catch (error) {
    if (error instanceof PoolError) {
      return fail(error);
    }
    throw error;
  }
};

// src/core/pool-registry.ts

import { EventEmitter } from 'events';
import { type Logger, makeLogger } from '../lib/logger';
import type { SequenceClock, TransferService } from '../types/ledger';
import type { Identity, Membership, PoolDetails, PoolEvent, RewardPayout } from '../types/pool';
import type { SignatureInput, SignatureVerifier } from '../utils/crypto';
import { PoolError, PoolErrorCode, type PoolResult, fail, toResult } from '../utils/errors';
import { validateFeePercent, validateIdentity, validateUint } from '../utils/validation';
import { FeeLedger } from './claim-ledger';
import { createSequenceClock } from './clock';
import { EscrowPool } from './escrow-pool';
import { ReentrancyGuard } from './reentrancy-guard';
import { registryPoolVariant } from './variants';

export interface PoolRegistryOptions {
  /** Contract identity; also the account holding every pool's funds. */
  readonly registryId: Identity;
  readonly feeWallet: Identity;
  readonly feePercent: bigint;
  readonly transfers: TransferService;
  readonly verifier: SignatureVerifier;
  readonly clock?: SequenceClock;
  readonly logger?: Logger;
}

/**
 * Many fixed-fee pools behind one contract, keyed by a numeric id. Pools
 * share the escrow account, the reentrancy guard and the platform fee ledger
 * but keep their own balances.
 */
export class PoolRegistry extends EventEmitter {
  private readonly pools = new Map<bigint, EscrowPool>();
  private readonly guard = new ReentrancyGuard();
  private readonly feeLedger = new FeeLedger();
  private readonly clock: SequenceClock;
  private readonly log: Logger;
  private nextId = 1n;

  constructor(private readonly options: PoolRegistryOptions) {
    super();
    validateIdentity(options.registryId, 'registryId');
    validateIdentity(options.feeWallet, 'feeWallet');
    validateFeePercent(options.feePercent);
    this.clock = options.clock ?? createSequenceClock();
    this.log = options.logger ?? makeLogger({ component: 'pool-registry', registry: options.registryId });
  }

  get registryId(): Identity {
    return this.options.registryId;
  }

  poolIdentity(poolId: bigint): Identity {
    return `${this.options.registryId}/${poolId}`;
  }

  createPool(caller: Identity, entryFee: bigint, requestedId?: bigint): PoolResult<bigint> {
    const result = toResult(() => {
      validateIdentity(caller, 'caller');
      validateUint(entryFee, 'entryFee');
      if (entryFee === 0n) {
        throw new PoolError(PoolErrorCode.InvalidFee, 'Entry fee must be greater than zero', 'entryFee');
      }

      const poolId = requestedId ?? this.nextId;
      validateUint(poolId, 'poolId');
      if (this.pools.has(poolId)) {
        throw new PoolError(PoolErrorCode.PoolAlreadyExists, `Pool ${poolId} already exists`, 'poolId');
      }

      const pool = new EscrowPool({
        settings: {
          poolId: this.poolIdentity(poolId),
          escrowAccount: this.options.registryId,
          owner: caller,
          feeWallet: this.options.feeWallet,
          feePercent: this.options.feePercent,
          variant: registryPoolVariant(entryFee),
        },
        transfers: this.options.transfers,
        verifier: this.options.verifier,
        clock: this.clock,
        guard: this.guard,
        feeLedger: this.feeLedger,
        logger: this.log,
      });
      pool.onEvent((event: PoolEvent) => this.emit('event', event));

      this.pools.set(poolId, pool);
      while (this.pools.has(this.nextId)) {
        this.nextId += 1n;
      }
      return poolId;
    });

    if (result.ok) {
      this.log.info({ poolId: result.value.toString(), owner: caller }, 'pool created');
    } else {
      this.log.warn({ operation: 'create-pool', caller, code: result.error.code }, result.error.message);
    }
    return result;
  }

  joinPool(poolId: bigint, caller: Identity): PoolResult<Membership> {
    return this.withPool(poolId, (pool) => pool.join(caller));
  }

  leavePool(poolId: bigint, caller: Identity, signature: SignatureInput): PoolResult<bigint> {
    return this.withPool(poolId, (pool) => pool.leave(caller, signature));
  }

  kick(poolId: bigint, caller: Identity, target: Identity): PoolResult<bigint> {
    return this.withPool(poolId, (pool) => pool.kick(caller, target));
  }

  claimReward(
    poolId: bigint,
    caller: Identity,
    amount: bigint,
    signature: SignatureInput
  ): PoolResult<RewardPayout> {
    return this.withPool(poolId, (pool) => pool.claimReward(caller, amount, signature));
  }

  getPool(poolId: bigint): EscrowPool | undefined {
    return this.pools.get(poolId);
  }

  getPoolDetails(poolId: bigint): PoolDetails | undefined {
    return this.pools.get(poolId)?.getDetails();
  }

  getPoolBalance(poolId: bigint): bigint | undefined {
    return this.pools.get(poolId)?.poolBalance();
  }

  getPoolPlayersCount(poolId: bigint): number | undefined {
    return this.pools.get(poolId)?.totalPlayers();
  }

  hasPlayerJoined(poolId: bigint, participant: Identity): boolean {
    return this.pools.get(poolId)?.hasPlayerJoined(participant) ?? false;
  }

  hasClaimedReward(poolId: bigint, participant: Identity): boolean {
    return this.pools.get(poolId)?.hasClaimedReward(participant) ?? false;
  }

  hasPaidEntryFee(poolId: bigint, participant: Identity): boolean {
    return this.pools.get(poolId)?.hasPaidEntryFee(participant) ?? false;
  }

  hasPaidPlatformFee(participant: Identity): boolean {
    return this.feeLedger.hasPaid(participant);
  }

  get poolCount(): number {
    return this.pools.size;
  }

  private withPool<T>(poolId: bigint, body: (pool: EscrowPool) => PoolResult<T>): PoolResult<T> {
    const pool = this.pools.get(poolId);
    if (!pool) {
      return fail(new PoolError(PoolErrorCode.PoolNotFound, `Pool ${poolId} does not exist`, 'poolId'));
    }
    return body(pool);
  }
}

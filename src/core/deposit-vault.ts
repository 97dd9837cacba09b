// src/core/deposit-vault.ts

import { EventEmitter } from 'events';
import { type Logger, makeLogger } from '../lib/logger';
import type { SequenceClock, TransferService } from '../types/ledger';
import type { ClaimedDeposit, Deposit, Identity, PoolEvent } from '../types/pool';
import type { SignatureInput, SignatureVerifier } from '../utils/crypto';
import { PoolError, PoolErrorCode, type PoolResult, toResult } from '../utils/errors';
import { validateIdentity, validatePositiveAmount, validateUint } from '../utils/validation';
import { createSequenceClock } from './clock';
import { CounterBalance, ensureSpendable } from './escrow-balance';
import { moveFunds } from './payout';
import { publishEvents } from './publish';
import { ReentrancyGuard } from './reentrancy-guard';

export interface DepositVaultOptions {
  /** Vault identity, bound into signatures and holding the funds. */
  readonly vaultId: Identity;
  readonly deployer: Identity;
  readonly transfers: TransferService;
  readonly verifier: SignatureVerifier;
  readonly clock?: SequenceClock;
  readonly logger?: Logger;
}

const depositKey = (participant: Identity, depositId: bigint): string => `${participant}#${depositId}`;

/**
 * Independent, single-use deposits. Each one is settled off-chain and then
 * either claimed with a signed payout or marked lost by the deployer.
 * Only forfeited funds can be withdrawn.
 */
export class DepositVault extends EventEmitter {
  private readonly deposits = new Map<string, Deposit>();
  private readonly claimed = new Map<string, ClaimedDeposit>();
  private readonly balance = new CounterBalance();
  private readonly guard = new ReentrancyGuard();
  private readonly clock: SequenceClock;
  private readonly log: Logger;
  private lastDepositId = 0n;
  private forfeited = 0n;

  constructor(private readonly options: DepositVaultOptions) {
    super();
    validateIdentity(options.vaultId, 'vaultId');
    validateIdentity(options.deployer, 'deployer');
    this.clock = options.clock ?? createSequenceClock();
    this.log = (options.logger ?? makeLogger()).child({ component: 'deposit-vault', vault: options.vaultId });
  }

  get vaultId(): Identity {
    return this.options.vaultId;
  }

  vaultBalance(): bigint {
    return this.balance.available();
  }

  /** Forfeited funds the deployer may still take out. */
  withdrawableBalance(): bigint {
    return this.forfeited;
  }

  getDeposit(participant: Identity, depositId: bigint): Deposit | undefined {
    return this.deposits.get(depositKey(participant, depositId));
  }

  getClaimedDeposit(participant: Identity, depositId: bigint): ClaimedDeposit | undefined {
    return this.claimed.get(depositKey(participant, depositId));
  }

  onEvent(listener: (event: PoolEvent) => void): this {
    return this.on('event', listener);
  }

  deposit(caller: Identity, amount: bigint): PoolResult<bigint> {
    return this.execute('deposit', caller, (events) => {
      validateIdentity(caller, 'caller');
      validatePositiveAmount(amount);

      moveFunds(this.options.transfers, { amount, from: caller, to: this.options.vaultId });
      this.balance.credit(amount);

      const id = this.lastDepositId + 1n;
      this.lastDepositId = id;
      this.deposits.set(depositKey(caller, id), {
        id,
        owner: caller,
        amount,
        valid: true,
        depositedAt: this.clock.now(),
      });

      events.push({ type: 'deposited', poolId: this.vaultId, participant: caller, depositId: id, amount });
      return id;
    });
  }

  /** Pays exactly the signed amount; outcomes are settled off-chain. */
  claim(caller: Identity, depositId: bigint, amount: bigint, signature: SignatureInput): PoolResult<ClaimedDeposit> {
    return this.execute('claim', caller, (events) => {
      validateIdentity(caller, 'caller');
      validateUint(amount, 'amount');
      const deposit = this.requireOpenDeposit(caller, depositId);

      this.options.verifier.assertSigned(
        { amount, recipient: caller, pool: this.vaultId, depositId },
        signature
      );
      validatePositiveAmount(amount);
      ensureSpendable(this.balance, amount);

      moveFunds(this.options.transfers, { amount, from: this.vaultId, to: caller });
      this.balance.debit(amount);

      const key = depositKey(caller, depositId);
      const record: ClaimedDeposit = { depositId, participant: caller, amount, claimedAt: this.clock.now() };
      this.deposits.set(key, { ...deposit, valid: false });
      this.claimed.set(key, record);

      events.push({ type: 'deposit-claimed', poolId: this.vaultId, participant: caller, depositId, amount });
      return record;
    });
  }

  markDepositLost(caller: Identity, participant: Identity, depositId: bigint): PoolResult<Deposit> {
    return this.execute('mark-deposit-lost', caller, (events) => {
      if (caller !== this.options.deployer) {
        throw new PoolError(PoolErrorCode.Unauthorized, 'Only the deployer can forfeit deposits', 'caller');
      }
      const deposit = this.requireOpenDeposit(participant, depositId);
      const lost: Deposit = { ...deposit, valid: false };
      this.deposits.set(depositKey(participant, depositId), lost);
      this.forfeited += deposit.amount;

      events.push({ type: 'deposit-lost', poolId: this.vaultId, participant, depositId });
      return lost;
    });
  }

  withdraw(caller: Identity, amount: bigint): PoolResult<bigint> {
    return this.execute('withdraw', caller, (events) => {
      if (caller !== this.options.deployer) {
        throw new PoolError(PoolErrorCode.Unauthorized, 'Only the deployer can withdraw', 'caller');
      }
      validatePositiveAmount(amount);
      if (amount > this.forfeited) {
        throw new PoolError(
          PoolErrorCode.InsufficientFunds,
          `Requested ${amount} but only ${this.forfeited} has been forfeited`,
          'amount'
        );
      }
      ensureSpendable(this.balance, amount);
      moveFunds(this.options.transfers, { amount, from: this.vaultId, to: caller });
      this.balance.debit(amount);
      this.forfeited -= amount;

      events.push({ type: 'withdrawn', poolId: this.vaultId, to: caller, amount });
      return this.forfeited;
    });
  }

  private requireOpenDeposit(participant: Identity, depositId: bigint): Deposit {
    const key = depositKey(participant, depositId);
    const deposit = this.deposits.get(key);
    if (!deposit) {
      throw new PoolError(
        PoolErrorCode.DepositNotFound,
        `No deposit ${depositId} for ${participant}`,
        'depositId'
      );
    }
    if (this.claimed.has(key)) {
      throw new PoolError(
        PoolErrorCode.DepositAlreadyClaimed,
        `Deposit ${depositId} has already been claimed`,
        'depositId'
      );
    }
    if (!deposit.valid) {
      throw new PoolError(PoolErrorCode.DepositNotValid, `Deposit ${depositId} is no longer valid`, 'depositId');
    }
    return deposit;
  }

  private execute<T>(operation: string, caller: Identity, body: (events: PoolEvent[]) => T): PoolResult<T> {
    const events: PoolEvent[] = [];
    const result = toResult(() => this.guard.run(() => body(events)));

    if (!result.ok) {
      this.log.warn({ operation, caller, code: result.error.code }, result.error.message);
      return result;
    }

    this.log.info({ operation, caller }, `${operation} completed`);
    publishEvents(this, this.log, events);
    return result;
  }
}

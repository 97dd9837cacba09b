// src/core/escrow-pool.ts

import { EventEmitter } from 'events';
import { type Logger, makeLogger } from '../lib/logger';
import type { SequenceClock, TransferService } from '../types/ledger';
import type {
  ClaimRecord,
  Identity,
  Membership,
  PoolDetails,
  PoolEvent,
  PoolSettings,
  PoolVariant,
  RewardPayout,
} from '../types/pool';
import type { SignatureInput, SignatureVerifier } from '../utils/crypto';
import { PoolError, PoolErrorCode, type PoolResult, toResult } from '../utils/errors';
import {
  validateFeePercent,
  validateIdentity,
  validatePositiveAmount,
  validateUint,
} from '../utils/validation';
import { ClaimLedger, FeeLedger } from './claim-ledger';
import { createSequenceClock } from './clock';
import { CounterBalance, type EscrowBalance, LedgerBalance, ensureSpendable } from './escrow-balance';
import { MembershipLedger } from './membership-ledger';
import { type PayoutContext, moveFunds, payReward } from './payout';
import { publishEvents } from './publish';
import { ReentrancyGuard } from './reentrancy-guard';

export interface EscrowPoolOptions {
  readonly settings: PoolSettings;
  readonly transfers: TransferService;
  readonly verifier: SignatureVerifier;
  readonly clock?: SequenceClock;
  /** Shared when several pools live behind one contract. */
  readonly guard?: ReentrancyGuard;
  readonly feeLedger?: FeeLedger;
  readonly logger?: Logger;
}

export type PoolEventListener = (event: PoolEvent) => void;

export class EscrowPool extends EventEmitter {
  private readonly settings: PoolSettings;
  private readonly transfers: TransferService;
  private readonly verifier: SignatureVerifier;
  private readonly clock: SequenceClock;
  private readonly guard: ReentrancyGuard;
  private readonly feeLedger: FeeLedger;
  private readonly balance: EscrowBalance;
  private readonly members = new MembershipLedger();
  private readonly claims = new ClaimLedger();
  private readonly log: Logger;
  private sponsored = false;

  constructor(options: EscrowPoolOptions) {
    super();
    const { settings } = options;
    validateIdentity(settings.poolId, 'poolId');
    validateIdentity(settings.escrowAccount, 'escrowAccount');
    validateIdentity(settings.owner, 'owner');
    validateIdentity(settings.feeWallet, 'feeWallet');
    validateFeePercent(settings.feePercent);

    this.settings = settings;
    this.transfers = options.transfers;
    this.verifier = options.verifier;
    this.clock = options.clock ?? createSequenceClock();
    this.guard = options.guard ?? new ReentrancyGuard();
    this.feeLedger = options.feeLedger ?? new FeeLedger();
    this.balance =
      settings.variant.balanceSource === 'ledger'
        ? new LedgerBalance(options.transfers, settings.escrowAccount)
        : new CounterBalance();
    this.log = (options.logger ?? makeLogger()).child({ component: 'escrow-pool', pool: settings.poolId });
  }

  // ── Reads ───────────────────────────────────────────────────────────────

  get poolId(): Identity {
    return this.settings.poolId;
  }

  get owner(): Identity {
    return this.settings.owner;
  }

  get variant(): PoolVariant {
    return this.settings.variant;
  }

  totalPlayers(): number {
    return this.members.size;
  }

  poolBalance(): bigint {
    return this.balance.available();
  }

  isSponsored(): boolean {
    return this.sponsored;
  }

  hasPlayerJoined(participant: Identity): boolean {
    return this.members.has(participant);
  }

  hasClaimedReward(participant: Identity): boolean {
    return this.claims.hasClaimed(participant);
  }

  hasPaidEntryFee(participant: Identity): boolean {
    return (this.members.get(participant)?.contributed ?? 0n) > 0n;
  }

  hasPaidPlatformFee(participant: Identity): boolean {
    return this.feeLedger.hasPaid(participant);
  }

  getMembership(participant: Identity): Membership | undefined {
    return this.members.get(participant);
  }

  getClaimRecord(participant: Identity): ClaimRecord | undefined {
    return this.claims.get(participant);
  }

  getDetails(): PoolDetails {
    return {
      poolId: this.settings.poolId,
      owner: this.settings.owner,
      entryFee: this.settings.variant.entryFee,
      poolSize: this.settings.variant.poolSize,
      balance: this.balance.available(),
      totalPlayers: this.members.size,
      sponsored: this.sponsored,
    };
  }

  onEvent(listener: PoolEventListener): this {
    return this.on('event', listener);
  }

  // ── Membership ──────────────────────────────────────────────────────────

  join(caller: Identity): PoolResult<Membership> {
    return this.execute('join', caller, (events) => {
      validateIdentity(caller, 'caller');
      this.members.assertNotMember(caller);

      const { variant, owner } = this.settings;
      const isDeployer = caller === owner;
      if (variant.sponsorGated && !isDeployer && !this.isJoinable()) {
        throw new PoolError(
          PoolErrorCode.NotJoinable,
          variant.feeModel === 'sponsored'
            ? 'Pool has not been sponsored yet'
            : 'Pool must be opened by its deployer first',
          'caller'
        );
      }

      const isSponsor = variant.feeModel === 'sponsored' && isDeployer;
      const contributed = this.joinContribution(isSponsor);
      if (contributed > 0n) {
        this.pullIn(caller, contributed);
      }

      const membership: Membership = {
        participant: caller,
        joinedAt: this.clock.now(),
        contributed,
        isSponsor,
      };
      this.members.add(membership);
      if (isSponsor) {
        this.sponsored = true;
      }

      events.push({ type: 'joined', poolId: this.poolId, participant: caller, contributed });
      return membership;
    });
  }

  leave(caller: Identity, signature: SignatureInput): PoolResult<bigint> {
    return this.execute('leave', caller, (events) => {
      validateIdentity(caller, 'caller');
      const membership = this.members.require(caller);

      if (membership.isSponsor && this.members.size > 1) {
        throw new PoolError(
          PoolErrorCode.PoolNotEmpty,
          'Sponsor can only leave once every other player has left',
          'caller'
        );
      }

      const refund = this.refundFor(membership);
      this.verifier.assertSigned({ amount: refund, recipient: caller, pool: this.poolId }, signature);

      if (refund > 0n) {
        this.payOut(caller, refund);
      }
      this.members.remove(caller);
      if (membership.isSponsor) {
        this.sponsored = false;
      }

      events.push({ type: 'left', poolId: this.poolId, participant: caller, refund });
      return refund;
    });
  }

  kick(caller: Identity, target: Identity): PoolResult<bigint> {
    return this.execute('kick', caller, (events) => {
      if (caller !== this.settings.owner || target === caller) {
        throw new PoolError(PoolErrorCode.Unauthorized, 'Only the pool owner can kick other players', 'caller');
      }
      const membership = this.members.require(target);
      this.claims.assertUnclaimed(target);

      const refund = this.settings.variant.refundOnKick ? membership.contributed : 0n;
      if (refund > 0n) {
        this.payOut(target, refund);
      }
      this.members.remove(target);

      events.push({ type: 'kicked', poolId: this.poolId, participant: target, refund });
      return refund;
    });
  }

  // ── Rewards ─────────────────────────────────────────────────────────────

  claimReward(caller: Identity, amount: bigint, signature: SignatureInput): PoolResult<RewardPayout> {
    return this.execute('claim-reward', caller, (events) => {
      validateIdentity(caller, 'caller');
      validateUint(amount, 'amount');
      this.members.require(caller);
      this.claims.assertUnclaimed(caller);

      if (this.settings.variant.rewardCap && amount > this.balance.available()) {
        throw new PoolError(
          PoolErrorCode.MaximumRewardExceeded,
          `Reward ${amount} exceeds pool balance ${this.balance.available()}`,
          'amount'
        );
      }

      this.verifier.assertSigned({ amount, recipient: caller, pool: this.poolId }, signature);
      validatePositiveAmount(amount);
      ensureSpendable(this.balance, amount);

      const payout = payReward(this.payoutContext(), caller, amount);
      this.claims.record(caller, amount, this.clock.now());
      this.balance.debit(amount);

      events.push({ type: 'reward-claimed', poolId: this.poolId, participant: caller, payout });
      return payout;
    });
  }

  // ── Treasury ────────────────────────────────────────────────────────────

  fund(caller: Identity, amount: bigint): PoolResult<bigint> {
    return this.execute('fund', caller, (events) => {
      validateIdentity(caller, 'caller');
      validatePositiveAmount(amount);
      this.pullIn(caller, amount);
      events.push({ type: 'funded', poolId: this.poolId, from: caller, amount });
      return this.balance.available();
    });
  }

  withdraw(caller: Identity, amount: bigint): PoolResult<bigint> {
    return this.execute('withdraw', caller, (events) => {
      if (caller !== this.settings.owner) {
        throw new PoolError(PoolErrorCode.Unauthorized, 'Only the pool owner can withdraw', 'caller');
      }
      validatePositiveAmount(amount);
      this.payOut(caller, amount);
      events.push({ type: 'withdrawn', poolId: this.poolId, to: caller, amount });
      return this.balance.available();
    });
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private isJoinable(): boolean {
    return this.settings.variant.feeModel === 'sponsored' ? this.sponsored : this.members.size > 0;
  }

  private joinContribution(isSponsor: boolean): bigint {
    const { variant } = this.settings;
    switch (variant.feeModel) {
      case 'fixed':
        return variant.entryFee;
      case 'sponsored':
        return isSponsor ? variant.poolSize : 0n;
      case 'none':
        return 0n;
    }
  }

  private refundFor(membership: Membership): bigint {
    const { variant } = this.settings;
    if (membership.isSponsor) return variant.poolSize;
    return variant.feeModel === 'fixed' ? variant.entryFee : 0n;
  }

  private pullIn(from: Identity, amount: bigint): void {
    moveFunds(this.transfers, { amount, from, to: this.settings.escrowAccount });
    this.balance.credit(amount);
  }

  private payOut(to: Identity, amount: bigint): void {
    ensureSpendable(this.balance, amount);
    moveFunds(this.transfers, { amount, from: this.settings.escrowAccount, to });
    this.balance.debit(amount);
  }

  private payoutContext(): PayoutContext {
    return {
      transfers: this.transfers,
      feeLedger: this.feeLedger,
      escrowAccount: this.settings.escrowAccount,
      feeWallet: this.settings.feeWallet,
      feePercent: this.settings.feePercent,
    };
  }

  /**
   * Runs one top-level operation under the guard. Events go out only after
   * the guard is released, so listeners may call back into the pool.
   */
  private execute<T>(operation: string, caller: Identity, body: (events: PoolEvent[]) => T): PoolResult<T> {
    const events: PoolEvent[] = [];
    const result = toResult(() => this.guard.run(() => body(events)));

    if (!result.ok) {
      this.log.warn({ operation, caller, code: result.error.code }, result.error.message);
      return result;
    }

    this.log.info({ operation, caller, balance: this.balance.available().toString() }, `${operation} completed`);
    publishEvents(this, this.log, events);
    return result;
  }
}

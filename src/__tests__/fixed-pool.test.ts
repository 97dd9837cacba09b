// src/__tests__/fixed-pool.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { fixedPoolVariant } from '../core/variants';
import { PoolErrorCode } from '../utils/errors';
import {
  DEPLOYER,
  FEE_WALLET,
  POOL,
  type PoolHarness,
  createPoolHarness,
  expectFailure,
  impostor,
  signer,
  thrownBy,
  unwrap
} from './setup';

const ENTRY_FEE = 5_000_000n;
const STARTING_FUNDS = 20_000_000n;

const rewardSignature = (recipient: string, amount: bigint) => signer.sign({ amount, recipient, pool: POOL });

describe('Fixed-fee pool', () => {
  let h: PoolHarness;

  beforeEach(() => {
    h = createPoolHarness(fixedPoolVariant(ENTRY_FEE));
    for (const account of [DEPLOYER, 'alice', 'bob']) {
      h.ledger.mint(account, STARTING_FUNDS);
    }
  });

  const joinAll = () => {
    unwrap(h.pool.join(DEPLOYER));
    unwrap(h.pool.join('alice'));
    unwrap(h.pool.join('bob'));
  };

  describe('join', () => {
    it('should require the deployer to join first', () => {
      const error = expectFailure(h.pool.join('alice'), PoolErrorCode.NotJoinable);
      expect(error.message).toBe('Pool must be opened by its deployer first');
      expect(h.pool.totalPlayers()).toBe(0);
    });

    it('should collect the entry fee', () => {
      const membership = unwrap(h.pool.join(DEPLOYER));

      expect(membership).toEqual({ participant: DEPLOYER, joinedAt: 1, contributed: ENTRY_FEE, isSponsor: false });
      expect(h.pool.poolBalance()).toBe(ENTRY_FEE);
      expect(h.ledger.balanceOf(POOL)).toBe(ENTRY_FEE);
      expect(h.ledger.balanceOf(DEPLOYER)).toBe(15_000_000n);
      expect(h.pool.hasPaidEntryFee(DEPLOYER)).toBe(true);
    });

    it('should let others join once the deployer is in', () => {
      joinAll();

      expect(h.pool.totalPlayers()).toBe(3);
      expect(h.pool.poolBalance()).toBe(15_000_000n);
      expect(h.pool.hasPlayerJoined('bob')).toBe(true);
    });

    it('should reject a second join without charging again', () => {
      unwrap(h.pool.join(DEPLOYER));
      unwrap(h.pool.join('alice'));

      expectFailure(h.pool.join('alice'), PoolErrorCode.AlreadyJoined);
      expect(h.pool.poolBalance()).toBe(10_000_000n);
      expect(h.ledger.balanceOf('alice')).toBe(15_000_000n);
    });

    it('should fail when the entry fee cannot be paid', () => {
      unwrap(h.pool.join(DEPLOYER));
      h.ledger.mint('carol', 1_000_000n);

      expectFailure(h.pool.join('carol'), PoolErrorCode.TransferFailed);
      expect(h.pool.hasPlayerJoined('carol')).toBe(false);
      expect(h.pool.poolBalance()).toBe(ENTRY_FEE);
    });

    it('should reject a malformed caller', () => {
      expectFailure(h.pool.join('not valid'), PoolErrorCode.InvalidFormat);
    });
  });

  describe('claimReward', () => {
    beforeEach(joinAll);

    it('should pay the reward minus the platform fee', () => {
      const payout = unwrap(h.pool.claimReward('alice', 10_000_000n, rewardSignature('alice', 10_000_000n)));

      expect(payout).toEqual({ amount: 10_000_000n, fee: 200_000n, net: 9_800_000n });
      expect(h.ledger.balanceOf(FEE_WALLET)).toBe(200_000n);
      expect(h.ledger.balanceOf('alice')).toBe(24_800_000n);
      expect(h.pool.poolBalance()).toBe(5_000_000n);
      expect(h.ledger.balanceOf(POOL)).toBe(5_000_000n);
      expect(h.pool.getClaimRecord('alice')).toEqual({
        participant: 'alice',
        claimed: true,
        amount: 10_000_000n,
        claimedAt: 4
      });
      expect(h.pool.hasPaidPlatformFee('alice')).toBe(true);
    });

    it('should pay a signed reward only once', () => {
      const signature = rewardSignature('alice', 10_000_000n);
      unwrap(h.pool.claimReward('alice', 10_000_000n, signature));

      expectFailure(h.pool.claimReward('alice', 10_000_000n, signature), PoolErrorCode.RewardAlreadyClaimed);
      expect(h.pool.poolBalance()).toBe(5_000_000n);
    });

    it('should reject a signature from another key without moving funds', () => {
      const transfersBefore = h.ledger.history().length;

      expectFailure(
        h.pool.claimReward('alice', 1_000_000n, impostor.sign({ amount: 1_000_000n, recipient: 'alice', pool: POOL })),
        PoolErrorCode.InvalidSignature
      );
      expect(h.ledger.history()).toHaveLength(transfersBefore);
      expect(h.pool.hasClaimedReward('alice')).toBe(false);
    });

    it('should reject a signature issued to someone else', () => {
      expectFailure(
        h.pool.claimReward('bob', 1_000_000n, rewardSignature('alice', 1_000_000n)),
        PoolErrorCode.InvalidSignature
      );
    });

    it('should reject non-members', () => {
      h.ledger.mint('carol', 1n);
      expectFailure(h.pool.claimReward('carol', 1_000_000n, rewardSignature('carol', 1_000_000n)), PoolErrorCode.NotJoined);
    });

    it('should reject a zero reward', () => {
      expectFailure(h.pool.claimReward('alice', 0n, rewardSignature('alice', 0n)), PoolErrorCode.InvalidAmount);
    });

    it('should reject a reward larger than the escrow', () => {
      expectFailure(
        h.pool.claimReward('alice', 20_000_000n, rewardSignature('alice', 20_000_000n)),
        PoolErrorCode.InsufficientFunds
      );
      expect(h.pool.poolBalance()).toBe(15_000_000n);
    });

    it('should emit reward-claimed after success', () => {
      unwrap(h.pool.claimReward('bob', 1_000_000n, rewardSignature('bob', 1_000_000n)));

      expect(h.events.at(-1)).toEqual({
        type: 'reward-claimed',
        poolId: POOL,
        participant: 'bob',
        payout: { amount: 1_000_000n, fee: 20_000n, net: 980_000n }
      });
    });
  });

  describe('leave', () => {
    beforeEach(joinAll);

    it('should refund the entry fee against a signed refund', () => {
      const refund = unwrap(h.pool.leave('alice', rewardSignature('alice', ENTRY_FEE)));

      expect(refund).toBe(ENTRY_FEE);
      expect(h.ledger.balanceOf('alice')).toBe(STARTING_FUNDS);
      expect(h.pool.hasPlayerJoined('alice')).toBe(false);
      expect(h.pool.poolBalance()).toBe(10_000_000n);
      expect(h.events.at(-1)).toEqual({ type: 'left', poolId: POOL, participant: 'alice', refund: ENTRY_FEE });
    });

    it('should reject a refund signature for another amount', () => {
      expectFailure(h.pool.leave('alice', rewardSignature('alice', 1n)), PoolErrorCode.InvalidSignature);
      expect(h.pool.hasPlayerJoined('alice')).toBe(true);
    });

    it('should reject non-members', () => {
      expectFailure(h.pool.leave('carol', rewardSignature('carol', ENTRY_FEE)), PoolErrorCode.NotJoined);
    });
  });

  describe('kick', () => {
    beforeEach(joinAll);

    it('should refund the kicked player', () => {
      const refund = unwrap(h.pool.kick(DEPLOYER, 'bob'));

      expect(refund).toBe(ENTRY_FEE);
      expect(h.ledger.balanceOf('bob')).toBe(STARTING_FUNDS);
      expect(h.pool.totalPlayers()).toBe(2);
      expect(h.events.at(-1)).toEqual({ type: 'kicked', poolId: POOL, participant: 'bob', refund: ENTRY_FEE });
    });

    it('should only let the owner kick', () => {
      const error = expectFailure(h.pool.kick('alice', 'bob'), PoolErrorCode.Unauthorized);
      expect(error.message).toBe('Only the pool owner can kick other players');
    });

    it('should not let the owner kick themselves', () => {
      expectFailure(h.pool.kick(DEPLOYER, DEPLOYER), PoolErrorCode.Unauthorized);
    });

    it('should not kick a player who has been paid', () => {
      unwrap(h.pool.claimReward('bob', 1_000_000n, rewardSignature('bob', 1_000_000n)));
      expectFailure(h.pool.kick(DEPLOYER, 'bob'), PoolErrorCode.RewardAlreadyClaimed);
    });

    it('should reject kicking a non-member', () => {
      expectFailure(h.pool.kick(DEPLOYER, 'carol'), PoolErrorCode.NotJoined);
    });
  });

  describe('treasury', () => {
    beforeEach(joinAll);

    it('should accept top-ups from anyone', () => {
      expect(unwrap(h.pool.fund('alice', 1_000_000n))).toBe(16_000_000n);
      expectFailure(h.pool.fund('alice', 0n), PoolErrorCode.InvalidAmount);
    });

    it('should let only the owner withdraw', () => {
      expectFailure(h.pool.withdraw('alice', 1n), PoolErrorCode.Unauthorized);
      expect(unwrap(h.pool.withdraw(DEPLOYER, 1_000_000n))).toBe(14_000_000n);
      expect(h.ledger.balanceOf(DEPLOYER)).toBe(16_000_000n);
      expectFailure(h.pool.withdraw(DEPLOYER, 15_000_000n), PoolErrorCode.InsufficientFunds);
    });
  });

  it('should keep the tracked balance equal to the escrow account through a full round', () => {
    joinAll();
    unwrap(h.pool.claimReward('alice', 3_000_000n, rewardSignature('alice', 3_000_000n)));
    unwrap(h.pool.kick(DEPLOYER, 'bob'));
    unwrap(h.pool.fund('bob', 2_000_000n));
    unwrap(h.pool.leave(DEPLOYER, rewardSignature(DEPLOYER, ENTRY_FEE)));

    expect(h.pool.poolBalance()).toBe(4_000_000n);
    expect(h.ledger.balanceOf(POOL)).toBe(h.pool.poolBalance());
    expect(h.pool.totalPlayers()).toBe(1);
    expect(h.events.map((event) => event.type)).toEqual([
      'joined',
      'joined',
      'joined',
      'reward-claimed',
      'kicked',
      'funded',
      'left'
    ]);
  });

  it('should emit nothing for a rejected operation', () => {
    h.pool.join('alice');
    expect(h.events).toEqual([]);
  });

  it('should reject a zero entry fee', () => {
    expect(thrownBy(() => fixedPoolVariant(0n)).code).toBe(PoolErrorCode.InvalidFee);
  });
});

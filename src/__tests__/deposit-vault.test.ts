// src/__tests__/deposit-vault.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { DepositVault } from '../core/deposit-vault';
import { makeNoopLogger } from '../lib/logger';
import { InMemoryAccountLedger } from '../services/account-ledger';
import type { PoolEvent } from '../types/pool';
import { PoolErrorCode } from '../utils/errors';
import { DEPLOYER, FEE_WALLET, expectFailure, signer, unwrap, testVerifier } from './setup';

const VAULT = 'escrow.vault';

const sign = (recipient: string, depositId: bigint, amount: bigint) =>
  signer.sign({ amount, recipient, pool: VAULT, depositId });

describe('DepositVault', () => {
  let ledger: InMemoryAccountLedger;
  let vault: DepositVault;
  let events: PoolEvent[];

  beforeEach(() => {
    ledger = new InMemoryAccountLedger();
    ledger.mint('alice', 10_000_000n);
    ledger.mint('bob', 10_000_000n);
    vault = new DepositVault({
      vaultId: VAULT,
      deployer: DEPLOYER,
      transfers: ledger,
      verifier: testVerifier(),
      logger: makeNoopLogger()
    });
    events = [];
    vault.onEvent((event) => events.push(event));
  });

  describe('deposit', () => {
    it('should reject a zero deposit', () => {
      expectFailure(vault.deposit('alice', 0n), PoolErrorCode.InvalidAmount);
    });

    it('should number deposits across participants', () => {
      expect(unwrap(vault.deposit('alice', 4_000_000n))).toBe(1n);
      expect(unwrap(vault.deposit('bob', 2_000_000n))).toBe(2n);

      expect(vault.vaultBalance()).toBe(6_000_000n);
      expect(ledger.balanceOf(VAULT)).toBe(6_000_000n);
      expect(vault.getDeposit('alice', 1n)).toEqual({
        id: 1n,
        owner: 'alice',
        amount: 4_000_000n,
        valid: true,
        depositedAt: 1
      });
      expect(events[1]).toEqual({ type: 'deposited', poolId: VAULT, participant: 'bob', depositId: 2n, amount: 2_000_000n });
    });

    it('should fail when the depositor is short', () => {
      expectFailure(vault.deposit('carol', 1n), PoolErrorCode.TransferFailed);
      expect(vault.vaultBalance()).toBe(0n);
    });
  });

  describe('claim', () => {
    beforeEach(() => {
      unwrap(vault.deposit('alice', 4_000_000n));
      unwrap(vault.deposit('bob', 2_000_000n));
    });

    it('should pay a signed deposit claim', () => {
      const claimed = unwrap(vault.claim('alice', 1n, 3_000_000n, sign('alice', 1n, 3_000_000n)));

      expect(claimed).toEqual({ depositId: 1n, participant: 'alice', amount: 3_000_000n, claimedAt: 3 });
      expect(vault.vaultBalance()).toBe(3_000_000n);
      expect(vault.getDeposit('alice', 1n)?.valid).toBe(false);
      expect(vault.getClaimedDeposit('alice', 1n)).toEqual(claimed);
      expect(ledger.balanceOf('alice')).toBe(9_000_000n);
      expect(events.at(-1)).toEqual({
        type: 'deposit-claimed',
        poolId: VAULT,
        participant: 'alice',
        depositId: 1n,
        amount: 3_000_000n
      });
    });

    it('should transfer exactly the signed amount', () => {
      unwrap(vault.claim('alice', 1n, 4_000_000n, sign('alice', 1n, 4_000_000n)));

      expect(ledger.balanceOf('alice')).toBe(10_000_000n);
      expect(ledger.balanceOf(FEE_WALLET)).toBe(0n);
      expect(vault.vaultBalance()).toBe(2_000_000n);
    });

    it('should not pay a deposit twice', () => {
      const signature = sign('alice', 1n, 1_000_000n);
      unwrap(vault.claim('alice', 1n, 1_000_000n, signature));

      expectFailure(vault.claim('alice', 1n, 1_000_000n, signature), PoolErrorCode.DepositAlreadyClaimed);
      expect(vault.vaultBalance()).toBe(5_000_000n);
    });

    it('should only find deposits under their owner', () => {
      expectFailure(vault.claim('alice', 2n, 1n, sign('alice', 2n, 1n)), PoolErrorCode.DepositNotFound);
    });

    it('should bind the deposit id into the signature', () => {
      expectFailure(
        vault.claim('alice', 1n, 1_000_000n, signer.sign({ amount: 1_000_000n, recipient: 'alice', pool: VAULT })),
        PoolErrorCode.InvalidSignature
      );
      expectFailure(vault.claim('bob', 2n, 1_000_000n, sign('bob', 1n, 1_000_000n)), PoolErrorCode.InvalidSignature);
      expect(vault.getDeposit('bob', 2n)?.valid).toBe(true);
    });

    it('should refuse more than the vault holds', () => {
      expectFailure(vault.claim('bob', 2n, 7_000_000n, sign('bob', 2n, 7_000_000n)), PoolErrorCode.InsufficientFunds);
    });

    it('should reject a zero payout', () => {
      expectFailure(vault.claim('bob', 2n, 0n, sign('bob', 2n, 0n)), PoolErrorCode.InvalidAmount);
    });

    it('should pay each of a participant\'s deposits in full', () => {
      expect(unwrap(vault.deposit('alice', 1_000_000n))).toBe(3n);

      unwrap(vault.claim('alice', 1n, 1_000_000n, sign('alice', 1n, 1_000_000n)));
      unwrap(vault.claim('alice', 3n, 1_000_000n, sign('alice', 3n, 1_000_000n)));

      expect(ledger.balanceOf('alice')).toBe(7_000_000n);
      expect(vault.vaultBalance()).toBe(5_000_000n);
    });

    it('should still pay when an event listener throws', () => {
      vault.onEvent(() => {
        throw new Error('listener failed');
      });

      const claimed = unwrap(vault.claim('bob', 2n, 2_000_000n, sign('bob', 2n, 2_000_000n)));

      expect(claimed.amount).toBe(2_000_000n);
      expect(ledger.balanceOf('bob')).toBe(10_000_000n);
      expect(events.at(-1)?.type).toBe('deposit-claimed');
    });
  });

  describe('markDepositLost', () => {
    beforeEach(() => {
      unwrap(vault.deposit('alice', 4_000_000n));
    });

    it('should only be available to the deployer', () => {
      const error = expectFailure(vault.markDepositLost('bob', 'alice', 1n), PoolErrorCode.Unauthorized);
      expect(error.message).toBe('Only the deployer can forfeit deposits');
    });

    it('should invalidate the deposit', () => {
      const forfeited = unwrap(vault.markDepositLost(DEPLOYER, 'alice', 1n));

      expect(forfeited.valid).toBe(false);
      expect(events.at(-1)).toEqual({ type: 'deposit-lost', poolId: VAULT, participant: 'alice', depositId: 1n });
      expectFailure(vault.claim('alice', 1n, 1n, sign('alice', 1n, 1n)), PoolErrorCode.DepositNotValid);
      expectFailure(vault.markDepositLost(DEPLOYER, 'alice', 1n), PoolErrorCode.DepositNotValid);
    });

    it('should leave the forfeited funds withdrawable by the deployer', () => {
      unwrap(vault.markDepositLost(DEPLOYER, 'alice', 1n));

      expect(vault.withdrawableBalance()).toBe(4_000_000n);
      expectFailure(vault.withdraw('alice', 1n), PoolErrorCode.Unauthorized);
      expect(unwrap(vault.withdraw(DEPLOYER, 4_000_000n))).toBe(0n);
      expect(ledger.balanceOf(DEPLOYER)).toBe(4_000_000n);
      expect(vault.vaultBalance()).toBe(0n);
    });
  });

  describe('withdraw', () => {
    beforeEach(() => {
      unwrap(vault.deposit('alice', 4_000_000n));
    });

    it('should not touch funds of a valid deposit', () => {
      const error = expectFailure(vault.withdraw(DEPLOYER, 4_000_000n), PoolErrorCode.InsufficientFunds);
      expect(error.message).toBe('Requested 4000000 but only 0 has been forfeited');
      expect(ledger.balanceOf(VAULT)).toBe(4_000_000n);

      unwrap(vault.claim('alice', 1n, 4_000_000n, sign('alice', 1n, 4_000_000n)));
      expect(ledger.balanceOf('alice')).toBe(10_000_000n);
    });

    it('should cap withdrawals at the forfeited total', () => {
      unwrap(vault.deposit('bob', 2_000_000n));
      unwrap(vault.markDepositLost(DEPLOYER, 'bob', 2n));

      expectFailure(vault.withdraw(DEPLOYER, 2_000_001n), PoolErrorCode.InsufficientFunds);
      expect(unwrap(vault.withdraw(DEPLOYER, 1_500_000n))).toBe(500_000n);
      expect(unwrap(vault.withdraw(DEPLOYER, 500_000n))).toBe(0n);
      expectFailure(vault.withdraw(DEPLOYER, 1n), PoolErrorCode.InsufficientFunds);

      expect(vault.vaultBalance()).toBe(4_000_000n);
      unwrap(vault.claim('alice', 1n, 4_000_000n, sign('alice', 1n, 4_000_000n)));
      expect(vault.vaultBalance()).toBe(0n);
    });

    it('should reject a zero withdrawal', () => {
      expectFailure(vault.withdraw(DEPLOYER, 0n), PoolErrorCode.InvalidAmount);
    });
  });
});

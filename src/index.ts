// src/index.ts

export { EscrowPool } from './core/escrow-pool';
export type { EscrowPoolOptions, PoolEventListener } from './core/escrow-pool';
export { PoolRegistry } from './core/pool-registry';
export type { PoolRegistryOptions } from './core/pool-registry';
export { DepositVault } from './core/deposit-vault';
export type { DepositVaultOptions } from './core/deposit-vault';
export { ReentrancyGuard } from './core/reentrancy-guard';
export { createSequenceClock } from './core/clock';
export {
  fixedPoolVariant,
  sponsoredPoolVariant,
  sponsoredTokenPoolVariant,
  openPoolVariant,
  registryPoolVariant
} from './core/variants';

export { InMemoryAccountLedger } from './services/account-ledger';
export type { AccountLedgerHooks } from './services/account-ledger';
export { SigningAuthority } from './services/signing-authority';
export { SqliteAccountLedger, openAccountDatabase } from './db';

export { createEscrowApp } from './app';
export type { EscrowApp, EscrowAppOptions } from './app';
export { ConfigError, loadConfig, parseConfig } from './config';
export type { EscrowConfig, PoolVariantName } from './config';

export type {
  Identity,
  PoolVariant,
  PoolSettings,
  Membership,
  ClaimRecord,
  PoolDetails,
  Deposit,
  ClaimedDeposit,
  RewardPayout,
  PoolEvent
} from './types/pool';

export type {
  Transfer,
  TransferError,
  TransferResult,
  TransferService,
  SequenceClock
} from './types/ledger';

export { PoolError, PoolErrorCode } from './utils/errors';
export type { PoolResult } from './utils/errors';

export { encodeClaimMessage } from './utils/canonical';
export type { ClaimMessage } from './utils/canonical';
export { SignatureVerifier, secp256k1Scheme, decodeSignature } from './utils/crypto';
export type { SignatureScheme, SignatureInput } from './utils/crypto';

// src/app.ts: composition root

import { EscrowPool } from './core/escrow-pool';
import { fixedPoolVariant, openPoolVariant, sponsoredPoolVariant, sponsoredTokenPoolVariant } from './core/variants';
import type { EscrowConfig, PoolVariantName } from './config';
import { type AccountDatabase, SqliteAccountLedger, openAccountDatabase } from './db';
import { type Logger, makeLogger } from './lib/logger';
import type { SequenceClock, TransferService } from './types/ledger';
import type { PoolVariant } from './types/pool';
import { SignatureVerifier } from './utils/crypto';

export interface EscrowAppOptions {
  /** Replaces the SQLite ledger, e.g. with an in-memory one. */
  transfers?: TransferService;
  clock?: SequenceClock;
  logger?: Logger;
}

export interface EscrowApp {
  readonly config: EscrowConfig;
  readonly pool: EscrowPool;
  readonly transfers: TransferService;
  readonly verifier: SignatureVerifier;
  readonly logger: Logger;
  close(): void;
}

export const variantFor = (name: PoolVariantName, config: EscrowConfig): PoolVariant => {
  switch (name) {
    case 'fixed':
      return fixedPoolVariant(config.entryFee);
    case 'sponsored':
      return sponsoredPoolVariant(config.poolSize);
    case 'sponsored-token':
      return sponsoredTokenPoolVariant(config.poolSize);
    case 'open':
      return openPoolVariant();
  }
};

export function createEscrowApp(config: EscrowConfig, options: EscrowAppOptions = {}): EscrowApp {
  const logger = options.logger ?? makeLogger({ contract: config.contractId }, config.logLevel);

  let db: AccountDatabase | null = null;
  let transfers: TransferService;
  if (options.transfers) {
    transfers = options.transfers;
  } else {
    db = openAccountDatabase(config.dbPath, logger.child({ component: 'account-db' }));
    transfers = new SqliteAccountLedger(db);
  }

  const verifier = new SignatureVerifier(config.trustedSignerPublicKey);
  const pool = new EscrowPool({
    settings: {
      poolId: config.contractId,
      escrowAccount: config.contractId,
      owner: config.deployer,
      feeWallet: config.feeWallet,
      feePercent: config.feePercent,
      variant: variantFor(config.variant, config),
    },
    transfers,
    verifier,
    clock: options.clock,
    logger,
  });

  logger.info(
    { variant: config.variant, signer: verifier.trustedPublicKeyHex, scheme: verifier.schemeName },
    'escrow pool ready'
  );

  return {
    config,
    pool,
    transfers,
    verifier,
    logger,
    close: () => {
      db?.close();
    },
  };
}

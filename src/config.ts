// src/config.ts

import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidIdentity } from './utils/validation';

export const POOL_VARIANTS = ['fixed', 'sponsored', 'sponsored-token', 'open'] as const;
export type PoolVariantName = (typeof POOL_VARIANTS)[number];

const identity = z.string().refine(isValidIdentity, { message: 'malformed identity' });

const uintString = z
  .string()
  .regex(/^\d+$/, 'must be an unsigned integer')
  .transform((value) => BigInt(value));

const envSchema = z.object({
  TRUSTED_SIGNER_PUBLIC_KEY: z
    .string()
    .regex(/^(0x)?(0[23][0-9a-fA-F]{64}|04[0-9a-fA-F]{128})$/, 'must be a secp256k1 public key in hex'),
  POOL_CONTRACT_ID: identity.default('escrow.pool'),
  POOL_DEPLOYER: identity.default('deployer'),
  FEE_WALLET: identity.default('fee-wallet'),
  PLATFORM_FEE_PERCENT: uintString
    .default('2')
    .refine((value) => value <= 100n, { message: 'must be between 0 and 100' }),
  ENTRY_FEE: uintString.default('5000000'),
  POOL_SIZE: uintString.default('50000000'),
  POOL_VARIANT: z.enum(POOL_VARIANTS).default('sponsored'),
  DB_PATH: z.string().min(1).default('data/escrow-ledger.db'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface EscrowConfig {
  readonly trustedSignerPublicKey: string;
  readonly contractId: string;
  readonly deployer: string;
  readonly feeWallet: string;
  readonly feePercent: bigint;
  readonly entryFee: bigint;
  readonly poolSize: bigint;
  readonly variant: PoolVariantName;
  readonly dbPath: string;
  readonly logLevel: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid escrow configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function parseConfig(env: Record<string, string | undefined>): EscrowConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const e = parsed.data;
  return {
    trustedSignerPublicKey: e.TRUSTED_SIGNER_PUBLIC_KEY,
    contractId: e.POOL_CONTRACT_ID,
    deployer: e.POOL_DEPLOYER,
    feeWallet: e.FEE_WALLET,
    feePercent: e.PLATFORM_FEE_PERCENT,
    entryFee: e.ENTRY_FEE,
    poolSize: e.POOL_SIZE,
    variant: e.POOL_VARIANT,
    dbPath: e.DB_PATH,
    logLevel: e.LOG_LEVEL,
  };
}

/** Reads `.env` (if present) into process.env, then validates. */
export function loadConfig(): EscrowConfig {
  dotenv.config();
  return parseConfig(process.env);
}

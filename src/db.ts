// src/db.ts: SQLite-backed account ledger
//
// Balances and an append-only transfer journal. Amounts are stored as
// decimal TEXT because u128 values do not fit SQLite's 64-bit INTEGER.
// Batches run inside one better-sqlite3 transaction: all legs or none.

import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { type Logger, makeLogger } from './lib/logger';
import { checkTransfer } from './services/account-ledger';
import type { Transfer, TransferResult, TransferService } from './types/ledger';
import type { Identity } from './types/pool';

export type AccountDatabase = Database.Database;

// ── Schema ────────────────────────────────────────────────────────────────

const migrations: { version: number; sql: string }[] = [
  {
    version: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS accounts (
        id          TEXT PRIMARY KEY,
        balance     TEXT NOT NULL DEFAULT '0',
        updated_at  INTEGER NOT NULL
      );
      CREATE TABLE IF NOT EXISTS transfers (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        batch_id      INTEGER NOT NULL,
        leg           INTEGER NOT NULL,
        from_account  TEXT NOT NULL,
        to_account    TEXT NOT NULL,
        amount        TEXT NOT NULL,
        created_at    INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_transfers_batch ON transfers(batch_id);
      CREATE INDEX IF NOT EXISTS idx_transfers_from  ON transfers(from_account);
      CREATE INDEX IF NOT EXISTS idx_transfers_to    ON transfers(to_account);
    `,
  },
];

export function applyMigrations(db: AccountDatabase, log: Logger): number {
  db.exec(`CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY)`);
  const current = db.prepare<[], { v: number | null }>('SELECT MAX(version) AS v FROM schema_version').get()?.v ?? 0;

  const apply = db.transaction(() => {
    let latest = current;
    for (const m of migrations) {
      if (m.version > current) {
        db.exec(m.sql);
        db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(m.version);
        log.info({ version: m.version }, 'ledger migration applied');
        latest = m.version;
      }
    }
    return latest;
  });
  return apply();
}

export function openAccountDatabase(dbPath: string, log: Logger = makeLogger({ component: 'account-db' })): AccountDatabase {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  applyMigrations(db, log);
  return db;
}

// ── Ledger ────────────────────────────────────────────────────────────────

interface BalanceRow {
  balance: string;
}

interface TransferRow {
  from_account: string;
  to_account: string;
  amount: string;
}

const prepareStatements = (db: AccountDatabase) => ({
  getBalance: db.prepare<[string], BalanceRow>('SELECT balance FROM accounts WHERE id = ?'),
  upsertBalance: db.prepare<{ id: string; balance: string; updated_at: number }>(`
    INSERT INTO accounts (id, balance, updated_at) VALUES (@id, @balance, @updated_at)
    ON CONFLICT(id) DO UPDATE SET balance = excluded.balance, updated_at = excluded.updated_at
  `),
  nextBatch: db.prepare<[], { next: number }>('SELECT COALESCE(MAX(batch_id), 0) + 1 AS next FROM transfers'),
  insertTransfer: db.prepare<{
    batch_id: number;
    leg: number;
    from_account: string;
    to_account: string;
    amount: string;
    created_at: number;
  }>(`
    INSERT INTO transfers (batch_id, leg, from_account, to_account, amount, created_at)
    VALUES (@batch_id, @leg, @from_account, @to_account, @amount, @created_at)
  `),
  history: db.prepare<[], TransferRow>('SELECT from_account, to_account, amount FROM transfers ORDER BY id ASC'),
});

export class SqliteAccountLedger implements TransferService {
  private readonly stmts: ReturnType<typeof prepareStatements>;

  constructor(private readonly db: AccountDatabase) {
    this.stmts = prepareStatements(db);
  }

  balanceOf(account: Identity): bigint {
    const row = this.stmts.getBalance.get(account);
    return row ? BigInt(row.balance) : 0n;
  }

  mint(account: Identity, amount: bigint): void {
    this.stmts.upsertBalance.run({
      id: account,
      balance: (this.balanceOf(account) + amount).toString(),
      updated_at: Date.now(),
    });
  }

  history(): Transfer[] {
    return this.stmts.history.all().map((row) => ({
      from: row.from_account,
      to: row.to_account,
      amount: BigInt(row.amount),
    }));
  }

  transfer(transfer: Transfer): TransferResult {
    return this.transferAll([transfer]);
  }

  transferAll(transfers: readonly Transfer[]): TransferResult {
    const run = this.db.transaction((batch: readonly Transfer[]): TransferResult => {
      const staged = new Map<Identity, bigint>();
      const balance = (account: Identity): bigint => staged.get(account) ?? this.balanceOf(account);

      for (const [leg, transfer] of batch.entries()) {
        const invalid = checkTransfer(transfer, leg, balance(transfer.from));
        if (invalid) {
          return { ok: false, error: invalid };
        }
        staged.set(transfer.from, balance(transfer.from) - transfer.amount);
        staged.set(transfer.to, balance(transfer.to) + transfer.amount);
      }

      const now = Date.now();
      for (const [id, value] of staged) {
        this.stmts.upsertBalance.run({ id, balance: value.toString(), updated_at: now });
      }
      const batchId = this.stmts.nextBatch.get()?.next ?? 1;
      for (const [leg, transfer] of batch.entries()) {
        this.stmts.insertTransfer.run({
          batch_id: batchId,
          leg,
          from_account: transfer.from,
          to_account: transfer.to,
          amount: transfer.amount.toString(),
          created_at: now,
        });
      }
      return { ok: true };
    });
    return run(transfers);
  }
}

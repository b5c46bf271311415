/**
 * @centwise/store-sqlite — Schema.
 *
 * Amounts and balances are INTEGER minor units. Timestamps are ISO-8601
 * text, so lexical order is time order.
 */

import type Database from "better-sqlite3";

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    balance INTEGER NOT NULL DEFAULT 0,
    is_system INTEGER NOT NULL DEFAULT 0 CHECK (is_system IN (0, 1)),
    UNIQUE (user_id, name)
  );

  CREATE UNIQUE INDEX IF NOT EXISTS accounts_one_system_per_user
    ON accounts(user_id) WHERE is_system = 1;

  CREATE TABLE IF NOT EXISTS categories (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    name TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    UNIQUE (user_id, name)
  );

  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE RESTRICT,
    category_id INTEGER NOT NULL REFERENCES categories(id) ON DELETE RESTRICT,
    amount INTEGER NOT NULL CONSTRAINT positive_amount CHECK (amount > 0),
    description TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS incomes (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE RESTRICT,
    amount INTEGER NOT NULL CONSTRAINT positive_amount CHECK (amount > 0),
    description TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transfers (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id TEXT NOT NULL,
    from_account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE RESTRICT,
    to_account_id INTEGER NOT NULL REFERENCES accounts(id) ON DELETE RESTRICT,
    amount INTEGER NOT NULL CONSTRAINT positive_amount CHECK (amount > 0),
    created_at TEXT NOT NULL,
    CONSTRAINT distinct_transfer_accounts CHECK (from_account_id <> to_account_id)
  );

  CREATE INDEX IF NOT EXISTS idx_expenses_user_created ON expenses(user_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_expenses_account ON expenses(account_id);
  CREATE INDEX IF NOT EXISTS idx_expenses_category ON expenses(category_id);
  CREATE INDEX IF NOT EXISTS idx_incomes_user_created ON incomes(user_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_incomes_account ON incomes(account_id);
  CREATE INDEX IF NOT EXISTS idx_transfers_user_created ON transfers(user_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_transfers_from ON transfers(from_account_id);
  CREATE INDEX IF NOT EXISTS idx_transfers_to ON transfers(to_account_id);
`;

/**
 * Configure the connection and create any missing tables.
 */
export function applySchema(db: Database.Database): void {
  // Enable WAL mode for file databases; in-memory ones report "memory"
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA_SQL);
}

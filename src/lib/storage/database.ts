import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import initSqlJs from 'sql.js';
import { drizzle, type SQLJsDatabase } from 'drizzle-orm/sql-js';
import * as schema from './schema';

export type LedgerDatabase = SQLJsDatabase<typeof schema>;

const IN_MEMORY = ':memory:';

export interface DatabaseHandle {
  db: LedgerDatabase;
  // Write the database image to its file; no-op in memory
  save(): void;
  // Save, then release the database
  close(): void;
}

const CREATE_TABLES = `
CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  username TEXT NOT NULL UNIQUE,
  email TEXT NOT NULL UNIQUE,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS statements (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users(id) ON DELETE CASCADE,
  file_path TEXT NOT NULL,
  file_name TEXT NOT NULL,
  bank_type TEXT NOT NULL,
  statement_date TEXT NOT NULL,
  parsing_status TEXT NOT NULL DEFAULT 'pending',
  total_debits_cents INTEGER NOT NULL DEFAULT 0,
  total_credits_cents INTEGER NOT NULL DEFAULT 0,
  transaction_count INTEGER NOT NULL DEFAULT 0,
  opening_balance_cents INTEGER,
  closing_balance_cents INTEGER,
  error_detail TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  statement_id INTEGER NOT NULL REFERENCES statements(id) ON DELETE CASCADE,
  transaction_date TEXT NOT NULL,
  description TEXT NOT NULL,
  amount_cents INTEGER NOT NULL CHECK (amount_cents >= 0),
  direction TEXT NOT NULL CHECK (direction IN ('Debit', 'Credit')),
  category TEXT NOT NULL,
  original_category TEXT,
  user_corrected INTEGER NOT NULL DEFAULT 0,
  balance_cents INTEGER,
  raw_text TEXT NOT NULL,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS transactions_statement_idx ON transactions (statement_id);
CREATE INDEX IF NOT EXISTS transactions_date_idx ON transactions (transaction_date);

CREATE TABLE IF NOT EXISTS category_rules (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER REFERENCES users(id) ON DELETE CASCADE,
  pattern TEXT NOT NULL,
  is_regex INTEGER NOT NULL DEFAULT 0,
  category TEXT NOT NULL,
  priority INTEGER NOT NULL DEFAULT 0,
  is_active INTEGER NOT NULL DEFAULT 1,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS category_rules_user_idx ON category_rules (user_id, is_active);
`;

/**
 * Open (or create) the SQLite store and make sure the tables exist.
 * The database lives in memory and is written back to `path` on save and
 * close. Pass ":memory:" for a throwaway database.
 */
export async function openDatabase(path: string): Promise<DatabaseHandle> {
  const SQL = await initSqlJs();
  const persistent = path !== IN_MEMORY;
  const sqlite = persistent && existsSync(path) ? new SQL.Database(readFileSync(path)) : new SQL.Database();

  sqlite.run('PRAGMA foreign_keys = ON');
  sqlite.exec(CREATE_TABLES);

  // export() reopens the connection, which resets pragmas
  const save = () => {
    if (!persistent) return;
    writeFileSync(path, sqlite.export());
    sqlite.run('PRAGMA foreign_keys = ON');
  };

  return {
    db: drizzle(sqlite, { schema }),
    save,
    close: () => {
      save();
      sqlite.close();
    },
  };
}

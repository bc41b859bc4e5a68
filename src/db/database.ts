/**
 * SQLite store definition using better-sqlite3.
 *
 * One file per user. The schema only ever grows: tables and columns are
 * added with IF NOT EXISTS / table_info checks on every open, so an old
 * file is brought up to date in place.
 */
import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { InvalidUserError } from '../domain/errors.js';

export type Store = Database.Database;

// --- Table interfaces ---

export interface DbMonth {
  month_id: string;            // YYYY-MM
  starting_balance: number;
  ending_balance: number | null; // null until closed
  status: 'open' | 'closed';
  created_at: string;
}

export interface DbTransaction {
  id: number;
  date: string;                // YYYY-MM-DD
  month_id: string;            // accrual month
  amount: number;              // +income / -expense
  category: string;            // Fixed, Variable, Income, Savings
  subcategory: string | null;
  payment_method: 'debit' | 'credit_card' | null;
  note: string | null;
  type: 'normal' | 'correction';
  bank_account_id: number | null;
  credit_card_id: number | null;
  statement_month_id: string | null;
  due_month_id: string | null; // cash month for card charges
  due_date: string | null;
  created_at: string;
}

export interface DbBankAccount {
  id: number;
  name: string;
  active: number;              // 0 or 1
  effective_from_month_id: string;
  effective_to_month_id: string | null;
}

export interface DbCreditCard {
  id: number;
  name: string;
  bank_account_id: number;     // account that pays the statement
  statement_close_day: number;
  due_day: number;
  active: number;
  effective_from_month_id: string;
  effective_to_month_id: string | null;
}

export interface DbAccountMonthBalance {
  month_id: string;
  bank_account_id: number;
  starting_balance: number;
  ending_balance: number | null;
}

/** Shared shape of fixed_expenses and income_sources */
export interface DbRecurring {
  id: number;
  name: string;
  amount: number;              // always stored positive
  due_day: number;
  category: string;
  subcategory: string | null;
  bank_account_id: number | null;
  active: number;
  created_at: string;
}

export interface DbObjective {
  id: number;
  category: string;
  percentage: number;          // fraction of income
  active: number;
  created_at: string;
}

// --- Schema ---

const BASE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS months (
    month_id TEXT PRIMARY KEY,
    starting_balance REAL NOT NULL,
    ending_balance REAL,
    status TEXT NOT NULL CHECK (status IN ('open', 'closed')),
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    date TEXT NOT NULL,
    month_id TEXT NOT NULL,
    amount REAL NOT NULL,
    category TEXT NOT NULL,
    subcategory TEXT,
    payment_method TEXT,
    note TEXT,
    type TEXT NOT NULL CHECK (type IN ('normal', 'correction')),
    created_at TEXT DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (month_id) REFERENCES months (month_id)
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_month ON transactions (month_id);

  CREATE TABLE IF NOT EXISTS budget_objectives (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    category TEXT NOT NULL,
    percentage REAL NOT NULL CHECK (percentage >= 0),
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS fixed_expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    amount REAL NOT NULL,
    due_day INTEGER NOT NULL CHECK (due_day BETWEEN 1 AND 31),
    category TEXT NOT NULL DEFAULT 'Fixed',
    subcategory TEXT,
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS income_sources (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    amount REAL NOT NULL,
    due_day INTEGER NOT NULL CHECK (due_day BETWEEN 1 AND 31),
    category TEXT NOT NULL DEFAULT 'Income',
    subcategory TEXT,
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );
`;

// Tables added after the first release
const ACCOUNT_SCHEMA = `
  CREATE TABLE IF NOT EXISTS bank_accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1,
    effective_from_month_id TEXT NOT NULL,
    effective_to_month_id TEXT,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS credit_cards (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    bank_account_id INTEGER NOT NULL,
    statement_close_day INTEGER NOT NULL CHECK (statement_close_day BETWEEN 1 AND 31),
    due_day INTEGER NOT NULL CHECK (due_day BETWEEN 1 AND 31),
    active INTEGER NOT NULL DEFAULT 1,
    effective_from_month_id TEXT NOT NULL,
    effective_to_month_id TEXT,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (bank_account_id) REFERENCES bank_accounts (id)
  );

  CREATE TABLE IF NOT EXISTS account_month_balances (
    month_id TEXT NOT NULL,
    bank_account_id INTEGER NOT NULL,
    starting_balance REAL NOT NULL,
    ending_balance REAL,
    PRIMARY KEY (month_id, bank_account_id),
    FOREIGN KEY (month_id) REFERENCES months (month_id),
    FOREIGN KEY (bank_account_id) REFERENCES bank_accounts (id)
  );
`;

// One active version per template / objective
const VERSIONING_INDEXES = `
  CREATE UNIQUE INDEX IF NOT EXISTS uq_active_objectives
    ON budget_objectives (category) WHERE active = 1;
  CREATE UNIQUE INDEX IF NOT EXISTS uq_active_fixed_expenses
    ON fixed_expenses (name, COALESCE(subcategory, '')) WHERE active = 1;
  CREATE UNIQUE INDEX IF NOT EXISTS uq_active_income_sources
    ON income_sources (name, COALESCE(subcategory, '')) WHERE active = 1;
  CREATE INDEX IF NOT EXISTS idx_transactions_due_month ON transactions (due_month_id);
`;

// Columns every query relies on, checked once migrations have run
const REQUIRED_COLUMNS: Record<string, string[]> = {
  months: ['month_id', 'starting_balance', 'ending_balance', 'status', 'created_at'],
  transactions: [
    'id', 'date', 'month_id', 'amount', 'category', 'subcategory', 'payment_method', 'note', 'type',
    'bank_account_id', 'credit_card_id', 'statement_month_id', 'due_month_id', 'due_date', 'created_at',
  ],
  bank_accounts: ['id', 'name', 'active', 'effective_from_month_id', 'effective_to_month_id'],
  credit_cards: [
    'id', 'name', 'bank_account_id', 'statement_close_day', 'due_day', 'active',
    'effective_from_month_id', 'effective_to_month_id',
  ],
  account_month_balances: ['month_id', 'bank_account_id', 'starting_balance', 'ending_balance'],
  fixed_expenses: ['id', 'name', 'amount', 'due_day', 'category', 'subcategory', 'bank_account_id', 'active', 'created_at'],
  income_sources: ['id', 'name', 'amount', 'due_day', 'category', 'subcategory', 'bank_account_id', 'active', 'created_at'],
  budget_objectives: ['id', 'category', 'percentage', 'active', 'created_at'],
};

function columnNames(db: Store, table: string): Set<string> {
  const rows = db.prepare<[string], { name: string }>('SELECT name FROM pragma_table_info(?)').all(table);
  return new Set(rows.map((c) => c.name));
}

function addColumnIfMissing(db: Store, table: string, column: string, definition: string): void {
  if (columnNames(db, table).has(column)) return;
  db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  console.log(`[store] Added column ${table}.${column}`);
}

/**
 * Bring a store of any earlier schema up to date. Idempotent. Throws when
 * the file holds tables of the same names but another layout.
 */
export function migrateStore(db: Store): void {
  db.exec(BASE_SCHEMA);
  db.exec(ACCOUNT_SCHEMA);

  // --- Migrations: add new columns safely ---
  addColumnIfMissing(db, 'transactions', 'bank_account_id', 'INTEGER REFERENCES bank_accounts (id)');
  addColumnIfMissing(db, 'transactions', 'credit_card_id', 'INTEGER REFERENCES credit_cards (id)');
  addColumnIfMissing(db, 'transactions', 'statement_month_id', 'TEXT');
  addColumnIfMissing(db, 'transactions', 'due_month_id', 'TEXT');
  addColumnIfMissing(db, 'transactions', 'due_date', 'TEXT');
  addColumnIfMissing(db, 'fixed_expenses', 'bank_account_id', 'INTEGER REFERENCES bank_accounts (id)');
  addColumnIfMissing(db, 'income_sources', 'bank_account_id', 'INTEGER REFERENCES bank_accounts (id)');

  db.exec(VERSIONING_INDEXES);

  const missing = Object.entries(REQUIRED_COLUMNS).flatMap(([table, required]) => {
    const present = columnNames(db, table);
    return required.filter((c) => !present.has(c)).map((c) => `${table}.${c}`);
  });
  if (missing.length > 0) {
    throw new Error(`Store schema is missing ${missing.join(', ')}`);
  }
}

/**
 * Open (creating if needed) a store file, or an in-memory store for ':memory:'.
 */
export function openStore(filename: string): Store {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }

  const db = new Database(filename);
  db.pragma('foreign_keys = ON');
  if (filename !== ':memory:') {
    // Enable WAL mode for better performance
    db.pragma('journal_mode = WAL');
  }

  try {
    migrateStore(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

const USER_NAME_RE = /^[A-Za-z0-9_.-]+$/;

/** Usable as a file name: no separators, no leading dot */
export function isValidUserName(user: string): boolean {
  return USER_NAME_RE.test(user) && !user.startsWith('.');
}

/** Store file backing one user's session */
export function userStorePath(dataDir: string, user: string): string {
  if (!isValidUserName(user)) throw new InvalidUserError(user);
  return path.join(dataDir, `${user}.db`);
}

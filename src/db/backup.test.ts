import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { InvalidBackupError } from '../domain/errors.js';
import { exportStore, isValidStoreFile, restoreStore } from './backup.js';
import { openStore, type Store } from './database.js';
import { createBankAccount } from './masterData.js';
import { listKnownMonths, openMonth } from './months.js';

let dir: string;

function foreignStoreBytes(): Buffer {
  const other = new Database(':memory:');
  other.exec("CREATE TABLE transactions (id INTEGER, x TEXT); INSERT INTO transactions VALUES (1, 'a');");
  const bytes = other.serialize();
  other.close();
  return bytes;
}

const opened: Store[] = [];

function track(db: Store): Store {
  opened.push(db);
  return db;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-backup-'));
});

afterEach(() => {
  for (const db of opened.splice(0)) db.close();
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('isValidStoreFile', () => {
  it('accepts an exported store', () => {
    const db = track(openStore(':memory:'));
    expect(isValidStoreFile(exportStore(db))).toBe(true);
  });

  it('rejects a SQLite file laid out for another program', () => {
    expect(isValidStoreFile(foreignStoreBytes())).toBe(false);
  });

  it('rejects empty and non-SQLite input', () => {
    expect(isValidStoreFile(Buffer.alloc(0))).toBe(false);
    expect(isValidStoreFile(Buffer.from('month_id,amount\n2024-01,10\n'.repeat(50)))).toBe(false);
  });
});

describe('restoreStore', () => {
  it('replaces the file contents and reopens it', () => {
    const source = track(openStore(':memory:'));
    createBankAccount(source, { name: 'Checking', effectiveFromMonthId: '2024-01' });
    openMonth(source, { monthId: '2024-01', startingBalance: 100 });
    const bytes = exportStore(source);

    const filename = path.join(dir, 'nested', 'bob.db');
    const restored = track(restoreStore(filename, bytes));

    expect(listKnownMonths(restored)).toEqual(['2024-01']);
    expect(fs.existsSync(`${filename}.restore`)).toBe(false);
  });

  it('round-trips a file store in WAL mode', () => {
    const first = path.join(dir, 'first.db');
    const db = track(openStore(first));
    openMonth(db, { monthId: '2024-05', startingBalance: 0 });

    const restored = track(restoreStore(path.join(dir, 'second.db'), exportStore(db)));
    expect(listKnownMonths(restored)).toEqual(['2024-05']);
  });

  it('leaves the target untouched when the input is not a store', () => {
    const filename = path.join(dir, 'carol.db');
    openStore(filename).close();
    const before = fs.readFileSync(filename);

    expect(() => restoreStore(filename, Buffer.from('not a database'))).toThrow(InvalidBackupError);
    expect(() => restoreStore(filename, foreignStoreBytes())).toThrow(InvalidBackupError);
    expect(fs.readFileSync(filename).equals(before)).toBe(true);
  });
});

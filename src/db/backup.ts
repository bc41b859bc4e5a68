/**
 * Whole-store backup and restore. A backup is the SQLite file itself.
 */
import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { InvalidBackupError } from '../domain/errors.js';
import { migrateStore, openStore, type Store } from './database.js';

// Header bytes 18-19 are the read/write format versions; 2 marks a WAL file.
const FORMAT_VERSION_OFFSETS = [18, 19];

/**
 * Copy of `bytes` switched to rollback-journal mode. An image still flagged
 * as WAL cannot be opened from memory.
 */
function withoutWalFlag(bytes: Buffer): Buffer {
  const copy = Buffer.from(bytes);
  if (copy.length > 19) {
    for (const offset of FORMAT_VERSION_OFFSETS) {
      if (copy[offset] === 2) copy[offset] = 1;
    }
  }
  return copy;
}

export function exportStore(db: Store): Buffer {
  return withoutWalFlag(db.serialize());
}

/**
 * Openable as SQLite, has a queryable catalog, and migrates to the current
 * schema. The check runs on an in-memory copy.
 */
export function isValidStoreFile(bytes: Buffer): boolean {
  if (bytes.length === 0) return false;
  try {
    const probe = new Database(withoutWalFlag(bytes));
    try {
      probe.prepare('SELECT name FROM sqlite_master LIMIT 1').all();
      migrateStore(probe);
      return true;
    } finally {
      probe.close();
    }
  } catch (error) {
    console.warn('[store] Rejected backup:', error instanceof Error ? error.message : error);
    return false;
  }
}

/**
 * Replace the store file with `bytes` and reopen it (migrations included).
 * Any handle on the old file must be closed first.
 */
export function restoreStore(filename: string, bytes: Buffer): Store {
  if (!isValidStoreFile(bytes)) throw new InvalidBackupError();

  fs.mkdirSync(path.dirname(filename), { recursive: true });
  const tmp = `${filename}.restore`;
  fs.writeFileSync(tmp, withoutWalFlag(bytes));
  for (const suffix of ['-wal', '-shm']) {
    fs.rmSync(`${filename}${suffix}`, { force: true });
  }
  fs.renameSync(tmp, filename);

  console.log(`[store] Restored ${filename} (${bytes.length} bytes)`);
  return openStore(filename);
}

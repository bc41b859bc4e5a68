/**
 * One store handle per user, opened on first use and kept for the life of
 * the process. The handle is passed explicitly to every core call.
 */
import { isValidUserName, openStore, userStorePath, type Store } from '../../src/db/database.js';
import { isValidStoreFile, restoreStore } from '../../src/db/backup.js';
import { InvalidBackupError, InvalidUserError } from '../../src/domain/errors.js';

export interface StoreRegistry {
  get(user: string): Store;
  restore(user: string, bytes: Buffer): Store;
  closeAll(): void;
}

/** File-backed stores under `dataDir`, or ':memory:' stores when dataDir is null */
export function createStoreRegistry(dataDir: string | null): StoreRegistry {
  const stores = new Map<string, Store>();

  function filenameFor(user: string): string {
    if (dataDir !== null) return userStorePath(dataDir, user);
    if (!isValidUserName(user)) throw new InvalidUserError(user);
    return ':memory:';
  }

  return {
    get(user) {
      const existing = stores.get(user);
      if (existing) return existing;
      const db = openStore(filenameFor(user));
      stores.set(user, db);
      console.log(`[api] Opened store for ${user}`);
      return db;
    },

    restore(user, bytes) {
      if (dataDir === null) {
        throw new Error('Restore requires a file-backed store');
      }
      if (!isValidStoreFile(bytes)) throw new InvalidBackupError();
      const filename = userStorePath(dataDir, user);
      stores.get(user)?.close();
      stores.delete(user);
      const db = restoreStore(filename, bytes);
      stores.set(user, db);
      return db;
    },

    closeAll() {
      for (const db of stores.values()) db.close();
      stores.clear();
    },
  };
}

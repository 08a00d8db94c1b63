/**
 * Name → public key store on SQLite.
 *
 * better-sqlite3 is synchronous, so every statement runs to completion
 * before the event loop hands the next request in. Duplicate names are
 * rejected by the UNIQUE constraint on `keys.name`.
 */

import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

import { createLogger } from '../shared/logger.js';

const log = createLogger('store');

type Migration = (db: Database.Database) => void;

/**
 * Schema migrations, tracked with the user_version pragma.
 * migrations[0] upgrades from version 0 to 1, and so on.
 */
const migrations: Migration[] = [
  (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS keys (
        id INTEGER PRIMARY KEY,
        name TEXT UNIQUE NOT NULL,
        pubkey BLOB
      );
    `);
  },
];

export function schemaVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

export function runMigrations(db: Database.Database): void {
  const current = schemaVersion(db);
  for (let i = current; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
    log.debug(`Migrated schema to version ${i + 1}`);
  }
}

export type RegisterResult = { ok: true } | { ok: false; reason: 'name_taken' };

function isConstraintViolation(err: unknown): boolean {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('SQLITE_CONSTRAINT')
  );
}

export class KeyStore {
  private readonly insertStmt: Database.Statement<[string, Buffer]>;
  private readonly lookupStmt: Database.Statement<[string], { pubkey: Buffer | null }>;
  private readonly countStmt: Database.Statement<[], { count: number }>;

  constructor(private readonly db: Database.Database) {
    this.insertStmt = db.prepare<[string, Buffer]>(
      'INSERT INTO keys (name, pubkey) VALUES (?, ?)',
    );
    this.lookupStmt = db.prepare<[string], { pubkey: Buffer | null }>(
      'SELECT pubkey FROM keys WHERE name = ?',
    );
    this.countStmt = db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM keys');
  }

  /**
   * Register `pubkey` under `name`.
   *
   * @throws the underlying SqliteError for anything other than a taken name
   */
  registerKey(name: string, pubkey: Buffer): RegisterResult {
    try {
      this.insertStmt.run(name, pubkey);
      return { ok: true };
    } catch (err) {
      if (isConstraintViolation(err)) {
        return { ok: false, reason: 'name_taken' };
      }
      throw err;
    }
  }

  lookupKey(name: string): Buffer | null {
    const row = this.lookupStmt.get(name);
    return row?.pubkey ?? null;
  }

  countKeys(): number {
    return this.countStmt.get()?.count ?? 0;
  }

  close(): void {
    this.db.close();
  }
}

/**
 * Open (creating if needed) the key database at `dbPath`.
 * Pass ':memory:' for a throwaway store.
 */
export function openKeyStore(dbPath: string): KeyStore {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  runMigrations(db);
  log.info(`Opened key store at ${dbPath} (schema v${schemaVersion(db)})`);
  return new KeyStore(db);
}

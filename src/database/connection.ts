/**
 * Database Connection Module
 *
 * Opens the SQLite files behind the secondary backend with better-sqlite3.
 * One connection per path, shared by every backend instance in the process.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { POINTS_DB_PATH } from '../config/paths.js';
import { runMigrations } from './migrate.js';
import { DatabaseError } from '../errors/index.js';

const connections = new Map<string, Database.Database>();
let exitHookRegistered = false;

/**
 * Get the connection for a database file, creating the file, its directory
 * and the schema on first use. `:memory:` opens a private in-memory
 * database that is never cached.
 *
 * @example
 * ```ts
 * const db = openDatabase('/tmp/points.db');
 * const count = db.prepare('SELECT COUNT(*) AS count FROM points').get();
 * ```
 */
export function openDatabase(path: string = POINTS_DB_PATH): Database.Database {
  const cached = connections.get(path);
  if (cached) {
    return cached;
  }

  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);
  // WAL lets readers proceed while a batch write is in flight
  db.pragma('journal_mode = WAL');

  const migrations = runMigrations(db);
  const failure = migrations.failed[0];
  if (failure) {
    db.close();
    throw new DatabaseError(`Migration ${failure.name} failed: ${failure.error}`);
  }

  if (path === ':memory:') {
    return db;
  }

  connections.set(path, db);
  if (!exitHookRegistered) {
    process.on('exit', () => closeAllDatabases());
    exitHookRegistered = true;
  }
  return db;
}

/**
 * Close one cached connection. Safe to call when none is open.
 */
export function closeDatabase(path: string = POINTS_DB_PATH): void {
  const db = connections.get(path);
  if (db) {
    db.close();
    connections.delete(path);
  }
}

export function closeAllDatabases(): void {
  for (const db of connections.values()) {
    db.close();
  }
  connections.clear();
}

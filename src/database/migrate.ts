/**
 * Database Migration Runner
 *
 * Applies the embedded migrations in order, recording each in `_migrations`.
 * Re-running is a no-op.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { errorMessage } from '../utils/result.js';

/**
 * Result of running migrations. Failures are reported, not thrown, so the
 * caller decides whether a partial schema is usable.
 */
export interface MigrationResult {
  applied: string[];
  failed: Array<{ name: string; error: string }>;
}

// SQL is embedded so the compiled output needs no asset files
const MIGRATIONS: Array<{ name: string; sql: string }> = [
  {
    name: '001-points.sql',
    sql: `
-- One row per point; several logical collections share the table
CREATE TABLE IF NOT EXISTS points (
  id TEXT NOT NULL,
  collection TEXT NOT NULL,
  vector BLOB NOT NULL,
  payload TEXT NOT NULL,
  file_path TEXT NOT NULL DEFAULT '',
  updated_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (collection, id)
);

CREATE INDEX IF NOT EXISTS idx_points_file ON points(collection, file_path);
`,
  },
];

const AppliedRowSchema = z.object({ name: z.string() });

/**
 * Apply every migration not yet recorded in `_migrations`.
 */
export function runMigrations(db: Database.Database): MigrationResult {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .all()
      .map((row) => AppliedRowSchema.parse(row).name)
  );

  const result: MigrationResult = { applied: [], failed: [] };

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.name)) {
      continue;
    }

    try {
      db.transaction(() => {
        db.exec(migration.sql);
        db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(migration.name);
      })();
      result.applied.push(migration.name);
    } catch (error) {
      result.failed.push({ name: migration.name, error: errorMessage(error) });
    }
  }

  return result;
}

export function getMigrationCount(): number {
  return MIGRATIONS.length;
}

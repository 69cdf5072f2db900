import type Database from 'better-sqlite3';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

interface MigrationRow {
  name: string;
}

function isMigrationRow(row: unknown): row is MigrationRow {
  return typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string';
}

/**
 * Apply every not-yet-applied .sql file in the migrations directory, in file name
 * order, each in its own transaction. Returns the names of the files applied.
 */
export function runMigrations(db: Database.Database, customMigrationsDir?: string): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const migrationsDir = customMigrationsDir ?? join(__dirname, 'migrations');

  if (!existsSync(migrationsDir)) {
    return [];
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  const applied = new Set(
    db
      .prepare('SELECT name FROM _migrations')
      .all()
      .filter(isMigrationRow)
      .map((row) => row.name),
  );

  const newlyApplied: string[] = [];
  for (const file of files) {
    if (applied.has(file)) continue;
    const sql = readFileSync(join(migrationsDir, file), 'utf-8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO _migrations (name) VALUES (?)').run(file);
    })();
    newlyApplied.push(file);
  }
  return newlyApplied;
}

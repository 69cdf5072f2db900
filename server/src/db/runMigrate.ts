import Database from 'better-sqlite3';
import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { runMigrations } from './migrate.js';
import { DEFAULT_DATABASE_URL } from '../plugins/config.js';

// Run migrations standalone (without starting the server)
function main(): void {
  const log = pino({ level: process.env.LOG_LEVEL || 'info' });
  const dbPath = process.env.DATABASE_URL || DEFAULT_DATABASE_URL;

  // Ensure parent directory exists
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  try {
    const applied = runMigrations(db);
    for (const file of applied) {
      log.info({ file }, 'Applied migration');
    }
    log.info({ dbPath, applied: applied.length }, 'Migrations completed successfully');
  } catch (err) {
    log.error({ err }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    db.close();
  }
}

main();

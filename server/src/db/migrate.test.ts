import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runMigrations } from './migrate.js';

describe('runMigrations', () => {
  let sqlite: Database.Database;
  let migrationsDir: string;

  beforeEach(() => {
    sqlite = new Database(':memory:');
    migrationsDir = mkdtempSync(join(tmpdir(), 'crewplan-migrations-'));
  });

  afterEach(() => {
    sqlite.close();
    rmSync(migrationsDir, { recursive: true, force: true });
  });

  it('applies .sql files in name order and records them', () => {
    writeFileSync(join(migrationsDir, '0002_b.sql'), 'CREATE TABLE b (id INTEGER PRIMARY KEY);');
    writeFileSync(join(migrationsDir, '0001_a.sql'), 'CREATE TABLE a (id INTEGER PRIMARY KEY);');
    writeFileSync(join(migrationsDir, 'notes.txt'), 'not a migration');

    expect(runMigrations(sqlite, migrationsDir)).toEqual(['0001_a.sql', '0002_b.sql']);
    expect(sqlite.prepare('SELECT name FROM _migrations ORDER BY name').all()).toEqual([
      { name: '0001_a.sql' },
      { name: '0002_b.sql' },
    ]);
  });

  it('only applies new files on a later run', () => {
    writeFileSync(join(migrationsDir, '0001_a.sql'), 'CREATE TABLE a (id INTEGER PRIMARY KEY);');
    runMigrations(sqlite, migrationsDir);

    writeFileSync(join(migrationsDir, '0002_b.sql'), 'CREATE TABLE b (id INTEGER PRIMARY KEY);');

    expect(runMigrations(sqlite, migrationsDir)).toEqual(['0002_b.sql']);
  });

  it('does not record a failing migration', () => {
    writeFileSync(join(migrationsDir, '0001_bad.sql'), 'CREATE TABLEX broken (id INT);');

    expect(() => runMigrations(sqlite, migrationsDir)).toThrow();
    expect(sqlite.prepare('SELECT name FROM _migrations').all()).toEqual([]);
  });

  it('returns nothing when the directory does not exist', () => {
    expect(runMigrations(sqlite, join(migrationsDir, 'missing'))).toEqual([]);
  });

  it('creates the scheduling tables from the bundled migrations', () => {
    runMigrations(sqlite);

    const columns = sqlite
      .prepare("SELECT name FROM pragma_table_info('tasks') ORDER BY cid")
      .all();

    expect(columns).toEqual([
      { name: 'id' },
      { name: 'project_id' },
      { name: 'parent_id' },
      { name: 'name' },
      { name: 'duration' },
      { name: 'working_duration' },
      { name: 'is_group' },
      { name: 'parallel' },
      { name: 'position' },
      { name: 'employee_id' },
      { name: 'predecessors' },
      { name: 'start_date' },
      { name: 'end_date' },
      { name: 'sort_order' },
      { name: 'created_at' },
      { name: 'updated_at' },
    ]);
  });
});

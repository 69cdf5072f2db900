import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { runMigrations } from '../db/migrate.js';
import * as schema from '../db/schema.js';
import * as projectService from './projectService.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';

describe('Project Service', () => {
  let sqlite: Database.Database;
  let db: BetterSQLite3Database<typeof schema>;

  function createTestDb() {
    const sqliteDb = new Database(':memory:');
    sqliteDb.pragma('foreign_keys = ON');
    runMigrations(sqliteDb);
    return { sqlite: sqliteDb, db: drizzle(sqliteDb, { schema }) };
  }

  function insertTask(projectId: string, id: string): void {
    const now = new Date().toISOString();
    db.insert(schema.tasks)
      .values({ id, projectId, name: id, duration: 1, createdAt: now, updatedAt: now })
      .run();
  }

  beforeEach(() => {
    const testDb = createTestDb();
    sqlite = testDb.sqlite;
    db = testDb.db;
  });

  afterEach(() => {
    sqlite.close();
  });

  // ─── createProject ──────────────────────────────────────────────────────────

  describe('createProject', () => {
    it('creates a project with a trimmed name', () => {
      const project = projectService.createProject(db, {
        name: '  Office move  ',
        startDate: '2024-03-04',
      });

      expect(project.id).toBeDefined();
      expect(project.name).toBe('Office move');
      expect(project.startDate).toBe('2024-03-04');
      expect(project.createdAt).toBe(project.updatedAt);
    });

    it('rejects a blank name', () => {
      expect(() => projectService.createProject(db, { name: '   ', startDate: '2024-03-04' })).toThrow(
        ValidationError,
      );
    });

    it('rejects a start date that is not a calendar date', () => {
      expect(() =>
        projectService.createProject(db, { name: 'Office move', startDate: '2024-02-30' }),
      ).toThrow(ValidationError);
    });
  });

  // ─── getProject / listProjects ──────────────────────────────────────────────

  describe('getProject', () => {
    it('returns a stored project', () => {
      const created = projectService.createProject(db, { name: 'A', startDate: '2024-01-01' });
      expect(projectService.getProject(db, created.id)).toEqual(created);
    });

    it('throws NotFoundError for an unknown ID', () => {
      expect(() => projectService.getProject(db, 'missing')).toThrow(NotFoundError);
    });
  });

  describe('listProjects', () => {
    it('returns an empty list when there are no projects', () => {
      expect(projectService.listProjects(db)).toEqual([]);
    });

    it('counts the tasks of each project', () => {
      const a = projectService.createProject(db, { name: 'A', startDate: '2024-01-01' });
      const b = projectService.createProject(db, { name: 'B', startDate: '2024-01-01' });
      insertTask(a.id, 'a1');
      insertTask(a.id, 'a2');

      const counts = Object.fromEntries(
        projectService.listProjects(db).map((project) => [project.name, project.taskCount]),
      );

      expect(counts).toEqual({ A: 2, B: 0 });
      expect(b.id).toBeDefined();
    });
  });

  // ─── deleteProject ──────────────────────────────────────────────────────────

  describe('deleteProject', () => {
    it('deletes the project and its tasks', () => {
      const project = projectService.createProject(db, { name: 'A', startDate: '2024-01-01' });
      insertTask(project.id, 't1');

      projectService.deleteProject(db, project.id);

      expect(() => projectService.getProject(db, project.id)).toThrow(NotFoundError);
      expect(db.select().from(schema.tasks).all()).toEqual([]);
    });

    it('throws NotFoundError for an unknown ID', () => {
      expect(() => projectService.deleteProject(db, 'missing')).toThrow(NotFoundError);
    });
  });
});

/**
 * Tests for schema creation and legacy upgrades on SQLite
 */

import { z } from 'zod';
import { SQLiteConnection } from '../../src/main/database/connection';
import { SchemaManager } from '../../src/main/database/migrations';
import { assertIdentifier } from '../../src/main/database/schema';
import { SchemaConflictError } from '../../src/shared/errors';

describe('SchemaManager', () => {
  let driver: SQLiteConnection;
  let manager: SchemaManager;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    driver = new SQLiteConnection({ engine: 'sqlite', databasePath: ':memory:', enableWAL: false });
    await driver.connect();
    manager = new SchemaManager(driver);
  });

  afterEach(async () => {
    await driver.close();
    jest.restoreAllMocks();
  });

  async function indexNames(): Promise<string[]> {
    const rows = await driver.query(
      `SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_%' ORDER BY name`
    );
    return z.array(z.object({ name: z.string() })).parse(rows).map((row) => row.name);
  }

  it('should create every table on an empty database', async () => {
    const report = await manager.ensureSchema();

    expect(report.dialect).toBe('sqlite');
    expect(report.createdTables).toEqual(['users', 'lessons', 'categories', 'vocabulary']);
    expect(report.addedColumns).toEqual([]);
    expect(report.renamedColumns).toEqual([]);
    expect(report.ownership.map((result) => result.status)).toEqual(['skipped', 'skipped']);
    expect(report.warnings).toEqual([]);
    expect(await indexNames()).toEqual([
      'idx_categories_user_id',
      'idx_lessons_user_id',
      'idx_users_is_admin',
      'idx_users_is_tracked',
      'idx_vocabulary_category_id',
      'idx_vocabulary_lesson_id',
      'idx_vocabulary_stats',
      'idx_vocabulary_user_id'
    ]);
  });

  it('should be idempotent', async () => {
    await manager.ensureSchema();
    await driver.execute(`INSERT INTO users (user_id) VALUES (1)`);

    const second = await manager.ensureSchema();

    expect(second.createdTables).toEqual([]);
    expect(second.addedColumns).toEqual([]);
    expect(await driver.query('SELECT user_id FROM users')).toEqual([{ user_id: 1 }]);
  });

  it('should rename legacy vocabulary columns and add reference columns', async () => {
    await driver.execute(`
      CREATE TABLE vocabulary (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        greek TEXT NOT NULL,
        russian TEXT NOT NULL,
        successful INTEGER DEFAULT 0,
        unsuccessful INTEGER DEFAULT 0,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(user_id, greek, russian)
      )
    `);
    await driver.execute(
      `INSERT INTO vocabulary (user_id, greek, russian, successful) VALUES (?, ?, ?, ?)`,
      [7, 'καλημέρα', 'доброе утро', 2]
    );

    const report = await manager.ensureSchema();

    expect(report.createdTables).toEqual(['users', 'lessons', 'categories']);
    expect(report.renamedColumns).toEqual([
      'vocabulary.greek -> source_text',
      'vocabulary.russian -> target_text',
      'vocabulary.successful -> success_count',
      'vocabulary.unsuccessful -> failure_count'
    ]);
    expect(report.addedColumns).toEqual(['vocabulary.lesson_id', 'vocabulary.category_id']);
    expect(await driver.query('SELECT source_text, target_text, success_count, lesson_id FROM vocabulary')).toEqual([
      { source_text: 'καλημέρα', target_text: 'доброе утро', success_count: 2, lesson_id: null }
    ]);
  });

  it('should move legacy lessons to the earliest admin', async () => {
    await driver.execute(`
      CREATE TABLE users (
        user_id INTEGER PRIMARY KEY,
        username TEXT,
        is_admin INTEGER DEFAULT 0,
        is_tracked INTEGER DEFAULT 0,
        added_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        notes TEXT
      )
    `);
    await driver.execute(`INSERT INTO users (user_id, is_admin) VALUES (42, 1)`);
    await driver.execute(`CREATE TABLE lessons (id INTEGER PRIMARY KEY AUTOINCREMENT, name TEXT NOT NULL UNIQUE)`);
    await driver.execute(`INSERT INTO lessons (name) VALUES ('Basics')`);

    const report = await manager.ensureSchema();

    expect(report.createdTables).toEqual(['categories', 'vocabulary']);
    expect(report.ownership[0]).toEqual({
      table: 'lessons',
      status: 'backfilled',
      fallbackOwnerId: 42,
      affectedRows: 1,
      detachedReferences: 0
    });
    expect(await driver.query('SELECT name, user_id FROM lessons')).toEqual([{ name: 'Basics', user_id: 42 }]);
    expect(await indexNames()).toContain('idx_lessons_user_id');
  });

  it('should refuse a vocabulary table without owners', async () => {
    await driver.execute(`
      CREATE TABLE vocabulary (
        id INTEGER PRIMARY KEY,
        source_text TEXT,
        target_text TEXT,
        success_count INTEGER,
        failure_count INTEGER,
        created_at TIMESTAMP
      )
    `);

    await expect(manager.ensureSchema()).rejects.toThrow(SchemaConflictError);
    await expect(manager.ensureSchema()).rejects.toThrow('Table vocabulary has no user_id column and cannot be upgraded in place');
  });

  it('should refuse a table that has both legacy and current names', async () => {
    await driver.execute(`
      CREATE TABLE vocabulary (
        id INTEGER PRIMARY KEY,
        user_id INTEGER NOT NULL,
        greek TEXT,
        source_text TEXT,
        target_text TEXT,
        success_count INTEGER,
        failure_count INTEGER,
        created_at TIMESTAMP
      )
    `);

    const error = await manager.ensureSchema().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SchemaConflictError);
    expect(error).toMatchObject({ code: 'SCHEMA_CONFLICT', recoverable: false });
  });
});

describe('assertIdentifier', () => {
  it('should accept plain identifiers and reject anything else', () => {
    expect(assertIdentifier('lessons_scoped')).toBe('lessons_scoped');
    expect(() => assertIdentifier('lessons; DROP TABLE users')).toThrow('Invalid SQL identifier');
  });
});

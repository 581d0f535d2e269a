/**
 * SQLite connection implementing the engine-neutral driver on better-sqlite3
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import type {
  ConstraintViolation,
  DialectDdl,
  SQLiteDatabaseConfig,
  SqlDriver,
  SqlExecutor,
  SqlValue
} from '../../shared/types/database.js';
import { APP_CONFIG, type GroupingTable } from '../../shared/constants/index.js';
import { driverErrorCode, errorMessage } from '../../shared/errors.js';
import { assertIdentifier, groupingTableSql } from './schema.js';

const SQLITE_CONSTRAINT_CODES: Record<string, ConstraintViolation> = {
  SQLITE_CONSTRAINT_UNIQUE: 'unique',
  SQLITE_CONSTRAINT_PRIMARYKEY: 'unique',
  SQLITE_CONSTRAINT_FOREIGNKEY: 'foreign_key',
  SQLITE_CONSTRAINT_NOTNULL: 'not_null',
  SQLITE_CONSTRAINT_CHECK: 'check'
};

// Built-in LOWER() only folds ASCII
const UNICODE_LOWER = 'unicode_lower';

export class SQLiteConnection implements SqlDriver {
  readonly dialect = 'sqlite' as const;
  readonly ddl: DialectDdl = {
    surrogateKey: 'INTEGER PRIMARY KEY AUTOINCREMENT',
    userIdType: 'INTEGER',
    timestampColumn: 'TIMESTAMP DEFAULT CURRENT_TIMESTAMP',
    caseFold: UNICODE_LOWER
  };

  private db: Database.Database | null = null;
  private config: SQLiteDatabaseConfig;
  // better-sqlite3 is synchronous and holds one connection, so async callers
  // are queued to keep transactions from interleaving
  private pending: Promise<void> = Promise.resolve();

  private readonly transactionExecutor: SqlExecutor = {
    query: async (sql, params = []) => this.runQuery(sql, params),
    execute: async (sql, params = []) => this.runExecute(sql, params)
  };

  constructor(config: SQLiteDatabaseConfig) {
    this.config = config;
  }

  /**
   * Open the database file and apply connection pragmas
   */
  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    try {
      const inMemory = this.config.databasePath === ':memory:';

      if (!inMemory) {
        const dataDir = path.dirname(this.config.databasePath);
        if (!fs.existsSync(dataDir)) {
          fs.mkdirSync(dataDir, { recursive: true });
        }
      }

      this.db = new Database(this.config.databasePath, {
        timeout: this.config.timeout ?? APP_CONFIG.DEFAULT_TIMEOUT_MS
      });

      if (this.config.enableWAL !== false && !inMemory) {
        this.db.pragma('journal_mode = WAL');
      }

      this.db.pragma('foreign_keys = ON');
      this.db.pragma('synchronous = NORMAL');
      this.db.function(UNICODE_LOWER, { deterministic: true }, (value: unknown) =>
        typeof value === 'string' ? value.toLowerCase() : value
      );
    } catch (error) {
      throw new Error(`Failed to connect to database: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    await this.pending;
    if (this.db) {
      try {
        this.db.close();
        this.db = null;
      } catch (error) {
        throw new Error(`Failed to close database: ${errorMessage(error)}`);
      }
    }
  }

  isConnected(): boolean {
    return this.db !== null;
  }

  query(sql: string, params: readonly SqlValue[] = []): Promise<unknown[]> {
    return this.serialize(async () => this.runQuery(sql, params));
  }

  execute(sql: string, params: readonly SqlValue[] = []): Promise<number> {
    return this.serialize(async () => this.runExecute(sql, params));
  }

  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.serialize(() => this.runTransaction(work));
  }

  /**
   * BEGIN IMMEDIATE takes the database-wide write lock, which covers `table`.
   * Foreign keys are switched off around the transaction so that rebuilding a
   * referenced table does not fire ON DELETE actions; they are verified before commit.
   */
  async exclusiveTransaction<T>(table: string, work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    assertIdentifier(table);

    return this.serialize(async () => {
      const db = this.getDatabase();
      db.pragma('foreign_keys = OFF');
      try {
        return await this.runTransaction(work, () => this.assertForeignKeys());
      } finally {
        db.pragma('foreign_keys = ON');
      }
    });
  }

  async tableExists(table: string, executor: SqlExecutor = this): Promise<boolean> {
    const rows = await executor.query(
      `SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?`,
      [table]
    );
    return rows.length > 0;
  }

  async columnExists(table: string, column: string, executor: SqlExecutor = this): Promise<boolean> {
    const rows = await executor.query(
      'SELECT name FROM pragma_table_info(?) WHERE name = ?',
      [table, column]
    );
    return rows.length > 0;
  }

  /**
   * SQLite cannot drop a table-level UNIQUE constraint or tighten a column,
   * so the table is rebuilt with the per-owner layout
   */
  async scopeUniqueNameToOwner(tx: SqlExecutor, table: GroupingTable): Promise<void> {
    const rebuilt = assertIdentifier(`${table}_scoped`);

    await tx.execute(`DROP TABLE IF EXISTS ${rebuilt}`);
    await tx.execute(groupingTableSql(this.ddl, rebuilt));
    await tx.execute(`
      INSERT INTO ${rebuilt} (id, name, user_id)
      SELECT id, name, user_id FROM ${table} WHERE user_id IS NOT NULL
    `);
    await tx.execute(`DROP TABLE ${table}`);
    await tx.execute(`ALTER TABLE ${rebuilt} RENAME TO ${table}`);
  }

  classifyError(error: unknown): ConstraintViolation | null {
    const code = driverErrorCode(error);
    return code ? SQLITE_CONSTRAINT_CODES[code] ?? null : null;
  }

  private getDatabase(): Database.Database {
    if (!this.db) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.db;
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const result = this.pending.then(task);
    this.pending = result.then(() => undefined, () => undefined);
    return result;
  }

  private async runTransaction<T>(work: (tx: SqlExecutor) => Promise<T>, beforeCommit?: () => void): Promise<T> {
    const db = this.getDatabase();
    db.exec('BEGIN IMMEDIATE');

    try {
      const result = await work(this.transactionExecutor);
      beforeCommit?.();
      db.exec('COMMIT');
      return result;
    } catch (error) {
      if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      throw error;
    }
  }

  private runQuery(sql: string, params: readonly SqlValue[]): unknown[] {
    const statement = this.getDatabase().prepare(sql);

    if (statement.reader) {
      return statement.all(...params);
    }

    statement.run(...params);
    return [];
  }

  private runExecute(sql: string, params: readonly SqlValue[]): number {
    return this.getDatabase().prepare(sql).run(...params).changes;
  }

  private assertForeignKeys(): void {
    const violations = this.getDatabase().pragma('foreign_key_check');
    if (Array.isArray(violations) && violations.length > 0) {
      throw new Error(`Foreign key check failed for ${violations.length} row(s)`);
    }
  }
}

/**
 * PostgreSQL connection implementing the engine-neutral driver on node-postgres
 */

import { Pool } from 'pg';
import type {
  ConstraintViolation,
  DialectDdl,
  PostgresDatabaseConfig,
  SqlDriver,
  SqlExecutor,
  SqlValue
} from '../../shared/types/database.js';
import { APP_CONFIG, TABLES, type GroupingTable } from '../../shared/constants/index.js';
import { driverErrorCode, errorMessage } from '../../shared/errors.js';
import { assertIdentifier } from './schema.js';

export interface PgQueryResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
}

export interface PgPoolClient extends PgQueryable {
  release(err?: Error | boolean): void;
}

/**
 * The part of `pg.Pool` this driver relies on
 */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgPoolClient>;
  end(): Promise<void>;
}

export type PgPoolFactory = (config: PostgresDatabaseConfig) => PgPool;

const POSTGRES_CONSTRAINT_CODES: Record<string, ConstraintViolation> = {
  '23505': 'unique',
  '23503': 'foreign_key',
  '23502': 'not_null',
  '23514': 'check'
};

export function createPgPool(config: PostgresDatabaseConfig): PgPool {
  return new Pool({
    connectionString: config.connectionString,
    max: config.maxConnections ?? APP_CONFIG.DEFAULT_POOL_SIZE,
    connectionTimeoutMillis: config.timeout ?? APP_CONFIG.DEFAULT_TIMEOUT_MS
  });
}

/**
 * Rewrite `?` placeholders to `$1, $2, ...`, leaving quoted text alone
 */
export function toPostgresPlaceholders(sql: string): string {
  let index = 0;
  let inLiteral = false;
  let result = '';

  for (const char of sql) {
    if (char === "'") {
      inLiteral = !inLiteral;
    }
    if (char === '?' && !inLiteral) {
      index += 1;
      result += `$${index}`;
    } else {
      result += char;
    }
  }

  return result;
}

function clientExecutor(client: PgQueryable): SqlExecutor {
  return {
    query: async (sql, params = []) => {
      const { rows } = await client.query(toPostgresPlaceholders(sql), [...params]);
      return rows;
    },
    execute: async (sql, params = []) => {
      const { rowCount } = await client.query(toPostgresPlaceholders(sql), [...params]);
      return rowCount ?? 0;
    }
  };
}

export class PostgresConnection implements SqlDriver {
  readonly dialect = 'postgres' as const;
  readonly ddl: DialectDdl = {
    surrogateKey: 'SERIAL PRIMARY KEY',
    userIdType: 'BIGINT',
    timestampColumn: 'TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP',
    caseFold: 'LOWER'
  };

  private pool: PgPool | null = null;
  private readonly config: PostgresDatabaseConfig;
  private readonly poolFactory: PgPoolFactory;

  constructor(config: PostgresDatabaseConfig, poolFactory: PgPoolFactory = createPgPool) {
    this.config = config;
    this.poolFactory = poolFactory;
  }

  async connect(): Promise<void> {
    if (this.pool) {
      return;
    }

    const pool = this.poolFactory(this.config);
    try {
      await pool.query('SELECT 1');
      this.pool = pool;
    } catch (error) {
      await pool.end();
      throw new Error(`Failed to connect to database: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      const pool = this.pool;
      this.pool = null;
      await pool.end();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<unknown[]> {
    return clientExecutor(this.getPool()).query(sql, params);
  }

  async execute(sql: string, params: readonly SqlValue[] = []): Promise<number> {
    return clientExecutor(this.getPool()).execute(sql, params);
  }

  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return this.withTransaction(work);
  }

  async exclusiveTransaction<T>(table: string, work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const lockedTable = assertIdentifier(table);
    return this.withTransaction(async (tx) => {
      await tx.execute(`LOCK TABLE ${lockedTable} IN ACCESS EXCLUSIVE MODE`);
      return work(tx);
    });
  }

  async tableExists(table: string, executor: SqlExecutor = this): Promise<boolean> {
    const rows = await executor.query(
      `SELECT 1 FROM information_schema.tables
       WHERE table_schema = current_schema() AND table_name = ?`,
      [table]
    );
    return rows.length > 0;
  }

  async columnExists(table: string, column: string, executor: SqlExecutor = this): Promise<boolean> {
    const rows = await executor.query(
      `SELECT 1 FROM information_schema.columns
       WHERE table_schema = current_schema() AND table_name = ? AND column_name = ?`,
      [table, column]
    );
    return rows.length > 0;
  }

  async scopeUniqueNameToOwner(tx: SqlExecutor, table: GroupingTable): Promise<void> {
    const name = assertIdentifier(table);

    await tx.execute(`ALTER TABLE ${name} ALTER COLUMN user_id SET NOT NULL`);
    await tx.execute(`ALTER TABLE ${name} DROP CONSTRAINT IF EXISTS ${name}_name_key`);
    await tx.execute(`CREATE UNIQUE INDEX IF NOT EXISTS ${name}_user_id_name_key ON ${name}(user_id, name)`);
    await tx.execute(
      `ALTER TABLE ${name} ADD CONSTRAINT ${name}_user_id_fkey
       FOREIGN KEY (user_id) REFERENCES ${TABLES.USERS}(user_id)`
    );
  }

  classifyError(error: unknown): ConstraintViolation | null {
    const code = driverErrorCode(error);
    return code ? POSTGRES_CONSTRAINT_CODES[code] ?? null : null;
  }

  private getPool(): PgPool {
    if (!this.pool) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.pool;
  }

  private async withTransaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.getPool().connect();
    const tx = clientExecutor(client);
    let brokenClient = false;

    try {
      await client.query('BEGIN');
      const result = await work(tx);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('[PostgresConnection] Rollback failed, discarding client:', errorMessage(rollbackError));
        brokenClient = true;
      }
      throw error;
    } finally {
      client.release(brokenClient);
    }
  }
}

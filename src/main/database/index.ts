/**
 * Database layer exports
 */

export { SQLiteConnection } from './connection.js';
export {
  PostgresConnection,
  createPgPool,
  toPostgresPlaceholders,
  type PgPool,
  type PgPoolClient,
  type PgPoolFactory,
  type PgQueryResult
} from './postgres-connection.js';
export { SchemaManager } from './migrations.js';
export { OwnershipMigration } from './ownership-migration.js';
export { VocabularyDatabaseLayer } from './database-layer.js';
export { createDatabase, createDriver, createTestDatabase } from './factory.js';

// Re-export types for convenience
export type {
  DatabaseConfig,
  SchemaReport,
  SqlDriver,
  SqlExecutor,
  VocabularyStore
} from '../../shared/types/database.js';

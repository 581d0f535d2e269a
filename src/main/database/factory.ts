/**
 * Database factory for creating configured store instances
 */

import path from 'path';
import { VocabularyDatabaseLayer } from './database-layer.js';
import { SQLiteConnection } from './connection.js';
import { PostgresConnection, type PgPoolFactory } from './postgres-connection.js';
import type { DatabaseConfig, SqlDriver } from '../../shared/types/database.js';
import { APP_CONFIG } from '../../shared/constants/index.js';

export function createDriver(config: DatabaseConfig, poolFactory?: PgPoolFactory): SqlDriver {
  switch (config.engine) {
    case 'postgres':
      return new PostgresConnection(config, poolFactory);
    case 'sqlite':
      return new SQLiteConnection(config);
  }
}

/**
 * Create a store; defaults to a SQLite file under the data directory
 */
export function createDatabase(config?: DatabaseConfig): VocabularyDatabaseLayer {
  const resolved: DatabaseConfig = config ?? {
    engine: 'sqlite',
    databasePath: path.join(APP_CONFIG.DATA_DIRECTORY, APP_CONFIG.DATABASE_NAME),
    enableWAL: true,
    timeout: APP_CONFIG.DEFAULT_TIMEOUT_MS
  };

  return new VocabularyDatabaseLayer(createDriver(resolved));
}

/**
 * Create a test database instance (in-memory)
 */
export function createTestDatabase(): VocabularyDatabaseLayer {
  return new VocabularyDatabaseLayer(new SQLiteConnection({
    engine: 'sqlite',
    databasePath: ':memory:',
    enableWAL: false,
    timeout: 1000
  }));
}

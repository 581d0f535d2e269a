/**
 * Environment-driven database configuration
 */

import path from 'path';
import { z } from 'zod';
import type { DatabaseConfig } from '../shared/types/database.js';
import { APP_CONFIG } from '../shared/constants/index.js';
import { InvalidInputError } from '../shared/errors.js';
import { describeIssues } from '../shared/validation.js';

const booleanFlag = z.enum(['1', '0', 'true', 'false', 'on', 'off'])
  .transform((value) => value === '1' || value === 'true' || value === 'on');

const EnvironmentSchema = z.object({
  DATABASE_URL: z.string().trim().min(1).optional(),
  SQLITE_PATH: z.string().trim().min(1).default(path.join(APP_CONFIG.DATA_DIRECTORY, APP_CONFIG.DATABASE_NAME)),
  DATABASE_TIMEOUT_MS: z.coerce.number().int().positive().default(APP_CONFIG.DEFAULT_TIMEOUT_MS),
  PG_POOL_MAX: z.coerce.number().int().positive().max(100).default(APP_CONFIG.DEFAULT_POOL_SIZE),
  SQLITE_WAL: booleanFlag.default('1')
});

/**
 * PostgreSQL when DATABASE_URL is set, SQLite otherwise
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = EnvironmentSchema.safeParse(withoutEmptyValues(env));
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid environment: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }

  const settings = parsed.data;

  if (settings.DATABASE_URL) {
    return {
      engine: 'postgres',
      connectionString: settings.DATABASE_URL,
      maxConnections: settings.PG_POOL_MAX,
      timeout: settings.DATABASE_TIMEOUT_MS
    };
  }

  return {
    engine: 'sqlite',
    databasePath: settings.SQLITE_PATH,
    enableWAL: settings.SQLITE_WAL,
    timeout: settings.DATABASE_TIMEOUT_MS
  };
}

/**
 * Blank variables behave as unset
 */
function withoutEmptyValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Connection string with the password masked, for logs
 */
export function describeDatabase(config: DatabaseConfig): string {
  if (config.engine === 'sqlite') {
    return `sqlite:${config.databasePath}`;
  }
  return config.connectionString.replace(/\/\/([^:/@]+):[^@]*@/, '//$1:***@');
}

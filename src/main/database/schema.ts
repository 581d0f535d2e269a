/**
 * Table, index and legacy-column definitions shared by both engines
 */

import type { DialectDdl } from '../../shared/types/database.js';
import { TABLES } from '../../shared/constants/index.js';

export function usersTableSql(ddl: DialectDdl): string {
  return `CREATE TABLE IF NOT EXISTS ${TABLES.USERS} (
    user_id ${ddl.userIdType} PRIMARY KEY,
    username TEXT,
    is_admin INTEGER NOT NULL DEFAULT 0,
    is_tracked INTEGER NOT NULL DEFAULT 0,
    added_at ${ddl.timestampColumn},
    notes TEXT
  )`;
}

/**
 * Lessons and categories share one layout. `tableName` differs from the
 * logical table while SQLite rebuilds a legacy table.
 */
export function groupingTableSql(ddl: DialectDdl, tableName: string): string {
  return `CREATE TABLE IF NOT EXISTS ${tableName} (
    id ${ddl.surrogateKey},
    name TEXT NOT NULL,
    user_id ${ddl.userIdType} NOT NULL REFERENCES ${TABLES.USERS}(user_id),
    UNIQUE (user_id, name)
  )`;
}

export function vocabularyTableSql(ddl: DialectDdl): string {
  return `CREATE TABLE IF NOT EXISTS ${TABLES.VOCABULARY} (
    id ${ddl.surrogateKey},
    user_id ${ddl.userIdType} NOT NULL REFERENCES ${TABLES.USERS}(user_id),
    source_text TEXT NOT NULL,
    target_text TEXT NOT NULL,
    success_count INTEGER NOT NULL DEFAULT 0 CHECK (success_count >= 0),
    failure_count INTEGER NOT NULL DEFAULT 0 CHECK (failure_count >= 0),
    ${referenceColumnSql('lesson_id')},
    ${referenceColumnSql('category_id')},
    created_at ${ddl.timestampColumn},
    UNIQUE (user_id, source_text, target_text)
  )`;
}

const REFERENCED_TABLES = {
  lesson_id: TABLES.LESSONS,
  category_id: TABLES.CATEGORIES
} as const;

export type VocabularyReferenceColumn = keyof typeof REFERENCED_TABLES;

/**
 * Column definition for a vocabulary reference; also valid after ADD COLUMN on both engines
 */
export function referenceColumnSql(column: VocabularyReferenceColumn): string {
  return `${column} INTEGER REFERENCES ${REFERENCED_TABLES[column]}(id) ON DELETE SET NULL`;
}

export interface IndexDefinition {
  name: string;
  table: string;
  columns: string[];
}

export const INDEXES: IndexDefinition[] = [
  { name: 'idx_vocabulary_user_id', table: TABLES.VOCABULARY, columns: ['user_id'] },
  { name: 'idx_vocabulary_stats', table: TABLES.VOCABULARY, columns: ['user_id', 'success_count', 'failure_count'] },
  { name: 'idx_vocabulary_lesson_id', table: TABLES.VOCABULARY, columns: ['lesson_id'] },
  { name: 'idx_vocabulary_category_id', table: TABLES.VOCABULARY, columns: ['category_id'] },
  { name: 'idx_lessons_user_id', table: TABLES.LESSONS, columns: ['user_id'] },
  { name: 'idx_categories_user_id', table: TABLES.CATEGORIES, columns: ['user_id'] },
  { name: 'idx_users_is_admin', table: TABLES.USERS, columns: ['is_admin'] },
  { name: 'idx_users_is_tracked', table: TABLES.USERS, columns: ['is_tracked'] }
];

export function indexSql(index: IndexDefinition): string {
  return `CREATE INDEX IF NOT EXISTS ${index.name} ON ${index.table}(${index.columns.join(', ')})`;
}

/**
 * Column names used by the single-language predecessor of this schema
 */
export const LEGACY_VOCABULARY_COLUMNS = [
  { legacy: 'greek', current: 'source_text' },
  { legacy: 'russian', current: 'target_text' },
  { legacy: 'successful', current: 'success_count' },
  { legacy: 'unsuccessful', current: 'failure_count' }
] as const;

const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/;

/**
 * Table and column names are interpolated into DDL, so only plain identifiers pass
 */
export function assertIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid SQL identifier: ${name}`);
  }
  return name;
}

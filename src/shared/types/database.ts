/**
 * Database layer interfaces and types
 */

import type {
  BatchAddResult,
  Category,
  CreateUserRequest,
  CreateVocabularyEntryRequest,
  Lesson,
  OwnerStatistics,
  TrainingScope,
  User,
  VocabularyEntry,
  VocabularyExportRow,
  VocabularyFilters,
  VocabularyPair
} from './core.js';
import type { GroupingTable } from '../constants/index.js';
import type { MigrationIncompleteError } from '../errors.js';

export type SqlDialect = 'sqlite' | 'postgres';

// Booleans are stored as 0/1 on both engines
export type SqlValue = string | number | null;

export type ConstraintViolation = 'unique' | 'foreign_key' | 'not_null' | 'check';

export interface SqlExecutor {
  /**
   * Run a statement and return its rows (empty for statements without RETURNING).
   * Parameters use `?` placeholders on every engine.
   */
  query(sql: string, params?: readonly SqlValue[]): Promise<unknown[]>;
  /**
   * Run a statement and return the number of affected rows
   */
  execute(sql: string, params?: readonly SqlValue[]): Promise<number>;
}

/**
 * Engine-specific fragments used when building CREATE TABLE statements
 */
export interface DialectDdl {
  surrogateKey: string;
  userIdType: string;
  timestampColumn: string;
  /** SQL function that lowercases text the same way `String.prototype.toLowerCase` does */
  caseFold: string;
}

export interface SqlDriver extends SqlExecutor {
  readonly dialect: SqlDialect;
  readonly ddl: DialectDdl;

  connect(): Promise<void>;
  close(): Promise<void>;
  isConnected(): boolean;

  /**
   * Run `work` in one transaction; statements must go through `tx`.
   * Rolls back when `work` rejects.
   */
  transaction<T>(work: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  /**
   * Transaction that keeps every other writer away from `table` until it ends.
   * Used for structural changes that rewrite existing rows.
   */
  exclusiveTransaction<T>(table: string, work: (tx: SqlExecutor) => Promise<T>): Promise<T>;

  tableExists(table: string, executor?: SqlExecutor): Promise<boolean>;
  columnExists(table: string, column: string, executor?: SqlExecutor): Promise<boolean>;

  /**
   * Make `user_id` required on a grouping table and replace the global
   * `UNIQUE(name)` with `UNIQUE(user_id, name)`. Runs inside `exclusiveTransaction`.
   */
  scopeUniqueNameToOwner(tx: SqlExecutor, table: GroupingTable): Promise<void>;

  classifyError(error: unknown): ConstraintViolation | null;
}

export type OwnershipMigrationStatus = 'skipped' | 'backfilled' | 'purged' | 'failed';

export interface OwnershipMigrationResult {
  table: GroupingTable;
  status: OwnershipMigrationStatus;
  fallbackOwnerId: number | null;
  affectedRows: number;
  detachedReferences: number;
  warning?: MigrationIncompleteError;
}

export interface SchemaReport {
  dialect: SqlDialect;
  createdTables: string[];
  addedColumns: string[];
  renamedColumns: string[];
  ownership: OwnershipMigrationResult[];
  warnings: MigrationIncompleteError[];
}

export interface VocabularyStore {
  // Users
  createUser(request: CreateUserRequest): Promise<User>;
  ensureUser(userId: number, username?: string): Promise<User>;
  upsertUser(request: CreateUserRequest): Promise<User>;
  getUser(userId: number): Promise<User | null>;
  setAdmin(userId: number, isAdmin: boolean): Promise<void>;
  setTracked(userId: number, isTracked: boolean): Promise<void>;
  listTrackedUsers(): Promise<User[]>;

  // Lessons and categories
  getOrCreateLesson(ownerId: number, name: string): Promise<Lesson>;
  getOrCreateCategory(ownerId: number, name: string): Promise<Category>;
  listLessons(ownerId: number): Promise<Lesson[]>;
  listCategories(ownerId: number): Promise<Category[]>;
  deleteLesson(ownerId: number, lessonId: number): Promise<void>;
  deleteCategory(ownerId: number, categoryId: number): Promise<void>;

  // Vocabulary
  addVocabularyEntry(ownerId: number, request: CreateVocabularyEntryRequest): Promise<VocabularyEntry>;
  addVocabularyBatch(ownerId: number, pairs: VocabularyPair[], scope?: TrainingScope): Promise<BatchAddResult>;
  listVocabulary(ownerId: number, filters?: VocabularyFilters): Promise<VocabularyEntry[]>;
  getVocabularyEntry(ownerId: number, entryId: number): Promise<VocabularyEntry | null>;
  countVocabulary(ownerId: number): Promise<number>;

  // Statistics
  recordOutcome(ownerId: number, entryId: number, success: boolean): Promise<VocabularyEntry>;
  resetStatistics(ownerId: number): Promise<number>;
  getStatistics(ownerId: number): Promise<OwnerStatistics>;
  exportVocabulary(ownerId: number): Promise<VocabularyExportRow[]>;

  // Database lifecycle
  initialize(): Promise<SchemaReport>;
  close(): Promise<void>;
}

export interface SQLiteDatabaseConfig {
  engine: 'sqlite';
  databasePath: string;
  enableWAL?: boolean;
  timeout?: number;
}

export interface PostgresDatabaseConfig {
  engine: 'postgres';
  connectionString: string;
  maxConnections?: number;
  timeout?: number;
}

export type DatabaseConfig = SQLiteDatabaseConfig | PostgresDatabaseConfig;

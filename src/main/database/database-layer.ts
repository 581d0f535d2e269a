/**
 * Vocabulary store implementation shared by the SQLite and PostgreSQL drivers
 */

import type {
  BatchAddResult,
  Category,
  CreateUserRequest,
  CreateVocabularyEntryRequest,
  Grouping,
  GroupingKind,
  Lesson,
  OwnerStatistics,
  TrainingScope,
  User,
  VocabularyEntry,
  VocabularyExportRow,
  VocabularyFilters,
  VocabularyPair
} from '../../shared/types/core.js';
import type {
  ConstraintViolation,
  SchemaReport,
  SqlDriver,
  SqlExecutor,
  SqlValue,
  VocabularyStore
} from '../../shared/types/database.js';
import { APP_CONFIG, GROUPING_REFERENCE_COLUMNS, TABLES, type GroupingTable } from '../../shared/constants/index.js';
import {
  DuplicateEntryError,
  InvalidInputError,
  InvalidReferenceError,
  NotFoundError,
  errorMessage,
  isStoreError
} from '../../shared/errors.js';
import {
  CreateUserSchema,
  CreateVocabularyEntrySchema,
  GroupingNameSchema,
  RecordIdSchema,
  TrainingScopeSchema,
  UserIdSchema,
  VocabularyFiltersSchema,
  VocabularyPairSchema,
  describeIssues,
  validate
} from '../../shared/validation.js';
import {
  CountRowSchema,
  ExportRowSchema,
  GroupingRowSchema,
  IdRowSchema,
  StatisticsRowSchema,
  UserIdRowSchema,
  UserRowSchema,
  VocabularyRowSchema,
  parseFirst,
  parseRows
} from './rows.js';
import { SchemaManager } from './migrations.js';

type ViolationMessages = Partial<Record<ConstraintViolation, string>>;

const GROUPING_TABLES: Record<GroupingKind, GroupingTable> = {
  lesson: TABLES.LESSONS,
  category: TABLES.CATEGORIES
};

const GROUPING_LABELS: Record<GroupingKind, string> = {
  lesson: 'Lesson',
  category: 'Category'
};

const VOCABULARY_COLUMNS = 'id, user_id, source_text, target_text, success_count, failure_count, lesson_id, category_id, created_at';

export class VocabularyDatabaseLayer implements VocabularyStore {
  private driver: SqlDriver;

  constructor(driver: SqlDriver) {
    this.driver = driver;
  }

  /**
   * Connect and bring the schema up to date
   */
  async initialize(): Promise<SchemaReport> {
    try {
      await this.driver.connect();
      const report = await new SchemaManager(this.driver).ensureSchema();
      console.log('Database initialized successfully');
      return report;
    } catch (error) {
      if (isStoreError(error)) {
        throw error;
      }
      throw new Error(`Failed to initialize database: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  // User management

  async createUser(request: CreateUserRequest): Promise<User> {
    const user = validate(CreateUserSchema, request, 'user');

    return this.run('create user', async () => {
      const rows = await this.driver.query(
        `INSERT INTO ${TABLES.USERS} (user_id, username, is_admin, is_tracked, notes)
         VALUES (?, ?, ?, ?, ?)
         RETURNING *`,
        [user.userId, user.username ?? null, toFlag(user.isAdmin), toFlag(user.isTracked), user.notes ?? null]
      );
      return this.requireUser(parseFirst(UserRowSchema, rows), user.userId);
    }, { unique: `User ${user.userId} already exists` });
  }

  /**
   * Register a user on first contact; existing users are returned unchanged
   */
  async ensureUser(userId: number, username?: string): Promise<User> {
    const id = validate(UserIdSchema, userId, 'user id');

    return this.run('ensure user', async () => {
      await this.driver.execute(
        `INSERT INTO ${TABLES.USERS} (user_id, username) VALUES (?, ?)
         ON CONFLICT (user_id) DO NOTHING`,
        [id, username ?? null]
      );
      return this.requireUser(await this.findUser(this.driver, id), id);
    });
  }

  /**
   * Insert or update a user. Missing username and notes keep their stored
   * values; admin and tracked flags are only ever raised here.
   */
  async upsertUser(request: CreateUserRequest): Promise<User> {
    const user = validate(CreateUserSchema, request, 'user');

    return this.run('upsert user', async () => {
      const rows = await this.driver.query(
        `INSERT INTO ${TABLES.USERS} (user_id, username, is_admin, is_tracked, notes)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT (user_id) DO UPDATE SET
           username = COALESCE(excluded.username, ${TABLES.USERS}.username),
           notes = COALESCE(excluded.notes, ${TABLES.USERS}.notes),
           is_admin = CASE WHEN excluded.is_admin = 1 THEN 1 ELSE ${TABLES.USERS}.is_admin END,
           is_tracked = CASE WHEN excluded.is_tracked = 1 THEN 1 ELSE ${TABLES.USERS}.is_tracked END
         RETURNING *`,
        [user.userId, user.username ?? null, toFlag(user.isAdmin), toFlag(user.isTracked), user.notes ?? null]
      );
      return this.requireUser(parseFirst(UserRowSchema, rows), user.userId);
    });
  }

  async getUser(userId: number): Promise<User | null> {
    const id = validate(UserIdSchema, userId, 'user id');
    return this.run('get user', () => this.findUser(this.driver, id));
  }

  async setAdmin(userId: number, isAdmin: boolean): Promise<void> {
    await this.setUserFlag(userId, 'is_admin', isAdmin);
  }

  async setTracked(userId: number, isTracked: boolean): Promise<void> {
    await this.setUserFlag(userId, 'is_tracked', isTracked);
  }

  async listTrackedUsers(): Promise<User[]> {
    return this.run('list tracked users', async () => {
      const rows = await this.driver.query(
        `SELECT * FROM ${TABLES.USERS} WHERE is_tracked = 1 ORDER BY added_at, user_id`
      );
      return parseRows(UserRowSchema, rows);
    });
  }

  // Lessons and categories

  async getOrCreateLesson(ownerId: number, name: string): Promise<Lesson> {
    return this.getOrCreateGrouping('lesson', ownerId, name);
  }

  async getOrCreateCategory(ownerId: number, name: string): Promise<Category> {
    return this.getOrCreateGrouping('category', ownerId, name);
  }

  async listLessons(ownerId: number): Promise<Lesson[]> {
    return this.listGroupings('lesson', ownerId);
  }

  async listCategories(ownerId: number): Promise<Category[]> {
    return this.listGroupings('category', ownerId);
  }

  async deleteLesson(ownerId: number, lessonId: number): Promise<void> {
    await this.deleteGrouping('lesson', ownerId, lessonId);
  }

  async deleteCategory(ownerId: number, categoryId: number): Promise<void> {
    await this.deleteGrouping('category', ownerId, categoryId);
  }

  // Vocabulary

  async addVocabularyEntry(ownerId: number, request: CreateVocabularyEntryRequest): Promise<VocabularyEntry> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const entry = validate(CreateVocabularyEntrySchema, request, 'vocabulary entry');

    return this.run('add vocabulary entry', () => this.driver.transaction(async (tx) => {
      await this.assertScopeOwnedBy(tx, owner, entry);

      const rows = await tx.query(
        `INSERT INTO ${TABLES.VOCABULARY} (user_id, source_text, target_text, lesson_id, category_id)
         VALUES (?, ?, ?, ?, ?)
         RETURNING ${VOCABULARY_COLUMNS}`,
        [owner, entry.sourceText, entry.targetText, entry.lessonId ?? null, entry.categoryId ?? null]
      );

      const created = parseFirst(VocabularyRowSchema, rows);
      if (!created) {
        throw new Error('Insert returned no row');
      }
      return created;
    }), {
      unique: `"${entry.sourceText}" - "${entry.targetText}" is already in the vocabulary`,
      foreign_key: `User ${owner} does not exist`
    });
  }

  /**
   * Add many pairs in one transaction. Pairs already stored are skipped;
   * invalid pairs are reported in `errors` and do not abort the batch.
   */
  async addVocabularyBatch(ownerId: number, pairs: VocabularyPair[], scope: TrainingScope = {}): Promise<BatchAddResult> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const validScope = validate(TrainingScopeSchema, scope, 'training scope');

    if (pairs.length > APP_CONFIG.MAX_PAIRS_PER_BATCH) {
      throw new InvalidInputError(`Too many pairs: ${pairs.length} (maximum ${APP_CONFIG.MAX_PAIRS_PER_BATCH})`);
    }

    const result: BatchAddResult = { added: 0, skipped: 0, errors: [] };
    const accepted: VocabularyPair[] = [];

    pairs.forEach((pair, index) => {
      const parsed = VocabularyPairSchema.safeParse(pair);
      if (parsed.success) {
        accepted.push(parsed.data);
      } else {
        result.errors.push(`Pair ${index + 1}: ${describeIssues(parsed.error)}`);
      }
    });

    if (accepted.length === 0) {
      return result;
    }

    return this.run('add vocabulary batch', () => this.driver.transaction(async (tx) => {
      await this.assertScopeOwnedBy(tx, owner, validScope);

      for (const pair of accepted) {
        const rows = await tx.query(
          `INSERT INTO ${TABLES.VOCABULARY} (user_id, source_text, target_text, lesson_id, category_id)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT (user_id, source_text, target_text) DO NOTHING
           RETURNING id`,
          [owner, pair.sourceText, pair.targetText, validScope.lessonId ?? null, validScope.categoryId ?? null]
        );
        if (parseFirst(IdRowSchema, rows)) {
          result.added += 1;
        } else {
          result.skipped += 1;
        }
      }

      return result;
    }), { foreign_key: `User ${owner} does not exist` });
  }

  async listVocabulary(ownerId: number, filters: VocabularyFilters = {}): Promise<VocabularyEntry[]> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const validFilters = validate(VocabularyFiltersSchema, filters, 'vocabulary filters');

    const conditions = ['user_id = ?'];
    const params: SqlValue[] = [owner];

    if (validFilters.lessonId !== undefined) {
      conditions.push('lesson_id = ?');
      params.push(validFilters.lessonId);
    }

    if (validFilters.categoryId !== undefined) {
      conditions.push('category_id = ?');
      params.push(validFilters.categoryId);
    }

    if (validFilters.search) {
      const pattern = `%${escapeLikePattern(validFilters.search.toLowerCase())}%`;
      const fold = this.driver.ddl.caseFold;
      conditions.push(`(${fold}(source_text) LIKE ? ESCAPE '\\' OR ${fold}(target_text) LIKE ? ESCAPE '\\')`);
      params.push(pattern, pattern);
    }

    let sql = `SELECT ${VOCABULARY_COLUMNS} FROM ${TABLES.VOCABULARY} WHERE ${conditions.join(' AND ')} ORDER BY id`;

    if (validFilters.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(validFilters.limit);
    } else if (validFilters.offset !== undefined && this.driver.dialect === 'sqlite') {
      // SQLite only accepts OFFSET after a LIMIT
      sql += ' LIMIT -1';
    }

    if (validFilters.offset !== undefined) {
      sql += ' OFFSET ?';
      params.push(validFilters.offset);
    }

    return this.run('list vocabulary', async () => parseRows(VocabularyRowSchema, await this.driver.query(sql, params)));
  }

  async getVocabularyEntry(ownerId: number, entryId: number): Promise<VocabularyEntry | null> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const id = validate(RecordIdSchema, entryId, 'entry id');

    return this.run('get vocabulary entry', async () => {
      const rows = await this.driver.query(
        `SELECT ${VOCABULARY_COLUMNS} FROM ${TABLES.VOCABULARY} WHERE id = ? AND user_id = ?`,
        [id, owner]
      );
      return parseFirst(VocabularyRowSchema, rows);
    });
  }

  async countVocabulary(ownerId: number): Promise<number> {
    const owner = validate(UserIdSchema, ownerId, 'user id');

    return this.run('count vocabulary', async () => {
      const rows = await this.driver.query(
        `SELECT COUNT(*) AS count FROM ${TABLES.VOCABULARY} WHERE user_id = ?`,
        [owner]
      );
      return parseFirst(CountRowSchema, rows)?.count ?? 0;
    });
  }

  // Statistics

  /**
   * Increment one counter in a single statement so concurrent answers are never lost
   */
  async recordOutcome(ownerId: number, entryId: number, success: boolean): Promise<VocabularyEntry> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const id = validate(RecordIdSchema, entryId, 'entry id');
    const counter = success ? 'success_count' : 'failure_count';

    return this.run('record outcome', async () => {
      const rows = await this.driver.query(
        `UPDATE ${TABLES.VOCABULARY}
         SET ${counter} = COALESCE(${counter}, 0) + 1
         WHERE id = ? AND user_id = ?
         RETURNING ${VOCABULARY_COLUMNS}`,
        [id, owner]
      );

      const updated = parseFirst(VocabularyRowSchema, rows);
      if (!updated) {
        throw new NotFoundError(`Vocabulary entry ${id} not found`);
      }
      return updated;
    });
  }

  async resetStatistics(ownerId: number): Promise<number> {
    const owner = validate(UserIdSchema, ownerId, 'user id');

    return this.run('reset statistics', async () => {
      const changes = await this.driver.execute(
        `UPDATE ${TABLES.VOCABULARY} SET success_count = 0, failure_count = 0 WHERE user_id = ?`,
        [owner]
      );
      console.log(`[VocabularyStore] Reset statistics of ${changes} entries for user ${owner}`);
      return changes;
    });
  }

  async getStatistics(ownerId: number): Promise<OwnerStatistics> {
    const owner = validate(UserIdSchema, ownerId, 'user id');

    return this.run('get statistics', async () => {
      const rows = await this.driver.query(
        `SELECT
           COUNT(*) AS total_entries,
           SUM(CASE WHEN COALESCE(success_count, 0) + COALESCE(failure_count, 0) > 0 THEN 1 ELSE 0 END) AS practiced_entries,
           SUM(COALESCE(success_count, 0)) AS total_successes,
           SUM(COALESCE(failure_count, 0)) AS total_failures
         FROM ${TABLES.VOCABULARY}
         WHERE user_id = ?`,
        [owner]
      );

      const stats = parseFirst(StatisticsRowSchema, rows);
      if (!stats) {
        throw new Error('Aggregate query returned no row');
      }
      return stats;
    });
  }

  async exportVocabulary(ownerId: number): Promise<VocabularyExportRow[]> {
    const owner = validate(UserIdSchema, ownerId, 'user id');

    return this.run('export vocabulary', async () => {
      const rows = await this.driver.query(
        `SELECT v.id, v.source_text, v.target_text, v.success_count, v.failure_count,
                l.name AS lesson_name, c.name AS category_name, v.created_at
         FROM ${TABLES.VOCABULARY} v
         LEFT JOIN ${TABLES.LESSONS} l ON l.id = v.lesson_id
         LEFT JOIN ${TABLES.CATEGORIES} c ON c.id = v.category_id
         WHERE v.user_id = ?
         ORDER BY v.id`,
        [owner]
      );
      return parseRows(ExportRowSchema, rows);
    });
  }

  // Helpers

  private async findUser(executor: SqlExecutor, userId: number): Promise<User | null> {
    const rows = await executor.query(`SELECT * FROM ${TABLES.USERS} WHERE user_id = ?`, [userId]);
    return parseFirst(UserRowSchema, rows);
  }

  private requireUser(user: User | null, userId: number): User {
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }

  private async setUserFlag(userId: number, column: 'is_admin' | 'is_tracked', value: boolean): Promise<void> {
    const id = validate(UserIdSchema, userId, 'user id');

    await this.run(`update ${column}`, async () => {
      const changes = await this.driver.execute(
        `UPDATE ${TABLES.USERS} SET ${column} = ? WHERE user_id = ?`,
        [toFlag(value), id]
      );
      if (changes === 0) {
        throw new NotFoundError(`User ${id} not found`);
      }
    });
  }

  /**
   * Look up by (owner, name) and insert when absent. A concurrent insert of the
   * same name surfaces as a unique violation and is answered by re-reading.
   */
  private async getOrCreateGrouping(kind: GroupingKind, ownerId: number, name: string): Promise<Grouping> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const trimmed = validate(GroupingNameSchema, name, `${kind} name`);
    const table = GROUPING_TABLES[kind];

    return this.run(`get or create ${kind}`, async () => {
      const existing = await this.findGrouping(table, owner, trimmed);
      if (existing) {
        return existing;
      }

      try {
        const rows = await this.driver.query(
          `INSERT INTO ${table} (name, user_id) VALUES (?, ?) RETURNING id, name, user_id`,
          [trimmed, owner]
        );
        const created = parseFirst(GroupingRowSchema, rows);
        if (!created) {
          throw new Error('Insert returned no row');
        }
        return created;
      } catch (error) {
        const violation = this.driver.classifyError(error);

        if (violation === 'unique') {
          const raced = await this.findGrouping(table, owner, trimmed);
          if (raced) {
            return raced;
          }
        }

        if (violation === 'foreign_key') {
          throw new NotFoundError(`User ${owner} not found`, { cause: error });
        }

        throw error;
      }
    });
  }

  private async findGrouping(table: GroupingTable, ownerId: number, name: string): Promise<Grouping | null> {
    const rows = await this.driver.query(
      `SELECT id, name, user_id FROM ${table} WHERE user_id = ? AND name = ?`,
      [ownerId, name]
    );
    return parseFirst(GroupingRowSchema, rows);
  }

  private async listGroupings(kind: GroupingKind, ownerId: number): Promise<Grouping[]> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const table = GROUPING_TABLES[kind];

    return this.run(`list ${table}`, async () => {
      const rows = await this.driver.query(
        `SELECT id, name, user_id FROM ${table} WHERE user_id = ? ORDER BY name, id`,
        [owner]
      );
      return parseRows(GroupingRowSchema, rows);
    });
  }

  /**
   * Detach vocabulary from the grouping, then delete it. Entries are kept.
   */
  private async deleteGrouping(kind: GroupingKind, ownerId: number, groupingId: number): Promise<void> {
    const owner = validate(UserIdSchema, ownerId, 'user id');
    const id = validate(RecordIdSchema, groupingId, `${kind} id`);
    const table = GROUPING_TABLES[kind];
    const referenceColumn = GROUPING_REFERENCE_COLUMNS[table];

    await this.run(`delete ${kind}`, () => this.driver.transaction(async (tx) => {
      const owned = await tx.query(`SELECT id FROM ${table} WHERE id = ? AND user_id = ?`, [id, owner]);
      if (owned.length === 0) {
        throw new NotFoundError(`${GROUPING_LABELS[kind]} ${id} not found`);
      }

      const detached = await tx.execute(
        `UPDATE ${TABLES.VOCABULARY} SET ${referenceColumn} = NULL WHERE ${referenceColumn} = ?`,
        [id]
      );
      await tx.execute(`DELETE FROM ${table} WHERE id = ?`, [id]);

      console.log(`[VocabularyStore] Deleted ${kind} ${id}, detached ${detached} entries`);
    }));
  }

  /**
   * Lesson and category must exist and belong to the owner of the entry
   */
  private async assertScopeOwnedBy(tx: SqlExecutor, ownerId: number, scope: TrainingScope): Promise<void> {
    const checks: Array<[GroupingKind, number | undefined]> = [
      ['lesson', scope.lessonId],
      ['category', scope.categoryId]
    ];

    for (const [kind, id] of checks) {
      if (id === undefined) {
        continue;
      }

      const rows = await tx.query(`SELECT user_id FROM ${GROUPING_TABLES[kind]} WHERE id = ?`, [id]);
      const row = parseFirst(UserIdRowSchema, rows);

      if (!row) {
        throw new InvalidReferenceError(`${GROUPING_LABELS[kind]} ${id} does not exist`);
      }
      if (row.user_id !== ownerId) {
        throw new InvalidReferenceError(`${GROUPING_LABELS[kind]} ${id} belongs to another user`);
      }
    }
  }

  /**
   * Translate driver constraint errors into store errors and wrap everything
   * else as `Failed to <operation>`
   */
  private async run<T>(operation: string, work: () => Promise<T>, messages: ViolationMessages = {}): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (isStoreError(error)) {
        throw error;
      }

      const violation = this.driver.classifyError(error);
      const detail = violation ? messages[violation] ?? errorMessage(error) : errorMessage(error);

      switch (violation) {
        case 'unique':
          throw new DuplicateEntryError(detail, { cause: error });
        case 'foreign_key':
          throw new InvalidReferenceError(detail, { cause: error });
        case 'not_null':
        case 'check':
          throw new InvalidInputError(detail, { cause: error });
        default:
          throw new Error(`Failed to ${operation}: ${detail}`, { cause: error });
      }
    }
  }
}

function toFlag(value: boolean | undefined): number {
  return value ? 1 : 0;
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

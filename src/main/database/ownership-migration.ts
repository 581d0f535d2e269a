/**
 * One-time move of lessons and categories from global names to per-user ownership
 */

import type { OwnershipMigrationResult, SqlDriver, SqlExecutor } from '../../shared/types/database.js';
import { GROUPING_REFERENCE_COLUMNS, TABLES, type GroupingTable } from '../../shared/constants/index.js';
import { MigrationIncompleteError, errorMessage } from '../../shared/errors.js';
import { UserIdRowSchema, parseFirst } from './rows.js';

const GROUPING_TABLES: readonly GroupingTable[] = [TABLES.LESSONS, TABLES.CATEGORIES];

interface TableMigration {
  status: 'skipped' | 'backfilled' | 'purged';
  fallbackOwnerId: number | null;
  affectedRows: number;
  detachedReferences: number;
}

export class OwnershipMigration {
  private driver: SqlDriver;

  constructor(driver: SqlDriver) {
    this.driver = driver;
  }

  /**
   * Migrate every grouping table. Never throws: a failed table is rolled back
   * and reported with `status: 'failed'` so the next start can retry.
   */
  async run(): Promise<OwnershipMigrationResult[]> {
    const results: OwnershipMigrationResult[] = [];
    for (const table of GROUPING_TABLES) {
      results.push(await this.migrateTable(table));
    }
    return results;
  }

  async migrateTable(table: GroupingTable): Promise<OwnershipMigrationResult> {
    try {
      if (await this.driver.columnExists(table, 'user_id')) {
        return { table, status: 'skipped', fallbackOwnerId: null, affectedRows: 0, detachedReferences: 0 };
      }

      const outcome = await this.driver.exclusiveTransaction(table, (tx) => this.rescope(tx, table));
      const result: OwnershipMigrationResult = { table, ...outcome };

      if (outcome.status === 'purged' && outcome.affectedRows > 0) {
        result.warning = new MigrationIncompleteError(
          table,
          `No admin or tracked user to own existing ${table}; deleted ${outcome.affectedRows} ownerless row(s)`
        );
        console.warn(`[OwnershipMigration] ${result.warning.message}`);
      } else if (outcome.status !== 'skipped') {
        console.log(`[OwnershipMigration] ${table}: ${outcome.status} ${outcome.affectedRows} row(s)`);
      }

      return result;
    } catch (error) {
      const warning = new MigrationIncompleteError(
        table,
        `Ownership migration of ${table} rolled back: ${errorMessage(error)}`,
        { cause: error }
      );
      console.warn(`[OwnershipMigration] ${warning.message}`);
      return { table, status: 'failed', fallbackOwnerId: null, affectedRows: 0, detachedReferences: 0, warning };
    }
  }

  private async rescope(tx: SqlExecutor, table: GroupingTable): Promise<TableMigration> {
    // Another process may have finished the migration while we waited for the lock
    if (await this.driver.columnExists(table, 'user_id', tx)) {
      return { status: 'skipped', fallbackOwnerId: null, affectedRows: 0, detachedReferences: 0 };
    }

    const fallbackOwnerId = await this.findFallbackOwner(tx);
    const referenceColumn = GROUPING_REFERENCE_COLUMNS[table];
    const hasReferences = await this.driver.columnExists(TABLES.VOCABULARY, referenceColumn, tx);

    await tx.execute(`ALTER TABLE ${table} ADD COLUMN user_id ${this.driver.ddl.userIdType}`);

    let status: TableMigration['status'];
    let affectedRows: number;
    let detachedReferences = 0;

    if (fallbackOwnerId !== null) {
      affectedRows = await tx.execute(`UPDATE ${table} SET user_id = ? WHERE user_id IS NULL`, [fallbackOwnerId]);
      if (hasReferences) {
        // Entries of other users may not point at the fallback owner's rows
        detachedReferences = await tx.execute(
          `UPDATE ${TABLES.VOCABULARY} SET ${referenceColumn} = NULL
           WHERE ${referenceColumn} IS NOT NULL
             AND (user_id <> ? OR ${referenceColumn} NOT IN (SELECT id FROM ${table}))`,
          [fallbackOwnerId]
        );
      }
      status = 'backfilled';
    } else {
      if (hasReferences) {
        detachedReferences = await tx.execute(
          `UPDATE ${TABLES.VOCABULARY} SET ${referenceColumn} = NULL WHERE ${referenceColumn} IS NOT NULL`
        );
      }
      affectedRows = await tx.execute(`DELETE FROM ${table} WHERE user_id IS NULL`);
      status = 'purged';
    }

    await this.driver.scopeUniqueNameToOwner(tx, table);

    return { status, fallbackOwnerId, affectedRows, detachedReferences };
  }

  /**
   * Earliest admin, else earliest tracked user
   */
  async findFallbackOwner(executor: SqlExecutor = this.driver): Promise<number | null> {
    const rows = await executor.query(
      `SELECT user_id FROM ${TABLES.USERS}
       WHERE is_admin = 1 OR is_tracked = 1
       ORDER BY is_admin DESC, added_at IS NULL, added_at ASC, user_id ASC
       LIMIT 1`
    );
    return parseFirst(UserIdRowSchema, rows)?.user_id ?? null;
  }
}

/**
 * Idempotent schema creation and additive upgrades for both engines
 */

import type { SchemaReport, SqlDriver } from '../../shared/types/database.js';
import { TABLES } from '../../shared/constants/index.js';
import { SchemaConflictError } from '../../shared/errors.js';
import {
  INDEXES,
  LEGACY_VOCABULARY_COLUMNS,
  groupingTableSql,
  indexSql,
  referenceColumnSql,
  usersTableSql,
  vocabularyTableSql,
  type IndexDefinition,
  type VocabularyReferenceColumn
} from './schema.js';
import { OwnershipMigration } from './ownership-migration.js';

const REQUIRED_VOCABULARY_COLUMNS = ['user_id', 'source_text', 'target_text', 'success_count', 'failure_count', 'created_at'];
const REFERENCE_COLUMNS: VocabularyReferenceColumn[] = ['lesson_id', 'category_id'];

export class SchemaManager {
  private driver: SqlDriver;

  constructor(driver: SqlDriver) {
    this.driver = driver;
  }

  /**
   * Bring the database to the current layout. Safe to call on every start.
   * Throws SchemaConflictError when the vocabulary table cannot be upgraded in place.
   */
  async ensureSchema(): Promise<SchemaReport> {
    const { ddl } = this.driver;
    const report: SchemaReport = {
      dialect: this.driver.dialect,
      createdTables: [],
      addedColumns: [],
      renamedColumns: [],
      ownership: [],
      warnings: []
    };

    await this.createTable(TABLES.USERS, usersTableSql(ddl), report);
    await this.createTable(TABLES.LESSONS, groupingTableSql(ddl, TABLES.LESSONS), report);
    await this.createTable(TABLES.CATEGORIES, groupingTableSql(ddl, TABLES.CATEGORIES), report);

    if (await this.driver.tableExists(TABLES.VOCABULARY)) {
      await this.upgradeVocabulary(report);
    } else {
      await this.createTable(TABLES.VOCABULARY, vocabularyTableSql(ddl), report);
    }

    report.ownership = await new OwnershipMigration(this.driver).run();
    for (const result of report.ownership) {
      if (result.warning) {
        report.warnings.push(result.warning);
      }
    }

    for (const column of REFERENCE_COLUMNS) {
      if (!(await this.driver.columnExists(TABLES.VOCABULARY, column))) {
        await this.driver.execute(`ALTER TABLE ${TABLES.VOCABULARY} ADD COLUMN ${referenceColumnSql(column)}`);
        report.addedColumns.push(`${TABLES.VOCABULARY}.${column}`);
      }
    }

    await this.createIndexes();

    console.log(
      `[SchemaManager] Schema ready (${report.dialect}): ` +
      `${report.createdTables.length} table(s) created, ` +
      `${report.addedColumns.length + report.renamedColumns.length} column change(s), ` +
      `${report.warnings.length} warning(s)`
    );

    return report;
  }

  private async createTable(table: string, sql: string, report: SchemaReport): Promise<void> {
    if (await this.driver.tableExists(table)) {
      return;
    }
    await this.driver.execute(sql);
    report.createdTables.push(table);
  }

  private async upgradeVocabulary(report: SchemaReport): Promise<void> {
    for (const { legacy, current } of LEGACY_VOCABULARY_COLUMNS) {
      const hasLegacy = await this.driver.columnExists(TABLES.VOCABULARY, legacy);
      if (!hasLegacy) {
        continue;
      }
      if (await this.driver.columnExists(TABLES.VOCABULARY, current)) {
        throw new SchemaConflictError(
          `Table ${TABLES.VOCABULARY} has both ${legacy} and ${current} columns`
        );
      }
      await this.driver.execute(`ALTER TABLE ${TABLES.VOCABULARY} RENAME COLUMN ${legacy} TO ${current}`);
      report.renamedColumns.push(`${TABLES.VOCABULARY}.${legacy} -> ${current}`);
      console.log(`[SchemaManager] Renamed ${TABLES.VOCABULARY}.${legacy} to ${current}`);
    }

    for (const column of REQUIRED_VOCABULARY_COLUMNS) {
      if (!(await this.driver.columnExists(TABLES.VOCABULARY, column))) {
        throw new SchemaConflictError(
          `Table ${TABLES.VOCABULARY} has no ${column} column and cannot be upgraded in place`
        );
      }
    }
  }

  private async createIndexes(): Promise<void> {
    for (const index of INDEXES) {
      if (await this.hasColumns(index)) {
        await this.driver.execute(indexSql(index));
      } else {
        console.warn(`[SchemaManager] Skipping index ${index.name}: ${index.table} is missing a column`);
      }
    }
  }

  private async hasColumns(index: IndexDefinition): Promise<boolean> {
    for (const column of index.columns) {
      if (!(await this.driver.columnExists(index.table, column))) {
        return false;
      }
    }
    return true;
  }
}

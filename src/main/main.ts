/**
 * Process entry point: load configuration, connect and bring the schema up to date.
 * Exits with code 1 when the database cannot be used.
 */

import { createDatabase, type VocabularyDatabaseLayer } from './database/index.js';
import { describeDatabase, loadDatabaseConfig } from './config.js';
import { SchemaConflictError, errorMessage } from '../shared/errors.js';

async function main(): Promise<void> {
  let databaseLayer: VocabularyDatabaseLayer | undefined;

  try {
    const config = loadDatabaseConfig();
    console.log(`Using database ${describeDatabase(config)}`);

    databaseLayer = createDatabase(config);
    const report = await databaseLayer.initialize();

    console.log(
      `Schema ready: created [${report.createdTables.join(', ')}], ` +
      `renamed [${report.renamedColumns.join(', ')}], added [${report.addedColumns.join(', ')}]`
    );
    for (const warning of report.warnings) {
      console.warn(`[${warning.code}] ${warning.message}`);
    }
  } catch (error) {
    if (error instanceof SchemaConflictError) {
      console.error(`Schema conflict, refusing to start: ${error.message}`);
    } else {
      console.error(`Failed to start: ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  } finally {
    try {
      await databaseLayer?.close();
    } catch (error) {
      console.error('Error closing database:', error);
      process.exitCode = 1;
    }
  }
}

void main();

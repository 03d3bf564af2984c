import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { config } from 'dotenv';
import { MigrationManager, retrievalMigrations } from '../src/migrations.js';
import { logger } from '../src/logger.js';

config();

const databasePath = process.env.RETRIEVAL_DB_PATH || './db/retrieval.db';
const rollbackTo = process.argv.includes('--rollback')
  ? Number(process.argv[process.argv.indexOf('--rollback') + 1])
  : undefined;

mkdirSync(dirname(databasePath), { recursive: true });
const db = new Database(databasePath);
const manager = new MigrationManager(db);

try {
  if (rollbackTo !== undefined) {
    if (!Number.isInteger(rollbackTo) || rollbackTo < 0) {
      throw new Error('--rollback expects a schema version');
    }
    manager.rollback(retrievalMigrations, rollbackTo);
    logger.success(`Rolled back to schema version ${rollbackTo}`, 'MigrationScript');
  } else {
    manager.runPendingMigrations(retrievalMigrations);
    logger.success('Database migrations are up to date', 'MigrationScript');
  }
} catch (error) {
  logger.error('Migration run failed', error instanceof Error ? error : undefined, 'MigrationScript');
  process.exitCode = 1;
} finally {
  db.close();
}

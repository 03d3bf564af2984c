/**
 * SQLite connection bootstrap for the retrieval stores
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { MigrationManager, retrievalMigrations } from './migrations.js';

export const IN_MEMORY = ':memory:';

export function openDatabase(dbPath: string = './db/retrieval.db'): Database.Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');

  new MigrationManager(db).runPendingMigrations(retrievalMigrations);
  return db;
}

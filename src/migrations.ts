/**
 * Database migration system for managing schema versions
 */

import Database from 'better-sqlite3';
import { logger } from './logger.js';

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
  down: (db: Database.Database) => void;
}

export class MigrationManager {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
    this.ensureMigrationsTable();
  }

  private ensureMigrationsTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);
  }

  /**
   * Get the current schema version
   */
  getCurrentVersion(): number {
    const result = this.db
      .prepare<[], { version: number | null }>(`
        SELECT MAX(version) as version FROM schema_migrations
      `)
      .get();

    return result?.version ?? 0;
  }

  /**
   * Versions and names already applied
   */
  getExecutedVersions(): Array<{ version: number; name: string }> {
    return this.db
      .prepare<[], { version: number; name: string }>(`
        SELECT version, name FROM schema_migrations ORDER BY version
      `)
      .all();
  }

  /**
   * Run all pending migrations
   */
  runPendingMigrations(migrations: Migration[]): void {
    const currentVersion = this.getCurrentVersion();
    const pendingMigrations = migrations
      .filter(m => m.version > currentVersion)
      .sort((a, b) => a.version - b.version);

    if (pendingMigrations.length === 0) {
      logger.debug('No pending migrations', { currentVersion }, 'MigrationManager');
      return;
    }

    logger.info(`Running ${pendingMigrations.length} migrations`, {
      from: currentVersion,
      to: pendingMigrations[pendingMigrations.length - 1].version
    }, 'MigrationManager');

    for (const migration of pendingMigrations) {
      try {
        const transaction = this.db.transaction(() => {
          migration.up(this.db);
          this.db.prepare(`
            INSERT INTO schema_migrations (version, name)
            VALUES (?, ?)
          `).run(migration.version, migration.name);
        });

        transaction();

        logger.debug(`Migration ${migration.version}: ${migration.name} applied`, undefined, 'MigrationManager');
      } catch (error) {
        logger.error(
          `Migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error)),
          'MigrationManager'
        );
        throw error;
      }
    }
  }

  /**
   * Rollback to a specific version
   */
  rollback(migrations: Migration[], targetVersion: number): void {
    const currentVersion = this.getCurrentVersion();

    if (targetVersion >= currentVersion) {
      logger.warn('Target version is not behind current version', {
        current: currentVersion,
        target: targetVersion
      }, 'MigrationManager');
      return;
    }

    const toRollback = migrations
      .filter(m => m.version > targetVersion && m.version <= currentVersion)
      .sort((a, b) => b.version - a.version);

    logger.info(`Rolling back ${toRollback.length} migrations`, {
      from: currentVersion,
      to: targetVersion
    }, 'MigrationManager');

    for (const migration of toRollback) {
      try {
        const transaction = this.db.transaction(() => {
          migration.down(this.db);
          this.db.prepare(`
            DELETE FROM schema_migrations WHERE version = ?
          `).run(migration.version);
        });

        transaction();

        logger.info(`Rolled back ${migration.version}: ${migration.name}`, undefined, 'MigrationManager');
      } catch (error) {
        logger.error(
          `Rollback of migration ${migration.version} failed`,
          error instanceof Error ? error : new Error(String(error)),
          'MigrationManager'
        );
        throw error;
      }
    }
  }

  /**
   * Get migration status
   */
  getStatus(allMigrations: Migration[]): {
    current: number;
    latest: number;
    pending: Migration[];
    executed: Migration[];
  } {
    const current = this.getCurrentVersion();
    const latest = Math.max(...allMigrations.map(m => m.version), 0);
    const executed = allMigrations.filter(m => m.version <= current);
    const pending = allMigrations.filter(m => m.version > current);

    return { current, latest, pending, executed };
  }
}

/**
 * Schema of the retrieval engine
 */
export const retrievalMigrations: Migration[] = [
  {
    version: 1,
    name: 'configurations_and_ledger',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS retrieval_configurations (
          id TEXT NOT NULL,
          tenant_id TEXT NOT NULL,
          name TEXT NOT NULL,
          description TEXT,
          protocol TEXT NOT NULL,
          settings TEXT NOT NULL,
          path_pattern TEXT NOT NULL,
          name_pattern TEXT NOT NULL,
          extension TEXT,
          cron_expression TEXT NOT NULL,
          timezone TEXT NOT NULL,
          schedule_description TEXT,
          token_timezone TEXT NOT NULL DEFAULT 'utc',
          active INTEGER NOT NULL DEFAULT 1,
          targets TEXT NOT NULL,
          created_at TEXT NOT NULL,
          created_by TEXT NOT NULL,
          modified_at TEXT,
          modified_by TEXT,
          last_executed_at TEXT,
          next_scheduled_run TEXT,
          version INTEGER NOT NULL DEFAULT 1,
          PRIMARY KEY (tenant_id, id)
        );

        CREATE INDEX IF NOT EXISTS idx_configurations_due
          ON retrieval_configurations(active, next_scheduled_run);

        CREATE TABLE IF NOT EXISTS processed_files (
          id TEXT PRIMARY KEY,
          tenant_id TEXT NOT NULL,
          configuration_id TEXT NOT NULL,
          execution_id TEXT NOT NULL,
          filename TEXT NOT NULL,
          locator TEXT NOT NULL,
          discovery_date TEXT NOT NULL,
          processed_at TEXT NOT NULL,
          size_bytes INTEGER,
          last_modified TEXT
        );

        CREATE UNIQUE INDEX IF NOT EXISTS idx_processed_files_identity
          ON processed_files(tenant_id, configuration_id, locator, discovery_date);
        CREATE INDEX IF NOT EXISTS idx_processed_files_configuration
          ON processed_files(tenant_id, configuration_id, processed_at DESC, id DESC);
        CREATE INDEX IF NOT EXISTS idx_processed_files_execution
          ON processed_files(execution_id);
      `);
    },
    down: (db) => {
      db.exec(`
        DROP INDEX IF EXISTS idx_processed_files_execution;
        DROP INDEX IF EXISTS idx_processed_files_configuration;
        DROP INDEX IF EXISTS idx_processed_files_identity;
        DROP TABLE IF EXISTS processed_files;
        DROP INDEX IF EXISTS idx_configurations_due;
        DROP TABLE IF EXISTS retrieval_configurations;
      `);
    }
  },
  {
    version: 2,
    name: 'execution_history',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS execution_records (
          id TEXT PRIMARY KEY,
          tenant_id TEXT NOT NULL,
          configuration_id TEXT NOT NULL,
          trigger TEXT NOT NULL,
          status TEXT NOT NULL,
          correlation_id TEXT NOT NULL,
          created_at TEXT NOT NULL,
          started_at TEXT,
          completed_at TEXT,
          duration_ms INTEGER,
          files_found INTEGER NOT NULL DEFAULT 0,
          files_processed INTEGER NOT NULL DEFAULT 0,
          notifications_emitted INTEGER NOT NULL DEFAULT 0,
          notification_failures INTEGER NOT NULL DEFAULT 0,
          retry_count INTEGER NOT NULL DEFAULT 0,
          resolved_path TEXT,
          resolved_name_pattern TEXT,
          error_category TEXT,
          error_message TEXT
        );

        CREATE INDEX IF NOT EXISTS idx_executions_configuration
          ON execution_records(tenant_id, configuration_id, created_at DESC, id DESC);
        CREATE INDEX IF NOT EXISTS idx_executions_open
          ON execution_records(status, created_at);
      `);
    },
    down: (db) => {
      db.exec(`
        DROP INDEX IF EXISTS idx_executions_open;
        DROP INDEX IF EXISTS idx_executions_configuration;
        DROP TABLE IF EXISTS execution_records;
      `);
    }
  }
];

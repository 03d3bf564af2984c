import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { decodeSequenceCursor, pageSize, toPage } from './continuation.js';
import { MarkProcessedInput, Page, ProcessedFileQuery, ProcessedFileRecord } from './types.js';

type ProcessedFileRow = {
  id: string;
  tenant_id: string;
  configuration_id: string;
  execution_id: string;
  filename: string;
  locator: string;
  discovery_date: string;
  processed_at: string;
  size_bytes: number | null;
  last_modified: string | null;
};

// rowid follows insertion, so it orders marks written in the same millisecond
type SequencedRow = ProcessedFileRow & { seq: number };

export interface MarkResult {
  created: boolean;
  record: ProcessedFileRecord;
}

export type ProcessedFileKey = Pick<MarkProcessedInput, 'tenantId' | 'configurationId' | 'locator' | 'discoveryDate'>;

/**
 * Ledger of files already handed to consumers. The unique index on
 * (tenant, configuration, locator, discovery date) decides which of several
 * concurrent writers owns a file.
 */
export class ProcessedFileLedger {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date()
  ) {}

  tryMarkProcessed(input: MarkProcessedInput): MarkResult {
    const id = randomUUID();
    const processedAt = this.clock().toISOString();
    const result = this.db
      .prepare(
        `
        INSERT INTO processed_files (
          id,
          tenant_id,
          configuration_id,
          execution_id,
          filename,
          locator,
          discovery_date,
          processed_at,
          size_bytes,
          last_modified
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
        ON CONFLICT(tenant_id, configuration_id, locator, discovery_date) DO NOTHING
        `
      )
      .run(
        id,
        input.tenantId,
        input.configurationId,
        input.executionId,
        input.filename,
        input.locator,
        input.discoveryDate,
        processedAt,
        input.sizeBytes ?? null,
        input.lastModified ?? null
      );

    const existing = this.find(input);
    if (!existing) {
      throw new Error(`Ledger entry for ${input.locator} vanished after insert`);
    }
    return { created: result.changes === 1, record: existing };
  }

  find(key: ProcessedFileKey): ProcessedFileRecord | undefined {
    const row = this.db
      .prepare<[string, string, string, string], ProcessedFileRow>(
        `
        SELECT *
        FROM processed_files
        WHERE tenant_id = ? AND configuration_id = ? AND locator = ? AND discovery_date = ?
        LIMIT 1
        `
      )
      .get(key.tenantId, key.configurationId, key.locator, key.discoveryDate);
    return row ? this.toRecord(row) : undefined;
  }

  isProcessed(key: ProcessedFileKey): boolean {
    return this.find(key) !== undefined;
  }

  /**
   * Drop an entry, but only the one written by `executionId`
   */
  release(key: ProcessedFileKey, executionId: string): boolean {
    const result = this.db
      .prepare(
        `
        DELETE FROM processed_files
        WHERE tenant_id = ? AND configuration_id = ? AND locator = ? AND discovery_date = ? AND execution_id = ?
        `
      )
      .run(key.tenantId, key.configurationId, key.locator, key.discoveryDate, executionId);
    return result.changes === 1;
  }

  query(tenantId: string, configurationId: string, query: ProcessedFileQuery = {}): Page<ProcessedFileRecord> {
    const limit = pageSize(query.limit);
    const conditions = ['tenant_id = ?', 'configuration_id = ?'];
    const values: unknown[] = [tenantId, configurationId];

    if (query.filename) {
      conditions.push('filename = ?');
      values.push(query.filename);
    }
    if (query.executionId) {
      conditions.push('execution_id = ?');
      values.push(query.executionId);
    }
    if (query.continuationToken) {
      const cursor = decodeSequenceCursor(query.continuationToken);
      conditions.push('(processed_at < ? OR (processed_at = ? AND rowid < ?))');
      values.push(cursor.sortKey, cursor.sortKey, cursor.seq);
    }
    values.push(limit + 1);

    const rows = this.db
      .prepare<unknown[], SequencedRow>(
        `
        SELECT rowid AS seq, *
        FROM processed_files
        WHERE ${conditions.join(' AND ')}
        ORDER BY processed_at DESC, rowid DESC
        LIMIT ?
        `
      )
      .all(...values);

    return toPage(rows, limit, (row) => this.toRecord(row), (row) => ({ sortKey: row.processed_at, id: row.seq }));
  }

  listByExecution(executionId: string): ProcessedFileRecord[] {
    return this.db
      .prepare<[string], ProcessedFileRow>(
        `
        SELECT *
        FROM processed_files
        WHERE execution_id = ?
        ORDER BY processed_at ASC, rowid ASC
        `
      )
      .all(executionId)
      .map((row) => this.toRecord(row));
  }

  private toRecord(row: ProcessedFileRow): ProcessedFileRecord {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      configurationId: row.configuration_id,
      executionId: row.execution_id,
      filename: row.filename,
      locator: row.locator,
      discoveryDate: row.discovery_date,
      processedAt: row.processed_at,
      sizeBytes: row.size_bytes,
      lastModified: row.last_modified,
    };
  }
}

import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { decodeSequenceCursor, pageSize, toPage } from './continuation.js';
import {
  ExecutionCompletion,
  ExecutionErrorCategory,
  ExecutionQuery,
  ExecutionRecord,
  ExecutionStatus,
  ExecutionTrigger,
  Page,
} from './types.js';

type ExecutionRow = {
  id: string;
  tenant_id: string;
  configuration_id: string;
  trigger: string;
  status: string;
  correlation_id: string;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  duration_ms: number | null;
  files_found: number;
  files_processed: number;
  notifications_emitted: number;
  notification_failures: number;
  retry_count: number;
  resolved_path: string | null;
  resolved_name_pattern: string | null;
  error_category: string | null;
  error_message: string | null;
};

// rowid breaks ties between records created in the same millisecond
type SequencedRow = ExecutionRow & { seq: number };

const STATUSES: readonly ExecutionStatus[] = ['Pending', 'Running', 'Completed', 'Failed'];
const CATEGORIES: readonly ExecutionErrorCategory[] = [
  'AuthenticationFailed',
  'NetworkError',
  'ProtocolError',
  'NotificationFailed',
  'Cancelled',
  'InternalError',
];

function toStatus(value: string): ExecutionStatus {
  return STATUSES.find((status) => status === value) ?? 'Failed';
}

function toCategory(value: string | null): ExecutionErrorCategory | null {
  if (value === null) return null;
  return CATEGORIES.find((category) => category === value) ?? 'InternalError';
}

export interface CreatePendingInput {
  tenantId: string;
  configurationId: string;
  trigger: ExecutionTrigger;
  correlationId?: string;
}

/**
 * Execution records: created Pending, moved to Running, closed exactly once.
 * Updates to a closed record are ignored.
 */
export class ExecutionHistoryStore {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date()
  ) {}

  createPending(input: CreatePendingInput): ExecutionRecord {
    const id = randomUUID();
    this.db
      .prepare(
        `
        INSERT INTO execution_records (
          id,
          tenant_id,
          configuration_id,
          trigger,
          status,
          correlation_id,
          created_at
        )
        VALUES (?, ?, ?, ?, 'Pending', ?, ?)
        `
      )
      .run(
        id,
        input.tenantId,
        input.configurationId,
        input.trigger,
        input.correlationId ?? randomUUID(),
        this.clock().toISOString()
      );

    const created = this.get(id);
    if (!created) {
      throw new Error(`Execution record ${id} was not persisted`);
    }
    return created;
  }

  markRunning(id: string): ExecutionRecord | undefined {
    const result = this.db
      .prepare(
        `
        UPDATE execution_records
        SET status = 'Running', started_at = ?
        WHERE id = ? AND status = 'Pending'
        `
      )
      .run(this.clock().toISOString(), id);
    return result.changes === 1 ? this.get(id) : undefined;
  }

  /**
   * Close a Pending or Running record. Returns undefined when the record is
   * missing or already terminal.
   */
  complete(id: string, completion: ExecutionCompletion): ExecutionRecord | undefined {
    const existing = this.get(id);
    if (!existing || existing.status === 'Completed' || existing.status === 'Failed') {
      return undefined;
    }

    const completedAt = this.clock();
    const startedAt = new Date(existing.startedAt ?? existing.createdAt);
    const durationMs = Math.max(0, completedAt.getTime() - startedAt.getTime());

    const result = this.db
      .prepare(
        `
        UPDATE execution_records
        SET
          status = ?,
          completed_at = ?,
          duration_ms = ?,
          files_found = ?,
          files_processed = ?,
          notifications_emitted = ?,
          notification_failures = ?,
          retry_count = ?,
          resolved_path = ?,
          resolved_name_pattern = ?,
          error_category = ?,
          error_message = ?
        WHERE id = ? AND status IN ('Pending', 'Running')
        `
      )
      .run(
        completion.status,
        completedAt.toISOString(),
        durationMs,
        completion.filesFound,
        completion.filesProcessed,
        completion.notificationsEmitted,
        completion.notificationFailures,
        completion.retryCount,
        completion.resolvedPath,
        completion.resolvedNamePattern,
        completion.errorCategory ?? null,
        completion.errorMessage ?? null,
        id
      );

    return result.changes === 1 ? this.get(id) : undefined;
  }

  get(id: string): ExecutionRecord | undefined {
    const row = this.db
      .prepare<[string], ExecutionRow>(
        `
        SELECT *
        FROM execution_records
        WHERE id = ?
        LIMIT 1
        `
      )
      .get(id);
    return row ? this.toRecord(row) : undefined;
  }

  list(tenantId: string, configurationId: string, query: ExecutionQuery = {}): Page<ExecutionRecord> {
    const limit = pageSize(query.limit);
    const conditions = ['tenant_id = ?', 'configuration_id = ?'];
    const values: unknown[] = [tenantId, configurationId];

    if (query.status) {
      conditions.push('status = ?');
      values.push(query.status);
    }
    if (query.from) {
      conditions.push('created_at >= ?');
      values.push(query.from.toISOString());
    }
    if (query.to) {
      conditions.push('created_at <= ?');
      values.push(query.to.toISOString());
    }
    if (query.continuationToken) {
      const cursor = decodeSequenceCursor(query.continuationToken);
      conditions.push('(created_at < ? OR (created_at = ? AND rowid < ?))');
      values.push(cursor.sortKey, cursor.sortKey, cursor.seq);
    }
    values.push(limit + 1);

    const rows = this.db
      .prepare<unknown[], SequencedRow>(
        `
        SELECT rowid AS seq, *
        FROM execution_records
        WHERE ${conditions.join(' AND ')}
        ORDER BY created_at DESC, rowid DESC
        LIMIT ?
        `
      )
      .all(...values);

    return toPage(rows, limit, (row) => this.toRecord(row), (row) => ({ sortKey: row.created_at, id: row.seq }));
  }

  listInWindow(tenantId: string, configurationId: string, from: Date, to: Date): ExecutionRecord[] {
    return this.db
      .prepare<[string, string, string, string], ExecutionRow>(
        `
        SELECT *
        FROM execution_records
        WHERE tenant_id = ? AND configuration_id = ? AND created_at >= ? AND created_at <= ?
        ORDER BY created_at ASC, rowid ASC
        `
      )
      .all(tenantId, configurationId, from.toISOString(), to.toISOString())
      .map((row) => this.toRecord(row));
  }

  listOpen(): ExecutionRecord[] {
    return this.db
      .prepare<[], ExecutionRow>(
        `
        SELECT *
        FROM execution_records
        WHERE status IN ('Pending', 'Running')
        ORDER BY created_at ASC, rowid ASC
        `
      )
      .all()
      .map((row) => this.toRecord(row));
  }

  /**
   * Fail Pending/Running records whose activity started before `olderThan`.
   * Used by the watchdog for executions whose worker went away.
   */
  closeAbandoned(olderThan: Date, excludeIds: ReadonlySet<string> = new Set()): ExecutionRecord[] {
    const cutoff = olderThan.toISOString();
    const candidates = this.db
      .prepare<[string], ExecutionRow>(
        `
        SELECT *
        FROM execution_records
        WHERE status IN ('Pending', 'Running') AND COALESCE(started_at, created_at) < ?
        `
      )
      .all(cutoff)
      .filter((row) => !excludeIds.has(row.id));

    const closed: ExecutionRecord[] = [];
    const close = this.db.transaction((rows: ExecutionRow[]) => {
      for (const row of rows) {
        const record = this.complete(row.id, {
          status: 'Failed',
          filesFound: row.files_found,
          filesProcessed: row.files_processed,
          notificationsEmitted: row.notifications_emitted,
          notificationFailures: row.notification_failures,
          retryCount: row.retry_count,
          resolvedPath: row.resolved_path,
          resolvedNamePattern: row.resolved_name_pattern,
          errorCategory: 'Cancelled',
          errorMessage: `Execution abandoned in ${row.status} state`,
        });
        if (record) closed.push(record);
      }
    });
    close(candidates);
    return closed;
  }

  private toRecord(row: ExecutionRow): ExecutionRecord {
    return {
      id: row.id,
      tenantId: row.tenant_id,
      configurationId: row.configuration_id,
      trigger: row.trigger === 'manual' ? 'manual' : 'scheduled',
      status: toStatus(row.status),
      correlationId: row.correlation_id,
      createdAt: row.created_at,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      durationMs: row.duration_ms,
      filesFound: row.files_found,
      filesProcessed: row.files_processed,
      notificationsEmitted: row.notifications_emitted,
      notificationFailures: row.notification_failures,
      retryCount: row.retry_count,
      resolvedPath: row.resolved_path,
      resolvedNamePattern: row.resolved_name_pattern,
      errorCategory: toCategory(row.error_category),
      errorMessage: row.error_message,
    };
  }
}

import { randomUUID } from 'crypto';
import Database from 'better-sqlite3';
import { AppError } from '../logger.js';
import { decodeContinuationToken, pageSize, toPage } from './continuation.js';
import { ConcurrencyConflictError } from './errors.js';
import { nextScheduledRun } from './schedule-evaluator.js';
import {
  CreateRetrievalConfigurationInput,
  Page,
  PageRequest,
  RetrievalConfiguration,
  UpdateRetrievalConfigurationInput,
} from './types.js';
import {
  assertValidConfiguration,
  readProtocol,
  readProtocolSettings,
  readTargets,
  readTokenTimezone,
} from './validation.js';

type ConfigurationRow = {
  id: string;
  tenant_id: string;
  name: string;
  description: string | null;
  protocol: string;
  settings: string;
  path_pattern: string;
  name_pattern: string;
  extension: string | null;
  cron_expression: string;
  timezone: string;
  schedule_description: string | null;
  token_timezone: string;
  active: number;
  targets: string;
  created_at: string;
  created_by: string;
  modified_at: string | null;
  modified_by: string | null;
  last_executed_at: string | null;
  next_scheduled_run: string | null;
  version: number;
};

export interface ConfigurationListQuery extends PageRequest {
  tenantId?: string;
  activeOnly?: boolean;
}

function normalizeExtension(extension: string | undefined | null): string | undefined {
  if (!extension) return undefined;
  const bare = extension.trim().replace(/^\./, '');
  return bare.length > 0 ? bare : undefined;
}

function normalizeInput(input: CreateRetrievalConfigurationInput): CreateRetrievalConfigurationInput {
  return {
    ...input,
    name: input.name.trim(),
    extension: normalizeExtension(input.extension),
    schedule: {
      ...input.schedule,
      cronExpression: input.schedule.cronExpression.trim(),
      timezone: input.schedule.timezone.trim() || 'UTC',
    },
    tokenTimezone: input.tokenTimezone ?? 'utc',
  };
}

/**
 * Retrieval configurations with a version column for optimistic concurrency.
 * Configurations are deactivated, never deleted.
 */
export class ConfigurationStore {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => Date = () => new Date()
  ) {}

  create(raw: CreateRetrievalConfigurationInput): RetrievalConfiguration {
    const input = normalizeInput(raw);
    assertValidConfiguration(input);

    const id = input.id ?? randomUUID();
    if (this.get(input.tenantId, id)) {
      throw new AppError(`Configuration already exists: ${id}`, 'CONFIGURATION_EXISTS', 409);
    }

    const now = this.clock();
    const active = input.active ?? true;
    const nextRun = active ? nextScheduledRun(input.schedule, now).toISOString() : null;

    this.db
      .prepare(
        `
        INSERT INTO retrieval_configurations (
          id,
          tenant_id,
          name,
          description,
          protocol,
          settings,
          path_pattern,
          name_pattern,
          extension,
          cron_expression,
          timezone,
          schedule_description,
          token_timezone,
          active,
          targets,
          created_at,
          created_by,
          next_scheduled_run,
          version
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 1)
        `
      )
      .run(
        id,
        input.tenantId,
        input.name,
        input.description ?? null,
        input.protocol,
        JSON.stringify(input.settings),
        input.pathPattern,
        input.namePattern,
        input.extension ?? null,
        input.schedule.cronExpression,
        input.schedule.timezone,
        input.schedule.description ?? null,
        input.tokenTimezone ?? 'utc',
        active ? 1 : 0,
        JSON.stringify(input.targets),
        now.toISOString(),
        input.createdBy,
        nextRun
      );

    return this.require(input.tenantId, id);
  }

  get(tenantId: string, id: string): RetrievalConfiguration | undefined {
    const row = this.db
      .prepare<[string, string], ConfigurationRow>(
        `
        SELECT *
        FROM retrieval_configurations
        WHERE tenant_id = ? AND id = ?
        LIMIT 1
        `
      )
      .get(tenantId, id);
    return row ? this.toRecord(row) : undefined;
  }

  require(tenantId: string, id: string): RetrievalConfiguration {
    const configuration = this.get(tenantId, id);
    if (!configuration) {
      throw new AppError(`Configuration not found: ${id}`, 'CONFIGURATION_NOT_FOUND', 404, { tenantId });
    }
    return configuration;
  }

  list(query: ConfigurationListQuery = {}): Page<RetrievalConfiguration> {
    const limit = pageSize(query.limit);
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.tenantId) {
      conditions.push('tenant_id = ?');
      values.push(query.tenantId);
    }
    if (query.activeOnly) {
      conditions.push('active = 1');
    }
    if (query.continuationToken) {
      const cursor = decodeContinuationToken(query.continuationToken);
      conditions.push('(created_at < ? OR (created_at = ? AND id < ?))');
      values.push(cursor.sortKey, cursor.sortKey, String(cursor.id));
    }
    values.push(limit + 1);

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<unknown[], ConfigurationRow>(
        `
        SELECT *
        FROM retrieval_configurations
        ${where}
        ORDER BY created_at DESC, id DESC
        LIMIT ?
        `
      )
      .all(...values);

    return toPage(rows, limit, (row) => this.toRecord(row), (row) => ({ sortKey: row.created_at, id: row.id }));
  }

  /**
   * Active configurations whose next run is at or before `now`, plus active
   * ones that have no next run recorded yet
   */
  listDue(now: Date, limit: number): RetrievalConfiguration[] {
    return this.db
      .prepare<[string, number], ConfigurationRow>(
        `
        SELECT *
        FROM retrieval_configurations
        WHERE active = 1 AND (next_scheduled_run IS NULL OR next_scheduled_run <= ?)
        ORDER BY next_scheduled_run IS NOT NULL, next_scheduled_run ASC
        LIMIT ?
        `
      )
      .all(now.toISOString(), limit)
      .map((row) => this.toRecord(row));
  }

  update(
    tenantId: string,
    id: string,
    changes: UpdateRetrievalConfigurationInput,
    expectedVersion: number
  ): RetrievalConfiguration {
    const existing = this.require(tenantId, id);

    const merged = normalizeInput({
      id: existing.id,
      tenantId: existing.tenantId,
      name: changes.name ?? existing.name,
      description: changes.description ?? existing.description,
      protocol: existing.protocol,
      settings: changes.settings ?? existing.settings,
      pathPattern: changes.pathPattern ?? existing.pathPattern,
      namePattern: changes.namePattern ?? existing.namePattern,
      extension: changes.extension === null ? undefined : (changes.extension ?? existing.extension),
      schedule: changes.schedule ?? existing.schedule,
      tokenTimezone: changes.tokenTimezone ?? existing.tokenTimezone,
      active: changes.active ?? existing.active,
      targets: changes.targets ?? existing.targets,
      createdBy: existing.createdBy,
    });
    assertValidConfiguration(merged);

    const now = this.clock();
    const active = merged.active ?? true;
    const scheduleChanged =
      merged.schedule.cronExpression !== existing.schedule.cronExpression ||
      merged.schedule.timezone !== existing.schedule.timezone;

    let nextRun: string | null = existing.nextScheduledRun ?? null;
    if (!active) {
      nextRun = null;
    } else if (scheduleChanged || !existing.active || nextRun === null) {
      nextRun = nextScheduledRun(merged.schedule, now).toISOString();
    }

    const result = this.db
      .prepare(
        `
        UPDATE retrieval_configurations
        SET
          name = ?,
          description = ?,
          settings = ?,
          path_pattern = ?,
          name_pattern = ?,
          extension = ?,
          cron_expression = ?,
          timezone = ?,
          schedule_description = ?,
          token_timezone = ?,
          active = ?,
          targets = ?,
          modified_at = ?,
          modified_by = ?,
          next_scheduled_run = ?,
          version = version + 1
        WHERE tenant_id = ? AND id = ? AND version = ?
        `
      )
      .run(
        merged.name,
        merged.description ?? null,
        JSON.stringify(merged.settings),
        merged.pathPattern,
        merged.namePattern,
        merged.extension ?? null,
        merged.schedule.cronExpression,
        merged.schedule.timezone,
        merged.schedule.description ?? null,
        merged.tokenTimezone ?? 'utc',
        active ? 1 : 0,
        JSON.stringify(merged.targets),
        now.toISOString(),
        changes.modifiedBy,
        nextRun,
        tenantId,
        id,
        expectedVersion
      );

    if (result.changes === 0) {
      throw new ConcurrencyConflictError('Configuration', id, expectedVersion);
    }
    return this.require(tenantId, id);
  }

  deactivate(tenantId: string, id: string, modifiedBy: string, expectedVersion?: number): RetrievalConfiguration {
    const existing = this.require(tenantId, id);
    const version = expectedVersion ?? existing.version;

    const result = this.db
      .prepare(
        `
        UPDATE retrieval_configurations
        SET active = 0, next_scheduled_run = NULL, modified_at = ?, modified_by = ?, version = version + 1
        WHERE tenant_id = ? AND id = ? AND version = ?
        `
      )
      .run(this.clock().toISOString(), modifiedBy, tenantId, id, version);

    if (result.changes === 0) {
      throw new ConcurrencyConflictError('Configuration', id, version);
    }
    return this.require(tenantId, id);
  }

  /**
   * Stamp the outcome of an execution. Fails with a conflict when the
   * configuration changed since `expectedVersion` was read.
   */
  recordExecution(
    tenantId: string,
    id: string,
    update: { executedAt: Date; nextScheduledRun: Date | null },
    expectedVersion: number
  ): RetrievalConfiguration {
    const result = this.db
      .prepare(
        `
        UPDATE retrieval_configurations
        SET last_executed_at = ?, next_scheduled_run = ?, version = version + 1
        WHERE tenant_id = ? AND id = ? AND version = ?
        `
      )
      .run(
        update.executedAt.toISOString(),
        update.nextScheduledRun ? update.nextScheduledRun.toISOString() : null,
        tenantId,
        id,
        expectedVersion
      );

    if (result.changes === 0) {
      this.require(tenantId, id);
      throw new ConcurrencyConflictError('Configuration', id, expectedVersion);
    }
    return this.require(tenantId, id);
  }

  scheduleNextRun(tenantId: string, id: string, next: Date, expectedVersion: number): RetrievalConfiguration {
    const result = this.db
      .prepare(
        `
        UPDATE retrieval_configurations
        SET next_scheduled_run = ?, version = version + 1
        WHERE tenant_id = ? AND id = ? AND version = ?
        `
      )
      .run(next.toISOString(), tenantId, id, expectedVersion);

    if (result.changes === 0) {
      throw new ConcurrencyConflictError('Configuration', id, expectedVersion);
    }
    return this.require(tenantId, id);
  }

  private toRecord(row: ConfigurationRow): RetrievalConfiguration {
    const protocol = readProtocol(row.protocol);
    return {
      id: row.id,
      tenantId: row.tenant_id,
      name: row.name,
      description: row.description ?? undefined,
      protocol,
      settings: readProtocolSettings(protocol, JSON.parse(row.settings)),
      pathPattern: row.path_pattern,
      namePattern: row.name_pattern,
      extension: row.extension ?? undefined,
      schedule: {
        cronExpression: row.cron_expression,
        timezone: row.timezone,
        description: row.schedule_description ?? undefined,
      },
      tokenTimezone: readTokenTimezone(row.token_timezone),
      active: row.active === 1,
      targets: readTargets(JSON.parse(row.targets)),
      createdAt: row.created_at,
      createdBy: row.created_by,
      modifiedAt: row.modified_at ?? undefined,
      modifiedBy: row.modified_by ?? undefined,
      lastExecutedAt: row.last_executed_at ?? undefined,
      nextScheduledRun: row.next_scheduled_run ?? undefined,
      version: row.version,
    };
  }
}

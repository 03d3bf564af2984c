import { randomUUID } from 'crypto';
import { AppError, logger } from '../logger.js';
import { AdapterRegistry, testConnection } from './adapters/adapter.js';
import { ConfigurationStore } from './configuration-store.js';
import { CredentialResolver, resolveSecret } from './credentials.js';
import { ProcessedFileLedger } from './dedup-ledger.js';
import { errorMessage, toRetrievalError } from './errors.js';
import { ExecutionHistoryStore } from './execution-history.js';
import { computeExecutionMetrics, defaultMetricsWindow } from './execution-metrics.js';
import { withDeadline } from './orchestrator.js';
import { Dispatch, SchedulerLoop } from './scheduler-loop.js';
import {
  ExecutionMetrics,
  ExecutionQuery,
  ExecutionRecord,
  Page,
  ProcessedFileQuery,
  ProcessedFileRecord,
} from './types.js';

const CONTEXT = 'RetrievalService';

export interface RetrievalServiceDependencies {
  configurations: ConfigurationStore;
  history: ExecutionHistoryStore;
  ledger: ProcessedFileLedger;
  scheduler: SchedulerLoop;
  adapters: AdapterRegistry;
  credentials: CredentialResolver;
  callTimeoutMs: number;
  clock?: () => Date;
}

export interface TriggerResult {
  executionId: string;
  correlationId: string;
  /** Settles when the execution ends */
  completion: Dispatch['completion'];
}

export interface ExecutionDetails {
  execution: ExecutionRecord;
  processedFiles: ProcessedFileRecord[];
}

export interface ConnectionCheck {
  ok: boolean;
  durationMs: number;
  errorCategory?: string;
  error?: string;
}

/**
 * Operator-facing surface: manual triggers, history, metrics and the ledger
 */
export class RetrievalService {
  private readonly clock: () => Date;

  constructor(private readonly deps: RetrievalServiceDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Start an execution now, outside the schedule. Returns once the Pending
   * record exists.
   */
  trigger(tenantId: string, configurationId: string): TriggerResult {
    const configuration = this.deps.configurations.require(tenantId, configurationId);
    if (!configuration.active) {
      throw new AppError(`Configuration is inactive: ${configurationId}`, 'CONFIGURATION_INACTIVE', 400, {
        tenantId,
        configurationId,
      });
    }

    const correlationId = randomUUID();
    const dispatch = this.deps.scheduler.dispatch(configuration, 'manual', correlationId);
    logger.info('Manual execution triggered', {
      executionId: dispatch.record.id,
      configurationId,
      tenantId,
    }, CONTEXT);

    return {
      executionId: dispatch.record.id,
      correlationId: dispatch.record.correlationId,
      completion: dispatch.completion,
    };
  }

  listExecutions(tenantId: string, configurationId: string, query: ExecutionQuery = {}): Page<ExecutionRecord> {
    this.deps.configurations.require(tenantId, configurationId);
    return this.deps.history.list(tenantId, configurationId, query);
  }

  getExecution(tenantId: string, configurationId: string, executionId: string): ExecutionDetails {
    const execution = this.deps.history.get(executionId);
    if (!execution || execution.tenantId !== tenantId || execution.configurationId !== configurationId) {
      throw new AppError(`Execution not found: ${executionId}`, 'EXECUTION_NOT_FOUND', 404, { tenantId, configurationId });
    }
    return { execution, processedFiles: this.deps.ledger.listByExecution(executionId) };
  }

  getMetrics(tenantId: string, configurationId: string, from?: Date, to?: Date): ExecutionMetrics {
    this.deps.configurations.require(tenantId, configurationId);
    const window = defaultMetricsWindow(this.clock());
    const start = from ?? window.from;
    const end = to ?? window.to;
    if (start.getTime() > end.getTime()) {
      throw new AppError('Metrics window start must not be after its end', 'INVALID_WINDOW', 400);
    }
    const records = this.deps.history.listInWindow(tenantId, configurationId, start, end);
    return computeExecutionMetrics(configurationId, records, start, end);
  }

  listProcessedFiles(tenantId: string, configurationId: string, query: ProcessedFileQuery = {}): Page<ProcessedFileRecord> {
    this.deps.configurations.require(tenantId, configurationId);
    return this.deps.ledger.query(tenantId, configurationId, query);
  }

  /**
   * Resolve credentials and reach the remote location once, without listing
   */
  async testConnection(tenantId: string, configurationId: string): Promise<ConnectionCheck> {
    const configuration = this.deps.configurations.require(tenantId, configurationId);
    const started = Date.now();
    const timeoutMs = configuration.settings.timeoutMs ?? this.deps.callTimeoutMs;

    try {
      const secret = await resolveSecret(this.deps.credentials, configuration.settings);
      await withDeadline(
        (signal) => testConnection(this.deps.adapters, configuration.settings, secret, signal),
        timeoutMs,
        new AbortController().signal
      );
      return { ok: true, durationMs: Date.now() - started };
    } catch (error) {
      const failure = toRetrievalError(error);
      logger.warn('Connection test failed', {
        configurationId,
        category: failure.category,
        error: errorMessage(error),
      }, CONTEXT);
      return {
        ok: false,
        durationMs: Date.now() - started,
        errorCategory: failure.category,
        error: failure.message,
      };
    }
  }
}

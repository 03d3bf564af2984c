import pLimit from 'p-limit';
import { SchedulerConfig } from '../config.js';
import { AppError, logger } from '../logger.js';
import { ConfigurationStore } from './configuration-store.js';
import { errorMessage, RetrievalError } from './errors.js';
import { ExecutionHistoryStore } from './execution-history.js';
import { ExecutionOrchestrator, ExecutionOutcome } from './orchestrator.js';
import { nextScheduledRun } from './schedule-evaluator.js';
import { ExecutionRecord, ExecutionTrigger, RetrievalConfiguration } from './types.js';

const CONTEXT = 'Scheduler';

export interface SchedulerDependencies {
  configurations: ConfigurationStore;
  history: ExecutionHistoryStore;
  orchestrator: ExecutionOrchestrator;
  clock?: () => Date;
}

export type SchedulerOptions = Pick<
  SchedulerConfig,
  'pollingIntervalMs' | 'maxConcurrentExecutions' | 'dueBatchSize' | 'executionTimeoutMs' | 'abandonedGraceMs'
>;

export interface TickSummary {
  due: number;
  dispatched: number;
  skippedInFlight: number;
  rescheduled: number;
  abandoned: number;
}

export interface Dispatch {
  record: ExecutionRecord;
  /** Settles when the execution ends; never rejects */
  completion: Promise<ExecutionOutcome | undefined>;
}

interface InFlightExecution {
  executionId: string;
  controller: AbortController;
  completion: Promise<ExecutionOutcome | undefined>;
}

function inFlightKey(tenantId: string, configurationId: string): string {
  return `${tenantId}:${configurationId}`;
}

/**
 * Polls for due configurations and hands them to a bounded pool.
 * At most one execution per configuration is in flight at a time.
 */
export class SchedulerLoop {
  private readonly clock: () => Date;
  private readonly limit: ReturnType<typeof pLimit>;
  private readonly inFlight = new Map<string, InFlightExecution>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private currentTick: Promise<TickSummary> | null = null;

  constructor(
    private readonly deps: SchedulerDependencies,
    private readonly options: SchedulerOptions
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.limit = pLimit(options.maxConcurrentExecutions);
  }

  get isRunning(): boolean {
    return this.running;
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  isInFlight(tenantId: string, configurationId: string): boolean {
    return this.inFlight.has(inFlightKey(tenantId, configurationId));
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info('Scheduler started', {
      pollingIntervalMs: this.options.pollingIntervalMs,
      maxConcurrentExecutions: this.options.maxConcurrentExecutions,
    }, CONTEXT);
    this.scheduleTick(0);
  }

  /**
   * Stop polling and wait for in-flight executions to finish
   */
  async stop(): Promise<void> {
    if (!this.running && this.inFlight.size === 0) return;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) {
      await this.currentTick;
    }
    await this.whenIdle();
    logger.info('Scheduler stopped', undefined, CONTEXT);
  }

  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight.values()].map((entry) => entry.completion));
    }
  }

  /**
   * One polling pass. Never throws; failures are logged and the pass ends.
   */
  async tick(): Promise<TickSummary> {
    const summary: TickSummary = { due: 0, dispatched: 0, skippedInFlight: 0, rescheduled: 0, abandoned: 0 };
    const now = this.clock();

    try {
      summary.abandoned = this.closeAbandoned(now);
    } catch (error) {
      logger.error('Watchdog pass failed', error instanceof Error ? error : undefined, CONTEXT);
    }

    // In-flight configurations stay due until they finish; read past them so
    // they never take up the whole batch
    const batchSize = this.options.dueBatchSize;
    let due: RetrievalConfiguration[];
    try {
      due = this.deps.configurations.listDue(now, batchSize + this.inFlight.size);
    } catch (error) {
      logger.error('Failed to list due configurations', error instanceof Error ? error : undefined, CONTEXT);
      return summary;
    }
    summary.due = due.length;

    for (const configuration of due) {
      if (summary.dispatched + summary.rescheduled >= batchSize) break;
      try {
        if (this.isInFlight(configuration.tenantId, configuration.id)) {
          summary.skippedInFlight++;
          logger.debug('Configuration already in flight; skipping', { configurationId: configuration.id }, CONTEXT);
          continue;
        }

        if (!configuration.nextScheduledRun) {
          const reference = configuration.lastExecutedAt ? new Date(configuration.lastExecutedAt) : now;
          const next = nextScheduledRun(configuration.schedule, reference);
          if (next.getTime() > now.getTime()) {
            this.deps.configurations.scheduleNextRun(configuration.tenantId, configuration.id, next, configuration.version);
            summary.rescheduled++;
            continue;
          }
        }

        this.dispatch(configuration, 'scheduled');
        summary.dispatched++;
      } catch (error) {
        logger.error('Failed to dispatch configuration', error instanceof Error ? error : undefined, CONTEXT, {
          configurationId: configuration.id,
        });
      }
    }

    if (summary.dispatched > 0 || summary.abandoned > 0) {
      logger.info('Scheduler tick', { ...summary }, CONTEXT);
    }
    return summary;
  }

  /**
   * Create the Pending record and queue the execution without waiting for it
   */
  dispatch(configuration: RetrievalConfiguration, trigger: ExecutionTrigger, correlationId?: string): Dispatch {
    const key = inFlightKey(configuration.tenantId, configuration.id);
    if (this.inFlight.has(key)) {
      throw new AppError(`An execution is already in progress for ${configuration.id}`, 'EXECUTION_IN_PROGRESS', 409, {
        tenantId: configuration.tenantId,
        configurationId: configuration.id,
      });
    }

    const record = this.deps.history.createPending({
      tenantId: configuration.tenantId,
      configurationId: configuration.id,
      trigger,
      correlationId,
    });
    const controller = new AbortController();
    const timeoutMs = this.options.executionTimeoutMs;

    const completion = this.limit(async () => {
      const deadline = setTimeout(() => {
        controller.abort(
          new RetrievalError(`Execution exceeded ${timeoutMs}ms`, 'Cancelled', { executionId: record.id, timeoutMs })
        );
      }, timeoutMs);
      try {
        return await this.deps.orchestrator.execute(configuration, record, controller.signal);
      } finally {
        clearTimeout(deadline);
      }
    })
      .catch((error: unknown) => {
        logger.error('Execution crashed outside the orchestrator', error instanceof Error ? error : undefined, CONTEXT, {
          executionId: record.id,
          error: errorMessage(error),
        });
        return undefined;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });

    this.inFlight.set(key, { executionId: record.id, controller, completion });
    return { record, completion };
  }

  /**
   * Abort the in-flight execution of a configuration, if any
   */
  cancel(tenantId: string, configurationId: string, reason: string = 'Execution cancelled'): boolean {
    const entry = this.inFlight.get(inFlightKey(tenantId, configurationId));
    if (!entry) return false;
    entry.controller.abort(new RetrievalError(reason, 'Cancelled', { executionId: entry.executionId }));
    return true;
  }

  private closeAbandoned(now: Date): number {
    const olderThan = new Date(now.getTime() - this.options.executionTimeoutMs - this.options.abandonedGraceMs);
    const live = new Set([...this.inFlight.values()].map((entry) => entry.executionId));
    const closed = this.deps.history.closeAbandoned(olderThan, live);
    for (const record of closed) {
      logger.warn('Closed abandoned execution', {
        executionId: record.id,
        configurationId: record.configurationId,
      }, CONTEXT);
    }
    return closed.length;
  }

  private scheduleTick(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentTick = this.tick();
      void this.currentTick
        .catch((error: unknown) => {
          logger.error('Scheduler tick failed', error instanceof Error ? error : undefined, CONTEXT);
        })
        .finally(() => {
          this.currentTick = null;
          if (this.running) {
            this.scheduleTick(this.options.pollingIntervalMs);
          }
        });
    }, delayMs);
  }
}

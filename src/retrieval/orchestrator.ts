import pRetry, { AbortError } from 'p-retry';
import { AdapterConfig, NotificationConfig, RetryConfig } from '../config.js';
import { AppError, logger } from '../logger.js';
import { AdapterRegistry, listFiles } from './adapters/adapter.js';
import { ConfigurationStore } from './configuration-store.js';
import { CredentialResolver, resolveSecret } from './credentials.js';
import { ProcessedFileLedger } from './dedup-ledger.js';
import {
  ConcurrencyConflictError,
  errorMessage,
  RetrievalError,
  toExecutionCategory,
  toRetrievalError,
} from './errors.js';
import { ExecutionHistoryStore } from './execution-history.js';
import {
  buildLifecycleNotification,
  emitFileNotifications,
  EmissionOutcome,
  LifecycleEventType,
  NotificationTransport,
} from './notifications.js';
import { nextScheduledRun } from './schedule-evaluator.js';
import { calendarDate, resolveTokens } from './token-resolver.js';
import { DiscoveredFile, ExecutionCompletion, ExecutionRecord, RetrievalConfiguration } from './types.js';

const CONTEXT = 'Orchestrator';
const SCHEDULE_UPDATE_ATTEMPTS = 3;

export interface OrchestratorDependencies {
  configurations: ConfigurationStore;
  history: ExecutionHistoryStore;
  ledger: ProcessedFileLedger;
  adapters: AdapterRegistry;
  transport: NotificationTransport;
  credentials: CredentialResolver;
  retry: RetryConfig;
  adapterOptions: AdapterConfig;
  notifications: NotificationConfig;
  clock?: () => Date;
}

/** How the configuration's lastExecutedAt/nextScheduledRun stamp went */
export type ScheduleUpdateResult = 'updated' | 'conflict' | 'skipped';

export interface ExecutionOutcome {
  record: ExecutionRecord;
  scheduleUpdate: ScheduleUpdateResult;
}

interface Progress {
  resolvedPath: string | null;
  resolvedNamePattern: string | null;
  filesFound: number;
  filesProcessed: number;
  notificationsEmitted: number;
  notificationFailures: number;
  retryCount: number;
  notificationErrors: string[];
}

function cancellationOf(signal: AbortSignal): RetrievalError {
  const reason: unknown = signal.reason;
  if (reason instanceof RetrievalError && reason.category === 'Cancelled') {
    return reason;
  }
  return new RetrievalError('Execution was cancelled', 'Cancelled', undefined, { cause: reason });
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw cancellationOf(signal);
  }
}

/**
 * Run `operation` with its own signal, failing with NetworkError once
 * `timeoutMs` passes and with Cancelled as soon as `parent` aborts.
 * The deadline settles before the operation's signal fires, so its error wins.
 */
export async function withDeadline<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent: AbortSignal
): Promise<T> {
  throwIfAborted(parent);

  const controller = new AbortController();
  let rejectDeadline: (error: RetrievalError) => void = () => undefined;
  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });

  const timer = setTimeout(() => {
    const error = new RetrievalError(`Remote call timed out after ${timeoutMs}ms`, 'NetworkError', { timeoutMs });
    rejectDeadline(error);
    controller.abort(error);
  }, timeoutMs);
  const onAbort = () => {
    rejectDeadline(cancellationOf(parent));
    controller.abort(parent.reason);
  };
  parent.addEventListener('abort', onAbort, { once: true });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent.removeEventListener('abort', onAbort);
  }
}

/**
 * Drives one execution from Pending to a terminal state: list, deduplicate,
 * notify, record, then stamp the configuration's schedule.
 */
export class ExecutionOrchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async execute(
    configuration: RetrievalConfiguration,
    execution: ExecutionRecord,
    signal: AbortSignal = new AbortController().signal
  ): Promise<ExecutionOutcome> {
    const running = this.deps.history.markRunning(execution.id);
    if (!running) {
      logger.warn('Execution is no longer pending; skipping', {
        executionId: execution.id,
        configurationId: configuration.id,
      }, CONTEXT);
      return { record: this.deps.history.get(execution.id) ?? execution, scheduleUpdate: 'skipped' };
    }

    logger.info('Execution started', {
      executionId: running.id,
      configurationId: configuration.id,
      tenantId: configuration.tenantId,
      trigger: running.trigger,
    }, CONTEXT);

    await this.emitLifecycle('FileCheckTriggered', configuration, running, { trigger: running.trigger });

    const progress: Progress = {
      resolvedPath: null,
      resolvedNamePattern: null,
      filesFound: 0,
      filesProcessed: 0,
      notificationsEmitted: 0,
      notificationFailures: 0,
      retryCount: 0,
      notificationErrors: [],
    };

    let completion: ExecutionCompletion;
    try {
      await this.run(configuration, running, signal, progress);
      completion =
        progress.notificationFailures > 0
          ? this.completionFrom(progress, 'Failed', {
              category: 'NotificationFailed',
              message: `${progress.notificationFailures} notification(s) failed: ${progress.notificationErrors.join('; ')}`,
            })
          : this.completionFrom(progress, 'Completed');
    } catch (error) {
      const failure = signal.aborted ? cancellationOf(signal) : toRetrievalError(error);
      completion = this.completionFrom(progress, 'Failed', {
        category: toExecutionCategory(failure.category),
        message: failure.message,
      });
    }

    const record = this.deps.history.complete(running.id, completion) ?? this.deps.history.get(running.id) ?? running;
    this.logCompletion(configuration, record);

    await this.emitLifecycle(
      record.status === 'Completed' ? 'FileCheckCompleted' : 'FileCheckFailed',
      configuration,
      record,
      {
        status: record.status,
        filesFound: record.filesFound,
        filesProcessed: record.filesProcessed,
        durationMs: record.durationMs,
        errorCategory: record.errorCategory,
        errorMessage: record.errorMessage,
      }
    );

    const scheduleUpdate = this.updateSchedule(configuration);
    return { record, scheduleUpdate };
  }

  private async run(
    configuration: RetrievalConfiguration,
    execution: ExecutionRecord,
    signal: AbortSignal,
    progress: Progress
  ): Promise<void> {
    const now = this.clock();
    const zone = configuration.tokenTimezone === 'schedule' ? configuration.schedule.timezone : 'UTC';
    progress.resolvedPath = resolveTokens(configuration.pathPattern, now, zone);
    progress.resolvedNamePattern = resolveTokens(configuration.namePattern, now, zone);
    const discoveryDate = calendarDate(now, zone);

    throwIfAborted(signal);
    const secret = await resolveSecret(this.deps.credentials, configuration.settings);

    const files = await this.discover(configuration, progress, secret, signal);
    progress.filesFound = files.length;

    for (const file of files) {
      throwIfAborted(signal);

      const key = {
        tenantId: configuration.tenantId,
        configurationId: configuration.id,
        locator: file.locator,
        discoveryDate,
      };
      const mark = this.deps.ledger.tryMarkProcessed({
        ...key,
        executionId: execution.id,
        filename: file.filename,
        sizeBytes: file.sizeBytes,
        lastModified: file.lastModified,
      });
      if (!mark.created) {
        logger.debug('File already processed', { locator: file.locator, discoveryDate }, CONTEXT);
        continue;
      }

      let emission: EmissionOutcome;
      try {
        emission = await this.emitUnlessCancelled(
          emitFileNotifications(this.deps.transport, {
            configuration,
            executionId: execution.id,
            correlationId: execution.correlationId,
            file,
            discoveryDate,
          }),
          signal
        );
      } catch (error) {
        if (this.deps.ledger.release(key, execution.id)) {
          logger.warn('Released mark for interrupted file', { locator: file.locator, executionId: execution.id }, CONTEXT);
        }
        throw error;
      }

      progress.filesProcessed++;
      progress.notificationsEmitted += emission.emitted;
      progress.notificationFailures += emission.failed;
      progress.notificationErrors.push(...emission.errors);
    }
  }

  private async discover(
    configuration: RetrievalConfiguration,
    progress: Progress,
    secret: string | undefined,
    signal: AbortSignal
  ): Promise<DiscoveredFile[]> {
    const { retry, adapterOptions } = this.deps;
    const timeoutMs = configuration.settings.timeoutMs ?? adapterOptions.callTimeoutMs;
    let attempts = 0;

    try {
      return await pRetry(
        async () => {
          attempts++;
          try {
            return await withDeadline(
              (callSignal) =>
                listFiles(this.deps.adapters, {
                  settings: configuration.settings,
                  secret,
                  path: progress.resolvedPath ?? '/',
                  namePattern: progress.resolvedNamePattern ?? '*',
                  extension: configuration.extension,
                  signal: callSignal,
                  maxResults: adapterOptions.maxResults,
                }),
              timeoutMs,
              signal
            );
          } catch (error) {
            const failure = toRetrievalError(error);
            if (!failure.retryable) {
              throw new AbortError(failure);
            }
            throw failure;
          }
        },
        {
          retries: Math.max(0, retry.attempts - 1),
          minTimeout: retry.minTimeoutMs,
          maxTimeout: retry.maxTimeoutMs,
          factor: retry.factor,
          signal,
          onFailedAttempt: (error) => {
            logger.warn('Listing attempt failed', {
              configurationId: configuration.id,
              attempt: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              error: error.message,
            }, CONTEXT);
          },
        }
      );
    } catch (error) {
      const failure = toRetrievalError(error);
      if (failure.category === 'NotFound') {
        logger.info('Remote location not found; treating as empty', {
          configurationId: configuration.id,
          path: progress.resolvedPath,
        }, CONTEXT);
        return [];
      }
      throw failure;
    } finally {
      progress.retryCount = Math.max(0, attempts - 1);
    }
  }

  private async emitUnlessCancelled(emission: Promise<EmissionOutcome>, signal: AbortSignal): Promise<EmissionOutcome> {
    throwIfAborted(signal);
    let rejectCancelled: (error: RetrievalError) => void = () => undefined;
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });
    const onAbort = () => rejectCancelled(cancellationOf(signal));
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      return await Promise.race([emission, cancelled]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private completionFrom(
    progress: Progress,
    status: ExecutionCompletion['status'],
    failure?: { category: ExecutionCompletion['errorCategory']; message: string }
  ): ExecutionCompletion {
    return {
      status,
      filesFound: progress.filesFound,
      filesProcessed: progress.filesProcessed,
      notificationsEmitted: progress.notificationsEmitted,
      notificationFailures: progress.notificationFailures,
      retryCount: progress.retryCount,
      resolvedPath: progress.resolvedPath,
      resolvedNamePattern: progress.resolvedNamePattern,
      errorCategory: failure?.category,
      errorMessage: failure?.message,
    };
  }

  /**
   * Stamp lastExecutedAt and the next run. A concurrent edit bumps the
   * version, so re-read and try again a bounded number of times.
   */
  private updateSchedule(configuration: RetrievalConfiguration): ScheduleUpdateResult {
    let current: RetrievalConfiguration | undefined = configuration;

    for (let attempt = 1; attempt <= SCHEDULE_UPDATE_ATTEMPTS && current; attempt++) {
      const now = this.clock();
      try {
        this.deps.configurations.recordExecution(
          current.tenantId,
          current.id,
          {
            executedAt: now,
            nextScheduledRun: current.active ? nextScheduledRun(current.schedule, now) : null,
          },
          current.version
        );
        return 'updated';
      } catch (error) {
        if (error instanceof ConcurrencyConflictError) {
          logger.debug('Configuration changed during execution; re-reading', {
            configurationId: configuration.id,
            attempt,
          }, CONTEXT);
          current = this.deps.configurations.get(configuration.tenantId, configuration.id);
          continue;
        }
        if (error instanceof AppError && error.statusCode === 404) {
          current = undefined;
          break;
        }
        logger.error('Failed to record execution on configuration', error instanceof Error ? error : undefined, CONTEXT, {
          configurationId: configuration.id,
        });
        return 'conflict';
      }
    }

    if (!current) {
      logger.warn('Configuration disappeared before its schedule could be updated', {
        configurationId: configuration.id,
      }, CONTEXT);
      return 'skipped';
    }

    logger.error(
      'Could not update configuration schedule after concurrent modifications',
      new ConcurrencyConflictError('Configuration', configuration.id, current.version),
      CONTEXT,
      { configurationId: configuration.id, attempts: SCHEDULE_UPDATE_ATTEMPTS }
    );
    return 'conflict';
  }

  private async emitLifecycle(
    type: LifecycleEventType,
    configuration: RetrievalConfiguration,
    execution: ExecutionRecord,
    payload: Record<string, unknown>
  ): Promise<void> {
    if (!this.deps.notifications.lifecycleEvents) return;
    try {
      await this.deps.transport.publish(
        buildLifecycleNotification(type, configuration, execution.id, execution.correlationId, payload)
      );
    } catch (error) {
      logger.warn('Lifecycle notification failed', {
        type,
        executionId: execution.id,
        error: errorMessage(error),
      }, CONTEXT);
    }
  }

  private logCompletion(configuration: RetrievalConfiguration, record: ExecutionRecord): void {
    const data = {
      executionId: record.id,
      configurationId: configuration.id,
      status: record.status,
      filesFound: record.filesFound,
      filesProcessed: record.filesProcessed,
      durationMs: record.durationMs,
      retryCount: record.retryCount,
    };
    if (record.status === 'Completed') {
      logger.info('Execution completed', data, CONTEXT);
    } else {
      logger.warn('Execution failed', { ...data, errorCategory: record.errorCategory, error: record.errorMessage }, CONTEXT);
    }
  }
}

import { ExecutionErrorCategory, ExecutionMetrics, ExecutionRecord } from './types.js';

export const DEFAULT_METRICS_WINDOW_DAYS = 30;

export function defaultMetricsWindow(now: Date = new Date()): { from: Date; to: Date } {
  return {
    from: new Date(now.getTime() - DEFAULT_METRICS_WINDOW_DAYS * 24 * 60 * 60 * 1000),
    to: now,
  };
}

/**
 * Aggregate execution records; nothing is stored, metrics are derived on read
 */
export function computeExecutionMetrics(
  configurationId: string,
  records: ExecutionRecord[],
  windowStart: Date,
  windowEnd: Date
): ExecutionMetrics {
  let successful = 0;
  let failed = 0;
  let inProgress = 0;
  let durationTotal = 0;
  let durationCount = 0;
  let filesDiscovered = 0;
  let filesProcessed = 0;
  const perDay: Record<string, number> = {};
  const failuresByCategory: Partial<Record<ExecutionErrorCategory, number>> = {};

  for (const record of records) {
    if (record.status === 'Completed') {
      successful++;
    } else if (record.status === 'Failed') {
      failed++;
      const category = record.errorCategory ?? 'InternalError';
      failuresByCategory[category] = (failuresByCategory[category] ?? 0) + 1;
    } else {
      inProgress++;
    }

    if (record.durationMs !== null && (record.status === 'Completed' || record.status === 'Failed')) {
      durationTotal += record.durationMs;
      durationCount++;
    }

    filesDiscovered += record.filesFound;
    filesProcessed += record.filesProcessed;

    const day = record.createdAt.slice(0, 10);
    perDay[day] = (perDay[day] ?? 0) + record.filesFound;
  }

  const terminal = successful + failed;
  return {
    configurationId,
    windowStart: windowStart.toISOString(),
    windowEnd: windowEnd.toISOString(),
    totalExecutions: records.length,
    successfulExecutions: successful,
    failedExecutions: failed,
    inProgressExecutions: inProgress,
    successRate: terminal > 0 ? successful / terminal : null,
    averageDurationMs: durationCount > 0 ? Math.round(durationTotal / durationCount) : null,
    totalFilesDiscovered: filesDiscovered,
    totalFilesProcessed: filesProcessed,
    filesDiscoveredPerDay: perDay,
    failuresByCategory,
  };
}

import { describe, it, expect } from 'vitest';
import { computeExecutionMetrics, defaultMetricsWindow } from './execution-metrics.js';
import { ExecutionRecord } from './types.js';

function record(overrides: Partial<ExecutionRecord>): ExecutionRecord {
  return {
    id: 'exec',
    tenantId: 'tenant-a',
    configurationId: 'daily-ach',
    trigger: 'scheduled',
    status: 'Completed',
    correlationId: 'corr',
    createdAt: '2026-02-23T00:00:00.000Z',
    startedAt: '2026-02-23T00:00:00.000Z',
    completedAt: '2026-02-23T00:00:01.000Z',
    durationMs: 1000,
    filesFound: 0,
    filesProcessed: 0,
    notificationsEmitted: 0,
    notificationFailures: 0,
    retryCount: 0,
    resolvedPath: null,
    resolvedNamePattern: null,
    errorCategory: null,
    errorMessage: null,
    ...overrides,
  };
}

const from = new Date('2026-02-01T00:00:00.000Z');
const to = new Date('2026-03-01T00:00:00.000Z');

describe('computeExecutionMetrics', () => {
  it('should aggregate outcomes, durations and files', () => {
    const metrics = computeExecutionMetrics('daily-ach', [
      record({ filesFound: 2, filesProcessed: 2, durationMs: 1000 }),
      record({ createdAt: '2026-02-24T00:00:00.000Z', filesFound: 3, filesProcessed: 1, durationMs: 2000 }),
      record({ createdAt: '2026-02-24T06:00:00.000Z', status: 'Failed', errorCategory: 'NetworkError', durationMs: 4000 }),
      record({ createdAt: '2026-02-25T00:00:00.000Z', status: 'Failed', errorCategory: null, durationMs: null }),
      record({ createdAt: '2026-02-25T00:05:00.000Z', status: 'Running', durationMs: null }),
    ], from, to);

    expect(metrics).toEqual({
      configurationId: 'daily-ach',
      windowStart: '2026-02-01T00:00:00.000Z',
      windowEnd: '2026-03-01T00:00:00.000Z',
      totalExecutions: 5,
      successfulExecutions: 2,
      failedExecutions: 2,
      inProgressExecutions: 1,
      successRate: 0.5,
      averageDurationMs: 2333,
      totalFilesDiscovered: 5,
      totalFilesProcessed: 3,
      filesDiscoveredPerDay: { '2026-02-23': 2, '2026-02-24': 3, '2026-02-25': 0 },
      failuresByCategory: { NetworkError: 1, InternalError: 1 },
    });
  });

  it('should report no rates for an empty window', () => {
    const metrics = computeExecutionMetrics('daily-ach', [], from, to);

    expect(metrics.totalExecutions).toBe(0);
    expect(metrics.successRate).toBeNull();
    expect(metrics.averageDurationMs).toBeNull();
    expect(metrics.filesDiscoveredPerDay).toEqual({});
  });
});

describe('defaultMetricsWindow', () => {
  it('should cover the last 30 days', () => {
    const window = defaultMetricsWindow(new Date('2026-03-31T12:00:00.000Z'));

    expect(window.from.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(window.to.toISOString()).toBe('2026-03-31T12:00:00.000Z');
  });
});

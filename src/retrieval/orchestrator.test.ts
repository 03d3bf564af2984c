import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import {
  discovered,
  ftpInput,
  hangUntilAborted,
  memoryDatabase,
  ScriptedRegistry,
  scriptedRegistry,
  StaticCredentialResolver,
  testConfig,
  TestClock,
} from '../test-utils/fixtures.js';
import { FileTransferSettings } from './types.js';
import { ConfigurationStore } from './configuration-store.js';
import { ProcessedFileLedger } from './dedup-ledger.js';
import { ConcurrencyConflictError, RetrievalError } from './errors.js';
import { ExecutionHistoryStore } from './execution-history.js';
import { LocalNotificationBus, NotificationMessage } from './notifications.js';
import { ExecutionOrchestrator, OrchestratorDependencies, withDeadline } from './orchestrator.js';
import { CreateRetrievalConfigurationInput, RetrievalConfiguration } from './types.js';

describe('ExecutionOrchestrator', () => {
  let db: Database.Database;
  let clock: TestClock;
  let configurations: ConfigurationStore;
  let history: ExecutionHistoryStore;
  let ledger: ProcessedFileLedger;
  let adapters: ScriptedRegistry;
  let bus: LocalNotificationBus;
  let received: NotificationMessage[];

  beforeEach(() => {
    db = memoryDatabase();
    clock = new TestClock('2026-02-23T00:00:00.000Z');
    configurations = new ConfigurationStore(db, clock.now);
    history = new ExecutionHistoryStore(db, clock.now);
    ledger = new ProcessedFileLedger(db, clock.now);
    adapters = scriptedRegistry();
    bus = new LocalNotificationBus();
    received = [];
    bus.subscribe((message) => {
      received.push(message);
    });
  });

  afterEach(() => {
    db.close();
  });

  function orchestrator(overrides: Partial<OrchestratorDependencies> = {}): ExecutionOrchestrator {
    const config = testConfig();
    return new ExecutionOrchestrator({
      configurations,
      history,
      ledger,
      adapters: adapters.registry,
      transport: bus,
      credentials: new StaticCredentialResolver(),
      retry: config.retry,
      adapterOptions: config.adapters,
      notifications: config.notifications,
      clock: clock.now,
      ...overrides,
    });
  }

  function setup(input: Partial<CreateRetrievalConfigurationInput> = {}) {
    const configuration = configurations.create(ftpInput(input));
    const execution = history.createPending({
      tenantId: configuration.tenantId,
      configurationId: configuration.id,
      trigger: 'scheduled',
    });
    return { configuration, execution };
  }

  function processedKey(configuration: RetrievalConfiguration, filename: string) {
    return {
      tenantId: configuration.tenantId,
      configurationId: configuration.id,
      locator: discovered(filename).locator,
      discoveryDate: '2026-02-23',
    };
  }

  it('should process and notify every new file', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue([discovered('A.csv'), discovered('B.csv')]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.record.filesFound).toBe(2);
    expect(outcome.record.filesProcessed).toBe(2);
    expect(outcome.record.notificationsEmitted).toBe(2);
    expect(outcome.record.resolvedPath).toBe('/files/2026/02/23');
    expect(outcome.record.resolvedNamePattern).toBe('*.csv');
    expect(ledger.listByExecution(execution.id).map((record) => record.filename)).toEqual(['A.csv', 'B.csv']);
    expect(received.map((message) => message.payload)).toEqual([{ name: 'A.csv' }, { name: 'B.csv' }]);
    expect(received[0].correlationId).toBe(execution.correlationId);
  });

  it('should notify each file once when two executions of a configuration overlap', async () => {
    const { configuration, execution } = setup();
    const overlapping = history.createPending({
      tenantId: configuration.tenantId,
      configurationId: configuration.id,
      trigger: 'manual',
    });
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    const listing = async () => {
      await gate;
      return [discovered('A.csv'), discovered('B.csv'), discovered('C.csv')];
    };
    adapters.ftp.enqueue(listing, listing);

    const engine = orchestrator();
    const running = Promise.all([
      engine.execute(configuration, execution),
      engine.execute(configuration, overlapping),
    ]);
    openGate();
    const outcomes = await running;

    expect(outcomes.map((outcome) => outcome.record.status)).toEqual(['Completed', 'Completed']);
    expect(outcomes.map((outcome) => outcome.record.filesFound)).toEqual([3, 3]);
    expect(outcomes.map((outcome) => outcome.scheduleUpdate)).toEqual(['updated', 'updated']);
    expect(outcomes[0].record.filesProcessed + outcomes[1].record.filesProcessed).toBe(3);
    expect(received).toHaveLength(3);
    expect(received.map((message) => JSON.stringify(message.payload)).sort()).toEqual([
      '{"name":"A.csv"}',
      '{"name":"B.csv"}',
      '{"name":"C.csv"}',
    ]);
  });

  it('should hand the adapter resolved patterns and the resolved secret', async () => {
    const { configuration, execution } = setup({ extension: 'csv' });

    await orchestrator().execute(configuration, execution);

    const [request] = adapters.ftp.requests;
    expect(request.path).toBe('/files/2026/02/23');
    expect(request.namePattern).toBe('*.csv');
    expect(request.extension).toBe('csv');
    expect(request.secret).toBe('test-secret');
    expect(request.maxResults).toBe(1000);
  });

  it('should skip files already in the ledger', async () => {
    const { configuration, execution } = setup();
    ledger.tryMarkProcessed({
      ...processedKey(configuration, 'A.csv'),
      executionId: 'earlier-execution',
      filename: 'A.csv',
    });
    adapters.ftp.enqueue([discovered('A.csv'), discovered('B.csv')]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.record.filesFound).toBe(2);
    expect(outcome.record.filesProcessed).toBe(1);
    expect(received).toHaveLength(1);
    expect(received[0].file?.filename).toBe('B.csv');
  });

  it('should complete with zero files when nothing matches', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue([]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.record.filesFound).toBe(0);
    expect(outcome.record.filesProcessed).toBe(0);
  });

  it('should fail with NetworkError after three timeouts', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(
      new RetrievalError('Connection timed out', 'NetworkError'),
      new RetrievalError('Connection timed out', 'NetworkError'),
      new RetrievalError('Connection timed out', 'NetworkError')
    );

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Failed');
    expect(outcome.record.errorCategory).toBe('NetworkError');
    expect(outcome.record.filesFound).toBe(0);
    expect(outcome.record.retryCount).toBe(2);
    expect(adapters.ftp.requests).toHaveLength(3);
  });

  it('should succeed when a retry recovers', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(new RetrievalError('Connection reset', 'NetworkError'), [discovered('A.csv')]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.record.retryCount).toBe(1);
    expect(outcome.record.filesProcessed).toBe(1);
  });

  it('should time out calls that never answer', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(
      hangUntilAborted<FileTransferSettings>(),
      hangUntilAborted<FileTransferSettings>(),
      hangUntilAborted<FileTransferSettings>()
    );

    const outcome = await orchestrator({ adapterOptions: { callTimeoutMs: 20, maxResults: 1000 } }).execute(
      configuration,
      execution
    );

    expect(outcome.record.status).toBe('Failed');
    expect(outcome.record.errorCategory).toBe('NetworkError');
    expect(outcome.record.errorMessage).toBe('Remote call timed out after 20ms');
    expect(adapters.ftp.requests.every((request) => request.signal.aborted)).toBe(true);
  });

  it('should not retry authentication failures', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(new RetrievalError('Login incorrect', 'AuthenticationFailed'));

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Failed');
    expect(outcome.record.errorCategory).toBe('AuthenticationFailed');
    expect(outcome.record.retryCount).toBe(0);
    expect(adapters.ftp.requests).toHaveLength(1);
  });

  it('should fail with AuthenticationFailed when the credential cannot be resolved', async () => {
    const { configuration, execution } = setup({
      settings: {
        protocol: 'file-transfer',
        host: 'ftp.example.test',
        port: 21,
        username: 'reader',
        passwordHandle: 'ftp/unknown',
        security: 'none',
      },
    });

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.errorCategory).toBe('AuthenticationFailed');
    expect(adapters.ftp.requests).toHaveLength(0);
  });

  it('should treat a missing remote location as empty', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(new RetrievalError('No such directory', 'NotFound'));

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.record.filesFound).toBe(0);
  });

  it('should fail with NotificationFailed but keep marks when a target fails', async () => {
    const { configuration, execution } = setup({
      targets: [
        { kind: 'directed', commandType: 'ProcessFile', destination: 'nowhere' },
        { kind: 'broadcast', eventType: 'FileDiscovered' },
      ],
    });
    adapters.ftp.enqueue([discovered('A.csv')]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Failed');
    expect(outcome.record.errorCategory).toBe('NotificationFailed');
    expect(outcome.record.filesProcessed).toBe(1);
    expect(outcome.record.notificationsEmitted).toBe(1);
    expect(outcome.record.notificationFailures).toBe(1);
    expect(received.map((message) => message.type)).toEqual(['FileDiscovered']);
    expect(ledger.isProcessed(processedKey(configuration, 'A.csv'))).toBe(true);
  });

  it('should release the mark of a file interrupted by cancellation', async () => {
    const { configuration, execution } = setup();
    const controller = new AbortController();
    adapters.ftp.enqueue([discovered('A.csv'), discovered('B.csv')]);
    bus.subscribe(() => {
      controller.abort();
      return new Promise<void>(() => undefined);
    });

    const outcome = await orchestrator().execute(configuration, execution, controller.signal);

    expect(outcome.record.status).toBe('Failed');
    expect(outcome.record.errorCategory).toBe('Cancelled');
    expect(outcome.record.filesProcessed).toBe(0);
    expect(ledger.isProcessed(processedKey(configuration, 'A.csv'))).toBe(false);
    expect(ledger.isProcessed(processedKey(configuration, 'B.csv'))).toBe(false);
  });

  it('should fail as Cancelled when aborted before listing', async () => {
    const { configuration, execution } = setup();
    const controller = new AbortController();
    controller.abort(new RetrievalError('Execution exceeded 5000ms', 'Cancelled'));

    const outcome = await orchestrator().execute(configuration, execution, controller.signal);

    expect(outcome.record.errorCategory).toBe('Cancelled');
    expect(outcome.record.errorMessage).toBe('Execution exceeded 5000ms');
    expect(adapters.ftp.requests).toHaveLength(0);
  });

  it('should stamp the last execution and next run on the configuration', async () => {
    const { configuration, execution } = setup();

    const outcome = await orchestrator().execute(configuration, execution);
    const updated = configurations.get(configuration.tenantId, configuration.id);

    expect(outcome.scheduleUpdate).toBe('updated');
    expect(updated?.lastExecutedAt).toBe('2026-02-23T00:00:00.000Z');
    expect(updated?.nextScheduledRun).toBe('2026-02-24T00:00:00.000Z');
    expect(updated?.version).toBe(2);
  });

  it('should re-read the configuration after a concurrent edit', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue(async () => {
      configurations.update(configuration.tenantId, configuration.id, { description: 'edited', modifiedBy: 'admin' }, 1);
      return [];
    });

    const outcome = await orchestrator().execute(configuration, execution);
    const updated = configurations.get(configuration.tenantId, configuration.id);

    expect(outcome.scheduleUpdate).toBe('updated');
    expect(updated?.description).toBe('edited');
    expect(updated?.lastExecutedAt).toBe('2026-02-23T00:00:00.000Z');
    expect(updated?.version).toBe(3);
  });

  it('should give up on the schedule update after repeated conflicts', async () => {
    const { configuration, execution } = setup();
    const recordExecution = vi.spyOn(configurations, 'recordExecution').mockImplementation(() => {
      throw new ConcurrencyConflictError('Configuration', configuration.id, 1);
    });

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
    expect(outcome.scheduleUpdate).toBe('conflict');
    expect(recordExecution).toHaveBeenCalledTimes(3);
  });

  it('should resolve date tokens in the schedule zone when configured', async () => {
    clock.set('2026-02-23T03:00:00.000Z');
    const { configuration, execution } = setup({
      schedule: { cronExpression: '0 6 * * *', timezone: 'America/New_York' },
      tokenTimezone: 'schedule',
    });
    adapters.ftp.enqueue([discovered('A.csv')]);

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.record.resolvedPath).toBe('/files/2026/02/22');
    expect(ledger.listByExecution(execution.id)[0].discoveryDate).toBe('2026-02-22');
  });

  it('should broadcast lifecycle events when enabled', async () => {
    const { configuration, execution } = setup();
    adapters.ftp.enqueue([discovered('A.csv')]);

    await orchestrator({ notifications: { lifecycleEvents: true } }).execute(configuration, execution);

    expect(received.map((message) => message.type)).toEqual([
      'FileCheckTriggered',
      'FileDiscovered',
      'FileCheckCompleted',
    ]);
    expect(received[2].idempotencyKey).toBe(`tenant-a:daily-ach:${execution.id}:FileCheckCompleted`);
  });

  it('should ignore lifecycle delivery failures', async () => {
    const { configuration, execution } = setup();
    bus.subscribe((message) => {
      if (message.type.startsWith('FileCheck')) {
        throw new Error('bus unavailable');
      }
    });

    const outcome = await orchestrator({ notifications: { lifecycleEvents: true } }).execute(configuration, execution);

    expect(outcome.record.status).toBe('Completed');
  });

  it('should skip an execution that is no longer pending', async () => {
    const { configuration, execution } = setup();
    history.complete(execution.id, {
      status: 'Failed',
      filesFound: 0,
      filesProcessed: 0,
      notificationsEmitted: 0,
      notificationFailures: 0,
      retryCount: 0,
      resolvedPath: null,
      resolvedNamePattern: null,
      errorCategory: 'Cancelled',
      errorMessage: 'closed',
    });

    const outcome = await orchestrator().execute(configuration, execution);

    expect(outcome.scheduleUpdate).toBe('skipped');
    expect(outcome.record.errorMessage).toBe('closed');
    expect(adapters.ftp.requests).toHaveLength(0);
  });
});

describe('withDeadline', () => {
  it('should resolve with the operation result in time', async () => {
    await expect(withDeadline(async () => 'ok', 1000, new AbortController().signal)).resolves.toBe('ok');
  });

  it('should reject as Cancelled when the parent aborts', async () => {
    const parent = new AbortController();
    const pending = withDeadline(() => new Promise<string>(() => undefined), 1000, parent.signal);
    parent.abort();

    await expect(pending).rejects.toMatchObject({ category: 'Cancelled' });
  });
});

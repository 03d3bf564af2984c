import { describe, it, expect } from 'vitest';
import {
  buildFileNotification,
  buildLifecycleNotification,
  emitFileNotifications,
  FileNotificationContext,
  LocalNotificationBus,
  NotificationMessage,
  substitutePlaceholders,
} from './notifications.js';
import { RetrievalConfiguration } from './types.js';
import { discovered, ftpInput } from '../test-utils/fixtures.js';

function configuration(overrides: Partial<RetrievalConfiguration> = {}): RetrievalConfiguration {
  return {
    ...ftpInput(),
    id: 'daily-ach',
    tokenTimezone: 'utc',
    active: true,
    createdAt: '2026-02-01T00:00:00.000Z',
    version: 1,
    ...overrides,
  };
}

function context(overrides: Partial<FileNotificationContext> = {}): FileNotificationContext {
  return {
    configuration: configuration(),
    executionId: 'exec-1',
    correlationId: 'corr-1',
    file: discovered('a.csv'),
    discoveryDate: '2026-02-23',
    ...overrides,
  };
}

describe('substitutePlaceholders', () => {
  const values = { filename: 'a.csv', sizeBytes: 128, lastModified: null };

  it('should keep the raw value for a sole placeholder', () => {
    expect(substitutePlaceholders('{sizeBytes}', values)).toBe(128);
    expect(substitutePlaceholders('{lastModified}', values)).toBeNull();
  });

  it('should interpolate placeholders inside text', () => {
    expect(substitutePlaceholders('File {filename} ({sizeBytes} bytes, {lastModified})', values)).toBe(
      'File a.csv (128 bytes, )'
    );
  });

  it('should leave unknown placeholders as written', () => {
    expect(substitutePlaceholders('{unknown}/{filename}', values)).toBe('{unknown}/a.csv');
  });

  it('should walk arrays and objects', () => {
    expect(substitutePlaceholders({ files: ['{filename}'], meta: { size: '{sizeBytes}', fixed: true } }, values)).toEqual({
      files: ['a.csv'],
      meta: { size: 128, fixed: true },
    });
  });
});

describe('buildFileNotification', () => {
  it('should build a broadcast with a stable idempotency key', () => {
    const message = buildFileNotification(
      { kind: 'broadcast', eventType: 'FileDiscovered', payload: { name: '{filename}', run: '{executionId}' } },
      0,
      context()
    );

    expect(message).toMatchObject({
      mode: 'broadcast',
      type: 'FileDiscovered',
      destination: null,
      idempotencyKey: 'tenant-a:daily-ach:ftp://ftp.example.test:21/files/2026/02/23/a.csv:2026-02-23:0:FileDiscovered',
      correlationId: 'corr-1',
      executionId: 'exec-1',
      protocol: 'file-transfer',
      payload: { name: 'a.csv', run: 'exec-1' },
    });
    expect(message.file).toEqual({
      filename: 'a.csv',
      locator: 'ftp://ftp.example.test:21/files/2026/02/23/a.csv',
      sizeBytes: 128,
      lastModified: '2026-02-22T23:00:00.000Z',
      discoveredAt: '2026-02-23T00:00:00.000Z',
      discoveryDate: '2026-02-23',
    });
  });

  it('should address directed messages to their destination', () => {
    const message = buildFileNotification({ kind: 'directed', commandType: 'ImportFile', destination: 'importer' }, 2, context());

    expect(message.destination).toBe('importer');
    expect(message.payload).toEqual({});
    expect(message.idempotencyKey.endsWith(':2:ImportFile')).toBe(true);
  });
});

describe('LocalNotificationBus', () => {
  it('should deliver broadcasts to subscribers in order until unsubscribed', async () => {
    const bus = new LocalNotificationBus();
    const received: string[] = [];
    bus.subscribe((message) => {
      received.push(`first:${message.type}`);
    });
    const unsubscribe = bus.subscribe(async (message) => {
      received.push(`second:${message.type}`);
    });

    const message = buildLifecycleNotification('FileCheckTriggered', configuration(), 'exec-1', 'corr-1', {});
    await bus.publish(message);
    unsubscribe();
    await bus.publish(message);

    expect(received).toEqual(['first:FileCheckTriggered', 'second:FileCheckTriggered', 'first:FileCheckTriggered']);
  });

  it('should fail directed messages without a handler', async () => {
    const bus = new LocalNotificationBus();
    const message = buildFileNotification({ kind: 'directed', commandType: 'ImportFile', destination: 'importer' }, 0, context());

    await expect(bus.send(message)).rejects.toMatchObject({
      category: 'NotificationFailed',
      message: 'No handler registered for destination "importer"',
    });

    const handled: NotificationMessage[] = [];
    bus.handle('importer', (delivered) => {
      handled.push(delivered);
    });
    await bus.send(message);
    expect(handled).toEqual([message]);
  });
});

describe('emitFileNotifications', () => {
  it('should keep emitting after a target fails', async () => {
    const bus = new LocalNotificationBus();
    const types: string[] = [];
    bus.subscribe((message) => {
      types.push(message.type);
    });

    const outcome = await emitFileNotifications(bus, context({
      configuration: configuration({
        targets: [
          { kind: 'directed', commandType: 'ImportFile', destination: 'importer' },
          { kind: 'broadcast', eventType: 'FileDiscovered' },
        ],
      }),
    }));

    expect(outcome).toEqual({
      emitted: 1,
      failed: 1,
      errors: ['ImportFile: No handler registered for destination "importer"'],
    });
    expect(types).toEqual(['FileDiscovered']);
  });
});

describe('buildLifecycleNotification', () => {
  it('should key lifecycle events by execution', () => {
    const message = buildLifecycleNotification('FileCheckCompleted', configuration(), 'exec-9', 'corr-9', { filesFound: 2 });

    expect(message.idempotencyKey).toBe('tenant-a:daily-ach:exec-9:FileCheckCompleted');
    expect(message.file).toBeUndefined();
    expect(message.payload).toEqual({ filesFound: 2 });
  });
});

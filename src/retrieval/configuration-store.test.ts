import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { ConfigurationStore } from './configuration-store.js';
import { ConcurrencyConflictError, ValidationError } from './errors.js';
import { AppError } from '../logger.js';
import { ftpInput, memoryDatabase, TestClock, webSettings } from '../test-utils/fixtures.js';

describe('ConfigurationStore', () => {
  let db: Database.Database;
  let clock: TestClock;
  let store: ConfigurationStore;

  beforeEach(() => {
    db = memoryDatabase();
    clock = new TestClock('2026-02-23T00:05:00.000Z');
    store = new ConfigurationStore(db, clock.now);
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('should normalize input and compute the first run', () => {
      const created = store.create(ftpInput({ name: '  Daily ACH files ', extension: '.csv ' }));

      expect(created).toMatchObject({
        id: 'daily-ach',
        tenantId: 'tenant-a',
        name: 'Daily ACH files',
        extension: 'csv',
        tokenTimezone: 'utc',
        active: true,
        createdAt: '2026-02-23T00:05:00.000Z',
        createdBy: 'test-user',
        nextScheduledRun: '2026-02-24T00:00:00.000Z',
        version: 1,
      });
      expect(created.settings).toMatchObject({ host: 'ftp.example.test', passwordHandle: 'ftp/partner-a' });
      expect(created.targets).toEqual([{ kind: 'broadcast', eventType: 'FileDiscovered', payload: { name: '{filename}' } }]);
    });

    it('should generate an id when none is given', () => {
      const created = store.create(ftpInput({ id: undefined }));
      expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should leave inactive configurations unscheduled', () => {
      expect(store.create(ftpInput({ active: false })).nextScheduledRun).toBeUndefined();
    });

    it('should reject duplicates within a tenant', () => {
      store.create(ftpInput());

      expect(() => store.create(ftpInput())).toThrow(AppError);
      expect(() => store.create(ftpInput())).toThrow('Configuration already exists: daily-ach');
      expect(store.create(ftpInput({ tenantId: 'tenant-b' })).tenantId).toBe('tenant-b');
    });

    it('should reject invalid configurations', () => {
      expect(() => store.create(ftpInput({ schedule: { cronExpression: 'every day', timezone: 'UTC' } }))).toThrow(
        ValidationError
      );
      expect(store.list().items).toEqual([]);
    });
  });

  describe('get and require', () => {
    it('should scope lookups by tenant', () => {
      store.create(ftpInput());

      expect(store.get('tenant-b', 'daily-ach')).toBeUndefined();
      expect(() => store.require('tenant-b', 'daily-ach')).toThrow('Configuration not found: daily-ach');
    });

    it('should carry a 404 status for missing configurations', () => {
      const failure = (() => {
        try {
          store.require('tenant-a', 'missing');
        } catch (error) {
          return error;
        }
      })();

      expect(failure).toMatchObject({ code: 'CONFIGURATION_NOT_FOUND', statusCode: 404 });
    });
  });

  describe('list', () => {
    beforeEach(() => {
      store.create(ftpInput({ id: 'first' }));
      clock.advance(1000);
      store.create(ftpInput({ id: 'second', active: false }));
      clock.advance(1000);
      store.create(ftpInput({ id: 'third' }));
      store.create(ftpInput({ id: 'other', tenantId: 'tenant-b' }));
    });

    it('should page newest first', () => {
      const first = store.list({ tenantId: 'tenant-a', limit: 2 });
      expect(first.items.map(item => item.id)).toEqual(['third', 'second']);

      const second = store.list({ tenantId: 'tenant-a', limit: 2, continuationToken: first.continuationToken });
      expect(second.items.map(item => item.id)).toEqual(['first']);
      expect(second.continuationToken).toBeNull();
    });

    it('should filter active configurations across tenants', () => {
      expect(store.list({ activeOnly: true }).items.map(item => item.id)).toEqual(['third', 'other', 'first']);
    });
  });

  describe('listDue', () => {
    it('should return active configurations at or past their next run, unscheduled first', () => {
      store.create(ftpInput({ id: 'daily' }));
      store.create(ftpInput({ id: 'hourly', schedule: { cronExpression: '0 * * * *', timezone: 'UTC' } }));
      store.create(ftpInput({ id: 'paused', active: false }));
      store.create(ftpInput({ id: 'unscheduled' }));
      db.prepare('UPDATE retrieval_configurations SET next_scheduled_run = NULL WHERE id = ?').run('unscheduled');

      expect(store.listDue(new Date('2026-02-23T00:30:00.000Z'), 10).map(item => item.id)).toEqual(['unscheduled']);
      expect(store.listDue(new Date('2026-02-24T00:00:00.000Z'), 10).map(item => item.id)).toEqual([
        'unscheduled',
        'hourly',
        'daily',
      ]);
      expect(store.listDue(new Date('2026-02-24T00:00:00.000Z'), 2)).toHaveLength(2);
    });
  });

  describe('update', () => {
    beforeEach(() => {
      store.create(ftpInput());
    });

    it('should bump the version and keep the schedule when it did not change', () => {
      clock.advance(60 * 1000);
      const updated = store.update('tenant-a', 'daily-ach', { name: 'Renamed', modifiedBy: 'editor' }, 1);

      expect(updated).toMatchObject({
        name: 'Renamed',
        version: 2,
        modifiedBy: 'editor',
        modifiedAt: '2026-02-23T00:06:00.000Z',
        nextScheduledRun: '2026-02-24T00:00:00.000Z',
      });
    });

    it('should recompute the next run when the schedule changes', () => {
      const updated = store.update('tenant-a', 'daily-ach', {
        schedule: { cronExpression: '0 6 * * *', timezone: 'America/New_York' },
        modifiedBy: 'editor',
      }, 1);

      expect(updated.nextScheduledRun).toBe('2026-02-23T11:00:00.000Z');
    });

    it('should clear and restore the next run with the active flag', () => {
      const paused = store.update('tenant-a', 'daily-ach', { active: false, modifiedBy: 'editor' }, 1);
      expect(paused.nextScheduledRun).toBeUndefined();

      clock.set('2026-02-25T12:00:00.000Z');
      const resumed = store.update('tenant-a', 'daily-ach', { active: true, modifiedBy: 'editor' }, 2);
      expect(resumed.nextScheduledRun).toBe('2026-02-26T00:00:00.000Z');
    });

    it('should clear the extension with null', () => {
      store.update('tenant-a', 'daily-ach', { extension: 'csv', modifiedBy: 'editor' }, 1);
      const cleared = store.update('tenant-a', 'daily-ach', { extension: null, modifiedBy: 'editor' }, 2);

      expect(cleared.extension).toBeUndefined();
    });

    it('should reject a stale version', () => {
      store.update('tenant-a', 'daily-ach', { name: 'First edit', modifiedBy: 'editor' }, 1);

      expect(() => store.update('tenant-a', 'daily-ach', { name: 'Second edit', modifiedBy: 'other' }, 1)).toThrow(
        ConcurrencyConflictError
      );
      expect(store.require('tenant-a', 'daily-ach').name).toBe('First edit');
    });

    it('should validate the merged result', () => {
      expect(() => store.update('tenant-a', 'daily-ach', { settings: webSettings(), modifiedBy: 'editor' }, 1)).toThrow(
        'Settings for web do not match protocol file-transfer'
      );
    });
  });

  describe('deactivate', () => {
    it('should deactivate at the current version by default', () => {
      store.create(ftpInput());
      const deactivated = store.deactivate('tenant-a', 'daily-ach', 'operator');

      expect(deactivated).toMatchObject({ active: false, version: 2, modifiedBy: 'operator' });
      expect(deactivated.nextScheduledRun).toBeUndefined();
      expect(() => store.deactivate('tenant-a', 'daily-ach', 'operator', 1)).toThrow(ConcurrencyConflictError);
    });
  });

  describe('recordExecution', () => {
    it('should stamp the run and the next occurrence', () => {
      store.create(ftpInput());
      const stamped = store.recordExecution('tenant-a', 'daily-ach', {
        executedAt: new Date('2026-02-24T00:00:02.000Z'),
        nextScheduledRun: new Date('2026-02-25T00:00:00.000Z'),
      }, 1);

      expect(stamped).toMatchObject({
        lastExecutedAt: '2026-02-24T00:00:02.000Z',
        nextScheduledRun: '2026-02-25T00:00:00.000Z',
        version: 2,
      });
    });

    it('should distinguish missing configurations from conflicts', () => {
      store.create(ftpInput());
      const update = { executedAt: clock.now(), nextScheduledRun: null };

      expect(() => store.recordExecution('tenant-a', 'missing', update, 1)).toThrow('Configuration not found: missing');
      expect(() => store.recordExecution('tenant-a', 'daily-ach', update, 7)).toThrow(ConcurrencyConflictError);
    });
  });

  describe('scheduleNextRun', () => {
    it('should set the next run under the version guard', () => {
      store.create(ftpInput());
      const scheduled = store.scheduleNextRun('tenant-a', 'daily-ach', new Date('2026-03-01T00:00:00.000Z'), 1);

      expect(scheduled.nextScheduledRun).toBe('2026-03-01T00:00:00.000Z');
      expect(() => store.scheduleNextRun('tenant-a', 'daily-ach', new Date(), 1)).toThrow(ConcurrencyConflictError);
    });
  });
});

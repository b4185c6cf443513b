import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteSnapshotStore, isSessionSnapshot } from '../../src/session/store.js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { SessionSnapshot, SessionStatus } from '../../src/session/types.js';

function makeSnapshot(
  sessionId: string,
  overrides: Partial<SessionSnapshot> = {}
): SessionSnapshot {
  return {
    sessionId,
    sessionType: 'default',
    status: 'completed',
    config: {
      sessionType: 'default',
      timeoutMinutes: 60,
      maxOperations: 1000,
      autoCleanup: true,
      persistState: true,
      logLevel: 'info',
      resourceLimits: {},
      customSettings: {},
    },
    metrics: {
      operationsCount: 2,
      apiCallsCount: 0,
      filesProcessed: 0,
      errorsCount: 0,
      warningsCount: 0,
      bytesProcessed: 0,
      executionTimeSeconds: 4,
    },
    createdAt: '2026-01-01T00:00:00.000Z',
    startedAt: '2026-01-01T00:00:00.000Z',
    completedAt: '2026-01-01T00:00:04.000Z',
    lastActivity: '2026-01-01T00:00:04.000Z',
    runtimeDuration: 4,
    isExpired: false,
    operationCount: 2,
    errorCount: 0,
    allocatedResources: [],
    stateKeys: [],
    ...overrides,
  };
}

describe('SqliteSnapshotStore', () => {
  let store: SqliteSnapshotStore;
  let dbPath: string;

  beforeEach(() => {
    // Create a temporary database file
    dbPath = path.join(os.tmpdir(), `test-snapshots-${Date.now()}-${Math.random()}.db`);
    store = new SqliteSnapshotStore(dbPath);
  });

  afterEach(() => {
    store.close();
    vi.useRealTimers();
    // Clean up the temporary database
    if (fs.existsSync(dbPath)) {
      fs.unlinkSync(dbPath);
    }
  });

  describe('save and get', () => {
    it('saves and retrieves a snapshot', () => {
      const snapshot = makeSnapshot('session-1', { stateKeys: ['queue'] });

      store.save(snapshot);

      expect(store.get('session-1')).toEqual(snapshot);
    });

    it('returns null for a missing snapshot', () => {
      expect(store.get('missing')).toBeNull();
    });

    it('replaces an earlier snapshot of the same session', () => {
      store.save(makeSnapshot('session-1', { status: 'active', completedAt: null }));
      store.save(makeSnapshot('session-1'));

      expect(store.get('session-1')?.status).toBe('completed');
      expect(store.list()).toHaveLength(1);
    });

    it('survives reopening the database', () => {
      store.save(makeSnapshot('session-1'));
      store.close();

      store = new SqliteSnapshotStore(dbPath);

      expect(store.get('session-1')?.sessionId).toBe('session-1');
    });

    it('creates the parent directory when missing', () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-dir-'));
      const nested = path.join(dir, 'a', 'b', 'snapshots.db');

      const nestedStore = new SqliteSnapshotStore(nested);
      nestedStore.save(makeSnapshot('session-1'));
      nestedStore.close();

      expect(fs.existsSync(nested)).toBe(true);
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('skips rows whose document is not a snapshot', () => {
      store.save(makeSnapshot('good'));
      store.close();

      const db = new Database(dbPath);
      db.prepare(
        `INSERT INTO session_snapshots (session_id, session_type, status, created_at, completed_at, saved_at, snapshot)
         VALUES ('bad', 'default', 'completed', 0, NULL, 0, '{not json')`
      ).run();
      db.close();

      store = new SqliteSnapshotStore(dbPath);

      expect(store.get('bad')).toBeNull();
      expect(store.list().map((s) => s.sessionId)).toEqual(['good']);
    });
  });

  describe('list', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      const statuses: Array<[string, string, SessionStatus]> = [
        ['s1', 'default', 'completed'],
        ['s2', 'api_workflow', 'failed'],
        ['s3', 'api_workflow', 'completed'],
        ['s4', 'testing', 'active'],
      ];
      statuses.forEach(([id, sessionType, status], index) => {
        vi.setSystemTime(new Date(Date.UTC(2026, 0, 1, 0, index)));
        store.save(makeSnapshot(id, { sessionType, status }));
      });
    });

    it('returns the most recently saved first', () => {
      expect(store.list().map((s) => s.sessionId)).toEqual(['s4', 's3', 's2', 's1']);
    });

    it('filters by status', () => {
      expect(store.list({ status: 'completed' }).map((s) => s.sessionId)).toEqual(['s3', 's1']);
      expect(store.list({ status: ['failed', 'active'] }).map((s) => s.sessionId)).toEqual([
        's4',
        's2',
      ]);
    });

    it('filters by session type', () => {
      expect(store.list({ sessionType: 'api_workflow' }).map((s) => s.sessionId)).toEqual([
        's3',
        's2',
      ]);
    });

    it('respects limit', () => {
      expect(store.list({ limit: 2 }).map((s) => s.sessionId)).toEqual(['s4', 's3']);
    });
  });

  describe('delete and prune', () => {
    it('deletes a snapshot', () => {
      store.save(makeSnapshot('session-1'));

      expect(store.delete('session-1')).toBe(true);
      expect(store.delete('session-1')).toBe(false);
      expect(store.get('session-1')).toBeNull();
    });

    it('prunes snapshots saved before a cutoff', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      store.save(makeSnapshot('old'));
      vi.setSystemTime(new Date('2026-01-10T00:00:00Z'));
      store.save(makeSnapshot('new'));

      const removed = store.prune(new Date('2026-01-05T00:00:00Z'));

      expect(removed).toBe(1);
      expect(store.list().map((s) => s.sessionId)).toEqual(['new']);
    });
  });

  describe('getStats', () => {
    it('reports zeros for an empty store', () => {
      const stats = store.getStats();

      expect(stats.totalSnapshots).toBe(0);
      expect(stats.averageRuntime).toBe(0);
      expect(stats.oldest).toBeUndefined();
      expect(stats.newest).toBeUndefined();
    });

    it('aggregates counts and metrics', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
      store.save(makeSnapshot('s1'));
      vi.setSystemTime(new Date('2026-01-02T00:00:00Z'));
      store.save(
        makeSnapshot('s2', {
          sessionType: 'batch_operation',
          status: 'failed',
          runtimeDuration: 10,
          metrics: { ...makeSnapshot('x').metrics, operationsCount: 5, errorsCount: 1 },
        })
      );

      const stats = store.getStats();

      expect(stats.totalSnapshots).toBe(2);
      expect(stats.byStatus).toEqual({ completed: 1, failed: 1 });
      expect(stats.byType).toEqual({ default: 1, batch_operation: 1 });
      expect(stats.totalOperations).toBe(7);
      expect(stats.totalErrors).toBe(1);
      expect(stats.averageRuntime).toBe(7);
      expect(stats.oldest?.toISOString()).toBe('2026-01-01T00:00:00.000Z');
      expect(stats.newest?.toISOString()).toBe('2026-01-02T00:00:00.000Z');
    });
  });

  describe('in-memory', () => {
    it('works without touching the filesystem', () => {
      const memory = new SqliteSnapshotStore(':memory:');
      memory.save(makeSnapshot('session-1'));

      expect(memory.get('session-1')?.sessionId).toBe('session-1');
      memory.close();
    });
  });
});

describe('isSessionSnapshot', () => {
  it('accepts a snapshot', () => {
    expect(isSessionSnapshot(makeSnapshot('session-1'))).toBe(true);
  });

  it('rejects values missing required fields or with an unknown status', () => {
    expect(isSessionSnapshot(null)).toBe(false);
    expect(isSessionSnapshot('session-1')).toBe(false);
    expect(isSessionSnapshot({ sessionId: 'session-1' })).toBe(false);
    expect(isSessionSnapshot({ ...makeSnapshot('session-1'), status: 'sleeping' })).toBe(false);
    expect(isSessionSnapshot({ ...makeSnapshot('session-1'), metrics: null })).toBe(false);
  });
});

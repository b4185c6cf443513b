import { describe, it, expect, vi } from 'vitest';
import { AllocatorTable, noopAllocator } from '../../src/session/allocators.js';
import { Session } from '../../src/session/session.js';
import type { SessionConfig } from '../../src/session/types.js';

function createSession(sessionType: string): Session {
  const config: SessionConfig = {
    sessionType,
    timeoutMinutes: 60,
    maxOperations: 1000,
    autoCleanup: true,
    persistState: true,
    logLevel: 'info',
    resourceLimits: {},
    customSettings: {},
  };
  return new Session('abc', sessionType, config);
}

describe('AllocatorTable', () => {
  it('allocates base resources for every session', async () => {
    const session = createSession('default');

    await new AllocatorTable().allocate(session);

    expect(Array.from(session.allocatedResources)).toEqual(['memory', 'logging', 'logger_abc']);
    expect(session.stateData).toEqual({});
  });

  it('seeds file_processing state', async () => {
    const session = createSession('file_processing');

    await new AllocatorTable().allocate(session);

    expect(session.allocatedResources.has('file_handlers')).toBe(true);
    expect(session.stateData).toEqual({ fileQueue: [], processedFiles: [] });
  });

  it('seeds batch_operation state', async () => {
    const session = createSession('batch_operation');

    await new AllocatorTable().allocate(session);

    expect(session.allocatedResources.has('batch_processor')).toBe(true);
    expect(session.stateData).toEqual({ batchQueue: [], batchResults: [] });
  });

  it('falls back to a no-op for unknown types', () => {
    expect(new AllocatorTable().lookup('custom_etl')).toBe(noopAllocator);
  });

  it('lets callers replace a built-in allocator', async () => {
    const custom = vi.fn((session: Session) => {
      session.allocate('sandbox_pool');
    });
    const table = new AllocatorTable({ api_workflow: custom });
    const session = createSession('api_workflow');

    await table.allocate(session);

    expect(custom).toHaveBeenCalledWith(session);
    expect(session.allocatedResources.has('api_pool')).toBe(false);
    expect(session.allocatedResources.has('sandbox_pool')).toBe(true);
  });

  it('registers allocators for new types', async () => {
    const table = new AllocatorTable();
    table.register('crawler', async (session) => {
      session.stateData.frontier = [];
    });
    const session = createSession('crawler');

    await table.allocate(session);

    expect(session.stateData).toEqual({ frontier: [] });
  });
});

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { buildTemplateRegistry, expandHome, toManagerConfig } from '../../src/config/options.js';
import { getDefaultConfig } from '../../src/config/loader.js';

describe('expandHome', () => {
  it('expands a leading tilde', () => {
    expect(expandHome('~/data/s.db')).toBe(path.join(os.homedir(), 'data/s.db'));
    expect(expandHome('~')).toBe(os.homedir());
  });

  it('leaves other paths alone', () => {
    expect(expandHome('/var/lib/s.db')).toBe('/var/lib/s.db');
    expect(expandHome('relative/~/s.db')).toBe('relative/~/s.db');
  });
});

describe('buildTemplateRegistry', () => {
  it('resolves templates that extend templates declared later', () => {
    const registry = buildTemplateRegistry({
      version: 1,
      templates: {
        strict_api: { extends: 'slow_api', maxOperations: 7 },
        slow_api: { extends: 'api_workflow', timeoutMinutes: 15 },
      },
    });

    expect(registry.resolve('strict_api')).toMatchObject({
      timeoutMinutes: 15,
      maxOperations: 7,
      resourceLimits: { maxConcurrentApiCalls: 10 },
    });
    expect(registry.get('strict_api')?.description).toBe('Derived from slow_api');
  });

  it('extends the default template when no base is named', () => {
    const registry = buildTemplateRegistry({
      version: 1,
      templates: { audit: { description: 'Audit run', persistState: false } },
    });

    expect(registry.get('audit')).toMatchObject({
      description: 'Audit run',
      config: { timeoutMinutes: 60, persistState: false },
    });
  });

  it('rejects circular extends', () => {
    expect(() =>
      buildTemplateRegistry({
        version: 1,
        templates: { a: { extends: 'b' }, b: { extends: 'a' } },
      })
    ).toThrow('Cannot resolve templates (unknown or circular extends): a, b');
  });

  it('rejects unknown bases', () => {
    expect(() =>
      buildTemplateRegistry({ version: 1, templates: { orphan: { extends: 'nope' } } })
    ).toThrow('Cannot resolve templates (unknown or circular extends): orphan');
  });
});

describe('toManagerConfig', () => {
  it('converts the file units to milliseconds', () => {
    const options = toManagerConfig(getDefaultConfig());

    expect(options).toMatchObject({
      maxConcurrentSessions: 100,
      expiryIntervalMs: 600_000,
      monitorIntervalMs: 60_000,
      completionGraceMs: 1000,
      persistenceEnabled: true,
      dbPath: path.join(os.homedir(), '.mcp-sessions', 'snapshots.db'),
    });
    expect(options.templates?.names()).toContain('maintenance');
  });

  it('leaves unset values to the manager defaults', () => {
    const options = toManagerConfig({ version: 1 });

    expect(options.maxConcurrentSessions).toBeUndefined();
    expect(options.expiryIntervalMs).toBeUndefined();
    expect(options.monitorIntervalMs).toBeUndefined();
    expect(options.dbPath).toBeUndefined();
  });
});

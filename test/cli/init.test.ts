import { describe, it, expect } from 'vitest';
import { generateDefaultConfig } from '../../src/cli/commands/init.js';
import { validateConfig } from '../../src/config/loader.js';
import { buildTemplateRegistry } from '../../src/config/options.js';

describe('Init Command Logic', () => {
  it('generates a config that validates', () => {
    const result = validateConfig(generateDefaultConfig());

    expect(result.errors).toBeUndefined();
    expect(result.valid).toBe(true);
    expect(result.config?.manager).toEqual({
      maxConcurrentSessions: 100,
      expiryIntervalMinutes: 10,
      monitorIntervalSeconds: 60,
      completionGraceMs: 1000,
      logLevel: 'info',
    });
  });

  it('declares an example template built on batch_operation', () => {
    const result = validateConfig(generateDefaultConfig());
    if (!result.config) {
      throw new Error('expected a config');
    }

    const registry = buildTemplateRegistry(result.config);

    expect(registry.resolve('nightly_sync')).toMatchObject({
      timeoutMinutes: 90,
      maxOperations: 50000,
      resourceLimits: { batchSize: 25, maxConcurrentBatches: 5 },
    });
    expect(registry.get('nightly_sync')?.description).toBe('Nightly sync of remote documents');
  });
});

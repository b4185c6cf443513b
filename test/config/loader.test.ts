import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { getDefaultConfig, loadConfig, validateConfig } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/session/errors.js';

describe('Config Loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sessions-config-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe('getDefaultConfig', () => {
    it('returns the documented defaults', () => {
      expect(getDefaultConfig()).toEqual({
        version: 1,
        manager: {
          maxConcurrentSessions: 100,
          expiryIntervalMinutes: 10,
          monitorIntervalSeconds: 60,
          completionGraceMs: 1000,
          logLevel: 'info',
        },
        persistence: {
          enabled: true,
          path: '~/.mcp-sessions/snapshots.db',
        },
        templates: {},
      });
    });
  });

  describe('loadConfig', () => {
    it('merges a partial file over the defaults', async () => {
      const filePath = writeConfig(
        'custom.yaml',
        `version: 1
manager:
  maxConcurrentSessions: 5
persistence:
  enabled: false
`
      );

      const config = await loadConfig(filePath);

      expect(config.manager).toEqual({
        maxConcurrentSessions: 5,
        expiryIntervalMinutes: 10,
        monitorIntervalSeconds: 60,
        completionGraceMs: 1000,
        logLevel: 'info',
      });
      expect(config.persistence).toEqual({
        enabled: false,
        path: '~/.mcp-sessions/snapshots.db',
      });
    });

    it('finds a config file in the working directory', async () => {
      writeConfig('mcp-sessions.yaml', 'manager:\n  logLevel: debug\n');
      vi.spyOn(process, 'cwd').mockReturnValue(tempDir);

      const config = await loadConfig();

      expect(config.manager?.logLevel).toBe('debug');
    });

    it('rejects an unsupported version', async () => {
      const filePath = writeConfig('v2.yaml', 'version: 2\n');

      await expect(loadConfig(filePath)).rejects.toThrow(ConfigurationError);
      await expect(loadConfig(filePath)).rejects.toThrow(
        `Invalid config ${filePath}: Unsupported config version: 2. Expected: 1`
      );
    });

    it('reports unreadable files', async () => {
      const missing = path.join(tempDir, 'missing.yaml');

      await expect(loadConfig(missing)).rejects.toThrow(`Failed to read config file ${missing}`);
    });

    it('reports malformed YAML', async () => {
      const filePath = writeConfig('broken.yaml', 'manager: [unclosed\n');

      await expect(loadConfig(filePath)).rejects.toThrow(`Failed to parse YAML in ${filePath}`);
    });
  });

  describe('validateConfig', () => {
    it('accepts an empty document', () => {
      const result = validateConfig('');

      expect(result.valid).toBe(true);
      expect(result.config).toEqual(getDefaultConfig());
    });

    it('reads templates', () => {
      const result = validateConfig(`version: 1
templates:
  crawler:
    extends: api_workflow
    description: Web crawl
    timeoutMinutes: 45
    logLevel: warn
    customSettings:
      userAgent: test-agent
`);

      expect(result.valid).toBe(true);
      expect(result.config?.templates?.crawler).toMatchObject({
        extends: 'api_workflow',
        description: 'Web crawl',
        timeoutMinutes: 45,
        logLevel: 'warn',
        customSettings: { userAgent: 'test-agent' },
      });
    });

    it('collects every problem', () => {
      const result = validateConfig(`version: 1
manager:
  maxConcurrentSessions: 0
  completionGraceMs: -1
  logLevel: loud
persistence:
  enabled: sometimes
templates:
  t:
    maxOperations: 2.5
    resourceLimits: 10
`);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        'manager.maxConcurrentSessions must be an integer > 0, got 0',
        'manager.completionGraceMs must be an integer >= 0, got -1',
        'Invalid manager.logLevel: loud. Valid: debug, info, warn, error',
        'persistence.enabled must be true or false, got sometimes',
        'templates.t.maxOperations must be an integer > 0, got 2.5',
        'templates.t.resourceLimits must be a mapping',
      ]);
    });

    it('rejects intervals longer than timers allow', () => {
      const result = validateConfig(`manager:
  expiryIntervalMinutes: 40000
  monitorIntervalSeconds: 2147484
`);

      expect(result.valid).toBe(false);
      expect(result.errors?.[0]).toMatch(
        /^manager\.expiryIntervalMinutes must be at most 35791\.39\d*, got 40000$/
      );
      expect(result.errors?.[1]).toBe(
        'manager.monitorIntervalSeconds must be at most 2147483.647, got 2147484'
      );
    });

    it('rejects a document that is not a mapping', () => {
      expect(validateConfig('- one\n- two\n')).toEqual({
        valid: false,
        errors: ['Config must be a mapping'],
      });
    });

    it('reports YAML syntax errors', () => {
      const result = validateConfig('manager: [unclosed\n');

      expect(result.valid).toBe(false);
      expect(result.errors?.[0]).toMatch(/^YAML parse error: /);
    });
  });
});

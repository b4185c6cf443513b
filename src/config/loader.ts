import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { parse as parseYaml } from 'yaml';
import { isLogLevel } from '../logging/logger.js';
import { ConfigurationError } from '../session/errors.js';
import { MAX_INTERVAL_MS } from '../session/tasks.js';
import type {
  CustomTemplateConfig,
  ManagerSettings,
  PersistenceSettings,
  SessionsConfig,
} from './types.js';

export const CONFIG_NAMES = [
  'mcp-sessions.yaml',
  'mcp-sessions.yml',
  '.mcp-sessions.yaml',
  '.mcp-sessions.yml',
];

export async function loadConfig(configPath?: string): Promise<SessionsConfig> {
  // If explicit path provided, use it
  if (configPath) {
    return loadConfigFile(configPath);
  }

  // Search for config in current directory
  for (const name of CONFIG_NAMES) {
    const fullPath = path.join(process.cwd(), name);
    if (fs.existsSync(fullPath)) {
      return loadConfigFile(fullPath);
    }
  }

  // Then ~/.mcp-sessions/config.yaml
  const globalConfig = path.join(os.homedir(), '.mcp-sessions', 'config.yaml');
  if (fs.existsSync(globalConfig)) {
    return loadConfigFile(globalConfig);
  }

  // Return default config if none found
  return getDefaultConfig();
}

async function loadConfigFile(filePath: string): Promise<SessionsConfig> {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read config file ${filePath}: ${reason(error)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse YAML in ${filePath}: ${reason(error)}`);
  }

  const errors: string[] = [];
  const config = readConfig(raw, errors);
  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid config ${filePath}: ${errors.join('; ')}`);
  }

  return mergeWithDefaults(config);
}

function mergeWithDefaults(config: SessionsConfig): SessionsConfig {
  const defaults = getDefaultConfig();

  return {
    version: config.version,
    manager: {
      ...defaults.manager,
      ...config.manager,
    },
    persistence: {
      ...defaults.persistence,
      ...config.persistence,
    },
    templates: config.templates ?? {},
  };
}

export function getDefaultConfig(): SessionsConfig {
  return {
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
  };
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
  config?: SessionsConfig;
}

export function validateConfig(content: string): ValidationResult {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    return {
      valid: false,
      errors: [`YAML parse error: ${reason(error)}`],
    };
  }

  const errors: string[] = [];
  const config = readConfig(raw, errors);

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  return { valid: true, config: mergeWithDefaults(config) };
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumber(
  label: string,
  value: unknown,
  errors: string[],
  options: { integer?: boolean; min?: number; exclusive?: boolean; max?: number }
): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const min = options.min ?? 0;
  const ok =
    typeof value === 'number' &&
    Number.isFinite(value) &&
    (!options.integer || Number.isInteger(value)) &&
    (options.exclusive ? value > min : value >= min);

  if (typeof value !== 'number' || !ok) {
    const kind = options.integer ? 'an integer' : 'a number';
    const bound = options.exclusive ? `> ${min}` : `>= ${min}`;
    errors.push(`${label} must be ${kind} ${bound}, got ${String(value)}`);
    return undefined;
  }

  if (options.max !== undefined && value > options.max) {
    errors.push(`${label} must be at most ${options.max}, got ${value}`);
    return undefined;
  }

  return value;
}

function readBoolean(label: string, value: unknown, errors: string[]): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    errors.push(`${label} must be true or false, got ${String(value)}`);
    return undefined;
  }
  return value;
}

function readString(label: string, value: unknown, errors: string[]): string | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    errors.push(`${label} must be a non-empty string`);
    return undefined;
  }
  return value;
}

function readMapping(
  label: string,
  value: unknown,
  errors: string[]
): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    errors.push(`${label} must be a mapping`);
    return undefined;
  }
  return value;
}

/**
 * Turn parsed YAML into a typed config, collecting every problem found.
 */
function readConfig(raw: unknown, errors: string[]): SessionsConfig {
  // An empty file parses to null
  if (raw === null || raw === undefined) {
    return { version: 1 };
  }

  if (!isRecord(raw)) {
    errors.push('Config must be a mapping');
    return { version: 1 };
  }

  const config: SessionsConfig = { version: 1 };

  if (raw.version !== undefined && raw.version !== 1) {
    errors.push(`Unsupported config version: ${String(raw.version)}. Expected: 1`);
  }

  const manager = readMapping('manager', raw.manager, errors);
  if (manager) {
    config.manager = readManager(manager, errors);
  }

  const persistence = readMapping('persistence', raw.persistence, errors);
  if (persistence) {
    const settings: PersistenceSettings = {};
    const enabled = readBoolean('persistence.enabled', persistence.enabled, errors);
    if (enabled !== undefined) {
      settings.enabled = enabled;
    }
    const dbPath = readString('persistence.path', persistence.path, errors);
    if (dbPath !== undefined) {
      settings.path = dbPath;
    }
    config.persistence = settings;
  }

  const templates = readMapping('templates', raw.templates, errors);
  if (templates) {
    const parsed: Record<string, CustomTemplateConfig> = {};
    for (const [name, value] of Object.entries(templates)) {
      const template = readMapping(`templates.${name}`, value, errors);
      if (template) {
        parsed[name] = readTemplate(name, template, errors);
      }
    }
    config.templates = parsed;
  }

  return config;
}

function readManager(raw: Record<string, unknown>, errors: string[]): ManagerSettings {
  const settings: ManagerSettings = {};

  const maxConcurrentSessions = readNumber(
    'manager.maxConcurrentSessions',
    raw.maxConcurrentSessions,
    errors,
    { integer: true, min: 0, exclusive: true }
  );
  if (maxConcurrentSessions !== undefined) {
    settings.maxConcurrentSessions = maxConcurrentSessions;
  }

  const expiryIntervalMinutes = readNumber(
    'manager.expiryIntervalMinutes',
    raw.expiryIntervalMinutes,
    errors,
    { min: 0, exclusive: true, max: MAX_INTERVAL_MS / 60_000 }
  );
  if (expiryIntervalMinutes !== undefined) {
    settings.expiryIntervalMinutes = expiryIntervalMinutes;
  }

  const monitorIntervalSeconds = readNumber(
    'manager.monitorIntervalSeconds',
    raw.monitorIntervalSeconds,
    errors,
    { min: 0, exclusive: true, max: MAX_INTERVAL_MS / 1000 }
  );
  if (monitorIntervalSeconds !== undefined) {
    settings.monitorIntervalSeconds = monitorIntervalSeconds;
  }

  const completionGraceMs = readNumber('manager.completionGraceMs', raw.completionGraceMs, errors, {
    integer: true,
    min: 0,
  });
  if (completionGraceMs !== undefined) {
    settings.completionGraceMs = completionGraceMs;
  }

  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) {
      settings.logLevel = raw.logLevel;
    } else {
      errors.push(`Invalid manager.logLevel: ${String(raw.logLevel)}. Valid: debug, info, warn, error`);
    }
  }

  return settings;
}

function readTemplate(
  name: string,
  raw: Record<string, unknown>,
  errors: string[]
): CustomTemplateConfig {
  const label = `templates.${name}`;
  const positiveInt = { integer: true, min: 0, exclusive: true };

  const template: CustomTemplateConfig = {
    extends: readString(`${label}.extends`, raw.extends, errors),
    description: readString(`${label}.description`, raw.description, errors),
    timeoutMinutes: readNumber(`${label}.timeoutMinutes`, raw.timeoutMinutes, errors, positiveInt),
    maxOperations: readNumber(`${label}.maxOperations`, raw.maxOperations, errors, positiveInt),
    autoCleanup: readBoolean(`${label}.autoCleanup`, raw.autoCleanup, errors),
    persistState: readBoolean(`${label}.persistState`, raw.persistState, errors),
    resourceLimits: readMapping(`${label}.resourceLimits`, raw.resourceLimits, errors),
    customSettings: readMapping(`${label}.customSettings`, raw.customSettings, errors),
  };

  if (raw.logLevel !== undefined) {
    if (isLogLevel(raw.logLevel)) {
      template.logLevel = raw.logLevel;
    } else {
      errors.push(`Invalid ${label}.logLevel: ${String(raw.logLevel)}`);
    }
  }

  return template;
}

import { isLogLevel, silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { ConfigurationError } from '../session/errors.js';
import type { SessionConfig, SessionConfigOverrides } from '../session/types.js';

/**
 * Session templates: named presets that every new session starts from.
 * Callers adjust a preset per session through overrides.
 */

export interface SessionTemplate {
  name: string;
  description: string;
  config: Omit<SessionConfig, 'sessionType'>;
}

export const DEFAULT_TEMPLATE = 'default';

export const defaultTemplate: SessionTemplate = {
  name: 'default',
  description: 'General purpose session',
  config: {
    timeoutMinutes: 60,
    maxOperations: 1000,
    autoCleanup: true,
    persistState: true,
    logLevel: 'info',
    resourceLimits: {},
    customSettings: {},
  },
};

export const apiWorkflowTemplate: SessionTemplate = {
  name: 'api_workflow',
  description: 'Multi-step workflows against third-party APIs',
  config: {
    timeoutMinutes: 120,
    maxOperations: 5000,
    autoCleanup: true,
    persistState: true,
    logLevel: 'info',
    resourceLimits: { maxConcurrentApiCalls: 10 },
    customSettings: {},
  },
};

export const fileProcessingTemplate: SessionTemplate = {
  name: 'file_processing',
  description: 'Bulk reading, converting and writing of local files',
  config: {
    timeoutMinutes: 180,
    maxOperations: 10000,
    autoCleanup: true,
    persistState: true,
    logLevel: 'info',
    resourceLimits: { maxFileSizeMb: 100, maxFiles: 1000 },
    customSettings: {},
  },
};

export const batchOperationTemplate: SessionTemplate = {
  name: 'batch_operation',
  description: 'Queued work processed in fixed-size batches',
  config: {
    timeoutMinutes: 300,
    maxOperations: 50000,
    autoCleanup: true,
    persistState: true,
    logLevel: 'info',
    resourceLimits: { batchSize: 100, maxConcurrentBatches: 5 },
    customSettings: {},
  },
};

/**
 * Kept after completion so the session can be inspected
 */
export const developmentTemplate: SessionTemplate = {
  name: 'development',
  description: 'Interactive development, kept after completion for debugging',
  config: {
    timeoutMinutes: 240,
    maxOperations: 2000,
    autoCleanup: false,
    persistState: true,
    logLevel: 'debug',
    resourceLimits: {},
    customSettings: {},
  },
};

export const testingTemplate: SessionTemplate = {
  name: 'testing',
  description: 'Short-lived test runs, never persisted',
  config: {
    timeoutMinutes: 30,
    maxOperations: 500,
    autoCleanup: true,
    persistState: false,
    logLevel: 'debug',
    resourceLimits: {},
    customSettings: {},
  },
};

export const maintenanceTemplate: SessionTemplate = {
  name: 'maintenance',
  description: 'Long-running maintenance with elevated system operations',
  config: {
    timeoutMinutes: 600,
    maxOperations: 100,
    autoCleanup: false,
    persistState: true,
    logLevel: 'info',
    resourceLimits: {},
    customSettings: { allowSystemOperations: true },
  },
};

export const builtinTemplates: readonly SessionTemplate[] = [
  defaultTemplate,
  apiWorkflowTemplate,
  fileProcessingTemplate,
  batchOperationTemplate,
  developmentTemplate,
  testingTemplate,
  maintenanceTemplate,
];

function assertPositiveInteger(field: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive integer, got ${String(value)}`);
  }
}

function assertBoolean(field: string, value: unknown): void {
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${field} must be a boolean, got ${String(value)}`);
  }
}

function assertRecord(field: string, value: unknown): void {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be a mapping`);
  }
}

/**
 * Check the fields an override actually sets. Overrides usually arrive
 * untyped from a tool call, so the static type is not trusted.
 */
export function validateOverrides(overrides: SessionConfigOverrides): void {
  if (overrides.timeoutMinutes !== undefined) {
    assertPositiveInteger('timeoutMinutes', overrides.timeoutMinutes);
  }
  if (overrides.maxOperations !== undefined) {
    assertPositiveInteger('maxOperations', overrides.maxOperations);
  }
  if (overrides.autoCleanup !== undefined) {
    assertBoolean('autoCleanup', overrides.autoCleanup);
  }
  if (overrides.persistState !== undefined) {
    assertBoolean('persistState', overrides.persistState);
  }
  if (overrides.logLevel !== undefined && !isLogLevel(overrides.logLevel)) {
    throw new ConfigurationError(`Invalid logLevel: ${String(overrides.logLevel)}`);
  }
  if (overrides.resourceLimits !== undefined) {
    assertRecord('resourceLimits', overrides.resourceLimits);
  }
  if (overrides.customSettings !== undefined) {
    assertRecord('customSettings', overrides.customSettings);
  }
}

/**
 * Apply overrides to a base config. Scalars replace; the two maps merge,
 * so adding one resource limit keeps the template's others.
 */
export function mergeConfig(
  base: Omit<SessionConfig, 'sessionType'>,
  overrides?: SessionConfigOverrides | null
): Omit<SessionConfig, 'sessionType'> {
  const o = overrides ?? {};

  return {
    timeoutMinutes: o.timeoutMinutes ?? base.timeoutMinutes,
    maxOperations: o.maxOperations ?? base.maxOperations,
    autoCleanup: o.autoCleanup ?? base.autoCleanup,
    persistState: o.persistState ?? base.persistState,
    logLevel: o.logLevel ?? base.logLevel,
    resourceLimits: { ...base.resourceLimits, ...o.resourceLimits },
    customSettings: { ...base.customSettings, ...o.customSettings },
  };
}

/**
 * Registry of session templates keyed by session type.
 */
export class TemplateRegistry {
  private templates = new Map<string, SessionTemplate>();
  private logger: Logger;

  constructor(templates: readonly SessionTemplate[] = builtinTemplates, logger: Logger = silentLogger) {
    this.logger = logger;
    for (const template of templates) {
      this.register(template);
    }

    if (!this.templates.has(DEFAULT_TEMPLATE)) {
      this.register(defaultTemplate);
    }
  }

  register(template: SessionTemplate): void {
    validateOverrides(template.config);
    this.templates.set(template.name, template);
  }

  /**
   * Register a template derived from an existing one. Uses the same
   * merge rules as per-session overrides.
   */
  extend(
    name: string,
    base: string,
    overrides: SessionConfigOverrides,
    description?: string
  ): SessionTemplate {
    const parent = this.templates.get(base);
    if (!parent) {
      throw new ConfigurationError(`Template '${name}' extends unknown template '${base}'`);
    }

    validateOverrides(overrides);
    const template: SessionTemplate = {
      name,
      description: description ?? `Derived from ${base}`,
      config: mergeConfig(parent.config, overrides),
    };
    this.register(template);
    return template;
  }

  get(name: string): SessionTemplate | undefined {
    return this.templates.get(name);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  names(): string[] {
    return Array.from(this.templates.keys());
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.templates.values()).map((t) => ({
      name: t.name,
      description: t.description,
    }));
  }

  /**
   * Effective config for a new session. Unknown types fall back to the
   * default template; they never fail.
   */
  resolve(sessionType: string, overrides?: SessionConfigOverrides | null): SessionConfig {
    let template = this.templates.get(sessionType);
    if (!template) {
      this.logger.warn(`Unknown session type '${sessionType}', using ${DEFAULT_TEMPLATE}`);
      template = this.templates.get(DEFAULT_TEMPLATE) ?? defaultTemplate;
    }

    if (overrides) {
      validateOverrides(overrides);
    }

    return {
      sessionType,
      ...mergeConfig(template.config, overrides),
    };
  }
}

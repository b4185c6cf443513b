import * as os from 'os';
import * as path from 'path';
import type { Logger } from '../logging/logger.js';
import { ConfigurationError } from '../session/errors.js';
import type { SessionManagerConfig } from '../session/types.js';
import { DEFAULT_TEMPLATE, TemplateRegistry, builtinTemplates } from './templates.js';
import type { SessionsConfig } from './types.js';

export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Built-in templates plus those declared in the config file. A template
 * may extend one declared after it; cycles and unknown bases are errors.
 */
export function buildTemplateRegistry(config: SessionsConfig, logger?: Logger): TemplateRegistry {
  const registry = new TemplateRegistry(builtinTemplates, logger);
  const pending = new Map(Object.entries(config.templates ?? {}));

  let progressed = true;
  while (pending.size > 0 && progressed) {
    progressed = false;

    for (const [name, template] of pending) {
      const { extends: base = DEFAULT_TEMPLATE, description, ...overrides } = template;
      if (!registry.has(base) || (pending.has(base) && base !== name)) {
        continue;
      }

      registry.extend(name, base, overrides, description);
      pending.delete(name);
      progressed = true;
    }
  }

  if (pending.size > 0) {
    const names = Array.from(pending.keys()).join(', ');
    throw new ConfigurationError(`Cannot resolve templates (unknown or circular extends): ${names}`);
  }

  return registry;
}

/**
 * Manager options for a loaded config. Explicit options win.
 */
export function toManagerConfig(config: SessionsConfig, logger?: Logger): SessionManagerConfig {
  const manager = config.manager ?? {};
  const persistence = config.persistence ?? {};

  return {
    maxConcurrentSessions: manager.maxConcurrentSessions,
    expiryIntervalMs:
      manager.expiryIntervalMinutes !== undefined
        ? manager.expiryIntervalMinutes * 60 * 1000
        : undefined,
    monitorIntervalMs:
      manager.monitorIntervalSeconds !== undefined
        ? manager.monitorIntervalSeconds * 1000
        : undefined,
    completionGraceMs: manager.completionGraceMs,
    persistenceEnabled: persistence.enabled,
    dbPath: persistence.path ? expandHome(persistence.path) : undefined,
    templates: buildTemplateRegistry(config, logger),
    logger,
  };
}

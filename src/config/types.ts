import type { LogLevel } from '../logging/logger.js';
import type { SessionConfigOverrides } from '../session/types.js';

export interface SessionsConfig {
  version: number;
  manager?: ManagerSettings;
  persistence?: PersistenceSettings;
  templates?: Record<string, CustomTemplateConfig>;
}

export interface ManagerSettings {
  maxConcurrentSessions?: number;
  expiryIntervalMinutes?: number;
  monitorIntervalSeconds?: number;
  completionGraceMs?: number;
  logLevel?: LogLevel;
}

export interface PersistenceSettings {
  enabled?: boolean;
  /** SQLite database path; `~` expands to the home directory */
  path?: string;
}

/**
 * A template declared in the config file. Fields not given are taken
 * from the template it extends (`default` unless stated).
 */
export interface CustomTemplateConfig extends SessionConfigOverrides {
  extends?: string;
  description?: string;
}

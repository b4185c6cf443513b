import type { LogLevel, Logger } from '../logging/logger.js';
import type { TemplateRegistry } from '../config/templates.js';
import type { Allocator } from './allocators.js';
import type { SnapshotStore } from './store.js';

export type SessionStatus =
  | 'initializing'
  | 'active'
  | 'paused'
  | 'completing'
  | 'completed'
  | 'failed'
  | 'timeout';

export type TerminalStatus = 'completed' | 'failed' | 'timeout';

/**
 * Names of the built-in templates. Any other string is accepted as a
 * custom session type and resolves to the default template.
 */
export type BuiltinSessionType =
  | 'default'
  | 'api_workflow'
  | 'file_processing'
  | 'batch_operation'
  | 'development'
  | 'testing'
  | 'maintenance';

export interface SessionConfig {
  sessionType: string;
  /** Inactivity window before the expiry sweep times the session out */
  timeoutMinutes: number;
  /** Soft cap: crossing it only produces a monitor warning */
  maxOperations: number;
  autoCleanup: boolean;
  persistState: boolean;
  logLevel: LogLevel;
  resourceLimits: Readonly<Record<string, unknown>>;
  customSettings: Readonly<Record<string, unknown>>;
}

/**
 * Per-session overrides. Scalars replace the template value,
 * `resourceLimits` and `customSettings` are merged key by key.
 */
export type SessionConfigOverrides = Partial<Omit<SessionConfig, 'sessionType'>>;

export interface SessionMetrics {
  operationsCount: number;
  apiCallsCount: number;
  filesProcessed: number;
  errorsCount: number;
  warningsCount: number;
  bytesProcessed: number;
  executionTimeSeconds: number;
}

export interface OperationRecord {
  timestamp: string;
  type: string;
  data: Record<string, unknown>;
  sequenceNumber: number;
}

export interface ErrorRecord {
  timestamp: string;
  type: string;
  message: string;
  data: Record<string, unknown>;
  sequenceNumber: number;
}

/**
 * Anything a session holds open on behalf of its caller.
 */
export interface Closable {
  close(): void | Promise<void>;
}

export interface UsageDelta {
  apiCalls?: number;
  filesProcessed?: number;
  bytesProcessed?: number;
}

/**
 * JSON-serializable view of a session. Also the persisted snapshot format.
 */
export interface SessionSnapshot {
  sessionId: string;
  sessionType: string;
  status: SessionStatus;
  config: SessionConfig;
  metrics: SessionMetrics;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  lastActivity: string;
  runtimeDuration: number;
  isExpired: boolean;
  operationCount: number;
  errorCount: number;
  allocatedResources: string[];
  stateKeys: string[];
}

export interface AggregateStatus {
  totalSessions: number;
  activeSessions: number;
  completedSessions: number;
  failedSessions: number;
  sessionDetails: Record<string, SessionSnapshot>;
}

export interface TransitionResult {
  sessionId: string;
  status: SessionStatus;
  timestamp: string;
}

export interface CompletionSummary {
  sessionId: string;
  status: 'completed';
  durationSeconds: number;
  operationsCount: number;
  timestamp: string;
}

export interface HealthReport {
  status: 'healthy' | 'not_initialized';
  totalSessions: number;
  activeSessions: number;
  sessionLimit: number;
  utilizationPercent: number;
  totalCreated: number;
  totalCompleted: number;
  totalFailed: number;
  totalTimedOut: number;
  expiryTaskRunning: boolean;
  monitorTaskRunning: boolean;
  availableTemplates: string[];
  /** Non-terminal snapshots found in the store at initialization */
  recoverableSnapshots: number;
}

export interface SessionStatistics {
  totalSessions: number;
  sessionsByType: Record<string, number>;
  sessionsByStatus: Partial<Record<SessionStatus, number>>;
  totalOperations: number;
  totalErrors: number;
  averageRuntime: number;
  lifetimeStats: {
    totalCreated: number;
    totalCompleted: number;
    totalFailed: number;
    totalTimedOut: number;
    successRate: number;
  };
}

/**
 * Session manager configuration.
 */
export interface SessionManagerConfig {
  /** Live-collection ceiling checked by startSession (default: 100) */
  maxConcurrentSessions?: number;
  /** Expiry sweep interval in milliseconds (default: 10 minutes) */
  expiryIntervalMs?: number;
  /** Metrics monitor interval in milliseconds (default: 60000) */
  monitorIntervalMs?: number;
  /** Delay before an auto-cleanup session leaves the collection (default: 1000) */
  completionGraceMs?: number;
  /** Whether initialize() starts the background tasks (default: true) */
  enableBackgroundTasks?: boolean;
  /** Whether completed sessions are snapshotted (default: true) */
  persistenceEnabled?: boolean;
  /** Path to the SQLite snapshot database, ':memory:' allowed */
  dbPath?: string | null;
  /** Use this store instead of opening one; the caller keeps ownership */
  store?: SnapshotStore;
  templates?: TemplateRegistry;
  /** Extra or replacement allocators keyed by session type */
  allocators?: Record<string, Allocator>;
  logger?: Logger;
}

// mcp-session-lifecycle - Session lifecycle management for MCP tool servers
// Main library exports

export { SessionManager } from './session/manager.js';
export { Session, TRANSITIONS, canTransition, isTerminalStatus } from './session/session.js';
export { SqliteSnapshotStore, isSessionSnapshot, getDefaultSnapshotPath } from './session/store.js';
export type { SnapshotStore, SnapshotQuery, SnapshotStats } from './session/store.js';
export { IntervalTask, MAX_INTERVAL_MS } from './session/tasks.js';
export type { IntervalTaskOptions } from './session/tasks.js';
export { AllocatorTable, baseAllocator, builtinAllocators, noopAllocator } from './session/allocators.js';
export type { Allocator } from './session/allocators.js';
export type {
  SessionStatus,
  TerminalStatus,
  BuiltinSessionType,
  SessionConfig,
  SessionConfigOverrides,
  SessionMetrics,
  OperationRecord,
  ErrorRecord,
  Closable,
  UsageDelta,
  SessionSnapshot,
  AggregateStatus,
  TransitionResult,
  CompletionSummary,
  HealthReport,
  SessionStatistics,
  SessionManagerConfig,
} from './session/types.js';

// Errors
export {
  SessionError,
  SessionNotFoundError,
  InvalidTransitionError,
  CapacityExceededError,
  AllocationError,
  PersistenceError,
  TeardownError,
  ConfigurationError,
  ManagerNotInitializedError,
} from './session/errors.js';
export type { SessionErrorCode } from './session/errors.js';

// Configuration & templates
export {
  loadConfig,
  validateConfig,
  getDefaultConfig,
  buildTemplateRegistry,
  toManagerConfig,
  TemplateRegistry,
  builtinTemplates,
  mergeConfig,
} from './config/index.js';
export type { SessionsConfig, SessionTemplate, ValidationResult } from './config/index.js';

// Logging
export { ConsoleLogger, silentLogger, isLogLevel } from './logging/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './logging/logger.js';

import type { SessionStatus } from './types.js';

export type SessionErrorCode =
  | 'SESSION_NOT_FOUND'
  | 'INVALID_TRANSITION'
  | 'CAPACITY_EXCEEDED'
  | 'ALLOCATION_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'TEARDOWN_FAILED'
  | 'INVALID_CONFIG'
  | 'NOT_INITIALIZED';

/**
 * Base class for every failure raised by the session subsystem.
 * `code` is stable and safe to hand back to a tool caller.
 */
export class SessionError extends Error {
  readonly code: SessionErrorCode;

  constructor(code: SessionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionError';
    this.code = code;
  }
}

export class SessionNotFoundError extends SessionError {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super('SESSION_NOT_FOUND', `Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
    this.sessionId = sessionId;
  }
}

export class InvalidTransitionError extends SessionError {
  readonly sessionId: string;
  readonly status: SessionStatus;
  readonly action: string;

  /**
   * @param action - verb phrase, e.g. "pause" or "move to completed"
   */
  constructor(sessionId: string, status: SessionStatus, action: string) {
    super('INVALID_TRANSITION', `Session ${sessionId} cannot ${action} (status: ${status})`);
    this.name = 'InvalidTransitionError';
    this.sessionId = sessionId;
    this.status = status;
    this.action = action;
  }
}

export class CapacityExceededError extends SessionError {
  readonly limit: number;

  constructor(limit: number) {
    super('CAPACITY_EXCEEDED', `Maximum concurrent sessions (${limit}) reached`);
    this.name = 'CapacityExceededError';
    this.limit = limit;
  }
}

export class AllocationError extends SessionError {
  readonly sessionId: string;
  readonly sessionType: string;

  constructor(sessionId: string, sessionType: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'ALLOCATION_FAILED',
      `Failed to allocate resources for ${sessionType} session ${sessionId}: ${reason}`,
      { cause }
    );
    this.name = 'AllocationError';
    this.sessionId = sessionId;
    this.sessionType = sessionType;
  }
}

export class PersistenceError extends SessionError {
  readonly sessionId: string;

  constructor(sessionId: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('PERSISTENCE_FAILED', `Failed to persist session ${sessionId}: ${reason}`, { cause });
    this.name = 'PersistenceError';
    this.sessionId = sessionId;
  }
}

export class TeardownError extends SessionError {
  readonly sessionId: string;
  /** What failed to release, e.g. "connection #2" or a temp file path */
  readonly resource: string;

  constructor(sessionId: string, resource: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('TEARDOWN_FAILED', `Failed to release ${resource} for session ${sessionId}: ${reason}`, {
      cause,
    });
    this.name = 'TeardownError';
    this.sessionId = sessionId;
    this.resource = resource;
  }
}

export class ConfigurationError extends SessionError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigurationError';
  }
}

export class ManagerNotInitializedError extends SessionError {
  constructor() {
    super('NOT_INITIALIZED', 'SessionManager not initialized');
    this.name = 'ManagerNotInitializedError';
  }
}

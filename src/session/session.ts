import * as fs from 'fs';
import { InvalidTransitionError, TeardownError } from './errors.js';
import type {
  Closable,
  ErrorRecord,
  OperationRecord,
  SessionConfig,
  SessionMetrics,
  SessionSnapshot,
  SessionStatus,
  TerminalStatus,
  UsageDelta,
} from './types.js';

/**
 * Legal status moves. Terminal statuses have no way out.
 */
export const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  initializing: ['active', 'completing', 'failed', 'timeout'],
  active: ['paused', 'completing', 'failed', 'timeout'],
  paused: ['active', 'completing', 'failed', 'timeout'],
  completing: ['completed', 'failed'],
  completed: [],
  failed: [],
  timeout: [],
};

const TERMINAL: readonly SessionStatus[] = ['completed', 'failed', 'timeout'];

export function isTerminalStatus(status: SessionStatus): status is TerminalStatus {
  return TERMINAL.includes(status);
}

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

function freezeConfig(config: SessionConfig): SessionConfig {
  return Object.freeze({
    ...config,
    resourceLimits: Object.freeze({ ...config.resourceLimits }),
    customSettings: Object.freeze({ ...config.customSettings }),
  });
}

function assertCount(name: string, value: number | undefined): number {
  if (value === undefined) {
    return 0;
  }
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

/**
 * A single unit of lifecycle, metrics and resource bookkeeping.
 *
 * Status only changes through `transition()`, which enforces the table
 * above and stamps `startedAt` / `completedAt`.
 */
export class Session {
  readonly sessionId: string;
  readonly sessionType: string;
  readonly config: SessionConfig;
  private readonly _metrics: SessionMetrics = {
    operationsCount: 0,
    apiCallsCount: 0,
    filesProcessed: 0,
    errorsCount: 0,
    warningsCount: 0,
    bytesProcessed: 0,
    executionTimeSeconds: 0,
  };

  readonly createdAt: Date;
  readonly stateData: Record<string, unknown> = {};
  readonly allocatedResources = new Set<string>();

  private readonly _operationHistory: OperationRecord[] = [];
  private readonly _errorLog: ErrorRecord[] = [];
  private _status: SessionStatus = 'initializing';
  private _startedAt: Date | null = null;
  private _completedAt: Date | null = null;
  private _lastActivity: Date;
  private openConnections: Closable[] = [];
  private tempFiles: string[] = [];

  constructor(sessionId: string, sessionType: string, config: SessionConfig) {
    this.sessionId = sessionId;
    this.sessionType = sessionType;
    this.config = freezeConfig(config);
    this.createdAt = new Date();
    this._lastActivity = new Date(this.createdAt.getTime());
  }

  get status(): SessionStatus {
    return this._status;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get lastActivity(): Date {
    return this._lastActivity;
  }

  /**
   * Frozen copy; counters only move through the recording methods.
   */
  get metrics(): Readonly<SessionMetrics> {
    return Object.freeze({ ...this._metrics });
  }

  get operationHistory(): readonly OperationRecord[] {
    return Object.freeze(this._operationHistory.slice());
  }

  get errorLog(): readonly ErrorRecord[] {
    return Object.freeze(this._errorLog.slice());
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  get connectionCount(): number {
    return this.openConnections.length;
  }

  get tempFileCount(): number {
    return this.tempFiles.length;
  }

  touch(): void {
    const now = new Date();
    // Guard against a clock stepping backwards
    if (now.getTime() >= this.createdAt.getTime()) {
      this._lastActivity = now;
    }
  }

  transition(to: SessionStatus): void {
    if (!canTransition(this._status, to)) {
      throw new InvalidTransitionError(this.sessionId, this._status, `move to ${to}`);
    }

    this._status = to;

    if (to === 'active' && this._startedAt === null) {
      this._startedAt = new Date();
    }

    if (isTerminalStatus(to)) {
      this._completedAt = new Date();
      this._metrics.executionTimeSeconds = this.getRuntimeDuration();
    }
  }

  addOperation(type: string, data?: Record<string, unknown> | null): OperationRecord {
    const record: OperationRecord = Object.freeze({
      timestamp: new Date().toISOString(),
      type,
      data: { ...data },
      sequenceNumber: this._operationHistory.length + 1,
    });
    this._operationHistory.push(record);
    this._metrics.operationsCount++;
    this.touch();
    return record;
  }

  addError(type: string, message: string, data?: Record<string, unknown> | null): ErrorRecord {
    const record: ErrorRecord = Object.freeze({
      timestamp: new Date().toISOString(),
      type,
      message,
      data: { ...data },
      sequenceNumber: this._errorLog.length + 1,
    });
    this._errorLog.push(record);
    this._metrics.errorsCount++;
    this.touch();
    return record;
  }

  /**
   * Recompute the running execution time. No-op once settled.
   */
  refreshExecutionTime(): number {
    if (!this.isTerminal) {
      this._metrics.executionTimeSeconds = this.getRuntimeDuration();
    }
    return this._metrics.executionTimeSeconds;
  }

  addWarning(): void {
    this._metrics.warningsCount++;
    this.touch();
  }

  recordUsage(delta: UsageDelta): void {
    const apiCalls = assertCount('apiCalls', delta.apiCalls);
    const files = assertCount('filesProcessed', delta.filesProcessed);
    const bytes = assertCount('bytesProcessed', delta.bytesProcessed);

    this._metrics.apiCallsCount += apiCalls;
    this._metrics.filesProcessed += files;
    this._metrics.bytesProcessed += bytes;
    this.touch();
  }

  allocate(tag: string): void {
    this.allocatedResources.add(tag);
  }

  trackConnection(connection: Closable): void {
    this.openConnections.push(connection);
  }

  trackTempFile(filePath: string): void {
    this.tempFiles.push(filePath);
  }

  isExpired(now: Date = new Date()): boolean {
    if (this.isTerminal || this._status === 'completing') {
      return false;
    }

    const timeoutMs = this.config.timeoutMinutes * 60 * 1000;
    return now.getTime() - this._lastActivity.getTime() > timeoutMs;
  }

  /**
   * Seconds since start, frozen once the session settles. 0 before start.
   */
  getRuntimeDuration(): number {
    if (this._startedAt === null) {
      return 0;
    }

    const end = this._completedAt ?? new Date();
    return (end.getTime() - this._startedAt.getTime()) / 1000;
  }

  /**
   * Close connections, delete temp files and drop resource tags.
   * Every step runs even if an earlier one fails; failures are returned.
   */
  async releaseResources(): Promise<TeardownError[]> {
    const failures: TeardownError[] = [];

    const connections = this.openConnections;
    this.openConnections = [];
    for (const [index, connection] of connections.entries()) {
      try {
        await connection.close();
      } catch (error) {
        failures.push(new TeardownError(this.sessionId, `connection #${index + 1}`, error));
      }
    }

    const files = this.tempFiles;
    this.tempFiles = [];
    for (const filePath of files) {
      try {
        if (fs.existsSync(filePath)) {
          await fs.promises.unlink(filePath);
        }
      } catch (error) {
        failures.push(new TeardownError(this.sessionId, filePath, error));
      }
    }

    this.allocatedResources.clear();

    return failures;
  }

  toSnapshot(): SessionSnapshot {
    return {
      sessionId: this.sessionId,
      sessionType: this.sessionType,
      status: this._status,
      config: {
        ...this.config,
        resourceLimits: { ...this.config.resourceLimits },
        customSettings: { ...this.config.customSettings },
      },
      metrics: { ...this._metrics },
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      lastActivity: this._lastActivity.toISOString(),
      runtimeDuration: this.getRuntimeDuration(),
      isExpired: this.isExpired(),
      operationCount: this._operationHistory.length,
      errorCount: this._errorLog.length,
      allocatedResources: Array.from(this.allocatedResources),
      stateKeys: Object.keys(this.stateData),
    };
  }
}

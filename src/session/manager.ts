import * as crypto from 'crypto';
import { toManagerConfig } from '../config/options.js';
import { TemplateRegistry } from '../config/templates.js';
import type { SessionsConfig } from '../config/types.js';
import { ConsoleLogger, errorMessage, silentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import { AllocatorTable } from './allocators.js';
import {
  AllocationError,
  CapacityExceededError,
  ConfigurationError,
  InvalidTransitionError,
  ManagerNotInitializedError,
  PersistenceError,
  SessionNotFoundError,
} from './errors.js';
import { Session, canTransition } from './session.js';
import { SqliteSnapshotStore } from './store.js';
import type { SnapshotQuery, SnapshotStore } from './store.js';
import { IntervalTask } from './tasks.js';
import type {
  AggregateStatus,
  CompletionSummary,
  HealthReport,
  SessionConfigOverrides,
  SessionManagerConfig,
  SessionSnapshot,
  SessionStatistics,
  SessionStatus,
  TransitionResult,
} from './types.js';

interface ResolvedManagerConfig {
  maxConcurrentSessions: number;
  expiryIntervalMs: number;
  monitorIntervalMs: number;
  completionGraceMs: number;
  enableBackgroundTasks: boolean;
}

const NON_TERMINAL: SessionStatus[] = ['initializing', 'active', 'paused', 'completing'];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Owns the live session collection and every status change.
 *
 * All mutation of the collection happens between awaits, so cooperative
 * scheduling is the only locking needed: a session id is registered in
 * the same synchronous stretch that mints it.
 */
export class SessionManager {
  private sessions = new Map<string, Session>();
  private readonly templates: TemplateRegistry;
  private readonly allocators: AllocatorTable;
  private readonly logger: Logger;
  private readonly config: ResolvedManagerConfig;
  private readonly expiryTask: IntervalTask;
  private readonly monitorTask: IntervalTask;
  private store: SnapshotStore | null;
  private readonly ownsStore: boolean;
  private initialized = false;

  private totalCreated = 0;
  private totalCompleted = 0;
  private totalFailed = 0;
  private totalTimedOut = 0;
  private recoverableSnapshots = 0;

  constructor(config?: SessionManagerConfig) {
    this.config = {
      maxConcurrentSessions: config?.maxConcurrentSessions ?? 100,
      expiryIntervalMs: config?.expiryIntervalMs ?? 10 * 60 * 1000,
      monitorIntervalMs: config?.monitorIntervalMs ?? 60 * 1000,
      completionGraceMs: config?.completionGraceMs ?? 1000,
      enableBackgroundTasks: config?.enableBackgroundTasks ?? true,
    };

    const limit = this.config.maxConcurrentSessions;
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new ConfigurationError(`maxConcurrentSessions must be a positive integer, got ${limit}`);
    }

    this.logger = config?.logger ?? silentLogger;
    this.templates = config?.templates ?? new TemplateRegistry(undefined, this.logger);
    this.allocators = new AllocatorTable(config?.allocators);

    if (config?.store) {
      this.store = config.store;
      this.ownsStore = false;
    } else if (config?.persistenceEnabled ?? true) {
      this.store = new SqliteSnapshotStore(config?.dbPath ?? undefined);
      this.ownsStore = true;
    } else {
      this.store = null;
      this.ownsStore = false;
    }

    this.expiryTask = new IntervalTask({
      name: 'expiry-sweep',
      intervalMs: this.config.expiryIntervalMs,
      run: async () => {
        await this.sweepExpiredSessions();
      },
      logger: this.logger,
    });

    this.monitorTask = new IntervalTask({
      name: 'session-monitor',
      intervalMs: this.config.monitorIntervalMs,
      run: () => {
        this.monitorSessions();
      },
      logger: this.logger,
    });
  }

  /**
   * Build a manager from a loaded config file. `options` take precedence
   * over the file.
   */
  static fromConfig(config: SessionsConfig, options?: SessionManagerConfig): SessionManager {
    const logger = options?.logger ?? new ConsoleLogger({ level: config.manager?.logLevel });
    return new SessionManager({
      ...toManagerConfig(config, logger),
      ...options,
    });
  }

  /**
   * Load persisted snapshots and start the background tasks.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.loadPersistedSessions();

    if (this.config.enableBackgroundTasks) {
      this.expiryTask.start();
      this.monitorTask.start();
    }

    this.initialized = true;
    this.logger.info(`SessionManager initialized with ${this.templates.names().length} templates`);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Create, allocate and activate a session. Returns its id.
   */
  async startSession(
    sessionType: string,
    overrides?: SessionConfigOverrides | null
  ): Promise<string> {
    if (!this.initialized) {
      throw new ManagerNotInitializedError();
    }

    if (this.sessions.size >= this.config.maxConcurrentSessions) {
      throw new CapacityExceededError(this.config.maxConcurrentSessions);
    }

    const sessionId = this.generateSessionId();
    const config = this.templates.resolve(sessionType, overrides);

    const session = new Session(sessionId, sessionType, config);
    this.sessions.set(sessionId, session);
    this.totalCreated++;

    const log = this.sessionLogger(session);
    log.debug(`Session created with type ${sessionType}`);

    try {
      await this.allocators.allocate(session);
    } catch (error) {
      await this.discardHalfBuilt(session);
      const failure = new AllocationError(sessionId, sessionType, error);
      this.logger.error(failure.message);
      throw failure;
    }

    // Throws if the session was settled (completed, timed out) while allocating
    session.transition('active');
    session.addOperation('session_start', { sessionType });

    log.info(`Session started`, { resources: Array.from(session.allocatedResources) });

    return sessionId;
  }

  /**
   * Live handle for recording operations, errors and resources.
   */
  getSession(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Snapshot of one session, or an aggregate of all of them.
   */
  async getSessionStatus(sessionId: string): Promise<SessionSnapshot>;
  async getSessionStatus(): Promise<AggregateStatus>;
  async getSessionStatus(sessionId?: string): Promise<SessionSnapshot | AggregateStatus>;
  async getSessionStatus(sessionId?: string): Promise<SessionSnapshot | AggregateStatus> {
    if (sessionId !== undefined) {
      return this.getSession(sessionId).toSnapshot();
    }

    const sessionDetails: Record<string, SessionSnapshot> = {};
    let activeSessions = 0;
    let completedSessions = 0;
    let failedSessions = 0;

    for (const [id, session] of this.sessions) {
      sessionDetails[id] = session.toSnapshot();
      if (session.status === 'active') activeSessions++;
      if (session.status === 'completed') completedSessions++;
      if (session.status === 'failed') failedSessions++;
    }

    return {
      totalSessions: this.sessions.size,
      activeSessions,
      completedSessions,
      failedSessions,
      sessionDetails,
    };
  }

  /**
   * Sessions still running or starting up.
   */
  getActiveSessionsCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.status === 'active' || session.status === 'initializing') {
        count++;
      }
    }
    return count;
  }

  async getAllSessions(): Promise<SessionSnapshot[]> {
    return Array.from(this.sessions.values(), (session) => session.toSnapshot());
  }

  async pauseSession(sessionId: string): Promise<TransitionResult> {
    const session = this.getSession(sessionId);

    if (session.status !== 'active') {
      throw new InvalidTransitionError(sessionId, session.status, 'pause');
    }

    session.transition('paused');
    session.addOperation('session_pause');
    this.sessionLogger(session).info('Session paused');

    return { sessionId, status: session.status, timestamp: new Date().toISOString() };
  }

  async resumeSession(sessionId: string): Promise<TransitionResult> {
    const session = this.getSession(sessionId);

    if (session.status !== 'paused') {
      throw new InvalidTransitionError(sessionId, session.status, 'resume');
    }

    session.transition('active');
    session.addOperation('session_resume');
    this.sessionLogger(session).info('Session resumed');

    return { sessionId, status: session.status, timestamp: new Date().toISOString() };
  }

  /**
   * Complete a session: tear down its resources, snapshot it if
   * configured, and drop it from the collection if it auto-cleans.
   *
   * Teardown and persistence problems are logged, not thrown. Anything
   * else that goes wrong marks the session failed and is re-thrown.
   */
  async completeSession(
    sessionId: string,
    completionData?: Record<string, unknown> | null
  ): Promise<CompletionSummary> {
    const session = this.getSession(sessionId);
    return this.finishSession(session, completionData, this.config.completionGraceMs);
  }

  /**
   * Drop a settled session from the collection. Live sessions must be
   * completed first.
   */
  async removeSession(sessionId: string): Promise<void> {
    const session = this.getSession(sessionId);

    if (!session.isTerminal) {
      throw new InvalidTransitionError(sessionId, session.status, 'be removed');
    }

    this.removeFromCollection(session);
  }

  /**
   * Time out every session idle for longer than its timeout. Returns the
   * ids that were swept. One failing session never stops the sweep.
   */
  async sweepExpiredSessions(): Promise<string[]> {
    const now = new Date();
    const expired: Session[] = [];
    for (const session of this.sessions.values()) {
      if (session.isExpired(now)) {
        expired.push(session);
      }
    }

    const swept: string[] = [];
    for (const session of expired) {
      // Settled since the scan (completed, or taken by an overlapping sweep)
      if (session.isTerminal || session.status === 'completing') {
        continue;
      }

      const log = this.sessionLogger(session);
      try {
        session.transition('timeout');
        session.addError('timeout', 'Session expired due to inactivity', {
          timeoutMinutes: session.config.timeoutMinutes,
        });
        this.totalTimedOut++;

        await this.teardown(session, log);
        swept.push(session.sessionId);
        log.info('Cleaned up expired session');
      } catch (error) {
        log.error(`Failed to clean up expired session: ${errorMessage(error)}`);
      } finally {
        this.removeFromCollection(session);
      }
    }

    return swept;
  }

  /**
   * Refresh runtime metrics of active sessions and warn about sessions at
   * their operation cap. Returns the ids over the cap; nothing is stopped.
   */
  monitorSessions(): string[] {
    const overLimit: string[] = [];

    for (const session of this.sessions.values()) {
      if (session.status !== 'active') {
        continue;
      }

      session.refreshExecutionTime();

      if (session.metrics.operationsCount >= session.config.maxOperations) {
        this.sessionLogger(session).warn('Session approaching operation limit', {
          operationsCount: session.metrics.operationsCount,
          maxOperations: session.config.maxOperations,
        });
        overLimit.push(session.sessionId);
      }
    }

    return overLimit;
  }

  async healthCheck(): Promise<HealthReport> {
    const activeSessions = this.getActiveSessionsCount();

    return {
      status: this.initialized ? 'healthy' : 'not_initialized',
      totalSessions: this.sessions.size,
      activeSessions,
      sessionLimit: this.config.maxConcurrentSessions,
      utilizationPercent: (activeSessions / this.config.maxConcurrentSessions) * 100,
      totalCreated: this.totalCreated,
      totalCompleted: this.totalCompleted,
      totalFailed: this.totalFailed,
      totalTimedOut: this.totalTimedOut,
      expiryTaskRunning: this.expiryTask.running,
      monitorTaskRunning: this.monitorTask.running,
      availableTemplates: this.templates.names(),
      recoverableSnapshots: this.recoverableSnapshots,
    };
  }

  async getSessionStatistics(): Promise<SessionStatistics> {
    const sessionsByType: Record<string, number> = {};
    const sessionsByStatus: Partial<Record<SessionStatus, number>> = {};
    let totalOperations = 0;
    let totalErrors = 0;
    let totalRuntime = 0;

    for (const session of this.sessions.values()) {
      sessionsByType[session.sessionType] = (sessionsByType[session.sessionType] || 0) + 1;
      sessionsByStatus[session.status] = (sessionsByStatus[session.status] || 0) + 1;
      totalOperations += session.metrics.operationsCount;
      totalErrors += session.metrics.errorsCount;
      totalRuntime += session.getRuntimeDuration();
    }

    return {
      totalSessions: this.sessions.size,
      sessionsByType,
      sessionsByStatus,
      totalOperations,
      totalErrors,
      averageRuntime: this.sessions.size > 0 ? totalRuntime / this.sessions.size : 0,
      lifetimeStats: {
        totalCreated: this.totalCreated,
        totalCompleted: this.totalCompleted,
        totalFailed: this.totalFailed,
        totalTimedOut: this.totalTimedOut,
        successRate: (this.totalCompleted / Math.max(1, this.totalCreated)) * 100,
      },
    };
  }

  /**
   * Read back a persisted snapshot. Snapshots are history, not live state.
   */
  getPersistedSnapshot(sessionId: string): SessionSnapshot | null {
    return this.store?.get(sessionId) ?? null;
  }

  listPersistedSnapshots(query?: SnapshotQuery): SessionSnapshot[] {
    return this.store?.list(query) ?? [];
  }

  listTemplates(): Array<{ name: string; description: string }> {
    return this.templates.list();
  }

  /**
   * Stop the background tasks, complete every active session and close
   * the snapshot store if this manager opened it.
   */
  async shutdown(): Promise<void> {
    this.logger.info('Shutting down SessionManager...');

    await Promise.all([this.expiryTask.stop(), this.monitorTask.stop()]);

    const active = Array.from(this.sessions.values()).filter((s) => s.status === 'active');
    for (const session of active) {
      try {
        await this.finishSession(session, { reason: 'shutdown' }, 0);
      } catch (error) {
        this.logger.error(
          `Failed to complete session ${session.sessionId} during shutdown: ${errorMessage(error)}`
        );
      }
    }

    this.initialized = false;

    if (this.ownsStore && this.store) {
      this.store.close();
      this.store = null;
    }

    this.logger.info('SessionManager shutdown complete');
  }

  private async finishSession(
    session: Session,
    completionData: Record<string, unknown> | null | undefined,
    graceMs: number
  ): Promise<CompletionSummary> {
    const { sessionId } = session;

    // Settled or already completing: reject before touching anything
    if (!canTransition(session.status, 'completing')) {
      throw new InvalidTransitionError(sessionId, session.status, 'complete');
    }

    const log = this.sessionLogger(session);

    try {
      session.transition('completing');
      session.addOperation('session_complete', completionData);

      await this.teardown(session, log);

      session.transition('completed');
      this.totalCompleted++;

      if (session.config.persistState) {
        this.persist(session, log);
      }

      if (session.config.autoCleanup) {
        if (graceMs > 0) {
          await delay(graceMs);
        }
        this.removeFromCollection(session);
      }

      log.info('Session completed successfully');

      return {
        sessionId,
        status: 'completed',
        durationSeconds: session.metrics.executionTimeSeconds,
        operationsCount: session.metrics.operationsCount,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      if (!session.isTerminal) {
        session.transition('failed');
      }
      session.addError('completion_error', errorMessage(error));
      this.totalFailed++;

      log.error(`Failed to complete session: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Release a session's resources. Individual failures are counted as
   * warnings on the session and logged.
   */
  private async teardown(session: Session, log: Logger): Promise<void> {
    const failures = await session.releaseResources();

    for (const failure of failures) {
      session.addWarning();
      log.warn(failure.message);
    }

    log.debug(`Released resources (${failures.length} failure(s))`);
  }

  private persist(session: Session, log: Logger): boolean {
    if (!this.store) {
      return false;
    }

    try {
      this.store.save(session.toSnapshot());
      log.debug('Persisted session snapshot');
      return true;
    } catch (error) {
      const failure = new PersistenceError(session.sessionId, error);
      log.error(failure.message);
      return false;
    }
  }

  /**
   * Undo a failed start: the session must not stay visible.
   */
  private async discardHalfBuilt(session: Session): Promise<void> {
    this.removeFromCollection(session);

    if (session.status === 'initializing') {
      session.transition('failed');
    }

    const failures = await session.releaseResources();
    for (const failure of failures) {
      this.logger.warn(failure.message);
    }
  }

  private removeFromCollection(session: Session): void {
    if (this.sessions.get(session.sessionId) === session) {
      this.sessions.delete(session.sessionId);
      this.logger.debug(`Removed session ${session.sessionId} from active sessions`);
    }
  }

  private generateSessionId(): string {
    let sessionId = crypto.randomUUID();
    while (this.sessions.has(sessionId)) {
      sessionId = crypto.randomUUID();
    }
    return sessionId;
  }

  private sessionLogger(session: Session): Logger {
    return this.logger.child(`session ${session.sessionId}`, session.config.logLevel);
  }

  /**
   * Snapshots are audit history. Non-terminal ones are counted and
   * reported, never rebuilt into live sessions.
   */
  private loadPersistedSessions(): void {
    if (!this.store) {
      return;
    }

    try {
      const snapshots = this.store.list({ status: NON_TERMINAL });
      for (const snapshot of snapshots) {
        this.logger.info(
          `Found persisted session ${snapshot.sessionId} (status: ${snapshot.status}); not restored`
        );
      }
      this.recoverableSnapshots = snapshots.length;
    } catch (error) {
      this.logger.error(`Failed to load persisted sessions: ${errorMessage(error)}`);
    }
  }
}

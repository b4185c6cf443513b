import Database from 'better-sqlite3';
import * as path from 'path';
import * as os from 'os';
import * as fs from 'fs';
import type { SessionSnapshot, SessionStatus } from './types.js';

export interface SnapshotQuery {
  status?: SessionStatus | SessionStatus[];
  sessionType?: string;
  limit?: number;
}

export interface SnapshotStats {
  totalSnapshots: number;
  byStatus: Record<string, number>;
  byType: Record<string, number>;
  totalOperations: number;
  totalErrors: number;
  averageRuntime: number;
  oldest?: Date;
  newest?: Date;
}

/**
 * Durable home for completed session snapshots, one document per session.
 */
export interface SnapshotStore {
  save(snapshot: SessionSnapshot): void;
  get(sessionId: string): SessionSnapshot | null;
  list(query?: SnapshotQuery): SessionSnapshot[];
  delete(sessionId: string): boolean;
  prune(olderThan: Date): number;
  getStats(): SnapshotStats;
  close(): void;
}

const STATUSES: readonly string[] = [
  'initializing',
  'active',
  'paused',
  'completing',
  'completed',
  'failed',
  'timeout',
];

export function isSessionSnapshot(value: unknown): value is SessionSnapshot {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  if (
    !('sessionId' in value) ||
    !('sessionType' in value) ||
    !('status' in value) ||
    !('config' in value) ||
    !('metrics' in value)
  ) {
    return false;
  }

  return (
    typeof value.sessionId === 'string' &&
    typeof value.sessionType === 'string' &&
    typeof value.status === 'string' &&
    STATUSES.includes(value.status) &&
    typeof value.config === 'object' &&
    value.config !== null &&
    typeof value.metrics === 'object' &&
    value.metrics !== null
  );
}

export function getDefaultSnapshotPath(): string {
  return path.join(os.homedir(), '.mcp-sessions', 'snapshots.db');
}

/**
 * SQLite-backed snapshot store. The snapshot itself is kept as JSON;
 * type, status and timestamps are copied into columns for filtering.
 */
export class SqliteSnapshotStore implements SnapshotStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const actualPath = dbPath || getDefaultSnapshotPath();

    if (actualPath !== ':memory:') {
      const dir = path.dirname(actualPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(actualPath);
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS session_snapshots (
        session_id TEXT PRIMARY KEY,
        session_type TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        completed_at INTEGER,
        saved_at INTEGER NOT NULL,
        snapshot TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_snapshots_status ON session_snapshots(status);
      CREATE INDEX IF NOT EXISTS idx_snapshots_type ON session_snapshots(session_type);
      CREATE INDEX IF NOT EXISTS idx_snapshots_saved ON session_snapshots(saved_at);
    `);
  }

  save(snapshot: SessionSnapshot): void {
    const stmt = this.db.prepare(`
      INSERT OR REPLACE INTO session_snapshots (
        session_id, session_type, status, created_at, completed_at, saved_at, snapshot
      )
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    stmt.run(
      snapshot.sessionId,
      snapshot.sessionType,
      snapshot.status,
      Date.parse(snapshot.createdAt),
      snapshot.completedAt ? Date.parse(snapshot.completedAt) : null,
      Date.now(),
      JSON.stringify(snapshot)
    );
  }

  get(sessionId: string): SessionSnapshot | null {
    const stmt = this.db.prepare('SELECT * FROM session_snapshots WHERE session_id = ?');
    const row = stmt.get(sessionId) as SnapshotRow | undefined;

    if (!row) return null;

    return this.rowToSnapshot(row);
  }

  /**
   * List snapshots, most recently saved first.
   */
  list(query?: SnapshotQuery): SessionSnapshot[] {
    let sql = 'SELECT * FROM session_snapshots WHERE 1=1';
    const params: unknown[] = [];

    if (query?.status) {
      const statuses = Array.isArray(query.status) ? query.status : [query.status];
      if (statuses.length > 0) {
        sql += ` AND status IN (${statuses.map(() => '?').join(', ')})`;
        params.push(...statuses);
      }
    }

    if (query?.sessionType) {
      sql += ' AND session_type = ?';
      params.push(query.sessionType);
    }

    sql += ' ORDER BY saved_at DESC, rowid DESC';

    if (query?.limit) {
      sql += ' LIMIT ?';
      params.push(query.limit);
    }

    const stmt = this.db.prepare(sql);
    const rows = stmt.all(...params) as SnapshotRow[];

    const snapshots: SessionSnapshot[] = [];
    for (const row of rows) {
      const snapshot = this.rowToSnapshot(row);
      if (snapshot) {
        snapshots.push(snapshot);
      }
    }
    return snapshots;
  }

  delete(sessionId: string): boolean {
    const stmt = this.db.prepare('DELETE FROM session_snapshots WHERE session_id = ?');
    const result = stmt.run(sessionId);
    return result.changes > 0;
  }

  /**
   * Delete snapshots saved before the given time.
   */
  prune(olderThan: Date): number {
    const stmt = this.db.prepare('DELETE FROM session_snapshots WHERE saved_at < ?');
    const result = stmt.run(olderThan.getTime());
    return result.changes;
  }

  getStats(): SnapshotStats {
    const countStmt = this.db.prepare(`
      SELECT
        COUNT(*) as total,
        MIN(saved_at) as oldest,
        MAX(saved_at) as newest
      FROM session_snapshots
    `);
    const counts = countStmt.get() as {
      total: number;
      oldest: number | null;
      newest: number | null;
    };

    const byStatus: Record<string, number> = {};
    const statusRows = this.db
      .prepare('SELECT status, COUNT(*) as count FROM session_snapshots GROUP BY status')
      .all() as { status: string; count: number }[];
    for (const row of statusRows) {
      byStatus[row.status] = row.count;
    }

    const byType: Record<string, number> = {};
    const typeRows = this.db
      .prepare('SELECT session_type, COUNT(*) as count FROM session_snapshots GROUP BY session_type')
      .all() as { session_type: string; count: number }[];
    for (const row of typeRows) {
      byType[row.session_type] = row.count;
    }

    // Metric totals live inside the JSON document
    let totalOperations = 0;
    let totalErrors = 0;
    let totalRuntime = 0;
    const snapshots = this.list();
    for (const snapshot of snapshots) {
      totalOperations += snapshot.metrics.operationsCount;
      totalErrors += snapshot.metrics.errorsCount;
      totalRuntime += snapshot.runtimeDuration;
    }

    return {
      totalSnapshots: counts.total,
      byStatus,
      byType,
      totalOperations,
      totalErrors,
      averageRuntime: snapshots.length > 0 ? totalRuntime / snapshots.length : 0,
      oldest: counts.oldest !== null ? new Date(counts.oldest) : undefined,
      newest: counts.newest !== null ? new Date(counts.newest) : undefined,
    };
  }

  close(): void {
    this.db.close();
  }

  private rowToSnapshot(row: SnapshotRow): SessionSnapshot | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(row.snapshot);
    } catch {
      return null;
    }

    return isSessionSnapshot(parsed) ? parsed : null;
  }
}

interface SnapshotRow {
  session_id: string;
  session_type: string;
  status: string;
  created_at: number;
  completed_at: number | null;
  saved_at: number;
  snapshot: string;
}

import { loadConfig } from '../../config/loader.js';
import { expandHome } from '../../config/options.js';
import { getDefaultSnapshotPath, SqliteSnapshotStore } from '../../session/store.js';

/**
 * Snapshot database to read: --db, then the config file, then the default.
 */
export async function resolveDbPath(options: { db?: string; config?: string }): Promise<string> {
  if (options.db) {
    return expandHome(options.db);
  }

  const config = await loadConfig(options.config);
  const configured = config.persistence?.path;
  return configured ? expandHome(configured) : getDefaultSnapshotPath();
}

export async function openStore(options: { db?: string; config?: string }): Promise<SqliteSnapshotStore> {
  return new SqliteSnapshotStore(await resolveDbPath(options));
}

/**
 * "30m", "1h", "7d" -> the point in time that long ago.
 */
export function parseDuration(duration: string, now: number = Date.now()): Date {
  const match = duration.match(/^(\d+)([mhd])$/);
  if (!match) {
    throw new Error(`Invalid duration format: ${duration}. Use format like 30m, 1h, 7d`);
  }

  const value = parseInt(match[1], 10);
  const unit = match[2];

  let ms: number;
  switch (unit) {
    case 'm':
      ms = value * 60 * 1000;
      break;
    case 'h':
      ms = value * 60 * 60 * 1000;
      break;
    case 'd':
      ms = value * 24 * 60 * 60 * 1000;
      break;
    default:
      throw new Error(`Unknown duration unit: ${unit}`);
  }

  return new Date(now - ms);
}

export function formatSeconds(seconds: number): string {
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }
  if (seconds < 3600) {
    return `${Math.floor(seconds / 60)}m ${Math.round(seconds % 60)}s`;
  }
  return `${Math.floor(seconds / 3600)}h ${Math.round((seconds % 3600) / 60)}m`;
}

export function percent(value: number, total: number): string {
  if (total === 0) return '0%';
  return `${Math.round((value / total) * 100)}%`;
}

import { Command } from 'commander';
import type { SnapshotStore } from '../../session/store.js';
import type { SessionSnapshot, SessionStatus } from '../../session/types.js';
import { formatSeconds, openStore, parseDuration } from './shared.js';

const STATUSES: readonly SessionStatus[] = [
  'initializing',
  'active',
  'paused',
  'completing',
  'completed',
  'failed',
  'timeout',
];

function parseStatus(value: string): SessionStatus {
  const status = STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Invalid status: ${value}. Valid: ${STATUSES.join(', ')}`);
  }
  return status;
}

interface StoreOptions {
  db?: string;
  config?: string;
}

export const historyCommand = new Command('history')
  .description('Browse persisted session snapshots');

historyCommand
  .command('list')
  .alias('ls')
  .description('List persisted sessions, most recent first')
  .option('--db <path>', 'Snapshot database')
  .option('-c, --config <path>', 'Config file')
  .option('-s, --status <status>', 'Filter by status')
  .option('-t, --type <type>', 'Filter by session type')
  .option('-n, --limit <count>', 'Maximum number of sessions', '20')
  .option('--json', 'Output as JSON')
  .action(
    async (
      options: StoreOptions & { status?: string; type?: string; limit: string; json?: boolean }
    ) => {
      let store: SnapshotStore | undefined;
      try {
        store = await openStore(options);
        const snapshots = store.list({
          status: options.status ? parseStatus(options.status) : undefined,
          sessionType: options.type,
          limit: parseInt(options.limit, 10) || 20,
        });

        if (options.json) {
          console.log(JSON.stringify(snapshots, null, 2));
          return;
        }

        if (snapshots.length === 0) {
          console.log('No persisted sessions');
          return;
        }

        console.log(`Persisted sessions (${snapshots.length}):\n`);
        for (const snapshot of snapshots) {
          console.log(formatSummary(snapshot));
          console.log();
        }
      } catch (error) {
        console.error('Failed to list sessions:', error);
        process.exit(1);
      } finally {
        store?.close();
      }
    }
  );

historyCommand
  .command('show <id>')
  .description('Show one persisted session snapshot')
  .option('--db <path>', 'Snapshot database')
  .option('-c, --config <path>', 'Config file')
  .action(async (id: string, options: StoreOptions) => {
    let store: SnapshotStore | undefined;
    try {
      store = await openStore(options);
      const snapshot = store.get(id);
      if (!snapshot) {
        console.error(`Session not found: ${id}`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(snapshot, null, 2));
    } catch (error) {
      console.error('Failed to read session:', error);
      process.exit(1);
    } finally {
      store?.close();
    }
  });

historyCommand
  .command('prune')
  .description('Delete snapshots older than a duration')
  .requiredOption('--older-than <duration>', 'Age threshold (e.g., 30m, 1h, 7d)')
  .option('--db <path>', 'Snapshot database')
  .option('-c, --config <path>', 'Config file')
  .action(async (options: StoreOptions & { olderThan: string }) => {
    let store: SnapshotStore | undefined;
    try {
      const cutoff = parseDuration(options.olderThan);
      store = await openStore(options);
      const count = store.prune(cutoff);
      console.log(`Pruned ${count} snapshot(s) saved before ${cutoff.toISOString()}`);
    } catch (error) {
      console.error('Failed to prune snapshots:', error);
      process.exit(1);
    } finally {
      store?.close();
    }
  });

// Default action (list)
historyCommand.action(async () => {
  await historyCommand.commands.find((c) => c.name() === 'list')?.parseAsync([], { from: 'user' });
});

export function formatSummary(snapshot: SessionSnapshot): string {
  return [
    `  ${snapshot.sessionId}`,
    `    Type:       ${snapshot.sessionType}`,
    `    Status:     ${snapshot.status}`,
    `    Completed:  ${snapshot.completedAt ?? 'n/a'}`,
    `    Runtime:    ${formatSeconds(snapshot.runtimeDuration)}`,
    `    Operations: ${snapshot.metrics.operationsCount} (${snapshot.metrics.errorsCount} errors)`,
  ].join('\n');
}

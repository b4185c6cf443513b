import { Command } from 'commander';
import type { SnapshotStore } from '../../session/store.js';
import { formatSeconds, openStore, percent } from './shared.js';

export const statsCommand = new Command('stats')
  .description('Show statistics over persisted sessions')
  .option('--db <path>', 'Snapshot database')
  .option('-c, --config <path>', 'Config file')
  .option('--json', 'Output as JSON')
  .action(async (options: { db?: string; config?: string; json?: boolean }) => {
    let store: SnapshotStore | undefined;
    try {
      store = await openStore(options);
      const stats = store.getStats();

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log('\nSession History Statistics');
      console.log('══════════════════════════════════════════\n');

      console.log('Summary');
      console.log('──────────────────────────────────────────');
      console.log(`  Persisted sessions:   ${stats.totalSnapshots}`);
      console.log(`  Total operations:     ${stats.totalOperations}`);
      console.log(`  Total errors:         ${stats.totalErrors}`);
      console.log(`  Average runtime:      ${formatSeconds(stats.averageRuntime)}`);
      if (stats.oldest && stats.newest) {
        console.log(`  Period:               ${stats.oldest.toISOString()} - ${stats.newest.toISOString()}`);
      }
      console.log();

      if (Object.keys(stats.byStatus).length > 0) {
        console.log('By Status');
        console.log('──────────────────────────────────────────');
        for (const [status, count] of Object.entries(stats.byStatus)) {
          const bar = '█'.repeat(Math.ceil((count / stats.totalSnapshots) * 20));
          console.log(`  ${status.padEnd(12)} ${String(count).padStart(5)}  ${bar} ${percent(count, stats.totalSnapshots)}`);
        }
        console.log();
      }

      if (Object.keys(stats.byType).length > 0) {
        console.log('By Session Type');
        console.log('──────────────────────────────────────────');
        for (const [type, count] of Object.entries(stats.byType)) {
          console.log(`  ${type.padEnd(20)} ${count}`);
        }
        console.log();
      }
    } catch (error) {
      console.error('Failed to get statistics:', error);
      process.exit(1);
    } finally {
      store?.close();
    }
  });

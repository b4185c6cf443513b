import { Command } from 'commander';
import * as fs from 'fs';
import { loadConfig } from '../../config/loader.js';
import { buildTemplateRegistry } from '../../config/options.js';
import { SqliteSnapshotStore } from '../../session/store.js';
import { resolveDbPath } from './shared.js';

export const doctorCommand = new Command('doctor')
  .description('Diagnose installation and configuration issues')
  .option('-c, --config <path>', 'Config file to check')
  .action(async (options: { config?: string }) => {
    console.log('\nSession Manager Doctor\n');
    console.log('═══════════════════════════════════════════\n');

    let issues = 0;

    // Check Node.js version
    process.stdout.write('Node.js version: ');
    const nodeVersion = process.version;
    const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);
    if (majorVersion >= 20) {
      console.log(`✓ ${nodeVersion}`);
    } else {
      console.log(`✗ ${nodeVersion} (requires Node.js 20+)`);
      issues++;
    }

    // Check configuration and templates
    process.stdout.write('Configuration: ');
    try {
      const config = await loadConfig(options.config);
      const registry = buildTemplateRegistry(config);
      console.log(`✓ Loaded (${registry.names().length} templates)`);
    } catch (error) {
      console.log(`✗ ${error instanceof Error ? error.message : String(error)}`);
      issues++;
    }

    // Check snapshot database
    process.stdout.write('Snapshot database: ');
    try {
      const dbPath = await resolveDbPath({ config: options.config });
      if (fs.existsSync(dbPath)) {
        const store = new SqliteSnapshotStore(dbPath);
        try {
          const stats = store.getStats();
          console.log(`✓ ${dbPath} (${stats.totalSnapshots} snapshots)`);
        } finally {
          store.close();
        }
      } else {
        console.log(`- Not created yet (${dbPath})`);
      }
    } catch (error) {
      console.log(`✗ ${error instanceof Error ? error.message : String(error)}`);
      issues++;
    }

    console.log();
    if (issues === 0) {
      console.log('✓ No issues found');
    } else {
      console.log(`✗ ${issues} issue(s) found`);
      process.exit(1);
    }
  });

import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export const initCommand = new Command('init')
  .description('Create a session manager configuration file')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(async (options: { force?: boolean }) => {
    try {
      const homeDir = os.homedir();
      const configPath = path.join(process.cwd(), 'mcp-sessions.yaml');
      const globalConfigPath = path.join(homeDir, '.mcp-sessions', 'config.yaml');

      const targetPath = fs.existsSync(path.join(process.cwd(), 'package.json'))
        ? configPath
        : globalConfigPath;

      if (fs.existsSync(targetPath) && !options.force) {
        console.log(`Configuration already exists: ${targetPath}`);
        console.log('Use --force to overwrite');
        return;
      }

      const dir = path.dirname(targetPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.writeFileSync(targetPath, generateDefaultConfig());
      console.log(`✓ Created configuration: ${targetPath}`);

      console.log('\nNext steps:');
      console.log('  1. Adjust limits and intervals under "manager"');
      console.log('  2. Declare your own session types under "templates"');
      console.log('  3. Run "mcp-sessions doctor" to verify the setup');
    } catch (error) {
      console.error('Initialization failed:', error);
      process.exit(1);
    }
  });

export function generateDefaultConfig(): string {
  return `# MCP session manager configuration

version: 1

manager:
  maxConcurrentSessions: 100   # startSession fails beyond this
  expiryIntervalMinutes: 10    # how often idle sessions are swept
  monitorIntervalSeconds: 60   # how often metrics and limits are checked
  completionGraceMs: 1000      # delay before an auto-cleanup session is dropped
  logLevel: info               # debug, info, warn, error

persistence:
  enabled: true
  path: ~/.mcp-sessions/snapshots.db

# Custom session types. Unlisted fields come from the template named in
# "extends" (default: "default"); resourceLimits and customSettings merge.
templates:
  nightly_sync:
    extends: batch_operation
    description: Nightly sync of remote documents
    timeoutMinutes: 90
    resourceLimits:
      batchSize: 25
`;
}

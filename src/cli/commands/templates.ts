import { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { buildTemplateRegistry } from '../../config/options.js';
import type { SessionConfig } from '../../session/types.js';

export const templatesCommand = new Command('templates')
  .description('List session templates, or show the resolved config of one')
  .argument('[name]', 'Template to show')
  .option('-c, --config <path>', 'Config file declaring custom templates')
  .option('--json', 'Output as JSON')
  .action(async (name: string | undefined, options: { config?: string; json?: boolean }) => {
    try {
      const config = await loadConfig(options.config);
      const registry = buildTemplateRegistry(config);

      if (!name) {
        const list = registry.list();
        if (options.json) {
          console.log(JSON.stringify(list, null, 2));
          return;
        }

        console.log(`Session templates (${list.length}):\n`);
        for (const template of list) {
          console.log(`  ${template.name.padEnd(20)} ${template.description}`);
        }
        return;
      }

      if (!registry.has(name)) {
        console.error(`Unknown template: ${name}`);
        console.error(`Available: ${registry.names().join(', ')}`);
        process.exit(1);
      }

      const resolved = registry.resolve(name);
      if (options.json) {
        console.log(JSON.stringify(resolved, null, 2));
        return;
      }

      console.log(formatTemplate(resolved));
    } catch (error) {
      console.error('Failed to list templates:', error);
      process.exit(1);
    }
  });

export function formatTemplate(config: SessionConfig): string {
  const lines = [
    `Template: ${config.sessionType}`,
    `  Timeout:        ${config.timeoutMinutes} min`,
    `  Max operations: ${config.maxOperations}`,
    `  Auto cleanup:   ${config.autoCleanup ? 'yes' : 'no'}`,
    `  Persist state:  ${config.persistState ? 'yes' : 'no'}`,
    `  Log level:      ${config.logLevel}`,
  ];

  const limits = Object.entries(config.resourceLimits);
  if (limits.length > 0) {
    lines.push('  Resource limits:');
    for (const [key, value] of limits) {
      lines.push(`    ${key}: ${JSON.stringify(value)}`);
    }
  }

  const settings = Object.entries(config.customSettings);
  if (settings.length > 0) {
    lines.push('  Custom settings:');
    for (const [key, value] of settings) {
      lines.push(`    ${key}: ${JSON.stringify(value)}`);
    }
  }

  return lines.join('\n');
}

#!/usr/bin/env node

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { doctorCommand } from './commands/doctor.js';
import { templatesCommand } from './commands/templates.js';
import { historyCommand } from './commands/history.js';
import { statsCommand } from './commands/stats.js';

const program = new Command();

program
  .name('mcp-sessions')
  .description('Inspect session templates and persisted session history')
  .version('0.1.0');

// Configuration
program.addCommand(initCommand);
program.addCommand(doctorCommand);
program.addCommand(templatesCommand);

// Persisted history
program.addCommand(historyCommand);
program.addCommand(statsCommand);

program.parse();

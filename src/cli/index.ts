#!/usr/bin/env node
import { Command } from 'commander';
import { showCommand } from './commands/show.js';
import { listCommand } from './commands/list.js';

const program = new Command()
  .name('trajview')
  .description('Print colorized conversations from agent trajectory result files')
  .version('0.1.0');

program.addCommand(showCommand, { isDefault: true });
program.addCommand(listCommand);

program.parse();

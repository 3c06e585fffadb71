import { Command } from 'commander';
import { printRecordList } from '../../runner/index.js';
import { resolveContext, type CommonOptions } from './shared.js';

export const listCommand = new Command('list')
  .description('List the records in a results file')
  .option('-f, --file <path>', 'Path to the JSON result file')
  .option('--no-color', 'Disable ANSI color output')
  .action((options: CommonOptions, command: Command) => {
    const context = resolveContext(command, options);
    if (!context) {
      return;
    }

    const printed = printRecordList({
      filePath: context.filePath,
      color: context.color,
      onDebug: context.onDebug,
    });

    if (!printed) {
      process.exitCode = 1;
    }
  });

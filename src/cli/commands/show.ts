import { Command } from 'commander';
import { printConversation } from '../../runner/index.js';
import { parseInteger, resolveContext, type CommonOptions } from './shared.js';

export interface ShowOptions extends CommonOptions {
  taskId: number;
  trial: number;
  width?: number;
}

export const showCommand = new Command('show')
  .description('Print one conversation from a results file')
  .option('-f, --file <path>', 'Path to the JSON result file')
  .requiredOption('-t, --task-id <id>', 'Task ID to select', parseInteger)
  .requiredOption('-r, --trial <n>', 'Trial index to select', parseInteger)
  .option('-w, --width <n>', 'Soft-wrap width (<=0 to disable)', parseInteger)
  .option('--no-color', 'Disable ANSI color output')
  .action((options: ShowOptions, command: Command) => {
    const context = resolveContext(command, options);
    if (!context) {
      return;
    }

    const printed = printConversation({
      filePath: context.filePath,
      taskId: options.taskId,
      trial: options.trial,
      width: options.width ?? context.config.width,
      color: context.color,
      compact: {
        maxLength: context.config.compact.max_length,
        maxValueLength: context.config.compact.max_value_length,
      },
      onDebug: context.onDebug,
    });

    if (!printed) {
      process.exitCode = 1;
    }
  });

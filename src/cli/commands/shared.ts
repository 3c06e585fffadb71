import { type Command, InvalidArgumentError } from 'commander';
import pc from 'picocolors';
import { loadConfig, CONFIG_FILENAME } from '../../config/index.js';
import { isTrajviewError } from '../../locator/index.js';
import { createStyler } from '../../render/index.js';
import type { ProjectConfig } from '../../types/index.js';

export interface CommonOptions {
  file?: string;
  color?: boolean;
}

export interface CommandContext {
  config: ProjectConfig;
  filePath: string;
  color: boolean;
  onDebug?: (message: string) => void;
}

/**
 * Commander argument parser for integer options
 */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return Number.parseInt(value, 10);
}

/**
 * Color is on unless disabled by flag or config, or the terminal can't show it
 */
export function resolveColor(flag: boolean | undefined, config?: ProjectConfig): boolean {
  return flag !== false && (config?.color ?? true) && pc.isColorSupported;
}

function debugLogger(): ((message: string) => void) | undefined {
  if (!process.env.TRAJVIEW_DEBUG) {
    return undefined;
  }
  return (message) => console.error(pc.dim(message));
}

/**
 * Load config and settle the results file, color and debug output for a command.
 * Config problems are reported as an error line and yield undefined.
 */
export function resolveContext(command: Command, options: CommonOptions): CommandContext | undefined {
  const onDebug = debugLogger();

  let config: ProjectConfig;
  try {
    const result = loadConfig({ configPath: process.env.TRAJVIEW_CONFIG });
    config = result.config;
    onDebug?.(`[Config] ${result.configPath ?? 'No config file, using defaults'}`);
  } catch (err) {
    if (!isTrajviewError(err)) {
      throw err;
    }
    const style = createStyler(resolveColor(options.color));
    console.log(style(`[error] ${err.message}`, 'error'));
    process.exitCode = 1;
    return undefined;
  }

  const filePath = options.file ?? config.file;
  if (!filePath) {
    command.error(`error: no results file given (use --file or set "file" in ${CONFIG_FILENAME})`);
  }

  return {
    config,
    filePath,
    color: resolveColor(options.color, config),
    onDebug,
  };
}

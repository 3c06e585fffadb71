import { readFileSync, existsSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import yaml from 'js-yaml';
import { ProjectConfigSchema, type ProjectConfig } from '../types/index.js';
import { ConfigError } from '../locator/errors.js';
import { interpolateEnv, type Environment } from './interpolate.js';

export const CONFIG_FILENAME = 'trajview.config.yaml';

/**
 * Find config file by walking up from cwd
 */
function findConfigFile(startDir: string): string | null {
  let dir = startDir;
  while (true) {
    const configPath = resolve(dir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }
    const parentDir = dirname(dir);
    if (parentDir === dir) {
      return null;
    }
    dir = parentDir;
  }
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: Environment;
}

export interface LoadConfigResult {
  config: ProjectConfig;
  /** null when no config file was found and defaults are in effect */
  configPath: string | null;
}

function parseConfig(raw: unknown, configPath: string): ProjectConfig {
  // An empty YAML document loads as undefined
  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${configPath}: ${errors}`);
  }
  return result.data;
}

/**
 * Load and validate project config, falling back to defaults when none exists
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadConfigResult {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(cwd);

  if (!configPath) {
    return { config: ProjectConfigSchema.parse({}), configPath: null };
  }

  if (!existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${configPath}: ${(err as Error).message.split('\n')[0]}`);
  }

  const config = parseConfig(raw, configPath);
  return {
    config: {
      ...config,
      // Relative paths are taken from the config file's directory
      file: config.file === undefined
        ? undefined
        : resolve(dirname(configPath), interpolateEnv(config.file, env)),
    },
    configPath,
  };
}

export { loadConfig, CONFIG_FILENAME, type LoadConfigOptions, type LoadConfigResult } from './loader.js';
export { interpolateEnv, type Environment } from './interpolate.js';

export type Environment = Record<string, string | undefined>;

/**
 * Replace ${ENV.NAME} placeholders; unset variables become empty strings
 */
export function interpolateEnv(template: string, env: Environment = process.env): string {
  return template.replace(/\$\{ENV\.(\w+)\}/g, (_match, name: string) => env[name] ?? '');
}

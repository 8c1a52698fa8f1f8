/**
 * Configuration loader - reads and validates hookwire.json5
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import JSON5 from 'json5';
import { defaultConfig, validateConfig, type HookwireConfig } from './schema.js';

export const DEFAULT_CONFIG_FILE = 'hookwire.json5';

/**
 * Replace `${VAR}` and `${VAR:-default}` references. Unset variables without a
 * default become empty strings.
 */
export function substituteEnvVars(value: string, env: NodeJS.ProcessEnv = process.env): string {
  return value.replace(
    /\$\{(\w+)(?::-(.*?))?\}/g,
    (_, key: string, defaultVal: string | undefined) => env[key] ?? defaultVal ?? ''
  );
}

function substituteDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') {
    return substituteEnvVars(obj, env);
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteDeep(item, env));
  }
  if (obj && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = substituteDeep(val, env);
    }
    return result;
  }
  return obj;
}

export function getConfigPath(cwd: string = process.cwd()): string {
  return join(cwd, DEFAULT_CONFIG_FILE);
}

export function parseConfigContent(content: string, env: NodeJS.ProcessEnv = process.env): HookwireConfig {
  const parsed: unknown = JSON5.parse(content);
  const result = validateConfig(substituteDeep(parsed, env));
  if (!result.success) {
    throw new Error(`Invalid config: ${result.error}`);
  }
  return result.data;
}

/**
 * Load the configuration file. A missing file yields the defaults.
 */
export function loadConfig(options?: { path?: string; env?: NodeJS.ProcessEnv }): HookwireConfig {
  const configPath = options?.path ?? getConfigPath();

  if (!existsSync(configPath)) {
    return defaultConfig();
  }

  return parseConfigContent(readFileSync(configPath, 'utf-8'), options?.env);
}

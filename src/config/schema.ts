/**
 * Configuration schema (Zod)
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';

export const loggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
});

export const hooksConfigSchema = z.object({
  /** Log every hook call and its outcome at debug level. */
  tracing: z.boolean().default(false),
  /** Warn when a call omits a parameter its specification declares. */
  warnOnMissingArgs: z.boolean().default(true),
});

export const pluginsConfigSchema = z.object({
  /** Plugin names that are never registered. */
  blocked: z.array(z.string().min(1)).default([]),
});

export const hookwireConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  hooks: hooksConfigSchema.default({}),
  plugins: pluginsConfigSchema.default({}),
});

export type HookwireConfig = z.infer<typeof hookwireConfigSchema>;

export type ConfigValidationResult =
  | { success: true; data: HookwireConfig }
  | { success: false; error: string };

export function validateConfig(data: unknown): ConfigValidationResult {
  const result = hookwireConfigSchema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
  };
}

/**
 * The configuration used when no file is present.
 */
export function defaultConfig(): HookwireConfig {
  return hookwireConfigSchema.parse({});
}

/**
 * hookwire: synchronous plugin hook dispatch.
 */

export * from './hooks/index.js';
export * from './plugins/index.js';
export { Logger, ConsoleTransport, logger, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { LogEntry, LogLevel, LoggerOptions, Transport } from './logging/logger.js';
export { loadConfig, parseConfigContent, getConfigPath, substituteEnvVars, DEFAULT_CONFIG_FILE } from './config/loader.js';
export { validateConfig, defaultConfig, hookwireConfigSchema } from './config/schema.js';
export type { ConfigValidationResult, HookwireConfig } from './config/schema.js';

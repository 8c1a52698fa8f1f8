/**
 * Hook errors
 *
 * Every failure raised by the hook engine itself is one of these classes.
 * Errors thrown by plugin implementations are never wrapped: they reach the
 * caller unchanged.
 */

/**
 * A hook or implementation was declared with contradictory options, or a
 * specification was bound twice.
 */
export class HookConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookConfigurationError';
  }
}

/**
 * A hook was used through the wrong entry point (historic vs. plain call),
 * with positional arguments, or an unknown plugin was removed.
 */
export class HookUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookUsageError';
  }
}

/**
 * Raised by the dispatcher: a wrapper broke the single-suspension contract or
 * a call did not supply an argument an implementation requires.
 */
export class HookCallError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookCallError';
  }
}

/**
 * A plugin's implementations do not match the specifications they target.
 */
export class PluginValidationError extends Error {
  readonly plugin: unknown;

  constructor(plugin: unknown, message: string) {
    super(message);
    this.name = 'PluginValidationError';
    this.plugin = plugin;
  }
}

/**
 * Normalise an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

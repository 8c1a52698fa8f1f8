/**
 * Hook Specification records
 */

import { HookConfigurationError } from './errors.js';
import type { HookSpec } from './types.js';

export interface HookSpecInput {
  name: string;
  argNames?: readonly string[];
  kwargNames?: readonly string[];
  firstResult?: boolean;
  historic?: boolean;
  warnOnImpl?: string;
  namespace?: unknown;
}

/**
 * Build a frozen HookSpec.
 *
 * @throws HookConfigurationError when both `firstResult` and `historic` are set.
 */
export function createHookSpec(input: HookSpecInput): HookSpec {
  const firstResult = input.firstResult ?? false;
  const historic = input.historic ?? false;
  if (firstResult && historic) {
    throw new HookConfigurationError(
      `Hook "${input.name}" cannot be both historic and firstResult`
    );
  }

  return Object.freeze({
    name: input.name,
    argNames: Object.freeze([...(input.argNames ?? [])]),
    kwargNames: Object.freeze([...(input.kwargNames ?? [])]),
    firstResult,
    historic,
    warnOnImpl: input.warnOnImpl,
    namespace: input.namespace,
  });
}

/**
 * Hook Implementation records
 *
 * Plugins, the plugin manager and `callExtra` all go through
 * `createHookImpl` so that the flag invariants hold for every record that
 * reaches a chain.
 */

import { HookConfigurationError } from './errors.js';
import type {
  HookFunction,
  HookImpl,
  HookWrapper,
  PlainHookImpl,
  WrapperHookImpl,
} from './types.js';

export const TEMP_PLUGIN_NAME = '<temp>';

interface HookImplInputBase {
  plugin?: unknown;
  pluginName?: string;
  argNames?: readonly string[];
  kwargNames?: readonly string[];
  tryFirst?: boolean;
  tryLast?: boolean;
  optionalHook?: boolean;
}

export type HookImplInput =
  | (HookImplInputBase & { hookWrapper?: false; function: HookFunction })
  | (HookImplInputBase & { hookWrapper: true; wrapper: HookWrapper });

/**
 * Build a frozen HookImpl.
 *
 * @throws HookConfigurationError when both `tryFirst` and `tryLast` are set.
 */
export function createHookImpl(input: HookImplInput): HookImpl {
  const tryFirst = input.tryFirst ?? false;
  const tryLast = input.tryLast ?? false;
  const pluginName = input.pluginName ?? TEMP_PLUGIN_NAME;
  if (tryFirst && tryLast) {
    throw new HookConfigurationError(
      `Implementation from plugin "${pluginName}" cannot be both tryFirst and tryLast`
    );
  }

  const base = {
    plugin: input.plugin,
    pluginName,
    argNames: Object.freeze([...(input.argNames ?? [])]),
    kwargNames: Object.freeze([...(input.kwargNames ?? [])]),
    tryFirst,
    tryLast,
    optionalHook: input.optionalHook ?? false,
  };

  if (input.hookWrapper === true) {
    const wrapperImpl: WrapperHookImpl = { ...base, hookWrapper: true, wrapper: input.wrapper };
    return Object.freeze(wrapperImpl);
  }
  const plainImpl: PlainHookImpl = { ...base, hookWrapper: false, function: input.function };
  return Object.freeze(plainImpl);
}

/**
 * Every parameter name the implementation declares, required ones first.
 */
export function declaredParams(impl: HookImpl): string[] {
  return [...impl.argNames, ...impl.kwargNames];
}

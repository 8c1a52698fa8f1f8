/**
 * Hook Engine
 *
 * Exports:
 *   - HookRelay   — one HookCaller per hook name
 *   - HookCaller  — call / callHistoric / callExtra and chain mutation
 *   - HookChain   — tryFirst / tryLast ordering of implementations
 *   - multicall   — the dispatcher behind every call
 *   - HookOutcome — result-or-error handed to wrappers and monitors
 *   - createHookMarkers — declare specifications and implementations
 *   - Errors and record types
 *
 * Quick start:
 *
 *   import { HookRelay, createHookImpl, createHookSpec } from './hooks/index.js';
 *
 *   const relay = new HookRelay();
 *   const caller = relay.get('greet');
 *   caller.setSpecification(createHookSpec({ name: 'greet', argNames: ['who'] }));
 *   caller.addImplementation(
 *     createHookImpl({ plugin: 'en', function: ({ who }) => `hello ${who}`, argNames: ['who'] })
 *   );
 *   caller.call({ who: 'world' }); // ['hello world']
 */

export { HookRelay, defaultHookExec } from './relay.js';
export { HookCaller } from './caller.js';
export { HookChain } from './chain.js';
export { CallHistory } from './history.js';
export { HookOutcome } from './outcome.js';
export { multicall, pickArgs, isPresent } from './multicall.js';
export { createHookImpl, declaredParams, TEMP_PLUGIN_NAME } from './implementation.js';
export { createHookSpec } from './specification.js';
export { createHookMarkers } from './markers.js';
export {
  HookCallError,
  HookConfigurationError,
  HookUsageError,
  PluginValidationError,
  toError,
} from './errors.js';

export type { ExtraImplementation, HookCallerOptions } from './caller.js';
export type { ChainSnapshot } from './chain.js';
export type { HistoricCall } from './history.js';
export type { HookImplInput } from './implementation.js';
export type { HookSpecInput } from './specification.js';
export type { HookRelayOptions } from './relay.js';
export type {
  HookImplDefinition,
  HookImplOptions,
  HookMarkers,
  HookSpecDefinition,
  HookSpecOptions,
} from './markers.js';
export type {
  GeneratorWrapper,
  HistoricResultCallback,
  HookArgs,
  HookExecFn,
  HookExecTarget,
  HookFunction,
  HookImpl,
  HookImplFlags,
  HookSpec,
  HookWrapper,
  PhasedWrapper,
  PlainHookImpl,
  WrapperHookImpl,
} from './types.js';

/**
 * Multicall Dispatcher
 *
 * Runs one logical hook call over an ordered implementation sequence, such
 * as the `plain ++ wrappers` list HookChain produces:
 *
 *   1. The sequence is split into wrappers and plain implementations, each
 *      keeping its relative order.
 *   2. Wrappers are entered from the tail of their list, so the last wrapper
 *      is the outermost one.
 *   3. Plain implementations run next, from the tail: tryFirst entries
 *      first. Each non-absent return value is collected in call order.
 *   4. With `firstResult`, the walk stops at the first non-absent value.
 *   5. Wrapper after-phases run innermost first, each seeing the outcome left
 *      by the one inside it.
 *
 * The outcome is unwrapped at the end: a captured error is re-thrown unless a
 * wrapper replaced it with a value.
 */

import { HookCallError } from './errors.js';
import { HookOutcome } from './outcome.js';
import type {
  GeneratorWrapper,
  HookArgs,
  HookImpl,
  PhasedWrapper,
  PlainHookImpl,
  WrapperHookImpl,
} from './types.js';

/**
 * Resumes one entered wrapper with the outcome of the call it wraps. An
 * error thrown by the after-phase is stored into the outcome.
 */
type Teardown = (outcome: HookOutcome) => void;

/**
 * Whether a value counts as a result. `undefined` and `null` do not.
 */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Select the arguments `impl` declared from the call's kwargs.
 *
 * @throws HookCallError if a required argument is missing.
 */
export function pickArgs(impl: HookImpl, kwargs: HookArgs): HookArgs {
  const args: Record<string, unknown> = {};
  for (const name of impl.argNames) {
    if (!Object.hasOwn(kwargs, name)) {
      throw new HookCallError(`Hook call must provide argument "${name}"`);
    }
    args[name] = kwargs[name];
  }
  for (const name of impl.kwargNames) {
    if (Object.hasOwn(kwargs, name)) args[name] = kwargs[name];
  }
  return args;
}

function isPhasedWrapper(wrapper: GeneratorWrapper | PhasedWrapper): wrapper is PhasedWrapper {
  return typeof wrapper !== 'function';
}

function wrapFail(impl: WrapperHookImpl, reason: string): HookCallError {
  return new HookCallError(`Wrapper from plugin "${impl.pluginName}" ${reason}`);
}

/**
 * Run the before-phase of a wrapper and return its teardown.
 */
function enterWrapper(impl: WrapperHookImpl, args: HookArgs): Teardown {
  const wrapper = impl.wrapper;

  if (isPhasedWrapper(wrapper)) {
    const token: unknown = wrapper.before ? wrapper.before(args) : undefined;
    return (outcome) => {
      try {
        wrapper.after(outcome, token, args);
      } catch (err: unknown) {
        outcome.forceError(err);
      }
    };
  }

  const gen = wrapper(args);
  if (gen.next().done) {
    throw wrapFail(impl, 'did not yield');
  }
  return (outcome) => {
    let step: IteratorResult<unknown, unknown>;
    try {
      step = gen.next(outcome);
    } catch (err: unknown) {
      outcome.forceError(err);
      return;
    }
    if (!step.done) {
      gen.return(undefined);
      throw wrapFail(impl, 'has second yield');
    }
  };
}

/**
 * Execute `impls` with `kwargs`.
 *
 * @returns the results in call order, or with `firstResult` the first
 *          non-absent result (undefined when there is none).
 */
export function multicall(
  impls: readonly HookImpl[],
  kwargs: HookArgs,
  firstResult = false
): unknown {
  const results: unknown[] = [];
  const teardowns: Teardown[] = [];
  let error: { readonly value: unknown } | undefined;

  const wrappers: WrapperHookImpl[] = [];
  const plain: PlainHookImpl[] = [];
  for (const impl of impls) {
    if (impl.hookWrapper) wrappers.push(impl);
    else plain.push(impl);
  }

  try {
    for (let i = wrappers.length - 1; i >= 0; i--) {
      const impl = wrappers[i];
      teardowns.push(enterWrapper(impl, pickArgs(impl, kwargs)));
    }

    for (let i = plain.length - 1; i >= 0; i--) {
      const impl = plain[i];
      const res = impl.function(pickArgs(impl, kwargs));
      if (isPresent(res)) {
        results.push(res);
        if (firstResult) break;
      }
    }
  } catch (err: unknown) {
    error = { value: err };
  }

  const value: unknown = firstResult ? results[0] : results;
  const outcome = error ? HookOutcome.failure(error.value) : HookOutcome.success(value);

  // A failing after-phase replaces the outcome; a second yield is thrown.
  for (let i = teardowns.length - 1; i >= 0; i--) {
    teardowns[i](outcome);
  }

  return outcome.getResult();
}

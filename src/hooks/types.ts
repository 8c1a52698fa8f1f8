/**
 * Hook Engine - Type Definitions
 *
 * Records shared by the chain builder, the dispatcher, the caller façade and
 * the plugin manager.
 */

import type { HookOutcome } from './outcome.js';

/**
 * Keyword arguments of a hook call. Hooks accept named arguments only.
 */
export type HookArgs = Readonly<Record<string, unknown>>;

// Declared through a method so that implementations may narrow `args` to the
// parameters they declare (method parameters are checked bivariantly).
type Bivariant<TArgs, TReturn> = {
  bivarianceHack(args: TArgs): TReturn;
}['bivarianceHack'];

/**
 * A plain implementation. Receives only the arguments it declared.
 * Returning `undefined` or `null` contributes no result.
 */
export type HookFunction = Bivariant<HookArgs, unknown>;

/**
 * Single-yield generator wrapper. Code before the `yield` runs before the
 * plain implementations; the `yield` evaluates to the outcome of the inner
 * call.
 */
export type GeneratorWrapper = Bivariant<HookArgs, Generator<unknown, unknown, HookOutcome>>;

/**
 * Two-phase wrapper. Whatever `before` returns is handed back to `after`.
 */
export interface PhasedWrapper<TToken = unknown> {
  before?(args: HookArgs): TToken;
  after(outcome: HookOutcome, token: TToken | undefined, args: HookArgs): void;
}

export type HookWrapper = GeneratorWrapper | PhasedWrapper;

/**
 * Ordering and behaviour flags of an implementation.
 */
export interface HookImplFlags {
  /** Run as early as possible among implementations of the same kind. */
  readonly tryFirst: boolean;
  /** Run as late as possible among implementations of the same kind. */
  readonly tryLast: boolean;
  /** A missing specification for this hook is not an error. */
  readonly optionalHook: boolean;
}

interface HookImplBase extends HookImplFlags {
  /** Owning plugin identity; undefined for temporary extra-call entries. */
  readonly plugin: unknown;
  readonly pluginName: string;
  /** Required parameter names, in declaration order. */
  readonly argNames: readonly string[];
  /** Parameter names that have defaults; passed only when supplied. */
  readonly kwargNames: readonly string[];
}

export interface PlainHookImpl extends HookImplBase {
  readonly hookWrapper: false;
  readonly function: HookFunction;
}

export interface WrapperHookImpl extends HookImplBase {
  readonly hookWrapper: true;
  readonly wrapper: HookWrapper;
}

/**
 * One registered implementation of a hook.
 */
export type HookImpl = PlainHookImpl | WrapperHookImpl;

/**
 * The contract of a hook.
 */
export interface HookSpec {
  readonly name: string;
  readonly argNames: readonly string[];
  readonly kwargNames: readonly string[];
  readonly firstResult: boolean;
  readonly historic: boolean;
  /** Logged whenever a plugin implements this hook. */
  readonly warnOnImpl?: string;
  /** The object the specification was declared on. */
  readonly namespace?: unknown;
}

/**
 * Executes a dispatch for a caller. The relay owns one and monitoring layers
 * wrap it.
 */
export type HookExecFn = (
  caller: HookExecTarget,
  impls: readonly HookImpl[],
  kwargs: HookArgs
) => unknown;

/**
 * The part of a caller a hook execution function needs to see.
 */
export interface HookExecTarget {
  readonly name: string;
  readonly spec: HookSpec | undefined;
}

/**
 * Invoked once per non-absent result of a historic call.
 */
export type HistoricResultCallback = (result: unknown) => void;

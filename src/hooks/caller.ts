/**
 * Hook Caller
 *
 * Binds one hook name to its specification, its implementation chain and,
 * for historic hooks, its call history.
 *
 * Usage:
 *   const caller = relay.get('configure');
 *   caller.setSpecification(createHookSpec({ name: 'configure', argNames: ['config'] }));
 *   caller.addImplementation(impl);
 *   const results = caller.call({ config });
 */

import { HookChain } from './chain.js';
import { HookConfigurationError, HookUsageError } from './errors.js';
import { CallHistory } from './history.js';
import { createHookImpl } from './implementation.js';
import { isPresent } from './multicall.js';
import { logger as rootLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type {
  HistoricResultCallback,
  HookArgs,
  HookExecFn,
  HookExecTarget,
  HookFunction,
  HookImpl,
  HookSpec,
} from './types.js';

/**
 * A temporary participant of `callExtra`. A bare function receives every
 * keyword argument of the call.
 */
export type ExtraImplementation =
  | HookFunction
  | { readonly function: HookFunction; readonly params: readonly string[] };

export interface HookCallerOptions {
  /** Log a warning when a call omits a parameter the specification declares. */
  warnOnMissingArgs?: boolean;
  logger?: Logger;
}

export class HookCaller implements HookExecTarget {
  readonly name: string;
  private readonly chain = new HookChain();
  private readonly hookExec: HookExecFn;
  private readonly logger: Logger;
  private readonly warnOnMissingArgs: boolean;
  private boundSpec?: HookSpec;
  private callHistory?: CallHistory;

  constructor(name: string, hookExec: HookExecFn, spec?: HookSpec, options: HookCallerOptions = {}) {
    this.name = name;
    this.hookExec = hookExec;
    this.logger = options.logger ?? rootLogger.child('hooks');
    this.warnOnMissingArgs = options.warnOnMissingArgs ?? true;
    if (spec) {
      this.setSpecification(spec);
    }
  }

  get spec(): HookSpec | undefined {
    return this.boundSpec;
  }

  /** Recorded calls; undefined for non-historic hooks. */
  get history(): CallHistory | undefined {
    return this.callHistory;
  }

  hasSpec(): boolean {
    return this.boundSpec !== undefined;
  }

  isHistoric(): boolean {
    return this.callHistory !== undefined;
  }

  /**
   * Bind the hook's specification. Binding happens once.
   *
   * @throws HookConfigurationError if a specification is already bound or the
   *         specification names another hook.
   */
  setSpecification(spec: HookSpec): void {
    if (this.boundSpec) {
      throw new HookConfigurationError(`Hook "${this.name}" already has a specification`);
    }
    if (spec.name !== this.name) {
      throw new HookConfigurationError(
        `Specification "${spec.name}" cannot be bound to hook "${this.name}"`
      );
    }
    this.boundSpec = spec;
    if (spec.historic) {
      this.callHistory = new CallHistory();
    }
  }

  /**
   * Implementations in chain order: plain ones, then wrappers.
   */
  getImplementations(): HookImpl[] {
    return this.chain.sequence();
  }

  /**
   * Add an implementation. On a historic hook every recorded call is replayed
   * against it, in recording order.
   */
  addImplementation(impl: HookImpl): void {
    this.chain.insert(impl);
    this.applyHistory(impl);
  }

  /**
   * Remove the implementation owned by `plugin`.
   *
   * @throws HookUsageError if the plugin has no implementation here.
   */
  removeImplementation(plugin: unknown): HookImpl {
    return this.chain.remove(plugin);
  }

  /**
   * Call every implementation with `kwargs`.
   *
   * @returns the list of non-absent results, tryFirst implementations first,
   *          or for firstResult hooks the first such result.
   */
  call(kwargs: HookArgs = {}): unknown {
    assertKeywordArgs(kwargs);
    if (this.isHistoric()) {
      throw new HookUsageError(`Historic hook "${this.name}" must be called with callHistoric()`);
    }
    this.warnMissingArgs(kwargs);
    return this.hookExec(this, this.chain.sequence(), kwargs);
  }

  /**
   * Call a historic hook. The call is recorded and replayed against every
   * implementation added later; `onResult` sees each non-absent result.
   */
  callHistoric(kwargs: HookArgs = {}, onResult?: HistoricResultCallback): void {
    assertKeywordArgs(kwargs);
    const history = this.callHistory;
    if (!history) {
      throw new HookUsageError(`Hook "${this.name}" is not historic`);
    }
    history.record(kwargs, onResult);
    const results = this.hookExec(this, this.chain.sequence(), kwargs);
    if (!onResult || !this.isResultList(results)) return;
    for (const result of results) {
      onResult(result);
    }
  }

  /**
   * Call the hook with `extras` temporarily added as normal implementations.
   * The chain is restored afterwards, whether the call succeeds or not.
   */
  callExtra(extras: readonly ExtraImplementation[], kwargs: HookArgs = {}): unknown {
    assertKeywordArgs(kwargs);
    const saved = this.chain.snapshot();
    try {
      for (const extra of extras) {
        const impl =
          typeof extra === 'function'
            ? createHookImpl({ function: extra, argNames: Object.keys(kwargs) })
            : createHookImpl({ function: extra.function, argNames: extra.params });
        this.chain.insert(impl);
      }
      return this.call(kwargs);
    } finally {
      this.chain.restore(saved);
    }
  }

  toString(): string {
    return `<HookCaller ${JSON.stringify(this.name)}>`;
  }

  private applyHistory(impl: HookImpl): void {
    if (!this.callHistory) return;
    for (const { kwargs, onResult } of this.callHistory) {
      const results = this.hookExec(this, [impl], kwargs);
      if (!onResult || !this.isResultList(results)) continue;
      const [first] = results;
      if (isPresent(first)) onResult(first);
    }
  }

  // a wrapper may have forced a non-list result
  private isResultList(results: unknown): results is unknown[] {
    if (Array.isArray(results)) return true;
    this.logger.debug(`Historic call of "${this.name}" produced no result list; callback skipped`, {
      hook: this.name,
      resultType: typeof results,
    });
    return false;
  }

  private warnMissingArgs(kwargs: HookArgs): void {
    if (!this.warnOnMissingArgs || !this.boundSpec) return;
    const missing = this.boundSpec.argNames.filter((name) => !Object.hasOwn(kwargs, name));
    if (missing.length > 0) {
      this.logger.warn(
        `Argument(s) ${missing.join(', ')} declared in the specification of "${this.name}" are missing from the call`,
        { hook: this.name, missing }
      );
    }
  }
}

function assertKeywordArgs(kwargs: unknown): void {
  if (typeof kwargs !== 'object' || kwargs === null || Array.isArray(kwargs)) {
    throw new HookUsageError('Hook calling supports only keyword arguments');
  }
}

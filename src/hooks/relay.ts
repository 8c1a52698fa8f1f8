/**
 * Hook Relay
 *
 * Namespace of hook callers, one per hook name. Asking for an unknown name
 * creates an unbound caller, so plugins may implement a hook before its
 * specification is added.
 *
 * All callers of a relay dispatch through the relay's hook execution
 * function. Replacing it (see `setHookExec`) changes how every caller runs,
 * which is how call monitoring is layered on.
 */

import { HookCaller } from './caller.js';
import { multicall } from './multicall.js';
import { logger as rootLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type { HookArgs, HookExecFn, HookExecTarget, HookImpl } from './types.js';

/**
 * Plain dispatch: run the multicall with the caller's firstResult mode.
 */
export const defaultHookExec: HookExecFn = (caller, impls, kwargs) =>
  multicall(impls, kwargs, caller.spec?.firstResult ?? false);

export interface HookRelayOptions {
  warnOnMissingArgs?: boolean;
  logger?: Logger;
}

export class HookRelay implements Iterable<HookCaller> {
  private readonly callers = new Map<string, HookCaller>();
  private hookExec: HookExecFn = defaultHookExec;
  private readonly logger: Logger;
  private readonly warnOnMissingArgs: boolean;

  constructor(options: HookRelayOptions = {}) {
    this.logger = options.logger ?? rootLogger.child('hooks');
    this.warnOnMissingArgs = options.warnOnMissingArgs ?? true;
  }

  /**
   * Return the caller for `name`, creating an unbound one if needed.
   */
  get(name: string): HookCaller {
    let caller = this.callers.get(name);
    if (!caller) {
      caller = this.createCaller(name);
      this.callers.set(name, caller);
    }
    return caller;
  }

  has(name: string): boolean {
    return this.callers.has(name);
  }

  names(): string[] {
    return Array.from(this.callers.keys());
  }

  get size(): number {
    return this.callers.size;
  }

  [Symbol.iterator](): Iterator<HookCaller> {
    return this.callers.values();
  }

  /**
   * Build a caller that dispatches through this relay but is not registered
   * under its name.
   */
  createCaller(name: string): HookCaller {
    return new HookCaller(name, this.execute, undefined, {
      logger: this.logger,
      warnOnMissingArgs: this.warnOnMissingArgs,
    });
  }

  getHookExec(): HookExecFn {
    return this.hookExec;
  }

  setHookExec(hookExec: HookExecFn): void {
    this.hookExec = hookExec;
  }

  private readonly execute = (
    caller: HookExecTarget,
    impls: readonly HookImpl[],
    kwargs: HookArgs
  ): unknown => this.hookExec(caller, impls, kwargs);
}

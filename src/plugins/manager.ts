/**
 * Plugin Manager
 *
 * Registers plugins' hook implementations on a HookRelay and keeps track of
 * which callers each plugin touched so it can be removed again:
 *   - addHookSpecs(ns)      — bind specifications declared for this project
 *   - register(plugin)      — verify and add every implementation of a plugin
 *   - unregister(plugin)    — remove a plugin's implementations everywhere
 *   - setBlocked(name)      — unregister and refuse future registrations
 *   - checkPending()        — fail on implementations of unknown hooks
 *   - addHookCallMonitoring — observe every hook call
 *   - subsetHookCaller()    — a caller without some plugins' implementations
 *
 * Events emitted (extends EventEmitter):
 *   - "plugin:registered"   (name: string, plugin: HookPlugin)
 *   - "plugin:unregistered" (name: string, plugin: HookPlugin)
 *   - "plugin:error"        (name: string, error: Error)
 */

import { EventEmitter } from 'events';
import type { HookCaller } from '../hooks/caller.js';
import {
  HookConfigurationError,
  HookUsageError,
  PluginValidationError,
  toError,
} from '../hooks/errors.js';
import { createHookImpl, declaredParams } from '../hooks/implementation.js';
import { HookOutcome } from '../hooks/outcome.js';
import { HookRelay } from '../hooks/relay.js';
import { createHookSpec } from '../hooks/specification.js';
import { logger as rootLogger } from '../logging/logger.js';
import type { Logger } from '../logging/logger.js';
import type { HookwireConfig } from '../config/schema.js';
import type { HookImplDefinition, HookSpecDefinition } from '../hooks/markers.js';
import type { HookArgs, HookExecFn, HookImpl } from '../hooks/types.js';

// ---------------------------------------------------------------------------
// Plugin and namespace shapes
// ---------------------------------------------------------------------------

export interface HookPlugin {
  /** Default registration name */
  readonly name?: string;
  readonly hooks: readonly HookImplDefinition[];
}

export interface HookSpecNamespace {
  readonly name?: string;
  readonly specs: readonly HookSpecDefinition[];
}

export type BeforeHookCall = (hookName: string, impls: readonly HookImpl[], kwargs: HookArgs) => void;

export type AfterHookCall = (
  outcome: HookOutcome,
  hookName: string,
  impls: readonly HookImpl[],
  kwargs: HookArgs
) => void;

// ---------------------------------------------------------------------------
// Manager config
// ---------------------------------------------------------------------------

export interface PluginManagerOptions {
  /** Only markers created for this project are picked up */
  project: string;
  logger?: Logger;
  warnOnMissingArgs?: boolean;
}

// ---------------------------------------------------------------------------
// PluginManager
// ---------------------------------------------------------------------------

export class PluginManager extends EventEmitter {
  readonly project: string;
  readonly hook: HookRelay;
  private readonly logger: Logger;
  private readonly plugins = new Map<string, HookPlugin>();
  private readonly blocked = new Set<string>();
  /** One entry per implementation added, so duplicates are removed once each */
  private readonly pluginCallers = new Map<unknown, HookCaller[]>();
  /** Subset callers holding a plugin's implementations; cleaned on unregister */
  private readonly subsetCallers = new Map<unknown, HookCaller[]>();
  private anonymousCount = 0;

  constructor(options: PluginManagerOptions) {
    super();
    this.project = options.project;
    this.logger = options.logger ?? rootLogger.child('plugins');
    this.hook = new HookRelay({
      logger: this.logger.child('hooks'),
      warnOnMissingArgs: options.warnOnMissingArgs,
    });
  }

  // ---- Specifications -------------------------------------------------------

  /**
   * Bind every specification of this project found in `namespace`.
   * Implementations registered before their specification are verified now.
   *
   * @throws HookConfigurationError if the namespace holds no specification of
   *         this project, or a hook already has one.
   */
  addHookSpecs(namespace: HookSpecNamespace): void {
    const bound: string[] = [];

    for (const def of namespace.specs) {
      if (def.project !== this.project) {
        this.logger.debug(`Skipping specification "${def.name}" of project "${def.project}"`);
        continue;
      }
      const spec = createHookSpec({
        name: def.name,
        argNames: def.argNames,
        kwargNames: def.kwargNames,
        firstResult: def.firstResult,
        historic: def.historic,
        warnOnImpl: def.warnOnImpl,
        namespace,
      });
      const caller = this.hook.get(def.name);
      caller.setSpecification(spec);
      for (const impl of caller.getImplementations()) {
        this.verifyHook(caller, impl);
      }
      bound.push(def.name);
    }

    if (bound.length === 0) {
      throw new HookConfigurationError(
        `Did not find any "${this.project}" hooks in ${namespace.name ?? 'the given namespace'}`
      );
    }
    this.logger.debug('Added hook specifications', { hooks: bound });
  }

  // ---- Registration ----------------------------------------------------------

  /**
   * Register every implementation `plugin` declares for this project.
   *
   * @returns the plugin name, or undefined if the name is blocked.
   * @throws HookUsageError if the name or the plugin is already registered.
   * @throws PluginValidationError if an implementation does not match its
   *         specification. Nothing of the plugin stays registered.
   */
  register(plugin: HookPlugin, name?: string): string | undefined {
    const pluginName = name ?? plugin.name ?? `plugin-${++this.anonymousCount}`;

    if (this.blocked.has(pluginName)) {
      this.logger.debug(`Plugin "${pluginName}" is blocked`);
      return undefined;
    }
    if (this.plugins.has(pluginName) || this.pluginCallers.has(plugin)) {
      throw new HookUsageError(`Plugin already registered: "${pluginName}"`);
    }

    this.plugins.set(pluginName, plugin);
    const callers: HookCaller[] = [];
    this.pluginCallers.set(plugin, callers);

    try {
      for (const def of plugin.hooks) {
        if (def.project !== this.project) {
          this.logger.debug(`Skipping "${def.hookName}" of project "${def.project}" in plugin "${pluginName}"`);
          continue;
        }
        const impl = toHookImpl(plugin, pluginName, def);
        const caller = this.hook.get(def.hookName);
        if (caller.hasSpec()) {
          this.verifyHook(caller, impl);
        }
        callers.push(caller);
        caller.addImplementation(impl);
      }
    } catch (err) {
      this.detach(plugin, pluginName);
      this.emit('plugin:error', pluginName, toError(err));
      throw err;
    }

    this.logger.debug(`Registered plugin "${pluginName}"`, { hooks: callers.map((c) => c.name) });
    this.emit('plugin:registered', pluginName, plugin);
    return pluginName;
  }

  /**
   * Remove a plugin, given by object or by name, from every hook.
   *
   * @throws HookUsageError if the plugin is not registered.
   */
  unregister(pluginOrName: HookPlugin | string): HookPlugin {
    const plugin = typeof pluginOrName === 'string' ? this.plugins.get(pluginOrName) : pluginOrName;
    const name = plugin ? this.getName(plugin) : undefined;
    if (!plugin || name === undefined) {
      const label = typeof pluginOrName === 'string' ? pluginOrName : pluginOrName.name ?? 'anonymous';
      throw new HookUsageError(`Plugin "${label}" is not registered`);
    }

    this.detach(plugin, name);
    this.logger.debug(`Unregistered plugin "${name}"`);
    this.emit('plugin:unregistered', name, plugin);
    return plugin;
  }

  /**
   * Block registrations under `name`, unregistering the current holder.
   */
  setBlocked(name: string): void {
    if (this.plugins.has(name)) {
      this.unregister(name);
    }
    this.blocked.add(name);
  }

  isBlocked(name: string): boolean {
    return this.blocked.has(name);
  }

  // ---- Queries ---------------------------------------------------------------

  getPlugin(name: string): HookPlugin | undefined {
    return this.plugins.get(name);
  }

  getName(plugin: HookPlugin): string | undefined {
    for (const [name, candidate] of this.plugins) {
      if (candidate === plugin) return name;
    }
    return undefined;
  }

  hasPlugin(name: string): boolean {
    return this.plugins.has(name);
  }

  isRegistered(plugin: HookPlugin): boolean {
    return this.pluginCallers.has(plugin);
  }

  getPlugins(): HookPlugin[] {
    return Array.from(this.plugins.values());
  }

  listNamePlugin(): Array<[string, HookPlugin]> {
    return Array.from(this.plugins.entries());
  }

  /**
   * The relay callers `plugin` has implementations on, or undefined when it
   * is not registered. Subset callers are not listed.
   */
  getHookCallers(plugin: HookPlugin): HookCaller[] | undefined {
    const callers = this.pluginCallers.get(plugin);
    return callers ? Array.from(new Set(callers)) : undefined;
  }

  // ---- Verification ------------------------------------------------------------

  /**
   * Every implementation sitting on a hook without specification must be
   * marked optional.
   *
   * @throws PluginValidationError naming the first offending implementation.
   */
  checkPending(): void {
    for (const caller of this.hook) {
      if (caller.hasSpec()) continue;
      for (const impl of caller.getImplementations()) {
        if (!impl.optionalHook) {
          throw new PluginValidationError(
            impl.plugin,
            `Unknown hook "${caller.name}" in plugin "${impl.pluginName}"`
          );
        }
      }
    }
  }

  // ---- Monitoring --------------------------------------------------------------

  /**
   * Call `before` ahead of and `after` behind every hook call. `after` gets
   * the call's outcome.
   *
   * @returns a function that removes the monitoring again.
   */
  addHookCallMonitoring(before: BeforeHookCall, after: AfterHookCall): () => void {
    const previous = this.hook.getHookExec();
    const monitored: HookExecFn = (caller, impls, kwargs) => {
      before(caller.name, impls, kwargs);
      const outcome = HookOutcome.fromCall(() => previous(caller, impls, kwargs));
      after(outcome, caller.name, impls, kwargs);
      return outcome.getResult();
    };
    this.hook.setHookExec(monitored);
    return () => {
      this.hook.setHookExec(previous);
    };
  }

  /**
   * Log every hook call at debug level on the "trace" child logger.
   *
   * @returns a function that stops tracing.
   */
  enableTracing(): () => void {
    const trace = this.logger.child('trace');
    return this.addHookCallMonitoring(
      (hookName, impls, kwargs) => {
        trace.debug(`${hookName} called`, {
          args: Object.keys(kwargs),
          plugins: impls.map((impl) => impl.pluginName),
        });
      },
      (outcome, hookName) => {
        if (outcome.failed) {
          trace.debug(`${hookName} failed`, { error: toError(outcome.error).message });
        } else {
          trace.debug(`${hookName} finished`, { result: outcome.getResult() });
        }
      }
    );
  }

  // ---- Subsets -------------------------------------------------------------------

  /**
   * A caller for `name` that leaves out the implementations of
   * `removePlugins`. Returns the relay's own caller when none of them
   * implements the hook. The subset starts with an empty call history.
   */
  subsetHookCaller(name: string, removePlugins: readonly HookPlugin[]): HookCaller {
    const original = this.hook.get(name);
    const impls = original.getImplementations();
    const excluded = new Set<unknown>(removePlugins);
    if (!impls.some((impl) => excluded.has(impl.plugin))) {
      return original;
    }

    const subset = this.hook.createCaller(name);
    if (original.spec) {
      subset.setSpecification(original.spec);
    }
    for (const impl of impls) {
      if (excluded.has(impl.plugin)) continue;
      subset.addImplementation(impl);
      const subsets = this.subsetCallers.get(impl.plugin);
      if (subsets) subsets.push(subset);
      else this.subsetCallers.set(impl.plugin, [subset]);
    }
    return subset;
  }

  // ---- Private helpers -----------------------------------------------------------

  private verifyHook(caller: HookCaller, impl: HookImpl): void {
    const spec = caller.spec;
    if (!spec) return;

    if (caller.isHistoric() && impl.hookWrapper) {
      throw new PluginValidationError(
        impl.plugin,
        `Plugin "${impl.pluginName}": historic hook "${caller.name}" cannot be implemented by a wrapper`
      );
    }

    if (spec.warnOnImpl) {
      this.logger.warn(spec.warnOnImpl, { hook: caller.name, plugin: impl.pluginName });
    }

    const available = new Set([...spec.argNames, ...spec.kwargNames]);
    const unknown = declaredParams(impl).filter((param) => !available.has(param));
    if (unknown.length > 0) {
      throw new PluginValidationError(
        impl.plugin,
        `Plugin "${impl.pluginName}" for hook "${caller.name}": argument(s) ${unknown.join(', ')} ` +
          `are not declared in the specification (${[...available].join(', ')})`
      );
    }
  }

  private detach(plugin: HookPlugin, name: string): void {
    for (const caller of this.pluginCallers.get(plugin) ?? []) {
      caller.removeImplementation(plugin);
    }
    for (const subset of this.subsetCallers.get(plugin) ?? []) {
      subset.removeImplementation(plugin);
    }
    this.pluginCallers.delete(plugin);
    this.subsetCallers.delete(plugin);
    if (this.plugins.get(name) === plugin) {
      this.plugins.delete(name);
    }
  }
}

function toHookImpl(plugin: HookPlugin, pluginName: string, def: HookImplDefinition): HookImpl {
  const base = {
    plugin,
    pluginName,
    argNames: def.argNames,
    kwargNames: def.kwargNames,
    tryFirst: def.tryFirst,
    tryLast: def.tryLast,
    optionalHook: def.optionalHook,
  };
  return def.hookWrapper
    ? createHookImpl({ ...base, hookWrapper: true, wrapper: def.wrapper })
    : createHookImpl({ ...base, function: def.function });
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export interface CreatePluginManagerOptions {
  project: string;
  config?: HookwireConfig;
  logger?: Logger;
}

/**
 * Build a PluginManager and apply `config`: log level, blocked plugin
 * names and hook tracing.
 */
export function createPluginManager(options: CreatePluginManagerOptions): PluginManager {
  const { config } = options;
  const base = options.logger ?? rootLogger;
  if (config) {
    base.setLevel(config.logging.level);
  }

  const manager = new PluginManager({
    project: options.project,
    logger: base.child('plugins'),
    warnOnMissingArgs: config?.hooks.warnOnMissingArgs,
  });

  for (const name of config?.plugins.blocked ?? []) {
    manager.setBlocked(name);
  }
  if (config?.hooks.tracing) {
    manager.enableTracing();
  }
  return manager;
}

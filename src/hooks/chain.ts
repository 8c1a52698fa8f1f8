/**
 * Hook Chain
 *
 * Keeps the implementations of one hook in two ordered lists, wrappers and
 * plain implementations. Within each list the order is:
 *
 *   tryLast entries ++ normal entries ++ tryFirst entries
 *
 * with every block in registration order. The dispatcher walks the combined
 * sequence from its tail, so tryFirst entries run first.
 *
 * Usage:
 *   const chain = new HookChain();
 *   chain.insert(impl);
 *   chain.remove(plugin);
 *   const impls = chain.sequence();
 */

import { HookUsageError } from './errors.js';
import type { HookImpl } from './types.js';

export interface ChainSnapshot {
  readonly wrappers: readonly HookImpl[];
  readonly nonWrappers: readonly HookImpl[];
}

export class HookChain {
  private wrappers: HookImpl[] = [];
  private nonWrappers: HookImpl[] = [];

  /**
   * Place `impl` in its list according to its priority flags.
   */
  insert(impl: HookImpl): void {
    const methods = impl.hookWrapper ? this.wrappers : this.nonWrappers;

    if (impl.tryLast) {
      // after the leading run of tryLast entries
      let i = 0;
      while (i < methods.length && methods[i].tryLast) i++;
      methods.splice(i, 0, impl);
    } else if (impl.tryFirst) {
      methods.push(impl);
    } else {
      // after the last non-tryFirst entry
      let i = methods.length - 1;
      while (i >= 0 && methods[i].tryFirst) i--;
      methods.splice(i + 1, 0, impl);
    }
  }

  /**
   * Remove the first implementation owned by `plugin`, searching plain
   * implementations before wrappers.
   *
   * @throws HookUsageError if the plugin has no implementation in this chain.
   */
  remove(plugin: unknown): HookImpl {
    for (const methods of [this.nonWrappers, this.wrappers]) {
      const index = methods.findIndex((impl) => impl.plugin === plugin);
      if (index >= 0) {
        const [removed] = methods.splice(index, 1);
        return removed;
      }
    }
    throw new HookUsageError(`Plugin ${describePlugin(plugin)} not found`);
  }

  /**
   * Whether `plugin` owns at least one implementation in this chain.
   */
  includes(plugin: unknown): boolean {
    return this.sequence().some((impl) => impl.plugin === plugin);
  }

  /**
   * The dispatch sequence: plain implementations followed by wrappers.
   */
  sequence(): HookImpl[] {
    return [...this.nonWrappers, ...this.wrappers];
  }

  snapshot(): ChainSnapshot {
    return { wrappers: [...this.wrappers], nonWrappers: [...this.nonWrappers] };
  }

  restore(snapshot: ChainSnapshot): void {
    this.wrappers = [...snapshot.wrappers];
    this.nonWrappers = [...snapshot.nonWrappers];
  }

  get size(): number {
    return this.wrappers.length + this.nonWrappers.length;
  }

  get isEmpty(): boolean {
    return this.size === 0;
  }
}

function describePlugin(plugin: unknown): string {
  if (typeof plugin === 'string') return `"${plugin}"`;
  if (plugin && typeof plugin === 'object' && 'name' in plugin && typeof plugin.name === 'string') {
    return `"${plugin.name}"`;
  }
  return String(plugin);
}

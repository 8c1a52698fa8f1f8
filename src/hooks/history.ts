/**
 * Call history of a historic hook.
 *
 * Append-only: entries live as long as the caller that owns them.
 */

import type { HistoricResultCallback, HookArgs } from './types.js';

export interface HistoricCall {
  readonly kwargs: HookArgs;
  readonly onResult?: HistoricResultCallback;
}

export class CallHistory implements Iterable<HistoricCall> {
  private readonly calls: HistoricCall[] = [];

  record(kwargs: HookArgs, onResult?: HistoricResultCallback): HistoricCall {
    const entry: HistoricCall = Object.freeze({ kwargs, onResult });
    this.calls.push(entry);
    return entry;
  }

  get size(): number {
    return this.calls.length;
  }

  [Symbol.iterator](): Iterator<HistoricCall> {
    // iterate a copy: a replayed implementation may record further calls
    return [...this.calls][Symbol.iterator]();
  }
}

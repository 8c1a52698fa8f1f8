/**
 * Multicall dispatcher — call order, result aggregation, firstResult,
 * argument selection and the wrapper protocol.
 */

import { describe, it, expect, vi } from 'vitest';

import { HookChain } from '../chain.js';
import { HookCallError } from '../errors.js';
import { createHookImpl } from '../implementation.js';
import { multicall, pickArgs, isPresent } from '../multicall.js';
import type { HookOutcome } from '../outcome.js';
import type { HookFunction, HookImpl, HookWrapper } from '../types.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

interface ImplOptions {
  tryFirst?: boolean;
  tryLast?: boolean;
  argNames?: string[];
  kwargNames?: string[];
}

function plain(name: string, fn: HookFunction, options: ImplOptions = {}): HookImpl {
  return createHookImpl({ plugin: name, pluginName: name, function: fn, ...options });
}

function wrap(name: string, wrapper: HookWrapper, options: ImplOptions = {}): HookImpl {
  return createHookImpl({ plugin: name, pluginName: name, hookWrapper: true, wrapper, ...options });
}

function chainOf(...impls: HookImpl[]): HookImpl[] {
  const chain = new HookChain();
  for (const impl of impls) chain.insert(impl);
  return chain.sequence();
}

// ── Call order and results ───────────────────────────────────────────────────

describe('multicall — results', () => {
  it('returns results in call order: tryFirst, normal, tryLast', () => {
    const impls = chainOf(
      plain('impl1', () => 1, { tryLast: true }),
      plain('impl2', () => 2),
      plain('impl3', () => 3, { tryFirst: true })
    );
    expect(multicall(impls, { a: 1, b: 2 })).toEqual([3, 2, 1]);
  });

  it('calls later-listed implementations first', () => {
    const calls: string[] = [];
    const impls = chainOf(
      plain('tl', () => { calls.push('tl'); }, { tryLast: true }),
      plain('n1', () => { calls.push('n1'); }),
      plain('n2', () => { calls.push('n2'); }),
      plain('tf', () => { calls.push('tf'); }, { tryFirst: true })
    );
    multicall(impls, {});
    expect(calls).toEqual(['tf', 'n2', 'n1', 'tl']);
  });

  it('skips undefined and null results', () => {
    const impls = chainOf(
      plain('a', () => 'a'),
      plain('b', () => undefined),
      plain('c', () => null),
      plain('d', () => 0)
    );
    expect(multicall(impls, {})).toEqual([0, 'a']);
  });

  it('returns an empty list when there are no implementations', () => {
    expect(multicall([], {})).toEqual([]);
  });
});

// ── firstResult ──────────────────────────────────────────────────────────────

describe('multicall — firstResult', () => {
  it('returns the first non-absent result and stops calling plain implementations', () => {
    const last = vi.fn(() => 'last');
    const impls = chainOf(
      plain('tl', last, { tryLast: true }),
      plain('n', () => 'normal'),
      plain('tf', () => undefined, { tryFirst: true })
    );

    expect(multicall(impls, {}, true)).toBe('normal');
    expect(last).not.toHaveBeenCalled();
  });

  it('returns undefined when no implementation produces a result', () => {
    const impls = chainOf(plain('a', () => undefined), plain('b', () => null));
    expect(multicall(impls, {}, true)).toBeUndefined();
  });

  it('still runs every wrapper after-phase', () => {
    const seen: unknown[] = [];
    const impls = chainOf(
      plain('n1', () => 'one'),
      plain('n2', () => 'two'),
      wrap('w', {
        after(outcome) {
          seen.push(outcome.getResult());
        },
      })
    );

    expect(multicall(impls, {}, true)).toBe('two');
    expect(seen).toEqual(['two']);
  });
});

// ── Arguments ────────────────────────────────────────────────────────────────

describe('multicall — arguments', () => {
  it('passes each implementation only the arguments it declares', () => {
    const received: unknown[] = [];
    const impls = chainOf(
      plain('a', (args) => { received.push(args); }, { argNames: ['a'] }),
      plain('none', (args) => { received.push(args); })
    );

    multicall(impls, { a: 1, b: 2 });
    expect(received).toEqual([{}, { a: 1 }]);
  });

  it('passes optional parameters only when the call supplies them', () => {
    const impl = plain('opt', () => undefined, { argNames: ['a'], kwargNames: ['flag'] });
    expect(pickArgs(impl, { a: 1 })).toEqual({ a: 1 });
    expect(pickArgs(impl, { a: 1, flag: true, other: 3 })).toEqual({ a: 1, flag: true });
  });

  it('throws HookCallError when a required argument is missing', () => {
    const impls = chainOf(plain('needs-b', () => 1, { argNames: ['a', 'b'] }));
    expect(() => multicall(impls, { a: 1 })).toThrow(HookCallError);
    expect(() => multicall(impls, { a: 1 })).toThrow('Hook call must provide argument "b"');
  });

  it('lets implementations narrow their argument type', () => {
    const double = plain('double', (args: { x: number }) => args.x * 2, { argNames: ['x'] });
    expect(multicall([double], { x: 21 })).toEqual([42]);
  });
});

// ── Wrappers ─────────────────────────────────────────────────────────────────

describe('multicall — generator wrappers', () => {
  it('runs code before and after the plain implementations', () => {
    const events: string[] = [];
    const impls = chainOf(
      plain('n', () => {
        events.push('impl');
        return 'value';
      }),
      wrap('w', function* () {
        events.push('enter');
        const outcome: HookOutcome = yield;
        events.push(`exit:${JSON.stringify(outcome.getResult())}`);
      })
    );

    expect(multicall(impls, {})).toEqual(['value']);
    expect(events).toEqual(['enter', 'impl', 'exit:["value"]']);
  });

  it('shows a failing implementation to the wrapper and re-throws it', () => {
    const events: string[] = [];
    const failure = new Error('boom');
    let observed: unknown;
    const impls = chainOf(
      plain('n', () => {
        throw failure;
      }),
      wrap('w', function* () {
        events.push('enter');
        const outcome: HookOutcome = yield;
        observed = outcome.error;
        events.push('exit');
      })
    );

    let thrown: unknown;
    try {
      multicall(impls, {});
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBe(failure);
    expect(observed).toBe(failure);
    expect(events).toEqual(['enter', 'exit']);
  });

  it('does not run plain implementations after a failure', () => {
    const later = vi.fn(() => 'later');
    const impls = chainOf(
      plain('later', later),
      plain('fails', () => {
        throw new Error('boom');
      }, { tryFirst: true })
    );

    expect(() => multicall(impls, {})).toThrow('boom');
    expect(later).not.toHaveBeenCalled();
  });

  it('nests wrappers: the last listed wrapper is outermost', () => {
    const events: string[] = [];
    const tracer = (name: string): HookWrapper =>
      function* () {
        events.push(`${name}:enter`);
        yield;
        events.push(`${name}:exit`);
      };
    const impls = chainOf(
      wrap('inner', tracer('inner')),
      wrap('outer', tracer('outer')),
      plain('n', () => {
        events.push('impl');
      })
    );

    multicall(impls, {});
    expect(events).toEqual(['outer:enter', 'inner:enter', 'impl', 'inner:exit', 'outer:exit']);
  });

  it('lets an inner wrapper replace a failure with a value seen by outer wrappers', () => {
    let outerSaw: unknown;
    const impls = chainOf(
      plain('n', () => {
        throw new Error('boom');
      }),
      wrap('inner', function* () {
        const outcome: HookOutcome = yield;
        if (outcome.failed) outcome.forceResult(['recovered']);
      }),
      wrap('outer', function* () {
        const outcome: HookOutcome = yield;
        outerSaw = outcome.failed ? outcome.error : outcome.getResult();
      })
    );

    expect(multicall(impls, {})).toEqual(['recovered']);
    expect(outerSaw).toEqual(['recovered']);
  });

  it('replaces the outcome with an error thrown by an after-phase', () => {
    let outerSaw: unknown;
    const impls = chainOf(
      plain('n', () => 'fine'),
      wrap('inner', function* () {
        yield;
        throw new Error('teardown');
      }),
      wrap('outer', function* () {
        const outcome: HookOutcome = yield;
        outerSaw = outcome.error;
      })
    );

    expect(() => multicall(impls, {})).toThrow('teardown');
    expect(outerSaw).toBeInstanceOf(Error);
    expect(outerSaw).toHaveProperty('message', 'teardown');
  });

  it('receives its declared arguments', () => {
    let received: unknown;
    const impls = chainOf(
      wrap('w', function* (args) {
        received = args;
        yield;
      }, { argNames: ['x'] })
    );
    multicall(impls, { x: 1, y: 2 });
    expect(received).toEqual({ x: 1 });
  });

  it('raises HookCallError when a wrapper does not yield', () => {
    const impls = chainOf(
      // eslint-disable-next-line require-yield
      wrap('lazy', function* () {
        return;
      })
    );
    expect(() => multicall(impls, {})).toThrow(HookCallError);
    expect(() => multicall(impls, {})).toThrow('Wrapper from plugin "lazy" did not yield');
  });

  it('delivers a missing yield to the wrappers already entered', () => {
    let outerSaw: unknown;
    const impls = chainOf(
      // eslint-disable-next-line require-yield
      wrap('lazy', function* () {
        return;
      }),
      wrap('outer', function* () {
        const outcome: HookOutcome = yield;
        outerSaw = outcome.error;
      })
    );
    expect(() => multicall(impls, {})).toThrow(HookCallError);
    expect(outerSaw).toBeInstanceOf(HookCallError);
  });

  it('raises HookCallError immediately on a second yield', () => {
    const outerExit = vi.fn();
    const impls = chainOf(
      wrap('greedy', function* () {
        yield;
        yield;
      }),
      wrap('outer', function* () {
        yield;
        outerExit();
      })
    );
    expect(() => multicall(impls, {})).toThrow('Wrapper from plugin "greedy" has second yield');
    expect(outerExit).not.toHaveBeenCalled();
  });
});

describe('multicall — phased wrappers', () => {
  it('hands the token returned by before to after', () => {
    const seen: unknown[] = [];
    const impls = chainOf(
      plain('n', () => 'value'),
      wrap('phased', {
        before: () => 'token',
        after(outcome, token) {
          seen.push(token, outcome.getResult());
        },
      })
    );

    multicall(impls, { a: 1 });
    expect(seen).toEqual(['token', ['value']]);
  });

  it('may override the result', () => {
    const impls = chainOf(
      plain('n', () => 1),
      wrap('phased', {
        after(outcome) {
          outcome.forceResult(['overridden']);
        },
      })
    );
    expect(multicall(impls, {})).toEqual(['overridden']);
  });

  it('replaces the outcome when after throws', () => {
    const impls = chainOf(
      plain('n', () => 1),
      wrap('phased', {
        after() {
          throw new Error('after failed');
        },
      })
    );
    expect(() => multicall(impls, {})).toThrow('after failed');
  });

  it('sees a failing implementation and can swallow it', () => {
    const impls = chainOf(
      plain('n', () => {
        throw new Error('boom');
      }),
      wrap('guard', {
        after(outcome) {
          if (outcome.failed) outcome.forceResult([]);
        },
      })
    );
    expect(multicall(impls, {})).toEqual([]);
  });
});

describe('isPresent', () => {
  it('treats only undefined and null as absent', () => {
    expect(isPresent(undefined)).toBe(false);
    expect(isPresent(null)).toBe(false);
    expect(isPresent(0)).toBe(true);
    expect(isPresent('')).toBe(true);
    expect(isPresent(false)).toBe(true);
  });
});

describe('multicall — unsorted input', () => {
  it('enters wrappers listed before plain implementations under firstResult', () => {
    const events: string[] = [];
    const impls = [
      wrap('w', {
        before: () => {
          events.push('before');
        },
        after(outcome) {
          events.push(`after:${String(outcome.getResult())}`);
        },
      }),
      plain('p', () => {
        events.push('p');
        return 'v';
      }),
    ];

    expect(multicall(impls, {}, true)).toBe('v');
    expect(events).toEqual(['before', 'p', 'after:v']);
  });

  it('keeps the relative order of interleaved wrappers and plain implementations', () => {
    const events: string[] = [];
    const tracer = (name: string): HookWrapper =>
      function* () {
        events.push(`${name}:enter`);
        yield;
        events.push(`${name}:exit`);
      };
    const impls = [
      wrap('w1', tracer('w1')),
      plain('p1', () => 'p1'),
      wrap('w2', tracer('w2')),
      plain('p2', () => 'p2'),
    ];

    expect(multicall(impls, {})).toEqual(['p2', 'p1']);
    expect(events).toEqual(['w2:enter', 'w1:enter', 'w1:exit', 'w2:exit']);
  });
});

describe('pickArgs — inherited names', () => {
  it('treats a parameter named like an Object member as missing', () => {
    const impl = plain('ctor', () => 1, { argNames: ['constructor'] });
    expect(() => pickArgs(impl, {})).toThrow('Hook call must provide argument "constructor"');
  });

  it('does not pass inherited members as optional parameters', () => {
    const impl = plain('opt', () => 1, { kwargNames: ['toString', 'valueOf'] });
    expect(pickArgs(impl, {})).toEqual({});
    expect(Object.keys(pickArgs(impl, { valueOf: 3 }))).toEqual(['valueOf']);
  });
});

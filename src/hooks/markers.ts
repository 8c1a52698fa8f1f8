/**
 * Hook Markers
 *
 * Declares hook specifications and implementations as plain records.
 * Every record is stamped with the project that declared it; a plugin
 * manager only picks up records of its own project.
 *
 * Usage:
 *   const { spec, impl, wrapper } = createHookMarkers('myapp');
 *
 *   export const hookspecs = {
 *     name: 'myapp.specs',
 *     specs: [spec('configure', { params: ['config'], historic: true })],
 *   };
 *
 *   export const plugin = {
 *     name: 'audit',
 *     hooks: [impl('configure', ({ config }) => audit(config), { params: ['config'] })],
 *   };
 */

import { z } from 'zod';
import { HookConfigurationError } from './errors.js';
import type { HookFunction, HookImplFlags, HookWrapper } from './types.js';

// ---------------------------------------------------------------------------
// Option schemas
// ---------------------------------------------------------------------------

const ParamListSchema = z
  .array(z.string().min(1))
  .refine((names) => new Set(names).size === names.length, {
    message: 'parameter names must be unique',
  });

const HookSpecOptionsSchema = z
  .object({
    params: ParamListSchema.default([]),
    optionalParams: ParamListSchema.default([]),
    firstResult: z.boolean().default(false),
    historic: z.boolean().default(false),
    warnOnImpl: z.string().min(1).optional(),
  })
  .strict()
  .refine((opts) => !(opts.firstResult && opts.historic), {
    message: 'a hook cannot be both historic and firstResult',
  });

const HookImplOptionsSchema = z
  .object({
    params: ParamListSchema.default([]),
    optionalParams: ParamListSchema.default([]),
    optionalHook: z.boolean().default(false),
    tryFirst: z.boolean().default(false),
    tryLast: z.boolean().default(false),
    specName: z.string().min(1).optional(),
  })
  .strict()
  .refine((opts) => !(opts.tryFirst && opts.tryLast), {
    message: 'an implementation cannot be both tryFirst and tryLast',
  });

// ---------------------------------------------------------------------------
// Public option and definition shapes
// ---------------------------------------------------------------------------

export interface HookSpecOptions {
  /** Required parameters, in declaration order. */
  params?: readonly string[];
  /** Parameters with defaults. */
  optionalParams?: readonly string[];
  /** Stop at the first implementation returning a non-absent value. */
  firstResult?: boolean;
  /** Record calls and replay them against implementations added later. */
  historic?: boolean;
  /** Logged whenever a plugin implements the hook. */
  warnOnImpl?: string;
}

export interface HookImplOptions {
  params?: readonly string[];
  optionalParams?: readonly string[];
  optionalHook?: boolean;
  tryFirst?: boolean;
  tryLast?: boolean;
  /** Implement this hook instead of the one the definition is listed for. */
  specName?: string;
}

export interface HookSpecDefinition {
  readonly kind: 'spec';
  readonly project: string;
  readonly name: string;
  readonly argNames: readonly string[];
  readonly kwargNames: readonly string[];
  readonly firstResult: boolean;
  readonly historic: boolean;
  readonly warnOnImpl?: string;
}

interface HookImplDefinitionBase extends HookImplFlags {
  readonly kind: 'impl';
  readonly project: string;
  readonly hookName: string;
  readonly argNames: readonly string[];
  readonly kwargNames: readonly string[];
}

export type HookImplDefinition =
  | (HookImplDefinitionBase & { readonly hookWrapper: false; readonly function: HookFunction })
  | (HookImplDefinitionBase & { readonly hookWrapper: true; readonly wrapper: HookWrapper });

export interface HookMarkers {
  readonly project: string;
  spec(name: string, options?: HookSpecOptions): HookSpecDefinition;
  impl(hookName: string, fn: HookFunction, options?: HookImplOptions): HookImplDefinition;
  wrapper(hookName: string, wrapper: HookWrapper, options?: HookImplOptions): HookImplDefinition;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function createHookMarkers(project: string): HookMarkers {
  function parseImplOptions(hookName: string, options: HookImplOptions) {
    const parsed = HookImplOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new HookConfigurationError(
        `Invalid implementation options for hook "${hookName}": ${describeIssues(parsed.error)}`
      );
    }
    const opts = parsed.data;
    return {
      kind: 'impl' as const,
      project,
      hookName: opts.specName ?? hookName,
      argNames: Object.freeze(opts.params),
      kwargNames: Object.freeze(opts.optionalParams),
      tryFirst: opts.tryFirst,
      tryLast: opts.tryLast,
      optionalHook: opts.optionalHook,
    };
  }

  return Object.freeze({
    project,

    spec(name: string, options: HookSpecOptions = {}): HookSpecDefinition {
      const parsed = HookSpecOptionsSchema.safeParse(options);
      if (!parsed.success) {
        throw new HookConfigurationError(
          `Invalid specification options for hook "${name}": ${describeIssues(parsed.error)}`
        );
      }
      const opts = parsed.data;
      return Object.freeze({
        kind: 'spec' as const,
        project,
        name,
        argNames: Object.freeze(opts.params),
        kwargNames: Object.freeze(opts.optionalParams),
        firstResult: opts.firstResult,
        historic: opts.historic,
        warnOnImpl: opts.warnOnImpl,
      });
    },

    impl(hookName: string, fn: HookFunction, options: HookImplOptions = {}): HookImplDefinition {
      return Object.freeze({ ...parseImplOptions(hookName, options), hookWrapper: false as const, function: fn });
    },

    wrapper(hookName: string, wrapper: HookWrapper, options: HookImplOptions = {}): HookImplDefinition {
      return Object.freeze({ ...parseImplOptions(hookName, options), hookWrapper: true as const, wrapper });
    },
  });
}

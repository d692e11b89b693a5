// ============================================================================
// covenant-pathways — Argument Types & Coercion
// ============================================================================

import type { z } from 'zod';
import { CoercionError } from './errors.js';
import type { CoercionIssue, CoercionResult } from './errors.js';

// ---------------------------------------------------------------------------
// Argument Types
// ---------------------------------------------------------------------------

/**
 * Identity token for the type of an external argument.
 *
 * The object itself is the identity: two `ArgumentType`s built from the same
 * zod schema are still distinct types, and the schema cache keys on the
 * token, not on its structure.
 */
export interface ArgumentType<T> {
  /** Human-readable type name, used in errors and schema metadata. */
  readonly name: string;
  /** zod schema that validates and describes values of this type. */
  readonly schema: z.ZodType<T>;
}

/**
 * Declare an argument type.
 *
 * @example
 * ```ts
 * const Payout = defineArgumentType('Payout', z.object({
 *   recipient: z.string(),
 *   amount: z.number().int().positive(),
 * }));
 * type Payout = ArgumentValue<typeof Payout>;
 * ```
 */
export function defineArgumentType<T>(name: string, schema: z.ZodType<T>): ArgumentType<T> {
  if (!name || name.trim().length === 0) {
    throw new Error('Pathways: argument type name must be a non-empty string');
  }
  return Object.freeze({ name, schema });
}

/** The value type described by an {@link ArgumentType}. */
export type ArgumentValue<A> = A extends ArgumentType<infer T> ? T : never;

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Validate an unknown value against an argument type.
 *
 * Never throws for bad input; the failure is returned as a
 * {@link CoercionError} carrying one issue per zod issue.
 */
export function parseArgument<T>(type: ArgumentType<T>, raw: unknown): CoercionResult<T> {
  const result = type.schema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }

  const issues: CoercionIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.map((segment) => String(segment)).join('.'),
    message: issue.message,
  }));
  return { ok: false, error: new CoercionError(type.name, issues) };
}

// ---------------------------------------------------------------------------
// Coercion helpers
// ---------------------------------------------------------------------------

/**
 * Converts a contract's shared argument envelope `S` into one pathway's
 * typed parameter `A`. Every updatable pathway names one explicitly.
 */
export type CoerceFn<S, A> = (args: S) => CoercionResult<A>;

/**
 * Build a {@link CoerceFn} that picks a member out of the envelope and
 * validates it against `type`.
 *
 * A `select` that returns `undefined` means the envelope does not carry an
 * argument for this pathway; that is reported as a coercion failure.
 *
 * @example
 * ```ts
 * type VaultArgs = { withdraw?: unknown; rotate?: unknown };
 * const coerce = coerceFrom<VaultArgs, Withdrawal>(Withdrawal, (args) => args.withdraw);
 * ```
 */
export function coerceFrom<S, A>(
  type: ArgumentType<A>,
  select: (args: S) => unknown,
): CoerceFn<S, A> {
  return (args) => {
    const picked = select(args);
    if (picked === undefined) {
      return {
        ok: false,
        error: new CoercionError(type.name, [
          { path: '', message: 'the argument envelope carries no value for this pathway' },
        ]),
      };
    }
    return parseArgument(type, picked);
  };
}

/**
 * Build a {@link CoerceFn} for contracts whose envelope *is* the pathway's
 * argument. The envelope is re-validated, not passed through.
 */
export function coerceIdentity<A>(type: ArgumentType<A>): CoerceFn<A, A> {
  return (args) => parseArgument(type, args);
}

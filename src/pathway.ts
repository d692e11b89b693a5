// ============================================================================
// covenant-pathways — Pathway Declarations
// ============================================================================

import type { ArgumentType, CoerceFn } from './argument.js';
import type { CompileGate } from './compileGate.js';
import type { Context } from './context.js';
import type { CoercionResult } from './errors.js';
import type { Guard } from './guard.js';
import type { PathwaySchema } from './schemaCache.js';
import type { TemplateIterable } from './template.js';

// ---------------------------------------------------------------------------
// Flavors
// ---------------------------------------------------------------------------

/** The three pathway lists a contract type exposes. */
export type PathwayKind = 'transition' | 'terminal' | 'updatable';

// ---- Transition ------------------------------------------------------------

/** Produces the templates of a transition. */
export type TransitionBody<C> = (self: C, ctx: Context) => TemplateIterable;

/**
 * A state transition: emits transaction templates without any external
 * argument, usable once all `guards` are satisfied.
 */
export interface TransitionPathway<C> {
  readonly kind: 'transition';
  readonly name: string;
  /** Must all be satisfied. Empty: usable unconditionally. */
  readonly guards: readonly Guard<C>[];
  /** Decide static inclusion. Empty: always included. */
  readonly compileGates: readonly CompileGate<C>[];
  readonly body: TransitionBody<C>;
}

// ---- Terminal --------------------------------------------------------------

/**
 * A terminal pathway is a guard bound into the terminal list: satisfying it
 * alone releases the contract's funds, with no body of its own.
 */
export type TerminalPathway<C> = Guard<C>;

// ---- Updatable -------------------------------------------------------------

/** Produces the templates of an updatable pathway from its typed argument. */
export type UpdatableBody<C, A> = (self: C, ctx: Context, arg: A) => TemplateIterable;

/**
 * A pathway driven by an externally supplied argument.
 *
 * The contract's shared argument envelope `S` is turned into this pathway's
 * own parameter `A` by `coerce`. Registry lists hold these with `A` erased
 * to `unknown`; {@link UpdatablePathway.call} is the type-safe way in from
 * an envelope.
 */
export interface UpdatablePathway<C, S, A = unknown> {
  readonly kind: 'updatable';
  readonly name: string;
  readonly guards: readonly Guard<C>[];
  readonly compileGates: readonly CompileGate<C>[];
  readonly argumentType: ArgumentType<A>;
  /**
   * Shared schema of `argumentType`. Present only for pathways declared with
   * `exposeSchema: true`.
   */
  readonly schema: PathwaySchema | undefined;
  coerce(args: S): CoercionResult<A>;
  body(self: C, ctx: Context, arg: A): TemplateIterable;
  /**
   * Coerce `args`, then run the body.
   *
   * @throws {CoercionError} If `args` does not yield a valid argument.
   */
  call(self: C, ctx: Context, args: S): TemplateIterable;
}

/** Any present declaration, as held by a registry. */
export type AnyPathway<C, S> = TransitionPathway<C> | TerminalPathway<C> | UpdatablePathway<C, S>;

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function createTransition<C>(params: {
  name: string;
  guards: readonly Guard<C>[];
  compileGates: readonly CompileGate<C>[];
  body: TransitionBody<C>;
}): TransitionPathway<C> {
  return Object.freeze({
    kind: 'transition',
    name: params.name,
    guards: Object.freeze([...params.guards]),
    compileGates: Object.freeze([...params.compileGates]),
    body: params.body,
  });
}

export function createUpdatable<C, S, A>(params: {
  name: string;
  guards: readonly Guard<C>[];
  compileGates: readonly CompileGate<C>[];
  argumentType: ArgumentType<A>;
  coerce: CoerceFn<S, A>;
  schema: PathwaySchema | undefined;
  body: UpdatableBody<C, A>;
}): UpdatablePathway<C, S, A> {
  const { coerce, body } = params;
  return Object.freeze({
    kind: 'updatable',
    name: params.name,
    guards: Object.freeze([...params.guards]),
    compileGates: Object.freeze([...params.compileGates]),
    argumentType: params.argumentType,
    schema: params.schema,
    coerce,
    body,
    call(self: C, ctx: Context, args: S): TemplateIterable {
      const coerced = coerce(args);
      if (!coerced.ok) throw coerced.error;
      return body(self, ctx, coerced.value);
    },
  });
}

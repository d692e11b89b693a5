// ============================================================================
// covenant-pathways — Contract Declaration
//
// A contract type is declared once, through ContractBuilder, as a table of
// named guards, compile gates and pathways. Names declared without a body
// are *absent*: their factories yield `undefined` and they are never callable.
// Every cross-reference is checked while the table is built, so a contract
// type that exists is consistent.
// ============================================================================

import { parseArgument } from './argument.js';
import type { ArgumentType, CoerceFn } from './argument.js';
import { createCompileGate } from './compileGate.js';
import type { CompileGate, CompileGateBody } from './compileGate.js';
import { CoercionError, DeclarationError } from './errors.js';
import type { CoercionResult } from './errors.js';
import { createGuard, GuardPolicy } from './guard.js';
import type { Guard, GuardBody } from './guard.js';
import { createTransition, createUpdatable } from './pathway.js';
import type { TransitionBody, TransitionPathway, UpdatableBody, UpdatablePathway } from './pathway.js';
import { createEntry } from './registry.js';
import type { PathwayRegistry } from './registry.js';
import { defaultSchemaCache } from './schemaCache.js';
import type { SchemaCache } from './schemaCache.js';

// ---------------------------------------------------------------------------
// Contract Type
// ---------------------------------------------------------------------------

/**
 * A declared contract type with instances of type `C` and the shared
 * updatable-argument envelope `S` (`undefined` for contracts with no
 * updatable pathways).
 */
export interface ContractType<C, S> {
  readonly name: string;
  /** Envelope shared by every updatable pathway of this contract. */
  readonly statefulArguments: ArgumentType<S> | undefined;
  /** Declared guard by name; `undefined` if absent or undeclared. */
  guard(name: string): Guard<C> | undefined;
  /** Declared compile gate by name; `undefined` if absent or undeclared. */
  compileGate(name: string): CompileGate<C> | undefined;
  /**
   * The pathway lists, bound to `cache` for updatable schemas. Memoized per
   * cache.
   *
   * @param cache - Defaults to {@link defaultSchemaCache}.
   */
  registry(cache?: SchemaCache): PathwayRegistry<C, S>;
  /** Validate an external value as this contract's argument envelope. */
  parseArguments(raw: unknown): CoercionResult<S>;
}

// ---------------------------------------------------------------------------
// Builder options
// ---------------------------------------------------------------------------

/** References from a pathway to declared guards and compile gates. */
export interface PathwayOptions<G extends string, K extends string> {
  /** Guards that must all be satisfied. Absent guards are skipped. */
  guardedBy?: readonly G[];
  /** Compile gates deciding inclusion. Absent gates are skipped. */
  compileIf?: readonly K[];
}

export interface GuardOptions {
  /** Evaluate at most once per contract instance. */
  cached?: boolean;
}

export interface UpdatableOptions<C, S, A, G extends string, K extends string> extends PathwayOptions<G, K> {
  argumentType: ArgumentType<A>;
  /** Explicit conversion from the contract's envelope to `A`. */
  coerce: CoerceFn<S, A>;
  /** Publish the argument's schema through the schema cache. */
  exposeSchema?: boolean;
  body: UpdatableBody<C, A>;
}

// ---------------------------------------------------------------------------
// Builder state
// ---------------------------------------------------------------------------

interface Slot<T> {
  readonly name: string;
  readonly value: T | undefined;
}

interface TransitionDraft<C> {
  readonly name: string;
  readonly guardedBy: readonly string[];
  readonly compileIf: readonly string[];
  readonly body: TransitionBody<C> | undefined;
}

interface UpdatableParts<C> {
  guards: readonly Guard<C>[];
  compileGates: readonly CompileGate<C>[];
  cache: SchemaCache;
}

interface UpdatableDraft<C, S> {
  readonly name: string;
  readonly guardedBy: readonly string[];
  readonly compileIf: readonly string[];
  /** Undefined for an absent pathway. */
  readonly make: ((parts: UpdatableParts<C>) => UpdatablePathway<C, S>) | undefined;
}

interface BuilderState<C, S> {
  readonly name: string;
  readonly statefulArguments: ArgumentType<S> | undefined;
  readonly guards: readonly Slot<Guard<C>>[];
  readonly compileGates: readonly Slot<CompileGate<C>>[];
  readonly transitions: readonly TransitionDraft<C>[];
  readonly terminals: readonly string[];
  readonly updatables: readonly UpdatableDraft<C, S>[];
}

const NAME = /^[A-Za-z_][A-Za-z0-9_-]*$/;

// ---------------------------------------------------------------------------
// ContractBuilder
// ---------------------------------------------------------------------------

/**
 * Immutable builder for a {@link ContractType}. Every method returns a new
 * builder; `G` and `K` accumulate the declared guard and compile-gate names
 * so references are checked by the compiler as well as at run time.
 *
 * Guards and compile gates must be declared before the pathways that
 * reference them.
 *
 * @example
 * ```ts
 * const Vault = declareContract<VaultState, VaultArgs>('Vault', { statefulArguments: VaultArgs })
 *   .guard('ownerSigned', (self) => Clause.key(self.owner), { cached: true })
 *   .guard('recoveryDelay', (self) => Clause.older(self.delay))
 *   .compileGate('hasHotKey', (self) => self.hot ? CompileDecision.NoConstraint : CompileDecision.Never)
 *   .transition('sweep', { guardedBy: ['ownerSigned'] }, function* (self, ctx) {
 *     yield ctx.template().addOutput(ctx.funds, self.cold).build();
 *   })
 *   .transition('rebalance')                      // absent
 *   .terminal('recoveryDelay')
 *   .updatable('withdraw', {
 *     guardedBy: ['ownerSigned'],
 *     compileIf: ['hasHotKey'],
 *     argumentType: Withdrawal,
 *     coerce: coerceFrom(Withdrawal, (args: VaultArgs) => args.withdraw),
 *     exposeSchema: true,
 *     body: function* (self, ctx, withdrawal) { ... },
 *   })
 *   .build();
 * ```
 */
export class ContractBuilder<C, S, G extends string = never, K extends string = never> {
  constructor(private readonly state: BuilderState<C, S>) {}

  // -----------------------------------------------------------------------
  // Guards & compile gates
  // -----------------------------------------------------------------------

  /** Declare an absent guard: references to it contribute nothing. */
  guard<N extends string>(name: N): ContractBuilder<C, S, G | N, K>;
  /** Declare a guard. */
  guard<N extends string>(name: N, body: GuardBody<C>, options?: GuardOptions): ContractBuilder<C, S, G | N, K>;
  guard<N extends string>(name: N, body?: GuardBody<C>, options?: GuardOptions): ContractBuilder<C, S, G | N, K> {
    this.assertNewName('guard', name, this.state.guards.map((slot) => slot.name));
    const value = body
      ? createGuard(name, body, options?.cached ? GuardPolicy.Cached : GuardPolicy.Fresh)
      : undefined;
    return new ContractBuilder<C, S, G | N, K>({ ...this.state, guards: [...this.state.guards, { name, value }] });
  }

  /** Declare an absent compile gate: it places no constraint. */
  compileGate<N extends string>(name: N): ContractBuilder<C, S, G, K | N>;
  /** Declare a compile gate. */
  compileGate<N extends string>(name: N, body: CompileGateBody<C>): ContractBuilder<C, S, G, K | N>;
  compileGate<N extends string>(name: N, body?: CompileGateBody<C>): ContractBuilder<C, S, G, K | N> {
    this.assertNewName('compile gate', name, this.state.compileGates.map((slot) => slot.name));
    const value = body ? createCompileGate(name, body) : undefined;
    return new ContractBuilder<C, S, G, K | N>({ ...this.state, compileGates: [...this.state.compileGates, { name, value }] });
  }

  // -----------------------------------------------------------------------
  // Pathways
  // -----------------------------------------------------------------------

  /** Declare an absent transition. */
  transition(name: string): ContractBuilder<C, S, G, K>;
  /** Declare an unguarded, always-included transition. */
  transition(name: string, body: TransitionBody<C>): ContractBuilder<C, S, G, K>;
  /** Declare a transition with guards and/or compile gates. */
  transition(name: string, options: PathwayOptions<G, K>, body: TransitionBody<C>): ContractBuilder<C, S, G, K>;
  transition(
    name: string,
    optionsOrBody?: PathwayOptions<G, K> | TransitionBody<C>,
    maybeBody?: TransitionBody<C>,
  ): ContractBuilder<C, S, G, K> {
    this.assertNewName('transition', name, this.state.transitions.map((draft) => draft.name));

    const options: PathwayOptions<G, K> = typeof optionsOrBody === 'function' ? {} : optionsOrBody ?? {};
    const body = typeof optionsOrBody === 'function' ? optionsOrBody : maybeBody;
    const draft: TransitionDraft<C> = {
      name,
      guardedBy: this.checkGuardRefs(name, options.guardedBy),
      compileIf: this.checkGateRefs(name, options.compileIf),
      body,
    };
    return new ContractBuilder<C, S, G, K>({ ...this.state, transitions: [...this.state.transitions, draft] });
  }

  /** Bind a declared guard into the terminal list. */
  terminal(guardName: G): ContractBuilder<C, S, G, K> {
    this.assertNewName('terminal', guardName, this.state.terminals);
    this.checkGuardRefs(guardName, [guardName]);
    return new ContractBuilder<C, S, G, K>({ ...this.state, terminals: [...this.state.terminals, guardName] });
  }

  /** Declare an absent updatable pathway. */
  updatable(name: string): ContractBuilder<C, S, G, K>;
  /** Declare an updatable pathway. */
  updatable<A>(name: string, options: UpdatableOptions<C, S, A, G, K>): ContractBuilder<C, S, G, K>;
  updatable<A>(name: string, options?: UpdatableOptions<C, S, A, G, K>): ContractBuilder<C, S, G, K> {
    this.assertNewName('updatable pathway', name, this.state.updatables.map((draft) => draft.name));

    if (!options) {
      const absent: UpdatableDraft<C, S> = { name, guardedBy: [], compileIf: [], make: undefined };
      return new ContractBuilder<C, S, G, K>({ ...this.state, updatables: [...this.state.updatables, absent] });
    }

    if (typeof options.coerce !== 'function') {
      throw new DeclarationError(this.state.name, `updatable pathway "${name}" must name a coerce function`);
    }

    const { argumentType, coerce, body } = options;
    const exposeSchema = options.exposeSchema ?? false;
    const draft: UpdatableDraft<C, S> = {
      name,
      guardedBy: this.checkGuardRefs(name, options.guardedBy),
      compileIf: this.checkGateRefs(name, options.compileIf),
      make: ({ guards, compileGates, cache }) =>
        createUpdatable<C, S, A>({
          name,
          guards,
          compileGates,
          argumentType,
          coerce,
          schema: exposeSchema ? cache.getSchemaFor(argumentType) : undefined,
          body,
        }),
    };
    return new ContractBuilder<C, S, G, K>({ ...this.state, updatables: [...this.state.updatables, draft] });
  }

  // -----------------------------------------------------------------------
  // Build
  // -----------------------------------------------------------------------

  /**
   * Finish the declaration.
   *
   * @throws {DeclarationError} If a present updatable pathway is declared
   *                            but the contract has no `statefulArguments`.
   */
  build(): ContractType<C, S> {
    const present = this.state.updatables.filter((draft) => draft.make !== undefined);
    if (present.length > 0 && !this.state.statefulArguments) {
      throw new DeclarationError(
        this.state.name,
        `updatable pathways (${present.map((draft) => draft.name).join(', ')}) need a statefulArguments envelope`,
      );
    }
    return new DeclaredContract(this.state);
  }

  // -----------------------------------------------------------------------
  // Validation
  // -----------------------------------------------------------------------

  private assertNewName(what: string, name: string, existing: readonly string[]): void {
    if (!NAME.test(name)) {
      throw new DeclarationError(this.state.name, `invalid ${what} name "${name}"`);
    }
    if (existing.includes(name)) {
      throw new DeclarationError(this.state.name, `duplicate ${what} "${name}"`);
    }
  }

  private checkGuardRefs(pathway: string, refs: readonly string[] = []): readonly string[] {
    const declared = this.state.guards.map((slot) => slot.name);
    for (const ref of refs) {
      if (!declared.includes(ref)) {
        throw new DeclarationError(this.state.name, `"${pathway}" references undeclared guard "${ref}"`);
      }
    }
    return Object.freeze([...refs]);
  }

  private checkGateRefs(pathway: string, refs: readonly string[] = []): readonly string[] {
    const declared = this.state.compileGates.map((slot) => slot.name);
    for (const ref of refs) {
      if (!declared.includes(ref)) {
        throw new DeclarationError(this.state.name, `"${pathway}" references undeclared compile gate "${ref}"`);
      }
    }
    return Object.freeze([...refs]);
  }
}

// ---------------------------------------------------------------------------
// declareContract
// ---------------------------------------------------------------------------

/** Start declaring a contract type with no updatable pathways. */
export function declareContract<C>(name: string): ContractBuilder<C, undefined>;
/** Start declaring a contract type whose updatable pathways share envelope `S`. */
export function declareContract<C, S>(
  name: string,
  options: { statefulArguments: ArgumentType<S> },
): ContractBuilder<C, S>;
export function declareContract<C, S>(
  name: string,
  options?: { statefulArguments: ArgumentType<S> },
): ContractBuilder<C, S> | ContractBuilder<C, undefined> {
  if (!NAME.test(name)) {
    throw new DeclarationError(name, 'contract name must match [A-Za-z_][A-Za-z0-9_-]*');
  }
  const empty = { name, guards: [], compileGates: [], transitions: [], terminals: [], updatables: [] };
  if (options) {
    return new ContractBuilder<C, S>({ ...empty, statefulArguments: options.statefulArguments });
  }
  return new ContractBuilder<C, undefined>({ ...empty, statefulArguments: undefined });
}

// ---------------------------------------------------------------------------
// DeclaredContract
// ---------------------------------------------------------------------------

class DeclaredContract<C, S> implements ContractType<C, S> {
  readonly name: string;
  readonly statefulArguments: ArgumentType<S> | undefined;
  private readonly guards: ReadonlyMap<string, Guard<C> | undefined>;
  private readonly compileGates: ReadonlyMap<string, CompileGate<C> | undefined>;
  private readonly transitions: readonly TransitionPathway<C>[];
  private readonly registries = new WeakMap<SchemaCache, PathwayRegistry<C, S>>();

  constructor(private readonly state: BuilderState<C, S>) {
    this.name = state.name;
    this.statefulArguments = state.statefulArguments;
    this.guards = new Map(state.guards.map((slot) => [slot.name, slot.value]));
    this.compileGates = new Map(state.compileGates.map((slot) => [slot.name, slot.value]));

    // Transitions do not depend on the schema cache; build them once.
    const transitions: TransitionPathway<C>[] = [];
    for (const draft of state.transitions) {
      if (draft.body) {
        transitions.push(
          createTransition({
            name: draft.name,
            guards: this.presentGuards(draft.guardedBy),
            compileGates: this.presentGates(draft.compileIf),
            body: draft.body,
          }),
        );
      }
    }
    this.transitions = transitions;
  }

  guard(name: string): Guard<C> | undefined {
    return this.guards.get(name);
  }

  compileGate(name: string): CompileGate<C> | undefined {
    return this.compileGates.get(name);
  }

  registry(cache: SchemaCache = defaultSchemaCache): PathwayRegistry<C, S> {
    const existing = this.registries.get(cache);
    if (existing) return existing;

    const registry: PathwayRegistry<C, S> = Object.freeze({
      contract: this.name,
      transitions: Object.freeze(
        this.state.transitions.map((draft) => {
          const declaration = this.transitions.find((t) => t.name === draft.name);
          return createEntry(draft.name, () => declaration);
        }),
      ),
      terminals: Object.freeze(
        this.state.terminals.map((name) => createEntry(name, () => this.guards.get(name))),
      ),
      updatables: Object.freeze(
        this.state.updatables.map((draft) => createEntry(draft.name, this.updatableFactory(draft, cache))),
      ),
    });
    this.registries.set(cache, registry);
    return registry;
  }

  parseArguments(raw: unknown): CoercionResult<S> {
    if (!this.statefulArguments) {
      return {
        ok: false,
        error: new CoercionError(`${this.name} arguments`, [
          { path: '', message: 'this contract declares no updatable pathways' },
        ]),
      };
    }
    return parseArgument(this.statefulArguments, raw);
  }

  // Built, and its schema fetched, on first call.
  private updatableFactory(draft: UpdatableDraft<C, S>, cache: SchemaCache): () => UpdatablePathway<C, S> | undefined {
    const make = draft.make;
    if (!make) return () => undefined;

    let declaration: UpdatablePathway<C, S> | undefined;
    return () => {
      if (!declaration) {
        declaration = make({
          guards: this.presentGuards(draft.guardedBy),
          compileGates: this.presentGates(draft.compileIf),
          cache,
        });
      }
      return declaration;
    };
  }

  private presentGuards(names: readonly string[]): Guard<C>[] {
    return names.flatMap((name) => {
      const guard = this.guards.get(name);
      return guard ? [guard] : [];
    });
  }

  private presentGates(names: readonly string[]): CompileGate<C>[] {
    return names.flatMap((name) => {
      const gate = this.compileGates.get(name);
      return gate ? [gate] : [];
    });
  }
}

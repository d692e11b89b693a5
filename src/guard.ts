// ============================================================================
// covenant-pathways — Guards
// ============================================================================

import type { Clause } from './clause.js';
import type { Context } from './context.js';

// ---------------------------------------------------------------------------
// Guard Declaration
// ---------------------------------------------------------------------------

/** How often a guard's body may be evaluated. */
export enum GuardPolicy {
  /** Re-evaluated every time the compiler asks. */
  Fresh = 'fresh',
  /** Evaluated at most once per contract instance; the clause is reused. */
  Cached = 'cached',
}

/** Computes the spending clause a guard imposes on a contract instance. */
export type GuardBody<C> = (self: C, ctx: Context) => Clause;

/**
 * A named spending-condition predicate.
 *
 * Guards are immutable descriptors shared by every pathway that references
 * them. A guard bound into a contract's terminal list is on its own
 * sufficient to release the contract's funds.
 */
export interface Guard<C> {
  readonly name: string;
  readonly policy: GuardPolicy;
  readonly body: GuardBody<C>;
}

/** Create a frozen {@link Guard}. */
export function createGuard<C>(name: string, body: GuardBody<C>, policy: GuardPolicy = GuardPolicy.Fresh): Guard<C> {
  return Object.freeze({ name, policy, body });
}

// ---------------------------------------------------------------------------
// GuardEvaluator
// ---------------------------------------------------------------------------

/** Counters exposed for diagnostics and tests. */
export interface GuardEvaluatorStats {
  /** Guard bodies actually invoked. */
  evaluations: number;
  /** Cached guards answered without invoking the body. */
  hits: number;
}

/**
 * Evaluates guards and honours {@link GuardPolicy.Cached}.
 *
 * Cached clauses are stored per contract instance (by object identity) and
 * per guard. Storage is a `WeakMap`, so entries go away with the instance;
 * {@link GuardEvaluator.invalidate} drops them earlier. The context is not
 * part of the key: a cached guard is, by declaration, independent of where
 * in the compilation it is asked for.
 */
export class GuardEvaluator {
  private cache = new WeakMap<object, Map<object, Clause>>();
  private readonly counters: GuardEvaluatorStats = { evaluations: 0, hits: 0 };

  /** Evaluate one guard for `self`. */
  evaluate<C extends object>(guard: Guard<C>, self: C, ctx: Context): Clause {
    if (guard.policy === GuardPolicy.Fresh) {
      this.counters.evaluations++;
      return guard.body(self, ctx);
    }

    let perInstance = this.cache.get(self);
    if (!perInstance) {
      perInstance = new Map();
      this.cache.set(self, perInstance);
    }

    const cached = perInstance.get(guard);
    if (cached) {
      this.counters.hits++;
      return cached;
    }

    this.counters.evaluations++;
    const clause = guard.body(self, ctx);
    perInstance.set(guard, clause);
    return clause;
  }

  /** Evaluate guards in order. An empty list yields an empty list. */
  evaluateAll<C extends object>(guards: readonly Guard<C>[], self: C, ctx: Context): Clause[] {
    return guards.map((guard) => this.evaluate(guard, self, ctx));
  }

  /** Forget every cached clause of `self`. */
  invalidate(self: object): void {
    this.cache.delete(self);
  }

  /** Forget every cached clause. */
  clear(): void {
    this.cache = new WeakMap();
  }

  get stats(): Readonly<GuardEvaluatorStats> {
    return { ...this.counters };
  }
}

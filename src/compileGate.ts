// ============================================================================
// covenant-pathways — Compile Gates
// ============================================================================

import type { Context } from './context.js';

// ---------------------------------------------------------------------------
// Compile Decision
// ---------------------------------------------------------------------------

/**
 * What a compile gate says about including its pathway in the compiled
 * contract.
 *
 * | Decision        | Meaning                                            |
 * |-----------------|----------------------------------------------------|
 * | `required`      | The pathway must be compiled.                      |
 * | `skippable`     | The pathway may be left out.                       |
 * | `never`         | The pathway must be left out.                      |
 * | `no-constraint` | This gate has no opinion.                          |
 * | `fail`          | Compilation of the contract must fail (`reasons`). |
 */
export type CompileDecision =
  | { readonly type: 'required' }
  | { readonly type: 'skippable' }
  | { readonly type: 'never' }
  | { readonly type: 'no-constraint' }
  | { readonly type: 'fail'; readonly reasons: readonly string[] };

const REQUIRED: CompileDecision = Object.freeze({ type: 'required' });
const SKIPPABLE: CompileDecision = Object.freeze({ type: 'skippable' });
const NEVER: CompileDecision = Object.freeze({ type: 'never' });
const NO_CONSTRAINT: CompileDecision = Object.freeze({ type: 'no-constraint' });

export const CompileDecision = {
  Required: REQUIRED,
  Skippable: SKIPPABLE,
  Never: NEVER,
  NoConstraint: NO_CONSTRAINT,
  fail(...reasons: string[]): CompileDecision {
    return Object.freeze({ type: 'fail', reasons: Object.freeze([...reasons]) });
  },
};

/**
 * Combine the decisions of several gates into one.
 *
 * - `fail` dominates; reasons of every failing gate are concatenated.
 * - `required` together with `never` is a `fail`.
 * - Otherwise `never` beats `required`, which beats `skippable`.
 * - `no-constraint` is neutral; an empty list yields `no-constraint`.
 */
export function mergeCompileDecisions(decisions: readonly CompileDecision[]): CompileDecision {
  const reasons: string[] = [];
  let failed = false;
  let required = false;
  let never = false;
  let skippable = false;

  for (const decision of decisions) {
    switch (decision.type) {
      case 'fail':
        failed = true;
        reasons.push(...decision.reasons);
        break;
      case 'required':
        required = true;
        break;
      case 'never':
        never = true;
        break;
      case 'skippable':
        skippable = true;
        break;
      case 'no-constraint':
        break;
    }
  }

  if (failed) return CompileDecision.fail(...reasons);
  if (required && never) {
    return CompileDecision.fail('pathway is both required and excluded');
  }
  if (never) return CompileDecision.Never;
  if (required) return CompileDecision.Required;
  if (skippable) return CompileDecision.Skippable;
  return CompileDecision.NoConstraint;
}

/** Whether a pathway with this (merged) decision belongs in the output. */
export function isIncluded(decision: CompileDecision): boolean {
  return decision.type !== 'never' && decision.type !== 'fail';
}

// ---------------------------------------------------------------------------
// Compile Gate Declaration
// ---------------------------------------------------------------------------

/** Evaluation policy of a compile gate. Gates are always evaluated fresh. */
export enum CompileGatePolicy {
  Fresh = 'fresh',
}

export type CompileGateBody<C> = (self: C, ctx: Context) => CompileDecision;

/** A named predicate deciding static inclusion of a pathway. */
export interface CompileGate<C> {
  readonly name: string;
  readonly policy: CompileGatePolicy;
  readonly body: CompileGateBody<C>;
}

/** Create a frozen {@link CompileGate}. */
export function createCompileGate<C>(name: string, body: CompileGateBody<C>): CompileGate<C> {
  return Object.freeze({ name, policy: CompileGatePolicy.Fresh, body });
}

/**
 * Evaluate gates in order, each one fresh. An empty list yields an empty
 * list, which merges to `no-constraint`.
 */
export function evaluateCompileGates<C>(gates: readonly CompileGate<C>[], self: C, ctx: Context): CompileDecision[] {
  return gates.map((gate) => gate.body(self, ctx));
}

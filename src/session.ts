// ============================================================================
// covenant-pathways — Compilation Session
// ============================================================================

import { Clause } from './clause.js';
import { evaluateCompileGates, mergeCompileDecisions } from './compileGate.js';
import type { CompileDecision, CompileGate } from './compileGate.js';
import type { ContractType } from './contract.js';
import type { Context } from './context.js';
import type { CoercionResult } from './errors.js';
import { GuardEvaluator } from './guard.js';
import type { Guard } from './guard.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';
import type { UpdatablePathway } from './pathway.js';
import { resolveRegistry } from './registry.js';
import type { PathwayRegistry, ResolvedPathways } from './registry.js';
import { SchemaCache } from './schemaCache.js';

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

/** Configuration for a {@link PathwaySession}. Every field is optional. */
export interface SessionConfig {
  /** Schema cache owned by the session. Defaults to a fresh cache. */
  schemaCache?: SchemaCache;
  /** Evaluator holding cached guard clauses. Defaults to a fresh evaluator. */
  guardEvaluator?: GuardEvaluator;
  /** Defaults to {@link silentLogger}. */
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// PathwaySession
// ---------------------------------------------------------------------------

/**
 * The state a compiler keeps while it walks contract types: one schema
 * cache, one guard evaluator and a logger.
 *
 * A session never invokes pathway bodies; it resolves declarations and
 * evaluates the guards and compile gates attached to them.
 *
 * @example
 * ```ts
 * const session = new PathwaySession({ logger: createLoggerFromEnv() });
 * const { transitions } = session.usablePathways(Vault);
 *
 * for (const pathway of transitions) {
 *   const decision = session.decideInclusion(pathway.compileGates, vault, ctx);
 *   if (!isIncluded(decision)) continue;
 *   const clause = session.guardClause(pathway.guards, vault, ctx);
 *   const templates = [...pathway.body(vault, ctx.derive(pathway.name))];
 * }
 * ```
 */
export class PathwaySession {
  readonly schemaCache: SchemaCache;
  readonly guardEvaluator: GuardEvaluator;
  private readonly logger: Logger;

  constructor(config: SessionConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.schemaCache = config.schemaCache ?? new SchemaCache({ logger: this.logger });
    this.guardEvaluator = config.guardEvaluator ?? new GuardEvaluator();
  }

  // -----------------------------------------------------------------------
  // Declarations
  // -----------------------------------------------------------------------

  /** The registry of `type`, bound to this session's schema cache. */
  registry<C, S>(type: ContractType<C, S>): PathwayRegistry<C, S> {
    return type.registry(this.schemaCache);
  }

  /**
   * Call every factory of `type` once and return the present declarations.
   * Absent names are skipped and logged at debug level.
   */
  usablePathways<C, S>(type: ContractType<C, S>): ResolvedPathways<C, S> {
    const resolved = resolveRegistry(this.registry(type), (kind, name) => {
      this.logger.debug('pathway_absent', 'Skipping absent pathway', {
        contract: type.name,
        kind,
        pathway: name,
      });
    });

    this.logger.debug('pathways_resolved', 'Resolved contract pathways', {
      contract: type.name,
      transitions: resolved.transitions.length,
      terminals: resolved.terminals.length,
      updatables: resolved.updatables.length,
    });
    return resolved;
  }

  // -----------------------------------------------------------------------
  // Guards & compile gates
  // -----------------------------------------------------------------------

  /** Clauses of `guards`, in order. Cached guards are answered per instance. */
  evaluateGuards<C extends object>(guards: readonly Guard<C>[], self: C, ctx: Context): Clause[] {
    return this.guardEvaluator.evaluateAll(guards, self, ctx);
  }

  /**
   * The conjunction of `guards`. An empty list is `trivial`: the pathway is
   * usable without any spending condition.
   */
  guardClause<C extends object>(guards: readonly Guard<C>[], self: C, ctx: Context): Clause {
    const clauses = this.evaluateGuards(guards, self, ctx);
    return clauses.length === 0 ? Clause.trivial() : Clause.and(...clauses);
  }

  /**
   * Merged inclusion decision of `gates`. An empty list is `no-constraint`:
   * the pathway is included.
   */
  decideInclusion<C>(gates: readonly CompileGate<C>[], self: C, ctx: Context): CompileDecision {
    const decision = mergeCompileDecisions(evaluateCompileGates(gates, self, ctx));
    if (decision.type === 'fail') {
      this.logger.warn('compile_gate_failed', 'Compile gates rejected the pathway', {
        path: ctx.pathString,
        reasons: decision.reasons,
      });
    }
    return decision;
  }

  /** Drop cached guard clauses of a contract instance. */
  invalidate(self: object): void {
    this.guardEvaluator.invalidate(self);
  }

  // -----------------------------------------------------------------------
  // Arguments
  // -----------------------------------------------------------------------

  /**
   * Turn an external value into the typed argument of `pathway`: validate it
   * as the contract's envelope, then apply the pathway's coercion.
   *
   * Failures are returned, not thrown, and logged at warn level.
   */
  coerceArguments<C, S, A>(
    type: ContractType<C, S>,
    pathway: UpdatablePathway<C, S, A>,
    raw: unknown,
  ): CoercionResult<A> {
    const envelope = type.parseArguments(raw);
    const result = envelope.ok ? pathway.coerce(envelope.value) : envelope;

    if (!result.ok) {
      this.logger.warn('coercion_failed', 'External argument rejected', {
        contract: type.name,
        pathway: pathway.name,
        issues: result.error.issues,
      });
    }
    return result;
  }
}

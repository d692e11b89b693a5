// ============================================================================
// covenant-pathways — Transaction Templates
// ============================================================================

import type { Context } from './context.js';
import { CompilationError } from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One output of a transaction template. */
export interface TemplateOutput {
  /** Amount in the chain's base unit. */
  readonly amount: bigint;
  /** Address, script descriptor or child contract identifier. */
  readonly destination: string;
  readonly metadata: Readonly<Record<string, string>>;
}

/**
 * A transaction template emitted by a pathway body.
 *
 * The compiler downstream turns templates into committed transactions; this
 * library treats them as opaque values.
 */
export interface TransactionTemplate {
  /** Derivation path of the context that built the template. */
  readonly path: readonly string[];
  readonly outputs: readonly TemplateOutput[];
  readonly label?: string;
  /** nLockTime. */
  readonly lockTime?: number;
  /** nSequence of the contract's input. */
  readonly sequence?: number;
}

/**
 * What a transition or updatable body returns: a finite sequence of
 * templates, consumed once. Generator functions are the usual way to write
 * one, and calling the body again starts a fresh sequence.
 */
export type TemplateIterable = Iterable<TransactionTemplate>;

// ---------------------------------------------------------------------------
// TemplateBuilder
// ---------------------------------------------------------------------------

/**
 * Accumulates outputs against the funds of a {@link Context}.
 *
 * Obtain one from `ctx.template()`.
 *
 * @example
 * ```ts
 * yield ctx.template()
 *   .addOutput(60_000n, aliceAddress)
 *   .addOutput(40_000n, bobAddress)
 *   .setSequence(144)
 *   .build();
 * ```
 */
export class TemplateBuilder {
  private readonly outputs: TemplateOutput[] = [];
  private remaining: bigint;
  private label?: string;
  private lockTime?: number;
  private sequence?: number;

  constructor(private readonly ctx: Context) {
    this.remaining = ctx.funds;
  }

  /** Funds not yet assigned to an output. */
  get remainingFunds(): bigint {
    return this.remaining;
  }

  /**
   * Append an output.
   *
   * @throws {CompilationError} If `amount` is not positive or exceeds the
   *                            remaining funds.
   */
  addOutput(amount: bigint, destination: string, metadata: Record<string, string> = {}): this {
    if (amount <= 0n) {
      throw new CompilationError(`output amount must be positive, got ${amount}`, this.ctx.path);
    }
    if (amount > this.remaining) {
      throw new CompilationError(
        `insufficient funds for output: need ${amount}, have ${this.remaining}`,
        this.ctx.path,
      );
    }
    if (!destination) {
      throw new CompilationError('output destination is required', this.ctx.path);
    }
    this.remaining -= amount;
    this.outputs.push(Object.freeze({ amount, destination, metadata: Object.freeze({ ...metadata }) }));
    return this;
  }

  setLabel(label: string): this {
    this.label = label;
    return this;
  }

  setLockTime(lockTime: number): this {
    if (!Number.isInteger(lockTime) || lockTime < 0 || lockTime > 0xffffffff) {
      throw new CompilationError(`invalid lock time ${lockTime}`, this.ctx.path);
    }
    this.lockTime = lockTime;
    return this;
  }

  setSequence(sequence: number): this {
    if (!Number.isInteger(sequence) || sequence < 0 || sequence > 0xffffffff) {
      throw new CompilationError(`invalid sequence ${sequence}`, this.ctx.path);
    }
    this.sequence = sequence;
    return this;
  }

  /**
   * Freeze the accumulated template.
   *
   * @throws {CompilationError} If no output was added.
   */
  build(): TransactionTemplate {
    if (this.outputs.length === 0) {
      throw new CompilationError('a template needs at least one output', this.ctx.path);
    }

    const template: {
      path: readonly string[];
      outputs: readonly TemplateOutput[];
      label?: string;
      lockTime?: number;
      sequence?: number;
    } = {
      path: this.ctx.path,
      outputs: Object.freeze([...this.outputs]),
    };
    if (this.label !== undefined) template.label = this.label;
    if (this.lockTime !== undefined) template.lockTime = this.lockTime;
    if (this.sequence !== undefined) template.sequence = this.sequence;

    return Object.freeze(template);
  }
}

/** Sum of a template's output amounts. */
export function totalAmount(template: TransactionTemplate): bigint {
  return template.outputs.reduce((sum, output) => sum + output.amount, 0n);
}

// ============================================================================
// covenant-pathways — Compilation Context
// ============================================================================

import { CompilationError } from './errors.js';
import { TemplateBuilder } from './template.js';

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

/** Chain a contract is being compiled for. */
export enum Network {
  Mainnet = 'mainnet',
  Testnet = 'testnet',
  Signet = 'signet',
  Regtest = 'regtest',
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export interface ContextOptions {
  network: Network;
  /** Funds (in the chain's base unit) available to this compilation step. */
  funds: bigint;
  /** Derivation path from the root contract. Defaults to the root (`[]`). */
  path?: readonly string[];
}

const SEGMENT = /^[A-Za-z0-9_-]+$/;

/**
 * The compile-time environment handed to every pathway, guard and compile
 * gate body.
 *
 * Contexts are immutable; `derive` and `spend` return new contexts. The
 * registry never inspects a context, it only forwards it.
 *
 * @example
 * ```ts
 * const root = new Context({ network: Network.Regtest, funds: 100_000n });
 * const child = root.derive('cooperativeClose');
 * child.pathString; // => '/cooperativeClose'
 * ```
 */
export class Context {
  readonly network: Network;
  readonly funds: bigint;
  readonly path: readonly string[];

  constructor(options: ContextOptions) {
    if (options.funds < 0n) {
      throw new CompilationError(`funds must be non-negative, got ${options.funds}`, options.path ?? []);
    }
    this.network = options.network;
    this.funds = options.funds;
    this.path = Object.freeze([...(options.path ?? [])]);
  }

  /** Slash-joined derivation path, `/` at the root. */
  get pathString(): string {
    return '/' + this.path.join('/');
  }

  /**
   * Child context for a named sub-step, with the same network and funds.
   *
   * @throws {CompilationError} If `segment` is not `[A-Za-z0-9_-]+`.
   */
  derive(segment: string): Context {
    if (!SEGMENT.test(segment)) {
      throw new CompilationError(`invalid path segment "${segment}"`, this.path);
    }
    return new Context({ network: this.network, funds: this.funds, path: [...this.path, segment] });
  }

  /**
   * Context with `amount` removed from the available funds.
   *
   * @throws {CompilationError} If `amount` is negative or exceeds the funds.
   */
  spend(amount: bigint): Context {
    if (amount < 0n) {
      throw new CompilationError(`cannot spend a negative amount (${amount})`, this.path);
    }
    if (amount > this.funds) {
      throw new CompilationError(`insufficient funds: need ${amount}, have ${this.funds}`, this.path);
    }
    return new Context({ network: this.network, funds: this.funds - amount, path: this.path });
  }

  /** Start a transaction template funded by this context. */
  template(): TemplateBuilder {
    return new TemplateBuilder(this);
  }
}

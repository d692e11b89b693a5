// ============================================================================
// covenant-pathways — Spending Clauses
// ============================================================================

import { sha256 } from '@noble/hashes/sha256';

// ---------------------------------------------------------------------------
// Clause
// ---------------------------------------------------------------------------

/**
 * A spending condition produced by a guard body.
 *
 * Clauses are plain immutable data. This library only builds and forwards
 * them; the script layer downstream decides how each one is enforced.
 */
export type Clause =
  | { readonly type: 'trivial' }
  | { readonly type: 'unsatisfiable' }
  /** A signature by `publicKey` (hex). */
  | { readonly type: 'key'; readonly publicKey: string }
  /** Reveal of the preimage of `hash` (hex SHA-256). */
  | { readonly type: 'sha256'; readonly hash: string }
  /** Absolute lock: block height or unix time (BIP-65 semantics). */
  | { readonly type: 'after'; readonly lockTime: number }
  /** Relative lock in blocks since confirmation (BIP-68 semantics). */
  | { readonly type: 'older'; readonly blocks: number }
  | { readonly type: 'and'; readonly clauses: readonly Clause[] }
  | { readonly type: 'or'; readonly clauses: readonly Clause[] }
  | { readonly type: 'threshold'; readonly k: number; readonly clauses: readonly Clause[] };

export type ClauseType = Clause['type'];

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const HEX = /^[0-9a-f]+$/;
/** Largest value a 32-bit nLockTime accepts. */
const MAX_LOCK_TIME = 0xffffffff;
/** Largest block count a BIP-68 relative lock encodes. */
const MAX_RELATIVE_BLOCKS = 0xffff;

/** @internal */
function toHex(bytes: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0');
  }
  return hex;
}

/** @internal */
function normalizeHex(value: string, bytes: number | undefined, label: string): string {
  const hex = value.toLowerCase().replace(/^0x/, '');
  if (!HEX.test(hex) || hex.length % 2 !== 0) {
    throw new Error(`Pathways: ${label} must be a hex string`);
  }
  if (bytes !== undefined && hex.length !== bytes * 2) {
    throw new Error(`Pathways: ${label} must be ${bytes} bytes, got ${hex.length / 2}`);
  }
  return hex;
}

/** @internal */
function assertInteger(value: number, min: number, max: number, label: string): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Pathways: ${label} must be an integer in [${min}, ${max}], got ${value}`);
  }
}

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

const TRIVIAL: Clause = Object.freeze({ type: 'trivial' });
const UNSATISFIABLE: Clause = Object.freeze({ type: 'unsatisfiable' });

/**
 * Clause constructors. Inputs are validated and normalized (hex lowercased,
 * `0x` stripped); results are frozen.
 *
 * @example
 * ```ts
 * const cooperative = Clause.and(Clause.key(alice), Clause.key(bob));
 * const timeout = Clause.and(Clause.key(alice), Clause.older(144));
 * const escape = Clause.or(cooperative, timeout);
 * ```
 */
export const Clause = {
  /** Always satisfied. */
  trivial(): Clause {
    return TRIVIAL;
  },

  /** Never satisfied. */
  unsatisfiable(): Clause {
    return UNSATISFIABLE;
  },

  /** Signature by an x-only (32-byte) or compressed (33-byte) public key. */
  key(publicKey: string): Clause {
    const hex = normalizeHex(publicKey, undefined, 'public key');
    if (hex.length !== 64 && hex.length !== 66) {
      throw new Error(`Pathways: public key must be 32 or 33 bytes, got ${hex.length / 2}`);
    }
    return Object.freeze({ type: 'key', publicKey: hex });
  },

  /** Preimage reveal for a 32-byte SHA-256 digest. */
  sha256(hash: string): Clause {
    return Object.freeze({ type: 'sha256', hash: normalizeHex(hash, 32, 'sha256 hash') });
  },

  /** Preimage reveal for `preimage`, hashing it here. */
  hashLock(preimage: Uint8Array): Clause {
    return Object.freeze({ type: 'sha256', hash: toHex(sha256(preimage)) });
  },

  /** Absolute time lock. */
  after(lockTime: number): Clause {
    assertInteger(lockTime, 1, MAX_LOCK_TIME, 'lock time');
    return Object.freeze({ type: 'after', lockTime });
  },

  /** Relative time lock in blocks. */
  older(blocks: number): Clause {
    assertInteger(blocks, 1, MAX_RELATIVE_BLOCKS, 'relative lock');
    return Object.freeze({ type: 'older', blocks });
  },

  /** All of `clauses`. A single clause is returned unchanged. */
  and(...clauses: Clause[]): Clause {
    if (clauses.length === 0) {
      throw new Error('Pathways: and() needs at least one clause');
    }
    if (clauses.length === 1) return clauses[0];
    return Object.freeze({ type: 'and', clauses: Object.freeze([...clauses]) });
  },

  /** Any of `clauses`. A single clause is returned unchanged. */
  or(...clauses: Clause[]): Clause {
    if (clauses.length === 0) {
      throw new Error('Pathways: or() needs at least one clause');
    }
    if (clauses.length === 1) return clauses[0];
    return Object.freeze({ type: 'or', clauses: Object.freeze([...clauses]) });
  },

  /** At least `k` of `clauses`. */
  threshold(k: number, clauses: Clause[]): Clause {
    if (clauses.length === 0) {
      throw new Error('Pathways: threshold() needs at least one clause');
    }
    assertInteger(k, 1, clauses.length, 'threshold');
    return Object.freeze({ type: 'threshold', k, clauses: Object.freeze([...clauses]) });
  },
};

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Render a clause as a compact policy string.
 *
 * Keys and hashes are abbreviated to their first 8 hex characters.
 *
 * @example
 * ```ts
 * describeClause(Clause.and(Clause.key(alice), Clause.older(144)));
 * // => 'and(pk(02a1b2c3…), older(144))'
 * ```
 */
export function describeClause(clause: Clause): string {
  switch (clause.type) {
    case 'trivial':
      return 'true';
    case 'unsatisfiable':
      return 'false';
    case 'key':
      return `pk(${clause.publicKey.slice(0, 8)}…)`;
    case 'sha256':
      return `sha256(${clause.hash.slice(0, 8)}…)`;
    case 'after':
      return `after(${clause.lockTime})`;
    case 'older':
      return `older(${clause.blocks})`;
    case 'and':
    case 'or':
      return `${clause.type}(${clause.clauses.map(describeClause).join(', ')})`;
    case 'threshold':
      return `thresh(${clause.k}, ${clause.clauses.map(describeClause).join(', ')})`;
  }
}

// ============================================================================
// covenant-pathways — Pathway Registry
// ============================================================================

import type { Guard } from './guard.js';
import type { PathwayKind, TransitionPathway, UpdatablePathway } from './pathway.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * One named slot of a registry list.
 *
 * `factory` takes no arguments and yields the declaration, or `undefined`
 * when the contract type does not implement this pathway. An absent result
 * is normal: it is how a contract implements a sparse subset of pathways.
 */
export interface RegistryEntry<T> {
  readonly name: string;
  readonly factory: () => T | undefined;
}

/**
 * The ordered pathway lists of one contract type, in the order the author
 * declared them. The arrays are frozen; reading them twice yields the same
 * order.
 */
export interface PathwayRegistry<C, S> {
  readonly contract: string;
  readonly transitions: readonly RegistryEntry<TransitionPathway<C>>[];
  /** Guards that on their own release the contract's funds. */
  readonly terminals: readonly RegistryEntry<Guard<C>>[];
  readonly updatables: readonly RegistryEntry<UpdatablePathway<C, S>>[];
}

/** Present declarations of a registry, by flavor, in declaration order. */
export interface ResolvedPathways<C, S> {
  readonly transitions: readonly TransitionPathway<C>[];
  readonly terminals: readonly Guard<C>[];
  readonly updatables: readonly UpdatablePathway<C, S>[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Create a frozen {@link RegistryEntry}. */
export function createEntry<T>(name: string, factory: () => T | undefined): RegistryEntry<T> {
  return Object.freeze({ name, factory });
}

/**
 * Look up one pathway by name.
 *
 * @returns The declaration; `undefined` if the name is absent or was never
 *          declared in this list.
 */
export function lookupPathway<T>(entries: readonly RegistryEntry<T>[], name: string): T | undefined {
  return entries.find((entry) => entry.name === name)?.factory();
}

/**
 * Call every factory once and keep the present declarations, in order.
 *
 * @param onAbsent - Called with the name of each absent entry.
 */
export function resolvePresent<T>(
  entries: readonly RegistryEntry<T>[],
  onAbsent?: (name: string) => void,
): T[] {
  const present: T[] = [];
  for (const entry of entries) {
    const declaration = entry.factory();
    if (declaration === undefined) {
      onAbsent?.(entry.name);
    } else {
      present.push(declaration);
    }
  }
  return present;
}

/**
 * Resolve all three lists of a registry.
 *
 * @param onAbsent - Called with the list and name of each absent entry.
 */
export function resolveRegistry<C, S>(
  registry: PathwayRegistry<C, S>,
  onAbsent?: (kind: PathwayKind, name: string) => void,
): ResolvedPathways<C, S> {
  return {
    transitions: resolvePresent(registry.transitions, (name) => onAbsent?.('transition', name)),
    terminals: resolvePresent(registry.terminals, (name) => onAbsent?.('terminal', name)),
    updatables: resolvePresent(registry.updatables, (name) => onAbsent?.('updatable', name)),
  };
}

/** Names declared in a registry list, present or not, in order. */
export function entryNames<T>(entries: readonly RegistryEntry<T>[]): string[] {
  return entries.map((entry) => entry.name);
}

// ============================================================================
// covenant-pathways — Schema Cache
// ============================================================================

import _canonicalize from 'canonicalize';
const canonicalize: (value: unknown) => string | undefined =
  typeof _canonicalize === 'function'
    ? _canonicalize
    : (_canonicalize as unknown as { default: (value: unknown) => string | undefined }).default;
import { keccak_256 } from '@noble/hashes/sha3';
import { z } from 'zod';
import type { ArgumentType } from './argument.js';
import { SchemaGenerationError } from './errors.js';
import { silentLogger } from './logger.js';
import type { Logger } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A JSON Schema document. */
export type JsonSchema = { readonly [key: string]: unknown };

/**
 * The shared, immutable structural description of an argument type.
 *
 * Every caller that asks for the same {@link ArgumentType} receives this very
 * object; compare with `===` or by `fingerprint`.
 */
export interface PathwaySchema {
  /** Name of the described argument type. */
  readonly argument: string;
  /** JSON Schema (draft 2020-12) of the argument. Deeply frozen. */
  readonly jsonSchema: JsonSchema;
  /** 0x-prefixed keccak256 of the RFC 8785 canonical form of `jsonSchema`. */
  readonly fingerprint: string;
}

/** Produces the JSON Schema of an argument type. Expected to be expensive. */
export type SchemaGenerator = <T>(type: ArgumentType<T>) => JsonSchema;

export interface SchemaCacheOptions {
  /** Schema generator. Defaults to zod's JSON Schema conversion. */
  generate?: SchemaGenerator;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** @internal */
function toHex(bytes: Uint8Array): string {
  let hex = '0x';
  for (let i = 0; i < bytes.length; i++) {
    hex += bytes[i].toString(16).padStart(2, '0');
  }
  return hex;
}

/** @internal */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Default generator: zod's JSON Schema conversion, titled with the argument
 * type's name.
 */
export const zodSchemaGenerator: SchemaGenerator = (type) => {
  const generated = z.toJSONSchema(type.schema);
  return { title: type.name, ...generated };
};

/**
 * Compute the fingerprint of a JSON Schema document.
 *
 * @returns 0x-prefixed keccak256 hex of the canonical JSON bytes.
 */
export function fingerprintSchema(jsonSchema: JsonSchema): string {
  const json = canonicalize(jsonSchema);
  if (json === undefined) {
    throw new Error('Pathways: canonicalize returned undefined — schema may contain unsupported values');
  }
  return toHex(keccak_256(new TextEncoder().encode(json)));
}

// ---------------------------------------------------------------------------
// SchemaCache
// ---------------------------------------------------------------------------

/**
 * Memoized map from argument type identity to its {@link PathwaySchema}.
 *
 * Generation runs at most once per argument type for the lifetime of the
 * cache. Lookup, generation and insertion happen in one synchronous step, so
 * no other caller on the event loop can interleave between the miss and the
 * insert.
 *
 * A compilation session normally owns its cache; {@link defaultSchemaCache}
 * serves callers that have none.
 *
 * @example
 * ```ts
 * const cache = new SchemaCache();
 * const a = cache.getSchemaFor(Payout);
 * const b = cache.getSchemaFor(Payout);
 * a === b; // => true, generated once
 * ```
 */
export class SchemaCache {
  private readonly entries = new Map<object, PathwaySchema>();
  private readonly generate: SchemaGenerator;
  private readonly logger: Logger;
  private generations = 0;

  constructor(options: SchemaCacheOptions = {}) {
    this.generate = options.generate ?? zodSchemaGenerator;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Return the shared schema for `type`, generating it on first request.
   *
   * @throws {SchemaGenerationError} If the generator cannot describe the type.
   */
  getSchemaFor<T>(type: ArgumentType<T>): PathwaySchema {
    const cached = this.entries.get(type);
    if (cached) return cached;

    let jsonSchema: JsonSchema;
    try {
      jsonSchema = this.generate(type);
    } catch (err) {
      throw new SchemaGenerationError(type.name, err);
    }
    this.generations++;

    const schema: PathwaySchema = deepFreeze({
      argument: type.name,
      jsonSchema,
      fingerprint: fingerprintSchema(jsonSchema),
    });
    this.entries.set(type, schema);

    this.logger.debug('schema_generated', 'Generated argument schema', {
      argument: type.name,
      fingerprint: schema.fingerprint,
    });
    return schema;
  }

  /** Whether a schema for `type` has already been generated. */
  has<T>(type: ArgumentType<T>): boolean {
    return this.entries.has(type);
  }

  /** Number of cached schemas. */
  get size(): number {
    return this.entries.size;
  }

  /** Number of times the generator has run successfully. */
  get generationCount(): number {
    return this.generations;
  }
}

/** Process-wide cache used when no session supplies one. */
export const defaultSchemaCache = new SchemaCache();

/** Shorthand for `defaultSchemaCache.getSchemaFor(type)`. */
export function getSchemaFor<T>(type: ArgumentType<T>): PathwaySchema {
  return defaultSchemaCache.getSchemaFor(type);
}

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineArgumentType } from '../argument.js';
import { SchemaGenerationError } from '../errors.js';
import type { Logger } from '../logger.js';
import {
  SchemaCache,
  defaultSchemaCache,
  fingerprintSchema,
  getSchemaFor,
  zodSchemaGenerator,
} from '../schemaCache.js';
import type { SchemaGenerator } from '../schemaCache.js';

const Payout = defineArgumentType(
  'Payout',
  z.object({ recipient: z.string(), amount: z.number().int().positive() }),
);

/** Wraps the zod generator and counts its invocations. */
function countingGenerator(): { generate: SchemaGenerator; calls: () => number } {
  let calls = 0;
  return {
    generate: (type) => {
      calls++;
      return zodSchemaGenerator(type);
    },
    calls: () => calls,
  };
}

describe('SchemaCache.getSchemaFor', () => {
  it('generates on first request and reuses the result', () => {
    const counter = countingGenerator();
    const cache = new SchemaCache({ generate: counter.generate });

    const first = cache.getSchemaFor(Payout);
    const second = cache.getSchemaFor(Payout);

    expect(second).toBe(first);
    expect(counter.calls()).toBe(1);
    expect(cache.generationCount).toBe(1);
    expect(cache.size).toBe(1);
  });

  it('generates once when callers race through Promise.all, each call completing synchronously', async () => {
    const counter = countingGenerator();
    const cache = new SchemaCache({ generate: counter.generate });

    const results = await Promise.all(
      Array.from({ length: 16 }, async () => cache.getSchemaFor(Payout)),
    );

    expect(counter.calls()).toBe(1);
    for (const schema of results) {
      expect(schema).toBe(results[0]);
    }
  });

  it('inserts each schema in the same call that generates it, even when generation re-enters the cache', () => {
    const Inner = defineArgumentType('Inner', z.object({ memo: z.string() }));
    const Outer = defineArgumentType('Outer', z.object({ inner: Inner.schema }));
    const observed: string[] = [];
    let calls = 0;

    const cache: SchemaCache = new SchemaCache({
      generate: (type) => {
        calls++;
        if (type.name === 'Outer') {
          observed.push(`outer cached during generation: ${cache.has(Outer)}`);
          const inner = cache.getSchemaFor(Inner);
          observed.push(`inner returned: ${inner.argument}, cached: ${cache.has(Inner)}`);
        }
        return zodSchemaGenerator(type);
      },
    });

    const outer = cache.getSchemaFor(Outer);

    expect(observed).toEqual(['outer cached during generation: false', 'inner returned: Inner, cached: true']);
    expect(cache.has(Outer)).toBe(true);
    expect(cache.getSchemaFor(Outer)).toBe(outer);
    expect(cache.getSchemaFor(Inner).argument).toBe('Inner');
    expect(calls).toBe(2);
    expect(cache.generationCount).toBe(2);
  });

  it('describes the argument as a JSON Schema titled with its name', () => {
    const schema = new SchemaCache().getSchemaFor(Payout);
    expect(schema.argument).toBe('Payout');
    expect(schema.jsonSchema).toMatchObject({
      title: 'Payout',
      type: 'object',
      properties: { recipient: { type: 'string' } },
    });
  });

  it('returns a deeply frozen schema', () => {
    const schema = new SchemaCache().getSchemaFor(Payout);
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.jsonSchema)).toBe(true);
    expect(Object.isFrozen(schema.jsonSchema.properties)).toBe(true);
  });

  it('fingerprints as a 0x-prefixed keccak256 hex string', () => {
    const schema = new SchemaCache().getSchemaFor(Payout);
    expect(schema.fingerprint).toMatch(/^0x[0-9a-f]{64}$/);
    expect(schema.fingerprint).toBe(fingerprintSchema(schema.jsonSchema));
  });

  it('keys on argument type identity, not structure', () => {
    const shape = z.object({ note: z.string() });
    const a = defineArgumentType('Twin', shape);
    const b = defineArgumentType('Twin', shape);
    const cache = new SchemaCache();

    const schemaA = cache.getSchemaFor(a);
    const schemaB = cache.getSchemaFor(b);

    expect(schemaA).not.toBe(schemaB);
    expect(schemaA.fingerprint).toBe(schemaB.fingerprint);
    expect(cache.generationCount).toBe(2);
  });

  it('wraps generator failures and caches nothing', () => {
    const cache = new SchemaCache({
      generate: () => {
        throw new Error('unrepresentable');
      },
    });

    expect(() => cache.getSchemaFor(Payout)).toThrow(SchemaGenerationError);
    expect(() => cache.getSchemaFor(Payout)).toThrow(
      'Pathways: cannot generate a schema for argument "Payout" — unrepresentable',
    );
    expect(cache.has(Payout)).toBe(false);
    expect(cache.generationCount).toBe(0);
  });

  it('logs each generation at debug level', () => {
    const events: string[] = [];
    const logger: Logger = {
      debug: (event) => events.push(event),
      info: () => {},
      warn: () => {},
      error: () => {},
    };
    const cache = new SchemaCache({ logger });

    cache.getSchemaFor(Payout);
    cache.getSchemaFor(Payout);

    expect(events).toEqual(['schema_generated']);
  });
});

describe('fingerprintSchema', () => {
  it('is independent of key order', () => {
    expect(fingerprintSchema({ b: 2, a: 1 })).toBe(fingerprintSchema({ a: 1, b: 2 }));
  });

  it('differs for different schemas', () => {
    expect(fingerprintSchema({ type: 'string' })).not.toBe(fingerprintSchema({ type: 'number' }));
  });
});

describe('getSchemaFor', () => {
  it('uses the process-wide cache', () => {
    const Memo = defineArgumentType('Memo', z.object({ text: z.string() }));
    expect(getSchemaFor(Memo)).toBe(defaultSchemaCache.getSchemaFor(Memo));
    expect(defaultSchemaCache.has(Memo)).toBe(true);
  });
});

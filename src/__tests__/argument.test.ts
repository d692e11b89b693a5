import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { coerceFrom, coerceIdentity, defineArgumentType, parseArgument } from '../argument.js';
import { CoercionError } from '../errors.js';

const Payout = defineArgumentType(
  'Payout',
  z.object({ recipient: z.string(), amount: z.number().int().positive() }),
);

type Envelope = { payout?: unknown; memo?: unknown };

describe('defineArgumentType', () => {
  it('returns a frozen identity token', () => {
    expect(Payout.name).toBe('Payout');
    expect(Object.isFrozen(Payout)).toBe(true);
  });

  it('rejects an empty name', () => {
    expect(() => defineArgumentType(' ', z.string())).toThrow('non-empty');
  });
});

describe('parseArgument', () => {
  it('returns a value equal to the directly constructed argument', () => {
    const direct = { recipient: 'addr:alice', amount: 5000 };
    const result = parseArgument(Payout, { recipient: 'addr:alice', amount: 5000 });
    expect(result).toEqual({ ok: true, value: direct });
  });

  it('drops fields the type does not declare', () => {
    const result = parseArgument(Payout, { recipient: 'addr:alice', amount: 1, extra: true });
    expect(result.ok && result.value).toEqual({ recipient: 'addr:alice', amount: 1 });
  });

  it('reports a typed failure with the offending path', () => {
    const result = parseArgument(Payout, { recipient: 'addr:alice', amount: -3 });
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toBeInstanceOf(CoercionError);
    expect(result.error.argument).toBe('Payout');
    expect(result.error.issues).toHaveLength(1);
    expect(result.error.issues[0].path).toBe('amount');
    expect(result.error.message).toMatch(/^Pathways: cannot coerce argument "Payout": amount: /);
  });

  it('reports a root-level failure with an empty path', () => {
    const result = parseArgument(Payout, 'not an object');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues[0].path).toBe('');
  });
});

describe('coerceFrom', () => {
  const coerce = coerceFrom(Payout, (args: Envelope) => args.payout);

  it('validates the selected member of the envelope', () => {
    const result = coerce({ payout: { recipient: 'addr:bob', amount: 42 } });
    expect(result).toEqual({ ok: true, value: { recipient: 'addr:bob', amount: 42 } });
  });

  it('fails when the envelope has no value for the pathway', () => {
    const result = coerce({ memo: 'hello' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues).toEqual([
      { path: '', message: 'the argument envelope carries no value for this pathway' },
    ]);
  });

  it('fails when the selected member is malformed', () => {
    const result = coerce({ payout: { recipient: 7, amount: 42 } });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map((issue) => issue.path)).toEqual(['recipient']);
  });
});

describe('coerceIdentity', () => {
  it('re-validates the envelope as the argument', () => {
    const coerce = coerceIdentity(Payout);
    expect(coerce({ recipient: 'addr:carol', amount: 9 })).toEqual({
      ok: true,
      value: { recipient: 'addr:carol', amount: 9 },
    });
  });
});

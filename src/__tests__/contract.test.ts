import { describe, it, expect } from 'vitest';
import { Clause } from '../clause.js';
import { Context, Network } from '../context.js';
import { declareContract } from '../contract.js';
import type { ContractBuilder } from '../contract.js';
import { CoercionError, DeclarationError } from '../errors.js';
import type { CoercionResult } from '../errors.js';
import { GuardPolicy } from '../guard.js';
import { entryNames, lookupPathway, resolvePresent } from '../registry.js';
import { SchemaCache } from '../schemaCache.js';
import { BUYER_KEY, EscrowArgs, EscrowContract, Release, createEscrow } from './fixtures/escrow.js';
import type { Escrow } from './fixtures/escrow.js';

const ctx = new Context({ network: Network.Regtest, funds: 10_000n });

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

describe('registry', () => {
  it('lists every declared name in declaration order', () => {
    const registry = EscrowContract.registry(new SchemaCache());

    expect(registry.contract).toBe('Escrow');
    expect(entryNames(registry.transitions)).toEqual(['cooperativeClose', 'dispute', 'renegotiate']);
    expect(entryNames(registry.terminals)).toEqual(['timedOut', 'oracleAttested']);
    expect(entryNames(registry.updatables)).toEqual(['release', 'extend', 'refund']);
  });

  it('returns the same registry for the same cache', () => {
    const cache = new SchemaCache();
    const first = EscrowContract.registry(cache);

    expect(EscrowContract.registry(cache)).toBe(first);
    expect(EscrowContract.registry(new SchemaCache())).not.toBe(first);
    expect(Object.isFrozen(first.transitions)).toBe(true);
  });

  it('yields undefined for absent and unknown names', () => {
    const registry = EscrowContract.registry(new SchemaCache());

    expect(lookupPathway(registry.transitions, 'renegotiate')).toBeUndefined();
    expect(lookupPathway(registry.terminals, 'oracleAttested')).toBeUndefined();
    expect(lookupPathway(registry.updatables, 'refund')).toBeUndefined();
    expect(lookupPathway(registry.transitions, 'nonexistent')).toBeUndefined();
    expect(EscrowContract.guard('oracleAttested')).toBeUndefined();
    expect(EscrowContract.compileGate('mainnetOnly')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Transitions & terminals
// ---------------------------------------------------------------------------

describe('transitions', () => {
  it('skips absent guards and compile gates', () => {
    const dispute = lookupPathway(EscrowContract.registry(new SchemaCache()).transitions, 'dispute');

    expect(dispute?.guards.map((guard) => guard.name)).toEqual(['arbiterSigned']);
    expect(dispute?.compileGates.map((gate) => gate.name)).toEqual(['arbitrated']);
  });

  it('runs the body against the instance and context', () => {
    const close = lookupPathway(EscrowContract.registry(new SchemaCache()).transitions, 'cooperativeClose');
    const templates = close ? [...close.body(createEscrow(), ctx.derive('cooperativeClose'))] : [];

    expect(templates).toEqual([
      {
        path: ['cooperativeClose'],
        outputs: [{ amount: 10_000n, destination: 'addr:seller', metadata: {} }],
        label: 'close',
      },
    ]);
  });

  it('returns a fresh iterable on every call', () => {
    const dispute = lookupPathway(EscrowContract.registry(new SchemaCache()).transitions, 'dispute');
    if (!dispute) throw new Error('dispute should be present');

    const iterable = dispute.body(createEscrow(), ctx);
    expect([...iterable]).toHaveLength(1);
    expect([...iterable]).toHaveLength(0);
    expect([...dispute.body(createEscrow(), ctx)]).toHaveLength(1);
  });

  it('records guard policies', () => {
    expect(EscrowContract.guard('buyerSigned')?.policy).toBe(GuardPolicy.Cached);
    expect(EscrowContract.guard('sellerSigned')?.policy).toBe(GuardPolicy.Fresh);
  });

  it('binds declared guards as terminals', () => {
    const timedOut = lookupPathway(EscrowContract.registry(new SchemaCache()).terminals, 'timedOut');

    expect(timedOut).toBe(EscrowContract.guard('timedOut'));
    expect(timedOut?.body(createEscrow(), ctx)).toEqual({
      type: 'and',
      clauses: [
        { type: 'key', publicKey: BUYER_KEY },
        { type: 'older', blocks: 144 },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// Updatables
// ---------------------------------------------------------------------------

describe('updatables', () => {
  it('generates schemas lazily, only for pathways that expose one', () => {
    const cache = new SchemaCache();
    const registry = EscrowContract.registry(cache);
    expect(cache.size).toBe(0);

    const release = lookupPathway(registry.updatables, 'release');
    const extend = lookupPathway(registry.updatables, 'extend');

    expect(cache.size).toBe(1);
    expect(cache.has(Release)).toBe(true);
    expect(release?.schema?.jsonSchema.title).toBe('Release');
    expect(extend?.schema).toBeUndefined();
  });

  it('memoizes the declaration behind a factory', () => {
    const registry = EscrowContract.registry(new SchemaCache());
    expect(lookupPathway(registry.updatables, 'release')).toBe(lookupPathway(registry.updatables, 'release'));
  });

  it('coerces the envelope and runs the body', () => {
    const release = lookupPathway(EscrowContract.registry(new SchemaCache()).updatables, 'release');
    if (!release) throw new Error('release should be present');

    const templates = [...release.call(createEscrow(), ctx, { release: { to: 'buyer', amount: 500 } })];
    expect(templates).toEqual([
      {
        path: [],
        outputs: [{ amount: 500n, destination: 'addr:buyer', metadata: {} }],
        label: 'release',
      },
    ]);
  });

  it('throws a CoercionError when called with an unusable envelope', () => {
    const release = lookupPathway(EscrowContract.registry(new SchemaCache()).updatables, 'release');
    if (!release) throw new Error('release should be present');

    expect(() => release.call(createEscrow(), ctx, { extend: { blocks: 6 } })).toThrow(CoercionError);
    expect(() => release.call(createEscrow(), ctx, { release: { to: 'buyer', amount: 0 } })).toThrow(
      /cannot coerce argument "Release": amount: /,
    );
  });
});

// ---------------------------------------------------------------------------
// Declaration checks
// ---------------------------------------------------------------------------

describe('declareContract', () => {
  it('declares a contract with one transition and one cached terminal guard', () => {
    const Simple = declareContract<{ owner: string }>('Simple')
      .guard('B', (self) => Clause.key(self.owner), { cached: true })
      .transition('A', function* (self, ctx) {
        yield ctx.template().addOutput(ctx.funds, self.owner).build();
      })
      .terminal('B')
      .build();
    const registry = Simple.registry(new SchemaCache());

    expect(entryNames(registry.transitions)).toEqual(['A']);
    expect(entryNames(registry.terminals)).toEqual(['B']);
    expect(registry.updatables).toEqual([]);
    expect(resolvePresent(registry.updatables)).toEqual([]);

    const a = lookupPathway(registry.transitions, 'A');
    expect(a).toBeDefined();
    expect(a ? [...a.body({ owner: 'addr:owner' }, ctx)] : []).toHaveLength(1);
    expect(lookupPathway(registry.terminals, 'B')?.policy).toBe(GuardPolicy.Cached);
    expect(Simple.statefulArguments).toBeUndefined();
  });

  it('rejects arguments for a contract without updatable pathways', () => {
    const Bare = declareContract<Escrow>('Bare').build();
    const result = Bare.parseArguments({});

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.error.argument).toBe('Bare arguments');
  });

  it('rejects duplicate names', () => {
    const builder = declareContract<Escrow>('Dup').guard('signed', (self) => Clause.key(self.buyer));

    expect(() => builder.guard('signed')).toThrow(DeclarationError);
    expect(() => builder.guard('signed')).toThrow(
      'Pathways: contract "Dup" is declared inconsistently: duplicate guard "signed"',
    );
    expect(() => builder.transition('t').transition('t')).toThrow('duplicate transition "t"');
    expect(() => builder.terminal('signed').terminal('signed')).toThrow('duplicate terminal "signed"');
  });

  it('rejects invalid names', () => {
    expect(() => declareContract<Escrow>('9lives')).toThrow(DeclarationError);
    expect(() => declareContract<Escrow>('Names').transition('bad name')).toThrow(
      'invalid transition name "bad name"',
    );
  });

  it('rejects references to undeclared guards and compile gates', () => {
    const builder: ContractBuilder<Escrow, undefined, string, string> = declareContract<Escrow>('Refs');

    expect(() => builder.transition('t', { guardedBy: ['ghost'] }, function* () {})).toThrow(
      '"t" references undeclared guard "ghost"',
    );
    expect(() => builder.transition('t', { compileIf: ['ghost'] }, function* () {})).toThrow(
      '"t" references undeclared compile gate "ghost"',
    );
    expect(() => builder.terminal('ghost')).toThrow('"ghost" references undeclared guard "ghost"');
  });

  it('requires an argument envelope for present updatable pathways', () => {
    const builder = declareContract<Escrow>('NoEnvelope').updatable('payout', {
      argumentType: Release,
      coerce: (): CoercionResult<Release> => ({ ok: false, error: new CoercionError('Release', []) }),
      body: function* () {},
    });

    expect(() => builder.build()).toThrow(
      'updatable pathways (payout) need a statefulArguments envelope',
    );
  });

  it('requires every updatable pathway to name a coerce function', () => {
    const options = {
      argumentType: Release,
      coerce: (): CoercionResult<Release> => ({ ok: false, error: new CoercionError('Release', []) }),
      body: function* () {},
    };
    Reflect.deleteProperty(options, 'coerce');
    const builder = declareContract<Escrow, EscrowArgs>('Loose', { statefulArguments: EscrowArgs });

    expect(() => builder.updatable('payout', options)).toThrow(DeclarationError);
    expect(() => builder.updatable('payout', options)).toThrow(
      'updatable pathway "payout" must name a coerce function',
    );
  });

  it('accepts absent updatable pathways without an envelope', () => {
    const Sparse = declareContract<Escrow>('Sparse').updatable('payout').build();
    expect(entryNames(Sparse.registry(new SchemaCache()).updatables)).toEqual(['payout']);
  });
});

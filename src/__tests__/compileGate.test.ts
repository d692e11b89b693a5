import { describe, it, expect } from 'vitest';
import { Context, Network } from '../context.js';
import {
  CompileDecision,
  CompileGatePolicy,
  createCompileGate,
  evaluateCompileGates,
  isIncluded,
  mergeCompileDecisions,
} from '../compileGate.js';

describe('mergeCompileDecisions', () => {
  it('yields no-constraint for an empty list', () => {
    const merged = mergeCompileDecisions([]);
    expect(merged).toEqual({ type: 'no-constraint' });
    expect(isIncluded(merged)).toBe(true);
  });

  it('treats no-constraint as neutral', () => {
    expect(mergeCompileDecisions([CompileDecision.NoConstraint, CompileDecision.Skippable])).toBe(
      CompileDecision.Skippable,
    );
  });

  it('ranks never over required over skippable', () => {
    expect(mergeCompileDecisions([CompileDecision.Skippable, CompileDecision.Required])).toBe(
      CompileDecision.Required,
    );
    expect(mergeCompileDecisions([CompileDecision.Skippable, CompileDecision.Never])).toBe(CompileDecision.Never);
  });

  it('fails when a pathway is both required and excluded', () => {
    expect(mergeCompileDecisions([CompileDecision.Required, CompileDecision.Never])).toEqual({
      type: 'fail',
      reasons: ['pathway is both required and excluded'],
    });
  });

  it('accumulates the reasons of every failing gate', () => {
    const merged = mergeCompileDecisions([
      CompileDecision.fail('too early'),
      CompileDecision.Required,
      CompileDecision.fail('wrong network', 'no oracle'),
    ]);
    expect(merged).toEqual({ type: 'fail', reasons: ['too early', 'wrong network', 'no oracle'] });
    expect(isIncluded(merged)).toBe(false);
  });
});

describe('evaluateCompileGates', () => {
  it('evaluates every gate fresh, in order', () => {
    let calls = 0;
    const gate = createCompileGate<{ live: boolean }>('live', (self) => {
      calls++;
      return self.live ? CompileDecision.Required : CompileDecision.Never;
    });
    const ctx = new Context({ network: Network.Signet, funds: 1n });

    expect(gate.policy).toBe(CompileGatePolicy.Fresh);
    expect(evaluateCompileGates([gate, gate], { live: false }, ctx)).toEqual([
      CompileDecision.Never,
      CompileDecision.Never,
    ]);
    expect(calls).toBe(2);
  });
});

// ============================================================================
// Escrow Compilation Walkthrough
// ============================================================================
//
// Declares a small escrow contract and walks it the way a compiler would:
// resolve the usable pathways, decide inclusion, build the spending clause
// and collect the transaction templates of each pathway.
//
// Usage:
//   PATHWAYS_LOG_LEVEL=debug npx tsx examples/escrow-session.ts
//
// ============================================================================

import { z } from 'zod';
import {
  Clause,
  CompileDecision,
  Context,
  Network,
  PathwaySession,
  coerceFrom,
  createLoggerFromEnv,
  declareContract,
  defineArgumentType,
  describeClause,
  isIncluded,
  totalAmount,
} from '../src/index.js';
import type { ArgumentValue } from '../src/index.js';

// ---- Contract ----------------------------------------------------------------

interface Escrow {
  buyer: string;
  seller: string;
  arbiter: string;
  timeoutBlocks: number;
}

const Payout = defineArgumentType(
  'Payout',
  z.object({
    destination: z.string().min(1),
    amount: z.number().int().positive(),
  }),
);

const EscrowArgs = defineArgumentType('EscrowArgs', z.object({ payout: z.unknown().optional() }));
type EscrowArgs = ArgumentValue<typeof EscrowArgs>;

const EscrowContract = declareContract<Escrow, EscrowArgs>('Escrow', { statefulArguments: EscrowArgs })
  .guard('buyerSigned', (self) => Clause.key(self.buyer), { cached: true })
  .guard('sellerSigned', (self) => Clause.key(self.seller))
  .guard('arbiterSigned', (self) => Clause.key(self.arbiter))
  .guard('timedOut', (self) => Clause.and(Clause.key(self.buyer), Clause.older(self.timeoutBlocks)))
  .compileGate('notOnMainnet', (_self, ctx) =>
    ctx.network === Network.Mainnet ? CompileDecision.Never : CompileDecision.NoConstraint,
  )
  .transition('close', { guardedBy: ['buyerSigned', 'sellerSigned'] }, function* (_self, ctx) {
    yield ctx.template().addOutput(ctx.funds, 'addr:seller').setLabel('close').build();
  })
  .transition('rescue')
  .terminal('timedOut')
  .updatable('payout', {
    guardedBy: ['arbiterSigned'],
    compileIf: ['notOnMainnet'],
    argumentType: Payout,
    coerce: coerceFrom(Payout, (args: EscrowArgs) => args.payout),
    exposeSchema: true,
    body: function* (_self, ctx, payout) {
      yield ctx.template().addOutput(BigInt(payout.amount), payout.destination).setLabel('payout').build();
    },
  })
  .build();

// ---- Walk ------------------------------------------------------------------

const session = new PathwaySession({ logger: createLoggerFromEnv(process.env, { component: 'escrow-example' }) });
const escrow: Escrow = {
  buyer: '02'.padEnd(66, 'a'),
  seller: '03'.padEnd(66, 'b'),
  arbiter: '02'.padEnd(66, 'c'),
  timeoutBlocks: 144,
};
const root = new Context({ network: Network.Regtest, funds: 100_000n });
const { transitions, terminals, updatables } = session.usablePathways(EscrowContract);

for (const pathway of transitions) {
  const ctx = root.derive(pathway.name);
  if (!isIncluded(session.decideInclusion(pathway.compileGates, escrow, ctx))) continue;

  const clause = session.guardClause(pathway.guards, escrow, ctx);
  for (const template of pathway.body(escrow, ctx)) {
    console.log(`${ctx.pathString}  ${describeClause(clause)}  -> ${totalAmount(template)} sat`);
  }
}

for (const guard of terminals) {
  console.log(`terminal ${guard.name}: ${describeClause(session.guardClause([guard], escrow, root))}`);
}

for (const pathway of updatables) {
  const ctx = root.derive(pathway.name);
  if (!isIncluded(session.decideInclusion(pathway.compileGates, escrow, ctx))) continue;

  console.log(`${ctx.pathString} schema ${pathway.schema?.fingerprint ?? '(none)'}`);
  const args = session.coerceArguments(EscrowContract, pathway, {
    payout: { destination: 'addr:buyer', amount: 25_000 },
  });
  if (!args.ok) {
    console.error(args.error.message);
    continue;
  }
  for (const template of pathway.body(escrow, ctx, args.value)) {
    console.log(`${ctx.pathString}  ${describeClause(session.guardClause(pathway.guards, escrow, ctx))}  -> ${totalAmount(template)} sat`);
  }
}

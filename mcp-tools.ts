// mcp-tools.ts
// Tool handlers behind the MCP server, kept free of transport so they can be
// called directly. Every handler returns a JSON-serialisable object; expected
// failures come back as { ok: false, message } instead of throwing.

import { add, conj, div, DomainError, equals, inv, mul, neg, sub, complexField, toString } from './complex.js';
import type { Complex } from './complex.js';
import { FIELD_LAWS, isNontrivial, verifyFieldLaws } from './field.js';
import { fromPolar, inPrincipalDomain, toPolar } from './polar.js';
import { ProofSession } from './proof-session.js';
import type { Command, Fact, Logger } from './prover-core.js';
import { checkTheorem, findTheorem, SAMPLE_COMPLEX, TALK_THEOREMS } from './theorems.js';
import type { TheoremReport, TheoremStatus } from './theorems.js';

export const COMPLEX_OPS = ['add', 'sub', 'mul', 'div', 'neg', 'inv', 'conj'] as const;
export type ComplexOpName = typeof COMPLEX_OPS[number];

export interface Failure { ok: false; message: string; error?: string; }

export type ComplexOpResult = { ok: true; result: Complex; text: string } | Failure;

const BINARY: Record<'add' | 'sub' | 'mul' | 'div', (a: Complex, b: Complex) => Complex> = { add, sub, mul, div };
const UNARY: Record<'neg' | 'inv' | 'conj', (a: Complex) => Complex> = { neg, inv, conj };

function isBinary(op: ComplexOpName): op is keyof typeof BINARY {
  return op in BINARY;
}

export function createToolHandlers(logger: Logger = () => {}) {
  return {
    complexOp({ op, a, b }: { op: ComplexOpName; a: Complex; b?: Complex }): ComplexOpResult {
      try {
        let result: Complex;
        if (isBinary(op)) {
          if (!b) return { ok: false, message: `operation '${op}' needs a second operand b` };
          result = BINARY[op](a, b);
        } else {
          result = UNARY[op](a);
        }
        logger(`complex_op ${op} -> ${toString(result)}`);
        return { ok: true, result, text: toString(result) };
      } catch (e) {
        if (e instanceof DomainError) return { ok: false, message: e.message, error: e.name };
        throw e;
      }
    },

    toPolar({ c }: { c: Complex }) {
      const [angle, radius] = toPolar(c);
      return { ok: true as const, angle, radius, quadrantLost: c.re < 0 };
    },

    fromPolar({ angle, radius }: { angle: number; radius: number }) {
      const result = fromPolar(angle, radius);
      return { ok: true as const, result, roundTripExpected: inPrincipalDomain(angle, radius) };
    },

    verifyFieldLaws({ samples, tolerance }: { samples?: Complex[]; tolerance?: number }) {
      const eq = (x: Complex, y: Complex) => equals(x, y, tolerance);
      const laws = verifyFieldLaws(complexField, samples ?? SAMPLE_COMPLEX, eq, FIELD_LAWS);
      return {
        ok: laws.every(l => !l.counterexample),
        nontrivial: isNontrivial(complexField, eq),
        laws,
      };
    },

    listTheorems() {
      return { theorems: TALK_THEOREMS.map(t => ({ name: t.name, title: t.title })) };
    },

    checkTheorem({ name }: { name: string }): { ok: true; report: TheoremReport } | Failure {
      const spec = findTheorem(name);
      if (!spec) return { ok: false, message: `unknown theorem: ${name}` };
      return { ok: true, report: checkTheorem(spec, logger) };
    },

    runProof({ goal, hypotheses, commands }: { goal: Fact; hypotheses?: Record<string, Fact>; commands: Command[] }) {
      const messages: string[] = [];
      const session = new ProofSession(goal, {
        hypotheses,
        logger: (m) => { messages.push(m); logger(m); },
      });
      const steps = commands.map(cmd => session.runCommand(cmd));
      const status: TheoremStatus = session.isComplete() ? 'proved' : session.isAdmitted() ? 'admitted' : 'open';
      return { ok: true as const, status, steps, messages, summary: session.getSummary() };
    },
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

// theorems.ts
// The theorem book shown in the talk. Each entry is a statement (one or more
// goals), a proof script run against every goal, and optionally some numeric
// evidence. The field laws and the polar magnitude go through; the polar round
// trip and the binomial sum are stated and left admitted.

import * as math from 'mathjs';
import { ProofSession } from './proof-session.js';
import { Expr, factToReadable } from './prover-core.js';
import type { Command, Fact, Logger } from './prover-core.js';
import { FIELD_LAWS, verifyFieldLaws } from './field.js';
import type { FieldLaw } from './field.js';
import { complex, complexField, equals, sqnorm } from './complex.js';
import type { Complex } from './complex.js';
import { fromPolar, inPrincipalDomain, roundTripHolds } from './polar.js';
import { lawGoals, symFromPolar, symSqnorm, symToPolar } from './symbolic-field.js';

export type TheoremStatus = 'proved' | 'admitted' | 'open';

export interface Evidence {
  checked: number;
  counterexample?: string;
}

/** A side goal proved in a nested session and added to the context under `name`. */
export interface Lemma {
  name: string;
  goal: Fact;
  proof: Command[];
}

export interface TheoremSpec {
  name: string;
  title: string;
  hypotheses?: Record<string, Fact>;
  /** proved before the main script, in order; later lemmas see earlier ones */
  lemmas?: Lemma[];
  goals: Fact[];
  /** applied to each goal in its own session */
  proof: Command[];
  evidence?: () => Evidence;
}

export interface GoalReport {
  goal: string;
  status: TheoremStatus;
}

export interface TheoremReport {
  name: string;
  title: string;
  status: TheoremStatus;
  goals: GoalReport[];
  evidence?: Evidence;
}

export const SAMPLE_COMPLEX: readonly Complex[] = [
  complex(1, 2),
  complex(3, -1),
  complex(0.5, -0.25),
  complex(-2, 0),
  complex(0, 0),
];

const STATUS_RANK: Record<TheoremStatus, number> = { proved: 0, admitted: 1, open: 2 };

function runScript(session: ProofSession, proof: Command[]) {
  for (const cmd of proof) {
    if (session.isComplete() || session.isAdmitted()) break;
    session.runCommand(cmd);
  }
}

export function checkTheorem(spec: TheoremSpec, logger: Logger = () => {}): TheoremReport {
  logger(`Checking ${spec.name}: ${spec.title}`);
  const goals = spec.goals.map((goal): GoalReport => {
    const session = new ProofSession(goal, { hypotheses: spec.hypotheses, logger });
    for (const lemma of spec.lemmas ?? []) {
      const child = session.startNestedProof(lemma.goal);
      runScript(child, lemma.proof);
      // an unproved lemma stays out of the context, so steps relying on it fail
      if (!session.finalizeNestedProof(child, lemma.name)) logger(`lemma ${lemma.name} not established`);
    }
    runScript(session, spec.proof);
    const status: TheoremStatus = session.isComplete() ? 'proved' : session.isAdmitted() ? 'admitted' : 'open';
    return { goal: factToReadable(goal), status };
  });
  const status = goals.reduce<TheoremStatus>((worst, g) => (STATUS_RANK[g.status] > STATUS_RANK[worst] ? g.status : worst), 'proved');
  const report: TheoremReport = { name: spec.name, title: spec.title, status, goals };
  if (spec.evidence) report.evidence = spec.evidence();
  logger(`${spec.name}: ${status}`);
  return report;
}

export function fieldLawTheorem(law: FieldLaw): TheoremSpec {
  const { hypotheses, goals, denomProofs } = lawGoals(law);
  return {
    name: `complex_${law.name}`,
    title: law.description,
    hypotheses,
    goals,
    proof: [{ cmd: 'field_simp', denomProofs }],
    evidence: () => {
      const [check] = verifyFieldLaws(complexField, SAMPLE_COMPLEX, (x, y) => equals(x, y), [law]);
      const evidence: Evidence = { checked: check.checked };
      if (check.counterexample) evidence.counterexample = check.counterexample.map(c => `(${c.re}, ${c.im})`).join(', ');
      return evidence;
    },
  };
}

const theta = Expr.var('theta');
const r = Expr.var('r');
const [roundTripAngle, roundTripRadius] = symToPolar(symFromPolar(theta, r));

const cosTheta = Expr.cos(theta);
const sinTheta = Expr.sin(theta);
const polarSqnorm = symSqnorm(symFromPolar(theta, r));

export const POLAR_ANGLES: readonly number[] = [-3, -2, -1.5, -1, -0.5, 0, 0.5, 1, 1.5, 2, 3];
export const POLAR_RADII: readonly number[] = [0.5, 1, 2];

export const POLAR_SQNORM: TheoremSpec = {
  name: 'polar_sqnorm',
  title: '|from_polar θ r|² = r²',
  lemmas: [
    {
      name: 'h_factor',
      goal: Expr.eq(polarSqnorm, Expr.mul(Expr.mul(r, r), Expr.add(Expr.pow(cosTheta, Expr.const(2)), Expr.pow(sinTheta, Expr.const(2))))),
      proof: [{ cmd: 'field_simp' }],
    },
    {
      name: 'h_pyth',
      goal: Expr.eq(Expr.add(Expr.pow(cosTheta, Expr.const(2)), Expr.pow(sinTheta, Expr.const(2))), Expr.const(1)),
      proof: [{ cmd: 'rewrite', equalityName: 'cos_sq_add_sin_sq' }],
    },
  ],
  goals: [Expr.eq(polarSqnorm, Expr.mul(r, r))],
  proof: [
    { cmd: 'rewrite', equalityName: 'h_factor' },
    { cmd: 'rewrite', equalityName: 'h_pyth' },
    { cmd: 'field_simp' },
  ],
  evidence: () => {
    const evidence: Evidence = { checked: 0 };
    for (const angle of POLAR_ANGLES) {
      for (const radius of POLAR_RADII) {
        evidence.checked++;
        if (Math.abs(sqnorm(fromPolar(angle, radius)) - radius * radius) > 1e-9 && !evidence.counterexample) {
          evidence.counterexample = `θ = ${angle}, r = ${radius}`;
        }
      }
    }
    return evidence;
  },
};

export const POLAR_ROUND_TRIP: TheoremSpec = {
  name: 'polar_round_trip',
  title: 'to_polar (from_polar θ r) = (θ, r)',
  goals: [Expr.eq(roundTripAngle, theta), Expr.eq(roundTripRadius, r)],
  // field_simp cannot even start: r * cos θ is not known to be nonzero
  proof: [{ cmd: 'field_simp' }, { cmd: 'sorry' }],
  evidence: () => {
    const evidence: Evidence = { checked: 0 };
    for (const angle of POLAR_ANGLES) {
      for (const radius of POLAR_RADII) {
        evidence.checked++;
        if (!roundTripHolds(angle, radius) && !evidence.counterexample) {
          evidence.counterexample = `θ = ${angle}, r = ${radius}${inPrincipalDomain(angle, radius) ? '' : ' (outside -π/2 < θ < π/2)'}`;
        }
      }
    }
    return evidence;
  },
};

export const BINOMIAL_MAX_N = 20;

export const BINOMIAL_SUM: TheoremSpec = {
  name: 'sum_range_choose',
  title: 'Σ_{k=0}^{n} C(n, k) = 2^n',
  goals: [Expr.eq(Expr.func('sum_range_choose', Expr.var('n')), Expr.pow(Expr.const(2), Expr.var('n')))],
  proof: [{ cmd: 'sorry' }],
  evidence: () => {
    const evidence: Evidence = { checked: 0 };
    for (let n = 0; n <= BINOMIAL_MAX_N; n++) {
      let sum = 0;
      for (let k = 0; k <= n; k++) sum += math.combinations(n, k);
      evidence.checked++;
      if (sum !== 2 ** n && !evidence.counterexample) evidence.counterexample = `n = ${n}`;
    }
    return evidence;
  },
};

export const TALK_THEOREMS: readonly TheoremSpec[] = [
  ...FIELD_LAWS.map(fieldLawTheorem),
  POLAR_SQNORM,
  POLAR_ROUND_TRIP,
  BINOMIAL_SUM,
];

export function findTheorem(name: string): TheoremSpec | undefined {
  return TALK_THEOREMS.find(t => t.name === name);
}

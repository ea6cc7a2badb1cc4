// demo.ts
// The walkthrough run on stage. Each section logs what the audience sees and
// the collected results come back as a summary.

import { pathToFileURL } from 'url';
import { add, complex, complexField, DomainError, equals, inv, mul, toString } from './complex.js';
import { isNontrivial, verifyFieldLaws } from './field.js';
import type { LawCheck } from './field.js';
import type { Complex } from './complex.js';
import { fromPolar, roundTripHolds, toPolar } from './polar.js';
import type { Logger } from './prover-core.js';
import { checkTheorem, SAMPLE_COMPLEX, TALK_THEOREMS } from './theorems.js';
import type { TheoremReport } from './theorems.js';

export interface DemoSummary {
  arithmetic: Record<string, string>;
  laws: LawCheck<Complex>[];
  nontrivial: boolean;
  theorems: TheoremReport[];
  polar: Array<{ angle: number; radius: number; holds: boolean }>;
}

export const DEMO_POLAR_POINTS: ReadonlyArray<readonly [number, number]> = [[0.5, 2], [1.2, 1], [2, 1], [-2.5, 3]];

export function runDemo(log: Logger = () => {}, proverLog: Logger = () => {}): DemoSummary {
  const section = (title: string) => { log("=".repeat(60)); log(title); log("=".repeat(60)); };

  section("1. Complex numbers as pairs of reals");
  const a = complex(1, 2);
  const b = complex(3, -1);
  const arithmetic: Record<string, string> = {
    'a + b': toString(add(a, b)),
    'a * b': toString(mul(a, b)),
    'a⁻¹': toString(inv(a), 2),
  };
  try {
    inv(complex(0, 0));
    arithmetic['0⁻¹'] = 'defined';
  } catch (e) {
    if (!(e instanceof DomainError)) throw e;
    arithmetic['0⁻¹'] = e.name;
  }
  for (const [k, v] of Object.entries(arithmetic)) log(`${k} = ${v}`);

  section("2. The field structure, checked on samples");
  const laws = verifyFieldLaws(complexField, SAMPLE_COMPLEX, (x, y) => equals(x, y));
  for (const l of laws) log(`${l.law}: ${l.counterexample ? 'FAILED' : 'ok'} (${l.checked} checked, ${l.skipped} skipped)`);
  const nontrivial = isNontrivial(complexField, (x, y) => equals(x, y));
  log(`0 ≠ 1: ${nontrivial}`);

  section("3. The theorem book");
  const theorems = TALK_THEOREMS.map(t => checkTheorem(t, proverLog));
  for (const t of theorems) {
    const evidence = t.evidence ? ` [${t.evidence.checked} cases${t.evidence.counterexample ? `, fails at ${t.evidence.counterexample}` : ''}]` : '';
    log(`${t.status.padEnd(8)} ${t.name}: ${t.title}${evidence}`);
  }

  section("4. Polar form and the one-argument arctangent");
  const polar = DEMO_POLAR_POINTS.map(([angle, radius]) => {
    const c = fromPolar(angle, radius);
    const [angle2, radius2] = toPolar(c);
    const holds = roundTripHolds(angle, radius);
    log(`(${angle}, ${radius}) -> ${toString(c, 3)} -> (${angle2.toFixed(3)}, ${radius2.toFixed(3)})${holds ? '' : '  <- quadrant lost'}`);
    return { angle, radius, holds };
  });

  return { arithmetic, laws, nontrivial, theorems, polar };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runDemo((m) => console.log(`[DEMO] ${m}`));
}

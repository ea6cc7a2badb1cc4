// symbolic-field.ts
// complexField again, but over expressions: each operation builds the AST of
// its real and imaginary parts. Feeding a FieldLaw through this instance gives
// the component equalities that field_simp has to discharge.

import { Expr } from './prover-core.js';
import type { Fact, FactEq } from './prover-core.js';
import type { Field, FieldLaw } from './field.js';

export interface SymComplex {
  re: Expr;
  im: Expr;
}

/** `a` becomes the pair of real variables a_re, a_im. */
export function symComplex(name: string): SymComplex {
  return { re: Expr.var(`${name}_re`), im: Expr.var(`${name}_im`) };
}

export function symSqnorm(a: SymComplex): Expr {
  return Expr.add(Expr.mul(a.re, a.re), Expr.mul(a.im, a.im));
}

export const symbolicField: Field<SymComplex> = {
  zero: { re: Expr.const(0), im: Expr.const(0) },
  one: { re: Expr.const(1), im: Expr.const(0) },
  add: (a, b) => ({ re: Expr.add(a.re, b.re), im: Expr.add(a.im, b.im) }),
  neg: a => ({ re: Expr.neg(a.re), im: Expr.neg(a.im) }),
  mul: (a, b) => ({
    re: Expr.sub(Expr.mul(a.re, b.re), Expr.mul(a.im, b.im)),
    im: Expr.add(Expr.mul(a.re, b.im), Expr.mul(a.im, b.re)),
  }),
  inv: a => {
    const n = symSqnorm(a);
    return { re: Expr.div(a.re, n), im: Expr.div(Expr.neg(a.im), n) };
  },
};

export function symFromPolar(angle: Expr, radius: Expr): SymComplex {
  return { re: Expr.mul(radius, Expr.cos(angle)), im: Expr.mul(radius, Expr.sin(angle)) };
}

export function symToPolar(c: SymComplex): [angle: Expr, radius: Expr] {
  return [Expr.atan(Expr.div(c.im, c.re)), Expr.sqrt(symSqnorm(c))];
}

export interface LawGoals {
  hypotheses: Record<string, Fact>;
  goals: FactEq[];
  denomProofs: string[];
}

export const NONZERO_HYPOTHESIS = 'ha';

export function lawGoals(law: FieldLaw): LawGoals {
  const a = symComplex('a');
  const [lhs, rhs] = law.sides(symbolicField, a, symComplex('b'), symComplex('c'));
  const hypotheses: Record<string, Fact> = {};
  if (law.requiresNonzero) hypotheses[NONZERO_HYPOTHESIS] = Expr.neq(symSqnorm(a), Expr.const(0));
  return {
    hypotheses,
    goals: [Expr.eq(lhs.re, rhs.re), Expr.eq(lhs.im, rhs.im)],
    denomProofs: law.requiresNonzero ? [NONZERO_HYPOTHESIS] : [],
  };
}

// field.ts
// A field as a record of named operations. The axioms are not enforced by the
// type system; FIELD_LAWS states them once, generically, so the same law can be
// checked numerically here and symbolically in symbolic-field.ts.

export interface Field<T> {
  readonly zero: T;
  readonly one: T;
  add(a: T, b: T): T;
  neg(a: T): T;
  mul(a: T, b: T): T;
  inv(a: T): T;
}

export function fieldSub<T>(F: Field<T>, a: T, b: T): T { return F.add(a, F.neg(b)); }
export function fieldDiv<T>(F: Field<T>, a: T, b: T): T { return F.mul(a, F.inv(b)); }

export interface FieldLaw {
  name: string;
  arity: 1 | 2 | 3;
  description: string;
  /** the first argument must not be zero */
  requiresNonzero?: boolean;
  sides<T>(F: Field<T>, a: T, b: T, c: T): [T, T];
}

export const FIELD_LAWS: readonly FieldLaw[] = [
  {
    name: 'add_comm', arity: 2, description: 'a + b = b + a',
    sides: (F, a, b) => [F.add(a, b), F.add(b, a)],
  },
  {
    name: 'add_assoc', arity: 3, description: '(a + b) + c = a + (b + c)',
    sides: (F, a, b, c) => [F.add(F.add(a, b), c), F.add(a, F.add(b, c))],
  },
  {
    name: 'zero_add', arity: 1, description: '0 + a = a',
    sides: (F, a) => [F.add(F.zero, a), a],
  },
  {
    name: 'add_neg', arity: 1, description: 'a + (-a) = 0',
    sides: (F, a) => [F.add(a, F.neg(a)), F.zero],
  },
  {
    name: 'mul_comm', arity: 2, description: 'a * b = b * a',
    sides: (F, a, b) => [F.mul(a, b), F.mul(b, a)],
  },
  {
    name: 'mul_assoc', arity: 3, description: '(a * b) * c = a * (b * c)',
    sides: (F, a, b, c) => [F.mul(F.mul(a, b), c), F.mul(a, F.mul(b, c))],
  },
  {
    name: 'one_mul', arity: 1, description: '1 * a = a',
    sides: (F, a) => [F.mul(F.one, a), a],
  },
  {
    name: 'mul_inv', arity: 1, description: 'a * a⁻¹ = 1 for a ≠ 0', requiresNonzero: true,
    sides: (F, a) => [F.mul(a, F.inv(a)), F.one],
  },
  {
    name: 'left_distrib', arity: 3, description: 'a * (b + c) = a * b + a * c',
    sides: (F, a, b, c) => [F.mul(a, F.add(b, c)), F.add(F.mul(a, b), F.mul(a, c))],
  },
];

export function findLaw(name: string): FieldLaw | undefined {
  return FIELD_LAWS.find(l => l.name === name);
}

export interface LawCheck<T> {
  law: string;
  checked: number;
  skipped: number;
  counterexample?: T[];
}

function tuples<T>(samples: readonly T[], arity: number): T[][] {
  let acc: T[][] = [[]];
  for (let i = 0; i < arity; i++) acc = acc.flatMap(prefix => samples.map(s => [...prefix, s]));
  return acc;
}

/**
 * Check every law on every tuple drawn from `samples`. Unused argument slots are
 * filled with `F.zero`. Only the first counterexample of each law is kept.
 */
export function verifyFieldLaws<T>(
  F: Field<T>,
  samples: readonly T[],
  eq: (x: T, y: T) => boolean,
  laws: readonly FieldLaw[] = FIELD_LAWS,
): LawCheck<T>[] {
  return laws.map(law => {
    const result: LawCheck<T> = { law: law.name, checked: 0, skipped: 0 };
    for (const args of tuples(samples, law.arity)) {
      const [a = F.zero, b = F.zero, c = F.zero] = args;
      if (law.requiresNonzero && eq(a, F.zero)) { result.skipped++; continue; }
      const [lhs, rhs] = law.sides(F, a, b, c);
      result.checked++;
      if (!eq(lhs, rhs) && !result.counterexample) result.counterexample = args;
    }
    return result;
  });
}

export function isNontrivial<T>(F: Field<T>, eq: (x: T, y: T) => boolean): boolean {
  return !eq(F.zero, F.one);
}

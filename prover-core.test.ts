import { describe, it, expect } from 'vitest';
import {
  Context,
  Expr,
  Prover,
  collectDenominatorsInExpr,
  exprEquals,
  exprToMathJSStringReal,
  factToReadable,
  findMalformed,
  findOccurrencesInExpr,
  getAtPath,
  isConstantExpr,
  replaceAtPath,
} from './prover-core.js';
import type { Command, Fact, ProofState } from './prover-core.js';

const x = Expr.var('x');
const y = Expr.var('y');
const t = Expr.var('t');
const r = Expr.var('r');

function stateFor(goal: Fact, facts: Record<string, Fact> = {}): ProofState {
  const context = new Context();
  for (const [name, f] of Object.entries(facts)) context.addFact(name, f);
  return { goal, context, closedBy: null };
}

function run(state: ProofState, ...cmds: Command[]): boolean[] {
  const prover = new Prover();
  return cmds.map(c => prover.runCommand(state, c));
}

describe('Expression utilities', () => {
  it('compares structurally', () => {
    expect(exprEquals(Expr.add(x, Expr.const(1)), Expr.add(x, Expr.const(1)))).toBe(true);
    expect(exprEquals(Expr.add(x, Expr.const(1)), Expr.add(Expr.const(1), x))).toBe(false);
    expect(exprEquals(Expr.sin(x), Expr.cos(x))).toBe(false);
  });

  it('finds every occurrence of a subterm', () => {
    const e = Expr.mul(x, Expr.add(x, y));
    expect(findOccurrencesInExpr(e, x)).toEqual([[0], [1, 0]]);
  });

  it('reads and replaces at a path without touching the original', () => {
    const f = Expr.eq(Expr.mul(x, Expr.add(x, y)), y);
    expect(getAtPath(f, { side: 'lhs', indices: [1, 1] })).toEqual(y);
    const g = replaceAtPath(f, { side: 'lhs', indices: [1, 0] }, Expr.const(2));
    expect(factToReadable(g)).toBe('x * (2 + y) = y');
    expect(factToReadable(f)).toBe('x * (x + y) = y');
    expect(() => getAtPath(f, { side: 'rhs', indices: [0] })).toThrow('path descends into a var node');
  });

  it('collects denominators', () => {
    const e = Expr.div(Expr.div(x, y), Expr.const(2));
    expect(collectDenominatorsInExpr(e)).toEqual([Expr.const(2), y]);
    expect(collectDenominatorsInExpr(Expr.pow(x, Expr.const(-1)))).toEqual([x]);
    expect(collectDenominatorsInExpr(Expr.pow(x, Expr.const(0.5)))).toEqual([x]);
    expect(collectDenominatorsInExpr(Expr.pow(x, Expr.neg(Expr.const(2))))).toEqual([x]);
    expect(collectDenominatorsInExpr(Expr.pow(x, Expr.const(3)))).toEqual([]);
  });

  it('knows constant expressions', () => {
    expect(isConstantExpr(Expr.add(Expr.const(1), Expr.const('pi')))).toBe(true);
    expect(isConstantExpr(Expr.add(Expr.const(1), x))).toBe(false);
    expect(isConstantExpr(Expr.const('1/x'))).toBe(false);
  });

  it('names the first malformed node', () => {
    expect(findMalformed(Expr.add(x, Expr.const('2.5e3')))).toBeUndefined();
    expect(findMalformed(Expr.mul(x, Expr.const('1/x')))).toBe('bad constant "1/x"');
    expect(findMalformed(Expr.add(x, Expr.var('x*0')))).toBe('bad variable name "x*0"');
    expect(findMalformed(Expr.var('pi'))).toBe('bad variable name "pi"');
    expect(findMalformed({ type: 'op', op: 'div', args: [x] })).toBe('div takes 2 arguments, got 1');
    expect(findMalformed({ type: 'op', op: 'add', args: [x] })).toBe('add takes at least 2 arguments, got 1');
    expect(findMalformed(Expr.neg(Expr.func('f-g', x)))).toBe('bad function name "f-g"');
  });

  it('renders mathjs input', () => {
    expect(exprToMathJSStringReal(Expr.mul(r, Expr.cos(t)))).toBe('((r) * (cos(t)))');
    expect(exprToMathJSStringReal(Expr.sub(x, Expr.neg(y)))).toBe('(x - (-y))');
  });
});

describe('Context', () => {
  it('rejects duplicate names', () => {
    const c = new Context();
    c.addFact('h', Expr.eq(x, y));
    expect(() => c.addFact('h', Expr.eq(y, x))).toThrow('fact name already present: h');
  });

  it('stores a copy of each fact', () => {
    const c = new Context();
    const f = Expr.eq(x, y);
    c.addFact('h', f);
    f.rhs = x;
    expect(c.getFact('h')).toEqual(Expr.eq(x, y));
  });
});

describe('field_simp', () => {
  it('proves a polynomial identity', () => {
    const s = stateFor(Expr.eq(
      Expr.mul(Expr.add(x, Expr.const(1)), Expr.sub(x, Expr.const(1))),
      Expr.sub(Expr.pow(x, Expr.const(2)), Expr.const(1)),
    ));
    expect(run(s, { cmd: 'field_simp' })).toEqual([true]);
    expect(s.closedBy).toBe('tactic');
  });

  it('needs a proof for every non-constant denominator', () => {
    const goal = Expr.eq(Expr.mul(Expr.div(x, y), y), x);
    const without = stateFor(goal);
    expect(run(without, { cmd: 'field_simp' })).toEqual([false]);
    expect(without.closedBy).toBeNull();

    const withProof = stateFor(goal, { hy: Expr.neq(y, Expr.const(0)) });
    expect(run(withProof, { cmd: 'field_simp', denomProofs: ['hy'] })).toEqual([true]);
  });

  it('treats a negative power as a denominator', () => {
    const goal = Expr.eq(Expr.mul(x, Expr.pow(x, Expr.const(-1))), Expr.const(1));
    const messages: string[] = [];
    const prover = new Prover();
    prover.setLogger(m => messages.push(m));
    const without = stateFor(goal);
    expect(prover.runCommand(without, { cmd: 'field_simp' })).toBe(false);
    expect(without.closedBy).toBeNull();
    expect(messages).toContain('denominator not proven non-zero: x');

    const withProof = stateFor(goal, { hx: Expr.neq(x, Expr.const(0)) });
    expect(run(withProof, { cmd: 'field_simp', denomProofs: ['hx'] })).toEqual([true]);
  });

  it('refuses constants that hide an expression', () => {
    const s = stateFor(Expr.eq(Expr.mul(x, Expr.const('1/x')), Expr.const(1)));
    expect(run(s, { cmd: 'field_simp' }, { cmd: 'norm_num' })).toEqual([false, false]);
    expect(s.closedBy).toBeNull();
  });

  it('refuses operators with the wrong number of arguments', () => {
    const messages: string[] = [];
    const prover = new Prover();
    prover.setLogger(m => messages.push(m));
    const s = stateFor(Expr.eq({ type: 'op', op: 'div', args: [x] }, x));
    expect(prover.runCommand(s, { cmd: 'field_simp' })).toBe(false);
    expect(messages).toEqual(['field_simp: malformed goal: div takes 2 arguments, got 1']);
  });

  it('rejects denominator proofs of the wrong shape', () => {
    const goal = Expr.eq(Expr.mul(Expr.div(x, y), y), x);
    const s = stateFor(goal, { hy: Expr.eq(y, Expr.const(1)) });
    expect(run(s, { cmd: 'field_simp', denomProofs: ['hy'] })).toEqual([false]);
    expect(run(stateFor(goal), { cmd: 'field_simp', denomProofs: ['missing'] })).toEqual([false]);
  });

  it('refuses a constant zero denominator', () => {
    const s = stateFor(Expr.eq(Expr.div(x, Expr.sub(Expr.const(1), Expr.const(1))), x));
    expect(run(s, { cmd: 'field_simp' })).toEqual([false]);
  });

  it('does not prove a false equation', () => {
    const s = stateFor(Expr.eq(Expr.add(x, Expr.const(1)), x));
    expect(run(s, { cmd: 'field_simp' })).toEqual([false]);
    expect(s.closedBy).toBeNull();
  });

  it('treats function applications as atoms', () => {
    const commuted = stateFor(Expr.eq(Expr.mul(r, Expr.sin(t)), Expr.mul(Expr.sin(t), r)));
    expect(run(commuted, { cmd: 'field_simp' })).toEqual([true]);

    const pythagoras = stateFor(Expr.eq(
      Expr.add(Expr.pow(Expr.sin(t), Expr.const(2)), Expr.pow(Expr.cos(t), Expr.const(2))),
      Expr.const(1),
    ));
    expect(run(pythagoras, { cmd: 'field_simp' })).toEqual([false]);
  });

  it('only works on equalities', () => {
    expect(run(stateFor(Expr.neq(x, y)), { cmd: 'field_simp' })).toEqual([false]);
  });
});

describe('norm_num', () => {
  it('proves constant equations', () => {
    const s = stateFor(Expr.eq(Expr.add(Expr.const(2), Expr.const(3)), Expr.const(5)));
    expect(run(s, { cmd: 'norm_num' })).toEqual([true]);
  });

  it('refuses non-constant sides', () => {
    expect(run(stateFor(Expr.eq(x, x)), { cmd: 'norm_num' })).toEqual([false]);
  });
});

describe('rewrite', () => {
  it('rewrites with a context equality', () => {
    const s = stateFor(
      Expr.eq(Expr.mul(x, Expr.const(2)), Expr.mul(Expr.add(y, Expr.const(1)), Expr.const(2))),
      { h: Expr.eq(x, Expr.add(y, Expr.const(1))) },
    );
    expect(run(s, { cmd: 'rewrite', equalityName: 'h' })).toEqual([true]);
    expect(factToReadable(s.goal)).toBe('(y + 1) * 2 = (y + 1) * 2');
    expect(new Prover().checkGoalProved(s)).toBe(true);
  });

  it('rewrites with a named rule', () => {
    const s = stateFor(Expr.eq(Expr.pow(x, Expr.const(2)), Expr.mul(x, x)));
    expect(run(s, { cmd: 'rewrite', equalityName: 'pow_two' })).toEqual([true]);
    expect(factToReadable(s.goal)).toBe('x * x = x * x');
  });

  it('closes the Pythagorean identity with its rule', () => {
    const s = stateFor(Expr.eq(
      Expr.add(Expr.pow(Expr.sin(t), Expr.const(2)), Expr.pow(Expr.cos(t), Expr.const(2))),
      Expr.const(1),
    ));
    expect(run(s, { cmd: 'rewrite', equalityName: 'sin_sq_add_cos_sq' })).toEqual([true]);
    expect(factToReadable(s.goal)).toBe('1 = 1');
    expect(new Prover().checkGoalProved(s)).toBe(true);
  });

  it('picks the requested occurrence', () => {
    const s = stateFor(Expr.eq(Expr.add(x, x), y), { h: Expr.eq(x, Expr.const(3)) });
    expect(run(s, { cmd: 'rewrite', equalityName: 'h', occurrence: 2 })).toEqual([true]);
    expect(factToReadable(s.goal)).toBe('(x + 3) = y');
  });

  it('fails on unknown names and missing occurrences', () => {
    const s = stateFor(Expr.eq(x, y), { h: Expr.eq(x, Expr.const(3)) });
    expect(run(s, { cmd: 'rewrite', equalityName: 'nope' })).toEqual([false]);
    expect(run(s, { cmd: 'rewrite', equalityName: 'h', occurrence: 5 })).toEqual([false]);
    expect(factToReadable(s.goal)).toBe('x = y');
  });
});

describe('symm and sorry', () => {
  it('adds the reversed equality', () => {
    const s = stateFor(Expr.eq(y, x), { h: Expr.eq(x, y) });
    expect(run(s, { cmd: 'symm', oldName: 'h', newName: 'h2' })).toEqual([true]);
    expect(s.context.getFact('h2')).toEqual(Expr.eq(y, x));
    expect(new Prover().checkGoalProved(s)).toBe(true);
  });

  it('refuses to reverse an inequality or overwrite a name', () => {
    const s = stateFor(Expr.eq(y, x), { h: Expr.neq(x, y), k: Expr.eq(x, y) });
    expect(run(s, { cmd: 'symm', oldName: 'h', newName: 'h2' }, { cmd: 'symm', oldName: 'k', newName: 'h' })).toEqual([false, false]);
  });

  it('admits without proving and then accepts nothing', () => {
    const s = stateFor(Expr.eq(x, y));
    expect(run(s, { cmd: 'sorry' }, { cmd: 'field_simp' })).toEqual([true, false]);
    expect(s.closedBy).toBe('sorry');
    expect(new Prover().checkGoalProved(s)).toBe(false);
  });

  it('throws on a command it does not know', () => {
    const bogus = JSON.parse('{"cmd":"bogus"}');
    expect(() => new Prover().runCommand(stateFor(Expr.eq(x, y)), bogus)).toThrow('Unknown command: {"cmd":"bogus"}');
  });
});

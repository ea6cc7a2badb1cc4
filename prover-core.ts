import * as math from 'mathjs';
import { v4 as uuid } from "uuid";
import { createHash } from "crypto";

const runtimeNonce = uuid() + uuid();
const hash = (x: string) => "aa" + createHash("sha256").update(x + runtimeNonce).digest('hex');

export type Logger = (message: string) => void;

////////////////////////
// AST Types
////////////////////////

export type Expr = VarNode | ConstNode | OpNode | FuncNode;
export type OpName = 'add' | 'sub' | 'mul' | 'div' | 'neg' | 'pow';
export interface VarNode { type: 'var'; name: string; }
export interface ConstNode { type: 'const'; value: string | number; }
export interface OpNode { type: 'op'; op: OpName; args: Expr[]; }
export interface FuncNode { type: 'func'; name: string; args: Expr[]; }

export interface FactEq { kind: 'eq'; lhs: Expr; rhs: Expr; }
export interface FactNeq { kind: 'neq'; lhs: Expr; rhs: Expr; }
export type Fact = FactEq | FactNeq;

////////////////////////
// Commands
////////////////////////
export type Command = CmdFieldSimp | CmdNormNum | CmdRewrite | CmdSymm | CmdSorry;
export interface CmdFieldSimp { cmd: 'field_simp'; denomProofs?: string[]; }
export interface CmdNormNum { cmd: 'norm_num'; }
export interface CmdRewrite { cmd: 'rewrite'; equalityName: string; occurrence?: number; }
export interface CmdSymm { cmd: 'symm'; oldName: string; newName: string; }
export interface CmdSorry { cmd: 'sorry'; }

////////////////////////
// Utilities
////////////////////////

export function deepClone<T>(x: T): T { return JSON.parse(JSON.stringify(x)); }

export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.type) {
    case 'var': return b.type === 'var' && b.name === a.name;
    case 'const': return b.type === 'const' && b.value === a.value;
    case 'op': return b.type === 'op' && a.op === b.op && argsEqual(a.args, b.args);
    case 'func': return b.type === 'func' && a.name === b.name && argsEqual(a.args, b.args);
  }
}

function argsEqual(xs: Expr[], ys: Expr[]): boolean {
  return xs.length === ys.length && xs.every((x, i) => exprEquals(x, ys[i]));
}

/** A position inside a fact: which side, then child indices from that side's root. */
export interface Path { side: 'lhs' | 'rhs'; indices: number[]; }

export function findOccurrencesInExpr(root: Expr, target: Expr): number[][] {
  const res: number[][] = [];
  function rec(node: Expr, path: number[]) {
    if (exprEquals(node, target)) res.push(path.slice());
    if (node.type === 'op' || node.type === 'func') node.args.forEach((ch, i) => { path.push(i); rec(ch, path); path.pop(); });
  }
  rec(root, []);
  return res;
}

export function getAtPath(f: Fact, path: Path): Expr {
  let node = f[path.side];
  for (const i of path.indices) {
    if (node.type !== 'op' && node.type !== 'func') throw new Error(`path descends into a ${node.type} node`);
    const child = node.args[i];
    if (!child) throw new Error(`no argument ${i} at path`);
    node = child;
  }
  return node;
}

function replaceInExpr(node: Expr, indices: number[], replacement: Expr): Expr {
  if (indices.length === 0) return deepClone(replacement);
  if (node.type !== 'op' && node.type !== 'func') throw new Error(`path descends into a ${node.type} node`);
  const [head, ...rest] = indices;
  if (head >= node.args.length) throw new Error(`no argument ${head} at path`);
  const args = node.args.map((a, i) => (i === head ? replaceInExpr(a, rest, replacement) : a));
  return { ...node, args };
}

export function replaceAtPath(f: Fact, path: Path, replacement: Expr): Fact {
  const updated = replaceInExpr(f[path.side], path.indices, replacement);
  return path.side === 'lhs' ? { ...f, lhs: updated } : { ...f, rhs: updated };
}

function isZeroConst(e: Expr): boolean {
  return e.type === 'const' && (e.value === 0 || e.value === '0');
}

////////////////////////
// Expr factory
////////////////////////
export const Expr = {
  var: (name: string): VarNode => ({ type: 'var', name }),
  const: (v: string | number): ConstNode => ({ type: 'const', value: v }),
  add: (...args: Expr[]): OpNode => ({ type: 'op', op: 'add', args }),
  sub: (a: Expr, b: Expr): OpNode => ({ type: 'op', op: 'sub', args: [a, b] }),
  mul: (...args: Expr[]): OpNode => ({ type: 'op', op: 'mul', args }),
  div: (a: Expr, b: Expr): OpNode => ({ type: 'op', op: 'div', args: [a, b] }),
  neg: (a: Expr): OpNode => ({ type: 'op', op: 'neg', args: [a] }),
  pow: (a: Expr, b: Expr): OpNode => ({ type: 'op', op: 'pow', args: [a, b] }),
  func: (name: string, ...args: Expr[]): FuncNode => ({ type: 'func', name, args }),
  sin: (x: Expr): FuncNode => Expr.func('sin', x),
  cos: (x: Expr): FuncNode => Expr.func('cos', x),
  atan: (x: Expr): FuncNode => Expr.func('atan', x),
  sqrt: (x: Expr): FuncNode => Expr.func('sqrt', x),
  eq: (a: Expr, b: Expr): FactEq => ({ kind: 'eq', lhs: a, rhs: b }),
  neq: (a: Expr, b: Expr): FactNeq => ({ kind: 'neq', lhs: a, rhs: b }),
};

////////////////////////
// mathjs conversion: two variants
////////////////////////

// Operators render the same way in both variants; only function application differs.
function opToMathJS(expr: OpNode, rec: (e: Expr) => string): string {
  const [a, b] = expr.args;
  switch (expr.op) {
    case 'add': return "(" + expr.args.map(rec).join(' + ') + ")";
    case 'mul': return "(" + expr.args.map(x => `(${rec(x)})`).join(' * ') + ")";
    case 'sub': return `(${rec(a)} - ${rec(b)})`;
    case 'div': return `(${rec(a)} / ${rec(b)})`;
    case 'neg': return `(-${rec(a)})`;
    case 'pow': return `(${rec(a)} ^ ${rec(b)})`;
  }
}

/** Function applications become atoms, so field_simp treats sin(x) like a variable. */
export function exprToMathJSStringOpaque(expr: Expr): string {
  switch (expr.type) {
    case 'var': return expr.name;
    case 'const': return String(expr.value);
    case 'op': return opToMathJS(expr, exprToMathJSStringOpaque);
    case 'func': return hash(`${expr.name}(${expr.args.map(exprToMathJSStringOpaque).join(',')})`);
  }
}

export function exprToMathJSStringReal(expr: Expr): string {
  switch (expr.type) {
    case 'var': return expr.name;
    case 'const': return String(expr.value);
    case 'op': return opToMathJS(expr, exprToMathJSStringReal);
    case 'func': return `${expr.name}(${expr.args.map(exprToMathJSStringReal).join(',')})`;
  }
}

////////////////////////
// Well-formedness
////////////////////////

/** Symbolic constants mathjs evaluates; anything else in a string constant is refused. */
export const NAMED_CONSTANTS: readonly string[] = ['pi', 'e'];
const NUMERIC_LITERAL = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
/** Variable and function names; a leading "?" marks a pattern variable. */
export const IDENTIFIER = /^\??[A-Za-z_][A-Za-z0-9_]*$/;

/** Accepted argument counts, [min, max]. */
export const OP_ARITY: Record<OpName, readonly [number, number]> = {
  add: [2, Infinity],
  mul: [2, Infinity],
  sub: [2, 2],
  div: [2, 2],
  pow: [2, 2],
  neg: [1, 1],
};

// names mathjs would read as constants rather than variables
const RESERVED_NAMES: readonly string[] = ['e', 'E', 'pi', 'PI', 'i', 'tau', 'phi', 'Infinity', 'NaN', 'true', 'false', 'null', 'undefined'];

export function isVariableName(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_NAMES.includes(name);
}

export function isConstLiteral(value: string | number): boolean {
  if (typeof value === 'number') return Number.isFinite(value);
  return NUMERIC_LITERAL.test(value) || NAMED_CONSTANTS.includes(value);
}

export function arityProblem(op: OpName, count: number): string | undefined {
  const [min, max] = OP_ARITY[op];
  if (count >= min && count <= max) return undefined;
  const expected = min === max ? `${min}` : `at least ${min}`;
  return `${op} takes ${expected} argument${min === 1 && max === 1 ? '' : 's'}, got ${count}`;
}

/** First reason `e` cannot be handed to mathjs, if any. */
export function findMalformed(e: Expr): string | undefined {
  if (e.type === 'var') return isVariableName(e.name) ? undefined : `bad variable name ${JSON.stringify(e.name)}`;
  if (e.type === 'const') return isConstLiteral(e.value) ? undefined : `bad constant ${JSON.stringify(e.value)}`;
  const own = e.type === 'op'
    ? arityProblem(e.op, e.args.length)
    : IDENTIFIER.test(e.name) ? undefined : `bad function name ${JSON.stringify(e.name)}`;
  if (own) return own;
  for (const a of e.args) {
    const problem = findMalformed(a);
    if (problem) return problem;
  }
  return undefined;
}

export function isConstantExpr(e: Expr): boolean {
  if (e.type === 'const') return isConstLiteral(e.value);
  if (e.type === 'var') return false;
  return e.args.every(isConstantExpr);
}

function isNaturalConst(e: Expr): boolean {
  if (e.type !== 'const') return false;
  const n = typeof e.value === 'number' ? e.value : NUMERIC_LITERAL.test(e.value) ? Number(e.value) : NaN;
  return Number.isInteger(n) && n >= 0;
}

/** Divisors of `expr`: right operands of div, and bases raised to anything but a natural number. */
export function collectDenominatorsInExpr(expr: Expr): Expr[] {
  const dens: Expr[] = [];
  function rec(node: Expr) {
    if (node.type === 'op') {
      if (node.op === 'div') dens.push(node.args[1]);
      if (node.op === 'pow' && !isNaturalConst(node.args[1])) dens.push(node.args[0]);
      node.args.forEach(rec);
    } else if (node.type === 'func') node.args.forEach(rec);
  }
  rec(expr); return dens;
}

function simplifyDifference(diff: string, rationalize: boolean): string {
  const s = rationalize ? math.simplify(math.rationalize(math.simplify(diff))) : math.simplify(diff);
  return s.toString();
}

////////////////////////
// Pattern matching utilities for rewrite rules
////////////////////////

export interface RewriteRule { lhs: Expr; rhs: Expr; }
export type RewriteRules = Record<string, RewriteRule>;

function isPatternVar(v: VarNode): boolean { return v.name.startsWith('?'); }

type Bindings = Map<string, Expr>;

function patternMatch(pattern: Expr, node: Expr, bindings: Bindings): boolean {
  if (pattern.type === 'var' && isPatternVar(pattern)) {
    const bound = bindings.get(pattern.name);
    if (bound) return exprEquals(bound, node);
    bindings.set(pattern.name, deepClone(node));
    return true;
  }
  switch (pattern.type) {
    case 'var':
    case 'const':
      return exprEquals(pattern, node);
    case 'op':
      if (node.type !== 'op' || node.op !== pattern.op) return false;
      return matchArgs(pattern.args, node.args, bindings);
    case 'func':
      if (node.type !== 'func' || node.name !== pattern.name) return false;
      return matchArgs(pattern.args, node.args, bindings);
  }
}

function matchArgs(ps: Expr[], ns: Expr[], bindings: Bindings): boolean {
  return ps.length === ns.length && ps.every((p, i) => patternMatch(p, ns[i], bindings));
}

function instantiate(pattern: Expr, bindings: Bindings): Expr {
  switch (pattern.type) {
    case 'var': {
      if (!isPatternVar(pattern)) return deepClone(pattern);
      const b = bindings.get(pattern.name);
      if (!b) throw new Error(`unbound pattern variable ${pattern.name}`);
      return deepClone(b);
    }
    case 'const': return deepClone(pattern);
    case 'op': return { type: 'op', op: pattern.op, args: pattern.args.map(a => instantiate(a, bindings)) };
    case 'func': return { type: 'func', name: pattern.name, args: pattern.args.map(a => instantiate(a, bindings)) };
  }
}

function findPatternOccurrencesInExpr(root: Expr, pattern: Expr): Array<{ indices: number[]; bindings: Bindings }> {
  const res: Array<{ indices: number[]; bindings: Bindings }> = [];
  function rec(node: Expr, path: number[]) {
    const bindings: Bindings = new Map();
    if (patternMatch(pattern, node, bindings)) res.push({ indices: path.slice(), bindings });
    if (node.type === 'op' || node.type === 'func') node.args.forEach((ch, i) => { path.push(i); rec(ch, path); path.pop(); });
  }
  rec(root, []);
  return res;
}

////////////////////////
// Default named rewrite rules
////////////////////////
const p = (name: string) => Expr.var(`?${name}`);

export const DEFAULT_REWRITE_RULES: RewriteRules = {
  pow_two: { lhs: Expr.pow(p('a'), Expr.const(2)), rhs: Expr.mul(p('a'), p('a')) },
  sub_eq_add_neg: { lhs: Expr.sub(p('a'), p('b')), rhs: Expr.add(p('a'), Expr.neg(p('b'))) },
  sin_sq_add_cos_sq: {
    lhs: Expr.add(Expr.pow(Expr.sin(p('t')), Expr.const(2)), Expr.pow(Expr.cos(p('t')), Expr.const(2))),
    rhs: Expr.const(1),
  },
  cos_sq_add_sin_sq: {
    lhs: Expr.add(Expr.pow(Expr.cos(p('t')), Expr.const(2)), Expr.pow(Expr.sin(p('t')), Expr.const(2))),
    rhs: Expr.const(1),
  },
};

////////////////////////
// Context
////////////////////////
export class Context {
  private map: Map<string, Fact> = new Map();
  addFact(name: string, fact: Fact) { if (this.map.has(name)) throw new Error(`fact name already present: ${name}`); this.map.set(name, deepClone(fact)); }
  getFact(name: string): Fact | undefined { return this.map.get(name); }
  has(name: string) { return this.map.has(name); }
  keys(): string[] { return Array.from(this.map.keys()); }
  facts(): Fact[] { return Array.from(this.map.values()); }
}

////////////////////////
// Proof state
////////////////////////

/** 'tactic' closes a goal for real; 'sorry' only admits it. */
export type ClosedBy = 'tactic' | 'sorry' | null;

export interface ProofState { goal: Fact; context: Context; closedBy: ClosedBy; }

////////////////////////
// Prover (core command implementations)
////////////////////////
export class Prover {
  private logger: Logger = () => {};
  readonly rewriteRules: RewriteRules;
  constructor(rules: RewriteRules = DEFAULT_REWRITE_RULES) {
    this.rewriteRules = rules;
  }
  setLogger(fn: Logger) { this.logger = fn; }

  public runCommand(state: ProofState, cmd: Command): boolean {
    if (state.closedBy) { this.logger("goal already closed, no more steps accepted"); return false; }

    switch (cmd.cmd) {
      case 'field_simp': return this.fieldSimp(state, cmd);
      case 'norm_num': return this.normNum(state);
      case 'rewrite': return this.rewrite(state, cmd);
      case 'symm': return this.symm(state, cmd);
      case 'sorry': return this.sorry(state);
      default: return ((x: never): boolean => { throw new Error(`Unknown command: ${JSON.stringify(x)}`); })(cmd);
    }
  }

  private fieldSimp(state: ProofState, cmd: CmdFieldSimp): boolean {
    const goal = state.goal;
    if (goal.kind !== 'eq') { this.logger('field_simp only supports equality goals'); return false; }
    const malformed = findMalformed(goal.lhs) ?? findMalformed(goal.rhs);
    if (malformed) { this.logger(`field_simp: malformed goal: ${malformed}`); return false; }

    const proven: Expr[] = [];
    for (const name of cmd.denomProofs ?? []) {
      const f = state.context.getFact(name);
      if (!f) { this.logger(`denominator proof not found: ${name}`); return false; }
      if (f.kind !== 'neq' || !isZeroConst(f.rhs)) { this.logger(`denominator proof '${name}' must have the form expr ≠ 0`); return false; }
      proven.push(f.lhs);
    }

    try {
      const dens = collectDenominatorsInExpr(goal.lhs).concat(collectDenominatorsInExpr(goal.rhs));
      for (const d of dens) {
        if (isConstantExpr(d)) {
          if (math.evaluate(exprToMathJSStringReal(d)) === 0) { this.logger(`constant denominator is zero: ${exprToReadableString(d)}`); return false; }
          continue;
        }
        if (!proven.some(q => exprEquals(q, d))) { this.logger('denominator not proven non-zero: ' + exprToReadableString(d)); return false; }
      }

      const diff = `(${exprToMathJSStringOpaque(goal.lhs)}) - (${exprToMathJSStringOpaque(goal.rhs)})`;
      const sStr = simplifyDifference(diff, true);
      this.logger(`field_simp: lhs - rhs -> ${sStr}`);
      if (sStr === '0') {
        state.closedBy = 'tactic';
        return true;
      }
      this.logger("field_simp: difference does not vanish, not provable from the field axioms");
      return false;
    } catch (e) { this.logger('field_simp failed: ' + (e instanceof Error ? e.message : String(e))); return false; }
  }

  private normNum(state: ProofState): boolean {
    const goal = state.goal;
    if (goal.kind !== 'eq') { this.logger('norm_num expects an equality goal'); return false; }
    const malformed = findMalformed(goal.lhs) ?? findMalformed(goal.rhs);
    if (malformed) { this.logger(`norm_num: malformed goal: ${malformed}`); return false; }
    if (!isConstantExpr(goal.lhs) || !isConstantExpr(goal.rhs)) { this.logger('norm_num: not both sides constant'); return false; }
    try {
      const sStr = simplifyDifference(`(${exprToMathJSStringReal(goal.lhs)}) - (${exprToMathJSStringReal(goal.rhs)})`, false);
      this.logger(`norm_num: lhs - rhs -> ${sStr}`);
      if (sStr === '0') {
        state.closedBy = 'tactic';
        return true;
      }
      return false;
    } catch (e) { this.logger('norm_num failed: ' + (e instanceof Error ? e.message : String(e))); return false; }
  }

  private rewrite(state: ProofState, cmd: CmdRewrite): boolean {
    const ruleName = cmd.equalityName;
    const fromContext = state.context.getFact(ruleName);
    const contextEq = fromContext && fromContext.kind === 'eq' ? fromContext : undefined;
    const fromRegistry = this.rewriteRules[ruleName];
    if (!contextEq && !fromRegistry) { this.logger(`rewrite: neither equality fact nor rewrite rule named '${ruleName}' found`); return false; }

    const sides = ['lhs', 'rhs'] as const;
    const occurrences: Array<{ path: Path; replaceWith: Expr }> = [];

    if (contextEq) {
      for (const [from, to] of [[contextEq.lhs, contextEq.rhs], [contextEq.rhs, contextEq.lhs]]) {
        for (const side of sides) {
          for (const indices of findOccurrencesInExpr(state.goal[side], from)) occurrences.push({ path: { side, indices }, replaceWith: to });
        }
      }
    }

    if (fromRegistry) {
      for (const [from, to] of [[fromRegistry.lhs, fromRegistry.rhs], [fromRegistry.rhs, fromRegistry.lhs]]) {
        for (const side of sides) {
          for (const m of findPatternOccurrencesInExpr(state.goal[side], from)) {
            let replaceWith: Expr;
            // a rule read right-to-left may mention variables its right side never binds
            try { replaceWith = instantiate(to, m.bindings); } catch { continue; }
            occurrences.push({ path: { side, indices: m.indices }, replaceWith });
          }
        }
      }
    }

    const occurrence = cmd.occurrence ?? 1;
    const chosen = occurrences[occurrence - 1];
    if (!chosen) { this.logger(`rewrite: occurrence ${occurrence} not found (${occurrences.length} available)`); return false; }
    state.goal = replaceAtPath(state.goal, chosen.path, chosen.replaceWith);
    this.logger(`rewrite applied at occurrence ${occurrence} using ${ruleName}: ${factToReadable(state.goal)}`);
    return true;
  }

  private symm(state: ProofState, cmd: CmdSymm): boolean {
    const f = state.context.getFact(cmd.oldName);
    if (!f) { this.logger(`symm: fact not found ${cmd.oldName}`); return false; }
    if (f.kind !== 'eq') { this.logger('symm expects an equality fact'); return false; }
    if (state.context.has(cmd.newName)) { this.logger(`symm: fact name already present: ${cmd.newName}`); return false; }
    const newFact: FactEq = { kind: 'eq', lhs: deepClone(f.rhs), rhs: deepClone(f.lhs) };
    state.context.addFact(cmd.newName, newFact); this.logger(`symm: added ${cmd.newName}: ${factToReadable(newFact)}`); return true;
  }

  private sorry(state: ProofState): boolean {
    state.closedBy = 'sorry';
    this.logger(`sorry: admitted ${factToReadable(state.goal)} without proof`);
    return true;
  }

  public checkGoalProved(state: ProofState): boolean {
    if (state.closedBy === 'tactic') return true;
    if (state.closedBy === 'sorry') return false;
    const goal = state.goal;
    if (goal.kind === 'eq' && exprEquals(goal.lhs, goal.rhs)) return true;
    return state.context.facts().some(f => f.kind === goal.kind && exprEquals(f.lhs, goal.lhs) && exprEquals(f.rhs, goal.rhs));
  }
}

////////////////////////
// Helpers & Readable
////////////////////////
export function factToReadable(f: Fact): string { return `${exprToReadableString(f.lhs)} ${f.kind === 'eq' ? '=' : '≠'} ${exprToReadableString(f.rhs)}`; }
export function exprToReadableString(e: Expr): string {
  switch (e.type) {
    case 'var': return e.name;
    case 'const': return String(e.value);
    case 'func': return `${e.name}(${e.args.map(exprToReadableString).join(', ')})`;
    case 'op': {
      const parts = e.args.map(exprToReadableString);
      switch (e.op) {
        case 'add': return `(${parts.join(' + ')})`;
        case 'mul': return parts.join(' * ');
        case 'sub': return `(${parts[0]} - ${parts[1]})`;
        case 'div': return `(${parts[0]} / ${parts[1]})`;
        case 'neg': return `(-${parts[0]})`;
        case 'pow': return `${parts[0]} ^ ${parts[1]}`;
      }
    }
  }
}


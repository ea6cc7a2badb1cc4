// schemas.ts
// zod schemas for the JSON forms used by batch mode and the MCP server.
// Descriptions are kept because MCP clients read them to build requests.

import { z } from 'zod';
import { arityProblem, IDENTIFIER, isConstLiteral, isVariableName } from './prover-core.js';
import type { Expr, Fact, Command } from './prover-core.js';

export const ComplexSchema = z.object({
  re: z.number().describe('Real part.'),
  im: z.number().describe('Imaginary part.')
}).describe('Complex number as a pair of reals.');

const VarNodeSchema = z.object({
  type: z.literal('var'),
  name: z.string()
    .refine(isVariableName, 'must be an identifier that is not a mathjs constant')
    .describe('Variable name, e.g. "a_re". Names starting with "?" are pattern variables in rewrite rules.')
}).describe('Variable AST node');

const ConstNodeSchema = z.object({
  type: z.literal('const'),
  value: z.union([z.string(), z.number()])
    .refine(isConstLiteral, 'must be a finite number, a numeric literal, "pi" or "e"')
    .describe('Numeric constant, or a symbolic constant mathjs knows such as "pi".')
}).describe('Constant AST node');

export const ExprSchema: z.ZodType<Expr> = z.lazy(() => z.union([
  VarNodeSchema,
  ConstNodeSchema,
  z.object({
    type: z.literal('op'),
    op: z.enum(['add', 'sub', 'mul', 'div', 'neg', 'pow']).describe('add and mul take 2+ args, neg takes 1, the rest take 2.'),
    args: z.array(ExprSchema)
  }).superRefine((node, ctx) => {
    const problem = arityProblem(node.op, node.args.length);
    if (problem) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['args'], message: problem });
  }).describe('Operator AST node'),
  z.object({
    type: z.literal('func'),
    name: z.string().regex(IDENTIFIER).describe('Function name, e.g. "sin", "cos", "atan", "sqrt".'),
    args: z.array(ExprSchema)
  }).describe('Function AST node')
])).describe('Expression AST node (var | const | op | func)');

export const FactSchema: z.ZodType<Fact> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('eq'), lhs: ExprSchema, rhs: ExprSchema }).describe('lhs = rhs'),
  z.object({ kind: z.literal('neq'), lhs: ExprSchema, rhs: ExprSchema }).describe('lhs ≠ rhs')
]).describe('Fact object (discriminated by kind=eq|neq).');

export const CommandSchema: z.ZodType<Command> = z.discriminatedUnion('cmd', [
  z.object({
    cmd: z.literal('field_simp').describe('Prove an equality goal by clearing denominators and simplifying lhs - rhs to 0.'),
    denomProofs: z.array(z.string()).optional().describe('Names of facts of the form expr ≠ 0, one per non-constant denominator.')
  }),
  z.object({
    cmd: z.literal('norm_num').describe('Prove an equality between two constant expressions.')
  }),
  z.object({
    cmd: z.literal('rewrite').describe('Rewrite the goal with a context equality or a named rewrite rule, in either direction.'),
    equalityName: z.string(),
    occurrence: z.number().int().positive().optional().describe('1-based match index, default 1.')
  }),
  z.object({
    cmd: z.literal('symm').describe('Add the reversed form of an equality fact under a new name.'),
    oldName: z.string(),
    newName: z.string()
  }),
  z.object({
    cmd: z.literal('sorry').describe('Admit the goal without proof.')
  })
]).describe('Proof command.');

export const HypothesesSchema = z.record(FactSchema).describe('Named facts available to the proof.');

export const BatchInputSchema = z.object({
  hypotheses: HypothesesSchema,
  goal: FactSchema
});

export const BatchCommandSchema = z.object({
  command: CommandSchema
});

export function formatZodError(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`).join('; ');
}

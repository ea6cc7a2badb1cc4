#!/usr/bin/env node
// mcp-server.ts
// MCP stdio server implemented using the official @modelcontextprotocol/sdk package.
//
// Exposes the talk's operations as MCP tools: complex arithmetic, polar
// conversion, numeric field-law checks, the theorem book, and free-form proof
// runs. Argument schemas carry descriptions so clients can build requests
// without external documentation.

import { pathToFileURL } from 'url';
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { COMPLEX_OPS, createToolHandlers } from './mcp-tools.js';
import type { Logger } from './prover-core.js';
import { CommandSchema, ComplexSchema, FactSchema, HypothesesSchema } from './schemas.js';

export interface McpServerOptions {
  name?: string;
  version?: string;
  logger?: Logger;
}

function textContent(value: unknown): CallToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value) }] };
}

export function createMcpServer(opts: McpServerOptions = {}): McpServer {
  const server = new McpServer({ name: opts.name ?? "complex-field-talk", version: opts.version ?? "0.1.0" });
  const tools = createToolHandlers(opts.logger);

  server.registerTool(
    "complex_op",
    {
      title: "Complex arithmetic",
      description: `Apply one complex operation.

PARAMS:
- \`op\`: one of ${COMPLEX_OPS.join(', ')}.
- \`a\`: first operand { re, im }.
- \`b\`: second operand, required for add, sub, mul, div.

RETURNS: \`{ ok: true, result, text }\`, or \`{ ok: false, message }\` when the operation is undefined (inverse or division by zero).`,
      inputSchema: {
        op: z.enum(COMPLEX_OPS).describe('Operation name.'),
        a: ComplexSchema,
        b: ComplexSchema.optional()
      }
    },
    async (args) => textContent(tools.complexOp(args))
  );

  server.registerTool(
    "to_polar",
    {
      title: "Rectangular to polar",
      description: "Convert { re, im } to { angle, radius } with angle = atan(im / re). The one-argument arctangent loses the quadrant when re < 0; `quadrantLost` flags that case.",
      inputSchema: { c: ComplexSchema }
    },
    async (args) => textContent(tools.toPolar(args))
  );

  server.registerTool(
    "from_polar",
    {
      title: "Polar to rectangular",
      description: "Convert an angle and radius to { re, im }. `roundTripExpected` is true when to_polar would give the same angle and radius back (-π/2 < angle < π/2, radius > 0).",
      inputSchema: {
        angle: z.number().describe('Angle in radians.'),
        radius: z.number().describe('Radius.')
      }
    },
    async (args) => textContent(tools.fromPolar(args))
  );

  server.registerTool(
    "verify_field_laws",
    {
      title: "Check the field laws numerically",
      description: "Evaluate every field law on every tuple of sample values. Laws needing a nonzero argument skip zero samples. RETURNS `{ ok, nontrivial, laws: [{ law, checked, skipped, counterexample? }] }`.",
      inputSchema: {
        samples: z.array(ComplexSchema).min(1).optional().describe('Sample values; a built-in set is used when omitted.'),
        tolerance: z.number().positive().optional().describe('Absolute tolerance per component, default 1e-10.')
      }
    },
    async (args) => textContent(tools.verifyFieldLaws(args))
  );

  server.registerTool(
    "list_theorems",
    {
      title: "List theorems",
      description: "List the names and statements of the theorem book.",
      inputSchema: {}
    },
    async () => textContent(tools.listTheorems())
  );

  server.registerTool(
    "check_theorem",
    {
      title: "Check a theorem",
      description: "Run a theorem's proof script. RETURNS `{ ok: true, report }` where report.status is proved, admitted (closed with sorry) or open.",
      inputSchema: { name: z.string().describe('Theorem name from list_theorems.') }
    },
    async (args) => textContent(tools.checkTheorem(args))
  );

  server.registerTool(
    "run_proof",
    {
      title: "Run a proof script",
      description: "Create a proof session for `goal` with optional named `hypotheses` and run `commands` in order. RETURNS `{ ok: true, status, steps, messages, summary }`; `steps[i]` tells whether command i succeeded.",
      inputSchema: {
        goal: FactSchema,
        hypotheses: HypothesesSchema.optional(),
        commands: z.array(CommandSchema)
      }
    },
    async (args) => textContent(tools.runProof(args))
  );

  return server;
}

export async function startMcpServer(opts: McpServerOptions = {}) {
  // stdout carries the protocol
  const server = createMcpServer({ logger: (m) => console.error(`[mcp] ${m}`), ...opts });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  process.on('SIGINT', () => {
    server.close().then(() => process.exit(0), (e: unknown) => {
      console.error('Failed to close MCP server:', e);
      process.exit(1);
    });
  });

  return { server, transport };
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  startMcpServer().catch((e: unknown) => {
    console.error('Failed to start MCP server:', e);
    process.exit(1);
  });
}

export default startMcpServer;

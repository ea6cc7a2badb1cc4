import { readFileSync } from 'fs';
import { ProofSession } from './proof-session.js';
import { factToReadable } from './prover-core.js';
import type { Command, Fact, Logger } from './prover-core.js';
import { BatchCommandSchema, BatchInputSchema, formatZodError } from './schemas.js';

/**
 * Batch mode input format for hypotheses and goal
 */
export interface BatchInput {
  hypotheses: Record<string, Fact>;
  goal: Fact;
}

/**
 * One line of a proof script
 */
export interface BatchCommand {
  command: Command;
}

export interface BatchError {
  line: number;
  command?: Command;
  message: string;
  type: 'parse_error' | 'command_error' | 'validation_error';
}

export interface EvaluationScore {
  error_count: number;
  proved: 0 | 1;
}

export interface BatchResult {
  evaluation_score: EvaluationScore;
  errors: BatchError[];
  session_summary?: string;
}

interface ParsedLine {
  line: number;
  value: unknown;
}

/**
 * Replays a JSONL proof script against a JSONL goal. An admitted (`sorry`)
 * proof is reported as not proved.
 */
export class BatchModeValidator {
  private logger: Logger;

  constructor(logger: Logger = () => {}) {
    this.logger = logger;
  }

  /**
   * Parse JSONL content; blank lines are skipped but still counted.
   */
  private parseJsonl(content: string): { data: ParsedLine[], errors: BatchError[] } {
    const lines = content.split('\n');
    const data: ParsedLine[] = [];
    const errors: BatchError[] = [];

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === '') continue;

      try {
        data.push({ line: i + 1, value: JSON.parse(line) });
      } catch (error) {
        errors.push({
          line: i + 1,
          message: `JSON parse error: ${error instanceof Error ? error.message : String(error)}`,
          type: 'parse_error'
        });
      }
    }

    return { data, errors };
  }

  private result(errors: BatchError[], proved: 0 | 1, session_summary?: string): BatchResult {
    const result: BatchResult = { evaluation_score: { error_count: errors.length, proved }, errors };
    if (session_summary !== undefined) result.session_summary = session_summary;
    return result;
  }

  processContent(inputContent: string, proofContent: string): BatchResult {
    const errors: BatchError[] = [];

    const inputParse = this.parseJsonl(inputContent);
    errors.push(...inputParse.errors);

    const [first, ...extra] = inputParse.data;
    if (!first) {
      errors.push({
        line: 1,
        message: 'Input file is empty or contains no valid JSON objects',
        type: 'validation_error'
      });
      return this.result(errors, 0);
    }
    for (const e of extra) {
      errors.push({
        line: e.line,
        message: 'Input file should contain exactly one JSON object with hypotheses and goal',
        type: 'validation_error'
      });
    }

    const input = BatchInputSchema.safeParse(first.value);
    if (!input.success) {
      errors.push({ line: first.line, message: `Invalid input: ${formatZodError(input.error)}`, type: 'validation_error' });
      return this.result(errors, 0);
    }

    const proofParse = this.parseJsonl(proofContent);
    errors.push(...proofParse.errors);

    const commands: Array<{ line: number; command: Command }> = [];
    for (const entry of proofParse.data) {
      const parsed = BatchCommandSchema.safeParse(entry.value);
      if (parsed.success) commands.push({ line: entry.line, command: parsed.data.command });
      else errors.push({ line: entry.line, message: `Invalid command: ${formatZodError(parsed.error)}`, type: 'validation_error' });
    }

    if (errors.length > 0) {
      return this.result(errors, 0);
    }

    this.logger('Creating proof session...');
    const batchInput: BatchInput = input.data;
    const session = new ProofSession(batchInput.goal, {
      hypotheses: batchInput.hypotheses,
      logger: this.logger
    });

    this.logger(`Goal: ${factToReadable(batchInput.goal)}`);
    this.logger(`Hypotheses: ${Object.keys(batchInput.hypotheses).length}`);
    this.logger(`Executing ${commands.length} commands...`);

    for (const { line, command } of commands) {
      this.logger(`Command at line ${line}: ${JSON.stringify(command)}`);
      if (!session.runCommand(command)) {
        errors.push({ line, command, message: 'Command failed to execute', type: 'command_error' });
      }
      if (session.isComplete()) {
        this.logger(`Proof completed at line ${line}`);
        break;
      }
      if (session.isAdmitted()) {
        this.logger(`Goal admitted with sorry at line ${line}`);
        break;
      }
    }

    const proved = session.isComplete() ? 1 : 0;
    if (proved) {
      this.logger('Proof completed successfully');
    } else {
      const lastLine = commands.length > 0 ? commands[commands.length - 1].line : 1;
      errors.push({
        line: lastLine,
        message: session.isAdmitted() ? 'Goal was admitted with sorry, not proved' : 'Proof sequence did not complete the goal',
        type: 'validation_error'
      });
    }

    return this.result(errors, proved, session.getSummary());
  }

  /**
   * Process batch mode files
   */
  processBatch(inputFilePath: string, proofFilePath: string): BatchResult {
    let inputContent: string;
    let proofContent: string;
    try {
      this.logger(`Reading input file: ${inputFilePath}`);
      inputContent = readFileSync(inputFilePath, 'utf-8');
      this.logger(`Reading proof file: ${proofFilePath}`);
      proofContent = readFileSync(proofFilePath, 'utf-8');
    } catch (error) {
      return this.result([{
        line: 1,
        message: `File processing error: ${error instanceof Error ? error.message : String(error)}`,
        type: 'parse_error'
      }], 0);
    }
    return this.processContent(inputContent, proofContent);
  }

  formatResult(result: BatchResult): string {
    const lines: string[] = [];

    lines.push('=== BATCH MODE EVALUATION RESULT ===');
    lines.push(`Error Count: ${result.evaluation_score.error_count}`);
    lines.push(`Proved: ${result.evaluation_score.proved}`);

    if (result.errors.length > 0) {
      lines.push('', '=== ERRORS ===');
      for (const error of result.errors) {
        let errorLine = `Line ${error.line} [${error.type.toUpperCase()}]: ${error.message}`;
        if (error.command) {
          errorLine += ` (Command: ${JSON.stringify(error.command)})`;
        }
        lines.push(errorLine);
      }
    }

    if (result.session_summary) {
      lines.push('', '=== SESSION SUMMARY ===');
      lines.push(result.session_summary);
    }

    return lines.join('\n');
  }
}

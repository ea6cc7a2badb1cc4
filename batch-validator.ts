#!/usr/bin/env node

import { BatchModeValidator } from './batch-mode.js';
import { argv, exit } from 'process';

/**
 * Command-line interface for batch mode validation
 */
function main() {
  if (argv.length < 4) {
    console.error('Usage: batch-validator <input-file> <proof-file>');
    console.error('');
    console.error('Arguments:');
    console.error('  input-file   JSONL file with hypotheses and goal');
    console.error('  proof-file   JSONL file with proof commands');
    console.error('');
    console.error('Example:');
    console.error('  batch-validator examples/mul_inv_re_input.jsonl examples/mul_inv_re_proof.jsonl');
    exit(1);
  }

  const inputFile = argv[2];
  const proofFile = argv[3];

  console.log('=== BATCH MODE PROOF VALIDATOR ===');
  console.log(`Input file: ${inputFile}`);
  console.log(`Proof file: ${proofFile}`);
  console.log('');

  const validator = new BatchModeValidator((msg) => console.log(`[LOG] ${msg}`));
  const result = validator.processBatch(inputFile, proofFile);

  console.log('');
  console.log(validator.formatResult(result));

  exit(result.evaluation_score.error_count > 0 ? 1 : 0);
}

main();

#!/usr/bin/env node
/**
 * Sprig interpreter CLI entry point.
 *
 * Usage: sprig <file.sprig>
 *        sprig run <file.sprig>
 *        sprig --eval "<expr>"
 *        sprig repl
 *        sprig demo
 *        sprig fmt <file.sprig> [...]
 */

import * as fs from 'fs';
import * as path from 'path';
import { Interpreter } from './interpreter';
import { SprigError } from './errors';
import { loadConfig } from './config';
import { evaluateSource } from './source';
import { runDemo } from './demo';
import { parseCommand } from './command';
import { startRepl } from './repl';
import { runFormatter } from '../../formatter/src/cli';

function main(): void {
  const command = parseCommand(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      printUsage();
      process.exit(0);
    case 'usage-error':
      console.error(command.message);
      process.exit(1);
    case 'fmt':
      process.exit(runFormatter(command.args));
  }

  let interpreter: Interpreter;
  try {
    interpreter = new Interpreter(loadConfig());
  } catch (e) {
    if (e instanceof SprigError) {
      console.error(e.message);
      process.exit(1);
    }
    throw e;
  }

  switch (command.kind) {
    case 'repl':
      startRepl(interpreter);
      return; // REPL runs its own event loop

    case 'demo':
      runDemo(line => console.log(line), interpreter);
      process.exit(0);

    case 'eval': {
      const outcome = interpreter.tryEvaluate(command.expression);
      if (!outcome.ok) {
        console.error(outcome.error.message);
        process.exit(1);
      }
      console.log(String(outcome.value));
      process.exit(0);
    }

    case 'run':
      process.exit(runFile(command.file, interpreter));
  }
}

/**
 * Evaluate each expression line of a file, printing one result per line.
 */
function runFile(filename: string, interpreter: Interpreter): number {
  const resolved = path.resolve(filename);
  if (!fs.existsSync(resolved)) {
    console.error(`Error: File not found: ${resolved}`);
    return 1;
  }

  const results = evaluateSource(fs.readFileSync(resolved, 'utf-8'), interpreter);
  let failed = false;
  for (const { line, outcome } of results) {
    if (outcome.ok) {
      console.log(String(outcome.value));
    } else {
      failed = true;
      console.error(`${filename}:${line}: ${outcome.error.message}`);
    }
  }
  return failed ? 1 : 0;
}

function printUsage(): void {
  console.log('Sprig v0.1.0');
  console.log('');
  console.log('Usage:');
  console.log('  sprig <file.sprig>                 Evaluate each expression line in a file');
  console.log('  sprig run <file.sprig>             Evaluate each expression line in a file');
  console.log('  sprig --eval "<expr>"              Evaluate one expression');
  console.log('  sprig repl                         Start interactive REPL');
  console.log('  sprig demo                         Run the demo expressions');
  console.log('  sprig fmt <file.sprig> [--check]   Format Sprig files');
  console.log('  sprig --help                       Show this help');
  console.log('');
  console.log('Configuration: sprig.config.json in the working directory, or SPRIG_MAX_DEPTH.');
}

main();

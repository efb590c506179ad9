/**
 * Demo runner: evaluates a fixed set of expressions and prints each result
 * or error. Every error is terminal for its one input only.
 */

import { Interpreter } from './interpreter';

export type Writer = (line: string) => void;

export const DEMO_CASES: readonly string[] = [
  '(let x 2 y 3 x (mult x y) (add x y))',
  '(let x 2 y 3 (add x (let x 4 (add x y))))',
  '(add (mult 2 3) (let a 5 (add a 1)))',
  '(let x 3 (let x 2 x))',
  '(let x 3 x)',
  '(add 10 20)',
  '42',
  '(let x 10 y (add x 5) (mult x y))',
  '(add x 5)',
  '()',
  '(mult 1 2 3)',
  '(let x 10 y)',
  '(+ 1 2)',
];

/**
 * Evaluate one input and print its outcome. Returns true on success.
 */
export function runCase(input: string, write: Writer, interpreter: Interpreter = new Interpreter()): boolean {
  write('');
  write(`Evaluating: "${input}"`);
  const outcome = interpreter.tryEvaluate(input);
  if (outcome.ok) {
    write(`Result: ${outcome.value}`);
    return true;
  }
  write(`Error: ${outcome.error.message}`);
  return false;
}

/**
 * Run every demo case. Returns the number of cases that failed.
 */
export function runDemo(write: Writer, interpreter: Interpreter = new Interpreter()): number {
  write('--- Sprig demo ---');
  let failures = 0;
  for (const input of DEMO_CASES) {
    if (!runCase(input, write, interpreter)) failures++;
  }
  return failures;
}

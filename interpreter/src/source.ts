/**
 * Helpers for `.sprig` files: one expression per line, `;` starts a
 * comment line, blank lines are ignored.
 */

import { EvaluationOutcome, Interpreter } from './interpreter';

export interface SourceLine {
  /** 1-based line number */
  line: number;
  text: string;
}

export function isCommentLine(text: string): boolean {
  return text.trimStart().startsWith(';');
}

/**
 * Collect the expression lines of a file, without their line terminators.
 */
export function expressionLines(source: string): SourceLine[] {
  const result: SourceLine[] = [];
  source.split(/\r?\n/).forEach((text, i) => {
    if (text.trim() === '' || isCommentLine(text)) return;
    result.push({ line: i + 1, text });
  });
  return result;
}

export type LineOutcome = SourceLine & { outcome: EvaluationOutcome };

/**
 * Evaluate every expression line independently.
 */
export function evaluateSource(source: string, interpreter: Interpreter): LineOutcome[] {
  return expressionLines(source).map(entry => ({
    ...entry,
    outcome: interpreter.tryEvaluate(entry.text),
  }));
}

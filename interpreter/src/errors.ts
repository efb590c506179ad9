/**
 * Error types for the Sprig interpreter.
 */

import { Token, TokenKind } from './tokens';

export class SprigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SprigError';
  }
}

export interface SyntaxErrorDetails {
  /** Token kind the parser required at this point */
  expected?: TokenKind;
  /** Token the parser saw instead */
  found?: Token;
}

export class SprigSyntaxError extends SprigError {
  public readonly position: number | undefined;
  public readonly expected: TokenKind | undefined;
  public readonly found: Token | undefined;

  constructor(message: string, position?: number, details: SyntaxErrorDetails = {}) {
    const loc = position !== undefined ? ` [position ${position}]` : '';
    super(`SyntaxError${loc}: ${message}`);
    this.name = 'SprigSyntaxError';
    this.position = position;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export class SprigEvaluationError extends SprigError {
  constructor(message: string) {
    super(`EvaluationError: ${message}`);
    this.name = 'SprigEvaluationError';
  }
}

export class SprigNameError extends SprigEvaluationError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(`undefined variable '${identifier}'`);
    this.name = 'SprigNameError';
    this.identifier = identifier;
  }
}

export class SprigOperatorError extends SprigEvaluationError {
  public readonly operator: string;

  constructor(operator: string) {
    super(`unknown operator or keyword '${operator}'`);
    this.name = 'SprigOperatorError';
    this.operator = operator;
  }
}

/**
 * Raised instead of overflowing the call stack on deeply nested input.
 */
export class SprigDepthError extends SprigError {
  public readonly limit: number;

  constructor(limit: number) {
    super(`ResourceError: expression nesting exceeds the limit of ${limit}`);
    this.name = 'SprigDepthError';
    this.limit = limit;
  }
}

/**
 * Short label for the error kind, as shown by the tools.
 */
export function errorKind(error: SprigError): 'syntax' | 'evaluation' | 'resource' | 'unknown' {
  if (error instanceof SprigSyntaxError) return 'syntax';
  if (error instanceof SprigEvaluationError) return 'evaluation';
  if (error instanceof SprigDepthError) return 'resource';
  return 'unknown';
}

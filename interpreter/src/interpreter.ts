/**
 * Fused parser and evaluator for Sprig.
 *
 * There is no syntax tree: each expression is evaluated the moment it has
 * been parsed, so errors surface strictly left to right (left operand before
 * right, bindings in order, body last).
 *
 * Grammar (every separator is exactly one space):
 *
 *   expr := INTEGER | IDENTIFIER
 *         | "(" "add" " " expr " " expr ")"
 *         | "(" "mult" " " expr " " expr ")"
 *         | "(" "let" " " (IDENTIFIER " " expr " ")* expr ")"
 */

import { Environment } from './environment';
import {
  SprigDepthError,
  SprigError,
  SprigEvaluationError,
  SprigOperatorError,
  SprigSyntaxError,
} from './errors';
import { InterpreterOptions, resolveOptions } from './config';
import { TokenStream } from './lexer';
import { Token, TokenKind, describeToken } from './tokens';
import { parseInt32, wrapAdd, wrapMul } from './int32';

type ArithmeticOperator = 'add' | 'mult';

const ARITHMETIC: Record<ArithmeticOperator, (a: number, b: number) => number> = {
  add: wrapAdd,
  mult: wrapMul,
};

function isArithmetic(name: string): name is ArithmeticOperator {
  return name === 'add' || name === 'mult';
}

export type EvaluationOutcome =
  | { ok: true; value: number }
  | { ok: false; error: SprigError };

/**
 * State for a single evaluation. Never shared between calls.
 */
class Evaluation {
  private readonly tokens: TokenStream;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(source: string, maxDepth: number) {
    this.tokens = new TokenStream(source);
    this.maxDepth = maxDepth;
  }

  run(): number {
    if (this.tokens.current.kind === 'Space') {
      this.tokens.advance();
    }

    const result = this.expression(new Environment());

    const trailing = this.tokens.current;
    if (trailing.kind !== 'EndOfFile') {
      throw new SprigSyntaxError('extra characters at end of input', trailing.position, {
        expected: 'EndOfFile',
        found: trailing,
      });
    }
    if (!Number.isSafeInteger(result)) {
      throw new SprigEvaluationError(`non-integer final result: ${result}`);
    }
    return result;
  }

  // ------------------------------------------------------------------
  // Token helpers
  // ------------------------------------------------------------------

  private expect(kind: TokenKind, context: string): Token {
    const token = this.tokens.current;
    if (token.kind !== kind) {
      throw new SprigSyntaxError(
        `expected ${kind} ${context}, found ${describeToken(token)}`,
        token.position,
        { expected: kind, found: token },
      );
    }
    this.tokens.advance();
    return token;
  }

  // ------------------------------------------------------------------
  // Expressions
  // ------------------------------------------------------------------

  private expression(env: Environment): number {
    if (++this.depth > this.maxDepth) {
      throw new SprigDepthError(this.maxDepth);
    }
    try {
      return this.dispatch(env);
    } finally {
      this.depth--;
    }
  }

  private dispatch(env: Environment): number {
    const token = this.tokens.current;

    switch (token.kind) {
      case 'Integer': {
        const value = parseInt32(token.text);
        if (value === null) {
          throw new SprigSyntaxError(
            `integer literal '${token.text}' does not fit in 32 bits`,
            token.position,
          );
        }
        this.tokens.advance();
        return value;
      }

      case 'Identifier':
        this.tokens.advance();
        return env.lookup(token.text);

      case 'OpenParen':
        this.tokens.advance();
        return this.form(env);

      case 'EndOfFile':
        throw new SprigSyntaxError('unexpected end of input', token.position, { found: token });

      default:
        throw new SprigSyntaxError(
          `unexpected token ${describeToken(token)}`,
          token.position,
          { found: token },
        );
    }
  }

  /**
   * A parenthesized form; the opening paren has already been consumed.
   */
  private form(env: Environment): number {
    const head = this.tokens.current;
    if (head.kind !== 'Identifier') {
      throw new SprigSyntaxError(
        `expected an operator or keyword after '(', found ${describeToken(head)}`,
        head.position,
        { expected: 'Identifier', found: head },
      );
    }
    this.tokens.advance();

    if (isArithmetic(head.text)) {
      return this.arithmetic(head.text, env);
    }
    if (head.text === 'let') {
      return this.letForm(env);
    }
    throw new SprigOperatorError(head.text);
  }

  private arithmetic(op: ArithmeticOperator, env: Environment): number {
    this.expect('Space', `after '${op}'`);
    const left = this.expression(env);
    this.expect('Space', `between the operands of '${op}'`);
    const right = this.expression(env);
    this.closeArithmetic(op);
    return ARITHMETIC[op](left, right);
  }

  /**
   * Consume the `)` ending a two-operand form. A space followed by a third
   * operand is reported as that operand.
   */
  private closeArithmetic(op: ArithmeticOperator): void {
    const token = this.tokens.current;
    if (token.kind === 'CloseParen') {
      this.tokens.advance();
      return;
    }

    let found = token;
    if (token.kind === 'Space') {
      const next = this.tokens.peek();
      if (next.kind !== 'CloseParen' && next.kind !== 'EndOfFile') {
        found = next;
      }
    }
    throw new SprigSyntaxError(
      `expected CloseParen after the second operand of '${op}', found ${describeToken(found)}`,
      found.position,
      { expected: 'CloseParen', found },
    );
  }

  /**
   * `(let name value ... body)`. Each value is evaluated in the scope being
   * built, so later bindings see earlier ones.
   */
  private letForm(env: Environment): number {
    const scope = env.child();
    this.expect('Space', "after 'let'");

    while (this.tokens.current.kind === 'Identifier') {
      // An identifier directly before `)` is the body, not a binding.
      if (this.tokens.peek().kind === 'CloseParen') break;

      const name = this.tokens.current.text;
      this.tokens.advance();

      const separator = this.tokens.current;
      if (separator.kind !== 'Space') {
        throw new SprigSyntaxError(
          `malformed let binding: expected a value expression after '${name}', found ${describeToken(separator)}`,
          separator.position,
          { expected: 'Space', found: separator },
        );
      }
      this.tokens.advance();

      scope.define(name, this.expression(scope));

      const next = this.tokens.current;
      if (next.kind !== 'CloseParen') {
        this.expect('Space', `after the value of '${name}'`);
      }
    }

    const bodyStart = this.tokens.current;
    if (bodyStart.kind === 'CloseParen') {
      throw new SprigSyntaxError('let form has no body expression', bodyStart.position, {
        found: bodyStart,
      });
    }

    const result = this.expression(scope);
    this.expect('CloseParen', "to close 'let'");
    return result;
  }
}

/**
 * Evaluates Sprig expressions. Holds configuration only; every call to
 * `evaluate` starts from a fresh lexer and root environment.
 */
export class Interpreter {
  private readonly options: InterpreterOptions;

  constructor(options?: Partial<InterpreterOptions>) {
    this.options = resolveOptions(options);
  }

  getOptions(): InterpreterOptions {
    return { ...this.options };
  }

  /**
   * Evaluate one expression, throwing the first error encountered.
   */
  evaluate(source: string): number {
    return new Evaluation(source, this.options.maxDepth).run();
  }

  /**
   * Evaluate one expression, returning the outcome instead of throwing.
   */
  tryEvaluate(source: string): EvaluationOutcome {
    try {
      return { ok: true, value: this.evaluate(source) };
    } catch (e) {
      if (e instanceof SprigError) {
        return { ok: false, error: e };
      }
      throw e;
    }
  }
}

export function evaluate(source: string, options?: Partial<InterpreterOptions>): number {
  return new Interpreter(options).evaluate(source);
}

export function tryEvaluate(source: string, options?: Partial<InterpreterOptions>): EvaluationOutcome {
  return new Interpreter(options).tryEvaluate(source);
}

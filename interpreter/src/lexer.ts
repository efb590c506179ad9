/**
 * Demand-driven tokenizer for Sprig source.
 *
 * Spaces are real tokens: the grammar requires exactly one space between
 * sub-expressions, so the lexer never skips them.
 */

import { SprigSyntaxError } from './errors';
import { Token, mkToken } from './tokens';

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && ((ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z'));
}

export class Lexer {
  private readonly source: string;
  private pos = 0;

  constructor(source: string) {
    this.source = source;
  }

  /** Offset of the next unread character. */
  get position(): number {
    return this.pos;
  }

  /**
   * Read the next token and advance past it.
   */
  next(): Token {
    const start = this.pos;
    if (start >= this.source.length) {
      return mkToken('EndOfFile', '', start);
    }

    const ch = this.source[start];

    if (ch === ' ') {
      this.pos++;
      return mkToken('Space', ' ', start);
    }
    if (ch === '(') {
      this.pos++;
      return mkToken('OpenParen', '(', start);
    }
    if (ch === ')') {
      this.pos++;
      return mkToken('CloseParen', ')', start);
    }

    if (isDigit(ch) || (ch === '-' && isDigit(this.source[start + 1]))) {
      this.pos++;
      while (isDigit(this.source[this.pos])) this.pos++;
      return mkToken('Integer', this.source.slice(start, this.pos), start);
    }

    if (isLetter(ch)) {
      this.pos++;
      while (isLetter(this.source[this.pos]) || isDigit(this.source[this.pos])) this.pos++;
      return mkToken('Identifier', this.source.slice(start, this.pos), start);
    }

    throw new SprigSyntaxError(`unexpected character '${ch}'`, start);
  }
}

/**
 * Token cursor with one token of lookahead.
 *
 * `peek()` lexes the following token once and holds it back; the next
 * `advance()` hands it out instead of lexing again.
 */
export class TokenStream {
  private readonly lexer: Lexer;
  private currentToken: Token;
  private heldBack: Token | null = null;

  constructor(source: string) {
    this.lexer = new Lexer(source);
    this.currentToken = this.lexer.next();
  }

  get current(): Token {
    return this.currentToken;
  }

  peek(): Token {
    if (this.heldBack === null) {
      this.heldBack = this.lexer.next();
    }
    return this.heldBack;
  }

  advance(): void {
    if (this.heldBack !== null) {
      this.currentToken = this.heldBack;
      this.heldBack = null;
    } else {
      this.currentToken = this.lexer.next();
    }
  }
}

/**
 * Lex the whole input, including the trailing EndOfFile token.
 */
export function tokenize(source: string): Token[] {
  const lexer = new Lexer(source);
  const tokens: Token[] = [];
  for (;;) {
    const token = lexer.next();
    tokens.push(token);
    if (token.kind === 'EndOfFile') return tokens;
  }
}

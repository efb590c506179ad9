/**
 * Token definitions shared by the lexer, interpreter and tooling.
 */

export type TokenKind =
  | 'OpenParen'
  | 'CloseParen'
  | 'Identifier'
  | 'Integer'
  | 'Space'
  | 'EndOfFile';

export interface Token {
  readonly kind: TokenKind;
  /** Source lexeme; empty for EndOfFile */
  readonly text: string;
  /** 0-based offset of the first character */
  readonly position: number;
}

export function mkToken(kind: TokenKind, text: string, position: number): Token {
  return { kind, text, position };
}

/**
 * Human-readable form of a token for error messages.
 */
export function describeToken(token: Token): string {
  switch (token.kind) {
    case 'Identifier':
    case 'Integer':
      return `${token.kind} '${token.text}'`;
    case 'EndOfFile':
      return 'end of input';
    default:
      return token.kind;
  }
}

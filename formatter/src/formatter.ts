/**
 * Sprig code formatter.
 *
 * Rewrites whitespace into the one shape the grammar accepts: single spaces
 * between sub-expressions, none just inside parentheses. Token text is never
 * changed.
 */

import { tokenize } from '../../interpreter/src/lexer';
import { Token } from '../../interpreter/src/tokens';
import { SprigError } from '../../interpreter/src/errors';
import { isCommentLine } from '../../interpreter/src/source';

export interface FormatOptions {
  /** Longest run of blank lines kept between expressions (default: 1) */
  maxBlankLines: number;
}

const DEFAULT_OPTIONS: FormatOptions = {
  maxBlankLines: 1,
};

export class FormatError extends SprigError {
  public readonly line: number;
  public readonly original: SprigError;

  constructor(line: number, cause: SprigError) {
    super(`FormatError [line ${line}]: ${cause.message}`);
    this.name = 'FormatError';
    this.line = line;
    this.original = cause;
  }
}

function needsSeparator(prev: Token, next: Token): boolean {
  return prev.kind !== 'OpenParen' && next.kind !== 'CloseParen';
}

/**
 * Format a single expression. Any whitespace (including tabs and newlines)
 * counts as a separator. Error positions refer to the whitespace-collapsed
 * text.
 */
export function formatExpression(source: string): string {
  const collapsed = source.replace(/\s+/g, ' ').trim();
  const tokens = tokenize(collapsed).filter(t => t.kind !== 'Space' && t.kind !== 'EndOfFile');

  let out = '';
  let prev: Token | null = null;
  for (const token of tokens) {
    if (prev !== null && needsSeparator(prev, token)) out += ' ';
    out += token.text;
    prev = token;
  }
  return out;
}

/**
 * Format a `.sprig` file: one expression per line, comment lines kept.
 */
export function format(source: string, options?: Partial<FormatOptions>): string {
  const opts: FormatOptions = { ...DEFAULT_OPTIONS, ...options };
  const output: string[] = [];
  let blanks = 0;

  source.split(/\r?\n/).forEach((text, i) => {
    if (text.trim() === '') {
      blanks++;
      return;
    }
    if (output.length > 0) {
      for (let n = 0; n < Math.min(blanks, opts.maxBlankLines); n++) output.push('');
    }
    blanks = 0;

    if (isCommentLine(text)) {
      output.push(text.trim());
      return;
    }
    try {
      output.push(formatExpression(text));
    } catch (e) {
      if (e instanceof SprigError) throw new FormatError(i + 1, e);
      throw e;
    }
  });

  return output.length > 0 ? output.join('\n') + '\n' : '';
}

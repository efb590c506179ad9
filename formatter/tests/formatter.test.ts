/**
 * Tests for the Sprig formatter and its CLI.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FormatError, format, formatExpression } from '../src/formatter';
import { FormatterIO, runFormatter } from '../src/cli';
import { SprigSyntaxError } from '../../interpreter/src/errors';
import { evaluate } from '../../interpreter/src/interpreter';

describe('formatExpression', () => {
  test('collapses whitespace and trims inside parens', () => {
    expect(formatExpression('( add   1\n\t2 )')).toBe('(add 1 2)');
  });

  test('separates adjacent sub-expressions', () => {
    expect(formatExpression('(add (mult 2 3)(add 1 1))')).toBe('(add (mult 2 3) (add 1 1))');
    expect(formatExpression('(let x 2 y(add x 1)y)')).toBe('(let x 2 y (add x 1) y)');
  });

  test('leaves canonical input unchanged', () => {
    const canonical = '(let x 2 y 3 (mult x y))';
    expect(formatExpression(canonical)).toBe(canonical);
  });

  test('keeps negative literals intact', () => {
    expect(formatExpression('(add  -1  -22)')).toBe('(add -1 -22)');
  });

  test('output is accepted by the interpreter', () => {
    expect(evaluate(formatExpression('  ( let  x 2\n  (add x  3) )'))).toBe(5);
  });

  test('lexical errors propagate', () => {
    expect(() => formatExpression('(add 1 +)')).toThrow(SprigSyntaxError);
  });
});

describe('format', () => {
  test('formats each line and keeps comments', () => {
    expect(format('; header\n\n\n(add  1 2)\n   \n42')).toBe('; header\n\n(add 1 2)\n\n42\n');
  });

  test('drops leading and trailing blank lines', () => {
    expect(format('\n\n42\n\n')).toBe('42\n');
  });

  test('respects maxBlankLines', () => {
    expect(format('1\n\n2', { maxBlankLines: 0 })).toBe('1\n2\n');
    expect(format('1\n\n\n\n2', { maxBlankLines: 2 })).toBe('1\n\n\n2\n');
  });

  test('empty input stays empty', () => {
    expect(format('')).toBe('');
  });

  test('errors carry the line number', () => {
    let error: unknown;
    try {
      format('42\n(add 1 $)');
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(FormatError);
    if (error instanceof FormatError) {
      expect(error.line).toBe(2);
      expect(error.original).toBeInstanceOf(SprigSyntaxError);
      expect(error.message).toBe("FormatError [line 2]: SyntaxError [position 7]: unexpected character '$'");
    }
  });
});

describe('runFormatter', () => {
  let dir: string;
  let logs: string[];
  let errors: string[];
  let written: string;
  let io: FormatterIO;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'sprig-fmt-'));
    logs = [];
    errors = [];
    written = '';
    io = {
      log: line => logs.push(line),
      error: line => errors.push(line),
      write: text => {
        written += text;
      },
    };
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeFile(name: string, contents: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents, 'utf-8');
    return file;
  }

  test('rewrites an unformatted file in place', () => {
    const file = writeFile('a.sprig', '(add  1 2)');
    expect(runFormatter([file], io)).toBe(0);
    expect(fs.readFileSync(file, 'utf-8')).toBe('(add 1 2)\n');
    expect(logs).toEqual([`Formatted: ${file}`]);
  });

  test('leaves a formatted file alone', () => {
    const file = writeFile('b.sprig', '(add 1 2)\n');
    expect(runFormatter([file], io)).toBe(0);
    expect(logs).toEqual([`Unchanged: ${file}`]);
  });

  test('--check reports without writing', () => {
    const file = writeFile('c.sprig', '( mult 2 3 )');
    expect(runFormatter(['--check', file], io)).toBe(1);
    expect(logs).toEqual([`Would reformat: ${file}`]);
    expect(fs.readFileSync(file, 'utf-8')).toBe('( mult 2 3 )');
  });

  test('--stdout prints the formatted source', () => {
    const file = writeFile('d.sprig', '(let x 1\tx)');
    expect(runFormatter(['--stdout', file], io)).toBe(0);
    expect(written).toBe('(let x 1 x)\n');
  });

  test('missing files and bad options fail', () => {
    expect(runFormatter([path.join(dir, 'missing.sprig')], io)).toBe(1);
    expect(runFormatter(['--bogus'], io)).toBe(1);
    expect(errors).toEqual([
      `Error: File not found: ${path.join(dir, 'missing.sprig')}`,
      'Unknown option: --bogus',
    ]);
  });

  test('--max-blank takes a whole non-negative number', () => {
    const file = writeFile('f.sprig', '1\n\n\n2');
    for (const bad of ['3abc', '1.5', '-1', '']) {
      expect(runFormatter(['--max-blank', bad, file], io)).toBe(1);
    }
    expect(errors).toEqual(Array(4).fill('Error: --max-blank must be a non-negative number'));
    expect(fs.readFileSync(file, 'utf-8')).toBe('1\n\n\n2');

    expect(runFormatter(['--max-blank', '2', '--stdout', file], io)).toBe(0);
    expect(written).toBe('1\n\n\n2\n');
  });

  test('syntax errors fail the run', () => {
    const file = writeFile('e.sprig', '(add 1 #)');
    expect(runFormatter([file], io)).toBe(1);
    expect(errors).toEqual([
      `Error formatting ${file}: FormatError [line 1]: SyntaxError [position 7]: unexpected character '#'`,
    ]);
  });

  test('--help prints usage', () => {
    expect(runFormatter(['--help'], io)).toBe(0);
    expect(logs[0]).toBe('Sprig Formatter v0.1.0');
  });
});

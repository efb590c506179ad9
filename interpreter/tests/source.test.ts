import { evaluateSource, expressionLines, isCommentLine } from '../src/source';
import { Interpreter } from '../src/interpreter';

describe('expressionLines', () => {
  test('skips blank and comment lines and keeps line numbers', () => {
    expect(expressionLines('; totals\n\n(add 1 2)\r\n42\n')).toEqual([
      { line: 3, text: '(add 1 2)' },
      { line: 4, text: '42' },
    ]);
  });

  test('indented comments are comments', () => {
    expect(isCommentLine('   ; note')).toBe(true);
    expect(isCommentLine('(add 1 2) ; note')).toBe(false);
  });
});

describe('evaluateSource', () => {
  test('evaluates each line independently', () => {
    const results = evaluateSource('(let x 4 x)\nx\n(mult 3 3)', new Interpreter());

    expect(results.map(r => r.line)).toEqual([1, 2, 3]);
    expect(results[0].outcome).toEqual({ ok: true, value: 4 });
    expect(results[1].outcome.ok).toBe(false);
    expect(results[2].outcome).toEqual({ ok: true, value: 9 });
  });
});

/**
 * Sprig REPL: interactive read-eval-print loop.
 *
 * Usage: sprig repl
 *
 * Features:
 *   - Each input is evaluated on its own; nothing carries over between inputs
 *   - Multi-line input while parentheses are unclosed
 *   - Special commands: :help, :quit, :clear, :tokens, :depth
 *   - Errors are printed and the loop continues
 */

import * as readline from 'readline';
import { Interpreter } from './interpreter';
import { SprigError } from './errors';
import { tokenize } from './lexer';
import { describeToken } from './tokens';

const VERSION = '0.1.0';

export type ReplAction = 'continue' | 'more' | 'quit' | 'clear';

export interface ReplResponse {
  action: ReplAction;
  /** Lines for stdout */
  output: string[];
  /** Lines for stderr */
  errors: string[];
}

/**
 * Count unmatched opening parentheses.
 */
export function openParenDepth(input: string): number {
  let depth = 0;
  for (const ch of input) {
    if (ch === '(') depth++;
    else if (ch === ')') depth--;
  }
  return depth;
}

/**
 * Line-at-a-time REPL logic, independent of the terminal.
 */
export class ReplSession {
  private readonly interpreter: Interpreter;
  private buffer: string[] = [];

  constructor(interpreter: Interpreter) {
    this.interpreter = interpreter;
  }

  get continuing(): boolean {
    return this.buffer.length > 0;
  }

  handleLine(line: string): ReplResponse {
    const trimmed = line.trim();

    if (!this.continuing && trimmed.startsWith(':')) {
      return this.handleCommand(trimmed);
    }

    if (trimmed !== '') this.buffer.push(trimmed);
    const input = this.buffer.join(' ');

    if (openParenDepth(input) > 0) {
      return { action: 'more', output: [], errors: [] };
    }

    this.buffer = [];
    if (input === '') {
      return { action: 'continue', output: [], errors: [] };
    }

    const outcome = this.interpreter.tryEvaluate(input);
    if (outcome.ok) {
      return { action: 'continue', output: [`=> ${outcome.value}`], errors: [] };
    }
    return { action: 'continue', output: [], errors: [`  ${outcome.error.message}`] };
  }

  private handleCommand(cmd: string): ReplResponse {
    const parts = cmd.split(/\s+/);
    const command = parts[0];
    const ok = (output: string[]): ReplResponse => ({ action: 'continue', output, errors: [] });

    switch (command) {
      case ':help':
      case ':h':
        return ok([
          '',
          'REPL Commands:',
          '  :help, :h         Show this help message',
          '  :quit, :q         Exit the REPL',
          '  :tokens <expr>    Show the tokens of an expression',
          '  :depth            Show the nesting limit',
          '  :clear            Clear the screen',
          '',
          'Forms: (add a b), (mult a b), (let name value ... body)',
          'Separate sub-expressions with exactly one space.',
          '',
        ]);

      case ':quit':
      case ':q':
      case ':exit':
        return { action: 'quit', output: [], errors: [] };

      case ':clear':
        return { action: 'clear', output: [], errors: [] };

      case ':depth':
        return ok([`maxDepth = ${this.interpreter.getOptions().maxDepth}`]);

      case ':tokens': {
        const expr = cmd.slice(command.length).trim();
        if (!expr) return ok(['Usage: :tokens <expression>']);
        try {
          return ok(
            tokenize(expr).map(t => `  ${String(t.position).padStart(3)}  ${describeToken(t)}`),
          );
        } catch (e) {
          if (e instanceof SprigError) {
            return { action: 'continue', output: [], errors: [`  ${e.message}`] };
          }
          throw e;
        }
      }

      default:
        return ok([`Unknown command: ${command}. Type :help for available commands.`]);
    }
  }
}

/**
 * Start the Sprig REPL on stdin/stdout.
 */
export function startRepl(interpreter: Interpreter): void {
  const session = new ReplSession(interpreter);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'sprig> ',
    terminal: true,
  });

  console.log(`Sprig REPL v${VERSION}`);
  console.log('Type :help for commands, :quit to exit.\n');

  rl.prompt();

  rl.on('line', (line: string) => {
    const response = session.handleLine(line);
    for (const out of response.output) console.log(out);
    for (const err of response.errors) console.error(err);

    switch (response.action) {
      case 'quit':
        rl.close();
        return;
      case 'clear':
        console.clear();
        break;
      case 'more':
        process.stdout.write('  ... ');
        return;
    }
    rl.prompt();
  });

  rl.on('close', () => {
    console.log('\nGoodbye!');
    process.exit(0);
  });
}

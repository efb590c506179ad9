/**
 * Command-line argument parsing for the `sprig` entry point.
 */

export type Command =
  | { kind: 'help' }
  | { kind: 'fmt'; args: string[] }
  | { kind: 'repl' }
  | { kind: 'demo' }
  | { kind: 'eval'; expression: string }
  | { kind: 'run'; file: string }
  | { kind: 'usage-error'; message: string };

export function parseCommand(args: string[]): Command {
  const [first, second] = args;

  switch (first) {
    case undefined:
    case '--help':
    case '-h':
      return { kind: 'help' };
    case 'fmt':
      return { kind: 'fmt', args: args.slice(1) };
    case 'repl':
      return { kind: 'repl' };
    case 'demo':
      return { kind: 'demo' };
    case '--eval':
    case '-e':
      if (second === undefined) {
        return { kind: 'usage-error', message: 'Error: --eval requires an expression argument' };
      }
      return { kind: 'eval', expression: second };
    case 'run':
      if (second === undefined) {
        return { kind: 'usage-error', message: 'Error: run requires a file argument' };
      }
      return { kind: 'run', file: second };
    default:
      // `sprig <file>` shorthand
      return { kind: 'run', file: first };
  }
}

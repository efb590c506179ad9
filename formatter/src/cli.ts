/**
 * Command-line handling shared by `sprig-fmt` and `sprig fmt`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { format, FormatOptions } from './formatter';
import { SprigError } from '../../interpreter/src/errors';

export interface FormatterIO {
  log: (line: string) => void;
  error: (line: string) => void;
  write: (text: string) => void;
}

const consoleIO: FormatterIO = {
  log: line => console.log(line),
  error: line => console.error(line),
  write: text => process.stdout.write(text),
};

export function printFormatterUsage(io: FormatterIO = consoleIO): void {
  io.log('Sprig Formatter v0.1.0');
  io.log('');
  io.log('Usage:');
  io.log('  sprig fmt <file.sprig> [options]');
  io.log('');
  io.log('Options:');
  io.log('  --check              Check if files are formatted (exit 1 if not)');
  io.log('  --stdout             Print formatted output to stdout');
  io.log('  --max-blank <n>      Longest run of blank lines to keep (default: 1)');
  io.log('  --help, -h           Show this help');
}

/**
 * Run the formatter over the given arguments. Returns the exit code.
 */
export function runFormatter(args: string[], io: FormatterIO = consoleIO): number {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printFormatterUsage(io);
    return 0;
  }

  let check = false;
  let toStdout = false;
  const options: Partial<FormatOptions> = {};
  const files: string[] = [];

  for (let i = 0; i < args.length; i++) {
    switch (args[i]) {
      case '--check':
        check = true;
        break;
      case '--stdout':
        toStdout = true;
        break;
      case '--max-blank': {
        const raw = args[++i] ?? '';
        const n = raw.trim() === '' ? NaN : Number(raw);
        if (!Number.isInteger(n) || n < 0) {
          io.error('Error: --max-blank must be a non-negative number');
          return 1;
        }
        options.maxBlankLines = n;
        break;
      }
      default:
        if (args[i].startsWith('-')) {
          io.error(`Unknown option: ${args[i]}`);
          return 1;
        }
        files.push(args[i]);
        break;
    }
  }

  if (files.length === 0) {
    io.error('Error: no files specified');
    return 1;
  }

  let allFormatted = true;

  for (const file of files) {
    const resolved = path.resolve(file);
    if (!fs.existsSync(resolved)) {
      io.error(`Error: File not found: ${resolved}`);
      return 1;
    }

    const source = fs.readFileSync(resolved, 'utf-8');

    let formatted: string;
    try {
      formatted = format(source, options);
    } catch (e) {
      if (e instanceof SprigError) {
        io.error(`Error formatting ${file}: ${e.message}`);
        return 1;
      }
      throw e;
    }

    if (check) {
      if (source !== formatted) {
        io.log(`Would reformat: ${file}`);
        allFormatted = false;
      } else {
        io.log(`Already formatted: ${file}`);
      }
    } else if (toStdout) {
      io.write(formatted);
    } else if (source !== formatted) {
      fs.writeFileSync(resolved, formatted, 'utf-8');
      io.log(`Formatted: ${file}`);
    } else {
      io.log(`Unchanged: ${file}`);
    }
  }

  return check && !allFormatted ? 1 : 0;
}

#!/usr/bin/env node
/**
 * Sprig formatter CLI entry point.
 *
 * Usage:
 *   sprig-fmt <file.sprig>            Format a file in-place
 *   sprig-fmt <file.sprig> --check    Check if file is formatted (exit 1 if not)
 *   sprig-fmt <file.sprig> --stdout   Print formatted output to stdout
 */

import { runFormatter } from './cli';

process.exit(runFormatter(process.argv.slice(2)));

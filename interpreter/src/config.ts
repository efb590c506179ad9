/**
 * Interpreter configuration.
 *
 * Sources, lowest precedence first: built-in defaults, `sprig.config.json`
 * in the working directory, then environment variables.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { SprigError } from './errors';

export const CONFIG_FILENAME = 'sprig.config.json';

/** Largest accepted `maxDepth`; each nesting level costs about four stack frames. */
export const MAX_DEPTH_LIMIT = 2000;

const maxDepth = z.number().int().positive().max(MAX_DEPTH_LIMIT);

const optionsSchema = z
  .object({
    /** Maximum expression nesting before evaluation aborts */
    maxDepth,
  })
  .strict();

export type InterpreterOptions = z.infer<typeof optionsSchema>;

const fileSchema = optionsSchema.partial();

const envSchema = z.object({
  SPRIG_MAX_DEPTH: z.coerce.number().int().positive().max(MAX_DEPTH_LIMIT).optional(),
});

export const DEFAULT_OPTIONS: InterpreterOptions = {
  maxDepth: 1000,
};

export class ConfigError extends SprigError {
  constructor(source: string, problems: string[]) {
    super(`ConfigError: invalid configuration in ${source}: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate caller-supplied overrides and merge them over the defaults.
 */
export function resolveOptions(overrides?: Partial<InterpreterOptions>): InterpreterOptions {
  const parsed = fileSchema.safeParse(overrides ?? {});
  if (!parsed.success) {
    throw new ConfigError('interpreter options', describeIssues(parsed.error));
  }
  return { ...DEFAULT_OPTIONS, ...parsed.data };
}

function readConfigFile(cwd: string): Partial<InterpreterOptions> {
  const configPath = path.join(cwd, CONFIG_FILENAME);
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(CONFIG_FILENAME, [`not valid JSON (${reason})`]);
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(CONFIG_FILENAME, describeIssues(parsed.error));
  }
  return parsed.data;
}

function readEnv(env: NodeJS.ProcessEnv): Partial<InterpreterOptions> {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('environment', describeIssues(parsed.error));
  }
  const options: Partial<InterpreterOptions> = {};
  if (parsed.data.SPRIG_MAX_DEPTH !== undefined) {
    options.maxDepth = parsed.data.SPRIG_MAX_DEPTH;
  }
  return options;
}

/**
 * Load the effective interpreter options for a working directory.
 */
export function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): InterpreterOptions {
  return { ...DEFAULT_OPTIONS, ...readConfigFile(cwd), ...readEnv(env) };
}

/**
 * Command-line argument parsing.
 *
 * Flags take `--name=value` or `--name value`; a flag followed by another
 * flag, or by nothing, is boolean.
 */

import { StrataError, validationError } from '../domain/errors';

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

/** Flags that never take a value. */
const BOOLEAN_FLAGS = new Set(['dry-run', 'simulate', 'verbose', 'shell', 'json', 'help']);

export function parseArgs(args: string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h') {
      flags.set('help', true);
    } else if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq !== -1) {
        flags.set(body.slice(0, eq), body.slice(eq + 1));
      } else if (!BOOLEAN_FLAGS.has(body) && i + 1 < args.length && !args[i + 1].startsWith('--')) {
        flags.set(body, args[++i]);
      } else {
        flags.set(body, true);
      }
    } else {
      positionals.push(arg);
    }
  }
  return { positionals, flags };
}

export function flagString(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

export function flagBoolean(args: ParsedArgs, name: string): boolean {
  return args.flags.get(name) === true;
}

/**
 * A positive integer flag, or undefined when absent.
 *
 * @throws StrataError (VALIDATION.SCHEMA) for anything else
 */
export function flagInt(args: ParsedArgs, name: string, min = 1): number | undefined {
  const value = args.flags.get(name);
  if (value === undefined) return undefined;
  const parsed = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new StrataError(validationError(`--${name} must be an integer >= ${min}`, { flag: name }));
  }
  return parsed;
}

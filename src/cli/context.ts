/**
 * Shared command context.
 */

import * as path from 'path';
import { ProvisioningHost } from '../adapters/host/interface';
import { ShellHost } from '../adapters/host/shell-host';
import { SimulatedHost } from '../adapters/host/simulated-host';
import { StrataConfig, loadConfig } from '../config';
import { StrataError, TypedError, toTypedError } from '../domain/errors';
import { LogLevel, setLogLevel } from '../logger';
import { ParsedArgs, flagBoolean, flagInt } from './args';
import { CliIo, colorize, formatError } from './output';

export interface CliContext {
  io: CliIo;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Host for every command; otherwise chosen from the flags. */
  host?: ProvisioningHost;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_MALFORMED_SPEC = 2;

/** Environment configuration with command-line overrides applied. */
export function resolveConfig(args: ParsedArgs, ctx: CliContext): StrataConfig {
  const config = loadConfig(ctx.env);
  const retries = flagInt(args, 'retries', 0);
  const parallel = flagInt(args, 'parallel');
  const port = flagInt(args, 'port', 0);

  if (flagBoolean(args, 'verbose')) {
    setLogLevel(LogLevel.Debug);
  } else {
    setLogLevel(ctx.env.STRATA_LOG_LEVEL ? config.logLevel : LogLevel.Warn);
  }

  return {
    ...config,
    retries: retries ?? config.retries,
    parallel: parallel ?? config.parallel,
    port: port ?? config.port,
  };
}

/** The injected host, the simulated host under --simulate, else the shell host. */
export function resolveHost(args: ParsedArgs, ctx: CliContext): ProvisioningHost {
  if (ctx.host) return ctx.host;
  return flagBoolean(args, 'simulate') ? new SimulatedHost() : new ShellHost({ cwd: ctx.cwd });
}

export function resolvePath(ctx: CliContext, file: string): string {
  return path.resolve(ctx.cwd, file);
}

/** Print an error and its hints. */
export function reportError(ctx: CliContext, err: unknown): TypedError {
  const error = err instanceof StrataError ? err.typedError : toTypedError(err);
  for (const line of formatError(error)) ctx.io.err(line);
  const nested = error.details?.errors;
  if (Array.isArray(nested)) {
    for (const entry of nested) {
      if (typeof entry === 'object' && entry !== null && 'message' in entry && typeof entry.message === 'string') {
        ctx.io.err(`  - ${entry.message}`);
      }
    }
  }
  return error;
}

export function reportWarnings(ctx: CliContext, warnings: string[]): void {
  for (const warning of warnings) {
    ctx.io.err(`${colorize('yellow', '!')} ${warning}`);
  }
}

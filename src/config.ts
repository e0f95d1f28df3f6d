/**
 * Runtime configuration.
 *
 * Read from environment variables with defaults. CLI flags and API options
 * override individual fields.
 */

import { ActionKind } from './domain/step';
import { TypedError, validationError } from './domain/errors';
import { LogLevel } from './logger';

export interface StrataConfig {
  logLevel: LogLevel;
  /** Retries after the first attempt for retryable action kinds; 0 disables retrying. */
  retries: number;
  /** Worker pool size; 1 means sequential. */
  parallel: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  timeouts: Record<ActionKind, number>;
  port: number;
}

export const DEFAULT_TIMEOUTS: Record<ActionKind, number> = {
  [ActionKind.InstallPackage]: 600_000,
  [ActionKind.CreateInterpreterEnv]: 600_000,
  [ActionKind.MutatePathVariable]: 30_000,
  [ActionKind.FetchArtifact]: 300_000,
  [ActionKind.SetPermission]: 30_000,
};

export const DEFAULT_CONFIG: StrataConfig = {
  logLevel: LogLevel.Info,
  retries: 3,
  parallel: 1,
  backoffBaseMs: 500,
  backoffMaxMs: 30_000,
  timeouts: DEFAULT_TIMEOUTS,
  port: 5000,
};

export class ConfigError extends Error {
  constructor(public readonly errors: TypedError[]) {
    super(errors.map((e) => e.message).join('; '));
    this.name = 'ConfigError';
  }
}

/** Environment variable carrying the timeout of an action kind. */
export function timeoutVariable(kind: ActionKind): string {
  return `STRATA_TIMEOUT_${kind.toUpperCase().replace(/-/g, '_')}_MS`;
}

/**
 * Build configuration from an environment.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): StrataConfig {
  const errors: TypedError[] = [];

  const int = (name: string, fallback: number, min: number): number => {
    const raw = env[name];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      errors.push(validationError(`${name} must be an integer >= ${min}, got "${raw}"`, { variable: name }));
      return fallback;
    }
    return value;
  };

  const timeouts = { ...DEFAULT_TIMEOUTS };
  for (const kind of Object.values(ActionKind)) {
    timeouts[kind] = int(timeoutVariable(kind), DEFAULT_TIMEOUTS[kind], 1);
  }

  const config: StrataConfig = {
    logLevel: parseLogLevel(env.STRATA_LOG_LEVEL, errors),
    retries: int('STRATA_RETRIES', DEFAULT_CONFIG.retries, 0),
    parallel: int('STRATA_PARALLEL', DEFAULT_CONFIG.parallel, 1),
    backoffBaseMs: int('STRATA_BACKOFF_BASE_MS', DEFAULT_CONFIG.backoffBaseMs, 0),
    backoffMaxMs: int('STRATA_BACKOFF_MAX_MS', DEFAULT_CONFIG.backoffMaxMs, 0),
    timeouts,
    port: int('PORT', DEFAULT_CONFIG.port, 0),
  };

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}

function parseLogLevel(raw: string | undefined, errors: TypedError[]): LogLevel {
  if (raw === undefined || raw === '') return DEFAULT_CONFIG.logLevel;
  const level = Object.values(LogLevel).find((l) => l === raw.toLowerCase());
  if (!level) {
    errors.push(
      validationError(`STRATA_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${raw}"`, {
        variable: 'STRATA_LOG_LEVEL',
      }),
    );
    return DEFAULT_CONFIG.logLevel;
  }
  return level;
}

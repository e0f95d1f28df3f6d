import { ActionKind } from '../src/domain/step';
import { ConfigError, DEFAULT_CONFIG, loadConfig, timeoutVariable } from '../src/config';
import { LogLevel } from '../src/logger';

describe('loadConfig', () => {
  test('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      STRATA_LOG_LEVEL: 'DEBUG',
      STRATA_RETRIES: '5',
      STRATA_PARALLEL: '4',
      STRATA_BACKOFF_BASE_MS: '0',
      STRATA_TIMEOUT_FETCH_ARTIFACT_MS: '1500',
      PORT: '8080',
    });

    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.retries).toBe(5);
    expect(config.parallel).toBe(4);
    expect(config.backoffBaseMs).toBe(0);
    expect(config.timeouts[ActionKind.FetchArtifact]).toBe(1500);
    expect(config.timeouts[ActionKind.InstallPackage]).toBe(DEFAULT_CONFIG.timeouts[ActionKind.InstallPackage]);
    expect(config.port).toBe(8080);
  });

  test('names the timeout variable of each kind', () => {
    expect(timeoutVariable(ActionKind.MutatePathVariable)).toBe('STRATA_TIMEOUT_MUTATE_PATH_VARIABLE_MS');
  });

  test('accepts zero retries', () => {
    expect(loadConfig({ STRATA_RETRIES: '0' }).retries).toBe(0);
  });

  test('collects every invalid variable', () => {
    let thrown: unknown;
    try {
      loadConfig({ STRATA_RETRIES: '-1', STRATA_PARALLEL: 'many', STRATA_LOG_LEVEL: 'loud' });
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(ConfigError);
    if (!(thrown instanceof ConfigError)) return;
    expect(thrown.errors.map((e) => e.message)).toEqual([
      'STRATA_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
      'STRATA_RETRIES must be an integer >= 0, got "-1"',
      'STRATA_PARALLEL must be an integer >= 1, got "many"',
    ]);
  });
});

import { LogEntry, LogLevel, createLogger, resetLogging, setLogHandler, setLogLevel } from '../src/logger';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
  });

  afterEach(() => {
    resetLogging();
  });

  test('child loggers merge their context', () => {
    const log = createLogger({ component: 'strata' }).child({ module: 'executor' });
    log.info('Step applied', { stepId: 'jq' });

    expect(entries).toHaveLength(1);
    expect(entries[0].level).toBe(LogLevel.Info);
    expect(entries[0].message).toBe('Step applied');
    expect(entries[0].context).toEqual({ component: 'strata', module: 'executor', stepId: 'jq' });
  });

  test('suppresses messages below the minimum level', () => {
    setLogLevel(LogLevel.Warn);
    const log = createLogger();
    log.debug('hidden');
    log.info('hidden');
    log.warn('shown');
    log.error('shown');

    expect(entries.map((e) => e.level)).toEqual([LogLevel.Warn, LogLevel.Error]);
  });
});

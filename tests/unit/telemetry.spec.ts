import { describe, it, expect, vi, afterEach } from 'vitest';
import { InMemoryMetrics, noopMetrics } from '../../src/adapters/telemetry/metrics.js';
import { ConsoleLogger } from '../../src/adapters/logging/console-logger.js';

describe('InMemoryMetrics', () => {
  it('should count commands, failures and rollbacks', () => {
    const metrics = new InMemoryMetrics();

    metrics.recordCommand('TEXT', 'query', 12);
    metrics.recordCommand('PROCEDURE', 'execute', 8);
    metrics.recordFailure('TEXT', 'queryAsDictionary', 'DuplicateKeyError');
    metrics.recordFailure('TEXT', 'execute', 'DatabaseError');
    metrics.recordFailure('TEXT', 'execute', 'DatabaseError');
    metrics.recordRollback('TEXT', 'execute');

    expect(metrics.snapshot()).toEqual({
      commandsTotal: 2,
      failuresTotal: 3,
      rollbacksTotal: 1,
      durationMsTotal: 20,
      failuresByType: { DuplicateKeyError: 1, DatabaseError: 2 },
    });
  });

  it('should export Prometheus text', () => {
    const metrics = new InMemoryMetrics('app_sql');
    metrics.recordCommand('TEXT', 'query', 5);

    expect(metrics.toPrometheusFormat()).toBe(
      [
        '# HELP app_sql_commands_total Commands that completed successfully',
        '# TYPE app_sql_commands_total counter',
        'app_sql_commands_total 1',
        '# HELP app_sql_failures_total Commands that failed',
        '# TYPE app_sql_failures_total counter',
        'app_sql_failures_total 0',
        '# HELP app_sql_rollbacks_total Transactions rolled back after a failure',
        '# TYPE app_sql_rollbacks_total counter',
        'app_sql_rollbacks_total 0',
        '# HELP app_sql_duration_ms_total Time spent in successful commands, in milliseconds',
        '# TYPE app_sql_duration_ms_total counter',
        'app_sql_duration_ms_total 5',
      ].join('\n') + '\n',
    );
  });

  it('should accept records on the no-op recorder', () => {
    expect(() => noopMetrics.recordCommand('TEXT', 'query', 1)).not.toThrow();
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the minimum level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const logger = new ConsoleLogger('warn');

    logger.info('[SqlCommand] hidden');
    logger.warn('[SqlCommand] shown', 'detail');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[SqlCommand] shown', 'detail');
  });

  it('should write debug output only at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger().debug('[SqlCommand] quiet');
    new ConsoleLogger('debug').debug('[SqlCommand] loud');

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith('[SqlCommand] loud');
  });
});

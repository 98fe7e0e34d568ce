import { describe, it, expect } from 'vitest';
import { loadConfig } from '../../src/main/config.js';
import { ConfigurationError } from '../../src/core/domain/errors/index.js';

describe('loadConfig', () => {
  it('should read the connection string with defaults', () => {
    expect(loadConfig({ DATABASE_URL: 'postgres://localhost/app' })).toEqual({
      connectionString: 'postgres://localhost/app',
      logStatements: false,
    });
  });

  it('should read the optional settings', () => {
    expect(
      loadConfig({
        DATABASE_URL: 'postgres://localhost/app',
        SQL_STATEMENT_TIMEOUT_MS: '2500',
        SQL_LOG_STATEMENTS: 'true',
      }),
    ).toEqual({
      connectionString: 'postgres://localhost/app',
      statementTimeoutMs: 2500,
      logStatements: true,
    });
  });

  it('should accept 1 and 0 as flags', () => {
    expect(loadConfig({ DATABASE_URL: 'postgres://x', SQL_LOG_STATEMENTS: '1' }).logStatements).toBe(true);
    expect(loadConfig({ DATABASE_URL: 'postgres://x', SQL_LOG_STATEMENTS: '0' }).logStatements).toBe(false);
  });

  it('should reject an empty connection string', () => {
    expect(() => loadConfig({ DATABASE_URL: '' })).toThrow(
      'Invalid configuration (DATABASE_URL): DATABASE_URL: DATABASE_URL is required',
    );
  });

  it('should list every offending key', () => {
    try {
      loadConfig({ SQL_STATEMENT_TIMEOUT_MS: 'soon', SQL_LOG_STATEMENTS: 'yes' });
      expect.fail('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect((error as ConfigurationError).keys).toEqual([
        'DATABASE_URL',
        'SQL_STATEMENT_TIMEOUT_MS',
        'SQL_LOG_STATEMENTS',
      ]);
    }
  });

  it('should reject a timeout that is not a positive integer', () => {
    expect(() => loadConfig({ DATABASE_URL: 'postgres://x', SQL_STATEMENT_TIMEOUT_MS: '-5' })).toThrow(
      ConfigurationError,
    );
  });
});

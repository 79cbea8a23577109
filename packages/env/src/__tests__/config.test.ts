import { afterEach, describe, expect, it, vi } from 'vitest';

import { getLogLevel, getTransactionLogPath, loadEnv, resetEnvCache } from '../config.js';

describe('loadEnv', () => {
  it('should apply defaults for unset variables', () => {
    expect(loadEnv({})).toEqual({
      LEDGERLINE_LOG_LEVEL: 'warn',
      LEDGERLINE_TRANSACTION_LOG: 'transactions.log',
      NODE_ENV: 'development',
    });
  });

  it('should accept explicit values', () => {
    const env = loadEnv({
      LEDGERLINE_LOG_LEVEL: 'debug',
      LEDGERLINE_TRANSACTION_LOG: ' logs/run.log ',
      NODE_ENV: 'production',
    });

    expect(env.LEDGERLINE_LOG_LEVEL).toBe('debug');
    expect(env.LEDGERLINE_TRANSACTION_LOG).toBe('logs/run.log');
    expect(env.NODE_ENV).toBe('production');
  });

  it('should report every invalid variable', () => {
    expect(() => loadEnv({ LEDGERLINE_LOG_LEVEL: 'loud', NODE_ENV: 'staging' })).toThrow(
      /Environment validation failed:\n {2}- LEDGERLINE_LOG_LEVEL: .*\n {2}- NODE_ENV: /
    );
  });

  it('should reject a blank transaction log path', () => {
    expect(() => loadEnv({ LEDGERLINE_TRANSACTION_LOG: '   ' })).toThrow('LEDGERLINE_TRANSACTION_LOG');
  });
});

describe('cached getters', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnvCache();
  });

  it('should read process.env once until the cache is reset', () => {
    vi.stubEnv('LEDGERLINE_LOG_LEVEL', 'error');
    resetEnvCache();

    expect(getLogLevel()).toBe('error');

    vi.stubEnv('LEDGERLINE_LOG_LEVEL', 'trace');
    expect(getLogLevel()).toBe('error');

    resetEnvCache();
    expect(getLogLevel()).toBe('trace');
  });

  it('should expose the transaction log path', () => {
    vi.stubEnv('LEDGERLINE_TRANSACTION_LOG', 'out/tx.log');
    resetEnvCache();

    expect(getTransactionLogPath()).toBe('out/tx.log');
  });
});

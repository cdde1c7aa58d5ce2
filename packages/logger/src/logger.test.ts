import { describe, expect, it } from 'vitest';

import { createLogger, isLogLevel, logger, resolveLogLevel } from './logger';

describe('resolveLogLevel', () => {
  it('prefers an explicit LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'trace', NODE_ENV: 'test' })).toBe('trace');
  });

  it('ignores an unknown LOG_LEVEL', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose', NODE_ENV: 'test' })).toBe('silent');
    expect(resolveLogLevel({ LOG_LEVEL: 'verbose', NODE_ENV: 'production' })).toBe('info');
  });

  it('stays silent under test', () => {
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('silent');
  });

  it('defaults to debug in development and info for unknown environments', () => {
    expect(resolveLogLevel({})).toBe('debug');
    expect(resolveLogLevel({ NODE_ENV: 'staging' })).toBe('info');
  });
});

describe('isLogLevel', () => {
  it('accepts the pino level names and silent', () => {
    expect(['trace', 'warn', 'silent', 'verbose', 'WARN', ''].filter(isLogLevel)).toEqual(['trace', 'warn', 'silent']);
  });
});

describe('createLogger', () => {
  it('binds the context name on a child logger', () => {
    const child = createLogger('rate-limiter');

    expect(child.bindings()).toEqual({ context: 'rate-limiter' });
  });

  it('nests contexts under an explicit parent', () => {
    const parent = createLogger('maps-client');
    const child = createLogger('transport', parent);

    expect(child.bindings()).toMatchObject({ context: 'transport' });
    expect(child.level).toBe(logger.level);
  });
});

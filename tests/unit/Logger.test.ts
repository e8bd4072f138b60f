// tests/unit/Logger.test.ts

import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/Logger';

describe('Logger', () => {
  const logger = new Logger({ level: 'debug', format: 'json', silent: true });

  it('should redact accessToken in metadata', () => {
    const redacted = logger['redactSensitive']({
      url: 'https://api.example.test/v1/metric/',
      accessToken: 'test-access',
    });

    expect(redacted.url).toBe('https://api.example.test/v1/metric/');
    expect(redacted.accessToken).toBe('[REDACTED]');
  });

  it('should redact credentials and headers', () => {
    const redacted = logger['redactSensitive']({
      refreshToken: 'test-refresh',
      password: 'test-secret',
      clientSecret: 'test-secret',
      authorization: 'Bearer test-access',
      mode: 'password',
    });

    expect(redacted).toEqual({
      refreshToken: '[REDACTED]',
      password: '[REDACTED]',
      clientSecret: '[REDACTED]',
      authorization: '[REDACTED]',
      mode: 'password',
    });
  });

  it('should redact nested token fields', () => {
    const obtainedAt = new Date('2025-01-01T00:00:00Z');
    const redacted = logger['redactSensitive']({
      version: 3,
      token: {
        accessToken: 'test-access',
        refreshToken: 'test-refresh',
        obtainedAt,
      },
    });

    expect(redacted.version).toBe(3);
    expect(redacted.token).toEqual({
      accessToken: '[REDACTED]',
      refreshToken: '[REDACTED]',
      obtainedAt, // Preserved
    });
  });

  it('should not mutate the caller metadata', () => {
    const meta = { accessToken: 'test-access' };
    logger['redactSensitive'](meta);

    expect(meta.accessToken).toBe('test-access');
  });

  it('should preserve non-sensitive data', () => {
    const data = {
      method: 'GET',
      status: 200,
      attempt: 1,
      waitMs: 245,
    };

    expect(logger['redactSensitive'](data)).toEqual(data);
  });

  it('should not throw when logging', () => {
    expect(() => {
      logger.debug('Debug message', { key: 'value' });
      logger.info('Info message', { key: 'value' });
      logger.warn('Warn message');
      logger.error('Error message', { key: 'value' });
    }).not.toThrow();
  });

  it('should accept the pretty format', () => {
    const pretty = new Logger({ format: 'pretty', silent: true });
    expect(() => pretty.info('hello', { password: 'test-secret' })).not.toThrow();
  });
});

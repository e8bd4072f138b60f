// tests/unit/ConfigValidator.test.ts

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_API_URL,
  DEFAULT_OAUTH_CLIENT_ID,
  buildDefaultHeaders,
  validateConfig,
  validateConfigSafe,
} from '../../src/config/ConfigValidator';
import { ConfigurationError } from '../../src/utils/errors';

describe('ConfigValidator', () => {
  const validConfig = {
    credentials: {
      mode: 'password' as const,
      username: 'ops@example.com',
      password: 'test-secret',
    },
  };

  it('should validate correct configuration and fill defaults', () => {
    const validated = validateConfig(validConfig);

    expect(validated.apiUrl).toBe(DEFAULT_API_URL);
    expect(validated.oauth.clientId).toBe(DEFAULT_OAUTH_CLIENT_ID);
    expect(validated.oauth.clientSecret).toBeUndefined();
    expect(validated.throttleMaxAutoRetryDelayMs).toBe(60_000);
    expect(validated.tokenExpirySkewMs).toBe(30_000);
    expect(validated.customHeaders).toEqual({});
    expect(validated.retry).toEqual({
      rateLimitBaseDelayMs: 1000,
      minDelayMs: 100,
      transientMaxRetries: 3,
      transientBaseDelayMs: 500,
      transientMaxDelayMs: 5000,
      jitterRatio: 0,
      retryableStatusCodes: [500, 502, 503, 504],
    });
    expect(validated.http).toEqual({ timeoutMs: 30_000, authTimeoutMs: 10_000, keepAlive: true });
  });

  it('should accept refresh-token credentials', () => {
    const validated = validateConfig({
      credentials: { mode: 'refreshToken', refreshToken: 'test-refresh' },
      oauth: { clientId: 'custom-client', clientSecret: 'test-secret' },
    });

    expect(validated.credentials).toEqual({ mode: 'refreshToken', refreshToken: 'test-refresh' });
    expect(validated.oauth).toEqual({ clientId: 'custom-client', clientSecret: 'test-secret' });
  });

  it('should reject missing credentials', () => {
    expect(() => validateConfig({})).toThrow(ConfigurationError);
    expect(() => validateConfig({})).toThrow('credentials: Required');
  });

  it('should reject an empty username', () => {
    const result = validateConfigSafe({
      credentials: { mode: 'password', username: '', password: 'test-secret' },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^credentials\.username: /);
    }
  });

  it('should reject an invalid API URL', () => {
    const result = validateConfigSafe({ ...validConfig, apiUrl: 'not-a-url' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual(['apiUrl: Invalid url']);
    }
  });

  it('should reject negative throttle ceiling', () => {
    const result = validateConfigSafe({ ...validConfig, throttleMaxAutoRetryDelayMs: -1 });

    expect(result.success).toBe(false);
  });

  it('should reject transientMaxDelayMs below transientBaseDelayMs', () => {
    const result = validateConfigSafe({
      ...validConfig,
      retry: { transientBaseDelayMs: 2000, transientMaxDelayMs: 1000 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.errors).toEqual([
        'retry: transientMaxDelayMs must be greater than or equal to transientBaseDelayMs',
      ]);
    }
  });

  it('should reject jitter ratios above 0.5', () => {
    const result = validateConfigSafe({ ...validConfig, retry: { jitterRatio: 0.9 } });

    expect(result.success).toBe(false);
  });

  it('should list every problem in the thrown error', () => {
    try {
      validateConfig({ apiUrl: 'nope' });
      expect.unreachable();
    } catch (error: unknown) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.details?.errors).toEqual(['apiUrl: Invalid url', 'credentials: Required']);
      }
    }
  });

  describe('buildDefaultHeaders', () => {
    it('should send the user agent only by default', () => {
      expect(buildDefaultHeaders(validateConfig(validConfig))).toEqual({
        'User-Agent': 'Bleemeo TypeScript Client',
      });
    });

    it('should add the account header and let custom headers override', () => {
      const config = validateConfig({
        ...validConfig,
        accountId: 'account-1',
        customHeaders: { 'User-Agent': 'my-tool/1.0', 'X-Trace': 'on' },
      });

      expect(buildDefaultHeaders(config)).toEqual({
        'User-Agent': 'my-tool/1.0',
        'X-Bleemeo-Account': 'account-1',
        'X-Trace': 'on',
      });
    });
  });
});

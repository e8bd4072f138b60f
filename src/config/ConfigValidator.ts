// src/config/ConfigValidator.ts

import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

export const DEFAULT_API_URL = 'https://api.bleemeo.com';
export const DEFAULT_OAUTH_CLIENT_ID = '1fc6de3e-8750-472e-baea-3ba22bb4eb56';
export const DEFAULT_USER_AGENT = 'Bleemeo TypeScript Client';
export const DEFAULT_THROTTLE_MAX_AUTO_RETRY_DELAY_MS = 60_000;

// Credentials Schema (exactly one mode per client)
const CredentialsSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('password'),
    username: z.string().min(1),
    password: z.string(),
    initialRefreshToken: z.string().min(1).optional(),
  }),
  z.object({
    mode: z.literal('refreshToken'),
    refreshToken: z.string().min(1),
  }),
]);

const OAuthClientSchema = z
  .object({
    clientId: z.string().min(1).default(DEFAULT_OAUTH_CLIENT_ID),
    clientSecret: z.string().min(1).optional(),
  })
  .default({});

// Retry Configuration Schema
const RetryConfigSchema = z
  .object({
    rateLimitBaseDelayMs: z.number().positive().default(1000),
    minDelayMs: z.number().nonnegative().default(100),
    transientMaxRetries: z.number().int().min(0).max(10).default(3),
    transientBaseDelayMs: z.number().positive().default(500),
    transientMaxDelayMs: z.number().positive().default(5000),
    jitterRatio: z.number().min(0).max(0.5).default(0),
    retryableStatusCodes: z
      .array(z.number().int().min(500).max(599))
      .default([500, 502, 503, 504]),
  })
  .default({})
  .refine((data) => data.transientMaxDelayMs >= data.transientBaseDelayMs, {
    message: 'transientMaxDelayMs must be greater than or equal to transientBaseDelayMs',
  });

const HttpConfigSchema = z
  .object({
    timeoutMs: z.number().positive().default(30_000),
    authTimeoutMs: z.number().positive().default(10_000),
    keepAlive: z.boolean().default(true),
    concurrency: z.number().int().positive().optional(),
  })
  .default({});

// Logger Configuration Schema
const LoggerConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
    format: z.enum(['json', 'pretty']).optional(),
    silent: z.boolean().optional(),
  })
  .default({});

// Metrics Configuration Schema
const MetricsConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
  })
  .default({});

// Complete Client Configuration Schema
export const ClientConfigSchema = z.object({
  apiUrl: z.string().url().default(DEFAULT_API_URL),
  accountId: z.string().min(1).optional(),
  credentials: CredentialsSchema,
  oauth: OAuthClientSchema,
  customHeaders: z.record(z.string()).default({}),
  throttleMaxAutoRetryDelayMs: z
    .number()
    .nonnegative()
    .default(DEFAULT_THROTTLE_MAX_AUTO_RETRY_DELAY_MS),
  tokenExpirySkewMs: z.number().nonnegative().default(30_000),
  retry: RetryConfigSchema,
  http: HttpConfigSchema,
  logging: LoggerConfigSchema,
  metrics: MetricsConfigSchema,
});

/** What callers pass in; every key but `credentials` has a default. */
export type ClientOptions = z.input<typeof ClientConfigSchema>;

/** Fully resolved configuration. */
export type ClientConfig = z.output<typeof ClientConfigSchema>;

/**
 * Validate client configuration
 *
 * @throws {ConfigurationError} listing every `path: message` problem
 */
export function validateConfig(config: unknown): ClientConfig {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return result.data;
  }

  const errors = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
  throw new ConfigurationError(`Invalid client configuration: ${errors.join('; ')}`, { errors });
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: ClientConfig } | { success: false; errors: string[] } {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}

/**
 * Headers sent with every API call: the user agent, the account header when
 * an account is selected, then the caller's custom headers on top.
 */
export function buildDefaultHeaders(config: ClientConfig): Record<string, string> {
  const headers: Record<string, string> = { 'User-Agent': DEFAULT_USER_AGENT };
  if (config.accountId) {
    headers['X-Bleemeo-Account'] = config.accountId;
  }
  return { ...headers, ...config.customHeaders };
}

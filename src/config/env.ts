// src/config/env.ts

import type { ClientOptions } from './ConfigValidator';
import { ConfigurationError } from '../utils/errors';

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Build client options from BLEEMEO_* environment variables. Explicit
 * `overrides` win over the environment.
 *
 * @throws {ConfigurationError} when neither a username nor an initial
 * refresh token is available
 */
export function loadConfigFromEnv(
  overrides: Partial<ClientOptions> = {},
  env: Env = process.env
): ClientOptions {
  const username = read(env, 'BLEEMEO_USER');
  const password = read(env, 'BLEEMEO_PASSWORD');
  const initialRefreshToken = read(env, 'BLEEMEO_OAUTH_INITIAL_REFRESH_TOKEN');

  let credentials = overrides.credentials;
  if (!credentials) {
    if (username) {
      credentials = { mode: 'password', username, password: password ?? '', initialRefreshToken };
    } else if (initialRefreshToken) {
      credentials = { mode: 'refreshToken', refreshToken: initialRefreshToken };
    } else {
      throw new ConfigurationError(
        'Either a username or an initial OAuth refresh token must be provided.'
      );
    }
  }

  const clientId = read(env, 'BLEEMEO_OAUTH_CLIENT_ID');
  const clientSecret = read(env, 'BLEEMEO_OAUTH_CLIENT_SECRET');

  return {
    ...overrides,
    apiUrl: overrides.apiUrl ?? read(env, 'BLEEMEO_API_URL'),
    accountId: overrides.accountId ?? read(env, 'BLEEMEO_ACCOUNT_ID'),
    credentials,
    oauth: {
      clientId: overrides.oauth?.clientId ?? clientId,
      clientSecret: overrides.oauth?.clientSecret ?? clientSecret,
    },
  };
}

// tests/helpers/fixtures.ts

import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

export const API_URL = 'https://api.example.test';
export const CLIENT_ID = 'test-client';

export function silentLogger(): Logger {
  return new Logger({ silent: true });
}

export function freshMetrics(): MetricsCollector {
  return new MetricsCollector();
}

/**
 * Token endpoint payload as the API sends it
 */
export function tokenBody(accessToken: string, refreshToken?: string, expiresIn = 36_000) {
  return {
    access_token: accessToken,
    refresh_token: refreshToken,
    expires_in: expiresIn,
    token_type: 'Bearer',
  };
}

/**
 * Resolve with the rejection reason of `promise`; fail if it fulfils.
 */
export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error: unknown) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

// src/core/token/Token.ts

import type { Token } from './types';

export interface TokenInit {
  accessToken: string;
  refreshToken?: string;
  obtainedAt?: Date;
  expiresInMs?: number;
  tokenType?: string;
}

/**
 * A missing or non-positive lifetime means the token has no known expiry.
 */
export function createToken(init: TokenInit): Token {
  const { expiresInMs } = init;
  return Object.freeze({
    accessToken: init.accessToken,
    refreshToken: init.refreshToken,
    obtainedAt: new Date((init.obtainedAt ?? new Date()).getTime()),
    expiresInMs: expiresInMs !== undefined && expiresInMs > 0 ? expiresInMs : Infinity,
    tokenType: init.tokenType,
  });
}

/**
 * The skew is capped at half the token lifetime so that a freshly issued
 * token is never already expired.
 */
export function isTokenExpired(token: Token, now: number, skewMs: number): boolean {
  if (token.expiresInMs === Infinity) return false;
  const skew = Math.min(skewMs, token.expiresInMs / 2);
  return now >= token.obtainedAt.getTime() + token.expiresInMs - skew;
}

export function tokenExpiresAt(token: Token): Date | undefined {
  if (token.expiresInMs === Infinity) return undefined;
  return new Date(token.obtainedAt.getTime() + token.expiresInMs);
}

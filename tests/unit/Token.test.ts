// tests/unit/Token.test.ts

import { describe, it, expect } from 'vitest';
import { createToken, isTokenExpired, tokenExpiresAt } from '../../src/core/token/Token';

const OBTAINED = new Date('2025-01-01T00:00:00Z').getTime();

describe('Token', () => {
  it('should freeze the snapshot', () => {
    const token = createToken({ accessToken: 'a1', refreshToken: 'r1' });

    expect(Object.isFrozen(token)).toBe(true);
  });

  it('should default to a token that never expires', () => {
    const token = createToken({ accessToken: 'a1' });

    expect(token.expiresInMs).toBe(Infinity);
    expect(tokenExpiresAt(token)).toBeUndefined();
    expect(isTokenExpired(token, Date.now() + 10 * 365 * 86_400_000, 30_000)).toBe(false);
  });

  it('should treat a zero or negative lifetime as no expiry', () => {
    const zero = createToken({ accessToken: 'a1', obtainedAt: new Date(OBTAINED), expiresInMs: 0 });
    const negative = createToken({ accessToken: 'a1', obtainedAt: new Date(OBTAINED), expiresInMs: -5 });

    expect(zero.expiresInMs).toBe(Infinity);
    expect(negative.expiresInMs).toBe(Infinity);
    expect(isTokenExpired(zero, OBTAINED, 30_000)).toBe(false);
    expect(tokenExpiresAt(zero)).toBeUndefined();
  });

  it('should copy obtainedAt so later mutation of the input has no effect', () => {
    const obtainedAt = new Date(OBTAINED);
    const token = createToken({ accessToken: 'a1', obtainedAt });

    obtainedAt.setTime(0);

    expect(token.obtainedAt.getTime()).toBe(OBTAINED);
  });

  it('should expire skew milliseconds before the deadline', () => {
    const token = createToken({
      accessToken: 'a1',
      obtainedAt: new Date(OBTAINED),
      expiresInMs: 3_600_000,
    });

    expect(isTokenExpired(token, OBTAINED + 3_569_999, 30_000)).toBe(false);
    expect(isTokenExpired(token, OBTAINED + 3_570_000, 30_000)).toBe(true);
    expect(tokenExpiresAt(token)).toEqual(new Date('2025-01-01T01:00:00Z'));
  });

  it('should cap the skew at half the lifetime', () => {
    const token = createToken({
      accessToken: 'a1',
      obtainedAt: new Date(OBTAINED),
      expiresInMs: 10_000,
    });

    // Skew of 30s would make the token born expired; 5s is applied instead
    expect(isTokenExpired(token, OBTAINED, 30_000)).toBe(false);
    expect(isTokenExpired(token, OBTAINED + 4_999, 30_000)).toBe(false);
    expect(isTokenExpired(token, OBTAINED + 5_000, 30_000)).toBe(true);
  });

  it('should not be expired right after creation', () => {
    const token = createToken({ accessToken: 'a1', expiresInMs: 36_000 });

    expect(isTokenExpired(token, token.obtainedAt.getTime(), 30_000)).toBe(false);
  });
});

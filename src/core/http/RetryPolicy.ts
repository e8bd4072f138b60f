// src/core/http/RetryPolicy.ts

import type {
  ResponseClassification,
  RetryConfig,
  RetryDecision,
  RetryState,
} from './types';

/**
 * Parse a Retry-After header (seconds, possibly fractional, or an HTTP date)
 * into milliseconds. Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? Math.round(seconds * 1000) : undefined;
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Decides whether a failed send is retried and for how long to wait.
 *
 * Rate-limit waits draw on the throttle ceiling; transient server and
 * transport failures have their own retry count and never consume that
 * ceiling. Without jitter every decision is a pure function of
 * (classification, state, now). With `jitterRatio > 0`, a wait `w` becomes
 * `w + floor(w * jitterRatio * random())`, i.e. within `[w, w * (1 + jitterRatio)]`.
 */
export class RetryPolicy {
  constructor(
    private config: RetryConfig,
    private random: () => number = Math.random
  ) {}

  initialState(deadline?: number): RetryState {
    return {
      attempt: 0,
      rateLimitRetries: 0,
      transientRetries: 0,
      throttleWaitMs: 0,
      transientWaitMs: 0,
      deadline,
    };
  }

  classifyResponse(
    status: number,
    headers: Record<string, string>,
    now: number = Date.now()
  ): ResponseClassification {
    if (status < 400) return { kind: 'success' };
    if (status === 401) return { kind: 'unauthorized' };
    if (status === 429) {
      return { kind: 'rateLimited', retryAfterMs: parseRetryAfter(headers['retry-after'], now) };
    }
    if (this.config.retryableStatusCodes.includes(status)) return { kind: 'serverTransientError' };
    if (status < 500) return { kind: 'other4xx' };
    return { kind: 'otherError' };
  }

  decide(classification: ResponseClassification, state: RetryState, now: number): RetryDecision {
    switch (classification.kind) {
      case 'rateLimited': {
        const wait =
          classification.retryAfterMs !== undefined
            ? Math.max(classification.retryAfterMs, this.config.minDelayMs)
            : this.withJitter(
                this.backoff(this.config.rateLimitBaseDelayMs, state.rateLimitRetries)
              );

        if (state.throttleWaitMs + wait > this.config.throttleMaxAutoRetryDelayMs) {
          return { action: 'giveUp', reason: 'ThrottleExceeded' };
        }
        return this.withinDeadline(wait, state, now);
      }

      case 'serverTransientError':
      case 'transportFailure': {
        if (state.transientRetries >= this.config.transientMaxRetries) {
          return { action: 'giveUp', reason: 'RetriesExhausted' };
        }
        const wait = this.withJitter(
          Math.min(
            this.backoff(this.config.transientBaseDelayMs, state.transientRetries),
            this.config.transientMaxDelayMs
          )
        );
        return this.withinDeadline(wait, state, now);
      }

      default:
        return { action: 'giveUp', reason: 'NotRetryable' };
    }
  }

  advance(state: RetryState, classification: ResponseClassification, waitMs: number): RetryState {
    const next: RetryState = { ...state, attempt: state.attempt + 1 };

    if (classification.kind === 'rateLimited') {
      next.rateLimitRetries += 1;
      next.throttleWaitMs += waitMs;
    } else {
      next.transientRetries += 1;
      next.transientWaitMs += waitMs;
    }

    return next;
  }

  get throttleCeilingMs(): number {
    return this.config.throttleMaxAutoRetryDelayMs;
  }

  private backoff(baseDelay: number, retries: number): number {
    return Math.max(baseDelay * Math.pow(2, retries), this.config.minDelayMs);
  }

  private withJitter(wait: number): number {
    if (this.config.jitterRatio <= 0) return wait;
    return wait + Math.floor(wait * this.config.jitterRatio * this.random());
  }

  private withinDeadline(wait: number, state: RetryState, now: number): RetryDecision {
    if (state.deadline !== undefined && now + wait > state.deadline) {
      return { action: 'giveUp', reason: 'DeadlineExceeded' };
    }
    return { action: 'retry', waitMs: wait };
  }
}

// src/core/http/RequestExecutor.ts

import axios from 'axios';
import PQueue from 'p-queue';
import type {
  ExecuteRequest,
  GiveUpReason,
  HttpConfig,
  HttpMethod,
  HttpResponse,
  ResponseClassification,
  RetryState,
} from './types';
import type { Transport } from './transport';
import type { RetryPolicy } from './RetryPolicy';
import type { Authenticator } from '../auth/Authenticator';
import type { TokenStore } from '../token/TokenStore';
import type { Credentials, Token } from '../token/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { CallScope } from './CallScope';
import { isTokenExpired } from '../token/Token';
import type { ApiErrorInit } from '../../utils/errors';
import {
  APIError,
  AuthError,
  BadRequestError,
  ClientClosedError,
  NetworkError,
  RequestTimeoutError,
  ResourceNotFoundError,
  SDKError,
  ThrottleExceededError,
  UnauthorizedError,
} from '../../utils/errors';
import { generateRequestId, withHttpSpan } from '../../observability/tracing';
import { toHeaderRecord } from '../../utils/http';

export interface RequestExecutorOptions {
  apiUrl: string;
  credentials: Credentials;
  defaultHeaders: Record<string, string>;
  http: HttpConfig;
  tokenExpirySkewMs: number;
}

export interface ExecutorDeps {
  transport: Transport;
  authenticator: Authenticator;
  tokens: TokenStore;
  policy: RetryPolicy;
  logger: Logger;
  metrics: MetricsCollector;
}

interface SendOutcome {
  classification: ResponseClassification;
  response?: HttpResponse;
  cause?: string; // Transport failures only
}

const NO_TOKEN = Symbol('no-token');

/**
 * Session core: every resource call funnels through execute().
 *
 * One logical call = token lookup, then send/classify until success or a
 * terminal outcome. A 401 triggers one coordinated refresh and one replay;
 * 429/5xx/transport failures are handed to the RetryPolicy.
 */
export class RequestExecutor {
  private readonly baseUrl: URL;
  private readonly queue?: PQueue;
  // In-flight acquisitions keyed by the token they replace
  private refreshes: Map<Token | typeof NO_TOKEN, Promise<Token>> = new Map();
  private throttledUntil = 0;
  private closed = false;
  // Aborted by close(); every live call scope is linked to it
  private readonly lifetime = new AbortController();

  constructor(
    private options: RequestExecutorOptions,
    private deps: ExecutorDeps
  ) {
    const base = options.apiUrl.endsWith('/') ? options.apiUrl : `${options.apiUrl}/`;
    this.baseUrl = new URL(base);

    if (options.http.concurrency !== undefined) {
      this.queue = new PQueue({ concurrency: options.http.concurrency });
    }
  }

  async execute(request: ExecuteRequest): Promise<HttpResponse> {
    if (this.closed) throw new ClientClosedError();

    const method = request.method ?? 'GET';
    const url = this.buildUrl(request.path);
    const scope = new CallScope(request.signal, request.timeoutMs, this.lifetime.signal);

    this.deps.metrics.adjustGauge('in_flight_requests', 1);
    try {
      return await this.run(request, method, url, scope);
    } finally {
      scope.dispose();
      this.deps.metrics.adjustGauge('in_flight_requests', -1);
    }
  }

  /**
   * Revoke the current refresh token and forget the session
   */
  async logout(): Promise<void> {
    const token = this.deps.tokens.get();
    if (token) {
      await this.deps.authenticator.revoke(token);
    }
    this.deps.tokens.clear();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.lifetime.abort();
    this.deps.tokens.clear();
    this.deps.transport.close();
    this.deps.logger.debug('Request executor closed');
  }

  get isClosed(): boolean {
    return this.closed;
  }

  buildUrl(path: string): string {
    const url = new URL(path, this.baseUrl);
    if (!url.pathname.endsWith('/')) {
      url.pathname = `${url.pathname}/`;
    }
    return url.toString();
  }

  private async run(
    request: ExecuteRequest,
    method: HttpMethod,
    url: string,
    scope: CallScope
  ): Promise<HttpResponse> {
    if (scope.aborted) throw scope.abortError();

    let state = this.deps.policy.initialState(scope.deadline);
    state = await this.waitOutThrottleWindow(state, url, scope);

    let token = await scope.race(this.currentToken());
    let replayed = false;

    for (;;) {
      if (scope.aborted) throw scope.abortError();
      const outcome = await this.send(request, method, url, token, state.attempt, scope);
      const { classification } = outcome;

      if (classification.kind === 'success' && outcome.response) {
        return outcome.response;
      }

      if (classification.kind === 'unauthorized') {
        if (replayed) {
          throw new UnauthorizedError(
            `Authentication failed on ${url}`,
            this.errorInit(outcome, url)
          );
        }
        replayed = true;
        this.deps.logger.info('Access token rejected, refreshing', { url });
        token = await scope.race(this.renewToken(token));
        continue;
      }

      if (classification.kind === 'rateLimited') {
        this.extendThrottleWindow(classification.retryAfterMs);
      }

      const decision = this.deps.policy.decide(classification, state, Date.now());
      if (decision.action === 'giveUp') {
        throw this.terminalError(decision.reason, outcome, method, url, state);
      }

      this.deps.metrics.incrementCounter('http_retries', { classification: classification.kind });
      this.deps.metrics.recordLatency('http_retry_wait', decision.waitMs, {
        classification: classification.kind,
      });
      this.deps.logger.warn('Retrying request', {
        method,
        url,
        classification: classification.kind,
        attempt: state.attempt + 1,
        waitMs: decision.waitMs,
        status: outcome.response?.status,
      });

      state = this.deps.policy.advance(state, classification, decision.waitMs);
      await scope.sleep(decision.waitMs);
    }
  }

  /**
   * A 429 with a Retry-After hint on any call delays the next calls too; the
   * remaining window counts against the caller's throttle ceiling.
   */
  private async waitOutThrottleWindow(
    state: RetryState,
    url: string,
    scope: CallScope
  ): Promise<RetryState> {
    const now = Date.now();
    const remaining = this.throttledUntil - now;
    if (remaining <= 0) return state;

    const classification: ResponseClassification = { kind: 'rateLimited', retryAfterMs: remaining };
    const decision = this.deps.policy.decide(classification, state, now);

    if (decision.action === 'giveUp') {
      const seconds = Math.ceil(remaining / 1000);
      if (decision.reason === 'DeadlineExceeded') {
        throw new RequestTimeoutError(`Throttled for ${seconds}s, beyond the request deadline`, {
          url,
          retryAfterMs: remaining,
        });
      }
      throw new ThrottleExceededError(
        `Throttle error: request must be retried after ${seconds}s`,
        { status: 429, body: null, classification: 'rateLimited', url },
        remaining
      );
    }

    this.deps.logger.info('Waiting out throttle window', { url, waitMs: decision.waitMs });
    await scope.sleep(decision.waitMs);
    return this.deps.policy.advance(state, classification, decision.waitMs);
  }

  private extendThrottleWindow(retryAfterMs: number | undefined): void {
    if (retryAfterMs === undefined) return;
    this.throttledUntil = Math.max(this.throttledUntil, Date.now() + retryAfterMs);
  }

  private async currentToken(): Promise<Token> {
    const token = this.deps.tokens.get();
    if (token && !isTokenExpired(token, Date.now(), this.options.tokenExpirySkewMs)) {
      return token;
    }

    if (token) {
      this.deps.logger.debug('Access token expired, renewing');
    }
    return this.renewToken(token);
  }

  /**
   * Replace `seen` with a fresh token. Callers that observed the same token
   * share one acquisition; its result is installed by compare-and-set and a
   * losing install falls back to whatever the store holds.
   */
  private renewToken(seen: Token | undefined): Promise<Token> {
    const current = this.deps.tokens.get();
    if (current && current !== seen) {
      return Promise.resolve(current);
    }

    const key = seen ?? NO_TOKEN;
    const existing = this.refreshes.get(key);
    if (existing) {
      this.deps.metrics.incrementCounter('token_refresh_dedup');
      this.deps.logger.debug('Token refresh already in progress, waiting');
      return existing;
    }

    const refresh = this.acquire(seen)
      .then((fresh) => {
        if (this.deps.tokens.compareAndSet(seen, fresh)) {
          return fresh;
        }
        return this.deps.tokens.get() ?? fresh;
      })
      .finally(() => {
        this.refreshes.delete(key);
      });

    this.refreshes.set(key, refresh);
    return refresh;
  }

  private async acquire(seen: Token | undefined): Promise<Token> {
    const { credentials } = this.options;
    if (!seen) {
      return this.deps.authenticator.obtain(credentials);
    }

    try {
      return await this.deps.authenticator.refresh(seen);
    } catch (error: unknown) {
      if (!(error instanceof AuthError)) throw error;

      const canFallBack =
        error.reason === 'NoRefreshAvailable' ||
        (error.reason === 'InvalidCredentials' && credentials.mode === 'password');
      if (!canFallBack) throw error;

      this.deps.logger.info('Refresh unavailable, authenticating with credentials', {
        reason: error.reason,
      });
      return this.deps.authenticator.obtain(credentials);
    }
  }

  private async send(
    request: ExecuteRequest,
    method: HttpMethod,
    url: string,
    token: Token,
    attempt: number,
    scope: CallScope
  ): Promise<SendOutcome> {
    const headers: Record<string, string> = {
      ...this.options.defaultHeaders,
      ...request.headers,
      Authorization: `Bearer ${token.accessToken}`,
      'X-Request-ID': generateRequestId(),
    };
    const hasBody = request.body !== undefined;
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }

    this.deps.logger.debug('HTTP request', {
      requestId: headers['X-Request-ID'],
      method,
      url,
      attempt,
      query: request.query,
    });

    return withHttpSpan<SendOutcome>(method, url, attempt, async () => {
      const startTime = Date.now();

      try {
        const response = await this.runThroughQueue(scope, () =>
          this.deps.transport.client.request<string>({
            url,
            method,
            headers,
            params: request.query,
            data: hasBody ? JSON.stringify(request.body) : undefined,
            timeout: this.options.http.timeoutMs,
            signal: scope.signal,
            responseType: 'text',
            validateStatus: () => true,
          })
        );

        this.deps.metrics.incrementCounter('http_requests_total', {
          method,
          status: response.status,
        });
        this.deps.metrics.recordLatency('http_request_duration', Date.now() - startTime, {
          method,
          status: response.status,
        });

        const responseHeaders = toHeaderRecord(response.headers);
        const classification = this.deps.policy.classifyResponse(response.status, responseHeaders);
        const decoded = decodeBody(response.data, responseHeaders['content-type']);

        return {
          classification:
            classification.kind === 'success' && !decoded.ok
              ? { kind: 'malformedResponse' }
              : classification,
          response: { status: response.status, headers: responseHeaders, data: decoded.data },
        };
      } catch (error: unknown) {
        if (scope.aborted) throw scope.abortError();
        if (!axios.isAxiosError(error)) throw error;

        this.deps.metrics.incrementCounter('http_requests_total', { method, status: 'error' });
        this.deps.logger.warn('HTTP transport failure', {
          method,
          url,
          code: error.code,
          error: error.message,
        });
        return { classification: { kind: 'transportFailure' }, cause: error.message };
      }
    });
  }

  /**
   * The wait for a queue slot belongs to the call: an aborted scope leaves
   * the queue at once, and its task releases the slot without sending.
   */
  private async runThroughQueue<T>(scope: CallScope, task: () => Promise<T>): Promise<T> {
    if (!this.queue) return task();
    return scope.race(
      this.queue.add(async () => {
        if (scope.aborted) throw scope.abortError();
        return task();
      })
    );
  }

  private errorInit(outcome: SendOutcome, url: string): ApiErrorInit {
    return {
      status: outcome.response?.status ?? 0,
      body: outcome.response?.data ?? null,
      headers: outcome.response?.headers,
      classification: outcome.classification.kind,
      url,
    };
  }

  private terminalError(
    reason: GiveUpReason,
    outcome: SendOutcome,
    method: HttpMethod,
    url: string,
    state: RetryState
  ): SDKError {
    const response = outcome.response;

    if (reason === 'DeadlineExceeded') {
      return new RequestTimeoutError(`Request ${method} on ${url} would exceed its deadline`, {
        url,
        status: response?.status,
        body: response?.data,
        cause: outcome.cause,
      });
    }

    if (!response) {
      return new NetworkError(`Request ${method} on ${url} failed: ${outcome.cause ?? 'network error'}`, {
        url,
        attempts: state.attempt + 1,
        cause: outcome.cause,
      });
    }

    const init = this.errorInit(outcome, url);
    const { classification } = outcome;

    if (reason === 'ThrottleExceeded' && classification.kind === 'rateLimited') {
      const retryAfter =
        classification.retryAfterMs !== undefined
          ? `${Math.ceil(classification.retryAfterMs / 1000)}s`
          : 'a backoff beyond the allowed delay';
      return new ThrottleExceededError(
        `Throttle error: request must be retried after ${retryAfter}`,
        init,
        classification.retryAfterMs
      );
    }
    if (response.status === 400) {
      return new BadRequestError(`Bad request on ${url}`, init);
    }
    if (response.status === 404) {
      return new ResourceNotFoundError(`Resource ${url} not found`, init);
    }
    if (classification.kind === 'malformedResponse') {
      return new APIError(`Malformed response body from ${method} ${url}`, init);
    }
    return new APIError(
      `Request ${method} on ${url} failed with status ${response.status}`,
      init
    );
  }
}

function decodeBody(raw: string, contentType: string | undefined): { ok: boolean; data: unknown } {
  if (raw === '') return { ok: true, data: null };
  if (!contentType || !/json/i.test(contentType)) return { ok: true, data: raw };

  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, data: raw };
  }
}

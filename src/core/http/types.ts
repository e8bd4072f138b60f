// src/core/http/types.ts

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'PATCH';

export type QueryValue = string | number | boolean;

export interface ExecuteRequest {
  method?: HttpMethod;
  path: string; // Relative to apiUrl, or absolute (pagination links)
  query?: Record<string, QueryValue>;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  timeoutMs?: number; // Bounds the whole logical call, retries included
}

export interface HttpResponse<T = unknown> {
  data: T;
  status: number;
  headers: Record<string, string>;
}

export type ResponseClassification =
  | { kind: 'success' }
  | { kind: 'unauthorized' }
  | { kind: 'rateLimited'; retryAfterMs?: number }
  | { kind: 'serverTransientError' }
  | { kind: 'transportFailure' }
  | { kind: 'other4xx' }
  | { kind: 'otherError' }
  | { kind: 'malformedResponse' };

export type ResponseClassificationKind = ResponseClassification['kind'];

export type GiveUpReason =
  | 'ThrottleExceeded'
  | 'RetriesExhausted'
  | 'DeadlineExceeded'
  | 'NotRetryable';

export type RetryDecision =
  | { action: 'retry'; waitMs: number }
  | { action: 'giveUp'; reason: GiveUpReason };

export interface RetryState {
  attempt: number; // Retries performed so far in this call
  rateLimitRetries: number;
  transientRetries: number;
  throttleWaitMs: number; // Cumulative rate-limit wait
  transientWaitMs: number;
  deadline?: number; // Epoch ms
}

export interface RetryConfig {
  throttleMaxAutoRetryDelayMs: number;
  rateLimitBaseDelayMs: number;
  minDelayMs: number;
  transientMaxRetries: number;
  transientBaseDelayMs: number;
  transientMaxDelayMs: number;
  jitterRatio: number; // 0 to 0.5
  retryableStatusCodes: number[];
}

export interface HttpConfig {
  timeoutMs: number;
  authTimeoutMs: number;
  keepAlive: boolean;
  concurrency?: number;
}

// src/utils/errors.ts

import type { ResponseClassificationKind } from '../core/http/types';

export class SDKError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
  }
}

// Auth errors

export type AuthErrorReason =
  | 'InvalidCredentials'
  | 'NoRefreshAvailable'
  | 'TransportFailure'
  | 'MalformedResponse';

export class AuthError extends SDKError {
  public readonly status?: number;
  public readonly body?: unknown;

  constructor(
    public readonly reason: AuthErrorReason,
    message: string,
    details?: Record<string, unknown> & { status?: number; body?: unknown }
  ) {
    super(message, 'AUTH_ERROR', { ...details, reason });
    this.status = details?.status;
    this.body = details?.body;
  }
}

// API errors

export interface ApiErrorInit {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
  classification: ResponseClassificationKind;
  url?: string;
}

export class APIError extends SDKError {
  public readonly status: number;
  public readonly body: unknown;
  public readonly headers: Record<string, string>;
  public readonly classification: ResponseClassificationKind;

  constructor(message: string, init: ApiErrorInit) {
    super(message, 'API_ERROR', {
      status: init.status,
      classification: init.classification,
      url: init.url,
    });
    this.status = init.status;
    this.body = init.body;
    this.headers = init.headers ?? {};
    this.classification = init.classification;
  }
}

export class BadRequestError extends APIError {
  constructor(message: string, init: ApiErrorInit) {
    super(message, init);
    this.code = 'BAD_REQUEST';
  }
}

export class ResourceNotFoundError extends APIError {
  constructor(message: string, init: ApiErrorInit) {
    super(message, init);
    this.code = 'RESOURCE_NOT_FOUND';
  }
}

export class UnauthorizedError extends APIError {
  constructor(message: string, init: ApiErrorInit) {
    super(message, init);
    this.code = 'UNAUTHORIZED';
  }
}

/**
 * Raised when waiting out rate limiting would push the call past the
 * configured auto-retry ceiling. `retryAfterMs` is the wait that was refused.
 */
export class ThrottleExceededError extends APIError {
  constructor(
    message: string,
    init: ApiErrorInit,
    public readonly retryAfterMs?: number
  ) {
    super(message, init);
    this.code = 'THROTTLE_EXCEEDED';
  }
}

// Network / lifecycle errors

export class NetworkError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class RequestTimeoutError extends SDKError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, 'REQUEST_TIMEOUT', details);
  }
}

export class RequestCancelledError extends SDKError {
  constructor(message: string = 'Request cancelled', details?: Record<string, unknown>) {
    super(message, 'REQUEST_CANCELLED', details);
  }
}

export class ClientClosedError extends SDKError {
  constructor(message: string = 'Client is closed') {
    super(message, 'CLIENT_CLOSED');
  }
}

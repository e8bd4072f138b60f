// src/index.ts

export { BleemeoClient } from './client';
export type { RequestOptions } from './client';
export { Resource } from './resources/Resource';
export {
  AgentType,
  ConfigItemSource,
  ConfigItemType,
  DisconnectionReason,
  GloutonDiagnostics,
  Graph,
  ReportIncluded,
  ReportPeriod,
  Status,
  TagType,
} from './resources/enums';
export type { Page, PageOptions, QueryParams, ResourceItem } from './resources/types';

export {
  ClientConfigSchema,
  DEFAULT_API_URL,
  DEFAULT_OAUTH_CLIENT_ID,
  validateConfig,
  validateConfigSafe,
} from './config/ConfigValidator';
export type { ClientConfig, ClientOptions } from './config/ConfigValidator';
export { loadConfigFromEnv } from './config/env';

export { RetryPolicy, parseRetryAfter } from './core/http/RetryPolicy';
export type {
  ExecuteRequest,
  GiveUpReason,
  HttpMethod,
  HttpResponse,
  ResponseClassification,
  RetryConfig,
  RetryDecision,
  RetryState,
} from './core/http/types';
export { TokenStore } from './core/token/TokenStore';
export { createToken, isTokenExpired, tokenExpiresAt } from './core/token/Token';
export type { Credentials, Token, TokenReplacedEvent } from './core/token/types';

// Export error classes for error handling
export {
  SDKError,
  ConfigurationError,
  AuthError,
  APIError,
  BadRequestError,
  ResourceNotFoundError,
  UnauthorizedError,
  ThrottleExceededError,
  NetworkError,
  RequestTimeoutError,
  RequestCancelledError,
  ClientClosedError,
} from './utils/errors';
export type { AuthErrorReason, ApiErrorInit } from './utils/errors';

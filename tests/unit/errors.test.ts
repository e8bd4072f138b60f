/**
 * Error Classes Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
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
} from '../../src/utils/errors';
import type { ApiErrorInit } from '../../src/utils/errors';

const init: ApiErrorInit = {
  status: 404,
  body: { detail: 'Not found.' },
  headers: { 'content-type': 'application/json' },
  classification: 'other4xx',
  url: 'https://api.example.test/v1/metric/abc/',
};

describe('Error Classes', () => {
  describe('SDKError', () => {
    it('should create error with message and code', () => {
      const error = new SDKError('Test error', 'TEST_CODE');
      expect(error.message).toBe('Test error');
      expect(error.code).toBe('TEST_CODE');
      expect(error.details).toBeUndefined();
      expect(error.name).toBe('SDKError');
      expect(error).toBeInstanceOf(Error);
    });

    it('should create error with details', () => {
      const details = { url: 'https://api.example.test/', attempts: 2 };
      const error = new SDKError('Test error', 'TEST_CODE', details);
      expect(error.details).toEqual(details);
    });
  });

  describe('ConfigurationError', () => {
    it('should carry the validation errors', () => {
      const error = new ConfigurationError('Invalid', { errors: ['apiUrl: Invalid url'] });
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.details).toEqual({ errors: ['apiUrl: Invalid url'] });
      expect(error).toBeInstanceOf(SDKError);
    });
  });

  describe('AuthError', () => {
    it('should expose reason, status and body', () => {
      const error = new AuthError('InvalidCredentials', 'Failed to retrieve OAuth token, status=400', {
        status: 400,
        body: { error: 'invalid_grant' },
      });

      expect(error.code).toBe('AUTH_ERROR');
      expect(error.reason).toBe('InvalidCredentials');
      expect(error.status).toBe(400);
      expect(error.body).toEqual({ error: 'invalid_grant' });
      expect(error.details).toEqual({
        status: 400,
        body: { error: 'invalid_grant' },
        reason: 'InvalidCredentials',
      });
    });

    it('should work without details', () => {
      const error = new AuthError('NoRefreshAvailable', 'No refresh token');
      expect(error.status).toBeUndefined();
      expect(error.details).toEqual({ reason: 'NoRefreshAvailable' });
    });
  });

  describe('APIError family', () => {
    it('should keep status, body, headers and classification', () => {
      const error = new APIError('Request failed', init);
      expect(error.code).toBe('API_ERROR');
      expect(error.status).toBe(404);
      expect(error.body).toEqual({ detail: 'Not found.' });
      expect(error.headers).toEqual({ 'content-type': 'application/json' });
      expect(error.classification).toBe('other4xx');
      expect(error.details).toEqual({
        status: 404,
        classification: 'other4xx',
        url: 'https://api.example.test/v1/metric/abc/',
      });
    });

    it('should default headers to an empty record', () => {
      const error = new APIError('Request failed', { status: 500, body: null, classification: 'otherError' });
      expect(error.headers).toEqual({});
    });

    const subclasses: Array<[new (message: string, init: ApiErrorInit) => APIError, string]> = [
      [BadRequestError, 'BAD_REQUEST'],
      [ResourceNotFoundError, 'RESOURCE_NOT_FOUND'],
      [UnauthorizedError, 'UNAUTHORIZED'],
    ];

    it.each(subclasses)('%o should be an APIError with its own code', (ErrorClass, code) => {
      const error = new ErrorClass('message', init);
      expect(error).toBeInstanceOf(APIError);
      expect(error.code).toBe(code);
      expect(error.status).toBe(404);
    });

    it('should carry the refused wait on ThrottleExceededError', () => {
      const error = new ThrottleExceededError(
        'Throttle error: request must be retried after 120s',
        { status: 429, body: null, classification: 'rateLimited' },
        120_000
      );
      expect(error).toBeInstanceOf(APIError);
      expect(error.code).toBe('THROTTLE_EXCEEDED');
      expect(error.retryAfterMs).toBe(120_000);
      expect(error.name).toBe('ThrottleExceededError');
    });
  });

  describe('Network and lifecycle errors', () => {
    it('should use default messages', () => {
      expect(new RequestTimeoutError().message).toBe('Request timeout');
      expect(new RequestCancelledError().message).toBe('Request cancelled');
      expect(new ClientClosedError().message).toBe('Client is closed');
    });

    it('should set codes', () => {
      expect(new NetworkError('down').code).toBe('NETWORK_ERROR');
      expect(new RequestTimeoutError().code).toBe('REQUEST_TIMEOUT');
      expect(new RequestCancelledError().code).toBe('REQUEST_CANCELLED');
      expect(new ClientClosedError().code).toBe('CLIENT_CLOSED');
    });
  });
});

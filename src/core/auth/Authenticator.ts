// src/core/auth/Authenticator.ts

import type { AxiosInstance, AxiosResponse } from 'axios';
import type { Credentials, Token } from '../token/types';
import type { GrantType, OAuthClientConfig } from './types';
import { TokenEndpointResponseSchema } from './types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { createToken } from '../token/Token';
import { APIError, AuthError, NetworkError } from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';
import { errorMessage, parseJsonOrText } from '../../utils/http';

const FORM_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded',
  'X-Requested-With': 'XMLHttpRequest',
};

/**
 * Performs the OAuth2 exchanges against the API's token endpoint.
 *
 * Every failure is terminal for the calling request: a rejected grant is an
 * InvalidCredentials error, never something to retry.
 */
export class Authenticator {
  private readonly tokenUrl: string;
  private readonly revokeUrl: string;
  private initialRefreshConsumed = false;

  constructor(
    private config: OAuthClientConfig,
    private http: AxiosInstance,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {
    this.tokenUrl = new URL('/o/token/', config.apiUrl).toString();
    this.revokeUrl = new URL('/o/revoke_token/', config.apiUrl).toString();
  }

  /**
   * Acquire a first token from the configured credentials
   */
  async obtain(credentials: Credentials): Promise<Token> {
    if (credentials.mode === 'refreshToken') {
      return this.requestToken('refresh_token', { refresh_token: credentials.refreshToken });
    }

    if (credentials.initialRefreshToken && !this.initialRefreshConsumed) {
      try {
        const token = await this.requestToken('refresh_token', {
          refresh_token: credentials.initialRefreshToken,
        });
        this.initialRefreshConsumed = true;
        return token;
      } catch (error: unknown) {
        if (!(error instanceof AuthError) || error.reason !== 'InvalidCredentials') {
          throw error;
        }
        this.initialRefreshConsumed = true;
        this.logger.warn('Initial refresh token rejected, using password grant', {
          status: error.status,
        });
      }
    }

    return this.requestToken('password', {
      username: credentials.username,
      password: credentials.password,
    });
  }

  /**
   * Exchange the refresh value of `current` for a new token
   */
  async refresh(current: Token): Promise<Token> {
    if (!current.refreshToken) {
      throw new AuthError('NoRefreshAvailable', 'Current token carries no refresh token');
    }

    return this.requestToken(
      'refresh_token',
      { refresh_token: current.refreshToken },
      current.refreshToken
    );
  }

  /**
   * Revoke the refresh token of `token`. No-op when it has none.
   */
  async revoke(token: Token): Promise<void> {
    if (!token.refreshToken) return;

    const form = this.buildForm({
      token: token.refreshToken,
      token_type_hint: 'refresh_token',
    });

    let response: AxiosResponse<string>;
    try {
      response = await this.http.post<string>(this.revokeUrl, form.toString(), {
        headers: FORM_HEADERS,
        timeout: this.config.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
    } catch (error: unknown) {
      throw new NetworkError('Token revocation failed', { cause: errorMessage(error) });
    }

    if (response.status !== 200) {
      throw new APIError(`Failed to revoke token, status=${response.status}`, {
        status: response.status,
        body: parseJsonOrText(response.data),
        classification: response.status >= 500 ? 'otherError' : 'other4xx',
        url: this.revokeUrl,
      });
    }

    this.logger.info('Token revoked');
  }

  private async requestToken(
    grant: GrantType,
    fields: Record<string, string>,
    previousRefreshToken?: string
  ): Promise<Token> {
    return withOAuthSpan(grant, async () => {
      const form = this.buildForm({ grant_type: grant, ...fields });

      let response: AxiosResponse<string>;
      try {
        response = await this.http.post<string>(this.tokenUrl, form.toString(), {
          headers: FORM_HEADERS,
          timeout: this.config.timeoutMs,
          responseType: 'text',
          validateStatus: () => true,
        });
      } catch (error: unknown) {
        this.recordFailure(grant, 'transport');
        this.logger.error('Token endpoint unreachable', { grant, error: errorMessage(error) });
        throw new AuthError('TransportFailure', 'Token endpoint unreachable', {
          cause: errorMessage(error),
        });
      }

      const status = response.status;
      if (status >= 400 && status < 500) {
        this.recordFailure(grant, 'rejected');
        this.logger.warn('Token request rejected', { grant, status });
        throw new AuthError('InvalidCredentials', `Failed to retrieve OAuth token, status=${status}`, {
          status,
          body: parseJsonOrText(response.data),
        });
      }
      if (status >= 500) {
        this.recordFailure(grant, 'server_error');
        throw new AuthError('TransportFailure', `Token endpoint failed, status=${status}`, {
          status,
          body: parseJsonOrText(response.data),
        });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(response.data);
      } catch {
        this.recordFailure(grant, 'malformed');
        throw new AuthError('MalformedResponse', 'Token endpoint returned invalid JSON', {
          status,
          body: response.data,
        });
      }

      const parsed = TokenEndpointResponseSchema.safeParse(payload);
      if (!parsed.success) {
        this.recordFailure(grant, 'malformed');
        throw new AuthError('MalformedResponse', 'Token endpoint returned an unexpected payload', {
          status,
          body: payload,
          issues: parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
        });
      }

      const data = parsed.data;
      this.metrics.incrementCounter('token_refresh_total', { grant, status: 'success' });
      this.logger.debug('Token exchange successful', {
        grant,
        hasRefreshToken: data.refresh_token !== undefined,
        expiresIn: data.expires_in,
      });

      return createToken({
        accessToken: data.access_token,
        refreshToken: data.refresh_token ?? previousRefreshToken,
        expiresInMs: data.expires_in !== undefined ? data.expires_in * 1000 : undefined,
        tokenType: data.token_type,
      });
    });
  }

  private buildForm(fields: Record<string, string>): URLSearchParams {
    const form = new URLSearchParams(fields);
    form.set('client_id', this.config.clientId);
    if (this.config.clientSecret) {
      form.set('client_secret', this.config.clientSecret);
    }
    return form;
  }

  private recordFailure(grant: GrantType, status: string): void {
    this.metrics.incrementCounter('token_refresh_total', { grant, status });
  }
}

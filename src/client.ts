// src/client.ts

import type { ExecuteRequest, HttpMethod, HttpResponse } from './core/http/types';
import type { Resource } from './resources/Resource';
import type { Page, PageOptions, QueryParams, ResourceItem } from './resources/types';
import { PageSchema } from './resources/types';
import { RequestExecutor } from './core/http/RequestExecutor';
import { RetryPolicy } from './core/http/RetryPolicy';
import { createTransport } from './core/http/transport';
import { Authenticator } from './core/auth/Authenticator';
import { TokenStore } from './core/token/TokenStore';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import type { ClientConfig, ClientOptions } from './config/ConfigValidator';
import { buildDefaultHeaders, validateConfig } from './config/ConfigValidator';
import { loadConfigFromEnv } from './config/env';
import { APIError } from './utils/errors';
import { errorMessage } from './utils/http';

export type RequestOptions = Omit<ExecuteRequest, 'method' | 'path' | 'query'> & {
  params?: QueryParams;
};

const ITERATE_PAGE_SIZE = 2500;

export class BleemeoClient {
  readonly config: ClientConfig;
  readonly tokens: TokenStore;
  private executor: RequestExecutor;
  private logger: Logger;
  private metrics: MetricsCollector;

  /**
   * @throws {ConfigurationError} If the options do not validate
   *
   * @example
   * ```typescript
   * const client = new BleemeoClient({
   *   credentials: { mode: 'password', username: 'ops@example.com', password: 'test-secret' },
   *   throttleMaxAutoRetryDelayMs: 30_000,
   * });
   * const metrics = await client.getPage(Resource.METRIC, { params: { active: true } });
   * ```
   */
  constructor(options: ClientOptions) {
    const config = validateConfig(options);
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector(config.metrics);
    const transport = createTransport(config.http);
    const tokens = new TokenStore(logger);

    const authenticator = new Authenticator(
      {
        apiUrl: config.apiUrl,
        clientId: config.oauth.clientId,
        clientSecret: config.oauth.clientSecret,
        timeoutMs: config.http.authTimeoutMs,
      },
      transport.client,
      logger,
      metrics
    );
    const policy = new RetryPolicy({
      throttleMaxAutoRetryDelayMs: config.throttleMaxAutoRetryDelayMs,
      ...config.retry,
    });

    this.executor = new RequestExecutor(
      {
        apiUrl: config.apiUrl,
        credentials: config.credentials,
        defaultHeaders: buildDefaultHeaders(config),
        http: config.http,
        tokenExpirySkewMs: config.tokenExpirySkewMs,
      },
      { transport, authenticator, tokens, policy, logger, metrics }
    );

    this.config = config;
    this.tokens = tokens;
    this.logger = logger;
    this.metrics = metrics;

    logger.debug('Client initialized', {
      apiUrl: config.apiUrl,
      mode: config.credentials.mode,
      accountId: config.accountId,
    });
  }

  /**
   * Build a client from BLEEMEO_* environment variables
   */
  static fromEnv(
    overrides: Partial<ClientOptions> = {},
    env: Record<string, string | undefined> = process.env
  ): BleemeoClient {
    return new BleemeoClient(loadConfigFromEnv(overrides, env));
  }

  /**
   * Run `fn` with a client that is logged out and closed on every exit path
   */
  static async withClient<T>(
    options: ClientOptions,
    fn: (client: BleemeoClient) => Promise<T>
  ): Promise<T> {
    const client = new BleemeoClient(options);
    let result: T;
    try {
      result = await fn(client);
    } catch (error: unknown) {
      // logout() closes the client even when revocation fails
      try {
        await client.logout();
      } catch (logoutError: unknown) {
        client.logger.warn('Logout failed after callback error', {
          error: errorMessage(logoutError),
        });
      }
      throw error;
    }
    await client.logout();
    return result;
  }

  async do(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<HttpResponse> {
    const { params, ...rest } = options;
    return this.executor.execute({ ...rest, method, path, query: params });
  }

  async get(
    resource: Resource,
    id: string,
    fields?: string[],
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    return this.do('GET', this.itemPath(resource, id), {
      ...options,
      params: fieldsParam(fields, options.params),
    });
  }

  async getPage(resource: Resource, opts: PageOptions = {}): Promise<HttpResponse> {
    return this.do('GET', resource, {
      params: { ...opts.params, page: opts.page ?? 1, page_size: opts.pageSize ?? 25 },
    });
  }

  async count(resource: Resource, params?: QueryParams): Promise<number> {
    const response = await this.getPage(resource, { page: 1, pageSize: 0, params });
    const page = this.parsePage(response, resource);

    if (page.count === undefined) {
      throw new APIError(`Listing ${resource} returned no count`, {
        status: response.status,
        body: response.data,
        headers: response.headers,
        classification: 'malformedResponse',
      });
    }
    return page.count;
  }

  /**
   * Iterate every item of a listing, following the `next` links
   */
  async *iterate(resource: Resource, params?: QueryParams): AsyncGenerator<ResourceItem> {
    let next: string | null = resource;
    // The next links already carry the query
    let query: QueryParams | undefined = { ...params, page_size: ITERATE_PAGE_SIZE };

    while (next !== null) {
      const response = await this.do('GET', next, { params: query });
      const page = this.parsePage(response, next);

      yield* page.results;

      next = page.next ?? null;
      query = undefined;
    }
  }

  async create(
    resource: Resource,
    body: unknown,
    fields?: string[],
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    return this.do('POST', resource, {
      ...options,
      body,
      params: fieldsParam(fields, options.params),
    });
  }

  async update(
    resource: Resource,
    id: string,
    body: unknown,
    fields?: string[],
    options: RequestOptions = {}
  ): Promise<HttpResponse> {
    return this.do('PATCH', this.itemPath(resource, id), {
      ...options,
      body,
      params: fieldsParam(fields, options.params),
    });
  }

  async delete(resource: Resource, id: string, options: RequestOptions = {}): Promise<HttpResponse> {
    return this.do('DELETE', this.itemPath(resource, id), options);
  }

  /**
   * Revoke the session's refresh token, then release the transport
   */
  async logout(): Promise<void> {
    try {
      await this.executor.logout();
    } finally {
      this.close();
    }
  }

  close(): void {
    if (this.executor.isClosed) return;
    this.executor.close();
    this.logger.debug('Client closed');
  }

  async getMetrics(): Promise<string> {
    return this.metrics.getMetrics();
  }

  private itemPath(resource: Resource, id: string): string {
    return `${resource}${encodeURIComponent(id)}/`;
  }

  private parsePage(response: HttpResponse, path: string): Page {
    const parsed = PageSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new APIError(`Unexpected listing payload from ${path}`, {
        status: response.status,
        body: response.data,
        headers: response.headers,
        classification: 'malformedResponse',
      });
    }
    return parsed.data;
  }
}

function fieldsParam(fields: string[] | undefined, params?: QueryParams): QueryParams | undefined {
  if (!fields || fields.length === 0) return params;
  return { ...params, fields: fields.join(',') };
}

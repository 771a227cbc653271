// ============================================================
// API Test Kit — API Client
// One call per HTTP verb over a pluggable transport
// ============================================================

import { TransportError } from '../errors.js';
import { createLogger, type Logger } from '../helpers/logger.js';
import { hasHeader, mergeHeaders } from '../helpers/headers.js';
import { ApiResponse } from './api.response.js';
import { PlaywrightTransport } from './transport.js';
import type {
  ApiConfig,
  ExchangeRecord,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  RequestOptions,
  RequestWithBodyOptions,
} from '../../types/index.js';

export interface ApiClientOptions {
  /** Merged over the config's default headers. */
  headers?: HttpHeaders;
  /** Defaults to a Playwright request context. */
  transport?: HttpTransport;
  logger?: Logger;
}

export class ApiClient {
  private readonly headers: HttpHeaders;
  private readonly log: ExchangeRecord[] = [];
  private isClosed = false;

  private constructor(
    readonly config: ApiConfig,
    private readonly transport: HttpTransport,
    private readonly logger: Logger,
    headers: HttpHeaders | undefined,
  ) {
    this.headers = mergeHeaders(config.defaultHeaders, headers);
  }

  static async create(config: ApiConfig, options: ApiClientOptions = {}): Promise<ApiClient> {
    const transport = options.transport ?? await PlaywrightTransport.open(config);
    const logger = options.logger ?? createLogger('ApiClient', config.logLevel);
    return new ApiClient(config, transport, logger, options.headers);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Every call made so far, in order. */
  get exchanges(): readonly ExchangeRecord[] {
    return this.log;
  }

  get(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('GET', path, options);
  }

  post(path: string, data?: unknown, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('POST', path, { ...options, data });
  }

  put(path: string, data?: unknown, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PUT', path, { ...options, data });
  }

  patch(path: string, data?: unknown, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('PATCH', path, { ...options, data });
  }

  delete(path: string, options?: RequestOptions): Promise<ApiResponse> {
    return this.request('DELETE', path, options);
  }

  async request(method: HttpMethod, path: string, options: RequestWithBodyOptions = {}): Promise<ApiResponse> {
    const url = this.buildUrl(path);
    if (this.isClosed) {
      throw new TransportError(method, url, 'client is closed');
    }

    const headers = mergeHeaders(this.headers, options.headers);
    let body: string | undefined;
    if (typeof options.data === 'string') {
      body = options.data;
    } else if (options.data !== undefined) {
      body = JSON.stringify(options.data);
      if (!hasHeader(headers, 'Content-Type')) headers['Content-Type'] = 'application/json';
    }

    this.logger.info(`${method} ${url}`);
    const start = Date.now();
    try {
      const raw = await this.transport.send({
        method,
        url,
        headers,
        ...(options.params ? { params: options.params } : {}),
        ...(body !== undefined ? { body } : {}),
        timeoutMs: options.timeoutMs ?? this.config.timeoutMs,
        maxRetries: this.config.retryCount,
      });
      const response = new ApiResponse(method, raw);
      this.log.push({ method, url, status: response.status, durationMs: Date.now() - start, error: null });
      this.logger.info(`Response: ${response.status} ${response.statusText}`);
      return response;
    } catch (err) {
      const error = err instanceof TransportError
        ? err
        : new TransportError(method, url, err instanceof Error ? err.message : String(err), { cause: err });
      this.log.push({ method, url, status: null, durationMs: Date.now() - start, error: error.message });
      this.logger.error(`${method} ${url} failed`, err);
      throw error;
    }
  }

  /**
   * Releases the transport. Safe to call more than once; a close whose
   * dispose failed leaves the client open so it can be retried.
   */
  async close(): Promise<void> {
    if (this.isClosed) return;
    await this.transport.dispose();
    this.isClosed = true;
  }

  /** Absolute http(s) URLs pass through; anything else is joined to baseUrl. */
  buildUrl(path: string): string {
    if (/^https?:\/\//i.test(path)) return path;
    const relative = path.replace(/^\/+/, '');
    return `${this.config.baseUrl}/${relative}`;
  }
}

/**
 * Scoped acquisition: the client is closed on every exit path, and the
 * callback's result or error is passed through unchanged. A close failure
 * is only thrown when the callback succeeded; otherwise it is logged.
 */
export async function withApiClient<T>(
  config: ApiConfig,
  fn: (client: ApiClient) => Promise<T>,
  options: ApiClientOptions = {},
): Promise<T> {
  const logger = options.logger ?? createLogger('ApiClient', config.logLevel);
  const client = await ApiClient.create(config, { ...options, logger });

  let result: T;
  try {
    result = await fn(client);
  } catch (err) {
    await client.close().catch((closeError: unknown) => {
      logger.error('Failed to close the client after an earlier error', closeError);
    });
    throw err;
  }
  await client.close();
  return result;
}

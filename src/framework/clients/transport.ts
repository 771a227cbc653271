// ============================================================
// API Test Kit — Playwright Transport
// Network I/O goes through Playwright's APIRequestContext
// ============================================================

import { request } from '@playwright/test';
import type { APIRequestContext } from '@playwright/test';
import { TransportError } from '../errors.js';
import type {
  ApiConfig,
  HttpTransport,
  TransportRequest,
  TransportResponse,
} from '../../types/index.js';

export class PlaywrightTransport implements HttpTransport {
  private constructor(private readonly context: APIRequestContext) {}

  static async open(config: ApiConfig): Promise<PlaywrightTransport> {
    const context = await request.newContext({ timeout: config.timeoutMs });
    return new PlaywrightTransport(context);
  }

  async send(req: TransportRequest): Promise<TransportResponse> {
    try {
      const response = await this.context.fetch(req.url, {
        method: req.method,
        headers: req.headers,
        ...(req.params ? { params: req.params } : {}),
        ...(req.body !== undefined ? { data: req.body } : {}),
        timeout: req.timeoutMs,
        maxRetries: req.maxRetries,
        failOnStatusCode: false,
      });

      try {
        return {
          url: response.url(),
          status: response.status(),
          statusText: response.statusText(),
          headers: response.headers(),
          body: await response.body(),
        };
      } finally {
        await response.dispose();
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(req.method, req.url, reason, { cause: err });
    }
  }

  async dispose(): Promise<void> {
    await this.context.dispose();
  }
}

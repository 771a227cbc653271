// ============================================================
// API Test Kit — Buffered API Response
// ============================================================

import type { ZodType, ZodTypeDef } from 'zod';
import type { HttpHeaders, HttpMethod, TransportResponse } from '../../types/index.js';

/**
 * Status, headers and body of one call, read in full before the client returns.
 * Header names are lower-case.
 */
export class ApiResponse {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly headers: Readonly<HttpHeaders>;
  private readonly body: Buffer;

  constructor(readonly method: HttpMethod, response: TransportResponse) {
    this.url = response.url;
    this.status = response.status;
    this.statusText = response.statusText;
    this.headers = Object.freeze(
      Object.fromEntries(
        Object.entries(response.headers).map(([name, value]) => [name.toLowerCase(), value]),
      ),
    );
    this.body = response.body;
  }

  header(name: string): string | undefined {
    return this.headers[name.toLowerCase()];
  }

  text(): string {
    return this.body.toString('utf-8');
  }

  /** Parsed body; with a schema the result is validated and typed. Throws on invalid JSON. */
  json(): unknown;
  json<T>(schema: ZodType<T, ZodTypeDef, unknown>): T;
  json<T>(schema?: ZodType<T, ZodTypeDef, unknown>): unknown {
    const data: unknown = JSON.parse(this.text());
    return schema ? schema.parse(data) : data;
  }

  isSuccessful(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }

  isServerError(): boolean {
    return this.status >= 500 && this.status < 600;
  }

  toString(): string {
    return `${this.method} ${this.url} → ${this.status} ${this.statusText}`;
  }
}

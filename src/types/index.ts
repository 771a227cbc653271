// ============================================================
// API Test Kit — Core Types
// ============================================================

import { z } from 'zod';

// ------------------------------------------------------------
// HTTP
// ------------------------------------------------------------
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HttpHeaders = Record<string, string>;

export type QueryParams = Record<string, string | number | boolean>;

export interface RequestOptions {
  headers?: HttpHeaders;
  params?: QueryParams;
  timeoutMs?: number;
}

export interface RequestWithBodyOptions extends RequestOptions {
  data?: unknown;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  params?: QueryParams;
  body?: string;
  timeoutMs: number;
  maxRetries: number;
}

export interface TransportResponse {
  url: string;
  status: number;
  statusText: string;
  headers: HttpHeaders;
  body: Buffer;
}

export interface HttpTransport {
  send(request: TransportRequest): Promise<TransportResponse>;
  dispose(): Promise<void>;
}

// ------------------------------------------------------------
// Request log (attached to failed tests)
// ------------------------------------------------------------
export interface ExchangeRecord {
  method: HttpMethod;
  url: string;
  status: number | null;
  durationMs: number;
  error: string | null;
}

// ------------------------------------------------------------
// Logging
// ------------------------------------------------------------
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// ------------------------------------------------------------
// Assertions
// ------------------------------------------------------------
export type JsonType = 'string' | 'number' | 'boolean' | 'object' | 'array' | 'null';

// ------------------------------------------------------------
// API Config
// ------------------------------------------------------------
export const ApiConfigSchema = z.object({
  baseUrl: z
    .string({ required_error: 'is required' })
    .url()
    .refine(url => /^https?:\/\//i.test(url), 'must be an http(s) URL')
    .transform(url => url.replace(/\/+$/, '')),
  timeoutMs: z.number().int().positive().default(30_000),
  retryCount: z.number().int().nonnegative().default(0),
  logLevel: z.enum(LOG_LEVELS).default('INFO'),
  defaultHeaders: z.record(z.string()).default({}),
});

type ParsedApiConfig = z.infer<typeof ApiConfigSchema>;

export type ApiConfig = Readonly<
  Omit<ParsedApiConfig, 'defaultHeaders'> & { defaultHeaders: Readonly<HttpHeaders> }
>;

export type ApiConfigInput = z.input<typeof ApiConfigSchema>;

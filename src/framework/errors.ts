// ============================================================
// API Test Kit — Error Types
// ============================================================

import type { HttpMethod } from '../types/index.js';

/** Missing or invalid settings. Fatal: the session cannot start without a valid config. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(
    message: string,
    readonly issues: string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** The request never produced a response (refused, timed out, client closed). Never retried here. */
export class TransportError extends Error {
  override readonly name = 'TransportError';

  constructor(
    readonly method: HttpMethod,
    readonly url: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`[ApiClient] ${method} ${url} failed: ${reason}`, options);
  }
}

export function formatValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  if (value instanceof RegExp) return value.toString();
  return JSON.stringify(value) ?? String(value);
}

/**
 * Expectation mismatch raised by the assertion helpers.
 * Named `AssertionError` so runners report it like any other failed expectation.
 */
export class ApiAssertionError extends Error {
  override readonly name = 'AssertionError';

  constructor(
    summary: string,
    readonly expected: unknown,
    readonly actual: unknown,
  ) {
    super(`${summary}\n\nExpected: ${formatValue(expected)}\nReceived: ${formatValue(actual)}`);
  }
}

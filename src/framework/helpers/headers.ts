import type { HttpHeaders } from '../../types/index.js';

const SENSITIVE_HEADERS = new Set(['authorization', 'proxy-authorization', 'x-api-key', 'cookie']);

export const REDACTED = '***HIDDEN***';

/**
 * Merge header sets left to right. Names compare case-insensitively;
 * a later set replaces the earlier value and its spelling of the name.
 */
export function mergeHeaders(...sets: Array<Readonly<HttpHeaders> | undefined>): HttpHeaders {
  const byLowerName = new Map<string, [string, string]>();
  for (const set of sets) {
    if (!set) continue;
    for (const [name, value] of Object.entries(set)) {
      byLowerName.set(name.toLowerCase(), [name, value]);
    }
  }
  return Object.fromEntries(byLowerName.values());
}

export function hasHeader(headers: Readonly<HttpHeaders>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some(key => key.toLowerCase() === wanted);
}

export function redactHeaders(headers: Readonly<HttpHeaders>): HttpHeaders {
  return Object.fromEntries(
    Object.entries(headers).map(([name, value]) => [
      name,
      SENSITIVE_HEADERS.has(name.toLowerCase()) ? REDACTED : value,
    ]),
  );
}

// ============================================================
// API Test Kit — Response Assertions
// Pure checks over ApiResponse; mismatches throw ApiAssertionError
// ============================================================

import type { ZodType, ZodTypeDef } from 'zod';
import { ApiAssertionError } from '../errors.js';
import type { ApiResponse } from '../clients/api.response.js';
import type { JsonType } from '../../types/index.js';

type JsonObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function jsonTypeOf(value: unknown): JsonType | 'undefined' {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'number') return 'number';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'object') return 'object';
  return 'undefined';
}

export function isDeepEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => isDeepEqual(item, b[i]));
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length
      && keys.every(key => Object.hasOwn(b, key) && isDeepEqual(a[key], b[key]));
  }
  return false;
}

/** Objects match on the keys `expected` names (recursively); arrays and scalars must be equal. */
export function containsSubset(actual: unknown, expected: unknown): boolean {
  if (isPlainObject(expected)) {
    return isPlainObject(actual)
      && Object.entries(expected).every(
        ([key, value]) => Object.hasOwn(actual, key) && containsSubset(actual[key], value),
      );
  }
  return isDeepEqual(actual, expected);
}

function readJson(response: ApiResponse): unknown {
  try {
    return response.json();
  } catch {
    throw new ApiAssertionError(
      `Expected a JSON body from ${response.method} ${response.url}`,
      'valid JSON',
      response.text(),
    );
  }
}

function readObject(response: ApiResponse): JsonObject {
  const data = readJson(response);
  if (!isPlainObject(data)) {
    throw new ApiAssertionError('Expected the JSON body to be an object', 'object', jsonTypeOf(data));
  }
  return data;
}

function readField(response: ApiResponse, field: string): unknown {
  const data = readObject(response);
  if (!Object.hasOwn(data, field)) {
    throw new ApiAssertionError(`Field '${field}' not found in response`, field, Object.keys(data));
  }
  return data[field];
}

export function assertStatus(response: ApiResponse, expected: number | readonly number[]): void {
  const allowed = typeof expected === 'number' ? [expected] : expected;
  if (!allowed.includes(response.status)) {
    throw new ApiAssertionError(
      `Expected status ${allowed.join(' or ')}, got ${response.status} (${response.method} ${response.url})`,
      expected,
      response.status,
    );
  }
}

export function assertSuccess(response: ApiResponse): void {
  if (!response.isSuccessful()) {
    throw new ApiAssertionError(
      `Expected a 2xx status, got ${response.status} ${response.statusText} (${response.method} ${response.url})`,
      '2xx',
      response.status,
    );
  }
}

export function assertHeader(response: ApiResponse, name: string, expected: string | RegExp): void {
  const actual = response.header(name);
  const matches = actual !== undefined
    && (typeof expected === 'string' ? actual === expected : expected.test(actual));
  if (!matches) {
    throw new ApiAssertionError(`Header '${name.toLowerCase()}' mismatch`, expected, actual);
  }
}

export function assertContentType(response: ApiResponse, expected = 'application/json'): void {
  const actual = (response.header('content-type') ?? '').toLowerCase();
  if (!actual.includes(expected.toLowerCase())) {
    throw new ApiAssertionError(
      `Expected content type '${expected}', got '${actual}'`,
      expected,
      actual,
    );
  }
}

export function assertJsonContains(response: ApiResponse, subset: JsonObject): void {
  const data = readJson(response);
  if (!containsSubset(data, subset)) {
    throw new ApiAssertionError('Response body does not contain the expected fields', subset, data);
  }
}

export function assertJsonHasFields(response: ApiResponse, fields: readonly string[]): void {
  const data = readObject(response);
  const missing = fields.filter(field => !Object.hasOwn(data, field));
  if (missing.length > 0) {
    throw new ApiAssertionError(
      `Required field(s) ${missing.map(f => `'${f}'`).join(', ')} not found in response`,
      fields,
      Object.keys(data),
    );
  }
}

export function assertJsonFieldValue(response: ApiResponse, field: string, expected: unknown): void {
  const actual = readField(response, field);
  if (!isDeepEqual(actual, expected)) {
    throw new ApiAssertionError(`Field '${field}' has an unexpected value`, expected, actual);
  }
}

export function assertJsonFieldType(response: ApiResponse, field: string, expected: JsonType): void {
  const actual = jsonTypeOf(readField(response, field));
  if (actual !== expected) {
    throw new ApiAssertionError(`Field '${field}' is ${actual}, expected ${expected}`, expected, actual);
  }
}

function readList(response: ApiResponse, field?: string): unknown[] {
  const target = field === undefined ? readJson(response) : readField(response, field);
  if (!Array.isArray(target)) {
    throw new ApiAssertionError(
      `Expected ${field === undefined ? 'the body' : `field '${field}'`} to be a list`,
      'array',
      jsonTypeOf(target),
    );
  }
  return target;
}

export function assertListMinLength(response: ApiResponse, min: number, field?: string): void {
  const list = readList(response, field);
  if (list.length < min) {
    throw new ApiAssertionError(`Expected at least ${min} item(s), got ${list.length}`, min, list.length);
  }
}

export function assertListNotEmpty(response: ApiResponse, field?: string): void {
  const list = readList(response, field);
  if (list.length === 0) {
    throw new ApiAssertionError('List is empty', 'non-empty list', list);
  }
}

/** Validates the body against a zod schema and returns the typed value. */
export function assertJsonMatches<T>(response: ApiResponse, schema: ZodType<T, ZodTypeDef, unknown>): T {
  const data = readJson(response);
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ApiAssertionError(`Response body does not match schema: ${issues.join(', ')}`, 'schema match', data);
  }
  return result.data;
}

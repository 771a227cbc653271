import { test, expect } from '@playwright/test';
import { z } from 'zod';
import { ApiResponse } from '../../clients/api.response.js';

function response(status: number, body: string, headers: Record<string, string> = {}): ApiResponse {
  return new ApiResponse('POST', {
    url: 'http://api.test.local/posts',
    status,
    statusText: status === 201 ? 'Created' : '',
    headers,
    body: Buffer.from(body, 'utf-8'),
  });
}

test.describe('ApiResponse', () => {
  test('lower-cases header names and looks them up case-insensitively', () => {
    const res = response(201, '{}', { 'Content-Type': 'application/json', 'X-Request-Id': 'req-1' });

    expect(res.headers).toEqual({ 'content-type': 'application/json', 'x-request-id': 'req-1' });
    expect(res.header('X-REQUEST-ID')).toBe('req-1');
    expect(res.header('etag')).toBeUndefined();
  });

  test('exposes the body as text and parsed JSON', () => {
    const res = response(201, '{"id":101,"title":"Ünïcode"}');

    expect(res.text()).toBe('{"id":101,"title":"Ünïcode"}');
    expect(res.json()).toEqual({ id: 101, title: 'Ünïcode' });
  });

  test('validates JSON against a schema when one is given', () => {
    const Created = z.object({ id: z.number() });
    const res = response(201, '{"id":101,"title":"x"}');

    expect(res.json(Created).id).toBe(101);
    expect(() => response(201, '{"id":"101"}').json(Created)).toThrow(z.ZodError);
  });

  test('throws on a body that is not JSON', () => {
    expect(() => response(500, 'Internal Server Error').json()).toThrow(SyntaxError);
  });

  test('classifies the status code', () => {
    const created = response(201, '');
    const missing = response(404, '');
    const broken = response(503, '');

    expect([created.isSuccessful(), created.isClientError(), created.isServerError()]).toEqual([true, false, false]);
    expect([missing.isSuccessful(), missing.isClientError(), missing.isServerError()]).toEqual([false, true, false]);
    expect([broken.isSuccessful(), broken.isClientError(), broken.isServerError()]).toEqual([false, false, true]);
  });

  test('summarises itself in one line', () => {
    expect(String(response(201, ''))).toBe('POST http://api.test.local/posts → 201 Created');
  });
});

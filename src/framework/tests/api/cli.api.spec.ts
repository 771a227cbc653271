import { expect } from '@playwright/test';
import { CommanderError } from 'commander';
import { createProgram, parseData } from '../../../cli/program.js';
import { mockApiTest } from '../../mocks/mock-api.fixture.js';
import { jsonReply, startMockServer } from '../../mocks/mock-server.js';

const ANSI = /\u001b\[[0-9;]*m/g;

const test = mockApiTest([
  { method: 'GET', path: '/health', reply: () => jsonReply(200, { status: 'ok' }) },
  {
    method: 'POST',
    path: '/echo',
    reply: req => jsonReply(200, { contentType: req.headers['content-type'] ?? null, body: req.body }),
  },
]);

interface CliRun {
  out: string;
  err: string;
  exitCode: number;
  code: string | undefined;
}

async function runCli(args: string[], env: Record<string, string>): Promise<CliRun> {
  let out = '';
  let err = '';
  const program = createProgram({
    env,
    output: {
      writeOut: text => { out += text; },
      writeErr: text => { err += text; },
    },
  });

  let exitCode = 0;
  let code: string | undefined;
  try {
    await program.parseAsync(args, { from: 'user' });
  } catch (error) {
    if (!(error instanceof CommanderError)) throw error;
    exitCode = error.exitCode;
    code = error.code;
  }
  return { out: out.replace(ANSI, ''), err: err.replace(ANSI, ''), exitCode, code };
}

function splitFirstLine(text: string): [string, string] {
  const newline = text.indexOf('\n');
  return [text.slice(0, newline), text.slice(newline + 1)];
}

test.describe('api-kit config', () => {
  test('@api prints the resolved configuration with credentials hidden', async ({ mockServer }) => {
    const run = await runCli(['config'], { BASE_URL: mockServer.url, LOG_LEVEL: 'SILENT', API_KEY: 'test-secret' });

    expect(run.exitCode).toBe(0);
    const [summary, json] = splitFirstLine(run.out);
    expect(summary).toBe(
      `[api-kit] ApiConfig(baseUrl='${mockServer.url}', timeoutMs=30000, retryCount=0, logLevel=SILENT, ` +
      'headers={"User-Agent":"api-test-kit/1.0","Authorization":"***HIDDEN***"})',
    );
    expect(JSON.parse(json)).toEqual({
      baseUrl: mockServer.url,
      timeoutMs: 30000,
      retryCount: 0,
      logLevel: 'SILENT',
      defaultHeaders: { 'User-Agent': 'api-test-kit/1.0', Authorization: '***HIDDEN***' },
    });
    expect(run.out).not.toContain('test-secret');
  });

  test('@api exits with 1 and lists the issues when the config is invalid', async () => {
    const run = await runCli(['config'], {});

    expect(run.exitCode).toBe(1);
    expect(run.code).toBe('api-kit.configuration');
    expect(run.out).toBe('');
    expect(run.err).toBe('API config validation failed. Missing/invalid: baseUrl: is required\n  - baseUrl: is required\n');
  });
});

test.describe('api-kit request', () => {
  test('@api prints the status line and the JSON body', async ({ mockServer }) => {
    const run = await runCli(['request', 'get', '/health'], { BASE_URL: mockServer.url, LOG_LEVEL: 'SILENT' });

    expect(run.exitCode).toBe(0);
    const [status, body] = splitFirstLine(run.out);
    expect(status).toBe(`GET ${mockServer.url}/health → 200 OK`);
    expect(JSON.parse(body)).toEqual({ status: 'ok' });
  });

  test('@api sends a JSON object body as application/json', async ({ mockServer }) => {
    const run = await runCli(
      ['request', 'POST', '/echo', '--data', '{"title":"Hello"}'],
      { BASE_URL: mockServer.url, LOG_LEVEL: 'SILENT' },
    );

    const [, body] = splitFirstLine(run.out);
    expect(JSON.parse(body)).toEqual({ contentType: 'application/json', body: '{"title":"Hello"}' });
  });

  test('@api sends a JSON scalar as the raw text it was given', async ({ mockServer }) => {
    const run = await runCli(
      ['request', 'POST', '/echo', '--data', '"text"'],
      { BASE_URL: mockServer.url, LOG_LEVEL: 'SILENT' },
    );

    const [, body] = splitFirstLine(run.out);
    expect(JSON.parse(body)).toMatchObject({ body: '"text"' });
  });

  test('@api exits with 1 on an unknown method', async ({ mockServer }) => {
    const run = await runCli(['request', 'FETCH', '/health'], { BASE_URL: mockServer.url, LOG_LEVEL: 'SILENT' });

    expect(run.exitCode).toBe(1);
    expect(run.code).toBe('commander.invalidArgument');
    expect(run.err).toContain("is invalid for argument 'method'. Use one of: GET, POST, PUT, PATCH, DELETE, HEAD, OPTIONS");
    expect(mockServer.requests.some(req => req.method === 'FETCH')).toBe(false);
  });

  test('@api exits with 1 when the server cannot be reached', async () => {
    const server = await startMockServer([]);
    const baseUrl = server.url;
    await server.close();

    const run = await runCli(['request', 'GET', '/health'], { BASE_URL: baseUrl, LOG_LEVEL: 'SILENT' });

    expect(run.exitCode).toBe(1);
    expect(run.code).toBe('api-kit.transport');
    expect(run.err).toMatch(new RegExp(`^\\[ApiClient\\] GET ${baseUrl}/health failed: .*ECONNREFUSED`));
  });
});

test.describe('parseData', () => {
  test('keeps JSON objects and arrays, and the raw text for everything else', () => {
    expect(parseData('{"title":"Hello"}')).toEqual({ title: 'Hello' });
    expect(parseData('[1,2]')).toEqual([1, 2]);
    expect(parseData('"text"')).toBe('"text"');
    expect(parseData('42')).toBe('42');
    expect(parseData('null')).toBe('null');
    expect(parseData('title=Hello')).toBe('title=Hello');
  });
});

import { expect } from '@playwright/test';
import { setTimeout as sleep } from 'timers/promises';
import { loadConfig } from '../../../config/api.config.js';
import { withApiClient } from '../../clients/api.client.js';
import { TransportError } from '../../errors.js';
import { mockApiTest } from '../../mocks/mock-api.fixture.js';
import { jsonReply, startMockServer } from '../../mocks/mock-server.js';

const test = mockApiTest([
  {
    method: 'GET',
    path: '/slow',
    reply: async () => {
      await sleep(1_000);
      return jsonReply(200, { status: 'late' });
    },
  },
]);

test.describe('Transport failures', () => {
  test('@api a refused connection surfaces as TransportError with its cause', async () => {
    const server = await startMockServer([]);
    const baseUrl = server.url;
    await server.close();
    const config = loadConfig({ env: {}, overrides: { baseUrl, logLevel: 'SILENT' } });

    const error = await withApiClient(config, client => client.get('/health')).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.method).toBe('GET');
    expect(error.url).toBe(`${baseUrl}/health`);
    expect(error.message).toMatch(/ECONNREFUSED/);
    expect(error.cause).toBeInstanceOf(Error);
  });

  test('@api a request slower than its timeout fails instead of hanging', async ({ apiClient }) => {
    const failure = apiClient.get('/slow', { timeoutMs: 100 });


    const error = await failure.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TransportError);
    if (!(error instanceof TransportError)) return;
    expect(error.url).toMatch(/\/slow$/);
    expect(error.message).toMatch(/timed? ?out/i);
    expect(error.cause).toBeInstanceOf(Error);
  });
});

import { expect, type TestInfo } from '@playwright/test';
import { mockApiTest } from '../../mocks/mock-api.fixture.js';
import { jsonReply } from '../../mocks/mock-server.js';
import { assertJsonContains, assertStatus } from '../../helpers/assertions.js';
import type { ApiClient } from '../../clients/api.client.js';

const test = mockApiTest([
  { method: 'GET', path: '/health', reply: () => jsonReply(200, { status: 'ok' }) },
]);

let clientFromFirstTest: ApiClient | undefined;

test.describe('GET /health', () => {
  test('@api returns 200 with {"status":"ok"}', async ({ apiClient }) => {
    clientFromFirstTest = apiClient;

    const response = await apiClient.get('/health');

    expect(response.status).toBe(200);
    expect(response.text()).toBe('{"status":"ok"}');
    expect(response.header('content-type')).toBe('application/json; charset=utf-8');
    assertStatus(response, 200);
    assertJsonContains(response, { status: 'ok' });
  });

  test('@api the previous test client was released at teardown', async ({ apiClient }) => {
    expect(clientFromFirstTest).toBeDefined();
    expect(clientFromFirstTest?.closed).toBe(true);
    expect(apiClient).not.toBe(clientFromFirstTest);
    expect(apiClient.closed).toBe(false);
  });

  test('@api the worker client serves every test in the worker', async ({ sessionApiClient, mockServer }) => {
    const response = await sessionApiClient.get('health');

    assertStatus(response, 200);
    expect(response.url).toBe(`${mockServer.url}/health`);
  });

  test('@api unknown paths come back as a JSON 404', async ({ apiClient }) => {
    const response = await apiClient.get('/missing');

    expect(response.isClientError()).toBe(true);
    assertStatus(response, 404);
    assertJsonContains(response, { error: 'Not Found', path: '/missing' });
  });
});

test.describe('apiClient fixture when the test throws', () => {
  test.describe.configure({ mode: 'serial' });

  let failedClient: ApiClient | undefined;
  let failedTestInfo: TestInfo | undefined;

  test('@api a throwing test still hands its client to teardown', async ({ apiClient }, testInfo) => {
    test.fail();
    failedClient = apiClient;
    failedTestInfo = testInfo;

    await apiClient.get('/health');
    throw new Error('test body failed after one request');
  });

  test('@api the failed test client was closed and its exchanges attached', async ({ mockServer }) => {
    expect(failedClient?.closed).toBe(true);

    const attachment = failedTestInfo?.attachments.find(a => a.name === 'api-exchanges');
    expect(attachment?.contentType).toBe('application/json');
    const exchanges: unknown = JSON.parse(attachment?.body?.toString('utf-8') ?? '[]');
    expect(exchanges).toEqual([
      expect.objectContaining({ method: 'GET', url: `${mockServer.url}/health`, status: 200, error: null }),
    ]);
  });
});

// Base fixture wired to an in-process mock server instead of a real API.

import { test as base } from '../fixtures/base.fixture.js';
import { loadConfig } from '../../config/api.config.js';
import { startMockServer, type MockRoute, type MockServer } from './mock-server.js';

export type MockWorkerFixtures = {
  mockServer: MockServer;
};

export function mockApiTest(routes: readonly MockRoute[]) {
  return base.extend<{}, MockWorkerFixtures>({
    mockServer: [async ({}, use) => {
      const server = await startMockServer(routes);
      try {
        await use(server);
      } finally {
        await server.close();
      }
    }, { scope: 'worker' }],

    apiConfig: [async ({ mockServer }, use) => {
      await use(loadConfig({ env: {}, overrides: { baseUrl: mockServer.url, logLevel: 'WARN' } }));
    }, { scope: 'worker' }],
  });
}

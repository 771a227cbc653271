// ============================================================
// API Test Kit — Base Fixture
// Extended Playwright test with an API client per test and per worker
// ============================================================

import { test as base, expect } from '@playwright/test';
import { loadConfig } from '../../config/api.config.js';
import { withApiClient, type ApiClient } from '../clients/api.client.js';
import type { ApiConfig } from '../../types/index.js';

export type ApiTestFixtures = {
  apiClient: ApiClient;
};

export type ApiWorkerFixtures = {
  /** Set through `use: { apiConfigFile }` in playwright.config.ts. */
  apiConfigFile: string | undefined;
  apiConfig: ApiConfig;
  sessionApiClient: ApiClient;
};

export const test = base.extend<ApiTestFixtures, ApiWorkerFixtures>({
  apiConfigFile: [undefined, { option: true, scope: 'worker' }],

  apiConfig: [async ({ apiConfigFile }, use) => {
    await use(loadConfig(apiConfigFile ? { configFile: apiConfigFile } : {}));
  }, { scope: 'worker' }],

  sessionApiClient: [async ({ apiConfig }, use) => {
    await withApiClient(apiConfig, use);
  }, { scope: 'worker' }],

  apiClient: async ({ apiConfig }, use, testInfo) => {
    await withApiClient(apiConfig, async client => {
      await use(client);

      // Request log goes into the report whenever the test failed or timed out
      const failed = testInfo.status === 'failed' || testInfo.status === 'timedOut';
      if (failed && client.exchanges.length > 0) {
        await testInfo.attach('api-exchanges', {
          body: JSON.stringify(client.exchanges, null, 2),
          contentType: 'application/json',
        });
      }
    });
  },
});

export { expect };

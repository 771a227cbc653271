// Root Playwright config — `npm test` runs both projects.
// No browser is launched: every test goes through APIRequestContext.

import { defineConfig } from '@playwright/test';
import dotenv from 'dotenv';
import type { ApiWorkerFixtures } from './src/framework/fixtures/base.fixture.js';

dotenv.config();

const isCI = process.env['CI'] === 'true';

export default defineConfig<{}, Pick<ApiWorkerFixtures, 'apiConfigFile'>>({
  testDir: './src/framework/tests',
  fullyParallel: false,
  forbidOnly: isCI,
  retries: 0,
  workers: isCI ? 2 : 1,
  reporter: [
    ['list'],
    ['allure-playwright', {
      detail: true,
      resultsDir: process.env['ALLURE_RESULTS_DIR'] ?? 'allure-results',
      suiteTitle: true,
    }],
  ],
  use: {
    apiConfigFile: process.env['API_CONFIG_FILE'],
  },
  projects: [
    {
      name: 'unit',
      testDir: './src/framework/tests/unit',
    },
    {
      name: 'api',
      testDir: './src/framework/tests/api',
      testMatch: /.*\.api\.spec\.ts/,
    },
  ],
  outputDir: 'test-results',
  timeout: parseInt(process.env['PLAYWRIGHT_TIMEOUT'] ?? '30000', 10),
});

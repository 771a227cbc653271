export { ApiClient, withApiClient, type ApiClientOptions } from './clients/api.client.js';
export { ApiResponse } from './clients/api.response.js';
export { PlaywrightTransport } from './clients/transport.js';
export { ApiAssertionError, ConfigurationError, TransportError } from './errors.js';
export * from './helpers/assertions.js';
export { createLogger, type Logger } from './helpers/logger.js';
export { test, expect, type ApiTestFixtures, type ApiWorkerFixtures } from './fixtures/base.fixture.js';
export { loadConfig, describeConfig, configToRecord, type LoadConfigOptions } from '../config/api.config.js';
export * from '../types/index.js';

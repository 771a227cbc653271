// ============================================================
// API Test Kit — Configuration Loader
// defaults → YAML file → environment → explicit overrides
// ============================================================

import dotenv from 'dotenv';
import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../framework/errors.js';
import { mergeHeaders, redactHeaders } from '../framework/helpers/headers.js';
import {
  ApiConfigSchema,
  type ApiConfig,
  type ApiConfigInput,
  type HttpHeaders,
} from '../types/index.js';

dotenv.config();

export const DEFAULT_HEADERS: Readonly<HttpHeaders> = { 'User-Agent': 'api-test-kit/1.0' };

type Env = Record<string, string | undefined>;

// logLevel stays a plain string until the final validation reports it.
type ConfigLayer = Partial<Omit<ApiConfigInput, 'logLevel'>> & { logLevel?: string };

export interface LoadConfigOptions {
  /** YAML file; falls back to API_CONFIG_FILE. */
  configFile?: string;
  /** Defaults to process.env (after .env is loaded). */
  env?: Env;
  overrides?: Partial<ApiConfigInput>;
}

const scalar = z.union([z.string(), z.number(), z.boolean()]).transform(String);

// Keys mirror the documented config file format (snake_case, timeout in seconds).
const ConfigFileSchema = z.object({
  base_url: z.string().optional(),
  timeout: z.number().positive().optional(),
  retry_count: z.number().int().nonnegative().optional(),
  log_level: z.string().optional(),
  default_headers: z.record(scalar).optional(),
});

function formatIssues(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map(issue => {
    const key = issue.path.join('.') || '(root)';
    return `${prefix}${key}: ${issue.message}`;
  });
}

function readConfigFile(configFile: string): ConfigLayer {
  let source: string;
  try {
    source = fs.readFileSync(configFile, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Config file not found: ${configFile}`, [configFile], { cause: err });
  }

  let data: unknown;
  try {
    data = parseYaml(source);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid YAML in config file ${configFile}: ${reason}`, [configFile], { cause: err });
  }

  // An empty document parses to null: no settings.
  if (data === null || data === undefined) return {};

  const result = ConfigFileSchema.safeParse(data);
  if (!result.success) {
    const issues = formatIssues(result.error, `${configFile}: `);
    throw new ConfigurationError(`Invalid config file ${configFile}: ${issues.join(', ')}`, issues);
  }

  const file = result.data;
  return {
    baseUrl: file.base_url,
    timeoutMs: file.timeout === undefined ? undefined : Math.round(file.timeout * 1000),
    retryCount: file.retry_count,
    logLevel: file.log_level === undefined ? undefined : toLogLevel(file.log_level),
    defaultHeaders: file.default_headers,
  };
}

function toLogLevel(value: string): string {
  return value.trim().toUpperCase();
}

function readEnvironment(env: Env, issues: string[]): ConfigLayer {
  const number = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      issues.push(`${name}: expected a number, got '${raw}'`);
      return undefined;
    }
    return value;
  };

  const apiKey = env['API_KEY'];
  const baseUrl = env['BASE_URL'];
  const logLevel = env['LOG_LEVEL'];

  return {
    baseUrl: baseUrl === undefined || baseUrl.trim() === '' ? undefined : baseUrl.trim(),
    timeoutMs: number('API_TIMEOUT_MS'),
    retryCount: number('API_RETRY_COUNT'),
    logLevel: logLevel === undefined || logLevel.trim() === '' ? undefined : toLogLevel(logLevel),
    defaultHeaders: apiKey ? { Authorization: `Bearer ${apiKey}` } : undefined,
  };
}

/**
 * Resolve the settings for one test run. Throws ConfigurationError listing
 * every missing or invalid key; the returned object is deeply frozen.
 */
export function loadConfig(options: LoadConfigOptions = {}): ApiConfig {
  const env = options.env ?? process.env;
  const issues: string[] = [];

  const configFile = options.configFile ?? env['API_CONFIG_FILE'];
  const fromFile = configFile ? readConfigFile(configFile) : {};
  const fromEnv = readEnvironment(env, issues);
  const fromOverrides: ConfigLayer = options.overrides ?? {};

  const raw: ConfigLayer = {
    baseUrl: fromOverrides.baseUrl ?? fromEnv.baseUrl ?? fromFile.baseUrl,
    timeoutMs: fromOverrides.timeoutMs ?? fromEnv.timeoutMs ?? fromFile.timeoutMs,
    retryCount: fromOverrides.retryCount ?? fromEnv.retryCount ?? fromFile.retryCount,
    logLevel: fromOverrides.logLevel ?? fromEnv.logLevel ?? fromFile.logLevel,
    defaultHeaders: mergeHeaders(
      DEFAULT_HEADERS,
      fromFile.defaultHeaders,
      fromEnv.defaultHeaders,
      fromOverrides.defaultHeaders,
    ),
  };

  const result = ApiConfigSchema.safeParse(raw);
  if (!result.success) issues.push(...formatIssues(result.error));

  if (!result.success || issues.length > 0) {
    throw new ConfigurationError(`API config validation failed. Missing/invalid: ${issues.join(', ')}`, issues);
  }

  return Object.freeze({
    ...result.data,
    defaultHeaders: Object.freeze({ ...result.data.defaultHeaders }),
  });
}

/** Safe one-line representation; credentials are hidden. */
export function describeConfig(config: ApiConfig): string {
  const headers = JSON.stringify(redactHeaders(config.defaultHeaders));
  return `ApiConfig(baseUrl='${config.baseUrl}', timeoutMs=${config.timeoutMs}, retryCount=${config.retryCount}, logLevel=${config.logLevel}, headers=${headers})`;
}

export function configToRecord(config: ApiConfig): Record<string, unknown> {
  return {
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    retryCount: config.retryCount,
    logLevel: config.logLevel,
    defaultHeaders: redactHeaders(config.defaultHeaders),
  };
}

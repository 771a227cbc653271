// ============================================================
// API Test Kit — CLI Program
// Inspect the resolved config or fire a single request
// ============================================================

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { configToRecord, describeConfig, loadConfig, type LoadConfigOptions } from '../config/api.config.js';
import { withApiClient } from '../framework/clients/api.client.js';
import type { ApiResponse } from '../framework/clients/api.response.js';
import { ConfigurationError, TransportError } from '../framework/errors.js';
import { HTTP_METHODS, type HttpHeaders, type HttpMethod } from '../types/index.js';

export interface ProgramOutput {
  writeOut(text: string): void;
  writeErr(text: string): void;
}

export interface ProgramOptions {
  output?: ProgramOutput;
  /** Environment handed to loadConfig; defaults to process.env. */
  env?: LoadConfigOptions['env'];
}

const stdio: ProgramOutput = {
  writeOut: text => process.stdout.write(text),
  writeErr: text => process.stderr.write(text),
};

function parseMethod(value: string): HttpMethod {
  const upper = value.toUpperCase();
  const method = HTTP_METHODS.find(m => m === upper);
  if (!method) {
    throw new InvalidArgumentError(`Use one of: ${HTTP_METHODS.join(', ')}`);
  }
  return method;
}

function collectHeader(value: string, previous: HttpHeaders): HttpHeaders {
  const colon = value.indexOf(':');
  if (colon <= 0) {
    throw new InvalidArgumentError(`Expected "Name: value", got '${value}'`);
  }
  return { ...previous, [value.slice(0, colon).trim()]: value.slice(colon + 1).trim() };
}

/** JSON objects and arrays are sent as JSON; anything else as the raw text. */
export function parseData(value: string): unknown {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return value;
  }
  return typeof parsed === 'object' && parsed !== null ? parsed : value;
}

/**
 * Builds the `api-kit` program. Errors leave through commander's exit
 * handling (exit code 1) and are thrown as CommanderError to the caller.
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const output = options.output ?? stdio;
  const print = (line: string) => output.writeOut(`${line}\n`);

  const configOptions = (configFile: string | undefined): LoadConfigOptions => ({
    ...(configFile ? { configFile } : {}),
    ...(options.env ? { env: options.env } : {}),
  });

  function fail(command: Command, err: unknown): never {
    if (err instanceof ConfigurationError) {
      const details = err.issues.map(issue => chalk.gray(`\n  - ${issue}`)).join('');
      command.error(`${chalk.red(err.message)}${details}`, { exitCode: 1, code: 'api-kit.configuration' });
    }
    if (err instanceof TransportError) {
      command.error(chalk.red(err.message), { exitCode: 1, code: 'api-kit.transport' });
    }
    throw err;
  }

  function printResponse(response: ApiResponse): void {
    const colour = response.isSuccessful() ? chalk.green : response.isClientError() ? chalk.yellow : chalk.red;
    print(colour(`${response.method} ${response.url} → ${response.status} ${response.statusText}`));

    const body = response.text();
    if (!body) return;
    try {
      print(JSON.stringify(response.json(), null, 2));
    } catch {
      print(body);
    }
  }

  // Output and exit handling are inherited by subcommands, so they go first.
  const program = new Command()
    .name('api-kit')
    .description('API Test Kit: config inspection and one-off requests')
    .version('0.1.0')
    .configureOutput(output)
    .exitOverride();

  program
    .command('config')
    .description('Print the resolved configuration (credentials hidden)')
    .option('-c, --config <file>', 'YAML config file (defaults to API_CONFIG_FILE)')
    .action((opts: { config?: string }, command: Command) => {
      try {
        const config = loadConfig(configOptions(opts.config));
        print(chalk.bold.cyan(`[api-kit] ${describeConfig(config)}`));
        print(JSON.stringify(configToRecord(config), null, 2));
      } catch (err) {
        fail(command, err);
      }
    });

  program
    .command('request')
    .description('Send one request and print the response')
    .argument('<method>', `HTTP method (${HTTP_METHODS.join(', ')})`, parseMethod)
    .argument('<endpoint>', 'Path joined to the base URL, or an absolute URL')
    .option('-c, --config <file>', 'YAML config file (defaults to API_CONFIG_FILE)')
    .option('-d, --data <body>', 'Request body; a JSON object or array is sent as application/json')
    .option('-H, --header <header>', 'Extra header "Name: value" (repeatable)', collectHeader, {})
    .action(async (
      method: HttpMethod,
      endpoint: string,
      opts: { config?: string; data?: string; header: HttpHeaders },
      command: Command,
    ) => {
      try {
        const config = loadConfig(configOptions(opts.config));
        const response = await withApiClient(config, client =>
          client.request(method, endpoint, {
            headers: opts.header,
            ...(opts.data !== undefined ? { data: parseData(opts.data) } : {}),
          }),
        );
        printResponse(response);
      } catch (err) {
        fail(command, err);
      }
    });

  return program;
}

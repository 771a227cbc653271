// ============================================================
// API Test Kit — Console Logger
// ============================================================

import chalk from 'chalk';
import type { LogLevel } from '../../types/index.js';

const SEVERITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  SILENT: 4,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
}

export function createLogger(scope: string, level: LogLevel = 'INFO'): Logger {
  const enabled = (at: LogLevel): boolean => SEVERITY[at] >= SEVERITY[level];
  const prefix = `[${scope}]`;

  return {
    level,
    debug(message) {
      if (enabled('DEBUG')) console.log(chalk.gray(`${prefix} ${message}`));
    },
    info(message) {
      if (enabled('INFO')) console.log(chalk.cyan(`${prefix} ${message}`));
    },
    warn(message) {
      if (enabled('WARN')) console.warn(chalk.yellow(`${prefix} ${message}`));
    },
    error(message, err) {
      if (!enabled('ERROR')) return;
      const detail = err instanceof Error ? `: ${err.message}` : '';
      console.error(chalk.red(`${prefix} ${message}${detail}`));
    },
  };
}

#!/usr/bin/env node
// ============================================================
// API Test Kit — CLI Entry Point
// ============================================================

import { CommanderError } from 'commander';
import { createProgram } from './cli/program.js';

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  if (!(err instanceof CommanderError)) throw err;
  process.exitCode = err.exitCode;
}

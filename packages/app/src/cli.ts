#!/usr/bin/env node

/**
 * CLI entry point for the pricelens command
 */

// Load environment variables from .env file
import 'dotenv/config';

import chalk from 'chalk';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(error instanceof Error ? (error.stack ?? error.message) : String(error)));
    process.exitCode = 1;
  });

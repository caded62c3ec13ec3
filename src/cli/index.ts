#!/usr/bin/env node
/**
 * Gigasheet CLI entry point
 */

import chalk from 'chalk';
import dotenv from 'dotenv';
import { errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { createProgram } from './program.js';

// Load environment variables
dotenv.config();

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    getLogger().debug('Command failed', { stack: error instanceof Error ? error.stack : undefined });
    console.error(chalk.red.bold('\n✗ ' + errorMessage(error)));
    process.exitCode = 1;
  });

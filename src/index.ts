#!/usr/bin/env node

/**
 * vault-search
 *
 * Searches an Obsidian vault by file name (fd) or content (rg) and prints
 * Alfred Script Filter JSON
 */

import dotenv from 'dotenv';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { run } from './cli/run.js';
import { USAGE, UsageError, VaultSearchError } from './utils/errors.js';
import { logger } from './utils/logger.js';

// Get the directory of this file for relative paths
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

async function main(): Promise<void> {
  // Load environment variables from the package's .env file
  dotenv.config({ path: path.join(__dirname, '..', '.env') });

  await run(process.argv.slice(2), {
    env: process.env,
    write: output => {
      process.stdout.write(output);
    },
  });
}

main().catch(error => {
  if (error instanceof VaultSearchError) {
    logger.error('Main', error.message);
    if (error instanceof UsageError && !error.message.includes(USAGE)) {
      console.error(USAGE);
    }
    process.exit(error.exitCode);
  }
  logger.error('Main', 'Fatal error', error);
  process.exit(1);
});

#!/usr/bin/env node

import { runCli } from './cli.js';
import { loadEnvFiles } from './config.js';
import { logger } from './utils/logger.js';

async function main(): Promise<number> {
  loadEnvFiles();
  return runCli(process.argv.slice(2));
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exitCode = 1;
  });

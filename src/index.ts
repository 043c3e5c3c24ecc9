#!/usr/bin/env node
import { createCLI } from './cli/index.js';
import { logger } from './utils/logger.js';

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`Unexpected error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    process.exit(1);
  });

#!/usr/bin/env node
import dotenv from 'dotenv';
import { createCLI } from './cli/index.js';
import { logger } from './utils/logger.js';

dotenv.config();

createCLI()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(`Unexpected error: ${error}`);
    process.exit(1);
  });

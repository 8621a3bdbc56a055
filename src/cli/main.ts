#!/usr/bin/env node
import { logger } from '../logging/logger.js';
import { run } from './index.js';

run(process.argv).catch((err: unknown) => {
  logger.fatal('unexpected failure', err);
  process.exitCode = 1;
});

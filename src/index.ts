#!/usr/bin/env node
import { main } from './main.js';
import { logger } from './utils/logger.js';

main().catch((error: unknown) => {
  logger.error('server:startup-failed', error);
  process.exit(1);
});

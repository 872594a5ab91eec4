import { logger } from '../../packages/core';
import { CONFIG } from './config';
import { runStudioDemo } from './demo';

logger.level = CONFIG.logLevel;

runStudioDemo(CONFIG).catch((error: unknown) => {
  logger.error({ err: error }, 'studio_demo_failed');
  process.exitCode = 1;
});

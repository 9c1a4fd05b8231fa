/**
 * NBA Score Notifier - Command Line Entry Point
 * 
 * Runs a single notifier invocation, for schedulers that start a process
 * per firing (cron, Kubernetes CronJob). Exits 0 when the digest was
 * published and 1 otherwise.
 */

import { createLogger } from './core/logger.js';
import { handler } from './handler.js';

const logger = createLogger();

handler()
  .then((result) => {
    logger.info({ result }, 'notifier finished');
    process.exitCode = result.code === 200 ? 0 : 1;
  })
  .catch((err) => {
    logger.error({ err }, 'Fatal error occurred');
    process.exitCode = 1;
  });

#!/usr/bin/env node
import { runCli } from './cli';
import { logger } from './logger';

const controller = new AbortController();
const interrupt = () => {
  logger.warn('[CLI] Interrupted, stopping after the current card');
  controller.abort();
};
process.once('SIGINT', interrupt);
process.once('SIGTERM', interrupt);

runCli(process.argv.slice(2), { cwd: process.cwd(), signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  })
  .finally(() => {
    process.off('SIGINT', interrupt);
    process.off('SIGTERM', interrupt);
  });

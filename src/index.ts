#!/usr/bin/env node
import { runCli } from './cli';
import { logger } from './utils';

/**
 * Run the matcher
 */
const main = async (): Promise<void> => {
  // Handle uncaught exceptions
  process.on('uncaughtException', (err: Error) => {
    logger.error(`Uncaught Exception: ${err.stack ?? err.message}`);
    process.exit(1);
  });

  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason: unknown) => {
    logger.error(`Unhandled Rejection: ${String(reason)}`);
    process.exit(1);
  });

  process.exitCode = await runCli(process.argv.slice(2));
};

void main();

#!/usr/bin/env node
import { App } from './app.js';
import { ConfigManager } from './config/ConfigManager.js';
import { initializeLogger, logger } from './middleware/logging.js';
import { ApplicationError } from './errors/index.js';
import { getErrorMessage } from './utils/errorHandling.js';

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection detected - this indicates a bug that must be fixed', {
    reason: reason instanceof Error ? {
      name: reason.name,
      message: reason.message,
      stack: reason.stack,
    } : reason,
  });
  process.exit(1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception detected - this indicates a bug that must be fixed', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });
  process.exit(1);
});

async function main(): Promise<number> {
  try {
    ConfigManager.getInstance().validate();
  } catch (error) {
    process.stderr.write(`reeltag: ${getErrorMessage(error)}\n`);
    return error instanceof ApplicationError ? error.exitStatus : 78;
  }
  initializeLogger();

  return new App().run(process.argv.slice(2));
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error('Failed to start reeltag:', error);
    process.exit(1);
  });

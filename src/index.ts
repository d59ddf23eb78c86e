#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof Error && error.name === 'ExitPromptError') {
    logger.warn('Cancelled.');
  } else {
    logger.error(error instanceof Error ? error.message : String(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  }
  process.exitCode = 1;
});

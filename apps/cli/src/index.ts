#!/usr/bin/env node
import 'dotenv/config';
import { getErrorMessage } from '@tagstore/core';
import { getLogger } from '@tagstore/logger';
import { Command } from 'commander';

import { registerCompositionCommand } from './features/composition/composition.js';
import { registerDedupCommand } from './features/dedup/dedup.js';
import { registerInitCommand } from './features/init/init.js';
import { registerQualityCommand } from './features/quality/quality.js';
import { registerRefreshViewsCommand } from './features/refresh-views/refresh-views.js';
import { registerStatusCommand } from './features/status/status.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program.name('tagstore').description('Attribution tag store maintenance').version('0.1.0');

  registerInitCommand(program);
  registerStatusCommand(program);
  registerQualityCommand(program);
  registerDedupCommand(program);
  registerRefreshViewsCommand(program);
  registerCompositionCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${getErrorMessage(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(1);
});

main().catch((error) => {
  logger.error(`CLI failed: ${getErrorMessage(error)}`);
  process.exit(1);
});

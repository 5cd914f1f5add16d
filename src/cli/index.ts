#!/usr/bin/env node

import { Command } from 'commander';
import { nodesCommand } from './commands/nodes';
import { runCommand } from './commands/run';
import { topCommand } from './commands/top';
import { sessionsCommand } from './commands/sessions';
import { AppError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const program = new Command();

program
  .name('fleetdispatch')
  .description('Run commands and collect status across a fleet of remote nodes')
  .version('1.0.0');

nodesCommand(program);
runCommand(program);
topCommand(program);
sessionsCommand(program);

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
  process.exitCode = 1;
});

program.parseAsync(process.argv).catch((error: unknown) => {
  const code = error instanceof AppError && error.code ? ` [${error.code}]` : '';
  console.error(`Error${code}: ${errorMessage(error)}`);
  process.exit(1);
});

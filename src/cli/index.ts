#!/usr/bin/env node
// Load environment variables before anything reads them
import 'dotenv/config';
import { Command } from 'commander';
import { registerBookCommands } from './commands/book';
import { registerLendingCommands } from './commands/lending';
import { registerQueueCommands } from './commands/queue';
import { registerUserCommands } from './commands/user';
import { registerSystemCommands } from './commands/system';
import { registerConfigCommands } from './commands/config';
import { cliLogger } from './container';
import { errorMessage, printError } from './utils/output';
import { logFailure } from './utils/run';

const program = new Command();

program
  .name('lending')
  .description('Library lending desk: scan, borrow, return and queue for books')
  .version('1.0.0');

// Register command modules
registerBookCommands(program);
registerLendingCommands(program);
registerQueueCommands(program);
registerUserCommands(program);
registerSystemCommands(program);
registerConfigCommands(program);

// Parse and execute
program.parseAsync(process.argv).catch((error: unknown) => {
  logFailure(cliLogger, 'lending', error);
  printError(errorMessage(error));
  process.exit(1);
});

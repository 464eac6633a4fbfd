import type { Logger } from '../../core/ports';
import { isLendingError } from '../../core/errors';
import { cliLogger, getCliContainer, type CliContainer } from '../container';
import { errorMessage, printError } from './output';

// Lookups and credential checks that fail are caller mistakes; everything else is a fault
export function logFailure(logger: Logger, command: string, error: unknown): void {
  if (isLendingError(error) && (error.code === 'NOT_FOUND' || error.code === 'UNAUTHORIZED')) {
    logger.warn({ err: error, command, code: error.code }, `${command}: ${error.message}`);
    return;
  }
  logger.error({ err: error, command }, `${command}: ${errorMessage(error)}`);
}

// Run a command body against the CLI container
// Failures print "<failure>: <reason>" and set exit code 1; the database is always closed
export async function runCommand(failure: string, body: (container: CliContainer) => Promise<void>): Promise<void> {
  let container: CliContainer | null = null;
  try {
    container = await getCliContainer();
    await body(container);
  } catch (error) {
    logFailure(cliLogger, failure, error);
    printError(`${failure}: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    await container?.disconnect();
  }
}

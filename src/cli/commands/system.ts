import { Command } from 'commander';
import { CIRCULATION_STATUSES, type Logger } from '../../core/ports';
import { ping, type SqliteDatabase } from '../../infra/db/sqlite';
import { cliLogger } from '../container';
import { parseLimit } from '../utils/options';
import { logFailure, runCommand } from '../utils/run';
import { formatDate, printError, printInfo, printSuccess, printTable } from '../utils/output';

// Print the connection check; a failure is reported once and marks the exit code
export async function reportStoreHealth(db: SqliteDatabase, logger: Logger): Promise<boolean> {
  try {
    await ping(db);
    printSuccess('Database connection: OK');
    return true;
  } catch (error) {
    logFailure(logger, 'status', error);
    printError('Database connection: FAILED');
    process.exitCode = 1;
    return false;
  }
}

// Register store health and transaction log commands (status, transactions)
export function registerSystemCommands(program: Command): void {
  program
    .command('status')
    .description('Show store health and circulation statistics')
    .action(async () => {
      await runCommand('Failed to get status', async ({ db, catalog, config }) => {
        if (!(await reportStoreHealth(db, cliLogger))) {
          return;
        }

        const books = await catalog.list();
        console.log(`\n=== ${config.libraryName()} ===\n`);
        printTable(
          ['Status', 'Count'],
          CIRCULATION_STATUSES.map((status) => [
            status,
            String(books.filter((book) => book.status === status).length),
          ]),
        );
        printInfo(`${books.length} book(s) in catalog`);
      });
    });

  program
    .command('transactions')
    .description('Show the borrow/return log, newest first')
    .option('-b, --book <bookId>', 'Only entries for this book')
    .option('-l, --limit <n>', 'Maximum entries to show', parseLimit, 20)
    .action(async (options: { book?: string; limit: number }) => {
      await runCommand('Failed to list transactions', async ({ transactions }) => {
        const records = await transactions.list({ bookId: options.book, limit: options.limit });
        if (records.length === 0) {
          printInfo('No transactions recorded');
          return;
        }

        printTable(
          ['Time', 'Action', 'Book ID', 'Student ID'],
          records.map((record) => [formatDate(record.occurredAt), record.action, record.bookId, record.studentId]),
        );
      });
    });
}

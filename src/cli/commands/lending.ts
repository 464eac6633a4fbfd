import { Command } from 'commander';
import { runCommand } from '../utils/run';
import { printInfo, printSuccess, printWarning } from '../utils/output';

// Register borrow and return commands
export function registerLendingCommands(program: Command): void {
  program
    .command('borrow <bookId> <studentId>')
    .description('Lend a book to a student')
    .requiredOption('-s, --secret <secret>', "Student's password")
    .action(async (bookId: string, studentId: string, options: { secret: string }) => {
      await runCommand('Failed to borrow book', async ({ orchestrator }) => {
        const result = await orchestrator.borrow(bookId, studentId, options.secret);

        if (result.success) {
          printSuccess(result.message);
          return;
        }

        // Not an error: the book is out or held for someone else
        printWarning(result.message);
        if (result.reason === 'unavailable') {
          printInfo(`Join the waiting list with: queue join ${bookId} ${studentId}`);
        }
      });
    });

  program
    .command('return <bookId> <studentId>')
    .description('Accept a returned book; reserves it for the next student in line')
    .action(async (bookId: string, studentId: string) => {
      await runCommand('Failed to return book', async ({ orchestrator }) => {
        const result = await orchestrator.returnBook(bookId, studentId);
        printSuccess(result.message);
      });
    });
}

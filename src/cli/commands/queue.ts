import { Command } from 'commander';
import { runCommand } from '../utils/run';
import { formatDate, printInfo, printSuccess, printTable } from '../utils/output';

// Register waiting list commands (join, show)
export function registerQueueCommands(program: Command): void {
  const queueCmd = program.command('queue').description('Waiting list commands');

  queueCmd
    .command('join <bookId> <studentId>')
    .description('Add a student to the waiting list of a book')
    .action(async (bookId: string, studentId: string) => {
      await runCommand('Failed to join waiting list', async ({ orchestrator }) => {
        const result = await orchestrator.enqueue(bookId, studentId);
        printSuccess(result.message);
      });
    });

  // Positions are 1-based in serving order
  queueCmd
    .command('show <bookId>')
    .description('List the waiting list of a book in serving order')
    .action(async (bookId: string) => {
      await runCommand('Failed to show waiting list', async ({ orchestrator, waitlist }) => {
        await orchestrator.lookup(bookId);
        const entries = await waitlist.findAll(bookId);

        if (entries.length === 0) {
          printInfo(`Nobody is waiting for ${bookId}`);
          return;
        }

        printTable(
          ['Position', 'Student ID', 'Joined At', 'Entry ID'],
          entries.map((entry, index) => [
            String(index + 1),
            entry.studentId,
            formatDate(entry.enqueuedAt),
            entry.id,
          ]),
        );
      });
    });
}

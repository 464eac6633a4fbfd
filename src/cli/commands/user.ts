import { Command } from 'commander';
import { runCommand } from '../utils/run';
import { printSuccess } from '../utils/output';

// Register student account commands (register, passwd)
export function registerUserCommands(program: Command): void {
  const userCmd = program.command('user').description('Student accounts');

  // Re-registering an existing id replaces its name and password
  userCmd
    .command('register <studentId> <displayName>')
    .description('Register or update a student')
    .requiredOption('-s, --secret <secret>', 'Password for the student')
    .action(async (studentId: string, displayName: string, options: { secret: string }) => {
      await runCommand('Failed to register student', async ({ accounts }) => {
        const user = await accounts.register(studentId, displayName, options.secret);
        printSuccess(`Registered ${user.displayName} (${user.id})`);
      });
    });

  userCmd
    .command('passwd <studentId>')
    .description("Change a student's password")
    .requiredOption('-c, --current <secret>', 'Current password')
    .requiredOption('-n, --next <secret>', 'New password')
    .action(async (studentId: string, options: { current: string; next: string }) => {
      await runCommand('Failed to change password', async ({ accounts }) => {
        await accounts.changeSecret(studentId, options.current, options.next);
        printSuccess(`Password changed for ${studentId}`);
      });
    });
}

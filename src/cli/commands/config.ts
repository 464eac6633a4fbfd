import { Command } from 'commander';
import { env } from '../../infra/env';
import { runCommand } from '../utils/run';
import { printTable } from '../utils/output';

export function registerConfigCommands(program: Command): void {
  const configCmd = program.command('config').description('Configuration viewing');

  configCmd
    .command('show')
    .description('Display current configuration and message templates')
    .action(async () => {
      await runCommand('Failed to show config', async ({ config }) => {
        console.log('\n=== Current Configuration ===\n');
        printTable(
          ['Setting', 'Value'],
          [
            ['Library', config.libraryName()],
            ['Untitled Label', config.untitledLabel()],
            ['Database', env.DATABASE_PATH],
            ['Policy File', env.POLICY_PATH],
          ],
        );

        console.log('\n=== Message Templates ===\n');
        for (const [name, template] of Object.entries(config.messages())) {
          console.log(`${name}:`);
          console.log(`  "${template}"\n`);
        }
      });
    });
}

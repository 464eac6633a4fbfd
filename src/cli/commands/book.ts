import path from 'path';
import { Command } from 'commander';
import { displayTitle } from '../../core/domain/circulation';
import { CatalogSeedSchema } from '../../infra/config/policySchema';
import { loadCatalogSeed } from '../../infra/services/catalogSeeder';
import { runCommand } from '../utils/run';
import { formatParty, formatStatus, printInfo, printSuccess, printTable, printWarning } from '../utils/output';

// Register catalog commands (scan, list, add, seed)
export function registerBookCommands(program: Command): void {
  const bookCmd = program.command('book').description('Catalog lookup and seeding');

  // scan <bookId> is what a QR scan resolves to: status plus advisory hint
  bookCmd
    .command('scan <bookId>')
    .description('Show the circulation status of a book')
    .action(async (bookId: string) => {
      await runCommand('Failed to scan book', async ({ orchestrator }) => {
        const { data, message } = await orchestrator.lookup(bookId);

        printTable(
          ['Field', 'Value'],
          [
            ['Book ID', data.bookId],
            ['Title', data.title],
            ['Status', formatStatus(data.status)],
            ['Holder', formatParty(data.holder)],
            ['Reserved For', formatParty(data.reservation)],
          ],
        );

        if (message) {
          printInfo(message);
        }
      });
    });

  bookCmd
    .command('list')
    .description('List every book in the catalog')
    .action(async () => {
      await runCommand('Failed to list books', async ({ catalog, config }) => {
        const books = await catalog.list();

        if (books.length === 0) {
          printInfo('Catalog is empty. Seed it with "book seed".');
          return;
        }

        printTable(
          ['ID', 'ISBN', 'Title', 'Status', 'Holder', 'Reserved For'],
          books.map((book) => [
            book.id,
            book.isbn ?? '-',
            displayTitle(book.title, config.untitledLabel()),
            formatStatus(book.status),
            formatParty(book.holder),
            formatParty(book.reservation),
          ]),
        );
      });
    });

  bookCmd
    .command('add <bookId> <title>')
    .description('Add a single book to the catalog as Available')
    .option('-i, --isbn <isbn>', 'ISBN of the book')
    .action(async (bookId: string, title: string, options: { isbn?: string }) => {
      await runCommand('Failed to add book', async ({ seeder }) => {
        const report = await seeder.seed(CatalogSeedSchema.parse([{ id: bookId, title, isbn: options.isbn }]));
        if (report.inserted.length === 1) {
          printSuccess(`Added ${bookId}: ${title}`);
        } else {
          printWarning(`Book ${bookId} already exists; left unchanged`);
        }
      });
    });

  bookCmd
    .command('seed [file]')
    .description('Insert books from a JSON seed file (existing ids are skipped)')
    .action(async (file: string | undefined) => {
      await runCommand('Failed to seed catalog', async ({ seeder }) => {
        const seedPath = path.resolve(process.cwd(), file ?? 'config/catalog.json');
        const report = await seeder.seed(loadCatalogSeed(seedPath));

        printSuccess(`Inserted ${report.inserted.length} book(s) from ${seedPath}`);
        if (report.skipped.length > 0) {
          printInfo(`Skipped existing: ${report.skipped.join(', ')}`);
        }
      });
    });
}

import fs from 'fs';
import type { CatalogRepository, Logger } from '../../core/ports';
import { CatalogSeedSchema, type CatalogSeed } from '../config/policySchema';

export interface SeedReport {
  inserted: string[];
  skipped: string[];
}

// Read and validate a catalog seed file (JSON array of { id, title, isbn? })
export function loadCatalogSeed(seedPath: string): CatalogSeed {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(seedPath, 'utf-8'));
  } catch (error) {
    throw new Error(`Failed to read catalog seed at ${seedPath}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return CatalogSeedSchema.parse(raw);
}

// Books enter the catalog out-of-band, always as Available
// Existing ids are skipped so seeding never resets circulation state
export class CatalogSeeder {
  constructor(
    private readonly catalog: CatalogRepository,
    private readonly logger: Logger,
  ) {}

  async seed(books: CatalogSeed): Promise<SeedReport> {
    const report: SeedReport = { inserted: [], skipped: [] };

    for (const book of books) {
      const inserted = await this.catalog.insertIfMissing(book);
      (inserted ? report.inserted : report.skipped).push(book.id);
    }

    this.logger.info(
      { inserted: report.inserted.length, skipped: report.skipped.length },
      'Catalog seed applied',
    );
    return report;
  }
}

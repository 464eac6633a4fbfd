import type { BookPatch, BookRecord, CatalogRepository, NewBook, Party } from '../../core/ports';
import { NotFoundError } from '../../core/errors';
import { applyPatch, isCirculationStatus } from '../../core/domain/circulation';
import { guard, type SqliteDatabase } from '../db/sqlite';

interface BookRow {
  id: string;
  isbn: string | null;
  title: string;
  status: string;
  holder_id: string | null;
  holder_name: string | null;
  reserved_id: string | null;
  reserved_name: string | null;
}

interface BookWrite {
  id: string;
  status: string;
  holder_id: string | null;
  holder_name: string | null;
  reserved_id: string | null;
  reserved_name: string | null;
  updated_at: string;
}

const toParty = (id: string | null, name: string | null): Party | undefined =>
  id === null ? undefined : { id, name: name ?? id };

// Transform a books row into the port BookRecord
// null columns become absent fields
const toBookRecord = (row: BookRow): BookRecord => {
  if (!isCirculationStatus(row.status)) {
    throw new Error(`Book ${row.id} has unknown status "${row.status}"`);
  }

  return {
    id: row.id,
    isbn: row.isbn ?? undefined,
    title: row.title,
    status: row.status,
    holder: toParty(row.holder_id, row.holder_name),
    reservation: toParty(row.reserved_id, row.reserved_name),
  };
};

// SQLite repository implementing CatalogRepository port interface
export class SqliteCatalogRepository implements CatalogRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async find(bookId: string): Promise<BookRecord | null> {
    return guard('catalog.find', () => {
      const row = this.db.prepare<[string], BookRow>('SELECT * FROM books WHERE id = ?').get(bookId);
      return row ? toBookRecord(row) : null;
    });
  }

  // Read, merge and write back in one SQLite transaction
  // Every circulation column is rewritten so cleared slots become NULL
  async update(bookId: string, patch: BookPatch): Promise<BookRecord> {
    const updated = await guard('catalog.update', () =>
      this.db.transaction((): BookRecord | null => {
        const row = this.db.prepare<[string], BookRow>('SELECT * FROM books WHERE id = ?').get(bookId);
        if (!row) {
          return null;
        }

        const next = applyPatch(toBookRecord(row), patch);
        this.db
          .prepare<BookWrite>(
            `UPDATE books
             SET status = @status,
                 holder_id = @holder_id, holder_name = @holder_name,
                 reserved_id = @reserved_id, reserved_name = @reserved_name,
                 updated_at = @updated_at
             WHERE id = @id`,
          )
          .run({
            id: bookId,
            status: next.status,
            holder_id: next.holder?.id ?? null,
            holder_name: next.holder?.name ?? null,
            reserved_id: next.reservation?.id ?? null,
            reserved_name: next.reservation?.name ?? null,
            updated_at: new Date().toISOString(),
          });
        return next;
      })(),
    );

    if (!updated) {
      throw new NotFoundError(`Book ${bookId} not found`);
    }
    return updated;
  }

  async list(): Promise<BookRecord[]> {
    return guard('catalog.list', () =>
      this.db.prepare<[], BookRow>('SELECT * FROM books ORDER BY id').all().map(toBookRecord),
    );
  }

  // New books start Available; an existing id is left exactly as it is
  async insertIfMissing(book: NewBook): Promise<boolean> {
    return guard('catalog.insert', () => {
      const result = this.db
        .prepare<[string, string | null, string, string]>(
          `INSERT INTO books (id, isbn, title, status, updated_at)
           VALUES (?, ?, ?, 'Available', ?)
           ON CONFLICT(id) DO NOTHING`,
        )
        .run(book.id, book.isbn ?? null, book.title, new Date().toISOString());
      return result.changes === 1;
    });
  }
}

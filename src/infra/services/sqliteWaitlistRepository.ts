import type { NewWaitlistEntry, WaitlistEntry, WaitlistRepository } from '../../core/ports';
import { guard, type SqliteDatabase } from '../db/sqlite';

interface WaitlistRow {
  sequence: number;
  id: string;
  book_id: string;
  student_id: string;
  enqueued_at: string;
}

const toEntry = (row: WaitlistRow): WaitlistEntry => ({
  id: row.id,
  bookId: row.book_id,
  studentId: row.student_id,
  enqueuedAt: new Date(row.enqueued_at),
  sequence: row.sequence,
});

// SQLite repository implementing WaitlistRepository port interface
// AUTOINCREMENT sequence gives the insertion order; it never reuses a value
export class SqliteWaitlistRepository implements WaitlistRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async findAll(bookId: string): Promise<WaitlistEntry[]> {
    return guard('waitlist.findAll', () =>
      this.db
        .prepare<[string], WaitlistRow>('SELECT * FROM waitlist WHERE book_id = ? ORDER BY sequence ASC')
        .all(bookId)
        .map(toEntry),
    );
  }

  async append(entry: NewWaitlistEntry): Promise<WaitlistEntry> {
    return guard('waitlist.append', () => {
      const result = this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO waitlist (id, book_id, student_id, enqueued_at) VALUES (?, ?, ?, ?)',
        )
        .run(entry.id, entry.bookId, entry.studentId, entry.enqueuedAt.toISOString());
      return { ...entry, sequence: Number(result.lastInsertRowid) };
    });
  }

  // Removes exactly this entry; the rest keep their sequence numbers
  async remove(entry: WaitlistEntry): Promise<void> {
    await guard('waitlist.remove', () => {
      this.db.prepare<[string]>('DELETE FROM waitlist WHERE id = ?').run(entry.id);
    });
  }
}

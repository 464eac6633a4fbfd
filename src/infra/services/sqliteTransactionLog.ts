import type { TransactionAction, TransactionLog, TransactionRecord } from '../../core/ports';
import { guard, type SqliteDatabase } from '../db/sqlite';

interface TransactionRow {
  id: number;
  occurred_at: string;
  action: TransactionAction;
  book_id: string;
  student_id: string;
}

export interface TransactionListFilters {
  bookId?: string;
  limit?: number;
}

export type LoggedTransaction = TransactionRecord & { id: number };

// SQLite implementation of the append-only transaction log
// Records are never updated or deleted
export class SqliteTransactionLog implements TransactionLog {
  constructor(private readonly db: SqliteDatabase) {}

  async append(record: TransactionRecord): Promise<void> {
    await guard('transactions.append', () => {
      this.db
        .prepare<[string, string, string, string]>(
          'INSERT INTO transactions (occurred_at, action, book_id, student_id) VALUES (?, ?, ?, ?)',
        )
        .run(record.occurredAt.toISOString(), record.action, record.bookId, record.studentId);
    });
  }

  // Newest first; only the CLI reads the log
  async list(filters: TransactionListFilters = {}): Promise<LoggedTransaction[]> {
    const limit = filters.limit ?? 50;
    return guard('transactions.list', () => {
      const rows =
        filters.bookId === undefined
          ? this.db
              .prepare<[number], TransactionRow>('SELECT * FROM transactions ORDER BY id DESC LIMIT ?')
              .all(limit)
          : this.db
              .prepare<[string, number], TransactionRow>(
                'SELECT * FROM transactions WHERE book_id = ? ORDER BY id DESC LIMIT ?',
              )
              .all(filters.bookId, limit);

      return rows.map((row) => ({
        id: row.id,
        occurredAt: new Date(row.occurred_at),
        action: row.action,
        bookId: row.book_id,
        studentId: row.student_id,
      }));
    });
  }
}

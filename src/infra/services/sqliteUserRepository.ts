import type { UserRecord, UserRepository } from '../../core/ports';
import { NotFoundError } from '../../core/errors';
import { guard, type SqliteDatabase } from '../db/sqlite';

interface UserRow {
  id: string;
  display_name: string;
  secret: string;
}

const toUserRecord = (row: UserRow): UserRecord => ({
  id: row.id,
  displayName: row.display_name,
  secret: row.secret,
});

// SQLite repository implementing UserRepository (and so UserDirectory)
// Secrets are stored as given; their format is outside the lending core
export class SqliteUserRepository implements UserRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async find(studentId: string): Promise<UserRecord | null> {
    return guard('users.find', () => {
      const row = this.db
        .prepare<[string], UserRow>('SELECT id, display_name, secret FROM users WHERE id = ?')
        .get(studentId);
      return row ? toUserRecord(row) : null;
    });
  }

  async upsert(user: UserRecord): Promise<UserRecord> {
    return guard('users.upsert', () => {
      const now = new Date().toISOString();
      this.db
        .prepare<[string, string, string, string, string]>(
          `INSERT INTO users (id, display_name, secret, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             display_name = excluded.display_name,
             secret = excluded.secret,
             updated_at = excluded.updated_at`,
        )
        .run(user.id, user.displayName, user.secret, now, now);
      return { ...user };
    });
  }

  async updateSecret(studentId: string, secret: string): Promise<void> {
    const changes = await guard('users.updateSecret', () =>
      this.db
        .prepare<[string, string, string]>('UPDATE users SET secret = ?, updated_at = ? WHERE id = ?')
        .run(secret, new Date().toISOString(), studentId).changes,
    );
    if (changes === 0) {
      throw new NotFoundError(`Student ${studentId} not found`);
    }
  }
}

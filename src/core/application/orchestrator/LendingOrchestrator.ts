import { randomUUID } from 'node:crypto';
import type {
  BookRecord,
  CatalogRepository,
  CirculationStatus,
  Config,
  Logger,
  Party,
  TransactionAction,
  TransactionLog,
  UserDirectory,
  WaitlistRepository,
} from '../../ports';
import { NotFoundError, UnauthorizedError } from '../../errors';
import { displayTitle, earliest, lendTo, reserveFor, secretsMatch, shelve } from '../../domain/circulation';
import { renderTemplate } from '../../utils/template';
import { KeyedMutex } from '../locks/KeyedMutex';

// ==================== Results ====================

export interface Success<T> {
  success: true;
  message: string;
  data: T;
}

// A borrow that the book's current status does not allow
export type BorrowRejection =
  | { success: false; message: string; reason: 'unavailable'; canQueue: true }
  | { success: false; message: string; reason: 'reserved'; reservedFor: Party };

export type BorrowResult = Success<{ bookId: string; title: string }> | BorrowRejection;

export type ReturnResult = Success<{ bookId: string; status: CirculationStatus; promoted?: Party }>;

export type EnqueueResult = Success<{ bookId: string; entryId: string; position: number }>;

export interface BookStatusView {
  bookId: string;
  title: string;
  status: CirculationStatus;
  holder?: Party;
  reservation?: Party;
}

export type LookupResult = Success<BookStatusView>;

export interface OrchestratorOptions {
  locks?: KeyedMutex;
  clock?: () => Date;
  newId?: () => string;
}

/**
 * Lending state machine. Every mutating operation on a book runs inside that
 * book's lock, so the read-branch-mutate sequence is atomic per book id.
 */
export class LendingOrchestrator {
  private readonly locks: KeyedMutex;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly users: UserDirectory,
    private readonly catalog: CatalogRepository,
    private readonly waitlist: WaitlistRepository,
    private readonly transactions: TransactionLog,
    private readonly config: Config,
    private readonly logger: Logger,
    options: OrchestratorOptions = {},
  ) {
    this.locks = options.locks ?? new KeyedMutex();
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  borrow(bookId: string, studentId: string, secret: string): Promise<BorrowResult> {
    return this.locks.runExclusive(bookId, async () => {
      const user = await this.users.find(studentId);
      if (!user) {
        throw new NotFoundError(`Student ${studentId} not found`);
      }
      if (!secretsMatch(secret, user.secret)) {
        throw new UnauthorizedError(`Credentials rejected for student ${studentId}`);
      }

      const book = await this.requireBook(bookId);
      const templates = this.config.messages();

      if (book.status === 'Borrowed') {
        this.logger.info({ bookId, studentId }, 'Borrow rejected: book already borrowed');
        return {
          success: false,
          message: renderTemplate(templates.borrow_unavailable, { title: this.titleOf(book) }),
          reason: 'unavailable',
          canQueue: true,
        };
      }

      if (book.status === 'Reserved' && book.reservation && book.reservation.id !== studentId) {
        const reservedFor = book.reservation;
        this.logger.info(
          { bookId, studentId, reservedFor: reservedFor.id },
          'Borrow rejected: book reserved for another student',
        );
        return {
          success: false,
          message: renderTemplate(templates.borrow_reserved, {
            reserved_name: reservedFor.name,
            reserved_id: reservedFor.id,
          }),
          reason: 'reserved',
          reservedFor,
        };
      }

      await this.catalog.update(bookId, lendTo({ id: user.id, name: user.displayName }));
      await this.record('Borrow', bookId, studentId);
      this.logger.info({ bookId, studentId, from: book.status, to: 'Borrowed' }, 'Book borrowed');

      const title = this.titleOf(book);
      return {
        success: true,
        message: renderTemplate(templates.borrow_success, { title }),
        data: { bookId, title },
      };
    });
  }

  // The returning student is recorded as given; it is not checked against the holder
  returnBook(bookId: string, studentId: string): Promise<ReturnResult> {
    return this.locks.runExclusive(bookId, async () => {
      const book = await this.requireBook(bookId);
      const templates = this.config.messages();

      const next = earliest(await this.waitlist.findAll(bookId));

      if (next) {
        const entrant = await this.users.find(next.studentId);
        const promoted: Party = { id: next.studentId, name: entrant?.displayName ?? next.studentId };

        await this.catalog.update(bookId, reserveFor(promoted));
        await this.waitlist.remove(next);
        await this.record('Return', bookId, studentId);
        this.logger.info(
          { bookId, studentId, from: book.status, to: 'Reserved', promoted: promoted.id, entryId: next.id },
          'Book returned and reserved for next in line',
        );

        return {
          success: true,
          message: renderTemplate(templates.return_reserved, {
            reserved_name: promoted.name,
            reserved_id: promoted.id,
          }),
          data: { bookId, status: 'Reserved', promoted },
        };
      }

      await this.catalog.update(bookId, shelve());
      await this.record('Return', bookId, studentId);
      this.logger.info({ bookId, studentId, from: book.status, to: 'Available' }, 'Book returned to shelf');

      return {
        success: true,
        message: renderTemplate(templates.return_shelved, { title: this.titleOf(book) }),
        data: { bookId, status: 'Available' },
      };
    });
  }

  // No guard against duplicate entries or entries by the current holder
  enqueue(bookId: string, studentId: string): Promise<EnqueueResult> {
    return this.locks.runExclusive(bookId, async () => {
      await this.requireBook(bookId);

      const entry = await this.waitlist.append({
        id: this.newId(),
        bookId,
        studentId,
        enqueuedAt: this.clock(),
      });

      // Position is the current count, so it shifts once earlier entries are served
      const position = (await this.waitlist.findAll(bookId)).length;
      this.logger.info({ bookId, studentId, entryId: entry.id, position }, 'Student joined waiting list');

      return {
        success: true,
        message: renderTemplate(this.config.messages().queue_joined, { position }),
        data: { bookId, entryId: entry.id, position },
      };
    });
  }

  async lookup(bookId: string): Promise<LookupResult> {
    const book = await this.requireBook(bookId);
    const templates = this.config.messages();

    let message = '';
    if (book.status === 'Available') {
      message = templates.scan_available;
    } else if (book.status === 'Borrowed') {
      message = templates.scan_borrowed;
    }

    return {
      success: true,
      message,
      data: {
        bookId: book.id,
        title: this.titleOf(book),
        status: book.status,
        holder: book.holder,
        reservation: book.reservation,
      },
    };
  }

  private async requireBook(bookId: string): Promise<BookRecord> {
    const book = await this.catalog.find(bookId);
    if (!book) {
      throw new NotFoundError(`Book ${bookId} not found`);
    }
    return book;
  }

  private titleOf(book: BookRecord): string {
    return displayTitle(book.title, this.config.untitledLabel());
  }

  private async record(action: TransactionAction, bookId: string, studentId: string): Promise<void> {
    await this.transactions.append({ occurredAt: this.clock(), action, bookId, studentId });
  }
}

/**
 * Consolidated port interfaces for the lending system.
 * Organized into logical groupings: domain types, configuration, stores, logging.
 */

// ==================== Domain Types ====================

export type CirculationStatus = 'Available' | 'Borrowed' | 'Reserved';

export const CIRCULATION_STATUSES: readonly CirculationStatus[] = ['Available', 'Borrowed', 'Reserved'];

// A student as seen on a book record (holder or reservation target)
export interface Party {
  id: string;
  name: string;
}

export interface BookRecord {
  id: string;
  isbn?: string;
  title: string;
  status: CirculationStatus;
  holder?: Party;
  reservation?: Party;
}

// null clears a slot, undefined leaves it untouched
export interface BookPatch {
  status?: CirculationStatus;
  holder?: Party | null;
  reservation?: Party | null;
}

export interface NewBook {
  id: string;
  title: string;
  isbn?: string;
}

export interface UserRecord {
  id: string;
  displayName: string;
  secret: string;
}

export interface WaitlistEntry {
  id: string;
  bookId: string;
  studentId: string;
  enqueuedAt: Date;
  sequence: number;
}

export type NewWaitlistEntry = Omit<WaitlistEntry, 'sequence'>;

export type TransactionAction = 'Borrow' | 'Return';

export interface TransactionRecord {
  occurredAt: Date;
  action: TransactionAction;
  bookId: string;
  studentId: string;
}

// ==================== Configuration ====================

export interface MessageTemplates {
  scan_available: string;
  scan_borrowed: string;
  borrow_success: string;
  borrow_unavailable: string;
  borrow_reserved: string;
  return_reserved: string;
  return_shelved: string;
  queue_joined: string;
}

/**
 * Synchronous configuration service.
 * Loaded once at startup from the policy file.
 */
export interface Config {
  untitledLabel(): string;
  messages(): MessageTemplates;
}

// ==================== Data Repositories ====================

/**
 * Read side of the student directory. The lending engine never writes here.
 */
export interface UserDirectory {
  find(studentId: string): Promise<UserRecord | null>;
}

/**
 * Registration-side writes, used by AccountService only.
 */
export interface UserRepository extends UserDirectory {
  upsert(user: UserRecord): Promise<UserRecord>;
  updateSecret(studentId: string, secret: string): Promise<void>;
}

export interface CatalogRepository {
  find(bookId: string): Promise<BookRecord | null>;
  update(bookId: string, patch: BookPatch): Promise<BookRecord>;
  list(): Promise<BookRecord[]>;
  insertIfMissing(book: NewBook): Promise<boolean>;
}

export interface WaitlistRepository {
  findAll(bookId: string): Promise<WaitlistEntry[]>;
  append(entry: NewWaitlistEntry): Promise<WaitlistEntry>;
  remove(entry: WaitlistEntry): Promise<void>;
}

/**
 * Append-only audit trail of circulation events.
 */
export interface TransactionLog {
  append(record: TransactionRecord): Promise<void>;
}

// ==================== Logging ====================

/**
 * Logger abstraction for infrastructure-independent logging.
 */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

export type LendingErrorCode = 'NOT_FOUND' | 'UNAUTHORIZED' | 'STORE_UNAVAILABLE';

// Base class for failures that stop an operation before it completes
// Conflicts (book borrowed or reserved for someone else) are results, not errors
export class LendingError extends Error {
  constructor(
    readonly code: LendingErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends LendingError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class UnauthorizedError extends LendingError {
  constructor(message: string) {
    super('UNAUTHORIZED', message);
  }
}

// Raised by store adapters when the backing store cannot be read or written
export class StoreUnavailableError extends LendingError {
  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('STORE_UNAVAILABLE', `Store unavailable during ${operation}: ${detail}`, { cause });
  }
}

export const isLendingError = (error: unknown): error is LendingError => error instanceof LendingError;

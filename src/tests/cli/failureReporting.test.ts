import { describe, it, expect, vi, afterEach } from 'vitest';
import { NotFoundError, StoreUnavailableError, UnauthorizedError } from '../../core/errors';
import type { Logger } from '../../core/ports';
import { openDatabase, IN_MEMORY } from '../../infra/db/sqlite';
import { logFailure } from '../../cli/utils/run';
import { parseLimit } from '../../cli/utils/options';
import { reportStoreHealth } from '../../cli/commands/system';

const mockLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}) satisfies Logger;

describe('logFailure', () => {
  it('logs a missing book at warn with its code and the command label', () => {
    const logger = mockLogger();
    const error = new NotFoundError('Book B9 not found');

    logFailure(logger, 'Failed to scan book', error);

    expect(logger.warn).toHaveBeenCalledWith(
      { err: error, command: 'Failed to scan book', code: 'NOT_FOUND' },
      'Failed to scan book: Book B9 not found',
    );
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs rejected credentials at warn', () => {
    const logger = mockLogger();

    logFailure(logger, 'Failed to borrow book', new UnauthorizedError('Credentials rejected for student S1'));

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn.mock.calls[0][0]).toMatchObject({ code: 'UNAUTHORIZED' });
  });

  it('logs store failures and unexpected errors at error', () => {
    const logger = mockLogger();
    const storeError = new StoreUnavailableError('catalog.find', new Error('disk I/O error'));

    logFailure(logger, 'Failed to return book', storeError);
    logFailure(logger, 'Failed to seed catalog', new Error('boom'));

    expect(logger.error).toHaveBeenNthCalledWith(
      1,
      { err: storeError, command: 'Failed to return book' },
      'Failed to return book: Store unavailable during catalog.find: disk I/O error',
    );
    expect(logger.error.mock.calls[1][1]).toBe('Failed to seed catalog: boom');
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe('reportStoreHealth', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('reports an open database as healthy', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const db = openDatabase(IN_MEMORY);
    const logger = mockLogger();

    try {
      expect(await reportStoreHealth(db, logger)).toBe(true);
    } finally {
      db.close();
    }
    expect(logger.error).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints one failure line, logs it and sets the exit code when the ping fails', async () => {
    const printed = vi.spyOn(console, 'error').mockImplementation(() => {});
    const db = openDatabase(IN_MEMORY);
    db.close();
    const logger = mockLogger();

    expect(await reportStoreHealth(db, logger)).toBe(false);

    expect(printed).toHaveBeenCalledTimes(1);
    expect(printed).toHaveBeenCalledWith(expect.anything(), 'Database connection: FAILED');
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0][0]).toMatchObject({ command: 'status' });
    expect(process.exitCode).toBe(1);
  });
});

describe('parseLimit', () => {
  it('accepts positive integers', () => {
    expect(parseLimit('20')).toBe(20);
    expect(parseLimit(' 5 ')).toBe(5);
  });

  it('rejects trailing garbage, zero, negatives and decimals', () => {
    for (const value of ['5abc', '0', '-1', '2.5', '']) {
      expect(() => parseLimit(value)).toThrow(`Expected a positive integer, got "${value}".`);
    }
  });
});

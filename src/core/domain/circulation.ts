import type { BookPatch, BookRecord, CirculationStatus, Party } from '../ports';

// Each transition writes all three circulation fields so a book can never
// end up both held and reserved.

export const lendTo = (holder: Party): BookPatch => ({
  status: 'Borrowed',
  holder,
  reservation: null,
});

export const reserveFor = (reservation: Party): BookPatch => ({
  status: 'Reserved',
  holder: null,
  reservation,
});

export const shelve = (): BookPatch => ({
  status: 'Available',
  holder: null,
  reservation: null,
});

export const applyPatch = (book: BookRecord, patch: BookPatch): BookRecord => {
  const next: BookRecord = { ...book, status: patch.status ?? book.status };
  if (patch.holder !== undefined) {
    next.holder = patch.holder ?? undefined;
  }
  if (patch.reservation !== undefined) {
    next.reservation = patch.reservation ?? undefined;
  }
  return next;
};

// Blank titles are shown under the configured placeholder label
export const displayTitle = (title: string, untitledLabel: string): string =>
  title.trim() === '' ? untitledLabel : title;

// Holder present iff Borrowed, reservation present iff Reserved
export const isConsistent = (book: BookRecord): boolean => {
  const held = book.holder !== undefined;
  const reserved = book.reservation !== undefined;
  return held === (book.status === 'Borrowed') && reserved === (book.status === 'Reserved');
};

// Earliest entry by store sequence; ties cannot occur since sequences are unique
export const earliest = <T extends { sequence: number }>(entries: readonly T[]): T | undefined =>
  entries.reduce<T | undefined>(
    (first, entry) => (first === undefined || entry.sequence < first.sequence ? entry : first),
    undefined,
  );

export const secretsMatch = (supplied: string, stored: string): boolean => supplied.trim() === stored.trim();

export const isCirculationStatus = (value: string): value is CirculationStatus =>
  value === 'Available' || value === 'Borrowed' || value === 'Reserved';

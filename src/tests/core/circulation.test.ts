import { describe, it, expect } from 'vitest';
import {
  applyPatch,
  displayTitle,
  earliest,
  isConsistent,
  lendTo,
  reserveFor,
  secretsMatch,
  shelve,
} from '../../core/domain/circulation';
import type { BookRecord } from '../../core/ports';

const available: BookRecord = { id: 'B1', title: 'Dune', status: 'Available' };

describe('circulation transitions', () => {
  it('lending sets the holder and clears any reservation', () => {
    const reserved = applyPatch(available, reserveFor({ id: 'S2', name: 'Grace' }));
    const lent = applyPatch(reserved, lendTo({ id: 'S2', name: 'Grace' }));

    expect(lent.status).toBe('Borrowed');
    expect(lent.holder).toEqual({ id: 'S2', name: 'Grace' });
    expect(lent.reservation).toBeUndefined();
    expect(isConsistent(lent)).toBe(true);
  });

  it('reserving clears the holder', () => {
    const lent = applyPatch(available, lendTo({ id: 'S1', name: 'Ada' }));
    const reserved = applyPatch(lent, reserveFor({ id: 'S2', name: 'Grace' }));

    expect(reserved).toMatchObject({ status: 'Reserved', reservation: { id: 'S2', name: 'Grace' } });
    expect(reserved.holder).toBeUndefined();
    expect(isConsistent(reserved)).toBe(true);
  });

  it('shelving clears both slots', () => {
    const lent = applyPatch(available, lendTo({ id: 'S1', name: 'Ada' }));
    const shelved = applyPatch(lent, shelve());

    expect(shelved.status).toBe('Available');
    expect(shelved.holder).toBeUndefined();
    expect(shelved.reservation).toBeUndefined();
  });

  it('leaves untouched fields alone for a partial patch', () => {
    const lent = applyPatch(available, lendTo({ id: 'S1', name: 'Ada' }));

    expect(applyPatch(lent, { status: 'Borrowed' })).toEqual(lent);
  });
});

describe('isConsistent', () => {
  it('rejects a borrowed book without a holder', () => {
    expect(isConsistent({ ...available, status: 'Borrowed' })).toBe(false);
  });

  it('rejects a book both held and reserved', () => {
    expect(
      isConsistent({
        ...available,
        status: 'Borrowed',
        holder: { id: 'S1', name: 'Ada' },
        reservation: { id: 'S2', name: 'Grace' },
      }),
    ).toBe(false);
  });

  it('rejects an available book with a reservation', () => {
    expect(isConsistent({ ...available, reservation: { id: 'S2', name: 'Grace' } })).toBe(false);
  });
});

describe('earliest', () => {
  it('picks the smallest sequence regardless of array order', () => {
    expect(earliest([{ sequence: 9 }, { sequence: 2 }, { sequence: 5 }])).toEqual({ sequence: 2 });
  });

  it('returns undefined for an empty list', () => {
    expect(earliest([])).toBeUndefined();
  });
});

describe('secretsMatch', () => {
  it('ignores surrounding whitespace but nothing else', () => {
    expect(secretsMatch(' pw-1\t', 'pw-1')).toBe(true);
    expect(secretsMatch('PW-1', 'pw-1')).toBe(false);
    expect(secretsMatch('pw 1', 'pw1')).toBe(false);
  });
});

describe('displayTitle', () => {
  it('substitutes the label for blank titles only', () => {
    expect(displayTitle('', 'Untitled')).toBe('Untitled');
    expect(displayTitle('   ', 'Untitled')).toBe('Untitled');
    expect(displayTitle(' Dune ', 'Untitled')).toBe(' Dune ');
  });
});

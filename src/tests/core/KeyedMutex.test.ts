import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '../../core/application/locks/KeyedMutex';

// Let every pending microtask run
const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

describe('KeyedMutex', () => {
  it('runs tasks under the same key one at a time, in call order', async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let releaseFirst = (): void => undefined;

    const first = mutex.runExclusive('B1', async () => {
      events.push('first:start');
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      events.push('first:end');
      return 1;
    });
    const second = mutex.runExclusive('B1', async () => {
      events.push('second:start');
      return 2;
    });

    await flush();
    expect(events).toEqual(['first:start']);

    releaseFirst();
    await expect(Promise.all([first, second])).resolves.toEqual([1, 2]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('does not hold back tasks under a different key', async () => {
    const mutex = new KeyedMutex();
    let releaseFirst = (): void => undefined;

    const blocked = mutex.runExclusive('B1', async () => {
      await new Promise<void>((resolve) => {
        releaseFirst = resolve;
      });
      return 'B1 done';
    });
    await flush();

    await expect(mutex.runExclusive('B2', async () => 'B2 done')).resolves.toBe('B2 done');
    expect(mutex.activeKeys).toBe(1);

    releaseFirst();
    await expect(blocked).resolves.toBe('B1 done');
  });

  it('releases the key when a task throws', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('B1', async () => {
      throw new Error('store down');
    });
    const next = mutex.runExclusive('B1', async () => 'ran');

    await expect(failing).rejects.toThrow('store down');
    await expect(next).resolves.toBe('ran');
    expect(mutex.activeKeys).toBe(0);
  });
});

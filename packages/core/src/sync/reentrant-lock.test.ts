import { describe, it, expect } from 'vitest';
import { NotificationDepthError } from '../errors/observa-error.js';
import { ReentrantLock } from './reentrant-lock.js';

describe('ReentrantLock', () => {
  it('should return the guarded result', () => {
    const lock = new ReentrantLock();
    expect(lock.runExclusive(() => 'done')).toBe('done');
  });

  it('should allow re-acquisition by the holding call stack', () => {
    const lock = new ReentrantLock();
    const counts: number[] = [];

    lock.runExclusive(() => {
      counts.push(lock.holdCount);
      lock.runExclusive(() => {
        counts.push(lock.holdCount);
      });
      counts.push(lock.holdCount);
    });

    expect(counts).toEqual([1, 2, 1]);
    expect(lock.isLocked).toBe(false);
  });

  it('should release when the guarded function throws', () => {
    const lock = new ReentrantLock();

    expect(() =>
      lock.runExclusive(() => {
        throw new Error('guarded failure');
      })
    ).toThrow('guarded failure');

    expect(lock.holdCount).toBe(0);
  });

  it('should refuse to nest past the depth limit', () => {
    const lock = new ReentrantLock({ maxDepth: 2, context: { owner: 'Counter' } });
    let caught: unknown;

    lock.runExclusive(() => {
      lock.runExclusive(() => {
        try {
          lock.runExclusive(() => undefined);
        } catch (error) {
          caught = error;
        }
      });
    });

    expect(caught).toBeInstanceOf(NotificationDepthError);
    expect(caught).toMatchObject({ maxDepth: 2, context: { owner: 'Counter', maxDepth: 2 } });
    expect(lock.isLocked).toBe(false);
  });
});

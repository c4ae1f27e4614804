import { describe, it, expect } from 'vitest';
import { ObserverError } from '../errors/observa-error.js';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { dispatch, raiseFailures } from './dispatcher.js';
import { ObserverRegistry } from './registry.js';
import type { Notification } from './types.js';

function notification(previous: number, next: number): Notification<number, number, number> {
  return { key: 'age', payload: () => next, previous: () => previous, next: () => next };
}

function recordingLogger() {
  const entries: LogEntry[] = [];
  return { entries, logger: createLogger({ handler: (entry) => entries.push(entry) }) };
}

describe('dispatch', () => {
  it('should call each observer with the arguments its arity asks for', () => {
    const { logger } = recordingLogger();
    const registry = new ObserverRegistry({ key: 'age' });
    const calls: unknown[][] = [];
    const none = () => {
      calls.push([]);
    };
    const one = (next: number) => {
      calls.push([next]);
    };
    const two = (previous: number, next: number) => {
      calls.push([previous, next]);
    };
    registry.add(none);
    registry.add(one);
    registry.add(two);

    const failures = dispatch(registry.live(), notification(1, 2), logger);

    expect(failures).toEqual([]);
    expect(calls).toEqual([[], [2], [1, 2]]);
  });

  it('should only build the arguments an observer needs', () => {
    const { logger } = recordingLogger();
    const registry = new ObserverRegistry({ key: 'items' });
    const built: string[] = [];
    const onChange = () => undefined;
    registry.add(onChange);

    dispatch(
      registry.live(),
      {
        key: 'items',
        payload: () => built.push('payload'),
        previous: () => built.push('previous'),
        next: () => built.push('next'),
      },
      logger
    );

    expect(built).toEqual([]);
  });

  it('should run every observer and collect failures in call order', () => {
    const { entries, logger } = recordingLogger();
    const registry = new ObserverRegistry({ key: 'age' });
    const first = new Error('first');
    const reached: string[] = [];
    function failing(): void {
      throw first;
    }
    const after = () => {
      reached.push('after');
    };
    registry.add(failing);
    registry.add(after);

    const failures = dispatch(registry.live(), notification(1, 2), logger);

    expect(failures).toEqual([first]);
    expect(reached).toEqual(['after']);
    expect(entries).toEqual([
      expect.objectContaining({
        level: 'error',
        message: 'Error in observer for "age"',
        context: { key: 'age', observer: 'failing' },
        error: expect.objectContaining({ message: 'first' }),
      }),
    ]);
  });

  it('should skip observers removed during the sweep', () => {
    const { logger } = recordingLogger();
    const registry = new ObserverRegistry({ key: 'age' });
    const reached: string[] = [];
    const second = () => {
      reached.push('second');
    };
    const first = () => {
      reached.push('first');
      registry.remove(second);
    };
    registry.add(first);
    registry.add(second);

    dispatch(registry.live(), notification(1, 2), logger);

    expect(reached).toEqual(['first']);
  });

  it('should log rejected async observers without failing the dispatch', async () => {
    const { entries, logger } = recordingLogger();
    const registry = new ObserverRegistry({ key: 'age' });
    const onAge = async (_next: number) => {
      throw new Error('async failure');
    };
    registry.add(onAge);

    const failures = dispatch(registry.live(), notification(1, 2), logger);
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(failures).toEqual([]);
    expect(entries).toEqual([
      expect.objectContaining({
        message: 'Async observer for "age" rejected',
        context: { key: 'age', observer: 'onAge' },
      }),
    ]);
  });
});

describe('raiseFailures', () => {
  it('should do nothing without failures', () => {
    expect(() => raiseFailures('age', [])).not.toThrow();
  });

  it('should rethrow a single failure as-is', () => {
    const failure = new RangeError('only one');
    expect(() => raiseFailures('age', [failure])).toThrow(failure);
  });

  it('should aggregate several failures', () => {
    const failures = [new Error('a'), new Error('b')];
    let caught: unknown;
    try {
      raiseFailures('age', failures);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ObserverError);
    expect(caught).toMatchObject({ errors: failures, message: '2 observers failed while notifying "age"' });
  });
});

import { describe, it, expect } from 'vitest';
import { canCollectGarbage, collectGarbage } from '../__tests__/collect-garbage.js';
import { InvalidObserverError } from '../errors/observa-error.js';
import { createLogger, type LogEntry } from '../observability/logger.js';
import { ObserverRegistry, type ObserverRefFactory } from './registry.js';
import type { AnyObserver } from './types.js';

/** Reference factory whose targets are "collected" on demand */
function controlledRefs() {
  const collected = new Set<AnyObserver>();
  const createRef: ObserverRefFactory = (callback) => ({
    deref: () => (collected.has(callback) ? undefined : callback),
  });
  return { createRef, collect: (callback: AnyObserver) => collected.add(callback) };
}

describe('ObserverRegistry', () => {
  describe('registration', () => {
    it('should keep registration order', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const first = () => undefined;
      const second = (_next: number) => undefined;
      const third = (_previous: number, _next: number) => undefined;

      registry.add(first);
      registry.add(second);
      registry.add(third);

      expect(registry.live().map((observer) => [observer.callback, observer.arity])).toEqual([
        [first, 0],
        [second, 1],
        [third, 2],
      ]);
    });

    it('should ignore duplicate registrations', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const onAge = () => undefined;

      expect(registry.add(onAge)).toBe(true);
      expect(registry.add(onAge)).toBe(false);
      expect(registry.size).toBe(1);
    });

    it('should reject observers with too many parameters', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      expect(() => registry.add((_a: number, _b: number, _c: number) => undefined)).toThrow(InvalidObserverError);
      expect(registry.size).toBe(0);
    });

    it('should report observers by arity', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const onAge = (_next: number) => undefined;
      registry.add(onAge);

      expect(registry.hasArity(1)).toBe(true);
      expect(registry.hasArity(2)).toBe(false);
    });
  });

  describe('removal', () => {
    it('should remove a registered observer', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const onAge = () => undefined;
      registry.add(onAge);

      expect(registry.remove(onAge)).toBe(true);
      expect(registry.has(onAge)).toBe(false);
      expect(registry.remove(onAge)).toBe(false);
    });

    it('should mark removed observers in earlier snapshots', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const onAge = () => undefined;
      registry.add(onAge);

      const [observer] = registry.live();
      expect(observer?.isRegistered()).toBe(true);

      registry.remove(onAge);
      expect(observer?.isRegistered()).toBe(false);
    });

    it('should unregister everything on clear', () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const first = () => undefined;
      const second = () => undefined;
      registry.add(first);
      registry.add(second);

      const snapshot = registry.live();
      registry.clear();

      expect(registry.size).toBe(0);
      expect(snapshot.map((observer) => observer.isRegistered())).toEqual([false, false]);
    });

    it('should log removals of unknown observers at debug level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'debug', handler: (entry) => entries.push(entry) });
      const registry = new ObserverRegistry({ key: 'age', logger });

      registry.remove(() => undefined);

      expect(entries).toEqual([
        expect.objectContaining({ level: 'debug', message: 'Observer not registered, nothing to remove', context: { key: 'age' } }),
      ]);
    });
  });

  describe('weak holding', () => {
    it('should skip and prune collected observers', () => {
      const refs = controlledRefs();
      const entries: LogEntry[] = [];
      const logger = createLogger({ level: 'debug', handler: (entry) => entries.push(entry) });
      const registry = new ObserverRegistry({ key: 'age', logger, createRef: refs.createRef });
      const kept = () => undefined;
      const dropped = () => undefined;
      registry.add(dropped);
      registry.add(kept);

      refs.collect(dropped);

      expect(registry.live().map((observer) => observer.callback)).toEqual([kept]);
      expect(registry.size).toBe(1);
      expect(entries.at(-1)).toMatchObject({ message: 'Pruned collected observers', context: { key: 'age', pruned: 1 } });
    });

    it('should not report a collected callback as registered', () => {
      const refs = controlledRefs();
      const registry = new ObserverRegistry({ key: 'age', createRef: refs.createRef });
      const onAge = () => undefined;
      registry.add(onAge);

      refs.collect(onAge);

      expect(registry.has(onAge)).toBe(false);
    });

    it.runIf(canCollectGarbage)('should not keep unreferenced callbacks alive', async () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const kept = () => undefined;
      registry.add(kept);
      (() => {
        registry.add(() => undefined);
      })();
      expect(registry.size).toBe(2);

      await collectGarbage();

      expect(registry.live().map((observer) => observer.callback)).toEqual([kept]);
    });

    it.runIf(canCollectGarbage)('should keep an owned callback alive as long as its owner', async () => {
      const registry = new ObserverRegistry({ key: 'age' });
      const owner = { name: 'widget' };
      (() => {
        registry.add(() => undefined, { owner });
      })();

      await collectGarbage();

      expect(registry.size).toBe(1);
      expect(owner.name).toBe('widget');
    });

    it.runIf(canCollectGarbage)('should release an owned callback with its owner', async () => {
      const registry = new ObserverRegistry({ key: 'age' });
      (() => {
        const owner = { name: 'widget' };
        registry.add(() => undefined, { owner });
      })();

      await collectGarbage();

      expect(registry.size).toBe(0);
    });
  });
});

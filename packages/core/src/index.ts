/**
 * Observable properties and collections.
 *
 * @example
 * ```typescript
 * import { ObservableList, defineObservable, observableProperty } from '@observa/core';
 *
 * class Person extends defineObservable({
 *   name: observableProperty(''),
 *   age: observableProperty(0),
 * }) {}
 *
 * const person = new Person();
 * const onAge = (previous: number, next: number) => console.log(previous, next);
 * person.addObserver('age', onAge);
 * person.age = 41;
 *
 * const tags = new ObservableList<string>();
 * const onTags = () => console.log(tags.toArray());
 * tags.addObserver(onTags);
 * tags.append('new');
 * ```
 *
 * @module @observa/core
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export {
  DEFAULT_MAX_NOTIFICATION_DEPTH,
  defaultObservableConfig,
  resolveObservableConfig,
  type ObservableConfig,
  type ResolvedObservableConfig,
} from './config.js';

// Observers
export * from './observers/index.js';

// Objects
export * from './object/index.js';

// Collections
export * from './collections/index.js';

// Locking
export { ReentrantLock, type ReentrantLockOptions } from './sync/reentrant-lock.js';
